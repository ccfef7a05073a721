import { expect, test } from 'vitest';
import { MemoryFsRuntime } from '../../runtime/memory/fs/memory-fs.runtime.ts';
import { readAll } from '../../src/type/fs.type.ts';

const decode = (data: Uint8Array) => new TextDecoder().decode(data);

test('MemoryFsRuntime - parents of a file are implied directories', async () => {
  const fs = new MemoryFsRuntime({ 'a/b/c.txt': 'x' });

  expect(await fs.stat('a/b')).toMatchObject({ name: 'b', isDirectory: true, isFile: false });
  expect(await fs.stat('a/b/c.txt')).toMatchObject({ name: 'c.txt', isFile: true, size: 1 });
});

test('MemoryFsRuntime - trailing slash declares an empty directory', async () => {
  const fs = new MemoryFsRuntime({ 'empty/': '' });

  expect(await fs.readDir('empty')).toEqual([]);
});

test('MemoryFsRuntime - readDir lists children in lexical order', async () => {
  const fs = new MemoryFsRuntime({ 'b.txt': '', 'a/': '', 'c/d.txt': '' });

  expect(await fs.readDir('')).toEqual([
    { name: 'a', isFile: false, isDirectory: true },
    { name: 'b.txt', isFile: true, isDirectory: false },
    { name: 'c', isFile: false, isDirectory: true },
  ]);
});

test('MemoryFsRuntime - missing paths are NOT_FOUND', async () => {
  const fs = new MemoryFsRuntime({ 'a.txt': '' });

  await expect(fs.stat('b.txt')).rejects.toMatchObject({ code: 'NOT_FOUND' });
  await expect(fs.open('a.txt/x')).rejects.toMatchObject({ code: 'NOT_FOUND' });
});

test('MemoryFsRuntime - directories cannot be opened, files cannot be listed', async () => {
  const fs = new MemoryFsRuntime({ 'dir/file.txt': '' });

  await expect(fs.open('dir')).rejects.toMatchObject({ code: 'NOT_FOUND' });
  await expect(fs.readDir('dir/file.txt')).rejects.toMatchObject({ code: 'NOT_FOUND' });
});

test('MemoryFsRuntime - dot segments are rejected', async () => {
  const fs = new MemoryFsRuntime({ 'a/b.txt': '' });

  await expect(fs.stat('a/../a/b.txt')).rejects.toMatchObject({ code: 'NOT_FOUND' });
  await expect(fs.sub('a').open('../a/b.txt')).rejects.toMatchObject({ code: 'NOT_FOUND' });
});

test('MemoryFsRuntime - open reads the whole content across calls', async () => {
  const fs = new MemoryFsRuntime({ 'note.txt': 'hello' });
  const file = await fs.open('note.txt');
  const buf = new Uint8Array(3);

  expect(await file.read(buf)).toBe(3);
  expect(decode(buf)).toBe('hel');
  expect(await file.read(buf)).toBe(2);
  expect(decode(buf.subarray(0, 2))).toBe('lo');
  expect(await file.read(buf)).toBe(0);
});

test('MemoryFsRuntime - sub scopes paths to a subtree', async () => {
  const fs = new MemoryFsRuntime({ 'a/b/c.txt': 'deep' });
  const scoped = fs.sub('a').sub('b');

  expect(decode(await readAll(scoped, 'c.txt'))).toBe('deep');
  expect(await scoped.stat('')).toMatchObject({ name: 'b', isDirectory: true });
});

test('MemoryFsRuntime - binary content is kept as is', async () => {
  const fs = new MemoryFsRuntime({ 'data.bin': new Uint8Array([0, 255, 1]) });

  expect(Array.from(await readAll(fs, 'data.bin'))).toEqual([0, 255, 1]);
});

test('MemoryFsRuntime - a path used as both file and directory is rejected', () => {
  expect(() => new MemoryFsRuntime({ a: 'file', 'a/b.txt': '' })).toThrow(
    'Path is both a file and a directory: a/b.txt',
  );
});
