/**
 * Unit tests for Template Assembler
 *
 * Directory descent over an in-memory tree: fragment inheritance and
 * override, body presence, the not-found marker, captures and error kinds.
 */

import { expect, test } from 'vitest';
import { type MemoryFiles, MemoryFsRuntime } from '../../runtime/memory/fs/memory-fs.runtime.ts';
import { TemplateAssembler } from '../../src/template/template.assembler.ts';
import { TemplateSet } from '../../src/template/template.set.ts';
import { FileSystemError, type TemplateFs } from '../../src/type/fs.type.ts';
import { createRecordingLogger, page } from './test.util.ts';

async function assemble(files: MemoryFiles, segments: string[]) {
  const templates = new TemplateSet();
  const submatches = await new TemplateAssembler(new MemoryFsRuntime(files)).assemble(templates, segments);
  return { templates, submatches };
}

// ============================================================================
// Body presence
// ============================================================================

test('assemble - root body alone resolves /', async () => {
  const { templates, submatches } = await assemble({ 'body.html.tmpl': 'Home' }, []);

  expect(submatches).toEqual([]);
  expect(templates.render({})).toBe(page('', 'Home'));
});

test('assemble - no body on the path is not found', async () => {
  await expect(assemble({ 'about/title.html.tmpl': 'About' }, ['about'])).rejects.toMatchObject({
    kind: 'NOT_FOUND',
  });
});

test('assemble - empty tree is not found', async () => {
  await expect(assemble({}, [])).rejects.toMatchObject({ kind: 'NOT_FOUND' });
});

test('assemble - root body covers deeper paths without their own', async () => {
  const { templates } = await assemble(
    { 'body.html.tmpl': 'Home {{> extra}}', 'docs/extra.html.tmpl': 'Docs' },
    ['docs'],
  );

  expect(templates.render({})).toBe(page('', 'Home Docs'));
});

test('assemble - a body anywhere on the path is enough', async () => {
  const { templates } = await assemble({ 'a/body.html.tmpl': 'A', 'a/b/': '' }, ['a', 'b']);

  expect(templates.render({})).toBe(page('', 'A'));
});

// ============================================================================
// Inheritance and override
// ============================================================================

test('assemble - deeper body overrides while the root head is inherited', async () => {
  const { templates } = await assemble(
    {
      'head.html.tmpl': '<title>Site</title>',
      'body.html.tmpl': 'Home',
      'about/body.html.tmpl': 'About',
    },
    ['about'],
  );

  expect(templates.render({})).toBe(page('<title>Site</title>', 'About'));
  expect(templates.originOf('body')).toBe('about/body.html.tmpl');
});

test('assemble - deeper head overrides the root head', async () => {
  const { templates } = await assemble(
    {
      'head.html.tmpl': 'root',
      'body.html.tmpl': 'Home',
      'docs/head.html.tmpl': 'docs',
    },
    ['docs'],
  );

  expect(templates.render({})).toBe(page('docs', 'Home'));
});

test('assemble - siblings of the path are not loaded', async () => {
  const { templates } = await assemble(
    {
      'body.html.tmpl': 'Home',
      'a/title.html.tmpl': 'A',
      'b/title.html.tmpl': 'B',
    },
    ['a'],
  );

  expect(templates.names()).toEqual(['body', 'title']);
  expect(templates.originOf('title')).toBe('a/title.html.tmpl');
});

test('assemble - directories named like fragments are skipped', async () => {
  const { templates } = await assemble(
    { 'body.html.tmpl': 'Home', 'a/nested.html.tmpl/': '' },
    ['a'],
  );

  expect(templates.has('nested')).toBe(false);
});

// ============================================================================
// Not-found marker
// ============================================================================

test('assemble - marker in the final directory is not found even with a body', async () => {
  await expect(
    assemble({ 'body.html.tmpl': 'Home', 'gone/404': '', 'gone/body.html.tmpl': 'Gone' }, ['gone']),
  ).rejects.toMatchObject({ kind: 'NOT_FOUND' });
});

test('assemble - marker at the root applies to /', async () => {
  await expect(assemble({ 'body.html.tmpl': 'Home', '404': '' }, [])).rejects.toMatchObject({
    kind: 'NOT_FOUND',
  });
});

test('assemble - marker in an intermediate directory does not apply', async () => {
  const { templates } = await assemble({ 'a/404': '', 'a/b/body.html.tmpl': 'B' }, ['a', 'b']);

  expect(templates.render({})).toBe(page('', 'B'));
});

// ============================================================================
// Captures
// ============================================================================

test('assemble - one submatch entry per segment, in path order', async () => {
  const { submatches } = await assemble(
    { 'users/{(?<id>\\d+)}/body.html.tmpl': 'User' },
    ['users', '42'],
  );

  expect(submatches).toHaveLength(2);
  expect(submatches[0].file.name).toBe('users');
  expect(submatches[0].submatches).toEqual([]);
  expect(submatches[1].file.name).toBe('{(?<id>\\d+)}');
  expect(submatches[1].submatches).toEqual([{ key: 'id', value: '42' }]);
});

// ============================================================================
// Failures
// ============================================================================

test('assemble - fragment file without a name is malformed', async () => {
  await expect(
    assemble({ 'body.html.tmpl': 'Home', 'a/.html.tmpl': 'x' }, ['a']),
  ).rejects.toMatchObject({ kind: 'MALFORMED' });
});

test('assemble - unparseable fragment is malformed', async () => {
  await expect(assemble({ 'body.html.tmpl': '{{#each items}}' }, [])).rejects.toMatchObject({
    kind: 'MALFORMED',
  });
});

test('assemble - unmatched segment deep in the path is not found', async () => {
  await expect(
    assemble({ 'body.html.tmpl': 'Home', 'a/b/': '' }, ['a', 'c']),
  ).rejects.toMatchObject({ kind: 'NOT_FOUND' });
});

test('assemble - filesystem failures other than not-exist are I/O errors', async () => {
  const denied = () => Promise.reject(new FileSystemError('denied', 'PERMISSION_DENIED'));
  const broken: TemplateFs = { stat: denied, readDir: denied, open: denied, sub: () => broken };

  await expect(
    new TemplateAssembler(broken).assemble(new TemplateSet(), []),
  ).rejects.toMatchObject({ kind: 'IO' });
});

test('assemble - an aborted signal stops resolution', async () => {
  const controller = new AbortController();
  controller.abort();

  await expect(
    new TemplateAssembler(new MemoryFsRuntime({ 'body.html.tmpl': 'Home' }))
      .assemble(new TemplateSet(), [], controller.signal),
  ).rejects.toMatchObject({ name: 'AbortError' });
});

test('assemble - logs each loaded fragment at debug', async () => {
  const { logger, entries } = createRecordingLogger();
  const fs = new MemoryFsRuntime({ 'body.html.tmpl': 'Home', 'a/title.html.tmpl': 'A' });

  await new TemplateAssembler(fs, { logger }).assemble(new TemplateSet(), ['a']);

  expect(entries).toContainEqual({
    level: 'debug',
    msg: 'fragment loaded',
    data: { name: 'title', origin: 'a/title.html.tmpl' },
  });
});
