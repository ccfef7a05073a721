/**
 * In-memory template tree.
 *
 * Keys are `/`-separated paths; parent directories are implied. A key ending
 * in `/` declares an (otherwise empty) directory.
 *
 * ```ts
 * const fs = new MemoryFsRuntime({
 *   'body.html.tmpl': '<h1>Home</h1>',
 *   'users/{(?<id>\\d+)}/body.html.tmpl': '<h1>User {{id}}</h1>',
 *   'assets/': '',
 * });
 * ```
 */

import {
  type DirEntry,
  type FileInfo,
  FileSystemError,
  splitPath,
  type TemplateFile,
  type TemplateFs,
} from '../../../src/type/fs.type.ts';

export type MemoryFiles = Record<string, string | Uint8Array>;

export type MemoryNode =
  | { kind: 'file'; content: Uint8Array }
  | { kind: 'dir'; children: Map<string, MemoryNode> };

export type MemoryDir = Extract<MemoryNode, { kind: 'dir' }>;

const encoder = new TextEncoder();

function buildTree(files: MemoryFiles): MemoryDir {
  const root: MemoryDir = { kind: 'dir', children: new Map() };

  for (const [path, content] of Object.entries(files)) {
    const isDir = path.endsWith('/');
    const parts = splitPath(path);
    let dir = root;

    parts.forEach((part, i) => {
      const last = i === parts.length - 1;
      const existing = dir.children.get(part);

      if (last && !isDir) {
        if (existing?.kind === 'dir') {
          throw new Error(`Path is both a file and a directory: ${path}`);
        }
        const bytes = typeof content === 'string' ? encoder.encode(content) : content;
        dir.children.set(part, { kind: 'file', content: bytes });
        return;
      }

      if (existing?.kind === 'file') {
        throw new Error(`Path is both a file and a directory: ${path}`);
      }
      if (existing) {
        dir = existing;
        return;
      }
      const child: MemoryDir = { kind: 'dir', children: new Map() };
      dir.children.set(part, child);
      dir = child;
    });
  }

  return root;
}

/** A view into a tree: the shared root plus the path of the scoped directory. */
export interface MemoryScope {
  root: MemoryDir;
  prefix: readonly string[];
}

export class MemoryFsRuntime implements TemplateFs {
  private readonly root: MemoryDir;
  private readonly prefix: readonly string[];

  constructor(files: MemoryFiles = {}, scope?: MemoryScope) {
    this.root = scope?.root ?? buildTree(files);
    this.prefix = scope?.prefix ?? [];
  }

  private lookup(path: string): { node: MemoryNode; name: string } {
    const parts = [...this.prefix, ...splitPath(path)];
    let node: MemoryNode = this.root;
    for (const part of parts) {
      const child: MemoryNode | undefined = node.kind === 'dir' ? node.children.get(part) : undefined;
      if (!child) {
        throw new FileSystemError(`Not found: ${path}`, 'NOT_FOUND');
      }
      node = child;
    }
    return { node, name: parts.length > 0 ? parts[parts.length - 1] : '.' };
  }

  async stat(path: string): Promise<FileInfo> {
    const { node, name } = this.lookup(path);
    return {
      name,
      isFile: node.kind === 'file',
      isDirectory: node.kind === 'dir',
      size: node.kind === 'file' ? node.content.byteLength : 0,
      mtime: null,
    };
  }

  async readDir(path: string): Promise<DirEntry[]> {
    const { node } = this.lookup(path);
    if (node.kind !== 'dir') {
      throw new FileSystemError(`Not a directory: ${path}`, 'NOT_FOUND');
    }
    return [...node.children.keys()].sort().map((name) => {
      const child = node.children.get(name);
      return { name, isFile: child?.kind === 'file', isDirectory: child?.kind === 'dir' };
    });
  }

  async open(path: string): Promise<TemplateFile> {
    const { node } = this.lookup(path);
    if (node.kind !== 'file') {
      throw new FileSystemError(`Not a file: ${path}`, 'NOT_FOUND');
    }
    const content = node.content;
    let position = 0;
    return {
      async read(into: Uint8Array): Promise<number> {
        const n = Math.min(into.byteLength, content.byteLength - position);
        into.set(content.subarray(position, position + n));
        position += n;
        return n;
      },
      close: async () => {},
    };
  }

  sub(dir: string): MemoryFsRuntime {
    return new MemoryFsRuntime({}, {
      root: this.root,
      prefix: [...this.prefix, ...splitPath(dir)],
    });
  }
}
