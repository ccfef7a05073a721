import { open, readdir, stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import {
  type DirEntry,
  type FileInfo,
  FileSystemError,
  type FileSystemErrorCode,
  splitPath,
  type TemplateFile,
  type TemplateFs,
} from '../../../src/type/fs.type.ts';

/** Map node:fs error codes to FileSystemError codes. */
function mapErrorCode(err: unknown): FileSystemErrorCode {
  const code = err instanceof Error && 'code' in err ? err.code : undefined;
  if (code === 'ENOENT' || code === 'ENOTDIR') return 'NOT_FOUND';
  if (code === 'EACCES' || code === 'EPERM') return 'PERMISSION_DENIED';
  return 'UNKNOWN';
}

const REASONS: Record<FileSystemErrorCode, string> = {
  NOT_FOUND: 'Not found',
  PERMISSION_DENIED: 'Permission denied',
  UNKNOWN: 'I/O error',
};

function toFsError(err: unknown, path: string): FileSystemError {
  if (err instanceof FileSystemError) return err;
  const code = mapErrorCode(err);
  return new FileSystemError(`${REASONS[code]}: ${path}`, code, { cause: err });
}

/**
 * Template tree on the local disk, rooted at `root`.
 *
 * ```ts
 * const server = createTemplateServer({}, new NodeFsRuntime('./public'));
 * ```
 */
export class NodeFsRuntime implements TemplateFs {
  private readonly root: string;

  constructor(root: string) {
    const abs = resolve(root);
    this.root = abs.endsWith('/') && abs.length > 1 ? abs.slice(0, -1) : abs;
  }

  private toAbsolute(path: string): { abs: string; name: string } {
    const parts = splitPath(path);
    if (parts.length === 0) return { abs: this.root, name: basename(this.root) };
    return { abs: `${this.root}/${parts.join('/')}`, name: parts[parts.length - 1] };
  }

  async stat(path: string): Promise<FileInfo> {
    const { abs, name } = this.toAbsolute(path);
    try {
      const info = await stat(abs);
      return {
        name,
        isFile: info.isFile(),
        isDirectory: info.isDirectory(),
        size: info.size,
        mtime: info.mtime,
      };
    } catch (error) {
      throw toFsError(error, path);
    }
  }

  async readDir(path: string): Promise<DirEntry[]> {
    const { abs } = this.toAbsolute(path);
    try {
      const dirents = await readdir(abs, { withFileTypes: true });
      return dirents.map((entry) => ({
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory(),
      }));
    } catch (error) {
      throw toFsError(error, path);
    }
  }

  async open(path: string): Promise<TemplateFile> {
    const { abs } = this.toAbsolute(path);
    try {
      const handle = await open(abs, 'r');
      if ((await handle.stat()).isDirectory()) {
        await handle.close();
        throw new FileSystemError(`Not a file: ${path}`, 'NOT_FOUND');
      }
      return {
        async read(into: Uint8Array): Promise<number> {
          const { bytesRead } = await handle.read(into, 0, into.byteLength, null);
          return bytesRead;
        },
        close: () => handle.close(),
      };
    } catch (error) {
      throw toFsError(error, path);
    }
  }

  sub(dir: string): NodeFsRuntime {
    return new NodeFsRuntime(this.toAbsolute(dir).abs);
  }
}
