/**
 * File System Abstraction
 *
 * Read-only, scope-relative view of a template tree. Lets the resolver run
 * against the local disk, an in-memory tree, or anything else that can list
 * directories and stream files.
 *
 * Paths are `/`-separated and relative to the scope. `''` is the scope itself.
 */

/** Chunk size used when a file is read or streamed. */
export const READ_CHUNK_SIZE = 64 * 1024;

export interface FileInfo {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
  size: number;
  mtime: Date | null;
}

export interface DirEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
}

/** An open file. `read` returns 0 once the end is reached. */
export interface TemplateFile {
  read(into: Uint8Array): Promise<number>;
  close(): Promise<void>;
}

export interface TemplateFs {
  /** Stat a file or directory. */
  stat(path: string): Promise<FileInfo>;

  /** List the immediate children of a directory. */
  readDir(path: string): Promise<DirEntry[]>;

  /** Open a regular file for reading. */
  open(path: string): Promise<TemplateFile>;

  /** Scope a subtree. The returned view resolves paths relative to `dir`. */
  sub(dir: string): TemplateFs;
}

export type FileSystemErrorCode = 'NOT_FOUND' | 'PERMISSION_DENIED' | 'UNKNOWN';

export class FileSystemError extends Error {
  constructor(
    message: string,
    public readonly code: FileSystemErrorCode,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'FileSystemError';
  }
}

/** True when `error` is the "does not exist" condition of the contract. */
export function isNotFound(error: unknown): boolean {
  return error instanceof FileSystemError && error.code === 'NOT_FOUND';
}

/**
 * Split a scope-relative path into its elements.
 * Rejects `.` and `..` so a scope can never be escaped.
 */
export function splitPath(path: string): string[] {
  const parts = path.split('/').filter(Boolean);
  for (const part of parts) {
    if (part === '.' || part === '..') {
      throw new FileSystemError(`Invalid path: ${path}`, 'NOT_FOUND');
    }
  }
  return parts;
}

/** Join scope-relative path elements. */
export function joinPath(...parts: string[]): string {
  return parts.filter(Boolean).join('/');
}

/** Read a whole file into memory. */
export async function readAll(fs: TemplateFs, path: string): Promise<Uint8Array> {
  const file = await fs.open(path);
  try {
    const chunks: Uint8Array[] = [];
    let total = 0;
    for (;;) {
      const chunk = new Uint8Array(READ_CHUNK_SIZE);
      const n = await file.read(chunk);
      if (n === 0) break;
      chunks.push(chunk.subarray(0, n));
      total += n;
    }
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      out.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return out;
  } finally {
    await file.close();
  }
}

/**
 * Stream an open file: `prefix` first (bytes already consumed), then the rest
 * of the file. The file is closed at the end, on error, or on cancel.
 */
export function toReadableStream(
  file: TemplateFile,
  prefix: Uint8Array = new Uint8Array(0),
): ReadableStream<Uint8Array> {
  let pending: Uint8Array | null = prefix.byteLength > 0 ? prefix : null;

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      if (pending) {
        controller.enqueue(pending);
        pending = null;
        return;
      }
      try {
        const chunk = new Uint8Array(READ_CHUNK_SIZE);
        const n = await file.read(chunk);
        if (n === 0) {
          await file.close();
          controller.close();
          return;
        }
        controller.enqueue(chunk.subarray(0, n));
      } catch (error) {
        controller.error(error);
        await file.close();
      }
    },
    cancel: () => file.close(),
  });
}
