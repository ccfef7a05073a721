/**
 * Resolution Types
 *
 * Shapes produced while a request path is resolved against the template tree,
 * and the tagged error every layer raises.
 */

import { type FileInfo, isNotFound } from './fs.type.ts';

/** One regex capture. `key` is empty for unnamed groups. */
export interface KeyValuePair {
  readonly key: string;
  readonly value: string;
}

/** A resolved directory plus the captures its name pattern produced. */
export interface DirEntryWithSubmatches {
  readonly file: FileInfo;
  readonly submatches: readonly KeyValuePair[];
}

/** One entry per path segment, in path order. */
export type PathExpressionSubmatches = readonly DirEntryWithSubmatches[];

/** Outcome of one level of the directory descent. */
export interface DescentResult {
  readonly bodyFound: boolean;
  readonly submatches: PathExpressionSubmatches;
}

/**
 * - `NOT_FOUND` → 404
 * - `MALFORMED` → 500 (bad fragment, bad pattern directory)
 * - `IO` → 500 (filesystem failure other than not-exist)
 */
export type ResolutionErrorKind = 'NOT_FOUND' | 'MALFORMED' | 'IO';

export class ResolutionError extends Error {
  constructor(
    message: string,
    public readonly kind: ResolutionErrorKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ResolutionError';
  }

  static notFound(message: string, cause?: unknown): ResolutionError {
    return new ResolutionError(message, 'NOT_FOUND', { cause });
  }

  static malformed(message: string, cause?: unknown): ResolutionError {
    return new ResolutionError(message, 'MALFORMED', { cause });
  }

  static io(message: string, cause?: unknown): ResolutionError {
    return new ResolutionError(message, 'IO', { cause });
  }
}

export function isResolutionError(
  error: unknown,
  kind?: ResolutionErrorKind,
): error is ResolutionError {
  return error instanceof ResolutionError && (kind === undefined || error.kind === kind);
}

/** Classify a filesystem failure: not-exist stays NotFound, the rest is I/O. */
export function fromFsError(message: string, error: unknown): ResolutionError {
  if (error instanceof ResolutionError) return error;
  return isNotFound(error) ? ResolutionError.notFound(message, error) : ResolutionError.io(message, error);
}
