/**
 * Segment Matcher
 *
 * Resolves one URL path segment against the subdirectories of a template
 * directory:
 * - Literal directories (/about → about/)
 * - Pattern directories, named `{regex}` (/users/42 → users/{(?<id>\d+)}/)
 *
 * A literal directory always wins. Among pattern directories, the one with
 * the most capture groups wins; ties go to the lexically first name.
 */

import { type DirEntry, type FileInfo, isNotFound, type TemplateFs } from '../type/fs.type.ts';
import { type Logger, logger as defaultLogger } from '../type/logger.type.ts';
import {
  type DirEntryWithSubmatches,
  fromFsError,
  type KeyValuePair,
  ResolutionError,
} from '../type/resolution.type.ts';

export const PATTERN_OPEN = '{';
export const PATTERN_CLOSE = '}';

/** Result of matching one segment. `name` is the directory's real name. */
export interface SegmentMatch {
  readonly name: string;
  readonly entry: DirEntryWithSubmatches;
}

/** Compiled pattern directory */
export interface CompiledPattern {
  readonly dirName: string;
  readonly regex: RegExp;
  /** Group names by capture index; '' for unnamed groups. */
  readonly groups: readonly string[];
}

/** True for names of the form `{...}` with a non-empty body. */
export function isPatternSegment(name: string): boolean {
  return name.length >= 3 && name.startsWith(PATTERN_OPEN) && name.endsWith(PATTERN_CLOSE);
}

const NAMED_GROUP = /^\(\?P?<([\p{ID_Start}$_][\p{ID_Continue}$\u200c\u200d]*)>/u;

/**
 * Scan a pattern body for capture groups.
 * Rewrites `(?P<name>` to `(?<name>` and records group names in index order.
 */
export function translatePattern(body: string): { source: string; groups: string[] } {
  let source = '';
  const groups: string[] = [];
  let inClass = false;

  for (let i = 0; i < body.length; i++) {
    const c = body[i];

    if (c === '\\') {
      source += body.slice(i, i + 2);
      i++;
      continue;
    }
    if (inClass) {
      if (c === ']') inClass = false;
      source += c;
      continue;
    }
    if (c === '[') {
      inClass = true;
    } else if (c === '(') {
      if (body[i + 1] !== '?') {
        groups.push('');
      } else {
        const named = NAMED_GROUP.exec(body.slice(i));
        if (named) {
          groups.push(named[1]);
          source += `(?<${named[1]}>`;
          i += named[0].length - 1;
          continue;
        }
      }
    }
    source += c;
  }

  return { source, groups };
}

/** Compile a pattern directory name. Throws MALFORMED on an invalid body. */
export function compilePattern(dirName: string): CompiledPattern {
  const body = dirName.slice(PATTERN_OPEN.length, -PATTERN_CLOSE.length);
  const { source, groups } = translatePattern(body);
  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${source})$`, 'u');
  } catch (error) {
    throw ResolutionError.malformed(`Invalid pattern directory name: ${dirName}`, error);
  }
  if (countGroups(source) !== groups.length) {
    throw ResolutionError.malformed(`Unrecognized capture group in pattern directory: ${dirName}`);
  }
  return { dirName, regex, groups };
}

/** Capture groups the engine sees in `source`; the empty alternative always matches. */
function countGroups(source: string): number {
  const match = new RegExp(`(?:${source})|`, 'u').exec('');
  return match ? match.length - 1 : 0;
}

/** Evaluate a compiled pattern against one segment. */
export function execPattern(pattern: CompiledPattern, segment: string): KeyValuePair[] | null {
  const match = pattern.regex.exec(segment);
  if (!match) return null;
  return pattern.groups.map((key, i) => ({ key, value: match[i + 1] ?? '' }));
}

export class SegmentMatcher {
  constructor(private readonly logger: Logger = defaultLogger) {}

  /**
   * Match `segment` against the children of `scope`.
   * Throws NOT_FOUND when nothing matches, MALFORMED for a bad pattern
   * directory and IO for any other filesystem failure.
   */
  async match(scope: TemplateFs, segment: string): Promise<SegmentMatch> {
    if (isPatternSegment(segment)) {
      throw ResolutionError.notFound(`Path includes a pattern: ${segment}`);
    }

    const exact = await this.statExact(scope, segment);
    if (exact) {
      if (!exact.isDirectory) {
        throw ResolutionError.notFound(`${segment} is not a directory`);
      }
      this.logger.debug('literal directory matched', { segment });
      return { name: exact.name, entry: { file: exact, submatches: [] } };
    }

    const candidates = await this.findPatternMatches(scope, segment);
    if (candidates.length === 0) {
      throw ResolutionError.notFound(`Directory not found: ${segment}`);
    }

    let best = candidates[0];
    for (const candidate of candidates.slice(1)) {
      if (candidate.submatches.length > best.submatches.length) best = candidate;
    }
    this.logger.debug('pattern directory matched', { segment, directory: best.dirName });

    let file: FileInfo;
    try {
      file = await scope.stat(best.dirName);
    } catch (error) {
      throw fromFsError(`Failed to look up ${best.dirName}`, error);
    }

    return { name: best.dirName, entry: { file, submatches: best.submatches } };
  }

  /** Every pattern directory under `scope` that matches `segment`, in lexical order. */
  async findPatternMatches(
    scope: TemplateFs,
    segment: string,
  ): Promise<{ dirName: string; submatches: KeyValuePair[] }[]> {
    let entries: DirEntry[];
    try {
      entries = await scope.readDir('');
    } catch (error) {
      throw fromFsError('Failed to list directory entries', error);
    }

    const names = entries
      .filter((e) => e.isDirectory && isPatternSegment(e.name))
      .map((e) => e.name)
      .sort();

    const matches: { dirName: string; submatches: KeyValuePair[] }[] = [];
    for (const dirName of names) {
      const pattern = compilePattern(dirName);
      const submatches = execPattern(pattern, segment);
      if (submatches) {
        this.logger.debug('pattern matches', { dirName, segment, captures: submatches.length });
        matches.push({ dirName, submatches });
      }
    }
    return matches;
  }

  private async statExact(scope: TemplateFs, segment: string): Promise<FileInfo | null> {
    try {
      return await scope.stat(segment);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw ResolutionError.io(`Failed to check directory ${segment}`, error);
    }
  }
}
