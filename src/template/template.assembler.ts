/**
 * Template Assembler
 *
 * Walks the template tree along a request path, one directory per segment,
 * loading every `*.html.tmpl` fragment it passes into a TemplateSet:
 *
 * ```
 * /users/42
 * ├── head.html.tmpl, body.html.tmpl      (root)
 * └── users/
 *     ├── title.html.tmpl
 *     └── {(?<id>\d+)}/body.html.tmpl      overrides the root body
 * ```
 *
 * Deeper fragments override shallower ones. The walk fails with NOT_FOUND
 * when no directory on the path (root included) defines `body`.
 */

import { type DirEntry, isNotFound, joinPath, readAll, type TemplateFs } from '../type/fs.type.ts';
import { type Logger, logger as defaultLogger } from '../type/logger.type.ts';
import {
  type DescentResult,
  fromFsError,
  type PathExpressionSubmatches,
  ResolutionError,
} from '../type/resolution.type.ts';
import { SegmentMatcher } from '../route/segment.matcher.ts';
import { BODY, HEAD, NOT_FOUND_MARKER, TEMPLATE_SUFFIX } from './layout.ts';
import type { TemplateSet } from './template.set.ts';

export interface TemplateAssemblerOptions {
  logger?: Logger;
  matcher?: SegmentMatcher;
}

const decoder = new TextDecoder();

export class TemplateAssembler {
  private readonly logger: Logger;
  private readonly matcher: SegmentMatcher;

  constructor(private readonly fs: TemplateFs, options: TemplateAssemblerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.matcher = options.matcher ?? new SegmentMatcher(this.logger);
  }

  /**
   * Fill `templates` for `segments` and return the captures of every segment.
   * `signal` is checked before each directory level.
   */
  async assemble(
    templates: TemplateSet,
    segments: readonly string[],
    signal?: AbortSignal,
  ): Promise<PathExpressionSubmatches> {
    await this.loadOptional(templates, HEAD);
    const rootBody = await this.loadOptional(templates, BODY);

    const { bodyFound, submatches } = await this.descend(this.fs, '', templates, segments, 0, signal);

    if (!rootBody && !bodyFound) {
      throw ResolutionError.notFound(`No body defined for /${segments.join('/')}`);
    }
    return submatches;
  }

  /** Resolve `segments[index]` under `scope`, load its fragments and recurse. */
  private async descend(
    scope: TemplateFs,
    path: string,
    templates: TemplateSet,
    segments: readonly string[],
    index: number,
    signal?: AbortSignal,
  ): Promise<DescentResult> {
    signal?.throwIfAborted();

    if (index >= segments.length) {
      await this.checkNotFoundMarker(scope, path);
      return { bodyFound: false, submatches: [] };
    }

    const { name, entry } = await this.matcher.match(scope, segments[index]);
    const dir = scope.sub(name);
    const dirPath = joinPath(path, name);

    const defined = await this.loadDirectory(dir, dirPath, templates);
    const deeper = await this.descend(dir, dirPath, templates, segments, index + 1, signal);

    return {
      bodyFound: defined.includes(BODY) || deeper.bodyFound,
      submatches: [entry, ...deeper.submatches],
    };
  }

  /** Load a root-level fragment. Returns false when the file does not exist. */
  private async loadOptional(templates: TemplateSet, name: string): Promise<boolean> {
    const filename = `${name}${TEMPLATE_SUFFIX}`;
    let source: string;
    try {
      source = await this.readText(this.fs, filename);
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug('root fragment absent', { filename });
        return false;
      }
      throw ResolutionError.io(`Failed to read ${filename}`, error);
    }
    templates.define(name, source, filename);
    return true;
  }

  /**
   * Parse every fragment file directly inside `dir`, in lexical order.
   * Returns the fragment names defined.
   */
  private async loadDirectory(dir: TemplateFs, dirPath: string, templates: TemplateSet): Promise<string[]> {
    let entries: DirEntry[];
    try {
      entries = await dir.readDir('');
    } catch (error) {
      throw fromFsError(`Failed to list ${dirPath}`, error);
    }

    const filenames = entries
      .filter((e) => !e.isDirectory && e.name.endsWith(TEMPLATE_SUFFIX))
      .map((e) => e.name)
      .sort();

    const fragments: { name: string; origin: string; source: string }[] = [];
    for (const filename of filenames) {
      const name = filename.slice(0, -TEMPLATE_SUFFIX.length);
      const origin = joinPath(dirPath, filename);
      if (!name) {
        throw ResolutionError.malformed(`Fragment file without a name: ${origin}`);
      }
      let source: string;
      try {
        source = await this.readText(dir, filename);
      } catch (error) {
        throw ResolutionError.io(`Failed to read ${origin}`, error);
      }
      fragments.push({ name, origin, source });
    }

    for (const { name, origin, source } of fragments) {
      templates.define(name, source, origin);
      this.logger.debug('fragment loaded', { name, origin });
    }
    return fragments.map((f) => f.name);
  }

  private async checkNotFoundMarker(scope: TemplateFs, path: string): Promise<void> {
    try {
      await scope.stat(NOT_FOUND_MARKER);
    } catch (error) {
      if (isNotFound(error)) return;
      throw ResolutionError.io(`Failed to check for ${joinPath(path, NOT_FOUND_MARKER)}`, error);
    }
    throw ResolutionError.notFound(`Not-found marker present in /${path}`);
  }

  private async readText(scope: TemplateFs, path: string): Promise<string> {
    return decoder.decode(await readAll(scope, path));
  }
}
