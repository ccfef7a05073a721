/**
 * Template Server
 *
 * Maps a GET request either to a static file or to a document assembled from
 * the template tree, over any TemplateFs runtime.
 *
 * ```ts
 * import { RequestDataMap } from 'tmplroute';
 * import { TemplateServer } from 'tmplroute/server';
 *
 * const server = TemplateServer.forDirectory('./site', {
 *   data: () => new RequestDataMap({ siteName: 'Example' }),
 * });
 *
 * // any Fetch-style host:
 * const response = await server.handleRequest(request);
 * ```
 *
 * Paths whose last element has an extension are static files; `.tmpl`
 * sources are never served. Everything else goes through the assembler.
 */

import { NodeFsRuntime } from '../runtime/node/fs/node-fs.runtime.ts';
import { isNotFound, type TemplateFile, type TemplateFs, toReadableStream } from '../src/type/fs.type.ts';
import { type Logger, logger as defaultLogger } from '../src/type/logger.type.ts';
import { isResolutionError, type PathExpressionSubmatches } from '../src/type/resolution.type.ts';
import { HIDDEN_EXTENSION } from '../src/template/layout.ts';
import { TemplateAssembler } from '../src/template/template.assembler.ts';
import { TemplateSet } from '../src/template/template.set.ts';
import { resolveContentType, TEXT_HTML, TEXT_PLAIN } from '../src/util/content-type.util.ts';
import { bindRequestData, type RequestData } from '../src/util/request-data.util.ts';
import type { ResolvedResponse, TemplateServerConfig } from './server-api.type.ts';

const STATUS_TEXT: Record<number, string> = {
  404: 'Not Found',
  405: 'Method Not Allowed',
  500: 'Internal Server Error',
};

function statusOnly(status: number, headers?: Record<string, string>): ResolvedResponse {
  return { status, contentType: TEXT_PLAIN, headers, body: STATUS_TEXT[status] ?? '' };
}

/** Extension of the last path element, dot included; '' when it has none. */
export function extensionOf(pathname: string): string {
  const last = pathname.slice(pathname.lastIndexOf('/') + 1);
  const dot = last.lastIndexOf('.');
  return dot >= 0 ? last.slice(dot) : '';
}

/** Percent-decode a pathname. Returns null when it cannot be decoded. */
export function decodePathname(pathname: string): string | null {
  try {
    return decodeURIComponent(pathname);
  } catch {
    return null;
  }
}

/** Split a decoded pathname, dropping empty segments. */
export function splitPathname(decoded: string): string[] {
  return decoded.split('/').filter(Boolean);
}

export class TemplateServer<D extends RequestData = RequestData> {
  private readonly logger: Logger;
  private readonly assembler: TemplateAssembler;

  constructor(
    private readonly runtime: TemplateFs,
    private readonly config: TemplateServerConfig<D> = {},
  ) {
    this.logger = config.logger ?? defaultLogger;
    this.assembler = new TemplateAssembler(runtime, { logger: this.logger });
  }

  /** Server over a directory on the local disk. */
  static forDirectory<D extends RequestData = RequestData>(
    dir: string,
    config: TemplateServerConfig<D> = {},
  ): TemplateServer<D> {
    return new TemplateServer(new NodeFsRuntime(dir), config);
  }

  async handleRequest(request: Request): Promise<Response> {
    const { status, contentType, headers, body } = await this.resolve(request);
    const responseHeaders = new Headers(headers);
    if (contentType) responseHeaders.set('Content-Type', contentType);
    return new Response(body, { status, headers: responseHeaders });
  }

  /** Resolve a request without building a `Response`. Never rejects. */
  async resolve(request: Request): Promise<ResolvedResponse> {
    const pathname = new URL(request.url).pathname;
    this.logger.debug('request', { method: request.method, path: pathname });

    if (request.method !== 'GET') {
      this.logger.info('method not allowed', { method: request.method, path: pathname });
      return statusOnly(405, { Allow: 'GET' });
    }

    const decoded = decodePathname(pathname);
    if (decoded === null) {
      this.logger.info('undecodable path', { path: pathname });
      return statusOnly(404);
    }
    const segments = splitPathname(decoded);

    try {
      const ext = extensionOf(decoded);
      if (ext === HIDDEN_EXTENSION) {
        this.logger.info('template source requested', { path: pathname });
        return statusOnly(404);
      }
      if (ext) return await this.serveStatic(segments.join('/'), ext, pathname);
      return await this.render(request, segments, pathname);
    } catch (error) {
      return this.fail(error, pathname);
    }
  }

  private async serveStatic(filename: string, ext: string, pathname: string): Promise<ResolvedResponse> {
    let file: TemplateFile;
    try {
      file = await this.runtime.open(filename);
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.info('static file not found', { path: pathname });
        return statusOnly(404);
      }
      throw error;
    }

    try {
      const { contentType, prefix } = await resolveContentType(file, ext);
      this.logger.debug('static file', { path: pathname, contentType });
      return { status: 200, contentType, body: toReadableStream(file, prefix) };
    } catch (error) {
      await file.close();
      throw error;
    }
  }

  private async render(request: Request, segments: string[], pathname: string): Promise<ResolvedResponse> {
    const templates = new TemplateSet(this.config.helpers?.(request));

    let submatches: PathExpressionSubmatches;
    try {
      submatches = await this.assembler.assemble(templates, segments, request.signal);
    } catch (error) {
      if (isResolutionError(error, 'NOT_FOUND')) {
        this.logger.info('template not found', { path: pathname, reason: error.message });
        return statusOnly(404);
      }
      throw error;
    }

    const context = bindRequestData(this.config.data, request, submatches);
    const html = templates.render(context);
    this.logger.debug('rendered', { path: pathname, fragments: templates.names() });
    return { status: 200, contentType: TEXT_HTML, body: html };
  }

  private fail(error: unknown, pathname: string): ResolvedResponse {
    if (error instanceof Error && error.name === 'AbortError') {
      this.logger.info('request aborted', { path: pathname });
    } else {
      this.logger.error(`Error handling ${pathname}`, error);
    }
    return statusOnly(500);
  }
}

/** Create a template server over `runtime`. */
export function createTemplateServer<D extends RequestData = RequestData>(
  config: TemplateServerConfig<D>,
  runtime: TemplateFs,
): TemplateServer<D> {
  return new TemplateServer(runtime, config);
}
