/**
 * Server API Types
 *
 * Configuration and result shapes for `createTemplateServer()`.
 */

import type { Logger } from '../src/type/logger.type.ts';
import type { HelperMap } from '../src/template/template.set.ts';
import type { RequestData, RequestDataFactory } from '../src/util/request-data.util.ts';

// ── Config ─────────────────────────────────────────────────────────────

/** Config for `createTemplateServer()`. Every field is optional. */
export interface TemplateServerConfig<D extends RequestData = RequestData> {
  /** Render context for a request. Without it templates render against `{}`. */
  data?: RequestDataFactory<D>;

  /** Template helpers for a request, registered before any fragment is parsed. */
  helpers?: (request: Request) => HelperMap;

  /** Defaults to the module logger (see `setLogger()`). */
  logger?: Logger;
}

// ── Result ─────────────────────────────────────────────────────────────

/**
 * Outcome of one request, independent of the Fetch API `Response`.
 * `body` is a rendered document, a file stream, or the status text.
 */
export interface ResolvedResponse {
  status: number;
  contentType?: string;
  headers?: Record<string, string>;
  body: string | ReadableStream<Uint8Array>;
}
