/**
 * Request Data
 *
 * Render contexts that receive the captures of the resolved path.
 *
 * ```ts
 * class PageData extends RouteParamsData {
 *   constructor(readonly user: string) { super(); }
 * }
 *
 * createTemplateServer({ data: (req) => new PageData(req.headers.get('x-user') ?? '') }, runtime);
 * // users/{(?<id>\d+)}/body.html.tmpl: <p>{{user}} viewing {{params.id}}</p>
 * ```
 */

import type { PathExpressionSubmatches } from '../type/resolution.type.ts';

/** Implemented by a render context that wants the path captures. */
export interface RequestData {
  setPathExpressionSubmatches(matches: PathExpressionSubmatches): void;
}

/** Builds the render context for one request. */
export type RequestDataFactory<D extends RequestData = RequestData> = (request: Request) => D;

/** Named captures across all segments; a later capture overwrites an earlier one. */
export function namedSubmatches(matches: PathExpressionSubmatches): Record<string, string> {
  const named: Record<string, string> = {};
  for (const entry of matches) {
    for (const { key, value } of entry.submatches) {
      if (key) named[key] = value;
    }
  }
  return named;
}

/**
 * Open-ended context: the full list under `pathExpressionSubmatches`, every
 * named capture under its own key.
 */
export class RequestDataMap implements RequestData {
  [key: string]: unknown;

  constructor(init: Record<string, unknown> = {}) {
    Object.assign(this, init);
  }

  setPathExpressionSubmatches(matches: PathExpressionSubmatches): void {
    this.pathExpressionSubmatches = matches;
    for (const [key, value] of Object.entries(namedSubmatches(matches))) {
      if (key !== 'setPathExpressionSubmatches') this[key] = value;
    }
  }
}

/** Base class for user contexts: named captures land in `params`. */
export class RouteParamsData implements RequestData {
  params: Record<string, string> = {};

  setPathExpressionSubmatches(matches: PathExpressionSubmatches): void {
    Object.assign(this.params, namedSubmatches(matches));
  }
}

/**
 * Render context for a request. With a factory its value receives the
 * captures; without one the context is empty.
 */
export function bindRequestData<D extends RequestData>(
  factory: RequestDataFactory<D> | undefined,
  request: Request,
  matches: PathExpressionSubmatches,
): D | Record<string, never> {
  if (!factory) return {};
  const data = factory(request);
  data.setPathExpressionSubmatches(matches);
  return data;
}
