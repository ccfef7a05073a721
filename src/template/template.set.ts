/**
 * Composed Template Set
 *
 * One Handlebars environment per request. Fragments are registered as
 * partials, so a deeper definition replaces a shallower one and `{{> name}}`
 * resolves against the final set when the layout is rendered.
 */

import Handlebars from 'handlebars';
import { ResolutionError } from '../type/resolution.type.ts';
import { BODY, HEAD, LAYOUT_TEMPLATE } from './layout.ts';

export type HelperMap = Record<string, Handlebars.HelperDelegate>;

export class TemplateSet {
  private readonly env: typeof Handlebars;
  /** Fragment name → file it was last loaded from. */
  private readonly origins = new Map<string, string>();

  constructor(helpers: HelperMap = {}) {
    this.env = Handlebars.create();
    this.env.registerHelper(helpers);
    this.env.registerPartial(HEAD, this.env.compile(''));
    this.env.registerPartial(BODY, this.env.compile(''));
  }

  /**
   * Parse `source` and register it under `name`, replacing any earlier
   * definition. Throws MALFORMED when the source does not parse.
   */
  define(name: string, source: string, origin = name): void {
    let ast: ReturnType<typeof Handlebars.parse>;
    try {
      ast = this.env.parse(source);
    } catch (error) {
      throw ResolutionError.malformed(`Failed to parse template ${origin}`, error);
    }
    this.env.registerPartial(name, this.env.compile(ast));
    this.origins.set(name, origin);
  }

  /** True when a fragment was loaded under `name`; the empty defaults do not count. */
  has(name: string): boolean {
    return this.origins.has(name);
  }

  names(): string[] {
    return [...this.origins.keys()].sort();
  }

  originOf(name: string): string | undefined {
    return this.origins.get(name);
  }

  /** Execute the layout against `context`. Execution errors propagate. */
  render(context: unknown): string {
    return this.env.compile(LAYOUT_TEMPLATE)(context);
  }
}
