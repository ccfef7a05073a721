/**
 * Layout skeleton and file naming conventions.
 */

/** Suffix of fragment source files (`body.html.tmpl`). */
export const TEMPLATE_SUFFIX = '.html.tmpl';

/** Last extension of TEMPLATE_SUFFIX; request paths ending in it are never served. */
export const HIDDEN_EXTENSION = '.tmpl';

/** A file with this name at the end of a path forces a 404. */
export const NOT_FOUND_MARKER = '404';

export const HEAD = 'head';
export const BODY = 'body';

/** Outer document. `head` and `body` are partials that default to empty. */
export const LAYOUT_TEMPLATE = `<!DOCTYPE html>
<html>
<head>{{> ${HEAD}}}</head>
<body>{{> ${BODY}}}</body>
</html>`;
