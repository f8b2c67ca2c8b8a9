/**
 * Caption parsing
 *
 * Splits a table caption into its text and a trailing attribute block.
 */

import type { Inline, TableContent } from '@tableattr/pandoc-types';
import { attrRegex } from './attr-regex.js';
import { FilterError } from './errors.js';
import { destringify, stringify, type Segment } from './inlines.js';

export interface ParsedCaption {
  /** Caption inlines without the attribute block, or null if nothing remains */
  caption: Inline[] | null;
  /** Text between the braces of the attribute block, or null if there is none */
  attrString: string | null;
}

/**
 * Inlines of the first block of the long caption, or null when the caption
 * is empty.
 */
export function captionInlines(table: TableContent): Inline[] | null {
  const [, [, longCaption]] = table;
  const first = longCaption[0];
  if (first === undefined) {
    return null;
  }
  if (first.t !== 'Plain' && first.t !== 'Para') {
    throw new FilterError(
      `Expected Plain or Para as first caption block, got ${first.t}`
    );
  }
  return first.c.length > 0 ? first.c : null;
}

/**
 * Extract the caption of a table and look for `{#id .class key="val"}` at
 * its end.
 *
 * A caption without a well-formed block comes back rebuilt but otherwise
 * unchanged, with `attrString` null.
 */
export function parseCaption(table: TableContent): ParsedCaption {
  const inlines = captionInlines(table);
  if (inlines === null) {
    return { caption: null, attrString: null };
  }

  const segments = stringify(inlines);
  const last = segments[segments.length - 1];
  const match = typeof last === 'string' ? attrRegex().exec(last) : null;

  if (typeof last !== 'string' || match === null) {
    return { caption: destringify(segments), attrString: null };
  }

  const attrString = match.groups?.attr ?? '';
  const captionEnd = last.slice(0, match.index).replace(/ +$/, '');
  const remainder: Segment[] = captionEnd
    ? [...segments.slice(0, -1), captionEnd]
    : segments.slice(0, -1);

  return {
    caption: remainder.length > 0 ? destringify(remainder) : null,
    attrString,
  };
}
