/**
 * Inline flattening
 *
 * Converts caption inlines into "stringified" segments for pattern
 * matching, and back again. Str, Space and Quoted nodes become text; any
 * other inline is kept as an opaque segment that separates text runs.
 *
 * For content made of Str, Space and Quoted nodes only,
 * `destringify(stringify(inlines))` reproduces `inlines`.
 */

import type { Inline, QuoteType } from '@tableattr/pandoc-types';

/**
 * A run of text, or an inline that is not interpreted as text
 */
export type Segment = string | Inline;

const QUOTE_CHARS: Record<QuoteType['t'], string> = {
  SingleQuote: "'",
  DoubleQuote: '"',
};

// First quote char of either kind opens a run; the nearest identical char closes it.
const QUOTED_RUN = /"(?<double>.*?)"|'(?<single>.*?)'/g;

function stringifyInline(inline: Inline): Segment[] {
  switch (inline.t) {
    case 'Str':
      return [inline.c];
    case 'Space':
      return [' '];
    case 'Quoted': {
      const [quoteType, content] = inline.c;
      const quote = QUOTE_CHARS[quoteType.t];
      return [quote, ...stringify(content), quote];
    }
    default:
      return [inline];
  }
}

/**
 * Turn inlines into segments where adjacent text is merged into one string.
 * The result never holds two strings next to each other.
 */
export function stringify(inlines: Inline[]): Segment[] {
  const stringified: Segment[] = [];

  for (const segment of inlines.flatMap(stringifyInline)) {
    const last = stringified.length - 1;
    if (typeof segment === 'string' && last >= 0) {
      const previous = stringified[last];
      if (typeof previous === 'string') {
        stringified[last] = previous + segment;
        continue;
      }
    }
    stringified.push(segment);
  }

  return stringified;
}

/**
 * Rebuild Str and Space inlines from text that holds no quoted runs.
 *
 * Leading and trailing spaces are kept as Space nodes, unlike Pandoc's
 * reader, which drops them.
 */
export function despacify(text: string): Inline[] {
  if (!text) {
    return [];
  }

  const inlines: Inline[] = [];
  text.split(' ').forEach((word, index) => {
    if (index > 0) {
      inlines.push({ t: 'Space' });
    }
    if (word) {
      inlines.push({ t: 'Str', c: word });
    }
  });
  return inlines;
}

/**
 * Rebuild inlines from text, turning each matched pair of quotes into a
 * Quoted node. Quoted content is processed again, so a different quote
 * character nested inside becomes a nested Quoted node.
 */
export function dequotify(text: string): Inline[] {
  const dequotified: Inline[] = [];
  let position = 0;

  for (const match of text.matchAll(QUOTED_RUN)) {
    const start = match.index ?? position;
    if (start > position) {
      dequotified.push(...despacify(text.slice(position, start)));
    }

    const single = match.groups?.single;
    const quoteType: QuoteType = single === undefined
      ? { t: 'DoubleQuote' }
      : { t: 'SingleQuote' };
    const inner = single ?? match.groups?.double ?? '';
    dequotified.push({ t: 'Quoted', c: [quoteType, dequotify(inner)] });

    position = start + match[0].length;
  }

  if (position < text.length) {
    dequotified.push(...despacify(text.slice(position)));
  }

  return dequotified;
}

/**
 * Turn stringified segments back into inlines. Quotes are handled before
 * spaces, so a value like `key="foo bar"` keeps its quoted span intact.
 */
export function destringify(segments: Segment[]): Inline[] {
  return segments.flatMap(segment =>
    typeof segment === 'string' ? dequotify(segment) : [segment]
  );
}
