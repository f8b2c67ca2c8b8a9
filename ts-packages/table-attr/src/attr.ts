/**
 * Attribute parsing
 */

import type { Attr } from '@tableattr/pandoc-types';
import { attrComponentRegexes, keyvalValue } from './attr-regex.js';

/**
 * Parse the text inside an attribute block's braces into a Pandoc Attr.
 *
 * The id is empty when absent. Classes keep their order and duplicates.
 * When a key repeats, the last value wins but the key keeps the position
 * of its first occurrence.
 *
 * @example
 * parseAttr('#id .class key=val'); // ['id', ['class'], [['key', 'val']]]
 */
export function parseAttr(attrString: string): Attr {
  const { ident, classes, keyvals } = attrComponentRegexes();

  const id = ident.exec(attrString)?.groups?.id ?? '';

  const classNames: string[] = [];
  for (const match of attrString.matchAll(classes)) {
    const name = match.groups?.class;
    if (name !== undefined) {
      classNames.push(name);
    }
  }

  const values = new Map<string, string>();
  for (const match of attrString.matchAll(keyvals)) {
    const groups = match.groups;
    if (groups?.key !== undefined) {
      values.set(groups.key, keyvalValue(groups));
    }
  }

  return [id, classNames, [...values.entries()]];
}
