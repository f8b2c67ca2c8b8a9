/**
 * Structural type guards for Pandoc JSON values
 *
 * The checks are shallow: they confirm the layout a consumer is about to
 * index into, not the full recursive shape of every child node.
 */

import type {
  Attr,
  Block,
  Caption,
  Inline,
  MetaValue,
  TableContent,
} from '@tableattr/pandoc-types';

/**
 * Any object with a string `t` field, the shape of every Pandoc element
 */
export function isTagged(node: unknown): node is { t: string } {
  return (
    typeof node === 'object' &&
    node !== null &&
    't' in node &&
    typeof node.t === 'string'
  );
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export function isInline(node: unknown): node is Inline {
  return isTagged(node);
}

export function isBlock(node: unknown): node is Block {
  return isTagged(node);
}

export function isMetaValue(node: unknown): node is MetaValue {
  return isTagged(node) && node.t.startsWith('Meta');
}

/**
 * Check for an [id, classes, [[key, value], ...]] triple
 */
export function isAttr(value: unknown): value is Attr {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    typeof value[0] === 'string' &&
    isStringArray(value[1]) &&
    Array.isArray(value[2]) &&
    value[2].every(pair => isStringArray(pair) && pair.length === 2)
  );
}

export function isCaption(value: unknown): value is Caption {
  if (!Array.isArray(value) || value.length !== 2) {
    return false;
  }
  const [short, long] = value;
  const shortOk = short === null || (Array.isArray(short) && short.every(isInline));
  return shortOk && Array.isArray(long) && long.every(isBlock);
}

/**
 * Check for the six-field table payload introduced in pandoc-types 1.22:
 * [attr, caption, colspecs, head, bodies, foot]
 */
export function isTableContent(value: unknown): value is TableContent {
  return (
    Array.isArray(value) &&
    value.length === 6 &&
    isAttr(value[0]) &&
    isCaption(value[1]) &&
    Array.isArray(value[2]) &&
    Array.isArray(value[3]) &&
    Array.isArray(value[4]) &&
    Array.isArray(value[5])
  );
}
