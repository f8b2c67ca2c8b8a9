/**
 * Table attribute filter
 *
 * Moves a `{#id .class key=val}` block from the end of a table caption
 * into the table's Attr.
 *
 * ```markdown
 * Table: Caption {#id .class key=val}
 *
 * FirstCol  SecondCol
 * --------- ----------
 * ```
 */

import type {
  Block,
  Block_Table,
  MetaValue,
} from '@tableattr/pandoc-types';
import { parseAttr } from './attr.js';
import { parseCaption } from './caption.js';
import { FilterError } from './errors.js';
import { isTableContent } from './guards.js';

/**
 * Return a replacement Table when its caption ends with an attribute
 * block, or null to leave the element unchanged.
 *
 * The table's existing Attr is replaced, the short caption is dropped, and
 * colspecs, head, bodies and foot are kept as they are.
 */
export function addTabAttr(
  key: string,
  value: unknown,
  _format: string,
  _meta: Record<string, MetaValue>
): Block_Table | null {
  if (key !== 'Table') {
    return null;
  }
  if (!isTableContent(value)) {
    throw new FilterError(
      'Malformed Table element: expected [attr, caption, colspecs, head, bodies, foot]'
    );
  }

  const { caption, attrString } = parseCaption(value);
  if (attrString === null) {
    return null;
  }

  const attr = parseAttr(attrString);
  const captionBlocks: Block[] = caption ? [{ t: 'Plain', c: caption }] : [];
  const [, , colSpecs, head, bodies, foot] = value;

  return {
    t: 'Table',
    c: [attr, [null, captionBlocks], colSpecs, head, bodies, foot],
  };
}

