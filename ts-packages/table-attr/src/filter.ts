/**
 * JSON filter driver
 *
 * Walks a Pandoc JSON document and lets filter actions replace the
 * elements they recognise, the way Pandoc's JSON filters work.
 */

import { z } from 'zod';
import type {
  Block,
  Inline,
  MetaValue,
  PandocDocument,
} from '@tableattr/pandoc-types';
import { FilterError } from './errors.js';
import { isBlock, isMetaValue, isTagged } from './guards.js';

export type PandocElement = Block | Inline | MetaValue;

/**
 * null keeps the element; an array is spliced in its place
 */
export type FilterResult = PandocElement | PandocElement[] | null;

export type FilterAction = (
  key: string,
  value: unknown,
  format: string,
  meta: Record<string, MetaValue>
) => FilterResult;

/**
 * Oldest pandoc-api-version with the current Table layout
 */
export const MIN_API_VERSION: readonly [number, number] = [1, 22];

const PandocDocumentSchema = z
  .object({
    'pandoc-api-version': z.array(z.number().int().nonnegative()).min(2),
    meta: z.record(z.string(), z.custom<MetaValue>(isMetaValue, 'expected a MetaValue')),
    blocks: z.array(z.custom<Block>(isBlock, 'expected a Block')),
  })
  .passthrough();

/**
 * Validate the top level of a parsed Pandoc JSON document.
 *
 * @throws FilterError if the layout is wrong or the API version predates 1.22
 */
export function parsePandocDocument(value: unknown): PandocDocument {
  const result = PandocDocumentSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new FilterError(`Not a Pandoc JSON document: ${issues}`);
  }

  const doc = result.data;
  const [major = 0, minor = 0] = doc['pandoc-api-version'];
  const [minMajor, minMinor] = MIN_API_VERSION;
  if (major < minMajor || (major === minMajor && minor < minMinor)) {
    throw new FilterError(
      `Unsupported pandoc-api-version ${doc['pandoc-api-version'].join('.')}; ` +
      `need ${MIN_API_VERSION.join('.')} or later`
    );
  }
  return doc;
}

/**
 * Rebuild `value`, offering every tagged element found in an array to
 * `action`. Replacements are walked in turn.
 */
export function walk(
  value: unknown,
  action: FilterAction,
  format: string,
  meta: Record<string, MetaValue>
): unknown {
  if (Array.isArray(value)) {
    const walked: unknown[] = [];
    for (const item of value) {
      if (!isTagged(item)) {
        walked.push(walk(item, action, format, meta));
        continue;
      }
      const result = action(item.t, 'c' in item ? item.c : null, format, meta);
      if (result === null) {
        walked.push(walk(item, action, format, meta));
      } else if (Array.isArray(result)) {
        for (const replacement of result) {
          walked.push(walk(replacement, action, format, meta));
        }
      } else {
        walked.push(walk(result, action, format, meta));
      }
    }
    return walked;
  }

  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, child]) => [key, walk(child, action, format, meta)])
    );
  }

  return value;
}

/**
 * Run `actions` in order over a serialized Pandoc document and serialize
 * the result.
 *
 * @throws FilterError if `source` is not a supported Pandoc JSON document
 */
export function applyJSONFilter(
  actions: FilterAction[],
  source: string,
  format = ''
): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FilterError(`Input is not valid JSON: ${reason}`);
  }

  const doc = parsePandocDocument(parsed);
  let altered: unknown = doc;
  for (const action of actions) {
    altered = walk(altered, action, format, doc.meta);
  }
  return JSON.stringify(altered);
}
