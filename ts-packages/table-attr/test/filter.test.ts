/**
 * Tests for the JSON filter driver
 */

import { test } from 'node:test';
import assert from 'node:assert';
import type { Block } from '@tableattr/pandoc-types';
import {
  applyJSONFilter,
  parsePandocDocument,
  walk,
  type FilterAction,
} from '../src/filter.js';
import { FilterError } from '../src/errors.js';
import { addTabAttr } from '../src/table-attr.js';
import { emph, mockDocument, mockTable, space, str } from './helpers/ast.js';

const para = (...words: string[]): Block => ({
  t: "Para",
  c: words.map(word => str(word)),
});

test('walk offers tagged elements to the action and keeps null results', () => {
  const seen: [string, unknown][] = [];
  const action: FilterAction = (key, value) => {
    seen.push([key, value]);
    return null;
  };
  const blocks: Block[] = [{ t: "Para", c: [str("a"), space] }];

  const walked = walk(blocks, action, 'html', {});

  assert.deepStrictEqual(walked, blocks);
  assert.notStrictEqual(walked, blocks);
  assert.deepStrictEqual(seen, [
    ["Para", [str("a"), space]],
    ["Str", "a"],
    ["Space", null],
  ]);
});

test('walk replaces elements and walks the replacement', () => {
  const action: FilterAction = (key, value) => {
    if (key === 'Strong') {
      return emph(str("x"));
    }
    if (key === 'Str' && value === 'x') {
      return str("y");
    }
    return null;
  };
  const blocks: Block[] = [{ t: "Para", c: [{ t: "Strong", c: [str("bold")] }] }];

  assert.deepStrictEqual(
    walk(blocks, action, '', {}),
    [{ t: "Para", c: [{ t: "Emph", c: [str("y")] }] }]
  );
});

test('walk splices array results', () => {
  const action: FilterAction = key => (key === 'Space' ? [] : null);
  const blocks: Block[] = [{ t: "Plain", c: [str("a"), space, str("b")] }];

  assert.deepStrictEqual(
    walk(blocks, action, '', {}),
    [{ t: "Plain", c: [str("a"), str("b")] }]
  );
});

test('walk passes format and meta to the action', () => {
  const formats: string[] = [];
  const action: FilterAction = (_key, _value, format, meta) => {
    formats.push(`${format}:${Object.keys(meta).join(',')}`);
    return null;
  };

  walk([space], action, 'docx', { draft: { t: "MetaBool", c: true } });

  assert.deepStrictEqual(formats, ["docx:draft"]);
});

test('parsePandocDocument accepts a current document', () => {
  const doc = mockDocument([para("Hello")]);

  assert.deepStrictEqual(parsePandocDocument(doc), doc);
});

test('parsePandocDocument rejects documents older than 1.22', () => {
  const doc = { ...mockDocument([]), "pandoc-api-version": [1, 21] };

  assert.throws(
    () => parsePandocDocument(doc),
    (err: unknown) =>
      err instanceof FilterError &&
      err.message === 'Unsupported pandoc-api-version 1.21; need 1.22 or later'
  );
});

test('parsePandocDocument rejects values that are not documents', () => {
  assert.throws(() => parsePandocDocument([]), FilterError);
  assert.throws(
    () => parsePandocDocument({ "pandoc-api-version": [1, 23], meta: {} }),
    (err: unknown) =>
      err instanceof FilterError && err.message.startsWith('Not a Pandoc JSON document: blocks:')
  );
  assert.throws(
    () => parsePandocDocument({ "pandoc-api-version": [1, 23], meta: {}, blocks: ["text"] }),
    (err: unknown) =>
      err instanceof FilterError &&
      err.message === 'Not a Pandoc JSON document: blocks.0: expected a Block'
  );
});

test('applyJSONFilter rewrites tables in a serialized document', () => {
  const doc = mockDocument([
    para("Intro"),
    { t: "Table", c: mockTable([str("Scores"), space, str("{#tbl-scores"), space, str(".wide}")]) },
  ]);

  const output = JSON.parse(applyJSONFilter([addTabAttr], JSON.stringify(doc), 'html'));

  assert.deepStrictEqual(output, mockDocument([
    para("Intro"),
    { t: "Table", c: mockTable([str("Scores")], ["tbl-scores", ["wide"], []]) },
  ]));
});

test('applyJSONFilter leaves documents without annotated tables as they are', () => {
  const doc = mockDocument([
    para("Intro"),
    { t: "Table", c: mockTable([str("Plain"), space, str("caption")]) },
  ]);

  const output = JSON.parse(applyJSONFilter([addTabAttr], JSON.stringify(doc)));

  assert.deepStrictEqual(output, doc);
});

test('applyJSONFilter rejects input that is not JSON', () => {
  assert.throws(
    () => applyJSONFilter([addTabAttr], '{"blocks": ['),
    (err: unknown) =>
      err instanceof FilterError && err.message.startsWith('Input is not valid JSON: ')
  );
});
