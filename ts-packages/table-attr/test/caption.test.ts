import { test } from 'node:test';
import assert from 'node:assert';
import type { Inline, TableContent } from '@tableattr/pandoc-types';
import { captionInlines, parseCaption } from '../src/caption.js';
import { FilterError } from '../src/errors.js';
import { doubleQuoted, emph, emptyAttr, mockTable, space, str } from './helpers/ast.js';

const softBreak: Inline = { t: "SoftBreak" };

test('parseCaption splits caption text from the attribute block', () => {
  const table = mockTable([
    str("Caption."), space, str("{#id"), space, str(".class"), space,
    str("key="), doubleQuoted(str("val")), str("}"),
  ]);

  assert.deepStrictEqual(parseCaption(table), {
    caption: [str("Caption.")],
    attrString: '#id .class key="val"',
  });
});

test('parseCaption returns the caption unchanged when there is no block', () => {
  const inlines = [str("Caption"), space, doubleQuoted(str("quoted")), str(".")];

  assert.deepStrictEqual(parseCaption(mockTable(inlines)), {
    caption: inlines,
    attrString: null,
  });
});

test('parseCaption leaves a malformed block in the caption', () => {
  const inlines = [str("Caption."), space, str("{#id"), space, str("#id}")];

  assert.deepStrictEqual(parseCaption(mockTable(inlines)), {
    caption: inlines,
    attrString: null,
  });
});

test('parseCaption returns a null caption when only the block is present', () => {
  const table = mockTable([
    str("{#id"), space, str(".class"), space, str("key="), doubleQuoted(str("val")), str("}"),
  ]);

  assert.deepStrictEqual(parseCaption(table), {
    caption: null,
    attrString: '#id .class key="val"',
  });
});

test('parseCaption returns nulls for an empty caption', () => {
  assert.deepStrictEqual(parseCaption(mockTable(null)), { caption: null, attrString: null });
  assert.deepStrictEqual(parseCaption(mockTable([])), { caption: null, attrString: null });
});

test('parseCaption keeps inlines that precede the block', () => {
  const emphasized = emph(str("Big"));

  assert.deepStrictEqual(
    parseCaption(mockTable([emphasized, space, str("{#id}")])),
    { caption: [emphasized], attrString: '#id' }
  );
});

test('parseCaption only looks at text after the last opaque inline', () => {
  const emphasized = emph(str("{#id}"));
  const inlines = [str("Caption"), space, emphasized];

  assert.deepStrictEqual(parseCaption(mockTable(inlines)), {
    caption: inlines,
    attrString: null,
  });
});

test('parseCaption handles soft breaks in multi-line captions', () => {
  const table = mockTable([str("A"), softBreak, str("B"), space, str("{.wide}")]);

  assert.deepStrictEqual(parseCaption(table), {
    caption: [str("A"), softBreak, str("B")],
    attrString: '.wide',
  });
});

test('captionInlines reads a Para caption block', () => {
  const table: TableContent = mockTable(null);
  table[1] = [null, [{ t: "Para", c: [str("Para"), space, str("caption")] }]];

  assert.deepStrictEqual(captionInlines(table), [str("Para"), space, str("caption")]);
});

test('captionInlines throws on a caption that does not start with text', () => {
  const table: TableContent = mockTable(null);
  table[1] = [null, [{ t: "Div", c: [emptyAttr(), []] }]];

  assert.throws(
    () => parseCaption(table),
    (err: unknown) =>
      err instanceof FilterError &&
      err.message === 'Expected Plain or Para as first caption block, got Div'
  );
});
