/**
 * Attribute grammar
 *
 * Patterns for the `{#id .class key=val}` block that may end a table
 * caption, and for the individual tokens inside it.
 */

// See https://www.w3.org/TR/html4/types.html
const IDENT = String.raw`#(?<id>[a-zA-Z][a-zA-Z0-9\-_:.]*)`;

const CLASS = String.raw`\.(?<class>[_a-zA-Z][_a-zA-Z0-9\-]*)`;

// Keys follow the naming rules for HTML data-* attributes. A value is
// unquoted, or wrapped in matching quotes that are not part of the capture.
// The lookahead + backreference pairs make each value match atomic: an
// unquoted value must be followed by neither quote character, and a quoted
// value ends at the nearest matching quote.
const KEYVAL =
  String.raw`(?<key>[_a-z][_a-z0-9\-.]*) *= *` +
  String.raw`(?:(?=(?<v1>[^ "'=}{]+))\k<v1>(?!["'])` +
  String.raw`|"(?=(?<v2>.*?)")\k<v2>"` +
  String.raw`|'(?=(?<v3>.*?)')\k<v3>')`;

// At most one id per block.
const ID_ONCE = String.raw`(?!(?:.*${IDENT.replace('?<id>', '?:')}.*){2,})`;

const ATTR_BLOCK =
  String.raw`\{${ID_ONCE} *` +
  String.raw`(?<attr>(?:(?:${IDENT}|${CLASS}|${KEYVAL})(?: +|(?=\}$)))+)\}$`;

/**
 * Token patterns only match when flanked by spaces or the string bounds.
 */
function wrap(pattern: string): string {
  return String.raw`(?: +|^)${pattern}(?= +|$)`;
}

export interface AttrComponentRegexes {
  ident: RegExp;
  classes: RegExp;
  keyvals: RegExp;
}

/**
 * Pattern for an attribute block at the very end of a caption. The block
 * content is captured in the `attr` group.
 */
export function attrRegex(): RegExp {
  return new RegExp(ATTR_BLOCK);
}

/**
 * Patterns for the tokens of an attribute block. `classes` and `keyvals`
 * are global so they can be used with `matchAll`.
 */
export function attrComponentRegexes(): AttrComponentRegexes {
  return {
    ident: new RegExp(wrap(IDENT)),
    classes: new RegExp(wrap(CLASS), 'g'),
    keyvals: new RegExp(wrap(KEYVAL), 'g'),
  };
}

/**
 * Value of a key-value match, whichever quoting form it used
 */
export function keyvalValue(groups: Record<string, string | undefined>): string {
  return groups.v1 ?? groups.v2 ?? groups.v3 ?? '';
}
