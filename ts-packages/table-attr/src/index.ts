/**
 * @tableattr/pandoc-table-attr
 *
 * Pandoc filter that turns a `{#id .class key=val}` block at the end of a
 * table caption into table attributes.
 */

export type { Segment } from './inlines.js';
export type { ParsedCaption } from './caption.js';
export type { AttrComponentRegexes } from './attr-regex.js';
export type {
  FilterAction,
  FilterResult,
  PandocElement,
} from './filter.js';
export type { FilterConfig, LoadedConfig, LogLevel } from './config.js';
export type { Logger, LogSink } from './logger.js';
export type { RunOptions } from './run.js';

export { stringify, despacify, dequotify, destringify } from './inlines.js';
export { attrRegex, attrComponentRegexes } from './attr-regex.js';
export { parseCaption, captionInlines } from './caption.js';
export { parseAttr } from './attr.js';
export { addTabAttr } from './table-attr.js';
export {
  walk,
  applyJSONFilter,
  parsePandocDocument,
  MIN_API_VERSION,
} from './filter.js';
export {
  isTagged,
  isInline,
  isBlock,
  isMetaValue,
  isAttr,
  isCaption,
  isTableContent,
} from './guards.js';
export { FilterError } from './errors.js';
export { loadConfig, DEFAULT_CONFIG, LOG_LEVELS, LOG_LEVEL_ENV } from './config.js';
export { createLogger } from './logger.js';
export { run } from './run.js';
