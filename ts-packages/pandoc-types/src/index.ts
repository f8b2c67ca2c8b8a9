/**
 * @tableattr/pandoc-types
 *
 * Type declarations for the Pandoc JSON AST. The package holds types only,
 * so consumers import it with `import type`.
 */

export type * from './pandoc-types.js';
