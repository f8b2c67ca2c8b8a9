/**
 * TypeScript type declarations for Pandoc JSON AST
 *
 * This file defines types for the standard Pandoc JSON format as produced
 * by `pandoc -t json` (pandoc-types 1.22 and later).
 *
 * The types are based on observation of Pandoc's JSON output since
 * there is no official JSON schema documentation.
 */

// =============================================================================
// Supporting types used throughout Pandoc AST
// =============================================================================

/**
 * Attributes structure: [id, classes, key-value pairs]
 */
export type Attr = [string, string[], [string, string][]];

/**
 * Target for links and images: [url, title]
 */
export type Target = [string, string];

export type MathType =
  | { t: "InlineMath" }
  | { t: "DisplayMath" };

/**
 * Quote type discriminator
 */
export type QuoteType =
  | { t: "SingleQuote" }
  | { t: "DoubleQuote" };

export type ListNumberStyle =
  | { t: "DefaultStyle" }
  | { t: "Example" }
  | { t: "Decimal" }
  | { t: "LowerRoman" }
  | { t: "UpperRoman" }
  | { t: "LowerAlpha" }
  | { t: "UpperAlpha" };

export type ListNumberDelim =
  | { t: "DefaultDelim" }
  | { t: "Period" }
  | { t: "OneParen" }
  | { t: "TwoParens" };

/**
 * List attributes for ordered lists: [start_number, style, delimiter]
 */
export type ListAttributes = [number, ListNumberStyle, ListNumberDelim];

export type CitationMode =
  | { t: "AuthorInText" }
  | { t: "SuppressAuthor" }
  | { t: "NormalCitation" };

/**
 * Table column alignment
 */
export type Alignment =
  | { t: "AlignLeft" }
  | { t: "AlignRight" }
  | { t: "AlignCenter" }
  | { t: "AlignDefault" };

export type ColWidth =
  | { t: "ColWidth"; c: number }
  | { t: "ColWidthDefault" };

/**
 * Column specification: [alignment, width]
 */
export type ColSpec = [Alignment, ColWidth];

// =============================================================================
// Inline types
// =============================================================================

export type Inline =
  | Inline_Str
  | Inline_Space
  | Inline_SoftBreak
  | Inline_LineBreak
  | Inline_Emph
  | Inline_Strong
  | Inline_Strikeout
  | Inline_Superscript
  | Inline_Subscript
  | Inline_SmallCaps
  | Inline_Underline
  | Inline_Quoted
  | Inline_Code
  | Inline_Math
  | Inline_RawInline
  | Inline_Link
  | Inline_Image
  | Inline_Span
  | Inline_Cite
  | Inline_Note;

// Simple text
export type Inline_Str = { t: "Str"; c: string };
export type Inline_Space = { t: "Space" };
export type Inline_SoftBreak = { t: "SoftBreak" };
export type Inline_LineBreak = { t: "LineBreak" };

// Formatting
export type Inline_Emph = { t: "Emph"; c: Inline[] };
export type Inline_Strong = { t: "Strong"; c: Inline[] };
export type Inline_Strikeout = { t: "Strikeout"; c: Inline[] };
export type Inline_Superscript = { t: "Superscript"; c: Inline[] };
export type Inline_Subscript = { t: "Subscript"; c: Inline[] };
export type Inline_SmallCaps = { t: "SmallCaps"; c: Inline[] };
export type Inline_Underline = { t: "Underline"; c: Inline[] };

// Quotes
export type Inline_Quoted = { t: "Quoted"; c: [QuoteType, Inline[]] };

// Code and math
export type Inline_Code = { t: "Code"; c: [Attr, string] };
export type Inline_Math = { t: "Math"; c: [MathType, string] };
export type Inline_RawInline = { t: "RawInline"; c: [string, string] };  // [format, content]

// Links and images
export type Inline_Link = { t: "Link"; c: [Attr, Inline[], Target] };
export type Inline_Image = { t: "Image"; c: [Attr, Inline[], Target] };

export type Inline_Span = { t: "Span"; c: [Attr, Inline[]] };

export interface Citation {
  citationId: string;
  citationPrefix: Inline[];
  citationSuffix: Inline[];
  citationMode: CitationMode;
  citationNoteNum: number;
  citationHash: number;
}
export type Inline_Cite = { t: "Cite"; c: [Citation[], Inline[]] };

export type Inline_Note = { t: "Note"; c: Block[] };

// =============================================================================
// Block types
// =============================================================================

export type Block =
  | Block_Plain
  | Block_Para
  | Block_Header
  | Block_CodeBlock
  | Block_RawBlock
  | Block_BlockQuote
  | Block_BulletList
  | Block_OrderedList
  | Block_DefinitionList
  | Block_Div
  | Block_HorizontalRule
  | Block_Null
  | Block_Table
  | Block_Figure;

export type Block_Plain = { t: "Plain"; c: Inline[] };
export type Block_Para = { t: "Para"; c: Inline[] };

// Headers: [level, attr, content]
export type Block_Header = { t: "Header"; c: [number, Attr, Inline[]] };

export type Block_CodeBlock = { t: "CodeBlock"; c: [Attr, string] };
export type Block_RawBlock = { t: "RawBlock"; c: [string, string] };  // [format, content]

export type Block_BlockQuote = { t: "BlockQuote"; c: Block[] };

// Lists
export type Block_BulletList = { t: "BulletList"; c: Block[][] };
export type Block_OrderedList = { t: "OrderedList"; c: [ListAttributes, Block[][]] };
export type Block_DefinitionList = { t: "DefinitionList"; c: [Inline[], Block[][]][] };

// Structural
export type Block_Div = { t: "Div"; c: [Attr, Block[]] };
export type Block_HorizontalRule = { t: "HorizontalRule" };
export type Block_Null = { t: "Null" };

// Tables
export type Cell = [Attr, Alignment, number, number, Block[]]; // [attr, alignment, rowSpan, colSpan, content]
export type Row = [Attr, Cell[]];
export type TableHead = [Attr, Row[]];
export type TableBody = [Attr, number, Row[], Row[]]; // [attr, rowHeadColumns, head, body]
export type TableFoot = [Attr, Row[]];

/**
 * Caption: [short, long]
 */
export type Caption = [Inline[] | null, Block[]];

/**
 * Table payload: [attr, caption, colspecs, head, bodies, foot]
 */
export type TableContent = [Attr, Caption, ColSpec[], TableHead, TableBody[], TableFoot];

export type Block_Table = { t: "Table"; c: TableContent };

// Figures (Pandoc 3.0+)
export type Block_Figure = { t: "Figure"; c: [Attr, Caption, Block[]] };

// =============================================================================
// Meta types
// =============================================================================

export type MetaValue =
  | MetaValue_Map
  | MetaValue_List
  | MetaValue_Bool
  | MetaValue_String
  | MetaValue_Inlines
  | MetaValue_Blocks;

export type MetaValue_Map = { t: "MetaMap"; c: Record<string, MetaValue> };
export type MetaValue_List = { t: "MetaList"; c: MetaValue[] };
export type MetaValue_Bool = { t: "MetaBool"; c: boolean };
export type MetaValue_String = { t: "MetaString"; c: string };
export type MetaValue_Inlines = { t: "MetaInlines"; c: Inline[] };
export type MetaValue_Blocks = { t: "MetaBlocks"; c: Block[] };

// =============================================================================
// Document
// =============================================================================

export interface PandocDocument {
  "pandoc-api-version": number[];
  meta: Record<string, MetaValue>;
  blocks: Block[];
}

/**
 * Any value that can appear in the serialized tree
 */
export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };
