/**
 * Core type definitions for parsed LaTeX nodes and the artifacts extracted
 * from them.
 */

/**
 * A half-open character range `[start, end)` into a document's text.
 */
export interface SourceSpan {
  start: number;
  end: number;
}

/**
 * A macro such as `\usepackage`. The node covers the backslash, the name and
 * any whitespace TeX skips after a control word.
 */
export interface MacroNode {
  kind: 'macro';
  name: string;
  offset: number;
  length: number;
}

/**
 * A brace-delimited group; `offset` and `length` include both braces.
 */
export interface GroupNode {
  kind: 'group';
  children: LatexNode[];
  offset: number;
  length: number;
}

/**
 * A run of plain characters (text, brackets, whitespace).
 */
export interface CharsNode {
  kind: 'chars';
  text: string;
  offset: number;
  length: number;
}

/**
 * A `%` comment up to, but not including, the end of the line.
 */
export interface CommentNode {
  kind: 'comment';
  text: string;
  offset: number;
  length: number;
}

/**
 * Closed union of the node kinds produced by the tokenizer.
 */
export type LatexNode = MacroNode | GroupNode | CharsNode | CommentNode;

/**
 * One `\usepackage[options]{name}` occurrence.
 */
export interface ImportDeclaration {
  /** Package identifier, without extension. */
  readonly name: string;
  /** Verbatim bracketed option text, when present. */
  readonly options?: string;
  /** Offset of the `\usepackage` macro. */
  readonly declarationOffset: number;
  readonly span: SourceSpan;
}

/**
 * One `\newcommand`, `\renewcommand` or `\providecommand` occurrence.
 */
export interface MacroDefinition {
  /** Name of the defined macro, without the backslash. */
  readonly name: string;
  /** The defining macro, e.g. `newcommand`. */
  readonly command: string;
  readonly definitionOffset: SourceSpan;
  /** Verbatim argument count and default value specifiers. */
  readonly argSpec: string;
  /** Verbatim body group contents; absent when there is no body group. */
  readonly body?: string;
  /** Exact source text of the whole definition. */
  readonly rawText: string;
}
