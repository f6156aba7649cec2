/**
 * Tokenizer - turns LaTeX source text into a flat sequence of typed nodes.
 *
 * Only the shapes needed to locate macros and their brace arguments are
 * modelled: macros, balanced groups, comments and character runs. Nothing is
 * expanded and no macro arguments are attached to their macro; arguments
 * appear as the following sibling nodes.
 */

import type { CharsNode, CommentNode, GroupNode, LatexNode, MacroNode } from '../core/types.js';

const LETTER_RE = /[A-Za-z@]/;
const SPECIAL_CHARS = new Set(['\\', '{', '}', '%']);

/** Offset of each `{` that is closed, mapped to the offset of its `}`. */
type BracePairs = ReadonlyMap<number, number>;

/**
 * Match braces in one pass, skipping escaped characters and comments the
 * same way the node reader does. Unmatched braces have no entry.
 */
function pairBraces(text: string): BracePairs {
  const pairs = new Map<number, number>();
  const open: number[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '%') {
      const eol = text.indexOf('\n', i);
      if (eol < 0) break;
      i = eol;
      continue;
    }
    if (ch === '{') {
      open.push(i);
    } else if (ch === '}') {
      const start = open.pop();
      if (start !== undefined) pairs.set(start, i);
    }
    i++;
  }
  return pairs;
}

/**
 * Skip the whitespace TeX ignores after a control word: blanks and at most
 * one line break.
 */
function skipMacroSpace(text: string, pos: number): number {
  let i = pos;
  while (text[i] === ' ' || text[i] === '\t') i++;
  if (text[i] === '\r' && text[i + 1] === '\n') i += 2;
  else if (text[i] === '\n') i++;
  else return i;
  while (text[i] === ' ' || text[i] === '\t') i++;
  return i;
}

function readMacro(text: string, pos: number): MacroNode | undefined {
  if (pos + 1 >= text.length) return undefined;
  if (!LETTER_RE.test(text[pos + 1])) {
    return { kind: 'macro', name: text[pos + 1], offset: pos, length: 2 };
  }
  let i = pos + 1;
  while (i < text.length && LETTER_RE.test(text[i])) i++;
  const name = text.slice(pos + 1, i);
  const end = skipMacroSpace(text, i);
  return { kind: 'macro', name, offset: pos, length: end - pos };
}

function readComment(text: string, pos: number): CommentNode {
  let end = text.indexOf('\n', pos);
  if (end < 0) end = text.length;
  if (end > pos && text[end - 1] === '\r') end--;
  return { kind: 'comment', text: text.slice(pos + 1, end), offset: pos, length: end - pos };
}

/** Returns undefined when the group is never closed. */
function readGroup(text: string, pos: number, pairs: BracePairs): GroupNode | undefined {
  const close = pairs.get(pos);
  if (close === undefined) return undefined;
  return {
    kind: 'group',
    children: readNodes(text, pos + 1, close, pairs),
    offset: pos,
    length: close + 1 - pos,
  };
}

/**
 * Scan a character run. The first character is always taken, so an unclosed
 * `{`, a stray `}` or a trailing `\` end up as plain text.
 */
function scanChars(text: string, pos: number, end: number): number {
  let i = pos + 1;
  while (i < end && !SPECIAL_CHARS.has(text[i])) i++;
  return i;
}

function pushChars(nodes: LatexNode[], text: string, start: number, end: number): void {
  const prev = nodes[nodes.length - 1];
  if (prev && prev.kind === 'chars' && prev.offset + prev.length === start) {
    const merged: CharsNode = {
      kind: 'chars',
      text: prev.text + text.slice(start, end),
      offset: prev.offset,
      length: end - prev.offset,
    };
    nodes[nodes.length - 1] = merged;
    return;
  }
  nodes.push({ kind: 'chars', text: text.slice(start, end), offset: start, length: end - start });
}

/**
 * Read the nodes in `[start, end)`. Inside a group, `end` is the offset of
 * its closing brace.
 */
function readNodes(text: string, start: number, end: number, pairs: BracePairs): LatexNode[] {
  const nodes: LatexNode[] = [];
  let pos = start;

  while (pos < end) {
    const ch = text[pos];

    if (ch === '\\') {
      const macro = readMacro(text, pos);
      if (macro) {
        nodes.push(macro);
        pos += macro.length;
        continue;
      }
    } else if (ch === '{') {
      const group = readGroup(text, pos, pairs);
      if (group) {
        nodes.push(group);
        pos += group.length;
        continue;
      }
    } else if (ch === '%') {
      const comment = readComment(text, pos);
      nodes.push(comment);
      pos += comment.length;
      continue;
    }

    const next = scanChars(text, pos, end);
    pushChars(nodes, text, pos, next);
    pos = next;
  }

  return nodes;
}

/**
 * Tokenize a whole document. Re-tokenizing the same text yields an equal
 * sequence.
 */
export function tokenize(text: string): LatexNode[] {
  return readNodes(text, 0, text.length, pairBraces(text));
}

/**
 * Offset just past the node.
 */
export function nodeEnd(node: LatexNode): number {
  return node.offset + node.length;
}

/**
 * The exact source text of a node.
 */
export function nodeText(text: string, node: LatexNode): string {
  return text.slice(node.offset, nodeEnd(node));
}

/**
 * The source text between a group's braces.
 */
export function groupContent(text: string, group: GroupNode): string {
  return text.slice(group.offset + 1, nodeEnd(group) - 1);
}
