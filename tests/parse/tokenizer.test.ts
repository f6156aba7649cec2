/**
 * Tests for the LaTeX tokenizer.
 */

import { describe, it, expect } from 'vitest';
import { groupContent, nodeText, tokenize } from '../../src/parse/tokenizer.js';

describe('tokenize', () => {
  it('should split a macro from its brace group', () => {
    const nodes = tokenize('\\usepackage{child}');

    expect(nodes).toEqual([
      { kind: 'macro', name: 'usepackage', offset: 0, length: 11 },
      {
        kind: 'group',
        offset: 11,
        length: 7,
        children: [{ kind: 'chars', text: 'child', offset: 12, length: 5 }],
      },
    ]);
  });

  it('should keep bracketed options as a sibling character run', () => {
    const nodes = tokenize('\\usepackage[utf8]{inputenc}');

    expect(nodes.map((n) => n.kind)).toEqual(['macro', 'chars', 'group']);
    expect(nodes[1]).toEqual({ kind: 'chars', text: '[utf8]', offset: 11, length: 6 });
  });

  it('should tokenize a macro definition', () => {
    const text = '\\newcommand{\\foo}[1]{bar #1}';
    const nodes = tokenize(text);

    expect(nodes.map((n) => n.kind)).toEqual(['macro', 'group', 'chars', 'group']);
    expect(nodes[1]).toEqual({
      kind: 'group',
      offset: 11,
      length: 6,
      children: [{ kind: 'macro', name: 'foo', offset: 12, length: 4 }],
    });
    expect(nodeText(text, nodes[2])).toBe('[1]');
    expect(nodes[3].offset).toBe(20);
    expect(nodes[3].length).toBe(8);
  });

  it('should attach the blanks after a control word to the macro', () => {
    const nodes = tokenize('\\foo  bar');

    expect(nodes).toEqual([
      { kind: 'macro', name: 'foo', offset: 0, length: 6 },
      { kind: 'chars', text: 'bar', offset: 6, length: 3 },
    ]);
  });

  it('should attach at most one line break to a macro', () => {
    const nodes = tokenize('\\foo\n\nbar');

    expect(nodes[0]).toEqual({ kind: 'macro', name: 'foo', offset: 0, length: 5 });
    expect(nodes[1]).toEqual({ kind: 'chars', text: '\nbar', offset: 5, length: 4 });
  });

  it('should read single character macros', () => {
    const nodes = tokenize('50\\% off');

    expect(nodes).toEqual([
      { kind: 'chars', text: '50', offset: 0, length: 2 },
      { kind: 'macro', name: '%', offset: 2, length: 2 },
      { kind: 'chars', text: ' off', offset: 4, length: 4 },
    ]);
  });

  it('should treat @ as a letter in macro names', () => {
    const nodes = tokenize('\\my@macro');
    expect(nodes).toEqual([{ kind: 'macro', name: 'my@macro', offset: 0, length: 9 }]);
  });

  it('should read comments up to the end of the line', () => {
    const nodes = tokenize('a % note\nb');

    expect(nodes).toEqual([
      { kind: 'chars', text: 'a ', offset: 0, length: 2 },
      { kind: 'comment', text: ' note', offset: 2, length: 6 },
      { kind: 'chars', text: '\nb', offset: 8, length: 2 },
    ]);
  });

  it('should keep an unclosed group as plain characters', () => {
    const nodes = tokenize('\\usepackage{child');

    expect(nodes).toEqual([
      { kind: 'macro', name: 'usepackage', offset: 0, length: 11 },
      { kind: 'chars', text: '{child', offset: 11, length: 6 },
    ]);
  });

  it('should keep a stray closing brace as plain characters', () => {
    expect(tokenize('a}b')).toEqual([{ kind: 'chars', text: 'a}b', offset: 0, length: 3 }]);
  });

  it('should nest groups', () => {
    const text = '{a{b}}';
    const [outer] = tokenize(text);

    expect(outer.kind).toBe('group');
    if (outer.kind !== 'group') return;
    expect(outer.children.map((n) => n.kind)).toEqual(['chars', 'group']);
    expect(groupContent(text, outer)).toBe('a{b}');
  });

  it('should return an equal sequence when run twice', () => {
    const text = '\\documentclass{article}\n\\usepackage[final]{x} % c\n{\\bf y}';
    expect(tokenize(text)).toEqual(tokenize(text));
  });

  it('should return no nodes for empty text', () => {
    expect(tokenize('')).toEqual([]);
  });

  it('should keep tokenizing after an unclosed group', () => {
    expect(tokenize('{\n\\usepackage{x}')).toEqual([
      { kind: 'chars', text: '{\n', offset: 0, length: 2 },
      { kind: 'macro', name: 'usepackage', offset: 2, length: 11 },
      {
        kind: 'group',
        offset: 13,
        length: 3,
        children: [{ kind: 'chars', text: 'x', offset: 14, length: 1 }],
      },
    ]);
  });

  it('should close an inner group inside an unclosed one', () => {
    expect(tokenize('{a{b}')).toEqual([
      { kind: 'chars', text: '{a', offset: 0, length: 2 },
      {
        kind: 'group',
        offset: 2,
        length: 3,
        children: [{ kind: 'chars', text: 'b', offset: 3, length: 1 }],
      },
    ]);
  });

  it('should not pair escaped braces', () => {
    expect(tokenize('{\\}')).toEqual([
      { kind: 'chars', text: '{', offset: 0, length: 1 },
      { kind: 'macro', name: '}', offset: 1, length: 2 },
    ]);
  });

  it('should not pair braces inside comments', () => {
    expect(tokenize('{% }\n}')).toEqual([
      {
        kind: 'group',
        offset: 0,
        length: 6,
        children: [
          { kind: 'comment', text: ' }', offset: 1, length: 3 },
          { kind: 'chars', text: '\n', offset: 4, length: 1 },
        ],
      },
    ]);
  });

  it('should tokenize many unclosed groups quickly', () => {
    const text = 'if (x) {\n'.repeat(40);
    expect(tokenize(text)).toEqual([{ kind: 'chars', text, offset: 0, length: text.length }]);
  }, 1000);
});
