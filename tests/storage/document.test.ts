/**
 * Tests for lazily parsed LaTeX documents.
 */

import { describe, it, expect, vi } from 'vitest';
import { join } from 'path';
import { LatexDocument } from '../../src/storage/document.js';
import { ParseError } from '../../src/core/errors.js';

describe('LatexDocument', () => {
  it('should use the base file name as its name', () => {
    const doc = new LatexDocument('some/dir/root.tex', { text: '' });
    expect(doc.name).toBe('root.tex');
    expect(doc.toString()).toBe('root.tex');
  });

  it('should read the file once and cache the parsed artifacts', () => {
    const readFile = vi.fn(() => '\\usepackage{a}\n\\newcommand{\\b}{c}');
    const doc = new LatexDocument('root.tex', { readFile });

    const imports = doc.imports;
    const definitions = doc.definitions;

    expect(doc.imports).toBe(imports);
    expect(doc.definitions).toBe(definitions);
    expect(doc.failures).toBe(doc.failures);
    expect(doc.text).toBe('\\usepackage{a}\n\\newcommand{\\b}{c}');
    expect(readFile).toHaveBeenCalledTimes(1);
    expect(readFile).toHaveBeenCalledWith('root.tex');
  });

  it('should not read until content is needed', () => {
    const readFile = vi.fn(() => '');
    const doc = new LatexDocument('root.tex', { readFile });

    expect(doc.name).toBe('root.tex');
    expect(readFile).not.toHaveBeenCalled();
  });

  it('should compute imports and definitions in one pass', () => {
    const readFile = vi.fn(() => '\\newcommand{\\b}{c}');
    const doc = new LatexDocument('x.sty', { readFile });

    expect(doc.definitions.size).toBe(1);
    expect(doc.imports.size).toBe(0);
    expect(readFile).toHaveBeenCalledTimes(1);
  });

  it('should propagate read errors', () => {
    const doc = new LatexDocument('missing.tex', {
      readFile: () => {
        throw new Error('ENOENT: missing.tex');
      },
    });

    expect(() => doc.imports).toThrow('ENOENT: missing.tex');
  });

  it('should keep partial results alongside failures', () => {
    const doc = new LatexDocument('bad.tex', { text: '\\usepackage{ok}\n\\usepackage{broken' });

    expect([...doc.imports.keys()]).toEqual(['ok']);
    expect(doc.failures).toHaveLength(1);
    expect(doc.failures[0]).toBeInstanceOf(ParseError);
    expect(doc.failures[0].path).toBe('bad.tex');
  });

  it('should read documents from disk', () => {
    const doc = new LatexDocument(join(process.cwd(), 'tests/fixtures/proj/root.tex'));

    expect([...doc.imports.keys()]).toEqual(['child', 'orphan']);
    expect(doc.imports.get('child')?.declarationOffset).toBe(24);
    expect(doc.imports.get('orphan')?.options).toBe('[final]');
    expect(doc.imports.get('orphan')?.span).toEqual({ start: 43, end: 69 });
  });

  it('should find imports around many unclosed braces', () => {
    const text = '\\usepackage{a}\n' + 'if (x) {\n'.repeat(30) + '\\usepackage{b}\n';
    const doc = new LatexDocument('code.sty', { text });

    expect([...doc.imports.keys()]).toEqual(['a', 'b']);
    expect(doc.failures).toEqual([]);
  }, 1000);

  it('should describe imports, definitions and failures', () => {
    const doc = new LatexDocument('x.tex', {
      text: '\\usepackage[final]{a}\n\\newcommand{\\b}[1]{c}\n\\usepackage{',
    });

    expect(doc.describe()).toEqual({
      imports: { a: { span: [0, 21], options: '[final]' } },
      definitions: { b: { command: 'newcommand', span: [22, 43], argSpec: '[1]', body: 'c' } },
      failures: ["Expecting package name group after '{' in 'x.tex'"],
    });
  });
});
