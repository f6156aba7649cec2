/**
 * Tests for dependency node projections.
 */

import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { LatexDocument } from '../../src/storage/document.js';
import { DependencyNode, ROOT, packageFileName, packageName } from '../../src/graph/dependency.js';
import { resolveDependencies } from '../../src/graph/resolver.js';
import { toJson, toYaml } from '../../src/export/render.js';

function doc(path: string, text: string): LatexDocument {
  return new LatexDocument(path, { text });
}

function scenario() {
  return resolveDependencies([
    doc('/proj/root.tex', '\\usepackage{zeta}\n\\usepackage{child}\n\\usepackage{orphan}'),
    doc('/proj/styles/child.sty', '\\usepackage{zeta}'),
    doc('/proj/styles/zeta.sty', ''),
  ]).root;
}

describe('package names', () => {
  it('should map between package and file names', () => {
    expect(packageFileName('child')).toBe('child.sty');
    expect(packageName('child.sty')).toBe('child');
    expect(packageName('plain')).toBe('plain');
  });
});

describe('DependencyNode.tree', () => {
  it('should sort keys at every level', () => {
    const tree = scenario().tree();

    expect(tree).toEqual({
      root: {
        'root.tex': {
          'child.sty': { 'zeta.sty': {} },
          'orphan.sty': {},
          'zeta.sty': {},
        },
      },
    });
    expect(Object.keys(tree.root['root.tex'])).toEqual(['child.sty', 'orphan.sty', 'zeta.sty']);
  });

  it('should key documents by relative path', () => {
    const main = scenario().get('root.tex');

    expect(main?.tree({ relativePaths: true })).toEqual({
      'root.tex': {
        'styles/child.sty': { 'styles/zeta.sty': {} },
        'orphan.sty': {},
        'styles/zeta.sty': {},
      },
    });
  });

  it('should stop at nodes already on the current path', () => {
    const root = resolveDependencies([
      doc('x.sty', '\\usepackage{y}'),
      doc('y.sty', '\\usepackage{x}'),
    ]).root;

    expect(root.get('x.sty')?.tree()).toEqual({ 'x.sty': { 'y.sty': { 'x.sty': {} } } });
  });

  it('should survive a JSON and YAML round trip', () => {
    const tree = scenario().tree();

    expect(JSON.parse(toJson(tree))).toEqual(tree);
    expect(parse(toYaml(tree))).toEqual(tree);
  });

  it('should not change the graph', () => {
    const root = scenario();
    const before = [...(root.get('root.tex')?.targets.keys() ?? [])];

    root.tree({ relativePaths: true });

    expect([...(root.get('root.tex')?.targets.keys() ?? [])]).toEqual(before);
  });
});

describe('DependencyNode.getFiles', () => {
  it('should list reachable documents once, children first', () => {
    const names = scenario()
      .getFiles()
      .map((d) => d.name);

    expect(names).toEqual(['zeta.sty', 'child.sty', 'root.tex']);
  });

  it('should terminate on cycles', () => {
    const root = resolveDependencies([
      doc('x.sty', '\\usepackage{y}'),
      doc('y.sty', '\\usepackage{x}'),
    ]).root;

    expect(root.getFiles().map((d) => d.name)).toEqual(['y.sty', 'x.sty']);
  });
});

describe('DependencyNode.baseDir', () => {
  it('should find the deepest directory holding every reachable document', () => {
    const root = scenario();

    expect(root.get('root.tex')?.baseDir).toBe('/proj');
    expect(root.get('root.tex')?.get('child.sty')?.baseDir).toBe('/proj/styles');
  });

  it('should walk up past sibling directories', () => {
    const root = resolveDependencies([
      doc('/a/b/x.tex', '\\usepackage{y}'),
      doc('/a/c/y.sty', ''),
    ]).root;

    expect(root.get('x.tex')?.baseDir).toBe('/a');
  });

  it('should be absent for the root', () => {
    expect(scenario().baseDir).toBeUndefined();
  });

  it('should be absent for a root with nothing reachable', () => {
    expect(new DependencyNode(ROOT, new Map()).baseDir).toBeUndefined();
  });
});
