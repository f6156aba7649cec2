/**
 * Dependency graph nodes and their read-only projections.
 */

import { dirname, isAbsolute, relative, sep } from 'path';
import type { LatexDocument } from '../storage/document.js';

/**
 * Source of the synthetic node that aggregates a whole project.
 */
export const ROOT: unique symbol = Symbol('root');

export const ROOT_NAME = 'root';

/**
 * Suffix appended to an imported package name to find its document.
 */
export const PACKAGE_EXTENSION = '.sty';

export function packageFileName(packageName: string): string {
  return packageName + PACKAGE_EXTENSION;
}

export function packageName(fileName: string): string {
  return fileName.endsWith(PACKAGE_EXTENSION) ? fileName.slice(0, -PACKAGE_EXTENSION.length) : fileName;
}

export type DependencySource = LatexDocument | typeof ROOT;

/**
 * Nested mapping of names to their imports, as rendered to JSON or YAML.
 */
export interface DependencyTree {
  [name: string]: DependencyTree;
}

export interface TreeOptions {
  /** Key documents by their path relative to {@link DependencyNode.baseDir}. */
  relativePaths?: boolean;
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isWithin(dir: string, file: string): boolean {
  const rel = relative(dir, file);
  return rel.length > 0 && rel.split(sep)[0] !== '..' && !isAbsolute(rel);
}

/**
 * An import relationship given by `\usepackage`. A `null` target is an
 * import with no matching document in the project.
 */
export class DependencyNode {
  readonly source: DependencySource;
  readonly targets: ReadonlyMap<string, DependencyNode | null>;
  private cachedBaseDir?: { value: string | undefined };

  constructor(source: DependencySource, targets: ReadonlyMap<string, DependencyNode | null>) {
    this.source = source;
    this.targets = targets;
  }

  get name(): string {
    return this.source === ROOT ? ROOT_NAME : this.source.name;
  }

  get document(): LatexDocument | undefined {
    return this.source === ROOT ? undefined : this.source;
  }

  /**
   * Packages imported but not found in the project. This typically includes
   * installed packages such as `hyperref`.
   */
  get orphans(): readonly string[] {
    const names: string[] = [];
    for (const [key, target] of this.targets) {
      if (target === null) names.push(packageName(key));
    }
    return names;
  }

  get(name: string): DependencyNode | null | undefined {
    return this.targets.get(name);
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  /**
   * Documents reachable from this node, each once, children before parents.
   */
  getFiles(): LatexDocument[] {
    const files: LatexDocument[] = [];
    const visited = new Set<DependencyNode>();

    function visit(node: DependencyNode) {
      if (visited.has(node)) return;
      visited.add(node);
      for (const target of node.targets.values()) {
        if (target !== null) visit(target);
      }
      if (node.source !== ROOT) files.push(node.source);
    }

    visit(this);
    return files;
  }

  /**
   * Deepest directory containing every reachable document.
   */
  get baseDir(): string | undefined {
    if (this.cachedBaseDir === undefined) {
      this.cachedBaseDir = { value: this.computeBaseDir() };
    }
    return this.cachedBaseDir.value;
  }

  private computeBaseDir(): string | undefined {
    if (this.source === ROOT) return undefined;
    const paths = this.getFiles().map((doc) => doc.absolutePath);
    if (paths.length === 0) return undefined;

    const depth = (p: string) => p.split(sep).length;
    const shallowest = paths.reduce((a, b) => (depth(b) < depth(a) ? b : a));
    let base = dirname(shallowest);
    while (!paths.every((p) => isWithin(base, p))) {
      const parent = dirname(base);
      if (parent === base) break;
      base = parent;
    }
    return base;
  }

  /**
   * Path of this node's document relative to `baseDir`, or its name.
   */
  relativePath(baseDir: string): string {
    if (this.source === ROOT) return ROOT_NAME;
    return relative(baseDir, this.source.absolutePath) || this.name;
  }

  /**
   * Nested mapping of this node and its imports with keys sorted at every
   * level. A target already being expanded higher up the path maps to `{}`.
   */
  tree(options: TreeOptions = {}): DependencyTree {
    const baseDir = options.relativePaths ? this.baseDir : undefined;
    const key = baseDir === undefined ? this.name : this.relativePath(baseDir);
    return { [key]: this.subtree(baseDir, new Set<DependencyNode>([this])) };
  }

  private subtree(baseDir: string | undefined, ancestors: Set<DependencyNode>): DependencyTree {
    const tree: DependencyTree = {};
    const entries = [...this.targets.entries()].sort(([a], [b]) => compareNames(a, b));

    for (const [name, target] of entries) {
      if (target === null) {
        tree[name] = {};
        continue;
      }
      const key = baseDir === undefined ? name : target.relativePath(baseDir);
      if (ancestors.has(target)) {
        tree[key] = {};
        continue;
      }
      ancestors.add(target);
      tree[key] = target.subtree(baseDir, ancestors);
      ancestors.delete(target);
    }

    return tree;
  }

  toString(): string {
    return `${this.name}: (${this.targets.size})`;
  }
}
