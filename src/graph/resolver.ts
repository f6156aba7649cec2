/**
 * Dependency resolution - expands `\usepackage` imports across a project
 * into a shared graph of {@link DependencyNode}s.
 */

import type { LatexDocument } from '../storage/document.js';
import { logger } from '../core/logger.js';
import { DependencyNode, ROOT, packageFileName } from './dependency.js';

export interface DependencyGraph {
  /** Synthetic node whose targets are the project's entry documents. */
  root: DependencyNode;
  /** Every resolved node by document name. */
  nodes: ReadonlyMap<string, DependencyNode>;
  /** Number of imports that pointed back at a node still being expanded. */
  cycles: number;
}

/**
 * Resolves documents to nodes, memoized by document name for the lifetime
 * of the resolver. Each node is registered before its imports are expanded,
 * so an import cycle resolves to the node already under construction.
 */
export class DependencyResolver {
  private readonly documentsByName: ReadonlyMap<string, LatexDocument>;
  private readonly memo = new Map<string, DependencyNode>();
  private readonly expanding = new Set<string>();
  private cycleCount = 0;

  constructor(documentsByName: ReadonlyMap<string, LatexDocument>) {
    this.documentsByName = documentsByName;
  }

  get nodes(): ReadonlyMap<string, DependencyNode> {
    return this.memo;
  }

  get cycles(): number {
    return this.cycleCount;
  }

  resolve(document: LatexDocument): DependencyNode {
    const existing = this.memo.get(document.name);
    if (existing) {
      if (this.expanding.has(document.name)) {
        this.cycleCount++;
        logger.debug(`import cycle back to ${document.name}`);
      }
      return existing;
    }

    const targets = new Map<string, DependencyNode | null>();
    const node = new DependencyNode(document, targets);
    this.memo.set(document.name, node);
    this.expanding.add(document.name);

    for (const decl of document.imports.values()) {
      const key = packageFileName(decl.name);
      const target = this.documentsByName.get(key);
      logger.debug(`${document.name} -> (${decl.name}) ${target ? target.path : 'not found'}`);
      targets.set(key, target ? this.resolve(target) : null);
    }

    this.expanding.delete(document.name);
    return node;
  }

  /**
   * Build the root node over `documents`. Entries are the documents no
   * other document imports; documents reachable from none of them, such as
   * members of a pure import cycle, are added in order until all are covered.
   */
  resolveRoot(documents: readonly LatexDocument[]): DependencyNode {
    const resolved = documents.map((doc) => this.resolve(this.documentsByName.get(doc.name) ?? doc));

    const imported = new Set<DependencyNode>();
    for (const node of resolved) {
      for (const target of node.targets.values()) {
        if (target !== null && target !== node) imported.add(target);
      }
    }

    const entries = new Map<string, DependencyNode>();
    for (const node of resolved) {
      if (!imported.has(node) && !entries.has(node.name)) {
        entries.set(node.name, node);
      }
    }

    const covered = new Set<LatexDocument>();
    const cover = (node: DependencyNode) => {
      for (const doc of node.getFiles()) covered.add(doc);
    };
    entries.forEach(cover);

    for (const node of resolved) {
      if (node.document && !covered.has(node.document) && !entries.has(node.name)) {
        entries.set(node.name, node);
        cover(node);
      }
    }

    return new DependencyNode(ROOT, entries);
  }
}

/**
 * Key documents by name. A later document replaces an earlier one with the
 * same name.
 */
export function indexDocumentsByName(documents: readonly LatexDocument[]): Map<string, LatexDocument> {
  const byName = new Map<string, LatexDocument>();
  for (const doc of documents) {
    const prev = byName.get(doc.name);
    if (prev && prev !== doc) {
      logger.warn(`${doc.path} shadows ${prev.path}`);
    }
    byName.set(doc.name, doc);
  }
  return byName;
}

/**
 * Resolve a project's documents into a dependency graph. `documentsByName`
 * defaults to {@link indexDocumentsByName} over `documents`.
 */
export function resolveDependencies(
  documents: readonly LatexDocument[],
  documentsByName: ReadonlyMap<string, LatexDocument> = indexDocumentsByName(documents)
): DependencyGraph {
  const resolver = new DependencyResolver(documentsByName);
  const root = resolver.resolveRoot(documents);
  return { root, nodes: resolver.nodes, cycles: resolver.cycles };
}
