/**
 * A LaTeX project: the set of documents used in one compilation and the
 * indexes derived from them.
 */

import { basename, resolve } from 'path';
import { LookupError } from './errors.js';
import { logger } from './logger.js';
import { LatexDocument, type DocumentOptions } from '../storage/document.js';
import { findCandidateFiles, type DiscoveryOptions } from '../storage/files.js';
import type { DependencyNode } from '../graph/dependency.js';
import {
  indexDocumentsByName,
  resolveDependencies,
  type DependencyGraph,
} from '../graph/resolver.js';
import { buildMacroLocations, sortMacroLocations, type MacroLocation } from '../graph/locations.js';

export interface ProjectOptions {
  /** Reader used for documents created from paths. */
  readFile?: DocumentOptions['readFile'];
}

/**
 * Every derived value is computed on first access and kept for the life of
 * the project; the files are assumed not to change during a run.
 */
export class LatexProject {
  readonly documents: readonly LatexDocument[];
  private byName?: ReadonlyMap<string, LatexDocument>;
  private graph?: DependencyGraph;
  private locationsByName?: ReadonlyMap<string, MacroLocation>;
  private sortedLocations?: readonly MacroLocation[];

  constructor(files: ReadonlyArray<string | LatexDocument>, options: ProjectOptions = {}) {
    this.documents = files.map((file) =>
      typeof file === 'string' ? new LatexDocument(file, { readFile: options.readFile }) : file
    );
  }

  get documentsByName(): ReadonlyMap<string, LatexDocument> {
    if (this.byName === undefined) {
      this.byName = indexDocumentsByName(this.documents);
    }
    return this.byName;
  }

  get dependencyGraph(): DependencyGraph {
    if (this.graph === undefined) {
      this.graph = resolveDependencies(this.documents, this.documentsByName);
      if (this.graph.cycles > 0) {
        logger.debug(`resolved ${this.graph.cycles} import cycle(s)`);
      }
    }
    return this.graph;
  }

  /**
   * Root of the import tree of every document in the project.
   */
  get dependencies(): DependencyNode {
    return this.dependencyGraph.root;
  }

  /**
   * Documents that take part in the dependency graph.
   */
  get dependencyFiles(): LatexDocument[] {
    return this.dependencies.getFiles();
  }

  /**
   * The shared node of a document, by document name.
   */
  dependencyFor(name: string): DependencyNode | undefined {
    return this.dependencyGraph.nodes.get(name);
  }

  get macroLocationsByName(): ReadonlyMap<string, MacroLocation> {
    if (this.locationsByName === undefined) {
      this.locationsByName = buildMacroLocations(this.documents);
    }
    return this.locationsByName;
  }

  get macroLocations(): readonly MacroLocation[] {
    if (this.sortedLocations === undefined) {
      this.sortedLocations = sortMacroLocations(this.macroLocationsByName);
    }
    return this.sortedLocations;
  }

  prime(): void {
    void this.dependencyGraph;
  }
}

/**
 * Create a project from files and directories. Fails with `NotFoundError`
 * when a path does not exist.
 */
export function createProject(
  paths: readonly string[],
  discovery: DiscoveryOptions,
  options: ProjectOptions = {}
): LatexProject {
  const files = paths.flatMap((path) => findCandidateFiles(path, discovery));
  logger.debug(`indexing ${files.length} file(s)`);
  return new LatexProject(files, options);
}

export type DocumentLookup =
  | { found: true; document: LatexDocument }
  | { found: false; query: string };

/**
 * Find a document by exact name, then by path, then by file name.
 */
export function findDocument(project: LatexProject, query: string): DocumentLookup {
  const exact = project.documentsByName.get(query);
  if (exact) {
    return { found: true, document: exact };
  }

  const absolute = resolve(query);
  const byPath = project.documents.find((doc) => doc.absolutePath === absolute);
  if (byPath) {
    return { found: true, document: byPath };
  }

  const fileName = basename(query);
  const byFileName = project.documents.find((doc) => doc.name === fileName);
  if (byFileName) {
    return { found: true, document: byFileName };
  }

  return { found: false, query };
}

/**
 * Like {@link findDocument}, but fails with `LookupError`.
 */
export function requireDocument(project: LatexProject, query: string): LatexDocument {
  const lookup = findDocument(project, query);
  if (!lookup.found) {
    throw new LookupError(lookup.query);
  }
  return lookup.document;
}
