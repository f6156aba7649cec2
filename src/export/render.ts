/**
 * Render dependency trees, file summaries and macro locations as text,
 * JSON or YAML.
 */

import { stringify } from 'yaml';
import type { LatexProject } from '../core/project.js';
import type { DependencyNode, DependencyTree } from '../graph/dependency.js';
import type { DefinitionSummary, FileSummary, LatexDocument } from '../storage/document.js';
import { describeDefinition, describeImport, formatSpan, spanTuple } from '../parse/extractor.js';

export interface OutlineOptions {
  relativePaths?: boolean;
}

export interface MacroLocationSummary extends DefinitionSummary {
  file: string;
}

const INDENT = '  ';

function byName(a: LatexDocument, b: LatexDocument): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function renderBranches(tree: DependencyTree, prefix: string, lines: string[]): void {
  const entries = Object.entries(tree);
  entries.forEach(([name, children], i) => {
    const last = i === entries.length - 1;
    lines.push(`${prefix} +-- ${name}`);
    renderBranches(children, prefix + (last ? '     ' : ' |   '), lines);
  });
}

/**
 * Left aligned ASCII rendering of a dependency tree.
 */
export function renderTree(tree: DependencyTree): string {
  const lines: string[] = [];
  for (const [name, children] of Object.entries(tree)) {
    lines.push(name);
    renderBranches(children, '', lines);
  }
  return lines.join('\n');
}

/**
 * Indented listing of a node with its target counts and orphans.
 */
export function renderOutline(node: DependencyNode, options: OutlineOptions = {}): string {
  const baseDir = options.relativePaths ? node.baseDir : undefined;
  const lines: string[] = [];
  const ancestors = new Set<DependencyNode>();

  function write(current: DependencyNode, depth: number) {
    const label = baseDir === undefined ? current.name : current.relativePath(baseDir);
    const indent = INDENT.repeat(depth);
    if (ancestors.has(current)) {
      lines.push(`${indent}${label}: (cycle)`);
      return;
    }
    lines.push(`${indent}${label}: (${current.targets.size})`);

    const orphans = current.orphans;
    if (orphans.length > 0) {
      lines.push(`${indent}${INDENT}orphans: ${orphans.join(', ')}`);
    }

    ancestors.add(current);
    for (const target of current.targets.values()) {
      if (target !== null) write(target, depth + 1);
    }
    ancestors.delete(current);
  }

  write(node, 0);
  return lines.join('\n');
}

/**
 * Absolute paths of every document reachable from `node`, one per line.
 */
export function renderFileList(node: DependencyNode): string {
  return [...new Set(node.getFiles().map((doc) => doc.absolutePath))].join('\n');
}

/**
 * Imports, definitions and failures of every document, keyed by path.
 */
export function describeFiles(project: LatexProject): Record<string, FileSummary> {
  const files: Record<string, FileSummary> = {};
  for (const doc of project.documents) {
    files[doc.path] = doc.describe();
  }
  return files;
}

export function renderFiles(project: LatexProject): string {
  const lines: string[] = [];
  for (const doc of [...project.documents].sort(byName)) {
    lines.push(`${doc.path}:`);
    lines.push(`${INDENT}imports:`);
    for (const decl of doc.imports.values()) {
      lines.push(`${INDENT.repeat(2)}${describeImport(decl)}`);
    }
    lines.push(`${INDENT}definitions:`);
    for (const def of doc.definitions.values()) {
      lines.push(`${INDENT.repeat(2)}${describeDefinition(def)}`);
    }
    if (doc.failures.length > 0) {
      lines.push(`${INDENT}failures:`);
      for (const failure of doc.failures) {
        lines.push(`${INDENT.repeat(2)}${failure.message}`);
      }
    }
  }
  return lines.join('\n');
}

export function describeMacroLocations(project: LatexProject): Record<string, MacroLocationSummary> {
  const macros: Record<string, MacroLocationSummary> = {};
  for (const { definition, document } of project.macroLocations) {
    const summary: MacroLocationSummary = {
      command: definition.command,
      span: spanTuple(definition.definitionOffset),
      argSpec: definition.argSpec,
      file: document.path,
    };
    if (definition.body !== undefined) summary.body = definition.body;
    macros[definition.name] = summary;
  }
  return macros;
}

export function renderMacroLocations(project: LatexProject): string {
  const lines: string[] = [];
  for (const { definition, document } of project.macroLocations) {
    lines.push(definition.name);
    lines.push(`${INDENT}command: ${definition.command}`);
    lines.push(`${INDENT}span: ${formatSpan(definition.definitionOffset)}`);
    if (definition.argSpec.length > 0) {
      lines.push(`${INDENT}args: ${definition.argSpec}`);
    }
    if (definition.body !== undefined) {
      lines.push(`${INDENT}body: ${definition.body.replace(/\s*\n\s*/g, ' ')}`);
    }
    lines.push(`${INDENT}file: ${document.path}`);
  }
  return lines.join('\n');
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 4);
}

export function toYaml(value: unknown): string {
  return stringify(value, { lineWidth: 0 });
}
