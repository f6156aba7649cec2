/**
 * Macro extraction - recovers `\usepackage` imports and
 * `\newcommand`-style definitions from a document's top level node sequence.
 */

import type {
  GroupNode,
  ImportDeclaration,
  LatexNode,
  MacroDefinition,
  MacroNode,
  SourceSpan,
} from '../core/types.js';
import { ParseError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { groupContent, nodeEnd, nodeText } from './tokenizer.js';

/**
 * Imports and definitions keyed by name. Both maps are upserted: a later
 * occurrence of a name replaces the earlier one and keeps its position.
 */
export interface ExtractionResult {
  imports: Map<string, ImportDeclaration>;
  definitions: Map<string, MacroDefinition>;
  failures: ParseError[];
}

/**
 * Outcome of parsing one macro occurrence. `next` is the index of the first
 * node after those consumed.
 */
type ParseStep<T> =
  | { status: 'parsed'; value: T; next: number }
  | { status: 'failed'; error: ParseError }
  | { status: 'unsupported'; reason: string };

const USEPACKAGE = 'usepackage';
const DEFINITION_SUFFIX = 'command';

function assertNever(node: never): never {
  throw new Error(`Unexpected node: ${JSON.stringify(node)}`);
}

export function formatSpan(span: SourceSpan): string {
  return `[${span.start}, ${span.end}]`;
}

export function spanTuple(span: SourceSpan): [number, number] {
  return [span.start, span.end];
}

export function describeImport(decl: ImportDeclaration): string {
  return `${decl.name} @ ${formatSpan(decl.span)}`;
}

export function describeDefinition(def: MacroDefinition): string {
  return `${def.name} @ ${formatSpan(def.definitionOffset)}`;
}

function parseImport(
  macro: MacroNode,
  nodes: LatexNode[],
  index: number,
  text: string,
  path: string
): ParseStep<ImportDeclaration> {
  const fail = (message: string): ParseStep<ImportDeclaration> => ({
    status: 'failed',
    error: new ParseError(path, message, macro.offset),
  });

  const next = nodes[index + 1];
  if (next === undefined) {
    return fail(`Expecting package name after '${nodeText(text, macro)}'`);
  }

  let options: string | undefined;
  let groupIndex: number;
  switch (next.kind) {
    case 'group':
      groupIndex = index + 1;
      break;
    case 'chars':
      // bracketed options arrive as a sibling character run
      options = next.text.trim() || undefined;
      groupIndex = index + 2;
      break;
    case 'macro':
    case 'comment':
      return fail(`Unknown usepackage syntax '${nodeText(text, macro)}${nodeText(text, next)}'`);
    default:
      return assertNever(next);
  }

  const group = nodes[groupIndex];
  if (group === undefined) {
    return fail(`Expecting package name group after '${nodeText(text, next)}'`);
  }
  if (group.kind !== 'group') {
    return fail(`Expecting group node: '${nodeText(text, group)}'`);
  }

  const first = group.children[0];
  if (first === undefined || first.kind !== 'chars') {
    return fail(`Expecting package name: '${nodeText(text, group)}'`);
  }
  const name = first.text.trim();
  if (name.length === 0) {
    return fail('Empty package name');
  }

  return {
    status: 'parsed',
    value: {
      name,
      options,
      declarationOffset: macro.offset,
      span: { start: macro.offset, end: nodeEnd(group) },
    },
    next: groupIndex + 1,
  };
}

function parseDefinition(
  macro: MacroNode,
  nodes: LatexNode[],
  index: number,
  text: string,
  path: string
): ParseStep<MacroDefinition> {
  const next = nodes[index + 1];
  if (next === undefined) {
    return {
      status: 'failed',
      error: new ParseError(path, `Expecting macro name after '${nodeText(text, macro)}'`, macro.offset),
    };
  }

  const nameNode = next.kind === 'group' ? next.children[0] : undefined;
  if (next.kind !== 'group' || nameNode === undefined || nameNode.kind !== 'macro') {
    return {
      status: 'unsupported',
      reason: `${nodeText(text, macro)}${nodeText(text, next)} at ${macro.offset}`,
    };
  }

  // everything up to the next group or comment is the argument spec
  const argNodes: LatexNode[] = [];
  let pos = index + 2;
  while (pos < nodes.length) {
    const node = nodes[pos];
    if (node.kind === 'group' || node.kind === 'comment') break;
    argNodes.push(node);
    pos++;
  }

  const stop = nodes[pos];
  const body: GroupNode | undefined = stop !== undefined && stop.kind === 'group' ? stop : undefined;
  const last: LatexNode = body ?? argNodes[argNodes.length - 1] ?? next;
  const span: SourceSpan = { start: macro.offset, end: nodeEnd(last) };

  return {
    status: 'parsed',
    value: {
      name: nameNode.name,
      command: macro.name,
      definitionOffset: span,
      argSpec: argNodes.map((node) => nodeText(text, node)).join(''),
      body: body ? groupContent(text, body) : undefined,
      rawText: text.slice(span.start, span.end),
    },
    next: body ? pos + 1 : pos,
  };
}

/**
 * Scan a document's nodes in a single forward pass. Failures are collected
 * and never stop the scan.
 */
export function extractMacros(nodes: LatexNode[], text: string, path: string): ExtractionResult {
  const imports = new Map<string, ImportDeclaration>();
  const definitions = new Map<string, MacroDefinition>();
  const failures: ParseError[] = [];

  let index = 0;
  while (index < nodes.length) {
    const node = nodes[index];
    if (node.kind !== 'macro') {
      index++;
      continue;
    }

    if (node.name === USEPACKAGE) {
      const step = parseImport(node, nodes, index, text, path);
      if (step.status === 'parsed') {
        const prev = imports.get(step.value.name);
        if (prev) {
          logger.info(`replacing previously <${describeImport(prev)}> <${describeImport(step.value)}> in ${path}`);
        }
        imports.set(step.value.name, step.value);
        index = step.next;
        continue;
      }
      if (step.status === 'failed') {
        failures.push(step.error);
      }
    } else if (node.name.endsWith(DEFINITION_SUFFIX)) {
      const step = parseDefinition(node, nodes, index, text, path);
      if (step.status === 'parsed') {
        definitions.set(step.value.name, step.value);
        index = step.next;
        continue;
      }
      if (step.status === 'failed') {
        failures.push(step.error);
      } else {
        logger.info(`Un-parsable macro: ${step.reason} in ${path}`);
      }
    }

    index++;
  }

  return { imports, definitions, failures };
}
