/**
 * A LaTeX file (`.tex`, `.sty`, ...) and the artifacts parsed from it.
 */

import { readFileSync } from 'fs';
import { basename, resolve } from 'path';
import type { ImportDeclaration, MacroDefinition } from '../core/types.js';
import type { ParseError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { tokenize } from '../parse/tokenizer.js';
import { extractMacros, spanTuple } from '../parse/extractor.js';

export type FileReader = (path: string) => string;

export interface DocumentOptions {
  /** Content to use instead of reading `path`. */
  text?: string;
  readFile?: FileReader;
}

export interface ImportSummary {
  span: [number, number];
  options?: string;
}

export interface DefinitionSummary {
  command: string;
  span: [number, number];
  argSpec: string;
  body?: string;
}

/**
 * Plain-data view of a document as written by the `files` command.
 */
export interface FileSummary {
  imports: Record<string, ImportSummary>;
  definitions: Record<string, DefinitionSummary>;
  failures: string[];
}

interface ParsedArtifacts {
  imports: ReadonlyMap<string, ImportDeclaration>;
  definitions: ReadonlyMap<string, MacroDefinition>;
  failures: readonly ParseError[];
}

const readUtf8: FileReader = (path) => readFileSync(path, 'utf-8');

export class LatexDocument {
  readonly path: string;
  private readonly readFile: FileReader;
  private content?: string;
  private artifacts?: ParsedArtifacts;

  constructor(path: string, options: DocumentOptions = {}) {
    this.path = path;
    this.content = options.text;
    this.readFile = options.readFile ?? readUtf8;
  }

  /**
   * The base file name, used as the document's key in a project.
   */
  get name(): string {
    return basename(this.path);
  }

  get absolutePath(): string {
    return resolve(this.path);
  }

  /**
   * File content, read on first access only. Read errors propagate.
   */
  get text(): string {
    if (this.content === undefined) {
      logger.debug(`reading: ${this.path}`);
      this.content = this.readFile(this.path);
    }
    return this.content;
  }

  private parse(): ParsedArtifacts {
    if (this.artifacts === undefined) {
      const text = this.text;
      const result = extractMacros(tokenize(text), text, this.path);
      this.artifacts = {
        imports: result.imports,
        definitions: result.definitions,
        failures: Object.freeze(result.failures),
      };
    }
    return this.artifacts;
  }

  /**
   * `\usepackage` declarations by package name; the last one wins.
   */
  get imports(): ReadonlyMap<string, ImportDeclaration> {
    return this.parse().imports;
  }

  /**
   * Macro definitions by macro name; the last one wins.
   */
  get definitions(): ReadonlyMap<string, MacroDefinition> {
    return this.parse().definitions;
  }

  get failures(): readonly ParseError[] {
    return this.parse().failures;
  }

  describe(): FileSummary {
    const imports: Record<string, ImportSummary> = {};
    for (const decl of this.imports.values()) {
      const summary: ImportSummary = { span: spanTuple(decl.span) };
      if (decl.options !== undefined) summary.options = decl.options;
      imports[decl.name] = summary;
    }

    const definitions: Record<string, DefinitionSummary> = {};
    for (const def of this.definitions.values()) {
      const summary: DefinitionSummary = {
        command: def.command,
        span: spanTuple(def.definitionOffset),
        argSpec: def.argSpec,
      };
      if (def.body !== undefined) summary.body = def.body;
      definitions[def.name] = summary;
    }

    return {
      imports,
      definitions,
      failures: this.failures.map((failure) => failure.message),
    };
  }

  toString(): string {
    return this.name;
  }
}
