/**
 * latex-index - index LaTeX package imports and macro definitions
 *
 * @packageDocumentation
 */

export type {
  SourceSpan,
  LatexNode,
  MacroNode,
  GroupNode,
  CharsNode,
  CommentNode,
  ImportDeclaration,
  MacroDefinition,
} from './core/types.js';
export {
  LatexIndexError,
  ParseError,
  NotFoundError,
  LookupError,
  ConfigError,
} from './core/errors.js';
export { logger, type LogLevel } from './core/logger.js';
export { loadConfig, parseConfig, DEFAULT_CONFIG, type IndexerConfig } from './core/config.js';
export {
  LatexProject,
  createProject,
  findDocument,
  requireDocument,
  type DocumentLookup,
} from './core/project.js';
export { tokenize, nodeText } from './parse/tokenizer.js';
export { extractMacros, type ExtractionResult } from './parse/extractor.js';
export { LatexDocument } from './storage/document.js';
export { findCandidateFiles, splitPathList } from './storage/files.js';
export { DependencyNode, ROOT, type DependencyTree } from './graph/dependency.js';
export { DependencyResolver, resolveDependencies, type DependencyGraph } from './graph/resolver.js';
export { buildMacroLocations, sortMacroLocations, type MacroLocation } from './graph/locations.js';
export {
  renderTree,
  renderOutline,
  renderFileList,
  renderFiles,
  renderMacroLocations,
  describeFiles,
  toJson,
  toYaml,
} from './export/render.js';
