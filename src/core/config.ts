/**
 * Indexer configuration, read from `latex-index.yaml`.
 */

import { readFileSync } from 'fs';
import { parse } from 'yaml';
import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import { findConfigFile } from '../storage/files.js';

export interface IndexerConfig {
  extensions: string[];
  recurse: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<IndexerConfig> = {
  extensions: ['tex', 'sty'],
  recurse: true,
  logLevel: 'warn',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed YAML content. Missing keys take their defaults and
 * unknown keys are ignored.
 */
export function parseConfig(content: string, file: string): IndexerConfig {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigError(file, `Invalid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const config: IndexerConfig = {
    ...DEFAULT_CONFIG,
    extensions: [...DEFAULT_CONFIG.extensions],
  };
  if (raw === null || raw === undefined) {
    return config;
  }
  if (!isRecord(raw)) {
    throw new ConfigError(file, 'Configuration must be a mapping');
  }

  const { extensions, recurse, logLevel } = raw;
  if (extensions !== undefined) {
    if (!Array.isArray(extensions) || !extensions.every((e): e is string => typeof e === 'string')) {
      throw new ConfigError(file, "'extensions' must be a list of strings");
    }
    config.extensions = extensions.map((e) => e.replace(/^\./, ''));
  }
  if (recurse !== undefined) {
    if (typeof recurse !== 'boolean') {
      throw new ConfigError(file, "'recurse' must be true or false");
    }
    config.recurse = recurse;
  }
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(file, `'logLevel' must be one of silent, error, warn, info, debug`);
    }
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Load the nearest configuration file, or the defaults when there is none.
 */
export function loadConfig(startDir: string = process.cwd()): IndexerConfig {
  const file = findConfigFile(startDir);
  if (!file) {
    return { ...DEFAULT_CONFIG, extensions: [...DEFAULT_CONFIG.extensions] };
  }

  let content: string;
  try {
    content = readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ConfigError(file, `Cannot read configuration: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(content, file);
}
