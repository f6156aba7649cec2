#!/usr/bin/env node
/**
 * latex-index CLI - list package dependencies, parsed files and macro
 * definitions of a LaTeX project.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type IndexerConfig } from '../core/config.js';
import { LatexIndexError, LookupError } from '../core/errors.js';
import { isLogLevel, logger, LOG_LEVELS } from '../core/logger.js';
import { createProject, requireDocument, type LatexProject } from '../core/project.js';
import { splitPathList } from '../storage/files.js';
import {
  describeFiles,
  describeMacroLocations,
  renderFileList,
  renderFiles,
  renderMacroLocations,
  renderOutline,
  renderTree,
  toJson,
  toYaml,
} from '../export/render.js';

type GlobalOptions = {
  logLevel?: string;
  verbose?: boolean;
};

interface ProjectCommandOptions {
  ext?: string;
  recurse?: boolean;
}

interface DepsOptions extends ProjectCommandOptions {
  source?: string;
  format: string;
  relative?: boolean;
}

interface FormatOptions extends ProjectCommandOptions {
  format: string;
}

const program = new Command();

program
  .name('latex-index')
  .description('Index LaTeX package imports and macro definitions')
  .version('0.1.0')
  .option('--log-level <level>', `Log level (${LOG_LEVELS.join(', ')})`)
  .option('-v, --verbose', 'Log informational messages');

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function checkFormat(format: string, valid: readonly string[]): void {
  if (!valid.includes(format)) {
    fail(`Invalid format: ${format}. Must be one of: ${valid.join(', ')}`);
  }
}

/**
 * Run a command, turning application errors into an error message and a
 * non-zero exit status.
 */
function run(action: () => void): void {
  try {
    action();
  } catch (error) {
    if (error instanceof LatexIndexError) {
      fail(error.format());
    }
    throw error;
  }
}

function configure(options: ProjectCommandOptions): IndexerConfig {
  const config = loadConfig();
  const globals = program.opts<GlobalOptions>();

  if (globals.logLevel !== undefined) {
    if (!isLogLevel(globals.logLevel)) {
      fail(`Invalid log level: ${globals.logLevel}. Must be one of: ${LOG_LEVELS.join(', ')}`);
    }
    config.logLevel = globals.logLevel;
  } else if (globals.verbose) {
    config.logLevel = 'info';
  }
  if (options.ext !== undefined) {
    config.extensions = options.ext.split(',').map((e) => e.trim().replace(/^\./, ''));
  }
  if (options.recurse !== undefined) {
    config.recurse = options.recurse;
  }

  logger.setLevel(config.logLevel);
  return config;
}

function openProject(paths: string, options: ProjectCommandOptions): LatexProject {
  const config = configure(options);
  return createProject(splitPathList(paths), config);
}

function reportFailures(project: LatexProject): void {
  for (const doc of project.documents) {
    for (const failure of doc.failures) {
      logger.warn(failure.message);
    }
  }
}

function output(text: string): void {
  console.log(text.trimEnd());
}

function addProjectOptions(command: Command): Command {
  return command
    .option('--ext <extensions>', 'Comma-separated candidate file extensions (e.g., tex,sty)')
    .option('--recurse', 'Descend into sub-directories')
    .option('--no-recurse', 'Do not descend into sub-directories');
}

// Deps command
addProjectOptions(
  program
    .command('deps <paths>')
    .description('List package dependencies; <paths> is a path separated list of files or directories')
    .option('-s, --source <name>', 'Only the dependencies of this document (name or path)')
    .option('-f, --format <format>', 'Output format (tree, outline, json, yaml, list)', 'tree')
    .option('-r, --relative', 'Show documents by path relative to their common directory')
).action((paths: string, options: DepsOptions) => {
  checkFormat(options.format, ['tree', 'outline', 'json', 'yaml', 'list']);
  run(() => {
    const project = openProject(paths, options);
    let node = project.dependencies;
    if (options.source !== undefined) {
      const doc = requireDocument(project, options.source);
      const found = project.dependencyFor(doc.name);
      if (!found) {
        throw new LookupError(options.source);
      }
      node = found;
    }
    reportFailures(project);

    if (options.format === 'list') {
      output(renderFileList(node));
      return;
    }
    if (options.format === 'outline') {
      output(renderOutline(node, { relativePaths: options.relative }));
      return;
    }

    const tree = node.tree({ relativePaths: options.relative });
    if (options.format === 'json') {
      output(toJson(tree));
    } else if (options.format === 'yaml') {
      output(toYaml(tree));
    } else {
      output(renderTree(tree));
    }
  });
});

// Files command
addProjectOptions(
  program
    .command('files <paths>')
    .description('List the imports, definitions and parse failures of each file')
    .option('-f, --format <format>', 'Output format (text, json, yaml, list)', 'text')
).action((paths: string, options: FormatOptions) => {
  checkFormat(options.format, ['text', 'json', 'yaml', 'list']);
  run(() => {
    const project = openProject(paths, options);

    if (options.format === 'list') {
      output(project.documents.map((doc) => doc.path).join('\n'));
    } else if (options.format === 'json') {
      output(toJson(describeFiles(project)));
    } else if (options.format === 'yaml') {
      output(toYaml(describeFiles(project)));
    } else {
      output(renderFiles(project));
    }
  });
});

// Commands command
addProjectOptions(
  program
    .command('commands <paths>')
    .description('List where each macro is defined')
    .option('-f, --format <format>', 'Output format (text, json, yaml)', 'text')
).action((paths: string, options: FormatOptions) => {
  checkFormat(options.format, ['text', 'json', 'yaml']);
  run(() => {
    const project = openProject(paths, options);
    reportFailures(project);

    if (project.macroLocations.length === 0) {
      console.log(chalk.yellow('No macro definitions found'));
      return;
    }
    if (options.format === 'json') {
      output(toJson(describeMacroLocations(project)));
    } else if (options.format === 'yaml') {
      output(toYaml(describeMacroLocations(project)));
    } else {
      output(renderMacroLocations(project));
    }
  });
});

program.parse();
