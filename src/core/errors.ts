/**
 * Error types raised while indexing LaTeX files.
 */

export type ErrorCode =
  | 'parse_error'
  | 'not_found'
  | 'lookup_error'
  | 'config_error';

/**
 * Base class for every application level error.
 */
export class LatexIndexError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'LatexIndexError';
    this.code = code;
  }

  format(): string {
    return `error: ${this.message}`;
  }
}

/**
 * A recognised macro form that could not be parsed. Recorded on the owning
 * document rather than thrown to the caller.
 */
export class ParseError extends LatexIndexError {
  readonly path: string;
  readonly offset?: number;

  constructor(path: string, message: string, offset?: number) {
    super('parse_error', `${message} in '${path}'`);
    this.name = 'ParseError';
    this.path = path;
    this.offset = offset;
  }
}

/**
 * A file or directory given to project construction does not exist.
 */
export class NotFoundError extends LatexIndexError {
  readonly path: string;

  constructor(path: string) {
    super('not_found', `No such file or directory: ${path}`);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

/**
 * A document name or path matched nothing in the project.
 */
export class LookupError extends LatexIndexError {
  readonly query: string;

  constructor(query: string) {
    super('lookup_error', `No source found: ${query}`);
    this.name = 'LookupError';
    this.query = query;
  }
}

export class ConfigError extends LatexIndexError {
  readonly file: string;

  constructor(file: string, message: string) {
    super('config_error', `${message} (${file})`);
    this.name = 'ConfigError';
    this.file = file;
  }
}
