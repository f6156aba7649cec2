/**
 * Tests for the leveled logger and error types.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { Logger, isLogLevel } from '../../src/core/logger.js';
import { ConfigError, LookupError, NotFoundError, ParseError } from '../../src/core/errors.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Logger', () => {
  it('should default to warnings', () => {
    const log = new Logger();

    expect(log.getLevel()).toBe('warn');
    expect(log.isEnabled('warn')).toBe(true);
    expect(log.isEnabled('info')).toBe(false);
  });

  it('should write enabled messages to stderr', () => {
    const write = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = new Logger();
    log.setLevel('info');

    log.info('reading: a.tex');
    log.debug('hidden');

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[INFO] reading: a.tex');
  });

  it('should write nothing when silent', () => {
    const write = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = new Logger();
    log.setLevel('silent');

    log.error('boom');
    log.warn('careful');

    expect(write).not.toHaveBeenCalled();
  });

  it('should recognise level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

describe('errors', () => {
  it('should name the document in parse errors', () => {
    const error = new ParseError('main.tex', 'Expecting group node', 7);

    expect(error.message).toBe("Expecting group node in 'main.tex'");
    expect(error.code).toBe('parse_error');
    expect(error.offset).toBe(7);
    expect(error.name).toBe('ParseError');
  });

  it('should format application errors for the command line', () => {
    expect(new NotFoundError('nada').format()).toBe('error: No such file or directory: nada');
    expect(new LookupError('x.tex').format()).toBe('error: No source found: x.tex');
    expect(new ConfigError('c.yaml', 'bad').message).toBe('bad (c.yaml)');
  });
});
