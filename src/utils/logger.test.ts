/**
 * Tests for Logger Utilities
 */

import { expect, describe, it, beforeEach, afterEach, beforeAll, afterAll, vi } from 'vitest';
import chalk from 'chalk';
import * as logger from './logger';
import { Verbosity } from '../interfaces/logger';

describe('Logger Utilities', () => {
  let stdoutOutput: string[];
  let stderrOutput: string[];
  let originalLevel: typeof chalk.level;

  beforeAll(() => {
    originalLevel = chalk.level;
    chalk.level = 1;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  beforeEach(() => {
    stdoutOutput = [];
    stderrOutput = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Verbosity Levels', () => {
    it('should define the correct verbosity levels', () => {
      expect(Verbosity.Quiet).toBe(0);
      expect(Verbosity.Normal).toBe(1);
      expect(Verbosity.Verbose).toBe(2);
    });
  });

  describe('Color helpers', () => {
    it('should wrap text with red ANSI codes', () => {
      expect(logger.red('error')).toBe('\x1b[31merror\x1b[39m');
    });

    it('should wrap text with green ANSI codes', () => {
      expect(logger.green('success')).toBe('\x1b[32msuccess\x1b[39m');
    });

    it('should wrap text with yellow ANSI codes', () => {
      expect(logger.yellow('warning')).toBe('\x1b[33mwarning\x1b[39m');
    });

    it('should wrap text with blue ANSI codes', () => {
      expect(logger.blue('info')).toBe('\x1b[34minfo\x1b[39m');
    });

    it('should wrap text with bold ANSI codes', () => {
      expect(logger.bold('bold text')).toBe('\x1b[1mbold text\x1b[22m');
    });
  });

  describe('log', () => {
    it('should write when verbosity allows it', () => {
      logger.log('listed /a', Verbosity.Normal, Verbosity.Normal);
      expect(stdoutOutput).toEqual(['listed /a\n']);
    });

    it('should skip messages above the current verbosity', () => {
      logger.log('listed /b', Verbosity.Verbose, Verbosity.Normal);
      expect(stdoutOutput).toEqual([]);
    });

    it('should drop repeated messages when duplicates are not allowed', () => {
      logger.log('retrying /c', Verbosity.Normal, Verbosity.Normal, false);
      logger.log('retrying /c', Verbosity.Normal, Verbosity.Normal, false);
      expect(stdoutOutput).toEqual(['retrying /c\n']);
    });

    it('should keep repeated messages by default', () => {
      logger.log('downloaded /d', Verbosity.Normal, Verbosity.Normal);
      logger.log('downloaded /d', Verbosity.Normal, Verbosity.Normal);
      expect(stdoutOutput).toHaveLength(2);
    });
  });

  describe('level helpers', () => {
    it('should send errors to stderr even when quiet', () => {
      logger.error('disk is full');
      expect(stdoutOutput).toEqual([]);
      expect(stderrOutput).toEqual(['\x1b[31m❌ disk is full\x1b[39m\n']);
    });

    it('should suppress warnings in quiet mode', () => {
      logger.warning('slow listing', Verbosity.Quiet);
      expect(stdoutOutput).toEqual([]);
    });

    it('should print warnings at normal verbosity', () => {
      logger.warning('listing retried', Verbosity.Normal);
      expect(stdoutOutput).toEqual(['\x1b[33m⚠️ listing retried\x1b[39m\n']);
    });

    it('should print info and success at normal verbosity', () => {
      logger.info('starting', Verbosity.Normal);
      logger.success('done', Verbosity.Normal);
      expect(stdoutOutput).toEqual([
        '\x1b[34mℹ️  starting\x1b[39m\n',
        '\x1b[32m✅ done\x1b[39m\n',
      ]);
    });

    it('should print verbose messages only in verbose mode', () => {
      logger.verbose('detail one', Verbosity.Normal);
      logger.verbose('detail two', Verbosity.Verbose);
      expect(stdoutOutput).toEqual(['detail two\n']);
    });

    it('should print always messages regardless of verbosity', () => {
      logger.always('summary line');
      expect(stdoutOutput).toEqual(['summary line\n']);
    });
  });

  describe('resolveVerbosity', () => {
    it('should prefer quiet over verbose', () => {
      expect(logger.resolveVerbosity({ quiet: true, verbose: true })).toBe(Verbosity.Quiet);
    });

    it('should map verbose and default flags', () => {
      expect(logger.resolveVerbosity({ verbose: true })).toBe(Verbosity.Verbose);
      expect(logger.resolveVerbosity({})).toBe(Verbosity.Normal);
    });
  });

  describe('error helpers', () => {
    it('should extract messages from errors and other values', () => {
      expect(logger.errorMessage(new Error('boom'))).toBe('boom');
      expect(logger.errorMessage('plain')).toBe('plain');
    });

    it('should extract system error codes', () => {
      const enoent = Object.assign(new Error('missing'), { code: 'ENOENT' });
      expect(logger.errorCode(enoent)).toBe('ENOENT');
      expect(logger.errorCode(new Error('no code'))).toBeUndefined();
      expect(logger.errorCode('ENOENT')).toBeUndefined();
    });
  });
});
