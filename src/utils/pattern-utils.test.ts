import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  PatternSyntaxError,
  compileExcludes,
  compileRule,
  loadExcludeFiles,
  loadExcludeMatcher,
  parseExcludeLines,
} from './pattern-utils';

describe('compileRule', () => {
  it('should treat single-segment patterns as unanchored', () => {
    const rule = compileRule('*.zip');
    expect(rule.anchored).toBe(false);
    expect(rule.directoryOnly).toBe(false);
    expect(rule.segments).toHaveLength(1);
  });

  it('should anchor patterns with a slash or a leading slash', () => {
    expect(compileRule('Sets/*.zip').anchored).toBe(true);
    expect(compileRule('/Sets').anchored).toBe(true);
  });

  it('should mark a trailing slash as directory-only', () => {
    const rule = compileRule('tmp/');
    expect(rule.directoryOnly).toBe(true);
    expect(rule.anchored).toBe(false);
  });

  it('should keep * inside one segment', () => {
    const [segment] = compileRule('/a*z').segments;
    expect(segment.test('abcz')).toBe(true);
    expect(segment.test('a/z')).toBe(false);
  });

  it('should match regex metacharacters literally', () => {
    const [segment] = compileRule('game (v1.0)+.bin').segments;
    expect(segment.test('game (v1.0)+.bin')).toBe(true);
    expect(segment.test('game (v1x0)+.bin')).toBe(false);
  });

  it.each([
    ['', 'pattern is empty'],
    ['   ', 'pattern is empty'],
    ['/', 'empty path segment'],
    ['a//b', 'empty path segment'],
    ['a/../b', '".." segments are not allowed'],
    ['./a', '"." segments are not allowed'],
    ['a\\b', 'backslashes are not supported'],
  ])('should reject %j', (pattern, detail) => {
    expect(() => compileRule(pattern)).toThrow(PatternSyntaxError);
    expect(() => compileRule(pattern)).toThrow(
      `Invalid exclude pattern "${pattern}": ${detail}`,
    );
  });
});

describe('compileExcludes', () => {
  it('should exclude nothing without patterns', () => {
    const matcher = compileExcludes([]);
    expect(matcher.isExcluded('a.zip')).toBe(false);
    expect(matcher.isExcludedDirectory('b')).toBe(false);
  });

  it('should exclude matching files at any depth', () => {
    const matcher = compileExcludes(['*.zip']);
    expect(matcher.isExcluded('a.zip')).toBe(true);
    expect(matcher.isExcluded('b/d.zip')).toBe(true);
    expect(matcher.isExcluded('b/c.rom')).toBe(false);
  });

  it('should exclude everything under a matching directory', () => {
    const matcher = compileExcludes(['BIOS']);
    expect(matcher.isExcludedDirectory('BIOS')).toBe(true);
    expect(matcher.isExcludedDirectory('Sets/BIOS')).toBe(true);
    expect(matcher.isExcluded('Sets/BIOS/x.bin')).toBe(true);
    expect(matcher.isExcluded('Sets/BIOSES/x.bin')).toBe(false);
  });

  it('should only match anchored patterns from the root', () => {
    const matcher = compileExcludes(['/b', 'Sets/*.zip']);
    expect(matcher.isExcluded('b/c.rom')).toBe(true);
    expect(matcher.isExcludedDirectory('x/b')).toBe(false);
    expect(matcher.isExcluded('Sets/a.zip')).toBe(true);
    expect(matcher.isExcluded('Other/Sets/a.zip')).toBe(false);
    expect(matcher.isExcludedDirectory('Sets')).toBe(false);
  });

  it('should apply directory-only rules to directories and their contents', () => {
    const matcher = compileExcludes(['tmp/']);
    expect(matcher.isExcluded('tmp')).toBe(false);
    expect(matcher.isExcludedDirectory('tmp')).toBe(true);
    expect(matcher.isExcluded('a/tmp/x.bin')).toBe(true);
  });

  it('should never exclude the root', () => {
    const matcher = compileExcludes(['*']);
    expect(matcher.isExcludedDirectory('')).toBe(false);
    expect(matcher.isExcluded('anything')).toBe(true);
  });
});

describe('parseExcludeLines', () => {
  it('should drop comments and blank lines and trim line ends', () => {
    expect(parseExcludeLines('# comment\n*.zip  \n\n  \nb/\r\n')).toEqual(['*.zip', 'b/']);
  });
});

describe('exclude files', () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) {
      fs.rmSync(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it('should combine CLI patterns with exclude file patterns', async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'archive-mirror-excludes-'));
    const excludeFile = path.join(tempDir, 'excludes.txt');
    fs.writeFileSync(excludeFile, '# skip demos\n*(Demo)*\n');

    expect(await loadExcludeFiles([excludeFile])).toEqual(['*(Demo)*']);

    const matcher = await loadExcludeMatcher({
      excludes: ['*.zip'],
      excludeFiles: [excludeFile],
    });
    expect(matcher.rules.map((rule) => rule.source)).toEqual(['*.zip', '*(Demo)*']);
    expect(matcher.isExcluded('Game (Demo).7z')).toBe(true);
  });

  it('should report unreadable exclude files', async () => {
    const missing = path.join(os.tmpdir(), 'archive-mirror-no-such-excludes.txt');
    await expect(loadExcludeFiles([missing])).rejects.toThrow(
      `Cannot read exclude file ${missing}:`,
    );
  });

  it('should surface syntax errors from exclude files', async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'archive-mirror-excludes-'));
    const excludeFile = path.join(tempDir, 'excludes.txt');
    fs.writeFileSync(excludeFile, 'a//b\n');

    await expect(loadExcludeMatcher({ excludeFiles: [excludeFile] })).rejects.toThrow(
      PatternSyntaxError,
    );
  });
});
