/**
 * Exclude pattern compilation and matching.
 *
 * A pattern is split into `/` segments; `*` matches any run of characters
 * inside one segment. Patterns without a `/` match any segment of a path,
 * patterns with one are anchored at the archive root. Matching a directory
 * excludes everything beneath it, so each rule is tried against every
 * ancestor prefix as well as the full path. A trailing `/` restricts a rule
 * to directories.
 */

import fs from 'node:fs/promises';

export class PatternSyntaxError extends Error {
  readonly pattern: string;

  constructor(pattern: string, detail: string) {
    super(`Invalid exclude pattern "${pattern}": ${detail}`);
    this.name = 'PatternSyntaxError';
    this.pattern = pattern;
  }
}

export interface ExcludeRule {
  readonly source: string;
  readonly segments: readonly RegExp[];
  readonly anchored: boolean;
  readonly directoryOnly: boolean;
}

export interface ExcludeMatcher {
  readonly rules: readonly ExcludeRule[];
  isExcluded(relativePath: string): boolean;
  isExcludedDirectory(relativeDirPath: string): boolean;
}

function compileSegment(segment: string): RegExp {
  const escaped = segment
    .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '[^/]*');
  return new RegExp(`^${escaped}$`);
}

export function compileRule(pattern: string): ExcludeRule {
  if (pattern.trim() === '') {
    throw new PatternSyntaxError(pattern, 'pattern is empty');
  }
  if (pattern.includes('\\')) {
    throw new PatternSyntaxError(pattern, 'backslashes are not supported');
  }

  let body = pattern;
  const directoryOnly = body.length > 1 && body.endsWith('/');
  if (directoryOnly) {
    body = body.slice(0, -1);
  }
  const leadingSlash = body.startsWith('/');
  if (leadingSlash) {
    body = body.slice(1);
  }

  const rawSegments = body.split('/');
  for (const segment of rawSegments) {
    if (segment === '') {
      throw new PatternSyntaxError(pattern, 'empty path segment');
    }
    if (segment === '.' || segment === '..') {
      throw new PatternSyntaxError(pattern, `"${segment}" segments are not allowed`);
    }
  }

  return {
    source: pattern,
    segments: rawSegments.map(compileSegment),
    anchored: leadingSlash || rawSegments.length > 1,
    directoryOnly,
  };
}

function splitPath(relativePath: string): string[] {
  return relativePath.split('/').filter((segment) => segment.length > 0);
}

/**
 * `directoryCount` is how many leading segments name directories: all of
 * them for a directory path, all but the last for a file path.
 */
function ruleMatches(
  rule: ExcludeRule,
  segments: string[],
  directoryCount: number,
): boolean {
  const limit = rule.directoryOnly ? directoryCount : segments.length;

  if (!rule.anchored) {
    const [matcher] = rule.segments;
    for (let i = 0; i < limit; i++) {
      if (matcher.test(segments[i])) {
        return true;
      }
    }
    return false;
  }

  if (rule.segments.length > limit) {
    return false;
  }
  return rule.segments.every((matcher, i) => matcher.test(segments[i]));
}

export function compileExcludes(patterns: readonly string[]): ExcludeMatcher {
  const rules = patterns.map(compileRule);

  const test = (relativePath: string, isDirectory: boolean): boolean => {
    if (rules.length === 0) {
      return false;
    }
    const segments = splitPath(relativePath);
    if (segments.length === 0) {
      return false;
    }
    const directoryCount = isDirectory ? segments.length : segments.length - 1;
    return rules.some((rule) => ruleMatches(rule, segments, directoryCount));
  };

  return {
    rules,
    isExcluded: (relativePath) => test(relativePath, false),
    isExcludedDirectory: (relativeDirPath) => test(relativeDirPath, true),
  };
}

const IGNORED_LINE = /^\s*(?:#.*)?$/;

/**
 * Patterns from the text of an exclude file: one per line, blank lines and
 * `#` comments dropped, trailing whitespace trimmed.
 */
export function parseExcludeLines(text: string): string[] {
  return text
    .split('\n')
    .filter((line) => !IGNORED_LINE.test(line))
    .map((line) => line.trimEnd());
}

export async function loadExcludeFiles(
  filePaths: readonly string[],
): Promise<string[]> {
  const patterns: string[] = [];
  for (const filePath of filePaths) {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Cannot read exclude file ${filePath}: ${message}`);
    }
    patterns.push(...parseExcludeLines(text));
  }
  return patterns;
}

/**
 * Compile CLI patterns plus the contents of exclude files into one matcher.
 * Syntax errors surface here, before any network activity.
 */
export async function loadExcludeMatcher(options: {
  excludes?: readonly string[];
  excludeFiles?: readonly string[];
}): Promise<ExcludeMatcher> {
  const fromFiles = await loadExcludeFiles(options.excludeFiles ?? []);
  return compileExcludes([...(options.excludes ?? []), ...fromFiles]);
}
