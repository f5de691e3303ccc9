/**
 * Turns one HTML directory index page into (name, kind, size) rows.
 *
 * Handles table-based indexes (one `<tr>` per entry, size in a
 * `<td class="size">` cell) and `<pre>`-style indexes (one line per entry,
 * size as the last column). Sizes are only reported when they are exact
 * byte counts; rounded values such as "1.2 MiB" are dropped.
 */

import type { ListingEntry } from '../../interfaces/remote-tree';

const ANCHOR_RE = /<a\s[^>]*?href\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))[^>]*>/gi;
const TABLE_ROW_RE = /<tr[\s>]/i;
const SIZE_CELL_RE =
  /<td[^>]*class\s*=\s*["']?[^"'>]*\bsize\b[^"'>]*["']?[^>]*>\s*([^<]*?)\s*<\/td>/i;
const PRE_SIZE_RE = /<\/a>.*\s(\d+)\s*$/i;
const SCHEME_RE = /^[a-z][a-z0-9+.-]*:/i;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;

/** Character for a numeric reference, or the reference itself when out of range. */
function fromCodePointOr(codePoint: number, fallback: string): string {
  return Number.isSafeInteger(codePoint) && codePoint <= MAX_CODE_POINT
    ? String.fromCodePoint(codePoint)
    : fallback;
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, code: string) => {
    if (code.startsWith('#x') || code.startsWith('#X')) {
      return fromCodePointOr(Number.parseInt(code.slice(2), 16), match);
    }
    if (code.startsWith('#')) {
      return fromCodePointOr(Number.parseInt(code.slice(1), 10), match);
    }
    return NAMED_ENTITIES[code.toLowerCase()] ?? match;
  });
}

/**
 * Resolve an href to a child entry name, or null for links that do not
 * name a direct child (parent links, sort links, absolute URLs).
 */
export function hrefToEntry(
  href: string,
): Pick<ListingEntry, 'name' | 'kind'> | null {
  const raw = decodeEntities(href.trim());
  if (
    raw === '' ||
    raw.startsWith('?') ||
    raw.startsWith('#') ||
    raw.startsWith('/') ||
    SCHEME_RE.test(raw)
  ) {
    return null;
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(raw);
  } catch {
    return null;
  }

  const isDirectory = decoded.endsWith('/');
  const name = isDirectory ? decoded.slice(0, -1) : decoded;
  if (
    name === '' ||
    name === '.' ||
    name === '..' ||
    name.includes('/') ||
    name.includes('\\')
  ) {
    return null;
  }
  return { name, kind: isDirectory ? 'directory' : 'file' };
}

function parseExactSize(text: string | undefined): number | undefined {
  if (text === undefined || !/^\d+$/.test(text)) {
    return undefined;
  }
  const size = Number(text);
  return Number.isSafeInteger(size) ? size : undefined;
}

function firstChildEntry(
  chunk: string,
): Pick<ListingEntry, 'name' | 'kind'> | null {
  for (const match of chunk.matchAll(ANCHOR_RE)) {
    const entry = hrefToEntry(match[1] ?? match[2] ?? match[3] ?? '');
    if (entry) {
      return entry;
    }
  }
  return null;
}

export function parseListing(html: string): ListingEntry[] {
  const isTable = TABLE_ROW_RE.test(html);
  const chunks = isTable ? html.split(TABLE_ROW_RE) : html.split(/\r?\n/);
  const entries: ListingEntry[] = [];
  const seen = new Set<string>();

  for (const chunk of chunks) {
    const entry = firstChildEntry(chunk);
    if (!entry || seen.has(entry.name)) {
      continue;
    }
    seen.add(entry.name);

    const size =
      entry.kind === 'file'
        ? parseExactSize(
            isTable ? SIZE_CELL_RE.exec(chunk)?.[1] : PRE_SIZE_RE.exec(chunk)?.[1],
          )
        : undefined;

    entries.push(size === undefined ? entry : { ...entry, size });
  }

  return entries;
}
