/**
 * SRC_URI: download URIs with optional `-> filename` renames (EAPI 2+),
 * `fetch+` / `mirror+` restriction prefixes (EAPI 8+), USE-conditional
 * groups and bare groups.
 */

import { wrapParse } from './errors';
import { charset, isFlagChar, parseBracketed, renderGroup, renderUseConditional } from './grammar';
import type { Grammar, Scanner } from './grammar';
import type { SrcUriEntry, UriRestriction } from './types';

const isUriChar = charset(":/.-_~$&'*+,;=%@#?");
const isFilenameChar = charset('.-_+');

const RESTRICTIONS: UriRestriction[] = ['fetch', 'mirror'];

/**
 * The local filename for a URL: everything after the last `/`, cut at the
 * first `?`.
 */
export function filenameFromUrl(url: string): string {
  const last = url.slice(url.lastIndexOf('/') + 1);
  const query = last.indexOf('?');
  return query === -1 ? last : last.slice(0, query);
}

function parseRestriction(scanner: Scanner): UriRestriction | null {
  return RESTRICTIONS.find(prefix => scanner.eat(`${prefix}+`)) ?? null;
}

/** ` -> filename`, or `null` with the position untouched. */
function parseRename(scanner: Scanner): string | null {
  const start = scanner.pos;
  scanner.skipWhitespace();
  if (scanner.eat('->')) {
    scanner.skipWhitespace();
    const target = scanner.takeWhile(isFilenameChar);
    if (target.length > 0) return target;
  }
  scanner.pos = start;
  return null;
}

const srcUriGrammar: Grammar<SrcUriEntry> = {
  isFlagChar,
  operators: {},
  useConditional: (flag, negated, entries) => ({ type: 'use-conditional', flag, negated, entries }),
  groupLabel: "closing ')'",
  group: entries => [{ type: 'group', entries }],
  parseAtom(scanner) {
    const start = scanner.pos;
    const restriction = parseRestriction(scanner);
    const url = scanner.takeWhile(isUriChar);
    if (url.length === 0) {
      scanner.pos = start;
      return undefined;
    }

    const target = parseRename(scanner);
    if (target !== null) {
      return { type: 'renamed', url, target, restriction };
    }
    return { type: 'uri', url, filename: filenameFromUrl(url), restriction };
  },
};

/**
 * Parse a SRC_URI value into its top-level entries.
 *
 * @example
 * ```ts
 * parseSrcUri('https://example.com/v1.tar.gz -> foo-1.tar.gz');
 * // [{ type: 'renamed', url: 'https://example.com/v1.tar.gz', target: 'foo-1.tar.gz', restriction: null }]
 * ```
 */
export function parseSrcUri(input: string): SrcUriEntry[] {
  return wrapParse('src-uri', () => parseBracketed(input, srcUriGrammar));
}

export function renderSrcUriEntry(entry: SrcUriEntry): string {
  switch (entry.type) {
    case 'uri':
      return `${entry.restriction ? `${entry.restriction}+` : ''}${entry.url}`;
    case 'renamed':
      return `${entry.restriction ? `${entry.restriction}+` : ''}${entry.url} -> ${entry.target}`;
    case 'use-conditional':
      return renderUseConditional(entry, renderSrcUriEntry);
    case 'group':
      return renderGroup('', entry.entries, renderSrcUriEntry);
  }
}

export function renderSrcUri(entries: SrcUriEntry[]): string {
  return entries.map(renderSrcUriEntry).join(' ');
}

/**
 * Local filenames of every URI, in order, regardless of USE conditions.
 */
export function distfiles(entries: SrcUriEntry[]): string[] {
  return entries.flatMap(entry => {
    switch (entry.type) {
      case 'uri':
        return [entry.filename];
      case 'renamed':
        return [entry.target];
      default:
        return distfiles(entry.entries);
    }
  });
}
