/**
 * RESTRICT and PROPERTIES: plain tokens, with USE-conditional groups since
 * EAPI 8.
 */

import { wrapParse } from './errors';
import { charset, isFlagChar, parseBracketed, renderUseConditional } from './grammar';
import type { Grammar } from './grammar';
import type { RestrictExpr } from './types';

const isTokenChar = charset('-_.+');

const restrictGrammar: Grammar<RestrictExpr> = {
  isFlagChar,
  operators: {},
  useConditional: (flag, negated, entries) => ({ type: 'use-conditional', flag, negated, entries }),
  // A bare group with one child is that child; any other count becomes a
  // single empty token.
  groupLabel: 'paren group',
  group: entries => (entries.length === 1 ? entries : [{ type: 'token', value: '' }]),
  parseAtom(scanner) {
    const value = scanner.takeWhile(isTokenChar);
    return value.length === 0 ? undefined : { type: 'token', value };
  },
};

/**
 * Parse a RESTRICT or PROPERTIES value into its top-level entries.
 *
 * @example
 * ```ts
 * parseRestrict('mirror !test? ( test )');
 * // [{ type: 'token', value: 'mirror' }, { type: 'use-conditional', flag: 'test', ... }]
 * ```
 */
export function parseRestrict(input: string): RestrictExpr[] {
  return wrapParse('restrict', () => parseBracketed(input, restrictGrammar));
}

export function renderRestrictEntry(entry: RestrictExpr): string {
  if (entry.type === 'token') return entry.value;
  return renderUseConditional(entry, renderRestrictEntry);
}

export function renderRestrict(entries: RestrictExpr[]): string {
  return entries.map(renderRestrictEntry).join(' ');
}

/**
 * All tokens with USE-conditional structure stripped, in order.
 *
 * Answers "does RESTRICT mention `test`?" without evaluating flags.
 */
export function flatTokens(entries: RestrictExpr[]): string[] {
  return entries.flatMap(entry => (entry.type === 'token' ? [entry.value] : flatTokens(entry.entries)));
}

/** Whether any entry is a USE-conditional group. */
export function hasUseConditional(entries: RestrictExpr[]): boolean {
  return entries.some(entry => entry.type === 'use-conditional');
}
