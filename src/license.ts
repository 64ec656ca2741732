/**
 * LICENSE expressions: license names, `|| ( ... )` any-of groups and
 * USE-conditional groups, implicitly conjoined at the top level.
 */

import { wrapParse } from './errors';
import { charset, collapse, parseBracketed, renderGroup, renderUseConditional } from './grammar';
import type { Grammar } from './grammar';
import type { LicenseExpr } from './types';

const isLicenseChar = charset('-_.+');

/** A license name may contain, but not start with, these. */
const BAD_LEADING = ['-', '.', '+'];

const licenseGrammar: Grammar<LicenseExpr> = {
  isFlagChar: charset('_-+@'),
  operators: {
    '||': entries => ({ type: 'any-of', entries }),
  },
  useConditional: (flag, negated, entries) => ({ type: 'use-conditional', flag, negated, entries }),
  groupLabel: "closing ')'",
  group: entries => entries,
  parseAtom(scanner) {
    const start = scanner.pos;
    const name = scanner.takeWhile(isLicenseChar);
    if (name.length === 0 || BAD_LEADING.includes(name[0])) {
      scanner.pos = start;
      return undefined;
    }
    return { type: 'license', name };
  },
};

/**
 * Parse a LICENSE value.
 *
 * @example
 * ```ts
 * parseLicense('|| ( MIT Apache-2.0 )');
 * // { type: 'any-of', entries: [{ type: 'license', name: 'MIT' }, ...] }
 * ```
 */
export function parseLicense(input: string): LicenseExpr {
  const entries = wrapParse('license', () => parseBracketed(input, licenseGrammar));
  return collapse(entries, all => ({ type: 'all', entries: all }));
}

export function renderLicense(expr: LicenseExpr): string {
  switch (expr.type) {
    case 'license':
      return expr.name;
    case 'any-of':
      return renderGroup('|| ', expr.entries, renderLicense);
    case 'use-conditional':
      return renderUseConditional(expr, renderLicense);
    case 'all':
      return expr.entries.map(renderLicense).join(' ');
  }
}

/**
 * Every license name in the tree, in order, ignoring the group structure.
 */
export function licenseNames(expr: LicenseExpr): string[] {
  if (expr.type === 'license') return [expr.name];
  return expr.entries.flatMap(licenseNames);
}

