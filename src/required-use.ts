/**
 * REQUIRED_USE constraints (EAPI 4+).
 *
 * `|| ( ... )` at least one, `^^ ( ... )` exactly one and `?? ( ... )` at
 * most one of the children hold; `[!]flag? ( ... )` applies its children
 * only under that flag state.
 */

import { wrapParse } from './errors';
import {
  collapse,
  isFlagChar,
  parseBracketed,
  renderGroup,
  renderUseConditional,
} from './grammar';
import type { Grammar } from './grammar';
import type { RequiredUseExpr } from './types';

const requiredUseGrammar: Grammar<RequiredUseExpr> = {
  isFlagChar,
  operators: {
    '||': entries => ({ type: 'any-of', entries }),
    '^^': entries => ({ type: 'exactly-one', entries }),
    '??': entries => ({ type: 'at-most-one', entries }),
  },
  useConditional: (flag, negated, entries) => ({ type: 'use-conditional', flag, negated, entries }),
  groupLabel: "closing ')'",
  group: entries => entries,
  parseAtom(scanner) {
    const start = scanner.pos;
    const negated = scanner.eat('!');
    const name = scanner.takeWhile(isFlagChar);
    if (name.length === 0) {
      scanner.pos = start;
      return undefined;
    }
    return { type: 'flag', name, negated };
  },
};

const OPERATOR_TOKENS = {
  'any-of': '||',
  'exactly-one': '^^',
  'at-most-one': '??',
} as const;

/**
 * Parse a REQUIRED_USE value.
 *
 * @example
 * ```ts
 * parseRequiredUse('^^ ( gui qt gtk )').type; // 'exactly-one'
 * ```
 */
export function parseRequiredUse(input: string): RequiredUseExpr {
  const entries = wrapParse('required-use', () => parseBracketed(input, requiredUseGrammar));
  return collapse(entries, all => ({ type: 'all', entries: all }));
}

export function renderRequiredUse(expr: RequiredUseExpr): string {
  switch (expr.type) {
    case 'flag':
      return expr.negated ? `!${expr.name}` : expr.name;
    case 'any-of':
    case 'exactly-one':
    case 'at-most-one':
      return renderGroup(`${OPERATOR_TOKENS[expr.type]} `, expr.entries, renderRequiredUse);
    case 'use-conditional':
      return renderUseConditional(expr, renderRequiredUse);
    case 'all':
      return expr.entries.map(renderRequiredUse).join(' ');
  }
}

/**
 * Whether the tree uses an `?? ( ... )` group anywhere.
 */
export function hasAtMostOne(expr: RequiredUseExpr): boolean {
  if (expr.type === 'at-most-one') return true;
  if (expr.type === 'flag') return false;
  return expr.entries.some(hasAtMostOne);
}
