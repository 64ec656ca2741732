/**
 * EAPI (ebuild API) versions and the features each one introduced.
 *
 * The predicates are advisory: the grammars accept every operator in every
 * EAPI, and `checkEapiCompliance` is where they are applied.
 */

import { MetadataError } from './errors';

export const EAPIS = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'] as const;

export type Eapi = (typeof EAPIS)[number];

/** Assumed when a cache entry has no EAPI line. */
export const OLDEST_EAPI: Eapi = '0';

function isEapi(value: string): value is Eapi {
  return EAPIS.some(known => known === value);
}

export function parseEapi(value: string): Eapi {
  if (!isEapi(value)) {
    throw new MetadataError('eapi', value);
  }
  return value;
}

/** Negative when `a` is older than `b`. */
export function compareEapi(a: Eapi, b: Eapi): number {
  return EAPIS.indexOf(a) - EAPIS.indexOf(b);
}

function since(introduced: Eapi): (eapi: Eapi) => boolean {
  return eapi => compareEapi(eapi, introduced) >= 0;
}

/** `src_prepare` and `src_configure` phases. */
export const hasSrcPrepare = since('2');
/** `url -> filename` in SRC_URI. */
export const hasSrcUriArrows = since('2');
export const hasProperties = since('3');
export const hasRequiredUse = since('4');
export const hasPkgPretend = since('4');
/** `?? ( ... )` in REQUIRED_USE. */
export const hasAtMostOneOf = since('5');
/** Sub-slots and the `:=` / `:*` slot operators. */
export const hasSlotOperators = since('5');
export const hasBdepend = since('7');
export const hasIdepend = since('8');
/** USE-conditional groups in RESTRICT and PROPERTIES. */
export const hasUseConditionalRestrict = since('8');
/** `fetch+` and `mirror+` prefixes in SRC_URI. */
export const hasSelectiveUriRestrictions = since('8');
