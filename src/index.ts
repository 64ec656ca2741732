/**
 * ebuild-metadata
 *
 * Reads and writes Gentoo md5-cache entries, including the expression
 * languages inside their values: LICENSE, REQUIRED_USE,
 * RESTRICT/PROPERTIES, SRC_URI and the dependency classes.
 *
 * @example
 * ```ts
 * import { parseCacheEntry, serializeCacheEntry } from 'ebuild-metadata';
 *
 * const entry = parseCacheEntry('EAPI=8\nDESCRIPTION=Example\nSLOT=0\nKEYWORDS=~amd64\n');
 * entry.metadata.keywords;
 * // [{ arch: 'amd64', stability: 'testing' }]
 *
 * serializeCacheEntry(entry);
 * // 'DEFINED_PHASES=-\nDESCRIPTION=Example\nEAPI=8\nKEYWORDS=~amd64\nSLOT=0\n'
 * ```
 */

export type {
  UseConditionalNode,
  LicenseExpr,
  LicenseNameNode,
  LicenseAnyOfNode,
  LicenseAllNode,
  RequiredUseExpr,
  FlagNode,
  AnyOfNode,
  ExactlyOneNode,
  AtMostOneNode,
  RequiredUseAllNode,
  RestrictExpr,
  TokenNode,
  SrcUriEntry,
  UriNode,
  RenamedUriNode,
  SrcUriGroupNode,
  UriRestriction,
  DepEntry,
  AtomNode,
  DepAnyOfNode,
  DepAllOfNode,
  PackageAtom,
  Blocker,
  VersionOperator,
  SlotDep,
  UseDep,
  UseDepKind,
  Keyword,
  Stability,
  IUse,
  IUseDefault,
  Phase,
  Slot,
  EbuildMetadata,
  CacheEntry,
} from './types';

export { ParseError, Scanner, parseBracketed } from './grammar';
export type { Grammar } from './grammar';
export { MetadataError } from './errors';
export type { MetadataErrorKind } from './errors';

export { parseLicense, renderLicense, licenseNames } from './license';
export { parseRequiredUse, renderRequiredUse, hasAtMostOne } from './required-use';
export { parseRestrict, renderRestrict, renderRestrictEntry, flatTokens, hasUseConditional } from './restrict';
export { parseSrcUri, renderSrcUri, renderSrcUriEntry, distfiles, filenameFromUrl } from './src-uri';
export {
  parseDependencies,
  parseAtom,
  renderDependencies,
  renderDependency,
  renderAtom,
  dependencyAtoms,
} from './dependency';

export {
  EAPIS,
  OLDEST_EAPI,
  parseEapi,
  compareEapi,
  hasSrcPrepare,
  hasSrcUriArrows,
  hasProperties,
  hasRequiredUse,
  hasPkgPretend,
  hasAtMostOneOf,
  hasSlotOperators,
  hasBdepend,
  hasIdepend,
  hasUseConditionalRestrict,
  hasSelectiveUriRestrictions,
} from './eapi';
export type { Eapi } from './eapi';
export { parseKeyword, parseKeywords, renderKeyword } from './keyword';
export { parseIUse, parseIUseLine, renderIUse } from './iuse';
export { PHASES, parsePhase, parsePhases, renderPhase, renderPhases } from './phase';
export { parseSlot, renderSlot } from './slot';

export { checkEapiCompliance } from './compliance';
export type { EapiViolation } from './compliance';
export {
  CACHE_KEYS,
  parseCacheEntry,
  serializeCacheEntry,
  readCacheLines,
  parseEclasses,
} from './cache';
export type { CacheKey, CacheParseOptions } from './cache';
