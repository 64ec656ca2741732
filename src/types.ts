/**
 * Expression tree and record types.
 *
 * Every grammar produces a discriminated union on `type`. Group nodes own
 * their children directly; a tree is exactly as deep as the brackets in the
 * text it came from.
 */

import type { Eapi } from './eapi';

/** `flag? ( ... )` or `!flag? ( ... )`. */
export interface UseConditionalNode<T> {
  type: 'use-conditional';
  flag: string;
  negated: boolean;
  entries: T[];
}

// LICENSE

export interface LicenseNameNode {
  type: 'license';
  name: string;
}

export interface LicenseAnyOfNode {
  type: 'any-of';
  entries: LicenseExpr[];
}

/** Implicit conjunction; only produced at the top level. */
export interface LicenseAllNode {
  type: 'all';
  entries: LicenseExpr[];
}

export type LicenseExpr =
  | LicenseNameNode
  | LicenseAnyOfNode
  | UseConditionalNode<LicenseExpr>
  | LicenseAllNode;

// REQUIRED_USE

export interface FlagNode {
  type: 'flag';
  name: string;
  negated: boolean;
}

export interface AnyOfNode {
  type: 'any-of';
  entries: RequiredUseExpr[];
}

export interface ExactlyOneNode {
  type: 'exactly-one';
  entries: RequiredUseExpr[];
}

export interface AtMostOneNode {
  type: 'at-most-one';
  entries: RequiredUseExpr[];
}

export interface RequiredUseAllNode {
  type: 'all';
  entries: RequiredUseExpr[];
}

export type RequiredUseExpr =
  | FlagNode
  | AnyOfNode
  | ExactlyOneNode
  | AtMostOneNode
  | UseConditionalNode<RequiredUseExpr>
  | RequiredUseAllNode;

// RESTRICT / PROPERTIES

export interface TokenNode {
  type: 'token';
  value: string;
}

export type RestrictExpr = TokenNode | UseConditionalNode<RestrictExpr>;

// SRC_URI

export type UriRestriction = 'fetch' | 'mirror';

/** A plain URI; `filename` is derived from the URL. */
export interface UriNode {
  type: 'uri';
  url: string;
  filename: string;
  restriction: UriRestriction | null;
}

/** `url -> target` */
export interface RenamedUriNode {
  type: 'renamed';
  url: string;
  target: string;
  restriction: UriRestriction | null;
}

export interface SrcUriGroupNode {
  type: 'group';
  entries: SrcUriEntry[];
}

export type SrcUriEntry =
  | UriNode
  | RenamedUriNode
  | UseConditionalNode<SrcUriEntry>
  | SrcUriGroupNode;

// Dependencies

export type VersionOperator = '<' | '<=' | '=' | '~' | '>=' | '>';

export type Blocker = 'weak' | 'strong';

/**
 * Slot part of an atom. `:*` is `{ slot: null, operator: '*' }`, `:=` is
 * `{ slot: null, operator: '=' }`.
 */
export interface SlotDep {
  slot: string | null;
  subslot: string | null;
  operator: '=' | '*' | null;
}

/**
 * `enabled` is `flag`, `disabled` is `-flag`, `equal` is `flag=`,
 * `not-equal` is `!flag=`, `conditional` is `flag?`, `not-conditional`
 * is `!flag?`.
 */
export type UseDepKind =
  | 'enabled'
  | 'disabled'
  | 'equal'
  | 'not-equal'
  | 'conditional'
  | 'not-conditional';

export interface UseDep {
  flag: string;
  kind: UseDepKind;
  /** `(+)` or `(-)` after the flag name. */
  missing: '+' | '-' | null;
}

export interface PackageAtom {
  blocker: Blocker | null;
  operator: VersionOperator | null;
  category: string;
  name: string;
  version: string | null;
  /** Trailing `*` on an `=` atom. */
  glob: boolean;
  slot: SlotDep | null;
  useDeps: UseDep[];
}

export interface AtomNode {
  type: 'atom';
  atom: PackageAtom;
}

export interface DepAnyOfNode {
  type: 'any-of';
  entries: DepEntry[];
}

/** A bare `( ... )` group. */
export interface DepAllOfNode {
  type: 'all-of';
  entries: DepEntry[];
}

export type DepEntry = AtomNode | DepAnyOfNode | UseConditionalNode<DepEntry> | DepAllOfNode;

// Single-token values

export type Stability = 'stable' | 'testing' | 'disabled' | 'disabled-all';

export interface Keyword {
  arch: string;
  stability: Stability;
}

export type IUseDefault = 'enabled' | 'disabled';

export interface IUse {
  name: string;
  default: IUseDefault | null;
}

export type Phase =
  | 'pkg_pretend'
  | 'pkg_setup'
  | 'src_unpack'
  | 'src_prepare'
  | 'src_configure'
  | 'src_compile'
  | 'src_test'
  | 'src_install'
  | 'pkg_preinst'
  | 'pkg_postinst'
  | 'pkg_prerm'
  | 'pkg_postrm'
  | 'pkg_config'
  | 'pkg_info'
  | 'pkg_nofetch';

export interface Slot {
  slot: string;
  subslot: string | null;
}

// Records

/** Metadata for one ebuild as stored in the cache. */
export interface EbuildMetadata {
  eapi: Eapi;
  description: string;
  slot: Slot;
  homepage: string[];
  srcUri: SrcUriEntry[];
  license: LicenseExpr | null;
  keywords: Keyword[];
  iuse: IUse[];
  requiredUse: RequiredUseExpr | null;
  restrict: RestrictExpr[];
  properties: RestrictExpr[];
  depend: DepEntry[];
  rdepend: DepEntry[];
  bdepend: DepEntry[];
  pdepend: DepEntry[];
  idepend: DepEntry[];
  inherited: string[];
  definedPhases: Phase[];
}

/** One `metadata/md5-cache/<category>/<package>-<version>` file. */
export interface CacheEntry {
  metadata: EbuildMetadata;
  /** `_md5_`: checksum of the ebuild file. */
  md5: string | null;
  /** `_eclasses_`: `[name, checksum]` pairs in file order. */
  eclasses: Array<[string, string]>;
}
