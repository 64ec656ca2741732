/**
 * EAPI compliance check.
 *
 * The grammars parse every construct regardless of the declared EAPI. This
 * pass walks a parsed record and lists the constructs its EAPI does not
 * provide.
 */

import { dependencyAtoms } from './dependency';
import {
  hasAtMostOneOf,
  hasBdepend,
  hasIdepend,
  hasPkgPretend,
  hasProperties,
  hasRequiredUse,
  hasSelectiveUriRestrictions,
  hasSlotOperators,
  hasSrcPrepare,
  hasSrcUriArrows,
  hasUseConditionalRestrict,
} from './eapi';
import type { Eapi } from './eapi';
import { hasAtMostOne } from './required-use';
import { hasUseConditional } from './restrict';
import type { DepEntry, EbuildMetadata, RenamedUriNode, SrcUriEntry, UriNode } from './types';

export interface EapiViolation {
  /** Cache key of the offending field, e.g. `REQUIRED_USE`. */
  field: string;
  feature: string;
  eapi: Eapi;
}

function srcUriLeaves(entries: SrcUriEntry[]): Array<UriNode | RenamedUriNode> {
  return entries.flatMap(entry =>
    entry.type === 'uri' || entry.type === 'renamed' ? [entry] : srcUriLeaves(entry.entries),
  );
}

function usesSlotOperators(entries: DepEntry[]): boolean {
  return dependencyAtoms(entries).some(
    atom => atom.slot !== null && (atom.slot.operator !== null || atom.slot.subslot !== null),
  );
}

/**
 * List every construct in `metadata` that its EAPI lacks, in the order the
 * fields are serialized. An empty list means the record is consistent with
 * its EAPI.
 */
export function checkEapiCompliance(metadata: EbuildMetadata): EapiViolation[] {
  const { eapi } = metadata;
  const violations: EapiViolation[] = [];
  const report = (field: string, feature: string) => {
    violations.push({ field, feature, eapi });
  };
  const checkSlots = (field: string, entries: DepEntry[]) => {
    if (!hasSlotOperators(eapi) && usesSlotOperators(entries)) {
      report(field, 'slot operators and sub-slots');
    }
  };

  const phases = metadata.definedPhases;
  if (!hasPkgPretend(eapi) && phases.includes('pkg_pretend')) {
    report('DEFINED_PHASES', 'pkg_pretend phase');
  }
  if (!hasSrcPrepare(eapi)) {
    if (phases.includes('src_prepare')) report('DEFINED_PHASES', 'src_prepare phase');
    if (phases.includes('src_configure')) report('DEFINED_PHASES', 'src_configure phase');
  }

  checkSlots('DEPEND', metadata.depend);
  checkSlots('PDEPEND', metadata.pdepend);
  checkSlots('RDEPEND', metadata.rdepend);

  if (metadata.requiredUse !== null) {
    if (!hasRequiredUse(eapi)) {
      report('REQUIRED_USE', 'REQUIRED_USE');
    } else if (!hasAtMostOneOf(eapi) && hasAtMostOne(metadata.requiredUse)) {
      report('REQUIRED_USE', "'??' group");
    }
  }

  if (!hasUseConditionalRestrict(eapi) && hasUseConditional(metadata.restrict)) {
    report('RESTRICT', 'USE-conditional groups');
  }

  const uris = srcUriLeaves(metadata.srcUri);
  if (!hasSrcUriArrows(eapi) && uris.some(entry => entry.type === 'renamed')) {
    report('SRC_URI', "'->' renames");
  }
  if (!hasSelectiveUriRestrictions(eapi) && uris.some(entry => entry.restriction !== null)) {
    report('SRC_URI', "'fetch+'/'mirror+' prefixes");
  }

  if (!hasBdepend(eapi) && metadata.bdepend.length > 0) {
    report('BDEPEND', 'BDEPEND');
  }
  checkSlots('BDEPEND', metadata.bdepend);

  if (!hasIdepend(eapi) && metadata.idepend.length > 0) {
    report('IDEPEND', 'IDEPEND');
  }
  checkSlots('IDEPEND', metadata.idepend);

  if (metadata.properties.length > 0) {
    if (!hasProperties(eapi)) {
      report('PROPERTIES', 'PROPERTIES');
    } else if (!hasUseConditionalRestrict(eapi) && hasUseConditional(metadata.properties)) {
      report('PROPERTIES', 'USE-conditional groups');
    }
  }

  return violations;
}
