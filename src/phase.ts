/**
 * Phase functions as listed in DEFINED_PHASES.
 *
 * The cache uses short names (`compile`); full names (`src_compile`) are
 * accepted too. Phases are identified by their full name.
 */

import { MetadataError } from './errors';
import { splitWords } from './grammar';
import type { Phase } from './types';

export const PHASES: readonly Phase[] = [
  'pkg_pretend',
  'pkg_setup',
  'src_unpack',
  'src_prepare',
  'src_configure',
  'src_compile',
  'src_test',
  'src_install',
  'pkg_preinst',
  'pkg_postinst',
  'pkg_prerm',
  'pkg_postrm',
  'pkg_config',
  'pkg_info',
  'pkg_nofetch',
];

/** Sentinel for "no phases defined". */
export const NO_PHASES = '-';

export function parsePhase(token: string): Phase {
  const phase = PHASES.find(p => p === token || renderPhase(p) === token);
  if (phase === undefined) {
    throw new MetadataError('phase', token);
  }
  return phase;
}

/**
 * Parse a DEFINED_PHASES value, keeping the order given. `-` and the empty
 * string mean no phases.
 */
export function parsePhases(line: string): Phase[] {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed === NO_PHASES) return [];
  return splitWords(trimmed).map(parsePhase);
}

/** Short name, as written in the cache. */
export function renderPhase(phase: Phase): string {
  return phase.slice(phase.indexOf('_') + 1);
}

export function renderPhases(phases: Phase[]): string {
  return phases.length === 0 ? NO_PHASES : phases.map(renderPhase).join(' ');
}
