/**
 * md5-cache entries: the `KEY=VALUE` files under `metadata/md5-cache/`.
 *
 * Parsing is all-or-nothing: the first bad field aborts with a
 * `MetadataError`. Unknown keys are ignored and a repeated key keeps its
 * last value.
 */

import { checkEapiCompliance } from './compliance';
import { parseDependencies, renderDependencies } from './dependency';
import { OLDEST_EAPI, parseEapi } from './eapi';
import { MetadataError } from './errors';
import { splitWords } from './grammar';
import { parseIUseLine, renderIUse } from './iuse';
import { parseKeywords, renderKeyword } from './keyword';
import { parseLicense, renderLicense } from './license';
import { parsePhases, renderPhases } from './phase';
import { parseRequiredUse, renderRequiredUse } from './required-use';
import { parseRestrict, renderRestrict } from './restrict';
import { parseSlot, renderSlot } from './slot';
import { parseSrcUri, renderSrcUri } from './src-uri';
import type { CacheEntry, DepEntry, LicenseExpr, RequiredUseExpr } from './types';

export interface CacheParseOptions {
  /**
   * Reject entries that use constructs their EAPI does not provide (see
   * `checkEapiCompliance`). Default: false.
   */
  strict?: boolean;
}

export const CACHE_KEYS = [
  'EAPI',
  'DESCRIPTION',
  'SLOT',
  'HOMEPAGE',
  'SRC_URI',
  'LICENSE',
  'KEYWORDS',
  'IUSE',
  'REQUIRED_USE',
  'RESTRICT',
  'PROPERTIES',
  'DEPEND',
  'RDEPEND',
  'BDEPEND',
  'PDEPEND',
  'IDEPEND',
  'INHERITED',
  'DEFINED_PHASES',
  '_md5_',
  '_eclasses_',
] as const;

export type CacheKey = (typeof CACHE_KEYS)[number];

function isCacheKey(key: string): key is CacheKey {
  return CACHE_KEYS.some(known => known === key);
}

/**
 * Split cache text into its known key/value pairs.
 */
export function readCacheLines(input: string): Map<CacheKey, string> {
  const values = new Map<CacheKey, string>();

  for (const raw of input.split('\n')) {
    const line = raw.trim();
    if (line.length === 0) continue;

    const eq = line.indexOf('=');
    if (eq === -1) {
      throw new MetadataError('cache-entry', `line without '=': ${line}`);
    }

    const key = line.slice(0, eq);
    if (isCacheKey(key)) {
      values.set(key, line.slice(eq + 1));
    }
  }

  return values;
}

/**
 * `_eclasses_`: tab-separated `name<TAB>checksum` pairs. A trailing
 * unpaired token is dropped.
 */
export function parseEclasses(value: string): Array<[string, string]> {
  if (value.length === 0) return [];

  const parts = value.split('\t');
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i + 1 < parts.length; i += 2) {
    pairs.push([parts[i], parts[i + 1]]);
  }
  return pairs;
}

/** An empty top-level conjunction, such as LICENSE=( ), counts as absent. */
function isEmptyAll(expr: LicenseExpr | RequiredUseExpr): boolean {
  return expr.type === 'all' && expr.entries.length === 0;
}

function parseDependencyField(value: string): DepEntry[] {
  return value.length === 0 ? [] : parseDependencies(value);
}

/**
 * Parse the contents of one cache file.
 *
 * @example
 * ```ts
 * const entry = parseCacheEntry('EAPI=8\nDESCRIPTION=Example\nSLOT=0\n');
 * entry.metadata.slot; // { slot: '0', subslot: null }
 * ```
 */
export function parseCacheEntry(input: string, options: CacheParseOptions = {}): CacheEntry {
  const values = readCacheLines(input);
  const field = (key: CacheKey) => values.get(key) ?? '';

  const eapiValue = values.get('EAPI');
  const eapi = eapiValue === undefined ? OLDEST_EAPI : parseEapi(eapiValue);

  const description = values.get('DESCRIPTION');
  if (description === undefined) {
    throw new MetadataError('missing-field', 'DESCRIPTION');
  }

  const slotValue = values.get('SLOT');
  if (slotValue === undefined) {
    throw new MetadataError('missing-field', 'SLOT');
  }

  const licenseValue = field('LICENSE');
  const license = licenseValue.length === 0 ? null : parseLicense(licenseValue);
  const requiredUseValue = field('REQUIRED_USE');
  const requiredUse = requiredUseValue.length === 0 ? null : parseRequiredUse(requiredUseValue);
  const srcUri = field('SRC_URI');
  const restrict = field('RESTRICT');
  const properties = field('PROPERTIES');

  const entry: CacheEntry = {
    metadata: {
      eapi,
      description,
      slot: parseSlot(slotValue),
      homepage: splitWords(field('HOMEPAGE')),
      srcUri: srcUri.length === 0 ? [] : parseSrcUri(srcUri),
      license: license !== null && isEmptyAll(license) ? null : license,
      keywords: parseKeywords(field('KEYWORDS')),
      iuse: parseIUseLine(field('IUSE')),
      requiredUse: requiredUse !== null && isEmptyAll(requiredUse) ? null : requiredUse,
      restrict: restrict.length === 0 ? [] : parseRestrict(restrict),
      properties: properties.length === 0 ? [] : parseRestrict(properties),
      depend: parseDependencyField(field('DEPEND')),
      rdepend: parseDependencyField(field('RDEPEND')),
      bdepend: parseDependencyField(field('BDEPEND')),
      pdepend: parseDependencyField(field('PDEPEND')),
      idepend: parseDependencyField(field('IDEPEND')),
      inherited: splitWords(field('INHERITED')),
      definedPhases: parsePhases(field('DEFINED_PHASES')),
    },
    md5: values.get('_md5_') ?? null,
    eclasses: parseEclasses(field('_eclasses_')),
  };

  if (options.strict) {
    const [violation] = checkEapiCompliance(entry.metadata);
    if (violation) {
      throw new MetadataError('eapi-feature', `${violation.field}: ${violation.feature} (EAPI ${violation.eapi})`);
    }
  }

  return entry;
}

/**
 * Serialize an entry back to cache text.
 *
 * Keys come in a fixed order. DEFINED_PHASES, DESCRIPTION, EAPI and SLOT
 * are always written; other fields only when non-empty. The text ends
 * with a newline.
 */
export function serializeCacheEntry(entry: CacheEntry): string {
  const m = entry.metadata;
  const lines: string[] = [];
  const emit = (key: CacheKey, value: string) => lines.push(`${key}=${value}`);
  const emitIf = (key: CacheKey, present: boolean, render: () => string) => {
    if (present) emit(key, render());
  };

  emit('DEFINED_PHASES', renderPhases(m.definedPhases));
  emitIf('DEPEND', m.depend.length > 0, () => renderDependencies(m.depend));
  emit('DESCRIPTION', m.description);
  emit('EAPI', m.eapi);
  emitIf('HOMEPAGE', m.homepage.length > 0, () => m.homepage.join(' '));
  emitIf('IUSE', m.iuse.length > 0, () => m.iuse.map(renderIUse).join(' '));
  emitIf('KEYWORDS', m.keywords.length > 0, () => m.keywords.map(renderKeyword).join(' '));
  if (m.license !== null) emit('LICENSE', renderLicense(m.license));
  emitIf('PDEPEND', m.pdepend.length > 0, () => renderDependencies(m.pdepend));
  emitIf('RDEPEND', m.rdepend.length > 0, () => renderDependencies(m.rdepend));
  if (m.requiredUse !== null) emit('REQUIRED_USE', renderRequiredUse(m.requiredUse));
  emitIf('RESTRICT', m.restrict.length > 0, () => renderRestrict(m.restrict));
  emit('SLOT', renderSlot(m.slot));
  emitIf('SRC_URI', m.srcUri.length > 0, () => renderSrcUri(m.srcUri));
  emitIf('BDEPEND', m.bdepend.length > 0, () => renderDependencies(m.bdepend));
  emitIf('IDEPEND', m.idepend.length > 0, () => renderDependencies(m.idepend));
  emitIf('PROPERTIES', m.properties.length > 0, () => renderRestrict(m.properties));
  emitIf('INHERITED', m.inherited.length > 0, () => m.inherited.join(' '));
  emitIf('_eclasses_', entry.eclasses.length > 0, () => entry.eclasses.flat().join('\t'));
  if (entry.md5 !== null) emit('_md5_', entry.md5);

  lines.push('');
  return lines.join('\n');
}
