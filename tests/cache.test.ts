import { describe, it, expect } from 'vitest';
import { parseCacheEntry, parseEclasses, readCacheLines, serializeCacheEntry } from '../src/cache';
import { hasBdepend } from '../src/eapi';
import { metadataError } from './helpers';

const CANONICAL = [
  'DEFINED_PHASES=compile configure install test',
  'DEPEND=dev-libs/libfoo:0= ssl? ( >=dev-libs/openssl-3.0.0:= )',
  'DESCRIPTION=Example command line tool',
  'EAPI=8',
  'HOMEPAGE=https://example.org/tool https://example.org/docs',
  'IUSE=+ssl -static doc test',
  'KEYWORDS=amd64 ~arm64 -x86',
  'LICENSE=|| ( MIT Apache-2.0 ) doc? ( CC-BY-4.0 )',
  'PDEPEND=app-misc/example-plugins',
  'RDEPEND=dev-libs/libfoo:0= ssl? ( >=dev-libs/openssl-3.0.0:= )',
  'REQUIRED_USE=?? ( ssl static )',
  'RESTRICT=!test? ( test ) mirror',
  'SLOT=0/1.2',
  'SRC_URI=https://example.org/dl/tool-1.2.tar.gz doc? ( https://example.org/dl/v1.2/docs.tar.xz -> tool-docs-1.2.tar.xz )',
  'BDEPEND=virtual/pkgconfig',
  'IDEPEND=acct-user/example',
  'PROPERTIES=live',
  'INHERITED=toolchain-funcs meson',
  '_eclasses_=toolchain-funcs\t0a1b2c\tmeson\t3d4e5f',
  '_md5_=0123456789abcdef0123456789abcdef',
  '',
].join('\n');

describe('cache', () => {
  describe('readCacheLines', () => {
    it('skips blank lines and unknown keys', () => {
      const values = readCacheLines('\nEAPI=8\nX_CUSTOM=1\n  \nSLOT=0\n');
      expect([...values.entries()]).toEqual([
        ['EAPI', '8'],
        ['SLOT', '0'],
      ]);
    });

    it('keeps the last value of a repeated key', () => {
      expect(readCacheLines('DESCRIPTION=one\nDESCRIPTION=two').get('DESCRIPTION')).toBe('two');
    });

    it('splits at the first equals sign', () => {
      expect(readCacheLines('DESCRIPTION=a=b').get('DESCRIPTION')).toBe('a=b');
    });

    it('rejects a line without =', () => {
      const err = metadataError(() => readCacheLines('EAPI=8\ngarbage\n'));
      expect(err.kind).toBe('cache-entry');
      expect(err.message).toBe("invalid cache entry: line without '=': garbage");
    });
  });

  describe('parseEclasses', () => {
    it('pairs names with checksums', () => {
      expect(parseEclasses('a\t1\tb\t2')).toEqual([
        ['a', '1'],
        ['b', '2'],
      ]);
    });

    it('drops a trailing unpaired name', () => {
      expect(parseEclasses('a\t1\tb')).toEqual([['a', '1']]);
    });

    it('returns nothing for an empty value', () => {
      expect(parseEclasses('')).toEqual([]);
    });
  });

  describe('parseCacheEntry', () => {
    it('parses the basic fields', () => {
      const entry = parseCacheEntry(
        'EAPI=7\nDESCRIPTION=Example\nSLOT=0\nKEYWORDS=~amd64\nDEFINED_PHASES=compile install\n',
      );
      expect(entry.metadata.eapi).toBe('7');
      expect(entry.metadata.description).toBe('Example');
      expect(entry.metadata.slot).toEqual({ slot: '0', subslot: null });
      expect(entry.metadata.keywords).toEqual([{ arch: 'amd64', stability: 'testing' }]);
      expect(entry.metadata.definedPhases).toEqual(['src_compile', 'src_install']);
      expect(entry.md5).toBeNull();
      expect(entry.eclasses).toEqual([]);
    });

    it('defaults absent fields', () => {
      const { metadata } = parseCacheEntry('DESCRIPTION=Minimal\nSLOT=0\n');
      expect(metadata.eapi).toBe('0');
      expect(hasBdepend(metadata.eapi)).toBe(false);
      expect(metadata.license).toBeNull();
      expect(metadata.requiredUse).toBeNull();
      expect(metadata.homepage).toEqual([]);
      expect(metadata.srcUri).toEqual([]);
      expect(metadata.restrict).toEqual([]);
      expect(metadata.depend).toEqual([]);
      expect(metadata.definedPhases).toEqual([]);
    });

    it('reads DEFINED_PHASES=- as no phases', () => {
      expect(parseCacheEntry('DESCRIPTION=x\nSLOT=0\nDEFINED_PHASES=-\n').metadata.definedPhases).toEqual([]);
    });

    it('parses sub-slots', () => {
      expect(parseCacheEntry('DESCRIPTION=Test\nSLOT=0/2.1').metadata.slot).toEqual({ slot: '0', subslot: '2.1' });
    });

    it('accepts an empty DESCRIPTION', () => {
      expect(parseCacheEntry('DESCRIPTION=\nSLOT=0').metadata.description).toBe('');
    });

    it('treats an empty LICENSE group as absent', () => {
      expect(parseCacheEntry('DESCRIPTION=x\nSLOT=0\nLICENSE=( )').metadata.license).toBeNull();
    });

    it('requires DESCRIPTION', () => {
      const err = metadataError(() => parseCacheEntry('EAPI=8\nSLOT=0\n'));
      expect(err.kind).toBe('missing-field');
      expect(err.message).toBe('missing required field: DESCRIPTION');
    });

    it('requires SLOT', () => {
      expect(metadataError(() => parseCacheEntry('EAPI=8\nDESCRIPTION=x\n')).detail).toBe('SLOT');
      expect(metadataError(() => parseCacheEntry('DESCRIPTION=x\nSLOT=\n')).detail).toBe('SLOT');
    });

    it('rejects an unknown EAPI', () => {
      const err = metadataError(() => parseCacheEntry('EAPI=10\nDESCRIPTION=x\nSLOT=0\n'));
      expect(err.kind).toBe('eapi');
      expect(err.detail).toBe('10');
    });

    it('reports the failing field grammar', () => {
      const err = metadataError(() => parseCacheEntry('DESCRIPTION=x\nSLOT=0\nLICENSE=ssl? ( MIT\n'));
      expect(err.kind).toBe('license');
      expect(err.label).toBe('USE conditional group');
    });

    it('parses every field of a full entry', () => {
      const entry = parseCacheEntry(CANONICAL);
      expect(entry.metadata.eapi).toBe('8');
      expect(entry.metadata.slot).toEqual({ slot: '0', subslot: '1.2' });
      expect(entry.metadata.homepage).toEqual(['https://example.org/tool', 'https://example.org/docs']);
      expect(entry.metadata.inherited).toEqual(['toolchain-funcs', 'meson']);
      expect(entry.metadata.properties).toEqual([{ type: 'token', value: 'live' }]);
      expect(entry.metadata.bdepend).toHaveLength(1);
      expect(entry.metadata.idepend).toHaveLength(1);
      expect(entry.metadata.pdepend).toHaveLength(1);
      expect(entry.eclasses).toEqual([
        ['toolchain-funcs', '0a1b2c'],
        ['meson', '3d4e5f'],
      ]);
      expect(entry.md5).toBe('0123456789abcdef0123456789abcdef');
    });
  });

  describe('strict mode', () => {
    const input = 'EAPI=7\nDESCRIPTION=x\nSLOT=0\nIDEPEND=acct-user/foo\n';

    it('rejects features the EAPI lacks', () => {
      const err = metadataError(() => parseCacheEntry(input, { strict: true }));
      expect(err.kind).toBe('eapi-feature');
      expect(err.message).toBe('unsupported by EAPI: IDEPEND: IDEPEND (EAPI 7)');
    });

    it('is off by default', () => {
      expect(parseCacheEntry(input).metadata.idepend).toHaveLength(1);
    });

    it('accepts a compliant entry', () => {
      expect(parseCacheEntry(CANONICAL, { strict: true }).metadata.eapi).toBe('8');
    });
  });

  describe('serializeCacheEntry', () => {
    it('writes a canonical entry back unchanged', () => {
      expect(serializeCacheEntry(parseCacheEntry(CANONICAL))).toBe(CANONICAL);
    });

    it('puts keys in canonical order', () => {
      const entry = parseCacheEntry('SLOT=0\nKEYWORDS=~amd64\nEAPI=8\nDESCRIPTION=Example\n');
      expect(serializeCacheEntry(entry)).toBe('DEFINED_PHASES=-\nDESCRIPTION=Example\nEAPI=8\nKEYWORDS=~amd64\nSLOT=0\n');
    });

    it('normalizes spacing', () => {
      const entry = parseCacheEntry('DESCRIPTION=x\nSLOT=0\nLICENSE=||(MIT  BSD)\nRESTRICT=  mirror   test\n');
      expect(serializeCacheEntry(entry)).toBe(
        'DEFINED_PHASES=-\nDESCRIPTION=x\nEAPI=0\nLICENSE=|| ( MIT BSD )\nRESTRICT=mirror test\nSLOT=0\n',
      );
    });

    it('round-trips parsed records', () => {
      const first = parseCacheEntry(CANONICAL);
      expect(parseCacheEntry(serializeCacheEntry(first))).toEqual(first);
    });
  });
});
