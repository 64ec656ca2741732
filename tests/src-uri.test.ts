import { describe, it, expect } from 'vitest';
import { parseSrcUri, renderSrcUri, distfiles, filenameFromUrl } from '../src/src-uri';
import { metadataError } from './helpers';

describe('src-uri', () => {
  describe('filenameFromUrl', () => {
    it('takes the last path segment', () => {
      expect(filenameFromUrl('https://example.org/dl/tool-1.0.tar.gz')).toBe('tool-1.0.tar.gz');
    });

    it('drops the query string', () => {
      expect(filenameFromUrl('https://example.org/get/tool.tar.gz?raw=1')).toBe('tool.tar.gz');
    });
  });

  describe('parsing', () => {
    it('parses a plain URI with its filename', () => {
      expect(parseSrcUri('https://example.org/tool-1.0.tar.gz')).toEqual([
        {
          type: 'uri',
          url: 'https://example.org/tool-1.0.tar.gz',
          filename: 'tool-1.0.tar.gz',
          restriction: null,
        },
      ]);
    });

    it('parses a rename', () => {
      expect(parseSrcUri('https://example.org/v1.0.tar.gz -> tool-1.0.tar.gz')).toEqual([
        {
          type: 'renamed',
          url: 'https://example.org/v1.0.tar.gz',
          target: 'tool-1.0.tar.gz',
          restriction: null,
        },
      ]);
    });

    it('parses restriction prefixes', () => {
      const [fetch, mirror] = parseSrcUri('fetch+https://example.org/a.zip mirror+https://example.org/b.zip');
      expect(fetch).toEqual({
        type: 'uri',
        url: 'https://example.org/a.zip',
        filename: 'a.zip',
        restriction: 'fetch',
      });
      expect(mirror.type === 'uri' && mirror.restriction).toBe('mirror');
    });

    it('keeps bare groups as group nodes', () => {
      expect(parseSrcUri('( https://a/b.tar.gz https://a/c.tar.gz )')).toEqual([
        {
          type: 'group',
          entries: [
            { type: 'uri', url: 'https://a/b.tar.gz', filename: 'b.tar.gz', restriction: null },
            { type: 'uri', url: 'https://a/c.tar.gz', filename: 'c.tar.gz', restriction: null },
          ],
        },
      ]);
    });

    it('rejects an arrow without a target', () => {
      const err = metadataError(() => parseSrcUri('https://a/b.tar.gz ->'));
      expect(err.kind).toBe('src-uri');
      expect(err.position).toBe(20);
    });

    it('labels an unterminated conditional', () => {
      expect(metadataError(() => parseSrcUri('doc? ( https://a/doc.zip')).label).toBe('USE conditional group');
    });

    it('labels an unterminated bare group', () => {
      expect(metadataError(() => parseSrcUri('( https://a/doc.zip')).label).toBe("closing ')'");
    });
  });

  describe('rendering', () => {
    it('keeps the fetch+ prefix', () => {
      const input = 'fetch+https://example.org/a.tar.gz';
      expect(renderSrcUri(parseSrcUri(input))).toBe(input);
    });

    it('keeps rename targets', () => {
      const input = 'https://example.org/v1.tar.gz -> tool-1.tar.gz doc? ( mirror+https://example.org/d.zip -> d-1.zip )';
      expect(renderSrcUri(parseSrcUri(input))).toBe(input);
    });

    it('renders empty groups', () => {
      expect(renderSrcUri(parseSrcUri('( )'))).toBe('(  )');
    });
  });

  it('lists local filenames', () => {
    expect(distfiles(parseSrcUri('https://a/b.tar.gz doc? ( https://a/doc.zip -> tool-doc.zip ) ( https://a/c.xz )'))).toEqual([
      'b.tar.gz',
      'tool-doc.zip',
      'c.xz',
    ]);
  });
});
