import { describe, it, expect } from 'vitest';
import { parseKeyword, parseKeywords, renderKeyword } from '../src/keyword';
import { metadataError } from './helpers';

describe('keyword', () => {
  it('parses each stability', () => {
    expect(parseKeywords('amd64 ~arm64 -x86 -*')).toEqual([
      { arch: 'amd64', stability: 'stable' },
      { arch: 'arm64', stability: 'testing' },
      { arch: 'x86', stability: 'disabled' },
      { arch: '*', stability: 'disabled-all' },
    ]);
  });

  it('keeps the arch suffix', () => {
    expect(parseKeyword('~amd64-linux')).toEqual({ arch: 'amd64-linux', stability: 'testing' });
  });

  it('rejects a bare prefix', () => {
    expect(metadataError(() => parseKeyword('~')).message).toBe('invalid keyword: ~');
    expect(metadataError(() => parseKeyword('-')).kind).toBe('keyword');
  });

  it('rejects an empty token', () => {
    expect(metadataError(() => parseKeyword('')).detail).toBe('empty keyword');
  });

  it('renders what it parses', () => {
    expect(parseKeywords('amd64 ~arm64 -x86 -*').map(renderKeyword).join(' ')).toBe('amd64 ~arm64 -x86 -*');
  });

  it('returns nothing for a blank line', () => {
    expect(parseKeywords('  ')).toEqual([]);
  });
});
