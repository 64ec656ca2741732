import { MetadataError } from './errors';
import { splitWords } from './grammar';
import type { Keyword } from './types';

/**
 * Parse one KEYWORDS token: `amd64`, `~arm64`, `-x86` or `-*`.
 */
export function parseKeyword(token: string): Keyword {
  if (token === '-*') {
    return { arch: '*', stability: 'disabled-all' };
  }

  let stability: Keyword['stability'] = 'stable';
  let arch = token;
  if (token.startsWith('~')) {
    stability = 'testing';
    arch = token.slice(1);
  } else if (token.startsWith('-')) {
    stability = 'disabled';
    arch = token.slice(1);
  }

  if (arch.length === 0) {
    throw new MetadataError('keyword', token.length === 0 ? 'empty keyword' : token);
  }

  return { arch, stability };
}

export function parseKeywords(line: string): Keyword[] {
  return splitWords(line).map(parseKeyword);
}

export function renderKeyword(keyword: Keyword): string {
  switch (keyword.stability) {
    case 'stable':
      return keyword.arch;
    case 'testing':
      return `~${keyword.arch}`;
    case 'disabled':
      return `-${keyword.arch}`;
    case 'disabled-all':
      return '-*';
  }
}

