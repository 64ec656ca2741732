import { MetadataError } from './errors';
import { splitWords } from './grammar';
import type { IUse } from './types';

/**
 * Parse one IUSE token; `+flag` is on by default, `-flag` off.
 */
export function parseIUse(token: string): IUse {
  if (token.length === 0) {
    throw new MetadataError('iuse', 'empty IUSE entry');
  }

  const prefix = token[0];
  if (prefix !== '+' && prefix !== '-') {
    return { name: token, default: null };
  }

  const name = token.slice(1);
  if (name.length === 0) {
    throw new MetadataError('iuse', token);
  }
  return { name, default: prefix === '+' ? 'enabled' : 'disabled' };
}

export function parseIUseLine(line: string): IUse[] {
  return splitWords(line).map(parseIUse);
}

export function renderIUse(flag: IUse): string {
  if (flag.default === 'enabled') return `+${flag.name}`;
  if (flag.default === 'disabled') return `-${flag.name}`;
  return flag.name;
}
