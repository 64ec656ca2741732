/**
 * Dependency specifications (DEPEND, RDEPEND, BDEPEND, PDEPEND, IDEPEND).
 *
 * Entries are package atoms, `|| ( ... )` any-of groups, USE-conditional
 * groups and bare `( ... )` all-of groups.
 */

import { wrapParse } from './errors';
import {
  ParseError,
  isFlagChar,
  isWhitespace,
  parseBracketed,
  renderGroup,
  renderUseConditional,
} from './grammar';
import type { Grammar } from './grammar';
import type {
  Blocker,
  DepEntry,
  PackageAtom,
  SlotDep,
  UseDep,
  UseDepKind,
  VersionOperator,
} from './types';

// Longest first so '<=' wins over '<'.
const OPERATORS: VersionOperator[] = ['<=', '>=', '<', '>', '=', '~'];

const CATEGORY = /^[A-Za-z0-9_][A-Za-z0-9+_.-]*$/;
const PACKAGE_NAME = /^[A-Za-z0-9_][A-Za-z0-9+_-]*$/;
const SLOT_NAME = /^[A-Za-z0-9_][A-Za-z0-9+_.-]*$/;
const NAME_AND_VERSION = /^(.+?)-(\d+(?:\.\d+)*[a-z]?(?:_(?:alpha|beta|pre|rc|p)\d*)*(?:-r\d+)?)$/;
const REVISION = /-r\d+$/;
const USE_DEP = /^(!)?(-)?([A-Za-z0-9][A-Za-z0-9+_@-]*)(\([+-]\))?([?=])?$/;

function parseSlotDep(text: string, offset: number): SlotDep {
  if (text === '*' || text === '=') {
    return { slot: null, subslot: null, operator: text };
  }

  const operator = text.endsWith('=') ? '=' : null;
  const body = operator ? text.slice(0, -1) : text;
  const separator = body.indexOf('/');
  const slot = separator === -1 ? body : body.slice(0, separator);
  const subslot = separator === -1 ? null : body.slice(separator + 1);

  if (!SLOT_NAME.test(slot) || (subslot !== null && !SLOT_NAME.test(subslot))) {
    throw new ParseError(`invalid slot dependency ':${text}'`, offset);
  }
  return { slot, subslot, operator };
}

function parseUseDep(text: string, offset: number): UseDep {
  const match = USE_DEP.exec(text);
  if (!match) {
    throw new ParseError(`invalid USE dependency '${text}'`, offset);
  }

  const [, bang, minus, flag, missing, suffix] = match;
  if ((bang && minus) || (bang && !suffix) || (minus && suffix)) {
    throw new ParseError(`invalid USE dependency '${text}'`, offset);
  }

  let kind: UseDepKind;
  if (suffix === '?') kind = bang ? 'not-conditional' : 'conditional';
  else if (suffix === '=') kind = bang ? 'not-equal' : 'equal';
  else kind = minus ? 'disabled' : 'enabled';

  return { flag, kind, missing: missing ? (missing[1] === '+' ? '+' : '-') : null };
}

/**
 * Parse a single atom such as `>=dev-lang/python-3.11:3.11[sqlite,-debug(-)]`.
 * `offset` is where `text` starts in the enclosing field, for error positions.
 */
function readAtom(text: string, offset: number): PackageAtom {
  let rest = text;

  let blocker: Blocker | null = null;
  if (rest.startsWith('!!')) {
    blocker = 'strong';
    rest = rest.slice(2);
  } else if (rest.startsWith('!')) {
    blocker = 'weak';
    rest = rest.slice(1);
  }

  const operator = OPERATORS.find(op => rest.startsWith(op)) ?? null;
  if (operator) rest = rest.slice(operator.length);

  let useDeps: UseDep[] = [];
  if (rest.endsWith(']')) {
    const open = rest.indexOf('[');
    if (open === -1) {
      throw new ParseError(`unbalanced ']' in '${text}'`, offset);
    }
    useDeps = rest
      .slice(open + 1, -1)
      .split(',')
      .map(item => parseUseDep(item, offset));
    rest = rest.slice(0, open);
  }

  let slot: SlotDep | null = null;
  const colon = rest.indexOf(':');
  if (colon !== -1) {
    slot = parseSlotDep(rest.slice(colon + 1), offset);
    rest = rest.slice(0, colon);
  }

  let glob = false;
  if (operator === '=' && rest.endsWith('*')) {
    glob = true;
    rest = rest.slice(0, -1);
  }

  const slash = rest.indexOf('/');
  if (slash === -1) {
    throw new ParseError(`missing category in '${text}'`, offset);
  }
  const category = rest.slice(0, slash);
  let name = rest.slice(slash + 1);

  let version: string | null = null;
  const match = NAME_AND_VERSION.exec(name);
  if (operator) {
    if (!match) {
      throw new ParseError(`'${operator}' needs a version in '${text}'`, offset);
    }
    name = match[1];
    version = match[2];
    if (operator === '~' && REVISION.test(version)) {
      throw new ParseError(`'~' does not take a revision in '${text}'`, offset);
    }
  } else if (match) {
    throw new ParseError(`version without an operator in '${text}'`, offset);
  }

  if (!CATEGORY.test(category)) {
    throw new ParseError(`invalid category '${category}'`, offset);
  }
  if (!PACKAGE_NAME.test(name)) {
    throw new ParseError(`invalid package name '${name}'`, offset);
  }

  return { blocker, operator, category, name, version, glob, slot, useDeps };
}

const dependencyGrammar: Grammar<DepEntry> = {
  isFlagChar,
  operators: {
    '||': entries => ({ type: 'any-of', entries }),
  },
  useConditional: (flag, negated, entries) => ({ type: 'use-conditional', flag, negated, entries }),
  groupLabel: "closing ')'",
  group: entries => [{ type: 'all-of', entries }],
  parseAtom(scanner) {
    const start = scanner.pos;
    // Parens end an atom except inside its [...] USE dependencies.
    let inBrackets = false;
    for (;;) {
      const ch = scanner.peek();
      if (ch === undefined || isWhitespace(ch)) break;
      if (!inBrackets && (ch === '(' || ch === ')')) break;
      if (ch === '[') inBrackets = true;
      if (ch === ']') inBrackets = false;
      scanner.advance();
    }

    const text = scanner.input.slice(start, scanner.pos);
    if (text.length === 0) return undefined;
    return { type: 'atom', atom: readAtom(text, start) };
  },
};

/**
 * Parse a dependency class value into its top-level entries.
 *
 * @example
 * ```ts
 * parseDependencies('ssl? ( dev-libs/openssl:0= ) sys-libs/zlib');
 * // [{ type: 'use-conditional', flag: 'ssl', ... }, { type: 'atom', atom: { ... } }]
 * ```
 */
export function parseDependencies(input: string): DepEntry[] {
  return wrapParse('dependency', () => parseBracketed(input, dependencyGrammar));
}

export function parseAtom(text: string): PackageAtom {
  return wrapParse('dependency', () => readAtom(text, 0));
}

function renderSlotDep(slot: SlotDep): string {
  if (slot.slot === null) return slot.operator ?? '';
  const subslot = slot.subslot === null ? '' : `/${slot.subslot}`;
  return `${slot.slot}${subslot}${slot.operator === '=' ? '=' : ''}`;
}

function renderUseDep(dep: UseDep): string {
  const bang = dep.kind === 'not-conditional' || dep.kind === 'not-equal' ? '!' : '';
  const minus = dep.kind === 'disabled' ? '-' : '';
  const missing = dep.missing ? `(${dep.missing})` : '';
  let suffix = '';
  if (dep.kind === 'conditional' || dep.kind === 'not-conditional') suffix = '?';
  if (dep.kind === 'equal' || dep.kind === 'not-equal') suffix = '=';
  return `${bang}${minus}${dep.flag}${missing}${suffix}`;
}

export function renderAtom(atom: PackageAtom): string {
  const blocker = atom.blocker === 'strong' ? '!!' : atom.blocker === 'weak' ? '!' : '';
  const version = atom.version === null ? '' : `-${atom.version}`;
  const glob = atom.glob ? '*' : '';
  const slot = atom.slot === null ? '' : `:${renderSlotDep(atom.slot)}`;
  const useDeps = atom.useDeps.length === 0 ? '' : `[${atom.useDeps.map(renderUseDep).join(',')}]`;
  return `${blocker}${atom.operator ?? ''}${atom.category}/${atom.name}${version}${glob}${slot}${useDeps}`;
}

export function renderDependency(entry: DepEntry): string {
  switch (entry.type) {
    case 'atom':
      return renderAtom(entry.atom);
    case 'any-of':
      return renderGroup('|| ', entry.entries, renderDependency);
    case 'use-conditional':
      return renderUseConditional(entry, renderDependency);
    case 'all-of':
      return renderGroup('', entry.entries, renderDependency);
  }
}

export function renderDependencies(entries: DepEntry[]): string {
  return entries.map(renderDependency).join(' ');
}

/** Every atom in the entries, in order, regardless of grouping. */
export function dependencyAtoms(entries: DepEntry[]): PackageAtom[] {
  return entries.flatMap(entry => (entry.type === 'atom' ? [entry.atom] : dependencyAtoms(entry.entries)));
}
