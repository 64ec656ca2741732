/**
 * Bracketed-expression grammar engine.
 *
 * LICENSE, REQUIRED_USE, RESTRICT/PROPERTIES, SRC_URI and the dependency
 * classes all share one shape: whitespace-separated entries, where an entry
 * is an atom, a `[!]flag? ( ... )` USE-conditional group, an operator group
 * such as `|| ( ... )`, or a bare `( ... )` group. This module implements
 * that shape once as a recursive descent parser; each grammar supplies a
 * `Grammar` describing its atoms and operators.
 */

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly position: number,
    public readonly label: string | null = null,
  ) {
    super(`Parse error at position ${position}: ${label ? `${message} (${label})` : message}`);
    this.name = 'ParseError';
  }
}

const WHITESPACE = /^[ \t\r\n]$/;
const ALNUM = /^[A-Za-z0-9]$/;

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

export function isAlphanumeric(ch: string): boolean {
  return ALNUM.test(ch);
}

/** Whitespace-separated words, without empty strings. */
export function splitWords(line: string): string[] {
  return line.split(/\s+/).filter(word => word.length > 0);
}

/**
 * Build a character predicate accepting ASCII alphanumerics plus `extra`.
 */
export function charset(extra: string): (ch: string) => boolean {
  return ch => isAlphanumeric(ch) || extra.includes(ch);
}

/** USE flag names inside conditionals: `[A-Za-z0-9_+-]`. */
export const isFlagChar = charset('_-+');

/**
 * Cursor over a single field value.
 */
export class Scanner {
  pos = 0;

  constructor(public readonly input: string) {}

  get atEnd(): boolean {
    return this.pos >= this.input.length;
  }

  get rest(): string {
    return this.input.slice(this.pos);
  }

  peek(): string | undefined {
    return this.input[this.pos];
  }

  advance(): string {
    return this.input[this.pos++];
  }

  startsWith(literal: string): boolean {
    return this.input.startsWith(literal, this.pos);
  }

  /** Consume `literal` if it is next. */
  eat(literal: string): boolean {
    if (!this.startsWith(literal)) return false;
    this.pos += literal.length;
    return true;
  }

  takeWhile(predicate: (ch: string) => boolean): string {
    const start = this.pos;
    while (this.pos < this.input.length && predicate(this.input[this.pos])) {
      this.pos++;
    }
    return this.input.slice(start, this.pos);
  }

  skipWhitespace(): void {
    this.takeWhile(isWhitespace);
  }
}

/**
 * Describes one expression language to the engine.
 */
export interface Grammar<T> {
  /** Characters allowed in the flag of a USE-conditional group. */
  isFlagChar(ch: string): boolean;

  /**
   * Two-character group operators such as `||`. An entry starting with the
   * first character of an operator is committed to that operator.
   */
  operators: Readonly<Record<string, (entries: T[]) => T>>;

  useConditional(flag: string, negated: boolean, entries: T[]): T;

  /** Label for an unterminated bare `( ... )` group. */
  groupLabel: string;

  /**
   * Turn the children of a bare `( ... )` group into the entries spliced
   * into the enclosing list.
   */
  group(entries: T[]): T[];

  /**
   * Parse one atom at the scanner position. Returns `undefined` (with the
   * position untouched) when no atom starts here.
   */
  parseAtom(scanner: Scanner): T | undefined;
}

/**
 * Parse a complete field value. Every non-whitespace character must be
 * consumed; empty input yields an empty list.
 */
export function parseBracketed<T>(input: string, grammar: Grammar<T>): T[] {
  const scanner = new Scanner(input);
  const entries = parseEntries(scanner, grammar);
  scanner.skipWhitespace();

  if (!scanner.atEnd) {
    throw new ParseError(`unexpected input '${scanner.rest}'`, scanner.pos);
  }

  return entries;
}

function parseEntries<T>(scanner: Scanner, grammar: Grammar<T>): T[] {
  const entries: T[] = [];

  for (;;) {
    const checkpoint = scanner.pos;
    scanner.skipWhitespace();

    const batch = parseEntry(scanner, grammar);
    if (batch === undefined) {
      scanner.pos = checkpoint;
      break;
    }
    entries.push(...batch);
  }

  return entries;
}

function parseEntry<T>(scanner: Scanner, grammar: Grammar<T>): T[] | undefined {
  const ch = scanner.peek();
  if (ch === undefined) return undefined;

  if (ch === '(') {
    scanner.advance();
    return grammar.group(parseGroupTail(scanner, grammar, grammar.groupLabel));
  }

  const operator = Object.keys(grammar.operators).find(token => token[0] === ch);
  if (operator !== undefined) {
    if (!scanner.eat(operator)) return undefined;
    scanner.skipWhitespace();
    const entries = parseGroupBody(scanner, grammar, `'${operator}' group`);
    return [grammar.operators[operator](entries)];
  }

  const conditional = parseUseConditional(scanner, grammar);
  if (conditional !== undefined) return [conditional];

  const atom = grammar.parseAtom(scanner);
  return atom === undefined ? undefined : [atom];
}

function parseUseConditional<T>(scanner: Scanner, grammar: Grammar<T>): T | undefined {
  const start = scanner.pos;
  const negated = scanner.eat('!');
  const flag = scanner.takeWhile(grammar.isFlagChar);

  if (flag.length === 0 || !scanner.eat('?')) {
    scanner.pos = start;
    return undefined;
  }

  // Past the '?' the group is mandatory.
  scanner.skipWhitespace();
  const entries = parseGroupBody(scanner, grammar, 'USE conditional group');
  return grammar.useConditional(flag, negated, entries);
}

function parseGroupBody<T>(scanner: Scanner, grammar: Grammar<T>, label: string): T[] {
  if (!scanner.eat('(')) {
    throw new ParseError("expected '('", scanner.pos, label);
  }
  return parseGroupTail(scanner, grammar, label);
}

/** Children and closing paren of a group whose `(` was consumed. */
function parseGroupTail<T>(scanner: Scanner, grammar: Grammar<T>, label: string): T[] {
  const entries = parseEntries(scanner, grammar);
  scanner.skipWhitespace();

  if (!scanner.eat(')')) {
    throw new ParseError('unterminated group', scanner.pos, label);
  }

  return entries;
}

/**
 * Collapse a top-level entry list: nothing becomes an empty conjunction,
 * a single entry stands alone, several are wrapped.
 */
export function collapse<T>(entries: T[], all: (entries: T[]) => T): T {
  if (entries.length === 1) return entries[0];
  return all(entries);
}

/** Space-join rendered children into `prefix( ... )`. */
export function renderGroup<T>(prefix: string, entries: T[], render: (entry: T) => string): string {
  return `${prefix}( ${entries.map(render).join(' ')} )`;
}

export function renderUseConditional<T>(
  node: { flag: string; negated: boolean; entries: T[] },
  render: (entry: T) => string,
): string {
  return renderGroup(`${node.negated ? '!' : ''}${node.flag}? `, node.entries, render);
}
