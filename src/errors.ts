import { ParseError } from './grammar';

export type MetadataErrorKind =
  | 'eapi'
  | 'keyword'
  | 'iuse'
  | 'phase'
  | 'src-uri'
  | 'license'
  | 'required-use'
  | 'restrict'
  | 'cache-entry'
  | 'missing-field'
  | 'dependency'
  | 'eapi-feature';

const PREFIXES: Record<MetadataErrorKind, string> = {
  eapi: 'invalid EAPI',
  keyword: 'invalid keyword',
  iuse: 'invalid IUSE entry',
  phase: 'invalid phase',
  'src-uri': 'invalid SRC_URI',
  license: 'invalid LICENSE',
  'required-use': 'invalid REQUIRED_USE',
  restrict: 'invalid RESTRICT/PROPERTIES',
  'cache-entry': 'invalid cache entry',
  'missing-field': 'missing required field',
  dependency: 'dependency parse error',
  'eapi-feature': 'unsupported by EAPI',
};

/**
 * Error thrown by every public parse function.
 *
 * `detail` is the offending value, field name or the underlying grammar
 * message. For grammar failures `position` and `label` locate the
 * sub-expression that broke.
 */
export class MetadataError extends Error {
  readonly position: number | null;
  readonly label: string | null;

  constructor(
    public readonly kind: MetadataErrorKind,
    public readonly detail: string,
    options: { position?: number; label?: string; cause?: unknown } = {},
  ) {
    super(`${PREFIXES[kind]}: ${detail}`, { cause: options.cause });
    this.name = 'MetadataError';
    this.position = options.position ?? null;
    this.label = options.label ?? null;
  }
}

/**
 * Run a grammar parser and rethrow its `ParseError` as a `MetadataError`
 * of the given kind.
 */
export function wrapParse<T>(kind: MetadataErrorKind, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof ParseError) {
      throw new MetadataError(kind, err.message, {
        position: err.position,
        label: err.label ?? undefined,
        cause: err,
      });
    }
    throw err;
  }
}
