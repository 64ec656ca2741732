import { MetadataError } from '../src/errors';

/** Run `fn` and return the `MetadataError` it throws. */
export function metadataError(fn: () => unknown): MetadataError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MetadataError) return err;
    throw err;
  }
  throw new Error('expected a MetadataError');
}
