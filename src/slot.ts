import { MetadataError } from './errors';
import type { Slot } from './types';

/**
 * Parse a SLOT value: `0` or `0/2.1` (sub-slot after the first `/`).
 */
export function parseSlot(value: string): Slot {
  if (value.length === 0) {
    throw new MetadataError('missing-field', 'SLOT');
  }

  const separator = value.indexOf('/');
  if (separator === -1) {
    return { slot: value, subslot: null };
  }
  return { slot: value.slice(0, separator), subslot: value.slice(separator + 1) };
}

export function renderSlot(slot: Slot): string {
  return slot.subslot === null ? slot.slot : `${slot.slot}/${slot.subslot}`;
}
