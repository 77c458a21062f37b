// packages/core/src/cipher/keys.ts
import { mod26, mod26Big } from './alphabet.js';
import type { ShiftedCategory } from './category.js';
import { InvalidShiftKeyError } from '../errors/index.js';

/** Any integer. `bigint` covers magnitudes a double cannot hold exactly. */
export type ShiftKey = number | bigint;

export interface ShiftKeys {
  shift1: ShiftKey;
  shift2: ShiftKey;
}

export type RuleShifts = Readonly<Record<ShiftedCategory, number>>;

/**
 * Residue of a key in `[0, 26)`.
 * @throws InvalidShiftKeyError for fractions, NaN and ±Infinity
 */
export function keyResidue(key: ShiftKey): number {
  if (typeof key === 'bigint') return mod26Big(key);
  if (!Number.isInteger(key)) {
    throw new InvalidShiftKeyError(`Shift key must be an integer, got ${key}`);
  }
  return mod26(key);
}

/**
 * Forward shift per category, already reduced mod 26.
 * Products and sums are taken over residues so they stay exact.
 */
export function forwardShifts(shift1: ShiftKey, shift2: ShiftKey): RuleShifts {
  const a = keyResidue(shift1);
  const b = keyResidue(shift2);
  return {
    lower_first : mod26(a * b),
    lower_second: mod26(-(a + b)),
    upper_first : mod26(-a),
    upper_second: mod26(b * b),
  };
}

export function inverseShifts(shift1: ShiftKey, shift2: ShiftKey): RuleShifts {
  const fwd = forwardShifts(shift1, shift2);
  return {
    lower_first : mod26(-fwd.lower_first),
    lower_second: mod26(-fwd.lower_second),
    upper_first : mod26(-fwd.upper_first),
    upper_second: mod26(-fwd.upper_second),
  };
}
