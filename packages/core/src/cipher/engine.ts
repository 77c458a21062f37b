// packages/core/src/cipher/engine.ts
import { LOWERCASE, UPPERCASE, shiftChar, isFirstHalf } from './alphabet.js';
import {
  alphabetOf,
  assertNever,
  categoryOfCode,
  classify,
  codeOf,
  type Category,
} from './category.js';
import { forwardShifts, inverseShifts, type RuleShifts, type ShiftKey } from './keys.js';
import { LengthMismatchError } from '../errors/index.js';
import type { EncodedText, TaggedText } from '../types/index.js';

function applyRule(ch: string, category: Category, shifts: RuleShifts): string {
  switch (category) {
    case 'lower_first':
    case 'lower_second':
    case 'upper_first':
    case 'upper_second':
      return shiftChar(ch, shifts[category], alphabetOf(category));
    case 'passthrough':
      return ch;
    default:
      return assertNever(category);
  }
}

/* ------------------------------------------------------------------ */
/*  Forward                                                            */
/* ------------------------------------------------------------------ */

/** Plain forward transform; no way back except {@link decodeHeuristic}. */
export function encode(text: string, shift1: ShiftKey, shift2: ShiftKey): string {
  const shifts = forwardShifts(shift1, shift2);
  let out = '';
  for (const ch of text) out += applyRule(ch, classify(ch), shifts);
  return out;
}

/** Forward transform that also records the rule used for every character. */
export function encodeTagged(text: string, shift1: ShiftKey, shift2: ShiftKey): TaggedText {
  const shifts = forwardShifts(shift1, shift2);
  const tags: Category[] = [];
  let out = '';
  for (const ch of text) {
    const category = classify(ch);
    tags.push(category);
    out += applyRule(ch, category, shifts);
  }
  return { text: out, tags };
}

export function encodeWithMetadata(
  text: string,
  shift1: ShiftKey,
  shift2: ShiftKey,
): EncodedText {
  const shifts = forwardShifts(shift1, shift2);
  let out  = '';
  let meta = '';
  for (const ch of text) {
    const category = classify(ch);
    out  += applyRule(ch, category, shifts);
    meta += codeOf(category);
  }
  return { text: out, metadata: meta };
}

/* ------------------------------------------------------------------ */
/*  Inverse, metadata-assisted                                         */
/* ------------------------------------------------------------------ */

function decodeAligned(
  chars: readonly string[],
  categories: readonly Category[],
  shift1: ShiftKey,
  shift2: ShiftKey,
): string {
  if (chars.length !== categories.length) {
    throw new LengthMismatchError(chars.length, categories.length);
  }
  const shifts = inverseShifts(shift1, shift2);
  let out = '';
  for (let i = 0; i < chars.length; i++) {
    out += applyRule(chars[i], categories[i], shifts);
  }
  return out;
}

/**
 * Exact inverse of {@link encodeWithMetadata}. Each position is decoded by
 * its metadata code alone; the ciphertext character is never inspected.
 * @throws LengthMismatchError when the two inputs differ in code points
 */
export function decodeWithMetadata(
  ciphertext: string,
  metadata: string,
  shift1: ShiftKey,
  shift2: ShiftKey,
): string {
  const chars = Array.from(ciphertext);
  const categories = Array.from(metadata, categoryOfCode);
  return decodeAligned(chars, categories, shift1, shift2);
}

export function decodeTagged(encoded: TaggedText, shift1: ShiftKey, shift2: ShiftKey): string {
  return decodeAligned(Array.from(encoded.text), encoded.tags, shift1, shift2);
}

/* ------------------------------------------------------------------ */
/*  Inverse, heuristic                                                 */
/* ------------------------------------------------------------------ */

/**
 * Best-effort decode without metadata.
 *
 * For a letter, undo the first-half rule and keep the result if it lands in
 * the first half; otherwise undo the second-half rule unconditionally. When
 * both candidates can land in the first half the wrong one may win, and the
 * output silently differs from the original.
 */
export function decodeHeuristic(ciphertext: string, shift1: ShiftKey, shift2: ShiftKey): string {
  const inv = inverseShifts(shift1, shift2);
  let out = '';
  for (const ch of ciphertext) {
    switch (classify(ch)) {
      case 'lower_first':
      case 'lower_second': {
        const cand = shiftChar(ch, inv.lower_first, LOWERCASE);
        out += isFirstHalf(cand, LOWERCASE) ? cand : shiftChar(ch, inv.lower_second, LOWERCASE);
        break;
      }
      case 'upper_first':
      case 'upper_second': {
        const cand = shiftChar(ch, inv.upper_first, UPPERCASE);
        out += isFirstHalf(cand, UPPERCASE) ? cand : shiftChar(ch, inv.upper_second, UPPERCASE);
        break;
      }
      case 'passthrough':
        out += ch;
        break;
    }
  }
  return out;
}
