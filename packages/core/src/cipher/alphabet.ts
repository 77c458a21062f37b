// packages/core/src/cipher/alphabet.ts

export const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
export const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

export const ALPHABET_SIZE = 26;

/** Symbols per half: `a`–`m` / `n`–`z` and `A`–`M` / `N`–`Z`. */
export const HALF_SIZE = ALPHABET_SIZE / 2;

export type Alphabet = typeof LOWERCASE | typeof UPPERCASE;

/**
 * Floored modulo 26. `%` truncates toward zero, so `-1 % 26` is `-1`;
 * this always lands in `[0, 26)`.
 */
export function mod26(n: number): number {
  return ((n % ALPHABET_SIZE) + ALPHABET_SIZE) % ALPHABET_SIZE;
}

/** Same as {@link mod26} for keys beyond `Number.MAX_SAFE_INTEGER`. */
export function mod26Big(n: bigint): number {
  const size = BigInt(ALPHABET_SIZE);
  return Number(((n % size) + size) % size);
}

/**
 * Rotate `ch` by `shift` positions inside `alphabet`.
 * Anything that is not a single symbol of that alphabet comes back as is.
 */
export function shiftChar(ch: string, shift: number, alphabet: Alphabet): string {
  if (ch.length !== 1) return ch;
  const idx = alphabet.indexOf(ch);
  if (idx === -1) return ch;
  return alphabet[mod26(idx + shift)];
}

/** Position of `ch` in its alphabet, or -1. */
export function indexIn(ch: string, alphabet: Alphabet): number {
  return ch.length === 1 ? alphabet.indexOf(ch) : -1;
}

export function isFirstHalf(ch: string, alphabet: Alphabet): boolean {
  const idx = indexIn(ch, alphabet);
  return idx >= 0 && idx < HALF_SIZE;
}
