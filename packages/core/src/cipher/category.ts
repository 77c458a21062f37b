// packages/core/src/cipher/category.ts
import { LOWERCASE, UPPERCASE, HALF_SIZE, indexIn, type Alphabet } from './alphabet.js';
import { InvalidMetadataError } from '../errors/index.js';

/* ------------------------------------------------------------------ */
/*  Categories and their persisted codes                               */
/* ------------------------------------------------------------------ */

export type Category =
  | 'lower_first'
  | 'lower_second'
  | 'upper_first'
  | 'upper_second'
  | 'passthrough';

/** Categories that move a character; `passthrough` never does. */
export type ShiftedCategory = Exclude<Category, 'passthrough'>;

export type MetadataCode = 'l' | 'L' | 'u' | 'U' | '0';

const CODE_OF: Record<Category, MetadataCode> = {
  lower_first : 'l',
  lower_second: 'L',
  upper_first : 'u',
  upper_second: 'U',
  passthrough : '0',
};

const CATEGORY_OF: Record<MetadataCode, Category> = {
  l: 'lower_first',
  L: 'lower_second',
  u: 'upper_first',
  U: 'upper_second',
  '0': 'passthrough',
};

export function assertNever(x: never): never {
  throw new TypeError(`Unexpected category: ${String(x)}`);
}

export function isMetadataCode(s: string): s is MetadataCode {
  return Object.prototype.hasOwnProperty.call(CATEGORY_OF, s);
}

export function codeOf(category: Category): MetadataCode {
  return CODE_OF[category];
}

/**
 * Category for a metadata symbol. Unknown symbols read as `passthrough`,
 * which is how previously written metadata has always been decoded.
 */
export function categoryOfCode(code: string): Category {
  return isMetadataCode(code) ? CATEGORY_OF[code] : 'passthrough';
}

/* ------------------------------------------------------------------ */
/*  Classifier                                                         */
/* ------------------------------------------------------------------ */

/** Which rule applies to one character (a single code point). */
export function classify(ch: string): Category {
  const lo = indexIn(ch, LOWERCASE);
  if (lo !== -1) return lo < HALF_SIZE ? 'lower_first' : 'lower_second';

  const up = indexIn(ch, UPPERCASE);
  if (up !== -1) return up < HALF_SIZE ? 'upper_first' : 'upper_second';

  return 'passthrough';
}

export function alphabetOf(category: ShiftedCategory): Alphabet {
  switch (category) {
    case 'lower_first':
    case 'lower_second':
      return LOWERCASE;
    case 'upper_first':
    case 'upper_second':
      return UPPERCASE;
    default:
      return assertNever(category);
  }
}

/* ------------------------------------------------------------------ */
/*  Metadata string <-> tags                                           */
/* ------------------------------------------------------------------ */

export function serializeMetadata(tags: readonly Category[]): string {
  let out = '';
  for (const tag of tags) out += CODE_OF[tag];
  return out;
}

/**
 * Strict parse of a metadata string.
 * @throws InvalidMetadataError on the first symbol that is not a known code
 */
export function parseMetadata(codes: string): Category[] {
  const tags: Category[] = [];
  let pos = 0;
  for (const code of codes) {
    if (!isMetadataCode(code)) {
      throw new InvalidMetadataError(
        `Unknown metadata code ${JSON.stringify(code)} at position ${pos}`,
      );
    }
    tags.push(CATEGORY_OF[code]);
    pos++;
  }
  return tags;
}

export type MetadataSummary = Record<Category, number> & {
  total   : number;
  /** Symbols that are not one of the five codes (decoded as passthrough). */
  unknown : number;
};

export function summarizeMetadata(codes: string): MetadataSummary {
  const summary: MetadataSummary = {
    lower_first : 0,
    lower_second: 0,
    upper_first : 0,
    upper_second: 0,
    passthrough : 0,
    total       : 0,
    unknown     : 0,
  };
  for (const code of codes) {
    summary.total++;
    if (isMetadataCode(code)) summary[CATEGORY_OF[code]]++;
    else summary.unknown++;
  }
  return summary;
}
