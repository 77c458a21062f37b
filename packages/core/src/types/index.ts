import type { Category } from '../cipher/category.js';

/* ------------------------- Transform results ------------------------- */

/** Ciphertext plus its persisted metadata string, aligned 1:1 by code point. */
export interface EncodedText {
  text     : string;
  metadata : string;
}

/** In-memory form of {@link EncodedText}: one tag per code point. */
export interface TaggedText {
  text : string;
  tags : Category[];
}

/* ------------------------- Verification ------------------------------ */

export interface VerifyReport {
  /** Metadata round trip reproduced the input. */
  ok          : boolean;
  /** Heuristic decode also reproduced it. */
  heuristicOk : boolean;
  encoded     : EncodedText;
  decrypted   : string;
  heuristic   : string;
}
