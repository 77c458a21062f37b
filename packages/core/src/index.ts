// packages/core/src/index.ts

import {
  encode,
  encodeWithMetadata,
  decodeWithMetadata,
  decodeHeuristic,
} from './cipher/engine.js';
import { keyResidue, type ShiftKey, type ShiftKeys } from './cipher/keys.js';
import { summarizeMetadata } from './cipher/category.js';
import { DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE } from './config/defaults.js';
import { StreamProcessor } from './stream/StreamProcessor.js';
import { ConfigError } from './errors/index.js';
import {
  createLogger,
  type Verbosity,
  type Logger,
} from './util/logger.js';
import type { EncodedText, VerifyReport } from './types/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring a Halfshift instance.
 */
export interface HalfshiftOptions {
  /** First shift key (any integer) */
  shift1     : ShiftKey;
  /** Second shift key (any integer) */
  shift2     : ShiftKey;
  /** Block size for streaming transforms, in UTF-16 units */
  chunkSize? : number;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?   : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?    : (msg: string) => void;
}

/**
 * Halfshift binds a key pair to the split-alphabet substitution cipher and
 * offers text, verification and streaming helpers on top of it.
 */
export class Halfshift {
  // — runtime-mutable --------------------------------------------------------
  private keys      : ShiftKeys;
  private chunkSize : number;
  private stream    : StreamProcessor;

  // — diagnostics ------------------------------------------------------------
  private readonly log : Logger;

  constructor(opt: HalfshiftOptions) {
    this.log       = createLogger(opt.verbose ?? 0, opt.logger);
    this.keys      = Halfshift.checkKeys(opt.shift1, opt.shift2);
    this.chunkSize = Halfshift.checkChunkSize(opt.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.stream    = new StreamProcessor(this.keys, this.chunkSize);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Setters / getters for run-time flexibility
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Replace the key pair for subsequent operations.
   * Streams already created keep the keys they were built with.
   */
  setKeys(shift1: ShiftKey, shift2: ShiftKey): void {
    this.keys   = Halfshift.checkKeys(shift1, shift2);
    this.stream = new StreamProcessor(this.keys, this.chunkSize);
  }
  getKeys(): ShiftKeys                      { return { ...this.keys }; }

  setChunkSize(units: number): number {
    this.chunkSize = Halfshift.checkChunkSize(units);
    this.stream    = new StreamProcessor(this.keys, this.chunkSize);
    return this.chunkSize;
  }
  getChunkSize(): number                    { return this.chunkSize; }

  /** Adjust verbosity level of internal logger at runtime. */
  setVerbose(level: Verbosity): void        { this.log.level = level; }
  getVerbose(): Verbosity                   { return this.log.level; }

  // ════════════════════════════════════════════════════════════════════════
  //  TEXT convenience
  // ════════════════════════════════════════════════════════════════════════

  /** Forward transform without metadata. */
  encryptText(plain: string): string {
    this.log.log(1, 'Start text encryption (no metadata)');
    const out = encode(plain, this.keys.shift1, this.keys.shift2);
    this.log.log(1, 'Encryption finished');
    return out;
  }

  /** Forward transform with the metadata needed for an exact decode. */
  encryptTextWithMeta(plain: string): EncodedText {
    this.log.log(1, 'Start text encryption');
    this.logResidues();
    const out = encodeWithMetadata(plain, this.keys.shift1, this.keys.shift2);
    this.log.log(1, 'Encryption finished');
    return out;
  }

  /**
   * Decrypt with metadata when it is given, heuristically otherwise.
   * @throws LengthMismatchError when ciphertext and metadata disagree in length
   */
  decryptText(ciphertext: string, metadata?: string): string {
    if (metadata === undefined) return this.decryptTextHeuristic(ciphertext);

    this.log.log(1, 'Start text decryption with metadata');
    const { unknown } = summarizeMetadata(metadata);
    if (unknown > 0) {
      this.log.log(2, `${unknown} unknown metadata code(s), decoded unchanged`);
    }
    const out = decodeWithMetadata(ciphertext, metadata, this.keys.shift1, this.keys.shift2);
    this.log.log(1, 'Decryption finished');
    return out;
  }

  /** Metadata-free decode; may differ from the original text. */
  decryptTextHeuristic(ciphertext: string): string {
    this.log.log(1, 'Start heuristic text decryption');
    this.logResidues();
    const out = decodeHeuristic(ciphertext, this.keys.shift1, this.keys.shift2);
    this.log.log(1, 'Decryption finished');
    return out;
  }

  /**
   * Encrypt then decrypt `plain` both ways and report which decode
   * reproduced it.
   */
  verify(plain: string): VerifyReport {
    const encoded   = this.encryptTextWithMeta(plain);
    const decrypted = this.decryptText(encoded.text, encoded.metadata);
    const heuristic = this.decryptTextHeuristic(encoded.text);
    const report: VerifyReport = {
      ok: decrypted === plain,
      heuristicOk: heuristic === plain,
      encoded,
      decrypted,
      heuristic,
    };
    this.log.log(report.ok ? 1 : 0, `Verification: ${report.ok ? 'SUCCESS' : 'FAILURE'}`);
    return report;
  }

  // ════════════════════════════════════════════════════════════════════════
  //  STREAMS
  // ════════════════════════════════════════════════════════════════════════

  /** Plaintext chunks in, { text, metadata } chunks out. */
  createEncryptionStream(): TransformStream<string, EncodedText> {
    this.log.log(2, `Creating encryption stream, chunk size ${this.chunkSize}`);
    return this.stream.encryptionStream();
  }

  /** { text, metadata } chunks in, plaintext out; errors on unpaired tail. */
  createDecryptionStream(): TransformStream<EncodedText, string> {
    this.log.log(2, `Creating decryption stream, chunk size ${this.chunkSize}`);
    return this.stream.decryptionStream();
  }

  createHeuristicDecryptionStream(): TransformStream<string, string> {
    this.log.log(2, `Creating heuristic decryption stream, chunk size ${this.chunkSize}`);
    return this.stream.heuristicDecryptionStream();
  }

  /** Run a whole readable through the encryption stream. */
  async encryptStream(readable: ReadableStream<string>): Promise<EncodedText> {
    return this.stream.encrypt(readable);
  }

  async decryptStream(readable: ReadableStream<EncodedText>): Promise<string> {
    return this.stream.decrypt(readable);
  }

  async decryptStreamHeuristic(readable: ReadableStream<string>): Promise<string> {
    return this.stream.decryptHeuristic(readable);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Helpers
  // ════════════════════════════════════════════════════════════════════════

  private logResidues(): void {
    this.log.log(
      3,
      `Key residues: shift1 ≡ ${keyResidue(this.keys.shift1)}, ` +
      `shift2 ≡ ${keyResidue(this.keys.shift2)} (mod 26)`,
    );
  }

  /** Validates both keys now so a bad key fails at configuration time. */
  private static checkKeys(shift1: ShiftKey, shift2: ShiftKey): ShiftKeys {
    keyResidue(shift1);
    keyResidue(shift2);
    return { shift1, shift2 };
  }

  private static checkChunkSize(units: number): number {
    if (!Number.isInteger(units) || units < 1) {
      throw new ConfigError(`Invalid chunkSize: ${units}. Must be a positive integer.`);
    }
    if (units > MAX_CHUNK_SIZE) {
      throw new RangeError(`chunkSize cannot exceed ${MAX_CHUNK_SIZE} units.`);
    }
    return units;
  }
}

export {
  encode,
  encodeWithMetadata,
  encodeTagged,
  decodeWithMetadata,
  decodeTagged,
  decodeHeuristic,
} from './cipher/engine.js';
export {
  classify,
  codeOf,
  categoryOfCode,
  serializeMetadata,
  parseMetadata,
  summarizeMetadata,
  type Category,
  type MetadataCode,
  type MetadataSummary,
} from './cipher/category.js';
export { mod26, shiftChar, LOWERCASE, UPPERCASE } from './cipher/alphabet.js';
export { keyResidue, forwardShifts, inverseShifts, type ShiftKey, type ShiftKeys } from './cipher/keys.js';
export { StreamProcessor } from './stream/StreamProcessor.js';
export { collectText, collectEncoded, streamOf } from './util/stream.js';
export { createLogger, isVerbosity, type Logger, type Verbosity } from './util/logger.js';
export * from './errors/index.js';
export type { EncodedText, TaggedText, VerifyReport } from './types/index.js';
