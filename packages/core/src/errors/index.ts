// packages/core/src/errors/index.ts
const DISABLE_STACKTRACE : boolean = true;

export class HalfshiftError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/**
 * Ciphertext and metadata disagree in length (counted in code points).
 * Raised before any plaintext is produced.
 */
export class LengthMismatchError extends HalfshiftError {
  constructor(
    readonly textLength     : number,
    readonly metadataLength : number,
  ) {
    super(
      `Ciphertext and metadata lengths do not match ` +
      `(ciphertext: ${textLength}, metadata: ${metadataLength})`,
    );
  }
}

export class InvalidShiftKeyError extends HalfshiftError {}
export class InvalidMetadataError extends HalfshiftError {}
export class ConfigError          extends HalfshiftError {}
