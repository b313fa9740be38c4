/**
 * Error Types
 *
 * Recoverable conditions (bad index, last layer, missing pixels, empty history)
 * never throw: operations report them with a `false` return. The classes here
 * are for malformed input crossing the module boundary and for internal
 * invariant violations, which are programming errors.
 */

export class PaintCoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raw pixel data whose length does not match its declared dimensions.
 */
export class InvalidBufferError extends PaintCoreError {}

/**
 * A persisted layer or document record that cannot be reconstructed.
 */
export class InvalidRecordError extends PaintCoreError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.field = field;
  }
}

export class InvariantViolationError extends PaintCoreError {}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}
