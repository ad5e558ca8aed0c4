/**
 * Recoverable errors. Every one of them is raised before any byte is written,
 * so callers may retry with corrected arguments.
 * Wrong argument types and broken backend invariants throw plain `Error` instead.
 * @module
 */

/** Base class: `instanceof CipherError` catches all recoverable failures. */
export class CipherError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/** Input and output buffers have different lengths. */
export class LengthMismatchError extends CipherError {
  readonly inputLength: number;
  readonly outputLength: number;
  constructor(inputLength: number, outputLength: number) {
    super(`input (${inputLength}) and output (${outputLength}) lengths are not equal`);
    this.inputLength = inputLength;
    this.outputLength = outputLength;
  }
}

/** Keystream left before counter wraparound is less than requested. */
export class InsufficientCapacityError extends CipherError {
  readonly needed: number;
  readonly remaining: number;
  constructor(needed: number, remaining: number) {
    super(`keystream exhausted: need ${needed} blocks, ${remaining} remaining`);
    this.needed = needed;
    this.remaining = remaining;
  }
}

/** Seek position does not fit into the counter of a stream cipher. */
export class OverflowError extends CipherError {
  constructor(message = 'stream position overflow') {
    super(message);
  }
}
