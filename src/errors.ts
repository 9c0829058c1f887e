/**
 * Error types raised by the codec.
 *
 * Every failure is local and deterministic, so none of these are retried.
 * Callers can branch on `instanceof` or on the `code` field.
 */

export type HuffmanErrorCode =
  | 'INVALID_INPUT'
  | 'MALFORMED_PAYLOAD'
  | 'UNSUPPORTED_SYMBOL';

/**
 * Base error class for all codec errors.
 */
export class HuffmanError extends Error {
  readonly code: HuffmanErrorCode;

  constructor(code: HuffmanErrorCode, message: string) {
    super(message);
    this.name = 'HuffmanError';
    this.code = code;
  }
}

/**
 * Thrown when the tree builder or the symbol normalizer receives input it
 * cannot work with (empty frequency table, bad counts, out-of-range symbols).
 */
export class InvalidInputError extends HuffmanError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Thrown when a payload, serialized tree or container is corrupted,
 * truncated, or does not belong to the tree it is decoded against.
 */
export class MalformedPayloadError extends HuffmanError {
  constructor(message: string) {
    super('MALFORMED_PAYLOAD', message);
    this.name = 'MalformedPayloadError';
  }
}

/**
 * Thrown when a symbol has no code in the codebook it is encoded with.
 */
export class UnsupportedSymbolError extends HuffmanError {
  readonly symbol: number;

  constructor(symbol: number) {
    super(
      'UNSUPPORTED_SYMBOL',
      `Symbol ${symbol} (U+${symbol.toString(16).toUpperCase().padStart(4, '0')}) is not in the codebook`
    );
    this.name = 'UnsupportedSymbolError';
    this.symbol = symbol;
  }
}
