/**
 * Branch-to-bit convention shared by the codebook generator, the encoder
 * and the decoder. Nothing else may hard-code which edge is 0 and which is 1.
 */

export type Bit = 0 | 1;

/** Bit emitted when descending into a left child. */
export const LEFT_BIT: Bit = 0;

/** Bit emitted when descending into a right child. */
export const RIGHT_BIT: Bit = 1;

/**
 * Code assigned to the only symbol of a single-leaf tree. An empty code
 * could not be packed, so every occurrence costs one bit.
 */
export const SINGLE_SYMBOL_CODE: readonly Bit[] = [LEFT_BIT];
