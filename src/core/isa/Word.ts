export const WORD_BITS = 16;
export const WORD_MIN = -(1 << (WORD_BITS - 1));
export const WORD_MAX = (1 << (WORD_BITS - 1)) - 1;

const SHIFT = 32 - WORD_BITS;

/** Wraps any integer into a signed 16-bit word. */
export function toWord(value: number): number {
  return ((value | 0) << SHIFT) >> SHIFT;
}

export function addWords(a: number, b: number): number {
  return toWord(a + b);
}

export function nandWords(a: number, b: number): number {
  return toWord(~(a & b));
}

// Only the low half of the product survives; Math.imul keeps the low 32 bits exact.
export function mulWords(a: number, b: number): number {
  return toWord(Math.imul(a, b));
}
