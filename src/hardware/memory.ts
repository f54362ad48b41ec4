import { MEMORY_SIZE } from '../constants/memory';

const WORD_MASK = 0xffff;

export function createMemory(): Uint16Array {
  return new Uint16Array(MEMORY_SIZE);
}

/** Truncates any integer to an unsigned 16-bit word. */
export function toWord(x: number): number {
  return x & WORD_MASK;
}

/** Reinterprets a 16-bit word as a two's complement value. */
export function toSigned(x: number): number {
  return (x << 16) >> 16;
}
