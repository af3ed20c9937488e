/**
 * @file types.ts
 * @description Numeric type aliases shared across the symbol builder.
 *
 * Quantities that live in the target's 64-bit address space are mapped to bigint,
 * everything that is bounded by a type or function size stays a plain number:
 *   number → sizes, member offsets, live range offsets, ids
 *   uintb  → bigint (module offsets, absolute addresses)
 */

/** Unsigned 64-bit address or module offset */
export type uintb = bigint;

/** Dense symbol id; 0 is never assigned */
export type SymbolId = number;

/** The id that never names a symbol */
export const NO_SYMBOL: SymbolId = 0;

/** Round `sz` up to the next multiple of `align` (align of 0 or 1 leaves it unchanged) */
export function calcAlignSize(sz: number, align: number): number {
  if (align <= 1) return sz;
  const mod = sz % align;
  if (mod === 0) return sz;
  return sz + (align - mod);
}
