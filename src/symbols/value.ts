/**
 * @file value.ts
 * @description Packed constant values carried by enumerants and constant locations.
 */

import { InvalidArgumentError } from '../core/error.js';

/**
 * Numeric representation of a constant, selected by an enum's underlying type width.
 */
export enum ValuePacking {
  Bool,
  Int8,
  Int16,
  Int32,
  Int64,
  UInt8,
  UInt16,
  UInt32,
  UInt64,
}

export interface ConstantValue {
  packing: ValuePacking;
  value: bigint;
}

function packingBits(packing: ValuePacking): number {
  switch (packing) {
    case ValuePacking.Bool: return 1;
    case ValuePacking.Int8: case ValuePacking.UInt8: return 8;
    case ValuePacking.Int16: case ValuePacking.UInt16: return 16;
    case ValuePacking.Int32: case ValuePacking.UInt32: return 32;
    case ValuePacking.Int64: case ValuePacking.UInt64: return 64;
  }
}

function isSignedPacking(packing: ValuePacking): boolean {
  return packing === ValuePacking.Int8 || packing === ValuePacking.Int16 ||
    packing === ValuePacking.Int32 || packing === ValuePacking.Int64;
}

/**
 * Select the packing for an ordinal of the given byte width.
 */
export function packingForSize(size: number, signed: boolean): ValuePacking {
  switch (size) {
    case 1: return signed ? ValuePacking.Int8 : ValuePacking.UInt8;
    case 2: return signed ? ValuePacking.Int16 : ValuePacking.UInt16;
    case 4: return signed ? ValuePacking.Int32 : ValuePacking.UInt32;
    case 8: return signed ? ValuePacking.Int64 : ValuePacking.UInt64;
    default:
      throw new InvalidArgumentError(`No packed representation for a ${size} byte value`);
  }
}

/**
 * Coerce a value into a packing. Integers wrap to the packing's width; anything non-zero
 * is true for a bool packing.
 */
export function packValue(packing: ValuePacking, raw: bigint | number | boolean): ConstantValue {
  let v: bigint;
  if (typeof raw === 'boolean') {
    v = raw ? 1n : 0n;
  } else if (typeof raw === 'number') {
    if (!Number.isInteger(raw))
      throw new InvalidArgumentError(`Constant value ${raw} is not an integer`);
    v = BigInt(raw);
  } else {
    v = raw;
  }

  if (packing === ValuePacking.Bool)
    return { packing, value: v !== 0n ? 1n : 0n };

  const bits = packingBits(packing);
  const value = isSignedPacking(packing) ? BigInt.asIntN(bits, v) : BigInt.asUintN(bits, v);
  return { packing, value };
}

/** The zero value of a packing */
export function zeroValue(packing: ValuePacking): ConstantValue {
  return { packing, value: 0n };
}

/**
 * The next auto-increment value. Bool packings stop at true.
 */
export function incrementValue(cv: ConstantValue): ConstantValue {
  if (cv.packing === ValuePacking.Bool)
    return { packing: cv.packing, value: 1n };
  return packValue(cv.packing, cv.value + 1n);
}

/** Render for diagnostics: true/false for bool, decimal otherwise */
export function valueToString(cv: ConstantValue): string {
  if (cv.packing === ValuePacking.Bool)
    return cv.value !== 0n ? 'true' : 'false';
  return cv.value.toString(10);
}
