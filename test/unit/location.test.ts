/**
 * @file location.test.ts
 * @description Tests for register metadata and the textual location format.
 */

import { describe, it, expect } from 'vitest';
import { RegisterTable } from '../../src/symbols/registers.js';
import {
  LocationKind,
  locationToString,
  locationsEquivalent,
  parseLocation,
} from '../../src/symbols/location.js';
import { ValuePacking } from '../../src/symbols/value.js';
import { InvalidArgumentError, NotFoundError } from '../../src/core/error.js';
import { loadArchitecture } from './support.js';

const table = new RegisterTable(loadArchitecture('amd64').registers);

// ---------------------------------------------------------------------------
// RegisterTable
// ---------------------------------------------------------------------------
describe('RegisterTable', () => {
  it('looks registers up by name without regard to case', () => {
    expect(table.findByName('RCX').id).toBe(330);
    expect(table.tryFindByName('rcx')?.size).toBe(8);
    expect(table.tryFindByName('zmm0')).toBeUndefined();
    expect(() => table.findByName('zmm0')).toThrow(NotFoundError);
    expect(() => table.findById(9999)).toThrow('Unknown register id: 9999');
  });

  it('walks up to the whole register', () => {
    expect(table.getBaseRegister(2).name).toBe('rcx');
    expect(table.getBaseRegister(330).name).toBe('rcx');
    expect(table.sameBaseRegister(18, 10)).toBe(true);
    expect(table.sameBaseRegister(18, 331)).toBe(false);
  });

  it('enumerates sub-registers breadth first', () => {
    expect(table.getSubRegisters(330).map((r) => r.name)).toEqual(['ecx', 'cx', 'cl', 'ch']);
    expect(table.getSubRegisters(154)).toEqual([]);
  });

  it('selects the sub-register that holds a value', () => {
    expect(table.selectSubRegister(330, 8).name).toBe('rcx');
    expect(table.selectSubRegister(330, 4).name).toBe('ecx');
    expect(table.selectSubRegister(330, 2).name).toBe('cx');
    expect(table.selectSubRegister(330, 3).name).toBe('cx');
    expect(table.selectSubRegister(330, 1).name).toBe('cl');
    expect(table.selectSubRegister(336, 4).name).toBe('r8d');
    expect(table.selectSubRegister(154, 8).name).toBe('xmm0');
  });

  it('rejects duplicate ids', () => {
    expect(() => new RegisterTable([
      { name: 'a', id: 1, size: 1 },
      { name: 'b', id: 1, size: 1 },
    ])).toThrow('Duplicate register id 1 (b)');
  });
});

// ---------------------------------------------------------------------------
// parseLocation
// ---------------------------------------------------------------------------
describe('parseLocation', () => {
  it('reads registers', () => {
    expect(parseLocation('@rcx', table)).toEqual({ kind: LocationKind.Register, regId: 330, size: 8 });
    expect(parseLocation(' @ECX ', table)).toEqual({ kind: LocationKind.Register, regId: 18, size: 4 });
  });

  it('reads register relative forms', () => {
    expect(parseLocation('[@rsp + 0x28]', table))
      .toEqual({ kind: LocationKind.RegisterRelative, regId: 335, offset: 0x28, size: 8 });
    expect(parseLocation('[@rbp - 0x8]', table))
      .toEqual({ kind: LocationKind.RegisterRelative, regId: 334, offset: -8, size: 8 });
    expect(parseLocation('[@rsp]', table))
      .toEqual({ kind: LocationKind.RegisterRelative, regId: 335, offset: 0, size: 8 });
  });

  it('reads image offsets and the empty location', () => {
    expect(parseLocation('+0x1000', table)).toEqual({ kind: LocationKind.ImageOffset, offset: 0x1000n });
    expect(parseLocation('', table)).toEqual({ kind: LocationKind.None });
    expect(parseLocation('   ', table)).toEqual({ kind: LocationKind.None });
  });

  it('rejects malformed text', () => {
    expect(() => parseLocation('@nosuch', table)).toThrow('Unknown register \'nosuch\' in location "@nosuch"');
    expect(() => parseLocation('@rcx junk', table)).toThrow('Trailing characters in location "@rcx junk"');
    expect(() => parseLocation('[@rsp + ]', table)).toThrow('Expected a hex value in location "[@rsp + ]"');
    expect(() => parseLocation('[@rsp', table)).toThrow('Expected \']\' in location "[@rsp"');
    expect(() => parseLocation('rcx', table)).toThrow(InvalidArgumentError);
  });
});

// ---------------------------------------------------------------------------
// locationToString
// ---------------------------------------------------------------------------
describe('locationToString', () => {
  it('writes the forms parseLocation reads', () => {
    for (const text of ['@ecx', '[@rsp + 0x28]', '[@rbp - 0x8]', '[@rsp]', '+0x1000', '']) {
      expect(locationToString(parseLocation(text, table), table)).toBe(text);
    }
  });

  it('has display forms for members and constants', () => {
    expect(locationToString({ kind: LocationKind.StructureRelative, offset: 8 }, table)).toBe('this+0x8');
    expect(locationToString({
      kind: LocationKind.StructureRelative, offset: 8, bitField: { position: 3, length: 4 },
    }, table)).toBe('this+0x8 (bits 3-6)');
    expect(locationToString({ kind: LocationKind.ConstantValue, value: { packing: ValuePacking.Int32, value: -5n } }, table))
      .toBe('=-5');
    expect(locationToString({ kind: LocationKind.ConstantValue, value: { packing: ValuePacking.Bool, value: 1n } }, table))
      .toBe('=true');
  });

  it('names unknown registers by id', () => {
    expect(locationToString({ kind: LocationKind.Register, regId: 9999, size: 8 }, table)).toBe('@reg9999');
  });
});

describe('locationsEquivalent', () => {
  it('compares the storage named', () => {
    const rcx = parseLocation('@rcx', table);
    expect(locationsEquivalent(rcx, { kind: LocationKind.Register, regId: 330, size: 4 })).toBe(true);
    expect(locationsEquivalent(rcx, parseLocation('@ecx', table))).toBe(false);
    expect(locationsEquivalent(parseLocation('[@rsp + 0x28]', table), parseLocation('[@rsp + 0x30]', table)))
      .toBe(false);
    expect(locationsEquivalent(parseLocation('+0x10', table), parseLocation('+0x10', table))).toBe(true);
  });
});
