/**
 * @file function.test.ts
 * @description Tests for functions, variables, live ranges and scopes.
 */

import { describe, it, expect } from 'vitest';
import { NO_SYMBOL } from '../../src/core/types.js';
import { InvalidArgumentError, NotFoundError } from '../../src/core/error.js';
import { SymbolKind } from '../../src/symbols/symbol.js';
import type { SymbolSet } from '../../src/symbols/symbolset.js';
import { FunctionSymbol, VariableSymbol } from '../../src/symbols/function.js';
import { type SymbolLocation, LocationKind } from '../../src/symbols/location.js';
import type { RegisterContext } from '../../src/symbols/services.js';
import { MODULE_BASE, makeSymbolSet } from './support.js';

const CHAR = 3;
const INT = 9;
const DOUBLE = 16;

const RCX: SymbolLocation = { kind: LocationKind.Register, regId: 330, size: 8 };
const RSP_8: SymbolLocation = { kind: LocationKind.RegisterRelative, regId: 335, offset: 8, size: 8 };
const IMAGE_3000: SymbolLocation = { kind: LocationKind.ImageOffset, offset: 0x3000n };

function makeFunction(set: SymbolSet, name: string = 'compute', offset: bigint = 0x1000n, size: number = 0x40): FunctionSymbol {
  return new FunctionSymbol(set, NO_SYMBOL, offset, size, INT, name);
}

function param(set: SymbolSet, fn: FunctionSymbol, name: string, typeId: number = INT): VariableSymbol {
  return new VariableSymbol(set, SymbolKind.Parameter, fn.getId(), typeId, name);
}

function local(set: SymbolSet, fn: FunctionSymbol, name: string, typeId: number = INT): VariableSymbol {
  return new VariableSymbol(set, SymbolKind.Local, fn.getId(), typeId, name);
}

class FixedContext implements RegisterContext {
  private ip: bigint;
  private regs: Map<number, bigint>;

  constructor(ip: bigint, regs: [number, bigint][] = []) {
    this.ip = ip;
    this.regs = new Map(regs);
  }

  getInstructionPointer(): bigint { return this.ip; }

  getRegisterValue(regId: number): bigint | undefined { return this.regs.get(regId); }
}

// ---------------------------------------------------------------------------
// FunctionSymbol
// ---------------------------------------------------------------------------
describe('FunctionSymbol', () => {
  it('validates its range', () => {
    const set = makeSymbolSet();
    expect(() => makeFunction(set, 'f', 0x1000n, 0)).toThrow('Invalid function size 0');
    expect(() => makeFunction(set, 'f', -1n)).toThrow(InvalidArgumentError);
  });

  it('shares one function type between equal signatures', () => {
    const set = makeSymbolSet();
    const f1 = makeFunction(set, 'f1', 0x1000n);
    param(set, f1, 'a');
    param(set, f1, 'b', DOUBLE);
    const f2 = makeFunction(set, 'f2', 0x2000n);
    param(set, f2, 'x');
    param(set, f2, 'y', DOUBLE);
    expect(f2.getFunctionTypeId()).toBe(f1.getFunctionTypeId());
    expect(f1.getFunctionType().getParameterTypeIds()).toEqual([INT, DOUBLE]);

    f2.setReturnTypeId(CHAR);
    expect(f2.getFunctionTypeId()).not.toBe(f1.getFunctionTypeId());
    expect(f2.getFunctionType().getReturnTypeId()).toBe(CHAR);
  });

  it('deletes function types no function uses any more', () => {
    const set = makeSymbolSet();
    const unnamedTypes = (): number[] => [...set.enumerateGlobals()]
      .filter((s) => s.getKind() === SymbolKind.Type && s.getName() === '')
      .map((s) => s.getId());

    const fn = makeFunction(set);
    for (const name of ['a', 'b', 'c', 'd', 'e']) param(set, fn, name);
    expect(unnamedTypes()).toEqual([fn.getFunctionTypeId()]);
    expect(set.getFunctionTypeUserCount(fn.getFunctionTypeId())).toBe(1);

    const twin = makeFunction(set, 'twin', 0x2000n);
    expect(twin.getFunctionTypeId()).not.toBe(fn.getFunctionTypeId());
    expect(unnamedTypes().length).toBe(2);

    const shared = fn.getFunctionTypeId();
    fn.delete();
    expect(set.tryGetSymbol(shared)).toBeUndefined();
    expect(unnamedTypes()).toEqual([twin.getFunctionTypeId()]);
  });

  it('rebuilds its type when a parameter changes type', () => {
    const set = makeSymbolSet();
    const fn = makeFunction(set);
    const a = param(set, fn, 'a');
    a.setTypeId(DOUBLE);
    expect(fn.getFunctionType().getParameterTypeIds()).toEqual([DOUBLE]);
    local(set, fn, 'tmp', CHAR);
    expect(fn.getFunctionType().getParameterTypeIds()).toEqual([DOUBLE]);
  });

  it('adds disjoint address ranges', () => {
    const set = makeSymbolSet();
    const fn = makeFunction(set);
    fn.addAddressRange(0x2000n, 0x20);
    expect(fn.getAddressRanges()).toEqual([{ offset: 0x1000n, size: 0x40 }, { offset: 0x2000n, size: 0x20 }]);
    expect(() => fn.addAddressRange(0x1030n, 0x20)).toThrow(InvalidArgumentError);

    const hit = set.findSymbolByOffset(0x2010n);
    expect(hit.symbol.getId()).toBe(fn.getId());
    expect(hit.residual).toBe(0x1010n);
    expect(fn.toRelativeOffset(0x2010n)).toBe(0x1010);
    expect(fn.toModuleOffset(0x1010)).toBe(0x2010n);
  });

  it('unregisters its ranges and children on delete', () => {
    const set = makeSymbolSet();
    const fn = makeFunction(set);
    fn.addAddressRange(0x2000n, 0x20);
    const a = param(set, fn, 'a');
    fn.delete();
    expect(a.isDeleted()).toBe(true);
    expect(() => set.findSymbolByOffset(0x1000n)).toThrow(NotFoundError);
    expect(() => set.findSymbolByOffset(0x2000n)).toThrow(NotFoundError);
    expect(() => a.addLiveRange(0, 4, RCX)).toThrow(NotFoundError);
  });
});

// ---------------------------------------------------------------------------
// Parameter order
// ---------------------------------------------------------------------------
describe('parameter order', () => {
  it('moves parameters among parameters only', () => {
    const set = makeSymbolSet();
    const fn = makeFunction(set);
    const a = param(set, fn, 'a');
    const l = local(set, fn, 'l');
    param(set, fn, 'b', DOUBLE);
    const c = param(set, fn, 'c', CHAR);

    c.moveToBefore(0);
    expect(fn.getParameters().map((p) => p.getName())).toEqual(['c', 'a', 'b']);
    expect(fn.getFunctionType().getParameterTypeIds()).toEqual([CHAR, INT, DOUBLE]);

    a.moveToBefore(3);
    expect(fn.getParameters().map((p) => p.getName())).toEqual(['c', 'b', 'a']);
    expect(fn.getChildPosition(a.getId())).toBe(3);
    expect(fn.getChildPosition(a.getId(), SymbolKind.Parameter)).toBe(2);

    expect(() => a.moveToBefore(5)).toThrow('Child position 5 out of range');
    expect(() => l.moveToBefore(0)).toThrow('Local l cannot be reordered');
    expect(fn.getLocals().map((v) => v.getName())).toEqual(['l']);
  });

  it('only attaches variables to functions', () => {
    const set = makeSymbolSet();
    expect(() => new VariableSymbol(set, SymbolKind.Parameter, INT, INT, 'p')).toThrow(`Symbol ${INT} is not a function`);
  });
});

// ---------------------------------------------------------------------------
// Live ranges
// ---------------------------------------------------------------------------
describe('live ranges', () => {
  it('are kept in offset order with per-variable ids', () => {
    const set = makeSymbolSet();
    const fn = makeFunction(set);
    const a = param(set, fn, 'a');
    expect(a.addLiveRange(0x10, 0x30, RSP_8)).toBe(1);
    expect(a.addLiveRange(0, 0x10, RCX)).toBe(2);
    expect(a.getLiveRanges().map((r) => [r.id, r.offset, r.size])).toEqual([[2, 0, 0x10], [1, 0x10, 0x30]]);
    expect(a.getLocationAt(0x20)).toEqual(RSP_8);
    expect(a.getLocationAt(0x40)).toEqual({ kind: LocationKind.None });
    expect(a.findLiveRangeAt(0xf)?.id).toBe(2);
  });

  it('reject spans outside the function or over another range', () => {
    const set = makeSymbolSet();
    const fn = makeFunction(set);
    const a = param(set, fn, 'a');
    a.addLiveRange(0, 0x10, RCX);
    expect(() => a.addLiveRange(0x8, 0x10, RSP_8)).toThrow('Live range 8+16 overlaps live range 1 of a');
    expect(() => a.addLiveRange(0x38, 0x10, RSP_8)).toThrow('Live range 56+16 is outside the bounds of the function');
    expect(() => a.addLiveRange(-4, 4, RSP_8)).toThrow(InvalidArgumentError);
    expect(() => a.addLiveRange(0x20, 0, RSP_8)).toThrow('Invalid live range 32+0');
  });

  it('reject locations a variable cannot live in', () => {
    const set = makeSymbolSet();
    const a = param(set, makeFunction(set), 'a');
    expect(() => a.addLiveRange(0, 4, { kind: LocationKind.None }))
      .toThrow('A live range cannot have a location of kind None');
    expect(() => a.addLiveRange(0, 4, { kind: LocationKind.StructureRelative, offset: 0 }))
      .toThrow('A live range cannot have a location of kind StructureRelative');
    expect(a.addLiveRange(0, 4, IMAGE_3000)).toBe(1);
  });

  it('are edited in place', () => {
    const set = makeSymbolSet();
    const a = param(set, makeFunction(set), 'a');
    const r1 = a.addLiveRange(0, 0x10, RCX);
    const r2 = a.addLiveRange(0x10, 0x10, RSP_8);
    expect(() => a.setLiveRangeSize(r1, 0x20)).toThrow(InvalidArgumentError);
    a.setLiveRangeSize(r1, 0x8);
    a.setLiveRangeOffset(r1, 0x4);
    a.setLiveRangeLocation(r2, IMAGE_3000);
    expect(a.getLiveRange(r1)).toEqual({ id: r1, offset: 4, size: 8, location: RCX });
    expect(a.getLiveRange(r2).location).toEqual(IMAGE_3000);

    a.deleteLiveRange(r1);
    expect(() => a.deleteLiveRange(r1)).toThrow('Variable a has no live range 1');
    expect(a.addLiveRange(0, 4, RCX)).toBe(3);
    a.deleteAllLiveRanges();
    expect(a.getLiveRanges()).toEqual([]);
  });

  it('are replaced all at once or not at all', () => {
    const set = makeSymbolSet();
    const a = param(set, makeFunction(set), 'a');
    a.addLiveRange(0, 0x10, RCX);

    expect(() => a.replaceLiveRanges([
      { offset: 0x10, size: 0x10, location: RSP_8 },
      { offset: 0x18, size: 0x10, location: RCX },
    ])).toThrow('Live range 24+16 overlaps live range 2 of a');
    expect(a.getLiveRanges()).toEqual([{ id: 1, offset: 0, size: 0x10, location: RCX }]);

    expect(a.replaceLiveRanges([
      { offset: 0x20, size: 0x20, location: RSP_8 },
      { offset: 0, size: 0x20, location: RCX },
    ])).toEqual([3, 2]);
    expect(a.getLiveRanges().map((r) => [r.id, r.offset])).toEqual([[3, 0], [2, 0x20]]);
  });

  it('may sit in any one range of the function', () => {
    const set = makeSymbolSet();
    const fn = makeFunction(set);
    fn.addAddressRange(0x2000n, 0x20);
    fn.addAddressRange(0x800n, 0x10);
    const a = param(set, fn, 'a');
    expect(a.addLiveRange(0x1000, 0x20, RCX)).toBe(1);
    expect(a.addLiveRange(-0x800, 0x10, RCX)).toBe(2);
    expect(() => a.addLiveRange(0x30, 0x1000, RCX)).toThrow(InvalidArgumentError);
  });

  it('give an unbound location only when one range covers the function', () => {
    const set = makeSymbolSet();
    const fn = makeFunction(set);
    const a = param(set, fn, 'a');
    expect(a.getLocation()).toEqual({ kind: LocationKind.None });
    const r = a.addLiveRange(0, 0x40, RCX);
    expect(a.getLocation()).toEqual(RCX);

    a.setLiveRangeSize(r, 0x20);
    expect(a.getLocation()).toEqual({ kind: LocationKind.None });
    a.setLiveRangeSize(r, 0x40);
    fn.addAddressRange(0x2000n, 0x10);
    expect(a.getLocation()).toEqual({ kind: LocationKind.None });
  });

  it('hand out copies', () => {
    const set = makeSymbolSet();
    const a = param(set, makeFunction(set), 'a');
    a.addLiveRange(0, 0x10, RSP_8);
    const copy = a.getLiveRanges()[0];
    copy.offset = 0x30;
    expect(a.getLiveRanges()[0].offset).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Scope
// ---------------------------------------------------------------------------
describe('Scope', () => {
  function setup(): { set: SymbolSet; fn: FunctionSymbol; a: VariableSymbol; b: VariableSymbol; t: VariableSymbol } {
    const set = makeSymbolSet();
    const fn = makeFunction(set);
    const a = param(set, fn, 'a');
    const b = param(set, fn, 'b');
    const t = local(set, fn, 't');
    a.addLiveRange(0, 0x10, RCX);
    a.addLiveRange(0x10, 0x30, RSP_8);
    b.addLiveRange(0, 0x8, RCX);
    t.addLiveRange(0x8, 0x38, IMAGE_3000);
    return { set, fn, a, b, t };
  }

  it('binds the variables live at an offset', () => {
    const { set } = setup();
    const scope = set.findScopeByOffset(0x1004n);
    expect(scope.getOffset()).toBe(4);
    expect([...scope.enumerateVariables()].map((v) => [v.name, v.liveRangeId])).toEqual([['a', 1], ['b', 1]]);

    const later = set.findScopeByOffset(0x1020n);
    expect([...later.enumerateVariables()].map((v) => v.name)).toEqual(['a', 't']);
    expect([...later.enumerateVariables(SymbolKind.Local)].map((v) => v.name)).toEqual(['t']);
    expect(later.findVariableByName('a')?.location).toEqual(RSP_8);
    expect(later.findVariableByName('b')).toBeUndefined();
  });

  it('never shares location storage between scopes', () => {
    const { set } = setup();
    const first = set.findScopeByOffset(0x1020n).findVariableByName('a');
    const second = set.findScopeByOffset(0x1020n).findVariableByName('a');
    expect(first?.location).toEqual(second?.location);
    expect(first?.location).not.toBe(second?.location);
  });

  it('resolves memory addresses', () => {
    const { set } = setup();
    const ctx = new FixedContext(MODULE_BASE + 0x1020n, [[335, 0x7ff000n]]);
    const scope = set.findScopeByContext(ctx);
    expect(scope.getOffset()).toBe(0x20);
    const a = scope.findVariableByName('a');
    const t = scope.findVariableByName('t');
    if (a === undefined || t === undefined) throw new Error('variables are not live');
    expect(scope.resolveAddress(a)).toBe(0x7ff008n);
    expect(scope.resolveAddress(t)).toBe(MODULE_BASE + 0x3000n);

    const early = set.findScopeByContext(new FixedContext(MODULE_BASE + 0x1004n)).findVariableByName('a');
    if (early === undefined) throw new Error('a is not live');
    expect(() => scope.resolveAddress(early)).toThrow('Variable a is not in memory');
  });

  it('needs a context for register relative locations', () => {
    const { set } = setup();
    const bare = set.findScopeByOffset(0x1020n);
    const a = bare.findVariableByName('a');
    if (a === undefined) throw new Error('a is not live');
    expect(() => bare.resolveAddress(a)).toThrow(InvalidArgumentError);

    const empty = set.findScopeByContext(new FixedContext(MODULE_BASE + 0x1020n));
    expect(() => empty.resolveAddress(a)).toThrow('Register 335 is not available in the context');
  });

  it('reports addresses outside every function', () => {
    const { set } = setup();
    expect(() => set.findScopeByOffset(0x5000n)).toThrow('No function at offset 0x5000');
    expect(() => set.findScopeByContext(new FixedContext(0x1000n))).toThrow(NotFoundError);
  });
});
