/**
 * @file function.ts
 * @description Functions, their parameters and locals, and variable live ranges.
 *
 * A function occupies one or more disjoint ranges of the module. The first range is the
 * primary one: function relative offsets (live ranges, scopes) are measured from its start.
 */

import type { SymbolId, uintb } from '../core/types.js';
import { NO_SYMBOL } from '../core/types.js';
import { InvalidArgumentError, NotFoundError, UnexpectedError } from '../core/error.js';
import { BaseSymbol, SymbolKind, type HasType, type HasOffset } from './symbol.js';
import type { SymbolSet } from './symbolset.js';
import type { FunctionTypeSymbol } from './type.js';
import { type SymbolLocation, LocationKind, copyLocation, noLocation } from './location.js';

/** One range of code occupied by a function */
export interface AddressRange {
  offset: uintb;
  size: number;
}

/**
 * Where a variable lives over [offset, offset + size), relative to the function start.
 */
export interface LiveRange {
  id: number;
  offset: number;
  size: number;
  location: SymbolLocation;
}

/** A live range that has not been given an id yet */
export type LiveRangeSpec = Omit<LiveRange, 'id'>;

function copyLiveRange(range: LiveRange): LiveRange {
  return { id: range.id, offset: range.offset, size: range.size, location: copyLocation(range.location) };
}

// ---------------------------------------------------------------------------
// FunctionSymbol
// ---------------------------------------------------------------------------

export class FunctionSymbol extends BaseSymbol implements HasOffset {
  private addressRanges: AddressRange[] = [];
  private returnTypeId: SymbolId;
  private functionTypeId: SymbolId = NO_SYMBOL;

  constructor(symbolSet: SymbolSet, parentId: SymbolId, offset: uintb, size: number, returnTypeId: SymbolId,
              name: string, qualifiedName?: string) {
    symbolSet.getType(returnTypeId);
    FunctionSymbol.checkRange(offset, size);
    super(symbolSet, SymbolKind.Function, parentId, name, qualifiedName);
    this.returnTypeId = returnTypeId;
    this.baseInitialize();
    this.insertRange({ offset, size });
    this.recomputeDerived();
  }

  private static checkRange(offset: uintb, size: number): void {
    if (offset < 0n)
      throw new InvalidArgumentError(`Invalid function offset ${offset}`);
    if (!Number.isInteger(size) || size <= 0)
      throw new InvalidArgumentError(`Invalid function size ${size}`);
  }

  override asFunction(): FunctionSymbol { return this; }

  /** Module offset of the primary range */
  getOffset(): uintb { return this.addressRanges[0].offset; }

  getAddressRanges(): AddressRange[] {
    return this.addressRanges.map((r) => ({ offset: r.offset, size: r.size }));
  }

  override getLocation(): SymbolLocation {
    return { kind: LocationKind.ImageOffset, offset: this.getOffset() };
  }

  private insertRange(range: AddressRange): void {
    this.addressRanges.push(range);
    this.symbolSet.addSymbolRange(range.offset, range.offset + BigInt(range.size), this.id);
  }

  /**
   * Add another disjoint range of code to the function.
   */
  addAddressRange(offset: uintb, size: number): void {
    this.checkAlive();
    FunctionSymbol.checkRange(offset, size);
    const end = offset + BigInt(size);
    for (const r of this.addressRanges) {
      if (offset < r.offset + BigInt(r.size) && r.offset < end)
        throw new InvalidArgumentError(`Range 0x${offset.toString(16)}+0x${size.toString(16)} overlaps ${this.name}`);
    }
    this.insertRange({ offset, size });
    this.symbolSet.invalidateExternalCaches();
  }

  /** Function relative offset of a module offset */
  toRelativeOffset(moduleOffset: uintb): number {
    return Number(moduleOffset - this.getOffset());
  }

  toModuleOffset(relativeOffset: number): uintb {
    return this.getOffset() + BigInt(relativeOffset);
  }

  /**
   * Index of the address range wholly containing the relative span [offset, offset + size),
   * or -1 if no single range does.
   */
  findContainingRange(offset: number, size: number): number {
    const base = this.getOffset();
    for (let i = 0; i < this.addressRanges.length; ++i) {
      const r = this.addressRanges[i];
      const start = Number(r.offset - base);
      if (offset >= start && offset + size <= start + r.size) return i;
    }
    return -1;
  }

  getReturnTypeId(): SymbolId { return this.returnTypeId; }

  setReturnTypeId(typeId: SymbolId): void {
    this.checkAlive();
    if (typeId === this.returnTypeId) return;
    this.symbolSet.getType(typeId);
    this.returnTypeId = typeId;
    this.notifyDependentChange();
    this.symbolSet.invalidateExternalCaches();
  }

  getFunctionTypeId(): SymbolId { return this.functionTypeId; }

  getFunctionType(): FunctionTypeSymbol {
    return this.symbolSet.getFunctionType(this.functionTypeId);
  }

  private childVariables(kind: SymbolKind.Parameter | SymbolKind.Local): VariableSymbol[] {
    const result: VariableSymbol[] = [];
    for (const childId of this.children) {
      const variable = this.symbolSet.tryGetSymbol(childId)?.asVariable();
      if (variable === undefined)
        throw new UnexpectedError(`Function ${this.name} has missing child ${childId}`);
      if (variable.getKind() === kind) result.push(variable);
    }
    return result;
  }

  /** Parameters in declaration order */
  getParameters(): VariableSymbol[] {
    return this.childVariables(SymbolKind.Parameter);
  }

  getLocals(): VariableSymbol[] {
    return this.childVariables(SymbolKind.Local);
  }

  protected override recomputeDerived(): void {
    const paramTypes = this.getParameters().map((p) => p.getTypeId());
    const previous = this.functionTypeId;
    this.functionTypeId = this.symbolSet.acquireFunctionType(this.returnTypeId, paramTypes);
    if (previous !== NO_SYMBOL) this.symbolSet.releaseFunctionType(previous);
  }

  protected override releaseReferences(): void {
    this.symbolSet.releaseFunctionType(this.functionTypeId);
    this.functionTypeId = NO_SYMBOL;
    for (const r of this.addressRanges) {
      this.symbolSet.removeSymbolRange(r.offset, r.offset + BigInt(r.size), this.id);
    }
  }
}

// ---------------------------------------------------------------------------
// VariableSymbol
// ---------------------------------------------------------------------------

/**
 * A parameter or local of a function, with the live ranges over which it has a location.
 */
export class VariableSymbol extends BaseSymbol implements HasType {
  private typeId: SymbolId;
  private liveRanges: LiveRange[] = [];
  private nextRangeId = 1;

  constructor(symbolSet: SymbolSet, kind: SymbolKind.Parameter | SymbolKind.Local, parentId: SymbolId,
              typeId: SymbolId, name: string) {
    symbolSet.getFunction(parentId);
    symbolSet.getType(typeId);
    super(symbolSet, kind, parentId, name);
    this.typeId = typeId;
    this.baseInitialize();
    this.symbolSet.addDependentNotify(this.id, this.parentId);
  }

  override asVariable(): VariableSymbol { return this; }

  getTypeId(): SymbolId { return this.typeId; }

  getFunction(): FunctionSymbol {
    const fn = this.symbolSet.tryGetSymbol(this.parentId)?.asFunction();
    if (fn === undefined)
      throw new UnexpectedError(`Variable ${this.name} has lost its function`);
    return fn;
  }

  setTypeId(typeId: SymbolId): void {
    this.checkAlive();
    if (typeId === this.typeId) return;
    this.symbolSet.getType(typeId);
    this.typeId = typeId;
    this.notifyDependentChange();
    this.symbolSet.invalidateExternalCaches();
  }

  /**
   * Reorder among the function's parameters. Locals keep their order.
   */
  moveToBefore(position: number): void {
    this.checkAlive();
    if (this.kind !== SymbolKind.Parameter)
      throw new InvalidArgumentError(`Local ${this.name} cannot be reordered`);
    this.getFunction().moveChildBefore(this.id, position, SymbolKind.Parameter);
  }

  // -- live ranges --

  private findRangeIndex(rangeId: number): number {
    const idx = this.liveRanges.findIndex((r) => r.id === rangeId);
    if (idx < 0)
      throw new NotFoundError(`Variable ${this.name} has no live range ${rangeId}`);
    return idx;
  }

  /**
   * A live range must sit inside one range of the function and must not overlap any other
   * range of this variable.
   */
  private validateRange(offset: number, size: number, location: SymbolLocation, excludeId: number): void {
    if (!Number.isInteger(offset) || !Number.isInteger(size) || size <= 0)
      throw new InvalidArgumentError(`Invalid live range ${offset}+${size}`);
    switch (location.kind) {
      case LocationKind.Register:
      case LocationKind.RegisterRelative:
      case LocationKind.ImageOffset:
        break;
      default:
        throw new InvalidArgumentError(`A live range cannot have a location of kind ${LocationKind[location.kind]}`);
    }
    if (this.getFunction().findContainingRange(offset, size) < 0)
      throw new InvalidArgumentError(`Live range ${offset}+${size} is outside the bounds of the function`);
    for (const r of this.liveRanges) {
      if (r.id === excludeId) continue;
      if (offset < r.offset + r.size && r.offset < offset + size)
        throw new InvalidArgumentError(`Live range ${offset}+${size} overlaps live range ${r.id} of ${this.name}`);
    }
  }

  private rangesChanged(): void {
    this.liveRanges.sort((a, b) => a.offset - b.offset);
    this.symbolSet.invalidateExternalCaches();
  }

  /**
   * @returns the id of the new range
   */
  addLiveRange(offset: number, size: number, location: SymbolLocation): number {
    this.checkAlive();
    this.validateRange(offset, size, location, 0);
    const id = this.nextRangeId++;
    this.liveRanges.push({ id, offset, size, location: copyLocation(location) });
    this.rangesChanged();
    return id;
  }

  setLiveRangeOffset(rangeId: number, offset: number): void {
    this.checkAlive();
    const range = this.liveRanges[this.findRangeIndex(rangeId)];
    this.validateRange(offset, range.size, range.location, rangeId);
    range.offset = offset;
    this.rangesChanged();
  }

  setLiveRangeSize(rangeId: number, size: number): void {
    this.checkAlive();
    const range = this.liveRanges[this.findRangeIndex(rangeId)];
    this.validateRange(range.offset, size, range.location, rangeId);
    range.size = size;
    this.rangesChanged();
  }

  setLiveRangeLocation(rangeId: number, location: SymbolLocation): void {
    this.checkAlive();
    const range = this.liveRanges[this.findRangeIndex(rangeId)];
    this.validateRange(range.offset, range.size, location, rangeId);
    range.location = copyLocation(location);
    this.rangesChanged();
  }

  deleteLiveRange(rangeId: number): void {
    this.checkAlive();
    this.liveRanges.splice(this.findRangeIndex(rangeId), 1);
    this.rangesChanged();
  }

  /**
   * Replace every live range. If any new range is invalid the variable keeps its old ranges.
   * @returns the ids of the new ranges, in offset order
   */
  replaceLiveRanges(ranges: readonly LiveRangeSpec[]): number[] {
    this.checkAlive();
    const previous = this.liveRanges;
    const previousNextId = this.nextRangeId;
    this.liveRanges = [];
    try {
      for (const r of ranges) {
        this.validateRange(r.offset, r.size, r.location, 0);
        this.liveRanges.push({ id: this.nextRangeId++, offset: r.offset, size: r.size, location: copyLocation(r.location) });
      }
    } catch (err) {
      this.liveRanges = previous;
      this.nextRangeId = previousNextId;
      throw err;
    }
    this.rangesChanged();
    return this.liveRanges.map((r) => r.id);
  }

  deleteAllLiveRanges(): void {
    this.checkAlive();
    this.liveRanges.length = 0;
    this.rangesChanged();
  }

  /** Live ranges ordered by offset */
  getLiveRanges(): LiveRange[] {
    return this.liveRanges.map(copyLiveRange);
  }

  getLiveRange(rangeId: number): LiveRange {
    return copyLiveRange(this.liveRanges[this.findRangeIndex(rangeId)]);
  }

  /** The live range covering a function relative offset */
  findLiveRangeAt(offset: number): LiveRange | undefined {
    const range = this.liveRanges.find((r) => r.offset <= offset && offset < r.offset + r.size);
    return range === undefined ? undefined : copyLiveRange(range);
  }

  getLocationAt(offset: number): SymbolLocation {
    return this.findLiveRangeAt(offset)?.location ?? noLocation();
  }

  /**
   * The location independent of any scope. Only a variable whose single live range covers
   * the whole of a single range function has one.
   */
  override getLocation(): SymbolLocation {
    if (this.liveRanges.length !== 1) return noLocation();
    const ranges = this.getFunction().getAddressRanges();
    if (ranges.length !== 1) return noLocation();
    const range = this.liveRanges[0];
    if (range.offset !== 0 || range.size !== ranges[0].size) return noLocation();
    return copyLocation(range.location);
  }

  protected override releaseReferences(): void {
    this.symbolSet.removeDependentNotify(this.id, this.parentId);
  }
}
