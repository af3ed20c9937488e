/**
 * @file data.ts
 * @description Data symbols: UDT members (fields and base classes), enumerants, global
 * data and public symbols.
 */

import type { SymbolId, uintb } from '../core/types.js';
import { NO_SYMBOL } from '../core/types.js';
import { InvalidArgumentError, UnexpectedError } from '../core/error.js';
import { BaseSymbol, SymbolKind, type HasType, type HasOffset } from './symbol.js';
import type { SymbolSet } from './symbolset.js';
import {
  type BaseTypeSymbol,
  type LayoutMember,
  type LayoutEnumerant,
  BasicTypeSymbol,
  EnumTypeSymbol,
  TypeKind,
  unwindTypedefs,
} from './type.js';
import { type ConstantValue, packValue, zeroValue } from './value.js';
import { type SymbolLocation, type BitFieldPlacement, LocationKind } from './location.js';

/** Declared offset of a member placed by layout */
export const AUTOMATIC_OFFSET = -1;

/**
 * Can a member of this type be a bitfield: an ordinal intrinsic, seen through any typedefs.
 */
export function canBeBitField(symbolSet: SymbolSet, typeId: SymbolId): boolean {
  const ty = unwindTypedefs(symbolSet, typeId);
  return ty instanceof BasicTypeSymbol && ty.isOrdinal() && ty.getSize() > 0;
}

function validateBitField(symbolSet: SymbolSet, typeId: SymbolId, bitField: BitFieldPlacement): void {
  if (!canBeBitField(symbolSet, typeId))
    throw new InvalidArgumentError(`Type ${symbolSet.getType(typeId).getName()} cannot hold a bitfield`);
  const bits = symbolSet.getType(typeId).getSize() * 8;
  if (!Number.isInteger(bitField.length) || bitField.length <= 0)
    throw new InvalidArgumentError(`Invalid bitfield length ${bitField.length}`);
  if (!Number.isInteger(bitField.position) || bitField.position < 0 ||
      bitField.position + bitField.length > bits)
    throw new InvalidArgumentError(`Bitfield ${bitField.position}:${bitField.length} does not fit in ${bits} bits`);
}

function ownerOfKind(symbolSet: SymbolSet, parentId: SymbolId, kind: TypeKind, what: string): BaseTypeSymbol {
  const owner = symbolSet.getSymbol(parentId).asType();
  if (owner === undefined || owner.getTypeKind() !== kind)
    throw new InvalidArgumentError(`${what} must belong to a ${TypeKind[kind]} type`);
  return owner;
}

// ---------------------------------------------------------------------------
// MemberSymbol
// ---------------------------------------------------------------------------

/**
 * A field or base class of a UDT.
 *
 * The member depends on its type and the owning UDT depends on the member, so a size
 * change in the member type re-lays out the owner.
 */
export class MemberSymbol extends BaseSymbol implements LayoutMember, HasType, HasOffset {
  private typeId: SymbolId;
  private declaredOffset: number;
  private computedOffset = 0;
  private bitField: BitFieldPlacement | null;

  constructor(symbolSet: SymbolSet, kind: SymbolKind.Field | SymbolKind.BaseClass, parentId: SymbolId,
              typeId: SymbolId, offset: number, name: string, bitField?: BitFieldPlacement) {
    ownerOfKind(symbolSet, parentId, TypeKind.Udt, kind === SymbolKind.Field ? 'A field' : 'A base class');
    symbolSet.getType(typeId);
    if (offset !== AUTOMATIC_OFFSET && (!Number.isInteger(offset) || offset < 0))
      throw new InvalidArgumentError(`Invalid member offset ${offset}`);
    if (bitField !== undefined) validateBitField(symbolSet, typeId, bitField);

    super(symbolSet, kind, parentId, name);
    this.typeId = typeId;
    this.declaredOffset = offset;
    this.bitField = bitField === undefined ? null : { ...bitField };
    this.baseInitialize();
    this.symbolSet.addDependentNotify(this.typeId, this.id);
    this.symbolSet.addDependentNotify(this.id, this.parentId);
  }

  override asMember(): LayoutMember { return this; }

  getTypeId(): SymbolId { return this.typeId; }

  isAutomaticLayout(): boolean { return this.declaredOffset === AUTOMATIC_OFFSET; }

  getDeclaredOffset(): number { return this.declaredOffset; }

  setComputedOffset(offset: number): void { this.computedOffset = offset; }

  /** Offset within the owning type as of the last layout */
  getOffset(): number {
    return this.isAutomaticLayout() ? this.computedOffset : this.declaredOffset;
  }

  getBitField(): BitFieldPlacement | null {
    return this.bitField === null ? null : { ...this.bitField };
  }

  override getLocation(): SymbolLocation {
    if (this.bitField === null)
      return { kind: LocationKind.StructureRelative, offset: this.getOffset() };
    return { kind: LocationKind.StructureRelative, offset: this.getOffset(), bitField: { ...this.bitField } };
  }

  /** Re-lay out the owner and broadcast */
  private changed(): void {
    this.notifyDependentChange();
    this.symbolSet.invalidateExternalCaches();
  }

  /**
   * Set an explicit offset. Members under automatic layout must be switched to explicit
   * layout first.
   */
  setOffset(offset: number): void {
    this.checkAlive();
    if (this.isAutomaticLayout())
      throw new InvalidArgumentError(`Cannot set the offset of ${this.name}, which is automatic layout`);
    if (!Number.isInteger(offset) || offset < 0)
      throw new InvalidArgumentError(`Invalid member offset ${offset}`);
    this.declaredOffset = offset;
    this.changed();
  }

  /**
   * Switch between automatic and explicit layout. Going explicit pins the member at the
   * offset layout last gave it.
   */
  setAutomaticLayout(automatic: boolean): void {
    this.checkAlive();
    if (automatic === this.isAutomaticLayout()) return;
    this.declaredOffset = automatic ? AUTOMATIC_OFFSET : this.computedOffset;
    this.changed();
  }

  setTypeId(typeId: SymbolId): void {
    this.checkAlive();
    if (typeId === this.typeId) return;
    this.symbolSet.getType(typeId);
    if (this.bitField !== null) validateBitField(this.symbolSet, typeId, this.bitField);
    this.symbolSet.removeDependentNotify(this.typeId, this.id);
    this.typeId = typeId;
    this.symbolSet.addDependentNotify(this.typeId, this.id);
    this.changed();
  }

  setBitField(bitField: BitFieldPlacement | null): void {
    this.checkAlive();
    if (bitField !== null) validateBitField(this.symbolSet, this.typeId, bitField);
    this.bitField = bitField === null ? null : { ...bitField };
    this.changed();
  }

  protected override releaseReferences(): void {
    this.symbolSet.removeDependentNotify(this.typeId, this.id);
    this.symbolSet.removeDependentNotify(this.id, this.parentId);
  }
}

// ---------------------------------------------------------------------------
// EnumerantSymbol
// ---------------------------------------------------------------------------

/**
 * A named constant of an enum. A null declared value means "previous plus one".
 */
export class EnumerantSymbol extends BaseSymbol implements LayoutEnumerant {
  private declaredValue: ConstantValue | null;
  private computedValue: ConstantValue;

  constructor(symbolSet: SymbolSet, parentId: SymbolId, value: bigint | number | boolean | null, name: string) {
    const owner = ownerOfKind(symbolSet, parentId, TypeKind.Enum, 'An enumerant');
    if (!(owner instanceof EnumTypeSymbol))
      throw new UnexpectedError(`Enum ${owner.getName()} has an unexpected representation`);
    const packing = owner.getPacking();

    super(symbolSet, SymbolKind.Field, parentId, name);
    this.declaredValue = value === null ? null : packValue(packing, value);
    this.computedValue = this.declaredValue ?? zeroValue(packing);
    this.baseInitialize();
    this.symbolSet.addDependentNotify(this.id, this.parentId);
  }

  override asEnumerant(): LayoutEnumerant { return this; }

  isAutoIncrement(): boolean { return this.declaredValue === null; }

  getDeclaredValue(): ConstantValue | null {
    return this.declaredValue === null ? null : { ...this.declaredValue };
  }

  setComputedValue(value: ConstantValue): void {
    this.computedValue = { ...value };
  }

  getValue(): ConstantValue {
    return { ...(this.declaredValue ?? this.computedValue) };
  }

  /**
   * Give the enumerant an explicit value, or null to return it to auto-increment.
   */
  setValue(value: bigint | number | boolean | null): void {
    this.checkAlive();
    const owner = this.symbolSet.getSymbol(this.parentId).asType();
    if (!(owner instanceof EnumTypeSymbol))
      throw new UnexpectedError(`Enumerant ${this.name} has lost its enum`);
    this.declaredValue = value === null ? null : packValue(owner.getPacking(), value);
    this.notifyDependentChange();
    this.symbolSet.invalidateExternalCaches();
  }

  override getLocation(): SymbolLocation {
    return { kind: LocationKind.ConstantValue, value: this.getValue() };
  }

  protected override releaseReferences(): void {
    this.symbolSet.removeDependentNotify(this.id, this.parentId);
  }
}

// ---------------------------------------------------------------------------
// GlobalDataSymbol
// ---------------------------------------------------------------------------

/**
 * Data at a fixed module offset. Occupies [offset, offset + type size) in the address index
 * and follows size changes of its type.
 */
export class GlobalDataSymbol extends BaseSymbol implements HasType, HasOffset {
  private typeId: SymbolId;
  private offset: uintb;
  /** Extent currently registered in the address index */
  private registeredSize = 0;

  constructor(symbolSet: SymbolSet, parentId: SymbolId, offset: uintb, typeId: SymbolId,
              name: string, qualifiedName?: string) {
    symbolSet.getType(typeId);
    if (offset < 0n)
      throw new InvalidArgumentError(`Invalid data offset ${offset}`);
    super(symbolSet, SymbolKind.Data, parentId, name, qualifiedName);
    this.typeId = typeId;
    this.offset = offset;
    this.baseInitialize();
    this.registerRange();
    this.symbolSet.addDependentNotify(this.typeId, this.id);
  }

  getTypeId(): SymbolId { return this.typeId; }

  getOffset(): uintb { return this.offset; }

  override getLocation(): SymbolLocation {
    return { kind: LocationKind.ImageOffset, offset: this.offset };
  }

  private currentSize(): number {
    const ty = this.symbolSet.tryGetSymbol(this.typeId)?.asType();
    if (ty === undefined)
      throw new UnexpectedError(`Data ${this.name} refers to missing type ${this.typeId}`);
    return Math.max(ty.getSize(), 1);
  }

  private registerRange(): void {
    this.registeredSize = this.currentSize();
    this.symbolSet.addSymbolRange(this.offset, this.offset + BigInt(this.registeredSize), this.id);
  }

  private unregisterRange(): void {
    if (this.registeredSize === 0) return;
    this.symbolSet.removeSymbolRange(this.offset, this.offset + BigInt(this.registeredSize), this.id);
    this.registeredSize = 0;
  }

  protected override recomputeDerived(): void {
    if (this.currentSize() === this.registeredSize) return;
    this.unregisterRange();
    this.registerRange();
  }

  setOffset(offset: uintb): void {
    this.checkAlive();
    if (offset < 0n)
      throw new InvalidArgumentError(`Invalid data offset ${offset}`);
    this.unregisterRange();
    this.offset = offset;
    this.registerRange();
    this.notifyDependentChange();
    this.symbolSet.invalidateExternalCaches();
  }

  setTypeId(typeId: SymbolId): void {
    this.checkAlive();
    if (typeId === this.typeId) return;
    this.symbolSet.getType(typeId);
    this.symbolSet.removeDependentNotify(this.typeId, this.id);
    this.typeId = typeId;
    this.symbolSet.addDependentNotify(this.typeId, this.id);
    this.notifyDependentChange();
    this.symbolSet.invalidateExternalCaches();
  }

  protected override releaseReferences(): void {
    this.unregisterRange();
    this.symbolSet.removeDependentNotify(this.typeId, this.id);
  }
}

// ---------------------------------------------------------------------------
// PublicSymbol
// ---------------------------------------------------------------------------

/**
 * A name at a module offset with no type or extent.
 */
export class PublicSymbol extends BaseSymbol implements HasOffset {
  private offset: uintb;

  constructor(symbolSet: SymbolSet, offset: uintb, name: string, qualifiedName?: string) {
    if (offset < 0n)
      throw new InvalidArgumentError(`Invalid public offset ${offset}`);
    super(symbolSet, SymbolKind.Public, NO_SYMBOL, name, qualifiedName);
    this.offset = offset;
    this.baseInitialize();
    this.symbolSet.addPublicAddress(this.offset, this.id);
  }

  getOffset(): uintb { return this.offset; }

  override getLocation(): SymbolLocation {
    return { kind: LocationKind.ImageOffset, offset: this.offset };
  }

  protected override releaseReferences(): void {
    this.symbolSet.removePublicAddress(this.offset, this.id);
  }
}
