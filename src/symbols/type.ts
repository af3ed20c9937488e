/**
 * @file type.ts
 * @description Type symbols and their layout.
 *
 * Every type carries a computed size and alignment. Types derived from other types
 * (arrays, typedefs, enums, UDTs) register as dependents of what they are built from and
 * recompute when notified, so a change to a leaf type ripples up through every type that
 * contains it.
 */

import type { SymbolId } from '../core/types.js';
import { NO_SYMBOL, calcAlignSize } from '../core/types.js';
import { InvalidArgumentError, UnexpectedError } from '../core/error.js';
import { BaseSymbol, SymbolKind } from './symbol.js';
import type { SymbolSet } from './symbolset.js';
import {
  type ConstantValue,
  ValuePacking,
  packingForSize,
  zeroValue,
  incrementValue,
} from './value.js';

export enum TypeKind {
  Intrinsic,
  Pointer,
  Array,
  Typedef,
  Enum,
  Udt,
  Function,
}

export enum IntrinsicKind {
  Void,
  Bool,
  Char,
  WChar,
  Int,
  UInt,
  Long,
  ULong,
  Float,
  HResult,
  Char16,
  Char32,
}

export enum PointerKind {
  Standard,
  Reference,
  RValueReference,
  CXHat,
}

/** Textual suffix for each pointer flavor */
export const POINTER_SUFFIX: Record<PointerKind, string> = {
  [PointerKind.Standard]: '*',
  [PointerKind.Reference]: '&',
  [PointerKind.RValueReference]: '&&',
  [PointerKind.CXHat]: '^',
};

// ---------------------------------------------------------------------------
// Capabilities of children that participate in layout
// ---------------------------------------------------------------------------

/**
 * A field or base class placed by UDT layout.
 */
export interface LayoutMember {
  getTypeId(): SymbolId;
  isAutomaticLayout(): boolean;
  /** The explicit offset, meaningful only when not automatic */
  getDeclaredOffset(): number;
  setComputedOffset(offset: number): void;
}

/**
 * An enumerant valued by enum layout.
 */
export interface LayoutEnumerant {
  /** True when the value is the previous enumerant plus one */
  isAutoIncrement(): boolean;
  getDeclaredValue(): ConstantValue | null;
  setComputedValue(value: ConstantValue): void;
}

// ---------------------------------------------------------------------------
// BaseTypeSymbol
// ---------------------------------------------------------------------------

export abstract class BaseTypeSymbol extends BaseSymbol {
  protected typeSize = 0;
  protected typeAlignment = 1;

  constructor(symbolSet: SymbolSet, parentId: SymbolId, name: string, qualifiedName?: string) {
    super(symbolSet, SymbolKind.Type, parentId, name, qualifiedName);
  }

  abstract getTypeKind(): TypeKind;

  /** Size in bytes as of the last layout */
  getSize(): number { return this.typeSize; }

  getAlignment(): number { return this.typeAlignment; }

  override asType(): BaseTypeSymbol { return this; }

  /** One line summary for diagnostics */
  describe(): string {
    const label = this.qualifiedName.length > 0 ? this.qualifiedName : `<${TypeKind[this.getTypeKind()]}>`;
    return `${label} (${TypeKind[this.getTypeKind()]}, size ${this.typeSize}, align ${this.typeAlignment})`;
  }

  /**
   * Resolve a type this type is built from. A missing or non-type id here means the graph
   * points at a deleted symbol.
   */
  protected resolveRelatedType(typeId: SymbolId): BaseTypeSymbol {
    const ty = this.symbolSet.tryGetSymbol(typeId)?.asType();
    if (ty === undefined)
      throw new UnexpectedError(`Type ${this.name} refers to missing type ${typeId}`);
    return ty;
  }
}

// ---------------------------------------------------------------------------
// Basic
// ---------------------------------------------------------------------------

export class BasicTypeSymbol extends BaseTypeSymbol {
  private intrinsicKind: IntrinsicKind;

  constructor(symbolSet: SymbolSet, intrinsicKind: IntrinsicKind, size: number, name: string) {
    super(symbolSet, NO_SYMBOL, name);
    this.intrinsicKind = intrinsicKind;
    this.typeSize = size;
    this.typeAlignment = Math.max(size, 1);
    this.baseInitialize();
  }

  getTypeKind(): TypeKind { return TypeKind.Intrinsic; }

  getIntrinsicKind(): IntrinsicKind { return this.intrinsicKind; }

  /** Integral kinds that can back an enum or a bitfield */
  isOrdinal(): boolean {
    return this.intrinsicKind !== IntrinsicKind.Void && this.intrinsicKind !== IntrinsicKind.Float;
  }
}

// ---------------------------------------------------------------------------
// Pointer
// ---------------------------------------------------------------------------

export class PointerTypeSymbol extends BaseTypeSymbol {
  private pointedToId: SymbolId;
  private pointerKind: PointerKind;

  constructor(symbolSet: SymbolSet, pointedToId: SymbolId, pointerKind: PointerKind, name?: string) {
    const target = symbolSet.getType(pointedToId);
    super(symbolSet, NO_SYMBOL, name ?? target.getQualifiedName() + POINTER_SUFFIX[pointerKind]);
    this.pointedToId = pointedToId;
    this.pointerKind = pointerKind;
    this.typeSize = symbolSet.getPointerSize();
    this.typeAlignment = this.typeSize;
    this.baseInitialize();
  }

  getTypeKind(): TypeKind { return TypeKind.Pointer; }

  getPointedToTypeId(): SymbolId { return this.pointedToId; }

  getPointerKind(): PointerKind { return this.pointerKind; }
}

// ---------------------------------------------------------------------------
// Array
// ---------------------------------------------------------------------------

export class ArrayTypeSymbol extends BaseTypeSymbol {
  private elementTypeId: SymbolId;
  private count: number;
  private elementSize = 0;

  constructor(symbolSet: SymbolSet, elementTypeId: SymbolId, count: number, name?: string) {
    const element = symbolSet.getType(elementTypeId);
    if (!Number.isInteger(count) || count < 0)
      throw new InvalidArgumentError(`Invalid array dimension ${count}`);
    super(symbolSet, NO_SYMBOL, name ?? `${element.getQualifiedName()}[${count}]`);
    this.elementTypeId = elementTypeId;
    this.count = count;
    this.recomputeDerived();
    this.baseInitialize();
    this.symbolSet.addDependentNotify(this.elementTypeId, this.id);
  }

  getTypeKind(): TypeKind { return TypeKind.Array; }

  getElementTypeId(): SymbolId { return this.elementTypeId; }

  getCount(): number { return this.count; }

  /** Element size as of the last recompute */
  getElementSize(): number { return this.elementSize; }

  protected override recomputeDerived(): void {
    const element = this.resolveRelatedType(this.elementTypeId);
    this.elementSize = element.getSize();
    this.typeSize = this.elementSize * this.count;
    this.typeAlignment = element.getAlignment();
  }

  protected override releaseReferences(): void {
    this.symbolSet.removeDependentNotify(this.elementTypeId, this.id);
  }
}

// ---------------------------------------------------------------------------
// Typedef
// ---------------------------------------------------------------------------

export class TypedefTypeSymbol extends BaseTypeSymbol {
  private typedefOfId: SymbolId;

  constructor(symbolSet: SymbolSet, parentId: SymbolId, typedefOfId: SymbolId, name: string, qualifiedName?: string) {
    symbolSet.getType(typedefOfId);
    super(symbolSet, parentId, name, qualifiedName);
    this.typedefOfId = typedefOfId;
    this.recomputeDerived();
    this.baseInitialize();
    this.symbolSet.addDependentNotify(this.typedefOfId, this.id);
  }

  getTypeKind(): TypeKind { return TypeKind.Typedef; }

  getTypedefOfId(): SymbolId { return this.typedefOfId; }

  /** Point the typedef at a different type */
  setTypedefOfId(typeId: SymbolId): void {
    this.checkAlive();
    if (typeId === this.typedefOfId) return;
    this.symbolSet.getType(typeId);
    this.symbolSet.removeDependentNotify(this.typedefOfId, this.id);
    this.typedefOfId = typeId;
    this.symbolSet.addDependentNotify(this.typedefOfId, this.id);
    this.notifyDependentChange();
    this.symbolSet.invalidateExternalCaches();
  }

  protected override recomputeDerived(): void {
    const target = this.resolveRelatedType(this.typedefOfId);
    this.typeSize = target.getSize();
    this.typeAlignment = target.getAlignment();
  }

  protected override releaseReferences(): void {
    this.symbolSet.removeDependentNotify(this.typedefOfId, this.id);
  }
}

/**
 * Follow typedefs to the type they ultimately name.
 */
export function unwindTypedefs(symbolSet: SymbolSet, typeId: SymbolId): BaseTypeSymbol {
  let ty = symbolSet.getType(typeId);
  const seen = new Set<SymbolId>();
  while (ty instanceof TypedefTypeSymbol && !seen.has(ty.getId())) {
    seen.add(ty.getId());
    ty = symbolSet.getType(ty.getTypedefOfId());
  }
  return ty;
}

// ---------------------------------------------------------------------------
// Enum
// ---------------------------------------------------------------------------

export class EnumTypeSymbol extends BaseTypeSymbol {
  private baseTypeId: SymbolId;
  private packing: ValuePacking;

  constructor(symbolSet: SymbolSet, parentId: SymbolId, baseTypeId: SymbolId, name: string, qualifiedName?: string) {
    const base = symbolSet.getType(baseTypeId);
    const packing = EnumTypeSymbol.packingForBase(base);
    super(symbolSet, parentId, name, qualifiedName);
    this.baseTypeId = baseTypeId;
    this.packing = packing;
    this.typeSize = base.getSize();
    this.typeAlignment = base.getAlignment();
    this.baseInitialize();
  }

  /**
   * The value representation for an enum over 'base'. Only ordinal intrinsics qualify.
   */
  static packingForBase(base: BaseTypeSymbol): ValuePacking {
    if (!(base instanceof BasicTypeSymbol))
      throw new InvalidArgumentError(`Enum base type ${base.getName()} is not an intrinsic`);
    switch (base.getIntrinsicKind()) {
      case IntrinsicKind.Bool:
        return ValuePacking.Bool;
      case IntrinsicKind.Char:
      case IntrinsicKind.Int:
      case IntrinsicKind.Long:
        return packingForSize(base.getSize(), true);
      case IntrinsicKind.WChar:
      case IntrinsicKind.UInt:
      case IntrinsicKind.ULong:
        return packingForSize(base.getSize(), false);
      default:
        throw new InvalidArgumentError(`Enum base type ${base.getName()} is not ordinal`);
    }
  }

  getTypeKind(): TypeKind { return TypeKind.Enum; }

  getBaseTypeId(): SymbolId { return this.baseTypeId; }

  getPacking(): ValuePacking { return this.packing; }

  protected override recomputeDerived(): void {
    this.layoutEnum();
  }

  /**
   * Assign values to automatic enumerants: the previous value plus one, starting at zero.
   * An explicit value restarts the count.
   */
  layoutEnum(): void {
    let cur = zeroValue(this.packing);
    let foundFirst = false;
    for (const childId of this.children) {
      const child = this.symbolSet.tryGetSymbol(childId);
      if (child === undefined)
        throw new UnexpectedError(`Enum ${this.name} has missing enumerant ${childId}`);
      if (child.getKind() !== SymbolKind.Field) continue;
      const enumerant = child.asEnumerant();
      if (enumerant === undefined) continue;

      const declared = enumerant.getDeclaredValue();
      if (enumerant.isAutoIncrement() || declared === null) {
        if (foundFirst) cur = incrementValue(cur);
        enumerant.setComputedValue(cur);
      } else {
        cur = declared;
      }
      foundFirst = true;
    }
  }
}

// ---------------------------------------------------------------------------
// UDT
// ---------------------------------------------------------------------------

export class UdtTypeSymbol extends BaseTypeSymbol {
  constructor(symbolSet: SymbolSet, parentId: SymbolId, name: string, qualifiedName?: string) {
    super(symbolSet, parentId, name, qualifiedName);
    this.baseInitialize();
  }

  getTypeKind(): TypeKind { return TypeKind.Udt; }

  protected override recomputeDerived(): void {
    this.layoutType();
  }

  /**
   * Place base classes, then fields, in declaration order. Automatic members go at the
   * running cursor rounded up to their alignment; explicit members go exactly where they
   * say. The size is the furthest member end rounded up to the largest alignment.
   */
  layoutType(): void {
    let typeSize = 0;
    let curOffset = 0;
    let maxAlignment = 1;

    const passKinds = [SymbolKind.BaseClass, SymbolKind.Field];
    for (const passKind of passKinds) {
      for (const childId of this.children) {
        const child = this.symbolSet.tryGetSymbol(childId);
        if (child === undefined)
          throw new UnexpectedError(`Type ${this.name} has missing member ${childId}`);
        if (child.getKind() !== passKind) continue;
        const member = child.asMember();
        if (member === undefined) continue;

        const memberType = this.symbolSet.tryGetSymbol(member.getTypeId())?.asType();
        if (memberType === undefined)
          throw new UnexpectedError(`Member ${child.getName()} of ${this.name} has missing type ${member.getTypeId()}`);

        const align = Math.max(memberType.getAlignment(), 1);
        if (align > maxAlignment) maxAlignment = align;

        let offset: number;
        if (member.isAutomaticLayout()) {
          offset = calcAlignSize(curOffset, align);
          member.setComputedOffset(offset);
        } else {
          offset = member.getDeclaredOffset();
        }

        curOffset = offset + memberType.getSize();
        if (typeSize < curOffset) typeSize = curOffset;
      }
    }

    this.typeAlignment = maxAlignment;
    this.typeSize = calcAlignSize(typeSize, maxAlignment);
  }
}

// ---------------------------------------------------------------------------
// Function type
// ---------------------------------------------------------------------------

/**
 * The structural type of a function: return type and ordered parameter types.
 * Instances are shared between functions with the same signature.
 */
export class FunctionTypeSymbol extends BaseTypeSymbol {
  private returnTypeId: SymbolId;
  private paramTypeIds: SymbolId[];

  constructor(symbolSet: SymbolSet, returnTypeId: SymbolId, paramTypeIds: SymbolId[]) {
    super(symbolSet, NO_SYMBOL, '');
    this.returnTypeId = returnTypeId;
    this.paramTypeIds = [...paramTypeIds];
    this.baseInitialize();
  }

  getTypeKind(): TypeKind { return TypeKind.Function; }

  getReturnTypeId(): SymbolId { return this.returnTypeId; }

  getParameterTypeIds(): SymbolId[] { return [...this.paramTypeIds]; }

  /** Cache key for a signature */
  static signatureKey(returnTypeId: SymbolId, paramTypeIds: readonly SymbolId[]): string {
    return `${returnTypeId}(${paramTypeIds.join(',')})`;
  }
}
