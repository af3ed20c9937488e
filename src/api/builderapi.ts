/**
 * @file builderapi.ts
 * @description The public operations over one module's symbol set.
 *
 * Every operation runs through guard(): it returns an Outcome holding either plain data
 * (snapshots, ids) or a Fault. Nothing thrown inside the library reaches the caller, and no
 * live symbol object is handed out.
 */

import type { SymbolId, uintb } from '../core/types.js';
import { NO_SYMBOL } from '../core/types.js';
import { type Outcome, InvalidArgumentError, guard } from '../core/error.js';
import { type BaseSymbol, SymbolKind, symbolKindName } from '../symbols/symbol.js';
import type { SymbolSet } from '../symbols/symbolset.js';
import {
  type PointerKind,
  ArrayTypeSymbol,
  BaseTypeSymbol,
  EnumTypeSymbol,
  PointerTypeSymbol,
  TypeKind,
  TypedefTypeSymbol,
  UdtTypeSymbol,
} from '../symbols/type.js';
import {
  AUTOMATIC_OFFSET,
  EnumerantSymbol,
  GlobalDataSymbol,
  MemberSymbol,
  PublicSymbol,
} from '../symbols/data.js';
import { FunctionSymbol, VariableSymbol } from '../symbols/function.js';
import { type BitFieldPlacement, type SymbolLocation, LocationKind } from '../symbols/location.js';
import { valueToString } from '../symbols/value.js';
import type { BoundVariable, Scope } from '../symbols/scope.js';
import type { RegisterContext, SymbolEventSink } from '../symbols/services.js';
import type { SymbolImporter } from '../symbols/importer.js';
import type { SymbolBuilderManager } from './manager.js';

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

/**
 * The state of a symbol at the time it was read.
 */
export interface SymbolSnapshot {
  id: SymbolId;
  kind: string;
  name: string;
  qualifiedName: string;
  parentId: SymbolId;
  children: SymbolId[];
  /** Textual location; empty if none */
  location: string;
  /** Types: the type kind, size and alignment */
  typeKind?: string;
  size?: number;
  alignment?: number;
  /** Members, data, variables, typedefs, pointers, arrays, enums: the referenced type */
  typeId?: SymbolId;
  /** Members: offset within the owner */
  offset?: number;
  isAutomaticLayout?: boolean;
  /** Data, functions, publics */
  moduleOffset?: uintb;
  /** Enumerants */
  value?: string;
}

export interface LiveRangeSnapshot {
  id: number;
  offset: number;
  size: number;
  location: string;
}

export interface OffsetSnapshot {
  symbol: SymbolSnapshot;
  residual: uintb;
}

export interface BoundVariableSnapshot {
  id: SymbolId;
  kind: string;
  name: string;
  typeId: SymbolId;
  location: string;
  liveRangeId: number;
}

export interface FieldOptions {
  /** Explicit offset; automatic layout when omitted */
  offset?: number;
  bitField?: BitFieldPlacement;
}

export interface ParameterDeclaration {
  name: string;
  typeName: string;
}

type SymbolClass<T extends BaseSymbol> = abstract new (...args: never[]) => T;

function inMemory(loc: SymbolLocation): boolean {
  return loc.kind === LocationKind.RegisterRelative || loc.kind === LocationKind.ImageOffset;
}

// ---------------------------------------------------------------------------
// SymbolBuilderApi
// ---------------------------------------------------------------------------

export class SymbolBuilderApi {
  private manager: SymbolBuilderManager;
  private symbolSet: SymbolSet;

  constructor(manager: SymbolBuilderManager, symbolSet: SymbolSet) {
    this.manager = manager;
    this.symbolSet = symbolSet;
  }

  getSymbolSet(): SymbolSet { return this.symbolSet; }

  // -- helpers --

  private expect<T extends BaseSymbol>(id: SymbolId, cls: SymbolClass<T>, what: string): T {
    const symbol = this.symbolSet.getSymbol(id);
    if (!(symbol instanceof cls))
      throw new InvalidArgumentError(`Symbol ${id} is not ${what}`);
    return symbol;
  }

  private typeId(typeName: string): SymbolId {
    return this.symbolSet.findTypeByName(typeName).getId();
  }

  private parseLocation(text: string): SymbolLocation {
    return this.manager.parseLocation(text);
  }

  /** Capture the current state of a symbol */
  snapshot(symbol: BaseSymbol): SymbolSnapshot {
    const snap: SymbolSnapshot = {
      id: symbol.getId(),
      kind: symbolKindName(symbol.getKind()),
      name: symbol.getName(),
      qualifiedName: symbol.getQualifiedName(),
      parentId: symbol.getParentId(),
      children: symbol.getChildren(),
      location: this.manager.locationToString(symbol.getLocation()),
    };

    if (symbol instanceof BaseTypeSymbol) {
      snap.typeKind = TypeKind[symbol.getTypeKind()];
      snap.size = symbol.getSize();
      snap.alignment = symbol.getAlignment();
      if (symbol instanceof PointerTypeSymbol) snap.typeId = symbol.getPointedToTypeId();
      else if (symbol instanceof ArrayTypeSymbol) snap.typeId = symbol.getElementTypeId();
      else if (symbol instanceof TypedefTypeSymbol) snap.typeId = symbol.getTypedefOfId();
      else if (symbol instanceof EnumTypeSymbol) snap.typeId = symbol.getBaseTypeId();
    } else if (symbol instanceof MemberSymbol) {
      snap.typeId = symbol.getTypeId();
      snap.offset = symbol.getOffset();
      snap.isAutomaticLayout = symbol.isAutomaticLayout();
    } else if (symbol instanceof EnumerantSymbol) {
      snap.value = valueToString(symbol.getValue());
    } else if (symbol instanceof GlobalDataSymbol) {
      snap.typeId = symbol.getTypeId();
      snap.moduleOffset = symbol.getOffset();
    } else if (symbol instanceof FunctionSymbol) {
      snap.typeId = symbol.getFunctionTypeId();
      snap.moduleOffset = symbol.getOffset();
    } else if (symbol instanceof VariableSymbol) {
      snap.typeId = symbol.getTypeId();
    } else if (symbol instanceof PublicSymbol) {
      snap.moduleOffset = symbol.getOffset();
    }
    return snap;
  }

  private bound(v: BoundVariable): BoundVariableSnapshot {
    return {
      id: v.id,
      kind: symbolKindName(v.kind),
      name: v.name,
      typeId: v.typeId,
      location: this.manager.locationToString(v.location),
      liveRangeId: v.liveRangeId,
    };
  }

  private scopeVariables(scope: Scope): BoundVariableSnapshot[] {
    return [...scope.enumerateVariables()].map((v) => this.bound(v));
  }

  // -- configuration and listeners --

  setOption(name: string, p1: string = '', p2: string = '', p3: string = ''): Outcome<string> {
    return guard(() => this.manager.setOption(name, p1, p2, p3));
  }

  addEventSink(sink: SymbolEventSink): Outcome<void> {
    return guard(() => this.symbolSet.addEventSink(sink));
  }

  setImporter(importer: SymbolImporter | null): Outcome<void> {
    return guard(() => this.symbolSet.setImporter(importer));
  }

  // -- types --

  createUdt(name: string, qualifiedName?: string): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(new UdtTypeSymbol(this.symbolSet, NO_SYMBOL, name, qualifiedName)));
  }

  createTypedef(name: string, targetTypeName: string, qualifiedName?: string): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(
      new TypedefTypeSymbol(this.symbolSet, NO_SYMBOL, this.typeId(targetTypeName), name, qualifiedName)));
  }

  createEnum(name: string, baseTypeName: string, qualifiedName?: string): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(
      new EnumTypeSymbol(this.symbolSet, NO_SYMBOL, this.typeId(baseTypeName), name, qualifiedName)));
  }

  createPointer(targetTypeName: string, pointerKind: PointerKind): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(new PointerTypeSymbol(this.symbolSet, this.typeId(targetTypeName), pointerKind)));
  }

  createArray(elementTypeName: string, count: number): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(new ArrayTypeSymbol(this.symbolSet, this.typeId(elementTypeName), count)));
  }

  setTypedefTarget(typedefId: SymbolId, targetTypeName: string): Outcome<SymbolSnapshot> {
    return guard(() => {
      const td = this.expect(typedefId, TypedefTypeSymbol, 'a typedef');
      td.setTypedefOfId(this.typeId(targetTypeName));
      return this.snapshot(td);
    });
  }

  // -- members --

  addField(udtId: SymbolId, name: string, typeName: string, opts: FieldOptions = {}): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(new MemberSymbol(this.symbolSet, SymbolKind.Field, udtId, this.typeId(typeName),
      opts.offset ?? AUTOMATIC_OFFSET, name, opts.bitField)));
  }

  addBaseClass(udtId: SymbolId, typeName: string, offset?: number): Outcome<SymbolSnapshot> {
    return guard(() => {
      const baseType = this.symbolSet.findTypeByName(typeName);
      return this.snapshot(new MemberSymbol(this.symbolSet, SymbolKind.BaseClass, udtId, baseType.getId(),
        offset ?? AUTOMATIC_OFFSET, baseType.getQualifiedName()));
    });
  }

  setMemberOffset(memberId: SymbolId, offset: number): Outcome<SymbolSnapshot> {
    return guard(() => {
      const member = this.expect(memberId, MemberSymbol, 'a field or base class');
      member.setOffset(offset);
      return this.snapshot(member);
    });
  }

  setMemberAutomaticLayout(memberId: SymbolId, automatic: boolean): Outcome<SymbolSnapshot> {
    return guard(() => {
      const member = this.expect(memberId, MemberSymbol, 'a field or base class');
      member.setAutomaticLayout(automatic);
      return this.snapshot(member);
    });
  }

  setMemberType(memberId: SymbolId, typeName: string): Outcome<SymbolSnapshot> {
    return guard(() => {
      const member = this.expect(memberId, MemberSymbol, 'a field or base class');
      member.setTypeId(this.typeId(typeName));
      return this.snapshot(member);
    });
  }

  setBitField(memberId: SymbolId, bitField: BitFieldPlacement | null): Outcome<SymbolSnapshot> {
    return guard(() => {
      const member = this.expect(memberId, MemberSymbol, 'a field or base class');
      member.setBitField(bitField);
      return this.snapshot(member);
    });
  }

  addEnumerant(enumId: SymbolId, name: string, value: bigint | number | boolean | null = null): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(new EnumerantSymbol(this.symbolSet, enumId, value, name)));
  }

  setEnumerantValue(enumerantId: SymbolId, value: bigint | number | boolean | null): Outcome<SymbolSnapshot> {
    return guard(() => {
      const enumerant = this.expect(enumerantId, EnumerantSymbol, 'an enumerant');
      enumerant.setValue(value);
      return this.snapshot(enumerant);
    });
  }

  // -- data --

  createData(name: string, moduleOffset: uintb, typeName: string, qualifiedName?: string): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(
      new GlobalDataSymbol(this.symbolSet, NO_SYMBOL, moduleOffset, this.typeId(typeName), name, qualifiedName)));
  }

  setDataOffset(dataId: SymbolId, moduleOffset: uintb): Outcome<SymbolSnapshot> {
    return guard(() => {
      const data = this.expect(dataId, GlobalDataSymbol, 'global data');
      data.setOffset(moduleOffset);
      return this.snapshot(data);
    });
  }

  setDataType(dataId: SymbolId, typeName: string): Outcome<SymbolSnapshot> {
    return guard(() => {
      const data = this.expect(dataId, GlobalDataSymbol, 'global data');
      data.setTypeId(this.typeId(typeName));
      return this.snapshot(data);
    });
  }

  createPublic(name: string, moduleOffset: uintb, qualifiedName?: string): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(new PublicSymbol(this.symbolSet, moduleOffset, name, qualifiedName)));
  }

  // -- functions and variables --

  createFunction(name: string, moduleOffset: uintb, size: number, returnTypeName: string,
                 parameters: ParameterDeclaration[] = [], qualifiedName?: string): Outcome<SymbolSnapshot> {
    return guard(() => {
      const returnTypeId = this.typeId(returnTypeName);
      const paramTypeIds = parameters.map((p) => this.typeId(p.typeName));
      const fn = new FunctionSymbol(this.symbolSet, NO_SYMBOL, moduleOffset, size, returnTypeId, name, qualifiedName);
      for (let i = 0; i < parameters.length; ++i) {
        new VariableSymbol(this.symbolSet, SymbolKind.Parameter, fn.getId(), paramTypeIds[i], parameters[i].name);
      }
      return this.snapshot(fn);
    });
  }

  addFunctionRange(functionId: SymbolId, moduleOffset: uintb, size: number): Outcome<SymbolSnapshot> {
    return guard(() => {
      const fn = this.symbolSet.getFunction(functionId);
      fn.addAddressRange(moduleOffset, size);
      return this.snapshot(fn);
    });
  }

  setReturnType(functionId: SymbolId, typeName: string): Outcome<SymbolSnapshot> {
    return guard(() => {
      const fn = this.symbolSet.getFunction(functionId);
      fn.setReturnTypeId(this.typeId(typeName));
      return this.snapshot(fn);
    });
  }

  getFunctionType(functionId: SymbolId): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(this.symbolSet.getFunction(functionId).getFunctionType()));
  }

  addParameter(functionId: SymbolId, name: string, typeName: string): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(
      new VariableSymbol(this.symbolSet, SymbolKind.Parameter, functionId, this.typeId(typeName), name)));
  }

  addLocal(functionId: SymbolId, name: string, typeName: string): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(
      new VariableSymbol(this.symbolSet, SymbolKind.Local, functionId, this.typeId(typeName), name)));
  }

  setVariableType(variableId: SymbolId, typeName: string): Outcome<SymbolSnapshot> {
    return guard(() => {
      const variable = this.expect(variableId, VariableSymbol, 'a parameter or local');
      variable.setTypeId(this.typeId(typeName));
      return this.snapshot(variable);
    });
  }

  moveParameterBefore(parameterId: SymbolId, position: number): Outcome<SymbolSnapshot> {
    return guard(() => {
      const variable = this.expect(parameterId, VariableSymbol, 'a parameter');
      variable.moveToBefore(position);
      return this.snapshot(variable.getFunction());
    });
  }

  // -- live ranges --

  addLiveRange(variableId: SymbolId, offset: number, size: number, location: string): Outcome<number> {
    return guard(() => this.expect(variableId, VariableSymbol, 'a parameter or local')
      .addLiveRange(offset, size, this.parseLocation(location)));
  }

  setLiveRangeOffset(variableId: SymbolId, rangeId: number, offset: number): Outcome<void> {
    return guard(() => this.expect(variableId, VariableSymbol, 'a parameter or local').setLiveRangeOffset(rangeId, offset));
  }

  setLiveRangeSize(variableId: SymbolId, rangeId: number, size: number): Outcome<void> {
    return guard(() => this.expect(variableId, VariableSymbol, 'a parameter or local').setLiveRangeSize(rangeId, size));
  }

  setLiveRangeLocation(variableId: SymbolId, rangeId: number, location: string): Outcome<void> {
    return guard(() => this.expect(variableId, VariableSymbol, 'a parameter or local')
      .setLiveRangeLocation(rangeId, this.parseLocation(location)));
  }

  deleteLiveRange(variableId: SymbolId, rangeId: number): Outcome<void> {
    return guard(() => this.expect(variableId, VariableSymbol, 'a parameter or local').deleteLiveRange(rangeId));
  }

  deleteAllLiveRanges(variableId: SymbolId): Outcome<void> {
    return guard(() => this.expect(variableId, VariableSymbol, 'a parameter or local').deleteAllLiveRanges());
  }

  getLiveRanges(variableId: SymbolId): Outcome<LiveRangeSnapshot[]> {
    return guard(() => this.expect(variableId, VariableSymbol, 'a parameter or local').getLiveRanges()
      .map((r) => ({ id: r.id, offset: r.offset, size: r.size, location: this.manager.locationToString(r.location) })));
  }

  /**
   * Derive the live ranges of a function's parameters from its code.
   * @returns the number of ranges written
   */
  buildParameterRanges(functionId: SymbolId): Outcome<number> {
    return guard(() => this.manager.buildParameterRanges(this.symbolSet, functionId));
  }

  // -- structure --

  deleteSymbol(id: SymbolId): Outcome<void> {
    return guard(() => this.symbolSet.getSymbol(id).delete());
  }

  moveChildBefore(parentId: SymbolId, childId: SymbolId, position: number, relativeTo?: SymbolKind): Outcome<SymbolSnapshot> {
    return guard(() => {
      const parent = this.symbolSet.getSymbol(parentId);
      parent.moveChildBefore(childId, position, relativeTo);
      return this.snapshot(parent);
    });
  }

  // -- lookup --

  getSymbol(id: SymbolId): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(this.symbolSet.getSymbol(id)));
  }

  findSymbolByName(name: string, kind?: SymbolKind): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(this.symbolSet.findSymbolByName(name, kind)));
  }

  findTypeByName(typeName: string): Outcome<SymbolSnapshot> {
    return guard(() => this.snapshot(this.symbolSet.findTypeByName(typeName)));
  }

  findSymbolsByRegex(pattern: string, kind?: SymbolKind): Outcome<SymbolSnapshot[]> {
    return guard(() => this.symbolSet.findSymbolsByRegex(pattern, kind).map((s) => this.snapshot(s)));
  }

  findSymbolByOffset(moduleOffset: uintb, exactOnly: boolean = false): Outcome<OffsetSnapshot> {
    return guard(() => {
      const match = this.symbolSet.findSymbolByOffset(moduleOffset, exactOnly);
      return { symbol: this.snapshot(match.symbol), residual: match.residual };
    });
  }

  /** Variables live at a module offset */
  getScopeVariables(moduleOffset: uintb): Outcome<BoundVariableSnapshot[]> {
    return guard(() => this.scopeVariables(this.symbolSet.findScopeByOffset(moduleOffset)));
  }

  /** Variables live in a register context, with the memory address of each where it has one */
  getContextVariables(context: RegisterContext): Outcome<(BoundVariableSnapshot & { address?: uintb })[]> {
    return guard(() => {
      const scope = this.symbolSet.findScopeByContext(context);
      const result: (BoundVariableSnapshot & { address?: uintb })[] = [];
      for (const v of scope.enumerateVariables()) {
        const snap: BoundVariableSnapshot & { address?: uintb } = this.bound(v);
        if (inMemory(v.location)) snap.address = scope.resolveAddress(v);
        result.push(snap);
      }
      return result;
    });
  }

  // -- enumeration --

  enumerateSymbols(kind?: SymbolKind): Outcome<SymbolSnapshot[]> {
    return guard(() => [...this.symbolSet.enumerateSymbols(kind)].map((s) => this.snapshot(s)));
  }

  enumerateGlobals(): Outcome<SymbolSnapshot[]> {
    return guard(() => [...this.symbolSet.enumerateGlobals()].map((s) => this.snapshot(s)));
  }

  enumerateChildren(parentId: SymbolId, kind?: SymbolKind): Outcome<SymbolSnapshot[]> {
    return guard(() => {
      const parent = this.symbolSet.getSymbol(parentId);
      const result: SymbolSnapshot[] = [];
      for (const childId of parent.getChildren()) {
        const child = this.symbolSet.getSymbol(childId);
        if (kind === undefined || child.getKind() === kind) result.push(this.snapshot(child));
      }
      return result;
    });
  }
}
