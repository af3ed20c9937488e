/**
 * @file symbolset.ts
 * @description The symbol store for one module.
 *
 * Owns every symbol by id and keeps the indices over them: the qualified-name map and
 * global list, the address range index, the public symbol index, and the dependency
 * graph used to propagate layout changes.
 */

import type { SymbolId, uintb } from '../core/types.js';
import { NO_SYMBOL } from '../core/types.js';
import {
  InvalidArgumentError,
  NotFoundError,
  UnsupportedError,
} from '../core/error.js';
import type { MessageLog } from '../core/log.js';
import type { BuilderConfig } from '../core/options.js';
import { RangeIndex } from '../core/rangemap.js';
import { PointIndex } from '../core/pointmap.js';
import { type BaseSymbol, SymbolKind } from './symbol.js';
import {
  type BaseTypeSymbol,
  BasicTypeSymbol,
  PointerTypeSymbol,
  ArrayTypeSymbol,
  FunctionTypeSymbol,
  IntrinsicKind,
  PointerKind,
  POINTER_SUFFIX,
} from './type.js';
import { LocationKind } from './location.js';
import { Scope } from './scope.js';
import type { FunctionSymbol } from './function.js';
import type { ModuleInfo, RegisterContext, SymbolEventSink } from './services.js';
import type { SymbolImporter } from './importer.js';

/**
 * Result of an address lookup: the symbol and how far into it the address lies.
 */
export interface OffsetMatch {
  symbol: BaseSymbol;
  residual: bigint;
}

/** Intrinsic types present in every symbol set */
const BASIC_TYPES: ReadonlyArray<[string, IntrinsicKind, number]> = [
  ['void', IntrinsicKind.Void, 0],
  ['bool', IntrinsicKind.Bool, 1],
  ['char', IntrinsicKind.Char, 1],
  ['signed char', IntrinsicKind.Char, 1],
  ['unsigned char', IntrinsicKind.UInt, 1],
  ['wchar_t', IntrinsicKind.WChar, 2],
  ['short', IntrinsicKind.Int, 2],
  ['unsigned short', IntrinsicKind.UInt, 2],
  ['int', IntrinsicKind.Int, 4],
  ['unsigned int', IntrinsicKind.UInt, 4],
  ['long', IntrinsicKind.Long, 4],
  ['unsigned long', IntrinsicKind.ULong, 4],
  ['__int64', IntrinsicKind.Int, 8],
  ['unsigned __int64', IntrinsicKind.UInt, 8],
  ['float', IntrinsicKind.Float, 4],
  ['double', IntrinsicKind.Float, 8],
];

/** Pointer suffixes, longest first so "&&" is not read as "&" */
const POINTER_SUFFIXES: ReadonlyArray<[string, PointerKind]> = [
  [POINTER_SUFFIX[PointerKind.RValueReference], PointerKind.RValueReference],
  [POINTER_SUFFIX[PointerKind.Standard], PointerKind.Standard],
  [POINTER_SUFFIX[PointerKind.Reference], PointerKind.Reference],
  [POINTER_SUFFIX[PointerKind.CXHat], PointerKind.CXHat],
];

export interface SymbolSetOptions {
  /** Pointer width in bytes */
  pointerSize: number;
  config: BuilderConfig;
  log: MessageLog;
}

export class SymbolSet {
  private module: ModuleInfo;
  private pointerSize: number;
  private config: BuilderConfig;
  private log: MessageLog;

  /** Symbols by id; slot 0 and deleted slots are null */
  private symbols: (BaseSymbol | null)[] = [null];
  private nextId: SymbolId = NO_SYMBOL;
  private globalSymbols: SymbolId[] = [];
  private symbolNameMap: Map<string, SymbolId> = new Map();

  private rangeIndex = new RangeIndex();
  private publicIndex = new PointIndex();

  /** dependency id -> (dependent id -> reference count) */
  private dependencies: Map<SymbolId, Map<SymbolId, number>> = new Map();

  /** signature key -> function type id */
  private functionTypes: Map<string, SymbolId> = new Map();
  /** function type id -> number of functions using it */
  private functionTypeUsers: Map<SymbolId, number> = new Map();

  private eventSinks: SymbolEventSink[] = [];
  private importer: SymbolImporter | null = null;
  private importing = false;

  constructor(module: ModuleInfo, options: SymbolSetOptions) {
    this.module = module;
    this.pointerSize = options.pointerSize;
    this.config = options.config;
    this.log = options.log;

    for (const [name, kind, size] of BASIC_TYPES) {
      new BasicTypeSymbol(this, kind, size, name);
    }
  }

  getModule(): ModuleInfo { return this.module; }

  getPointerSize(): number { return this.pointerSize; }

  getConfig(): BuilderConfig { return this.config; }

  getLog(): MessageLog { return this.log; }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Assign the next id to a new symbol and index it.
   */
  addNewSymbol(symbol: BaseSymbol): SymbolId {
    if (this.nextId >= Number.MAX_SAFE_INTEGER)
      throw new UnsupportedError('Symbol ids exhausted');
    const id = ++this.nextId;
    this.symbols[id] = symbol;

    if (symbol.isGlobal()) {
      this.globalSymbols.push(id);
      const qname = symbol.getQualifiedName();
      if (qname.length > 0 && !this.symbolNameMap.has(qname)) {
        this.symbolNameMap.set(qname, id);
      }
    }

    this.invalidateExternalCaches();
    return id;
  }

  /**
   * Remove a symbol from every index. Dependents are left alone: ids they hold on the
   * deleted symbol stop resolving.
   */
  deleteExistingSymbol(id: SymbolId): void {
    const symbol = this.tryGetSymbol(id);
    if (symbol === undefined) return;

    if (symbol.isGlobal()) {
      const idx = this.globalSymbols.indexOf(id);
      if (idx >= 0) this.globalSymbols.splice(idx, 1);
      const qname = symbol.getQualifiedName();
      if (this.symbolNameMap.get(qname) === id) {
        this.symbolNameMap.delete(qname);
      }
    }

    this.dependencies.delete(id);
    for (const [key, typeId] of this.functionTypes) {
      if (typeId === id) this.functionTypes.delete(key);
    }
    this.functionTypeUsers.delete(id);
    this.symbols[id] = null;

    this.invalidateExternalCaches();
  }

  tryGetSymbol(id: SymbolId): BaseSymbol | undefined {
    if (!Number.isInteger(id) || id <= NO_SYMBOL || id >= this.symbols.length) return undefined;
    return this.symbols[id] ?? undefined;
  }

  getSymbol(id: SymbolId): BaseSymbol {
    const symbol = this.tryGetSymbol(id);
    if (symbol === undefined)
      throw new NotFoundError(`No symbol with id ${id}`);
    return symbol;
  }

  /**
   * Resolve an id that must name a type.
   */
  getType(id: SymbolId): BaseTypeSymbol {
    const ty = this.getSymbol(id).asType();
    if (ty === undefined)
      throw new InvalidArgumentError(`Symbol ${id} is not a type`);
    return ty;
  }

  getFunctionType(id: SymbolId): FunctionTypeSymbol {
    const ty = this.getType(id);
    if (!(ty instanceof FunctionTypeSymbol))
      throw new InvalidArgumentError(`Symbol ${id} is not a function type`);
    return ty;
  }

  getFunction(id: SymbolId): FunctionSymbol {
    const fn = this.getSymbol(id).asFunction();
    if (fn === undefined)
      throw new InvalidArgumentError(`Symbol ${id} is not a function`);
    return fn;
  }

  /** Number of live symbols */
  getSymbolCount(): number {
    let count = 0;
    for (const sym of this.symbols) {
      if (sym !== null) ++count;
    }
    return count;
  }

  // -------------------------------------------------------------------------
  // Dependencies
  // -------------------------------------------------------------------------

  /**
   * Record that 'dependentId' must be notified when 'dependencyId' changes.
   * Edges are reference counted; each add needs a matching remove.
   */
  addDependentNotify(dependencyId: SymbolId, dependentId: SymbolId): void {
    let dependents = this.dependencies.get(dependencyId);
    if (dependents === undefined) {
      dependents = new Map();
      this.dependencies.set(dependencyId, dependents);
    }
    dependents.set(dependentId, (dependents.get(dependentId) ?? 0) + 1);
  }

  /**
   * @returns false if there was no such edge
   */
  removeDependentNotify(dependencyId: SymbolId, dependentId: SymbolId): boolean {
    const dependents = this.dependencies.get(dependencyId);
    if (dependents === undefined) return false;
    const count = dependents.get(dependentId);
    if (count === undefined) return false;
    if (count <= 1) {
      dependents.delete(dependentId);
      if (dependents.size === 0) this.dependencies.delete(dependencyId);
    } else {
      dependents.set(dependentId, count - 1);
    }
    return true;
  }

  /** Reference count of the edge dependencyId -> dependentId */
  getDependentCount(dependencyId: SymbolId, dependentId: SymbolId): number {
    return this.dependencies.get(dependencyId)?.get(dependentId) ?? 0;
  }

  getDependents(dependencyId: SymbolId): SymbolId[] {
    return [...(this.dependencies.get(dependencyId)?.keys() ?? [])];
  }

  /**
   * Notify every dependent of 'id'. Dependents that no longer resolve are skipped.
   */
  notifyDependents(id: SymbolId): void {
    for (const dependentId of this.getDependents(id)) {
      this.tryGetSymbol(dependentId)?.notifyDependentChange();
    }
  }

  /**
   * Recompute a symbol and everything that depends on it.
   */
  notifyDependentChange(id: SymbolId): void {
    this.getSymbol(id).notifyDependentChange();
  }

  // -------------------------------------------------------------------------
  // Address indices
  // -------------------------------------------------------------------------

  addSymbolRange(start: uintb, end: uintb, id: SymbolId): void {
    this.rangeIndex.insert(start, end, id);
  }

  removeSymbolRange(start: uintb, end: uintb, id: SymbolId): boolean {
    return this.rangeIndex.remove(start, end, id);
  }

  addPublicAddress(offset: uintb, id: SymbolId): void {
    this.publicIndex.insert(offset, id);
  }

  removePublicAddress(offset: uintb, id: SymbolId): boolean {
    return this.publicIndex.remove(offset, id);
  }

  /** The range index, for inspection */
  getRangeIndex(): RangeIndex { return this.rangeIndex; }

  // -------------------------------------------------------------------------
  // Listeners and importer
  // -------------------------------------------------------------------------

  addEventSink(sink: SymbolEventSink): void {
    this.eventSinks.push(sink);
  }

  removeEventSink(sink: SymbolEventSink): boolean {
    const idx = this.eventSinks.indexOf(sink);
    if (idx < 0) return false;
    this.eventSinks.splice(idx, 1);
    return true;
  }

  /**
   * Tell listeners that the symbols of this module changed. A listener that throws is
   * reported and otherwise ignored.
   */
  invalidateExternalCaches(): void {
    for (const sink of this.eventSinks) {
      try {
        sink.symbolsChanged(this.module);
      } catch (err) {
        this.log.warn(`Cache invalidation for ${this.module.name} failed: ${errorText(err)}`);
      }
    }
  }

  setImporter(importer: SymbolImporter | null): void {
    this.importer = importer;
  }

  getImporter(): SymbolImporter | null { return this.importer; }

  /**
   * Give the importer a chance to populate symbols before a lookup. Nothing it throws
   * reaches the lookup.
   */
  private runImport(description: string, fn: (importer: SymbolImporter) => void): void {
    if (!this.config.autoImport || this.importer === null || this.importing) return;
    this.importing = true;
    try {
      fn(this.importer);
    } catch (err) {
      this.log.warn(`Import for ${description} failed: ${errorText(err)}`);
    } finally {
      this.importing = false;
    }
  }

  // -------------------------------------------------------------------------
  // Lookup
  // -------------------------------------------------------------------------

  tryFindSymbolByName(name: string, kind?: SymbolKind): BaseSymbol | undefined {
    this.runImport(`name '${name}'`, (imp) => imp.importForNameQuery(kind, name));
    const id = this.symbolNameMap.get(name);
    if (id === undefined) return undefined;
    return this.tryGetSymbol(id);
  }

  findSymbolByName(name: string, kind?: SymbolKind): BaseSymbol {
    const symbol = this.tryFindSymbolByName(name, kind);
    if (symbol === undefined)
      throw new NotFoundError(`No symbol named '${name}'`);
    return symbol;
  }

  /**
   * Global symbols whose qualified name matches the pattern.
   */
  findSymbolsByRegex(pattern: string | RegExp, kind?: SymbolKind): BaseSymbol[] {
    let re: RegExp;
    try {
      re = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
    } catch (err) {
      throw new InvalidArgumentError(`Bad pattern '${String(pattern)}': ${errorText(err)}`);
    }
    this.runImport(`pattern ${re.source}`, (imp) => imp.importForRegexQuery(kind, re));

    const result: BaseSymbol[] = [];
    for (const symbol of this.enumerateGlobals()) {
      if (kind !== undefined && symbol.getKind() !== kind) continue;
      re.lastIndex = 0;
      if (re.test(symbol.getQualifiedName())) result.push(symbol);
    }
    return result;
  }

  /**
   * Resolve a type name, synthesizing pointer and array types for names that end in a
   * pointer suffix or a dimension.
   */
  findTypeByName(typeName: string): BaseTypeSymbol {
    const name = typeName.trim();
    if (name.length === 0)
      throw new InvalidArgumentError('Empty type name');

    const existing = this.tryFindSymbolByName(name, SymbolKind.Type);
    if (existing !== undefined) {
      const ty = existing.asType();
      if (ty === undefined)
        throw new InvalidArgumentError(`'${name}' names a symbol which is not a type`);
      return ty;
    }

    for (const [suffix, pointerKind] of POINTER_SUFFIXES) {
      if (!name.endsWith(suffix)) continue;
      if (!this.config.demandCreatePointers)
        throw new UnsupportedError(`Pointer type '${name}' must be declared`);
      const baseName = name.substring(0, name.length - suffix.length).trimEnd();
      if (baseName.length === 0)
        throw new InvalidArgumentError(`Pointer type '${name}' has no base type`);
      const base = this.findTypeByName(baseName);
      const canonical = base.getQualifiedName() + suffix;
      return this.lookupType(canonical) ?? new PointerTypeSymbol(this, base.getId(), pointerKind, canonical);
    }

    if (name.endsWith(']')) {
      const open = name.lastIndexOf('[');
      if (open < 0)
        throw new InvalidArgumentError(`Unbalanced array type '${name}'`);
      const dimText = name.substring(open + 1, name.length - 1).trim();
      if (!/^[0-9]+$/.test(dimText))
        throw new InvalidArgumentError(`Array type '${name}' has an invalid dimension`);
      if (!this.config.demandCreateArrays)
        throw new UnsupportedError(`Array type '${name}' must be declared`);
      const baseName = name.substring(0, open).trimEnd();
      if (baseName.length === 0)
        throw new InvalidArgumentError(`Array type '${name}' has no element type`);
      const element = this.findTypeByName(baseName);
      const count = Number.parseInt(dimText, 10);
      const canonical = `${element.getQualifiedName()}[${count}]`;
      return this.lookupType(canonical) ?? new ArrayTypeSymbol(this, element.getId(), count, canonical);
    }

    throw new NotFoundError(`No type named '${name}'`);
  }

  /** Name map lookup restricted to types, without consulting the importer */
  private lookupType(name: string): BaseTypeSymbol | undefined {
    const id = this.symbolNameMap.get(name);
    return id === undefined ? undefined : this.tryGetSymbol(id)?.asType();
  }

  /**
   * Find the symbol covering a module offset. Falls back to the nearest public symbol at
   * or below the offset. With 'exactOnly', the offset must be the symbol's start.
   */
  findSymbolByOffset(moduleOffset: uintb, exactOnly: boolean = false): OffsetMatch {
    this.runImport(`offset 0x${moduleOffset.toString(16)}`, (imp) => imp.importForOffsetQuery(undefined, moduleOffset));

    let match: OffsetMatch | undefined;
    for (const id of this.rangeIndex.query(moduleOffset)) {
      const symbol = this.tryGetSymbol(id);
      if (symbol === undefined) continue;
      match = { symbol, residual: moduleOffset - symbolBaseOffset(symbol) };
      break;
    }

    if (match === undefined) {
      const pt = this.publicIndex.nearestBefore(moduleOffset);
      const symbol = pt === undefined ? undefined : this.tryGetSymbol(pt.ids[0]);
      if (pt !== undefined && symbol !== undefined) {
        match = { symbol, residual: moduleOffset - pt.address };
      }
    }

    if (match === undefined)
      throw new NotFoundError(`No symbol at offset 0x${moduleOffset.toString(16)}`);
    if (exactOnly && match.residual !== 0n)
      throw new NotFoundError(`No symbol starts at offset 0x${moduleOffset.toString(16)}`);
    return match;
  }

  /**
   * The scope of the function containing a module offset.
   */
  findScopeByOffset(moduleOffset: uintb, context?: RegisterContext): Scope {
    for (const id of this.rangeIndex.query(moduleOffset)) {
      const fn = this.tryGetSymbol(id)?.asFunction();
      if (fn !== undefined) {
        return new Scope(fn, fn.toRelativeOffset(moduleOffset), context);
      }
    }
    throw new NotFoundError(`No function at offset 0x${moduleOffset.toString(16)}`);
  }

  /**
   * The scope of the function executing in a register context.
   */
  findScopeByContext(context: RegisterContext): Scope {
    const ip = context.getInstructionPointer();
    const base = this.module.baseAddress;
    if (ip < base)
      throw new NotFoundError(`Instruction pointer 0x${ip.toString(16)} is outside ${this.module.name}`);
    return this.findScopeByOffset(ip - base, context);
  }

  // -------------------------------------------------------------------------
  // Function types
  // -------------------------------------------------------------------------

  /**
   * The shared function type for a signature, created the first time it is asked for.
   */
  getFunctionTypeId(returnTypeId: SymbolId, paramTypeIds: readonly SymbolId[]): SymbolId {
    const key = FunctionTypeSymbol.signatureKey(returnTypeId, paramTypeIds);
    const cached = this.functionTypes.get(key);
    if (cached !== undefined && this.tryGetSymbol(cached) !== undefined) return cached;
    const fnType = new FunctionTypeSymbol(this, returnTypeId, [...paramTypeIds]);
    this.functionTypes.set(key, fnType.getId());
    return fnType.getId();
  }

  /**
   * The function type for a signature, counted as used by one more function.
   */
  acquireFunctionType(returnTypeId: SymbolId, paramTypeIds: readonly SymbolId[]): SymbolId {
    const id = this.getFunctionTypeId(returnTypeId, paramTypeIds);
    this.functionTypeUsers.set(id, (this.functionTypeUsers.get(id) ?? 0) + 1);
    return id;
  }

  /**
   * Drop one use of a function type, deleting it when no function uses it any more.
   */
  releaseFunctionType(id: SymbolId): void {
    const users = this.functionTypeUsers.get(id);
    if (users === undefined) return;
    if (users > 1) {
      this.functionTypeUsers.set(id, users - 1);
      return;
    }
    this.functionTypeUsers.delete(id);
    const fnType = this.tryGetSymbol(id);
    if (fnType !== undefined && !fnType.isDeleted()) fnType.delete();
  }

  /** Number of functions using a function type */
  getFunctionTypeUserCount(id: SymbolId): number {
    return this.functionTypeUsers.get(id) ?? 0;
  }

  // -------------------------------------------------------------------------
  // Enumeration
  // -------------------------------------------------------------------------

  /** Every live symbol, optionally of one kind, in id order */
  *enumerateSymbols(kind?: SymbolKind): IterableIterator<BaseSymbol> {
    const bound = this.symbols.length;
    for (let id = 1; id < bound; ++id) {
      const symbol = this.symbols[id];
      if (symbol === null || symbol === undefined) continue;
      if (kind !== undefined && symbol.getKind() !== kind) continue;
      yield symbol;
    }
  }

  /** Global symbols in creation order */
  *enumerateGlobals(): IterableIterator<BaseSymbol> {
    for (const id of [...this.globalSymbols]) {
      const symbol = this.tryGetSymbol(id);
      if (symbol !== undefined) yield symbol;
    }
  }
}

/** Module offset a symbol's residual is measured from */
function symbolBaseOffset(symbol: BaseSymbol): uintb {
  const fn = symbol.asFunction();
  if (fn !== undefined) return fn.getOffset();
  const loc = symbol.getLocation();
  if (loc.kind === LocationKind.ImageOffset) return loc.offset;
  return 0n;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
