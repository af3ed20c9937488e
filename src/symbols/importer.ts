/**
 * @file importer.ts
 * @description On-demand import of symbols from a secondary source.
 *
 * A symbol set consults its importer before name, offset and pattern lookups. The importer
 * copies in whatever the secondary source knows about the query and remembers each query
 * answered once the source is open, so it is not repeated.
 */

import type { SymbolId, uintb } from '../core/types.js';
import { NO_SYMBOL } from '../core/types.js';
import { ImportFailureError, SymbolError } from '../core/error.js';
import { SymbolKind } from './symbol.js';
import type { SymbolSet } from './symbolset.js';
import { UdtTypeSymbol, TypedefTypeSymbol } from './type.js';
import { AUTOMATIC_OFFSET, GlobalDataSymbol, MemberSymbol } from './data.js';
import { FunctionSymbol, VariableSymbol } from './function.js';

// ---------------------------------------------------------------------------
// SymbolImporter (abstract base)
// ---------------------------------------------------------------------------

export abstract class SymbolImporter {
  protected symbolSet: SymbolSet;
  private connected = false;
  private nameQueries: Set<string> = new Set();
  private offsetQueries: Set<uintb> = new Set();
  private patternQueries: Set<string> = new Set();

  constructor(symbolSet: SymbolSet) {
    this.symbolSet = symbolSet;
  }

  isConnected(): boolean { return this.connected; }

  /**
   * Open the secondary source. Failures surface as ImportFailureError.
   */
  connectToSource(): void {
    if (this.connected) return;
    try {
      this.openSource();
    } catch (err) {
      throw this.importFailure('connect to source', err);
    }
    this.connected = true;
  }

  disconnectFromSource(): void {
    if (!this.connected) return;
    this.connected = false;
    this.closeSource();
  }

  /** Forget which queries have been answered */
  resetQueries(): void {
    this.nameQueries.clear();
    this.offsetQueries.clear();
    this.patternQueries.clear();
  }

  importForNameQuery(kind: SymbolKind | undefined, name: string): void {
    const key = `${kind ?? '*'}:${name}`;
    if (this.nameQueries.has(key)) return;
    this.connectToSource();
    this.nameQueries.add(key);
    this.runQuery(`name '${name}'`, () => this.importByName(kind, name));
  }

  importForOffsetQuery(kind: SymbolKind | undefined, offset: uintb): void {
    if (this.offsetQueries.has(offset)) return;
    this.connectToSource();
    this.offsetQueries.add(offset);
    this.runQuery(`offset 0x${offset.toString(16)}`, () => this.importByOffset(kind, offset));
  }

  importForRegexQuery(kind: SymbolKind | undefined, pattern: RegExp): void {
    const key = `${kind ?? '*'}:/${pattern.source}/${pattern.flags}`;
    if (this.patternQueries.has(key)) return;
    this.connectToSource();
    this.patternQueries.add(key);
    this.runQuery(`pattern ${pattern.source}`, () => this.importByPattern(kind, pattern));
  }

  private runQuery(what: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      throw this.importFailure(what, err);
    }
  }

  /** Wrap anything thrown while importing */
  protected importFailure(what: string, err: unknown): ImportFailureError {
    if (err instanceof ImportFailureError) return err;
    const msg = err instanceof Error ? err.message : String(err);
    return new ImportFailureError(`Unable to import ${what}: ${msg}`);
  }

  protected abstract openSource(): void;

  protected closeSource(): void {}

  protected abstract importByName(kind: SymbolKind | undefined, name: string): void;

  protected abstract importByOffset(kind: SymbolKind | undefined, offset: uintb): void;

  protected abstract importByPattern(kind: SymbolKind | undefined, pattern: RegExp): void;
}

// ---------------------------------------------------------------------------
// CatalogImporter
// ---------------------------------------------------------------------------

export interface CatalogField {
  name: string;
  typeName: string;
  /** Explicit offset; omitted for automatic layout */
  offset?: number;
}

export interface CatalogParameter {
  name: string;
  typeName: string;
}

export type CatalogRecord =
  | { kind: 'udt'; name: string; baseClasses?: string[]; fields: CatalogField[] }
  | { kind: 'typedef'; name: string; typeName: string }
  | { kind: 'data'; name: string; offset: uintb; typeName: string }
  | { kind: 'function'; name: string; offset: uintb; size: number; returnTypeName: string;
      parameters: CatalogParameter[]; locals?: CatalogParameter[] };

/**
 * Where catalog records come from. Opening may fail.
 */
export interface CatalogSource {
  readRecords(): readonly CatalogRecord[];
}

function recordKind(record: CatalogRecord): SymbolKind {
  switch (record.kind) {
    case 'udt':
    case 'typedef':
      return SymbolKind.Type;
    case 'data':
      return SymbolKind.Data;
    case 'function':
      return SymbolKind.Function;
  }
}

/** Strip pointer and array decorations from a type name */
function baseTypeName(typeName: string): string {
  return typeName.replace(/(\s*(\*|&|\^|\[\s*\d*\s*\]))+\s*$/, '').trim();
}

/**
 * Imports from an in-memory catalog of records. Type names in the records are resolved
 * through the symbol set, importing named catalog types first where needed.
 */
export class CatalogImporter extends SymbolImporter {
  private source: CatalogSource;
  private records: readonly CatalogRecord[] = [];
  /** Names of records imported so far */
  private imported: Set<string> = new Set();

  constructor(symbolSet: SymbolSet, source: CatalogSource) {
    super(symbolSet);
    this.source = source;
  }

  protected openSource(): void {
    this.records = this.source.readRecords();
  }

  protected override closeSource(): void {
    this.records = [];
  }

  protected importByName(kind: SymbolKind | undefined, name: string): void {
    for (const record of this.records) {
      if (record.name !== name) continue;
      if (kind !== undefined && recordKind(record) !== kind) continue;
      this.importRecord(record);
    }
  }

  protected importByOffset(kind: SymbolKind | undefined, offset: uintb): void {
    for (const record of this.records) {
      if (kind !== undefined && recordKind(record) !== kind) continue;
      if (record.kind === 'function') {
        if (offset >= record.offset && offset < record.offset + BigInt(record.size)) this.importRecord(record);
      } else if (record.kind === 'data') {
        if (offset === record.offset) this.importRecord(record);
      }
    }
  }

  protected importByPattern(kind: SymbolKind | undefined, pattern: RegExp): void {
    for (const record of this.records) {
      if (kind !== undefined && recordKind(record) !== kind) continue;
      pattern.lastIndex = 0;
      if (pattern.test(record.name)) this.importRecord(record);
    }
  }

  private resolveType(typeName: string): SymbolId {
    const base = baseTypeName(typeName);
    for (const record of this.records) {
      if (record.name === base && recordKind(record) === SymbolKind.Type) this.importRecord(record);
    }
    return this.symbolSet.findTypeByName(typeName).getId();
  }

  /**
   * Create the symbols for one record. A record whose name is already taken is skipped.
   * A record that fails part way is rolled back.
   */
  private importRecord(record: CatalogRecord): void {
    if (this.imported.has(record.name)) return;
    this.imported.add(record.name);
    if (this.symbolSet.tryFindSymbolByName(record.name) !== undefined) return;

    let created: SymbolId = NO_SYMBOL;
    try {
      switch (record.kind) {
        case 'udt': {
          const udt = new UdtTypeSymbol(this.symbolSet, NO_SYMBOL, record.name);
          created = udt.getId();
          for (const baseName of record.baseClasses ?? []) {
            const baseId = this.resolveType(baseName);
            new MemberSymbol(this.symbolSet, SymbolKind.BaseClass, created, baseId, AUTOMATIC_OFFSET,
              this.symbolSet.getType(baseId).getQualifiedName());
          }
          for (const field of record.fields) {
            new MemberSymbol(this.symbolSet, SymbolKind.Field, created, this.resolveType(field.typeName),
              field.offset ?? AUTOMATIC_OFFSET, field.name);
          }
          break;
        }
        case 'typedef':
          created = new TypedefTypeSymbol(this.symbolSet, NO_SYMBOL, this.resolveType(record.typeName),
            record.name).getId();
          break;
        case 'data':
          created = new GlobalDataSymbol(this.symbolSet, NO_SYMBOL, record.offset, this.resolveType(record.typeName),
            record.name).getId();
          break;
        case 'function': {
          const fn = new FunctionSymbol(this.symbolSet, NO_SYMBOL, record.offset, record.size,
            this.resolveType(record.returnTypeName), record.name);
          created = fn.getId();
          for (const p of record.parameters) {
            new VariableSymbol(this.symbolSet, SymbolKind.Parameter, created, this.resolveType(p.typeName), p.name);
          }
          for (const l of record.locals ?? []) {
            new VariableSymbol(this.symbolSet, SymbolKind.Local, created, this.resolveType(l.typeName), l.name);
          }
          break;
        }
      }
    } catch (err) {
      if (created !== NO_SYMBOL) this.symbolSet.tryGetSymbol(created)?.delete();
      if (err instanceof SymbolError)
        throw new ImportFailureError(`Record '${record.name}': ${err.message}`);
      throw err;
    }
    this.symbolSet.getLog().info(`Imported ${record.kind} ${record.name}`);
  }
}
