/**
 * @file symbol.ts
 * @description Base class for every symbol held by a symbol set.
 *
 * Symbols refer to each other only by id. The owning SymbolSet resolves ids on demand, so
 * a deleted symbol leaves behind an id that fails to resolve rather than a dangling object.
 */

import type { SymbolId } from '../core/types.js';
import { NO_SYMBOL } from '../core/types.js';
import { InvalidArgumentError, NotFoundError } from '../core/error.js';
import { type SymbolLocation, noLocation } from './location.js';
import type { SymbolSet } from './symbolset.js';
import type { BaseTypeSymbol, LayoutMember, LayoutEnumerant } from './type.js';
import type { FunctionSymbol, VariableSymbol } from './function.js';

export enum SymbolKind {
  Type,
  Field,
  BaseClass,
  Data,
  Function,
  Parameter,
  Local,
  Public,
}

/** Kinds indexed by qualified name in the global index */
export function isGlobalKind(kind: SymbolKind): boolean {
  return kind === SymbolKind.Type || kind === SymbolKind.Data ||
    kind === SymbolKind.Function || kind === SymbolKind.Public;
}

export function symbolKindName(kind: SymbolKind): string {
  return SymbolKind[kind];
}

/** A symbol that refers to a type */
export interface HasType {
  getTypeId(): SymbolId;
}

/** A symbol placed at an offset */
export interface HasOffset {
  getOffset(): number | bigint;
}

/**
 * Common state of all symbols: identity, naming, and the ordered child list.
 */
export abstract class BaseSymbol {
  protected symbolSet: SymbolSet;
  /** Unique id, 0 until the symbol is registered */
  protected id: SymbolId = NO_SYMBOL;
  protected kind: SymbolKind;
  protected parentId: SymbolId;
  protected name: string;
  protected qualifiedName: string;
  /** Children in declaration order */
  protected children: SymbolId[] = [];
  private deleted = false;

  constructor(symbolSet: SymbolSet, kind: SymbolKind, parentId: SymbolId, name: string, qualifiedName?: string) {
    this.symbolSet = symbolSet;
    this.kind = kind;
    this.parentId = parentId;
    this.name = name;
    this.qualifiedName = qualifiedName ?? name;
  }

  /**
   * Register with the symbol set and link into the parent's child list.
   * Concrete classes call this once their own state is complete.
   */
  protected baseInitialize(): void {
    this.id = this.symbolSet.addNewSymbol(this);
    if (this.parentId !== NO_SYMBOL) {
      this.symbolSet.getSymbol(this.parentId).addChild(this.id);
    }
  }

  getSymbolSet(): SymbolSet { return this.symbolSet; }

  getId(): SymbolId { return this.id; }

  getKind(): SymbolKind { return this.kind; }

  getName(): string { return this.name; }

  getQualifiedName(): string { return this.qualifiedName; }

  getParentId(): SymbolId { return this.parentId; }

  /** The children in declaration order (a copy) */
  getChildren(): SymbolId[] { return [...this.children]; }

  isGlobal(): boolean { return isGlobalKind(this.kind); }

  isDeleted(): boolean { return this.deleted; }

  /** Location of the symbol's value; most symbols have none */
  getLocation(): SymbolLocation { return noLocation(); }

  // -- capabilities --

  asType(): BaseTypeSymbol | undefined { return undefined; }

  asMember(): LayoutMember | undefined { return undefined; }

  asEnumerant(): LayoutEnumerant | undefined { return undefined; }

  asFunction(): FunctionSymbol | undefined { return undefined; }

  asVariable(): VariableSymbol | undefined { return undefined; }

  /** Fail if this symbol object outlived its registration */
  protected checkAlive(): void {
    if (this.deleted)
      throw new NotFoundError(`Symbol ${this.id} (${this.name}) no longer resolves`);
  }

  // -- children --

  addChild(childId: SymbolId): void {
    this.checkAlive();
    this.children.push(childId);
    this.notifyDependentChange();
  }

  /**
   * @returns false if 'childId' was not a child
   */
  removeChild(childId: SymbolId): boolean {
    const idx = this.children.indexOf(childId);
    if (idx < 0) return false;
    this.children.splice(idx, 1);
    if (!this.deleted) this.notifyDependentChange();
    return true;
  }

  /**
   * Position of a child, counted among all children or, if 'relativeTo' is given,
   * among the children of that kind.
   */
  getChildPosition(childId: SymbolId, relativeTo?: SymbolKind): number {
    let pos = 0;
    for (const id of this.children) {
      if (id === childId) return pos;
      if (relativeTo === undefined || this.symbolSet.tryGetSymbol(id)?.getKind() === relativeTo) ++pos;
    }
    throw new NotFoundError(`Symbol ${childId} is not a child of ${this.name}`);
  }

  /**
   * Move a child so it sits before the child currently at 'position'. A position equal to
   * the number of children moves it to the end. With 'relativeTo', positions count only
   * children of that kind.
   */
  moveChildBefore(childId: SymbolId, position: number, relativeTo?: SymbolKind): void {
    this.checkAlive();
    const idx = this.children.indexOf(childId);
    if (idx < 0)
      throw new NotFoundError(`Symbol ${childId} is not a child of ${this.name}`);
    if (!Number.isInteger(position) || position < 0)
      throw new InvalidArgumentError(`Invalid child position ${position}`);

    let newIdx: number;
    if (relativeTo === undefined) {
      if (position > this.children.length)
        throw new InvalidArgumentError(`Child position ${position} out of range`);
      newIdx = position;
    } else {
      newIdx = -1;
      let count = 0;
      for (let i = 0; i < this.children.length; ++i) {
        if (this.symbolSet.tryGetSymbol(this.children[i])?.getKind() !== relativeTo) continue;
        if (count === position) {
          newIdx = i;
          break;
        }
        ++count;
      }
      if (newIdx < 0) {
        if (position !== count)
          throw new InvalidArgumentError(`Child position ${position} out of range`);
        newIdx = this.children.length;
      }
    }

    if (newIdx === idx || newIdx === idx + 1) return;

    this.children.splice(idx, 1);
    if (newIdx > idx) --newIdx;
    this.children.splice(newIdx, 0, childId);

    this.notifyDependentChange();
    this.symbolSet.invalidateExternalCaches();
  }

  // -- dependency notification --

  /**
   * Recompute state derived from other symbols (sizes, offsets, function types).
   */
  protected recomputeDerived(): void {
  }

  /**
   * Something this symbol depends on changed: recompute, then tell everything that
   * depends on this symbol.
   */
  notifyDependentChange(): void {
    if (this.deleted) return;
    this.recomputeDerived();
    this.symbolSet.notifyDependents(this.id);
  }

  // -- deletion --

  /**
   * Drop references this symbol holds on other symbols (dependency edges, address ranges).
   */
  protected releaseReferences(): void {
  }

  /**
   * Delete this symbol and the children it owns. Symbols that depend on it are left
   * referring to an id that no longer resolves.
   */
  delete(): void {
    this.checkAlive();
    this.deleted = true;
    for (const childId of [...this.children]) {
      const child = this.symbolSet.tryGetSymbol(childId);
      if (child !== undefined && !child.isDeleted()) child.delete();
    }
    this.children.length = 0;

    this.releaseReferences();

    if (this.parentId !== NO_SYMBOL) {
      this.symbolSet.tryGetSymbol(this.parentId)?.removeChild(this.id);
    }
    this.symbolSet.deleteExistingSymbol(this.id);
  }
}
