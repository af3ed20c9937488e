/**
 * @file scope.ts
 * @description A view of the variables live at one point in a function.
 *
 * Each scope binds variables to the location they hold at its offset. Bound variables are
 * fresh objects: two scopes over the same function never share location storage.
 */

import type { SymbolId, uintb } from '../core/types.js';
import { InvalidArgumentError, NotFoundError } from '../core/error.js';
import { SymbolKind } from './symbol.js';
import type { FunctionSymbol, VariableSymbol } from './function.js';
import { type SymbolLocation, LocationKind } from './location.js';
import type { RegisterContext } from './services.js';

export interface BoundVariable {
  id: SymbolId;
  kind: SymbolKind;
  name: string;
  typeId: SymbolId;
  location: SymbolLocation;
  /** The live range the location came from */
  liveRangeId: number;
}

export class Scope {
  private fn: FunctionSymbol;
  private offset: number;
  private context: RegisterContext | undefined;

  constructor(fn: FunctionSymbol, offset: number, context?: RegisterContext) {
    this.fn = fn;
    this.offset = offset;
    this.context = context;
  }

  getFunction(): FunctionSymbol { return this.fn; }

  /** Function relative offset of the scope */
  getOffset(): number { return this.offset; }

  getContext(): RegisterContext | undefined { return this.context; }

  private bind(variable: VariableSymbol): BoundVariable | undefined {
    const range = variable.findLiveRangeAt(this.offset);
    if (range === undefined) return undefined;
    return {
      id: variable.getId(),
      kind: variable.getKind(),
      name: variable.getName(),
      typeId: variable.getTypeId(),
      location: range.location,
      liveRangeId: range.id,
    };
  }

  /**
   * Parameters and locals live at the scope offset, in declaration order.
   */
  *enumerateVariables(kind?: SymbolKind.Parameter | SymbolKind.Local): IterableIterator<BoundVariable> {
    const symbolSet = this.fn.getSymbolSet();
    for (const childId of this.fn.getChildren()) {
      const variable = symbolSet.tryGetSymbol(childId)?.asVariable();
      if (variable === undefined) continue;
      if (kind !== undefined && variable.getKind() !== kind) continue;
      const bound = this.bind(variable);
      if (bound !== undefined) yield bound;
    }
  }

  findVariableByName(name: string): BoundVariable | undefined {
    for (const bound of this.enumerateVariables()) {
      if (bound.name === name) return bound;
    }
    return undefined;
  }

  /**
   * The address a bound variable occupies in memory. Register relative locations need the
   * scope's register context.
   */
  resolveAddress(variable: BoundVariable): uintb {
    const loc = variable.location;
    switch (loc.kind) {
      case LocationKind.RegisterRelative: {
        if (this.context === undefined)
          throw new InvalidArgumentError(`Scope has no register context to resolve ${variable.name}`);
        const base = this.context.getRegisterValue(loc.regId);
        if (base === undefined)
          throw new NotFoundError(`Register ${loc.regId} is not available in the context`);
        return BigInt.asUintN(64, base + BigInt(loc.offset));
      }
      case LocationKind.ImageOffset:
        return this.fn.getSymbolSet().getModule().baseAddress + loc.offset;
      default:
        throw new InvalidArgumentError(`Variable ${variable.name} is not in memory`);
    }
  }
}
