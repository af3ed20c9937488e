/**
 * @file pointmap.ts
 * @description Single-address variant of the interval index, for symbols that have
 * an address but no extent (exported and public names).
 */

import type { SymbolId, uintb } from './types.js';

/**
 * All ids registered at one address.
 */
export interface PointEntry {
  address: uintb;
  ids: SymbolId[];
}

/**
 * Sorted map from addresses to id lists supporting nearest-before queries.
 */
export class PointIndex {
  private points: PointEntry[] = [];

  get size(): number {
    return this.points.length;
  }

  /** Index of the first point at or after 'addr' */
  private lowerBound(addr: uintb): number {
    let lo = 0;
    let hi = this.points.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.points[mid].address < addr) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  insert(addr: uintb, id: SymbolId): void {
    const idx = this.lowerBound(addr);
    if (idx < this.points.length && this.points[idx].address === addr) {
      this.points[idx].ids.push(id);
      return;
    }
    this.points.splice(idx, 0, { address: addr, ids: [id] });
  }

  /**
   * @returns false if the id was not registered at the address
   */
  remove(addr: uintb, id: SymbolId): boolean {
    const idx = this.lowerBound(addr);
    if (idx >= this.points.length || this.points[idx].address !== addr) return false;
    const ids = this.points[idx].ids;
    const pos = ids.indexOf(id);
    if (pos < 0) return false;
    ids.splice(pos, 1);
    if (ids.length === 0) this.points.splice(idx, 1);
    return true;
  }

  /** Ids registered exactly at 'addr' */
  query(addr: uintb): SymbolId[] {
    const idx = this.lowerBound(addr);
    if (idx >= this.points.length || this.points[idx].address !== addr) return [];
    return [...this.points[idx].ids];
  }

  /**
   * The closest point at or before 'addr'.
   */
  nearestBefore(addr: uintb): PointEntry | undefined {
    let idx = this.lowerBound(addr);
    if (idx < this.points.length && this.points[idx].address === addr) {
      return { address: addr, ids: [...this.points[idx].ids] };
    }
    --idx;
    if (idx < 0) return undefined;
    const pt = this.points[idx];
    return { address: pt.address, ids: [...pt.ids] };
  }

  *entries(): IterableIterator<PointEntry> {
    for (const pt of this.points) {
      yield pt;
    }
  }
}
