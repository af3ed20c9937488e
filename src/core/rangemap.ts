/**
 * @file rangemap.ts
 * @description Interval multimap from half-open address ranges to symbol ids.
 *
 * The map is stored as a sorted partition of the covered address space. Inserting a
 * range that overlaps existing cells splits those cells so that every cell carries
 * exactly the ids whose inserted range covers it, and touching cells never carry the
 * same ids. Any inserted range can be rebuilt as the union of the cells holding its id.
 */

import type { SymbolId, uintb } from './types.js';

/**
 * One cell of the partition: [start, end) and the ids covering it.
 */
export class RangeCell {
  start: uintb;
  end: uintb;
  ids: SymbolId[];

  constructor(start: uintb, end: uintb, ids: SymbolId[]) {
    this.start = start;
    this.end = end;
    this.ids = ids;
  }

  /** Does this cell contain the given address */
  contains(addr: uintb): boolean {
    return this.start <= addr && addr < this.end;
  }
}

function sameIds(a: SymbolId[], b: SymbolId[]): boolean {
  if (a.length !== b.length) return false;
  const sa = [...a].sort((x, y) => x - y);
  const sb = [...b].sort((x, y) => x - y);
  for (let i = 0; i < sa.length; ++i) {
    if (sa[i] !== sb[i]) return false;
  }
  return true;
}

/**
 * Half-open interval multimap.
 *
 * Lookups binary search on the cell end and then check containment.
 */
export class RangeIndex {
  private cells: RangeCell[] = [];

  /** Number of cells in the partition */
  get size(): number {
    return this.cells.length;
  }

  empty(): boolean {
    return this.cells.length === 0;
  }

  clear(): void {
    this.cells.length = 0;
  }

  /** Index of the first cell whose end lies beyond 'addr' */
  private lowerBound(addr: uintb): number {
    let lo = 0;
    let hi = this.cells.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.cells[mid].end <= addr) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  /**
   * Find the cell containing the given address.
   * @returns the index of the cell, or -1 if no cell covers the address
   */
  find(addr: uintb): number {
    const idx = this.lowerBound(addr);
    if (idx >= this.cells.length) return -1;
    if (this.cells[idx].start > addr) return -1;
    return idx;
  }

  /**
   * Get the ids of every range covering the address (a copy; empty if none)
   */
  query(addr: uintb): SymbolId[] {
    const idx = this.find(addr);
    if (idx < 0) return [];
    return [...this.cells[idx].ids];
  }

  /**
   * Attach 'id' to every address in [start, end).
   * Cells straddling either end of the range are split so the id lands only on the overlap.
   */
  insert(start: uintb, end: uintb, id: SymbolId): void {
    if (start >= end) return;

    let cur = start;
    const first = this.lowerBound(cur);
    let i = first;
    while (cur < end) {
      if (i >= this.cells.length || this.cells[i].start >= end) {
        this.cells.splice(i, 0, new RangeCell(cur, end, [id]));
        ++i;
        break;
      }

      const cell = this.cells[i];
      if (cur < cell.start) {
        // Gap ahead of the next cell
        this.cells.splice(i, 0, new RangeCell(cur, cell.start, [id]));
        ++i;
        cur = cell.start;
        continue;
      }

      if (cur > cell.start) {
        const before = new RangeCell(cell.start, cur, [...cell.ids]);
        cell.start = cur;
        this.cells.splice(i, 0, before);
        ++i;
      }

      if (end < cell.end) {
        const after = new RangeCell(end, cell.end, [...cell.ids]);
        cell.end = end;
        this.cells.splice(i + 1, 0, after);
      }

      cell.ids.push(id);
      cur = cell.end;
      ++i;
    }

    this.coalesce(first, i);
  }

  /**
   * Detach 'id' from every address in [start, end).
   * @returns false if the id was not present anywhere in the range
   */
  remove(start: uintb, end: uintb, id: SymbolId): boolean {
    if (start >= end) return false;

    let changed = false;
    const first = this.lowerBound(start);
    let i = first;
    while (i < this.cells.length && this.cells[i].start < end) {
      const cell = this.cells[i];
      const pos = cell.ids.indexOf(id);
      if (pos < 0) {
        ++i;
        continue;
      }

      if (cell.start < start) {
        const before = new RangeCell(cell.start, start, [...cell.ids]);
        cell.start = start;
        this.cells.splice(i, 0, before);
        ++i;
      }

      if (cell.end > end) {
        const after = new RangeCell(end, cell.end, [...cell.ids]);
        cell.end = end;
        this.cells.splice(i + 1, 0, after);
      }

      cell.ids.splice(pos, 1);
      changed = true;
      if (cell.ids.length === 0) {
        this.cells.splice(i, 1);
      } else {
        ++i;
      }
    }

    if (changed) this.coalesce(first, i);
    return changed;
  }

  /**
   * Merge touching cells carrying the same ids, looking at each pair (j-1, j) for
   * j in [from, to].
   */
  private coalesce(from: number, to: number): void {
    let j = Math.max(from, 1);
    while (j <= to && j < this.cells.length) {
      const prev = this.cells[j - 1];
      const cell = this.cells[j];
      if (prev.end === cell.start && sameIds(prev.ids, cell.ids)) {
        prev.end = cell.end;
        this.cells.splice(j, 1);
        --to;
      } else {
        ++j;
      }
    }
  }

  /** Iterate over all cells in address order */
  *entries(): IterableIterator<RangeCell> {
    for (const cell of this.cells) {
      yield cell;
    }
  }
}
