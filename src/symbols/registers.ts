/**
 * @file registers.ts
 * @description Canonical register metadata supplied by the host, indexed by name and id.
 */

import { NotFoundError, InvalidArgumentError } from '../core/error.js';

/**
 * Description of one architectural register.
 * Sub-registers name their parent and the bit span they occupy within it.
 */
export interface RegisterInformation {
  name: string;
  /** Canonical id */
  id: number;
  /** Size in bytes */
  size: number;
  /** Canonical id of the containing register, if this is a sub-register */
  parentId?: number;
  /** Least significant bit of the mapping within the parent */
  subLsb?: number;
  /** Most significant bit of the mapping within the parent */
  subMsb?: number;
  /** Canonical ids of registers contained in this one */
  subRegisters?: number[];
}

/**
 * Lookup table over a register set.
 */
export class RegisterTable {
  private byId: Map<number, RegisterInformation> = new Map();
  private byName: Map<string, number> = new Map();

  constructor(infos: readonly RegisterInformation[]) {
    for (const info of infos) {
      if (this.byId.has(info.id))
        throw new InvalidArgumentError(`Duplicate register id ${info.id} (${info.name})`);
      this.byId.set(info.id, info);
      this.byName.set(info.name.toLowerCase(), info.id);
    }
  }

  get size(): number {
    return this.byId.size;
  }

  tryFindByName(name: string): RegisterInformation | undefined {
    const id = this.byName.get(name.toLowerCase());
    return id === undefined ? undefined : this.byId.get(id);
  }

  findByName(name: string): RegisterInformation {
    const info = this.tryFindByName(name);
    if (info === undefined)
      throw new NotFoundError(`Unknown register: ${name}`);
    return info;
  }

  tryFindById(id: number): RegisterInformation | undefined {
    return this.byId.get(id);
  }

  findById(id: number): RegisterInformation {
    const info = this.byId.get(id);
    if (info === undefined)
      throw new NotFoundError(`Unknown register id: ${id}`);
    return info;
  }

  /**
   * Walk parent links up to the whole register that owns 'id'.
   */
  getBaseRegister(id: number): RegisterInformation {
    let info = this.findById(id);
    const seen = new Set<number>();
    while (info.parentId !== undefined && !seen.has(info.id)) {
      seen.add(info.id);
      const parent = this.byId.get(info.parentId);
      if (parent === undefined) break;
      info = parent;
    }
    return info;
  }

  /** Do the two registers share the same whole register */
  sameBaseRegister(a: number, b: number): boolean {
    return this.getBaseRegister(a).id === this.getBaseRegister(b).id;
  }

  /**
   * All registers contained in 'id', in enumeration order (breadth first).
   */
  getSubRegisters(id: number): RegisterInformation[] {
    const result: RegisterInformation[] = [];
    const seen = new Set<number>([id]);
    const queue = [...(this.findById(id).subRegisters ?? [])];
    while (queue.length > 0) {
      const subId = queue.shift();
      if (subId === undefined || seen.has(subId)) continue;
      seen.add(subId);
      const sub = this.byId.get(subId);
      if (sub === undefined) continue;
      result.push(sub);
      queue.push(...(sub.subRegisters ?? []));
    }
    return result;
  }

  /**
   * Pick the register that holds a value of 'valueSize' bytes placed in register 'id'.
   * This is the largest sub-register no bigger than the value that starts at bit 0; the
   * first one enumerated wins a tie. A value as large as the register uses the register.
   */
  selectSubRegister(id: number, valueSize: number): RegisterInformation {
    const reg = this.findById(id);
    if (valueSize >= reg.size) return reg;
    let best: RegisterInformation | undefined;
    for (const sub of this.getSubRegisters(id)) {
      if ((sub.subLsb ?? 0) !== 0) continue;
      if (sub.size > valueSize) continue;
      if (best === undefined || sub.size > best.size) best = sub;
    }
    return best ?? reg;
  }

  *entries(): IterableIterator<RegisterInformation> {
    yield* this.byId.values();
  }
}
