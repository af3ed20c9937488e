/**
 * @file rangebuilder.ts
 * @description Computes parameter live ranges by walking a function's disassembly.
 *
 * The calling convention gives each parameter its location on entry. A forward dataflow
 * walk over the basic blocks then follows those locations: register writes end a range,
 * calls end ranges held in volatile registers, moves open a range at the destination, and
 * adjusting a base register rebases the ranges relative to it. Blocks are revisited until
 * the set of locations flowing into each one stops growing. The per-block results are then
 * merged into disjoint ranges and written back onto the parameters.
 */

import type { uintb } from '../core/types.js';
import { UnexpectedError } from '../core/error.js';
import type { MessageLog } from '../core/log.js';
import type { FunctionSymbol, LiveRangeSpec, VariableSymbol } from '../symbols/function.js';
import type { RegisterInformation, RegisterTable } from '../symbols/registers.js';
import {
  type SymbolLocation,
  LocationKind,
  copyLocation,
  locationsEquivalent,
  registerLocation,
  registerRelativeLocation,
} from '../symbols/location.js';
import {
  type BasicBlock,
  type Disassembler,
  type Instruction,
  type InstructionOperand,
  type OperandRegister,
  OperandFlags,
} from '../symbols/services.js';
import type { CallingConvention } from './callconv.js';

/** Walks of one block beyond which new entry locations are ignored */
const MAX_BLOCK_TRAVERSALS = 32;

/**
 * A range of code over which a parameter sits in one location, in absolute addresses.
 */
export interface TrackedRange {
  location: SymbolLocation;
  start: uintb;
  end: uintb;
  /** Traversal of the block that recorded it */
  traversal: number;
}

/** A range still open during a block walk */
interface OpenRange {
  param: number;
  location: SymbolLocation;
  start: uintb;
}

/** What an instruction does to one location */
type LocationEffect =
  | { kind: 'keep' }
  | { kind: 'kill' }
  | { kind: 'rebase'; location: SymbolLocation };

class BlockInfo {
  block: BasicBlock;
  /** Per parameter, the locations that flow into the block */
  entry: SymbolLocation[][];
  /** Per parameter, the locations live at the end of the last walk */
  exit: SymbolLocation[][];
  /** Per parameter, the ranges recorded by every walk */
  ranges: TrackedRange[][];
  traversalCount = 0;

  constructor(block: BasicBlock, paramCount: number) {
    this.block = block;
    this.entry = Array.from({ length: paramCount }, () => []);
    this.exit = Array.from({ length: paramCount }, () => []);
    this.ranges = Array.from({ length: paramCount }, () => []);
  }

  getStartAddress(): uintb { return this.block.startAddress; }
}

function hex(val: uintb): string {
  return '0x' + val.toString(16);
}

function hasFlag(op: InstructionOperand, flag: number): boolean {
  return (op.flags & flag) !== 0;
}

function isRegisterOperand(op: InstructionOperand): boolean {
  return hasFlag(op, OperandFlags.register) && !hasFlag(op, OperandFlags.memory);
}

// ---------------------------------------------------------------------------
// RangeBuilder
// ---------------------------------------------------------------------------

export class RangeBuilder {
  private disassembler: Disassembler;
  private log: MessageLog;

  constructor(disassembler: Disassembler, log: MessageLog) {
    this.disassembler = disassembler;
    this.log = log;
  }

  /**
   * Replace the live ranges of every parameter of 'fn' with ranges derived from its code.
   * @returns the number of live ranges written
   */
  propagateParameterRanges(fn: FunctionSymbol, convention: CallingConvention): number {
    const params = fn.getParameters();
    if (params.length === 0) return 0;
    const walk = new ParameterWalk(fn, params, convention, this.log);
    walk.run(this.disassembler);
    return walk.writeBack();
  }
}

/**
 * State of one run of the analysis over one function.
 */
class ParameterWalk {
  private fn: FunctionSymbol;
  private params: VariableSymbol[];
  private convention: CallingConvention;
  private registers: RegisterTable;
  private log: MessageLog;
  private moduleBase: uintb;
  private blocks: Map<uintb, BlockInfo> = new Map();
  /** Pending (block, predecessor) visits */
  private worklist: { addr: uintb; from: uintb | undefined }[] = [];

  constructor(fn: FunctionSymbol, params: VariableSymbol[], convention: CallingConvention, log: MessageLog) {
    this.fn = fn;
    this.params = params;
    this.convention = convention;
    this.registers = convention.getRegisters();
    this.log = log;
    this.moduleBase = fn.getSymbolSet().getModule().baseAddress;
  }

  run(disassembler: Disassembler): void {
    const symbolSet = this.fn.getSymbolSet();
    const entryLocations = this.convention.placeParameters(symbolSet, this.params.map((p) => p.getTypeId()));
    const entryAddr = this.moduleBase + this.fn.getOffset();

    for (const block of disassembler.disassembleFunction(entryAddr)) {
      this.blocks.set(block.startAddress, new BlockInfo(block, this.params.length));
    }
    const entry = this.blocks.get(entryAddr);
    if (entry === undefined)
      throw new UnexpectedError(`Disassembly of ${this.fn.getName()} has no block at ${hex(entryAddr)}`);
    for (let p = 0; p < this.params.length; ++p) {
      if (entryLocations[p].kind !== LocationKind.None) entry.entry[p].push(copyLocation(entryLocations[p]));
    }

    this.worklist.push({ addr: entryAddr, from: undefined });
    while (this.worklist.length > 0) {
      const item = this.worklist.shift();
      if (item === undefined) break;
      this.traverseBlockAt(item.addr, item.from);
    }
  }

  private getBlock(addr: uintb): BlockInfo {
    const info = this.blocks.get(addr);
    if (info === undefined)
      throw new UnexpectedError(`No basic block at ${hex(addr)}`);
    return info;
  }

  private traverseBlockAt(addr: uintb, from: uintb | undefined): void {
    const info = this.getBlock(addr);
    let changed = false;
    if (from !== undefined) {
      changed = this.carryoverLiveRanges(info, this.getBlock(from));
    }
    if (info.traversalCount !== 0 && !changed) return;
    if (info.traversalCount >= MAX_BLOCK_TRAVERSALS) {
      this.log.warn(`Block ${hex(addr)} of ${this.fn.getName()} did not settle; ignoring further flows into it`);
      return;
    }

    ++info.traversalCount;
    this.log.trace(`Walking block ${hex(addr)} (pass ${info.traversalCount})`);
    this.walkBlock(info);

    for (const flow of info.block.outboundFlows) {
      if (this.blocks.has(flow.destination)) {
        this.worklist.push({ addr: flow.destination, from: addr });
      } else {
        this.log.trace(`Flow from ${hex(flow.source)} to ${hex(flow.destination)} leaves the function`);
      }
    }
  }

  /**
   * Merge the exit locations of a predecessor into the entry of a block.
   * @returns true if the block gained a location
   */
  private carryoverLiveRanges(to: BlockInfo, from: BlockInfo): boolean {
    let changed = false;
    for (let p = 0; p < this.params.length; ++p) {
      for (const loc of from.exit[p]) {
        if (to.entry[p].some((e) => locationsEquivalent(e, loc))) continue;
        to.entry[p].push(copyLocation(loc));
        changed = true;
      }
    }
    return changed;
  }

  private walkBlock(info: BlockInfo): void {
    const traversal = info.traversalCount;
    const record = (r: OpenRange, end: uintb): void => {
      if (end > r.start) {
        info.ranges[r.param].push({ location: r.location, start: r.start, end, traversal });
      }
    };

    let open: OpenRange[] = [];
    for (let p = 0; p < this.params.length; ++p) {
      for (const loc of info.entry[p]) {
        open.push({ param: p, location: loc, start: info.block.startAddress });
      }
    }

    for (const instr of info.block.instructions) {
      const next = instr.address + BigInt(instr.length);
      const kept: OpenRange[] = [];
      const opened: OpenRange[] = [];

      for (const r of open) {
        const effect = this.effectOn(instr, r.location);
        if (effect.kind === 'keep') {
          kept.push(r);
          continue;
        }
        record(r, instr.address);
        if (effect.kind === 'rebase') {
          opened.push({ param: r.param, location: effect.location, start: next });
        }
      }

      for (const r of open) {
        const target = this.aliasTarget(instr, r.location);
        if (target !== undefined) opened.push({ param: r.param, location: target, start: next });
      }

      for (const r of opened) {
        const dup = kept.some((k) => k.param === r.param && locationsEquivalent(k.location, r.location));
        if (!dup) kept.push(r);
      }
      open = kept;
    }

    for (let p = 0; p < this.params.length; ++p) info.exit[p] = [];
    for (const r of open) {
      record(r, info.block.endAddress);
      info.exit[r.param].push(r.location);
    }
  }

  // -- instruction semantics --

  private canonical(reg: OperandRegister): RegisterInformation | undefined {
    return this.registers.tryFindByName(reg.name) ?? this.registers.tryFindById(reg.id);
  }

  /** Registers written by the instruction, canonically */
  private writtenRegisters(instr: Instruction): { op: InstructionOperand; reg: RegisterInformation }[] {
    const result: { op: InstructionOperand; reg: RegisterInformation }[] = [];
    for (const op of instr.operands) {
      if (!hasFlag(op, OperandFlags.output) || !isRegisterOperand(op)) continue;
      for (const r of op.registers) {
        const reg = this.canonical(r);
        if (reg !== undefined) result.push({ op, reg });
      }
    }
    return result;
  }

  private sameBase(a: number, b: number): boolean {
    if (this.registers.tryFindById(a) === undefined || this.registers.tryFindById(b) === undefined) return a === b;
    return this.registers.sameBaseRegister(a, b);
  }

  /**
   * Immediate adjustment an add or sub applies to its destination register, or undefined
   * for anything else.
   */
  private adjustment(instr: Instruction): number | undefined {
    const mnemonic = instr.mnemonic.toLowerCase();
    if (mnemonic !== 'add' && mnemonic !== 'sub') return undefined;
    const imm = instr.operands.find((op) => hasFlag(op, OperandFlags.immediate) && op.immediate !== undefined);
    if (imm?.immediate === undefined) return undefined;
    const val = Number(imm.immediate);
    return mnemonic === 'add' ? val : -val;
  }

  /**
   * Every register write ends a range in that register. Calls also end ranges held in
   * volatile registers. Adjusting the base of a register relative location moves it.
   */
  private effectOn(instr: Instruction, loc: SymbolLocation): LocationEffect {
    if (loc.kind === LocationKind.Register) {
      if (instr.isCall && !this.convention.isNonVolatile(loc.regId)) return { kind: 'kill' };
      for (const w of this.writtenRegisters(instr)) {
        if (this.sameBase(w.reg.id, loc.regId)) return { kind: 'kill' };
      }
      return { kind: 'keep' };
    }

    if (loc.kind === LocationKind.RegisterRelative) {
      for (const w of this.writtenRegisters(instr)) {
        if (!this.sameBase(w.reg.id, loc.regId)) continue;
        const delta = this.adjustment(instr);
        if (delta === undefined) return { kind: 'kill' };
        return { kind: 'rebase', location: { ...loc, offset: loc.offset - delta } };
      }
    }
    return { kind: 'keep' };
  }

  /** Does a memory operand address exactly a register relative location */
  private addressesLocation(op: InstructionOperand, loc: SymbolLocation): boolean {
    if (loc.kind !== LocationKind.RegisterRelative || op.registers.length !== 1) return false;
    const base = this.canonical(op.registers[0]);
    return base !== undefined && this.sameBase(base.id, loc.regId) && Number(op.immediate ?? 0n) === loc.offset;
  }

  /**
   * If the instruction copies the value at 'loc' somewhere, the location of the copy.
   */
  private aliasTarget(instr: Instruction, loc: SymbolLocation): SymbolLocation | undefined {
    if (!instr.mnemonic.toLowerCase().startsWith('mov')) return undefined;
    const inputs = instr.operands.filter((op) => hasFlag(op, OperandFlags.input) && !hasFlag(op, OperandFlags.output));
    const outputs = instr.operands.filter((op) => hasFlag(op, OperandFlags.output));
    if (inputs.length !== 1 || outputs.length !== 1) return undefined;

    const input = inputs[0];
    let matches = false;
    if (loc.kind === LocationKind.Register && isRegisterOperand(input) && input.registers.length === 1) {
      const reg = this.canonical(input.registers[0]);
      matches = reg !== undefined && this.sameBase(reg.id, loc.regId);
    } else if (hasFlag(input, OperandFlags.memory)) {
      matches = this.addressesLocation(input, loc);
    }
    if (!matches) return undefined;

    const output = outputs[0];
    if (output.registers.length !== 1) return undefined;
    const reg = this.canonical(output.registers[0]);
    if (reg === undefined) return undefined;
    if (isRegisterOperand(output)) return registerLocation(reg);
    if (hasFlag(output, OperandFlags.memory)) return registerRelativeLocation(reg, Number(output.immediate ?? 0n));
    return undefined;
  }

  // -- finalization --

  /**
   * Merge the per-block ranges of each parameter and store them on the parameter.
   * @returns the number of live ranges written
   */
  writeBack(): number {
    const ordered = [...this.blocks.values()].sort((a, b) =>
      a.getStartAddress() < b.getStartAddress() ? -1 : a.getStartAddress() > b.getStartAddress() ? 1 : 0);

    let written = 0;
    for (let p = 0; p < this.params.length; ++p) {
      const collected: TrackedRange[] = [];
      for (const info of ordered) {
        for (const r of info.ranges[p]) collected.push({ ...r });
      }
      const merged = coalesceAdjacent(resolveOverlaps(coalesceSameTraversal(collected)));

      written += this.params[p].replaceLiveRanges(this.clipToFunction(merged)).length;
    }
    this.log.info(`Built ${written} live ranges for ${this.params.length} parameters of ${this.fn.getName()}`);
    return written;
  }

  /** Function relative pieces of the ranges that lie inside the function */
  private clipToFunction(ranges: TrackedRange[]): LiveRangeSpec[] {
    const fnBase = this.moduleBase + this.fn.getOffset();
    const result: LiveRangeSpec[] = [];
    for (const r of ranges) {
      for (const fr of this.fn.getAddressRanges()) {
        const lo = this.moduleBase + fr.offset;
        const hi = lo + BigInt(fr.size);
        const start = r.start > lo ? r.start : lo;
        const end = r.end < hi ? r.end : hi;
        if (end <= start) continue;
        result.push({ offset: Number(start - fnBase), size: Number(end - start), location: r.location });
      }
    }
    return result;
  }
}

// ---------------------------------------------------------------------------
// Range merging
// ---------------------------------------------------------------------------

/**
 * Join ranges from the same traversal that share a location and overlap or touch.
 */
function coalesceSameTraversal(ranges: TrackedRange[]): TrackedRange[] {
  const result: TrackedRange[] = [];
  for (const r of ranges) {
    const host = result.find((e) => e.traversal === r.traversal && locationsEquivalent(e.location, r.location) &&
      r.start <= e.end && e.start <= r.end);
    if (host === undefined) {
      result.push({ ...r });
      continue;
    }
    if (r.start < host.start) host.start = r.start;
    if (r.end > host.end) host.end = r.end;
  }
  return result;
}

function compareRanges(a: TrackedRange, b: TrackedRange): number {
  if (a.start !== b.start) return a.start < b.start ? -1 : 1;
  if (a.end !== b.end) return a.end < b.end ? -1 : 1;
  return 0;
}

/**
 * Make the ranges disjoint. Sweeping upward, the range that ends soonest among those
 * starting at the cursor wins, up to the next start of another range; whatever the others
 * cover beyond that point is considered afterwards.
 */
export function resolveOverlaps(ranges: TrackedRange[]): TrackedRange[] {
  let pending = ranges.filter((r) => r.end > r.start).map((r) => ({ ...r }));
  const result: TrackedRange[] = [];
  while (pending.length > 0) {
    pending.sort(compareRanges);
    const cursor = pending[0].start;
    let pick = pending[0];
    let end = pick.end;
    for (const r of pending) {
      if (r.start > cursor) {
        if (r.start < end) end = r.start;
        break;
      }
      if (r.end < pick.end) pick = r;
    }
    if (pick.end < end) end = pick.end;
    result.push({ ...pick, start: cursor, end });
    for (const r of pending) {
      if (r.start < end) r.start = end;
    }
    pending = pending.filter((r) => r.end > r.start);
  }
  return result;
}

/**
 * Join disjoint ranges that abut and share a location.
 */
function coalesceAdjacent(ranges: TrackedRange[]): TrackedRange[] {
  const result: TrackedRange[] = [];
  for (const r of ranges) {
    const last = result.length > 0 ? result[result.length - 1] : undefined;
    if (last !== undefined && last.end === r.start && locationsEquivalent(last.location, r.location)) {
      last.end = r.end;
    } else {
      result.push({ ...r });
    }
  }
  return result;
}
