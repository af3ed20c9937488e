/**
 * @file support.ts
 * @description Shared fixtures for the unit tests: register tables, an in-process
 * disassembler, and builders for symbol sets and instructions.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { expect } from 'vitest';
import type { Fault, Outcome } from '../../src/core/error.js';
import { LogLevel, MemoryLogSink, MessageLog } from '../../src/core/log.js';
import { type BuilderConfig, defaultConfig } from '../../src/core/options.js';
import { SymbolSet } from '../../src/symbols/symbolset.js';
import {
  type ArchitectureInfo,
  type BasicBlock,
  type Disassembler,
  type Instruction,
  type InstructionOperand,
  type ModuleInfo,
  OperandFlags,
} from '../../src/symbols/services.js';
import { SymbolBuilderManager } from '../../src/api/manager.js';

export const MODULE_BASE = 0x140000000n;

export function loadArchitecture(name: 'amd64' | 'arm64'): ArchitectureInfo {
  const path = fileURLToPath(new URL(`../fixtures/${name}-registers.json`, import.meta.url));
  const info: ArchitectureInfo = JSON.parse(readFileSync(path, 'utf8'));
  return info;
}

export function testModule(name: string = 'app.exe'): ModuleInfo {
  return { name, baseAddress: MODULE_BASE, size: 0x100000n };
}

/**
 * A standalone symbol set whose log output lands in 'writer'.
 */
export function makeSymbolSet(config: Partial<BuilderConfig> = {}, writer: MemoryLogSink = new MemoryLogSink()): SymbolSet {
  const full = { ...defaultConfig(), ...config };
  return new SymbolSet(testModule(), {
    pointerSize: 8,
    config: full,
    log: new MessageLog(writer, () => full.logLevel),
  });
}

/**
 * Disassembly served from a table of prepared blocks.
 */
export class FakeDisassembler implements Disassembler {
  private functions: Map<bigint, BasicBlock[]> = new Map();
  requests: bigint[] = [];

  addFunction(entry: bigint, blocks: BasicBlock[]): void {
    this.functions.set(entry, blocks);
  }

  disassembleFunction(address: bigint): BasicBlock[] {
    this.requests.push(address);
    return this.functions.get(address) ?? [];
  }
}

export function makeManager(opts: { disassembler?: Disassembler; arch?: 'amd64' | 'arm64'; logLevel?: LogLevel } = {}): {
  manager: SymbolBuilderManager;
  writer: MemoryLogSink;
} {
  const writer = new MemoryLogSink();
  const manager = new SymbolBuilderManager({
    architecture: loadArchitecture(opts.arch ?? 'amd64'),
    disassembler: opts.disassembler,
    config: { logLevel: opts.logLevel ?? LogLevel.Warning },
    logSink: writer,
  });
  return { manager, writer };
}

/** Assert that a value is an instance of 'cls' and return it as one */
export function narrow<T>(value: unknown, cls: abstract new (...args: never[]) => T): T {
  expect(value).toBeInstanceOf(cls);
  if (!(value instanceof cls)) throw new Error(`expected an instance of ${cls.name}`);
  return value;
}

/** The value of a successful outcome; fails the test on a fault */
export function unwrap<T>(out: Outcome<T>): T {
  if (!out.ok) throw new Error(`${out.fault.kind}: ${out.fault.message}`);
  return out.value;
}

/** The fault of a failed outcome */
export function faultOf<T>(out: Outcome<T>): Fault {
  if (out.ok) throw new Error('expected a fault');
  return out.fault;
}

// -- instruction builders --

/** Register operand; only the name identifies the register */
export function regOp(name: string, flags: number): InstructionOperand {
  return { flags: flags | OperandFlags.register, registers: [{ id: 0, name }] };
}

/** Memory operand [base + disp] */
export function memOp(base: string, disp: number, flags: number): InstructionOperand {
  return { flags: flags | OperandFlags.memory, registers: [{ id: 0, name: base }], immediate: BigInt(disp) };
}

export function immOp(value: number): InstructionOperand {
  return { flags: OperandFlags.input | OperandFlags.immediate, registers: [], immediate: BigInt(value) };
}

export function instr(address: bigint, length: number, mnemonic: string, operands: InstructionOperand[],
                      isCall: boolean = false): Instruction {
  return { address, length, mnemonic, isCall, operands };
}

/** A block whose end is one past its last instruction */
export function block(instructions: Instruction[], successors: bigint[] = []): BasicBlock {
  const first = instructions[0];
  const last = instructions[instructions.length - 1];
  const endAddress = last.address + BigInt(last.length);
  return {
    startAddress: first.address,
    endAddress,
    instructions,
    outboundFlows: successors.map((destination) => ({ source: last.address, destination })),
  };
}

export const IN = OperandFlags.input;
export const OUT = OperandFlags.output;
