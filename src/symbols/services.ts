/**
 * @file services.ts
 * @description Contracts for the host services the symbol builder consumes.
 */

import type { uintb } from '../core/types.js';
import type { RegisterInformation } from './registers.js';

/**
 * A module whose symbols are being built.
 */
export interface ModuleInfo {
  name: string;
  baseAddress: uintb;
  size: uintb;
}

/**
 * The target architecture as described by the host.
 */
export interface ArchitectureInfo {
  /** "AMD64", "ARM64", ... */
  name: string;
  /** Pointer width in bits */
  bitness: 32 | 64;
  registers: RegisterInformation[];
}

/**
 * Receives "symbols changed" broadcasts after every mutation.
 */
export interface SymbolEventSink {
  symbolsChanged(module: ModuleInfo): void;
}

/**
 * Register state of a stopped thread, used to bind scopes to a frame.
 */
export interface RegisterContext {
  getInstructionPointer(): uintb;
  /** Value of a register by canonical id, if the context knows it */
  getRegisterValue(regId: number): uintb | undefined;
}

// ---------------------------------------------------------------------------
// Disassembler
// ---------------------------------------------------------------------------

/**
 * Operand property bits
 */
export class OperandFlags {
  static readonly input = 1;
  static readonly output = 2;
  static readonly register = 4;
  static readonly memory = 8;
  static readonly immediate = 16;
}

/**
 * A register used by an operand, in the disassembler's own numbering. Names are what
 * correlate it with canonical register ids.
 */
export interface OperandRegister {
  id: number;
  name: string;
  /** Scale factor for index registers of a memory operand */
  scale?: number;
}

export interface InstructionOperand {
  /** OperandFlags bits */
  flags: number;
  registers: OperandRegister[];
  /** Immediate value, or displacement of a memory operand */
  immediate?: bigint;
}

export interface Instruction {
  address: uintb;
  length: number;
  mnemonic: string;
  isCall: boolean;
  operands: InstructionOperand[];
}

export interface ControlFlowEdge {
  /** Address of the instruction the flow originates from */
  source: uintb;
  /** Start address of the destination block */
  destination: uintb;
}

export interface BasicBlock {
  startAddress: uintb;
  /** One past the last byte of the block */
  endAddress: uintb;
  instructions: Instruction[];
  outboundFlows: ControlFlowEdge[];
}

export interface Disassembler {
  /** Basic blocks of the function whose entry point is 'address' */
  disassembleFunction(address: uintb): BasicBlock[];
}
