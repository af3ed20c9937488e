/**
 * @file callconv.ts
 * @description Calling conventions: where parameters live on entry to a function.
 *
 * A convention is described by register names. The names are resolved to canonical ids
 * once, when the convention is built for a register table, so the rules themselves never
 * depend on a particular numbering.
 */

import type { SymbolId } from '../core/types.js';
import { calcAlignSize } from '../core/types.js';
import { UnsupportedError } from '../core/error.js';
import type { SymbolSet } from '../symbols/symbolset.js';
import { BasicTypeSymbol, IntrinsicKind, unwindTypedefs } from '../symbols/type.js';
import type { RegisterInformation, RegisterTable } from '../symbols/registers.js';
import {
  type SymbolLocation,
  LocationKind,
  registerLocation,
  registerRelativeLocation,
} from '../symbols/location.js';

/**
 * Register names and stack layout of a convention.
 */
export interface ConventionLayout {
  nonVolatile: readonly string[];
  ordinalRegisters: readonly string[];
  floatRegisters: readonly string[];
  stackPointer: string;
  /** Offset from the stack pointer of the first stack parameter, on entry */
  stackStart: number;
  /** Largest value passed directly in an ordinal register */
  maxOrdinalSize: number;
  /** Largest value passed directly in a floating point register */
  maxFloatSize: number;
  /** True if ordinal and floating registers are picked by parameter position */
  positional: boolean;
  pointerSize: number;
}

/** Is this parameter type passed in floating point registers */
function isFloatType(symbolSet: SymbolSet, typeId: SymbolId): boolean {
  const ty = unwindTypedefs(symbolSet, typeId);
  return ty instanceof BasicTypeSymbol && ty.getIntrinsicKind() === IntrinsicKind.Float;
}

// ---------------------------------------------------------------------------
// CallingConvention (abstract base)
// ---------------------------------------------------------------------------

export abstract class CallingConvention {
  protected registers: RegisterTable;
  protected layout: ConventionLayout;
  /** Canonical ids of the whole registers preserved across calls */
  protected nonVolatiles: Set<number> = new Set();
  protected ordinalRegs: RegisterInformation[];
  protected floatRegs: RegisterInformation[];
  protected stackPointer: RegisterInformation;

  constructor(registers: RegisterTable, layout: ConventionLayout) {
    this.registers = registers;
    this.layout = layout;
    for (const name of layout.nonVolatile) {
      this.nonVolatiles.add(this.registers.getBaseRegister(this.resolve(name).id).id);
    }
    this.ordinalRegs = layout.ordinalRegisters.map((n) => this.resolve(n));
    this.floatRegs = layout.floatRegisters.map((n) => this.resolve(n));
    this.stackPointer = this.resolve(layout.stackPointer);
  }

  private resolve(name: string): RegisterInformation {
    const info = this.registers.tryFindByName(name);
    if (info === undefined)
      throw new UnsupportedError(`Register ${name} required by the ${this.getName()} convention is not defined`);
    return info;
  }

  abstract getName(): string;

  getRegisters(): RegisterTable { return this.registers; }

  getStackPointer(): RegisterInformation { return this.stackPointer; }

  /**
   * Is a register, or the whole register containing it, preserved across calls.
   */
  isNonVolatile(regId: number): boolean {
    const base = this.registers.tryFindById(regId) === undefined ? regId : this.registers.getBaseRegister(regId).id;
    return this.nonVolatiles.has(base);
  }

  /**
   * Locations of the parameters, given their type ids, on entry to the function.
   *
   * Floating point values take the floating register sequence and everything else the
   * ordinal one. A value too large for its register is passed by reference through it.
   * Once a sequence runs out, parameters go on the stack in 8 byte aligned slots.
   */
  placeParameters(symbolSet: SymbolSet, paramTypeIds: readonly SymbolId[]): SymbolLocation[] {
    const result: SymbolLocation[] = [];
    let ordinalIdx = 0;
    let floatIdx = 0;
    let stackOffset = this.layout.stackStart;

    for (let i = 0; i < paramTypeIds.length; ++i) {
      const size = unwindTypedefs(symbolSet, paramTypeIds[i]).getSize();
      const isFloat = isFloatType(symbolSet, paramTypeIds[i]);
      const regs = isFloat ? this.floatRegs : this.ordinalRegs;
      const maxSize = isFloat ? this.layout.maxFloatSize : this.layout.maxOrdinalSize;
      let slot: number;
      if (this.layout.positional) {
        slot = i;
      } else {
        slot = isFloat ? floatIdx++ : ordinalIdx++;
      }

      if (slot < regs.length) {
        const reg = regs[slot];
        if (size <= maxSize) {
          result.push(registerLocation(this.registers.selectSubRegister(reg.id, size)));
        } else {
          result.push({ kind: LocationKind.RegisterRelative, regId: reg.id, offset: 0, size: this.layout.pointerSize });
        }
        continue;
      }

      result.push(registerRelativeLocation(this.stackPointer, stackOffset));
      stackOffset += Math.max(8, calcAlignSize(size, 8));
    }
    return result;
  }
}

// ---------------------------------------------------------------------------
// Concrete conventions
// ---------------------------------------------------------------------------

/**
 * Windows x64. The first four parameters take rcx, rdx, r8, r9 or xmm0-xmm3 by position.
 * Stack parameters start past the return address and the 0x20 byte home area.
 */
export class WindowsAmd64Convention extends CallingConvention {
  constructor(registers: RegisterTable) {
    super(registers, {
      nonVolatile: ['r12', 'r13', 'r14', 'r15', 'rdi', 'rsi', 'rbx', 'rbp', 'rsp'],
      ordinalRegisters: ['rcx', 'rdx', 'r8', 'r9'],
      floatRegisters: ['xmm0', 'xmm1', 'xmm2', 'xmm3'],
      stackPointer: 'rsp',
      stackStart: 0x28,
      maxOrdinalSize: 16,
      maxFloatSize: 32,
      positional: true,
      pointerSize: 8,
    });
  }

  getName(): string { return 'windows-amd64'; }
}

/**
 * Windows ARM64. x0-x7 and d0-d7 are consumed independently.
 */
export class WindowsArm64Convention extends CallingConvention {
  constructor(registers: RegisterTable) {
    super(registers, {
      nonVolatile: ['x18', 'x19', 'x20', 'x21', 'x22', 'x23', 'x24', 'x25', 'x26', 'x27', 'x28', 'x29', 'x30'],
      ordinalRegisters: ['x0', 'x1', 'x2', 'x3', 'x4', 'x5', 'x6', 'x7'],
      floatRegisters: ['d0', 'd1', 'd2', 'd3', 'd4', 'd5', 'd6', 'd7'],
      stackPointer: 'sp',
      stackStart: 0,
      maxOrdinalSize: 16,
      maxFloatSize: 16,
      positional: false,
      pointerSize: 8,
    });
  }

  getName(): string { return 'windows-arm64'; }
}

/**
 * The convention used for functions of an architecture.
 */
export function createDefaultConvention(architecture: string, registers: RegisterTable): CallingConvention {
  switch (architecture.toLowerCase()) {
    case 'amd64':
    case 'x64':
    case 'x86_64':
      return new WindowsAmd64Convention(registers);
    case 'arm64':
    case 'aarch64':
      return new WindowsArm64Convention(registers);
    default:
      throw new UnsupportedError(`No calling convention for architecture ${architecture}`);
  }
}
