/**
 * @file location.ts
 * @description Where a symbol's value lives, and the textual form used by the API.
 *
 * Textual forms:
 *   ""                  no location
 *   "@rcx"              register
 *   "[@rsp + 0x28]"     register relative ("[@rsp]", "[@rbp - 0x8]")
 *   "+0x1000"           module image offset
 */

import { InvalidArgumentError } from '../core/error.js';
import type { RegisterInformation, RegisterTable } from './registers.js';
import { type ConstantValue, valueToString } from './value.js';

function hexString(value: number | bigint): string {
  return '0x' + value.toString(16);
}

export enum LocationKind {
  None,
  Register,
  RegisterRelative,
  ImageOffset,
  StructureRelative,
  ConstantValue,
}

export interface NoLocation {
  kind: LocationKind.None;
}

export interface RegisterLocation {
  kind: LocationKind.Register;
  regId: number;
  size: number;
}

export interface RegisterRelativeLocation {
  kind: LocationKind.RegisterRelative;
  regId: number;
  offset: number;
  size: number;
}

export interface ImageOffsetLocation {
  kind: LocationKind.ImageOffset;
  offset: bigint;
}

export interface BitFieldPlacement {
  position: number;
  length: number;
}

export interface StructureRelativeLocation {
  kind: LocationKind.StructureRelative;
  offset: number;
  bitField?: BitFieldPlacement;
}

export interface ConstantValueLocation {
  kind: LocationKind.ConstantValue;
  value: ConstantValue;
}

export type SymbolLocation =
  | NoLocation
  | RegisterLocation
  | RegisterRelativeLocation
  | ImageOffsetLocation
  | StructureRelativeLocation
  | ConstantValueLocation;

export function noLocation(): NoLocation {
  return { kind: LocationKind.None };
}

export function registerLocation(reg: RegisterInformation): RegisterLocation {
  return { kind: LocationKind.Register, regId: reg.id, size: reg.size };
}

export function registerRelativeLocation(reg: RegisterInformation, offset: number): RegisterRelativeLocation {
  return { kind: LocationKind.RegisterRelative, regId: reg.id, offset, size: reg.size };
}

/** A copy that shares no storage with the original */
export function copyLocation(loc: SymbolLocation): SymbolLocation {
  switch (loc.kind) {
    case LocationKind.StructureRelative:
      return loc.bitField === undefined
        ? { kind: loc.kind, offset: loc.offset }
        : { kind: loc.kind, offset: loc.offset, bitField: { ...loc.bitField } };
    case LocationKind.ConstantValue:
      return { kind: loc.kind, value: { ...loc.value } };
    default:
      return { ...loc };
  }
}

/**
 * Do two locations name the same storage.
 */
export function locationsEquivalent(a: SymbolLocation, b: SymbolLocation): boolean {
  switch (a.kind) {
    case LocationKind.None:
      return b.kind === LocationKind.None;
    case LocationKind.Register:
      return b.kind === LocationKind.Register && a.regId === b.regId;
    case LocationKind.RegisterRelative:
      return b.kind === LocationKind.RegisterRelative && a.regId === b.regId && a.offset === b.offset;
    case LocationKind.ImageOffset:
      return b.kind === LocationKind.ImageOffset && a.offset === b.offset;
    case LocationKind.StructureRelative:
      return b.kind === LocationKind.StructureRelative && a.offset === b.offset &&
        a.bitField?.position === b.bitField?.position && a.bitField?.length === b.bitField?.length;
    case LocationKind.ConstantValue:
      return b.kind === LocationKind.ConstantValue && a.value.packing === b.value.packing &&
        a.value.value === b.value.value;
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

class LocationScanner {
  private text: string;
  private pos = 0;

  constructor(text: string) {
    this.text = text;
  }

  skipSpace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) ++this.pos;
  }

  atEnd(): boolean {
    this.skipSpace();
    return this.pos >= this.text.length;
  }

  accept(ch: string): boolean {
    this.skipSpace();
    if (this.text.startsWith(ch, this.pos)) {
      this.pos += ch.length;
      return true;
    }
    return false;
  }

  expect(ch: string): void {
    if (!this.accept(ch))
      throw new InvalidArgumentError(`Expected '${ch}' in location "${this.text}"`);
  }

  /** Hex number with optional 0x prefix */
  hex(): bigint {
    this.skipSpace();
    let p = this.pos;
    if (this.text.startsWith('0x', p) || this.text.startsWith('0X', p)) p += 2;
    const start = p;
    while (p < this.text.length && /[0-9a-fA-F]/.test(this.text[p])) ++p;
    if (p === start)
      throw new InvalidArgumentError(`Expected a hex value in location "${this.text}"`);
    this.pos = p;
    return BigInt('0x' + this.text.substring(start, p));
  }

  /** '@' followed by a register name */
  register(table: RegisterTable): RegisterInformation {
    this.expect('@');
    let p = this.pos;
    while (p < this.text.length && /[A-Za-z0-9_.]/.test(this.text[p])) ++p;
    const name = this.text.substring(this.pos, p);
    if (name.length === 0)
      throw new InvalidArgumentError(`Expected a register name in location "${this.text}"`);
    const reg = table.tryFindByName(name);
    if (reg === undefined)
      throw new InvalidArgumentError(`Unknown register '${name}' in location "${this.text}"`);
    this.pos = p;
    return reg;
  }
}

/**
 * Parse the textual form of a location.
 */
export function parseLocation(text: string, table: RegisterTable): SymbolLocation {
  const sc = new LocationScanner(text);
  if (sc.atEnd()) return noLocation();

  let loc: SymbolLocation;
  if (sc.accept('[')) {
    const reg = sc.register(table);
    let offset = 0;
    if (sc.accept('+')) {
      offset = Number(sc.hex());
    } else if (sc.accept('-')) {
      offset = -Number(sc.hex());
    }
    sc.expect(']');
    loc = registerRelativeLocation(reg, offset);
  } else if (sc.accept('+')) {
    loc = { kind: LocationKind.ImageOffset, offset: sc.hex() };
  } else {
    loc = registerLocation(sc.register(table));
  }

  if (!sc.atEnd())
    throw new InvalidArgumentError(`Trailing characters in location "${text}"`);
  return loc;
}

function registerName(regId: number, table: RegisterTable): string {
  return table.tryFindById(regId)?.name ?? `reg${regId}`;
}

/**
 * Render a location in the textual form accepted by parseLocation.
 * Structure relative and constant locations have display-only forms.
 */
export function locationToString(loc: SymbolLocation, table: RegisterTable): string {
  switch (loc.kind) {
    case LocationKind.None:
      return '';
    case LocationKind.Register:
      return '@' + registerName(loc.regId, table);
    case LocationKind.RegisterRelative: {
      const base = '[@' + registerName(loc.regId, table);
      if (loc.offset === 0) return base + ']';
      if (loc.offset < 0) return `${base} - ${hexString(-loc.offset)}]`;
      return `${base} + ${hexString(loc.offset)}]`;
    }
    case LocationKind.ImageOffset:
      return '+' + hexString(loc.offset);
    case LocationKind.StructureRelative: {
      const base = 'this+' + hexString(loc.offset);
      if (loc.bitField === undefined) return base;
      const last = loc.bitField.position + loc.bitField.length - 1;
      return `${base} (bits ${loc.bitField.position}-${last})`;
    }
    case LocationKind.ConstantValue:
      return '=' + valueToString(loc.value);
  }
}
