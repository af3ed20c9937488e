/**
 * @file error.ts
 * @description Error classes raised by the symbol builder and the failure taxonomy
 * reported across the public boundary.
 */

/**
 * The lowest level error generated by the library.
 * Carries a human readable explanation alongside the standard message.
 */
export class LowlevelError extends Error {
  explain: string;
  constructor(message: string) {
    super(message);
    this.name = 'LowlevelError';
    this.explain = message;
  }
}

/** The kinds of failure an operation can report */
export type FaultKind = 'NotFound' | 'InvalidArgument' | 'Unsupported' | 'Unexpected' | 'ImportFailure';

/**
 * An error tagged with its failure kind.
 */
export class SymbolError extends LowlevelError {
  readonly kind: FaultKind;
  constructor(kind: FaultKind, message: string) {
    super(message);
    this.name = 'SymbolError';
    this.kind = kind;
  }
}

/** A name, offset, or id lookup missed */
export class NotFoundError extends SymbolError {
  constructor(message: string) {
    super('NotFound', message);
    this.name = 'NotFoundError';
  }
}

/** Malformed input: bad type syntax, out-of-bounds offsets, overlapping ranges... */
export class InvalidArgumentError extends SymbolError {
  constructor(message: string) {
    super('InvalidArgument', message);
    this.name = 'InvalidArgumentError';
  }
}

/** The request needs something that is switched off or not implemented for the target */
export class UnsupportedError extends SymbolError {
  constructor(message: string) {
    super('Unsupported', message);
    this.name = 'UnsupportedError';
  }
}

/** An internal invariant was violated, e.g. an id resolving to the wrong kind of symbol */
export class UnexpectedError extends SymbolError {
  constructor(message: string) {
    super('Unexpected', message);
    this.name = 'UnexpectedError';
  }
}

/** The secondary symbol source could not supply what was asked of it */
export class ImportFailureError extends SymbolError {
  constructor(message: string) {
    super('ImportFailure', message);
    this.name = 'ImportFailureError';
  }
}

// ---------------------------------------------------------------------------
// Boundary conversion
// ---------------------------------------------------------------------------

export interface Fault {
  kind: FaultKind;
  message: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; fault: Fault };

/**
 * Convert anything thrown inside the library into a Fault.
 * Errors that do not carry a kind are internal invariant violations.
 */
export function toFault(err: unknown): Fault {
  if (err instanceof SymbolError)
    return { kind: err.kind, message: err.explain };
  if (err instanceof LowlevelError)
    return { kind: 'Unexpected', message: err.explain };
  if (err instanceof Error)
    return { kind: 'Unexpected', message: `${err.name}: ${err.message}` };
  return { kind: 'Unexpected', message: String(err) };
}

/**
 * Run `fn` and capture its result or failure. Nothing thrown by `fn` escapes.
 */
export function guard<T>(fn: () => T): Outcome<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    return { ok: false, fault: toFault(err) };
  }
}
