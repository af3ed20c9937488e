/**
 * @file options.ts
 * @description Configuration of a symbol builder context and the named option
 * commands that change it.
 */

import { InvalidArgumentError } from './error.js';
import { LogLevel, parseLogLevel } from './log.js';

/**
 * Settings shared by every symbol set created from one context.
 */
export interface BuilderConfig {
  /** Synthesize pointer types for names ending in *, &, && or ^ */
  demandCreatePointers: boolean;
  /** Synthesize array types for names ending in [N] */
  demandCreateArrays: boolean;
  /** Consult the attached importer before name/offset lookups */
  autoImport: boolean;
  logLevel: LogLevel;
}

export function defaultConfig(): BuilderConfig {
  return {
    demandCreatePointers: true,
    demandCreateArrays: true,
    autoImport: true,
    logLevel: LogLevel.Warning,
  };
}

// ---------------------------------------------------------------------------
// BuilderOption - base class
// ---------------------------------------------------------------------------

/**
 * Base class for option commands that affect a BuilderConfig.
 *
 * Each instance modifies the configuration through its apply() method, which is handed
 * the configuration along with up to three string parameters.
 */
export abstract class BuilderOption {
  protected name: string = '';

  /** Return the name of the option */
  getName(): string {
    return this.name;
  }

  /**
   * Apply the option to the configuration.
   * @returns a confirmation message
   */
  abstract apply(config: BuilderConfig, p1: string, p2: string, p3: string): string;

  /**
   * Parse an "on" or "off" string. An empty string defaults to true.
   */
  static onOrOff(p: string): boolean {
    if (p.length === 0)
      return true;
    if (p === 'on')
      return true;
    if (p === 'off')
      return false;
    throw new InvalidArgumentError('Must specify toggle value, on/off');
  }
}

// ---------------------------------------------------------------------------
// OptionDatabase
// ---------------------------------------------------------------------------

/**
 * Dispatcher for option commands, keyed by option name.
 */
export class OptionDatabase {
  private config: BuilderConfig;
  private optionmap: Map<string, BuilderOption> = new Map();

  private registerOption(option: BuilderOption): void {
    this.optionmap.set(option.getName(), option);
  }

  constructor(config: BuilderConfig) {
    this.config = config;
    this.registerOption(new OptionDemandPointers());
    this.registerOption(new OptionDemandArrays());
    this.registerOption(new OptionAutoImport());
    this.registerOption(new OptionLogLevel());
  }

  /** Names of all registered options */
  getNames(): string[] {
    return [...this.optionmap.keys()];
  }

  /**
   * Issue an option command.
   * @returns the confirmation message of the option
   */
  set(name: string, p1: string = '', p2: string = '', p3: string = ''): string {
    const opt = this.optionmap.get(name);
    if (opt === undefined)
      throw new InvalidArgumentError(`Unknown option: ${name}`);
    return opt.apply(this.config, p1, p2, p3);
  }
}

// ---------------------------------------------------------------------------
// Concrete BuilderOption subclasses
// ---------------------------------------------------------------------------

/**
 * Toggle synthesis of pointer types during type-name resolution.
 */
export class OptionDemandPointers extends BuilderOption {
  constructor() {
    super();
    this.name = 'demandpointers';
  }

  apply(config: BuilderConfig, p1: string, _p2: string, _p3: string): string {
    const val = BuilderOption.onOrOff(p1);
    config.demandCreatePointers = val;
    return val ? 'Pointer types are created on demand' : 'Pointer types must be declared';
  }
}

/**
 * Toggle synthesis of array types during type-name resolution.
 */
export class OptionDemandArrays extends BuilderOption {
  constructor() {
    super();
    this.name = 'demandarrays';
  }

  apply(config: BuilderConfig, p1: string, _p2: string, _p3: string): string {
    const val = BuilderOption.onOrOff(p1);
    config.demandCreateArrays = val;
    return val ? 'Array types are created on demand' : 'Array types must be declared';
  }
}

/**
 * Toggle consulting the secondary symbol source before lookups.
 */
export class OptionAutoImport extends BuilderOption {
  constructor() {
    super();
    this.name = 'autoimport';
  }

  apply(config: BuilderConfig, p1: string, _p2: string, _p3: string): string {
    const val = BuilderOption.onOrOff(p1);
    config.autoImport = val;
    return val ? 'Importing on lookup enabled' : 'Importing on lookup disabled';
  }
}

/**
 * Set the threshold of the message log.
 */
export class OptionLogLevel extends BuilderOption {
  constructor() {
    super();
    this.name = 'loglevel';
  }

  apply(config: BuilderConfig, p1: string, _p2: string, _p3: string): string {
    const level = parseLogLevel(p1);
    if (level === undefined)
      throw new InvalidArgumentError(`Unknown log level: ${p1}`);
    config.logLevel = level;
    return 'Log level set to ' + p1.toLowerCase();
  }
}
