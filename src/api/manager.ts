/**
 * @file manager.ts
 * @description The symbol builder context: configuration, log, register table and the
 * symbol sets of every tracked process.
 *
 * There is no global registry. A host creates one SymbolBuilderManager per debugging
 * session and passes it wherever symbols are built.
 */

import type { SymbolId, uintb } from '../core/types.js';
import { InvalidArgumentError, NotFoundError, UnsupportedError } from '../core/error.js';
import { type LogSink, MessageLog, StderrLogSink } from '../core/log.js';
import { type BuilderConfig, OptionDatabase, defaultConfig } from '../core/options.js';
import { RegisterTable } from '../symbols/registers.js';
import { type SymbolLocation, parseLocation, locationToString } from '../symbols/location.js';
import { SymbolSet } from '../symbols/symbolset.js';
import type { ArchitectureInfo, Disassembler, ModuleInfo } from '../symbols/services.js';
import { type CallingConvention, createDefaultConvention } from '../analysis/callconv.js';
import { RangeBuilder } from '../analysis/rangebuilder.js';

export interface ManagerOptions {
  architecture: ArchitectureInfo;
  disassembler?: Disassembler;
  config?: Partial<BuilderConfig>;
  /** Destination of log output; stderr by default */
  logSink?: LogSink;
}

export class SymbolBuilderManager {
  private architecture: ArchitectureInfo;
  private registers: RegisterTable;
  private config: BuilderConfig;
  private options: OptionDatabase;
  private log: MessageLog;
  private disassembler: Disassembler | null;
  private convention: CallingConvention | null = null;
  private processes: Map<string, SymbolBuilderProcess> = new Map();

  constructor(opts: ManagerOptions) {
    this.architecture = opts.architecture;
    this.registers = new RegisterTable(opts.architecture.registers);
    this.config = { ...defaultConfig(), ...opts.config };
    this.options = new OptionDatabase(this.config);
    this.log = new MessageLog(opts.logSink ?? new StderrLogSink(), () => this.config.logLevel);
    this.disassembler = opts.disassembler ?? null;
  }

  getArchitecture(): ArchitectureInfo { return this.architecture; }

  getRegisters(): RegisterTable { return this.registers; }

  getConfig(): BuilderConfig { return this.config; }

  getLog(): MessageLog { return this.log; }

  /** Pointer width in bytes */
  getPointerSize(): number { return this.architecture.bitness / 8; }

  /**
   * Change a configuration option by name.
   * @returns the option's confirmation message
   */
  setOption(name: string, p1: string = '', p2: string = '', p3: string = ''): string {
    return this.options.set(name, p1, p2, p3);
  }

  getOptionNames(): string[] { return this.options.getNames(); }

  setDisassembler(disassembler: Disassembler | null): void {
    this.disassembler = disassembler;
  }

  // -- processes --

  /** The process tracked under 'key', created on first use */
  trackProcess(key: string): SymbolBuilderProcess {
    let proc = this.processes.get(key);
    if (proc === undefined) {
      proc = new SymbolBuilderProcess(this, key);
      this.processes.set(key, proc);
    }
    return proc;
  }

  tryGetProcess(key: string): SymbolBuilderProcess | undefined {
    return this.processes.get(key);
  }

  /** Stop tracking a process, dropping the symbols of its modules */
  untrackProcess(key: string): boolean {
    return this.processes.delete(key);
  }

  getProcessKeys(): string[] { return [...this.processes.keys()]; }

  // -- locations --

  parseLocation(text: string): SymbolLocation {
    return parseLocation(text, this.registers);
  }

  locationToString(loc: SymbolLocation): string {
    return locationToString(loc, this.registers);
  }

  // -- analysis --

  getDefaultCallingConvention(): CallingConvention {
    if (this.convention === null) {
      this.convention = createDefaultConvention(this.architecture.name, this.registers);
    }
    return this.convention;
  }

  /**
   * Recompute the live ranges of a function's parameters from its code.
   * @returns the number of live ranges written
   */
  buildParameterRanges(symbolSet: SymbolSet, functionId: SymbolId): number {
    if (this.disassembler === null)
      throw new UnsupportedError('No disassembler is available to build live ranges');
    const fn = symbolSet.getFunction(functionId);
    const builder = new RangeBuilder(this.disassembler, this.log);
    return builder.propagateParameterRanges(fn, this.getDefaultCallingConvention());
  }
}

/**
 * The symbol sets of the modules of one process.
 */
export class SymbolBuilderProcess {
  private manager: SymbolBuilderManager;
  private key: string;
  private modules: Map<string, SymbolSet> = new Map();

  constructor(manager: SymbolBuilderManager, key: string) {
    this.manager = manager;
    this.key = key;
  }

  getManager(): SymbolBuilderManager { return this.manager; }

  getKey(): string { return this.key; }

  /**
   * Start a symbol set for a module. A module has at most one.
   */
  createSymbolsForModule(module: ModuleInfo): SymbolSet {
    if (this.modules.has(module.name))
      throw new InvalidArgumentError(`Module ${module.name} already has builder symbols`);
    const symbolSet = new SymbolSet(module, {
      pointerSize: this.manager.getPointerSize(),
      config: this.manager.getConfig(),
      log: this.manager.getLog(),
    });
    this.modules.set(module.name, symbolSet);
    this.manager.getLog().info(`Created symbols for ${module.name} in process ${this.key}`);
    return symbolSet;
  }

  tryGetSymbolsForModule(name: string): SymbolSet | undefined {
    return this.modules.get(name);
  }

  getSymbolsForModule(name: string): SymbolSet {
    const symbolSet = this.modules.get(name);
    if (symbolSet === undefined)
      throw new NotFoundError(`Module ${name} has no builder symbols`);
    return symbolSet;
  }

  /** The symbol set of the module containing an absolute address */
  findSymbolsByAddress(address: uintb): SymbolSet | undefined {
    for (const symbolSet of this.modules.values()) {
      const mod = symbolSet.getModule();
      if (address >= mod.baseAddress && address < mod.baseAddress + mod.size) return symbolSet;
    }
    return undefined;
  }

  deleteSymbolsForModule(name: string): boolean {
    return this.modules.delete(name);
  }

  getModuleNames(): string[] { return [...this.modules.keys()]; }
}
