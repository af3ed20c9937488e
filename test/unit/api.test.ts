/**
 * @file api.test.ts
 * @description Tests for the manager, its processes, and the public operations facade.
 */

import { describe, it, expect } from 'vitest';
import type { uintb } from '../../src/core/types.js';
import { InvalidArgumentError, NotFoundError, UnsupportedError } from '../../src/core/error.js';
import { SymbolKind } from '../../src/symbols/symbol.js';
import type { RegisterContext } from '../../src/symbols/services.js';
import { SymbolBuilderApi } from '../../src/api/builderapi.js';
import { MODULE_BASE, faultOf, makeManager, testModule, unwrap } from './support.js';

const RSP = 335;

class FixedContext implements RegisterContext {
  constructor(private ip: uintb, private regs: Map<number, uintb>) {}

  getInstructionPointer(): uintb { return this.ip; }

  getRegisterValue(regId: number): uintb | undefined { return this.regs.get(regId); }
}

function setup(): { api: SymbolBuilderApi; text: () => string } {
  const { manager, writer } = makeManager();
  const set = manager.trackProcess('p1').createSymbolsForModule(testModule());
  return { api: new SymbolBuilderApi(manager, set), text: () => writer.toString() };
}

// ---------------------------------------------------------------------------
// SymbolBuilderManager
// ---------------------------------------------------------------------------
describe('SymbolBuilderManager', () => {
  it('tracks processes by key', () => {
    const { manager } = makeManager();
    const proc = manager.trackProcess('p1');
    expect(manager.trackProcess('p1')).toBe(proc);
    expect(manager.getProcessKeys()).toEqual(['p1']);
    expect(manager.untrackProcess('p1')).toBe(true);
    expect(manager.tryGetProcess('p1')).toBeUndefined();
    expect(manager.untrackProcess('p1')).toBe(false);
  });

  it('keeps one symbol set per module', () => {
    const { manager } = makeManager();
    const proc = manager.trackProcess('p1');
    const set = proc.createSymbolsForModule(testModule());
    expect(set.getPointerSize()).toBe(8);
    expect(proc.getSymbolsForModule('app.exe')).toBe(set);
    expect(() => proc.createSymbolsForModule(testModule()))
      .toThrow('Module app.exe already has builder symbols');
    expect(() => proc.createSymbolsForModule(testModule())).toThrow(InvalidArgumentError);
    expect(() => proc.getSymbolsForModule('other.dll')).toThrow(NotFoundError);
    expect(() => proc.getSymbolsForModule('other.dll')).toThrow('Module other.dll has no builder symbols');

    expect(proc.findSymbolsByAddress(MODULE_BASE + 0x10n)).toBe(set);
    expect(proc.findSymbolsByAddress(MODULE_BASE + 0x100000n)).toBeUndefined();
    expect(proc.deleteSymbolsForModule('app.exe')).toBe(true);
    expect(proc.getModuleNames()).toEqual([]);
  });

  it('applies options to every symbol set', () => {
    const { manager, writer } = makeManager();
    const set = manager.trackProcess('p1').createSymbolsForModule(testModule());
    expect(manager.getOptionNames()).toEqual(['demandpointers', 'demandarrays', 'autoimport', 'loglevel']);

    expect(manager.setOption('demandpointers', 'off')).toBe('Pointer types must be declared');
    expect(() => set.findTypeByName('int*')).toThrow(UnsupportedError);
    expect(() => set.findTypeByName('int*')).toThrow('Pointer type \'int*\' must be declared');

    expect(manager.setOption('loglevel', 'info')).toBe('Log level set to info');
    manager.trackProcess('p2').createSymbolsForModule(testModule('lib.dll'));
    expect(writer.toString()).toBe('info: Created symbols for lib.dll in process p2\n');
  });

  it('describes its architecture', () => {
    expect(makeManager().manager.getPointerSize()).toBe(8);
    const { manager } = makeManager({ arch: 'arm64' });
    expect(manager.getDefaultCallingConvention().getName()).toBe('windows-arm64');
    expect(manager.locationToString(manager.parseLocation('[@sp+0x10]'))).toBe('[@sp + 0x10]');
  });
});

// ---------------------------------------------------------------------------
// SymbolBuilderApi: types and members
// ---------------------------------------------------------------------------
describe('SymbolBuilderApi types', () => {
  it('creates a structure and lays out its fields', () => {
    const { api } = setup();
    const udt = unwrap(api.createUdt('Point'));
    expect(udt).toMatchObject({ id: 17, kind: 'Type', name: 'Point', typeKind: 'Udt', parentId: 0, children: [] });

    expect(unwrap(api.addField(17, 'x', 'int'))).toMatchObject({
      id: 18, kind: 'Field', typeId: 9, offset: 0, isAutomaticLayout: true, location: 'this+0x0',
    });
    expect(unwrap(api.addField(17, 'c', 'char'))).toMatchObject({ id: 19, offset: 4, location: 'this+0x4' });
    expect(unwrap(api.getSymbol(17))).toMatchObject({ size: 8, alignment: 4, children: [18, 19] });
  });

  it('pins a member before moving it', () => {
    const { api } = setup();
    api.createUdt('Point');
    api.addField(17, 'x', 'int');

    expect(faultOf(api.setMemberOffset(18, 8))).toEqual({
      kind: 'InvalidArgument', message: 'Cannot set the offset of x, which is automatic layout',
    });
    expect(unwrap(api.setMemberAutomaticLayout(18, false))).toMatchObject({ offset: 0, isAutomaticLayout: false });
    expect(unwrap(api.setMemberOffset(18, 8))).toMatchObject({ offset: 8, location: 'this+0x8' });
    expect(unwrap(api.getSymbol(17))).toMatchObject({ size: 12 });
  });

  it('assigns enumerant values', () => {
    const { api } = setup();
    const color = unwrap(api.createEnum('Color', 'int'));
    api.addEnumerant(color.id, 'Red');
    api.addEnumerant(color.id, 'Blue', 5);
    api.addEnumerant(color.id, 'Green');
    expect(unwrap(api.enumerateChildren(color.id)).map((e) => [e.name, e.value, e.location]))
      .toEqual([['Red', '0', '=0'], ['Blue', '5', '=5'], ['Green', '6', '=6']]);
  });

  it('resolves typedefs and derived types', () => {
    const { api } = setup();
    const td = unwrap(api.createTypedef('count_t', 'unsigned int'));
    expect(td).toMatchObject({ typeKind: 'Typedef', typeId: 10, size: 4 });
    expect(unwrap(api.setTypedefTarget(td.id, 'double'))).toMatchObject({ typeId: 16, size: 8 });
    expect(unwrap(api.findTypeByName('count_t[4]'))).toMatchObject({ typeKind: 'Array', size: 32, name: 'count_t[4]' });
    expect(unwrap(api.findSymbolsByRegex('^count_t')).map((s) => s.name)).toEqual(['count_t', 'count_t[4]']);
  });

  it('reports failures as faults', () => {
    const { api } = setup();
    api.createUdt('Point');
    expect(faultOf(api.getSymbol(9999))).toEqual({ kind: 'NotFound', message: 'No symbol with id 9999' });
    expect(faultOf(api.findTypeByName('Nope'))).toEqual({ kind: 'NotFound', message: 'No type named \'Nope\'' });
    expect(faultOf(api.setTypedefTarget(17, 'int'))).toEqual({
      kind: 'InvalidArgument', message: 'Symbol 17 is not a typedef',
    });
    expect(faultOf(api.setEnumerantValue(17, 1))).toEqual({
      kind: 'InvalidArgument', message: 'Symbol 17 is not an enumerant',
    });
    expect(faultOf(api.setOption('bogus'))).toEqual({ kind: 'InvalidArgument', message: 'Unknown option: bogus' });
  });

  it('deletes symbols', () => {
    const { api } = setup();
    api.createUdt('Point');
    api.addField(17, 'x', 'int');
    expect(unwrap(api.deleteSymbol(17))).toBeUndefined();
    expect(faultOf(api.getSymbol(18)).kind).toBe('NotFound');
    expect(faultOf(api.findSymbolByName('Point')).kind).toBe('NotFound');
  });
});

// ---------------------------------------------------------------------------
// SymbolBuilderApi: functions, data and scopes
// ---------------------------------------------------------------------------
describe('SymbolBuilderApi functions', () => {
  function withMain(api: SymbolBuilderApi): { fnId: number; argc: number; argv: number } {
    const fn = unwrap(api.createFunction('main', 0x1000n, 0x40, 'int', [
      { name: 'argc', typeName: 'int' },
      { name: 'argv', typeName: 'char**' },
    ]));
    const [argc, argv] = unwrap(api.enumerateChildren(fn.id, SymbolKind.Parameter)).map((p) => p.id);
    return { fnId: fn.id, argc, argv };
  }

  it('creates a function with its parameters', () => {
    const { api } = setup();
    const { fnId, argv } = withMain(api);
    const fn = unwrap(api.getSymbol(fnId));
    expect(fn).toMatchObject({ kind: 'Function', name: 'main', location: '+0x1000', moduleOffset: 0x1000n });
    expect(unwrap(api.enumerateChildren(fnId)).map((p) => p.name)).toEqual(['argc', 'argv']);

    const fnType = unwrap(api.getFunctionType(fnId));
    expect(fnType.id).toBe(fn.typeId);
    expect(fnType.typeKind).toBe('Function');

    expect(unwrap(api.moveParameterBefore(argv, 0)).children[0]).toBe(argv);
  });

  it('edits live ranges through location text', () => {
    const { api } = setup();
    const { argc } = withMain(api);
    expect(unwrap(api.addLiveRange(argc, 0, 0x10, '@ecx'))).toBe(1);
    expect(unwrap(api.addLiveRange(argc, 0x10, 0x30, '[@rsp + 0x8]'))).toBe(2);
    expect(unwrap(api.getLiveRanges(argc))).toEqual([
      { id: 1, offset: 0, size: 0x10, location: '@ecx' },
      { id: 2, offset: 0x10, size: 0x30, location: '[@rsp + 0x8]' },
    ]);

    expect(faultOf(api.addLiveRange(argc, 8, 8, '@edx'))).toEqual({
      kind: 'InvalidArgument', message: 'Live range 8+8 overlaps live range 1 of argc',
    });
    expect(faultOf(api.addLiveRange(argc, 0x40, 4, '@nosuch'))).toEqual({
      kind: 'InvalidArgument', message: 'Unknown register \'nosuch\' in location "@nosuch"',
    });

    api.setLiveRangeLocation(argc, 1, '@edx');
    api.deleteLiveRange(argc, 2);
    expect(unwrap(api.getLiveRanges(argc))).toEqual([{ id: 1, offset: 0, size: 0x10, location: '@edx' }]);
    api.deleteAllLiveRanges(argc);
    expect(unwrap(api.getLiveRanges(argc))).toEqual([]);
  });

  it('binds variables to a scope', () => {
    const { api } = setup();
    const { argc } = withMain(api);
    api.addLiveRange(argc, 0, 0x10, '@ecx');
    api.addLiveRange(argc, 0x10, 0x30, '[@rsp + 0x8]');

    expect(unwrap(api.getScopeVariables(0x1004n))).toEqual([
      { id: argc, kind: 'Parameter', name: 'argc', typeId: 9, location: '@ecx', liveRangeId: 1 },
    ]);

    const ctx = new FixedContext(MODULE_BASE + 0x1020n, new Map([[RSP, 0x7ff000n]]));
    expect(unwrap(api.getContextVariables(ctx))).toEqual([
      { id: argc, kind: 'Parameter', name: 'argc', typeId: 9, location: '[@rsp + 0x8]', liveRangeId: 2, address: 0x7ff008n },
    ]);
    expect(faultOf(api.getScopeVariables(0x5000n))).toEqual({ kind: 'NotFound', message: 'No function at offset 0x5000' });
  });

  it('finds code and data by offset', () => {
    const { api } = setup();
    withMain(api);
    expect(unwrap(api.createData('gCount', 0x3000n, 'int'))).toMatchObject({
      kind: 'Data', location: '+0x3000', moduleOffset: 0x3000n, typeId: 9,
    });
    api.createPublic('entry', 0x5000n);

    const inMain = unwrap(api.findSymbolByOffset(0x1010n));
    expect([inMain.symbol.name, inMain.residual]).toEqual(['main', 0x10n]);
    expect(faultOf(api.findSymbolByOffset(0x1010n, true)))
      .toEqual({ kind: 'NotFound', message: 'No symbol starts at offset 0x1010' });

    const pub = unwrap(api.findSymbolByOffset(0x5008n));
    expect([pub.symbol.name, pub.residual]).toEqual(['entry', 8n]);
  });

  it('needs a disassembler to build ranges', () => {
    const { api } = setup();
    const { fnId } = withMain(api);
    expect(faultOf(api.buildParameterRanges(fnId))).toEqual({
      kind: 'Unsupported', message: 'No disassembler is available to build live ranges',
    });
  });
});
