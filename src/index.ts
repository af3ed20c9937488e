/**
 * @file index.ts
 * @description Public surface of the symbol builder.
 */

export * from './core/types.js';
export * from './core/error.js';
export * from './core/log.js';
export * from './core/options.js';
export { RangeIndex, RangeCell } from './core/rangemap.js';
export { PointIndex, type PointEntry } from './core/pointmap.js';

export * from './symbols/value.js';
export * from './symbols/registers.js';
export * from './symbols/location.js';
export * from './symbols/services.js';
export * from './symbols/symbol.js';
export * from './symbols/type.js';
export * from './symbols/data.js';
export * from './symbols/function.js';
export * from './symbols/scope.js';
export * from './symbols/symbolset.js';
export * from './symbols/importer.js';

export * from './analysis/callconv.js';
export { RangeBuilder } from './analysis/rangebuilder.js';

export * from './api/manager.js';
export * from './api/builderapi.js';
