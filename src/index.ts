// Public library surface.

export const VERSION = '0.1.0';

export * from './errors';
export * from './util/result';
export * from './util/deterministicJson';

export * from './schema/types';
export { RESERVED_NAMES, RESERVED_LETTERS, kebabCase, mergeVisibility, isVisible } from './schema/names';
export * from './schema/flagStruct';
export * from './schema/schema';
export * from './values/argValues';
export { leaderDots } from './usage/renderUsage';

export * from './table/flagTable';
export * from './table/loadFlagTable';
export * from './scan/tableScanner';
export * from './check/checkTables';
export * from './report/checkReport';
export * from './report/writeReport';
export * from './extract/extractFlagTables';

export { runApp, type RunAppOptions } from './cli/app';
