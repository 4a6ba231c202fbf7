export * from './types';
export * from './errors';
export * from './utils';
export * from './clause';
export * from './query';
export * from './dialect';

export type { Compiler } from './compiler/compiler';
export { CompilerContext } from './compiler/compiler-context';
export { SQLCompiler } from './compiler/sql-compiler';
export { compile } from './compiler/compile';

export { SQLBuilder } from './sql-builder';
export type {
  SQLBuilderConfig,
  SQLBuilderEvents,
  CompileEvent,
  CompileErrorEvent,
} from './sql-builder';
