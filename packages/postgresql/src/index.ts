export { PostgreSQLDialect } from './dialect/postgresql-dialect';
export { PostgreSQLCompiler } from './compiler/postgresql-compiler';

// Re-export core types
export type { Dialect, DialectOptions, CompiledQuery } from '@clausekit/core';
