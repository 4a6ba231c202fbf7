export { MySQLDialect } from './dialect/mysql-dialect';
export { MySQLCompiler } from './compiler/mysql-compiler';

// Re-export core types
export type { Dialect, DialectOptions, CompiledQuery } from '@clausekit/core';
