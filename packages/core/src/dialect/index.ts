/**
 * SQL Dialect Abstraction Layer
 *
 * @module dialect
 */

export type { Dialect } from './dialect';
export { SQLDialect, type DialectConfig, type DialectOptions } from './sql-dialect';
export { DefaultDialect } from './default-dialect';
export { DialectFactory, registerDialect, type DialectCreator } from './dialect-factory';
