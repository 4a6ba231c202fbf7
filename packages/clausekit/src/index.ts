/**
 * clausekit - All-in-one package
 *
 * Core clauses, statements and compiler, plus every bundled dialect,
 * registered with the dialect factory on import:
 *
 * ```bash
 * npm install clausekit
 * ```
 *
 * Or install individual packages:
 *
 * ```bash
 * npm install @clausekit/core @clausekit/postgresql
 * ```
 */

import '@clausekit/mysql/register';
import '@clausekit/postgresql/register';

// Re-export everything from core
export * from '@clausekit/core';

// Re-export all dialects
export { MySQLDialect, MySQLCompiler } from '@clausekit/mysql';
export { PostgreSQLDialect, PostgreSQLCompiler } from '@clausekit/postgresql';
