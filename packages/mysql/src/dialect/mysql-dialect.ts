/**
 * MySQL Dialect Implementation
 *
 * - Backtick (`) identifier quoting, through mysql2's escapeId
 * - Positional (?) parameter placeholders
 * - Upsert as INSERT ... ON DUPLICATE KEY UPDATE
 */

import mysql from 'mysql2';

import { SQLDialect } from '@clausekit/core';

import { MySQLCompiler } from '../compiler/mysql-compiler';

import type { Compiler, DialectConfig } from '@clausekit/core';

export class MySQLDialect extends SQLDialect {
  readonly name = 'mysql';

  readonly config: DialectConfig = {
    identifierQuote: '`',
  };

  /**
   * MySQL uses ? for all positional parameters
   */
  placeholder(): string {
    return '?';
  }

  /**
   * `db.table` is split and each part quoted
   */
  override escapeIdentifier(identifier: string): string {
    return mysql.escapeId(identifier);
  }

  protected override createCompiler(): Compiler {
    return new MySQLCompiler();
  }
}
