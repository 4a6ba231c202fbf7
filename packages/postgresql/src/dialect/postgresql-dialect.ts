/**
 * PostgreSQL Dialect Implementation
 *
 * Handles PostgreSQL-specific SQL syntax:
 * - Double quote (") identifier quoting, through pg's escapeIdentifier
 * - Numbered ($1, $2) parameter placeholders
 * - Upsert as INSERT ... ON CONFLICT
 */

import pg from 'pg';

import { SQLDialect } from '@clausekit/core';

import { PostgreSQLCompiler } from '../compiler/postgresql-compiler';

import type { Compiler, DialectConfig } from '@clausekit/core';

export class PostgreSQLDialect extends SQLDialect {
  readonly name = 'postgresql';

  readonly config: DialectConfig = {
    identifierQuote: '"',
  };

  /**
   * PostgreSQL uses $1, $2, $3... for positional parameters
   */
  placeholder(): string {
    return `$${this.nextParameterIndex()}`;
  }

  override escapeIdentifier(identifier: string): string {
    // Handle schema.table format
    return identifier
      .split('.')
      .map((part) => pg.escapeIdentifier(part))
      .join('.');
  }

  protected override createCompiler(): Compiler {
    return new PostgreSQLCompiler();
  }
}
