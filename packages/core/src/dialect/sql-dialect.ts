/**
 * SQL Dialect Base Class
 *
 * Implements the Dialect contract on top of a small configuration:
 * identifier quoting, an opt-in escaping switch, and the placeholder counter
 * for numbered parameter styles. Subclasses pick the placeholder syntax and,
 * through `createCompiler()`, the compiler that renders their statements.
 */

import { SQLCompiler } from '../compiler/sql-compiler';

import type { Dialect } from './dialect';
import type { Compiler } from '../compiler/compiler';

export interface DialectConfig {
  /** Character used to escape identifiers (e.g., ` for MySQL, " for PostgreSQL) */
  identifierQuote: string;
}

export interface DialectOptions {
  /** Quote table, column and alias names. Off by default. */
  escaping?: boolean;
}

export abstract class SQLDialect implements Dialect {
  abstract readonly name: string;
  abstract readonly config: DialectConfig;

  private parameterIndex = 0;
  private escaping: boolean;
  private compiler?: Compiler;

  constructor(options: DialectOptions = {}) {
    this.escaping = options.escaping ?? false;
  }

  /**
   * Next parameter placeholder
   * ANSI / MySQL: ?
   * PostgreSQL: $1, $2, $3...
   */
  abstract placeholder(): string;

  get escapingEnabled(): boolean {
    return this.escaping;
  }

  setEscaping(escaping: boolean): this {
    this.escaping = escaping;
    return this;
  }

  /**
   * Identifier as rendered in SQL: quoted when escaping is on, as-is otherwise
   */
  escape(identifier: string): string {
    if (!this.escaping) {
      return identifier;
    }
    return this.escapeIdentifier(identifier);
  }

  /**
   * Quote an identifier (table name, column name)
   */
  escapeIdentifier(identifier: string): string {
    const quote = this.config.identifierQuote;
    // Handle schema.table format
    return identifier
      .split('.')
      .map((part) => `${quote}${part.replaceAll(quote, quote + quote)}${quote}`)
      .join('.');
  }

  /**
   * Reset parameter index for the next compilation
   */
  reset(): void {
    this.parameterIndex = 0;
  }

  getCompiler(): Compiler {
    this.compiler ??= this.createCompiler();
    return this.compiler;
  }

  protected createCompiler(): Compiler {
    return new SQLCompiler();
  }

  /**
   * Increment and return parameter index (for PostgreSQL-style)
   */
  protected nextParameterIndex(): number {
    return ++this.parameterIndex;
  }
}
