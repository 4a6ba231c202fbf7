/**
 * Compiler Context
 *
 * Mutable state of a single compilation, passed to every visit function:
 * - bindings, appended in the order their placeholders are rendered
 * - whether rendering is inside a sub-query
 * - the default table of the enclosing statement
 * - a free-form variable bag for dialect compilers
 *
 * A context is created by `compile()` and discarded when it returns; it is
 * never shared between compilations.
 */

import type { Compiler } from './compiler';
import type { Dialect } from '../dialect/dialect';

export class CompilerContext {
  readonly binds: unknown[] = [];
  readonly vars = new Map<string, unknown>();
  readonly compiler: Compiler;

  inSubQuery = false;
  defaultTableName = '';

  constructor(readonly dialect: Dialect) {
    this.compiler = dialect.getCompiler();
  }

  /**
   * Record a value and return the placeholder standing for it
   */
  bind(value: unknown): string {
    this.binds.push(value);
    return this.dialect.placeholder();
  }

  /**
   * Run `render` in sub-query scope, where every column is qualified.
   * The previous scope is restored even if `render` throws.
   */
  withSubQuery<T>(render: () => T): T {
    const previous = this.inSubQuery;
    this.inSubQuery = true;
    try {
      return render();
    } finally {
      this.inSubQuery = previous;
    }
  }

  /**
   * Run `render` with `tableName` as the default table
   */
  withDefaultTable<T>(tableName: string, render: () => T): T {
    const previous = this.defaultTableName;
    this.defaultTableName = tableName;
    try {
      return render();
    } finally {
      this.defaultTableName = previous;
    }
  }
}
