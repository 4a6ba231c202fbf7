/**
 * Insert Statement
 *
 * @example
 * ```typescript
 * const users = table('users');
 * users.insert().values({ email: 'jane@example.com', name: 'Jane' }).returning(users.c('id'));
 * ```
 */

import { compile } from '../compiler/compile';

import type { Clause } from '../clause/clause';
import type { ColumnElem, TableElem } from '../clause/elements';
import type { CompilerContext } from '../compiler/compiler-context';
import type { Dialect } from '../dialect/dialect';
import type { CompiledQuery } from '../types';

export interface InsertComponents {
  readonly table: TableElem;
  readonly values: ReadonlyMap<string, unknown>;
  readonly returning: readonly ColumnElem[];
}

export class InsertStmt implements Clause {
  readonly kind = 'insert';

  readonly components: InsertComponents;

  constructor(table: TableElem, components: Partial<Omit<InsertComponents, 'table'>> = {}) {
    this.components = {
      table,
      values: components.values ?? new Map(),
      returning: components.returning ?? [],
    };
  }

  /**
   * Set column values, merged over any set before
   */
  values(values: Record<string, unknown>): InsertStmt {
    return new InsertStmt(this.components.table, {
      ...this.components,
      values: mergeValues(this.components.values, values),
    });
  }

  returning(...columns: ColumnElem[]): InsertStmt {
    return new InsertStmt(this.components.table, { ...this.components, returning: columns });
  }

  build(dialect: Dialect): CompiledQuery {
    return compile(this, dialect);
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitInsert(context, this);
  }
}

export function mergeValues(
  current: ReadonlyMap<string, unknown>,
  values: Record<string, unknown>,
): ReadonlyMap<string, unknown> {
  const merged = new Map(current);
  for (const [column, value] of Object.entries(values)) {
    merged.set(column, value);
  }
  return merged;
}
