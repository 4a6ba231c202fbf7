/**
 * Upsert Statement
 *
 * Insert-or-update. There is no ANSI SQL for this, so only dialect compilers
 * render it (MySQL `ON DUPLICATE KEY UPDATE`, PostgreSQL `ON CONFLICT`).
 */

import { compile } from '../compiler/compile';
import { mergeValues } from './insert-builder';

import type { Clause } from '../clause/clause';
import type { ColumnElem, TableElem } from '../clause/elements';
import type { CompilerContext } from '../compiler/compiler-context';
import type { Dialect } from '../dialect/dialect';
import type { CompiledQuery } from '../types';

export interface UpsertComponents {
  readonly table: TableElem;
  readonly values: ReadonlyMap<string, unknown>;
  /** Unique key columns a conflict is detected on */
  readonly conflictColumns: readonly ColumnElem[];
  readonly returning: readonly ColumnElem[];
}

export class UpsertStmt implements Clause {
  readonly kind = 'upsert';

  readonly components: UpsertComponents;

  constructor(table: TableElem, components: Partial<Omit<UpsertComponents, 'table'>> = {}) {
    this.components = {
      table,
      values: components.values ?? new Map(),
      conflictColumns: components.conflictColumns ?? [],
      returning: components.returning ?? [],
    };
  }

  values(values: Record<string, unknown>): UpsertStmt {
    return this.with({ values: mergeValues(this.components.values, values) });
  }

  onConflict(...columns: ColumnElem[]): UpsertStmt {
    return this.with({ conflictColumns: columns });
  }

  returning(...columns: ColumnElem[]): UpsertStmt {
    return this.with({ returning: columns });
  }

  build(dialect: Dialect): CompiledQuery {
    return compile(this, dialect);
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitUpsert(context, this);
  }

  private with(changes: Partial<Omit<UpsertComponents, 'table'>>): UpsertStmt {
    return new UpsertStmt(this.components.table, { ...this.components, ...changes });
  }
}
