import { WhereClause } from '../clause/where';
import { compile } from '../compiler/compile';
import { mergeValues } from './insert-builder';

import type { Clause } from '../clause/clause';
import type { ColumnElem, TableElem } from '../clause/elements';
import type { CompilerContext } from '../compiler/compiler-context';
import type { Dialect } from '../dialect/dialect';
import type { CompiledQuery } from '../types';

export interface UpdateComponents {
  readonly table: TableElem;
  readonly values: ReadonlyMap<string, unknown>;
  readonly where?: WhereClause;
  readonly returning: readonly ColumnElem[];
}

export class UpdateStmt implements Clause {
  readonly kind = 'update';

  readonly components: UpdateComponents;

  constructor(table: TableElem, components: Partial<Omit<UpdateComponents, 'table'>> = {}) {
    this.components = {
      ...components,
      table,
      values: components.values ?? new Map(),
      returning: components.returning ?? [],
    };
  }

  /**
   * Set column values, merged over any set before
   */
  values(values: Record<string, unknown>): UpdateStmt {
    return this.with({ values: mergeValues(this.components.values, values) });
  }

  where(clause: Clause): UpdateStmt {
    return this.with({ where: clause instanceof WhereClause ? clause : new WhereClause(clause) });
  }

  returning(...columns: ColumnElem[]): UpdateStmt {
    return this.with({ returning: columns });
  }

  build(dialect: Dialect): CompiledQuery {
    return compile(this, dialect);
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitUpdate(context, this);
  }

  private with(changes: Partial<Omit<UpdateComponents, 'table'>>): UpdateStmt {
    return new UpdateStmt(this.components.table, { ...this.components, ...changes });
  }
}
