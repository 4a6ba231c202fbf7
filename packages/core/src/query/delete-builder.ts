import { WhereClause } from '../clause/where';
import { compile } from '../compiler/compile';

import type { Clause } from '../clause/clause';
import type { ColumnElem, TableElem } from '../clause/elements';
import type { CompilerContext } from '../compiler/compiler-context';
import type { Dialect } from '../dialect/dialect';
import type { CompiledQuery } from '../types';

export interface DeleteComponents {
  readonly table: TableElem;
  readonly where?: WhereClause;
  readonly returning: readonly ColumnElem[];
}

/**
 * Delete Statement
 *
 * A delete without `where()` removes every row of the table; nothing here
 * guards against that.
 */
export class DeleteStmt implements Clause {
  readonly kind = 'delete';

  readonly components: DeleteComponents;

  constructor(table: TableElem, components: Partial<Omit<DeleteComponents, 'table'>> = {}) {
    this.components = {
      ...components,
      table,
      returning: components.returning ?? [],
    };
  }

  where(clause: Clause): DeleteStmt {
    return new DeleteStmt(this.components.table, {
      ...this.components,
      where: clause instanceof WhereClause ? clause : new WhereClause(clause),
    });
  }

  returning(...columns: ColumnElem[]): DeleteStmt {
    return new DeleteStmt(this.components.table, { ...this.components, returning: columns });
  }

  build(dialect: Dialect): CompiledQuery {
    return compile(this, dialect);
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitDelete(context, this);
  }
}
