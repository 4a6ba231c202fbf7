/**
 * Select Statement
 *
 * Immutable fluent builder for SELECT statements. Every method returns a new
 * statement, so a base query can be shared and specialised freely.
 *
 * @example
 * ```typescript
 * const users = table('users');
 * const { sql, bindings } = users
 *   .select(users.c('id'), users.c('email'))
 *   .where(users.c('active').eq(true))
 *   .orderBy(users.c('created_at'))
 *   .desc()
 *   .limit(0, 10)
 *   .build(new DefaultDialect());
 * ```
 */

import { JoinClause } from '../clause/join';
import { HavingClause } from '../clause/having';
import { OrderByClause } from '../clause/order-by';
import { WhereClause } from '../clause/where';
import { compile } from '../compiler/compile';
import { ValidationError } from '../errors';
import { validateRowCount } from '../utils/validation';

import type { AggregateClause, Clause } from '../clause/clause';
import type { ColumnElem, TableElem } from '../clause/elements';
import type { Selectable } from '../clause/join';
import type { CompilerContext } from '../compiler/compiler-context';
import type { Dialect } from '../dialect/dialect';
import type { CompiledQuery, JoinType } from '../types';

export interface SelectComponents {
  readonly columns: readonly Clause[];
  readonly from?: Selectable;
  readonly where?: WhereClause;
  readonly groupBy: readonly ColumnElem[];
  readonly having?: HavingClause;
  readonly orderBy?: OrderByClause;
  readonly offset?: number;
  readonly count?: number;
}

export class SelectStmt implements Clause {
  readonly kind = 'select';

  readonly components: SelectComponents;

  constructor(components: Partial<SelectComponents> = {}) {
    this.components = {
      ...components,
      columns: components.columns ?? [],
      groupBy: components.groupBy ?? [],
    };
  }

  /**
   * Set columns to select
   */
  select(...columns: Clause[]): SelectStmt {
    return this.with({ columns });
  }

  /**
   * Set FROM table (or join chain)
   */
  from(selectable: Selectable): SelectStmt {
    return this.with({ from: selectable });
  }

  /**
   * Set WHERE condition, replacing any previous one
   */
  where(clause: Clause): SelectStmt {
    return this.with({ where: clause instanceof WhereClause ? clause : new WhereClause(clause) });
  }

  // ============ JOIN Methods ============

  innerJoin(table: TableElem, fromCol: ColumnElem, col: ColumnElem): SelectStmt {
    return this.join('INNER JOIN', table, fromCol.eq(col));
  }

  leftJoin(table: TableElem, fromCol: ColumnElem, col: ColumnElem): SelectStmt {
    return this.join('LEFT OUTER JOIN', table, fromCol.eq(col));
  }

  rightJoin(table: TableElem, fromCol: ColumnElem, col: ColumnElem): SelectStmt {
    return this.join('RIGHT OUTER JOIN', table, fromCol.eq(col));
  }

  crossJoin(table: TableElem): SelectStmt {
    return this.join('CROSS JOIN', table);
  }

  // ============ Grouping Methods ============

  /**
   * Append columns to GROUP BY
   */
  groupBy(...columns: ColumnElem[]): SelectStmt {
    return this.with({ groupBy: [...this.components.groupBy, ...columns] });
  }

  /**
   * Set HAVING condition, replacing any previous one
   */
  having(aggregate: AggregateClause, op: string, value: unknown): SelectStmt {
    return this.with({ having: new HavingClause(aggregate, op, value) });
  }

  /**
   * Order by columns, ascending until `desc()` is called
   */
  orderBy(...columns: ColumnElem[]): SelectStmt {
    return this.with({ orderBy: new OrderByClause(columns, 'ASC') });
  }

  asc(): SelectStmt {
    return this.with({ orderBy: new OrderByClause(this.requireOrderBy().columns, 'ASC') });
  }

  desc(): SelectStmt {
    return this.with({ orderBy: new OrderByClause(this.requireOrderBy().columns, 'DESC') });
  }

  // ============ Pagination Methods ============

  /**
   * Set both OFFSET and row count. LIMIT is only rendered once both are set.
   */
  limit(offset: number, count: number): SelectStmt {
    validateRowCount(offset, 'offset');
    validateRowCount(count, 'count');
    return this.with({ offset, count });
  }

  offset(offset: number): SelectStmt {
    validateRowCount(offset, 'offset');
    return this.with({ offset });
  }

  count(count: number): SelectStmt {
    validateRowCount(count, 'count');
    return this.with({ count });
  }

  /**
   * Compile with the given dialect
   */
  build(dialect: Dialect): CompiledQuery {
    return compile(this, dialect);
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitSelect(context, this);
  }

  private join(joinType: JoinType, table: TableElem, onClause?: Clause): SelectStmt {
    const from = this.components.from;
    if (!from) {
      throw new ValidationError(`${joinType} requires a FROM table`, 'from');
    }
    return this.with({ from: new JoinClause(joinType, from, table, onClause) });
  }

  private requireOrderBy(): OrderByClause {
    const orderBy = this.components.orderBy;
    if (!orderBy) {
      throw new ValidationError('Call orderBy() before setting a direction', 'orderBy');
    }
    return orderBy;
  }

  private with(changes: Partial<SelectComponents>): SelectStmt {
    return new SelectStmt({ ...this.components, ...changes });
  }
}

export function select(...columns: Clause[]): SelectStmt {
  return new SelectStmt({ columns });
}
