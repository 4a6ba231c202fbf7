import { AliasClause, BinaryExpressionClause, ListClause, TextClause, toClause } from './clause';
import { DeleteStmt } from '../query/delete-builder';
import { InsertStmt } from '../query/insert-builder';
import { SelectStmt } from '../query/select-builder';
import { UpdateStmt } from '../query/update-builder';
import { UpsertStmt } from '../query/upsert-builder';
import { validateIdentifier } from '../utils/validation';

import type { Clause } from './clause';
import type { CompilerContext } from '../compiler/compiler-context';

/**
 * Table reference. Also the default table of a statement, whose own columns
 * are rendered without a table prefix.
 *
 * @example
 * ```typescript
 * const users = table('users');
 * const stmt = users.select(users.c('id'), users.c('email')).where(users.c('id').eq(5));
 * ```
 */
export class TableElem implements Clause {
  readonly kind = 'table';

  constructor(readonly name: string) {
    validateIdentifier(name, 'table');
  }

  /**
   * Column of this table
   */
  c(name: string): ColumnElem {
    return new ColumnElem(this.name, name);
  }

  defaultName(): string {
    return this.name;
  }

  select(...columns: Clause[]): SelectStmt {
    return new SelectStmt().select(...columns).from(this);
  }

  insert(): InsertStmt {
    return new InsertStmt(this);
  }

  update(): UpdateStmt {
    return new UpdateStmt(this);
  }

  delete(): DeleteStmt {
    return new DeleteStmt(this);
  }

  upsert(): UpsertStmt {
    return new UpsertStmt(this);
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitTable(context, this);
  }
}

/**
 * Column reference, identified by (table, name)
 */
export class ColumnElem implements Clause {
  readonly kind = 'column';

  constructor(
    readonly table: string,
    readonly name: string,
  ) {
    validateIdentifier(table, 'table');
    validateIdentifier(name, 'column');
  }

  eq(value: unknown): BinaryExpressionClause {
    return this.compare('=', value);
  }

  notEq(value: unknown): BinaryExpressionClause {
    return this.compare('!=', value);
  }

  gt(value: unknown): BinaryExpressionClause {
    return this.compare('>', value);
  }

  gte(value: unknown): BinaryExpressionClause {
    return this.compare('>=', value);
  }

  lt(value: unknown): BinaryExpressionClause {
    return this.compare('<', value);
  }

  lte(value: unknown): BinaryExpressionClause {
    return this.compare('<=', value);
  }

  like(pattern: unknown): BinaryExpressionClause {
    return this.compare('LIKE', pattern);
  }

  notLike(pattern: unknown): BinaryExpressionClause {
    return this.compare('NOT LIKE', pattern);
  }

  in(...values: unknown[]): BinaryExpressionClause {
    return new BinaryExpressionClause(this, 'IN', new ListClause(values.map(toClause)));
  }

  notIn(...values: unknown[]): BinaryExpressionClause {
    return new BinaryExpressionClause(this, 'NOT IN', new ListClause(values.map(toClause)));
  }

  isNull(): BinaryExpressionClause {
    return new BinaryExpressionClause(this, 'IS', new TextClause('NULL'));
  }

  isNotNull(): BinaryExpressionClause {
    return new BinaryExpressionClause(this, 'IS NOT', new TextClause('NULL'));
  }

  as(alias: string): AliasClause {
    return new AliasClause(this, alias);
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitColumn(context, this);
  }

  private compare(op: string, value: unknown): BinaryExpressionClause {
    return new BinaryExpressionClause(this, op, toClause(value));
  }
}
