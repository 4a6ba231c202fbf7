/**
 * ANSI SQL Compiler
 *
 * Reference implementation of the Compiler visitor. Visit functions are only
 * reached through `accept` or `context.compiler`, never `this`, so a dialect
 * subclass overriding one of them is picked up everywhere.
 */

import { isClause } from '../clause/clause';
import { NotImplementedError } from '../errors';
import { SelectStmt } from '../query/select-builder';

import type { Compiler } from './compiler';
import type { CompilerContext } from './compiler-context';
import type {
  AggregateClause,
  AliasClause,
  BinaryExpressionClause,
  BindClause,
  CombinerClause,
  ExistsClause,
  ListClause,
  TextClause,
} from '../clause/clause';
import type { ColumnElem, TableElem } from '../clause/elements';
import type { HavingClause } from '../clause/having';
import type { JoinClause } from '../clause/join';
import type { OrderByClause } from '../clause/order-by';
import type { WhereClause } from '../clause/where';
import type { DeleteStmt } from '../query/delete-builder';
import type { InsertStmt } from '../query/insert-builder';
import type { UpdateStmt } from '../query/update-builder';
import type { UpsertStmt } from '../query/upsert-builder';

export class SQLCompiler implements Compiler {
  /**
   * Aggregate functions: COUNT(x), SUM(x)...
   */
  visitAggregate(context: CompilerContext, aggregate: AggregateClause): string {
    return `${aggregate.fn}(${aggregate.clause.accept(context)})`;
  }

  visitAlias(context: CompilerContext, alias: AliasClause): string {
    return `${alias.selectable.accept(context)} AS ${context.dialect.escape(alias.name)}`;
  }

  visitBinary(context: CompilerContext, binary: BinaryExpressionClause): string {
    return `${binary.left.accept(context)} ${binary.op} ${binary.right.accept(context)}`;
  }

  visitBind(context: CompilerContext, bind: BindClause): string {
    return context.bind(bind.value);
  }

  /**
   * Columns of the default table are left unqualified, except inside a
   * sub-query where every column carries its table.
   */
  visitColumn(context: CompilerContext, column: ColumnElem): string {
    const name = context.compiler.visitLabel(context, column.name);
    if (context.inSubQuery || context.defaultTableName !== column.table) {
      return `${context.compiler.visitLabel(context, column.table)}.${name}`;
    }
    return name;
  }

  /**
   * AND / OR groups, one pair of parentheses around the whole group
   */
  visitCombiner(context: CompilerContext, combiner: CombinerClause): string {
    const parts = combiner.clauses.map((clause) => clause.accept(context));
    return `(${parts.join(` ${combiner.operator} `)})`;
  }

  visitDelete(context: CompilerContext, deleteStmt: DeleteStmt): string {
    const { table, where, returning } = deleteStmt.components;

    return context.withDefaultTable(table.name, () => {
      let sql = `DELETE FROM ${table.accept(context)}`;
      if (where) {
        sql += `\n${where.accept(context)}`;
      }
      return sql + this.renderReturning(context, returning);
    });
  }

  visitExists(context: CompilerContext, exists: ExistsClause): string {
    const keyword = exists.not ? 'NOT EXISTS' : 'EXISTS';
    const inner = context.withSubQuery(() => exists.select.accept(context));
    return `${keyword}(${inner})`;
  }

  /**
   * The aggregate is rendered before the value is bound, keeping bindings in
   * placeholder order.
   */
  visitHaving(context: CompilerContext, having: HavingClause): string {
    const aggregateSql = having.aggregate.accept(context);
    return `HAVING ${aggregateSql} ${having.op} ${context.bind(having.value)}`;
  }

  visitInsert(context: CompilerContext, insert: InsertStmt): string {
    const { table, values, returning } = insert.components;

    return context.withDefaultTable(table.name, () => {
      const entries = this.sortedEntries(values);
      const columns = entries.map(([name]) => context.compiler.visitLabel(context, name));
      const placeholders = entries.map(([, value]) => this.renderValue(context, value));

      const sql =
        `INSERT INTO ${table.accept(context)}(${columns.join(', ')})\n` +
        `VALUES(${placeholders.join(', ')})`;
      return sql + this.renderReturning(context, returning);
    });
  }

  visitJoin(context: CompilerContext, join: JoinClause): string {
    let sql = `${join.left.accept(context)}\n${join.joinType} ${join.right.accept(context)}`;
    if (join.onClause) {
      sql += ` ON ${join.onClause.accept(context)}`;
    }
    return sql;
  }

  visitLabel(context: CompilerContext, label: string): string {
    return context.dialect.escape(label);
  }

  visitList(context: CompilerContext, list: ListClause): string {
    return `(${list.clauses.map((clause) => clause.accept(context)).join(', ')})`;
  }

  visitOrderBy(context: CompilerContext, orderBy: OrderByClause): string {
    const columns = orderBy.columns.map((column) => column.accept(context));
    return `ORDER BY ${columns.join(', ')} ${orderBy.direction}`;
  }

  /**
   * One line per clause, in SQL order; unset clauses are left out.
   * LIMIT is only rendered when both offset and count are set.
   */
  visitSelect(context: CompilerContext, select: SelectStmt): string {
    const { columns, from, where, groupBy, having, orderBy, offset, count } = select.components;

    const render = (): string => {
      const lines: string[] = [];

      lines.push(`SELECT ${columns.map((column) => column.accept(context)).join(', ')}`);

      if (from) {
        lines.push(`FROM ${from.accept(context)}`);
      }

      if (where) {
        lines.push(where.accept(context));
      }

      if (groupBy.length > 0) {
        const names = groupBy.map((column) => context.compiler.visitLabel(context, column.name));
        lines.push(`GROUP BY ${names.join(', ')}`);
      }

      if (having) {
        lines.push(having.accept(context));
      }

      if (orderBy) {
        lines.push(orderBy.accept(context));
      }

      if (offset !== undefined && count !== undefined) {
        lines.push(`LIMIT ${count} OFFSET ${offset}`);
      }

      return lines.join('\n');
    };

    // A sub-select keeps the outer statement's default table
    if (context.inSubQuery || !from) {
      return render();
    }
    return context.withDefaultTable(from.defaultName(), render);
  }

  visitTable(context: CompilerContext, table: TableElem): string {
    return context.compiler.visitLabel(context, table.name);
  }

  visitText(_context: CompilerContext, text: TextClause): string {
    return text.text;
  }

  visitUpdate(context: CompilerContext, update: UpdateStmt): string {
    const { table, values, where, returning } = update.components;

    return context.withDefaultTable(table.name, () => {
      let sql = `UPDATE ${table.accept(context)}`;

      const sets = this.sortedEntries(values).map(
        ([name, value]) =>
          `${context.compiler.visitLabel(context, name)} = ${this.renderValue(context, value)}`,
      );
      if (sets.length > 0) {
        sql += `\nSET ${sets.join(', ')}`;
      }

      if (where) {
        sql += `\n${where.accept(context)}`;
      }

      return sql + this.renderReturning(context, returning);
    });
  }

  /**
   * ANSI SQL has no upsert; dialect compilers override this.
   */
  visitUpsert(context: CompilerContext, _upsert: UpsertStmt): string {
    throw new NotImplementedError(`upsert in the ${context.dialect.name} dialect`);
  }

  visitWhere(context: CompilerContext, where: WhereClause): string {
    return `WHERE ${where.clause.accept(context)}`;
  }

  /**
   * `\nRETURNING a, b`, or nothing when no columns are requested
   */
  protected renderReturning(context: CompilerContext, columns: readonly ColumnElem[]): string {
    if (columns.length === 0) {
      return '';
    }
    return `\nRETURNING ${columns.map((column) => column.accept(context)).join(', ')}`;
  }

  /**
   * A column value: a sub-select is parenthesized and rendered in sub-query
   * scope, other clauses (`text('visits + 1')`) in place, anything else is bound.
   */
  protected renderValue(context: CompilerContext, value: unknown): string {
    if (value instanceof SelectStmt) {
      return `(${context.withSubQuery(() => value.accept(context))})`;
    }
    return isClause(value) ? value.accept(context) : context.bind(value);
  }

  /**
   * Column values sorted by column name, so output does not depend on the
   * order values were set in.
   */
  protected sortedEntries(values: ReadonlyMap<string, unknown>): Array<[string, unknown]> {
    return [...values.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }
}
