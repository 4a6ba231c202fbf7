/**
 * Expression factories
 *
 * Plain functions building Clause values, so conditions read close to the SQL
 * they render:
 *
 * @example
 * ```typescript
 * and(eq(users.c('active'), true), or(users.c('role').eq('admin'), text('1 = 1')));
 * ```
 */

import {
  AggregateClause,
  AliasClause,
  BinaryExpressionClause,
  BindClause,
  CombinerClause,
  ExistsClause,
  ListClause,
  TextClause,
  toClause,
} from './clause';
import { ColumnElem, TableElem } from './elements';

import type { Clause } from './clause';

export function table(name: string): TableElem {
  return new TableElem(name);
}

export function column(tableName: string, name: string): ColumnElem {
  return new ColumnElem(tableName, name);
}

/**
 * Raw SQL, rendered as-is. Never put user input here; use `bind()`.
 */
export function text(sql: string): TextClause {
  return new TextClause(sql);
}

export function bind(value: unknown): BindClause {
  return new BindClause(value);
}

export function and(...clauses: Clause[]): CombinerClause {
  return new CombinerClause('AND', clauses);
}

export function or(...clauses: Clause[]): CombinerClause {
  return new CombinerClause('OR', clauses);
}

export function binary(left: Clause, op: string, right: unknown): BinaryExpressionClause {
  return new BinaryExpressionClause(left, op, toClause(right));
}

export function eq(left: Clause, right: unknown): BinaryExpressionClause {
  return binary(left, '=', right);
}

export function notEq(left: Clause, right: unknown): BinaryExpressionClause {
  return binary(left, '!=', right);
}

export function gt(left: Clause, right: unknown): BinaryExpressionClause {
  return binary(left, '>', right);
}

export function gte(left: Clause, right: unknown): BinaryExpressionClause {
  return binary(left, '>=', right);
}

export function lt(left: Clause, right: unknown): BinaryExpressionClause {
  return binary(left, '<', right);
}

export function lte(left: Clause, right: unknown): BinaryExpressionClause {
  return binary(left, '<=', right);
}

export function like(left: Clause, pattern: unknown): BinaryExpressionClause {
  return binary(left, 'LIKE', pattern);
}

export function notLike(left: Clause, pattern: unknown): BinaryExpressionClause {
  return binary(left, 'NOT LIKE', pattern);
}

/**
 * Parenthesized comma list; plain values are bound
 */
export function list(...values: unknown[]): ListClause {
  return new ListClause(values.map(toClause));
}

export function alias(selectable: Clause, name: string): AliasClause {
  return new AliasClause(selectable, name);
}

export function exists(select: Clause): ExistsClause {
  return new ExistsClause(select, false);
}

export function notExists(select: Clause): ExistsClause {
  return new ExistsClause(select, true);
}

export function aggregate(fn: string, clause: Clause): AggregateClause {
  return new AggregateClause(fn, clause);
}

export function count(clause: Clause): AggregateClause {
  return aggregate('COUNT', clause);
}

export function sum(clause: Clause): AggregateClause {
  return aggregate('SUM', clause);
}

export function avg(clause: Clause): AggregateClause {
  return aggregate('AVG', clause);
}

export function min(clause: Clause): AggregateClause {
  return aggregate('MIN', clause);
}

export function max(clause: Clause): AggregateClause {
  return aggregate('MAX', clause);
}
