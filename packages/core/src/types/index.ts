export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Rendered SQL and the values for its placeholders, in placeholder order.
 */
export interface CompiledQuery {
  sql: string;
  bindings: unknown[];
}

export type OrderDirection = 'ASC' | 'DESC';

export type CombinerOperator = 'AND' | 'OR';

export type JoinType = 'INNER JOIN' | 'LEFT OUTER JOIN' | 'RIGHT OUTER JOIN' | 'CROSS JOIN';
