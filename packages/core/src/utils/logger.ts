import type { Logger } from '../types';

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[clausekit] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[clausekit] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[clausekit] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[clausekit] ${msg}`, ...args),
};
/* eslint-enable no-console */

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength = 200): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}

export function formatBindings(bindings: unknown[], maxLength = 100): string {
  const str = JSON.stringify(bindings, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
  if (str.length <= maxLength) {
    return str;
  }
  return `${str.slice(0, maxLength)}...`;
}
