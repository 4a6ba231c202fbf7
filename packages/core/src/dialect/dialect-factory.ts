/**
 * Dialect Factory
 *
 * Registry of dialect constructors by name. The ANSI dialect is built in;
 * dialect packages add theirs from their `register` module:
 *
 * ```typescript
 * import '@clausekit/postgresql/register';
 *
 * const dialect = DialectFactory.createDialect('postgres', { escaping: true });
 * ```
 */

import { DefaultDialect } from './default-dialect';
import { ValidationError } from '../errors';

import type { Dialect } from './dialect';
import type { DialectOptions } from './sql-dialect';

export type DialectCreator = (options?: DialectOptions) => Dialect;

const dialectCreators = new Map<string, DialectCreator>();
const dialectCache = new Map<string, Dialect>();

/**
 * Register a dialect under one or more names (aliases)
 */
export function registerDialect(names: string | string[], creator: DialectCreator): void {
  for (const name of Array.isArray(names) ? names : [names]) {
    dialectCreators.set(name.toLowerCase(), creator);
    dialectCache.delete(name.toLowerCase());
  }
}

registerDialect(['default', 'ansi'], (options) => new DefaultDialect(options));

export class DialectFactory {
  /**
   * Get dialect for name (cached, escaping off).
   * Compilations through a shared instance must not overlap.
   */
  static getDialect(name: string): Dialect {
    const key = name.toLowerCase();

    const cached = dialectCache.get(key);
    if (cached) {
      return cached;
    }

    const dialect = this.createDialect(key);
    dialectCache.set(key, dialect);
    return dialect;
  }

  /**
   * Create new dialect instance (not cached)
   */
  static createDialect(name: string, options?: DialectOptions): Dialect {
    const creator = dialectCreators.get(name.toLowerCase());
    if (!creator) {
      throw new ValidationError(`Unsupported dialect: ${name}`, 'dialect');
    }
    return creator(options);
  }

  static isSupported(name: string): boolean {
    return dialectCreators.has(name.toLowerCase());
  }

  static registeredNames(): string[] {
    return [...dialectCreators.keys()].sort();
  }

  /**
   * Clear dialect cache (useful for testing)
   */
  static clearCache(): void {
    dialectCache.clear();
  }
}
