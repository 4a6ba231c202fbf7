import { EventEmitter } from 'eventemitter3';

import { TableElem } from './clause/elements';
import { compile } from './compiler/compile';
import { DialectFactory } from './dialect/dialect-factory';
import { SQLDialect } from './dialect/sql-dialect';
import { ClauseKitError, CompileError } from './errors';
import { select } from './query/select-builder';
import { consoleLogger, formatBindings, truncateSql } from './utils/logger';
import { validateBuilderConfig } from './utils/validation';

import type { Clause } from './clause/clause';
import type { Dialect } from './dialect/dialect';
import type { DeleteStmt } from './query/delete-builder';
import type { InsertStmt } from './query/insert-builder';
import type { SelectStmt } from './query/select-builder';
import type { UpdateStmt } from './query/update-builder';
import type { UpsertStmt } from './query/upsert-builder';
import type { CompiledQuery, Logger } from './types';

export interface SQLBuilderConfig {
  /** Registered dialect name ('default', 'mysql', 'postgres'...) or an instance */
  dialect: string | Dialect;
  /** Quote identifiers; applies to SQLDialect-based dialects */
  escaping?: boolean;
  /** Log with the console logger when no logger is given */
  logging?: boolean;
  logger?: Logger;
  /** Include bound values in debug logs */
  logBindings?: boolean;
}

export interface CompileEvent {
  sql: string;
  bindings: unknown[];
  duration: number;
}

export interface CompileErrorEvent {
  error: Error;
  duration: number;
}

export interface SQLBuilderEvents {
  compile: (event: CompileEvent) => void;
  compileError: (event: CompileErrorEvent) => void;
}

/**
 * SQLBuilder - one dialect, statement starters and a logged compile()
 *
 * @example
 * ```typescript
 * const qb = new SQLBuilder({ dialect: 'postgres', escaping: true, logging: true });
 * const users = qb.table('users');
 *
 * const { sql, bindings } = qb.compile(
 *   users.select(users.c('id')).where(users.c('email').eq('jane@example.com')),
 * );
 * ```
 */
export class SQLBuilder extends EventEmitter<SQLBuilderEvents> {
  readonly dialect: Dialect;
  private readonly logger?: Logger;
  private readonly logBindings: boolean;

  constructor(config: SQLBuilderConfig) {
    super();
    validateBuilderConfig(config, (name) => DialectFactory.isSupported(name));

    if (typeof config.dialect === 'string') {
      // A fresh instance, so its placeholder counter is ours alone
      this.dialect = DialectFactory.createDialect(config.dialect, { escaping: config.escaping });
    } else {
      this.dialect = config.dialect;
      if (config.escaping !== undefined && this.dialect instanceof SQLDialect) {
        this.dialect.setEscaping(config.escaping);
      }
    }

    this.logger = config.logger ?? (config.logging ? consoleLogger : undefined);
    this.logBindings = config.logBindings ?? false;
  }

  table(name: string): TableElem {
    return new TableElem(name);
  }

  select(...columns: Clause[]): SelectStmt {
    return select(...columns);
  }

  insert(table: string | TableElem): InsertStmt {
    return this.toTable(table).insert();
  }

  update(table: string | TableElem): UpdateStmt {
    return this.toTable(table).update();
  }

  delete(table: string | TableElem): DeleteStmt {
    return this.toTable(table).delete();
  }

  upsert(table: string | TableElem): UpsertStmt {
    return this.toTable(table).upsert();
  }

  /**
   * Compile with this builder's dialect.
   * Failures are logged, emitted as `compileError` and rethrown; errors not
   * raised by the library itself are wrapped in a CompileError.
   */
  compile(clause: Clause): CompiledQuery {
    const startTime = Date.now();

    try {
      const result = compile(clause, this.dialect);
      const duration = Date.now() - startTime;

      if (this.logBindings) {
        this.logger?.debug(`Compiled (${duration}ms): ${truncateSql(result.sql)}`, {
          bindings: formatBindings(result.bindings),
        });
      } else {
        this.logger?.debug(`Compiled (${duration}ms): ${truncateSql(result.sql)}`);
      }

      this.emit('compile', { sql: result.sql, bindings: result.bindings, duration });
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      const cause = error instanceof Error ? error : new Error(String(error));
      const failure =
        cause instanceof ClauseKitError
          ? cause
          : new CompileError(`Compilation failed: ${cause.message}`, this.dialect.name, cause);

      this.logger?.error(`Compilation failed (${duration}ms): ${failure.message}`);
      this.emit('compileError', { error: failure, duration });
      throw failure;
    }
  }

  private toTable(table: string | TableElem): TableElem {
    return typeof table === 'string' ? new TableElem(table) : table;
  }
}
