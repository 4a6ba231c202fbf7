import { SQLDialect } from './sql-dialect';

import type { DialectConfig } from './sql-dialect';

/**
 * ANSI SQL: double-quoted identifiers, `?` placeholders, no upsert
 */
export class DefaultDialect extends SQLDialect {
  readonly name = 'default';

  readonly config: DialectConfig = {
    identifierQuote: '"',
  };

  placeholder(): string {
    return '?';
  }
}
