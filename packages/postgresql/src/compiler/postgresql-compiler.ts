import { SQLCompiler, ValidationError } from '@clausekit/core';

import type { CompilerContext, UpsertStmt } from '@clausekit/core';

export class PostgreSQLCompiler extends SQLCompiler {
  /**
   * INSERT ... ON CONFLICT (keys) DO UPDATE SET col = EXCLUDED.col.
   * Key columns are not updated; when every column is a key the conflict is
   * ignored with DO NOTHING.
   */
  override visitUpsert(context: CompilerContext, upsert: UpsertStmt): string {
    const { table, values, conflictColumns, returning } = upsert.components;

    if (conflictColumns.length === 0) {
      throw new ValidationError('PostgreSQL upsert requires onConflict() columns', 'onConflict');
    }

    return context.withDefaultTable(table.name, () => {
      const entries = this.sortedEntries(values);
      const columns = entries.map(([name]) => context.compiler.visitLabel(context, name));
      const placeholders = entries.map(([, value]) => this.renderValue(context, value));

      const keyNames = new Set(conflictColumns.map((column) => column.name));
      const keys = conflictColumns.map((column) => context.compiler.visitLabel(context, column.name));
      const updates = entries
        .filter(([name]) => !keyNames.has(name))
        .map(([name]) => {
          const label = context.compiler.visitLabel(context, name);
          return `${label} = EXCLUDED.${label}`;
        });

      let sql =
        `INSERT INTO ${table.accept(context)}(${columns.join(', ')})\n` +
        `VALUES(${placeholders.join(', ')})\n` +
        `ON CONFLICT (${keys.join(', ')})\n`;
      sql += updates.length > 0 ? `DO UPDATE SET ${updates.join(', ')}` : 'DO NOTHING';

      return sql + this.renderReturning(context, returning);
    });
  }
}
