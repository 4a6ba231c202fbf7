import { NotImplementedError, SQLCompiler } from '@clausekit/core';

import type { ColumnElem, CompilerContext, UpsertStmt } from '@clausekit/core';

export class MySQLCompiler extends SQLCompiler {
  /**
   * INSERT ... ON DUPLICATE KEY UPDATE, every inserted column is updated
   * from the row that failed to insert. MySQL picks the conflicting key
   * itself, so `onConflict()` columns are not rendered.
   */
  override visitUpsert(context: CompilerContext, upsert: UpsertStmt): string {
    const { table, values, returning } = upsert.components;

    return context.withDefaultTable(table.name, () => {
      const entries = this.sortedEntries(values);
      const columns = entries.map(([name]) => context.compiler.visitLabel(context, name));
      const placeholders = entries.map(([, value]) => this.renderValue(context, value));
      const updates = columns.map((column) => `${column} = VALUES(${column})`);

      const sql =
        `INSERT INTO ${table.accept(context)}(${columns.join(', ')})\n` +
        `VALUES(${placeholders.join(', ')})\n` +
        `ON DUPLICATE KEY UPDATE ${updates.join(', ')}`;
      return sql + this.renderReturning(context, returning);
    });
  }

  /**
   * MySQL has no RETURNING clause
   */
  protected override renderReturning(
    context: CompilerContext,
    columns: readonly ColumnElem[],
  ): string {
    if (columns.length === 0) {
      return '';
    }
    throw new NotImplementedError(`RETURNING in the ${context.dialect.name} dialect`);
  }
}
