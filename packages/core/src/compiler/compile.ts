import { CompilerContext } from './compiler-context';

import type { Clause } from '../clause/clause';
import type { Dialect } from '../dialect/dialect';
import type { CompiledQuery } from '../types';

/**
 * Render a clause tree to SQL and its bindings.
 *
 * The dialect is reset afterwards whether or not rendering succeeded, so the
 * same instance can be reused for the next compilation.
 */
export function compile(clause: Clause, dialect: Dialect): CompiledQuery {
  try {
    const context = new CompilerContext(dialect);
    const sql = clause.accept(context);
    return { sql, bindings: context.binds };
  } finally {
    dialect.reset();
  }
}
