import { CombinerClause } from './clause';

import type { Clause } from './clause';
import type { CompilerContext } from '../compiler/compiler-context';

export class WhereClause implements Clause {
  readonly kind = 'where';

  constructor(readonly clause: Clause) {}

  /**
   * Combine the current clause and the new ones with AND.
   * The current clause becomes the first operand, so chained calls nest:
   * `where(x).and(a).or(b)` is `((x AND a) OR b)`.
   */
  and(...clauses: Clause[]): WhereClause {
    return new WhereClause(new CombinerClause('AND', [this.clause, ...clauses]));
  }

  /**
   * Combine the current clause and the new ones with OR
   */
  or(...clauses: Clause[]): WhereClause {
    return new WhereClause(new CombinerClause('OR', [this.clause, ...clauses]));
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitWhere(context, this);
  }
}

export function where(clause: Clause): WhereClause {
  return new WhereClause(clause);
}
