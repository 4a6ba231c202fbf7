import type { AggregateClause, Clause } from './clause';
import type { CompilerContext } from '../compiler/compiler-context';

/**
 * `HAVING <aggregate> <op> <value>`, the value is always bound
 */
export class HavingClause implements Clause {
  readonly kind = 'having';

  constructor(
    readonly aggregate: AggregateClause,
    readonly op: string,
    readonly value: unknown,
  ) {}

  accept(context: CompilerContext): string {
    return context.compiler.visitHaving(context, this);
  }
}
