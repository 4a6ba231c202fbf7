import type { Clause } from './clause';
import type { TableElem } from './elements';
import type { CompilerContext } from '../compiler/compiler-context';

/**
 * Anything a statement can select FROM: a table, or a chain of joins
 * starting at a table.
 */
export type Selectable = TableElem | JoinClause;

export class JoinClause implements Clause {
  readonly kind = 'join';

  constructor(
    readonly joinType: string,
    readonly left: Selectable,
    readonly right: TableElem,
    readonly onClause?: Clause,
  ) {}

  /**
   * The leftmost table of the chain
   */
  defaultName(): string {
    return this.left.defaultName();
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitJoin(context, this);
  }
}
