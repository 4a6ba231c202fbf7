import type { Clause } from './clause';
import type { ColumnElem } from './elements';
import type { CompilerContext } from '../compiler/compiler-context';
import type { OrderDirection } from '../types';

export class OrderByClause implements Clause {
  readonly kind = 'orderBy';

  constructor(
    readonly columns: readonly ColumnElem[],
    readonly direction: OrderDirection = 'ASC',
  ) {}

  accept(context: CompilerContext): string {
    return context.compiler.visitOrderBy(context, this);
  }
}
