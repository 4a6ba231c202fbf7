/**
 * Clause AST
 *
 * Every node of the SQL tree implements a single operation, `accept`, which
 * hands the node to the context's compiler and returns the rendered fragment.
 * Nodes are immutable; all mutable state lives in the CompilerContext.
 */

import { ValidationError } from '../errors';

import type { CompilerContext } from '../compiler/compiler-context';
import type { CombinerOperator } from '../types';

export interface Clause {
  accept(context: CompilerContext): string;
}

export function isClause(value: unknown): value is Clause {
  return (
    typeof value === 'object' &&
    value !== null &&
    'accept' in value &&
    typeof value.accept === 'function'
  );
}

/**
 * Wrap a plain value in a BindClause, pass clauses through
 */
export function toClause(value: unknown): Clause {
  return isClause(value) ? value : new BindClause(value);
}

export class TextClause implements Clause {
  readonly kind = 'text';

  constructor(readonly text: string) {}

  accept(context: CompilerContext): string {
    return context.compiler.visitText(context, this);
  }
}

export class BindClause implements Clause {
  readonly kind = 'bind';

  constructor(readonly value: unknown) {}

  accept(context: CompilerContext): string {
    return context.compiler.visitBind(context, this);
  }
}

export class BinaryExpressionClause implements Clause {
  readonly kind = 'binary';

  constructor(
    readonly left: Clause,
    readonly op: string,
    readonly right: Clause,
  ) {}

  accept(context: CompilerContext): string {
    return context.compiler.visitBinary(context, this);
  }
}

export class CombinerClause implements Clause {
  readonly kind = 'combiner';

  constructor(
    readonly operator: CombinerOperator,
    readonly clauses: readonly Clause[],
  ) {
    if (clauses.length === 0) {
      throw new ValidationError(`${operator} requires at least one clause`, 'clauses');
    }
  }

  accept(context: CompilerContext): string {
    return context.compiler.visitCombiner(context, this);
  }
}

export class ListClause implements Clause {
  readonly kind = 'list';

  constructor(readonly clauses: readonly Clause[]) {}

  accept(context: CompilerContext): string {
    return context.compiler.visitList(context, this);
  }
}

export class AliasClause implements Clause {
  readonly kind = 'alias';

  constructor(
    readonly selectable: Clause,
    readonly name: string,
  ) {}

  accept(context: CompilerContext): string {
    return context.compiler.visitAlias(context, this);
  }
}

export class ExistsClause implements Clause {
  readonly kind = 'exists';

  constructor(
    readonly select: Clause,
    readonly not = false,
  ) {}

  accept(context: CompilerContext): string {
    return context.compiler.visitExists(context, this);
  }
}

export class AggregateClause implements Clause {
  readonly kind = 'aggregate';

  constructor(
    readonly fn: string,
    readonly clause: Clause,
  ) {}

  accept(context: CompilerContext): string {
    return context.compiler.visitAggregate(context, this);
  }
}
