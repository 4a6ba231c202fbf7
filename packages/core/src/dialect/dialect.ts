import type { Compiler } from '../compiler/compiler';

/**
 * Database-specific rendering rules consumed by the compiler.
 *
 * `placeholder()` may keep a counter (`$1`, `$2`...), which makes an instance
 * unsafe to share between two compilations running at the same time.
 * `reset()` clears it and is called by `compile()` after every compilation.
 */
export interface Dialect {
  readonly name: string;
  escape(identifier: string): string;
  placeholder(): string;
  reset(): void;
  getCompiler(): Compiler;
}
