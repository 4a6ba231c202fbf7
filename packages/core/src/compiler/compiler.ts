import type {
  AggregateClause,
  AliasClause,
  BinaryExpressionClause,
  BindClause,
  CombinerClause,
  ExistsClause,
  ListClause,
  TextClause,
} from '../clause/clause';
import type { ColumnElem, TableElem } from '../clause/elements';
import type { HavingClause } from '../clause/having';
import type { JoinClause } from '../clause/join';
import type { OrderByClause } from '../clause/order-by';
import type { WhereClause } from '../clause/where';
import type { DeleteStmt } from '../query/delete-builder';
import type { InsertStmt } from '../query/insert-builder';
import type { SelectStmt } from '../query/select-builder';
import type { UpdateStmt } from '../query/update-builder';
import type { UpsertStmt } from '../query/upsert-builder';
import type { CompilerContext } from './compiler-context';

/**
 * Visitor producing SQL from each kind of Clause.
 *
 * Dialects extend the ANSI `SQLCompiler` and override only what differs,
 * most notably `visitUpsert`.
 */
export interface Compiler {
  visitAggregate(context: CompilerContext, aggregate: AggregateClause): string;
  visitAlias(context: CompilerContext, alias: AliasClause): string;
  visitBinary(context: CompilerContext, binary: BinaryExpressionClause): string;
  visitBind(context: CompilerContext, bind: BindClause): string;
  visitColumn(context: CompilerContext, column: ColumnElem): string;
  visitCombiner(context: CompilerContext, combiner: CombinerClause): string;
  visitDelete(context: CompilerContext, deleteStmt: DeleteStmt): string;
  visitExists(context: CompilerContext, exists: ExistsClause): string;
  visitHaving(context: CompilerContext, having: HavingClause): string;
  visitInsert(context: CompilerContext, insert: InsertStmt): string;
  visitJoin(context: CompilerContext, join: JoinClause): string;
  visitLabel(context: CompilerContext, label: string): string;
  visitList(context: CompilerContext, list: ListClause): string;
  visitOrderBy(context: CompilerContext, orderBy: OrderByClause): string;
  visitSelect(context: CompilerContext, select: SelectStmt): string;
  visitTable(context: CompilerContext, table: TableElem): string;
  visitText(context: CompilerContext, text: TextClause): string;
  visitUpdate(context: CompilerContext, update: UpdateStmt): string;
  visitUpsert(context: CompilerContext, upsert: UpsertStmt): string;
  visitWhere(context: CompilerContext, where: WhereClause): string;
}
