export { SelectStmt, select, type SelectComponents } from './select-builder';
export { InsertStmt, type InsertComponents } from './insert-builder';
export { UpdateStmt, type UpdateComponents } from './update-builder';
export { DeleteStmt, type DeleteComponents } from './delete-builder';
export { UpsertStmt, type UpsertComponents } from './upsert-builder';
