import { describe, it, expect } from 'vitest';

import { table } from '../../clause/expressions';
import { DefaultDialect } from '../../dialect/default-dialect';
import { NotImplementedError } from '../../errors';

describe('UpsertStmt', () => {
  const users = table('users');

  it('should collect values, conflict columns and RETURNING', () => {
    const stmt = users
      .upsert()
      .values({ id: 1, email: 'jane@example.com' })
      .onConflict(users.c('id'))
      .returning(users.c('id'));

    expect(stmt.components.table).toBe(users);
    expect(stmt.components.values.get('email')).toBe('jane@example.com');
    expect(stmt.components.conflictColumns).toEqual([users.c('id')]);
    expect(stmt.components.returning).toEqual([users.c('id')]);
  });

  it('should replace conflict columns', () => {
    const stmt = users.upsert().onConflict(users.c('id')).onConflict(users.c('email'));
    expect(stmt.components.conflictColumns).toEqual([users.c('email')]);
  });

  it('should not build with the ANSI dialect', () => {
    expect(() => users.upsert().values({ id: 1 }).build(new DefaultDialect())).toThrow(
      NotImplementedError,
    );
  });
});
