import { describe, it, expect, beforeEach } from 'vitest';

import { AggregateClause } from '../../clause/clause';
import {
  alias,
  and,
  bind,
  count,
  eq,
  exists,
  list,
  notExists,
  sum,
  table,
  text,
} from '../../clause/expressions';
import { HavingClause } from '../../clause/having';
import { JoinClause } from '../../clause/join';
import { OrderByClause } from '../../clause/order-by';
import { DefaultDialect } from '../../dialect/default-dialect';
import { NotImplementedError } from '../../errors';
import { select } from '../../query/select-builder';
import { compile } from '../compile';

import type { Clause } from '../../clause/clause';

describe('SQLCompiler', () => {
  const users = table('users');
  const sessions = table('sessions');
  let dialect: DefaultDialect;

  beforeEach(() => {
    dialect = new DefaultDialect();
  });

  function asSQL(clause: Clause): string {
    return compile(clause, dialect).sql;
  }

  function asSQLBinds(clause: Clause): [string, unknown[]] {
    const { sql, bindings } = compile(clause, dialect);
    return [sql, bindings];
  }

  describe('expressions', () => {
    it('should pass text through', () => {
      expect(asSQL(text('NOW()'))).toBe('NOW()');
    });

    it('should bind values instead of inlining them', () => {
      expect(asSQLBinds(bind("'; DROP TABLE users; --"))).toEqual([
        '?',
        ["'; DROP TABLE users; --"],
      ]);
    });

    it('should render binary expressions', () => {
      expect(asSQLBinds(eq(text('1'), 2))).toEqual(['1 = ?', [2]]);
    });

    it('should render lists', () => {
      expect(asSQLBinds(list(1, text('DEFAULT'), 3))).toEqual(['(?, DEFAULT, ?)', [1, 3]]);
    });

    it('should render aliases', () => {
      expect(asSQL(alias(count(users.c('id')), 'total'))).toBe('COUNT(users.id) AS total');
    });

    it('should render aggregates', () => {
      expect(asSQL(new AggregateClause('MAX', users.c('age')))).toBe('MAX(users.age)');
      expect(asSQL(sum(users.c('score')))).toBe('SUM(users.score)');
    });

    it('should render ORDER BY', () => {
      const orderBy = new OrderByClause([users.c('id'), users.c('email')], 'DESC');
      expect(asSQL(orderBy)).toBe('ORDER BY users.id, users.email DESC');
    });

    it('should bind the HAVING value after the aggregate', () => {
      const having = new HavingClause(count(users.c('id')), '>=', 3);
      expect(asSQLBinds(having)).toEqual(['HAVING COUNT(users.id) >= ?', [3]]);
    });
  });

  describe('columns', () => {
    it('should qualify columns when there is no default table', () => {
      expect(asSQL(users.c('id'))).toBe('users.id');
    });

    it('should leave columns of the default table unqualified', () => {
      expect(asSQL(users.select(users.c('id'), users.c('email')))).toBe(
        'SELECT id, email\nFROM users',
      );
    });

    it('should qualify columns of other tables', () => {
      expect(asSQL(users.select(users.c('id'), sessions.c('token')))).toBe(
        'SELECT id, sessions.token\nFROM users',
      );
    });

    it('should escape both parts when escaping is on', () => {
      dialect.setEscaping(true);
      expect(asSQL(users.c('id'))).toBe('"users"."id"');
      expect(asSQL(users.select(users.c('id')))).toBe('SELECT "id"\nFROM "users"');
    });
  });

  describe('joins', () => {
    it('should render a join with its ON clause', () => {
      const join = new JoinClause(
        'LEFT OUTER JOIN',
        users,
        sessions,
        eq(users.c('id'), sessions.c('user_id')),
      );
      expect(asSQL(join)).toBe('users\nLEFT OUTER JOIN sessions ON users.id = sessions.user_id');
    });

    it('should render a join without ON clause', () => {
      expect(asSQL(new JoinClause('CROSS JOIN', users, sessions))).toBe(
        'users\nCROSS JOIN sessions',
      );
    });

    it('should use the leftmost table as default table of a join chain', () => {
      const devices = table('devices');
      const stmt = users
        .select(users.c('id'), devices.c('name'))
        .innerJoin(sessions, users.c('id'), sessions.c('user_id'))
        .leftJoin(devices, sessions.c('device_id'), devices.c('id'));

      expect(asSQL(stmt)).toBe(
        'SELECT id, devices.name\n' +
          'FROM users\n' +
          'INNER JOIN sessions ON id = sessions.user_id\n' +
          'LEFT OUTER JOIN devices ON sessions.device_id = devices.id',
      );
    });
  });

  describe('select', () => {
    it('should render every clause in SQL order', () => {
      const stmt = users
        .select(users.c('id'), count(sessions.c('id')))
        .innerJoin(sessions, users.c('id'), sessions.c('user_id'))
        .where(users.c('active').eq(true))
        .groupBy(users.c('id'))
        .having(count(sessions.c('id')), '>', 2)
        .orderBy(users.c('id'))
        .desc()
        .limit(0, 5);

      expect(asSQLBinds(stmt)).toEqual([
        'SELECT id, COUNT(sessions.id)\n' +
          'FROM users\n' +
          'INNER JOIN sessions ON id = sessions.user_id\n' +
          'WHERE active = ?\n' +
          'GROUP BY id\n' +
          'HAVING COUNT(sessions.id) > ?\n' +
          'ORDER BY id DESC\n' +
          'LIMIT 5 OFFSET 0',
        [true, 2],
      ]);
    });

    it('should render LIMIT and OFFSET when both are set', () => {
      const stmt = users
        .select(users.c('id'))
        .where(users.c('id').gt(1))
        .limit(10, 20);
      expect(asSQL(stmt)).toBe('SELECT id\nFROM users\nWHERE id > ?\nLIMIT 20 OFFSET 10');
    });

    it('should omit LIMIT when only the offset is set', () => {
      expect(asSQL(users.select(users.c('id')).offset(10))).toBe('SELECT id\nFROM users');
    });

    it('should omit LIMIT when only the count is set', () => {
      expect(asSQL(users.select(users.c('id')).count(20))).toBe('SELECT id\nFROM users');
    });

    it('should render GROUP BY with bare column names', () => {
      const stmt = users.select(sessions.c('user_id')).from(sessions).groupBy(sessions.c('user_id'));
      expect(asSQL(stmt)).toBe('SELECT user_id\nFROM sessions\nGROUP BY user_id');
    });

    it('should render a select without FROM', () => {
      expect(asSQLBinds(select(text('1'), bind(2)))).toEqual(['SELECT 1, ?', [2]]);
    });
  });

  describe('exists', () => {
    const subSelect = sessions
      .select(sessions.c('id'))
      .where(sessions.c('user_id').eq(users.c('id')));

    it('should qualify every column inside the sub-query, even of the outer table', () => {
      const stmt = users.select(users.c('id')).where(exists(subSelect));
      expect(asSQL(stmt)).toBe(
        'SELECT id\n' +
          'FROM users\n' +
          'WHERE EXISTS(SELECT sessions.id\nFROM sessions\nWHERE sessions.user_id = users.id)',
      );
    });

    it('should render NOT EXISTS', () => {
      expect(asSQL(notExists(subSelect))).toBe(
        'NOT EXISTS(SELECT sessions.id\nFROM sessions\nWHERE sessions.user_id = users.id)',
      );
    });

    it('should leave sub-query scope after the EXISTS', () => {
      const stmt = users
        .select(users.c('id'))
        .where(and(exists(subSelect), users.c('active').eq(true)));
      expect(asSQLBinds(stmt)).toEqual([
        'SELECT id\n' +
          'FROM users\n' +
          'WHERE (EXISTS(SELECT sessions.id\nFROM sessions\nWHERE sessions.user_id = users.id) AND active = ?)',
        [true],
      ]);
    });
  });

  describe('insert', () => {
    it('should render columns sorted by name with one placeholder each', () => {
      const stmt = users
        .insert()
        .values({ name: 'Jane', email: 'jane@example.com' })
        .returning(users.c('id'));
      expect(asSQLBinds(stmt)).toEqual([
        'INSERT INTO users(email, name)\nVALUES(?, ?)\nRETURNING id',
        ['jane@example.com', 'Jane'],
      ]);
    });

    it('should render the same SQL whatever order values were set in', () => {
      const a = users.insert().values({ b: 2, a: 1 });
      const b = users.insert().values({ a: 1 }).values({ b: 2 });
      expect(asSQLBinds(a)).toEqual(asSQLBinds(b));
    });

    it('should render clause values in place', () => {
      expect(asSQLBinds(users.insert().values({ created_at: text('NOW()'), name: 'Jo' }))).toEqual([
        'INSERT INTO users(created_at, name)\nVALUES(NOW(), ?)',
        ['Jo'],
      ]);
    });

    it('should parenthesize sub-select values and qualify their columns', () => {
      const teams = table('teams');
      const stmt = users.insert().values({
        team_id: teams.select(teams.c('id')).where(teams.c('name').eq('core')),
        name: 'Jo',
      });
      expect(asSQLBinds(stmt)).toEqual([
        'INSERT INTO users(name, team_id)\n' +
          'VALUES(?, (SELECT teams.id\nFROM teams\nWHERE teams.name = ?))',
        ['Jo', 'core'],
      ]);
    });
  });

  describe('update', () => {
    it('should render SET, WHERE and RETURNING', () => {
      const stmt = users
        .update()
        .values({ name: 'Jane', active: false })
        .where(users.c('id').eq(1))
        .returning(users.c('id'));
      expect(asSQLBinds(stmt)).toEqual([
        'UPDATE users\nSET active = ?, name = ?\nWHERE id = ?\nRETURNING id',
        [false, 'Jane', 1],
      ]);
    });

    it('should render clause values in place', () => {
      const stmt = users
        .update()
        .values({ visits: text('visits + 1') })
        .where(users.c('id').eq(7));
      expect(asSQLBinds(stmt)).toEqual(['UPDATE users\nSET visits = visits + 1\nWHERE id = ?', [7]]);
    });

    it('should keep the outer statement scope after a sub-select value', () => {
      const teams = table('teams');
      const stmt = users
        .update()
        .values({ team_id: teams.select(teams.c('id')).where(teams.c('name').eq('core')) })
        .where(users.c('id').eq(7));
      expect(asSQLBinds(stmt)).toEqual([
        'UPDATE users\n' +
          'SET team_id = (SELECT teams.id\nFROM teams\nWHERE teams.name = ?)\n' +
          'WHERE id = ?',
        ['core', 7],
      ]);
    });
  });

  describe('delete', () => {
    it('should render DELETE with WHERE', () => {
      expect(asSQLBinds(users.delete().where(users.c('id').eq(1)))).toEqual([
        'DELETE FROM users\nWHERE id = ?',
        [1],
      ]);
    });

    it('should render RETURNING', () => {
      expect(asSQL(users.delete().returning(users.c('id'), users.c('email')))).toBe(
        'DELETE FROM users\nRETURNING id, email',
      );
    });
  });

  describe('upsert', () => {
    it('should fail as not implemented', () => {
      const stmt = users.upsert().values({ id: 1 });
      expect(() => asSQL(stmt)).toThrow(NotImplementedError);
      expect(() => asSQL(stmt)).toThrow(
        'Feature "upsert in the default dialect" is not implemented',
      );
    });
  });
});
