import { describe, it, expect } from 'vitest';

import { count, table, text } from '../../clause/expressions';
import { JoinClause } from '../../clause/join';
import { WhereClause } from '../../clause/where';
import { DefaultDialect } from '../../dialect/default-dialect';
import { ValidationError } from '../../errors';
import { SelectStmt, select } from '../select-builder';

describe('SelectStmt', () => {
  const users = table('users');
  const posts = table('posts');
  const dialect = new DefaultDialect();

  describe('immutability', () => {
    it('should return a new statement from every method', () => {
      const base = users.select(users.c('id'));
      const filtered = base.where(users.c('active').eq(true));

      expect(filtered).not.toBe(base);
      expect(base.components.where).toBeUndefined();
      expect(base.build(dialect).sql).toBe('SELECT id\nFROM users');
    });

    it('should let one base statement be specialised twice', () => {
      const base = users.select(users.c('id'));
      const admins = base.where(users.c('role').eq('admin'));
      const guests = base.where(users.c('role').eq('guest'));

      expect(admins.build(dialect).bindings).toEqual(['admin']);
      expect(guests.build(dialect).bindings).toEqual(['guest']);
    });
  });

  describe('select', () => {
    it('should start without FROM when built from the select() function', () => {
      const stmt = select(text('1'));
      expect(stmt.components.columns).toHaveLength(1);
      expect(stmt.components.from).toBeUndefined();
    });

    it('should replace the selected columns', () => {
      const stmt = users.select(users.c('id')).select(users.c('email'));
      expect(stmt.build(dialect).sql).toBe('SELECT email\nFROM users');
    });
  });

  describe('where', () => {
    it('should wrap plain conditions in a WHERE clause', () => {
      const stmt = users.select(users.c('id')).where(users.c('id').eq(1));
      expect(stmt.components.where).toBeInstanceOf(WhereClause);
    });

    it('should keep a WhereClause as given', () => {
      const where = new WhereClause(users.c('id').eq(1));
      expect(users.select(users.c('id')).where(where).components.where).toBe(where);
    });

    it('should replace the previous condition', () => {
      const stmt = users
        .select(users.c('id'))
        .where(users.c('id').eq(1))
        .where(users.c('id').eq(2));
      expect(stmt.build(dialect)).toEqual({
        sql: 'SELECT id\nFROM users\nWHERE id = ?',
        bindings: [2],
      });
    });
  });

  describe('joins', () => {
    it('should turn FROM into a join chain', () => {
      const stmt = users.select(users.c('id')).innerJoin(posts, users.c('id'), posts.c('user_id'));
      const from = stmt.components.from;

      expect(from).toBeInstanceOf(JoinClause);
      expect(from?.defaultName()).toBe('users');
    });

    it('should render every join type', () => {
      const base = users.select(users.c('id'));

      expect(base.leftJoin(posts, users.c('id'), posts.c('user_id')).build(dialect).sql).toBe(
        'SELECT id\nFROM users\nLEFT OUTER JOIN posts ON id = posts.user_id',
      );
      expect(base.rightJoin(posts, users.c('id'), posts.c('user_id')).build(dialect).sql).toBe(
        'SELECT id\nFROM users\nRIGHT OUTER JOIN posts ON id = posts.user_id',
      );
      expect(base.crossJoin(posts).build(dialect).sql).toBe(
        'SELECT id\nFROM users\nCROSS JOIN posts',
      );
    });

    it('should require a FROM table', () => {
      expect(() => select(users.c('id')).crossJoin(posts)).toThrow(ValidationError);
      expect(() => select(users.c('id')).crossJoin(posts)).toThrow(
        'CROSS JOIN requires a FROM table',
      );
    });
  });

  describe('grouping', () => {
    it('should append GROUP BY columns', () => {
      const stmt = posts
        .select(posts.c('user_id'), posts.c('status'))
        .groupBy(posts.c('user_id'))
        .groupBy(posts.c('status'));
      expect(stmt.build(dialect).sql).toBe(
        'SELECT user_id, status\nFROM posts\nGROUP BY user_id, status',
      );
    });

    it('should replace HAVING', () => {
      const stmt = posts
        .select(posts.c('user_id'))
        .groupBy(posts.c('user_id'))
        .having(count(posts.c('id')), '>', 1)
        .having(count(posts.c('id')), '<', 10);
      expect(stmt.build(dialect)).toEqual({
        sql: 'SELECT user_id\nFROM posts\nGROUP BY user_id\nHAVING COUNT(id) < ?',
        bindings: [10],
      });
    });
  });

  describe('ordering', () => {
    it('should order ascending by default', () => {
      const stmt = users.select(users.c('id')).orderBy(users.c('name'), users.c('id'));
      expect(stmt.build(dialect).sql).toBe('SELECT id\nFROM users\nORDER BY name, id ASC');
    });

    it('should switch direction', () => {
      const stmt = users.select(users.c('id')).orderBy(users.c('id')).desc();
      expect(stmt.components.orderBy?.direction).toBe('DESC');
      expect(stmt.asc().components.orderBy?.direction).toBe('ASC');
    });

    it('should require orderBy() before a direction', () => {
      expect(() => users.select(users.c('id')).desc()).toThrow(
        'Call orderBy() before setting a direction',
      );
    });
  });

  describe('pagination', () => {
    it('should set offset and count together', () => {
      const stmt = users.select(users.c('id')).limit(40, 20);
      expect(stmt.components.offset).toBe(40);
      expect(stmt.components.count).toBe(20);
    });

    it('should render LIMIT once offset and count are both set', () => {
      const stmt = users.select(users.c('id')).count(20).offset(40);
      expect(stmt.build(dialect).sql).toBe('SELECT id\nFROM users\nLIMIT 20 OFFSET 40');
    });

    it('should reject negative or fractional values', () => {
      const stmt = users.select(users.c('id'));
      expect(() => stmt.limit(-1, 10)).toThrow('offset must be a non-negative integer');
      expect(() => stmt.count(2.5)).toThrow('count must be a non-negative integer');
      expect(() => stmt.offset(-5)).toThrow('offset must be a non-negative integer');
    });
  });

  it('should construct empty', () => {
    const stmt = new SelectStmt();
    expect(stmt.components.columns).toEqual([]);
    expect(stmt.components.groupBy).toEqual([]);
  });
});
