/**
 * Executes rendered SQL against an in-memory SQLite database. Only operators
 * SQLite understands are exercised here (no ANY/ALL lists, no `~`).
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';
import { QueryBuilder } from '../queryBuilder';
import { SQLRenderer } from '../renderers/sqlRenderer';
import { SQLiteEscaper } from '../renderers/sqlEscaper';
import { defaultAST, type EntityMetadata } from '../catalog';
import type { QueryAST, QueryValue } from '../queryAst';

/** node-sqlite3 expects the placeholder prefix on named parameter keys. */
function bind(params: Record<string, QueryValue>): Record<string, QueryValue>
{
	const bound: Record<string, QueryValue> = {};
	for (const [name, value] of Object.entries(params))
	{
		bound[`:${name}`] = value;
	}
	return bound;
}

describe('rendered SQL on SQLite', () =>
{
	const renderer = new SQLRenderer();
	let db: Database;

	async function all<T>(ast: QueryAST, overrides: Record<string, QueryValue> = {}): Promise<T[]>
	{
		const { sql, params } = renderer.render(ast);
		return db.all<T[]>(sql, bind({ ...params, ...overrides }));
	}

	async function run(ast: QueryAST): Promise<number | undefined>
	{
		const { sql, params } = renderer.render(ast);
		const result = await db.run(sql, bind(params));
		return result.changes;
	}

	beforeEach(async () =>
	{
		db = await open({
			filename: ':memory:',
			driver: sqlite3.Database
		});
		await db.exec(`
			CREATE TABLE users (
				id TEXT PRIMARY KEY,
				email TEXT NOT NULL,
				age INTEGER,
				deleted_at TEXT
			)
		`);

		const seed = QueryBuilder.insert('users')
			.values({ id: 'u1', email: 'ann@example.com', age: 31, deleted_at: null })
			.values({ id: 'u2', email: 'bob@test.org', age: 17, deleted_at: null })
			.values({ id: 'u3', email: 'cy@example.com', age: 45, deleted_at: '2026-01-01' })
			.returning('id')
			.mustBuild();

		const inserted = await all<{ id: string }>(seed);
		expect(inserted.map(r => r.id).sort()).toEqual(['u1', 'u2', 'u3']);
	});

	afterEach(async () =>
	{
		await db.close();
	});

	it('selects with projection, filter, ordering and limit', async () =>
	{
		const ast = QueryBuilder.select('users')
			.fields('id', 'email')
			.where('age', 'GE', 18)
			.whereNull('deleted_at')
			.orderByAsc('id')
			.limit(10)
			.mustBuild();

		expect(await all(ast)).toEqual([{ id: 'u1', email: 'ann@example.com' }]);
	});

	it('applies OR the way the chain reads', async () =>
	{
		const ast = QueryBuilder.select('users')
			.fields('id')
			.where('age', 'LT', 18)
			.orWhere('id', 'EQ', 'u3')
			.orderByAsc('id')
			.mustBuild();

		expect(await all(ast)).toEqual([{ id: 'u2' }, { id: 'u3' }]);
	});

	it('binds both BETWEEN bounds', async () =>
	{
		const ast = QueryBuilder.select('users').fields('id').whereBetween('age', 30, 50).orderByAsc('id').mustBuild();

		expect(await all(ast)).toEqual([{ id: 'u1' }, { id: 'u3' }]);
	});

	it('matches LIKE patterns', async () =>
	{
		const ast = QueryBuilder.select('users').fields('id').whereLike('email', '%@example.com').orderByAsc('id').mustBuild();

		expect(await all(ast)).toEqual([{ id: 'u1' }, { id: 'u3' }]);
	});

	it('pages with LIMIT and OFFSET', async () =>
	{
		const ast = QueryBuilder.select('users').fields('id').orderByDesc('age').paginate(2, 1).mustBuild();

		expect(await all(ast)).toEqual([{ id: 'u1' }]);
	});

	it('updates and returns the new values', async () =>
	{
		const ast = QueryBuilder.update('users')
			.set('age', 32)
			.where('id', 'EQ', 'u1')
			.returning('id', 'age')
			.mustBuild();

		expect(await all(ast)).toEqual([{ id: 'u1', age: 32 }]);
	});

	it('deletes and counts', async () =>
	{
		const removed = await run(QueryBuilder.delete('users').whereNotNull('deleted_at').mustBuild());
		const [count] = await all<{ 'COUNT(*)': number }>(QueryBuilder.count('users').mustBuild());

		expect(removed).toBe(1);
		expect(count['COUNT(*)']).toBe(2);
	});

	it('runs quoted identifiers', async () =>
	{
		const quoted = new SQLRenderer({ escaper: new SQLiteEscaper() });
		const { sql, params } = quoted.render(
			QueryBuilder.select('users').field('users.email', 'mail').where('users.id', 'EQ', 'u2').mustBuild()
		);

		expect(sql).toBe('SELECT "users"."email" AS "mail" FROM "users" WHERE "users"."id" = :users_id');
		expect(await db.all(sql, bind(params))).toEqual([{ mail: 'bob@test.org' }]);
	});

	it('executes catalog queries with values bound at execution time', async () =>
	{
		const label: EntityMetadata = { typeName: 'Label', table: 'labels', fields: [{ name: 'id' }, { name: 'text' }] };
		await db.exec('CREATE TABLE labels (id TEXT PRIMARY KEY, text TEXT)');

		const created = await all<{ id: string; text: string }>(defaultAST(label, 'create'), { id_0: 'l1', text_0: 'red' });
		const fetched = await all(defaultAST(label, 'get'), { id: 'l1' });
		await all(defaultAST(label, 'delete'), { id: 'l1' });
		const remaining = await all(defaultAST(label, 'list'));

		expect(created).toEqual([{ id: 'l1', text: 'red' }]);
		expect(fetched).toEqual([{ id: 'l1', text: 'red' }]);
		expect(remaining).toEqual([]);
	});
});
