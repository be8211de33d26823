/**
 * @file The backend-agnostic query model. A QueryAST describes one data
 * operation; renderers turn it into SQL, document-store commands, etc.
 * Nothing in here knows about a particular backend.
 */

/** Kind of data operation. */
export type Operation = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' | 'COUNT';

/**
 * Comparison operators understood by the condition algebra.
 * See `operators.ts` for arity rules.
 */
export type Operator =
	| 'EQ' | 'NE' | 'GT' | 'GE' | 'LT' | 'LE'
	| 'IN' | 'NOT_IN'
	| 'LIKE' | 'REGEX'
	| 'IS_NULL' | 'IS_NOT_NULL'
	| 'BETWEEN'
	| 'EXISTS';

/** Connector between a condition and the one that follows it. */
export type LogicalOperator = 'AND' | 'OR';

export type SortDirection = 'ASC' | 'DESC';

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL' | 'FULL OUTER' | 'CROSS';

/** A literal carried by a condition, row or update. */
export type QueryScalar = null | boolean | number | string | Date;

/**
 * Any value the AST can carry. Lists are used by IN / NOT_IN, and a
 * two-element list is the `[lo, hi]` pair of BETWEEN.
 */
export type QueryValue = QueryScalar | QueryValue[];

/** Projected field. */
export interface Field
{
	readonly name: string;
	readonly alias?: string;
}

/**
 * One predicate of a WHERE or HAVING chain.
 *
 * `logical` is the connector placed between this condition and the next one;
 * on the last condition of a chain it is ignored.
 */
export interface Condition
{
	readonly field: string;
	readonly operator: Operator;
	readonly value: QueryValue;
	readonly logical: LogicalOperator;
	/** Key under which `value` is bound in rendered output */
	readonly paramName: string;
}

/**
 * JOIN clause. `on` is raw predicate text and is passed through unvalidated.
 */
export interface Join
{
	readonly type: JoinType;
	readonly target: string;
	readonly on: string;
}

export interface Order
{
	readonly field: string;
	readonly direction: SortDirection;
}

/** Opaque provider-specific directive (optimizer hint, index, ...). */
export interface Hint
{
	readonly provider: string;
	readonly type: string;
	readonly value: string;
}

export interface RowEntry
{
	readonly field: string;
	readonly value: QueryValue;
}

/** An insert row or update set, ordered by field name. */
export type Row = readonly RowEntry[];

export interface QueryAST
{
	readonly operation: Operation;
	/** Table or collection name */
	readonly target: string;
	/** Projection; empty selects every field */
	readonly fields: readonly Field[];
	readonly conditions: readonly Condition[];
	readonly joins: readonly Join[];
	readonly ordering: readonly Order[];
	readonly grouping: readonly string[];
	readonly having: readonly Condition[];
	readonly limit?: number;
	readonly offset?: number;
	/** Rows to insert (INSERT only) */
	readonly values?: readonly Row[];
	/** Field assignments (UPDATE only) */
	readonly updates?: Row;
	readonly returning: readonly string[];
	readonly hints: readonly Hint[];
}

export function cloneValue(value: QueryValue): QueryValue
{
	if (Array.isArray(value))
	{
		return value.map(cloneValue);
	}
	if (value instanceof Date)
	{
		return new Date(value.getTime());
	}
	return value;
}

function cloneCondition(condition: Condition): Condition
{
	return { ...condition, value: cloneValue(condition.value) };
}

function cloneRow(row: Row): RowEntry[]
{
	return row.map(entry => ({ field: entry.field, value: cloneValue(entry.value) }));
}

/**
 * Deep copy of an AST. The copy shares no arrays, objects or dates with the original.
 */
export function cloneQueryAST(ast: QueryAST): QueryAST
{
	const clone: {
		-readonly [K in keyof QueryAST]: QueryAST[K];
	} = {
		operation: ast.operation,
		target: ast.target,
		fields: ast.fields.map(f => ({ ...f })),
		conditions: ast.conditions.map(cloneCondition),
		joins: ast.joins.map(j => ({ ...j })),
		ordering: ast.ordering.map(o => ({ ...o })),
		grouping: [...ast.grouping],
		having: ast.having.map(cloneCondition),
		returning: [...ast.returning],
		hints: ast.hints.map(h => ({ ...h }))
	};

	if (ast.limit !== undefined) clone.limit = ast.limit;
	if (ast.offset !== undefined) clone.offset = ast.offset;
	if (ast.values) clone.values = ast.values.map(cloneRow);
	if (ast.updates) clone.updates = cloneRow(ast.updates);

	return clone;
}

function compareFields(a: RowEntry, b: RowEntry): number
{
	if (a.field < b.field) return -1;
	if (a.field > b.field) return 1;
	return 0;
}

/**
 * Converts a plain record into a row ordered by field name, so that rendered
 * column lists never depend on object key order.
 */
export function toRow(record: Readonly<Record<string, QueryValue>>): RowEntry[]
{
	return Object.keys(record)
		.map(field => ({ field, value: cloneValue(record[field]) }))
		.sort(compareFields);
}

/**
 * Returns a copy of `row` with `field` set to `value`, keeping field order.
 */
export function setRowEntry(row: Row, field: string, value: QueryValue): RowEntry[]
{
	const next = row.filter(entry => entry.field !== field);
	next.push({ field, value: cloneValue(value) });
	return next.sort(compareFields);
}

/**
 * Adds `key` as an own enumerable property. Unlike plain assignment this also
 * works for `__proto__`, which would otherwise replace the prototype.
 */
export function setOwn<T>(target: Record<string, T>, key: string, value: T): void
{
	Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Plain-object view of a row, keys inserted in row order.
 */
export function rowToRecord(row: Row): Record<string, QueryValue>
{
	const record: Record<string, QueryValue> = {};
	for (const entry of row)
	{
		setOwn(record, entry.field, cloneValue(entry.value));
	}
	return record;
}
