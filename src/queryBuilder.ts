import type {
	Condition, Field, Hint, Join, JoinType, Operation, Operator, Order,
	QueryAST, QueryValue, Row, RowEntry, SortDirection
} from './queryAst';
import { cloneQueryAST, cloneValue, setRowEntry, toRow } from './queryAst';
import { toParamName } from './operators';
import { validateQueryAST } from './validator';
import type { ValidationError } from './errors';

/**
 * Outcome of {@link QueryBuilder.build}.
 */
export type BuildResult =
	| { ok: true; ast: QueryAST }
	| { ok: false; error: ValidationError };

interface BuilderState
{
	operation: Operation;
	target: string;
	fields: Field[];
	conditions: Condition[];
	joins: Join[];
	ordering: Order[];
	grouping: string[];
	having: Condition[];
	limit?: number;
	offset?: number;
	values?: Row[];
	updates?: RowEntry[];
	returning: string[];
	hints: Hint[];
}

/**
 * Fluent constructor for {@link QueryAST}.
 *
 * A builder holds mutable state and belongs to a single caller. `build()`
 * hands out a validated deep copy, so later calls on the builder never
 * affect an AST that was already built.
 *
 * @example
 * ```typescript
 * const ast = QueryBuilder.select('users')
 *   .fields('id', 'email')
 *   .where('tenant_id', 'EQ', 't1')
 *   .orderByDesc('created_at')
 *   .limit(10)
 *   .mustBuild();
 * ```
 */
export class QueryBuilder
{
	private readonly state: BuilderState;

	private constructor(operation: Operation, target: string)
	{
		this.state = {
			operation,
			target,
			fields: [],
			conditions: [],
			joins: [],
			ordering: [],
			grouping: [],
			having: [],
			returning: [],
			hints: []
		};
		if (operation === 'INSERT')
		{
			this.state.values = [];
		}
		if (operation === 'UPDATE')
		{
			this.state.updates = [];
		}
	}

	static select(target: string): QueryBuilder
	{
		return new QueryBuilder('SELECT', target);
	}

	static insert(target: string): QueryBuilder
	{
		return new QueryBuilder('INSERT', target);
	}

	static update(target: string): QueryBuilder
	{
		return new QueryBuilder('UPDATE', target);
	}

	static delete(target: string): QueryBuilder
	{
		return new QueryBuilder('DELETE', target);
	}

	static count(target: string): QueryBuilder
	{
		return new QueryBuilder('COUNT', target);
	}

	/**
	 * Adds projected fields in call order.
	 */
	fields(...names: string[]): this
	{
		for (const name of names)
		{
			this.state.fields.push({ name });
		}
		return this;
	}

	/**
	 * Adds a single projected field, optionally aliased.
	 */
	field(name: string, alias?: string): this
	{
		this.state.fields.push(alias ? { name, alias } : { name });
		return this;
	}

	/**
	 * Adds an AND-connected condition. The parameter name is the field with
	 * dots replaced by underscores (`u.id` binds as `u_id`).
	 */
	where(field: string, operator: Operator, value: QueryValue): this
	{
		return this.whereRaw(field, operator, value, toParamName(field));
	}

	/**
	 * Like {@link where} with an explicit parameter name, for when two
	 * conditions on the same field would otherwise share one.
	 */
	whereRaw(field: string, operator: Operator, value: QueryValue, paramName: string): this
	{
		this.state.conditions.push({
			field,
			operator,
			value: cloneValue(value),
			logical: 'AND',
			paramName
		});
		return this;
	}

	/**
	 * Turns the connector after the previous condition into OR, then appends
	 * the new condition. There is no grouping: `where(A).where(B).orWhere(C)`
	 * means `A AND B OR C`. On an empty chain this is plain {@link where}.
	 */
	orWhere(field: string, operator: Operator, value: QueryValue): this
	{
		const conditions = this.state.conditions;
		const last = conditions.length - 1;
		if (last >= 0)
		{
			conditions[last] = { ...conditions[last], logical: 'OR' };
		}
		return this.where(field, operator, value);
	}

	whereNull(field: string): this
	{
		return this.where(field, 'IS_NULL', null);
	}

	whereNotNull(field: string): this
	{
		return this.where(field, 'IS_NOT_NULL', null);
	}

	whereIn(field: string, values: QueryValue[]): this
	{
		return this.where(field, 'IN', values);
	}

	whereNotIn(field: string, values: QueryValue[]): this
	{
		return this.where(field, 'NOT_IN', values);
	}

	whereBetween(field: string, start: QueryValue, end: QueryValue): this
	{
		return this.where(field, 'BETWEEN', [start, end]);
	}

	whereLike(field: string, pattern: string): this
	{
		return this.where(field, 'LIKE', pattern);
	}

	/**
	 * Adds a JOIN. `on` is raw predicate text and reaches the SQL unchanged,
	 * so it must never contain user input.
	 */
	join(type: JoinType, target: string, on: string): this
	{
		this.state.joins.push({ type, target, on });
		return this;
	}

	innerJoin(target: string, on: string): this
	{
		return this.join('INNER', target, on);
	}

	leftJoin(target: string, on: string): this
	{
		return this.join('LEFT', target, on);
	}

	orderBy(field: string, direction: SortDirection = 'ASC'): this
	{
		this.state.ordering.push({ field, direction });
		return this;
	}

	orderByAsc(field: string): this
	{
		return this.orderBy(field, 'ASC');
	}

	orderByDesc(field: string): this
	{
		return this.orderBy(field, 'DESC');
	}

	groupBy(...fields: string[]): this
	{
		this.state.grouping.push(...fields);
		return this;
	}

	/**
	 * Adds a HAVING condition, bound as `having_<field>`.
	 */
	having(field: string, operator: Operator, value: QueryValue): this
	{
		this.state.having.push({
			field,
			operator,
			value: cloneValue(value),
			logical: 'AND',
			paramName: `having_${toParamName(field)}`
		});
		return this;
	}

	limit(limit: number): this
	{
		this.state.limit = limit;
		return this;
	}

	offset(offset: number): this
	{
		this.state.offset = offset;
		return this;
	}

	/**
	 * Sets LIMIT to `pageSize` and OFFSET to `(page - 1) * pageSize`.
	 * Pages are 1-based; `page` is not range-checked.
	 */
	paginate(page: number, pageSize: number): this
	{
		return this.limit(pageSize).offset((page - 1) * pageSize);
	}

	/**
	 * Appends an insert row. Ignored unless this is an INSERT builder.
	 */
	values(row: Readonly<Record<string, QueryValue>>): this
	{
		if (this.state.operation !== 'INSERT' || !this.state.values)
		{
			return this;
		}
		this.state.values.push(toRow(row));
		return this;
	}

	/**
	 * Assigns a field. Ignored unless this is an UPDATE builder; assigning the
	 * same field again replaces its value.
	 */
	set(field: string, value: QueryValue): this
	{
		if (this.state.operation !== 'UPDATE' || !this.state.updates)
		{
			return this;
		}
		this.state.updates = setRowEntry(this.state.updates, field, value);
		return this;
	}

	returning(...fields: string[]): this
	{
		this.state.returning.push(...fields);
		return this;
	}

	hint(provider: string, type: string, value: string): this
	{
		this.state.hints.push({ provider, type, value });
		return this;
	}

	/**
	 * Validates the query and returns an independent copy of it.
	 */
	build(): BuildResult
	{
		const error = validateQueryAST(this.state);
		if (error)
		{
			return { ok: false, error };
		}
		return { ok: true, ast: cloneQueryAST(this.state) };
	}

	/**
	 * Like {@link build}, but throws the validation error.
	 */
	mustBuild(): QueryAST
	{
		const result = this.build();
		if (!result.ok)
		{
			throw result.error;
		}
		return result.ast;
	}
}
