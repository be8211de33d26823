/**
 * SQLRenderer - compiles a QueryAST into parameterized SQL
 *
 * Output uses named placeholders (`:name`) and a parameter map. No literal
 * value is ever written into the SQL text. List operators use PostgreSQL's
 * `= ANY(...)` / `!= ALL(...)` forms so a whole list binds as one parameter.
 *
 * @module renderers/sqlRenderer
 */

import type { Condition, QueryAST, QueryValue } from '../queryAst';
import { cloneValue, setOwn } from '../queryAst';
import type { Renderer } from '../renderer';
import { RenderError } from '../errors';
import { expectList, expectPair, expectPattern, toParamName } from '../operators';
import { assertValidQueryAST, checkPagination } from '../validator';
import { getLogger } from '../logger';
import { SQLEscaper, PlainEscaper } from './sqlEscaper';
import { SQLValidator } from './sqlValidator';

/**
 * Rendered SQL statement and the values for its named placeholders.
 */
export interface SQLQuery
{
	sql: string;
	params: Record<string, QueryValue>;
}

export interface SQLRendererOptions
{
	/** Identifier quoting; defaults to {@link PlainEscaper} */
	escaper?: SQLEscaper;
}

/**
 * Parameter map that refuses to bind the same name twice.
 */
class ParamBag
{
	readonly values: Record<string, QueryValue> = {};

	bind(name: string, value: QueryValue): string
	{
		if (Object.prototype.hasOwnProperty.call(this.values, name))
		{
			throw new RenderError('DuplicateParameter', `Parameter "${name}" is bound more than once`, { paramName: name });
		}
		setOwn(this.values, name, cloneValue(value));
		return `:${name}`;
	}
}

const COMPARISONS = {
	EQ: '=',
	NE: '!=',
	GT: '>',
	GE: '>=',
	LT: '<',
	LE: '<=',
	LIKE: 'LIKE',
	REGEX: '~'
} as const;

export class SQLRenderer implements Renderer<SQLQuery>
{
	readonly name = 'sql';

	private readonly escaper: SQLEscaper;
	private readonly logger = getLogger('SQLRenderer');

	constructor(options: SQLRendererOptions = {})
	{
		this.escaper = options.escaper ?? new PlainEscaper();
	}

	/**
	 * @throws ValidationError if the AST is structurally invalid
	 * @throws RenderError for unsupported operators, malformed values, bad identifiers or pagination
	 */
	render(ast: QueryAST): SQLQuery
	{
		this.logger.debug('Rendering query', { operation: ast.operation, target: ast.target });

		assertValidQueryAST(ast);
		checkPagination(ast);
		SQLValidator.validateQuery(ast);

		const params = new ParamBag();
		let sql: string;

		switch (ast.operation)
		{
			case 'SELECT':
				sql = this.renderSelect(ast, params);
				break;
			case 'INSERT':
				sql = this.renderInsert(ast, params);
				break;
			case 'UPDATE':
				sql = this.renderUpdate(ast, params);
				break;
			case 'DELETE':
				sql = this.renderDelete(ast, params);
				break;
			case 'COUNT':
				sql = this.renderCount(ast, params);
				break;
			default:
				return this.unsupportedOperation(ast.operation);
		}

		this.logger.debug('Query rendered', { operation: ast.operation, paramCount: Object.keys(params.values).length });

		return { sql, params: params.values };
	}

	private renderSelect(ast: QueryAST, params: ParamBag): string
	{
		const fields = ast.fields.length === 0
			? '*'
			: ast.fields.map(f =>
			{
				const name = this.identifier(f.name);
				return f.alias ? `${name} AS ${this.escaper.escapeIdentifier(f.alias)}` : name;
			}).join(', ');

		let sql = `SELECT ${fields} FROM ${this.identifier(ast.target)}`;

		for (const join of ast.joins)
		{
			sql += ` ${join.type} JOIN ${this.identifier(join.target)}`;
			if (join.on)
			{
				sql += ` ON ${join.on}`;
			}
		}

		sql += this.whereClause(ast.conditions, params);

		if (ast.grouping.length > 0)
		{
			sql += ` GROUP BY ${ast.grouping.map(f => this.identifier(f)).join(', ')}`;
		}

		if (ast.having.length > 0)
		{
			sql += ` HAVING ${this.renderChain(ast.having, params)}`;
		}

		if (ast.ordering.length > 0)
		{
			sql += ` ORDER BY ${ast.ordering.map(o => `${this.identifier(o.field)} ${o.direction}`).join(', ')}`;
		}

		if (ast.limit !== undefined)
		{
			sql += ` LIMIT ${ast.limit}`;
		}

		if (ast.offset !== undefined)
		{
			sql += ` OFFSET ${ast.offset}`;
		}

		return sql;
	}

	/**
	 * Columns come from the first row, in field-name order. Each later row
	 * must carry exactly the same columns.
	 */
	private renderInsert(ast: QueryAST, params: ParamBag): string
	{
		const rows = ast.values ?? [];
		const columns = rows[0].map(entry => entry.field);

		if (columns.length === 0)
		{
			throw new RenderError('MalformedRow', 'INSERT row 0 has no columns', { row: 0 });
		}

		const tuples = rows.map((row, index) =>
		{
			const rowColumns = row.map(entry => entry.field);
			if (rowColumns.length !== columns.length || rowColumns.some((c, i) => c !== columns[i]))
			{
				this.logger.error('INSERT rows have different columns', { row: index, expected: columns, actual: rowColumns });
				throw new RenderError('MalformedRow', `INSERT row ${index} does not have the columns of row 0`, {
					row: index,
					expected: columns,
					actual: rowColumns
				});
			}
			const placeholders = row.map(entry => params.bind(`${toParamName(entry.field)}_${index}`, entry.value));
			return `(${placeholders.join(', ')})`;
		});

		let sql = `INSERT INTO ${this.identifier(ast.target)} (${columns.map(c => this.identifier(c)).join(', ')})`;
		sql += ` VALUES ${tuples.join(', ')}`;
		sql += this.returningClause(ast);
		return sql;
	}

	private renderUpdate(ast: QueryAST, params: ParamBag): string
	{
		const sets = (ast.updates ?? []).map(entry =>
			`${this.identifier(entry.field)} = ${params.bind(`update_${toParamName(entry.field)}`, entry.value)}`
		);

		let sql = `UPDATE ${this.identifier(ast.target)} SET ${sets.join(', ')}`;
		sql += this.whereClause(ast.conditions, params);
		sql += this.returningClause(ast);
		return sql;
	}

	private renderDelete(ast: QueryAST, params: ParamBag): string
	{
		let sql = `DELETE FROM ${this.identifier(ast.target)}`;
		sql += this.whereClause(ast.conditions, params);
		sql += this.returningClause(ast);
		return sql;
	}

	private renderCount(ast: QueryAST, params: ParamBag): string
	{
		return `SELECT COUNT(*) FROM ${this.identifier(ast.target)}${this.whereClause(ast.conditions, params)}`;
	}

	private whereClause(conditions: readonly Condition[], params: ParamBag): string
	{
		return conditions.length > 0 ? ` WHERE ${this.renderChain(conditions, params)}` : '';
	}

	private returningClause(ast: QueryAST): string
	{
		if (ast.returning.length === 0)
		{
			return '';
		}
		return ` RETURNING ${ast.returning.map(f => this.identifier(f)).join(', ')}`;
	}

	/**
	 * Joins predicates left to right, each pair separated by the connector
	 * stored on the earlier condition. No parentheses are added, so SQL's own
	 * precedence (AND before OR) applies.
	 */
	private renderChain(conditions: readonly Condition[], params: ParamBag): string
	{
		let sql = '';
		conditions.forEach((condition, i) =>
		{
			if (i > 0)
			{
				sql += conditions[i - 1].logical === 'OR' ? ' OR ' : ' AND ';
			}
			sql += this.renderPredicate(condition, params);
		});
		return sql;
	}

	private renderPredicate(condition: Condition, params: ParamBag): string
	{
		const field = this.identifier(condition.field);
		const name = condition.paramName;

		switch (condition.operator)
		{
			case 'EQ':
			case 'NE':
			case 'GT':
			case 'GE':
			case 'LT':
			case 'LE':
				return `${field} ${COMPARISONS[condition.operator]} ${params.bind(name, condition.value)}`;
			case 'LIKE':
			case 'REGEX':
				return `${field} ${COMPARISONS[condition.operator]} ${params.bind(name, expectPattern(condition))}`;
			case 'IN':
				return `${field} = ANY(${params.bind(name, expectList(condition))})`;
			case 'NOT_IN':
				return `${field} != ALL(${params.bind(name, expectList(condition))})`;
			case 'IS_NULL':
				return `${field} IS NULL`;
			case 'IS_NOT_NULL':
				return `${field} IS NOT NULL`;
			case 'BETWEEN':
			{
				const [lo, hi] = expectPair(condition);
				return `${field} BETWEEN ${params.bind(`${name}_lo`, lo)} AND ${params.bind(`${name}_hi`, hi)}`;
			}
			default:
				this.logger.error('Operator has no SQL form', { operator: condition.operator, field: condition.field });
				throw new RenderError('UnsupportedOperator', `unsupported operator for SQL: ${condition.operator}`, {
					operator: condition.operator
				});
		}
	}

	private identifier(name: string): string
	{
		return name === '*' ? name : this.escaper.escapeIdentifier(name);
	}

	private unsupportedOperation(operation: never): never
	{
		throw new RenderError('UnsupportedOperation', `unsupported operation: ${String(operation)}`, { operation });
	}
}
