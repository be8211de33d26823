/**
 * MongoRenderer - compiles a QueryAST into a structured document-store command
 *
 * The output is plain data (operation name, collection, filter, documents,
 * update and options) that a Mongo-style driver call can be assembled from.
 *
 * @module renderers/mongoRenderer
 */

import type { Condition, QueryAST, QueryValue, Row } from '../queryAst';
import { cloneValue, rowToRecord, setOwn } from '../queryAst';
import type { Renderer } from '../renderer';
import { RenderError } from '../errors';
import { expectList, expectPair, expectPattern } from '../operators';
import { assertValidQueryAST, checkPagination } from '../validator';
import { getLogger } from '../logger';

export type MongoOperation = 'find' | 'insertOne' | 'insertMany' | 'updateOne' | 'deleteOne' | 'countDocuments';

export type MongoFilterValue = QueryValue | MongoFilter | MongoFilter[];

export interface MongoFilter
{
	[key: string]: MongoFilterValue;
}

export type MongoDocument = Record<string, QueryValue>;

export interface MongoFindOptions
{
	projection?: Record<string, 1>;
	sort?: Record<string, 1 | -1>;
	limit?: number;
	skip?: number;
}

export interface MongoCommand
{
	operation: MongoOperation;
	collection: string;
	filter?: MongoFilter;
	document?: MongoDocument;
	documents?: MongoDocument[];
	update?: { $set: MongoDocument };
	options?: MongoFindOptions;
}

/**
 * How a condition chain containing OR connectors becomes a filter.
 *
 * - `precedence`: AND binds tighter than OR, the same reading the SQL chain
 *   gets. `A AND B OR C` becomes `{ $or: [{ A, B }, { C }] }`.
 * - `flatten`: every condition ANDed together in one `$and`, ignoring OR.
 *   Kept for consumers that depend on the older output; it is not a correct
 *   translation and logs a warning each time it applies.
 */
export type OrStrategy = 'precedence' | 'flatten';

export interface MongoRendererOptions
{
	/** Default: `precedence` */
	orStrategy?: OrStrategy;
}

/**
 * Converts a LIKE pattern to an anchored regular expression source:
 * `%` matches any run of characters, `_` exactly one, everything else literally.
 */
export function likeToRegex(pattern: string): string
{
	let regex = '';
	for (const ch of pattern)
	{
		if (ch === '%')
		{
			regex += '.*';
		}
		else if (ch === '_')
		{
			regex += '.';
		}
		else
		{
			regex += ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
		}
	}
	return `^${regex}$`;
}

/**
 * Serializes a command with two-space indentation.
 */
export function serializeMongoCommand(command: MongoCommand): string
{
	return JSON.stringify(command, null, 2);
}

export class MongoRenderer implements Renderer<MongoCommand>
{
	readonly name = 'mongo';

	private readonly orStrategy: OrStrategy;
	private readonly logger = getLogger('MongoRenderer');

	constructor(options: MongoRendererOptions = {})
	{
		this.orStrategy = options.orStrategy ?? 'precedence';
	}

	/**
	 * @throws ValidationError if the AST is structurally invalid
	 * @throws RenderError for clauses or operators with no document-store form
	 */
	render(ast: QueryAST): MongoCommand
	{
		this.logger.debug('Rendering query', { operation: ast.operation, target: ast.target });

		assertValidQueryAST(ast);
		checkPagination(ast);
		this.rejectRelationalClauses(ast);

		let command: MongoCommand;

		switch (ast.operation)
		{
			case 'SELECT':
				command = this.renderFind(ast);
				break;
			case 'INSERT':
				command = this.renderInsert(ast);
				break;
			case 'UPDATE':
				command = {
					operation: 'updateOne',
					collection: ast.target,
					filter: this.buildFilter(ast.conditions),
					update: { $set: rowToRecord(ast.updates ?? []) }
				};
				break;
			case 'DELETE':
				command = { operation: 'deleteOne', collection: ast.target, filter: this.buildFilter(ast.conditions) };
				break;
			case 'COUNT':
				command = { operation: 'countDocuments', collection: ast.target, filter: this.buildFilter(ast.conditions) };
				break;
			default:
				return this.unsupportedOperation(ast.operation);
		}

		this.logger.debug('Query rendered', { operation: command.operation, collection: command.collection });
		return command;
	}

	private renderFind(ast: QueryAST): MongoCommand
	{
		const command: MongoCommand = {
			operation: 'find',
			collection: ast.target,
			filter: this.buildFilter(ast.conditions)
		};
		const options: MongoFindOptions = {};

		if (ast.fields.length > 0)
		{
			const projection: Record<string, 1> = {};
			for (const field of ast.fields)
			{
				setOwn(projection, field.name, 1);
			}
			options.projection = projection;
		}

		if (ast.ordering.length > 0)
		{
			const sort: Record<string, 1 | -1> = {};
			for (const order of ast.ordering)
			{
				setOwn(sort, order.field, order.direction === 'DESC' ? -1 : 1);
			}
			options.sort = sort;
		}

		if (ast.limit !== undefined)
		{
			options.limit = ast.limit;
		}
		if (ast.offset !== undefined)
		{
			options.skip = ast.offset;
		}

		if (Object.keys(options).length > 0)
		{
			command.options = options;
		}
		return command;
	}

	private renderInsert(ast: QueryAST): MongoCommand
	{
		const rows: readonly Row[] = ast.values ?? [];
		if (rows.length === 1)
		{
			return { operation: 'insertOne', collection: ast.target, document: rowToRecord(rows[0]) };
		}
		return { operation: 'insertMany', collection: ast.target, documents: rows.map(rowToRecord) };
	}

	/**
	 * Splits the chain at OR connectors into groups of ANDed conditions.
	 * The connector on the last condition is never consulted.
	 */
	private buildFilter(conditions: readonly Condition[]): MongoFilter
	{
		const groups: Condition[][] = [[]];
		conditions.forEach((condition, i) =>
		{
			groups[groups.length - 1].push(condition);
			if (condition.logical === 'OR' && i < conditions.length - 1)
			{
				groups.push([]);
			}
		});

		if (groups.length === 1)
		{
			return this.andFilter(groups[0]);
		}

		if (this.orStrategy === 'flatten')
		{
			this.logger.warn('OR connectors flattened into $and; the filter matches only documents satisfying every condition', {
				conditionCount: conditions.length
			});
			return { $and: conditions.map(c => this.singleFilter(c)) };
		}

		return { $or: groups.map(group => this.andFilter(group)) };
	}

	/**
	 * One flat `{ field: predicate }` map, or `$and` when a field repeats and
	 * a flat map would drop a predicate.
	 */
	private andFilter(conditions: readonly Condition[]): MongoFilter
	{
		const fields = new Set(conditions.map(c => c.field));
		if (fields.size < conditions.length)
		{
			return { $and: conditions.map(c => this.singleFilter(c)) };
		}

		const filter: MongoFilter = {};
		for (const condition of conditions)
		{
			setOwn(filter, condition.field, this.predicate(condition));
		}
		return filter;
	}

	private singleFilter(condition: Condition): MongoFilter
	{
		return { [condition.field]: this.predicate(condition) };
	}

	private predicate(condition: Condition): MongoFilterValue
	{
		const value = cloneValue(condition.value);

		switch (condition.operator)
		{
			case 'EQ':
				return value;
			case 'NE':
				return { $ne: value };
			case 'GT':
				return { $gt: value };
			case 'GE':
				return { $gte: value };
			case 'LT':
				return { $lt: value };
			case 'LE':
				return { $lte: value };
			case 'IN':
				return { $in: cloneValue(expectList(condition)) };
			case 'NOT_IN':
				return { $nin: cloneValue(expectList(condition)) };
			case 'LIKE':
				return { $regex: likeToRegex(expectPattern(condition)), $options: 'i' };
			case 'REGEX':
				return { $regex: expectPattern(condition) };
			case 'IS_NULL':
				return null;
			case 'IS_NOT_NULL':
				return { $ne: null };
			case 'BETWEEN':
			{
				const [lo, hi] = expectPair(condition);
				return { $gte: cloneValue(lo), $lte: cloneValue(hi) };
			}
			case 'EXISTS':
				return { $exists: true };
			default:
				return this.unsupportedOperator(condition.operator);
		}
	}

	private rejectRelationalClauses(ast: QueryAST): void
	{
		const clauses = [
			['joins', ast.joins.length],
			['grouping', ast.grouping.length],
			['having', ast.having.length]
		] as const;

		for (const [clause, size] of clauses)
		{
			if (size > 0)
			{
				this.logger.error('Clause has no document-store form', { clause, target: ast.target });
				throw new RenderError('UnsupportedClause', `${clause} cannot be rendered as a document-store command`, { clause });
			}
		}
	}

	private unsupportedOperator(operator: never): never
	{
		throw new RenderError('UnsupportedOperator', `unsupported operator for document store: ${String(operator)}`, { operator });
	}

	private unsupportedOperation(operation: never): never
	{
		throw new RenderError('UnsupportedOperation', `unsupported operation: ${String(operation)}`, { operation });
	}
}
