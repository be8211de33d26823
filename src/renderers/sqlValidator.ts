import { getLogger } from '../logger';
import { RenderError } from '../errors';
import type { QueryAST } from '../queryAst';

/**
 * Identifier and parameter-name checks for SQL output. Everything the SQL
 * renderer writes into query text, other than raw JOIN predicates, passes
 * through here first.
 */
export class SQLValidator
{
	private static readonly logger = getLogger('SQLValidator');

	private static readonly IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*(\.[a-zA-Z_][a-zA-Z0-9_]*)?$/;
	private static readonly PARAM_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
	private static readonly JOIN_TYPES = ['INNER', 'LEFT', 'RIGHT', 'FULL', 'FULL OUTER', 'CROSS'];

	/**
	 * Letters, digits and underscores, optionally one `table.` prefix, at most 128 characters.
	 * @param allowWildcard Accept a bare `*` (projection and RETURNING lists)
	 * @throws RenderError `InvalidIdentifier`
	 */
	static validateIdentifier(identifier: string, allowWildcard = false): string
	{
		if (allowWildcard && identifier === '*')
		{
			return identifier;
		}
		if (!this.IDENTIFIER.test(identifier) || identifier.length > 128)
		{
			this.logger.error('Invalid SQL identifier detected', { identifier });
			throw new RenderError('InvalidIdentifier', `Invalid identifier: ${identifier}`, { identifier });
		}
		return identifier;
	}

	/**
	 * Aliases cannot be dotted.
	 * @throws RenderError `InvalidIdentifier`
	 */
	static validateAlias(alias: string): string
	{
		if (!this.PARAM_NAME.test(alias))
		{
			this.logger.error('Invalid SQL alias detected', { alias });
			throw new RenderError('InvalidIdentifier', `Invalid alias: ${alias}`, { alias });
		}
		return alias;
	}

	/**
	 * Parameter names are written after a colon and must be a single plain word.
	 * @throws RenderError `InvalidIdentifier`
	 */
	static validateParamName(paramName: string): string
	{
		if (!this.PARAM_NAME.test(paramName))
		{
			this.logger.error('Invalid parameter name detected', { paramName });
			throw new RenderError('InvalidIdentifier', `Invalid parameter name: ${paramName}`, { paramName });
		}
		return paramName;
	}

	/**
	 * @throws RenderError `InvalidIdentifier`
	 */
	static validateDirection(direction: string): string
	{
		if (direction !== 'ASC' && direction !== 'DESC')
		{
			this.logger.error('Invalid ORDER BY direction detected', { direction });
			throw new RenderError('InvalidIdentifier', `Invalid ORDER BY direction: ${direction}`, { direction });
		}
		return direction;
	}

	/**
	 * @throws RenderError `InvalidIdentifier`
	 */
	static validateJoinType(joinType: string): string
	{
		if (!this.JOIN_TYPES.includes(joinType))
		{
			this.logger.error('Invalid JOIN type detected', { joinType, validTypes: this.JOIN_TYPES });
			throw new RenderError('InvalidIdentifier', `Invalid JOIN type: ${joinType}`, { joinType });
		}
		return joinType;
	}

	/**
	 * Checks every identifier and parameter name the AST would put into SQL text.
	 */
	static validateQuery(ast: QueryAST): void
	{
		this.logger.debug('Validating SQL identifiers', { operation: ast.operation, target: ast.target });

		this.validateIdentifier(ast.target);

		for (const field of ast.fields)
		{
			this.validateIdentifier(field.name, true);
			if (field.alias)
			{
				this.validateAlias(field.alias);
			}
		}

		for (const condition of [...ast.conditions, ...ast.having])
		{
			this.validateIdentifier(condition.field);
			this.validateParamName(condition.paramName);
		}

		for (const join of ast.joins)
		{
			this.validateJoinType(join.type);
			this.validateIdentifier(join.target);
		}

		for (const order of ast.ordering)
		{
			this.validateIdentifier(order.field);
			this.validateDirection(order.direction);
		}

		for (const field of ast.grouping)
		{
			this.validateIdentifier(field);
		}

		for (const row of ast.values ?? [])
		{
			for (const entry of row)
			{
				this.validateIdentifier(entry.field);
			}
		}

		for (const entry of ast.updates ?? [])
		{
			this.validateIdentifier(entry.field);
		}

		for (const field of ast.returning)
		{
			this.validateIdentifier(field, true);
		}
	}
}
