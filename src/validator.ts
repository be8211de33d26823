import type { QueryAST } from './queryAst';
import { RenderError, ValidationError } from './errors';
import { getLogger } from './logger';

const logger = getLogger('Validator');

/**
 * Checks the structural invariants of an AST and returns the first one that
 * is violated, or `undefined` when the AST is valid.
 *
 * - `target` must be non-empty
 * - INSERT needs at least one row
 * - UPDATE needs at least one field assignment
 */
export function validateQueryAST(ast: QueryAST): ValidationError | undefined
{
	let error: ValidationError | undefined;

	if (!ast.target)
	{
		error = new ValidationError('MissingTarget', 'target (table/collection) is required');
	}
	else if (ast.operation === 'INSERT' && (ast.values?.length ?? 0) === 0)
	{
		error = new ValidationError('MissingInsertValues', 'INSERT requires at least one row of values');
	}
	else if (ast.operation === 'UPDATE' && (ast.updates?.length ?? 0) === 0)
	{
		error = new ValidationError('MissingUpdateFields', 'UPDATE requires at least one field to update');
	}

	if (error)
	{
		logger.warn('AST validation failed', { operation: ast.operation, target: ast.target, kind: error.kind });
	}
	return error;
}

/**
 * @throws ValidationError when {@link validateQueryAST} reports a problem
 */
export function assertValidQueryAST(ast: QueryAST): void
{
	const error = validateQueryAST(ast);
	if (error)
	{
		throw error;
	}
}

/**
 * LIMIT and OFFSET must be non-negative integers when present. This is a
 * render-time check: `paginate(0, n)` still builds.
 * @throws RenderError `InvalidPagination`
 */
export function checkPagination(ast: QueryAST): void
{
	for (const [name, value] of [['limit', ast.limit], ['offset', ast.offset]] as const)
	{
		if (value !== undefined && (!Number.isInteger(value) || value < 0))
		{
			logger.error('Invalid pagination value', { [name]: value });
			throw new RenderError('InvalidPagination', `Invalid ${name.toUpperCase()} value: ${value}`, { [name]: value });
		}
	}
}
