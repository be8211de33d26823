/**
 * Error kinds raised by {@link validateQueryAST}.
 */
export type ValidationErrorKind =
	| 'MissingTarget'
	| 'MissingInsertValues'
	| 'MissingUpdateFields';

/**
 * Error kinds raised while compiling a QueryAST into a backend form.
 */
export type RenderErrorKind =
	| 'UnsupportedOperator'
	| 'UnsupportedOperation'
	| 'UnsupportedClause'
	| 'MalformedBetween'
	| 'MalformedList'
	| 'MalformedPattern'
	| 'MalformedRow'
	| 'InvalidIdentifier'
	| 'InvalidPagination'
	| 'DuplicateParameter';

/**
 * Error kinds raised while synthesizing ASTs from entity metadata.
 */
export type CatalogErrorKind =
	| 'UnsupportedDirective'
	| 'DuplicateTenantField'
	| 'NoUpdatableColumns';

export type QueryErrorKind = ValidationErrorKind | RenderErrorKind | CatalogErrorKind;

/**
 * Base class for every error astql raises. `kind` is stable and meant for
 * programmatic handling; `message` is for humans.
 */
export class QueryError<K extends QueryErrorKind = QueryErrorKind> extends Error
{
	constructor(
		readonly kind: K,
		message: string,
		readonly details?: Record<string, unknown>
	)
	{
		super(message);
		this.name = new.target.name;
	}
}

export class ValidationError extends QueryError<ValidationErrorKind> {}

export class RenderError extends QueryError<RenderErrorKind> {}

export class CatalogError extends QueryError<CatalogErrorKind> {}
