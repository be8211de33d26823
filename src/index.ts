/**
 * @file Main entry point of astql: the backend-agnostic query AST, its
 * builder and validator, the SQL and document-store renderers, and the
 * catalog adapter that derives default CRUD queries from field metadata.
 */
export type {
	Operation, Operator, LogicalOperator, SortDirection, JoinType,
	QueryScalar, QueryValue, Field, Condition, Join, Order, Hint,
	RowEntry, Row, QueryAST
} from './queryAst';
export { cloneQueryAST, cloneValue, toRow, rowToRecord, setOwn } from './queryAst';

export type { OperatorArity, OperatorInfo } from './operators';
export { OPERATORS, operatorArity, usesValue, toParamName } from './operators';

export type { ValidationErrorKind, RenderErrorKind, CatalogErrorKind, QueryErrorKind } from './errors';
export { QueryError, ValidationError, RenderError, CatalogError } from './errors';

export { validateQueryAST, assertValidQueryAST, checkPagination } from './validator';

export type { BuildResult } from './queryBuilder';
export { QueryBuilder } from './queryBuilder';

export type { Renderer } from './renderer';

export type { SQLQuery, SQLRendererOptions } from './renderers/sqlRenderer';
export { SQLRenderer } from './renderers/sqlRenderer';
export { SQLEscaper, PlainEscaper, PostgreSQLEscaper, SQLiteEscaper } from './renderers/sqlEscaper';
export { SQLValidator } from './renderers/sqlValidator';

export type {
	MongoOperation, MongoFilter, MongoFilterValue, MongoDocument,
	MongoFindOptions, MongoCommand, OrStrategy, MongoRendererOptions
} from './renderers/mongoRenderer';
export { MongoRenderer, likeToRegex, serializeMongoCommand } from './renderers/mongoRenderer';

export type { FieldDescriptor, EntityMetadata, CrudVerb } from './catalog';
export {
	defaultAST, generateCrudQueries, resolveColumn, hasField, targetOf,
	SUPPORTED_VERBS, DEFAULT_LIST_LIMIT
} from './catalog';

export type { LogData, LogEntry, LoggerConfig, ContextLogger } from './logger';
export { Logger, LogLevel, globalLogger, getLogger } from './logger';
