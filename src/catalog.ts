/**
 * @file Default CRUD queries for an entity, synthesized from plain field
 * metadata. The metadata is passed in by the caller; nothing here discovers
 * it or keeps it in a registry.
 */
import type { Hint, QueryAST, QueryValue } from './queryAst';
import { setOwn } from './queryAst';
import { QueryBuilder } from './queryBuilder';
import { CatalogError } from './errors';
import { getLogger } from './logger';

const logger = getLogger('Catalog');

/**
 * One field of an entity.
 */
export interface FieldDescriptor
{
	/** Field name in code */
	name: string;
	/** Serialized name; `-` excludes the field from every query */
	jsonName?: string;
	/** Column override */
	dbColumn?: string;
	/**
	 * Tag values by key. `astql` holds comma-separated directives, `db` a
	 * column override (`-` is ignored).
	 */
	tags?: Readonly<Record<string, string>>;
}

export interface EntityMetadata
{
	/** Entity type name; the default table is its lower-cased plural */
	typeName: string;
	/** Explicit table or collection name */
	table?: string;
	fields: readonly FieldDescriptor[];
}

export type CrudVerb = 'get' | 'list' | 'create' | 'update' | 'delete' | 'count';

export const SUPPORTED_VERBS: readonly CrudVerb[] = ['get', 'list', 'create', 'update', 'delete', 'count'];

/** Page size of the default `list` query. */
export const DEFAULT_LIST_LIMIT = 100;

const SOFT_DELETE_FIELD = 'deleted_at';
const CREATED_FIELD = 'created_at';
const ID_FIELD = 'id';
const TENANT_PARAM = 'tenant_id';
const MANAGED_FIELDS = [ID_FIELD, CREATED_FIELD, SOFT_DELETE_FIELD];

interface ResolvedField
{
	column: string;
	hints: Hint[];
	tenant: boolean;
}

/**
 * Column a field maps to: name, then jsonName, then dbColumn, then the `db` tag.
 * Returns `undefined` for fields excluded with `jsonName: '-'`.
 */
export function resolveColumn(field: FieldDescriptor): string | undefined
{
	if (field.jsonName === '-')
	{
		return undefined;
	}

	let column = field.name;
	if (field.jsonName)
	{
		column = field.jsonName;
	}
	if (field.dbColumn)
	{
		column = field.dbColumn;
	}
	const dbTag = field.tags?.db;
	if (dbTag && dbTag !== '-')
	{
		column = dbTag;
	}
	return column;
}

/**
 * Whether any field is known under `name`, by code name, serialized name or column.
 */
export function hasField(metadata: EntityMetadata, name: string): boolean
{
	return metadata.fields.some(field =>
		field.name === name
		|| field.jsonName === name
		|| field.dbColumn === name
		|| field.tags?.db === name
	);
}

export function targetOf(metadata: EntityMetadata): string
{
	return metadata.table ?? `${metadata.typeName.toLowerCase()}s`;
}

/**
 * Parses the `astql` directives of one field.
 * @throws CatalogError `UnsupportedDirective` for `relation:` and unknown directives
 */
function parseDirectives(column: string, tag: string): Pick<ResolvedField, 'hints' | 'tenant'>
{
	const hints: Hint[] = [];
	let tenant = false;

	for (const raw of tag.split(','))
	{
		const directive = raw.trim();
		if (!directive)
		{
			continue;
		}

		if (directive.startsWith('index:'))
		{
			hints.push({ provider: 'sql', type: 'index', value: `${column}:${directive.slice('index:'.length)}` });
		}
		else if (directive === 'unique')
		{
			hints.push({ provider: 'sql', type: 'unique', value: column });
		}
		else if (directive === 'security:tenant')
		{
			tenant = true;
		}
		else
		{
			// relation:<name> would need JOIN synthesis, which does not exist yet
			logger.error('Unsupported astql directive', { column, directive });
			throw new CatalogError('UnsupportedDirective', `Unsupported astql directive "${directive}" on field "${column}"`, {
				column,
				directive
			});
		}
	}

	return { hints, tenant };
}

function resolveFields(metadata: EntityMetadata): ResolvedField[]
{
	const resolved: ResolvedField[] = [];
	for (const field of metadata.fields)
	{
		const column = resolveColumn(field);
		if (column === undefined)
		{
			continue;
		}
		const tag = field.tags?.astql;
		resolved.push({ column, ...(tag ? parseDirectives(column, tag) : { hints: [], tenant: false }) });
	}
	return resolved;
}

function nullRow(columns: readonly string[]): Record<string, QueryValue>
{
	const row: Record<string, QueryValue> = {};
	for (const column of columns)
	{
		setOwn(row, column, null);
	}
	return row;
}

/**
 * Builds the default AST for one CRUD verb. Values that only exist at
 * execution time (the record id, the tenant, column values) are bound as
 * `null` placeholders under stable parameter names.
 *
 * - `get`: SELECT every column by `id`
 * - `list`: SELECT every column, newest first when `created_at` exists, first page of {@link DEFAULT_LIST_LIMIT}
 * - `create`: INSERT one row of every column, `RETURNING *`
 * - `update`: UPDATE every column except `id`, `created_at` and `deleted_at` by `id`, `RETURNING *`
 * - `delete`: soft delete (sets `deleted_at`) when the entity has one, hard DELETE otherwise
 * - `count`: COUNT
 *
 * Tenant conditions from `security:tenant` come first, then `deleted_at IS NULL`
 * when the entity is soft-deletable, then `id = :id`.
 *
 * @throws CatalogError `UnsupportedDirective` for unsupported `astql` directives,
 * `DuplicateTenantField` when more than one field is tagged `security:tenant`,
 * `NoUpdatableColumns` for `update` when every column is managed
 */
export function defaultAST(metadata: EntityMetadata, verb: CrudVerb): QueryAST
{
	const target = targetOf(metadata);
	const fields = resolveFields(metadata);
	const columns = fields.map(f => f.column);
	const softDelete = hasField(metadata, SOFT_DELETE_FIELD);

	const tenantColumns = fields.filter(f => f.tenant).map(f => f.column);
	if (tenantColumns.length > 1)
	{
		logger.error('More than one tenant field', { typeName: metadata.typeName, columns: tenantColumns });
		throw new CatalogError(
			'DuplicateTenantField',
			`${metadata.typeName} has more than one security:tenant field: ${tenantColumns.join(', ')}`,
			{ columns: tenantColumns }
		);
	}

	let builder: QueryBuilder;
	switch (verb)
	{
		case 'get':
		case 'list':
			builder = QueryBuilder.select(target).fields(...columns);
			break;
		case 'create':
			builder = QueryBuilder.insert(target).values(nullRow(columns)).returning('*');
			break;
		case 'update':
		{
			const updatable = columns.filter(c => !MANAGED_FIELDS.includes(c));
			if (updatable.length === 0)
			{
				throw new CatalogError('NoUpdatableColumns', `${metadata.typeName} has no columns an update can set`, {
					typeName: metadata.typeName
				});
			}
			builder = QueryBuilder.update(target).returning('*');
			for (const column of updatable)
			{
				builder.set(column, null);
			}
			break;
		}
		case 'delete':
			builder = softDelete
				? QueryBuilder.update(target).set(SOFT_DELETE_FIELD, null)
				: QueryBuilder.delete(target);
			break;
		case 'count':
			builder = QueryBuilder.count(target);
			break;
	}

	for (const field of fields)
	{
		for (const hint of field.hints)
		{
			builder.hint(hint.provider, hint.type, hint.value);
		}
	}

	if (verb !== 'create')
	{
		for (const column of tenantColumns)
		{
			builder.whereRaw(column, 'EQ', null, TENANT_PARAM);
		}
		if (softDelete)
		{
			builder.whereNull(SOFT_DELETE_FIELD);
		}
		if (verb === 'get' || verb === 'update' || verb === 'delete')
		{
			builder.where(ID_FIELD, 'EQ', null);
		}
	}

	if (verb === 'list')
	{
		if (hasField(metadata, CREATED_FIELD))
		{
			builder.orderByDesc(CREATED_FIELD);
		}
		builder.limit(DEFAULT_LIST_LIMIT).offset(0);
	}

	return builder.mustBuild();
}

/**
 * Default AST for every verb in {@link SUPPORTED_VERBS}. A verb the entity has
 * no query for (`update` when every column is managed) is left out.
 */
export function generateCrudQueries(metadata: EntityMetadata): Partial<Record<CrudVerb, QueryAST>>
{
	logger.info('Generating queries from metadata', { typeName: metadata.typeName, fieldCount: metadata.fields.length });

	const queries: Partial<Record<CrudVerb, QueryAST>> = {};

	for (const verb of SUPPORTED_VERBS)
	{
		let ast: QueryAST;
		try
		{
			ast = defaultAST(metadata, verb);
		}
		catch (error)
		{
			if (error instanceof CatalogError && error.kind === 'NoUpdatableColumns')
			{
				logger.debug('Skipping verb', { typeName: metadata.typeName, verb, reason: error.message });
				continue;
			}
			throw error;
		}

		queries[verb] = ast;
		logger.debug('Generated AST', {
			typeName: metadata.typeName,
			verb,
			target: ast.target,
			fieldCount: ast.fields.length,
			conditionCount: ast.conditions.length
		});
	}

	logger.info('Query generation completed', { typeName: metadata.typeName, queryCount: Object.keys(queries).length });
	return queries;
}
