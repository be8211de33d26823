/**
 * Quotes identifiers for one SQL dialect. Identifiers reach the escaper
 * already validated, so escaping only has to add the dialect's quoting.
 */
export abstract class SQLEscaper
{
	/**
	 * @param identifier Identifier, possibly `table.column`
	 */
	abstract escapeIdentifier(identifier: string): string;
}

/**
 * Leaves identifiers exactly as written. Default for {@link SQLRenderer}.
 */
export class PlainEscaper extends SQLEscaper
{
	escapeIdentifier(identifier: string): string
	{
		return identifier;
	}
}

/**
 * Double-quotes each part of a dotted identifier: `u.id` becomes `"u"."id"`.
 */
export class PostgreSQLEscaper extends SQLEscaper
{
	escapeIdentifier(identifier: string): string
	{
		return identifier.split('.').map(part => `"${part}"`).join('.');
	}
}

/**
 * SQLite accepts the same double-quoted form as PostgreSQL.
 */
export class SQLiteEscaper extends PostgreSQLEscaper {}
