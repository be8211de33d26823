import type { Condition, Operator, QueryValue } from './queryAst';
import { RenderError } from './errors';

/**
 * How many values an operator consumes.
 *
 * - `binary`: a single comparison value
 * - `list`: a sequence of values
 * - `pattern`: a string pattern
 * - `pair`: exactly `[lo, hi]`
 * - `unary`: no value
 */
export type OperatorArity = 'binary' | 'list' | 'pattern' | 'pair' | 'unary';

export interface OperatorInfo
{
	readonly arity: OperatorArity;
	readonly description: string;
}

export const OPERATORS: Readonly<Record<Operator, OperatorInfo>> = {
	EQ: { arity: 'binary', description: 'equal to' },
	NE: { arity: 'binary', description: 'not equal to' },
	GT: { arity: 'binary', description: 'greater than' },
	GE: { arity: 'binary', description: 'greater than or equal to' },
	LT: { arity: 'binary', description: 'less than' },
	LE: { arity: 'binary', description: 'less than or equal to' },
	IN: { arity: 'list', description: 'member of' },
	NOT_IN: { arity: 'list', description: 'not a member of' },
	LIKE: { arity: 'pattern', description: 'matches a % / _ wildcard pattern' },
	REGEX: { arity: 'pattern', description: 'matches a backend regular expression' },
	IS_NULL: { arity: 'unary', description: 'is null' },
	IS_NOT_NULL: { arity: 'unary', description: 'is not null' },
	BETWEEN: { arity: 'pair', description: 'between two bounds, inclusive' },
	EXISTS: { arity: 'unary', description: 'field is present' }
};

export function operatorArity(operator: Operator): OperatorArity
{
	return OPERATORS[operator].arity;
}

/** Whether the operator binds its condition value. */
export function usesValue(operator: Operator): boolean
{
	return operatorArity(operator) !== 'unary';
}

/**
 * Parameter name derived from a field: `u.id` becomes `u_id`.
 */
export function toParamName(field: string): string
{
	return field.replace(/\./g, '_');
}

/**
 * Returns the `[lo, hi]` bounds of a BETWEEN condition.
 * @throws RenderError `MalformedBetween` unless the value is a two-element list
 */
export function expectPair(condition: Condition): [QueryValue, QueryValue]
{
	const value = condition.value;
	if (!Array.isArray(value) || value.length !== 2)
	{
		throw new RenderError('MalformedBetween', `BETWEEN on "${condition.field}" requires exactly two values`, {
			field: condition.field
		});
	}
	return [value[0], value[1]];
}

/**
 * @throws RenderError `MalformedList` unless the value of an IN / NOT_IN condition is a list
 */
export function expectList(condition: Condition): QueryValue[]
{
	if (!Array.isArray(condition.value))
	{
		throw new RenderError('MalformedList', `${condition.operator} on "${condition.field}" requires a list of values`, {
			field: condition.field
		});
	}
	return condition.value;
}

/**
 * @throws RenderError `MalformedPattern` unless the value of a LIKE / REGEX condition is a string
 */
export function expectPattern(condition: Condition): string
{
	if (typeof condition.value !== 'string')
	{
		throw new RenderError('MalformedPattern', `${condition.operator} on "${condition.field}" requires a string pattern`, {
			field: condition.field
		});
	}
	return condition.value;
}
