import { describe, it, expect } from 'vitest';
import { OPERATORS, expectList, expectPair, expectPattern, operatorArity, toParamName, usesValue } from './operators';
import type { Condition, Operator, QueryValue } from './queryAst';

const condition = (operator: Operator, value: QueryValue): Condition => ({
	field: 'age',
	operator,
	value,
	logical: 'AND',
	paramName: 'age'
});

describe('operators', () =>
{
	it('describes every operator', () =>
	{
		expect(Object.keys(OPERATORS)).toEqual([
			'EQ', 'NE', 'GT', 'GE', 'LT', 'LE', 'IN', 'NOT_IN',
			'LIKE', 'REGEX', 'IS_NULL', 'IS_NOT_NULL', 'BETWEEN', 'EXISTS'
		]);
	});

	it('reports arity', () =>
	{
		expect(operatorArity('GE')).toBe('binary');
		expect(operatorArity('NOT_IN')).toBe('list');
		expect(operatorArity('LIKE')).toBe('pattern');
		expect(operatorArity('BETWEEN')).toBe('pair');
		expect(operatorArity('EXISTS')).toBe('unary');
	});

	it('knows which operators bind a value', () =>
	{
		expect(usesValue('EQ')).toBe(true);
		expect(usesValue('BETWEEN')).toBe(true);
		expect(usesValue('IS_NULL')).toBe(false);
		expect(usesValue('IS_NOT_NULL')).toBe(false);
	});

	it('derives parameter names from dotted fields', () =>
	{
		expect(toParamName('u.id')).toBe('u_id');
		expect(toParamName('email')).toBe('email');
	});

	describe('value checks', () =>
	{
		it('returns BETWEEN bounds', () =>
		{
			expect(expectPair(condition('BETWEEN', [18, 65]))).toEqual([18, 65]);
		});

		it('rejects BETWEEN values that are not a pair', () =>
		{
			const values: QueryValue[] = [[1], [1, 2, 3], 5, null];
			for (const value of values)
			{
				expect(() => expectPair(condition('BETWEEN', value))).toThrow(
					expect.objectContaining({ kind: 'MalformedBetween' })
				);
			}
		});

		it('requires a list for IN', () =>
		{
			expect(expectList(condition('IN', [1, 2]))).toEqual([1, 2]);
			expect(() => expectList(condition('IN', 1))).toThrow('IN on "age" requires a list of values');
		});

		it('requires a string pattern for LIKE', () =>
		{
			expect(expectPattern(condition('LIKE', 'a%'))).toBe('a%');
			expect(() => expectPattern(condition('LIKE', 3))).toThrow(
				expect.objectContaining({ kind: 'MalformedPattern' })
			);
		});
	});
});
