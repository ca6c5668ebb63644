import { describe, it, expect } from 'vitest';
import { ExpressionBuilder } from './expression';
import { fieldRef, literal, range } from './condition';
import type { Condition } from './condition';
import { ValidationError } from './errors';
import { Logic, Operator } from './operator';
import { countPlaceholders } from './placeholder';

describe('ExpressionBuilder', () =>
{
	it('should fold conditions with their own connectives', () =>
	{
		const expression = ExpressionBuilder.build([
			{ tableAlias: 't', field: 'myfield1', operator: Operator.Eq, value: literal('test') },
			{ tableAlias: 't', field: 'myfield2', operator: Operator.Eq, value: literal('other'), logic: Logic.And }
		]);

		expect(expression.text).toBe('t.myfield1 = ? AND t.myfield2 = ?');
		expect(expression.logic).toBeUndefined();
		expect(expression.values).toEqual(['test', 'other']);
	});

	it('should keep the first condition connective as written', () =>
	{
		const expression = ExpressionBuilder.build([
			{ tableAlias: 't', field: 'myfield2', operator: Operator.Between, value: range(10, 20), logic: Logic.And }
		]);

		expect(expression.text).toBe('AND t.myfield2 BETWEEN ? AND ?');
		expect(expression.values).toEqual([10, 20]);
	});

	it('should carry the grouping connective separately', () =>
	{
		const expression = ExpressionBuilder.build(
			[{ field: 'status', operator: Operator.Eq, value: literal('active') }],
			Logic.Or
		);

		expect(expression.text).toBe('status = ?');
		expect(expression.logic).toBe(Logic.Or);
	});

	it('should have one marker per bound value', () =>
	{
		const conditions: Condition[] = [
			{ tableAlias: 'o', field: 'id', operator: Operator.Eq, value: literal(1) },
			{ tableAlias: 'o', field: 'product_id', operator: Operator.Eq, value: fieldRef('p', 'id'), logic: Logic.And },
			{ tableAlias: 'o', field: 'quantity', operator: Operator.Between, value: range(1, 5), logic: Logic.And },
			{ tableAlias: 'o', field: 'user_id', operator: Operator.In, value: literal([1, 2, 3]), logic: Logic.And },
			{ tableAlias: 'o', field: 'order_date', operator: Operator.NotNull, logic: Logic.Or },
			{ tableAlias: 'o', field: 'meta', operator: Operator.JsonHasKey, value: literal('gift'), logic: Logic.And }
		];

		const expression = ExpressionBuilder.build(conditions);

		expect(expression.values).toEqual([1, 1, 5, [1, 2, 3], 'gift']);
		expect(countPlaceholders(expression.text)).toBe(5);
	});

	it('should not be affected by later changes to the input list', () =>
	{
		const conditions: Condition[] = [{ field: 'a', operator: Operator.Eq, value: literal(1) }];
		const expression = ExpressionBuilder.build(conditions);
		conditions.push({ field: 'b', operator: Operator.Eq, value: literal(2), logic: Logic.And });

		expect(expression.text).toBe('a = ?');
		expect(expression.values).toEqual([1]);
		expect(Object.isFrozen(expression)).toBe(true);
	});

	it('should fail on the first invalid condition', () =>
	{
		expect(() => ExpressionBuilder.build([
			{ field: 'a', operator: Operator.Eq, value: literal(1) },
			{ field: '', operator: Operator.Eq, value: literal('MYVALUE'), logic: Logic.And }
		])).toThrow(ValidationError);
	});

	it('should reject an empty condition list', () =>
	{
		expect(() => ExpressionBuilder.build([])).toThrow('expression requires at least one condition');
	});
});
