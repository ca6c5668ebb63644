/**
 * Leaf predicates: the value a condition compares against and the rendering
 * of one `field operator value` fragment.
 *
 * @module condition
 */

import { ValidationError } from './errors';
import { getLogger } from './logger';
import { Logic, Operator, isNullCheck, renderOperator } from './operator';
import { GENERIC_MARKER } from './placeholder';

const logger = getLogger('ConditionBuilder');

/**
 * JSON-compatible value.
 */
export type JsonValue =
	| null
	| boolean
	| number
	| string
	| JsonValue[]
	| { [key: string]: JsonValue };

/**
 * A value that can be bound to a placeholder.
 */
export type BindValue = JsonValue | Date | bigint;

/**
 * Right-hand side of a condition.
 * - `literal`: one bound value
 * - `field`: another table's column, rendered as SQL text and never bound
 * - `range`: two bound values, low then high
 */
export type ValueRef =
	| { kind: 'literal'; value: BindValue }
	| { kind: 'field'; tableAlias: string; field: string }
	| { kind: 'range'; low: BindValue; high: BindValue };

/**
 * Helper function to create a literal value reference
 */
export function literal(value: BindValue): ValueRef
{
	return { kind: 'literal', value };
}

/**
 * Helper function to create a reference to `tableAlias.field`
 */
export function fieldRef(tableAlias: string, field: string): ValueRef
{
	return { kind: 'field', tableAlias, field };
}

/**
 * Helper function to create a `low AND high` range
 */
export function range(low: BindValue, high: BindValue): ValueRef
{
	return { kind: 'range', low, high };
}

/**
 * One leaf predicate. `logic` is written in front of this condition's own
 * fragment; nothing is inserted between conditions automatically.
 */
export interface Condition
{
	tableAlias?: string;
	field: string;
	operator: Operator;
	value?: ValueRef;
	logic?: Logic;
}

/**
 * Marker shape of one value: arrays bind as a single parenthesised marker
 * and are left for the driver to expand.
 */
export function bindValue(value: BindValue): string
{
	return Array.isArray(value) ? `(${GENERIC_MARKER})` : GENERIC_MARKER;
}

/**
 * Text of a value reference in a condition.
 */
export function bindValueRef(ref: ValueRef): string
{
	switch (ref.kind)
	{
		case 'field':
			return `${ref.tableAlias}.${ref.field}`;
		case 'literal':
			return bindValue(ref.value);
		case 'range':
			return `${bindValue(ref.low)} AND ${bindValue(ref.high)}`;
	}
}

/**
 * Values a reference contributes, in the order its markers are written.
 */
export function valueRefValues(ref: ValueRef): BindValue[]
{
	switch (ref.kind)
	{
		case 'field':
			return [];
		case 'literal':
			return [ref.value];
		case 'range':
			return [ref.low, ref.high];
	}
}

/**
 * `alias.field`, or `field` when no alias is given.
 */
export function qualify(field: string, tableAlias?: string): string
{
	return tableAlias ? `${tableAlias}.${field}` : field;
}

export class ConditionBuilder
{
	/**
	 * Renders a condition, e.g. `AND t.age >= ?` or `t.deleted_at IS NULL`.
	 * @throws ValidationError if the field is empty, or if an operator other
	 * than a null check has no value
	 */
	static build(condition: Condition): string
	{
		if (!condition.field)
		{
			logger.error('Condition field is empty', { operator: condition.operator });
			throw new ValidationError('field is empty');
		}

		const operator = renderOperator(condition.operator);
		const column = qualify(condition.field, condition.tableAlias);
		let fragment: string;

		if (isNullCheck(condition.operator))
		{
			fragment = `${column} ${operator}`;
		}
		else
		{
			if (!condition.value)
			{
				logger.error('Condition has no value', { field: condition.field, operator: condition.operator });
				throw new ValidationError(`operator ${condition.operator} on field ${condition.field} requires a value`);
			}
			fragment = `${column} ${operator} ${bindValueRef(condition.value)}`;
		}

		return condition.logic ? `${condition.logic} ${fragment}` : fragment;
	}

	/**
	 * Bound values of a condition. Null checks contribute none, whatever their value.
	 */
	static values(condition: Condition): BindValue[]
	{
		if (isNullCheck(condition.operator) || !condition.value)
		{
			return [];
		}
		return valueRefValues(condition.value);
	}
}
