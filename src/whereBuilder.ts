/**
 * Combines expressions into predicate clauses.
 *
 * @module whereBuilder
 */

import type { BindValue } from './condition';
import { ValidationError } from './errors';
import type { Expression } from './expression';
import { getLogger } from './logger';

const logger = getLogger('WhereBuilder');

/**
 * Clause text with its bound values in text order.
 */
export interface GroupedClause
{
	readonly text: string;
	readonly values: readonly BindValue[];
}

/**
 * Joins expressions into one predicate. With more than one expression each
 * is written as `LOGIC (text)`; a lone expression is written as `LOGIC text`
 * without parentheses. The logic is left out wherever it is unset.
 */
export function groupExpressions(expressions: readonly Expression[]): GroupedClause
{
	const doGrouping = expressions.length > 1;
	const parts: string[] = [];
	const values: BindValue[] = [];

	for (const expression of expressions)
	{
		const body = doGrouping ? `(${expression.text})` : expression.text;
		parts.push(expression.logic ? `${expression.logic} ${body}` : body);
		values.push(...expression.values);
	}

	return { text: parts.join(' '), values };
}

export class WhereBuilder
{
	/**
	 * Builds a `WHERE` clause.
	 * @throws ValidationError if `expressions` is empty
	 */
	static build(expressions: readonly Expression[]): GroupedClause
	{
		if (expressions.length === 0)
		{
			logger.error('WHERE clause has no expressions');
			throw new ValidationError('where clause requires at least one expression');
		}

		const grouped = groupExpressions(expressions);
		return { text: `WHERE ${grouped.text}`, values: grouped.values };
	}
}
