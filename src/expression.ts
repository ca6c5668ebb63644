import type { BindValue, Condition } from './condition';
import { ConditionBuilder } from './condition';
import { ValidationError } from './errors';
import { getLogger } from './logger';
import { Logic } from './operator';

const logger = getLogger('ExpressionBuilder');

/**
 * Conditions folded into one fragment, with their values in text order.
 * `logic` prefixes the whole expression when it is grouped with siblings and
 * is independent of the connectives inside `text`.
 */
export interface Expression
{
	readonly text: string;
	readonly logic?: Logic;
	readonly values: readonly BindValue[];
}

export class ExpressionBuilder
{
	/**
	 * Folds conditions left to right, space separated. The first condition's
	 * own connective is kept as written.
	 *
	 * @param conditions Conditions in output order
	 * @param logic Connective for this expression one grouping level up
	 * @throws ValidationError from the first invalid condition, or if `conditions` is empty
	 */
	static build(conditions: readonly Condition[], logic?: Logic): Expression
	{
		if (conditions.length === 0)
		{
			logger.error('Expression has no conditions');
			throw new ValidationError('expression requires at least one condition');
		}

		const fragments: string[] = [];
		const values: BindValue[] = [];
		for (const condition of conditions)
		{
			fragments.push(ConditionBuilder.build(condition));
			values.push(...ConditionBuilder.values(condition));
		}

		return Object.freeze({
			text: fragments.join(' '),
			logic,
			values: Object.freeze(values)
		});
	}
}
