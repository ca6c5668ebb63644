/**
 * Renders the `SET` list of an UPDATE.
 *
 * @module setBuilder
 */

import type { BindValue } from './condition';
import { GENERIC_MARKER, PlaceholderKind } from './placeholder';
import { ValidationError } from './errors';
import { getLogger } from './logger';
import type { SelectBuilder } from './statements/selectBuilder';
import type { GroupedClause } from './whereBuilder';

const logger = getLogger('SetBuilder');

/**
 * Right-hand side of an assignment: a bound value or a sub-select.
 */
export type SetValue =
	| { kind: 'value'; value: BindValue }
	| { kind: 'query'; query: SelectBuilder };

export interface SetFieldUpdate
{
	field: string;
	value: SetValue;
}

export function setValue(value: BindValue): SetValue
{
	return { kind: 'value', value };
}

/**
 * Sub-select right-hand side. The select must use question-mark notation;
 * its placeholders are numbered together with the outer statement's.
 */
export function setQuery(query: SelectBuilder): SetValue
{
	return { kind: 'query', query };
}

export class SetBuilder
{
	/**
	 * Builds `SET a = ?, b = (SELECT ...)`. A sub-select's values are spliced
	 * in at the position of its assignment.
	 *
	 * @throws ValidationError if `items` is empty, a field is empty, or a
	 * sub-select was created with a notation other than question-mark
	 */
	static build(items: readonly SetFieldUpdate[]): GroupedClause
	{
		if (items.length === 0)
		{
			logger.error('SET has no assignments');
			throw new ValidationError('set requires at least one assignment');
		}

		const assignments: string[] = [];
		const values: BindValue[] = [];

		for (const item of items)
		{
			if (!item.field)
			{
				logger.error('SET field is empty');
				throw new ValidationError('set field is empty');
			}

			switch (item.value.kind)
			{
				case 'value':
					assignments.push(`${item.field} = ${GENERIC_MARKER}`);
					values.push(item.value.value);
					break;
				case 'query':
				{
					const { query } = item.value;
					if (query.getPlaceholderKind() !== PlaceholderKind.QuestionMark)
					{
						logger.error('Sub-select uses a numbered notation', { field: item.field, placeholder: query.getPlaceholderKind() });
						throw new ValidationError(`sub-select for ${item.field} must be built with question-mark placeholders`);
					}
					const nested = query.build();
					assignments.push(`${item.field} = (${nested.sql})`);
					values.push(...nested.values);
					break;
				}
			}
		}

		return { text: `SET ${assignments.join(', ')}`, values };
	}
}
