import { qualify } from './condition';
import { ValidationError } from './errors';
import { getLogger } from './logger';

const logger = getLogger('GroupByBuilder');

export interface GroupByItem
{
	tableAlias?: string;
	field: string;
}

export class GroupByBuilder
{
	/**
	 * Builds `GROUP BY t.a, t.b`, dropping repeated fields.
	 * @throws ValidationError if `items` is empty or a field is empty
	 */
	static build(items: readonly GroupByItem[]): string
	{
		if (items.length === 0)
		{
			logger.error('GROUP BY has no items');
			throw new ValidationError('group by item is empty');
		}

		const rendered: string[] = [];
		for (const item of items)
		{
			if (!item.field)
			{
				logger.error('GROUP BY field is empty', { tableAlias: item.tableAlias });
				throw new ValidationError('group by field is empty');
			}
			const fragment = qualify(item.field, item.tableAlias);
			if (!rendered.includes(fragment))
			{
				rendered.push(fragment);
			}
		}

		return `GROUP BY ${rendered.join(', ')}`;
	}
}
