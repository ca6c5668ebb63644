import { qualify } from './condition';
import { ValidationError } from './errors';
import { getLogger } from './logger';

const logger = getLogger('OrderByBuilder');

/**
 * Sort direction
 */
export enum Sequence
{
	Asc = 'ASC',
	Desc = 'DESC'
}

export interface OrderByItem
{
	tableAlias?: string;
	field: string;
	sequence: Sequence;
}

export class OrderByBuilder
{
	/**
	 * Builds `ORDER BY a ASC, t.b DESC`. An item whose rendered text equals
	 * an earlier one is dropped.
	 * @throws ValidationError if `items` is empty or a field is empty
	 */
	static build(items: readonly OrderByItem[]): string
	{
		if (items.length === 0)
		{
			logger.error('ORDER BY has no items');
			throw new ValidationError('order by item is empty');
		}

		const rendered: string[] = [];
		for (const item of items)
		{
			if (!item.field)
			{
				logger.error('ORDER BY field is empty', { tableAlias: item.tableAlias });
				throw new ValidationError('order by field is empty');
			}
			const fragment = `${qualify(item.field, item.tableAlias)} ${item.sequence}`;
			if (!rendered.includes(fragment))
			{
				rendered.push(fragment);
			}
		}

		return `ORDER BY ${rendered.join(', ')}`;
	}
}
