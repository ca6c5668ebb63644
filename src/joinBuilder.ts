import { ValidationError } from './errors';
import type { Expression } from './expression';
import { getLogger } from './logger';
import type { GroupedClause } from './whereBuilder';
import { groupExpressions } from './whereBuilder';

const logger = getLogger('JoinBuilder');

/**
 * JOIN type
 */
export enum JoinKind
{
	Inner = 'INNER',
	Left = 'LEFT',
	Right = 'RIGHT',
	Full = 'FULL',
	Cross = 'CROSS'
}

export class JoinBuilder
{
	/**
	 * Builds `KIND JOIN table as alias ON ...`. A cross join takes no
	 * expressions and has no `ON`; every other kind needs at least one.
	 *
	 * @param kind JOIN type
	 * @param table Joined table
	 * @param tableAlias Alias the ON expressions refer to
	 * @param expressions ON expressions, grouped like a WHERE clause
	 * @throws ValidationError on an empty table or alias, or an expression list that does not fit `kind`
	 */
	static build(kind: JoinKind, table: string, tableAlias: string, expressions: readonly Expression[]): GroupedClause
	{
		if (!table || !tableAlias)
		{
			logger.error('JOIN table or alias is empty', { table, tableAlias });
			throw new ValidationError('join table and alias are required');
		}

		const head = `${kind} JOIN ${table} as ${tableAlias}`;

		if (kind === JoinKind.Cross)
		{
			if (expressions.length > 0)
			{
				logger.error('CROSS JOIN given ON expressions', { table, expressionCount: expressions.length });
				throw new ValidationError('cross join does not take on expressions');
			}
			return { text: head, values: [] };
		}

		if (expressions.length === 0)
		{
			logger.error('JOIN has no ON expressions', { kind, table });
			throw new ValidationError(`${kind.toLowerCase()} join requires at least one on expression`);
		}

		const grouped = groupExpressions(expressions);
		return { text: `${head} ON ${grouped.text}`, values: grouped.values };
	}
}
