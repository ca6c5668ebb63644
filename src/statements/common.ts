import { ValidationError } from '../errors';
import { getLogger } from '../logger';

const logger = getLogger('StatementBuilder');

/**
 * `table as alias`, or `table` when no alias is given.
 */
export function tableReference(table: string, tableAlias?: string): string
{
	return tableAlias ? `${table} as ${tableAlias}` : table;
}

/**
 * `RETURNING a, b`, or undefined for an empty column list.
 */
export function returningClause(columns: readonly string[]): string | undefined
{
	return columns.length > 0 ? `RETURNING ${columns.join(', ')}` : undefined;
}

/**
 * @throws ValidationError unless `table` is a non-empty string
 */
export function requireTable(statement: string, table: string | undefined): string
{
	if (!table)
	{
		logger.error('Statement has no table', { statement });
		throw new ValidationError(`${statement} requires a table`);
	}
	return table;
}

/**
 * @throws ValidationError unless `value` is a non-negative integer
 */
export function validateLimitOffset(clause: 'LIMIT' | 'OFFSET', value: number): number
{
	if (!Number.isInteger(value) || value < 0)
	{
		logger.error('Invalid LIMIT/OFFSET value detected', { clause, value });
		throw new ValidationError(`Invalid ${clause} value: ${value}`);
	}
	return value;
}
