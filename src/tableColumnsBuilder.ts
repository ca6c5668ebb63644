import type { BuiltStatement } from './builtStatement';
import { assembleStatement } from './builtStatement';
import { ValidationError } from './errors';
import { getLogger } from './logger';
import { GENERIC_MARKER, PlaceholderKind } from './placeholder';

const logger = getLogger('TableColumnsBuilder');

/**
 * Row shape returned by the table columns query.
 */
export type TableColumnRow = {
	column_name: string;
	data_type: string;
};

export class TableColumnsBuilder
{
	/**
	 * Lists the columns of `table` with their data types from
	 * `information_schema.columns`. The table name is bound, not inlined.
	 * @throws ValidationError if `table` is empty
	 */
	static build(table: string, placeholder: PlaceholderKind = PlaceholderKind.QuestionMark): BuiltStatement
	{
		if (!table)
		{
			logger.error('Table name is empty');
			throw new ValidationError('table is empty');
		}

		return assembleStatement('SELECT', [
			'SELECT column_name, data_type FROM information_schema.columns',
			`WHERE table_name = ${GENERIC_MARKER}`
		], [table], placeholder);
	}
}
