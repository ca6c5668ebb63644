import type { BindValue } from '../condition';
import type { BuiltStatement } from '../builtStatement';
import { assembleStatement } from '../builtStatement';
import { ValidationError } from '../errors';
import { getLogger } from '../logger';
import { GENERIC_MARKER, PlaceholderKind } from '../placeholder';
import { requireTable, returningClause } from './common';

const logger = getLogger('InsertBuilder');

interface InsertState
{
	readonly placeholder: PlaceholderKind;
	readonly table?: string;
	readonly columns: readonly string[];
	readonly rows: readonly (readonly BindValue[])[];
	readonly returning?: string;
}

/**
 * Immutable multi-row INSERT builder, written as
 * `INSERT INTO table(a, b) VALUES (?, ?), (?, ?) RETURNING ...`.
 * Each value binds to its own placeholder, arrays included.
 */
export class InsertBuilder
{
	private state: InsertState;

	constructor(placeholder: PlaceholderKind = PlaceholderKind.QuestionMark)
	{
		this.state = { placeholder, columns: [], rows: [] };
	}

	private derive(patch: Partial<InsertState>): InsertBuilder
	{
		const next = new InsertBuilder(this.state.placeholder);
		next.state = { ...this.state, ...patch };
		return next;
	}

	getPlaceholderKind(): PlaceholderKind
	{
		return this.state.placeholder;
	}

	table(table: string): InsertBuilder
	{
		return this.derive({ table });
	}

	columns(columns: readonly string[]): InsertBuilder
	{
		return this.derive({ columns: [...columns] });
	}

	/**
	 * Appends one row.
	 * @throws ValidationError if the row length differs from the column count
	 */
	values(row: readonly BindValue[]): InsertBuilder
	{
		this.checkRow(row);
		return this.derive({ rows: [...this.state.rows, [...row]] });
	}

	returning(columns: readonly string[]): InsertBuilder
	{
		if (columns.length === 0)
		{
			return this;
		}
		return this.derive({ returning: returningClause(columns) });
	}

	/**
	 * Bound rows in insertion order.
	 */
	getRows(): readonly (readonly BindValue[])[]
	{
		return this.state.rows;
	}

	/**
	 * @throws ValidationError if the table, columns or rows are missing, or a
	 * row no longer matches the column count
	 */
	build(): BuiltStatement
	{
		const { state } = this;
		const table = requireTable('INSERT', state.table);
		if (state.columns.length === 0)
		{
			logger.error('INSERT has no columns', { table });
			throw new ValidationError('INSERT requires at least one column');
		}
		if (state.rows.length === 0)
		{
			logger.error('INSERT has no rows', { table });
			throw new ValidationError('INSERT requires at least one row of values');
		}
		state.rows.forEach(row => this.checkRow(row));

		const values: BindValue[] = [];
		for (const row of state.rows)
		{
			values.push(...row);
		}
		const tuples = state.rows
			.map(row => `(${row.map(() => GENERIC_MARKER).join(', ')})`)
			.join(', ');

		return assembleStatement('INSERT', [
			`INSERT INTO ${table}(${state.columns.join(', ')}) VALUES ${tuples}`,
			state.returning
		], values, state.placeholder);
	}

	private checkRow(row: readonly BindValue[]): void
	{
		if (row.length !== this.state.columns.length)
		{
			logger.error('Mismatched number of columns and values', { columns: this.state.columns.length, values: row.length });
			throw new ValidationError(`mismatched number of columns (${this.state.columns.length}) and values (${row.length})`);
		}
	}
}
