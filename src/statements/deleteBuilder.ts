import type { BuiltStatement } from '../builtStatement';
import { assembleStatement } from '../builtStatement';
import type { Expression } from '../expression';
import { PlaceholderKind } from '../placeholder';
import type { GroupedClause } from '../whereBuilder';
import { WhereBuilder } from '../whereBuilder';
import { requireTable, returningClause, tableReference } from './common';

interface DeleteState
{
	readonly placeholder: PlaceholderKind;
	readonly table?: string;
	readonly using?: string;
	readonly filter?: GroupedClause;
	readonly returning?: string;
}

/**
 * Immutable DELETE builder, written as
 * `DELETE FROM table USING other WHERE ... RETURNING ...`.
 */
export class DeleteBuilder
{
	private state: DeleteState;

	constructor(placeholder: PlaceholderKind = PlaceholderKind.QuestionMark)
	{
		this.state = { placeholder };
	}

	private derive(patch: Partial<DeleteState>): DeleteBuilder
	{
		const next = new DeleteBuilder(this.state.placeholder);
		next.state = { ...this.state, ...patch };
		return next;
	}

	getPlaceholderKind(): PlaceholderKind
	{
		return this.state.placeholder;
	}

	table(table: string, tableAlias?: string): DeleteBuilder
	{
		return this.derive({ table: tableReference(table, tableAlias) });
	}

	using(table: string, tableAlias?: string): DeleteBuilder
	{
		return this.derive({ using: `USING ${tableReference(table, tableAlias)}` });
	}

	filter(expressions: readonly Expression[]): DeleteBuilder
	{
		if (expressions.length === 0)
		{
			return this;
		}
		return this.derive({ filter: WhereBuilder.build(expressions) });
	}

	returning(columns: readonly string[]): DeleteBuilder
	{
		if (columns.length === 0)
		{
			return this;
		}
		return this.derive({ returning: returningClause(columns) });
	}

	/**
	 * @throws ValidationError if no table was set
	 */
	build(): BuiltStatement
	{
		const { state } = this;
		const table = requireTable('DELETE', state.table);

		return assembleStatement('DELETE', [
			`DELETE FROM ${table}`,
			state.using,
			state.filter?.text,
			state.returning
		], state.filter?.values ?? [], state.placeholder);
	}
}
