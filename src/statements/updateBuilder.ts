import type { BindValue } from '../condition';
import type { BuiltStatement } from '../builtStatement';
import { assembleStatement } from '../builtStatement';
import { ValidationError } from '../errors';
import type { Expression } from '../expression';
import { getLogger } from '../logger';
import { PlaceholderKind } from '../placeholder';
import type { SetFieldUpdate } from '../setBuilder';
import { SetBuilder } from '../setBuilder';
import type { GroupedClause } from '../whereBuilder';
import { WhereBuilder } from '../whereBuilder';
import { requireTable, returningClause, tableReference } from './common';

const logger = getLogger('UpdateBuilder');

interface UpdateState
{
	readonly placeholder: PlaceholderKind;
	readonly table?: string;
	readonly set?: GroupedClause;
	readonly filter?: GroupedClause;
	readonly returning?: string;
}

/**
 * Immutable UPDATE builder, written as `UPDATE table SET ... WHERE ... RETURNING ...`.
 */
export class UpdateBuilder
{
	private state: UpdateState;

	constructor(placeholder: PlaceholderKind = PlaceholderKind.QuestionMark)
	{
		this.state = { placeholder };
	}

	private derive(patch: Partial<UpdateState>): UpdateBuilder
	{
		const next = new UpdateBuilder(this.state.placeholder);
		next.state = { ...this.state, ...patch };
		return next;
	}

	getPlaceholderKind(): PlaceholderKind
	{
		return this.state.placeholder;
	}

	table(table: string, tableAlias?: string): UpdateBuilder
	{
		return this.derive({ table: tableReference(table, tableAlias) });
	}

	/**
	 * Sets the assignment list.
	 * @throws ValidationError when the builder already has one, or from {@link SetBuilder.build}
	 */
	set(items: readonly SetFieldUpdate[]): UpdateBuilder
	{
		if (this.state.set)
		{
			logger.error('SET assigned twice', { table: this.state.table });
			throw new ValidationError('`set()` can only be called once');
		}
		return this.derive({ set: SetBuilder.build(items) });
	}

	filter(expressions: readonly Expression[]): UpdateBuilder
	{
		if (expressions.length === 0)
		{
			return this;
		}
		return this.derive({ filter: WhereBuilder.build(expressions) });
	}

	returning(columns: readonly string[]): UpdateBuilder
	{
		if (columns.length === 0)
		{
			return this;
		}
		return this.derive({ returning: returningClause(columns) });
	}

	/**
	 * @throws ValidationError if no table or no assignments were given
	 */
	build(): BuiltStatement
	{
		const { state } = this;
		const table = requireTable('UPDATE', state.table);
		if (!state.set)
		{
			logger.error('UPDATE has no assignments', { table });
			throw new ValidationError('UPDATE requires a set clause');
		}

		const values: BindValue[] = [...state.set.values];
		if (state.filter)
		{
			values.push(...state.filter.values);
		}

		return assembleStatement('UPDATE', [
			`UPDATE ${table}`,
			state.set.text,
			state.filter?.text,
			state.returning
		], values, state.placeholder);
	}
}
