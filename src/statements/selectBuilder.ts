import type { BindValue } from '../condition';
import type { BuiltStatement } from '../builtStatement';
import { assembleStatement } from '../builtStatement';
import type { Expression } from '../expression';
import type { GroupByItem } from '../groupByBuilder';
import { GroupByBuilder } from '../groupByBuilder';
import { JoinBuilder, JoinKind } from '../joinBuilder';
import type { OrderByItem } from '../orderByBuilder';
import { OrderByBuilder } from '../orderByBuilder';
import { PlaceholderKind, escapeMarkerText } from '../placeholder';
import type { GroupedClause } from '../whereBuilder';
import { WhereBuilder } from '../whereBuilder';
import { requireTable, tableReference, validateLimitOffset } from './common';

interface SelectState
{
	readonly placeholder: PlaceholderKind;
	readonly distinct: boolean;
	readonly table?: string;
	readonly fields: readonly string[];
	readonly joins: readonly GroupedClause[];
	readonly filter?: GroupedClause;
	readonly groupBy?: string;
	readonly orderBy?: string;
	readonly limit?: number;
	readonly offset?: number;
}

/**
 * Immutable SELECT builder. Every method returns a new builder, so one
 * builder can be branched into several statements without them sharing
 * clauses.
 *
 * Clauses are written as
 * `SELECT [DISTINCT] columns FROM table joins WHERE GROUP BY ORDER BY LIMIT OFFSET`
 * whatever order the methods were called in, and bound values follow the same order.
 *
 * @example
 * const statement = new SelectBuilder(PlaceholderKind.DollarSequential)
 *   .table('orders', 'o')
 *   .columns('o', ['id', 'user_id'])
 *   .filter([ExpressionBuilder.build([{ tableAlias: 'o', field: 'id', operator: Operator.Eq, value: literal(1) }])])
 *   .build();
 * // statement.sql === 'SELECT o.id, o.user_id FROM orders as o WHERE o.id = $1'
 */
export class SelectBuilder
{
	private state: SelectState;

	constructor(placeholder: PlaceholderKind = PlaceholderKind.QuestionMark)
	{
		this.state = { placeholder, distinct: false, fields: [], joins: [] };
	}

	private derive(patch: Partial<SelectState>): SelectBuilder
	{
		const next = new SelectBuilder(this.state.placeholder);
		next.state = { ...this.state, ...patch };
		return next;
	}

	getPlaceholderKind(): PlaceholderKind
	{
		return this.state.placeholder;
	}

	distinct(): SelectBuilder
	{
		return this.derive({ distinct: true });
	}

	table(table: string, tableAlias?: string): SelectBuilder
	{
		return this.derive({ table: tableReference(table, tableAlias) });
	}

	/**
	 * Adds `alias.column` for each name, or `alias.*` when `names` is empty.
	 */
	columns(tableAlias: string, names: readonly string[]): SelectBuilder
	{
		const added = names.length === 0
			? [`${tableAlias}.*`]
			: names.map(name => `${tableAlias}.${name}`);
		return this.derive({ fields: [...this.state.fields, ...added] });
	}

	/**
	 * Adds raw column expressions such as `CONCAT(first_name, ' ', last_name) as full_name`,
	 * or `*` when `expressions` is empty. Raw columns bind no values, so every
	 * `?` in them is literal SQL (`d.body ? 'title'`) and is escaped here.
	 */
	columnsRaw(expressions: readonly string[]): SelectBuilder
	{
		const added = expressions.length === 0 ? ['*'] : expressions.map(escapeMarkerText);
		return this.derive({ fields: [...this.state.fields, ...added] });
	}

	/**
	 * Appends a join. A non-cross join with no expressions is ignored.
	 */
	join(kind: JoinKind, table: string, tableAlias: string, expressions: readonly Expression[]): SelectBuilder
	{
		if (expressions.length === 0 && kind !== JoinKind.Cross)
		{
			return this;
		}
		const join = JoinBuilder.build(kind, table, tableAlias, expressions);
		return this.derive({ joins: [...this.state.joins, join] });
	}

	/**
	 * Sets the WHERE clause, replacing an earlier one. Empty input is ignored.
	 */
	filter(expressions: readonly Expression[]): SelectBuilder
	{
		if (expressions.length === 0)
		{
			return this;
		}
		return this.derive({ filter: WhereBuilder.build(expressions) });
	}

	orderBy(items: readonly OrderByItem[]): SelectBuilder
	{
		if (items.length === 0)
		{
			return this;
		}
		return this.derive({ orderBy: OrderByBuilder.build(items) });
	}

	groupBy(items: readonly GroupByItem[]): SelectBuilder
	{
		if (items.length === 0)
		{
			return this;
		}
		return this.derive({ groupBy: GroupByBuilder.build(items) });
	}

	limit(value: number): SelectBuilder
	{
		return this.derive({ limit: validateLimitOffset('LIMIT', value) });
	}

	offset(value: number): SelectBuilder
	{
		return this.derive({ offset: validateLimitOffset('OFFSET', value) });
	}

	/**
	 * Renders the statement. Selects every column when none were added.
	 * @throws ValidationError if no table was set
	 */
	build(): BuiltStatement
	{
		const { state } = this;
		const table = requireTable('SELECT', state.table);
		const fields = state.fields.length > 0 ? state.fields.join(', ') : '*';
		const head = `SELECT${state.distinct ? ' DISTINCT' : ''} ${fields} FROM ${table}`;

		const values: BindValue[] = [];
		for (const join of state.joins)
		{
			values.push(...join.values);
		}
		if (state.filter)
		{
			values.push(...state.filter.values);
		}

		return assembleStatement('SELECT', [
			head,
			...state.joins.map(join => join.text),
			state.filter?.text,
			state.groupBy,
			state.orderBy,
			state.limit !== undefined ? `LIMIT ${state.limit}` : undefined,
			state.offset !== undefined ? `OFFSET ${state.offset}` : undefined
		], values, state.placeholder);
	}
}
