/**
 * @file Configuration entry point: hands out statement builders preset with
 * the placeholder notation of the target database.
 */
import type { BuiltStatement } from './builtStatement';
import type { LoggerConfig } from './logger';
import { getLogger, globalLogger } from './logger';
import { PlaceholderKind } from './placeholder';
import { DeleteBuilder } from './statements/deleteBuilder';
import { InsertBuilder } from './statements/insertBuilder';
import { SelectBuilder } from './statements/selectBuilder';
import { UpdateBuilder } from './statements/updateBuilder';
import { TableColumnsBuilder } from './tableColumnsBuilder';

/**
 * Database the statements are written for.
 */
export type Dialect = 'postgres' | 'mysql' | 'sqlite';

/**
 * Factory configuration.
 */
export interface SqlweaveConfig
{
	/** Target database (default: 'postgres') */
	dialect?: Dialect;
	/** Overrides the dialect's notation */
	placeholder?: PlaceholderKind;
	/** Applied to the global logger */
	logging?: LoggerConfig;
}

const DIALECT_PLACEHOLDERS: Readonly<Record<Dialect, PlaceholderKind>> = {
	postgres: PlaceholderKind.DollarSequential,
	mysql: PlaceholderKind.QuestionMark,
	sqlite: PlaceholderKind.QuestionMark
};

/**
 * Creates statement builders that share one placeholder notation.
 *
 * @example
 * const sql = new StatementFactory({ dialect: 'postgres' });
 * const statement = sql.insert().table('users').columns(['name']).values(['Ada']).build();
 * // statement.sql === 'INSERT INTO users(name) VALUES ($1)'
 */
export class StatementFactory
{
	private readonly logger = getLogger('StatementFactory');
	private readonly dialect: Dialect;
	private readonly placeholder: PlaceholderKind;

	constructor(config: SqlweaveConfig = {})
	{
		if (config.logging)
		{
			globalLogger.configure(config.logging);
		}
		this.dialect = config.dialect ?? 'postgres';
		this.placeholder = config.placeholder ?? DIALECT_PLACEHOLDERS[this.dialect];
		this.logger.debug('StatementFactory initialized', { dialect: this.dialect, placeholder: this.placeholder });
	}

	getDialect(): Dialect
	{
		return this.dialect;
	}

	getPlaceholderKind(): PlaceholderKind
	{
		return this.placeholder;
	}

	select(): SelectBuilder
	{
		return new SelectBuilder(this.placeholder);
	}

	/**
	 * A select to nest inside another statement. Always question-mark, so
	 * the outer statement numbers its placeholders.
	 */
	subSelect(): SelectBuilder
	{
		return new SelectBuilder(PlaceholderKind.QuestionMark);
	}

	insert(): InsertBuilder
	{
		return new InsertBuilder(this.placeholder);
	}

	update(): UpdateBuilder
	{
		return new UpdateBuilder(this.placeholder);
	}

	delete(): DeleteBuilder
	{
		return new DeleteBuilder(this.placeholder);
	}

	tableColumns(table: string): BuiltStatement
	{
		return TableColumnsBuilder.build(table, this.placeholder);
	}
}
