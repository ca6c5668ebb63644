import { Pool, PoolConfig, QueryResultRow } from 'pg';
import type { BuiltStatement } from '../builtStatement';
import { ExecutorError, ValidationError } from '../errors';
import { getLogger } from '../logger';
import { PlaceholderKind } from '../placeholder';
import type { TableColumnRow } from '../tableColumnsBuilder';
import { TableColumnsBuilder } from '../tableColumnsBuilder';

/**
 * Result of an executed statement.
 */
export interface ExecutionResult<T>
{
	/** Rows returned by SELECT or RETURNING */
	rows: T[];

	/** Rows affected, when the server reports it */
	affectedRows?: number;
}

/**
 * Column description returned by {@link PostgreSQLExecutor.describeTable}.
 */
export interface ColumnInfo
{
	columnName: string;
	dataType: string;
}

/**
 * Pool options passed straight to `pg`.
 */
export type PostgreSQLExecutorOptions = PoolConfig;

/**
 * Runs built statements against PostgreSQL through a `pg` connection pool.
 * Statements are passed verbatim; nothing is rewritten here.
 */
export class PostgreSQLExecutor
{
	private pool?: Pool;

	private readonly logger = getLogger('PostgreSQLExecutor');

	constructor(private readonly options: PostgreSQLExecutorOptions = {})
	{
		this.logger.debug('PostgreSQLExecutor initialized', {
			host: options.host,
			database: options.database,
			max: options.max ?? 10
		});
	}

	/**
	 * Creates the connection pool. Connections are opened on first use.
	 */
	async connect(): Promise<void>
	{
		if (this.pool)
		{
			return;
		}
		this.logger.debug('Creating PostgreSQL connection pool', { max: this.options.max ?? 10 });
		this.pool = new Pool({ max: 10, ...this.options });
	}

	/**
	 * Closes every pooled connection.
	 */
	async disconnect(): Promise<void>
	{
		if (!this.pool)
		{
			return;
		}
		const pool = this.pool;
		this.pool = undefined;
		await pool.end();
		this.logger.debug('PostgreSQL connection pool closed');
	}

	isConnected(): boolean
	{
		return this.pool !== undefined;
	}

	/**
	 * Executes a built statement.
	 * @throws ValidationError if the statement binds values with question-mark placeholders
	 * @throws ExecutorError if not connected or the query fails
	 */
	async execute<T extends QueryResultRow = QueryResultRow>(statement: BuiltStatement): Promise<ExecutionResult<T>>
	{
		if (statement.placeholder !== PlaceholderKind.DollarSequential && statement.values.length > 0)
		{
			this.logger.error('PostgreSQL requires numbered placeholders', { placeholder: statement.placeholder });
			throw new ValidationError('PostgreSQL statements must be built with dollar-sequential placeholders');
		}

		const pool = this.requirePool();
		this.logger.debug('Executing statement', { sql: statement.sql, values: statement.values.length });

		try
		{
			const result = await pool.query<T>(statement.sql, [...statement.values]);
			return {
				rows: result.rows,
				affectedRows: result.rowCount ?? undefined
			};
		}
		catch (error)
		{
			this.logger.error('Statement execution failed', {
				sql: statement.sql,
				error: error instanceof Error ? error.message : String(error)
			});
			throw new ExecutorError('PostgreSQL statement execution failed', { cause: error });
		}
	}

	/**
	 * Lists the columns of `table` from `information_schema`.
	 */
	async describeTable(table: string): Promise<ColumnInfo[]>
	{
		const statement = TableColumnsBuilder.build(table, PlaceholderKind.DollarSequential);
		const result = await this.execute<TableColumnRow>(statement);
		return result.rows.map(row => ({ columnName: row.column_name, dataType: row.data_type }));
	}

	private requirePool(): Pool
	{
		if (!this.pool)
		{
			this.logger.error('Executor used before connect()');
			throw new ExecutorError('PostgreSQL executor is not connected');
		}
		return this.pool;
	}
}
