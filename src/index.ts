/**
 * @file Main entry point of the sqlweave library.
 * It exports the statement builders, the clause builders they are made of,
 * the placeholder pass, and the PostgreSQL executor.
 */

// Values and conditions
export { literal, fieldRef, range, bindValue, bindValueRef, qualify, ConditionBuilder } from './condition';
export type { BindValue, JsonValue, ValueRef, Condition } from './condition';
export { Operator, Logic, OPERATOR_SQL } from './operator';
export { ExpressionBuilder } from './expression';
export type { Expression } from './expression';

// Clauses
export { WhereBuilder, groupExpressions } from './whereBuilder';
export type { GroupedClause } from './whereBuilder';
export { JoinBuilder, JoinKind } from './joinBuilder';
export { OrderByBuilder, Sequence } from './orderByBuilder';
export type { OrderByItem } from './orderByBuilder';
export { GroupByBuilder } from './groupByBuilder';
export type { GroupByItem } from './groupByBuilder';
export { SetBuilder, setValue, setQuery } from './setBuilder';
export type { SetValue, SetFieldUpdate } from './setBuilder';

// Statements
export { SelectBuilder } from './statements/selectBuilder';
export { InsertBuilder } from './statements/insertBuilder';
export { UpdateBuilder } from './statements/updateBuilder';
export { DeleteBuilder } from './statements/deleteBuilder';
export { TableColumnsBuilder } from './tableColumnsBuilder';
export type { TableColumnRow } from './tableColumnsBuilder';
export type { BuiltStatement } from './builtStatement';
export { PlaceholderKind, substitutePlaceholders, countPlaceholders, escapeMarkerText } from './placeholder';
export { StatementFactory } from './statementFactory';
export type { SqlweaveConfig, Dialect } from './statementFactory';

// Execution
export { PostgreSQLExecutor } from './executors/postgresExecutor';
export type { PostgreSQLExecutorOptions, ExecutionResult, ColumnInfo } from './executors/postgresExecutor';

// Errors and logging
export { SqlweaveError, ValidationError, ExecutorError } from './errors';
export { Logger, LogLevel, globalLogger, getLogger } from './logger';
export type { LoggerConfig, LogEntry, ContextLogger } from './logger';
