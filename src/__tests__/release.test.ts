import { describe, it, expect } from 'vitest';
import * as sqlweave from '../index';

/**
 * Pre-release check of the public entry point.
 */
describe('Public API', () =>
{
	it('should export the statement builders', () =>
	{
		expect(typeof sqlweave.SelectBuilder).toBe('function');
		expect(typeof sqlweave.InsertBuilder).toBe('function');
		expect(typeof sqlweave.UpdateBuilder).toBe('function');
		expect(typeof sqlweave.DeleteBuilder).toBe('function');
		expect(typeof sqlweave.TableColumnsBuilder.build).toBe('function');
		expect(typeof sqlweave.StatementFactory).toBe('function');
	});

	it('should export the clause builders and helpers', () =>
	{
		expect(typeof sqlweave.ConditionBuilder.build).toBe('function');
		expect(typeof sqlweave.ExpressionBuilder.build).toBe('function');
		expect(typeof sqlweave.WhereBuilder.build).toBe('function');
		expect(typeof sqlweave.JoinBuilder.build).toBe('function');
		expect(typeof sqlweave.OrderByBuilder.build).toBe('function');
		expect(typeof sqlweave.GroupByBuilder.build).toBe('function');
		expect(typeof sqlweave.SetBuilder.build).toBe('function');
		expect(sqlweave.literal('x')).toEqual({ kind: 'literal', value: 'x' });
		expect(sqlweave.escapeMarkerText('a ? b')).toBe('a ?? b');
	});

	it('should export the enums with their SQL text', () =>
	{
		expect(sqlweave.Logic.Or).toBe('OR');
		expect(sqlweave.JoinKind.Full).toBe('FULL');
		expect(sqlweave.Sequence.Desc).toBe('DESC');
		expect(sqlweave.OPERATOR_SQL[sqlweave.Operator.NotNull]).toBe('IS NOT NULL');
		expect(Object.values(sqlweave.PlaceholderKind)).toEqual(['question_mark', 'dollar_sequential']);
	});

	it('should export the executor, errors and logger', () =>
	{
		expect(new sqlweave.PostgreSQLExecutor().isConnected()).toBe(false);
		expect(new sqlweave.ValidationError('x')).toBeInstanceOf(sqlweave.SqlweaveError);
		expect(sqlweave.globalLogger).toBeInstanceOf(sqlweave.Logger);
	});
});
