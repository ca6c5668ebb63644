import { describe, it, expect, afterEach } from 'vitest';
import { StatementFactory } from './statementFactory';
import { ExpressionBuilder } from './expression';
import { literal } from './condition';
import { LogLevel, globalLogger } from './logger';
import { Operator } from './operator';
import { PlaceholderKind } from './placeholder';
import { setQuery } from './setBuilder';

describe('StatementFactory', () =>
{
	afterEach(() =>
	{
		globalLogger.configure({ level: LogLevel.INFO, console: true });
	});

	it('should default to postgres with numbered placeholders', () =>
	{
		const factory = new StatementFactory();

		expect(factory.getDialect()).toBe('postgres');
		expect(factory.getPlaceholderKind()).toBe(PlaceholderKind.DollarSequential);
		expect(factory.insert().table('users').columns(['name']).values(['Ada']).build().sql)
			.toBe('INSERT INTO users(name) VALUES ($1)');
	});

	it('should use question marks for mysql and sqlite', () =>
	{
		expect(new StatementFactory({ dialect: 'mysql' }).getPlaceholderKind()).toBe(PlaceholderKind.QuestionMark);
		expect(new StatementFactory({ dialect: 'sqlite' }).delete().table('users').filter([
			ExpressionBuilder.build([{ field: 'id', operator: Operator.Eq, value: literal(3) }])
		]).build().sql).toBe('DELETE FROM users WHERE id = ?');
	});

	it('should let an explicit placeholder override the dialect', () =>
	{
		const factory = new StatementFactory({ dialect: 'postgres', placeholder: PlaceholderKind.QuestionMark });

		expect(factory.select().table('users', 'u').build().placeholder).toBe(PlaceholderKind.QuestionMark);
	});

	it('should hand out question-mark sub-selects for nesting', () =>
	{
		const factory = new StatementFactory();
		const lookup = factory.subSelect()
			.table('users', 'u')
			.columns('u', ['id'])
			.filter([ExpressionBuilder.build([{ tableAlias: 'u', field: 'email', operator: Operator.Eq, value: literal('a@example.com') }])]);

		const statement = factory.update()
			.table('orders')
			.set([{ field: 'user_id', value: setQuery(lookup) }])
			.build();

		expect(statement.sql).toBe('UPDATE orders SET user_id = (SELECT u.id FROM users as u WHERE u.email = $1)');
	});

	it('should build the table columns query in its notation', () =>
	{
		expect(new StatementFactory().tableColumns('orders').sql)
			.toBe('SELECT column_name, data_type FROM information_schema.columns WHERE table_name = $1');
	});

	it('should apply logging settings to the global logger', () =>
	{
		new StatementFactory({ logging: { level: LogLevel.DEBUG } });

		expect(globalLogger.getLevel()).toBe(LogLevel.DEBUG);
	});
});
