import { describe, it, expect } from 'vitest';
import { InsertBuilder } from './insertBuilder';
import { ValidationError } from '../errors';
import { PlaceholderKind } from '../placeholder';

describe('InsertBuilder', () =>
{
	it('should number every value of every row', () =>
	{
		const statement = new InsertBuilder(PlaceholderKind.DollarSequential)
			.table('users')
			.columns(['name', 'email'])
			.values(['Alice', 'alice@example.com'])
			.values(['Bob', 'bob@example.com'])
			.build();

		expect(statement.sql).toBe('INSERT INTO users(name, email) VALUES ($1, $2), ($3, $4)');
		expect(statement.values).toEqual(['Alice', 'alice@example.com', 'Bob', 'bob@example.com']);
	});

	it('should append RETURNING', () =>
	{
		const statement = new InsertBuilder(PlaceholderKind.QuestionMark)
			.table('users')
			.columns(['name', 'email'])
			.values(['Alice', 'alice@example.com'])
			.values(['Bob', 'bob@example.com'])
			.returning(['name', 'email'])
			.build();

		expect(statement.sql).toBe('INSERT INTO users(name, email) VALUES (?, ?), (?, ?) RETURNING name, email');
	});

	it('should bind arrays and objects as single values', () =>
	{
		const statement = new InsertBuilder(PlaceholderKind.DollarSequential)
			.table('products')
			.columns(['tags', 'attributes'])
			.values([['new', 'sale'], { color: 'red' }])
			.build();

		expect(statement.sql).toBe('INSERT INTO products(tags, attributes) VALUES ($1, $2)');
		expect(statement.values).toEqual([['new', 'sale'], { color: 'red' }]);
	});

	it('should reject a row that does not match the columns', () =>
	{
		const builder = new InsertBuilder().table('users').columns(['name', 'email']);

		expect(() => builder.values(['Alice'])).toThrow(ValidationError);
		expect(builder.getRows()).toEqual([]);
	});

	it('should reject rows left mismatched by a later columns() call', () =>
	{
		const builder = new InsertBuilder()
			.table('users')
			.columns(['name'])
			.values(['Alice'])
			.columns(['name', 'email']);

		expect(() => builder.build()).toThrow('mismatched number of columns (2) and values (1)');
	});

	it('should require columns and rows', () =>
	{
		expect(() => new InsertBuilder().table('users').build()).toThrow('INSERT requires at least one column');
		expect(() => new InsertBuilder().table('users').columns(['name']).build()).toThrow('INSERT requires at least one row of values');
	});

	it('should require a table', () =>
	{
		expect(() => new InsertBuilder().columns(['name']).values(['Alice']).build()).toThrow('INSERT requires a table');
	});
});
