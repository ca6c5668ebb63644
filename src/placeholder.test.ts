import { describe, it, expect } from 'vitest';
import { PlaceholderKind, countPlaceholders, escapeMarkerText, numberPlaceholders, substitutePlaceholders } from './placeholder';
import { ValidationError } from './errors';

describe('Placeholder substitution', () =>
{
	describe('escapeMarkerText', () =>
	{
		it('should double every marker character', () =>
		{
			expect(escapeMarkerText('?')).toBe('??');
			expect(escapeMarkerText('?|')).toBe('??|');
			expect(escapeMarkerText('@?')).toBe('@??');
		});

		it('should leave text without markers unchanged', () =>
		{
			expect(escapeMarkerText('>=')).toBe('>=');
		});
	});

	describe('countPlaceholders', () =>
	{
		it('should count plain and parenthesised markers', () =>
		{
			expect(countPlaceholders('a = ? AND b IN (?) AND c BETWEEN ? AND ?')).toBe(4);
		});

		it('should skip escaped pairs', () =>
		{
			expect(countPlaceholders('data ?? ? AND tags ??| (?)')).toBe(2);
		});

		it('should return 0 for text without markers', () =>
		{
			expect(countPlaceholders('SELECT * FROM users')).toBe(0);
		});
	});

	describe('QuestionMark', () =>
	{
		it('should return the text unchanged', () =>
		{
			const text = 'WHERE t.email = ? AND t.data ?? ?';
			expect(substitutePlaceholders(text, PlaceholderKind.QuestionMark)).toBe(text);
		});
	});

	describe('DollarSequential', () =>
	{
		it('should number markers from 1 in text order', () =>
		{
			expect(substitutePlaceholders('WHERE a = ? AND b IN (?) AND c = ?', PlaceholderKind.DollarSequential))
				.toBe('WHERE a = $1 AND b IN ($2) AND c = $3');
		});

		it('should write escaped pairs back as a single literal marker', () =>
		{
			expect(substitutePlaceholders('WHERE data ?? ? AND tags ??| (?) AND keys ??& (?)', PlaceholderKind.DollarSequential))
				.toBe('WHERE data ? $1 AND tags ?| ($2) AND keys ?& ($3)');
		});

		it('should leave text without markers unchanged', () =>
		{
			expect(substitutePlaceholders('SELECT t.* FROM users as t', PlaceholderKind.DollarSequential))
				.toBe('SELECT t.* FROM users as t');
		});

		it('should refuse text that is already numbered', () =>
		{
			const once = substitutePlaceholders('a = ? AND b = ?', PlaceholderKind.DollarSequential);
			expect(once).toBe('a = $1 AND b = $2');
			expect(() => substitutePlaceholders(once, PlaceholderKind.DollarSequential)).toThrow(ValidationError);
		});

		it('should number assembled text that holds $ and a digit in a name', () =>
		{
			expect(numberPlaceholders("SELECT l.amount$1, '$5 off' FROM ledger as l WHERE l.id = ?", PlaceholderKind.DollarSequential))
				.toBe("SELECT l.amount$1, '$5 off' FROM ledger as l WHERE l.id = $1");
		});
	});
});
