/**
 * Placeholder notation and the substitution pass that turns the generic `?`
 * marker into the notation a driver expects.
 *
 * Builders always write the generic marker. Literal `?` characters that are
 * part of SQL text (the JSONB key operators) are written doubled, so `??` is
 * never a placeholder.
 *
 * @module placeholder
 */

import { ValidationError } from './errors';
import { getLogger } from './logger';

const logger = getLogger('Placeholder');

/**
 * Placeholder style of a built statement.
 */
export enum PlaceholderKind
{
	/** `?` for every value (MySQL, SQLite, ...) */
	QuestionMark = 'question_mark',
	/** `$1`, `$2`, ... (PostgreSQL) */
	DollarSequential = 'dollar_sequential'
}

export const GENERIC_MARKER = '?';

const NUMBERED_PLACEHOLDER = /\$\d/;

/**
 * Doubles every marker character in a piece of literal SQL text.
 */
export function escapeMarkerText(text: string): string
{
	return text.split(GENERIC_MARKER).join(GENERIC_MARKER + GENERIC_MARKER);
}

/**
 * Walks `text` left to right, calling `onMarker` for each placeholder and
 * `onLiteral` for each escaped `??` pair.
 */
function scan(text: string, onMarker: () => string, onLiteral: () => string): string
{
	let result = '';
	let i = 0;
	while (i < text.length)
	{
		const char = text[i];
		if (char !== GENERIC_MARKER)
		{
			result += char;
			i += 1;
			continue;
		}
		if (text[i + 1] === GENERIC_MARKER)
		{
			result += onLiteral();
			i += 2;
			continue;
		}
		result += onMarker();
		i += 1;
	}
	return result;
}

/**
 * Number of placeholders in `text`, escaped pairs excluded.
 */
export function countPlaceholders(text: string): number
{
	let count = 0;
	scan(text, () =>
	{
		count += 1;
		return GENERIC_MARKER;
	}, () => '');
	return count;
}

/**
 * Rewrites the generic markers of generic statement text. Used by the
 * statement assemblers, whose text is never numbered before this pass, so
 * a `$` followed by a digit in a name or literal is left alone.
 */
export function numberPlaceholders(text: string, kind: PlaceholderKind): string
{
	switch (kind)
	{
		case PlaceholderKind.QuestionMark:
			return text;
		case PlaceholderKind.DollarSequential:
		{
			let counter = 0;
			return scan(text, () =>
			{
				counter += 1;
				return `$${counter}`;
			}, () => GENERIC_MARKER);
		}
	}
}

/**
 * Rewrites the generic markers of a fully assembled statement.
 *
 * Must run once over the whole statement text: numbering restarts at `$1`
 * on every call, so running it per clause would break the alignment with the
 * value list. Caller-supplied text that already carries `$n` placeholders is
 * refused under sequential numbering.
 */
export function substitutePlaceholders(text: string, kind: PlaceholderKind): string
{
	if (kind === PlaceholderKind.DollarSequential && NUMBERED_PLACEHOLDER.test(text))
	{
		logger.error('Statement text already carries numbered placeholders', { text });
		throw new ValidationError('Statement text already carries numbered placeholders');
	}
	return numberPlaceholders(text, kind);
}
