/**
 * BuiltStatement - the output of a statement builder
 *
 * Holds the final SQL text in the requested placeholder notation and the
 * values to bind, in the order their placeholders appear. It can be passed
 * as-is to a driver's parameterized query call.
 *
 * @module builtStatement
 */

import type { BindValue } from './condition';
import { ValidationError } from './errors';
import { getLogger } from './logger';
import { PlaceholderKind, countPlaceholders, numberPlaceholders } from './placeholder';

const logger = getLogger('Statement');

export interface BuiltStatement
{
	/** SQL text with placeholders in `placeholder` notation */
	readonly sql: string;

	/** Values to bind, in placeholder order */
	readonly values: readonly BindValue[];

	/** Notation used in `sql` */
	readonly placeholder: PlaceholderKind;
}

/**
 * Joins clause fragments in the given order, checks that the generic text
 * carries exactly one marker per value, then runs the substitution pass
 * over the whole text.
 *
 * @param statement Statement kind, for log and error messages
 * @param clauses Clause fragments in canonical order; empty entries are skipped
 * @param values Bound values of those clauses, in the same order
 * @param placeholder Target notation
 * @throws ValidationError if the marker count differs from the number of values
 */
export function assembleStatement(
	statement: string,
	clauses: readonly (string | undefined)[],
	values: readonly BindValue[],
	placeholder: PlaceholderKind
): BuiltStatement
{
	const text = clauses
		.filter((clause): clause is string => Boolean(clause))
		.join(' ')
		.trim();

	const markers = countPlaceholders(text);
	if (markers !== values.length)
	{
		logger.error('Placeholder count does not match bound values', { statement, markers, values: values.length });
		throw new ValidationError(`${statement} has ${markers} placeholders but ${values.length} bound values`);
	}

	const sql = numberPlaceholders(text, placeholder);
	logger.debug('Statement built', { statement, placeholder, values: values.length });

	return Object.freeze({
		sql,
		values: Object.freeze([...values]),
		placeholder
	});
}
