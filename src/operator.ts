import { escapeMarkerText } from './placeholder';

/**
 * Comparison operators a condition can apply.
 */
export enum Operator
{
	// Equality
	Eq = 'eq',
	Neq = 'neq',

	// Comparison
	Gt = 'gt',
	Gte = 'gte',
	Lt = 'lt',
	Lte = 'lte',

	// Pattern matching
	Like = 'like',
	NotLike = 'not_like',
	ILike = 'ilike',

	// List membership
	In = 'in',
	NotIn = 'not_in',

	// Null checks
	IsNull = 'is_null',
	NotNull = 'not_null',

	// Range
	Between = 'between',

	// JSONB
	JsonContains = 'json_contains',
	JsonContainedBy = 'json_contained_by',
	JsonHasKey = 'json_has_key',
	JsonHasAnyKeys = 'json_has_any_keys',
	JsonHasAllKeys = 'json_has_all_keys',
	JsonPathExists = 'json_path_exists',
	JsonPathMatch = 'json_path_match'
}

/**
 * Boolean connective placed in front of a condition or a grouped expression.
 */
export enum Logic
{
	And = 'AND',
	Or = 'OR'
}

/**
 * SQL symbol of each operator, as the database reads it.
 */
export const OPERATOR_SQL: Readonly<Record<Operator, string>> = {
	[Operator.Eq]: '=',
	[Operator.Neq]: '!=',
	[Operator.Gt]: '>',
	[Operator.Gte]: '>=',
	[Operator.Lt]: '<',
	[Operator.Lte]: '<=',
	[Operator.Like]: 'LIKE',
	[Operator.NotLike]: 'NOT LIKE',
	[Operator.ILike]: 'ILIKE',
	[Operator.In]: 'IN',
	[Operator.NotIn]: 'NOT IN',
	[Operator.IsNull]: 'IS NULL',
	[Operator.NotNull]: 'IS NOT NULL',
	[Operator.Between]: 'BETWEEN',
	[Operator.JsonContains]: '@>',
	[Operator.JsonContainedBy]: '<@',
	[Operator.JsonHasKey]: '?',
	[Operator.JsonHasAnyKeys]: '?|',
	[Operator.JsonHasAllKeys]: '?&',
	[Operator.JsonPathExists]: '@?',
	[Operator.JsonPathMatch]: '@@'
};

/**
 * True for the operators that take no right-hand side.
 */
export function isNullCheck(operator: Operator): boolean
{
	return operator === Operator.IsNull || operator === Operator.NotNull;
}

/**
 * Operator text as written into generic statement text, with marker
 * characters escaped.
 */
export function renderOperator(operator: Operator): string
{
	return escapeMarkerText(OPERATOR_SQL[operator]);
}
