/**
 * @file Error types raised by the statement builders and the executor.
 */

/**
 * Base class of every error this library throws.
 */
export class SqlweaveError extends Error
{
	override readonly name: string = 'SqlweaveError';

	constructor(message: string, options?: { cause?: unknown })
	{
		super(message, options);
		// Restore prototype chain for instanceof checks
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/**
 * Raised when a builder receives input it cannot render, or when a built
 * statement would not line up its markers with its bound values.
 */
export class ValidationError extends SqlweaveError
{
	override readonly name: string = 'ValidationError';
}

/**
 * Raised by an executor that is not connected or whose driver call failed.
 */
export class ExecutorError extends SqlweaveError
{
	override readonly name: string = 'ExecutorError';
}
