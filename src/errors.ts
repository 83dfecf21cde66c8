/**
 * Error classes raised by handles, the codec and the script runner.
 *
 * Every class extends {@link StructError} so callers can catch the whole
 * family at once, or branch on the concrete class.
 */

export class StructError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class ConfigError extends StructError {}

export class ConnectionError extends StructError {}

export class EncodingError extends StructError {}

export class DecodingError extends StructError {}

export class DataTypeError extends StructError {}

/**
 * List index outside the current bounds.
 */
export class IndexError extends StructError {
	constructor(public readonly index: number, message: string = `Index ${index} out of range.`) {
		super(message);
	}
}

/**
 * Missing hash field or set member where the operation requires one.
 */
export class KeyError extends StructError {}

/**
 * Key that no longer exists in the store.
 */
export class NotFoundError extends StructError {
	constructor(public readonly key: string, message: string = `Key "${key}" does not exist.`) {
		super(message);
	}
}

export class ScriptArgumentError extends StructError {
	constructor(public readonly scriptId: string, public readonly parameter: string) {
		super(`Invalid arguments for script "${scriptId}": missing "${parameter}".`);
	}
}

export class ScriptExecutionError extends StructError {
	constructor(public readonly scriptId: string, public readonly scope: string, message: string, options?: ErrorOptions) {
		super(`Script "${scope}:${scriptId}" failed: ${message}`, options);
	}
}

/**
 * Message of an error value, whatever was thrown.
 */
export function errorMessage(err: unknown): string {
	return err instanceof Error
		? err.message
		: String(err);
}

export function isNoScriptError(err: unknown): boolean {
	return errorMessage(err).startsWith('NOSCRIPT');
}

export function isNoSuchKeyError(err: unknown): boolean {
	return errorMessage(err).includes('no such key');
}

export function isOutOfRangeError(err: unknown): boolean {
	return errorMessage(err).includes('index out of range');
}
