import { DataType } from './DataType';
import {
	DataTypeError,
	DecodingError,
	EncodingError,
	errorMessage,
} from './errors';
import {
	INLINE_PREFIX,
	REFERENCE_PREFIX,
} from './types';
import type { Storable } from './DataType';
import type {
	IORedisLike,
	Jsonish,
} from './types';

const REFERENCE_TAG = `${REFERENCE_PREFIX}:`;
const INLINE_TAG = `${INLINE_PREFIX}:`;

// JSON has no NaN or Infinity; stringify would turn them into null.
function rejectNonFinite(key: string, item: unknown): unknown {
	if (typeof item === 'number' && !Number.isFinite(item)) {
		throw new EncodingError(`Failed to encode value: ${item} is not a finite number.`);
	}
	return item;
}

/**
 * Builds a bound handle for a key whose kind the store reported.
 */
export type HandleResolver = (kind: string, key: string) => DataType;

/**
 * Converts values to and from the single string payload stored per slot.
 *
 * A handle becomes `redis:struct:<key>`; anything else becomes
 * `redis:abs:<json>`. Inline payloads decode without touching the store, a
 * reference payload costs one `TYPE` call.
 */
export class Codec {
	static readonly referenceTag = REFERENCE_TAG;
	static readonly inlineTag = INLINE_TAG;

	constructor(
		private readonly redis: IORedisLike,
		private readonly resolve: HandleResolver,
	) {
	}

	isReference(payload: string): boolean {
		return payload.startsWith(REFERENCE_TAG);
	}

	isInline(payload: string): boolean {
		return payload.startsWith(INLINE_TAG);
	}

	encode(value: Storable): string {
		if (value instanceof DataType) {
			return `${REFERENCE_TAG}${value.key}`;
		}
		let json: string | undefined;

		try {
			json = JSON.stringify(value, rejectNonFinite);
		}
		catch (err) {
			if (err instanceof EncodingError) {
				throw err;
			}
			throw new EncodingError(`Failed to encode value: ${errorMessage(err)}`, { cause: err });
		}
		if (json === undefined) {
			throw new EncodingError(`Failed to encode value of type ${typeof value}.`);
		}
		return `${INLINE_TAG}${json}`;
	}

	async decode(payload: string): Promise<Storable> {
		if (this.isReference(payload)) {
			return await this.decodeReference(payload.slice(REFERENCE_TAG.length));
		}
		if (this.isInline(payload)) {
			return this.decodeInline(payload.slice(INLINE_TAG.length));
		}
		throw new DecodingError('Failed to decode value. Unknown payload prefix.');
	}

	private async decodeReference(key: string): Promise<DataType> {
		if (key.length === 0) {
			throw new DecodingError('Failed to decode value. Reference has no key.');
		}
		const kind = await this.redis.type(key);

		if (kind === 'none') {
			throw new DecodingError(`Failed to decode value. Key "${key}" does not exist.`);
		}
		try {
			return this.resolve(kind, key);
		}
		catch (err) {
			if (err instanceof DataTypeError) {
				throw new DecodingError(`Failed to decode value. Key "${key}" holds unsupported type "${kind}".`, { cause: err });
			}
			throw err;
		}
	}

	private decodeInline(json: string): Jsonish {
		try {
			const value: Jsonish = JSON.parse(json);

			return value;
		}
		catch (err) {
			throw new DecodingError(`Failed to decode value: ${errorMessage(err)}`, { cause: err });
		}
	}
}
