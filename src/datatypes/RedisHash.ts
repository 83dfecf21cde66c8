import { DataType } from '../DataType';
import {
	DecodingError,
	KeyError,
} from '../errors';
import { ObservedValue } from '../Observable';
import {
	hashPop,
	hashSetDefault,
} from '../scripts/hash';
import type { Storable } from '../DataType';
import type {
	Jsonish,
	StructureKind,
} from '../types';

/**
 * Handle to a Redis hash. Field names are plain strings; values go through
 * the codec.
 */
export class RedisHash extends DataType {
	readonly kind: StructureKind = 'hash';

	async length(): Promise<number> {
		return await this.redis.hlen(this.key);
	}

	get(field: string): Promise<Storable | undefined>;
	get(field: string, fallback: Storable): Promise<Storable>;
	async get(field: string, fallback?: Storable): Promise<Storable | undefined> {
		const payload = await this.redis.hget(this.key, field);

		return payload === null
			? fallback
			: await this.decode(payload);
	}

	async set(field: string, value: Storable): Promise<void> {
		await this.redis.hset(this.key, field, this.encode(value));
	}

	async update(values: Readonly<Record<string, Storable>>): Promise<void> {
		const fieldValues: string[] = [];

		for (const [ field, value ] of Object.entries(values)) {
			fieldValues.push(field, this.encode(value));
		}
		if (fieldValues.length > 0) {
			await this.redis.hset(this.key, ...fieldValues);
		}
	}

	/**
	 * Stores `fallback` under `field` unless the field exists, then returns
	 * the field's current value. Both steps run in one script.
	 */
	async setDefault(field: string, fallback: Storable): Promise<Storable> {
		const payload = await this.run(hashSetDefault, [ this.key, field, this.encode(fallback) ]);

		if (payload === null) {
			throw new KeyError(`Field "${field}" vanished from hash "${this.key}".`);
		}
		return await this.decode(payload);
	}

	/**
	 * Removes one field. The value is not followed, even when it is a
	 * reference; use {@link DataType.delete} on the value for that.
	 *
	 * @returns Whether the field existed.
	 */
	async deleteField(field: string): Promise<boolean> {
		return (await this.redis.hdel(this.key, field)) > 0;
	}

	/**
	 * Removes every field. Referenced structures are kept.
	 */
	async clear(): Promise<void> {
		await this.redis.del(this.key);
	}

	async has(field: string): Promise<boolean> {
		return (await this.redis.hexists(this.key, field)) === 1;
	}

	async keys(): Promise<string[]> {
		return await this.redis.hkeys(this.key);
	}

	async values(): Promise<Storable[]> {
		const payloads = await this.redis.hvals(this.key);

		return await Promise.all(payloads.map((payload) => this.decode(payload)));
	}

	async entries(): Promise<Array<[string, Storable]>> {
		const record = await this.redis.hgetall(this.key);
		const entries: Array<[string, Storable]> = [];

		for (const [ field, payload ] of Object.entries(record)) {
			entries.push([ field, await this.decode(payload) ]);
		}
		return entries;
	}

	/**
	 * Removes `field` and returns its value atomically.
	 *
	 * @throws KeyError when the field is absent and no fallback was given.
	 */
	async pop(field: string, ...fallback: [] | [Storable]): Promise<Storable> {
		const payload = await this.run(hashPop, [ this.key, field ]);

		if (payload !== null) {
			return await this.decode(payload);
		}
		if (fallback.length === 1) {
			return fallback[0];
		}
		throw new KeyError(`Invalid key "${field}".`);
	}

	async observe(field: string): Promise<ObservedValue<Jsonish>> {
		const payload = await this.redis.hget(this.key, field);

		if (payload === null) {
			throw new KeyError(`Invalid key "${field}".`);
		}
		const value = await this.decode(payload);

		if (value instanceof DataType) {
			throw new DecodingError(`Field "${field}" of hash "${this.key}" is a reference and cannot be observed.`);
		}
		const observed = new ObservedValue<Jsonish>(value);

		observed.subscribe({
			onChange: async (next) => await this.set(field, next),
		});
		return observed;
	}

	async *[Symbol.asyncIterator](): AsyncGenerator<[string, Storable], void, undefined> {
		let cursor = '0';

		do {
			const [ next, flat ] = await this.redis.hscan(this.key, cursor, 'COUNT', 100);

			cursor = next;

			for (let i = 0; i + 1 < flat.length; i += 2) {
				yield [ flat[i], await this.decode(flat[i + 1]) ];
			}
		}
		while (cursor !== '0');
	}
}
