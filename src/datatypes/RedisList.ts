import { DataType } from '../DataType';
import {
	DecodingError,
	IndexError,
	isOutOfRangeError,
	isNoSuchKeyError,
} from '../errors';
import { ObservedValue } from '../Observable';
import {
	listContains,
	listCount,
	listInsert,
	listPop,
} from '../scripts/list';
import type { Storable } from '../DataType';
import type {
	Jsonish,
	StructureKind,
} from '../types';

/**
 * Handle to a Redis list.
 *
 * Index mutation and scans run as Lua scripts, so they stay atomic with
 * respect to other clients writing to the same list.
 */
export class RedisList extends DataType {
	readonly kind: StructureKind = 'list';

	async length(): Promise<number> {
		return await this.redis.llen(this.key);
	}

	async append(value: Storable): Promise<number> {
		return await this.redis.rpush(this.key, this.encode(value));
	}

	async extend(values: ReadonlyArray<Storable>): Promise<number> {
		if (values.length === 0) {
			return await this.length();
		}
		return await this.redis.rpush(this.key, ...values.map((value) => this.encode(value)));
	}

	async insert(index: number, value: Storable): Promise<number> {
		const length = await this.run(listInsert, [ this.key, toIndex(index), this.encode(value) ]);

		if (length === null) {
			throw new IndexError(index);
		}
		return length;
	}

	async index(index: number): Promise<Storable> {
		const payload = await this.redis.lindex(this.key, toIndex(index));

		if (payload === null) {
			throw new IndexError(index);
		}
		return await this.decode(payload);
	}

	async set(index: number, value: Storable): Promise<void> {
		try {
			await this.redis.lset(this.key, toIndex(index), this.encode(value));
		}
		catch (err) {
			if (isOutOfRangeError(err) || isNoSuchKeyError(err)) {
				throw new IndexError(index);
			}
			throw err;
		}
	}

	async pop(index: number = 0): Promise<Storable> {
		const payload = await this.run(listPop, [ this.key, toIndex(index) ]);

		if (payload === null) {
			throw new IndexError(index);
		}
		return await this.decode(payload);
	}

	/**
	 * Removes the element at `index` without decoding it.
	 */
	async removeAt(index: number): Promise<void> {
		const payload = await this.run(listPop, [ this.key, toIndex(index) ]);

		if (payload === null) {
			throw new IndexError(index);
		}
	}

	/**
	 * Removes the first occurrence of `value`.
	 *
	 * @returns Whether an element was removed.
	 */
	async remove(value: Storable): Promise<boolean> {
		return (await this.redis.lrem(this.key, 1, this.encode(value))) > 0;
	}

	async count(value: Storable): Promise<number> {
		return await this.run(listCount, [ this.key, this.encode(value) ]);
	}

	async contains(value: Storable): Promise<boolean> {
		return await this.run(listContains, [ this.key, this.encode(value) ]);
	}

	async toArray(): Promise<Storable[]> {
		const items: Storable[] = [];

		for await (const item of this) {
			items.push(item);
		}
		return items;
	}

	/**
	 * Reads the inline value at `index` and writes it back whenever the
	 * returned {@link ObservedValue} changes.
	 */
	async observe(index: number): Promise<ObservedValue<Jsonish>> {
		const value = await this.index(index);

		if (value instanceof DataType) {
			throw new DecodingError(`Element ${index} of list "${this.key}" is a reference and cannot be observed.`);
		}
		const observed = new ObservedValue<Jsonish>(value);

		observed.subscribe({
			onChange: async (next) => await this.set(index, next),
		});
		return observed;
	}

	async *[Symbol.asyncIterator](): AsyncGenerator<Storable, void, undefined> {
		let i = 0;
		let payload = await this.redis.lindex(this.key, i);

		while (payload !== null) {
			yield await this.decode(payload);

			i++;
			payload = await this.redis.lindex(this.key, i);
		}
	}
}

function toIndex(index: number): number {
	if (!Number.isInteger(index)) {
		throw new IndexError(index, `Index ${index} is not an integer.`);
	}
	return index;
}
