import { DataType } from '../DataType';
import { KeyError } from '../errors';
import type { Storable } from '../DataType';
import type { StructureKind } from '../types';

/**
 * Handle to a Redis set.
 *
 * Members are compared by payload, so two handles to the same key are the
 * same member and inline values compare by their JSON text.
 */
export class RedisSet extends DataType {
	readonly kind: StructureKind = 'set';

	async length(): Promise<number> {
		return await this.redis.scard(this.key);
	}

	/**
	 * @returns Whether the member was new.
	 */
	async add(value: Storable): Promise<boolean> {
		return (await this.redis.sadd(this.key, this.encode(value))) > 0;
	}

	/**
	 * @throws KeyError when `value` is not a member.
	 */
	async remove(value: Storable): Promise<void> {
		if ((await this.redis.srem(this.key, this.encode(value))) === 0) {
			throw new KeyError('Item not in set.');
		}
	}

	async discard(value: Storable): Promise<void> {
		await this.redis.srem(this.key, this.encode(value));
	}

	/**
	 * Removes and returns an arbitrary member.
	 *
	 * @throws KeyError when the set is empty.
	 */
	async pop(): Promise<Storable> {
		const payload = await this.redis.spop(this.key);

		if (payload === null) {
			throw new KeyError('Set is empty.');
		}
		return await this.decode(payload);
	}

	/**
	 * Removes every member without following references.
	 */
	async clear(): Promise<void> {
		await this.redis.del(this.key);
	}

	async has(value: Storable): Promise<boolean> {
		return await this.hasPayload(this.encode(value));
	}

	async members(): Promise<Storable[]> {
		const payloads = await this.redis.smembers(this.key);

		return await Promise.all(payloads.map((payload) => this.decode(payload)));
	}

	async union(other: RedisSet): Promise<RedisSet> {
		const result = this.spawn();

		await this.redis.sunionstore(result.key, this.key, other.key);
		return result;
	}

	async intersection(other: RedisSet): Promise<RedisSet> {
		const result = this.spawn();

		await this.redis.sinterstore(result.key, this.key, other.key);
		return result;
	}

	async difference(other: RedisSet): Promise<RedisSet> {
		const result = this.spawn();

		await this.redis.sdiffstore(result.key, this.key, other.key);
		return result;
	}

	async update(other: RedisSet): Promise<this> {
		await this.redis.sunionstore(this.key, this.key, other.key);
		return this;
	}

	async intersectionUpdate(other: RedisSet): Promise<this> {
		await this.redis.sinterstore(this.key, this.key, other.key);
		return this;
	}

	async differenceUpdate(other: RedisSet): Promise<this> {
		await this.redis.sdiffstore(this.key, this.key, other.key);
		return this;
	}

	/**
	 * Members in exactly one of the two sets, stored under a new key.
	 */
	async symmetricDifference(other: RedisSet): Promise<RedisSet> {
		const result = this.spawn();
		const payloads = [
			...(await this.exclusivePayloads(other)),
			...(await other.exclusivePayloads(this)),
		];

		if (payloads.length > 0) {
			await this.redis.sadd(result.key, ...payloads);
		}
		return result;
	}

	async symmetricDifferenceUpdate(other: RedisSet): Promise<this> {
		const incoming = await other.exclusivePayloads(this);
		const common: string[] = [];

		for (const payload of await this.payloads()) {
			if (await other.hasPayload(payload)) {
				common.push(payload);
			}
		}
		if (common.length > 0) {
			await this.redis.srem(this.key, ...common);
		}
		if (incoming.length > 0) {
			await this.redis.sadd(this.key, ...incoming);
		}
		return this;
	}

	async isSubset(other: RedisSet): Promise<boolean> {
		for (const payload of await this.payloads()) {
			if (!(await other.hasPayload(payload))) {
				return false;
			}
		}
		return true;
	}

	async isSuperset(other: RedisSet): Promise<boolean> {
		return await other.isSubset(this);
	}

	async *[Symbol.asyncIterator](): AsyncGenerator<Storable, void, undefined> {
		let cursor = '0';

		do {
			const [ next, payloads ] = await this.redis.sscan(this.key, cursor, 'COUNT', 100);

			cursor = next;

			for (const payload of payloads) {
				yield await this.decode(payload);
			}
		}
		while (cursor !== '0');
	}

	protected async payloads(): Promise<string[]> {
		return await this.redis.smembers(this.key);
	}

	protected async hasPayload(payload: string): Promise<boolean> {
		return (await this.redis.sismember(this.key, payload)) === 1;
	}

	protected async exclusivePayloads(other: RedisSet): Promise<string[]> {
		const exclusive: string[] = [];

		for (const payload of await this.payloads()) {
			if (!(await other.hasPayload(payload))) {
				exclusive.push(payload);
			}
		}
		return exclusive;
	}

	private spawn(): RedisSet {
		return new RedisSet(this.context, this.context.createKey());
	}
}
