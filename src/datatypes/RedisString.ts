import { DataType } from '../DataType';
import type { Storable } from '../DataType';
import type { StructureKind } from '../types';

/**
 * Handle to a plain Redis string holding one payload.
 */
export class RedisString extends DataType {
	readonly kind: StructureKind = 'string';

	/**
	 * @returns The decoded value, or `undefined` when the key is missing.
	 */
	async get(): Promise<Storable | undefined> {
		const payload = await this.redis.get(this.key);

		return payload === null
			? undefined
			: await this.decode(payload);
	}

	async set(value: Storable): Promise<void> {
		await this.redis.set(this.key, this.encode(value));
	}
}
