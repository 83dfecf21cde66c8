import { DataType } from '../DataType';
import type { StructureKind } from '../types';

/**
 * Handle to a Redis sorted set.
 *
 * Members are written by other clients; this handle covers the key-level
 * operations inherited from {@link DataType} (cascading delete included).
 */
export class RedisSortedSet extends DataType {
	readonly kind: StructureKind = 'zset';

	async length(): Promise<number> {
		return await this.redis.zcard(this.key);
	}
}
