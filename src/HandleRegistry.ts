import { RedisHash } from './datatypes/RedisHash';
import { RedisList } from './datatypes/RedisList';
import { RedisSet } from './datatypes/RedisSet';
import { RedisSortedSet } from './datatypes/RedisSortedSet';
import { RedisString } from './datatypes/RedisString';
import { DataTypeError } from './errors';
import type {
	DataType,
	HandleContext,
} from './DataType';

export type HandleConstructor = new (context: HandleContext, key: string) => DataType;

/**
 * Maps a kind name, as reported by `TYPE`, to the handle class that wraps it.
 */
export class HandleRegistry {
	private readonly constructors: Map<string, HandleConstructor> = new Map();

	static withDefaults(): HandleRegistry {
		return new HandleRegistry()
			.register('string', RedisString)
			.register('list', RedisList)
			.register('hash', RedisHash)
			.register('set', RedisSet)
			.register('zset', RedisSortedSet);
	}

	register(kind: string, constructor: HandleConstructor): this {
		this.constructors.set(kind, constructor);
		return this;
	}

	has(kind: string): boolean {
		return this.constructors.has(kind);
	}

	resolve(kind: string): HandleConstructor {
		const constructor = this.constructors.get(kind);

		if (!constructor) {
			throw new DataTypeError(`Invalid data type "${kind}".`);
		}
		return constructor;
	}

	kinds(): string[] {
		return Array.from(this.constructors.keys());
	}
}
