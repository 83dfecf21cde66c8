import * as crypto from 'crypto';
import {
	isNumP,
	isStrFilled,
	strTrim,
} from 'full-utils';
import { Codec } from './Codec';
import {
	createClient,
	isTruthy,
	loadConfig,
} from './config';
import { RedisHash } from './datatypes/RedisHash';
import { RedisList } from './datatypes/RedisList';
import { RedisSet } from './datatypes/RedisSet';
import { RedisSortedSet } from './datatypes/RedisSortedSet';
import { RedisString } from './datatypes/RedisString';
import {
	ConnectionError,
	NotFoundError,
} from './errors';
import { HandleRegistry } from './HandleRegistry';
import {
	ScriptRunner,
	scriptRegistry,
} from './Script';
import type { RedisStructsConfig } from './config';
import type {
	DataType,
	HandleContext,
	Storable,
} from './DataType';
import type { ScriptRegistry } from './Script';
import type {
	IORedisLike,
	LogEvent,
	LogEventHandler,
} from './types';

export interface RedisStructsOptions {
	keyPrefix?: string;
	strictCheckConnection?: boolean;
	handles?: HandleRegistry;
	scripts?: ScriptRegistry;
	onLogEvent?: LogEventHandler;
}

/**
 * Entry point: wraps one client connection and hands out structure handles.
 *
 * @example
 * ```ts
 * const structs = RedisStructs.connect();
 * const profile = structs.hash();
 * const tags = structs.list();
 *
 * await tags.extend([ 'admin', 'beta' ]);
 * await profile.set('tags', tags);
 * await profile.delete(); // removes the list too
 * ```
 */
export class RedisStructs implements HandleContext {
	public readonly isStrictCheckConnection: boolean;
	public readonly keyPrefix?: string;
	public readonly handles: HandleRegistry;
	public readonly codec: Codec;
	public readonly runner: ScriptRunner;
	private readonly onLogEvent?: LogEventHandler;

	constructor(public readonly redis: IORedisLike, options: RedisStructsOptions = {}) {
		this.isStrictCheckConnection = options.strictCheckConnection ?? isTruthy(process.env.REDIS_STRICT_CHECK_CONNECTION);
		this.keyPrefix = options.keyPrefix;
		this.handles = options.handles ?? HandleRegistry.withDefaults();
		this.onLogEvent = options.onLogEvent;
		this.codec = new Codec(redis, (kind, key) => this.create(kind, key));
		this.runner = new ScriptRunner(redis, options.scripts ?? scriptRegistry, options.onLogEvent);

		if (this.keyPrefix !== undefined) {
			this.toKeyString(...this.fromKeyString(this.keyPrefix));
		}
	}

	static connect(config: RedisStructsConfig = loadConfig(), options: Omit<RedisStructsOptions, 'keyPrefix' | 'strictCheckConnection'> = {}): RedisStructs {
		return new RedisStructs(createClient(config), {
			...options,
			keyPrefix: config.keyPrefix,
			strictCheckConnection: config.strictCheckConnection,
		});
	}

	checkConnection(): boolean {
		return this.redis.status === 'ready'
			|| (this.isStrictCheckConnection
				? false
				: (this.redis.status === 'connecting' || this.redis.status === 'reconnecting'));
	}

	emit(event: LogEvent): void {
		this.onLogEvent?.(event);
	}

	toKeyString(...parts: Array<string | number>): string {
		for (const p of parts) {
			const s = strTrim(p);

			if (!isStrFilled(s) || s.includes(':') || /[\*\?\[\]\s]/.test(s)) {
				throw new Error(`Key segment is invalid (no ":", spaces or glob chars * ? [ ] allowed): "${s}"`);
			}
		}
		return parts.join(':');
	}

	fromKeyString(key: string): Array<string> {
		return key.split(':').filter(Boolean);
	}

	createKey(): string {
		const id = crypto.randomUUID();

		return this.keyPrefix
			? `${this.keyPrefix}:${id}`
			: id;
	}

	encode(value: Storable): string {
		return this.codec.encode(value);
	}

	async decode(payload: string): Promise<Storable> {
		return await this.codec.decode(payload);
	}

	create(kind: string, key: string = this.createKey()): DataType {
		const Handle = this.handles.resolve(kind);

		return new Handle(this, key);
	}

	string(key?: string): RedisString {
		return new RedisString(this, key ?? this.createKey());
	}

	list(key?: string): RedisList {
		return new RedisList(this, key ?? this.createKey());
	}

	hash(key?: string): RedisHash {
		return new RedisHash(this, key ?? this.createKey());
	}

	set(key?: string): RedisSet {
		return new RedisSet(this, key ?? this.createKey());
	}

	sortedSet(key?: string): RedisSortedSet {
		return new RedisSortedSet(this, key ?? this.createKey());
	}

	/**
	 * Binds a handle to an existing key, picking the class from `TYPE`.
	 */
	async attach(key: string): Promise<DataType> {
		if (!isStrFilled(key)) {
			throw new Error('Key format error.');
		}
		this.assertConnection();

		const kind = await this.redis.type(key);

		if (kind === 'none') {
			throw new NotFoundError(key);
		}
		return this.create(kind, key);
	}

	async keys(pattern: string, limit: number = 100, scanSize: number = 1000): Promise<string[]> {
		if (!isStrFilled(pattern)) {
			throw new Error('Pattern format error.');
		}
		if (!isNumP(limit)) {
			throw new Error('Limit format error.');
		}
		if (!isNumP(scanSize)) {
			throw new Error('Size format error.');
		}
		this.assertConnection();

		const keys: Set<string> = new Set();
		let cursor = '0';

		do {
			const [ nextCursor, found ] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', scanSize);

			cursor = nextCursor;

			for (const k of found) {
				if (!keys.has(k)) {
					keys.add(k);

					if (keys.size >= limit) {
						return Array.from(keys);
					}
				}
			}
		}
		while (cursor !== '0');
		return Array.from(keys);
	}

	async quit(): Promise<void> {
		if (this.redis.quit) {
			await this.redis.quit();
		}
	}

	private assertConnection(): void {
		if (!this.checkConnection()) {
			throw new ConnectionError('Redis connection error.');
		}
	}
}
