import { isNumP } from 'full-utils';
import {
	ConnectionError,
	NotFoundError,
	isNoSuchKeyError,
} from './errors';
import { deleteAll } from './scripts/shared';
import { REFERENCE_PREFIX } from './types';
import type { Codec } from './Codec';
import type {
	ScriptDefinition,
	ScriptRunner,
} from './Script';
import type {
	IORedisLike,
	Jsonish,
	LogEvent,
	ScriptValue,
	StructureKind,
} from './types';

/**
 * Anything that can occupy a slot: an inline JSON value or a handle to
 * another structure.
 */
export type Storable = Jsonish | DataType;

/**
 * What a handle needs from the object that created it.
 */
export interface HandleContext {
	readonly redis: IORedisLike;
	readonly codec: Codec;
	readonly runner: ScriptRunner;
	checkConnection(): boolean;
	createKey(): string;
	emit(event: LogEvent): void;
}

/**
 * Base class of every structure handle: one store key, one kind.
 */
export abstract class DataType {
	abstract readonly kind: StructureKind;
	private boundKey: string;

	constructor(protected readonly context: HandleContext, key: string) {
		this.boundKey = key;
	}

	get key(): string {
		return this.boundKey;
	}

	protected get redis(): IORedisLike {
		this.assertConnection();
		return this.context.redis;
	}

	protected assertConnection(): void {
		if (!this.context.checkConnection()) {
			throw new ConnectionError('Redis connection error.');
		}
	}

	protected encode(value: Storable): string {
		return this.context.codec.encode(value);
	}

	protected decode(payload: string): Promise<Storable> {
		return this.context.codec.decode(payload);
	}

	protected async run<R>(
		definition: ScriptDefinition<R>,
		positional: ReadonlyArray<ScriptValue> = [],
		named: Readonly<Record<string, ScriptValue>> = {},
	): Promise<R> {
		this.assertConnection();
		return await this.context.runner.execute(definition, positional, named);
	}

	async exists(): Promise<boolean> {
		return (await this.redis.exists(this.key)) === 1;
	}

	async rename(newKey?: string): Promise<string> {
		const target = newKey ?? this.context.createKey();

		try {
			await this.redis.rename(this.key, target);
		}
		catch (err) {
			if (isNoSuchKeyError(err)) {
				throw new NotFoundError(this.key);
			}
			throw err;
		}
		this.boundKey = target;
		return target;
	}

	async expire(ttlMs: number): Promise<boolean> {
		if (!isNumP(ttlMs)) {
			throw new RangeError('TTL format error.');
		}
		return (await this.redis.pexpire(this.key, ttlMs)) === 1;
	}

	async persist(): Promise<boolean> {
		return (await this.redis.persist(this.key)) === 1;
	}

	/**
	 * Deletes this structure and every structure reachable through reference
	 * payloads, in one server-side call.
	 *
	 * @returns Number of keys removed.
	 */
	async delete(): Promise<number> {
		const removed = await this.run(deleteAll, [ this.key, `${REFERENCE_PREFIX}:` ]);

		this.context.emit({ event: 'delete', key: this.key, removed });
		return removed;
	}

	toString(): string {
		return `${this.kind}:${this.key}`;
	}
}
