import {
	ScriptArgumentError,
	ScriptExecutionError,
	StructError,
	errorMessage,
	isNoScriptError,
} from './errors';
import type {
	IORedisLike,
	LogEventHandler,
	ScriptValue,
	StructureKind,
} from './types';

/**
 * Namespace a script belongs to: one structure kind, or `shared` for the
 * scripts every kind inherits.
 */
export type ScriptScope = StructureKind | 'shared';

/**
 * Static description of a server-side Lua script.
 *
 * @remarks
 * `keys` and `args` name the parameters in the order the Lua body reads them
 * from `KEYS` and `ARGV`. A call supplies each of them either by name or
 * positionally; see {@link ScriptRunner.resolve}.
 */
export interface ScriptDefinition<R> {
	readonly id: string;
	readonly scope: ScriptScope;
	readonly keys: ReadonlyArray<string>;
	readonly args: ReadonlyArray<string>;
	readonly lua: string;

	/**
	 * Rewrites resolved keys and arguments right before dispatch.
	 */
	prepare?(keys: string[], args: string[]): [string[], string[]];

	/**
	 * Converts the raw script reply into the value handed back to callers.
	 */
	process(raw: unknown): R;
}

export type AnyScriptDefinition = ScriptDefinition<unknown>;

/**
 * Process-wide cache of uploaded scripts, keyed by `(scope, id)`.
 *
 * Concurrent first uses of the same script share one pending `SCRIPT LOAD`,
 * so the body is uploaded once. A failed upload is evicted and the next
 * caller tries again.
 */
export class ScriptRegistry {
	private readonly loaded: Map<string, Promise<string>> = new Map();

	static slot(definition: AnyScriptDefinition): string {
		return `${definition.scope}:${definition.id}`;
	}

	has(definition: AnyScriptDefinition): boolean {
		return this.loaded.has(ScriptRegistry.slot(definition));
	}

	load(redis: IORedisLike, definition: AnyScriptDefinition, onLoad?: (sha: string) => void): Promise<string> {
		const slot = ScriptRegistry.slot(definition);
		const pending = this.loaded.get(slot);

		if (pending) {
			return pending;
		}
		const loading = this.upload(redis, definition, onLoad).catch((err: unknown) => {
			if (this.loaded.get(slot) === loading) {
				this.loaded.delete(slot);
			}
			throw err;
		});

		this.loaded.set(slot, loading);
		return loading;
	}

	forget(definition: AnyScriptDefinition): void {
		this.loaded.delete(ScriptRegistry.slot(definition));
	}

	clear(): void {
		this.loaded.clear();
	}

	private async upload(redis: IORedisLike, definition: AnyScriptDefinition, onLoad?: (sha: string) => void): Promise<string> {
		const sha = await redis.script('LOAD', definition.lua);

		if (typeof sha !== 'string' || sha.length === 0) {
			throw new ScriptExecutionError(definition.id, definition.scope, 'SCRIPT LOAD returned no digest.');
		}
		onLoad?.(sha);
		return sha;
	}
}

export const scriptRegistry = new ScriptRegistry();

/**
 * Executes script definitions over one client connection.
 */
export class ScriptRunner {
	constructor(
		private readonly redis: IORedisLike,
		private readonly registry: ScriptRegistry = scriptRegistry,
		private readonly onLogEvent?: LogEventHandler,
	) {
	}

	/**
	 * Maps call arguments onto the declared `keys`, then `args`.
	 *
	 * Each parameter is looked up by name in `named` first. Otherwise it takes
	 * the next positional value not consumed yet; the cursor carries over from
	 * keys to args.
	 */
	resolve(
		definition: AnyScriptDefinition,
		positional: ReadonlyArray<ScriptValue>,
		named: Readonly<Record<string, ScriptValue>>,
	): [string[], string[]] {
		let cursor = 0;

		const take = (parameter: string): string => {
			if (Object.hasOwn(named, parameter)) {
				return String(named[parameter]);
			}
			if (cursor < positional.length) {
				return String(positional[cursor++]);
			}
			throw new ScriptArgumentError(definition.id, parameter);
		};
		const keys = definition.keys.map(take);
		const args = definition.args.map(take);

		return [ keys, args ];
	}

	async execute<R>(
		definition: ScriptDefinition<R>,
		positional: ReadonlyArray<ScriptValue> = [],
		named: Readonly<Record<string, ScriptValue>> = {},
	): Promise<R> {
		const [ keys, args ] = this.resolve(definition, positional, named);
		const [ preparedKeys, preparedArgs ] = definition.prepare
			? definition.prepare(keys, args)
			: [ keys, args ];
		let raw: unknown;

		try {
			raw = await this.dispatch(definition, preparedKeys, preparedArgs);
		}
		catch (err) {
			if (err instanceof StructError) {
				throw err;
			}
			this.onLogEvent?.({
				event: 'script:error',
				scope: definition.scope,
				scriptId: definition.id,
				error: errorMessage(err),
			});
			throw new ScriptExecutionError(definition.id, definition.scope, errorMessage(err), { cause: err });
		}
		return definition.process(raw);
	}

	private async dispatch(definition: AnyScriptDefinition, keys: string[], args: string[]): Promise<unknown> {
		const sha = await this.load(definition);

		try {
			return await this.redis.evalsha(sha, keys.length, ...keys, ...args);
		}
		catch (err) {
			if (!isNoScriptError(err)) {
				throw err;
			}
		}
		this.registry.forget(definition);
		this.onLogEvent?.({
			event: 'script:reload',
			scope: definition.scope,
			scriptId: definition.id,
		});
		return await this.redis.evalsha(await this.load(definition), keys.length, ...keys, ...args);
	}

	private load(definition: AnyScriptDefinition): Promise<string> {
		return this.registry.load(this.redis, definition, (sha) => this.onLogEvent?.({
			event: 'script:load',
			scope: definition.scope,
			scriptId: definition.id,
			sha,
		}));
	}
}
