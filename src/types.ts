/**
 * Represents the scalar values that can appear inside a stored JSON payload.
 *
 * @remarks
 * `JsonPrimitive` is the leaf of {@link Jsonish}. Everything the codec writes
 * as an inline payload is built from these four kinds of values.
 *
 * This type intentionally excludes `undefined`, functions, symbols and
 * `bigint`, none of which survive `JSON.stringify`.
 *
 * @example
 * ```ts
 * const a: JsonPrimitive = "hello";   // ok
 * const b: JsonPrimitive = 123;       // ok
 * const c: JsonPrimitive = null;      // ok
 *
 * const d: JsonPrimitive = undefined; // not allowed
 * ```
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON-compatible value.
 *
 * This is the set of values that can be stored inline: a primitive, an
 * array of `Jsonish`, or a plain object whose values are `Jsonish`.
 *
 * @remarks
 * A value of this type round-trips through the codec unchanged:
 * `decode(encode(value))` yields a deep-equal copy.
 *
 * @example
 * ```ts
 * const profile: Jsonish = {
 *   name: "Alice",
 *   tags: ["admin", "beta"],
 *   limits: { daily: 10 },
 * };
 * ```
 */
export type Jsonish =
	| JsonPrimitive
	| { [key: string]: Jsonish }
	| Jsonish[];

/**
 * Structure kinds as reported by the Redis `TYPE` command.
 *
 * @remarks
 * `TYPE` answers `none` for a missing key; that answer is never a kind and is
 * handled separately wherever a kind is looked up.
 */
export type StructureKind = 'string' | 'list' | 'hash' | 'set' | 'zset';

/**
 * Every kind known to the default handle registry, in a stable order.
 */
export const STRUCTURE_KINDS: ReadonlyArray<StructureKind> = [ 'string', 'list', 'hash', 'set', 'zset' ];

/**
 * Scalar accepted as a script key or argument.
 *
 * Numbers are sent in their decimal string form.
 */
export type ScriptValue = string | number;

/**
 * Structured diagnostic emitted by the library.
 *
 * @remarks
 * The library never writes to the console. Callers that want visibility pass
 * an `onLogEvent` callback when constructing {@link RedisStructs} and route
 * the events to whatever logger they use.
 *
 * - `script:load` - a script body was uploaded with `SCRIPT LOAD`.
 * - `script:reload` - the server answered `NOSCRIPT` and the body was uploaded again.
 * - `script:error` - a script call failed on the server.
 * - `delete` - a cascading delete finished.
 */
export interface LogEvent {
	event: 'script:load' | 'script:reload' | 'script:error' | 'delete';
	scope?: string;
	scriptId?: string;
	sha?: string;
	key?: string;
	removed?: number;
	error?: string;
}

/**
 * Receiver for {@link LogEvent}s.
 */
export type LogEventHandler = (event: LogEvent) => void;

/**
 * Minimal Redis client contract used by this library.
 *
 * This interface describes only the subset of Redis commands the handles,
 * the codec and the script runner depend on. An `ioredis` client satisfies
 * it as is; any other client can be adapted to match this shape.
 *
 * @remarks
 * - All methods are asynchronous and return `Promise` results.
 * - Network errors, timeouts and reconnection are the client's concern.
 * - Values are always passed as already-encoded payload strings.
 */
export interface IORedisLike {
	/**
	 * Current connection status of the client.
	 *
	 * @remarks
	 * Typical values are `'ready'`, `'connecting'` and `'reconnecting'`.
	 * `RedisStructs.checkConnection()` reads this field before every command.
	 */
	status: 'ready' | 'connecting' | 'reconnecting' | string;

	/**
	 * Incrementally scans the keyspace and returns one page of keys.
	 *
	 * @param cursor - `'0'` for the first call, then the returned cursor.
	 * @param matchKeyword - Literal `'MATCH'` keyword.
	 * @param pattern - Glob pattern such as `"user:*"`.
	 * @param countKeyword - Literal `'COUNT'` keyword.
	 * @param count - Page size hint.
	 * @returns `[nextCursor, keys]`; the scan is complete once `nextCursor` is `'0'`.
	 */
	scan(
		cursor: string,
		matchKeyword: 'MATCH',
		pattern: string,
		countKeyword: 'COUNT',
		count: number
	): Promise<[nextCursor: string, keys: string[]]>;

	/**
	 * Returns the kind of value stored at `key`, or `'none'` when it is missing.
	 *
	 * @remarks
	 * Corresponds to the Redis `TYPE` command. Reference payloads are decoded
	 * with exactly one call to this method.
	 */
	type(key: string): Promise<string>;

	/**
	 * Renames `key` to `newKey`, overwriting `newKey` if it exists.
	 *
	 * @remarks
	 * Redis fails with `ERR no such key` when `key` is missing.
	 */
	rename(key: string, newKey: string): Promise<'OK'>;

	/**
	 * Returns `1` when `key` exists and `0` otherwise.
	 */
	exists(key: string): Promise<number>;

	/**
	 * Sets a time-to-live in milliseconds.
	 *
	 * @returns `1` if the timeout was set, `0` if the key does not exist.
	 */
	pexpire(key: string, ttlMs: number): Promise<number>;

	/**
	 * Removes the time-to-live of `key`.
	 *
	 * @returns `1` if a timeout was removed, `0` otherwise.
	 */
	persist(key: string): Promise<number>;

	/**
	 * Deletes keys without looking at their contents.
	 *
	 * @returns Number of keys removed.
	 */
	del(...keys: string[]): Promise<number>;

	/**
	 * Fetches the string stored at `key`, or `null` when it is missing.
	 */
	get(key: string): Promise<string | null>;

	/**
	 * Stores a string at `key`.
	 */
	set(key: string, value: string): Promise<'OK'>;

	/**
	 * Pushes payloads to the tail of a list.
	 *
	 * @returns New length of the list.
	 */
	rpush(key: string, ...values: string[]): Promise<number>;

	/**
	 * Returns the list element at `index`, or `null` when out of range.
	 *
	 * @remarks
	 * Negative indexes count from the tail, as in Redis.
	 */
	lindex(key: string, index: number): Promise<string | null>;

	/**
	 * Overwrites the list element at `index`.
	 *
	 * @remarks
	 * Redis fails with `ERR index out of range` when `index` does not exist
	 * and with `ERR no such key` when the list does not exist.
	 */
	lset(key: string, index: number, value: string): Promise<'OK'>;

	/**
	 * Removes elements equal to `value`.
	 *
	 * @param count
	 * - `> 0` - remove up to `count` occurrences from head to tail.
	 * - `< 0` - remove up to `|count|` occurrences from tail to head.
	 * - `0` - remove all occurrences.
	 * @returns Number of removed elements.
	 */
	lrem(key: string, count: number, value: string): Promise<number>;

	/**
	 * Returns the length of a list, `0` when it is missing.
	 */
	llen(key: string): Promise<number>;

	/**
	 * Returns the value of one hash field, or `null` when it is missing.
	 */
	hget(key: string, field: string): Promise<string | null>;

	/**
	 * Sets hash fields from a flat `field, value, field, value, ...` list.
	 *
	 * @returns Number of fields that were newly created.
	 */
	hset(key: string, ...fieldValues: string[]): Promise<number>;

	/**
	 * Removes hash fields.
	 *
	 * @returns Number of fields removed.
	 */
	hdel(key: string, ...fields: string[]): Promise<number>;

	/**
	 * Returns `1` when the hash field exists and `0` otherwise.
	 */
	hexists(key: string, field: string): Promise<number>;

	/**
	 * Returns every field name of a hash.
	 */
	hkeys(key: string): Promise<string[]>;

	/**
	 * Returns every value of a hash.
	 */
	hvals(key: string): Promise<string[]>;

	/**
	 * Returns every field and value of a hash as a record.
	 */
	hgetall(key: string): Promise<Record<string, string>>;

	/**
	 * Returns the number of fields in a hash.
	 */
	hlen(key: string): Promise<number>;

	/**
	 * Incrementally scans a hash.
	 *
	 * @returns `[nextCursor, flat field/value list]`.
	 */
	hscan(key: string, cursor: string, countKeyword: 'COUNT', count: number): Promise<[nextCursor: string, entries: string[]]>;

	/**
	 * Adds members to a set.
	 *
	 * @returns Number of members that were not already present.
	 */
	sadd(key: string, ...members: string[]): Promise<number>;

	/**
	 * Removes members from a set.
	 *
	 * @returns Number of members removed.
	 */
	srem(key: string, ...members: string[]): Promise<number>;

	/**
	 * Removes and returns a random member, or `null` when the set is empty.
	 */
	spop(key: string): Promise<string | null>;

	/**
	 * Returns `1` when `member` belongs to the set and `0` otherwise.
	 */
	sismember(key: string, member: string): Promise<number>;

	/**
	 * Returns the number of members in a set.
	 */
	scard(key: string): Promise<number>;

	/**
	 * Returns every member of a set.
	 */
	smembers(key: string): Promise<string[]>;

	/**
	 * Incrementally scans a set.
	 *
	 * @returns `[nextCursor, members]`.
	 */
	sscan(key: string, cursor: string, countKeyword: 'COUNT', count: number): Promise<[nextCursor: string, members: string[]]>;

	/**
	 * Stores the union of `keys` at `destination`.
	 *
	 * @returns Number of members in the resulting set.
	 */
	sunionstore(destination: string, ...keys: string[]): Promise<number>;

	/**
	 * Stores the intersection of `keys` at `destination`.
	 *
	 * @returns Number of members in the resulting set.
	 */
	sinterstore(destination: string, ...keys: string[]): Promise<number>;

	/**
	 * Stores the members of the first key that are in none of the others.
	 *
	 * @returns Number of members in the resulting set.
	 */
	sdiffstore(destination: string, ...keys: string[]): Promise<number>;

	/**
	 * Returns the number of members in a sorted set.
	 */
	zcard(key: string): Promise<number>;

	/**
	 * Loads a Lua script into Redis and returns its SHA1 hash.
	 *
	 * @param subcommand - Literal `'LOAD'` keyword (only subcommand used here).
	 * @param script - Lua script source code.
	 * @returns SHA1 hash of the stored script, to be used with `EVALSHA`.
	 *
	 * @remarks
	 * The reply is typed `unknown` because clients differ in how they type
	 * `SCRIPT` replies; the runner validates it before use.
	 */
	script(subcommand: 'LOAD', script: string): Promise<unknown>;

	/**
	 * Executes a previously loaded Lua script by its SHA1 hash.
	 *
	 * @param sha1 - SHA1 hash returned by `SCRIPT LOAD`.
	 * @param numKeys
	 * Number of key arguments that follow. The first `numKeys` items
	 * in `args` are `KEYS`, the rest are `ARGV`.
	 * @returns Script result: strings, integers, `null` for Lua `false`, or nested arrays.
	 *
	 * @remarks
	 * Redis fails with a `NOSCRIPT` error when the hash is not in the server
	 * script cache, for example after `SCRIPT FLUSH` or a failover.
	 */
	evalsha(sha1: string, numKeys: number, ...args: string[]): Promise<unknown>;

	/**
	 * Closes the connection.
	 *
	 * @remarks
	 * Optional because adapters over shared connections may not own them.
	 */
	quit?(): Promise<'OK'>;
}

/**
 * Tag of a payload that references another server-resident structure.
 *
 * @remarks
 * Stored payloads look like `redis:struct:<key>`. The tag is fixed: changing
 * it would orphan every reference already written.
 */
export const REFERENCE_PREFIX = 'redis:struct';

/**
 * Tag of a payload that carries an inline JSON value: `redis:abs:<json>`.
 */
export const INLINE_PREFIX = 'redis:abs';
