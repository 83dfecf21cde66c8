import type { ScriptDefinition } from '../Script';

// Emulated for tests in tests/support/FakeRedis.ts; change both together.

export const HASH_POP_LUA = `
	local value = redis.call('HGET', KEYS[1], ARGV[1])
	if not value then
		return false
	end
	redis.call('HDEL', KEYS[1], ARGV[1])
	return value
`;

/**
 * Stores `ARGV[2]` under field `ARGV[1]` unless it exists, then returns the
 * field's value.
 */
export const HASH_SET_DEFAULT_LUA = `
	redis.call('HSETNX', KEYS[1], ARGV[1], ARGV[2])
	return redis.call('HGET', KEYS[1], ARGV[1])
`;

const toPayload = (raw: unknown): string | null => typeof raw === 'string'
	? raw
	: null;

export const hashPop: ScriptDefinition<string | null> = {
	id: 'pop',
	scope: 'hash',
	keys: [ 'key' ],
	args: [ 'field' ],
	lua: HASH_POP_LUA,
	process: toPayload,
};

export const hashSetDefault: ScriptDefinition<string | null> = {
	id: 'setDefault',
	scope: 'hash',
	keys: [ 'key' ],
	args: [ 'field', 'value' ],
	lua: HASH_SET_DEFAULT_LUA,
	process: toPayload,
};
