import * as crypto from 'crypto';
import type { ScriptDefinition } from '../Script';

// Emulated for tests in tests/support/FakeRedis.ts; change both together.

// Markers are unique per call so they never match a stored payload.
const withMarker = (keys: string[], args: string[]): [string[], string[]] => [
	keys,
	[ ...args, `redis-structs:marker:${crypto.randomUUID()}` ],
];

/**
 * Inserts `ARGV[2]` before the element at index `ARGV[1]`.
 *
 * The element is swapped for a marker first, so `LINSERT` finds the exact
 * position even when equal payloads occur earlier in the list. Returns the
 * new length, or `false` when the index is out of range.
 */
export const LIST_INSERT_LUA = `
	local key = KEYS[1]
	local index = tonumber(ARGV[1])
	local item = ARGV[2]
	local marker = ARGV[3]
	local pivot = redis.call('LINDEX', key, index)
	if not pivot then
		return false
	end
	redis.call('LSET', key, index, marker)
	local length = redis.call('LINSERT', key, 'BEFORE', marker, item)
	local restore = index
	if index >= 0 then
		restore = index + 1
	end
	redis.call('LSET', key, restore, pivot)
	return length
`;

/**
 * Removes and returns the element at index `ARGV[1]`, or `false` when the
 * index is out of range.
 */
export const LIST_POP_LUA = `
	local key = KEYS[1]
	local index = tonumber(ARGV[1])
	local sentinel = ARGV[2]
	local item = redis.call('LINDEX', key, index)
	if not item then
		return false
	end
	redis.call('LSET', key, index, sentinel)
	redis.call('LREM', key, 1, sentinel)
	return item
`;

export const LIST_COUNT_LUA = `
	local key = KEYS[1]
	local item = ARGV[1]
	local i = 0
	local count = 0
	local value = redis.call('LINDEX', key, i)
	while value do
		if value == item then
			count = count + 1
		end
		i = i + 1
		value = redis.call('LINDEX', key, i)
	end
	return count
`;

export const LIST_CONTAINS_LUA = `
	local key = KEYS[1]
	local item = ARGV[1]
	local i = 0
	local value = redis.call('LINDEX', key, i)
	while value do
		if value == item then
			return 1
		end
		i = i + 1
		value = redis.call('LINDEX', key, i)
	end
	return 0
`;

export const listInsert: ScriptDefinition<number | null> = {
	id: 'insert',
	scope: 'list',
	keys: [ 'key' ],
	args: [ 'index', 'item' ],
	lua: LIST_INSERT_LUA,
	prepare: withMarker,
	process: (raw) => raw === null
		? null
		: Number(raw),
};

export const listPop: ScriptDefinition<string | null> = {
	id: 'pop',
	scope: 'list',
	keys: [ 'key' ],
	args: [ 'index' ],
	lua: LIST_POP_LUA,
	prepare: withMarker,
	process: (raw) => typeof raw === 'string'
		? raw
		: null,
};

export const listCount: ScriptDefinition<number> = {
	id: 'count',
	scope: 'list',
	keys: [ 'key' ],
	args: [ 'item' ],
	lua: LIST_COUNT_LUA,
	process: (raw) => Number(raw),
};

export const listContains: ScriptDefinition<boolean> = {
	id: 'contains',
	scope: 'list',
	keys: [ 'key' ],
	args: [ 'item' ],
	lua: LIST_CONTAINS_LUA,
	process: (raw) => Number(raw) === 1,
};
