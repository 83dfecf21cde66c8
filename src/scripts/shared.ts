import type { ScriptDefinition } from '../Script';

// Emulated for tests in tests/support/FakeRedis.ts; change both together.

/**
 * Deletes `KEYS[1]` and, depth first, every structure referenced from its
 * elements. `ARGV[1]` is the reference tag including its trailing colon.
 *
 * Keys already visited are skipped, so a reference cycle terminates.
 * Returns the number of keys removed.
 */
export const DELETE_ALL_LUA = `
	local prefix = ARGV[1]
	local visited = {}
	local removed = 0
	local remove

	local function follow(value)
		if value and string.sub(value, 1, #prefix) == prefix then
			remove(string.sub(value, #prefix + 1))
		end
	end

	local function follow_all(values)
		for i = 1, #values do
			follow(values[i])
		end
	end

	remove = function(key)
		if visited[key] then
			return
		end
		visited[key] = true

		local kind = redis.call('TYPE', key)['ok']

		if kind == 'list' then
			local i = 0
			local item = redis.call('LINDEX', key, i)
			while item do
				follow(item)
				i = i + 1
				item = redis.call('LINDEX', key, i)
			end
		elseif kind == 'hash' then
			follow_all(redis.call('HVALS', key))
		elseif kind == 'set' then
			follow_all(redis.call('SMEMBERS', key))
		elseif kind == 'zset' then
			follow_all(redis.call('ZRANGE', key, 0, -1))
		elseif kind == 'string' then
			follow(redis.call('GET', key))
		end
		removed = removed + redis.call('DEL', key)
	end

	remove(KEYS[1])
	return removed
`;

export const deleteAll: ScriptDefinition<number> = {
	id: 'deleteAll',
	scope: 'shared',
	keys: [ 'key' ],
	args: [ 'prefix' ],
	lua: DELETE_ALL_LUA,
	process: (raw) => Number(raw ?? 0),
};
