import {
	describe,
	expect,
	it,
	vi,
} from 'vitest';
import {
	ScriptArgumentError,
	ScriptExecutionError,
} from '../src/errors';
import {
	ScriptRegistry,
	ScriptRunner,
} from '../src/Script';
import {
	listContains,
	listCount,
} from '../src/scripts/list';
import { FakeRedis } from './support/FakeRedis';
import { createStructs } from './support/createStructs';
import type { ScriptDefinition } from '../src/Script';
import type { LogEvent } from '../src/types';

const probe: ScriptDefinition<string> = {
	id: 'probe',
	scope: 'shared',
	keys: [ 'key' ],
	args: [ 'a', 'b' ],
	lua: 'return 1',
	process: (raw) => String(raw),
};

class EmptyDigestRedis extends FakeRedis {
	failures = 1;

	async script(subcommand: 'LOAD', script: string): Promise<unknown> {
		if (this.failures > 0) {
			this.failures--;
			return '';
		}
		return await super.script(subcommand, script);
	}
}

describe('ScriptRunner.resolve', () => {
	const runner = new ScriptRunner(new FakeRedis(), new ScriptRegistry());

	it('fills keys then args from positional values', () => {
		expect(runner.resolve(probe, [ 'k', 1, 'x' ], {})).toEqual([ [ 'k' ], [ '1', 'x' ] ]);
	});

	it('prefers named values and keeps the positional cursor for the rest', () => {
		expect(runner.resolve(probe, [ 'k', 'x' ], { a: 5 })).toEqual([ [ 'k' ], [ '5', 'x' ] ]);
	});

	it('accepts every parameter by name', () => {
		expect(runner.resolve(probe, [], { key: 'k', a: 'one', b: 'two' })).toEqual([ [ 'k' ], [ 'one', 'two' ] ]);
	});

	it('reports the first unresolved parameter', () => {
		expect(() => runner.resolve(probe, [ 'k', 'x' ], {})).toThrow(ScriptArgumentError);
		expect(() => runner.resolve(probe, [ 'k', 'x' ], {})).toThrow('Invalid arguments for script "probe": missing "b".');
	});
});

describe('ScriptRunner.execute', () => {
	it('uploads a script once for concurrent first uses', async () => {
		const redis = new FakeRedis();
		const runner = new ScriptRunner(redis, new ScriptRegistry());

		await redis.rpush('k', 'a', 'b', 'a');

		const results = await Promise.all([
			runner.execute(listCount, [ 'k', 'a' ]),
			runner.execute(listCount, [ 'k', 'b' ]),
			runner.execute(listCount, [ 'k', 'c' ]),
		]);

		expect(results).toEqual([ 2, 1, 0 ]);
		expect(redis.loads).toEqual([ listCount.lua ]);
	});

	it('shares uploads between runners on the same registry', async () => {
		const redis = new FakeRedis();
		const registry = new ScriptRegistry();

		await redis.rpush('k', 'a');
		await new ScriptRunner(redis, registry).execute(listContains, [ 'k', 'a' ]);
		await new ScriptRunner(redis, registry).execute(listContains, [ 'k', 'a' ]);

		expect(redis.loads.length).toBe(1);
		expect(registry.has(listContains)).toBe(true);
	});

	it('reloads and retries once after NOSCRIPT', async () => {
		const events: LogEvent[] = [];
		const redis = new FakeRedis();
		const runner = new ScriptRunner(redis, new ScriptRegistry(), (event) => events.push(event));

		await redis.rpush('k', 'a');
		expect(await runner.execute(listContains, [ 'k', 'a' ])).toBe(true);

		redis.flushScripts();

		expect(await runner.execute(listContains, [ 'k', 'b' ])).toBe(false);
		expect(redis.loads.length).toBe(2);
		expect(events.map((event) => event.event)).toEqual([ 'script:load', 'script:reload', 'script:load' ]);
	});

	it('evicts a failed upload so the next call retries', async () => {
		const redis = new EmptyDigestRedis();
		const registry = new ScriptRegistry();
		const runner = new ScriptRunner(redis, registry);

		await redis.rpush('k', 'a');
		await expect(runner.execute(listCount, [ 'k', 'a' ])).rejects.toThrow('Script "list:count" failed: SCRIPT LOAD returned no digest.');
		expect(registry.has(listCount)).toBe(false);
		expect(await runner.execute(listCount, [ 'k', 'a' ])).toBe(1);
	});

	it('wraps store errors and logs them', async () => {
		const events: LogEvent[] = [];
		const redis = new FakeRedis();
		const runner = new ScriptRunner(redis, new ScriptRegistry(), (event) => events.push(event));

		await redis.hset('h', 'f', 'v');

		const failure = runner.execute(listCount, [ 'h', 'a' ]);

		await expect(failure).rejects.toBeInstanceOf(ScriptExecutionError);
		await expect(failure).rejects.toThrow('Script "list:count" failed: WRONGTYPE Operation against a key holding the wrong kind of value');
		expect(events[events.length - 1]).toEqual({
			event: 'script:error',
			scope: 'list',
			scriptId: 'count',
			error: 'WRONGTYPE Operation against a key holding the wrong kind of value',
		});
	});

	it('runs the prepare hook before dispatch', async () => {
		const { redis, structs } = createStructs();
		const list = structs.list('letters');

		await list.extend([ 'a' ]);

		const evalsha = vi.spyOn(redis, 'evalsha');

		await list.pop(0);

		const [ , numKeys, key, index, marker ] = evalsha.mock.calls[0];

		expect([ numKeys, key, index ]).toEqual([ 1, 'letters', '0' ]);
		expect(marker).toMatch(/^redis-structs:marker:[0-9a-f-]{36}$/);
	});
});

describe('ScriptRegistry', () => {
	it('keys entries by scope and id', () => {
		expect(ScriptRegistry.slot(listCount)).toBe('list:count');
		expect(ScriptRegistry.slot(probe)).toBe('shared:probe');
	});

	it('forgets and clears entries', async () => {
		const redis = new FakeRedis();
		const registry = new ScriptRegistry();

		await registry.load(redis, listCount);
		await registry.load(redis, listContains);
		registry.forget(listCount);

		expect(registry.has(listCount)).toBe(false);
		expect(registry.has(listContains)).toBe(true);

		registry.clear();

		expect(registry.has(listContains)).toBe(false);
	});
});
