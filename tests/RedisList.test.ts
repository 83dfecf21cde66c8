import {
	describe,
	expect,
	it,
} from 'vitest';
import { RedisList } from '../src/datatypes/RedisList';
import {
	DecodingError,
	IndexError,
} from '../src/errors';
import { createStructs } from './support/createStructs';

describe('RedisList', () => {
	it('appends and extends', async () => {
		const { structs } = createStructs();
		const list = structs.list('letters');

		expect(await list.append('a')).toBe(1);
		expect(await list.extend([ 'b', 'c' ])).toBe(3);
		expect(await list.extend([])).toBe(3);
		expect(await list.toArray()).toEqual([ 'a', 'b', 'c' ]);
		expect(await list.length()).toBe(3);
	});

	it('pops by index and keeps the remaining order', async () => {
		const { structs } = createStructs();
		const list = structs.list('letters');

		await list.extend([ 'a', 'b', 'c' ]);

		expect(await list.pop(1)).toBe('b');
		expect(await list.toArray()).toEqual([ 'a', 'c' ]);
		expect(await list.pop(-1)).toBe('c');
		expect(await list.pop()).toBe('a');
		await expect(list.pop()).rejects.toBeInstanceOf(IndexError);
	});

	it('pops the element at the index even when equal payloads come first', async () => {
		const { redis, structs } = createStructs();
		const list = structs.list('dupes');

		await list.extend([ 'x', 'y', 'x' ]);

		expect(await list.pop(2)).toBe('x');
		expect(redis.data.get('dupes')).toEqual({ kind: 'list', value: [ 'redis:abs:"x"', 'redis:abs:"y"' ] });
	});

	it('inserts before the element at the index', async () => {
		const { structs } = createStructs();
		const list = structs.list('letters');

		await list.extend([ 'a', 'b', 'c' ]);

		expect(await list.insert(1, 'x')).toBe(4);
		expect(await list.toArray()).toEqual([ 'a', 'x', 'b', 'c' ]);
		expect(await list.insert(-1, 'y')).toBe(5);
		expect(await list.toArray()).toEqual([ 'a', 'x', 'b', 'y', 'c' ]);
	});

	it('inserts at the exact position among equal payloads', async () => {
		const { structs } = createStructs();
		const list = structs.list('dupes');

		await list.extend([ 'a', 'a', 'a' ]);
		await list.insert(2, 'x');

		expect(await list.toArray()).toEqual([ 'a', 'a', 'x', 'a' ]);
	});

	it('raises IndexError for out of range inserts', async () => {
		const { structs } = createStructs();
		const list = structs.list('letters');

		await expect(list.insert(0, 'a')).rejects.toThrow('Index 0 out of range.');
		await list.append('a');
		await expect(list.insert(5, 'b')).rejects.toBeInstanceOf(IndexError);
	});

	it('reads and writes by index', async () => {
		const { structs } = createStructs();
		const list = structs.list('letters');

		await list.extend([ 'a', 'b', 'c' ]);
		await list.set(1, { upper: 'B' });

		expect(await list.index(1)).toEqual({ upper: 'B' });
		expect(await list.index(-1)).toBe('c');
		await expect(list.index(3)).rejects.toThrow('Index 3 out of range.');
		await expect(list.set(9, 'z')).rejects.toBeInstanceOf(IndexError);
		await expect(structs.list('missing').set(0, 'z')).rejects.toBeInstanceOf(IndexError);
	});

	it('rejects non-integer indexes', async () => {
		const { structs } = createStructs();

		await expect(structs.list('letters').index(1.5)).rejects.toThrow('Index 1.5 is not an integer.');
	});

	it('removes by index and by value', async () => {
		const { structs } = createStructs();
		const list = structs.list('letters');

		await list.extend([ 'a', 'b', 'a', 'c' ]);
		await list.removeAt(0);

		expect(await list.remove('a')).toBe(true);
		expect(await list.remove('q')).toBe(false);
		expect(await list.toArray()).toEqual([ 'b', 'c' ]);
		await expect(list.removeAt(2)).rejects.toBeInstanceOf(IndexError);
	});

	it('counts and finds values', async () => {
		const { structs } = createStructs();
		const list = structs.list('letters');

		await list.extend([ 'a', 'b', 'a' ]);

		expect(await list.count('a')).toBe(2);
		expect(await list.count('z')).toBe(0);
		expect(await list.contains('b')).toBe(true);
		expect(await list.contains('q')).toBe(false);
	});

	it('stores nested handles as references', async () => {
		const { redis, structs } = createStructs();
		const outer = structs.list('outer');
		const inner = structs.list('inner');

		await inner.append(1);
		await outer.append(inner);

		const item = await outer.index(0);

		expect(redis.data.get('outer')).toEqual({ kind: 'list', value: [ 'redis:struct:inner' ] });
		expect(item).toBeInstanceOf(RedisList);
		expect(item instanceof RedisList && await item.toArray()).toEqual([ 1 ]);
	});

	it('writes observed changes back to the element', async () => {
		const { structs } = createStructs();
		const list = structs.list('rows');

		await list.extend([ [ 1, 2 ], 'tail' ]);

		const observed = await list.observe(0);

		await observed.mutate((draft) => {
			if (Array.isArray(draft)) {
				draft.push(3);
			}
		});

		expect(await list.toArray()).toEqual([ [ 1, 2, 3 ], 'tail' ]);
	});

	it('refuses to observe a reference', async () => {
		const { structs } = createStructs();
		const list = structs.list('outer');
		const inner = structs.list('inner');

		await inner.append(1);
		await list.append(inner);

		await expect(list.observe(0)).rejects.toBeInstanceOf(DecodingError);
	});

	it('iterates in order', async () => {
		const { structs } = createStructs();
		const list = structs.list('numbers');
		const seen: unknown[] = [];

		await list.extend([ 1, 2, 3 ]);

		for await (const item of list) {
			seen.push(item);
		}
		expect(seen).toEqual([ 1, 2, 3 ]);
	});
});
