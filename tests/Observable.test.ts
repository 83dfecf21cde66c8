import {
	describe,
	expect,
	it,
} from 'vitest';
import { ObservedValue } from '../src/Observable';

describe('ObservedValue', () => {
	it('notifies observers in subscription order after each change', async () => {
		const observed = new ObservedValue<number[]>([ 1 ]);
		const calls: string[] = [];

		observed.subscribe({ onChange: async (value) => { calls.push(`first:${value.join(',')}`); } });
		observed.subscribe({ onChange: async (value) => { calls.push(`second:${value.join(',')}`); } });

		expect(await observed.mutate((draft) => { draft.push(2); })).toEqual([ 1, 2 ]);
		expect(await observed.replace([ 9 ])).toEqual([ 9 ]);
		expect(calls).toEqual([ 'first:1,2', 'second:1,2', 'first:9', 'second:9' ]);
	});

	it('stops notifying after unsubscribe', async () => {
		const observed = new ObservedValue<string>('a');
		const seen: string[] = [];
		const unsubscribe = observed.subscribe({ onChange: async (value) => { seen.push(value); } });

		await observed.replace('b');
		unsubscribe();
		await observed.replace('c');

		expect(seen).toEqual([ 'b' ]);
		expect(observed.value).toBe('c');
	});

	it('propagates observer failures', async () => {
		const observed = new ObservedValue<number>(1);

		observed.subscribe({ onChange: async () => { throw new Error('write failed'); } });

		await expect(observed.replace(2)).rejects.toThrow('write failed');
	});
});
