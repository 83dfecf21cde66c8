import type { Jsonish } from './types';

export interface Observer<T> {
	onChange(value: T): Promise<void>;
}

export interface Observable<T> {
	/**
	 * Registers `observer` and returns a function that removes it again.
	 */
	subscribe(observer: Observer<T>): () => void;
}

/**
 * Local copy of an inline value whose changes are pushed to subscribers.
 *
 * Handles subscribe to write the value back into the slot it came from, so
 * `await observed.mutate((tags) => { tags.push('new'); })` updates the
 * stored payload once every subscriber has finished.
 */
export class ObservedValue<T extends Jsonish> implements Observable<T> {
	private readonly observers: Array<Observer<T>> = [];

	constructor(private current: T) {
	}

	get value(): T {
		return this.current;
	}

	subscribe(observer: Observer<T>): () => void {
		this.observers.push(observer);

		return () => {
			const index = this.observers.indexOf(observer);

			if (index >= 0) {
				this.observers.splice(index, 1);
			}
		};
	}

	async mutate(mutation: (draft: T) => void): Promise<T> {
		mutation(this.current);
		await this.notify();
		return this.current;
	}

	async replace(next: T): Promise<T> {
		this.current = next;
		await this.notify();
		return this.current;
	}

	private async notify(): Promise<void> {
		for (const observer of [ ...this.observers ]) {
			await observer.onChange(this.current);
		}
	}
}
