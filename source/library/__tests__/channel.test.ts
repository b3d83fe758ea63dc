import {describe, it, expect} from 'vitest';
import {StatusChannel} from '../background/channel.js';

describe('StatusChannel', () => {
	it('polls items in push order and null when empty', () => {
		const channel = new StatusChannel<string>();
		channel.push('a');
		channel.push('b');

		expect(channel.poll()).toBe('a');
		expect(channel.poll()).toBe('b');
		expect(channel.poll()).toBeNull();
	});

	it('drains everything at once', () => {
		const channel = new StatusChannel<number>();
		[1, 2, 3].forEach(n => channel.push(n));

		expect(channel.drain()).toEqual([1, 2, 3]);
		expect(channel.size).toBe(0);
		expect(channel.drain()).toEqual([]);
	});

	it('hands a pushed item straight to a waiting consumer', async () => {
		const channel = new StatusChannel<string>();
		const pending = channel.pull();
		channel.push('direct');

		await expect(pending).resolves.toBe('direct');
		expect(channel.size).toBe(0);
	});

	it('returns a buffered item from pull without waiting', async () => {
		const channel = new StatusChannel<string>();
		channel.push('ready');

		await expect(channel.pull(10)).resolves.toBe('ready');
	});

	it('resolves pull with null after the timeout', async () => {
		const channel = new StatusChannel<string>();

		await expect(channel.pull(20)).resolves.toBeNull();
		// A later push is buffered, not lost to the timed-out consumer
		channel.push('later');
		expect(channel.poll()).toBe('later');
	});

	it('clear discards items and releases waiting consumers', async () => {
		const channel = new StatusChannel<string>();
		channel.push('stale');
		channel.clear();
		expect(channel.poll()).toBeNull();

		const pending = channel.pull();
		channel.clear();
		await expect(pending).resolves.toBeNull();
	});
});
