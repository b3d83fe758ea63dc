/**
 * Unbounded FIFO channel between the indexing worker and its owner.
 *
 * - Producer never blocks (status events are small and rare)
 * - poll() and drain() are non-blocking snapshot reads
 * - pull() lets async consumers wait for the next item without spinning
 *
 * @template T - Type of items in the channel
 */
export class StatusChannel<T> {
	private buffer: T[] = [];
	private waitingPull: Array<{
		resolve: (value: T | null) => void;
		timer: ReturnType<typeof setTimeout> | null;
	}> = [];

	/**
	 * Append an item. Delivered directly to a waiting consumer if there is one.
	 */
	push(item: T): void {
		const consumer = this.waitingPull.shift();
		if (consumer) {
			if (consumer.timer) clearTimeout(consumer.timer);
			consumer.resolve(item);
			return;
		}
		this.buffer.push(item);
	}

	/**
	 * Take the oldest item, or null if the channel is empty.
	 */
	poll(): T | null {
		return this.buffer.shift() ?? null;
	}

	/**
	 * Take every buffered item, oldest first.
	 */
	drain(): T[] {
		const items = this.buffer;
		this.buffer = [];
		return items;
	}

	/**
	 * Wait for the next item.
	 * Resolves null after `timeoutMs`, or when the channel is cleared.
	 */
	pull(timeoutMs?: number): Promise<T | null> {
		const item = this.poll();
		if (item !== null) {
			return Promise.resolve(item);
		}

		return new Promise<T | null>(resolve => {
			const waiter: {
				resolve: (value: T | null) => void;
				timer: ReturnType<typeof setTimeout> | null;
			} = {resolve, timer: null};

			if (timeoutMs !== undefined) {
				waiter.timer = setTimeout(() => {
					this.waitingPull = this.waitingPull.filter(w => w !== waiter);
					resolve(null);
				}, timeoutMs);
			}

			this.waitingPull.push(waiter);
		});
	}

	/**
	 * Discard buffered items and release waiting consumers with null.
	 */
	clear(): void {
		this.buffer = [];
		for (const consumer of this.waitingPull) {
			if (consumer.timer) clearTimeout(consumer.timer);
			consumer.resolve(null);
		}
		this.waitingPull = [];
	}

	/** Current number of buffered items */
	get size(): number {
		return this.buffer.length;
	}
}
