/**
 * Bounded async channel: `send` waits while the buffer is full, iteration waits
 * while it is empty. Closing with an error rethrows it to the consumer after the
 * buffered items drain.
 */
export class BoundedChannel<T extends {}> implements AsyncIterable<T> {
	private _items: T[] = [];
	private _closed = false;
	private _error: unknown;
	private _hasError = false;
	private _readers: Array<() => void> = [];
	private _writers: Array<() => void> = [];

	constructor(private readonly _capacity: number) {
		if (_capacity < 1) throw new Error("channel capacity must be at least 1");
	}

	get size(): number {
		return this._items.length;
	}

	get closed(): boolean {
		return this._closed;
	}

	/**
	 * Resolves to false when the channel closed before the value could be queued.
	 */
	async send(value: T): Promise<boolean> {
		while (!this._closed && this._items.length >= this._capacity) {
			await new Promise<void>((resolve) => this._writers.push(resolve));
		}
		if (this._closed) return false;

		this._items.push(value);
		this._wake(this._readers);
		return true;
	}

	close(error?: unknown): void {
		if (this._closed) return;
		this._closed = true;
		if (error !== undefined) {
			this._error = error;
			this._hasError = true;
		}
		this._wake(this._readers);
		this._wake(this._writers);
	}

	/**
	 * Consumer-side close: drops whatever is buffered and releases blocked senders.
	 */
	cancel(): void {
		this._items = [];
		this.close();
	}

	async *[Symbol.asyncIterator](): AsyncGenerator<T, void, unknown> {
		for (;;) {
			const item = this._items.shift();
			if (item !== undefined) {
				this._wake(this._writers);
				yield item;
				continue;
			}
			if (this._closed) {
				if (this._hasError) throw this._error;
				return;
			}
			await new Promise<void>((resolve) => this._readers.push(resolve));
		}
	}

	private _wake(waiters: Array<() => void>): void {
		const pending = waiters.splice(0);
		for (const resolve of pending) resolve();
	}
}

/**
 * Moves production of `source` onto a reader task that runs up to `capacity`
 * items ahead of the consumer.
 */
export async function* bufferStream<T extends {}>(source: AsyncIterable<T>, capacity = 64): AsyncGenerator<T, void, unknown> {
	const channel = new BoundedChannel<T>(capacity);

	const pumping = (async () => {
		try {
			for await (const item of source) {
				if (!(await channel.send(item))) break;
			}
			channel.close();
		} catch (err) {
			channel.close(err);
		}
	})();

	try {
		yield* channel;
	} finally {
		channel.cancel();
		await pumping;
	}
}
