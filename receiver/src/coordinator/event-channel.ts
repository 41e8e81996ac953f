export const DEFAULT_MAX_BUFFERED = 1000;

interface Waiter<T> {
	resolve: (result: IteratorResult<T>) => void;
	reject: (err: Error) => void;
}

/**
 * Bounded push/pull queue handed out to consumers as an async iterator.
 *
 * A slow consumer never blocks the producer: past `maxBuffered` the oldest
 * queued value is dropped and counted.
 */
export class EventChannel<T> implements AsyncIterableIterator<T> {
	private readonly buffer: T[] = [];
	private readonly waiters: Waiter<T>[] = [];
	private closed = false;
	private failure?: Error;
	private droppedCount = 0;

	constructor(
		private readonly maxBuffered: number = DEFAULT_MAX_BUFFERED,
		private readonly onDetach?: (channel: EventChannel<T>) => void
	) {
		if (!Number.isInteger(maxBuffered) || maxBuffered < 1) {
			throw new RangeError("maxBuffered must be a positive integer");
		}
	}

	get dropped(): number {
		return this.droppedCount;
	}

	get buffered(): number {
		return this.buffer.length;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/** Returns the number of values dropped to make room (0 or 1). */
	push(value: T): number {
		if (this.closed) return 0;

		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve({ value, done: false });
			return 0;
		}

		this.buffer.push(value);
		if (this.buffer.length > this.maxBuffered) {
			this.buffer.shift();
			this.droppedCount += 1;
			return 1;
		}
		return 0;
	}

	/** End the stream normally once the buffer is drained. */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		for (const w of this.waiters.splice(0)) {
			w.resolve({ value: undefined, done: true });
		}
		this.onDetach?.(this);
	}

	/** End the stream by throwing `err` to the consumer after the buffer is drained. */
	fail(err: Error): void {
		if (this.closed) return;
		this.closed = true;

		const waiting = this.waiters.splice(0);
		if (waiting.length > 0) {
			for (const w of waiting) w.reject(err);
		} else {
			this.failure = err;
		}
		this.onDetach?.(this);
	}

	next(): Promise<IteratorResult<T>> {
		if (this.buffer.length > 0) {
			const value = this.buffer.shift();
			if (value !== undefined) return Promise.resolve({ value, done: false });
		}

		if (this.failure) {
			const err = this.failure;
			this.failure = undefined;
			return Promise.reject(err);
		}

		if (this.closed) {
			return Promise.resolve({ value: undefined, done: true });
		}

		return new Promise<IteratorResult<T>>((resolve, reject) => {
			this.waiters.push({ resolve, reject });
		});
	}

	/** Consumer-side detach (`break` in `for await`). */
	return(): Promise<IteratorResult<T>> {
		this.buffer.length = 0;
		this.failure = undefined;
		this.close();
		return Promise.resolve({ value: undefined, done: true });
	}

	[Symbol.asyncIterator](): EventChannel<T> {
		return this;
	}
}
