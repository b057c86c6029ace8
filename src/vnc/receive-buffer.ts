/**
 * Growable byte queue for reassembling server messages across transport frames.
 *
 * Bytes are appended at the back and only leave the front through `consume()`,
 * once the framer has identified a complete message.
 */

const INITIAL_CAPACITY = 4096;

export class ReceiveBuffer {
	private storage: Uint8Array;
	private start = 0;
	private end = 0;

	constructor(initialCapacity = INITIAL_CAPACITY) {
		this.storage = new Uint8Array(Math.max(initialCapacity, 16));
	}

	/** Number of buffered bytes */
	get length(): number {
		return this.end - this.start;
	}

	/** Append a chunk to the back of the queue. */
	append(chunk: Uint8Array): void {
		if (chunk.length === 0) return;

		if (this.end + chunk.length > this.storage.length) {
			this.makeRoom(chunk.length);
		}
		this.storage.set(chunk, this.end);
		this.end += chunk.length;
	}

	/**
	 * The buffered bytes, without copying. The view is only valid until the
	 * next `append()` or `consume()`.
	 */
	view(): Uint8Array {
		return this.storage.subarray(this.start, this.end);
	}

	/** Drop `n` bytes from the front and return what remains. */
	consume(n: number): Uint8Array {
		if (!Number.isInteger(n) || n < 0 || n > this.length) {
			throw new RangeError(`Cannot consume ${n} bytes (have ${this.length})`);
		}
		this.start += n;
		if (this.start === this.end) {
			this.start = 0;
			this.end = 0;
		}
		return this.view();
	}

	/** Discard everything. */
	clear(): void {
		this.start = 0;
		this.end = 0;
	}

	private makeRoom(extra: number): void {
		const needed = this.length + extra;

		// Compact in place when the consumed prefix frees enough space
		if (needed <= this.storage.length) {
			this.storage.copyWithin(0, this.start, this.end);
			this.end -= this.start;
			this.start = 0;
			return;
		}

		let capacity = this.storage.length;
		while (capacity < needed) {
			capacity *= 2;
		}
		const next = new Uint8Array(capacity);
		next.set(this.storage.subarray(this.start, this.end), 0);
		this.end -= this.start;
		this.start = 0;
		this.storage = next;
	}
}
