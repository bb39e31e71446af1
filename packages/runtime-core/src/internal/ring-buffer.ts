/**
 * Smallest power of two that is >= value (and >= 1)
 */
export function nearestPowerOfTwo(value: number): number {
	let size = 1;
	while (size < value) {
		size *= 2;
	}
	return size;
}

/**
 * Fixed-capacity FIFO queue. Capacity is rounded up to a power of two.
 */
export class RingBuffer<T> {
	private items: Array<T | undefined>;
	private head = 0;
	private tail = 0;
	private readonly mask: number;

	constructor(capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new Error(`Ring buffer capacity must be a positive integer, got ${capacity}`);
		}
		const size = nearestPowerOfTwo(capacity);
		this.items = new Array<T | undefined>(size);
		this.mask = size - 1;
	}

	get capacity(): number {
		return this.mask + 1;
	}

	/** Number of unread items */
	dataLeft(): number {
		return this.tail - this.head;
	}

	/**
	 * Append an item. Returns false when the buffer is full.
	 */
	write(item: T): boolean {
		if (this.dataLeft() === this.capacity) {
			return false;
		}
		this.items[this.tail & this.mask] = item;
		this.tail++;
		return true;
	}

	read(): T | undefined {
		if (this.head === this.tail) {
			return undefined;
		}
		const slot = this.head & this.mask;
		const item = this.items[slot];
		this.items[slot] = undefined;
		this.head++;
		return item;
	}
}
