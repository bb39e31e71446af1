/** Number of addressable slots; ids are `revision * SLOT_LIMIT + index` */
const SLOT_LIMIT = 0x100000;

/**
 * Dense table addressed by small integer ids.
 * Every slot carries a revision, so an id that outlived its entry never aliases a newer one.
 * Id 0 is never issued.
 */
export class SlotTable<T extends object> {
	private values: Array<T | undefined> = [];
	private revisions: number[] = [];
	private freeList: number[] = [];
	private count = 0;

	add(value: T): number {
		let index = this.freeList.pop();
		if (index === undefined) {
			index = this.values.length;
			if (index >= SLOT_LIMIT) {
				throw new Error(`Slot table exhausted (${SLOT_LIMIT} entries)`);
			}
			this.values.push(undefined);
			this.revisions.push(0);
		}
		const revision = this.revisions[index] + 1;
		this.revisions[index] = revision;
		this.values[index] = value;
		this.count++;
		return revision * SLOT_LIMIT + index;
	}

	get(id: number): T | undefined {
		const index = this.indexOf(id);
		return index === undefined ? undefined : this.values[index];
	}

	isValid(id: number): boolean {
		return this.indexOf(id) !== undefined;
	}

	remove(id: number): T | undefined {
		const index = this.indexOf(id);
		if (index === undefined) {
			return undefined;
		}
		const value = this.values[index];
		this.values[index] = undefined;
		this.freeList.push(index);
		this.count--;
		return value;
	}

	get size(): number {
		return this.count;
	}

	/**
	 * Id of the first live entry, in slot order
	 */
	firstId(): number | undefined {
		for (const [id] of this.entries()) {
			return id;
		}
		return undefined;
	}

	*entries(): IterableIterator<[number, T]> {
		for (let index = 0; index < this.values.length; index++) {
			const value = this.values[index];
			if (value !== undefined) {
				yield [this.revisions[index] * SLOT_LIMIT + index, value];
			}
		}
	}

	clear(): void {
		for (let index = 0; index < this.values.length; index++) {
			if (this.values[index] !== undefined) {
				this.values[index] = undefined;
				this.freeList.push(index);
			}
		}
		this.count = 0;
	}

	private indexOf(id: number): number | undefined {
		if (!Number.isInteger(id) || id <= 0) {
			return undefined;
		}
		const index = id % SLOT_LIMIT;
		const revision = Math.floor(id / SLOT_LIMIT);
		if (index >= this.values.length || this.revisions[index] !== revision || this.values[index] === undefined) {
			return undefined;
		}
		return index;
	}
}
