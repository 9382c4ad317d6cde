/**
 * BoundedQueue is a fixed-capacity FIFO ring buffer.
 * Pushing onto a full queue evicts the single oldest item; both operations are O(1).
 *
 * @template T - The type of item stored.
 */
export class BoundedQueue<T> {
    /** Backing storage; slots outside the live window are undefined. */
    private _items: (T | undefined)[];
    /** Index of the oldest live item. */
    private _head = 0;
    /** Number of live items. */
    private _size = 0;
    private readonly _capacity: number;

    /**
     * @param capacity number - Maximum number of items held at once (positive integer)
     */
    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`BoundedQueue capacity must be a positive integer, got ${capacity}`);
        }
        this._capacity = capacity;
        this._items = new Array<T | undefined>(capacity);
    }

    public get capacity(): number {
        return this._capacity;
    }

    public get size(): number {
        return this._size;
    }

    /**
     * Appends an item, evicting the oldest one first when full.
     * @param item T - Item to append
     * @returns T | undefined - The evicted item, if any
     */
    public Push(item: T): T | undefined {
        let evicted: T | undefined;

        if (this._size === this._capacity) {
            evicted = this._items[this._head];
            this._items[this._head] = item;
            this._head = (this._head + 1) % this._capacity;
            return evicted;
        }
        this._items[(this._head + this._size) % this._capacity] = item;
        this._size++;
        return evicted;
    }

    /**
     * Items oldest first.
     * @returns T[] - Fresh array; mutating it does not affect the queue
     */
    public ToArray(): T[] {
        const result: T[] = [];

        for (let i = 0; i < this._size; i++) {
            const item = this._items[(this._head + i) % this._capacity];

            if (item !== undefined) {
                result.push(item);
            }
        }
        return result;
    }

    /**
     * Replaces the content with the given items (oldest first), keeping only the newest `capacity`.
     * @param items readonly T[] - Items in chronological order
     */
    public Reset(items: readonly T[]): void {
        const kept = items.slice(Math.max(0, items.length - this._capacity));
        this._items = new Array<T | undefined>(this._capacity);
        kept.forEach((item, index) => {
            this._items[index] = item;
        });
        this._head = 0;
        this._size = kept.length;
    }

    /** Removes every item. */
    public Clear(): void {
        this.Reset([]);
    }
}
