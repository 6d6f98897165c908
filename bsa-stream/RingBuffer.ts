/**
 * Fixed-length ring buffer of doubles with O(1) push.
 * Always full: it starts as `capacity` NaNs, and NaN marks a missing sample.
 */
import { BSA_BUFFER_LENGTH } from './constants';

export class RingBuffer {
    private buffer: Float64Array;
    // Index of the oldest element
    private head: number = 0;
    readonly capacity: number;

    constructor(capacity: number = BSA_BUFFER_LENGTH) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.buffer = new Float64Array(capacity).fill(NaN);
    }

    /**
     * Evict the oldest value and append `value` as the newest - O(1)
     */
    push(value: number): void {
        this.buffer[this.head] = value;
        this.head = (this.head + 1) % this.capacity;
    }

    /**
     * Evict the `count` oldest values and append `count` NaN placeholders.
     * Counts beyond the capacity blank the whole buffer.
     */
    shiftWithGap(count: number): void {
        if (count <= 0) return;
        if (count >= this.capacity) {
            this.buffer.fill(NaN);
            this.head = 0;
            return;
        }
        for (let i = 0; i < count; i++) {
            this.push(NaN);
        }
    }

    /**
     * Replace the whole contents, oldest-first.
     */
    load(values: ArrayLike<number>): void {
        if (values.length !== this.capacity) {
            throw new RangeError(`Expected ${this.capacity} values, got ${values.length}`);
        }
        this.buffer.set(values);
        this.head = 0;
    }

    /**
     * Independent copy in chronological order (oldest first)
     */
    toArray(): Float64Array {
        const out = new Float64Array(this.capacity);
        out.set(this.buffer.subarray(this.head));
        out.set(this.buffer.subarray(0, this.head), this.capacity - this.head);
        return out;
    }

    /**
     * Most recent value - O(1)
     */
    getLatest(): number {
        const index = this.head === 0 ? this.capacity - 1 : this.head - 1;
        return this.buffer[index];
    }

    get length(): number {
        return this.capacity;
    }

    /**
     * Blank every slot - O(n)
     */
    clear(): void {
        this.buffer.fill(NaN);
        this.head = 0;
    }
}
