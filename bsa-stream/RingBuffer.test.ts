import { BSA_BUFFER_LENGTH } from './constants';
import { RingBuffer } from './RingBuffer';

describe('RingBuffer', () => {
  it('starts full of NaN at the BSA buffer length', () => {
    const ring = new RingBuffer();
    const values = ring.toArray();

    expect(ring.length).toBe(BSA_BUFFER_LENGTH);
    expect(values).toHaveLength(2800);
    expect(values.every(Number.isNaN)).toBe(true);
  });

  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
    expect(() => new RingBuffer(2.5)).toThrow(RangeError);
  });

  it('evicts the oldest value on push', () => {
    const ring = new RingBuffer(4);
    [1, 2, 3, 4, 5].forEach((v) => ring.push(v));

    expect(Array.from(ring.toArray())).toEqual([2, 3, 4, 5]);
    expect(ring.getLatest()).toBe(5);
  });

  it('pads a gap with NaN and keeps order across the wrap point', () => {
    const ring = new RingBuffer(4);
    ring.load([1, 2, 3, 4]);

    ring.shiftWithGap(2);
    expect(Array.from(ring.toArray())).toEqual([3, 4, NaN, NaN]);

    ring.push(9);
    expect(Array.from(ring.toArray())).toEqual([4, NaN, NaN, 9]);
    expect(ring.getLatest()).toBe(9);
  });

  it('ignores non-positive gaps and blanks everything for gaps past the capacity', () => {
    const ring = new RingBuffer(3);
    ring.load([1, 2, 3]);

    ring.shiftWithGap(0);
    ring.shiftWithGap(-4);
    expect(Array.from(ring.toArray())).toEqual([1, 2, 3]);

    ring.shiftWithGap(10);
    expect(Array.from(ring.toArray())).toEqual([NaN, NaN, NaN]);

    ring.push(7);
    expect(Array.from(ring.toArray())).toEqual([NaN, NaN, 7]);
  });

  it('refuses to load the wrong number of values', () => {
    const ring = new RingBuffer(3);
    expect(() => ring.load([1, 2])).toThrow('Expected 3 values, got 2');
  });

  it('returns copies that do not alias the buffer', () => {
    const ring = new RingBuffer(2);
    ring.load([1, 2]);

    const copy = ring.toArray();
    copy[0] = 100;

    expect(Array.from(ring.toArray())).toEqual([1, 2]);
  });

  it('clears back to NaN', () => {
    const ring = new RingBuffer(2);
    ring.load([1, 2]);
    ring.clear();

    expect(Array.from(ring.toArray())).toEqual([NaN, NaN]);
  });
});
