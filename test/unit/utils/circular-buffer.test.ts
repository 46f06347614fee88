import { describe, it, expect } from 'vitest';
import { CircularBuffer } from '../../../src/utils/circular-buffer.js';

describe('CircularBuffer', () => {
  it('rejects capacities that are not positive integers', () => {
    expect(() => new CircularBuffer(0)).toThrow(RangeError);
    expect(() => new CircularBuffer(2.5)).toThrow('capacity must be an integer >= 1, got 2.5');
  });

  it('starts empty', () => {
    const buf = new CircularBuffer<number>(4);
    expect(buf.length).toBe(0);
    expect(buf.isFull).toBe(false);
    expect(buf.toArray()).toEqual([]);
  });

  it('keeps insertion order until full', () => {
    const buf = new CircularBuffer<number>(3);
    expect(buf.push(1)).toBeUndefined();
    buf.push(2);
    buf.push(3);
    expect(buf.isFull).toBe(true);
    expect(buf.toArray()).toEqual([1, 2, 3]);
  });

  it('overwrites the oldest entry and returns it', () => {
    const buf = new CircularBuffer<number>(3);
    [1, 2, 3].forEach((n) => buf.push(n));
    expect(buf.push(4)).toBe(1);
    expect(buf.push(5)).toBe(2);
    expect(buf.length).toBe(3);
    expect(buf.toArray()).toEqual([3, 4, 5]);
  });

  it('survives many wrap-arounds', () => {
    const buf = new CircularBuffer<number>(3);
    for (let i = 1; i <= 8; i++) buf.push(i);
    expect(buf.toArray()).toEqual([6, 7, 8]);
  });

  it('reduces oldest to newest', () => {
    const buf = new CircularBuffer<string>(2);
    ['a', 'b', 'c'].forEach((s) => buf.push(s));
    expect(buf.reduce((acc, s) => acc + s, '>')).toBe('>bc');
  });

  it('works with a capacity of one', () => {
    const buf = new CircularBuffer<number>(1);
    buf.push(1);
    expect(buf.push(2)).toBe(1);
    expect(buf.toArray()).toEqual([2]);
  });
});
