import { describe, it, expect } from 'vitest';
import { GREETING_BYTES, RxAccumulator, find_sequence } from '../stream';

function bytes(text: string): number[] {
  return Array.from(Buffer.from(text, 'latin1'));
}

describe('find_sequence', () => {
  it('finds the first occurrence', () => {
    expect(find_sequence([1, 2, 3, 2, 3], [2, 3])).toBe(1);
  });

  it('returns -1 when absent or cut short', () => {
    expect(find_sequence([1, 2, 3], [3, 4])).toBe(-1);
  });

  it('matches an empty needle at 0', () => {
    expect(find_sequence([9], [])).toBe(0);
  });
});

describe('RxAccumulator', () => {
  it('has the greeting bytes for "start"', () => {
    expect(GREETING_BYTES).toEqual([0x73, 0x74, 0x61, 0x72, 0x74]);
  });

  it('drops everything up to and including the greeting', () => {
    const rx = new RxAccumulator();
    rx.push(bytes('\x00\xffstartAB'));
    expect(rx.consume_greeting()).toBe(true);
    expect(Array.from(rx.take_all())).toEqual([0x41, 0x42]);
  });

  it('keeps bytes when the greeting is incomplete', () => {
    const rx = new RxAccumulator();
    rx.push(bytes('sta'));
    expect(rx.consume_greeting()).toBe(false);
    expect(rx.length).toBe(3);

    rx.push(bytes('rt'));
    expect(rx.consume_greeting()).toBe(true);
    expect(rx.length).toBe(0);
  });

  it('takes bytes from the front', () => {
    const rx = new RxAccumulator();
    rx.push([1, 2, 3]);
    expect(Array.from(rx.take(2))).toEqual([1, 2]);
    expect(Array.from(rx.take(10))).toEqual([3]);
    expect(rx.length).toBe(0);
  });

  it('stores only the low 8 bits', () => {
    const rx = new RxAccumulator();
    rx.push([0x1ff]);
    expect(Array.from(rx.take_all())).toEqual([0xff]);
  });

  it('clear empties the buffer', () => {
    const rx = new RxAccumulator();
    rx.push([1, 2]);
    rx.clear();
    expect(rx.length).toBe(0);
  });
});
