import { describe, it, expect } from 'vitest';
import { create_uart_tx, greeting_bytes, tick_uart_tx } from '../uart_tx';
import type { UartTxInputs, UartTxState } from '../uart_tx';

const NO_REQUEST: UartTxInputs = { request: false, data: 0 };

/** Run ticks, applying `requests[i]` on tick i, and collect `out` and `done`. */
function run(
  state: UartTxState,
  ticks: number,
  ticks_per_byte: number,
  requests: Record<number, number> = {}
): { out: Array<number | null>; done: boolean[]; state: UartTxState } {
  const out: Array<number | null> = [];
  const done: boolean[] = [];
  let s = state;
  for (let i = 0; i < ticks; i++) {
    const data = requests[i];
    s = tick_uart_tx(s, data === undefined ? NO_REQUEST : { request: true, data }, ticks_per_byte);
    out.push(s.out);
    done.push(s.done);
  }
  return { out, done, state: s };
}

describe('greeting_bytes', () => {
  it('encodes the boot greeting', () => {
    expect(greeting_bytes()).toEqual([0x73, 0x74, 0x61, 0x72, 0x74]);
  });

  it('encodes an empty greeting as no bytes', () => {
    expect(greeting_bytes('')).toEqual([]);
  });
});

describe('tick_uart_tx', () => {
  it('sends the greeting first, one byte per line time', () => {
    const r = run(create_uart_tx('ab'), 5, 2);
    expect(r.out).toEqual([null, null, 0x61, null, 0x62]);
    expect(r.done).toEqual([false, false, false, false, false]);
  });

  it('holds a controller byte until the greeting has gone out', () => {
    const r = run(create_uart_tx('ab'), 8, 2, { 0: 0x55 });
    expect(r.out).toEqual([null, null, 0x61, null, 0x62, null, 0x55, null]);
    expect(r.done).toEqual([false, false, false, false, false, false, true, false]);
  });

  it('pulses done for exactly one tick per controller byte', () => {
    const r = run(create_uart_tx(''), 3, 1, { 0: 7 });
    expect(r.out).toEqual([null, 7, null]);
    expect(r.done).toEqual([false, true, false]);
  });

  it('treats a line time below one as one tick', () => {
    const r = run(create_uart_tx(''), 2, 0, { 0: 9 });
    expect(r.out).toEqual([null, 9]);
  });

  it('keeps only the low 8 bits of a requested byte', () => {
    const r = run(create_uart_tx(''), 2, 1, { 0: 0x1ab });
    expect(r.out[1]).toBe(0xab);
  });

  it('is idle once everything has been sent', () => {
    const r = run(create_uart_tx('a'), 4, 1);
    expect(r.state).toEqual({ greeting: [], pending: null, in_flight: null, done: false, out: null });
  });
});
