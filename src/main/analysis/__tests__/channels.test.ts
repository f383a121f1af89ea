import { describe, it, expect } from 'vitest';
import {
  calculate_duty_cycle,
  calculate_signal_frequency,
  count_transitions,
  split_channels,
  summarize_capture
} from '../channels';

/** `periods` repetitions of `low` zeros followed by `high` ones. */
function square(low: number, high: number, periods: number): number[] {
  const out: number[] = [];
  for (let p = 0; p < periods; p++) {
    for (let i = 0; i < low; i++) out.push(0);
    for (let i = 0; i < high; i++) out.push(1);
  }
  return out;
}

describe('split_channels', () => {
  it('maps bit i of every byte to channel i', () => {
    expect(split_channels(Uint8Array.of(0b01, 0b10, 0b11), 2)).toEqual([
      [1, 0, 1],
      [0, 1, 1]
    ]);
  });

  it('splits into 8 channels by default', () => {
    const channels = split_channels(Uint8Array.of(0x80));
    expect(channels).toHaveLength(8);
    expect(channels[7]).toEqual([1]);
    expect(channels[0]).toEqual([0]);
  });
});

describe('calculate_signal_frequency', () => {
  it('uses rising-to-rising spacing', () => {
    expect(calculate_signal_frequency(square(2, 2, 5), 1000)).toBe(250);
  });

  it('handles an asymmetric duty cycle', () => {
    expect(calculate_signal_frequency(square(3, 1, 6), 400)).toBe(100);
  });

  it('doubles the spacing between opposite edges of a single pulse', () => {
    expect(calculate_signal_frequency([0, 1, 1, 0, 0], 100)).toBe(25);
  });

  it('returns null with fewer than two edges', () => {
    expect(calculate_signal_frequency([0, 0, 1, 1, 1], 1000)).toBeNull();
    expect(calculate_signal_frequency([1], 1000)).toBeNull();
  });
});

describe('calculate_duty_cycle', () => {
  it('returns the percentage of high samples', () => {
    expect(calculate_duty_cycle([1, 1, 0, 0])).toBe(50);
    expect(calculate_duty_cycle([1, 0, 0, 0])).toBe(25);
  });

  it('returns null for an empty channel', () => {
    expect(calculate_duty_cycle([])).toBeNull();
  });
});

describe('count_transitions', () => {
  it('counts level changes', () => {
    expect(count_transitions([0, 1, 1, 0, 1])).toBe(3);
    expect(count_transitions([1, 1, 1])).toBe(0);
  });
});

describe('summarize_capture', () => {
  it('summarises each channel', () => {
    const summary = summarize_capture(Uint8Array.of(0, 1, 0, 1), 100);
    expect(summary).toHaveLength(8);
    expect(summary[0]).toEqual({ channel: 0, transitions: 3, duty_percent: 50, frequency_hz: 50 });
    expect(summary[1]).toEqual({ channel: 1, transitions: 0, duty_percent: 0, frequency_hz: null });
  });
});
