/**
 * Capture analysis: per-channel bit streams, signal frequency and duty.
 *
 * @module analysis/channels
 */

import { CHANNEL_COUNT } from '../protocol/constants';

/** Edges considered when estimating a period. */
const MAX_EDGES = 20;

/** Summary of one channel of a capture. */
export interface ChannelSummary {
  channel: number;
  /** Number of level changes. */
  transitions: number;
  /** Percentage of samples that are high, or null for an empty capture. */
  duty_percent: number | null;
  /** Estimated frequency, or null when there are too few edges. */
  frequency_hz: number | null;
}

/**
 * Split capture bytes into one 0/1 list per channel (bit i = channel i).
 */
export function split_channels(data: Uint8Array, channel_count: number = CHANNEL_COUNT): number[][] {
  const channels: number[][] = Array.from({ length: channel_count }, () => []);
  for (const byte of data) {
    for (let ch = 0; ch < channel_count; ch++) {
      channels[ch].push((byte >> ch) & 1);
    }
  }
  return channels;
}

/** Differences between consecutive entries, at most MAX_EDGES - 1 of them. */
function spacings(positions: number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < Math.min(positions.length, MAX_EDGES); i++) {
    out.push(positions[i] - positions[i - 1]);
  }
  return out;
}

/**
 * Estimate a channel's frequency from its edges.
 *
 * Uses rising-to-rising periods, then falling-to-falling, then any two
 * adjacent edges (doubling the spacing between opposite edges).
 *
 * @returns Frequency in Hz, or null with fewer than two edges.
 */
export function calculate_signal_frequency(channel: number[], sample_rate_hz: number): number | null {
  if (channel.length < 2) return null;

  const edges: number[] = [];
  const rising_flags: boolean[] = [];
  for (let i = 1; i < channel.length; i++) {
    if (channel[i] !== channel[i - 1]) {
      edges.push(i);
      rising_flags.push(channel[i] > channel[i - 1]);
    }
  }
  if (edges.length < 2) return null;

  let periods = spacings(edges.filter((_, i) => rising_flags[i]));

  if (periods.length < 2) {
    const falling = spacings(edges.filter((_, i) => !rising_flags[i]));
    if (falling.length > 0) periods = falling;
  }

  if (periods.length < 2) {
    periods = [];
    for (let i = 1; i < Math.min(edges.length, MAX_EDGES); i++) {
      const gap = edges[i] - edges[i - 1];
      periods.push(rising_flags[i] !== rising_flags[i - 1] ? gap * 2 : gap);
    }
  }

  if (periods.length === 0) return null;

  const avg_period_samples = periods.reduce((a, b) => a + b, 0) / periods.length;
  if (avg_period_samples <= 0) return null;
  return sample_rate_hz / avg_period_samples;
}

/**
 * Percentage of samples that are high.
 *
 * @returns 0-100, or null for an empty channel.
 */
export function calculate_duty_cycle(channel: number[]): number | null {
  if (channel.length === 0) return null;
  const high = channel.reduce((a, b) => a + b, 0);
  return (high / channel.length) * 100;
}

/** Count level changes in a channel. */
export function count_transitions(channel: number[]): number {
  let n = 0;
  for (let i = 1; i < channel.length; i++) {
    if (channel[i] !== channel[i - 1]) n++;
  }
  return n;
}

/** Summarise every channel of a capture. */
export function summarize_capture(data: Uint8Array, sample_rate_hz: number): ChannelSummary[] {
  return split_channels(data).map((bits, channel) => ({
    channel,
    transitions: count_transitions(bits),
    duty_percent: calculate_duty_cycle(bits),
    frequency_hz: calculate_signal_frequency(bits, sample_rate_hz)
  }));
}
