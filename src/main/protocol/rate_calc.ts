/**
 * Register value calculations for sample rate, generator frequency and
 * duty cycle, plus parsing of the user-facing rate and duty strings.
 *
 * All register values are derived from the 27 MHz system clock.
 *
 * @module protocol/rate_calc
 */

import { PARAMETER_MAX, SAMPLE_RATE_PRESETS, SYS_CLK_HZ } from './constants';

/** A requested value, the register setting for it, and what it yields. */
export interface RegisterSetting {
  /** Requested value. */
  target: number;
  /** Value to load into the device register. */
  register: number;
  /** Value the device will actually produce. */
  actual: number;
  /** |actual - target|. */
  error: number;
  /** Error relative to target, in percent (0 for a non-positive target). */
  error_percent: number;
}

/** Clamp a register value to [1, 0xFFFFFFFF]. */
function clamp_register(value: number): number {
  if (!Number.isFinite(value)) return PARAMETER_MAX;
  return Math.max(1, Math.min(Math.floor(value), PARAMETER_MAX));
}

function setting(target: number, register: number, actual: number): RegisterSetting {
  const error = Math.abs(actual - target);
  return {
    target,
    register,
    actual,
    error,
    error_percent: target > 0 ? (error / target) * 100 : 0
  };
}

/**
 * Sample divisor for a target sample rate: floor(27 MHz / rate).
 *
 * @param rate_hz - Requested sample rate.
 */
export function sample_rate_setting(rate_hz: number): RegisterSetting {
  const divisor = clamp_register(SYS_CLK_HZ / rate_hz);
  return setting(rate_hz, divisor, SYS_CLK_HZ / divisor);
}

/**
 * Generator half-period divider for a target output frequency:
 * floor(27 MHz / f / 2).
 */
export function frequency_setting(frequency_hz: number): RegisterSetting {
  const divider = clamp_register(SYS_CLK_HZ / frequency_hz / 2);
  return setting(frequency_hz, divider, SYS_CLK_HZ / (divider * 2));
}

/**
 * Generator high time for a duty ratio at a given output frequency.
 *
 * The high time is kept within [1, period - 1] clock cycles.
 *
 * @param frequency_hz - Output frequency the period is derived from.
 * @param ratio - Duty ratio in [0, 1].
 * @returns The setting, or null when the period is shorter than two clock
 *   cycles (above 13.5 MHz) and no high time fits.
 */
export function duty_cycle_setting(frequency_hz: number, ratio: number): RegisterSetting | null {
  const period = Math.floor(SYS_CLK_HZ / frequency_hz);
  if (!(period >= 2)) return null;
  const high = Math.max(1, Math.min(Math.floor(period * ratio), period - 1));
  return setting(ratio, high, high / period);
}

/**
 * Parse a sample-rate string.
 *
 * Accepts presets ("27M", "13.5M", "100k", ...), numbers with an M, K or
 * HZ suffix, and plain numbers. Case-insensitive.
 *
 * @returns Rate in Hz, or null when the string is not a positive number.
 */
export function parse_rate(text: string): number | null {
  const s = text.trim().toUpperCase();
  if (s.length === 0) return null;

  const preset = SAMPLE_RATE_PRESETS[s];
  if (preset !== undefined) return preset;

  let scale = 1;
  let digits = s;
  if (s.endsWith('HZ')) {
    digits = s.slice(0, -2);
  } else if (s.endsWith('M')) {
    scale = 1_000_000;
    digits = s.slice(0, -1);
  } else if (s.endsWith('K')) {
    scale = 1_000;
    digits = s.slice(0, -1);
  }

  if (!/^\d+(\.\d+)?$/.test(digits.trim())) return null;
  const value = parseFloat(digits) * scale;
  return value > 0 ? value : null;
}

/**
 * Parse a duty-cycle string: "50", "50%" or "0.5".
 *
 * Values above 1 are taken as percentages. The result is clamped to
 * [0, 1].
 *
 * @returns Duty ratio, or null when the string is not a number.
 */
export function parse_duty(text: string): number | null {
  const s = text.trim().replace(/%$/, '').trim();
  if (!/^-?\d+(\.\d+)?$/.test(s)) return null;

  let value = parseFloat(s);
  if (value > 1) value /= 100;
  return Math.max(0, Math.min(value, 1));
}
