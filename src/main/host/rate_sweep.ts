/**
 * Sample-rate sweep.
 *
 * Waits for the boot greeting once, then runs one capture per rate:
 * load the divisor, START, sample for `dwell_ms`, STOP, receive. Each
 * step reports the divisor, the rate it yields and what came back.
 *
 * @module host/rate_sweep
 */

import {
  BUFFER_CAPACITY,
  GREETING_TIMEOUT_MS,
  SWEEP_DWELL_MS,
  SWEEP_RATES,
  SWEEP_RECEIVE_TIMEOUT_MS
} from '../protocol/constants';
import type { SweepRate } from '../protocol/constants';
import type { RegisterSetting } from '../protocol/rate_calc';
import type { CaptureLink, CaptureResult, ReceiveOptions } from '../transport/link_types';
import { run_capture } from './capture_session';

export interface RateSweepOptions {
  /** Sampling time per rate before STOP. Defaults to 2 s. */
  dwell_ms?: number;
  /** Bytes to wait for per rate. Defaults to the buffer capacity. */
  expected_bytes?: number;
  greeting_timeout_ms?: number;
  /** Receive limits per rate. Defaults to a 5 s total timeout. */
  receive?: ReceiveOptions;
  /** Called as each rate finishes. */
  on_step?: (step: SweepStep) => void;
}

/** Outcome of one rate. */
export interface SweepStep extends CaptureResult {
  rate: SweepRate;
  setting: RegisterSetting;
  /** Number of different byte values received. */
  distinct_values: number;
}

export interface SweepReport {
  greeting: boolean;
  steps: SweepStep[];
}

/**
 * Pick the rates to sweep.
 *
 * @param index - Position in {@link SWEEP_RATES}; all rates when omitted.
 * @returns The selection, or null when the index is out of range.
 */
export function select_sweep_rates(index?: number): SweepRate[] | null {
  if (index === undefined) return [...SWEEP_RATES];
  if (!Number.isInteger(index) || index < 0 || index >= SWEEP_RATES.length) return null;
  return [SWEEP_RATES[index]];
}

/**
 * Capture once at each rate, in order.
 *
 * @param link - Serial or simulated link.
 * @param rates - Rates to capture at.
 */
export async function run_rate_sweep(
  link: CaptureLink,
  rates: readonly SweepRate[] = SWEEP_RATES,
  options: RateSweepOptions = {}
): Promise<SweepReport> {
  const greeting = await link.wait_for_greeting(options.greeting_timeout_ms ?? GREETING_TIMEOUT_MS);
  const steps: SweepStep[] = [];

  for (const rate of rates) {
    const report = await run_capture(link, {
      sample_rate_hz: rate.hz,
      stop_after_ms: options.dwell_ms ?? SWEEP_DWELL_MS,
      expected_bytes: options.expected_bytes ?? BUFFER_CAPACITY,
      skip_greeting: true,
      receive: options.receive ?? { timeout_ms: SWEEP_RECEIVE_TIMEOUT_MS }
    });

    const setting = report.settings.sample_rate;
    if (!setting) {
      throw new Error(`rate_sweep: no sample rate setting for ${rate.label}`);
    }

    const step: SweepStep = {
      data: report.data,
      complete: report.complete,
      reason: report.reason,
      rate,
      setting,
      distinct_values: new Set(report.data).size
    };
    steps.push(step);
    options.on_step?.(step);
  }

  return { greeting, steps };
}
