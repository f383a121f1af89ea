/**
 * Sample-rate divider.
 *
 * Turns the system clock into a one-tick "sample enable" pulse every
 * `divisor` ticks. A divisor update takes effect on the tick it is
 * requested and pulses immediately, so a new rate never waits out the
 * remainder of the old period.
 *
 * @module core/sample_divider
 */

import { DEFAULT_SAMPLE_DIVISOR } from '../protocol/constants';

/** Divider registers. */
export interface DividerState {
  /** Ticks per pulse, always >= 1. */
  divisor: number;
  /** Ticks since the last pulse. */
  counter: number;
  /** Sample enable; true for exactly one tick per period. */
  pulse: boolean;
}

/** Per-tick divider inputs. */
export interface DividerInputs {
  /** One-shot request to adopt `divisor`. */
  update: boolean;
  /** Requested divisor (u32). Zero is promoted to one. */
  divisor: number;
}

/** Normalise a raw u32 divisor; 0 becomes 1. */
export function clamp_divisor(raw: number): number {
  const divisor = raw >>> 0;
  return divisor === 0 ? 1 : divisor;
}

/**
 * Create divider registers in their reset state.
 *
 * @param divisor - Reset divisor (default 270, i.e. 100 kHz at 27 MHz).
 */
export function create_divider_state(divisor: number = DEFAULT_SAMPLE_DIVISOR): DividerState {
  return {
    divisor: clamp_divisor(divisor),
    counter: 0,
    pulse: false
  };
}

/**
 * Advance the divider by one tick.
 *
 * @returns The next register values; `pulse` is the output for this tick.
 */
export function tick_divider(state: DividerState, inputs: DividerInputs): DividerState {
  if (inputs.update) {
    return { divisor: clamp_divisor(inputs.divisor), counter: 0, pulse: true };
  }

  if (state.divisor === 1) {
    return { divisor: 1, counter: 0, pulse: true };
  }

  if (state.counter >= state.divisor - 1) {
    return { divisor: state.divisor, counter: 0, pulse: true };
  }

  return { divisor: state.divisor, counter: state.counter + 1, pulse: false };
}
