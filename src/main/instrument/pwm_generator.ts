/**
 * Test-signal generator model.
 *
 * A PWM output with period `2 * frequency_divider` ticks that is high for
 * the first `duty_high_cycles` ticks of each period (capped at the
 * period). The controller's update pulse loads both registers and
 * restarts the phase.
 *
 * @module instrument/pwm_generator
 */

import { DEFAULT_DUTY_HIGH_CYCLES, DEFAULT_FREQUENCY_DIVIDER } from '../protocol/constants';

/** Generator registers. */
export interface GeneratorState {
  frequency_divider: number;
  duty_high_cycles: number;
  /** Position within the current period. */
  phase: number;
  level: boolean;
}

/** Per-tick generator inputs, driven by the controller. */
export interface GeneratorInputs {
  /** One-tick pulse: load the two registers below and restart. */
  update: boolean;
  frequency_divider: number;
  duty_high_cycles: number;
}

/**
 * Create a generator at phase 0 with its output low.
 *
 * A divider of 0 is taken as 1.
 */
export function create_generator_state(
  frequency_divider: number = DEFAULT_FREQUENCY_DIVIDER,
  duty_high_cycles: number = DEFAULT_DUTY_HIGH_CYCLES
): GeneratorState {
  return {
    frequency_divider: Math.max(1, frequency_divider >>> 0),
    duty_high_cycles: duty_high_cycles >>> 0,
    phase: 0,
    level: false
  };
}

/** Output period in ticks. */
export function generator_period(state: GeneratorState): number {
  return 2 * state.frequency_divider;
}

/**
 * Advance the generator by one tick.
 *
 * The level for this tick comes from the phase after any update is
 * applied, so the first tick after a load is high for any non-zero duty.
 */
export function tick_generator(state: GeneratorState, inputs: GeneratorInputs): GeneratorState {
  const current = inputs.update
    ? create_generator_state(inputs.frequency_divider, inputs.duty_high_cycles)
    : state;

  const period = generator_period(current);
  const high = Math.min(current.duty_high_cycles, period);

  return {
    ...current,
    level: current.phase < high,
    phase: (current.phase + 1) % period
  };
}
