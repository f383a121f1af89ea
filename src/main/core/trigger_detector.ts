/**
 * Trigger detector.
 *
 * Evaluates edge and pattern conditions over the masked channel set on
 * every tick. The result is registered, so a condition present in the
 * sample of tick N is reported on tick N + 1. Nothing is latched: a
 * condition that keeps holding keeps firing.
 *
 * @module core/trigger_detector
 */

import { TriggerType } from '../protocol/types';
import type { TriggerConfig } from '../protocol/types';

/** Detector output register. */
export interface TriggerState {
  detected: boolean;
}

/** Per-tick detector inputs. */
export interface TriggerInputs {
  /** Sample vector of this tick. */
  current: number;
  /** Sample vector of the previous tick. */
  previous: number;
  config: TriggerConfig;
}

/**
 * Combinational trigger evaluation for one pair of samples.
 *
 * @returns True when the configured condition holds.
 */
export function evaluate_trigger(
  current: number,
  previous: number,
  config: TriggerConfig
): boolean {
  const cur = current & 0xFF;
  const prev = previous & 0xFF;
  const mask = config.mask & 0xFF;

  const rising = cur & ~prev & 0xFF;
  const falling = ~cur & prev & 0xFF;

  switch (config.type) {
    case TriggerType.RisingEdge:
      return (rising & mask) !== 0;
    case TriggerType.FallingEdge:
      return (falling & mask) !== 0;
    case TriggerType.PatternMatch:
      return (cur & mask) === (config.pattern & mask);
    case TriggerType.EdgeEither:
      return ((rising | falling) & mask) !== 0;
    default:
      return false;
  }
}

/** Detector registers in their reset state. */
export function create_trigger_state(): TriggerState {
  return { detected: false };
}

/** Advance the detector by one tick. */
export function tick_trigger(_state: TriggerState, inputs: TriggerInputs): TriggerState {
  return { detected: evaluate_trigger(inputs.current, inputs.previous, inputs.config) };
}
