/**
 * Acquisition controller types.
 *
 * Session phase variants, the controller register record, per-tick
 * inputs, and the buffer requests derived from them.
 *
 * @module core/controller_types
 */

import { SessionState } from '../protocol/types';
import type { ParameterTarget, TriggerConfig } from '../protocol/types';

// ---------------------------------------------------------------------------
// Phase
// ---------------------------------------------------------------------------

/** Progress of a 4-byte little-endian parameter load. */
export interface ParameterLoad {
  /** Payload bytes consumed so far (0-3 while loading). */
  bytes_received: number;
  /** Bytes received so far, placed at their little-endian positions. */
  accumulator: number;
}

/** Loading the generator's frequency or duty-cycle register. */
export interface SetParameterPhase extends ParameterLoad {
  state: SessionState.SetParameter;
  target: ParameterTarget;
}

/** Loading the sample-rate divisor register. */
export interface SetSampleRatePhase extends ParameterLoad {
  state: SessionState.SetSampleRate;
}

/** States that carry no data of their own. */
export interface SimplePhase {
  state:
    | SessionState.Idle
    | SessionState.Config
    | SessionState.Armed
    | SessionState.Sampling
    | SessionState.Ready
    | SessionState.Transmit;
}

/** Current controller phase, discriminated on `state`. */
export type ControllerPhase = SimplePhase | SetParameterPhase | SetSampleRatePhase;

// ---------------------------------------------------------------------------
// Registers
// ---------------------------------------------------------------------------

/** Every register owned by the acquisition controller. */
export interface ControllerState {
  phase: ControllerPhase;
  trigger: TriggerConfig;
  /** Bytes handed to the transmitter in this transmit run. */
  tx_sent: number;
  /** Bytes to transmit, snapshotted when the capture ended. */
  tx_total: number;
  /** Generator half-period divider register. */
  frequency_divider: number;
  /** Generator high-time register, in clock cycles. */
  duty_high_cycles: number;
  /** Sample divisor register presented to the divider. */
  sample_divisor: number;
  /** One-tick pulse: generator registers changed. */
  generator_update: boolean;
  /** One-tick pulse: divider should adopt `sample_divisor`. */
  divider_update: boolean;
  /** One-tick pulse: transmit the buffer's registered read data. */
  tx_request: boolean;
}

/** Register reset values that may be chosen at construction. */
export interface ControllerOptions {
  trigger?: Partial<TriggerConfig>;
  sample_divisor?: number;
  frequency_divider?: number;
  duty_high_cycles?: number;
}

// ---------------------------------------------------------------------------
// Inputs / outputs
// ---------------------------------------------------------------------------

/** Signals the controller samples on one tick (previous-tick values). */
export interface ControllerInputs {
  /** Host byte with its one-tick valid pulse, or null when none arrived. */
  rx_byte: number | null;
  /** Registered trigger detector output. */
  trigger_detected: boolean;
  /** Registered divider sample-enable pulse. */
  divider_pulse: boolean;
  buffer_full: boolean;
  buffer_empty: boolean;
  sample_count: number;
  /** One-tick pulse: the transmitter finished the last controller byte. */
  tx_done: boolean;
}

/** Buffer control signals decoded from the controller state this tick. */
export interface BufferControl {
  write: boolean;
  read: boolean;
  clear: boolean;
}

/** Result of one controller tick. */
export interface ControllerStep {
  state: ControllerState;
  buffer: BufferControl;
}
