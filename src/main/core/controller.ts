/**
 * Acquisition controller.
 *
 * The orchestrating state machine of the capture engine. It decodes host
 * command bytes, arms and runs captures, and streams the buffer back to
 * the host, one tick at a time.
 *
 * State transitions:
 *   IDLE --> ARMED               on START
 *   IDLE --> CONFIG              on CONFIG / TRIGGER_CONFIG
 *   IDLE --> SET_PARAMETER       on SET_FREQUENCY / SET_DUTY_CYCLE
 *   IDLE --> SET_SAMPLE_RATE     on SET_SAMPLE_RATE
 *   CONFIG --> IDLE              next tick, no payload consumed
 *   ARMED --> SAMPLING           mask empty, or trigger detected
 *   ARMED --> SET_*              on a parameter command (capture abandoned)
 *   SAMPLING --> READY           on STOP, or buffer full
 *   SAMPLING --> SET_*           on a parameter command (capture abandoned)
 *   READY --> TRANSMIT           next tick
 *   TRANSMIT --> IDLE            after the last byte is reported sent
 *   SET_* --> IDLE               after the 4th payload byte
 *
 * A parameter load never returns to the state it interrupted; capture
 * must be restarted with START.
 *
 * @module core/controller
 */

import {
  ALL_CHANNELS_MASK,
  CMD_CONFIG,
  CMD_SET_DUTY_CYCLE,
  CMD_SET_FREQUENCY,
  CMD_SET_SAMPLE_RATE,
  CMD_START,
  CMD_STOP,
  CMD_TRIGGER_CONFIG,
  DEFAULT_DUTY_HIGH_CYCLES,
  DEFAULT_FREQUENCY_DIVIDER,
  DEFAULT_SAMPLE_DIVISOR,
  PARAMETER_PAYLOAD_SIZE
} from '../protocol/constants';
import { SessionState, TriggerType } from '../protocol/types';
import type {
  BufferControl,
  ControllerInputs,
  ControllerOptions,
  ControllerPhase,
  ControllerState,
  ControllerStep,
  ParameterLoad
} from './controller_types';

const IDLE: ControllerPhase = { state: SessionState.Idle };
const CONFIG: ControllerPhase = { state: SessionState.Config };
const ARMED: ControllerPhase = { state: SessionState.Armed };
const SAMPLING: ControllerPhase = { state: SessionState.Sampling };
const READY: ControllerPhase = { state: SessionState.Ready };
const TRANSMIT: ControllerPhase = { state: SessionState.Transmit };

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Create controller registers in their reset state.
 *
 * Trigger reset values default to all channels, rising edge, pattern 0.
 */
export function create_controller_state(options: ControllerOptions = {}): ControllerState {
  return {
    phase: IDLE,
    trigger: {
      mask: (options.trigger?.mask ?? ALL_CHANNELS_MASK) & 0xFF,
      type: options.trigger?.type ?? TriggerType.RisingEdge,
      pattern: (options.trigger?.pattern ?? 0) & 0xFF
    },
    tx_sent: 0,
    tx_total: 0,
    frequency_divider: (options.frequency_divider ?? DEFAULT_FREQUENCY_DIVIDER) >>> 0,
    duty_high_cycles: (options.duty_high_cycles ?? DEFAULT_DUTY_HIGH_CYCLES) >>> 0,
    sample_divisor: (options.sample_divisor ?? DEFAULT_SAMPLE_DIVISOR) >>> 0,
    generator_update: false,
    divider_update: false,
    tx_request: false
  };
}

// ---------------------------------------------------------------------------
// Derived signals
// ---------------------------------------------------------------------------

/** True while a transmit run should hand the next byte to the transmitter. */
function transmit_read(state: ControllerState, inputs: ControllerInputs): boolean {
  if (state.phase.state !== SessionState.Transmit) return false;
  if (state.tx_sent >= state.tx_total) return false;

  const first_byte = state.tx_sent === 0 && !inputs.buffer_empty;
  return first_byte || inputs.tx_done;
}

/**
 * Decode the buffer control signals for this tick.
 *
 * The write enable is gated by the divider pulse here, so one sample is
 * accepted per pulse while sampling.
 */
export function buffer_control(state: ControllerState, inputs: ControllerInputs): BufferControl {
  const phase = state.phase.state;
  return {
    write: phase === SessionState.Sampling && !inputs.buffer_full && inputs.divider_pulse,
    read: transmit_read(state, inputs),
    clear: phase === SessionState.Armed
  };
}

// ---------------------------------------------------------------------------
// Command decoding
// ---------------------------------------------------------------------------

/** Phase entered when a parameter command arrives, or null for other bytes. */
function begin_parameter_load(byte: number): ControllerPhase | null {
  switch (byte) {
    case CMD_SET_FREQUENCY:
      return { state: SessionState.SetParameter, target: 'frequency', bytes_received: 0, accumulator: 0 };
    case CMD_SET_DUTY_CYCLE:
      return { state: SessionState.SetParameter, target: 'duty_cycle', bytes_received: 0, accumulator: 0 };
    case CMD_SET_SAMPLE_RATE:
      return { state: SessionState.SetSampleRate, bytes_received: 0, accumulator: 0 };
    default:
      return null;
  }
}

/** Phase entered from IDLE for a command byte, or null when unrecognised. */
function decode_idle_command(byte: number): ControllerPhase | null {
  switch (byte) {
    case CMD_START:
      return ARMED;
    case CMD_CONFIG:
    case CMD_TRIGGER_CONFIG:
      return CONFIG;
    default:
      return begin_parameter_load(byte);
  }
}

/** Fold one payload byte into a load. */
function accumulate(load: ParameterLoad, byte: number): ParameterLoad {
  const shift = 8 * load.bytes_received;
  return {
    bytes_received: load.bytes_received + 1,
    accumulator: (load.accumulator | ((byte & 0xFF) << shift)) >>> 0
  };
}

// ---------------------------------------------------------------------------
// Step
// ---------------------------------------------------------------------------

/**
 * Advance the controller by one tick.
 *
 * @param state - Registers committed at the end of the previous tick.
 * @param inputs - Signals sampled on this tick.
 * @returns The next registers and the buffer control for this tick.
 */
export function tick_controller(state: ControllerState, inputs: ControllerInputs): ControllerStep {
  const buffer = buffer_control(state, inputs);
  const rx = inputs.rx_byte === null ? null : inputs.rx_byte & 0xFF;

  const next: ControllerState = {
    ...state,
    generator_update: false,
    divider_update: false,
    tx_request: false
  };

  const phase = state.phase;

  switch (phase.state) {
    case SessionState.Idle: {
      if (rx !== null) {
        next.phase = decode_idle_command(rx) ?? IDLE;
      }
      break;
    }

    case SessionState.Config:
      // Trigger reconfiguration has no payload format; nothing is read.
      next.phase = IDLE;
      break;

    case SessionState.Armed: {
      next.tx_sent = 0;
      next.tx_total = 0;

      const load = rx !== null ? begin_parameter_load(rx) : null;
      if (load) {
        next.phase = load;
      } else if (state.trigger.mask === 0 || inputs.trigger_detected) {
        next.phase = SAMPLING;
      }
      break;
    }

    case SessionState.Sampling: {
      const load = rx !== null ? begin_parameter_load(rx) : null;
      if (load) {
        next.phase = load;
      } else if (rx === CMD_STOP || inputs.buffer_full) {
        next.tx_total = inputs.sample_count;
        next.phase = READY;
      }
      break;
    }

    case SessionState.Ready:
      next.tx_sent = 0;
      next.phase = TRANSMIT;
      break;

    case SessionState.Transmit: {
      if (buffer.read) {
        next.tx_sent = state.tx_sent + 1;
        next.tx_request = true;
      } else if (
        state.tx_sent >= state.tx_total &&
        (state.tx_total === 0 || inputs.tx_done)
      ) {
        next.tx_sent = 0;
        next.tx_total = 0;
        next.phase = IDLE;
      }
      break;
    }

    case SessionState.SetParameter: {
      if (rx === null) break;
      const load = accumulate(phase, rx);
      if (load.bytes_received < PARAMETER_PAYLOAD_SIZE) {
        next.phase = { ...phase, ...load };
        break;
      }
      if (phase.target === 'frequency') {
        next.frequency_divider = load.accumulator;
      } else {
        next.duty_high_cycles = load.accumulator;
      }
      next.generator_update = true;
      next.phase = IDLE;
      break;
    }

    case SessionState.SetSampleRate: {
      if (rx === null) break;
      const load = accumulate(phase, rx);
      if (load.bytes_received < PARAMETER_PAYLOAD_SIZE) {
        next.phase = { ...phase, ...load };
        break;
      }
      next.sample_divisor = load.accumulator;
      next.divider_update = true;
      next.phase = IDLE;
      break;
    }
  }

  return { state: next, buffer };
}

/** Diagnostic code of the current session state. */
export function session_state(state: ControllerState): SessionState {
  return state.phase.state;
}
