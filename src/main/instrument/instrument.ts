/**
 * Capture instrument: the acquisition controller wired to its buffer,
 * divider and trigger detector, plus the transmitter and test-signal
 * generator it talks to.
 *
 * `step_instrument` is the single synchronous step. Every component reads
 * only the registers committed on the previous tick, so the order in
 * which they are evaluated below does not matter.
 *
 * The {@link Instrument} class owns one context, feeds queued host bytes
 * in one per tick, and reports transmitted bytes and state changes as
 * events.
 *
 * @module instrument/instrument
 */

import { EventEmitter } from 'events';
import { BOOT_GREETING, BUFFER_CAPACITY, DEFAULT_TICKS_PER_BYTE } from '../protocol/constants';
import { SessionState } from '../protocol/types';
import type { TriggerConfig } from '../protocol/types';
import { create_controller_state, tick_controller } from '../core/controller';
import type { ControllerState } from '../core/controller_types';
import { create_divider_state, tick_divider } from '../core/sample_divider';
import type { DividerState } from '../core/sample_divider';
import { create_trigger_state, tick_trigger } from '../core/trigger_detector';
import type { TriggerState } from '../core/trigger_detector';
import { create_ring_buffer, tick_ring_buffer } from '../core/ring_buffer';
import type { RingBufferState } from '../core/ring_buffer';
import { create_uart_tx, tick_uart_tx } from './uart_tx';
import type { UartTxState } from './uart_tx';
import { create_generator_state, tick_generator } from './pwm_generator';
import type { GeneratorState } from './pwm_generator';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Build-time parameters of a simulated instrument. */
export interface InstrumentOptions {
  /** Buffer capacity in samples. Defaults to 49152. */
  capacity?: number;
  /** Transmitter line time per byte. Defaults to 115200 baud at 27 MHz. */
  ticks_per_byte?: number;
  /** Reset sample divisor. */
  sample_divisor?: number;
  /** Reset trigger configuration. */
  trigger?: Partial<TriggerConfig>;
  /** Reset generator registers. */
  frequency_divider?: number;
  duty_high_cycles?: number;
  /** Boot message; '' disables it. */
  greeting?: string;
}

/** Every register of the instrument. */
export interface InstrumentContext {
  controller: ControllerState;
  divider: DividerState;
  trigger: TriggerState;
  buffer: RingBufferState;
  uart: UartTxState;
  generator: GeneratorState;
  /** Sample of the previous tick, for edge detection. */
  previous_sample: number;
  ticks_per_byte: number;
  /** Ticks elapsed since reset. */
  tick: number;
}

/** External inputs of one tick. */
export interface TickInputs {
  /** Input vector, one bit per channel. */
  sample: number;
  /** Host byte with its one-tick valid pulse. */
  rx_byte?: number | null;
}

/** External outputs of one tick. */
export interface TickOutputs {
  /** Byte that finished on the serial line this tick. */
  tx_byte: number | null;
  /** Diagnostic session-state code. */
  state: SessionState;
  /** Test-signal generator output level. */
  test_signal: boolean;
}

/** Result of {@link step_instrument}. */
export interface InstrumentStep {
  context: InstrumentContext;
  outputs: TickOutputs;
}

// ---------------------------------------------------------------------------
// Functional core
// ---------------------------------------------------------------------------

/** Create an instrument context in its reset state. */
export function create_instrument_context(options: InstrumentOptions = {}): InstrumentContext {
  const controller = create_controller_state({
    trigger: options.trigger,
    sample_divisor: options.sample_divisor,
    frequency_divider: options.frequency_divider,
    duty_high_cycles: options.duty_high_cycles
  });

  return {
    controller,
    divider: create_divider_state(controller.sample_divisor),
    trigger: create_trigger_state(),
    buffer: create_ring_buffer(options.capacity ?? BUFFER_CAPACITY),
    uart: create_uart_tx(options.greeting ?? BOOT_GREETING),
    generator: create_generator_state(controller.frequency_divider, controller.duty_high_cycles),
    previous_sample: 0,
    ticks_per_byte: options.ticks_per_byte ?? DEFAULT_TICKS_PER_BYTE,
    tick: 0
  };
}

/**
 * Advance every component by one tick.
 *
 * @param ctx - Registers committed at the end of the previous tick.
 * @param inputs - Sample vector and optional host byte for this tick.
 */
export function step_instrument(ctx: InstrumentContext, inputs: TickInputs): InstrumentStep {
  const sample = inputs.sample & 0xFF;
  const ctl = ctx.controller;

  const { state: controller, buffer: control } = tick_controller(ctl, {
    rx_byte: inputs.rx_byte ?? null,
    trigger_detected: ctx.trigger.detected,
    divider_pulse: ctx.divider.pulse,
    buffer_full: ctx.buffer.full,
    buffer_empty: ctx.buffer.empty,
    sample_count: ctx.buffer.sample_count,
    tx_done: ctx.uart.done
  });

  const buffer = tick_ring_buffer(ctx.buffer, {
    write: control.write,
    write_data: sample,
    read: control.read,
    clear: control.clear
  });

  const divider = tick_divider(ctx.divider, {
    update: ctl.divider_update,
    divisor: ctl.sample_divisor
  });

  const trigger = tick_trigger(ctx.trigger, {
    current: sample,
    previous: ctx.previous_sample,
    config: ctl.trigger
  });

  const generator = tick_generator(ctx.generator, {
    update: ctl.generator_update,
    frequency_divider: ctl.frequency_divider,
    duty_high_cycles: ctl.duty_high_cycles
  });

  const uart = tick_uart_tx(
    ctx.uart,
    { request: ctl.tx_request, data: ctx.buffer.read_data },
    ctx.ticks_per_byte
  );

  const context: InstrumentContext = {
    controller,
    divider,
    trigger,
    buffer,
    uart,
    generator,
    previous_sample: sample,
    ticks_per_byte: ctx.ticks_per_byte,
    tick: ctx.tick + 1
  };

  return {
    context,
    outputs: {
      tx_byte: uart.out,
      state: controller.phase.state,
      test_signal: generator.level
    }
  };
}

// ---------------------------------------------------------------------------
// Instrument
// ---------------------------------------------------------------------------

/**
 * Events emitted by {@link Instrument}.
 *
 * - `'tx'`: a byte finished on the serial line.
 * - `'state_change'`: the session state changed (new, previous).
 */
export interface InstrumentEvents {
  tx: (byte: number) => void;
  state_change: (state: SessionState, previous: SessionState) => void;
}

/**
 * Stateful wrapper around {@link step_instrument}.
 *
 * Usage:
 * ```ts
 * const inst = new Instrument({ capacity: 1024 });
 * inst.on('tx', (byte) => { ... });
 * inst.send(Uint8Array.of(CMD_START));
 * for (let i = 0; i < 10_000; i++) inst.step(read_pins());
 * ```
 */
export class Instrument extends EventEmitter {
  private readonly options: InstrumentOptions;
  private context: InstrumentContext;
  private rx_queue: number[] = [];
  private last_outputs: TickOutputs;

  constructor(options: InstrumentOptions = {}) {
    super();
    this.options = { ...options };
    this.context = create_instrument_context(this.options);
    this.last_outputs = this._initial_outputs();
  }

  /** Registers committed by the most recent tick. */
  get_context(): Readonly<InstrumentContext> {
    return this.context;
  }

  /** Current session state. */
  get_state(): SessionState {
    return this.context.controller.phase.state;
  }

  /** Outputs of the most recent tick. */
  get_outputs(): TickOutputs {
    return { ...this.last_outputs };
  }

  /** Host bytes waiting to be delivered. */
  pending_rx(): number {
    return this.rx_queue.length;
  }

  /** Queue host bytes; one is delivered per tick. */
  send(data: Uint8Array): void {
    for (const byte of data) {
      this.rx_queue.push(byte);
    }
  }

  /**
   * Run one tick with the given input vector.
   *
   * @param sample - Channel levels for this tick.
   */
  step(sample: number): TickOutputs {
    const rx_byte = this.rx_queue.length > 0 ? this.rx_queue.shift() ?? null : null;
    const previous = this.context.controller.phase.state;

    const { context, outputs } = step_instrument(this.context, { sample, rx_byte });
    this.context = context;
    this.last_outputs = outputs;

    if (outputs.tx_byte !== null) {
      this.emit('tx', outputs.tx_byte);
    }
    if (outputs.state !== previous) {
      this.emit('state_change', outputs.state, previous);
    }

    return outputs;
  }

  /** Return every register to its reset value and drop queued host bytes. */
  reset(): void {
    this.context = create_instrument_context(this.options);
    this.rx_queue = [];
    this.last_outputs = this._initial_outputs();
  }

  private _initial_outputs(): TickOutputs {
    return {
      tx_byte: null,
      state: this.context.controller.phase.state,
      test_signal: this.context.generator.level
    };
  }
}
