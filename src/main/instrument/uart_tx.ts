/**
 * Serial transmitter model.
 *
 * Stands in for the device's UART output. The boot greeting is queued at
 * reset and always goes out first; a byte requested by the controller is
 * held in a one-deep slot until the line is free. Each byte keeps the
 * line busy for `ticks_per_byte` ticks and then appears on `out`. Only
 * controller bytes raise the one-tick `done` pulse.
 *
 * @module instrument/uart_tx
 */

import { BOOT_GREETING } from '../protocol/constants';

/** Byte currently being shifted out. */
interface InFlight {
  byte: number;
  from_controller: boolean;
  ticks_left: number;
}

/** Transmitter registers. */
export interface UartTxState {
  /** Greeting bytes not yet started. */
  greeting: readonly number[];
  /** Controller byte waiting for the line. */
  pending: number | null;
  in_flight: InFlight | null;
  /** One-tick pulse: a controller byte finished. */
  done: boolean;
  /** Byte that finished on this tick, or null. */
  out: number | null;
}

/** Per-tick transmitter inputs. */
export interface UartTxInputs {
  /** One-tick request from the controller. */
  request: boolean;
  /** Byte to send when `request` is set. */
  data: number;
}

/** Greeting text as wire bytes. */
export function greeting_bytes(greeting: string = BOOT_GREETING): number[] {
  return Array.from(Buffer.from(greeting, 'latin1'));
}

/**
 * Create a transmitter that will send `greeting` first.
 *
 * @param greeting - Boot message; pass '' for none.
 */
export function create_uart_tx(greeting: string = BOOT_GREETING): UartTxState {
  return {
    greeting: greeting_bytes(greeting),
    pending: null,
    in_flight: null,
    done: false,
    out: null
  };
}

/**
 * Advance the transmitter by one tick.
 *
 * @param ticks_per_byte - Line time of one byte (clamped to >= 1).
 */
export function tick_uart_tx(
  state: UartTxState,
  inputs: UartTxInputs,
  ticks_per_byte: number
): UartTxState {
  let greeting = state.greeting;
  let pending = inputs.request ? inputs.data & 0xFF : state.pending;
  let in_flight = state.in_flight;
  let done = false;
  let out: number | null = null;

  if (in_flight) {
    const ticks_left = in_flight.ticks_left - 1;
    if (ticks_left <= 0) {
      out = in_flight.byte;
      done = in_flight.from_controller;
      in_flight = null;
    } else {
      in_flight = { ...in_flight, ticks_left };
    }
  }

  if (!in_flight) {
    const line_ticks = Math.max(1, Math.floor(ticks_per_byte));
    if (greeting.length > 0) {
      in_flight = { byte: greeting[0], from_controller: false, ticks_left: line_ticks };
      greeting = greeting.slice(1);
    } else if (pending !== null) {
      in_flight = { byte: pending, from_controller: true, ticks_left: line_ticks };
      pending = null;
    }
  }

  return { greeting, pending, in_flight, done, out };
}
