/**
 * In-process link to a simulated {@link Instrument}.
 *
 * Implements the same {@link CaptureLink} contract as the serial link, so
 * the capture session can run against the model. Device time only moves
 * inside `wait_for_greeting`, `receive_capture` and `pause`; every wait is
 * bounded by a tick budget instead of wall-clock time.
 *
 * By default the generator output is looped back to channel 0 and all
 * other channels read low.
 *
 * @module instrument/sim_link
 */

import { SYS_CLK_HZ } from '../protocol/constants';
import { RxAccumulator } from '../protocol/stream';
import type { CaptureLink, CaptureResult, ReceiveOptions } from '../transport/link_types';
import { Instrument } from './instrument';

/** Produces the input vector for a tick. */
export type SampleSource = (tick: number, test_signal: boolean) => number;

/** Simulation limits. */
export interface SimLinkOptions {
  /** Input vector per tick. Defaults to the generator on channel 0. */
  source?: SampleSource;
  /** Device ticks per millisecond of link time. Defaults to 27000. */
  ticks_per_ms?: number;
  /** Upper bound on ticks for one greeting wait or receive. */
  max_ticks?: number;
  /** Ticks without a new byte, once bytes have flowed, that end a receive. */
  idle_ticks?: number;
}

/** Default source: generator looped back to channel 0. */
export const loopback_source: SampleSource = (_tick, test_signal) => (test_signal ? 0x01 : 0x00);

const DEFAULT_MAX_TICKS = 200_000_000;
const DEFAULT_IDLE_TICKS = 1_000_000;

export class SimulatedLink implements CaptureLink {
  private readonly instrument: Instrument;
  private readonly source: SampleSource;
  private readonly ticks_per_ms: number;
  private readonly max_ticks: number;
  private readonly idle_ticks: number;
  private readonly rx = new RxAccumulator();

  constructor(instrument: Instrument, options: SimLinkOptions = {}) {
    this.instrument = instrument;
    this.source = options.source ?? loopback_source;
    this.ticks_per_ms = options.ticks_per_ms ?? SYS_CLK_HZ / 1000;
    this.max_ticks = options.max_ticks ?? DEFAULT_MAX_TICKS;
    this.idle_ticks = options.idle_ticks ?? DEFAULT_IDLE_TICKS;
  }

  send(data: Uint8Array): void {
    this.instrument.send(data);
  }

  /** Step until the greeting has been received, or the budget runs out. */
  async wait_for_greeting(timeout_ms?: number): Promise<boolean> {
    const budget = this._budget(timeout_ms);
    for (let i = 0; i < budget; i++) {
      if (this.rx.consume_greeting()) return true;
      this._tick();
    }
    return this.rx.consume_greeting();
  }

  /** Step until `expected` bytes arrived, the line went quiet, or the budget ran out. */
  async receive_capture(expected: number, options: ReceiveOptions = {}): Promise<CaptureResult> {
    const budget = this._budget(options.timeout_ms);
    const idle_limit =
      options.idle_timeout_ms !== undefined
        ? Math.max(1, Math.round(options.idle_timeout_ms * this.ticks_per_ms))
        : this.idle_ticks;

    let quiet = 0;
    for (let i = 0; i < budget; i++) {
      if (this.rx.length >= expected) {
        return { data: this.rx.take(expected), complete: true, reason: 'complete' };
      }

      const before = this.rx.length;
      this._tick();

      if (this.rx.length > before) {
        quiet = 0;
      } else if (this.rx.length > 0 && ++quiet >= idle_limit) {
        return { data: this.rx.take(expected), complete: false, reason: 'idle' };
      }
    }

    if (this.rx.length >= expected) {
      return { data: this.rx.take(expected), complete: true, reason: 'complete' };
    }
    return { data: this.rx.take(expected), complete: false, reason: 'timeout' };
  }

  /** Run the device for `ms` of link time. */
  async pause(ms: number): Promise<void> {
    const ticks = Math.round(ms * this.ticks_per_ms);
    for (let i = 0; i < ticks; i++) {
      this._tick();
    }
  }

  private _budget(timeout_ms: number | undefined): number {
    if (timeout_ms === undefined) return this.max_ticks;
    return Math.min(this.max_ticks, Math.round(timeout_ms * this.ticks_per_ms));
  }

  private _tick(): void {
    const ctx = this.instrument.get_context();
    const sample = this.source(ctx.tick, ctx.generator.level);
    const outputs = this.instrument.step(sample);
    if (outputs.tx_byte !== null) {
      this.rx.push([outputs.tx_byte]);
    }
  }
}
