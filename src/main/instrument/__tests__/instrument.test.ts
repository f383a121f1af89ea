import { describe, it, expect, vi } from 'vitest';
import { Instrument, create_instrument_context, step_instrument } from '../instrument';
import { SessionState } from '../../protocol/types';
import {
  CMD_SET_FREQUENCY,
  CMD_SET_SAMPLE_RATE,
  CMD_START
} from '../../protocol/constants';

const GREETING = [0x73, 0x74, 0x61, 0x72, 0x74];

describe('create_instrument_context', () => {
  it('resets every component', () => {
    const ctx = create_instrument_context({ capacity: 16 });
    expect(ctx.controller.phase.state).toBe(SessionState.Idle);
    expect(ctx.buffer.capacity).toBe(16);
    expect(ctx.buffer.empty).toBe(true);
    expect(ctx.divider.divisor).toBe(270);
    expect(ctx.generator.frequency_divider).toBe(13500);
    expect(ctx.uart.greeting).toEqual(GREETING);
    expect(ctx.ticks_per_byte).toBe(2344);
    expect(ctx.tick).toBe(0);
  });

  it('passes reset values through to the divider and generator', () => {
    const ctx = create_instrument_context({ sample_divisor: 4, frequency_divider: 6, duty_high_cycles: 2 });
    expect(ctx.divider.divisor).toBe(4);
    expect(ctx.generator.frequency_divider).toBe(6);
    expect(ctx.generator.duty_high_cycles).toBe(2);
  });
});

describe('step_instrument', () => {
  it('leaves the input context untouched apart from buffer storage', () => {
    const ctx = create_instrument_context({ capacity: 4 });
    const { context } = step_instrument(ctx, { sample: 0x01, rx_byte: CMD_START });
    expect(ctx.tick).toBe(0);
    expect(ctx.controller.phase.state).toBe(SessionState.Idle);
    expect(context.tick).toBe(1);
    expect(context.controller.phase.state).toBe(SessionState.Armed);
    expect(context.previous_sample).toBe(0x01);
  });

  it('masks the sample to 8 channels', () => {
    const { context } = step_instrument(create_instrument_context(), { sample: 0x3ff });
    expect(context.previous_sample).toBe(0xff);
  });

  it('adopts a new sample divisor one tick after the load completes', () => {
    let ctx = create_instrument_context();
    for (const b of [CMD_SET_SAMPLE_RATE, 0x0a, 0x00, 0x00, 0x00]) {
      ctx = step_instrument(ctx, { sample: 0, rx_byte: b }).context;
    }
    expect(ctx.controller.sample_divisor).toBe(10);
    expect(ctx.controller.divider_update).toBe(true);
    expect(ctx.divider.divisor).toBe(270);

    ctx = step_instrument(ctx, { sample: 0 }).context;
    expect(ctx.divider).toEqual({ divisor: 10, counter: 0, pulse: true });
  });
});

describe('Instrument', () => {
  it('captures after a rising edge and streams the buffer in write order', () => {
    const inst = new Instrument({ capacity: 4, ticks_per_byte: 1, sample_divisor: 1 });
    const sent: number[] = [];
    const states: Array<[SessionState, SessionState]> = [];
    inst.on('tx', (b: number) => sent.push(b));
    inst.on('state_change', (s: SessionState, prev: SessionState) => states.push([s, prev]));

    inst.send(Uint8Array.of(CMD_START));
    for (let i = 0; i < 40; i++) inst.step(i & 0xff);

    expect(sent).toEqual([...GREETING, 3, 4, 5, 6]);
    expect(states).toEqual([
      [SessionState.Armed, SessionState.Idle],
      [SessionState.Sampling, SessionState.Armed],
      [SessionState.Ready, SessionState.Sampling],
      [SessionState.Transmit, SessionState.Ready],
      [SessionState.Idle, SessionState.Transmit]
    ]);
    expect(inst.get_state()).toBe(SessionState.Idle);
  });

  it('returns to idle on the tick after the last byte leaves the line', () => {
    const inst = new Instrument({ capacity: 4, ticks_per_byte: 1, sample_divisor: 1 });
    inst.send(Uint8Array.of(CMD_START));
    const trace: SessionState[] = [];
    for (let i = 0; i < 22; i++) trace.push(inst.step(i & 0xff).state);

    expect(trace[20]).toBe(SessionState.Transmit);
    expect(trace[21]).toBe(SessionState.Idle);
  });

  it('does not capture after a parameter load interrupts arming', () => {
    const inst = new Instrument({ capacity: 4, ticks_per_byte: 1, sample_divisor: 1 });
    const sent: number[] = [];
    inst.on('tx', (b: number) => sent.push(b));

    inst.send(Uint8Array.of(CMD_START, CMD_SET_FREQUENCY, 0x01, 0x00, 0x00, 0x00));
    for (let i = 0; i < 60; i++) inst.step(i & 1);

    expect(inst.get_state()).toBe(SessionState.Idle);
    expect(inst.get_context().controller.frequency_divider).toBe(1);
    expect(inst.get_context().generator.frequency_divider).toBe(1);
    expect(inst.get_context().buffer.sample_count).toBe(0);
    expect(sent).toEqual(GREETING);
  });

  it('delivers one queued host byte per tick', () => {
    const inst = new Instrument();
    inst.send(Uint8Array.of(0x03, 0x03, 0x03));
    expect(inst.pending_rx()).toBe(3);
    inst.step(0);
    expect(inst.pending_rx()).toBe(2);
  });

  it('reports the generator level as the test signal', () => {
    const inst = new Instrument({ frequency_divider: 1, duty_high_cycles: 1 });
    expect(inst.get_outputs().test_signal).toBe(false);
    expect(inst.step(0).test_signal).toBe(true);
    expect(inst.step(0).test_signal).toBe(false);
    expect(inst.get_outputs().test_signal).toBe(false);
  });

  it('does not emit state_change while the state holds', () => {
    const inst = new Instrument();
    const listener = vi.fn();
    inst.on('state_change', listener);
    for (let i = 0; i < 10; i++) inst.step(0);
    expect(listener).not.toHaveBeenCalled();
  });

  it('reset drops queued bytes and restores every register', () => {
    const inst = new Instrument({ capacity: 8 });
    inst.send(Uint8Array.of(CMD_START, CMD_START));
    inst.step(0);
    expect(inst.get_state()).toBe(SessionState.Armed);

    inst.reset();
    expect(inst.pending_rx()).toBe(0);
    expect(inst.get_state()).toBe(SessionState.Idle);
    expect(inst.get_context().tick).toBe(0);
    expect(inst.get_context().buffer.capacity).toBe(8);
  });
});
