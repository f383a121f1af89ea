import { describe, it, expect, vi } from 'vitest';
import { run_rate_sweep, select_sweep_rates } from '../rate_sweep';
import type { SweepStep } from '../rate_sweep';
import { Instrument } from '../../instrument/instrument';
import { SimulatedLink } from '../../instrument/sim_link';
import type { SampleSource } from '../../instrument/sim_link';
import { SWEEP_RATES } from '../../protocol/constants';
import type { CaptureLink, CaptureResult, ReceiveOptions } from '../../transport/link_types';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Records every call in order and answers every receive with two bytes. */
class RecordingLink implements CaptureLink {
  log: string[] = [];

  wait_for_greeting = vi.fn(async (_timeout_ms?: number): Promise<boolean> => {
    this.log.push('greeting');
    return true;
  });

  receive_capture = vi.fn(
    async (_expected: number, _options?: ReceiveOptions): Promise<CaptureResult> => {
      this.log.push('receive');
      return { data: Uint8Array.of(7, 7), complete: false, reason: 'timeout' };
    }
  );

  pause = vi.fn(async (ms: number): Promise<void> => {
    this.log.push(`pause ${ms}`);
  });

  send(data: Uint8Array): void {
    this.log.push(`send ${Array.from(data).join(' ')}`);
  }
}

/** Sample vector equal to the tick number. */
const counter: SampleSource = (tick) => tick & 0xff;

/** Difference between neighbouring bytes, modulo 256. */
function steps(data: Uint8Array): number[] {
  const out: number[] = [];
  for (let i = 1; i < data.length; i++) out.push((data[i] - data[i - 1] + 256) % 256);
  return out;
}

// ---------------------------------------------------------------------------
// select_sweep_rates
// ---------------------------------------------------------------------------

describe('select_sweep_rates', () => {
  it('returns every rate, slowest first, without an index', () => {
    const rates = select_sweep_rates();
    expect(rates?.map((r) => r.hz)).toEqual([
      10_000, 50_000, 100_000, 500_000, 1_000_000, 10_000_000, 13_500_000, 27_000_000
    ]);
  });

  it('returns the one rate at an index', () => {
    expect(select_sweep_rates(2)).toEqual([SWEEP_RATES[2]]);
    expect(select_sweep_rates(7)?.[0].label).toBe('27MHz');
  });

  it('rejects an index outside the table', () => {
    expect(select_sweep_rates(8)).toBeNull();
    expect(select_sweep_rates(-1)).toBeNull();
    expect(select_sweep_rates(1.5)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// run_rate_sweep
// ---------------------------------------------------------------------------

describe('run_rate_sweep', () => {
  it('waits for the greeting once and runs START/STOP per rate', async () => {
    const link = new RecordingLink();
    const seen: SweepStep[] = [];

    const report = await run_rate_sweep(link, [SWEEP_RATES[0], SWEEP_RATES[7]], {
      on_step: (step) => seen.push(step)
    });

    expect(link.log).toEqual([
      'greeting',
      'send 7 140 10 0 0',
      'send 1',
      'pause 2000',
      'send 2',
      'receive',
      'send 7 1 0 0 0',
      'send 1',
      'pause 2000',
      'send 2',
      'receive'
    ]);
    expect(link.receive_capture).toHaveBeenCalledWith(49152, { timeout_ms: 5000 });

    expect(report.greeting).toBe(true);
    expect(report.steps.map((s) => s.setting.register)).toEqual([2700, 1]);
    expect(report.steps[0].setting.actual).toBe(10_000);
    expect(report.steps[0].reason).toBe('timeout');
    expect(report.steps[0].distinct_values).toBe(1);
    expect(seen).toEqual(report.steps);
  });

  it('captures at each rate on the simulated instrument', async () => {
    const inst = new Instrument({ capacity: 16, ticks_per_byte: 1 });
    const link = new SimulatedLink(inst, { source: counter, ticks_per_ms: 100 });

    const report = await run_rate_sweep(link, [SWEEP_RATES[6], SWEEP_RATES[7]], {
      dwell_ms: 5,
      expected_bytes: 16
    });

    expect(report.greeting).toBe(true);
    const [slow, fast] = report.steps;

    expect(slow.setting.register).toBe(2);
    expect(slow.setting.actual).toBe(13_500_000);
    expect(slow.complete).toBe(true);
    expect(slow.data).toHaveLength(16);
    expect(steps(slow.data)).toEqual(new Array(15).fill(2));
    expect(slow.distinct_values).toBe(16);

    expect(fast.setting.register).toBe(1);
    expect(fast.complete).toBe(true);
    expect(steps(fast.data)).toEqual(new Array(15).fill(1));
    expect(inst.get_context().divider.divisor).toBe(1);
  });

  it('reports a short capture when STOP comes before the buffer fills', async () => {
    const inst = new Instrument({ capacity: 1000, ticks_per_byte: 1 });
    const link = new SimulatedLink(inst, { source: counter, ticks_per_ms: 100 });

    const report = await run_rate_sweep(link, [SWEEP_RATES[7]], {
      dwell_ms: 1,
      expected_bytes: 1000,
      receive: { idle_timeout_ms: 1 }
    });

    const [step] = report.steps;
    expect(step.complete).toBe(false);
    expect(step.reason).toBe('idle');
    expect(step.data.length).toBeGreaterThan(0);
    expect(step.data.length).toBeLessThan(100);
    expect(steps(step.data).every((s) => s === 1)).toBe(true);
  });
});
