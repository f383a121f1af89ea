#!/usr/bin/env node
/**
 * logic-capture command-line entry point.
 *
 * @module cli
 */

import { writeFileSync } from 'fs';
import {
  BUFFER_CAPACITY,
  CAPTURE_TIMEOUT_MS,
  DEFAULT_BAUD_RATE,
  SWEEP_RECEIVE_TIMEOUT_MS
} from './protocol/constants';
import {
  build_set_duty_cycle,
  build_set_frequency,
  build_set_sample_rate
} from './protocol/command_builder';
import {
  duty_cycle_setting,
  frequency_setting,
  parse_duty,
  parse_rate,
  sample_rate_setting
} from './protocol/rate_calc';
import type { RegisterSetting } from './protocol/rate_calc';
import { SESSION_STATE_NAMES, SessionState } from './protocol/types';
import { LaUsb } from './transport/la_usb';
import { pick_port, scan_ports } from './transport/port_scanner';
import { Instrument } from './instrument/instrument';
import { SimulatedLink } from './instrument/sim_link';
import { run_capture } from './host/capture_session';
import type { CaptureOptions, CaptureReport } from './host/capture_session';
import { run_rate_sweep, select_sweep_rates } from './host/rate_sweep';
import type { RateSweepOptions, SweepReport, SweepStep } from './host/rate_sweep';
import type { CaptureLink } from './transport/link_types';
import { split_channels, summarize_capture } from './analysis/channels';
import { export_csv } from './analysis/csv_export';
import { export_vcd } from './analysis/vcd_export';
import { HELP_TEXT, parse_args, sweep_index_arg, validate_options } from './cli_args';
import type { CliOptions } from './cli_args';

/** Simulated buffer size when --capacity is not given. */
const SIM_DEFAULT_CAPACITY = 4096;

/** Simulated serial line time when --ticks-per-byte is not given. */
const SIM_DEFAULT_TICKS_PER_BYTE = 16;

/** Thrown for bad user input; printed without a stack. */
class UsageError extends Error {}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function format_hz(hz: number): string {
  if (hz >= 1e6) return `${(hz / 1e6).toFixed(2)} MHz`;
  if (hz >= 1e3) return `${(hz / 1e3).toFixed(2)} kHz`;
  return `${hz.toFixed(2)} Hz`;
}

function print_setting(label: string, s: RegisterSetting, unit: (v: number) => string): void {
  console.log(`[${label}] target:   ${unit(s.target)}`);
  console.log(`[${label}] register: ${s.register} (0x${s.register.toString(16).toUpperCase().padStart(8, '0')})`);
  console.log(`[${label}] actual:   ${unit(s.actual)}`);
  console.log(`[${label}] error:    ${s.error_percent.toFixed(2)} %`);
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)} %`;
}

function require_rate(text: string | undefined, what: string): number | undefined {
  if (text === undefined) return undefined;
  const value = parse_rate(text);
  if (value === null) {
    throw new UsageError(`${what} '${text}' is not a valid rate`);
  }
  return value;
}

function require_duty(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const value = parse_duty(text);
  if (value === null) {
    throw new UsageError(`duty cycle '${text}' is not a number`);
  }
  return value;
}

async function resolve_port(name: string, vid?: string): Promise<string> {
  if (name !== 'auto') return name;
  const port = pick_port(await scan_ports(), vid);
  if (!port) {
    throw new UsageError('could not pick a port automatically, name one (see "ports")');
  }
  console.log(`[cli] using ${port.label}`);
  return port.path;
}

async function with_device<T>(options: CliOptions, body: (la: LaUsb) => Promise<T>): Promise<T> {
  const la = new LaUsb();
  la.on('error', (err: Error) => console.error('[serial]', err.message));
  await la.connect(await resolve_port(options.positionals[0], options.vid), options.baud ?? DEFAULT_BAUD_RATE);
  try {
    return await body(la);
  } finally {
    la.disconnect();
  }
}

function capture_options(options: CliOptions, expected_default: number): CaptureOptions {
  const timeout_ms = options.timeout_s !== undefined ? options.timeout_s * 1000 : CAPTURE_TIMEOUT_MS;
  return {
    sample_rate_hz: require_rate(options.sample_rate, 'sample rate'),
    frequency_hz: require_rate(options.freq, 'frequency'),
    duty: require_duty(options.duty),
    stop_after_ms: options.stop_after_ms,
    expected_bytes: options.expected ?? expected_default,
    receive: { timeout_ms }
  };
}

function report_capture(report: CaptureReport, options: CliOptions): void {
  if (!report.greeting) {
    console.warn('[capture] no boot greeting seen, continuing');
  }
  console.log(
    `[capture] received ${report.data.length} bytes (${report.reason}) at ${format_hz(report.sample_rate_hz)}`
  );
  if (!report.complete) {
    console.warn('[capture] capture is incomplete: stopped early, trigger not met, or link stalled');
  }

  for (const ch of summarize_capture(report.data, report.sample_rate_hz)) {
    const freq = ch.frequency_hz !== null ? format_hz(ch.frequency_hz) : '-';
    const duty = ch.duty_percent !== null ? `${ch.duty_percent.toFixed(1)} %` : '-';
    console.log(`[capture] CH${ch.channel}: ${ch.transitions} edges, duty ${duty}, freq ${freq}`);
  }

  if (options.bin) {
    writeFileSync(options.bin, report.data);
    console.log(`[capture] raw bytes written to ${options.bin}`);
  }
  if (options.out) {
    writeFileSync(options.out, export_vcd(split_channels(report.data), report.sample_rate_hz));
    console.log(`[capture] VCD written to ${options.out}`);
  }
  if (options.csv) {
    writeFileSync(options.csv, export_csv(split_channels(report.data), report.sample_rate_hz));
    console.log(`[capture] CSV written to ${options.csv}`);
  }
}

function print_sweep_step(step: SweepStep): void {
  const head = Array.from(step.data.subarray(0, 10)).join(' ');
  console.log(`[sweep] ${step.rate.label} (${step.rate.note})`);
  console.log(`[sweep]   divisor:  ${step.setting.register}`);
  console.log(`[sweep]   actual:   ${format_hz(step.setting.actual)}`);
  console.log(`[sweep]   received: ${step.data.length} bytes (${step.reason}), ${step.distinct_values} distinct values`);
  if (step.data.length > 0) {
    console.log(`[sweep]   first:    ${head}`);
  }
}

async function sweep(link: CaptureLink, options: CliOptions, expected_default: number): Promise<SweepReport> {
  const index = sweep_index_arg(options);
  const rates = select_sweep_rates(index !== undefined ? Number(index) : undefined);
  if (!rates) {
    throw new UsageError(`sweep index '${index}' is out of range`);
  }

  const sweep_options: RateSweepOptions = {
    dwell_ms: options.stop_after_ms,
    expected_bytes: options.expected ?? expected_default,
    receive: {
      timeout_ms: options.timeout_s !== undefined ? options.timeout_s * 1000 : SWEEP_RECEIVE_TIMEOUT_MS
    },
    on_step: print_sweep_step
  };

  const report = await run_rate_sweep(link, rates, sweep_options);
  if (!report.greeting) {
    console.warn('[sweep] no boot greeting seen, continuing');
  }
  console.log(`[sweep] done: ${report.steps.length} rate(s)`);
  return report;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function cmd_ports(options: CliOptions): Promise<void> {
  const ports = await scan_ports();
  if (ports.length === 0) {
    console.log('[ports] no serial ports found');
    return;
  }
  const preferred = pick_port(ports, options.vid);
  for (const port of ports) {
    console.log(`${port === preferred ? '*' : ' '} ${port.label}`);
  }
}

async function cmd_rate(options: CliOptions): Promise<void> {
  const rate = require_rate(options.positionals[1], 'sample rate') ?? 0;
  const setting = sample_rate_setting(rate);
  await with_device(options, async (la) => {
    la.send(build_set_sample_rate(setting.register));
    await la.drain();
  });
  print_setting('rate', setting, format_hz);
}

async function cmd_freq(options: CliOptions): Promise<void> {
  const hz = require_rate(options.positionals[1], 'frequency') ?? 0;
  const setting = frequency_setting(hz);
  await with_device(options, async (la) => {
    la.send(build_set_frequency(setting.register));
    await la.drain();
  });
  print_setting('freq', setting, format_hz);
}

async function cmd_duty(options: CliOptions): Promise<void> {
  const hz = require_rate(options.positionals[1], 'frequency') ?? 0;
  const ratio = require_duty(options.positionals[2]) ?? 0;
  const setting = duty_cycle_setting(hz, ratio);
  if (!setting) {
    throw new UsageError(`no duty cycle fits ${format_hz(hz)}; the period must be at least two clock cycles`);
  }
  await with_device(options, async (la) => {
    la.send(build_set_duty_cycle(setting.register));
    await la.drain();
  });
  print_setting('duty', setting, percent);
}

async function cmd_capture(options: CliOptions): Promise<void> {
  const capture = capture_options(options, BUFFER_CAPACITY);
  const report = await with_device(options, (la) => run_capture(la, capture));
  report_capture(report, options);
}

async function cmd_sweep(options: CliOptions): Promise<void> {
  await with_device(options, (la) => sweep(la, options, BUFFER_CAPACITY));
}

async function cmd_simulate(options: CliOptions): Promise<void> {
  const capacity = options.capacity ?? SIM_DEFAULT_CAPACITY;
  const instrument = new Instrument({
    capacity,
    ticks_per_byte: options.ticks_per_byte ?? SIM_DEFAULT_TICKS_PER_BYTE
  });
  instrument.on('state_change', (state: SessionState) => {
    console.log(`[sim] tick ${instrument.get_context().tick}: ${SESSION_STATE_NAMES[state]}`);
  });

  const link = new SimulatedLink(instrument);
  if (options.sweep) {
    await sweep(link, options, capacity);
    return;
  }

  const report = await run_capture(link, capture_options(options, capacity));
  report_capture(report, options);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<number> {
  const options = parse_args(process.argv.slice(2));

  if (options.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  const problem = validate_options(options);
  if (problem) {
    console.error(`[cli] ${problem}`);
    console.log(HELP_TEXT);
    return 1;
  }

  try {
    switch (options.command) {
      case 'ports':
        await cmd_ports(options);
        break;
      case 'rate':
        await cmd_rate(options);
        break;
      case 'freq':
        await cmd_freq(options);
        break;
      case 'duty':
        await cmd_duty(options);
        break;
      case 'capture':
        await cmd_capture(options);
        break;
      case 'sweep':
        await cmd_sweep(options);
        break;
      case 'simulate':
        await cmd_simulate(options);
        break;
    }
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`[cli] ${err.message}`);
      return 1;
    }
    console.error('[cli] error:', err instanceof Error ? err.message : err);
    return 2;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[cli] fatal:', err);
    process.exitCode = 2;
  }
);
