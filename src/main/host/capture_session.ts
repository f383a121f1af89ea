/**
 * Host-side capture session.
 *
 * Drives one capture over any {@link CaptureLink}:
 *   1. wait for the boot greeting (carry on without it on timeout)
 *   2. load sample rate, generator frequency and duty cycle if requested
 *   3. START
 *   4. optionally let the capture run for a while and send STOP
 *   5. receive the capture bytes
 *
 * @module host/capture_session
 */

import {
  BUFFER_CAPACITY,
  DEFAULT_SAMPLE_RATE_HZ,
  GREETING_TIMEOUT_MS
} from '../protocol/constants';
import {
  build_set_duty_cycle,
  build_set_frequency,
  build_set_sample_rate,
  build_start,
  build_stop
} from '../protocol/command_builder';
import {
  duty_cycle_setting,
  frequency_setting,
  sample_rate_setting
} from '../protocol/rate_calc';
import type { RegisterSetting } from '../protocol/rate_calc';
import type { CaptureLink, CaptureResult, ReceiveOptions } from '../transport/link_types';

/** What to configure and how to receive. */
export interface CaptureOptions {
  /** Sample rate to load before starting; the device default is kept if omitted. */
  sample_rate_hz?: number;
  /** Generator output frequency to load. */
  frequency_hz?: number;
  /** Generator duty ratio (0-1); uses `frequency_hz`, else 1 kHz, for the period. */
  duty?: number;
  /** Send STOP this long after START instead of waiting for a full buffer. */
  stop_after_ms?: number;
  /** Bytes to wait for. Defaults to the buffer capacity. */
  expected_bytes?: number;
  greeting_timeout_ms?: number;
  /** Don't wait for the greeting; it is only sent once after power-up. */
  skip_greeting?: boolean;
  receive?: ReceiveOptions;
}

/** Everything learned from one session. */
export interface CaptureReport extends CaptureResult {
  /** Whether the boot greeting was seen during this session. */
  greeting: boolean;
  /** Sample rate the data was captured at. */
  sample_rate_hz: number;
  /** Register settings that were sent, by name. */
  settings: CaptureSettings;
}

export interface CaptureSettings {
  sample_rate?: RegisterSetting;
  frequency?: RegisterSetting;
  duty?: RegisterSetting;
}

/** Frequency used for the duty period when none is given. */
const DEFAULT_DUTY_FREQUENCY_HZ = 1000;

/**
 * Work out the register settings for a session.
 *
 * @throws If no duty cycle fits the requested frequency.
 */
export function resolve_settings(options: CaptureOptions): CaptureSettings {
  const settings: CaptureSettings = {};

  if (options.sample_rate_hz !== undefined) {
    settings.sample_rate = sample_rate_setting(options.sample_rate_hz);
  }
  if (options.frequency_hz !== undefined) {
    settings.frequency = frequency_setting(options.frequency_hz);
  }
  if (options.duty !== undefined) {
    const hz = options.frequency_hz ?? DEFAULT_DUTY_FREQUENCY_HZ;
    const duty = duty_cycle_setting(hz, options.duty);
    if (!duty) {
      throw new Error(`capture_session: no duty cycle fits a ${hz} Hz period`);
    }
    settings.duty = duty;
  }

  return settings;
}

/**
 * Run one capture session.
 *
 * Settings are checked before anything is sent.
 *
 * @param link - Serial or simulated link.
 * @param options - Configuration for this capture.
 */
export async function run_capture(
  link: CaptureLink,
  options: CaptureOptions = {}
): Promise<CaptureReport> {
  const settings = resolve_settings(options);

  const greeting = options.skip_greeting
    ? false
    : await link.wait_for_greeting(options.greeting_timeout_ms ?? GREETING_TIMEOUT_MS);

  if (settings.sample_rate) {
    link.send(build_set_sample_rate(settings.sample_rate.register));
  }
  if (settings.frequency) {
    link.send(build_set_frequency(settings.frequency.register));
  }
  if (settings.duty) {
    link.send(build_set_duty_cycle(settings.duty.register));
  }

  link.send(build_start());

  if (options.stop_after_ms !== undefined) {
    await link.pause(options.stop_after_ms);
    link.send(build_stop());
  }

  const result = await link.receive_capture(options.expected_bytes ?? BUFFER_CAPACITY, options.receive);

  return {
    ...result,
    greeting,
    sample_rate_hz: settings.sample_rate?.actual ?? DEFAULT_SAMPLE_RATE_HZ,
    settings
  };
}
