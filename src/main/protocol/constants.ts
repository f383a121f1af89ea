/**
 * Protocol and instrument constants for logic-capture.
 *
 * Command bytes, payload sizes, clock and buffer parameters, and the
 * register reset values shared by the device model and the host tooling.
 *
 * @module protocol/constants
 */

// ---------------------------------------------------------------------------
// Command bytes (host -> device)
// ---------------------------------------------------------------------------

/** START: arm the capture engine. */
export const CMD_START = 0x01;

/** STOP: end the running capture and transmit what was captured. */
export const CMD_STOP = 0x02;

/** TRIGGER_CONFIG: accepted, no payload consumed. */
export const CMD_TRIGGER_CONFIG = 0x04;

/** CONFIG: accepted, no payload consumed. */
export const CMD_CONFIG = 0x05;

/** SET_FREQUENCY: u32 LE generator half-period divider follows. */
export const CMD_SET_FREQUENCY = 0x06;

/** SET_SAMPLE_RATE: u32 LE sample clock divisor follows. */
export const CMD_SET_SAMPLE_RATE = 0x07;

/** SET_DUTY_CYCLE: u32 LE generator high time (clock cycles) follows. */
export const CMD_SET_DUTY_CYCLE = 0x08;

/** Payload length of every parameter-setting command. */
export const PARAMETER_PAYLOAD_SIZE = 4;

/** Largest value a parameter register can hold. */
export const PARAMETER_MAX = 0xFFFFFFFF;

// ---------------------------------------------------------------------------
// Clock and capture geometry
// ---------------------------------------------------------------------------

/** Device system clock; one tick of the model is one period of it. */
export const SYS_CLK_HZ = 27_000_000;

/** Capture buffer capacity in samples (one byte per sample). */
export const BUFFER_CAPACITY = 49152;

/** Number of input channels (bits per sample). */
export const CHANNEL_COUNT = 8;

/** Trigger mask selecting every channel. */
export const ALL_CHANNELS_MASK = 0xFF;

// ---------------------------------------------------------------------------
// Register reset values
// ---------------------------------------------------------------------------

/** Sample rate the device comes up with. */
export const DEFAULT_SAMPLE_RATE_HZ = 100_000;

/** Sample clock divisor for {@link DEFAULT_SAMPLE_RATE_HZ}. */
export const DEFAULT_SAMPLE_DIVISOR = SYS_CLK_HZ / DEFAULT_SAMPLE_RATE_HZ;

/** Generator half-period divider at reset (1 kHz output). */
export const DEFAULT_FREQUENCY_DIVIDER = 13_500;

/** Generator high time at reset, in clock cycles (50 % at 1 kHz). */
export const DEFAULT_DUTY_HIGH_CYCLES = 13_500;

// ---------------------------------------------------------------------------
// Serial link
// ---------------------------------------------------------------------------

/** Literal the device sends once after boot, before any capture data. */
export const BOOT_GREETING = 'start';

/** Default baud rate of the host link. */
export const DEFAULT_BAUD_RATE = 115200;

/** Line bits per byte (start + 8 data + stop). */
export const UART_BITS_PER_BYTE = 10;

/** Clock ticks needed to shift one byte out at the default baud rate. */
export const DEFAULT_TICKS_PER_BYTE = Math.ceil(
  (SYS_CLK_HZ * UART_BITS_PER_BYTE) / DEFAULT_BAUD_RATE
);

// ---------------------------------------------------------------------------
// Host timing
// ---------------------------------------------------------------------------

/** How long the host waits for the boot greeting before carrying on. */
export const GREETING_TIMEOUT_MS = 2000;

/** Overall limit on receiving one capture. */
export const CAPTURE_TIMEOUT_MS = 60_000;

/** Receive ends early once data has started and then stalls this long. */
export const CAPTURE_IDLE_TIMEOUT_MS = 5000;

/** Sample-rate shorthands accepted by the rate parser. */
export const SAMPLE_RATE_PRESETS: Readonly<Record<string, number>> = {
  '27M': 27_000_000,
  '13.5M': 13_500_000,
  '1M': 1_000_000,
  '500K': 500_000,
  '100K': 100_000,
  '50K': 50_000,
  '10K': 10_000,
  '1K': 1_000
};

/** A sample rate the sweep captures at. */
export interface SweepRate {
  hz: number;
  label: string;
  /** What the rate suits. */
  note: string;
}

/** Rates the sample-rate sweep steps through, slowest first. */
export const SWEEP_RATES: readonly SweepRate[] = [
  { hz: 10_000, label: '10kHz', note: 'low-frequency signals, long captures' },
  { hz: 50_000, label: '50kHz', note: 'low to mid-frequency signals' },
  { hz: 100_000, label: '100kHz', note: 'power-up default' },
  { hz: 500_000, label: '500kHz', note: 'mid-frequency signals' },
  { hz: 1_000_000, label: '1MHz', note: 'high-frequency signals' },
  { hz: 10_000_000, label: '10MHz', note: 'divisor rounds down to 2' },
  { hz: 13_500_000, label: '13.5MHz', note: 'divisor 2' },
  { hz: 27_000_000, label: '27MHz', note: 'divisor 1, one sample per clock' }
];

/** How long each sweep step samples before STOP. */
export const SWEEP_DWELL_MS = 2000;

/** Receive limit for each sweep step. */
export const SWEEP_RECEIVE_TIMEOUT_MS = 5000;
