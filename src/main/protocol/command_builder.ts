/**
 * Host command builders.
 *
 * Single-byte commands are sent bare. Parameter commands carry a u32
 * little-endian payload:
 *   [cmd] [bits 7:0] [bits 15:8] [bits 23:16] [bits 31:24]
 *
 * @module protocol/command_builder
 */

import {
  CMD_CONFIG,
  CMD_SET_DUTY_CYCLE,
  CMD_SET_FREQUENCY,
  CMD_SET_SAMPLE_RATE,
  CMD_START,
  CMD_STOP,
  CMD_TRIGGER_CONFIG,
  PARAMETER_MAX,
  PARAMETER_PAYLOAD_SIZE
} from './constants';

// ---------------------------------------------------------------------------
// Helpers: little-endian u32
// ---------------------------------------------------------------------------

/** Write unsigned 32-bit little-endian at offset. */
export function write_u32_le(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = value & 0xFF;
  buf[offset + 1] = (value >>> 8) & 0xFF;
  buf[offset + 2] = (value >>> 16) & 0xFF;
  buf[offset + 3] = (value >>> 24) & 0xFF;
}

/** Read unsigned 32-bit little-endian at offset. */
export function read_u32_le(buf: Uint8Array, offset: number): number {
  return (
    (buf[offset] |
      (buf[offset + 1] << 8) |
      (buf[offset + 2] << 16) |
      (buf[offset + 3] << 24)) >>> 0
  );
}

// ---------------------------------------------------------------------------
// Single-byte commands
// ---------------------------------------------------------------------------

/** START (1 byte). */
export function build_start(): Uint8Array {
  return Uint8Array.of(CMD_START);
}

/** STOP (1 byte). */
export function build_stop(): Uint8Array {
  return Uint8Array.of(CMD_STOP);
}

/**
 * CONFIG (1 byte).
 *
 * The device accepts the command but reads no payload, so none is sent:
 * any trailing bytes would be decoded as commands.
 */
export function build_config(): Uint8Array {
  return Uint8Array.of(CMD_CONFIG);
}

/** TRIGGER_CONFIG (1 byte), same caveat as {@link build_config}. */
export function build_trigger_config(): Uint8Array {
  return Uint8Array.of(CMD_TRIGGER_CONFIG);
}

// ---------------------------------------------------------------------------
// Parameter commands
// ---------------------------------------------------------------------------

/**
 * Build a 5-byte parameter command.
 *
 * @param cmd - Command byte.
 * @param value - Register value; truncated and clamped to [0, 0xFFFFFFFF].
 */
export function build_parameter_command(cmd: number, value: number): Uint8Array {
  const clamped = Math.min(PARAMETER_MAX, Math.max(0, Math.trunc(value)));
  const buf = new Uint8Array(1 + PARAMETER_PAYLOAD_SIZE);
  buf[0] = cmd & 0xFF;
  write_u32_le(buf, 1, clamped);
  return buf;
}

/** SET_FREQUENCY with a generator half-period divider. */
export function build_set_frequency(divider: number): Uint8Array {
  return build_parameter_command(CMD_SET_FREQUENCY, divider);
}

/** SET_SAMPLE_RATE with a sample clock divisor. */
export function build_set_sample_rate(divisor: number): Uint8Array {
  return build_parameter_command(CMD_SET_SAMPLE_RATE, divisor);
}

/** SET_DUTY_CYCLE with the generator high time in clock cycles. */
export function build_set_duty_cycle(high_cycles: number): Uint8Array {
  return build_parameter_command(CMD_SET_DUTY_CYCLE, high_cycles);
}
