import { describe, it, expect } from 'vitest';
import {
  build_config,
  build_parameter_command,
  build_set_duty_cycle,
  build_set_frequency,
  build_set_sample_rate,
  build_start,
  build_stop,
  build_trigger_config,
  read_u32_le,
  write_u32_le
} from '../command_builder';

describe('u32 little-endian helpers', () => {
  it('writes the low byte first', () => {
    const buf = new Uint8Array(6);
    write_u32_le(buf, 1, 0x12345678);
    expect(Array.from(buf)).toEqual([0x00, 0x78, 0x56, 0x34, 0x12, 0x00]);
  });

  it('reads values with the top bit set as unsigned', () => {
    expect(read_u32_le(Uint8Array.of(0xff, 0xff, 0xff, 0xff), 0)).toBe(0xffffffff);
    expect(read_u32_le(Uint8Array.of(0x00, 0x00, 0x00, 0x80), 0)).toBe(0x80000000);
  });
});

describe('single-byte commands', () => {
  it('builds START, STOP, TRIGGER_CONFIG and CONFIG', () => {
    expect(Array.from(build_start())).toEqual([0x01]);
    expect(Array.from(build_stop())).toEqual([0x02]);
    expect(Array.from(build_trigger_config())).toEqual([0x04]);
    expect(Array.from(build_config())).toEqual([0x05]);
  });
});

describe('parameter commands', () => {
  it('builds SET_SAMPLE_RATE for the 100 kHz divisor', () => {
    expect(Array.from(build_set_sample_rate(270))).toEqual([0x07, 0x0e, 0x01, 0x00, 0x00]);
  });

  it('builds SET_FREQUENCY for a 1 kHz output', () => {
    expect(Array.from(build_set_frequency(13500))).toEqual([0x06, 0xbc, 0x34, 0x00, 0x00]);
  });

  it('builds SET_DUTY_CYCLE', () => {
    expect(Array.from(build_set_duty_cycle(0x12345678))).toEqual([0x08, 0x78, 0x56, 0x34, 0x12]);
  });

  it('truncates fractional values', () => {
    expect(Array.from(build_parameter_command(0x07, 10.9))).toEqual([0x07, 0x0a, 0x00, 0x00, 0x00]);
  });

  it('clamps values outside the u32 range', () => {
    expect(Array.from(build_parameter_command(0x07, -5))).toEqual([0x07, 0x00, 0x00, 0x00, 0x00]);
    expect(Array.from(build_parameter_command(0x07, 2 ** 33))).toEqual([0x07, 0xff, 0xff, 0xff, 0xff]);
  });
});
