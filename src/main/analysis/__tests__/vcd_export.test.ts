import { describe, it, expect } from 'vitest';
import { export_vcd } from '../vcd_export';

const DATE = new Date(2024, 0, 2, 3, 4, 5);

const HEADER_TAIL = ['$timescale 1ps $end', '$scope module logic_analyzer $end'];

describe('export_vcd', () => {
  it('writes the header, initial values and only changed channels', () => {
    const vcd = export_vcd(
      [
        [0, 1, 1],
        [1, 1, 0]
      ],
      1_000_000,
      DATE
    );

    expect(vcd).toBe(
      [
        '$date',
        '    2024-01-02 03:04:05',
        '$end',
        '$version',
        '    logic-capture VCD export',
        '$end',
        '$comment',
        '    Sample Rate: 1000000 Hz',
        '    Channels: 2',
        '    Samples: 3',
        '$end',
        ...HEADER_TAIL,
        '$var wire 1 ch0 CH0 $end',
        '$var wire 1 ch1 CH1 $end',
        '$upscope $end',
        '$enddefinitions $end',
        '#0',
        '0ch0',
        '1ch1',
        '#1000000',
        '1ch0',
        '#2000000',
        '0ch1'
      ].join('\n') + '\n'
    );
  });

  it('skips samples where nothing changed', () => {
    const lines = export_vcd([[1, 1, 1, 0]], 1000, DATE).split('\n');
    const body = lines.slice(lines.indexOf('$enddefinitions $end') + 1);
    expect(body).toEqual(['#0', '1ch0', '#3000000000', '0ch0', '']);
  });

  it('writes an empty body for an empty capture', () => {
    const lines = export_vcd([[], []], 1000, DATE).split('\n');
    expect(lines).toContain('    Samples: 0');
    expect(lines.slice(-2)).toEqual(['#0', '']);
  });
});
