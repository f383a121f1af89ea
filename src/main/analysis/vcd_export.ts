/**
 * Value Change Dump export of a capture, readable by PulseView and
 * GTKWave.
 *
 * @module analysis/vcd_export
 */

/** Format a date as "YYYY-MM-DD HH:MM:SS" in local time. */
function format_date(date: Date): string {
  const p = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${p(date.getMonth() + 1)}-${p(date.getDate())} ` +
    `${p(date.getHours())}:${p(date.getMinutes())}:${p(date.getSeconds())}`
  );
}

/**
 * Render channels as a VCD document.
 *
 * Timescale is 1 ps; sample n is stamped at n * trunc(1e12 / rate).
 * After the initial values at #0, only samples where some channel changed
 * are written, listing just the channels that changed.
 *
 * @param channels - One 0/1 list per channel, all the same length.
 * @param sample_rate_hz - Rate the samples were taken at.
 * @param date - Timestamp for the header.
 */
export function export_vcd(channels: number[][], sample_rate_hz: number, date: Date = new Date()): string {
  const sample_count = channels.length > 0 ? channels[0].length : 0;
  const lines: string[] = [
    '$date',
    `    ${format_date(date)}`,
    '$end',
    '$version',
    '    logic-capture VCD export',
    '$end',
    '$comment',
    `    Sample Rate: ${sample_rate_hz} Hz`,
    `    Channels: ${channels.length}`,
    `    Samples: ${sample_count}`,
    '$end',
    '$timescale 1ps $end',
    '$scope module logic_analyzer $end'
  ];

  const ids = channels.map((_, i) => `ch${i}`);
  ids.forEach((id, i) => lines.push(`$var wire 1 ${id} CH${i} $end`));
  lines.push('$upscope $end', '$enddefinitions $end');

  const step_ps = Math.trunc(1e12 / sample_rate_hz);
  const previous: Array<number | null> = channels.map(() => null);

  lines.push('#0');
  channels.forEach((bits, i) => {
    if (bits.length > 0) {
      lines.push(`${bits[0]}${ids[i]}`);
      previous[i] = bits[0];
    }
  });

  for (let n = 1; n < sample_count; n++) {
    const changed = channels
      .map((_, i) => i)
      .filter((i) => channels[i][n] !== previous[i]);
    if (changed.length === 0) continue;

    lines.push(`#${n * step_ps}`);
    for (const i of changed) {
      lines.push(`${channels[i][n]}${ids[i]}`);
      previous[i] = channels[i][n];
    }
  }

  return lines.join('\n') + '\n';
}
