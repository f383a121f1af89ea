/**
 * sigrok CSV export of a capture.
 *
 * Comment lines start with ';'. The header names a `time` column followed
 * by one column per channel, and each row holds the sample time in
 * seconds and the 0/1 level of every channel. PulseView imports it with
 * `column_formats=-,<n>l` and the sample rate from the comment.
 *
 * @module analysis/csv_export
 */

/**
 * Render channels as sigrok CSV.
 *
 * Sample n is stamped at n / rate seconds, printed with 9 decimals.
 *
 * @param channels - One 0/1 list per channel, all the same length.
 * @param sample_rate_hz - Rate the samples were taken at.
 */
export function export_csv(channels: number[][], sample_rate_hz: number): string {
  const sample_count = channels.length > 0 ? channels[0].length : 0;
  const lines: string[] = [
    '; CSV file generated by logic-capture',
    `; Sample Rate: ${Math.trunc(sample_rate_hz)} Hz`,
    `; Channels: ${channels.length}, Samples: ${sample_count}`,
    ';',
    ['time', ...channels.map((_, i) => `CH${i}`)].join(',')
  ];

  for (let n = 0; n < sample_count; n++) {
    const row = [(n / sample_rate_hz).toFixed(9)];
    for (const bits of channels) row.push(String(bits[n]));
    lines.push(row.join(','));
  }

  return lines.join('\n') + '\n';
}
