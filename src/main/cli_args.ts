/**
 * Command-line parsing for the logic-capture CLI.
 *
 * @module cli_args
 */

import { SWEEP_RATES } from './protocol/constants';

export type CliCommand = 'ports' | 'rate' | 'freq' | 'duty' | 'capture' | 'sweep' | 'simulate';

const COMMANDS: readonly CliCommand[] = ['ports', 'rate', 'freq', 'duty', 'capture', 'sweep', 'simulate'];

/** Positional arguments each command needs after its name. */
const REQUIRED_POSITIONALS: Record<CliCommand, string[]> = {
  ports: [],
  rate: ['port', 'rate'],
  freq: ['port', 'hz'],
  duty: ['port', 'hz', 'duty'],
  capture: ['port'],
  sweep: ['port'],
  simulate: []
};

export interface CliOptions {
  command: CliCommand | null;
  /** Arguments after the command name that are not options. */
  positionals: string[];
  sample_rate?: string;
  freq?: string;
  duty?: string;
  stop_after_ms?: number;
  expected?: number;
  timeout_s?: number;
  capacity?: number;
  ticks_per_byte?: number;
  baud?: number;
  vid?: string;
  out?: string;
  bin?: string;
  csv?: string;
  /** simulate: run the sample-rate sweep instead of one capture. */
  sweep: boolean;
  help: boolean;
  /** Unrecognised options or command names. */
  unknown: string[];
}

export const HELP_TEXT = `
logic-capture - host tooling for the 8-channel capture engine

Usage: logic-capture <command> [arguments] [options]

Commands:
  ports                      List serial ports
  rate <port> <rate>         Set the sample rate (e.g. 1M, 100k, 27M)
  freq <port> <hz>           Set the test-signal frequency
  duty <port> <hz> <duty>    Set the test-signal duty cycle (50, 50%, 0.5)
  capture <port>             Run a capture on the device
  sweep <port> [index]       Capture once at each sweep rate, or only the one at index
  simulate                   Run a capture against the built-in model

  Sweep rates: ${SWEEP_RATES.map((r, i) => `${i}=${r.label}`).join(' ')}

  <port> may be "auto" to use the only port present (or the one matching --vid).

Options:
  -r, --sample-rate <rate>   Sample rate to load before capturing
  -f, --freq <hz>            Test-signal frequency to load before capturing
  -d, --duty <duty>          Test-signal duty cycle to load before capturing
  -s, --stop-after <ms>      Send STOP after this many ms instead of filling the buffer
  -n, --expected <bytes>     Bytes to wait for (default: buffer capacity)
  -t, --timeout <s>          Receive timeout in seconds (default: 60)
  -b, --baud <rate>          Serial baud rate (default: 115200)
      --vid <id>             USB vendor ID used by "auto"
      --capacity <n>         simulate: buffer capacity (default: 4096)
      --ticks-per-byte <n>   simulate: serial line time per byte (default: 16)
  -o, --out <file.vcd>       Write the capture as VCD
      --bin <file.bin>       Write the raw capture bytes
      --csv <file.csv>       Write the capture as sigrok CSV
      --sweep [index]        simulate: run the sample-rate sweep
  -h, --help                 Show this help message

Examples:
  logic-capture rate /dev/ttyUSB0 1M
  logic-capture capture COM3 --sample-rate 1M --freq 10k --duty 25% -o capture.vcd
  logic-capture simulate --sample-rate 13.5M --freq 100k -o sim.vcd --csv sim.csv
  logic-capture sweep COM3 4
  logic-capture simulate --sweep -s 50
`;

function parse_int(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  return Number.isNaN(n) ? undefined : n;
}

function parse_number(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseFloat(value);
  return Number.isNaN(n) ? undefined : n;
}

function is_command(word: string): word is CliCommand {
  return (COMMANDS as readonly string[]).includes(word);
}

/**
 * Parse command line arguments.
 */
export function parse_args(args: string[]): CliOptions {
  const options: CliOptions = {
    command: null,
    positionals: [],
    sweep: false,
    help: false,
    unknown: []
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case '-r':
      case '--sample-rate':
        options.sample_rate = args[++i];
        break;

      case '-f':
      case '--freq':
        options.freq = args[++i];
        break;

      case '-d':
      case '--duty':
        options.duty = args[++i];
        break;

      case '-s':
      case '--stop-after':
        options.stop_after_ms = parse_number(args[++i]);
        break;

      case '-n':
      case '--expected':
        options.expected = parse_int(args[++i]);
        break;

      case '-t':
      case '--timeout':
        options.timeout_s = parse_number(args[++i]);
        break;

      case '-b':
      case '--baud':
        options.baud = parse_int(args[++i]);
        break;

      case '--vid':
        options.vid = args[++i];
        break;

      case '--capacity':
        options.capacity = parse_int(args[++i]);
        break;

      case '--ticks-per-byte':
        options.ticks_per_byte = parse_int(args[++i]);
        break;

      case '-o':
      case '--out':
        options.out = args[++i];
        break;

      case '--bin':
        options.bin = args[++i];
        break;

      case '--csv':
        options.csv = args[++i];
        break;

      case '--sweep':
        options.sweep = true;
        break;

      case '-h':
      case '--help':
        options.help = true;
        break;

      default:
        if (arg.startsWith('-')) {
          options.unknown.push(arg);
        } else if (options.command === null && options.positionals.length === 0) {
          if (is_command(arg)) {
            options.command = arg;
          } else {
            options.unknown.push(arg);
          }
        } else {
          options.positionals.push(arg);
        }
        break;
    }

    i++;
  }

  return options;
}

/** The sweep's rate index argument, if one was given. */
export function sweep_index_arg(options: CliOptions): string | undefined {
  if (options.command === 'sweep') return options.positionals[1];
  if (options.command === 'simulate' && options.sweep) return options.positionals[0];
  return undefined;
}

/**
 * Check parsed options for problems.
 *
 * @returns An error message, or null when the options are usable.
 */
export function validate_options(options: CliOptions): string | null {
  if (options.unknown.length > 0) {
    return `Unknown argument '${options.unknown[0]}'`;
  }
  if (options.command === null) {
    return 'No command given';
  }

  const required = REQUIRED_POSITIONALS[options.command];
  if (options.positionals.length < required.length) {
    return `'${options.command}' needs <${required.slice(options.positionals.length).join('> <')}>`;
  }

  const index = sweep_index_arg(options);
  if (index !== undefined && (!/^\d+$/.test(index) || Number(index) >= SWEEP_RATES.length)) {
    return `sweep index must be 0-${SWEEP_RATES.length - 1}, got '${index}'`;
  }

  if (options.capacity !== undefined && options.capacity < 2) {
    return '--capacity must be at least 2';
  }
  if (options.stop_after_ms !== undefined && options.stop_after_ms < 0) {
    return '--stop-after must not be negative';
  }
  if (options.expected !== undefined && options.expected < 1) {
    return '--expected must be at least 1';
  }
  return null;
}
