/**
 * Command-line flags for the gridloop binary
 */

import { ConfigurationError, type FrameEncoding } from './engine';

export interface CliArgs {
  help: boolean;
  list: boolean;
  /** Game id or name; the CLI prompts when omitted */
  game?: string;
  fps?: number;
  frames?: number;
  warmupMs?: number;
  encoding: FrameEncoding;
}

const NUMERIC_FLAGS = {
  '--fps': 'fps',
  '--frames': 'frames',
  '--warmup': 'warmupMs',
} as const;

type NumericFlag = keyof typeof NUMERIC_FLAGS;

function isNumericFlag(flag: string): flag is NumericFlag {
  return Object.keys(NUMERIC_FLAGS).includes(flag);
}

/**
 * @throws ConfigurationError on an unknown flag or a non-numeric value
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false, list: false, encoding: 'raw' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    // --fps=20 and --fps 20 are equivalent
    const equals = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = equals === -1 ? arg : arg.slice(0, equals);
    const inline = equals === -1 ? undefined : arg.slice(equals + 1);

    if (flag === '--help' || flag === '-h') {
      args.help = true;
    } else if (flag === '--list' || flag === '-l') {
      args.list = true;
    } else if (flag === '--rle') {
      args.encoding = 'rle';
    } else if (isNumericFlag(flag)) {
      const raw = inline ?? argv[++i];
      const value = Number(raw);
      if (raw === undefined || raw.trim() === '' || !Number.isFinite(value)) {
        throw new ConfigurationError(`${flag} expects a number, got ${JSON.stringify(raw ?? '')}`);
      }
      args[NUMERIC_FLAGS[flag]] = value;
    } else if (flag.startsWith('-')) {
      throw new ConfigurationError(`Unknown option: ${flag}`);
    } else if (args.game === undefined) {
      args.game = arg;
    } else {
      throw new ConfigurationError(`Unexpected argument: ${arg}`);
    }
  }

  return args;
}
