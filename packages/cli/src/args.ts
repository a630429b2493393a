/**
 * Command-line argument helpers
 */

import { isAsset, isTimeframe, type Asset, type Timeframe } from '@candle-archive/shared';

export interface ParsedArgs {
  positionals: string[];
  /** `--flag` → true, `--key=value` → value */
  flags: Map<string, string | true>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const [name = '', ...rest] = arg.slice(2).split('=');
      flags.set(name, rest.length > 0 ? rest.join('=') : true);
    } else {
      positionals.push(arg);
    }
  }

  return { positionals, flags };
}

export function requireArg(args: ParsedArgs, index: number, name: string): string {
  const value = args.positionals[index];
  if (value === undefined) {
    throw new Error(`Missing argument <${name}>`);
  }
  return value;
}

export function toAsset(value: string): Asset {
  const lower = value.toLowerCase();
  if (!isAsset(lower)) {
    throw new Error(`Unknown asset "${value}" (expected btc or eth)`);
  }
  return lower;
}

export function toTimeframe(value: string): Timeframe {
  if (!isTimeframe(value)) {
    throw new Error(`Unknown timeframe "${value}" (expected 1min, 5min, 30min, hourly, daily or weekly)`);
  }
  return value;
}

export function toYear(value: string): number {
  if (!/^\d{4}$/.test(value)) {
    throw new Error(`Invalid year "${value}"`);
  }
  return Number(value);
}
