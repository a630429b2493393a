/**
 * CLI command handlers
 *
 * Each handler returns the process exit code. Reports are written through
 * `ctx.out`; progress goes to the logger.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  AGGREGATED_TIMEFRAMES,
  TIMEFRAMES,
  timeframeSeconds,
  utcYear,
  type CandleRow,
  type CandleSource,
  type DatasetConfig,
  type Logger,
} from '@candle-archive/shared';
import {
  Backfiller,
  aggregateFiles,
  checkAssetConsistency,
  combineYearlyFiles,
  dedupeFile,
  fillFile,
  filePath,
  findFileGaps,
  fixZeroPricesFile,
  listDatasetFiles,
  mergeFiles,
  parseFilePath,
  previousPartitionRow,
  rangesReportPath,
  readCandleRows,
  readRangesReport,
  saveBackfill,
  splitFullFile,
  validateDataset,
  writeRangesReport,
  type ValidationIssue,
} from '@candle-archive/dataset';
import { parseArgs, requireArg, toAsset, toTimeframe, toYear, type ParsedArgs } from './args.js';

export interface CommandContext {
  config: DatasetConfig;
  logger: Logger;
  out: (line: string) => void;
  createSource: () => CandleSource;
  cwd: string;
}

export type CommandHandler = (args: ParsedArgs, ctx: CommandContext) => Promise<number>;

export interface Command {
  usage: string;
  description: string;
  run: CommandHandler;
}

function resolvePath(ctx: CommandContext, file: string): string {
  return path.resolve(ctx.cwd, file);
}

function relative(ctx: CommandContext, file: string): string {
  return path.relative(ctx.config.dataDir, file);
}

/**
 * Bucket length of a file, from its place in the layout (1 minute otherwise)
 */
function stepFor(ctx: CommandContext, file: string): number {
  const parsed = parseFilePath(ctx.config.dataDir, file);
  return parsed ? timeframeSeconds(parsed.timeframe) : 60;
}

/**
 * Last candle of the previous year, for files that are yearly partitions
 */
function previousRowFor(ctx: CommandContext, file: string): CandleRow | null {
  const parsed = parseFilePath(ctx.config.dataDir, file);
  return parsed ? previousPartitionRow(parsed) : null;
}

function formatIssue(issue: ValidationIssue): string {
  const where = issue.line !== undefined ? ` line ${issue.line}` : '';
  return `   ${issue.severity} ${issue.code}${where}: ${issue.message}`;
}

// ============================================================================
// COMMANDS
// ============================================================================

const validate: CommandHandler = async (args, ctx) => {
  const asset = args.positionals[0] !== undefined ? toAsset(args.positionals[0]) : undefined;
  const timeframe = args.positionals[1] !== undefined ? toTimeframe(args.positionals[1]) : undefined;

  const report = validateDataset(
    ctx.config.dataDir,
    { asset, timeframe },
    { requireContinuous: args.flags.has('strict') },
    ctx.logger
  );

  if (report.files.length === 0) {
    ctx.out('No dataset files found');
    return 1;
  }

  for (const file of report.files) {
    ctx.out(`${file.ok ? '✅' : '❌'} ${relative(ctx, file.file)}: ${file.rowCount} rows`);
    for (const issue of file.issues) {
      ctx.out(formatIssue(issue));
    }
    if (file.truncated) {
      ctx.out('   ... more issues not shown');
    }
  }
  for (const issue of report.boundaryIssues) {
    ctx.out(`${issue.severity === 'error' ? '❌' : '⚠️'} ${relative(ctx, issue.file)}: ${issue.message}`);
  }

  ctx.out(
    `Files: ${report.files.length} | Rows: ${report.totalRows} | Errors: ${report.errorCount} | Warnings: ${report.warningCount}`
  );
  return report.ok ? 0 : 1;
};

const consistency: CommandHandler = async (args, ctx) => {
  const asset = toAsset(requireArg(args, 0, 'asset'));
  const timeframe = toTimeframe(requireArg(args, 1, 'timeframe'));
  const year = args.positionals[2] !== undefined ? toYear(args.positionals[2]) : undefined;

  const report = checkAssetConsistency(ctx.config.dataDir, asset, timeframe, year);

  for (const issue of report.issues) {
    const detail =
      issue.kind === 'field-mismatch' ? ` ${issue.field}: expected ${issue.expected}, found ${issue.actual}` : '';
    ctx.out(`   ${issue.kind} ${issue.timestamp}${detail}`);
  }
  ctx.out(
    `${report.ok ? '✅' : '❌'} ${asset} ${timeframe}: ${report.bucketsChecked} buckets checked, ${report.issues.length} issues`
  );
  return report.ok ? 0 : 1;
};

const gaps: CommandHandler = async (args, ctx) => {
  const file = resolvePath(ctx, requireArg(args, 0, 'file'));
  const report = findFileGaps(file, stepFor(ctx, file));

  if (report.total_missing_timestamps === 0) {
    ctx.out('✅ No missing data found');
    return 0;
  }

  for (const range of report.ranges) {
    ctx.out(`   ${range.start_datetime} to ${range.end_datetime} (${range.duration_minutes} minutes)`);
  }

  const output = rangesReportPath(file);
  writeRangesReport(report, output);
  ctx.out(`❌ Missing timestamps: ${report.total_missing_timestamps} in ${report.total_ranges} ranges`);
  ctx.out(`Saved ranges to ${output}`);
  return 0;
};

const backfill: CommandHandler = async (args, ctx) => {
  const reportPath = resolvePath(ctx, requireArg(args, 0, 'ranges.json'));
  const report = readRangesReport(reportPath);
  const target = path.resolve(path.dirname(reportPath), report.filename);

  const assetFlag = args.flags.get('asset');
  const located = parseFilePath(ctx.config.dataDir, target);
  const asset = typeof assetFlag === 'string' ? toAsset(assetFlag) : located?.asset;
  if (!asset) {
    throw new Error(`Cannot tell the asset of ${target}; pass --asset=btc or --asset=eth`);
  }
  if (located && located.timeframe !== '1min') {
    throw new Error(`Backfill only supports 1min files, got ${located.timeframe}`);
  }

  const existing = fs.existsSync(target) ? readCandleRows(target) : [];
  const backfiller = new Backfiller(ctx.createSource(), ctx.logger.child({ command: 'backfill' }), {
    concurrency: ctx.config.backfill.concurrency,
    maxRetries: ctx.config.backfill.maxRetries,
    retryDelayMs: ctx.config.backfill.retryDelayMs,
  });
  const result = await backfiller.backfill(asset, report, existing);

  if (result.rows.length === 0) {
    ctx.out('❌ No missing data could be retrieved');
    return 1;
  }

  const written = saveBackfill(target, result.rows, args.flags.has('merge'));
  ctx.out(`Retrieved ${result.rows.length} candles, ${result.succeeded}/${result.ranges.length} ranges complete`);
  ctx.out(`Saved to ${written}`);
  return result.failed === 0 ? 0 : 1;
};

const merge: CommandHandler = async (args, ctx) => {
  const original = resolvePath(ctx, requireArg(args, 0, 'original'));
  const extra = resolvePath(ctx, requireArg(args, 1, 'extra'));
  const output =
    args.positionals[2] !== undefined
      ? resolvePath(ctx, args.positionals[2])
      : original.replace(/\.csv$/, '') + '_complete.csv';

  const result = mergeFiles(original, extra, output);
  ctx.out(`Merged ${result.added} new rows, removed ${result.removed} duplicates`);
  ctx.out(`Saved ${result.rows.length} rows to ${output}`);
  return 0;
};

const dedupe: CommandHandler = async (args, ctx) => {
  const asset = toAsset(requireArg(args, 0, 'asset'));
  const timeframe = args.positionals[1] !== undefined ? toTimeframe(args.positionals[1]) : undefined;

  let total = 0;
  for (const file of listDatasetFiles(ctx.config.dataDir, { asset, timeframe })) {
    const { removed } = dedupeFile(file.path);
    if (removed > 0) {
      ctx.out(`${relative(ctx, file.path)}: removed ${removed} duplicates`);
      total += removed;
    }
  }

  ctx.out(total === 0 ? '✅ No duplicates found' : `Removed ${total} duplicates`);
  return 0;
};

const fill: CommandHandler = async (args, ctx) => {
  const file = resolvePath(ctx, requireArg(args, 0, 'file'));
  const step = stepFor(ctx, file);
  const previous = previousRowFor(ctx, file);

  // Seeded fills start at Jan 1 00:00 at the earliest, so the file keeps to its year
  const start = previous
    ? Math.max(previous.unix_timestamp + step, Date.UTC(utcYear(previous.unix_timestamp) + 1, 0, 1) / 1000)
    : undefined;
  const { filled } = fillFile(file, step, { previous, start });

  ctx.out(`Filled ${filled} missing candles in ${file}`);
  return 0;
};

const fixZeros: CommandHandler = async (args, ctx) => {
  const file = resolvePath(ctx, requireArg(args, 0, 'file'));
  const { fixed, dropped } = fixZeroPricesFile(file, previousRowFor(ctx, file));

  if (fixed === 0 && dropped === 0) {
    ctx.out('✅ No zero-price candles found');
    return 0;
  }
  ctx.out(`Fixed ${fixed} zero-price candles in ${file}`);
  if (dropped > 0) {
    ctx.out(`⚠️ Dropped ${dropped} zero-price candles with no earlier prices`);
  }
  return 0;
};

const aggregate: CommandHandler = async (args, ctx) => {
  const asset = toAsset(requireArg(args, 0, 'asset'));
  const timeframes = args.positionals.length > 1 ? args.positionals.slice(1).map(toTimeframe) : AGGREGATED_TIMEFRAMES;

  const results = aggregateFiles(ctx.config.dataDir, asset, timeframes, ctx.logger.child({ command: 'aggregate' }));
  for (const result of results) {
    ctx.out(`${TIMEFRAMES[result.timeframe].label}: ${result.candles} candles in ${result.files.length} files`);
  }
  return 0;
};

const split: CommandHandler = async (args, ctx) => {
  const asset = toAsset(requireArg(args, 0, 'asset'));
  const timeframe = toTimeframe(requireArg(args, 1, 'timeframe'));
  if (TIMEFRAMES[timeframe].partition !== 'year') {
    throw new Error(`${timeframe} is stored as a single full.csv`);
  }

  const written = splitFullFile(filePath(ctx.config.dataDir, asset, timeframe, 'full'));
  for (const file of written) {
    ctx.out(`Saved ${relative(ctx, file)}`);
  }
  return 0;
};

const combine: CommandHandler = async (args, ctx) => {
  const asset = toAsset(requireArg(args, 0, 'asset'));
  const timeframe = toTimeframe(requireArg(args, 1, 'timeframe'));
  const output = args.positionals[2] !== undefined ? resolvePath(ctx, args.positionals[2]) : undefined;

  const result = combineYearlyFiles(ctx.config.dataDir, asset, timeframe, output);
  ctx.out(`Combined ${result.files.length} files, removed ${result.removed} duplicates`);
  ctx.out(`Saved ${result.rows} rows to ${result.output}`);
  return 0;
};

export const COMMANDS: Record<string, Command> = {
  validate: {
    usage: 'validate [asset] [timeframe] [--strict]',
    description: 'Check data integrity of the archive',
    run: validate,
  },
  consistency: {
    usage: 'consistency <asset> <timeframe> [year]',
    description: 'Compare an aggregated timeframe with its 1-minute data',
    run: consistency,
  },
  gaps: {
    usage: 'gaps <file>',
    description: 'List missing candles and write <file>_missing_ranges.json',
    run: gaps,
  },
  backfill: {
    usage: 'backfill <ranges.json> [--merge] [--asset=btc|eth]',
    description: 'Fetch missing 1-minute candles from Binance',
    run: backfill,
  },
  merge: {
    usage: 'merge <original> <extra> [output]',
    description: 'Merge two candle files, dropping duplicates',
    run: merge,
  },
  dedupe: {
    usage: 'dedupe <asset> [timeframe]',
    description: 'Remove duplicate timestamps in place',
    run: dedupe,
  },
  fill: {
    usage: 'fill <file>',
    description: 'Forward-fill missing candles in place',
    run: fill,
  },
  'fix-zeros': {
    usage: 'fix-zeros <file>',
    description: 'Give zero-price candles the previous prices',
    run: fixZeros,
  },
  aggregate: {
    usage: 'aggregate <asset> [timeframe...]',
    description: 'Rebuild aggregated timeframes from 1-minute data',
    run: aggregate,
  },
  split: {
    usage: 'split <asset> <timeframe>',
    description: 'Split full.csv into yearly files',
    run: split,
  },
  combine: {
    usage: 'combine <asset> <timeframe> [output]',
    description: 'Join yearly files into one (default full.csv)',
    run: combine,
  },
};

export function usage(): string[] {
  return [
    'Usage: candle-archive <command> [...args]',
    '',
    ...Object.values(COMMANDS).map((c) => `  ${c.usage.padEnd(52)} ${c.description}`),
  ];
}

/**
 * Dispatch `argv` (without node and script) to a command
 */
export async function runCli(argv: readonly string[], ctx: CommandContext): Promise<number> {
  const [name, ...rest] = argv;
  const command = name !== undefined && Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;

  if (!command) {
    for (const line of usage()) {
      ctx.out(line);
    }
    return name === undefined || name === 'help' || name === '--help' ? 0 : 1;
  }

  try {
    return await command.run(parseArgs(rest), ctx);
  } catch (error) {
    ctx.logger.error(error instanceof Error ? error.message : String(error), { command: name });
    return 1;
  }
}
