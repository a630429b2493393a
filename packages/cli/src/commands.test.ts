import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { createSilentLogger, formatTimestamp, type CandleRow, type CandleSource } from '@candle-archive/shared';
import { aggregate, filePath, readCandleRows, writeCandleFile } from '@candle-archive/dataset';
import { runCli, type CommandContext } from './commands.js';

/** 2024-01-01 00:00:00 UTC */
const JAN_1_2024 = 1704067200;

function candle(unix: number, price: number = 100): CandleRow {
  return {
    timestamp: formatTimestamp(unix),
    open: price,
    close: price + 1,
    volume: 1,
    unix_timestamp: unix,
    high: price + 2,
    low: price - 1,
  };
}

function series(start: number, count: number, step: number = 60): CandleRow[] {
  return Array.from({ length: count }, (_, i) => candle(start + i * step, 100 + i));
}

/**
 * Helper: a source that has every minute
 */
const completeSource: CandleSource = {
  name: 'fake',
  fetchMinuteCandles: async (_asset, start, end) => series(start, (end - start) / 60 + 1),
};

describe('CLI', () => {
  let root: string;
  let lines: string[];
  let ctx: CommandContext;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'candle-cli-'));
    lines = [];
    ctx = {
      config: {
        dataDir: root,
        logLevel: 'error',
        logToFile: false,
        binanceSymbols: { btc: 'BTCUSDT', eth: 'ETHUSDT' },
        backfill: { concurrency: 2, maxRetries: 0, retryDelayMs: 0 },
      },
      logger: createSilentLogger(),
      out: (line) => lines.push(line),
      createSource: () => completeSource,
      cwd: root,
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const minuteFile = (): string => filePath(root, 'btc', '1min', 2024);

  describe('dispatch', () => {
    it('should print usage without a command', async () => {
      expect(await runCli([], ctx)).toBe(0);
      expect(lines[0]).toBe('Usage: candle-archive <command> [...args]');
    });

    it('should fail on an unknown command', async () => {
      expect(await runCli(['frobnicate'], ctx)).toBe(1);
      expect(lines[0]).toBe('Usage: candle-archive <command> [...args]');
    });

    it('should not treat object prototype keys as commands', async () => {
      expect(await runCli(['constructor'], ctx)).toBe(1);
      expect(await runCli(['toString'], ctx)).toBe(1);
      expect(lines.filter((line) => line.startsWith('Usage:'))).toHaveLength(2);
    });

    it('should log command errors and exit 1', async () => {
      const error = vi.spyOn(ctx.logger, 'error');

      expect(await runCli(['validate', 'doge'], ctx)).toBe(1);
      expect(error).toHaveBeenCalledWith('Unknown asset "doge" (expected btc or eth)', { command: 'validate' });
    });

    it('should report missing arguments', async () => {
      const error = vi.spyOn(ctx.logger, 'error');

      expect(await runCli(['gaps'], ctx)).toBe(1);
      expect(error).toHaveBeenCalledWith('Missing argument <file>', { command: 'gaps' });
    });
  });

  describe('validate', () => {
    it('should pass a clean archive', async () => {
      writeCandleFile(minuteFile(), series(JAN_1_2024, 3));

      expect(await runCli(['validate'], ctx)).toBe(0);
      expect(lines).toEqual([
        `✅ ${path.join('btc', '1min', '2024.csv')}: 3 rows`,
        'Files: 1 | Rows: 3 | Errors: 0 | Warnings: 0',
      ]);
    });

    it('should fail gaps in strict mode', async () => {
      writeCandleFile(minuteFile(), [candle(JAN_1_2024), candle(JAN_1_2024 + 180)]);

      expect(await runCli(['validate', 'btc', '1min', '--strict'], ctx)).toBe(1);
      expect(lines).toEqual([
        `❌ ${path.join('btc', '1min', '2024.csv')}: 2 rows`,
        '   error gap line 3: Gap of 2 candles between 2024-01-01 00:00:00 and 2024-01-01 00:03:00',
        'Files: 1 | Rows: 2 | Errors: 1 | Warnings: 0',
      ]);
    });

    it('should pass the sample archive shipped in data/', async () => {
      ctx.config.dataDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../data');

      expect(await runCli(['validate'], ctx)).toBe(0);
      expect(lines[lines.length - 1]).toBe('Files: 16 | Rows: 458 | Errors: 0 | Warnings: 0');

      lines.length = 0;
      expect(await runCli(['consistency', 'eth', 'weekly'], ctx)).toBe(0);
      expect(lines).toEqual(['✅ eth weekly: 2 buckets checked, 0 issues']);
    });

    it('should fail when nothing matches', async () => {
      expect(await runCli(['validate', 'eth'], ctx)).toBe(1);
      expect(lines).toEqual(['No dataset files found']);
    });
  });

  describe('gaps and backfill', () => {
    beforeEach(() => {
      writeCandleFile(minuteFile(), [candle(JAN_1_2024), candle(JAN_1_2024 + 180)]);
    });

    it('should write the ranges report', async () => {
      expect(await runCli(['gaps', path.join('btc', '1min', '2024.csv')], ctx)).toBe(0);

      const report = path.join(root, 'btc', '1min', '2024_missing_ranges.json');
      expect(lines).toEqual([
        '   2024-01-01 00:01:00 UTC to 2024-01-01 00:02:00 UTC (2 minutes)',
        '❌ Missing timestamps: 2 in 1 ranges',
        `Saved ranges to ${report}`,
      ]);
      expect(fs.existsSync(report)).toBe(true);
    });

    it('should say so when nothing is missing', async () => {
      writeCandleFile(minuteFile(), series(JAN_1_2024, 3));

      expect(await runCli(['gaps', minuteFile()], ctx)).toBe(0);
      expect(lines).toEqual(['✅ No missing data found']);
    });

    it('should backfill into a side file', async () => {
      await runCli(['gaps', minuteFile()], ctx);
      lines.length = 0;

      const report = path.join(root, 'btc', '1min', '2024_missing_ranges.json');
      expect(await runCli(['backfill', report], ctx)).toBe(0);

      const sideFile = path.join(root, 'btc', '1min', '2024_missing_data.csv');
      expect(lines).toEqual(['Retrieved 2 candles, 1/1 ranges complete', `Saved to ${sideFile}`]);
      expect(readCandleRows(sideFile).map((r) => r.unix_timestamp)).toEqual([JAN_1_2024 + 60, JAN_1_2024 + 120]);
      expect(readCandleRows(minuteFile())).toHaveLength(2);
    });

    it('should merge backfilled rows with --merge', async () => {
      await runCli(['gaps', minuteFile()], ctx);

      const report = path.join(root, 'btc', '1min', '2024_missing_ranges.json');
      expect(await runCli(['backfill', report, '--merge'], ctx)).toBe(0);

      expect(readCandleRows(minuteFile()).map((r) => r.unix_timestamp)).toEqual([
        JAN_1_2024,
        JAN_1_2024 + 60,
        JAN_1_2024 + 120,
        JAN_1_2024 + 180,
      ]);
      expect(fs.existsSync(`${minuteFile()}.backup`)).toBe(true);
    });

    it('should not merge into a file with malformed lines', async () => {
      await runCli(['gaps', minuteFile()], ctx);
      fs.appendFileSync(minuteFile(), 'garbage\n');
      const error = vi.spyOn(ctx.logger, 'error');

      const report = path.join(root, 'btc', '1min', '2024_missing_ranges.json');
      expect(await runCli(['backfill', report, '--merge'], ctx)).toBe(1);
      expect(error).toHaveBeenCalledWith(`Malformed row in ${minuteFile()} at line 4: expected 7 columns, found 1`, {
        command: 'backfill',
      });
      expect(fs.existsSync(`${minuteFile()}.backup`)).toBe(false);
    });

    it('should fail when the source returns nothing', async () => {
      await runCli(['gaps', minuteFile()], ctx);
      lines.length = 0;
      ctx.createSource = () => ({ name: 'empty', fetchMinuteCandles: async () => [] });

      const report = path.join(root, 'btc', '1min', '2024_missing_ranges.json');
      expect(await runCli(['backfill', report], ctx)).toBe(1);
      expect(lines).toEqual(['❌ No missing data could be retrieved']);
    });
  });

  describe('consistency and aggregate', () => {
    it('should accept aggregates rebuilt from minutes', async () => {
      writeCandleFile(minuteFile(), series(JAN_1_2024, 3));

      expect(await runCli(['aggregate', 'btc', 'hourly'], ctx)).toBe(0);
      expect(lines).toEqual(['1 Hour: 1 candles in 1 files']);

      lines.length = 0;
      expect(await runCli(['consistency', 'btc', 'hourly'], ctx)).toBe(0);
      expect(lines).toEqual(['✅ btc hourly: 1 buckets checked, 0 issues']);
    });

    it('should report aggregates that disagree', async () => {
      const minutes = series(JAN_1_2024, 3);
      writeCandleFile(minuteFile(), minutes);
      const [hour] = aggregate(minutes, 'hourly');
      if (!hour) throw new Error('expected one hourly candle');
      writeCandleFile(filePath(root, 'btc', 'hourly', 'full'), [{ ...hour, close: 999 }]);

      expect(await runCli(['consistency', 'btc', 'hourly', '2024'], ctx)).toBe(1);
      expect(lines).toEqual([
        '   field-mismatch 2024-01-01 00:00:00 close: expected 103, found 999',
        '❌ btc hourly: 1 buckets checked, 1 issues',
      ]);
    });
  });

  describe('repair commands', () => {
    it('should dedupe files of an asset', async () => {
      writeCandleFile(minuteFile(), [...series(JAN_1_2024, 2), candle(JAN_1_2024)]);

      expect(await runCli(['dedupe', 'btc'], ctx)).toBe(0);
      expect(lines).toEqual([`${path.join('btc', '1min', '2024.csv')}: removed 1 duplicates`, 'Removed 1 duplicates']);
      expect(readCandleRows(minuteFile())).toHaveLength(2);
    });

    it('should forward-fill a file', async () => {
      writeCandleFile(minuteFile(), [candle(JAN_1_2024), candle(JAN_1_2024 + 180)]);

      expect(await runCli(['fill', minuteFile()], ctx)).toBe(0);
      expect(lines).toEqual([`Filled 2 missing candles in ${minuteFile()}`]);
      expect(readCandleRows(minuteFile())).toHaveLength(4);
    });

    it('should seed the fill of a year from the end of the previous one', async () => {
      writeCandleFile(filePath(root, 'btc', '1min', 2023), series(JAN_1_2024 - 180, 3));
      writeCandleFile(minuteFile(), [candle(JAN_1_2024 + 120)]);

      expect(await runCli(['fill', minuteFile()], ctx)).toBe(0);
      expect(lines).toEqual([`Filled 2 missing candles in ${minuteFile()}`]);
      expect(readCandleRows(minuteFile()).map((r) => [r.timestamp, r.open, r.volume])).toEqual([
        ['2024-01-01 00:00:00', 102, 0],
        ['2024-01-01 00:01:00', 102, 0],
        ['2024-01-01 00:02:00', 100, 1],
      ]);
    });

    it('should keep a seeded fill inside the file year', async () => {
      writeCandleFile(filePath(root, 'btc', '1min', 2023), [candle(JAN_1_2024 - 600, 90)]);
      writeCandleFile(minuteFile(), [candle(JAN_1_2024 + 60)]);

      expect(await runCli(['fill', minuteFile()], ctx)).toBe(0);
      expect(readCandleRows(minuteFile()).map((r) => [r.timestamp, r.open])).toEqual([
        ['2024-01-01 00:00:00', 90],
        ['2024-01-01 00:01:00', 100],
      ]);
    });

    it('should fix zero-price candles from the previous year', async () => {
      const zero = { ...candle(JAN_1_2024), open: 0, close: 0, high: 0, low: 0, volume: 0 };
      writeCandleFile(filePath(root, 'btc', '1min', 2023), series(JAN_1_2024 - 120, 2));
      writeCandleFile(minuteFile(), [zero, candle(JAN_1_2024 + 60)]);

      expect(await runCli(['fix-zeros', minuteFile()], ctx)).toBe(0);
      expect(lines).toEqual([`Fixed 1 zero-price candles in ${minuteFile()}`]);
      expect(readCandleRows(minuteFile())[0]).toEqual({ ...candle(JAN_1_2024, 101), volume: 0 });
      expect(fs.existsSync(`${minuteFile()}.backup`)).toBe(true);
    });

    it('should drop leading zero-price candles with nothing to copy', async () => {
      const zero = { ...candle(JAN_1_2024), open: 0, close: 0, high: 0, low: 0, volume: 0 };
      writeCandleFile(minuteFile(), [zero, candle(JAN_1_2024 + 60)]);

      expect(await runCli(['fix-zeros', minuteFile()], ctx)).toBe(0);
      expect(lines).toEqual([
        `Fixed 0 zero-price candles in ${minuteFile()}`,
        '⚠️ Dropped 1 zero-price candles with no earlier prices',
      ]);
      expect(readCandleRows(minuteFile())).toHaveLength(1);
    });

    it('should say so when no candle has zero prices', async () => {
      writeCandleFile(minuteFile(), series(JAN_1_2024, 2));

      expect(await runCli(['fix-zeros', minuteFile()], ctx)).toBe(0);
      expect(lines).toEqual(['✅ No zero-price candles found']);
    });

    it('should combine yearly files into full.csv', async () => {
      writeCandleFile(filePath(root, 'btc', '1min', 2023), series(JAN_1_2024 - 120, 2));
      writeCandleFile(minuteFile(), series(JAN_1_2024, 3));

      expect(await runCli(['combine', 'btc', '1min'], ctx)).toBe(0);

      const output = filePath(root, 'btc', '1min', 'full');
      expect(lines).toEqual(['Combined 2 files, removed 0 duplicates', `Saved 5 rows to ${output}`]);
      expect(readCandleRows(output)).toHaveLength(5);
    });

    it('should combine into a chosen output', async () => {
      writeCandleFile(minuteFile(), series(JAN_1_2024, 3));

      expect(await runCli(['combine', 'btc', '1min', 'btc_all.csv'], ctx)).toBe(0);
      expect(lines[1]).toBe(`Saved 3 rows to ${path.join(root, 'btc_all.csv')}`);
    });

    it('should merge two files into <original>_complete.csv', async () => {
      const extra = path.join(root, 'extra.csv');
      writeCandleFile(minuteFile(), [candle(JAN_1_2024), candle(JAN_1_2024 + 120)]);
      writeCandleFile(extra, [candle(JAN_1_2024 + 60)]);

      expect(await runCli(['merge', minuteFile(), 'extra.csv'], ctx)).toBe(0);

      const output = path.join(root, 'btc', '1min', '2024_complete.csv');
      expect(lines).toEqual(['Merged 1 new rows, removed 0 duplicates', `Saved 3 rows to ${output}`]);
    });

    it('should split a full file by year', async () => {
      writeCandleFile(filePath(root, 'eth', '5min', 'full'), [candle(JAN_1_2024 - 300), candle(JAN_1_2024)]);

      expect(await runCli(['split', 'eth', '5min'], ctx)).toBe(0);
      expect(lines).toEqual([
        `Saved ${path.join('eth', '5min', '2023.csv')}`,
        `Saved ${path.join('eth', '5min', '2024.csv')}`,
      ]);
    });

    it('should not aggregate minutes with malformed lines', async () => {
      writeCandleFile(minuteFile(), series(JAN_1_2024, 3));
      fs.appendFileSync(minuteFile(), 'garbage\n');
      const error = vi.spyOn(ctx.logger, 'error');

      expect(await runCli(['aggregate', 'btc', 'hourly'], ctx)).toBe(1);
      expect(error).toHaveBeenCalledWith(`Malformed row in ${minuteFile()} at line 5: expected 7 columns, found 1`, {
        command: 'aggregate',
      });
      expect(fs.existsSync(filePath(root, 'btc', 'hourly', 'full'))).toBe(false);
    });

    it('should refuse to split timeframes stored as full.csv', async () => {
      expect(await runCli(['split', 'eth', 'daily'], ctx)).toBe(1);
    });
  });
});
