import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { readCandleRows, writeCandleFile } from '../csv/store.js';
import { filePath, parseFilePath } from '../layout.js';
import { JAN_1_2024, candle, makeTempDir, removeDir, series } from '../test-utils.js';
import {
  combineYearlyFiles,
  dedupeFile,
  dedupeRows,
  fixZeroPriceRows,
  fixZeroPricesFile,
  mergeFiles,
  mergeRows,
  previousPartitionRow,
  splitByYear,
  splitFullFile,
} from './repair.js';

const BAD_LINE = '2024-01-01 00:09:00,oops,101,1,1704067740,102,99\n';

function zeroRow(unix: number) {
  return { ...candle(unix), open: 0, close: 0, high: 0, low: 0, volume: 0 };
}

describe('repair', () => {
  describe('dedupeRows', () => {
    it('should keep the first row per timestamp', () => {
      const result = dedupeRows([candle(JAN_1_2024), candle(JAN_1_2024 + 60), candle(JAN_1_2024, 500)]);

      expect(result.removed).toBe(1);
      expect(result.rows.map((r) => [r.unix_timestamp, r.open])).toEqual([
        [JAN_1_2024, 100],
        [JAN_1_2024 + 60, 100],
      ]);
    });
  });

  describe('mergeRows', () => {
    it('should sort, dedupe and prefer the primary series', () => {
      const primary = [candle(JAN_1_2024), candle(JAN_1_2024 + 120)];
      const extra = [candle(JAN_1_2024 + 120, 700), candle(JAN_1_2024 + 60, 500)];

      const result = mergeRows(primary, extra);

      expect(result.rows.map((r) => [r.unix_timestamp, r.open])).toEqual([
        [JAN_1_2024, 100],
        [JAN_1_2024 + 60, 500],
        [JAN_1_2024 + 120, 100],
      ]);
      expect(result.removed).toBe(1);
      expect(result.added).toBe(1);
    });
  });

  it('should split rows by UTC year', () => {
    const years = splitByYear([candle(JAN_1_2024 - 60), candle(JAN_1_2024), candle(JAN_1_2024 + 60)]);

    expect([...years.keys()]).toEqual([2023, 2024]);
    expect(years.get(2024)).toHaveLength(2);
  });

  describe('fixZeroPriceRows', () => {
    it('should copy the previous valid prices with zero volume', () => {
      const result = fixZeroPriceRows([candle(JAN_1_2024, 100, 5), zeroRow(JAN_1_2024 + 60), zeroRow(JAN_1_2024 + 120)]);

      expect(result.fixed).toBe(2);
      expect(result.dropped).toBe(0);
      expect(result.rows[2]).toEqual({
        timestamp: '2024-01-01 00:02:00',
        open: 100,
        close: 101,
        volume: 0,
        unix_timestamp: JAN_1_2024 + 120,
        high: 102,
        low: 99,
      });
    });

    it('should drop zero rows with nothing valid before them', () => {
      const result = fixZeroPriceRows([zeroRow(JAN_1_2024), candle(JAN_1_2024 + 60)]);

      expect(result.dropped).toBe(1);
      expect(result.rows.map((r) => r.unix_timestamp)).toEqual([JAN_1_2024 + 60]);
    });

    it('should seed from the row before the file', () => {
      const result = fixZeroPriceRows([zeroRow(JAN_1_2024)], candle(JAN_1_2024 - 60, 90));

      expect(result.fixed).toBe(1);
      expect(result.rows.map((r) => [r.open, r.close, r.high, r.low, r.volume])).toEqual([[90, 91, 92, 89, 0]]);
    });

    it('should keep rows where only some prices are zero', () => {
      const partial = { ...candle(JAN_1_2024), open: 0 };
      const result = fixZeroPriceRows([candle(JAN_1_2024 - 60), partial]);

      expect(result.fixed).toBe(0);
      expect(result.rows[1]).toEqual(partial);
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir();
    });

    afterEach(() => {
      removeDir(dir);
    });

    it('should dedupe a file in place with a backup', () => {
      const file = path.join(dir, '2024.csv');
      writeCandleFile(file, [...series(JAN_1_2024, 2), candle(JAN_1_2024)]);

      expect(dedupeFile(file).removed).toBe(1);
      expect(readCandleRows(file)).toHaveLength(2);
      expect(readCandleRows(`${file}.backup`)).toHaveLength(3);
    });

    it('should leave a clean file alone', () => {
      const file = path.join(dir, '2024.csv');
      writeCandleFile(file, series(JAN_1_2024, 2));

      expect(dedupeFile(file).removed).toBe(0);
      expect(fs.existsSync(`${file}.backup`)).toBe(false);
    });

    it('should merge a side file into a new output', () => {
      const original = path.join(dir, '2024.csv');
      const extra = path.join(dir, '2024_missing_data.csv');
      const output = path.join(dir, '2024_complete.csv');
      writeCandleFile(original, [candle(JAN_1_2024), candle(JAN_1_2024 + 120)]);
      writeCandleFile(extra, [candle(JAN_1_2024 + 60)]);

      const result = mergeFiles(original, extra, output);

      expect(result.added).toBe(1);
      expect(readCandleRows(output).map((r) => r.unix_timestamp)).toEqual([
        JAN_1_2024,
        JAN_1_2024 + 60,
        JAN_1_2024 + 120,
      ]);
      expect(readCandleRows(original)).toHaveLength(2);
    });

    it('should back up the original when merging in place', () => {
      const original = path.join(dir, '2024.csv');
      writeCandleFile(original, series(JAN_1_2024, 2));

      const result = mergeFiles(original, path.join(dir, 'absent.csv'), original);

      expect(result.added).toBe(0);
      expect(fs.existsSync(`${original}.backup`)).toBe(true);
    });

    it('should split full.csv into yearly files', () => {
      const full = path.join(dir, '5min', 'full.csv');
      writeCandleFile(full, [candle(JAN_1_2024 - 300), candle(JAN_1_2024), candle(JAN_1_2024 + 300)]);

      const written = splitFullFile(full);

      expect(written).toEqual([path.join(dir, '5min', '2023.csv'), path.join(dir, '5min', '2024.csv')]);
      expect(readCandleRows(path.join(dir, '5min', '2024.csv'))).toHaveLength(2);
    });

    it('should refuse to rewrite files with malformed lines', () => {
      const file = path.join(dir, '2024.csv');
      writeCandleFile(file, [...series(JAN_1_2024, 3), candle(JAN_1_2024)]);
      fs.appendFileSync(file, BAD_LINE);
      const before = fs.readFileSync(file, 'utf-8');
      const message = `Malformed row in ${file} at line 6: invalid number in column "open"`;

      expect(() => dedupeFile(file)).toThrow(message);
      expect(() => mergeFiles(file, path.join(dir, 'absent.csv'), file)).toThrow(message);
      expect(fs.readFileSync(file, 'utf-8')).toBe(before);
      expect(fs.existsSync(`${file}.backup`)).toBe(false);
    });

    it('should refuse to split a full.csv with malformed lines', () => {
      const full = path.join(dir, '5min', 'full.csv');
      writeCandleFile(full, [candle(JAN_1_2024)]);
      fs.appendFileSync(full, BAD_LINE);

      expect(() => splitFullFile(full)).toThrow(`Malformed row in ${full} at line 3`);
      expect(fs.existsSync(path.join(dir, '5min', '2024.csv'))).toBe(false);
    });

    it('should fix zero rows of a file in place with a backup', () => {
      const file = path.join(dir, '2024.csv');
      writeCandleFile(file, [candle(JAN_1_2024), zeroRow(JAN_1_2024 + 60)]);

      const result = fixZeroPricesFile(file);

      expect(result.fixed).toBe(1);
      expect(readCandleRows(file)[1]?.open).toBe(100);
      expect(readCandleRows(`${file}.backup`)[1]?.open).toBe(0);
    });

    it('should not rewrite a file without zero rows', () => {
      const file = path.join(dir, '2024.csv');
      writeCandleFile(file, series(JAN_1_2024, 2));

      expect(fixZeroPricesFile(file)).toEqual({ rows: series(JAN_1_2024, 2), fixed: 0, dropped: 0 });
      expect(fs.existsSync(`${file}.backup`)).toBe(false);
    });

    it('should find the last row of the previous year', () => {
      writeCandleFile(filePath(dir, 'btc', '1min', 2023), series(JAN_1_2024 - 180, 3));
      writeCandleFile(filePath(dir, 'btc', '1min', 2024), series(JAN_1_2024, 1));

      const current = parseFilePath(dir, filePath(dir, 'btc', '1min', 2024));
      const first = parseFilePath(dir, filePath(dir, 'btc', '1min', 2023));
      const full = parseFilePath(dir, filePath(dir, 'btc', 'daily', 'full'));

      expect(current && previousPartitionRow(current)?.timestamp).toBe('2023-12-31 23:59:00');
      expect(first && previousPartitionRow(first)).toBeNull();
      expect(full && previousPartitionRow(full)).toBeNull();
    });

    it('should combine yearly files into full.csv', () => {
      writeCandleFile(filePath(dir, 'eth', '5min', 2023), series(JAN_1_2024 - 600, 2, 300));
      writeCandleFile(filePath(dir, 'eth', '5min', 2024), series(JAN_1_2024, 3, 300));

      const result = combineYearlyFiles(dir, 'eth', '5min');

      expect(result.output).toBe(filePath(dir, 'eth', '5min', 'full'));
      expect(result.files).toEqual([
        path.resolve(filePath(dir, 'eth', '5min', 2023)),
        path.resolve(filePath(dir, 'eth', '5min', 2024)),
      ]);
      expect(result.rows).toBe(5);
      expect(result.removed).toBe(0);
      expect(readCandleRows(result.output).map((r) => r.timestamp)).toEqual([
        '2023-12-31 23:50:00',
        '2023-12-31 23:55:00',
        '2024-01-01 00:00:00',
        '2024-01-01 00:05:00',
        '2024-01-01 00:10:00',
      ]);
    });

    it('should refuse to combine timeframes stored as full.csv', () => {
      expect(() => combineYearlyFiles(dir, 'btc', 'daily')).toThrow('daily is already stored as a single full.csv');
      expect(() => combineYearlyFiles(dir, 'btc', '1min')).toThrow(`No yearly 1min files found for btc under ${dir}`);
    });
  });
});
