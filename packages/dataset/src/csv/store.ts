/**
 * Reading and writing candle files on disk
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CandleRow } from '@candle-archive/shared';
import { parseCandleCsv, serializeCandleCsv, type ParsedCandleCsv } from './codec.js';

export interface WriteOptions {
  /**
   * Keep the previous file as `<file>.backup`, or `.backup2`, `.backup3`...
   * when earlier backups exist (default: false)
   */
  backup?: boolean;
}

/**
 * Parse a candle file
 *
 * @throws when the file does not exist
 */
export function readCandleFile(filePath: string): ParsedCandleCsv {
  if (!fs.existsSync(filePath)) {
    throw new Error(`CSV file not found: ${filePath}`);
  }
  return parseCandleCsv(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Rows of a candle file, throwing if the header is wrong or a line is malformed
 *
 * For tools that transform files: validation reports bad lines, everything
 * else refuses to touch such files.
 */
export function readCandleRows(filePath: string): CandleRow[] {
  const parsed = readCandleFile(filePath);
  if (!parsed.headerValid) {
    throw new Error(`Unexpected header in ${filePath}: ${parsed.header.join(',') || '(empty)'}`);
  }
  const [firstError] = parsed.errors;
  if (firstError) {
    const more = parsed.errors.length > 1 ? ` (${parsed.errors.length} malformed lines)` : '';
    throw new Error(`Malformed row in ${filePath} at line ${firstError.line}: ${firstError.message}${more}`);
  }
  return parsed.rows;
}

/**
 * First unused backup name: `<file>.backup`, then `<file>.backup2`, ...
 */
export function nextBackupPath(filePath: string): string {
  let candidate = `${filePath}.backup`;
  for (let n = 2; fs.existsSync(candidate); n++) {
    candidate = `${filePath}.backup${n}`;
  }
  return candidate;
}

/**
 * Write rows to a candle file
 *
 * Writes a temp file next to the target and renames it into place.
 *
 * @returns Path of the backup made, or null
 */
export function writeCandleFile(
  filePath: string,
  rows: readonly CandleRow[],
  options: WriteOptions = {}
): string | null {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const tmpPath = `${filePath}.tmp-${process.pid}`;
  fs.writeFileSync(tmpPath, serializeCandleCsv(rows), 'utf-8');

  let backupPath: string | null = null;
  if (options.backup && fs.existsSync(filePath)) {
    backupPath = nextBackupPath(filePath);
    fs.renameSync(filePath, backupPath);
  }
  fs.renameSync(tmpPath, filePath);
  return backupPath;
}
