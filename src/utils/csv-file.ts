/**
 * CSV File Utilities
 *
 * Reads and writes whole tables with papaparse. A table is fully
 * serialized before anything touches the disk, written to a temporary
 * sibling file and renamed into place, so readers only ever see a complete
 * file or no file.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import Papa from 'papaparse';

/**
 * Serialize rows to CSV text with a fixed column order
 *
 * null values are written as empty cells. A table with no rows still gets
 * its header line. Lines are joined with '\n', with no trailing newline.
 */
export function serializeCsv<T extends object>(rows: readonly T[], columns: readonly string[]): string {
  const data = rows.map((row) => {
    const values = new Map<string, unknown>(Object.entries(row));
    return columns.map((column) => values.get(column) ?? null);
  });

  return Papa.unparse([[...columns], ...data], { newline: '\n' });
}

/**
 * Parse CSV text with a header line into records of strings
 */
export function parseCsv(text: string): Record<string, string>[] {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
  });
  return result.data;
}

/**
 * Check whether a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Write rows to a CSV file in one step
 *
 * @returns Number of data rows written
 */
export async function writeCsvFile<T extends object>(
  filePath: string,
  rows: readonly T[],
  columns: readonly string[]
): Promise<number> {
  const content = serializeCsv(rows, columns);
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`
  );

  await fs.writeFile(tempPath, content, 'utf8');
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  return rows.length;
}

/**
 * Read a CSV file into records of strings
 */
export async function readCsvFile(filePath: string): Promise<Record<string, string>[]> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseCsv(text);
}
