/**
 * CSV File Utilities Tests
 *
 * Uses a temporary directory; nothing outside it is touched.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  fileExists,
  parseCsv,
  readCsvFile,
  serializeCsv,
  writeCsvFile,
} from '../../src/utils/csv-file';

describe('serializeCsv', () => {
  it('should write columns in the given order', () => {
    const text = serializeCsv([{ b: 2, a: 1 }], ['a', 'b']);

    expect(text).toBe('a,b\n1,2');
  });

  it('should write null and missing values as empty cells', () => {
    const text = serializeCsv([{ a: null }], ['a', 'b']);

    expect(text).toBe('a,b\n,');
  });

  it('should quote values containing delimiters', () => {
    const text = serializeCsv([{ news: 'Knee injury, 50% chance' }], ['news']);

    expect(text).toBe('news\n"Knee injury, 50% chance"');
  });

  it('should write the header for an empty table', () => {
    expect(serializeCsv([], ['a', 'b'])).toBe('a,b');
  });
});

describe('parseCsv', () => {
  it('should parse rows into string records', () => {
    expect(parseCsv('id,minutes\n1,90\n2,\n')).toEqual([
      { id: '1', minutes: '90' },
      { id: '2', minutes: '' },
    ]);
  });
});

describe('CSV files', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'csv-file-test-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should write a file and read it back', async () => {
    const filePath = path.join(directory, 'teams.csv');

    const rowCount = await writeCsvFile(
      filePath,
      [
        { fpl_code: 1, name: 'Arsenal' },
        { fpl_code: 2, name: 'Aston Villa' },
      ],
      ['fpl_code', 'name']
    );

    expect(rowCount).toBe(2);
    expect(await readCsvFile(filePath)).toEqual([
      { fpl_code: '1', name: 'Arsenal' },
      { fpl_code: '2', name: 'Aston Villa' },
    ]);
  });

  it('should leave no temporary file behind', async () => {
    await writeCsvFile(path.join(directory, 'players.csv'), [{ id: 1 }], ['id']);

    expect(await fs.readdir(directory)).toEqual(['players.csv']);
  });

  it('should replace an existing file', async () => {
    const filePath = path.join(directory, 'latest.csv');
    await writeCsvFile(filePath, [{ id: 1 }], ['id']);
    await writeCsvFile(filePath, [{ id: 2 }], ['id']);

    expect(await fs.readFile(filePath, 'utf8')).toBe('id\n2');
  });

  it('should report whether a file exists', async () => {
    const filePath = path.join(directory, 'missing.csv');

    expect(await fileExists(filePath)).toBe(false);
    await fs.writeFile(filePath, 'id\n');
    expect(await fileExists(filePath)).toBe(true);
  });

  it('should rethrow errors other than a missing file', async () => {
    const filePath = path.join(directory, 'teams.csv');
    await fs.writeFile(filePath, 'id\n');

    await expect(fileExists(path.join(filePath, 'nested.csv'))).rejects.toMatchObject({ code: 'ENOTDIR' });
  });

  it('should remove the temporary file when the rename fails', async () => {
    const target = path.join(directory, 'occupied.csv');
    await fs.mkdir(target);

    await expect(writeCsvFile(target, [{ id: 1 }], ['id'])).rejects.toMatchObject({ code: 'EISDIR' });
    expect(await fs.readdir(directory)).toEqual(['occupied.csv']);
  });
});
