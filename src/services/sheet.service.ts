import fs from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import { logger } from '../config/logger.js';
import { SheetParseError } from '../models/errors.js';
import type { CellValue, Sheet } from '../types/models.js';

export class SheetService {
  /**
   * Parse CSV text into rows of strings. Blank lines stay in as empty rows;
   * consumers skip them.
   *
   * @throws SheetParseError on malformed quoting
   */
  static parseCsv(text: string, name = 'sheet'): Sheet {
    const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), { skipEmptyLines: false });

    const fatal = result.errors.find((error) => error.type === 'Quotes');
    if (fatal) {
      throw new SheetParseError(name, `${fatal.message} (row ${fatal.row ?? '?'})`);
    }
    for (const error of result.errors) {
      logger.debug(`CSV notice in ${name}: ${error.message}`, { code: error.code, row: error.row });
    }

    return { name, rows: result.data };
  }

  static toCsv(rows: readonly (readonly CellValue[])[]): string {
    return Papa.unparse(rows.map((row) => row.map((value) => value ?? '')));
  }

  static async readCsv(filePath: string): Promise<Sheet> {
    const text = await fs.readFile(filePath, 'utf-8');
    return this.parseCsv(text, path.basename(filePath));
  }

  static async writeCsv(filePath: string, rows: readonly (readonly CellValue[])[]): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, this.toCsv(rows), 'utf-8');
    logger.info(`Wrote ${rows.length} rows to ${filePath}`);
  }

  /**
   * Full paths of the .csv files directly inside a directory, sorted by name.
   * A missing directory yields an empty list.
   */
  static async listCsvFiles(directory: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (isMissingPath(error)) {
        logger.warn(`Directory not found: ${directory}`);
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => entry.toLowerCase().endsWith('.csv'))
      .sort()
      .map((entry) => path.join(directory, entry));
  }
}

// fs errors may come from another realm, where `instanceof Error` is false
function isMissingPath(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
