import fs from 'fs';
import os from 'os';
import path from 'path';
import { SheetService } from '../../src/services/sheet.service';
import { SheetParseError } from '../../src/models/errors';

describe('SheetService', () => {
  describe('parseCsv', () => {
    it('should parse rows of strings and keep quoted commas', () => {
      const sheet = SheetService.parseCsv('First,Last\nJane,Doe\n"Smith, Jr",John', 'members.csv');

      expect(sheet).toEqual({
        name: 'members.csv',
        rows: [
          ['First', 'Last'],
          ['Jane', 'Doe'],
          ['Smith, Jr', 'John'],
        ],
      });
    });

    it('should strip a leading byte order mark', () => {
      expect(SheetService.parseCsv('\uFEFFFirst,Last').rows[0]).toEqual(['First', 'Last']);
    });

    it('should reject unterminated quotes', () => {
      expect(() => SheetService.parseCsv('a,"b\nc,d', 'broken.csv')).toThrow(SheetParseError);
    });
  });

  describe('toCsv', () => {
    it('should quote where needed and write empty cells for null', () => {
      expect(
        SheetService.toCsv([
          ['a', null, 3],
          ['x,y', 'z', true],
        ])
      ).toBe('a,,3\r\n"x,y",z,true');
    });

    it('should read back what it writes', () => {
      const rows = [
        ['Giver \\ Receiver', 'Jane Doe', 'Change in Referrals:'],
        ['Jane Doe', '0', '+4 ↗️'],
      ];

      expect(SheetService.parseCsv(SheetService.toCsv(rows)).rows).toEqual(rows);
    });
  });

  describe('listCsvFiles', () => {
    let directory: string;

    beforeAll(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'slip-sheets-'));
      fs.writeFileSync(path.join(directory, 'b.csv'), 'x');
      fs.writeFileSync(path.join(directory, 'a.CSV'), 'x');
      fs.writeFileSync(path.join(directory, 'notes.txt'), 'x');
    });

    afterAll(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should list .csv files sorted by name', async () => {
      await expect(SheetService.listCsvFiles(directory)).resolves.toEqual([
        path.join(directory, 'a.CSV'),
        path.join(directory, 'b.csv'),
      ]);
    });

    it('should return an empty list for a missing directory', async () => {
      await expect(SheetService.listCsvFiles(path.join(directory, 'missing'))).resolves.toEqual([]);
    });

    it('should rethrow errors other than a missing directory', async () => {
      await expect(SheetService.listCsvFiles(path.join(directory, 'b.csv'))).rejects.toMatchObject({
        code: 'ENOTDIR',
      });
    });
  });

  describe('readCsv and writeCsv', () => {
    it('should write a grid and read it back by file name', async () => {
      const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'slip-report-'));
      const filePath = path.join(directory, 'nested', 'report.csv');

      await SheetService.writeCsv(filePath, [
        ['Member Name', 'Total'],
        ['Jane Doe', 4],
      ]);
      const sheet = await SheetService.readCsv(filePath);

      expect(sheet).toEqual({
        name: 'report.csv',
        rows: [
          ['Member Name', 'Total'],
          ['Jane Doe', '4'],
        ],
      });

      fs.rmSync(directory, { recursive: true, force: true });
    });
  });
});
