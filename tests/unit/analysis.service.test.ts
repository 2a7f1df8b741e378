import { AnalysisService } from '../../src/services/analysis.service';
import { SheetService } from '../../src/services/sheet.service';
import type { CellRow, Sheet } from '../../src/types/models';

const SLIP_HEADER: CellRow = ['Giver', 'Receiver', 'Slip Type', 'Date', 'Amount', 'Business Type', 'Detail'];

const memberSheet: Sheet = {
  name: 'members.csv',
  rows: [
    ['First Name', 'Last Name'],
    ['Alice', 'Smith'],
    ['Bob', 'Jones'],
    ['Carol', 'White'],
    ['alice', 'smith'],
  ],
};

const slipSheet: Sheet = {
  name: 'week1.csv',
  rows: [
    SLIP_HEADER,
    ['Alice Smith', 'Bob Jones', 'Referral'],
    ['Bob Jones', 'Alice Smith', 'One to One'],
    ['Alice Smith', 'Carol White', 'TYFCB', '', '$100.00', '', ''],
    ['Alice Smith', 'Bob Jones', 'Lunch Meeting'],
  ],
};

describe('AnalysisService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('runFromSheets', () => {
    it('should run the whole pipeline and collect warnings', () => {
      const result = AnalysisService.runFromSheets({ memberSheets: [memberSheet], dataSheets: [slipSheet] });

      expect(result.success).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([
        'members.csv: Duplicate member "alice smith" ignored; keeping "Alice Smith"',
        'week1.csv: Row 5: unrecognized slip type "Lunch Meeting"',
      ]);
      expect(result.issues.map((issue) => issue.code)).toEqual(['duplicate_member', 'unrecognized_slip_type']);
      expect(result.members.map((member) => member.fullName)).toEqual(['Alice Smith', 'Bob Jones', 'Carol White']);

      const { report } = result;
      expect(report?.matrices.referral.matrix.toArray()).toEqual([
        [0, 1, 0],
        [0, 0, 0],
        [0, 0, 0],
      ]);
      expect(report?.matrices.combination.matrix.toArray()).toEqual([
        [0, 3, 0],
        [1, 0, 0],
        [0, 0, 0],
      ]);
      expect(report?.thankYouSummary.totalAmount).toBe(100);
      expect(report?.thankYouSummary.withinPercentage).toBe(100);
      expect(report?.dataQuality.members.duplicates).toBe(1);
      expect(report?.relationStatistics.totalMeetings).toBe(1);
      expect(report?.thankYouLeaders.givers.map((entry) => [entry.member.fullName, entry.amount])).toEqual([
        ['Alice Smith', 100],
      ]);
      expect(report?.thankYouLeaders.receivers.map((entry) => [entry.member.fullName, entry.amount])).toEqual([
        ['Carol White', 100],
      ]);
      expect(report?.thankYouPairs.within.toArray()).toEqual([
        [0, 0, 100],
        [0, 0, 0],
        [0, 0, 0],
      ]);
      expect(report?.memberPerformance.map((entry) => entry.member)).toEqual([
        'Alice Smith',
        'Bob Jones',
        'Carol White',
      ]);
      expect(report?.memberPerformance[0].referralEfficiency).toBeCloseTo(1 / 3);
      expect(result.elapsedSeconds).toBeGreaterThanOrEqual(0);
    });

    it('should fail without member sheets', () => {
      const result = AnalysisService.runFromSheets({ memberSheets: [], dataSheets: [slipSheet] });

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['No member files provided']);
      expect(result.report).toBeNull();
    });

    it('should fail without data sheets', () => {
      const result = AnalysisService.runFromSheets({ memberSheets: [memberSheet], dataSheets: [] });

      expect(result.errors).toEqual(['No slip data files provided']);
    });

    it('should fail when the member sheets hold no members', () => {
      const result = AnalysisService.runFromSheets({
        memberSheets: [{ name: 'empty.csv', rows: [['First Name', 'Last Name']] }],
        dataSheets: [slipSheet],
      });

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['No members found in the member files']);
    });

    it('should pass the within-organization rule through', () => {
      const result = AnalysisService.runFromSheets({
        memberSheets: [memberSheet],
        dataSheets: [slipSheet],
        withinOrganizationRule: 'never',
      });

      expect(result.report?.thankYouSummary.amountOutside).toBe(100);
    });
  });

  describe('runFromFiles', () => {
    it('should skip unreadable files with a warning', async () => {
      jest.spyOn(SheetService, 'readCsv').mockImplementation(async (filePath: string) => {
        if (filePath === 'members.csv') {
          return memberSheet;
        }
        if (filePath === 'week1.csv') {
          return slipSheet;
        }
        throw new Error(`ENOENT: no such file ${filePath}`);
      });

      const result = await AnalysisService.runFromFiles({
        memberFiles: ['members.csv'],
        dataFiles: ['missing.csv', 'week1.csv'],
      });

      expect(result.success).toBe(true);
      expect(result.warnings[0]).toBe('missing.csv: Skipped unreadable file: ENOENT: no such file missing.csv');
      expect(result.issues[0].code).toBe('file_skipped');
      expect(result.relations.referrals).toHaveLength(1);
    });

    it('should fail when every data file is unreadable', async () => {
      jest.spyOn(SheetService, 'readCsv').mockImplementation(async (filePath: string) => {
        if (filePath === 'members.csv') {
          return memberSheet;
        }
        throw new Error('unreadable');
      });

      const result = await AnalysisService.runFromFiles({ memberFiles: ['members.csv'], dataFiles: ['bad.csv'] });

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['No slip data files provided']);
      expect(result.warnings).toContain('bad.csv: Skipped unreadable file: unreadable');
    });

    it('should fail fast without member files', async () => {
      const readCsv = jest.spyOn(SheetService, 'readCsv');

      const result = await AnalysisService.runFromFiles({ memberFiles: [], dataFiles: ['week1.csv'] });

      expect(result.errors).toEqual(['No member files provided']);
      expect(readCsv).not.toHaveBeenCalled();
    });
  });
});
