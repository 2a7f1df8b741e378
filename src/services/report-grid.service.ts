import { COMBINATION_HEADERS } from './snapshot-comparator.service.js';
import type { MemberMatrix } from '../models/matrix.js';
import type { CountMatrixResult } from './matrix-aggregator.service.js';
import type { CombinationMatrixResult } from './combination.service.js';
import type { CellValue, ThankYou, ThankYouSummary } from '../types/models.js';

export const GRID_CORNER = 'Giver \\ Receiver';

export const REPORT_HEADERS = {
  TOTAL_REFERRALS_GIVEN: 'Total Referrals Given:',
  UNIQUE_REFERRALS_GIVEN: 'Unique Referrals Given:',
  TOTAL_REFERRALS_RECEIVED: 'Total Referrals Received:',
  UNIQUE_REFERRALS_RECEIVED: 'Unique Referrals Received:',
  TOTAL_OTO: 'Total OTO:',
  UNIQUE_OTO: 'Unique OTO:',
  TOTAL_TYFCB_GIVEN: 'Total TYFCB Given:',
  TOTAL_TYFCB_RECEIVED: 'Total TYFCB Received:',
} as const;

const currency = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

export function formatCurrency(amount: number): string {
  return currency.format(amount);
}

/**
 * Export grids for matrices and thank-you statistics. Row 0 of every matrix
 * grid is `Giver \ Receiver` followed by member full names; each member row
 * starts with that member's full name.
 */
export class ReportGridService {
  static referralGrid(result: CountMatrixResult): CellValue[][] {
    const size = result.matrix.size;
    const grid = this.matrixGrid(result.matrix, [
      REPORT_HEADERS.TOTAL_REFERRALS_GIVEN,
      withMemberCount(REPORT_HEADERS.UNIQUE_REFERRALS_GIVEN, size),
    ]);

    result.stats.forEach((entry, index) => {
      grid[index + 1].push(entry.totalGiven, entry.uniqueGiven);
    });

    grid.push([REPORT_HEADERS.TOTAL_REFERRALS_RECEIVED, ...result.stats.map((entry) => entry.totalReceived)]);
    grid.push([
      withMemberCount(REPORT_HEADERS.UNIQUE_REFERRALS_RECEIVED, size),
      ...result.stats.map((entry) => entry.uniqueReceived),
    ]);

    return grid;
  }

  static meetingGrid(result: CountMatrixResult): CellValue[][] {
    const grid = this.matrixGrid(result.matrix, [
      REPORT_HEADERS.TOTAL_OTO,
      withMemberCount(REPORT_HEADERS.UNIQUE_OTO, result.matrix.size),
    ]);

    result.stats.forEach((entry, index) => {
      grid[index + 1].push(entry.totalGiven, entry.uniqueGiven);
    });

    return grid;
  }

  /**
   * The layout the snapshot comparator reads back
   */
  static combinationGrid(result: CombinationMatrixResult): CellValue[][] {
    const grid = this.matrixGrid(result.matrix, [
      COMBINATION_HEADERS.NEITHER,
      COMBINATION_HEADERS.MEETING_ONLY,
      COMBINATION_HEADERS.REFERRAL_ONLY,
      COMBINATION_HEADERS.BOTH,
    ]);

    result.stats.forEach((entry, index) => {
      grid[index + 1].push(entry.neither, entry.meetingOnly, entry.referralOnly, entry.both);
    });

    return grid;
  }

  static thankYouSummaryGrid(summary: ThankYouSummary): CellValue[][] {
    const outsidePercentage = summary.totalAmount === 0 ? 0 : 100 - summary.withinPercentage;

    return [
      ['TYFCB Summary Report'],
      [],
      ['Chapter Overview'],
      ['Total TYFCB Amount:', formatCurrency(summary.totalAmount)],
      ['Total TYFCB Count:', summary.totalCount],
      [],
      ['Within Chapter Business'],
      ['Amount:', formatCurrency(summary.amountWithin)],
      ['Count:', summary.countWithin],
      ['Percentage:', `${summary.withinPercentage.toFixed(1)}%`],
      [],
      ['Outside Chapter Business'],
      ['Amount:', formatCurrency(summary.amountOutside)],
      ['Count:', summary.countOutside],
      ['Percentage:', `${outsidePercentage.toFixed(1)}%`],
    ];
  }

  /**
   * Only members with thank-you activity get a row
   */
  static thankYouMemberGrid(summary: ThankYouSummary): CellValue[][] {
    const grid: CellValue[][] = [
      [
        'Member Name',
        'Given Within Chapter',
        'Given Outside Chapter',
        'Total Given',
        'Received Within Chapter',
        'Received Outside Chapter',
        'Total Received',
      ],
    ];

    for (const entry of summary.members) {
      if (entry.totalGiven === 0 && entry.totalReceived === 0) {
        continue;
      }
      grid.push([
        entry.member.fullName,
        formatCurrency(entry.givenWithin),
        formatCurrency(entry.givenOutside),
        formatCurrency(entry.totalGiven),
        formatCurrency(entry.receivedWithin),
        formatCurrency(entry.receivedOutside),
        formatCurrency(entry.totalReceived),
      ]);
    }

    return grid;
  }

  /**
   * One row per thank-you, largest amount first
   */
  static thankYouTransactionGrid(thankYous: readonly ThankYou[]): CellValue[][] {
    const sorted = [...thankYous].sort((a, b) => b.amount - a.amount);

    return [
      ['From', 'To', 'Amount', 'Within Chapter', 'Description'],
      ...sorted.map((thankYou) => [
        thankYou.giver ? thankYou.giver.fullName : 'Unknown',
        thankYou.receiver.fullName,
        formatCurrency(thankYou.amount),
        thankYou.withinOrganization ? 'Yes' : 'No',
        thankYou.description ?? '',
      ]),
    ];
  }

  /**
   * Giver → receiver thank-you amounts for one side of the organization boundary
   */
  static thankYouPairGrid(matrix: MemberMatrix): CellValue[][] {
    const grid = this.matrixGrid(matrix, [REPORT_HEADERS.TOTAL_TYFCB_GIVEN]);

    matrix.members.forEach((member, index) => {
      grid[index + 1].push(sum(matrix.row(member)));
    });
    grid.push([REPORT_HEADERS.TOTAL_TYFCB_RECEIVED, ...matrix.members.map((member) => sum(matrix.column(member)))]);

    return grid;
  }

  private static matrixGrid(matrix: MemberMatrix, summaryHeaders: string[]): CellValue[][] {
    const names = matrix.members.map((member) => member.fullName);
    const cells = matrix.toArray();

    return [
      [GRID_CORNER, ...names, ...summaryHeaders],
      ...matrix.members.map((member, index): CellValue[] => [member.fullName, ...cells[index]]),
    ];
  }
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function withMemberCount(header: string, size: number): string {
  return `${header} (Total Members = ${size})`;
}
