import { logger } from '../config/logger.js';
import { SnapshotHeaderError } from '../models/errors.js';
import { cellAt, cellNumber, cellText } from '../utils/cells.js';
import type { CellValue, Grid, Trend } from '../types/models.js';

export const COMBINATION_HEADERS = {
  NEITHER: 'Neither:',
  MEETING_ONLY: 'OTO only:',
  REFERRAL_ONLY: 'Referral only:',
  BOTH: 'OTO and Referral:',
} as const;

export const COMPARISON_HEADERS = {
  CURRENT_REFERRAL: 'Current Referral:',
  LAST_REFERRAL: 'Last Referral:',
  CHANGE_IN_REFERRALS: 'Change in Referrals:',
  LAST_NEITHER: 'Last Neither:',
  CHANGE_IN_NEITHER: 'Change in Neither:',
} as const;

export type CombinationHeader = keyof typeof COMBINATION_HEADERS;

const HEADER_KEYS: readonly CombinationHeader[] = ['NEITHER', 'MEETING_ONLY', 'REFERRAL_ONLY', 'BOTH'];

export interface CellPosition {
  row: number;
  column: number;
}

export type HeaderLocations = Record<CombinationHeader, CellPosition>;

export interface MetricDelta {
  current: number;
  last: number;
  change: number;
  trend: Trend;
}

export interface MemberDelta {
  name: string;
  /** Row of the member in the new snapshot grid */
  row: number;
  /** False when the old snapshot has no row for this member */
  previouslyListed: boolean;
  referral: MetricDelta;
  neither: MetricDelta;
}

export interface MemberChange {
  name: string;
  change: number;
}

export interface ComparisonInsights {
  totalMembers: number;
  improvedMembers: number;
  declinedMembers: number;
  unchangedMembers: number;
  biggestImprovements: MemberChange[];
  biggestDeclines: MemberChange[];
  summary: {
    averageChange: number;
    totalChange: number;
    improvementRate: number;
    declineRate: number;
  };
}

export interface SnapshotComparison {
  grid: CellValue[][];
  members: MemberDelta[];
  insights: ComparisonInsights;
}

export interface CompareOptions {
  topN?: number;
}

const TREND_GLYPHS: Record<Trend, string> = {
  positive: '↗️',
  negative: '↘️',
  unchanged: '➡️',
};

export class SnapshotComparatorService {
  /**
   * Scan every cell for the four combination headers (exact match).
   *
   * @param snapshot label used in the error message
   * @throws SnapshotHeaderError naming every header that is missing
   */
  static findHeaderLocations(grid: Grid, snapshot = 'matrix'): HeaderLocations {
    const found: Partial<HeaderLocations> = {};

    grid.forEach((row, rowIndex) => {
      row.forEach((value, columnIndex) => {
        if (typeof value !== 'string') {
          return;
        }
        const key = HEADER_KEYS.find((candidate) => COMBINATION_HEADERS[candidate] === value);
        if (key) {
          // A later occurrence replaces an earlier one
          found[key] = { row: rowIndex, column: columnIndex };
        }
      });
    });

    const { NEITHER, MEETING_ONLY, REFERRAL_ONLY, BOTH } = found;
    if (!NEITHER || !MEETING_ONLY || !REFERRAL_ONLY || !BOTH) {
      const missing = HEADER_KEYS.filter((key) => !found[key]).map((key) => COMBINATION_HEADERS[key]);
      throw new SnapshotHeaderError(snapshot, missing);
    }

    return { NEITHER, MEETING_ONLY, REFERRAL_ONLY, BOTH };
  }

  static computeTrend(change: number): Trend {
    if (change > 0) {
      return 'positive';
    }
    if (change < 0) {
      return 'negative';
    }
    return 'unchanged';
  }

  /**
   * "+4 ↗️", "-2 ↘️", "0 ➡️"
   */
  static formatChange(change: number): string {
    const trend = this.computeTrend(change);
    const sign = trend === 'positive' ? '+' : '';
    // Normalizes -0 to 0
    const value = change === 0 ? 0 : change;
    return `${sign}${value} ${TREND_GLYPHS[trend]}`;
  }

  static computeDelta(current: number, last: number): MetricDelta {
    const change = current - last;
    return { current, last, change, trend: this.computeTrend(change) };
  }

  /**
   * Current referral activity of a member row: referral-only plus both
   */
  static currentReferralValue(row: readonly CellValue[], headers: HeaderLocations): number {
    return cellNumber(cellAt(row, headers.REFERRAL_ONLY.column)) + cellNumber(cellAt(row, headers.BOTH.column));
  }

  /**
   * Map trimmed, lower-cased member names (column 0) below a header row to
   * the value read from each row
   */
  static buildMemberLookup(
    grid: Grid,
    headerRow: number,
    valueOf: (row: readonly CellValue[]) => number
  ): Map<string, number> {
    const lookup = new Map<string, number>();

    for (let rowIndex = headerRow + 1; rowIndex < grid.length; rowIndex++) {
      const row = grid[rowIndex];
      const name = lookupKey(row[0]);
      if (name) {
        lookup.set(name, valueOf(row));
      }
    }

    return lookup;
  }

  /**
   * Compare a new combination-matrix export against an older one.
   *
   * Returns the new grid with five comparison columns written immediately
   * after the "OTO and Referral:" column, the per-member deltas and the
   * insight rollup over referral changes.
   *
   * @throws SnapshotHeaderError when either grid lacks a required header
   */
  static compare(newGrid: Grid, oldGrid: Grid, options: CompareOptions = {}): SnapshotComparison {
    const newHeaders = this.findHeaderLocations(newGrid, 'new');
    const oldHeaders = this.findHeaderLocations(oldGrid, 'old');

    const lastReferral = this.buildMemberLookup(oldGrid, oldHeaders.BOTH.row, (row) =>
      this.currentReferralValue(row, oldHeaders)
    );
    const lastNeither = this.buildMemberLookup(oldGrid, oldHeaders.NEITHER.row, (row) =>
      cellNumber(cellAt(row, oldHeaders.NEITHER.column))
    );

    const headerRow = newHeaders.BOTH.row;
    const firstColumn = newHeaders.BOTH.column + 1;
    const width = Math.max(firstColumn + 5, ...newGrid.map((row) => row.length));
    const grid: CellValue[][] = newGrid.map((row) => padRow(row, width));

    grid[headerRow][firstColumn] = COMPARISON_HEADERS.CURRENT_REFERRAL;
    grid[headerRow][firstColumn + 1] = COMPARISON_HEADERS.LAST_REFERRAL;
    grid[headerRow][firstColumn + 2] = COMPARISON_HEADERS.CHANGE_IN_REFERRALS;
    grid[headerRow][firstColumn + 3] = COMPARISON_HEADERS.LAST_NEITHER;
    grid[headerRow][firstColumn + 4] = COMPARISON_HEADERS.CHANGE_IN_NEITHER;

    const members: MemberDelta[] = [];

    for (let rowIndex = headerRow + 1; rowIndex < grid.length; rowIndex++) {
      const row = grid[rowIndex];
      const key = lookupKey(row[0]);
      if (!key) {
        continue;
      }

      // Members missing from the old snapshot compare against 0
      const referral = this.computeDelta(
        this.currentReferralValue(newGrid[rowIndex], newHeaders),
        lastReferral.get(key) ?? 0
      );
      const neither = this.computeDelta(
        cellNumber(cellAt(newGrid[rowIndex], newHeaders.NEITHER.column)),
        lastNeither.get(key) ?? 0
      );

      row[firstColumn] = referral.current;
      row[firstColumn + 1] = referral.last;
      row[firstColumn + 2] = this.formatChange(referral.change);
      row[firstColumn + 3] = neither.last;
      row[firstColumn + 4] = this.formatChange(neither.change);

      members.push({
        name: cellText(row[0]),
        row: rowIndex,
        previouslyListed: lastReferral.has(key),
        referral,
        neither,
      });
    }

    const insights = this.computeInsights(members, options.topN ?? 5);
    logger.info(`Compared snapshots for ${members.length} members`, {
      improved: insights.improvedMembers,
      declined: insights.declinedMembers,
      unchanged: insights.unchangedMembers,
    });

    return { grid, members, insights };
  }

  /**
   * Roll up referral changes. Ties keep input order.
   */
  static computeInsights(members: readonly MemberDelta[], topN = 5): ComparisonInsights {
    const changes: MemberChange[] = members.map((member) => ({
      name: member.name,
      change: member.referral.change,
    }));

    const improved = changes.filter((entry) => entry.change > 0);
    const declined = changes.filter((entry) => entry.change < 0);
    const totalMembers = changes.length;
    const totalChange = changes.reduce((total, entry) => total + entry.change, 0);

    return {
      totalMembers,
      improvedMembers: improved.length,
      declinedMembers: declined.length,
      unchangedMembers: totalMembers - improved.length - declined.length,
      biggestImprovements: [...improved].sort((a, b) => b.change - a.change).slice(0, topN),
      biggestDeclines: [...declined].sort((a, b) => a.change - b.change).slice(0, topN),
      summary: {
        averageChange: totalMembers > 0 ? totalChange / totalMembers : 0,
        totalChange,
        improvementRate: totalMembers > 0 ? improved.length / totalMembers : 0,
        declineRate: totalMembers > 0 ? declined.length / totalMembers : 0,
      },
    };
  }
}

function lookupKey(value: CellValue): string {
  return cellText(value).toLowerCase();
}

function padRow(row: readonly CellValue[], width: number): CellValue[] {
  const padded: CellValue[] = [...row];
  while (padded.length < width) {
    padded.push(null);
  }
  return padded;
}
