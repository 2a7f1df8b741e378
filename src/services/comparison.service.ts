import { logger } from '../config/logger.js';
import { errorMessage } from '../models/errors.js';
import { SnapshotComparatorService } from './snapshot-comparator.service.js';
import { SheetService } from './sheet.service.js';
import type { ComparisonInsights, MemberDelta } from './snapshot-comparator.service.js';
import type { CellValue, Grid } from '../types/models.js';

export interface ComparisonInput {
  newGrid: Grid;
  oldGrid: Grid;
  topN?: number;
}

export interface ComparisonFilesInput {
  newFile: string;
  oldFile: string;
  topN?: number;
}

export interface ComparisonRunResult {
  success: boolean;
  errors: string[];
  warnings: string[];
  grid: CellValue[][] | null;
  members: MemberDelta[];
  insights: ComparisonInsights | null;
}

export class ComparisonService {
  /**
   * Compare two combination-matrix exports. Never throws; a missing header or
   * any other failure is returned in `errors`.
   */
  static compareSnapshots(input: ComparisonInput): ComparisonRunResult {
    try {
      const comparison = SnapshotComparatorService.compare(input.newGrid, input.oldGrid, { topN: input.topN });
      const warnings = comparison.members
        .filter((member) => !member.previouslyListed)
        .map((member) => `${member.name} is not in the old snapshot; compared against 0`);

      return {
        success: true,
        errors: [],
        warnings,
        grid: comparison.grid,
        members: comparison.members,
        insights: comparison.insights,
      };
    } catch (error) {
      logger.error('Snapshot comparison failed', { error: errorMessage(error) });
      return failed(errorMessage(error));
    }
  }

  static async compareSnapshotFiles(input: ComparisonFilesInput): Promise<ComparisonRunResult> {
    let newGrid: Grid;
    let oldGrid: Grid;
    try {
      newGrid = (await SheetService.readCsv(input.newFile)).rows;
      oldGrid = (await SheetService.readCsv(input.oldFile)).rows;
    } catch (error) {
      logger.error('Could not read snapshot files', { error: errorMessage(error) });
      return failed(errorMessage(error));
    }

    return this.compareSnapshots({ newGrid, oldGrid, topN: input.topN });
  }
}

function failed(message: string): ComparisonRunResult {
  return { success: false, errors: [message], warnings: [], grid: null, members: [], insights: null };
}
