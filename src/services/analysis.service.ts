import { logger } from '../config/logger.js';
import { InputValidationError, errorMessage } from '../models/errors.js';
import { MemberRegistry } from './member-registry.service.js';
import { RelationExtractorService } from './relation-extractor.service.js';
import { MatrixAggregatorService } from './matrix-aggregator.service.js';
import { CombinationService } from './combination.service.js';
import { ThankYouService } from './thank-you.service.js';
import { AnalysisSummaryService } from './analysis-summary.service.js';
import { SheetService } from './sheet.service.js';
import type { Member } from '../models/member.js';
import type { ThankYouPairMatrices, ThankYouPerformer } from './thank-you.service.js';
import type {
  AnalysisMatrices,
  ChapterOverview,
  DataQualityReport,
  MemberPerformance,
  RelationStatistics,
} from './analysis-summary.service.js';
import type {
  ProcessingWarning,
  RelationSet,
  Sheet,
  ThankYouSummary,
  WithinOrganizationRule,
} from '../types/models.js';

export interface AnalysisSheetsInput {
  memberSheets: readonly Sheet[];
  dataSheets: readonly Sheet[];
  withinOrganizationRule?: WithinOrganizationRule;
}

export interface AnalysisFilesInput {
  memberFiles: readonly string[];
  dataFiles: readonly string[];
  withinOrganizationRule?: WithinOrganizationRule;
}

export interface AnalysisReport {
  matrices: AnalysisMatrices;
  thankYouSummary: ThankYouSummary;
  thankYouLeaders: { givers: ThankYouPerformer[]; receivers: ThankYouPerformer[] };
  thankYouPairs: ThankYouPairMatrices;
  overview: ChapterOverview;
  /** One entry per member, in registry order */
  memberPerformance: MemberPerformance[];
  dataQuality: DataQualityReport;
  relationStatistics: RelationStatistics;
}

export interface AnalysisRunResult {
  success: boolean;
  errors: string[];
  warnings: string[];
  /** Structured form of `warnings` */
  issues: ProcessingWarning[];
  members: readonly Member[];
  relations: RelationSet;
  /** null when the run failed */
  report: AnalysisReport | null;
  elapsedSeconds: number;
}

export class AnalysisService {
  /**
   * Full pipeline over already-parsed sheets: registry, extraction,
   * matrices, combination, thank-you statistics and summaries.
   *
   * Never throws; failures end up in `errors` with `success: false`.
   */
  static runFromSheets(input: AnalysisSheetsInput): AnalysisRunResult {
    const startedAt = Date.now();
    const result: AnalysisRunResult = {
      success: false,
      errors: [],
      warnings: [],
      issues: [],
      members: [],
      relations: { referrals: [], meetings: [], thankYous: [] },
      report: null,
      elapsedSeconds: 0,
    };

    const record = (warnings: readonly ProcessingWarning[]) => {
      result.issues.push(...warnings);
      result.warnings.push(...warnings.map(formatWarning));
    };

    try {
      if (input.memberSheets.length === 0) {
        throw new InputValidationError('No member files provided');
      }
      if (input.dataSheets.length === 0) {
        throw new InputValidationError('No slip data files provided');
      }

      const { registry, warnings: memberWarnings } = MemberRegistry.fromMemberSheets(input.memberSheets);
      record(memberWarnings);
      if (registry.size === 0) {
        throw new InputValidationError('No members found in the member files');
      }
      result.members = registry.members;

      const extraction = RelationExtractorService.extractFromSheets(input.dataSheets, registry, {
        withinOrganizationRule: input.withinOrganizationRule,
      });
      record(extraction.warnings);
      result.relations = {
        referrals: extraction.referrals,
        meetings: extraction.meetings,
        thankYous: extraction.thankYous,
      };

      const referral = MatrixAggregatorService.buildReferralMatrix(registry.members, extraction.referrals);
      const meeting = MatrixAggregatorService.buildMeetingMatrix(registry.members, extraction.meetings);
      const combination = CombinationService.deriveCombinationMatrix(referral.matrix, meeting.matrix);
      const matrices: AnalysisMatrices = { referral, meeting, combination };

      const duplicates = memberWarnings.filter((warning) => warning.code === 'duplicate_member').length;

      const thankYouSummary = ThankYouService.summarize(registry.members, extraction.thankYous);

      result.report = {
        matrices,
        thankYouSummary,
        thankYouLeaders: {
          givers: ThankYouService.topPerformers(thankYouSummary.members, 'given'),
          receivers: ThankYouService.topPerformers(thankYouSummary.members, 'received'),
        },
        thankYouPairs: ThankYouService.buildPairMatrices(registry.members, extraction.thankYous),
        overview: AnalysisSummaryService.chapterOverview(matrices),
        memberPerformance: registry.members.flatMap(
          (member) => AnalysisSummaryService.memberPerformance(matrices, member) ?? []
        ),
        dataQuality: AnalysisSummaryService.dataQuality(registry.members, result.relations, duplicates),
        relationStatistics: AnalysisSummaryService.relationStatistics(result.relations),
      };
      result.success = true;
    } catch (error) {
      logger.error('Analysis failed', { error: errorMessage(error) });
      result.errors.push(errorMessage(error));
    }

    result.elapsedSeconds = (Date.now() - startedAt) / 1000;

    logger.info('Analysis finished', {
      success: result.success,
      members: result.members.length,
      referrals: result.relations.referrals.length,
      meetings: result.relations.meetings.length,
      thankYous: result.relations.thankYous.length,
      warnings: result.warnings.length,
      elapsedSeconds: result.elapsedSeconds,
    });

    return result;
  }

  /**
   * Read CSV files one after another, then run the pipeline. A file that
   * cannot be read or parsed is reported as a warning and skipped.
   */
  static async runFromFiles(input: AnalysisFilesInput): Promise<AnalysisRunResult> {
    const startedAt = Date.now();

    if (input.memberFiles.length === 0 || input.dataFiles.length === 0) {
      const message =
        input.memberFiles.length === 0 ? 'No member files provided' : 'No slip data files provided';
      logger.error('Analysis failed', { error: message });
      return {
        success: false,
        errors: [message],
        warnings: [],
        issues: [],
        members: [],
        relations: { referrals: [], meetings: [], thankYous: [] },
        report: null,
        elapsedSeconds: 0,
      };
    }

    const issues: ProcessingWarning[] = [];
    const memberSheets = await readSheets(input.memberFiles, issues);
    const dataSheets = await readSheets(input.dataFiles, issues);

    const result = this.runFromSheets({
      memberSheets,
      dataSheets,
      withinOrganizationRule: input.withinOrganizationRule,
    });

    return {
      ...result,
      warnings: [...issues.map(formatWarning), ...result.warnings],
      issues: [...issues, ...result.issues],
      elapsedSeconds: (Date.now() - startedAt) / 1000,
    };
  }
}

export function formatWarning(warning: ProcessingWarning): string {
  return warning.source ? `${warning.source}: ${warning.message}` : warning.message;
}

async function readSheets(files: readonly string[], issues: ProcessingWarning[]): Promise<Sheet[]> {
  const sheets: Sheet[] = [];

  for (const file of files) {
    try {
      sheets.push(await SheetService.readCsv(file));
    } catch (error) {
      const message = `Skipped unreadable file: ${errorMessage(error)}`;
      logger.warn(message, { file });
      issues.push({ code: 'file_skipped', message, source: file, row: null });
    }
  }

  return sheets;
}
