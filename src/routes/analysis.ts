import { Router, Request, Response } from 'express';
import { AnalysisService } from '../services/analysis.service.js';
import { ReportGridService } from '../services/report-grid.service.js';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';
import { analysisRequestSchema, formatIssues } from './schemas.js';
import type { AnalysisRequest } from './schemas.js';
import type { AnalysisRunResult } from '../services/analysis.service.js';
import type { ThankYouPerformer } from '../services/thank-you.service.js';

const router = Router();

export function runRequestedAnalysis(body: AnalysisRequest): AnalysisRunResult {
  return AnalysisService.runFromSheets({
    memberSheets: [{ name: 'members', rows: body.members }],
    dataSheets: body.files,
    withinOrganizationRule: body.withinOrganizationRule ?? env.WITHIN_ORGANIZATION_RULE,
  });
}

/**
 * Response body for an analysis run, matrices rendered as export grids
 */
export function presentAnalysis(result: AnalysisRunResult) {
  const { report } = result;

  return {
    success: result.success,
    errors: result.errors,
    warnings: result.warnings,
    elapsedSeconds: result.elapsedSeconds,
    members: result.members.map((member) => member.fullName),
    counts: {
      referrals: result.relations.referrals.length,
      meetings: result.relations.meetings.length,
      thankYous: result.relations.thankYous.length,
    },
    grids: report
      ? {
          referral: ReportGridService.referralGrid(report.matrices.referral),
          meeting: ReportGridService.meetingGrid(report.matrices.meeting),
          combination: ReportGridService.combinationGrid(report.matrices.combination),
          thankYouSummary: ReportGridService.thankYouSummaryGrid(report.thankYouSummary),
          thankYouMembers: ReportGridService.thankYouMemberGrid(report.thankYouSummary),
          thankYouWithin: ReportGridService.thankYouPairGrid(report.thankYouPairs.within),
          thankYouOutside: ReportGridService.thankYouPairGrid(report.thankYouPairs.outside),
        }
      : null,
    thankYouLeaders: report
      ? {
          givers: report.thankYouLeaders.givers.map(presentPerformer),
          receivers: report.thankYouLeaders.receivers.map(presentPerformer),
        }
      : null,
    memberPerformance: report?.memberPerformance ?? null,
    overview: report?.overview ?? null,
    dataQuality: report?.dataQuality ?? null,
    relationStatistics: report?.relationStatistics ?? null,
  };
}

function presentPerformer(entry: ThankYouPerformer) {
  return { member: entry.member.fullName, amount: entry.amount };
}

/**
 * POST /api/analysis
 * Run the full analysis over uploaded member and slip rows
 */
router.post('/', (req: Request, res: Response) => {
  try {
    const parsed = analysisRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid analysis request', details: formatIssues(parsed.error) });
    }

    const result = runRequestedAnalysis(parsed.data);
    res.status(result.success ? 200 : 422).json(presentAnalysis(result));
  } catch (error) {
    logger.error('Error running analysis', { error });
    res.status(500).json({ error: 'Internal server error' });
  }
});

export default router;
