/**
 * Run Analysis Command
 *
 * Reads member lists from MEMBERS_DIR and slip exports from DATA_DIR, then
 * writes the matrix and thank-you reports as CSV files to REPORTS_DIR.
 *
 * Usage:
 *   npm run analyze
 *   npm run analyze -- --rule always
 */

import path from 'path';
import { AnalysisService } from '../services/analysis.service.js';
import { ReportGridService, formatCurrency } from '../services/report-grid.service.js';
import { SheetService } from '../services/sheet.service.js';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';
import type { CellValue, WithinOrganizationRule } from '../types/models.js';

const RULES: readonly WithinOrganizationRule[] = ['empty-detail', 'always', 'never'];

function parseRule(args: string[]): WithinOrganizationRule {
  const ruleIndex = args.indexOf('--rule');
  if (ruleIndex < 0) {
    return env.WITHIN_ORGANIZATION_RULE;
  }
  const rule = RULES.find((candidate) => candidate === args[ruleIndex + 1]);
  if (!rule) {
    throw new Error(`--rule must be one of: ${RULES.join(', ')}`);
  }
  return rule;
}

async function main() {
  const withinOrganizationRule = parseRule(process.argv.slice(2));

  console.log('='.repeat(60));
  console.log('CHAPTER SLIP ANALYSIS');
  console.log('='.repeat(60));
  console.log(`Members: ${env.MEMBERS_DIR}`);
  console.log(`Slips:   ${env.DATA_DIR}`);
  console.log(`Reports: ${env.REPORTS_DIR}`);

  const memberFiles = await SheetService.listCsvFiles(env.MEMBERS_DIR);
  const dataFiles = await SheetService.listCsvFiles(env.DATA_DIR);

  const result = await AnalysisService.runFromFiles({ memberFiles, dataFiles, withinOrganizationRule });

  if (result.warnings.length > 0) {
    console.log(`\nWarnings (${result.warnings.length}):`);
    for (const warning of result.warnings) {
      console.log(`  - ${warning}`);
    }
  }

  if (!result.success || !result.report) {
    console.error('\nANALYSIS FAILED');
    for (const error of result.errors) {
      console.error(`  - ${error}`);
    }
    process.exitCode = 1;
    return;
  }

  const { report } = result;
  const reports: Array<[string, CellValue[][]]> = [
    ['referral_matrix.csv', ReportGridService.referralGrid(report.matrices.referral)],
    ['oto_matrix.csv', ReportGridService.meetingGrid(report.matrices.meeting)],
    ['combination_matrix.csv', ReportGridService.combinationGrid(report.matrices.combination)],
    ['tyfcb_summary.csv', ReportGridService.thankYouSummaryGrid(report.thankYouSummary)],
    ['tyfcb_by_member.csv', ReportGridService.thankYouMemberGrid(report.thankYouSummary)],
    ['tyfcb_transactions.csv', ReportGridService.thankYouTransactionGrid(result.relations.thankYous)],
    ['tyfcb_within_matrix.csv', ReportGridService.thankYouPairGrid(report.thankYouPairs.within)],
    ['tyfcb_outside_matrix.csv', ReportGridService.thankYouPairGrid(report.thankYouPairs.outside)],
  ];

  console.log('\nWriting reports...');
  for (const [fileName, grid] of reports) {
    await SheetService.writeCsv(path.join(env.REPORTS_DIR, fileName), grid);
    console.log(`  - ${fileName}`);
  }

  console.log('\n' + '='.repeat(60));
  console.log('ANALYSIS COMPLETE');
  console.log('='.repeat(60));
  console.log(`Members:     ${result.members.length}`);
  console.log(`Referrals:   ${result.relations.referrals.length}`);
  console.log(`One-to-ones: ${result.relations.meetings.length}`);
  console.log(`TYFCBs:      ${result.relations.thankYous.length} (${formatCurrency(report.thankYouSummary.totalAmount)})`);
  console.log(`Participation: ${(report.overview.engagement.overallParticipation * 100).toFixed(1)}%`);
  console.log(`Data quality:  ${report.dataQuality.qualityScore.toFixed(1)}`);
  console.log(`Elapsed:     ${result.elapsedSeconds.toFixed(2)}s`);

  if (report.thankYouLeaders.givers.length > 0) {
    console.log('\nTop TYFCB givers:');
    for (const entry of report.thankYouLeaders.givers) {
      console.log(`  ${entry.member.fullName.padEnd(30)} ${formatCurrency(entry.amount)}`);
    }
  }
}

main().catch((error) => {
  logger.error('Analysis command failed', { error });
  console.error('\nANALYSIS FAILED:', error instanceof Error ? error.message : error);
  process.exit(1);
});
