/**
 * Compare Matrices Command
 *
 * Compares a new combination-matrix export against an older one and writes
 * the new grid with the comparison columns filled in.
 *
 * Usage:
 *   npm run compare -- reports/combination_matrix.csv old/combination_matrix.csv
 *   npm run compare -- new.csv old.csv reports/comparison.csv
 */

import path from 'path';
import { ComparisonService } from '../services/comparison.service.js';
import { SheetService } from '../services/sheet.service.js';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';

async function main() {
  const [newFile, oldFile, outFile] = process.argv.slice(2);
  if (!newFile || !oldFile) {
    console.error('Usage: npm run compare -- <new.csv> <old.csv> [out.csv]');
    process.exitCode = 1;
    return;
  }

  const outputPath = outFile ?? path.join(env.REPORTS_DIR, 'combination_comparison.csv');

  console.log('='.repeat(60));
  console.log('COMBINATION MATRIX COMPARISON');
  console.log('='.repeat(60));
  console.log(`New: ${newFile}`);
  console.log(`Old: ${oldFile}`);

  const result = await ComparisonService.compareSnapshotFiles({ newFile, oldFile, topN: env.TOP_MOVERS_LIMIT });

  for (const warning of result.warnings) {
    console.log(`  ! ${warning}`);
  }

  if (!result.success || !result.grid || !result.insights) {
    console.error('\nCOMPARISON FAILED');
    for (const error of result.errors) {
      console.error(`  - ${error}`);
    }
    process.exitCode = 1;
    return;
  }

  await SheetService.writeCsv(outputPath, result.grid);

  const { insights } = result;
  console.log('\n' + '='.repeat(60));
  console.log('COMPARISON COMPLETE');
  console.log('='.repeat(60));
  console.log(`Members:   ${insights.totalMembers}`);
  console.log(`Improved:  ${insights.improvedMembers}`);
  console.log(`Declined:  ${insights.declinedMembers}`);
  console.log(`Unchanged: ${insights.unchangedMembers}`);
  console.log(`Average change: ${insights.summary.averageChange.toFixed(2)}`);

  if (insights.biggestImprovements.length > 0) {
    console.log('\nBiggest improvements:');
    for (const entry of insights.biggestImprovements) {
      console.log(`  - ${entry.name}: +${entry.change}`);
    }
  }
  if (insights.biggestDeclines.length > 0) {
    console.log('\nBiggest declines:');
    for (const entry of insights.biggestDeclines) {
      console.log(`  - ${entry.name}: ${entry.change}`);
    }
  }

  console.log(`\nWrote ${outputPath}`);
}

main().catch((error) => {
  logger.error('Compare command failed', { error });
  console.error('\nCOMPARISON FAILED:', error instanceof Error ? error.message : error);
  process.exit(1);
});
