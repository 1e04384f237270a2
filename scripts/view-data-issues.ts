/**
 * Script to view logged scrape runs and data quality issues
 *
 * Usage: npx ts-node scripts/view-data-issues.ts [path/to/runs.db]
 * Falls back to DIAGNOSTICS_DB from the environment.
 */

import '../src/config/env';
import { openRunLog } from '../src/db/database';

interface IssueStats {
  [key: string]: number;
}

function main() {
  const dbPath = process.argv[2] || process.env.DIAGNOSTICS_DB;
  if (!dbPath) {
    console.error('Usage: npx ts-node scripts/view-data-issues.ts <runs.db> (or set DIAGNOSTICS_DB)');
    process.exitCode = 1;
    return;
  }

  const runLog = openRunLog(dbPath);
  try {
    console.log('='.repeat(80));
    console.log('SCRAPE RUNS AND DATA QUALITY ISSUES');
    console.log('='.repeat(80));
    console.log();

    const runs = runLog.getRecentRuns(10);
    if (runs.length === 0) {
      console.log(`No runs logged in ${runLog.getDbPath()}`);
      return;
    }

    console.log('Recent runs:');
    for (const run of runs) {
      const status = run.interrupted ? 'interrupted' : run.failed_pages > 0 ? 'partial' : 'ok';
      console.log(
        `  #${run.id} ${run.start_date}..${run.end_date} -> ${run.target_timezone}: ` +
          `${run.events} events, ${run.pages_visited}/${run.pages_planned} pages, ${status}`
      );
      for (const failure of runLog.getPageFailures(run.id)) {
        console.log(`      failed ${failure.dates}: ${failure.message}`);
      }
    }
    console.log();

    const issues = runLog.getRecentDataIssues(100);
    if (issues.length === 0) {
      console.log('✅ No data quality issues logged');
      return;
    }

    console.log(`📊 Issues in the last ${issues.length} entries:`);
    const byType = issues.reduce((acc: IssueStats, issue) => {
      acc[issue.type] = (acc[issue.type] || 0) + 1;
      return acc;
    }, {});
    Object.entries(byType)
      .sort((a, b) => b[1] - a[1])
      .forEach(([type, count]) => {
        const percentage = ((count / issues.length) * 100).toFixed(1);
        console.log(`  ${type.padEnd(30)} ${count} (${percentage}%)`);
      });
    console.log();

    console.log('Most recent issues (last 10):');
    console.log('-'.repeat(80));
    issues.slice(0, 10).forEach((issue, index) => {
      console.log(`\n${index + 1}. [${issue.type}] run #${issue.run_id}`);
      console.log(`   ${issue.message}`);
      if (issue.url) console.log(`   Page: ${issue.url}`);
      if (issue.details) console.log(`   Details: ${issue.details.substring(0, 200)}`);
    });

    console.log();
    console.log('='.repeat(80));
  } finally {
    runLog.close();
  }
}

try {
  main();
} catch (error) {
  console.error('Error generating report:', error);
  process.exitCode = 1;
}
