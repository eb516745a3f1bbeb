/**
 * iDigBio Recordset Chart Generator
 * =================================
 *
 * Pulls usage and ingestion statistics for one iDigBio recordset and renders
 * them as charts (PNG + interactive HTML) into docs/charts/.
 *
 * ## Charts
 *
 * | File              | Source                         | Scale  |
 * |-------------------|--------------------------------|--------|
 * | usage_monthly     | monthly search/download counts | linear |
 * | ingest_metrics    | annual records / media records | log    |
 * | search_download   | annual searches vs downloads   | log    |
 * | usage_vs_viewed   | annual downloads vs views      | log    |
 * | usage_ratios      | annual usage ratios            | log    |
 *
 * ## Re-runnability
 *
 * Output files are overwritten on every run and only appear once every chart
 * has rendered. Safe for cron; the monthly GitHub workflow commits the result.
 *
 * Usage:
 *   npx tsx scripts/update-charts.ts --recordset <uuid> [options]
 *
 * Examples:
 *   npx tsx scripts/update-charts.ts --recordset 7b0809fb-fd62-4733-8f40-74ceb04cbcac
 *   npx tsx scripts/update-charts.ts --recordset 7b0809fb-fd62-4733-8f40-74ceb04cbcac --chart usage_monthly
 */

import { run } from "@/lib/cli";

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error) => {
    console.error("Error:", error);
    process.exitCode = 1;
  }
);
