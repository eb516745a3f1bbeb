import { getChartConfig, type ChartConfig, type StatsSource } from "@/config/charts";
import { writeArtifacts, type Artifact, type WrittenArtifact } from "@/lib/artifacts";
import { buildChartModel, type ChartModel } from "@/lib/charts";
import { UsageError } from "@/lib/errors";
import { formatBytes } from "@/lib/format";
import type { StatsClient } from "@/lib/idigbio";
import { renderChartArtifacts } from "@/lib/render";
import type { StatsSnapshot } from "@/lib/stats";

export interface PipelineOptions {
  recordset: string;
  monthlyMinDate: string;
  overallMinDate: string;
  maxDate: string;
  outDir: string;
  charts: string[];
}

export interface PipelineResult {
  models: ChartModel[];
  written: WrittenArtifact[];
}

const SOURCE_LABELS: Record<StatsSource, string> = {
  monthlyUsage: "monthly usage",
  annualIngest: "annual ingestion",
  annualUse: "annual usage",
};

function fetchSnapshot(client: StatsClient, source: StatsSource, options: PipelineOptions): Promise<StatsSnapshot> {
  switch (source) {
    case "monthlyUsage":
      return client.fetchMonthlyUsage(options.recordset, options.monthlyMinDate);
    case "annualIngest":
      return client.fetchIngestStats(options.recordset, options.overallMinDate, options.maxDate);
    case "annualUse":
      return client.fetchUseStats(options.recordset, options.overallMinDate, options.maxDate);
  }
}

/**
 * One run: fetch every snapshot the selected charts need, render them all in
 * memory, then write the files. Nothing reaches the output directory unless
 * every chart rendered.
 */
export async function runPipeline(options: PipelineOptions, client: StatsClient): Promise<PipelineResult> {
  const configs = options.charts.map((id) => {
    const config = getChartConfig(id);
    if (!config) throw new UsageError(`Unknown chart: ${id}`);
    return config;
  });

  // Step 1: fetch each needed snapshot once, in chart order
  console.log("Step 1: Fetching stats from iDigBio...");
  const snapshots = new Map<StatsSource, StatsSnapshot>();
  for (const config of configs) {
    if (snapshots.has(config.source)) continue;
    const snapshot = await fetchSnapshot(client, config.source, options);
    snapshots.set(config.source, snapshot);
    console.log(
      `  ${SOURCE_LABELS[config.source].padEnd(17)} - ${snapshot.dates.length} dates, ${snapshot.rows.length} values`
    );
  }

  // Step 2: aggregate and render
  console.log("\nStep 2: Rendering charts...");
  const models: ChartModel[] = [];
  const artifacts: Artifact[] = [];
  for (const config of configs) {
    const model = buildChartModel(config, requireSnapshot(snapshots, config));
    models.push(model);
    artifacts.push(...renderChartArtifacts(model));
    console.log(`  ${config.id.padEnd(17)} - ${model.series.length} series, ${model.points.length} points`);
  }

  // Step 3: write
  console.log(`\nStep 3: Writing ${artifacts.length} files to ${options.outDir}...`);
  const written = await writeArtifacts(options.outDir, artifacts);
  for (const file of written) {
    console.log(`  ${file.path} (${formatBytes(file.size)})`);
  }

  return { models, written };
}

function requireSnapshot(snapshots: Map<StatsSource, StatsSnapshot>, config: ChartConfig): StatsSnapshot {
  const snapshot = snapshots.get(config.source);
  if (!snapshot) throw new Error(`Missing ${config.source} snapshot for chart ${config.id}`);
  return snapshot;
}
