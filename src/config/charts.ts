/**
 * Chart configuration for the recordset stats job
 *
 * Each chart has:
 * - id: Unique identifier, also the base name of the generated files
 * - title: Heading drawn above the plot
 * - source: Which iDigBio stats snapshot the chart is drawn from
 * - metrics: Metrics to plot (omitted = every metric the snapshot contains)
 * - fillMissing: Plot listed metrics as zero lines even when the API never returned them
 * - derive: Optional derived series computed from the pivoted table
 * - scale: Y axis scale; log axes drop values <= 0
 * - yAxisLabel: Y axis caption
 */

export type StatsSource = "monthlyUsage" | "annualIngest" | "annualUse";

export type ChartScale = "linear" | "log";

export type MarkerShape = "circle" | "square" | "cross";

export interface SeriesStyle {
  color: string;
  dash?: string; // SVG stroke-dasharray, solid when omitted
  marker: MarkerShape;
}

export interface ChartConfig {
  id: string;
  title: string;
  source: StatsSource;
  metrics?: string[];
  fillMissing?: boolean;
  derive?: "usageRatios";
  scale: ChartScale;
  yAxisLabel: string;
}

// Line styles in plotting order: solid/circle, dashed/square, dash-dot/cross
export const SERIES_STYLES: SeriesStyle[] = [
  { color: "#1f77b4", marker: "circle" },
  { color: "#ff7f0e", dash: "6 3", marker: "square" },
  { color: "#2ca02c", dash: "8 3 2 3", marker: "cross" },
  { color: "#d62728", marker: "circle" },
  { color: "#9467bd", dash: "6 3", marker: "square" },
  { color: "#8c564b", dash: "8 3 2 3", marker: "cross" },
];

// Labels for derived ratio series
export const RATIO_LABELS: Record<string, string> = {
  dlRatio: "download / download_count",
  sdRatio: "download / search_count",
  vsRatio: "viewed_records / search_count",
};

export const CHARTS: ChartConfig[] = [
  {
    id: "usage_monthly",
    title: "Monthly Usage",
    source: "monthlyUsage",
    metrics: ["search_count", "download_count"],
    fillMissing: true,
    scale: "linear",
    yAxisLabel: "Count",
  },
  {
    id: "ingest_metrics",
    title: "Data Ingestion Metrics (annual)",
    source: "annualIngest",
    scale: "log",
    yAxisLabel: "Count",
  },
  {
    id: "search_download",
    title: "Search Events vs Download Events (annual)",
    source: "annualUse",
    metrics: ["search_count", "download_count"],
    scale: "log",
    yAxisLabel: "Count",
  },
  {
    id: "usage_vs_viewed",
    title: "Downloaded vs Viewed (annual)",
    source: "annualUse",
    metrics: ["download_count", "viewed_records", "viewed_media"],
    scale: "log",
    yAxisLabel: "Count",
  },
  {
    id: "usage_ratios",
    title: "Usage Ratios (annual)",
    source: "annualUse",
    derive: "usageRatios",
    scale: "log",
    yAxisLabel: "Ratio",
  },
];

export const CHART_IDS = CHARTS.map((c) => c.id);

export function getChartConfig(id: string): ChartConfig | undefined {
  return CHARTS.find((c) => c.id === id);
}

// Chart geometry (8x4 inch figure at 100 dpi)
export const CHART_WIDTH = 800;
export const CHART_HEIGHT = 400;
