import { RATIO_LABELS, SERIES_STYLES, type ChartConfig, type SeriesStyle } from "@/config/charts";
import { RenderError } from "@/lib/errors";
import {
  computeUsageRatios,
  dropNonPositive,
  listMetrics,
  pivotByMetric,
  type ChartPoint,
  type StatsSnapshot,
} from "@/lib/stats";

export interface ChartSeries extends SeriesStyle {
  key: string;
  label: string;
}

export interface ChartModel {
  config: ChartConfig;
  recordset: string;
  series: ChartSeries[];
  points: ChartPoint[];
}

function selectMetrics(config: ChartConfig, snapshot: StatsSnapshot): string[] {
  const present = listMetrics(snapshot);
  if (!config.metrics) return present;
  if (config.fillMissing) return config.metrics;
  return config.metrics.filter((m) => present.includes(m));
}

/**
 * Turn a snapshot into the series and points one chart plots.
 * Throws RenderError when there is nothing drawable.
 */
export function buildChartModel(config: ChartConfig, snapshot: StatsSnapshot): ChartModel {
  if (snapshot.dates.length === 0) {
    throw new RenderError(`No data points for chart ${config.id}`, config.id);
  }

  let points: ChartPoint[];
  let keys: string[];
  if (config.derive === "usageRatios") {
    points = computeUsageRatios(pivotByMetric(snapshot, ["download", "download_count", "search_count", "viewed_records"]));
    keys = Object.keys(RATIO_LABELS);
  } else {
    keys = selectMetrics(config, snapshot);
    points = pivotByMetric(snapshot, keys);
  }

  if (keys.length === 0) {
    throw new RenderError(`No series to plot for chart ${config.id}`, config.id);
  }

  if (config.scale === "log") {
    points = dropNonPositive(points);
    const drawable = points.some((p) => keys.some((k) => p.values[k] !== null));
    if (!drawable) {
      throw new RenderError(`Chart ${config.id} has no positive values for a log axis`, config.id);
    }
  }

  const series = keys.map((key, i) => ({
    key,
    label: RATIO_LABELS[key] ?? key,
    ...SERIES_STYLES[i % SERIES_STYLES.length],
  }));

  return { config, recordset: snapshot.recordset, series, points };
}
