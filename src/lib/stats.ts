/**
 * Pure aggregation helpers over iDigBio stats snapshots.
 *
 * A snapshot is kept in long form (one row per date and metric). Charts need
 * wide rows keyed by time bucket, so everything here goes
 * rows -> bucket totals -> chart points.
 */

export type StatsInterval = "month" | "year";

export interface StatsRow {
  date: string; // YYYY-MM-DD
  metric: string;
  count: number;
}

export interface StatsSnapshot {
  recordset: string;
  interval: StatsInterval;
  dates: string[]; // every date key returned, sorted, including dates with no metrics
  rows: StatsRow[];
}

export interface BucketTotal {
  bucket: string;
  total: number;
}

export interface ChartPoint {
  bucket: string;
  values: Record<string, number | null>;
}

export function bucketOf(date: string, interval: StatsInterval): string {
  return interval === "month" ? date.slice(0, 7) : date.slice(0, 4);
}

/**
 * Sum counts per time bucket. Buckets come back sorted ascending.
 */
export function aggregateByBucket(
  rows: Array<{ date: string; count: number }>,
  interval: StatsInterval
): BucketTotal[] {
  const totals = new Map<string, number>();
  for (const row of rows) {
    const bucket = bucketOf(row.date, interval);
    totals.set(bucket, (totals.get(bucket) ?? 0) + row.count);
  }
  return Array.from(totals.entries())
    .map(([bucket, total]) => ({ bucket, total }))
    .sort((a, b) => a.bucket.localeCompare(b.bucket));
}

export function listMetrics(snapshot: StatsSnapshot): string[] {
  return [...new Set(snapshot.rows.map((r) => r.metric))].sort();
}

export function listBuckets(snapshot: StatsSnapshot): string[] {
  return [...new Set(snapshot.dates.map((d) => bucketOf(d, snapshot.interval)))].sort();
}

/**
 * Pivot the long table into one point per bucket with a value per metric.
 * Metrics with no rows in a bucket are zero-filled.
 */
export function pivotByMetric(snapshot: StatsSnapshot, metrics: string[]): ChartPoint[] {
  const points: ChartPoint[] = listBuckets(snapshot).map((bucket) => ({
    bucket,
    values: Object.fromEntries(metrics.map((m): [string, number] => [m, 0])),
  }));
  const byBucket = new Map(points.map((p): [string, ChartPoint] => [p.bucket, p]));

  for (const metric of metrics) {
    const rows = snapshot.rows.filter((r) => r.metric === metric);
    for (const { bucket, total } of aggregateByBucket(rows, snapshot.interval)) {
      const point = byBucket.get(bucket);
      if (point) point.values[metric] = total;
    }
  }

  return points;
}

const ratio = (numerator: number, denominator: number) => numerator / (denominator === 0 ? 1 : denominator);

/**
 * Derive usage ratios from annual usage points. A zero denominator is treated as 1.
 */
export function computeUsageRatios(points: ChartPoint[]): ChartPoint[] {
  return points.map((p) => {
    const v = (metric: string) => p.values[metric] ?? 0;
    return {
      bucket: p.bucket,
      values: {
        dlRatio: ratio(v("download"), v("download_count")),
        sdRatio: ratio(v("download"), v("search_count")),
        vsRatio: ratio(v("viewed_records"), v("search_count")),
      },
    };
  });
}

/**
 * Log axes cannot show zero or negative values; turn them into gaps.
 */
export function dropNonPositive(points: ChartPoint[]): ChartPoint[] {
  return points.map((p) => ({
    bucket: p.bucket,
    values: Object.fromEntries(
      Object.entries(p.values).map(([key, value]): [string, number | null] => [
        key,
        value !== null && value > 0 ? value : null,
      ])
    ),
  }));
}

export function toSeries(points: ChartPoint[], key: string): Array<[string, number | null]> {
  return points.map((p) => [p.bucket, p.values[key] ?? null]);
}
