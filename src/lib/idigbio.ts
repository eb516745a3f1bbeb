/**
 * iDigBio summary-stats client
 * ============================
 *
 * Three endpoints feed the charts:
 *
 *   POST /v2/summary/stats/search    monthly usage (search/download counts)
 *   GET  /v2/summary/stats/api/      annual ingestion (records, media records)
 *   GET  /v2/summary/stats/search/   annual usage (searches, downloads, views)
 *
 * All of them answer with the same envelope:
 *
 *   { "dates": { "2024-01-01": { "<recordset uuid>": { "search_count": 10, ... } } } }
 *
 * The envelope is validated before anything is charted. A date whose entry does
 * not mention our recordset is kept as a date with no metrics; entries for
 * other recordsets are ignored.
 */

import { z } from "zod";
import { IDIGBIO_API_URL, IDIGBIO_TIMEOUT_MS } from "@/config/env";
import { isDateKey } from "@/lib/dates";
import { DataFormatError, RemoteFetchError } from "@/lib/errors";
import type { StatsInterval, StatsRow, StatsSnapshot } from "@/lib/stats";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface StatsClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface StatsClient {
  fetchMonthlyUsage(recordset: string, minDate: string): Promise<StatsSnapshot>;
  fetchIngestStats(recordset: string, minDate: string, maxDate: string): Promise<StatsSnapshot>;
  fetchUseStats(recordset: string, minDate: string, maxDate: string): Promise<StatsSnapshot>;
}

// =============================================================================
// RESPONSE SCHEMA
// =============================================================================

const statsEnvelopeSchema = z.object({
  dates: z.record(
    z.string().refine(isDateKey, { message: "Expected a YYYY-MM-DD date key" }),
    z.record(z.string(), z.unknown())
  ),
});

const recordsetMetricsSchema = z.record(z.string(), z.number().finite());

function formatIssues(error: z.ZodError, prefix: Array<string | number> = []): string[] {
  return error.issues.map((issue) => {
    const where = [...prefix, ...issue.path].join(".") || "(root)";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a stats payload and flatten it into a long-form snapshot.
 */
export function parseStatsResponse(body: unknown, recordset: string, interval: StatsInterval): StatsSnapshot {
  const envelope = statsEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    const issues = formatIssues(envelope.error);
    throw new DataFormatError(`Unexpected stats response shape (${issues[0]})`, issues);
  }

  const issues: string[] = [];
  const rows: StatsRow[] = [];
  const dates = new Set<string>();

  const entries = Object.entries(envelope.data.dates).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, byRecordset] of entries) {
    const date = key.slice(0, 10);
    // 2024-01-01 and 2024-01-01T00:00:00 name the same day
    if (dates.has(date)) {
      issues.push(`dates.${key}: Duplicate date key for ${date}`);
      continue;
    }
    dates.add(date);

    const entry = byRecordset[recordset];
    if (entry === undefined) continue;

    const metrics = recordsetMetricsSchema.safeParse(entry);
    if (!metrics.success) {
      issues.push(...formatIssues(metrics.error, ["dates", key, recordset]));
      continue;
    }
    for (const [metric, count] of Object.entries(metrics.data)) {
      rows.push({ date, metric, count });
    }
  }

  if (issues.length > 0) {
    throw new DataFormatError(`Unexpected metrics for recordset ${recordset} (${issues[0]})`, issues);
  }

  return { recordset, interval, dates: [...dates].sort(), rows };
}

// =============================================================================
// HTTP
// =============================================================================

export function createStatsClient(options: StatsClientOptions = {}): StatsClient {
  const baseUrl = (options.baseUrl ?? IDIGBIO_API_URL).replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? IDIGBIO_TIMEOUT_MS;
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  async function request(url: string, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await doFetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === "TimeoutError"
          ? `timed out after ${timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new RemoteFetchError(`iDigBio request failed: ${reason}`, url, null, { cause: error });
    }

    if (!response.ok) {
      throw new RemoteFetchError(
        `iDigBio API error: ${response.status} ${response.statusText}`.trim(),
        url,
        response.status
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new RemoteFetchError("iDigBio response body could not be read", url, response.status, { cause: error });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new DataFormatError("iDigBio response is not valid JSON", [], { cause: error });
    }
  }

  async function getYearly(path: string, recordset: string, minDate: string, maxDate: string) {
    const params = new URLSearchParams({
      dateInterval: "year",
      minDate,
      maxDate,
      recordset,
    });
    const body = await request(`${baseUrl}${path}?${params}`, {
      method: "GET",
      headers: { Accept: "application/json" },
    });
    return parseStatsResponse(body, recordset, "year");
  }

  return {
    async fetchMonthlyUsage(recordset, minDate) {
      const body = await request(`${baseUrl}/v2/summary/stats/search`, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({ dateInterval: "month", minDate, recordset }),
      });
      return parseStatsResponse(body, recordset, "month");
    },

    fetchIngestStats(recordset, minDate, maxDate) {
      return getYearly("/v2/summary/stats/api/", recordset, minDate, maxDate);
    },

    fetchUseStats(recordset, minDate, maxDate) {
      return getYearly("/v2/summary/stats/search/", recordset, minDate, maxDate);
    },
  };
}
