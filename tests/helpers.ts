import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { FetchLike } from "../src/lib/idigbio";
import type { StatsSnapshot } from "../src/lib/stats";

export const RECORDSET = "7b0809fb-fd62-4733-8f40-74ceb04cbcac";

/**
 * Build an iDigBio stats envelope for one recordset.
 */
export function statsBody(
  byDate: Record<string, Record<string, number> | undefined>,
  recordset: string = RECORDSET
) {
  return {
    dates: Object.fromEntries(
      Object.entries(byDate).map(([date, metrics]): [string, Record<string, Record<string, number>>] => [
        date,
        metrics ? { [recordset]: metrics } : {},
      ])
    ),
  };
}

export function snapshot(partial: Partial<StatsSnapshot> & Pick<StatsSnapshot, "interval">): StatsSnapshot {
  return { recordset: RECORDSET, dates: [], rows: [], ...partial };
}

export interface RecordedCall {
  url: string;
  init?: RequestInit;
}

type Route = (url: string, init?: RequestInit) => Response | Promise<Response>;

/**
 * In-process fetch stand-in. The first route whose path fragment the URL contains
 * answers the request.
 */
export function fakeFetch(routes: Array<[string, Route]>): { fetch: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const match = routes.find(([fragment]) => url.includes(fragment));
    if (!match) return new Response("not found", { status: 404, statusText: "Not Found" });
    return match[1](url, init);
  };
  return { fetch, calls };
}

export const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "recordset-charts-"));
}

export async function listFiles(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }
}
