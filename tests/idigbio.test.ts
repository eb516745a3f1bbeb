import test from "node:test";
import assert from "node:assert/strict";
import { DataFormatError, RemoteFetchError } from "../src/lib/errors";
import { createStatsClient, parseStatsResponse } from "../src/lib/idigbio";
import { fakeFetch, json, RECORDSET, statsBody } from "./helpers";

const BASE_URL = "https://stats.test";

test("parseStatsResponse flattens the envelope for one recordset", () => {
  const body = {
    dates: {
      "2024-02-01": { [RECORDSET]: { search_count: 15 }, "other-recordset": { search_count: 99 } },
      "2024-01-01T00:00:00": { [RECORDSET]: { search_count: 10, download_count: 2 } },
      "2024-03-01": {},
    },
  };
  const snapshot = parseStatsResponse(body, RECORDSET, "month");
  assert.deepEqual(snapshot, {
    recordset: RECORDSET,
    interval: "month",
    dates: ["2024-01-01", "2024-02-01", "2024-03-01"],
    rows: [
      { date: "2024-01-01", metric: "search_count", count: 10 },
      { date: "2024-01-01", metric: "download_count", count: 2 },
      { date: "2024-02-01", metric: "search_count", count: 15 },
    ],
  });
});

test("parseStatsResponse rejects a body without dates", () => {
  assert.throws(
    () => parseStatsResponse({ results: [] }, RECORDSET, "year"),
    (error: unknown) => error instanceof DataFormatError && error.issues[0].startsWith("dates:")
  );
});

test("parseStatsResponse rejects a malformed date key", () => {
  assert.throws(
    () => parseStatsResponse({ dates: { "last-month": {} } }, RECORDSET, "month"),
    (error: unknown) =>
      error instanceof DataFormatError && error.issues.some((i) => i.includes("Expected a YYYY-MM-DD date key"))
  );
});

test("parseStatsResponse reports non-numeric metrics with their path", () => {
  const body = { dates: { "2024-01-01": { [RECORDSET]: { search_count: "10" } } } };
  assert.throws(
    () => parseStatsResponse(body, RECORDSET, "month"),
    (error: unknown) =>
      error instanceof DataFormatError &&
      error.issues.length === 1 &&
      error.issues[0] === `dates.2024-01-01.${RECORDSET}.search_count: Expected number, received string`
  );
});

test("parseStatsResponse ignores entries of other recordsets, malformed or not", () => {
  const body = {
    dates: { "2024-01-01": { [RECORDSET]: { records: 3 }, other: "not an object", another: { records: "n/a" } } },
  };
  assert.deepEqual(parseStatsResponse(body, RECORDSET, "year").rows, [
    { date: "2024-01-01", metric: "records", count: 3 },
  ]);
});

test("fetchMonthlyUsage posts the monthly query", async () => {
  const { fetch, calls } = fakeFetch([
    ["/v2/summary/stats/search", () => json(statsBody({ "2024-01-01": { search_count: 10 } }))],
  ]);
  const client = createStatsClient({ baseUrl: `${BASE_URL}/`, fetch });

  const snapshot = await client.fetchMonthlyUsage(RECORDSET, "2024-01-01");

  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, `${BASE_URL}/v2/summary/stats/search`);
  assert.equal(calls[0].init?.method, "POST");
  assert.deepEqual(JSON.parse(String(calls[0].init?.body)), {
    dateInterval: "month",
    minDate: "2024-01-01",
    recordset: RECORDSET,
  });
  assert.equal(snapshot.interval, "month");
  assert.deepEqual(snapshot.rows, [{ date: "2024-01-01", metric: "search_count", count: 10 }]);
});

test("annual queries go out as GET with query parameters", async () => {
  const { fetch, calls } = fakeFetch([
    ["/v2/summary/stats/api/", () => json(statsBody({ "2015-01-16": { records: 5 } }))],
    ["/v2/summary/stats/search/", () => json(statsBody({ "2015-01-16": { search_count: 7 } }))],
  ]);
  const client = createStatsClient({ baseUrl: BASE_URL, fetch });

  const ingest = await client.fetchIngestStats(RECORDSET, "2015-01-16", "2024-12-31");
  const use = await client.fetchUseStats(RECORDSET, "2015-01-16", "2024-12-31");

  const query = `dateInterval=year&minDate=2015-01-16&maxDate=2024-12-31&recordset=${RECORDSET}`;
  assert.deepEqual(
    calls.map((c) => [c.init?.method, c.url]),
    [
      ["GET", `${BASE_URL}/v2/summary/stats/api/?${query}`],
      ["GET", `${BASE_URL}/v2/summary/stats/search/?${query}`],
    ]
  );
  assert.equal(ingest.interval, "year");
  assert.deepEqual(ingest.rows, [{ date: "2015-01-16", metric: "records", count: 5 }]);
  assert.deepEqual(use.rows, [{ date: "2015-01-16", metric: "search_count", count: 7 }]);
});

test("a non-2xx response is a RemoteFetchError carrying the status", async () => {
  const { fetch } = fakeFetch([
    ["/v2/summary/stats/search", () => new Response("boom", { status: 503, statusText: "Service Unavailable" })],
  ]);
  const client = createStatsClient({ baseUrl: BASE_URL, fetch });

  await assert.rejects(client.fetchMonthlyUsage(RECORDSET, "2024-01-01"), (error: unknown) => {
    assert.ok(error instanceof RemoteFetchError);
    assert.equal(error.status, 503);
    assert.equal(error.url, `${BASE_URL}/v2/summary/stats/search`);
    assert.equal(error.message, "iDigBio API error: 503 Service Unavailable");
    return true;
  });
});

test("a transport failure is a RemoteFetchError without status", async () => {
  const client = createStatsClient({
    baseUrl: BASE_URL,
    fetch: async () => {
      throw new TypeError("fetch failed");
    },
  });

  await assert.rejects(client.fetchUseStats(RECORDSET, "2015-01-16", "2024-12-31"), (error: unknown) => {
    assert.ok(error instanceof RemoteFetchError);
    assert.equal(error.status, null);
    assert.equal(error.message, "iDigBio request failed: fetch failed");
    return true;
  });
});

test("a body that is not JSON is a DataFormatError", async () => {
  const { fetch } = fakeFetch([["/v2/summary/stats/api/", () => new Response("<html>maintenance</html>")]]);
  const client = createStatsClient({ baseUrl: BASE_URL, fetch });

  await assert.rejects(
    client.fetchIngestStats(RECORDSET, "2015-01-16", "2024-12-31"),
    (error: unknown) => error instanceof DataFormatError && error.message === "iDigBio response is not valid JSON"
  );
});

test("a timed-out request is a RemoteFetchError naming the timeout", async () => {
  const client = createStatsClient({
    baseUrl: BASE_URL,
    timeoutMs: 20,
    fetch: (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) {
          reject(new Error("request carried no abort signal"));
          return;
        }
        signal.addEventListener("abort", () => reject(signal.reason));
      }),
  });

  await assert.rejects(client.fetchMonthlyUsage(RECORDSET, "2024-01-01"), (error: unknown) => {
    assert.ok(error instanceof RemoteFetchError);
    assert.equal(error.status, null);
    assert.equal(error.message, "iDigBio request failed: timed out after 20ms");
    return true;
  });
});

test("parseStatsResponse rejects two keys for the same day", () => {
  const body = {
    dates: {
      "2024-01-01": { [RECORDSET]: { search_count: 1 } },
      "2024-01-01T00:00:00": { [RECORDSET]: { search_count: 1 } },
    },
  };
  assert.throws(
    () => parseStatsResponse(body, RECORDSET, "month"),
    (error: unknown) =>
      error instanceof DataFormatError &&
      error.issues.length === 1 &&
      error.issues[0] === "dates.2024-01-01T00:00:00: Duplicate date key for 2024-01-01"
  );
});
