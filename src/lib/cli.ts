import { parseArgs } from "util";
import { z } from "zod";
import { CHART_IDS } from "@/config/charts";
import { DEFAULT_OUT_DIR, DEFAULT_OVERALL_MIN_DATE } from "@/config/env";
import { isCalendarDate, startOfYear, toIsoDate } from "@/lib/dates";
import { describeError, UsageError } from "@/lib/errors";
import { createStatsClient, type StatsClient } from "@/lib/idigbio";
import { runPipeline, type PipelineOptions, type PipelineResult } from "@/lib/pipeline";

export const USAGE = `Usage: npm run charts -- --recordset <uuid> [options]

Options:
  --recordset <id>             iDigBio recordset to chart (required)
  --monthly-min-date <date>    Earliest date (YYYY-MM-DD) for monthly stats (default: Jan 1 this year)
  --overall-min-date <date>    Earliest date (YYYY-MM-DD) for annual stats (default: ${DEFAULT_OVERALL_MIN_DATE})
  --max-date <date>            Latest date (YYYY-MM-DD) for annual stats (default: today)
  --out-dir <dir>              Directory to write charts to (default: ${DEFAULT_OUT_DIR})
  --chart <id>                 Only generate this chart; repeatable (default: all)
  -h, --help                   Show this help

Charts: ${CHART_IDS.join(", ")}`;

const isoDate = (flag: string) =>
  z.string().refine(isCalendarDate, { message: `${flag} must be a calendar date in YYYY-MM-DD form` });

const cliSchema = z
  .object({
    recordset: z
      .string({ required_error: "--recordset is required" })
      .trim()
      .min(1, "--recordset must not be empty"),
    monthlyMinDate: isoDate("--monthly-min-date"),
    overallMinDate: isoDate("--overall-min-date"),
    maxDate: isoDate("--max-date"),
    outDir: z.string().trim().min(1, "--out-dir must not be empty"),
    charts: z
      .array(
        z.string().refine(
          (id) => CHART_IDS.includes(id),
          (id) => ({ message: `Unknown chart "${id}" (expected one of ${CHART_IDS.join(", ")})` })
        )
      )
      .min(1),
  })
  .refine((o) => o.overallMinDate <= o.maxDate, {
    message: "--overall-min-date must not be after --max-date",
  });

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        recordset: { type: "string" },
        "monthly-min-date": { type: "string" },
        "overall-min-date": { type: "string" },
        "max-date": { type: "string" },
        "out-dir": { type: "string" },
        chart: { type: "string", multiple: true },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse and validate command-line arguments. Returns null when help was requested.
 */
export function parseCliArgs(argv: string[], now: Date = new Date()): PipelineOptions | null {
  const values = readFlags(argv);
  if (values.help) return null;

  const parsed = cliSchema.safeParse({
    recordset: values.recordset,
    monthlyMinDate: values["monthly-min-date"] ?? startOfYear(now),
    overallMinDate: values["overall-min-date"] ?? DEFAULT_OVERALL_MIN_DATE,
    maxDate: values["max-date"] ?? toIsoDate(now),
    outDir: values["out-dir"] ?? DEFAULT_OUT_DIR,
    charts: values.chart && values.chart.length > 0 ? [...new Set(values.chart)] : CHART_IDS,
  });
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return parsed.data;
}

export interface RunDeps {
  client?: StatsClient;
  now?: Date;
}

/**
 * Full CLI run. Resolves to the process exit code; never rejects.
 */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  let options: PipelineOptions | null;
  try {
    options = parseCliArgs(argv, deps.now);
  } catch (error) {
    console.error(describeError(error));
    console.error(`\n${USAGE}`);
    return 1;
  }

  if (options === null) {
    console.log(USAGE);
    return 0;
  }

  const startTime = Date.now();
  console.log("iDigBio Recordset Chart Generator");
  console.log("=".repeat(60));
  console.log(`Recordset: ${options.recordset}`);
  console.log(`Monthly:   ${options.monthlyMinDate} onwards`);
  console.log(`Annual:    ${options.overallMinDate} to ${options.maxDate}`);
  console.log(`Output:    ${options.outDir}`);
  console.log("");

  let result: PipelineResult;
  try {
    result = await runPipeline(options, deps.client ?? createStatsClient());
  } catch (error) {
    console.error(`\n${describeError(error)}`);
    return 1;
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\nAll ${result.models.length} charts generated in ${options.outDir} (${elapsed}s)`);
  return 0;
}
