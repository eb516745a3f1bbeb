const toInt = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

export const IDIGBIO_API_URL = (process.env.IDIGBIO_API_URL ?? "https://search.idigbio.org").replace(/\/+$/, "");
export const readTimeoutMs = (value: string | undefined) => clamp(toInt(value, 60_000), 1_000, 300_000);

export const IDIGBIO_TIMEOUT_MS = readTimeoutMs(process.env.IDIGBIO_TIMEOUT_MS);

export const DEFAULT_OUT_DIR = "docs/charts";
export const DEFAULT_OVERALL_MIN_DATE = "2015-01-16";
