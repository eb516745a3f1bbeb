/**
 * Error classes for the chart job. Every one of them is fatal to a run:
 * the CLI prints `<name>: <message>` and exits non-zero.
 */

export class ChartJobError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChartJobError";
  }
}

export class UsageError extends ChartJobError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class RemoteFetchError extends ChartJobError {
  constructor(
    message: string,
    public url: string,
    public status: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RemoteFetchError";
  }
}

export class DataFormatError extends ChartJobError {
  constructor(
    message: string,
    public issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DataFormatError";
  }
}

export class RenderError extends ChartJobError {
  constructor(
    message: string,
    public chartId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RenderError";
  }
}

export class FilesystemError extends ChartJobError {
  constructor(
    message: string,
    public path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FilesystemError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
