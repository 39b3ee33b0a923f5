import type { StatsOperation } from "./types/records.js";

export class StatsPipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidLaneError extends StatsPipelineError {
  constructor(readonly raw: string) {
    super(`Invalid lane "${raw}". Use listLaneAliases() (or GET /api/lanes) to see the valid lanes.`);
  }
}

export class InvalidRankError extends StatsPipelineError {
  constructor(readonly raw: string) {
    super(`Invalid rank "${raw}". Use listRankAliases() (or GET /api/ranks) to see the valid ranks.`);
  }
}

/** Structurally invalid arguments, raised before any request goes out. */
export class RequestValidationError extends StatsPipelineError {}

export type TransportFailureKind = "http_error" | "timeout" | "network_error";

export class TransportError extends StatsPipelineError {
  readonly kind: TransportFailureKind;
  readonly status?: number;
  readonly url: string;

  constructor(params: { kind: TransportFailureKind; url: string; status?: number; cause?: unknown }) {
    const detail =
      params.kind === "http_error"
        ? `HTTP ${params.status ?? "error"}`
        : params.kind === "timeout"
          ? "request timed out"
          : `network error${params.cause instanceof Error ? `: ${params.cause.message}` : ""}`;
    super(`Failed to fetch ${params.url} (${detail}).`, { cause: params.cause });
    this.kind = params.kind;
    this.status = params.status;
    this.url = params.url;
  }
}

export class ExtractionError extends StatsPipelineError {
  constructor(
    readonly operation: StatsOperation,
    readonly reason: string
  ) {
    super(`Could not extract ${operation} data: ${reason}`);
  }
}
