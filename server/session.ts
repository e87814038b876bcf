import { collapseToDatasets } from "./dataset-loader";
import { applyWindow, computeBounds, describeRangeCheck, validateWindow } from "./date-range";
import { mapSources, SOURCE_NAMES, SOURCE_SCHEMAS, type SourceName } from "./sources";
import type { DatasetMap, DateWindow, GlobalBounds, LoadResult, LoadResults } from "./types/telemetry";

export interface SessionContext {
  readonly loadedFrom: string;
  readonly loadedAt: string;
  readonly results: Readonly<LoadResults>;
  readonly datasets: Readonly<DatasetMap>;
  readonly bounds: GlobalBounds | null;
}

export interface WindowSelection {
  start?: string | null;
  end?: string | null;
}

export type PipelineHalt =
  | { kind: "no_data_at_all"; message: string; bounds: null }
  | { kind: "inverted_range"; message: string; bounds: GlobalBounds }
  | { kind: "outside_bounds"; message: string; bounds: GlobalBounds };

export type PipelineResult =
  | { status: "ok"; window: DateWindow; bounds: GlobalBounds; datasets: DatasetMap }
  | { status: "halted"; halt: PipelineHalt };

export interface SourceStatus {
  source: SourceName;
  file: string;
  status: "loaded" | "absent";
  rows: number;
  error: string | null;
}

export function buildSessionContext(
  results: LoadResults,
  loadedFrom: string,
  loadedAt: Date = new Date(),
): SessionContext {
  const frozenResults = Object.freeze({ ...results });
  const datasets = Object.freeze(collapseToDatasets(frozenResults));
  return Object.freeze({
    loadedFrom,
    loadedAt: loadedAt.toISOString(),
    results: frozenResults,
    datasets,
    bounds: computeBounds(SOURCE_NAMES.map((s) => datasets[s])),
  });
}

export function replaceSource(
  context: SessionContext,
  source: SourceName,
  result: LoadResult,
  loadedFrom: string,
): SessionContext {
  const results = mapSources((s) => (s === source ? result : context.results[s]));
  return buildSessionContext(results, loadedFrom);
}

export function describeSources(context: SessionContext): SourceStatus[] {
  return SOURCE_NAMES.map((source) => {
    const result = context.results[source];
    return {
      source,
      file: SOURCE_SCHEMAS[source].file,
      status: result.ok ? "loaded" : "absent",
      rows: result.ok ? result.dataset.records.length : 0,
      error: result.ok ? null : result.error.message,
    };
  });
}

export function runPipeline(context: SessionContext, selection: WindowSelection = {}): PipelineResult {
  const { bounds } = context;
  if (!bounds) {
    return {
      status: "halted",
      halt: { kind: "no_data_at_all", message: describeRangeCheck("no_data", null), bounds: null },
    };
  }

  const window: DateWindow = {
    start: selection.start ?? bounds.min,
    end: selection.end ?? bounds.max,
  };

  const check = validateWindow(window, bounds);
  if (check === "ok") {
    return { status: "ok", window, bounds, datasets: applyWindow(context.datasets, window) };
  }

  const message = describeRangeCheck(check, bounds);
  if (check === "no_data") {
    return { status: "halted", halt: { kind: "no_data_at_all", message, bounds: null } };
  }
  return { status: "halted", halt: { kind: check, message, bounds } };
}

export class SessionStore {
  private context: SessionContext;

  constructor(initial: SessionContext) {
    this.context = initial;
  }

  current(): SessionContext {
    return this.context;
  }

  replace(next: SessionContext): SessionContext {
    this.context = next;
    return next;
  }
}
