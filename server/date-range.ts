import { mapSources } from "./sources";
import type { Dataset, DatasetMap, DateWindow, GlobalBounds } from "./types/telemetry";

export type RangeCheck = "ok" | "inverted_range" | "outside_bounds" | "no_data";

export function computeBounds(datasets: ReadonlyArray<Dataset | null>): GlobalBounds | null {
  let min: string | null = null;
  let max: string | null = null;

  for (const ds of datasets) {
    if (!ds) continue;
    for (const r of ds.records) {
      if (min === null || r.day < min) min = r.day;
      if (max === null || r.day > max) max = r.day;
    }
  }

  if (min === null || max === null) return null;
  return { min, max };
}

/**
 * Classifies a requested window against the available bounds. An inverted
 * window wins over every other outcome; a window is only rejected for bounds
 * when it shares no day with them, so partial overlaps pass.
 */
export function validateWindow(window: DateWindow, bounds: GlobalBounds | null): RangeCheck {
  if (window.start > window.end) return "inverted_range";
  if (!bounds) return "no_data";
  if (window.end < bounds.min || window.start > bounds.max) return "outside_bounds";
  return "ok";
}

export function describeRangeCheck(check: Exclude<RangeCheck, "ok">, bounds: GlobalBounds | null): string {
  switch (check) {
    case "no_data":
      return "No valid data found.";
    case "inverted_range":
      return "Start date cannot be after End date.";
    case "outside_bounds":
      return bounds
        ? `The selected date range is outside the available dataset. Available data: ${bounds.min} → ${bounds.max}. Please adjust the date selection.`
        : "The selected date range is outside the available dataset.";
  }
}

export function filterByDate(dataset: Dataset | null, window: DateWindow): Dataset | null {
  if (!dataset) return null;
  return {
    source: dataset.source,
    columns: dataset.columns,
    records: dataset.records.filter((r) => r.day >= window.start && r.day <= window.end),
  };
}

export function applyWindow(datasets: DatasetMap, window: DateWindow): DatasetMap {
  return mapSources((source) => filterByDate(datasets[source], window));
}
