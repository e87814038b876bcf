import type { SourceName } from "../sources";

export type CellValue = number | string | null;

export type TelemetryRecord = {
  timestamp: string;
  day: string;
  fields: Readonly<Record<string, CellValue>>;
};

export type Dataset = {
  source: SourceName;
  columns: readonly string[];
  records: readonly TelemetryRecord[];
};

export type DateWindow = { start: string; end: string };

export type GlobalBounds = { min: string; max: string };

export type LoadErrorKind =
  | "not_found"
  | "unreadable"
  | "empty_file"
  | "missing_columns"
  | "invalid_timestamp";

export type LoadError = {
  source: SourceName;
  kind: LoadErrorKind;
  message: string;
};

export type LoadResult = { ok: true; dataset: Dataset } | { ok: false; error: LoadError };

export type LoadResults = Record<SourceName, LoadResult>;

export type DatasetMap = Record<SourceName, Dataset | null>;
