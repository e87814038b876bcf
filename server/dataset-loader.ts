import * as fs from "node:fs";
import * as path from "node:path";
import unzipper from "unzipper";
import { Readable } from "stream";
import { colIdx, parseCsvTable } from "./csv";
import { mapSources, SOURCE_SCHEMAS, sourceForFile, TIMESTAMP_COLUMN, type SourceName } from "./sources";
import { parseCellValue, parseTimestamp } from "./validation";
import type {
  CellValue,
  DatasetMap,
  LoadErrorKind,
  LoadResult,
  LoadResults,
  TelemetryRecord,
} from "./types/telemetry";

export const MAX_ENTRY_BYTES = 200 * 1024 * 1024;

export interface LoadOptions {
  timezone?: string | null;
  /** Largest decompressed archive entry kept; bigger entries are skipped. */
  maxEntryBytes?: number;
}

function failure(source: SourceName, kind: LoadErrorKind, message: string): LoadResult {
  return { ok: false, error: { source, kind, message } };
}

export function parseSourceCsv(source: SourceName, text: string, options: LoadOptions = {}): LoadResult {
  const { file, required } = SOURCE_SCHEMAS[source];
  const table = parseCsvTable(text);
  if (!table) {
    return failure(source, "empty_file", `${file} has no header row`);
  }

  const { headers, rows } = table;
  const missing = [TIMESTAMP_COLUMN, ...required].filter((c) => !headers.includes(c));
  if (missing.length > 0) {
    return failure(source, "missing_columns", `${file} is missing column(s): ${missing.join(", ")}`);
  }

  const tsIdx = colIdx(headers, TIMESTAMP_COLUMN);
  const records: TelemetryRecord[] = [];

  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    const raw = row[tsIdx] ?? "";
    const parsed = parseTimestamp(raw, options.timezone);
    if (!parsed) {
      return failure(source, "invalid_timestamp", `${file} row ${i + 1}: invalid timestamp "${raw}"`);
    }

    const fields: Record<string, CellValue> = {};
    for (let j = 0; j < headers.length; j++) {
      if (j === tsIdx) continue;
      fields[headers[j]] = parseCellValue(row[j] ?? "");
    }
    records.push({ timestamp: parsed.timestamp, day: parsed.day, fields });
  }

  return { ok: true, dataset: { source, columns: headers, records } };
}

export function loadSourceFile(source: SourceName, dataDir: string, options: LoadOptions = {}): LoadResult {
  const { file } = SOURCE_SCHEMAS[source];
  const filePath = path.join(dataDir, file);
  if (!fs.existsSync(filePath)) {
    return failure(source, "not_found", `${file} not found in ${dataDir}`);
  }
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return failure(source, "unreadable", `${file} could not be read: ${reason}`);
  }
  return parseSourceCsv(source, text, options);
}

export function logLoadResults(results: LoadResults, origin: string): void {
  console.log(`[loader] loading sources from ${origin}`);
  for (const [source, result] of Object.entries(results)) {
    if (result.ok) {
      console.log(`[loader] ${source}: ${result.dataset.records.length} rows`);
    } else {
      console.warn(`[loader] ${source} unavailable: ${result.error.message}`);
    }
  }
}

export function loadAllSources(dataDir: string, options: LoadOptions = {}): LoadResults {
  const results = mapSources((source) => loadSourceFile(source, dataDir, options));
  logLoadResults(results, dataDir);
  return results;
}

async function extractCsvEntries(fileBuffer: Buffer, maxEntryBytes: number): Promise<Map<SourceName, Buffer>> {
  const entries = new Map<SourceName, Buffer>();
  const stream = Readable.from(fileBuffer);
  const zip = stream.pipe(unzipper.Parse({ forceStream: true }));

  for await (const entry of zip) {
    const typedEntry = entry as unzipper.Entry;
    const entryPath = typedEntry.path;
    const source = entryPath.startsWith("__MACOSX/") ? null : sourceForFile(path.posix.basename(entryPath));

    if (typedEntry.type === "File" && source) {
      const chunks: Buffer[] = [];
      let size = 0;
      for await (const chunk of typedEntry) {
        const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        size += buf.length;
        // keep reading past the cap so the parser moves on to the next entry
        if (size <= maxEntryBytes) chunks.push(buf);
      }
      if (size > maxEntryBytes) {
        console.warn(`[loader] skipping ${entryPath}: larger than ${maxEntryBytes} bytes`);
        continue;
      }
      if (entries.has(source)) {
        console.warn(`[loader] archive has more than one ${SOURCE_SCHEMAS[source].file}, using ${entryPath}`);
      }
      entries.set(source, Buffer.concat(chunks));
    } else {
      typedEntry.autodrain();
    }
  }

  return entries;
}

export async function loadSourcesFromZip(fileBuffer: Buffer, options: LoadOptions = {}): Promise<LoadResults> {
  const entries = await extractCsvEntries(fileBuffer, options.maxEntryBytes ?? MAX_ENTRY_BYTES);
  const results = mapSources((source): LoadResult => {
    const buf = entries.get(source);
    if (!buf) {
      return failure(source, "not_found", `${SOURCE_SCHEMAS[source].file} not found in archive`);
    }
    return parseSourceCsv(source, buf.toString("utf-8"), options);
  });
  logLoadResults(results, "uploaded archive");
  return results;
}

export function collapseToDatasets(results: LoadResults): DatasetMap {
  return mapSources((source) => {
    const result = results[source];
    return result.ok ? result.dataset : null;
  });
}
