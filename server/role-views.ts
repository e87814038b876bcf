import { fmtDateRange, fmtInt, fmtPct, fmtRaw } from "../lib/format";
import type { SourceName } from "./sources";
import { toNumberOrNull } from "./validation";
import type { CellValue, Dataset, DatasetMap, DateWindow, GlobalBounds } from "./types/telemetry";

export const ROLES = ["Athlete", "Coach", "Trainer", "Team Doctor"] as const;

export type Role = (typeof ROLES)[number];

export const ROLE_THEME: Record<Role, string> = {
  Athlete: "#1f77b4",
  Coach: "#2ca02c",
  Trainer: "#ff7f0e",
  "Team Doctor": "#d62728",
};

export const ROLE_SOURCES: Record<Role, readonly SourceName[]> = {
  Athlete: ["energy", "calories", "activity", "sleep", "stress"],
  Coach: ["energy", "calories", "activity", "heart_rate"],
  Trainer: ["heart_rate", "body_comp", "sleep"],
  "Team Doctor": ["spo2", "ecg", "heart_rate", "bp", "falls"],
};

export const VIEW_THRESHOLDS = {
  underRecoveredEnergy: 65,
  lowSpo2Percent: 92,
} as const;

export const HR_ZONES = [
  { label: "Z1", lo: 0, hi: 100 },
  { label: "Z2", lo: 100, hi: 120 },
  { label: "Z3", lo: 120, hi: 140 },
  { label: "Z4", lo: 140, hi: 160 },
  { label: "Z5", lo: 160, hi: 220 },
] as const;

export type Metric = { label: string; value: number | null; display: string };

export type Alert = { level: "warning" | "error"; message: string; detail: string };

export type SeriesPoint = { timestamp: string; value: number | null };

export type Series = { key: string; points: SeriesPoint[] };

export type Panel =
  | { kind: "line" | "area"; title: string; series: Series[] }
  | { kind: "bar"; title: string; bars: { label: string; count: number }[] }
  | { kind: "table"; title: string; columns: string[]; rows: Record<string, CellValue>[] };

export type RoleDashboard = {
  role: Role;
  title: string;
  subtitle: string;
  color: string;
  window: DateWindow;
  bounds: GlobalBounds;
  metrics: Metric[];
  alerts: Alert[];
  panels: Panel[];
  missingSources: SourceName[];
};

export interface FilteredView {
  window: DateWindow;
  bounds: GlobalBounds;
  datasets: DatasetMap;
}

export function isRole(value: string): value is Role {
  return (ROLES as readonly string[]).includes(value);
}

function columnValues(ds: Dataset, column: string): number[] {
  const out: number[] = [];
  for (const r of ds.records) {
    const n = toNumberOrNull(r.fields[column]);
    if (n != null) out.push(n);
  }
  return out;
}

export function lastValue(ds: Dataset | null, column: string): number | null {
  if (!ds || ds.records.length === 0) return null;
  return toNumberOrNull(ds.records[ds.records.length - 1].fields[column]);
}

function series(ds: Dataset, column: string): Series {
  return {
    key: column,
    points: ds.records.map((r) => ({ timestamp: r.timestamp, value: toNumberOrNull(r.fields[column]) })),
  };
}

function chart(kind: "line" | "area", title: string, ds: Dataset | null, ...columns: string[]): Panel[] {
  if (!ds) return [];
  return [{ kind, title, series: columns.map((c) => series(ds, c)) }];
}

function latestMetric(label: string, ds: Dataset | null, column: string): Metric {
  const raw = lastValue(ds, column);
  const value = raw == null ? null : Math.trunc(raw);
  return { label, value, display: fmtInt(value) };
}

export function sleepScoreSeries(sleep: Dataset): Series {
  return {
    key: "sleep_score",
    points: sleep.records.map((r) => ({
      timestamp: r.timestamp,
      value: ["deep", "light", "rem"].reduce((sum, c) => sum + (toNumberOrNull(r.fields[c]) ?? 0), 0),
    })),
  };
}

export function countHeartRateZones(heart: Dataset): { label: string; count: number }[] {
  const bpm = columnValues(heart, "bpm");
  return HR_ZONES.map((z) => ({
    label: z.label,
    count: bpm.filter((v) => v > z.lo && v <= z.hi).length,
  }));
}

function athleteView(d: DatasetMap): Pick<RoleDashboard, "metrics" | "alerts" | "panels"> {
  const panels: Panel[] = [];
  if (d.sleep) {
    panels.push({ kind: "line", title: "Sleep Quality", series: [sleepScoreSeries(d.sleep)] });
  }
  panels.push(...chart("line", "Stress Trend", d.stress, "stress_score"));

  return {
    metrics: [
      latestMetric("Energy Score", d.energy, "energy_score"),
      latestMetric("Calories", d.calories, "calories"),
      latestMetric("Active Minutes", d.activity, "active_minutes"),
    ],
    alerts: [],
    panels,
  };
}

function coachView(d: DatasetMap): Pick<RoleDashboard, "metrics" | "alerts" | "panels"> {
  const alerts: Alert[] = [];
  const energy = lastValue(d.energy, "energy_score");
  if (energy != null && energy < VIEW_THRESHOLDS.underRecoveredEnergy) {
    alerts.push({
      level: "warning",
      message: "Athlete may be under-recovered.",
      detail: `Latest energy score ${fmtRaw(energy, 0)}`,
    });
  }

  return {
    metrics: [],
    alerts,
    panels: [
      ...chart("line", "Calories Burned", d.calories, "calories"),
      ...chart("line", "Active Minutes", d.activity, "active_minutes"),
      ...chart("line", "Heart Rate", d.heart_rate, "bpm"),
      ...chart("line", "Readiness Score", d.energy, "energy_score"),
    ],
  };
}

function trainerView(d: DatasetMap): Pick<RoleDashboard, "metrics" | "alerts" | "panels"> {
  const panels: Panel[] = [];
  if (d.heart_rate) {
    panels.push({ kind: "bar", title: "Heart Rate Zones", bars: countHeartRateZones(d.heart_rate) });
  }
  panels.push(
    ...chart("line", "Body Fat %", d.body_comp, "body_fat"),
    ...chart("line", "Muscle Mass", d.body_comp, "muscle_mass"),
    ...chart("area", "Sleep Stages", d.sleep, "deep", "light", "rem"),
  );
  return { metrics: [], alerts: [], panels };
}

function teamDoctorView(d: DatasetMap): Pick<RoleDashboard, "metrics" | "alerts" | "panels"> {
  const alerts: Alert[] = [];
  const metrics: Metric[] = [];

  const oxygen = d.spo2 ? columnValues(d.spo2, "oxygen_percent") : [];
  if (oxygen.length > 0) {
    const lowest = oxygen.reduce((lo, v) => (v < lo ? v : lo), oxygen[0]);
    if (lowest < VIEW_THRESHOLDS.lowSpo2Percent) {
      alerts.push({ level: "error", message: "Low SpO₂ detected.", detail: `Lowest reading ${fmtPct(lowest)}` });
    }
  }

  if (d.ecg) {
    const abnormal = Math.trunc(columnValues(d.ecg, "abnormal_flag").reduce((s, v) => s + v, 0));
    metrics.push({ label: "ECG Abnormal Events", value: abnormal, display: fmtInt(abnormal) });
  }

  const panels: Panel[] = [
    ...chart("line", "Heart Rate", d.heart_rate, "bpm"),
    ...chart("line", "Blood Oxygen", d.spo2, "oxygen_percent"),
    ...chart("line", "Blood Pressure", d.bp, "systolic", "diastolic"),
  ];

  if (d.falls) {
    panels.push({
      kind: "table",
      title: "Fall Events",
      columns: [...d.falls.columns],
      rows: d.falls.records
        .filter((r) => toNumberOrNull(r.fields.fall_detected) === 1)
        .map((r) => ({ timestamp: r.timestamp, ...r.fields })),
    });
  }

  return { metrics, alerts, panels };
}

export function buildRoleDashboard(role: Role, view: FilteredView): RoleDashboard {
  const d = view.datasets;
  let body: Pick<RoleDashboard, "metrics" | "alerts" | "panels">;
  switch (role) {
    case "Athlete":
      body = athleteView(d);
      break;
    case "Coach":
      body = coachView(d);
      break;
    case "Trainer":
      body = trainerView(d);
      break;
    case "Team Doctor":
      body = teamDoctorView(d);
      break;
  }

  return {
    role,
    title: `${role} Dashboard`,
    subtitle: fmtDateRange(view.window.start, view.window.end),
    color: ROLE_THEME[role],
    window: view.window,
    bounds: view.bounds,
    ...body,
    missingSources: ROLE_SOURCES[role].filter((s) => d[s] === null),
  };
}
