export const SOURCE_NAMES = [
  "calories",
  "activity",
  "heart_rate",
  "sleep",
  "stress",
  "energy",
  "spo2",
  "bp",
  "ecg",
  "falls",
  "body_comp",
  "antioxidants",
] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export interface SourceSchema {
  file: string;
  required: readonly string[];
}

export const TIMESTAMP_COLUMN = "timestamp";

export const SOURCE_SCHEMAS: Record<SourceName, SourceSchema> = {
  calories: { file: "calories.csv", required: ["calories"] },
  activity: { file: "activity.csv", required: ["active_minutes"] },
  heart_rate: { file: "heart_rate.csv", required: ["bpm"] },
  sleep: { file: "sleep.csv", required: ["deep", "light", "rem"] },
  stress: { file: "stress.csv", required: ["stress_score"] },
  energy: { file: "energy.csv", required: ["energy_score"] },
  spo2: { file: "spo2.csv", required: ["oxygen_percent"] },
  bp: { file: "bp.csv", required: ["systolic", "diastolic"] },
  ecg: { file: "ecg.csv", required: ["abnormal_flag"] },
  falls: { file: "falls.csv", required: ["fall_detected"] },
  body_comp: { file: "body_comp.csv", required: ["body_fat", "muscle_mass"] },
  antioxidants: { file: "antioxidants.csv", required: [] },
};

export function isSourceName(value: string): value is SourceName {
  return (SOURCE_NAMES as readonly string[]).includes(value);
}

export function sourceForFile(fileName: string): SourceName | null {
  const lower = fileName.toLowerCase();
  for (const name of SOURCE_NAMES) {
    if (SOURCE_SCHEMAS[name].file === lower) return name;
  }
  return null;
}

export function mapSources<T>(fn: (source: SourceName) => T): Record<SourceName, T> {
  return {
    calories: fn("calories"),
    activity: fn("activity"),
    heart_rate: fn("heart_rate"),
    sleep: fn("sleep"),
    stress: fn("stress"),
    energy: fn("energy"),
    spo2: fn("spo2"),
    bp: fn("bp"),
    ecg: fn("ecg"),
    falls: fn("falls"),
    body_comp: fn("body_comp"),
    antioxidants: fn("antioxidants"),
  };
}
