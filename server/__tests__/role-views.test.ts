import { parseSourceCsv } from "../dataset-loader";
import { buildRoleDashboard, countHeartRateZones, isRole, lastValue, type FilteredView, type Panel } from "../role-views";
import { mapSources, type SourceName } from "../sources";
import type { Dataset, DatasetMap } from "../types/telemetry";

function csv(source: SourceName, text: string): Dataset {
  const result = parseSourceCsv(source, text);
  if (!result.ok) throw new Error(result.error.message);
  return result.dataset;
}

function view(overrides: Partial<DatasetMap>): FilteredView {
  return {
    window: { start: "2024-01-01", end: "2024-01-02" },
    bounds: { min: "2024-01-01", max: "2024-01-31" },
    datasets: { ...mapSources<Dataset | null>(() => null), ...overrides },
  };
}

const titles = (panels: Panel[]) => panels.map((p) => p.title);

const energyLow = csv("energy", "timestamp,energy_score\n2024-01-01,80\n2024-01-02,62.7\n");
const activity = csv("activity", "timestamp,active_minutes\n2024-01-02,45\n");
const sleep = csv("sleep", "timestamp,deep,light,rem\n2024-01-01,90,240,100\n2024-01-02,80,,95\n");

describe("isRole", () => {
  it("accepts the four roles only", () => {
    expect(isRole("Team Doctor")).toBe(true);
    expect(isRole("team doctor")).toBe(false);
    expect(isRole("Physio")).toBe(false);
  });
});

describe("lastValue", () => {
  it("uses the last record in file order", () => {
    expect(lastValue(energyLow, "energy_score")).toBe(62.7);
  });

  it("absent or empty datasets give null", () => {
    expect(lastValue(null, "energy_score")).toBeNull();
    expect(lastValue(csv("energy", "timestamp,energy_score\n"), "energy_score")).toBeNull();
  });
});

describe("Athlete dashboard", () => {
  const dash = buildRoleDashboard("Athlete", view({ energy: energyLow, activity, sleep }));

  it("header fields", () => {
    expect(dash.title).toBe("Athlete Dashboard");
    expect(dash.color).toBe("#1f77b4");
    expect(dash.subtitle).toBe("2024-01-01 → 2024-01-02");
  });

  it("latest-value metrics, truncated, with absent sources shown as a dash", () => {
    expect(dash.metrics).toEqual([
      { label: "Energy Score", value: 62, display: "62" },
      { label: "Calories", value: null, display: "—" },
      { label: "Active Minutes", value: 45, display: "45" },
    ]);
  });

  it("sleep quality sums the stages and skips blanks", () => {
    expect(dash.panels).toEqual([
      {
        kind: "line",
        title: "Sleep Quality",
        series: [
          {
            key: "sleep_score",
            points: [
              { timestamp: "2024-01-01T00:00:00.000Z", value: 430 },
              { timestamp: "2024-01-02T00:00:00.000Z", value: 175 },
            ],
          },
        ],
      },
    ]);
  });

  it("lists sources the role needs but could not load", () => {
    expect(dash.missingSources).toEqual(["calories", "stress"]);
  });
});

describe("Coach dashboard", () => {
  it("warns when the latest energy score is below 65", () => {
    const dash = buildRoleDashboard("Coach", view({ energy: energyLow, activity }));
    expect(dash.alerts).toEqual([
      { level: "warning", message: "Athlete may be under-recovered.", detail: "Latest energy score 63" },
    ]);
    expect(titles(dash.panels)).toEqual(["Active Minutes", "Readiness Score"]);
  });

  it("no warning at or above the threshold", () => {
    const energy = csv("energy", "timestamp,energy_score\n2024-01-02,65\n");
    expect(buildRoleDashboard("Coach", view({ energy })).alerts).toEqual([]);
  });

  it("no warning and no charts when every source is absent", () => {
    const dash = buildRoleDashboard("Coach", view({}));
    expect(dash.alerts).toEqual([]);
    expect(dash.panels).toEqual([]);
    expect(dash.missingSources).toEqual(["energy", "calories", "activity", "heart_rate"]);
  });
});

describe("Trainer dashboard", () => {
  const heart = csv("heart_rate", "timestamp,bpm\n2024-01-01,58\n2024-01-01,100\n2024-01-01,101\n2024-01-02,131\n2024-01-02,165\n2024-01-02,230\n2024-01-02,0\n");

  it("heart rate zones are right-closed and every zone is listed", () => {
    expect(countHeartRateZones(heart)).toEqual([
      { label: "Z1", count: 2 },
      { label: "Z2", count: 1 },
      { label: "Z3", count: 1 },
      { label: "Z4", count: 0 },
      { label: "Z5", count: 1 },
    ]);
  });

  it("panels follow the available sources", () => {
    const body = csv("body_comp", "timestamp,body_fat,muscle_mass\n2024-01-01,14.2,41.5\n");
    const dash = buildRoleDashboard("Trainer", view({ heart_rate: heart, body_comp: body, sleep }));
    expect(titles(dash.panels)).toEqual(["Heart Rate Zones", "Body Fat %", "Muscle Mass", "Sleep Stages"]);

    const stages = dash.panels[3];
    expect(stages.kind).toBe("area");
    if (stages.kind === "area") {
      expect(stages.series.map((s) => s.key)).toEqual(["deep", "light", "rem"]);
      expect(stages.series[1].points[1].value).toBeNull();
    }
  });
});

describe("Team Doctor dashboard", () => {
  const spo2 = csv("spo2", "timestamp,oxygen_percent\n2024-01-01,97\n2024-01-02,91.5\n");
  const ecg = csv("ecg", "timestamp,abnormal_flag\n2024-01-01,0\n2024-01-01,1\n2024-01-02,1\n");
  const bp = csv("bp", "timestamp,systolic,diastolic\n2024-01-01,120,80\n");
  const falls = csv(
    "falls",
    "timestamp,fall_detected,severity\n2024-01-01 10:00:00,0,\n2024-01-02 11:30:00,1,high\n",
  );
  const dash = buildRoleDashboard("Team Doctor", view({ spo2, ecg, bp, falls }));

  it("low SpO2 raises an error alert", () => {
    expect(dash.alerts).toEqual([{ level: "error", message: "Low SpO₂ detected.", detail: "Lowest reading 91.5%" }]);
  });

  it("counts abnormal ECG events", () => {
    expect(dash.metrics).toEqual([{ label: "ECG Abnormal Events", value: 2, display: "2" }]);
  });

  it("charts and fall table", () => {
    expect(titles(dash.panels)).toEqual(["Blood Oxygen", "Blood Pressure", "Fall Events"]);
    expect(dash.panels[2]).toEqual({
      kind: "table",
      title: "Fall Events",
      columns: ["timestamp", "fall_detected", "severity"],
      rows: [{ timestamp: "2024-01-02T11:30:00.000Z", fall_detected: 1, severity: "high" }],
    });
    expect(dash.missingSources).toEqual(["heart_rate"]);
  });

  it("finds the lowest SpO2 reading in a large export", () => {
    const records = Array.from({ length: 300_000 }, (_, i) => ({
      timestamp: "2024-01-01T00:00:00.000Z",
      day: "2024-01-01",
      fields: { oxygen_percent: i === 150_000 ? 90 : 97 },
    }));
    const big: Dataset = { source: "spo2", columns: ["timestamp", "oxygen_percent"], records };
    const dash = buildRoleDashboard("Team Doctor", view({ spo2: big }));
    expect(dash.alerts).toEqual([{ level: "error", message: "Low SpO₂ detected.", detail: "Lowest reading 90.0%" }]);
  });

  it("no ECG metric and no alert without those sources", () => {
    const bare = buildRoleDashboard("Team Doctor", view({}));
    expect(bare.metrics).toEqual([]);
    expect(bare.alerts).toEqual([]);
  });
});

describe("sources with no numeric values", () => {
  const energy = csv("energy", "timestamp,energy_score\n2024-01-01,n/a\n2024-01-02,pending\n");
  const spo2 = csv("spo2", "timestamp,oxygen_percent\n2024-01-01,error\n");

  it("latest-value metrics fall back to a dash", () => {
    const dash = buildRoleDashboard("Athlete", view({ energy }));
    expect(dash.metrics[0]).toEqual({ label: "Energy Score", value: null, display: "—" });
  });

  it("raise no alerts and chart null points", () => {
    expect(buildRoleDashboard("Coach", view({ energy })).alerts).toEqual([]);

    const doctor = buildRoleDashboard("Team Doctor", view({ spo2 }));
    expect(doctor.alerts).toEqual([]);
    expect(doctor.panels).toEqual([
      {
        kind: "line",
        title: "Blood Oxygen",
        series: [{ key: "oxygen_percent", points: [{ timestamp: "2024-01-01T00:00:00.000Z", value: null }] }],
      },
    ]);
  });
});
