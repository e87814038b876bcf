export function fmtInt(x: number | null | undefined): string {
  if (x == null) return "—";
  return Math.trunc(x).toString();
}

export function fmtRaw(x: number | null | undefined, decimals: number = 2): string {
  if (x == null) return "—";
  return x.toFixed(decimals);
}

export function fmtPct(x: number | null | undefined, decimals: number = 1): string {
  if (x == null) return "—";
  return `${x.toFixed(decimals)}%`;
}

export function fmtDateRange(start: string | null | undefined, end: string | null | undefined): string {
  if (!start || !end) return "—";
  return start === end ? start : `${start} → ${end}`;
}
