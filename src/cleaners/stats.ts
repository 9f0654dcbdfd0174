import type { CellValue } from "../parsers/table.js";

export function mean(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Quantile with linear interpolation between closest ranks */
export function quantile(values: readonly number[], q: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function median(values: readonly number[]): number {
  return quantile(values, 0.5);
}

/** Sample standard deviation (n - 1) */
export function stdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const variance = values.reduce((acc, v) => acc + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

function sortKey(value: Exclude<CellValue, null>): [number, number | string] {
  if (typeof value === "number") return [0, value];
  if (typeof value === "boolean") return [1, value ? 1 : 0];
  if (value instanceof Date) return [2, value.getTime()];
  return [3, value];
}

function compareCells(a: Exclude<CellValue, null>, b: Exclude<CellValue, null>): number {
  const [ra, ka] = sortKey(a);
  const [rb, kb] = sortKey(b);
  if (ra !== rb) return ra - rb;
  if (typeof ka === "number" && typeof kb === "number") return ka - kb;
  const sa = String(ka);
  const sb = String(kb);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/** Key that treats equal values of the same type as identical */
export function cellKey(value: CellValue): string {
  if (value instanceof Date) return `d:${value.toISOString()}`;
  return JSON.stringify(value);
}

/** Most frequent non-null value; ties go to the smallest. Null if there is none. */
export function mode(values: readonly CellValue[]): CellValue {
  const counts = new Map<string, { value: Exclude<CellValue, null>; count: number }>();

  for (const value of values) {
    if (value === null) continue;
    const key = cellKey(value);
    const entry = counts.get(key);
    if (entry) entry.count++;
    else counts.set(key, { value, count: 1 });
  }

  let best: { value: Exclude<CellValue, null>; count: number } | undefined;
  for (const entry of counts.values()) {
    if (
      !best ||
      entry.count > best.count ||
      (entry.count === best.count && compareCells(entry.value, best.value) < 0)
    ) {
      best = entry;
    }
  }

  return best ? best.value : null;
}

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const SLASH_YMD = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})$/;
const SLASH_MDY = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2}|\d{4})$/;
const NAMED_MONTH = /^(?:[A-Za-z]{3,9}\.? \d{1,2},? \d{4}|\d{1,2} [A-Za-z]{3,9}\.? \d{4})$/;

function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parse common date spellings: ISO (with optional time), year-first and
 * month-first slashed dates, and "March 5, 2024" / "5 March 2024".
 * Anything else, including bare numbers, is not a date.
 */
export function parseDate(raw: string): Date | null {
  const s = raw.trim();

  const iso = ISO_DATE.exec(s);
  if (iso) {
    const date = utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    if (!date || iso[4] === undefined) return date;
    const zone = iso[7] ?? "Z";
    const pad = (v: string) => v.padStart(2, "0");
    const stamp = `${iso[1]}-${pad(iso[2])}-${pad(iso[3])}T${pad(iso[4])}:${iso[5]}:${iso[6] ?? "00"}${zone}`;
    const parsed = new Date(stamp);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  const ymd = SLASH_YMD.exec(s);
  if (ymd) return utcDate(Number(ymd[1]), Number(ymd[2]), Number(ymd[3]));

  const mdy = SLASH_MDY.exec(s);
  if (mdy) {
    let year = Number(mdy[3]);
    if (mdy[3].length === 2) year += year < 70 ? 2000 : 1900;
    return utcDate(year, Number(mdy[1]), Number(mdy[2]));
  }

  if (NAMED_MONTH.test(s)) {
    const ms = Date.parse(`${s.replace(",", "")} UTC`);
    return Number.isNaN(ms) ? null : new Date(ms);
  }

  return null;
}
