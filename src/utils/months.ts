import { ValidationError } from "@/lib/errors";

export const MONTHS_ES = [
  "Enero", "Febrero", "Marzo", "Abril", "Mayo", "Junio",
  "Julio", "Agosto", "Septiembre", "Octubre", "Noviembre", "Diciembre",
] as const;

export interface LocalDateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_RE = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;

const pad2 = (n: number) => String(n).padStart(2, "0");

export function daysInMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate();
}

export function assertYearMonth(year: number, month: number): void {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new ValidationError("year", `Año inválido: ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError("month", `Mes inválido: ${month}`);
  }
}

/** "Marzo 2025" */
export function monthLabel(year: number, month: number): string {
  assertYearMonth(year, month);
  return `${MONTHS_ES[month - 1]} ${year}`;
}

/** The month `delta` months away; December + 1 is January of the next year. */
export function shiftMonth(year: number, month: number, delta: number): { year: number; month: number } {
  const index = year * 12 + (month - 1) + delta;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

/** Half-open [first of month, first of next month), local time. December rolls into January of the next year. */
export function monthRange(year: number, month: number): { start: Date; end: Date } {
  assertYearMonth(year, month);
  const start = new Date(year, month - 1, 1, 0, 0, 0, 0);
  const end = month === 12 ? new Date(year + 1, 0, 1, 0, 0, 0, 0) : new Date(year, month, 1, 0, 0, 0, 0);
  return { start, end };
}

/** Date key in local calendar date (YYYY-MM-DD). */
export function toDateKey(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

/** Sortable storage form: YYYY-MM-DD HH:MM:SS from local fields. */
export function toTimestampText(d: Date): string {
  if (Number.isNaN(d.getTime())) throw new ValidationError("timestamp", "Fecha u hora inválida");
  return `${toDateKey(d)} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

export function parseTimestampText(text: string): LocalDateTimeParts {
  // Some backends hand timestamps back ISO-style ("2025-03-01T09:00:00").
  const m = TIMESTAMP_RE.exec(text.trim().replace("T", " ").slice(0, 19));
  if (!m) throw new ValidationError("timestamp", `Marca de tiempo inválida: ${text}`);
  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month) || hour > 23 || minute > 59 || second > 59) {
    throw new ValidationError("timestamp", `Marca de tiempo inválida: ${text}`);
  }
  return { year, month, day, hour, minute, second };
}

/** Canonical text for a stored timestamp, whatever shape the backend returned. */
export function canonicalTimestampText(text: string): string {
  const p = parseTimestampText(text);
  return `${p.year}-${pad2(p.month)}-${pad2(p.day)} ${pad2(p.hour)}:${pad2(p.minute)}:${pad2(p.second)}`;
}

export function isDateKey(text: string): boolean {
  const m = DATE_KEY_RE.exec(text);
  if (!m) return false;
  const [year, month, day] = m.slice(1).map(Number);
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

/** Form input (date "YYYY-MM-DD", time "HH:MM" or "HH:MM:SS") to a local Date. */
export function composeTimestamp(dateKey: string, time: string): Date {
  if (!isDateKey(dateKey)) throw new ValidationError("date", `Fecha inválida: ${dateKey}`);
  const t = TIME_RE.exec(time.trim());
  if (!t) throw new ValidationError("time", `Hora inválida: ${time}`);
  const hour = Number(t[1]);
  const minute = Number(t[2]);
  const second = t[3] ? Number(t[3]) : 0;
  if (hour > 23 || minute > 59 || second > 59) throw new ValidationError("time", `Hora inválida: ${time}`);
  const [year, month, day] = dateKey.split("-").map(Number);
  return new Date(year, month - 1, day, hour, minute, second, 0);
}

/** "YYYY-MM-DD" part of a stored timestamp. */
export function dateKeyOf(timestamp: string): string {
  return canonicalTimestampText(timestamp).slice(0, 10);
}

/** "HH:MM" part of a stored timestamp. */
export function timeOfDayOf(timestamp: string): string {
  return canonicalTimestampText(timestamp).slice(11, 16);
}
