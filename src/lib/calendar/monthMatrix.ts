import type { CalendarCell, CalendarEntry, Session } from "@/types";
import { normalizeClient } from "@/utils/clientName";
import { assertYearMonth, daysInMonth, parseTimestampText } from "@/utils/months";

/** Column headers, Monday first. */
export const WEEKDAYS_ES = ["Lun", "Mar", "Mié", "Jue", "Vie", "Sáb", "Dom"] as const;

const pad2 = (n: number) => String(n).padStart(2, "0");

/**
 * Weeks of the month, Monday through Sunday. Cells outside the month are 0.
 * March 2025 (starts on a Saturday) begins with [0, 0, 0, 0, 0, 1, 2].
 */
export function monthMatrix(year: number, month: number): number[][] {
  assertYearMonth(year, month);
  // getDay() is Sunday-based; shift so Monday is column 0.
  const lead = (new Date(year, month - 1, 1).getDay() + 6) % 7;
  const days = daysInMonth(year, month);
  const weeks: number[][] = [];
  let week: number[] = Array<number>(lead).fill(0);
  for (let day = 1; day <= days; day++) {
    week.push(day);
    if (week.length === 7) {
      weeks.push(week);
      week = [];
    }
  }
  if (week.length > 0) weeks.push([...week, ...Array<number>(7 - week.length).fill(0)]);
  return weeks;
}

/** Sessions keyed by date (YYYY-MM-DD), each day ordered by time of day. */
export function projectCalendar(sessions: Session[]): Map<string, CalendarEntry[]> {
  const byDay = new Map<string, { ts: string; entry: CalendarEntry }[]>();
  for (const s of sessions) {
    const p = parseTimestampText(s.timestamp);
    const dateKey = `${p.year}-${pad2(p.month)}-${pad2(p.day)}`;
    const list = byDay.get(dateKey) ?? [];
    list.push({
      ts: `${pad2(p.hour)}:${pad2(p.minute)}:${pad2(p.second)}`,
      entry: { id: s.id, client: normalizeClient(s.client), time: `${pad2(p.hour)}:${pad2(p.minute)}`, amount: s.amount },
    });
    byDay.set(dateKey, list);
  }
  const out = new Map<string, CalendarEntry[]>();
  for (const key of [...byDay.keys()].sort()) {
    const list = byDay.get(key) ?? [];
    list.sort((a, b) => (a.ts !== b.ts ? (a.ts < b.ts ? -1 : 1) : a.entry.id - b.entry.id));
    out.set(key, list.map((x) => x.entry));
  }
  return out;
}

/** Full Monday-first grid for a month. Days without classes carry an empty entry list, not a gap. */
export function buildMonthGrid(year: number, month: number, sessions: Session[]): CalendarCell[][] {
  const byDay = projectCalendar(sessions);
  return monthMatrix(year, month).map((week) =>
    week.map((day): CalendarCell => {
      if (day === 0) return { inMonth: false };
      const dateKey = `${year}-${pad2(month)}-${pad2(day)}`;
      const entries = byDay.get(dateKey) ?? [];
      return { inMonth: true, day, dateKey, entries, total: entries.reduce((sum, e) => sum + e.amount, 0) };
    })
  );
}
