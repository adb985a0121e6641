import type { Session } from "@/types";
import { buildMonthGrid, WEEKDAYS_ES } from "@/lib/calendar/monthMatrix";
import { formatMoney } from "@/utils/money";
import { toDateKey } from "@/utils/months";
import "../pages/calendar.css";

export interface MonthCalendarGridProps {
  year: number;
  month: number;
  sessions: Session[];
  today?: Date;
}

/** Month grid, Monday through Sunday, with each day's classes and total. */
export default function MonthCalendarGrid({ year, month, sessions, today = new Date() }: MonthCalendarGridProps) {
  const todayKey = toDateKey(today);
  const weeks = buildMonthGrid(year, month, sessions);

  return (
    <div className="calendar-page__grid-card">
      <div className="calendar-page__weekdays">
        {WEEKDAYS_ES.map((label) => (
          <span key={label}>{label}</span>
        ))}
      </div>
      <div className="calendar-page__dates">
        {weeks.flatMap((week, w) =>
          week.map((cell, i) => {
            if (!cell.inMonth) {
              return <div key={`empty-${w}-${i}`} className="calendar-page__date-cell calendar-page__date-cell--other-month" />;
            }
            return (
              <div
                key={cell.dateKey}
                className={`calendar-page__date-cell ${cell.dateKey === todayKey ? "calendar-page__date-cell--today" : ""}`}
              >
                <div className="calendar-page__day-number">{cell.day}</div>
                {cell.entries.length === 0 ? (
                  <div className="calendar-page__empty">— sin clases —</div>
                ) : (
                  <>
                    <ul className="calendar-page__entries">
                      {cell.entries.map((e) => (
                        <li key={e.id}>
                          <strong>{e.time}</strong> · {e.client} · {formatMoney(e.amount)}
                        </li>
                      ))}
                    </ul>
                    <div className="calendar-page__day-total">Total del día: {formatMoney(cell.total)}</div>
                  </>
                )}
              </div>
            );
          })
        )}
      </div>
    </div>
  );
}
