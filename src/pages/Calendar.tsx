import { useStoreContext } from "@/context/StoreContext";
import MonthCalendarGrid from "@/components/MonthCalendarGrid";
import { monthLabel } from "@/utils/months";

export default function Calendar() {
  const { period, rollup } = useStoreContext();
  const sessions = rollup?.sessions ?? [];

  return (
    <section>
      <h2>Calendario de {monthLabel(period.year, period.month)}</h2>
      {sessions.length === 0 && <div className="notice notice--info">No hay clases en este mes.</div>}
      <MonthCalendarGrid year={period.year} month={period.month} sessions={sessions} />
    </section>
  );
}
