import { useEffect, useMemo, useState } from "react";
import { useStoreContext } from "@/context/StoreContext";
import DataTable from "@/components/DataTable";
import Notice, { type NoticeState } from "@/components/Notice";
import { Button } from "@/components/ui/Button";
import { TrashIcon } from "@/components/ui/Icons";
import { SESSION_COLUMNS, sessionOptionLabel, toMonthSessionTable } from "@/lib/aggregation/tables";
import { describeError } from "@/lib/errors";
import { monthLabel } from "@/utils/months";

/** Numbered list of the selected month's classes, with a picker to delete one. */
export default function MonthSessions() {
  const { period, rollup, deleteSession } = useStoreContext();
  const rows = useMemo(() => toMonthSessionTable(rollup?.sessions ?? []), [rollup]);
  const [selectedId, setSelectedId] = useState<number | null>(null);
  const [notice, setNotice] = useState<NoticeState | null>(null);

  useEffect(() => {
    setSelectedId(rows[0]?.id ?? null);
  }, [rows]);

  const handleDelete = async () => {
    if (selectedId == null) return;
    try {
      await deleteSession(selectedId);
      setNotice({ tone: "success", text: "Registro borrado." });
    } catch (err) {
      setNotice({ tone: "error", text: describeError(err) });
    }
  };

  return (
    <section className="card">
      <h2>Clases del mes: {monthLabel(period.year, period.month)}</h2>
      <Notice notice={notice} />
      {rows.length === 0 ? (
        <div className="notice notice--info">No hay registros en este mes.</div>
      ) : (
        <>
          <DataTable columns={SESSION_COLUMNS} rows={rows} rowKey={(r) => r.id} />
          <details style={{ marginTop: 12 }}>
            <summary>Borrar un registro</summary>
            <label className="field" style={{ marginTop: 8 }}>
              Selecciona el registro a borrar
              <select value={selectedId ?? ""} onChange={(e) => setSelectedId(Number(e.target.value))}>
                {rows.map((r) => (
                  <option key={r.id} value={r.id}>
                    {sessionOptionLabel(r)}
                  </option>
                ))}
              </select>
            </label>
            <Button variant="danger" onClick={() => void handleDelete()}>
              <TrashIcon /> Borrar seleccionado
            </Button>
          </details>
        </>
      )}
    </section>
  );
}
