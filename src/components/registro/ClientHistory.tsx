import { useEffect, useState } from "react";
import { useStoreContext } from "@/context/StoreContext";
import DataTable from "@/components/DataTable";
import Notice, { type NoticeState } from "@/components/Notice";
import { Button } from "@/components/ui/Button";
import { DownloadIcon } from "@/components/ui/Icons";
import { HISTORY_COLUMNS, toHistoryTable } from "@/lib/aggregation/tables";
import { describeError } from "@/lib/errors";
import { downloadCsv, historyFileName, historyToCsv } from "@/utils/csvExport";
import type { HistoryRow } from "@/types";

export default function ClientHistory() {
  const { clients, rollup, loadHistory } = useStoreContext();
  const [client, setClient] = useState("");
  const [rows, setRows] = useState<HistoryRow[]>([]);
  const [notice, setNotice] = useState<NoticeState | null>(null);

  useEffect(() => {
    if (!client || !clients.includes(client)) setClient(clients[0] ?? "");
  }, [clients, client]);

  useEffect(() => {
    if (!client) {
      setRows([]);
      return;
    }
    let cancelled = false;
    loadHistory(client)
      .then((next) => {
        if (!cancelled) {
          setRows(next);
          setNotice(null);
        }
      })
      .catch((err: unknown) => {
        if (!cancelled) setNotice({ tone: "error", text: describeError(err) });
      });
    return () => {
      cancelled = true;
    };
  }, [client, rollup, loadHistory]);

  return (
    <section className="card">
      <h2>Historial de meses por cliente</h2>
      <Notice notice={notice} />
      {clients.length === 0 ? (
        <div className="notice notice--info">Aún no hay clientes para mostrar historial.</div>
      ) : (
        <>
          <label className="field">
            Cliente
            <select value={client} onChange={(e) => setClient(e.target.value)}>
              {clients.map((c) => (
                <option key={c} value={c}>
                  {c}
                </option>
              ))}
            </select>
          </label>
          {rows.length === 0 ? (
            <div className="notice notice--info">Ese cliente todavía no tiene clases registradas.</div>
          ) : (
            <>
              <DataTable columns={HISTORY_COLUMNS} rows={toHistoryTable(rows)} rowKey={(r) => r.Mes} />
              <Button style={{ marginTop: 12 }} onClick={() => downloadCsv(historyFileName(client), historyToCsv(rows))}>
                <DownloadIcon /> Descargar historial de {client}
              </Button>
            </>
          )}
        </>
      )}
    </section>
  );
}
