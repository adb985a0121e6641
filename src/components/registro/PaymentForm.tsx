import { useEffect, useState } from "react";
import { useStoreContext } from "@/context/StoreContext";
import { Button } from "@/components/ui/Button";
import MonthFilter from "@/components/MonthFilter";
import Notice, { type NoticeState } from "@/components/Notice";
import { clientMonthTotal, paymentLabel } from "@/lib/aggregation/rollup";
import { describeError } from "@/lib/errors";
import { formatMoney } from "@/utils/money";
import { monthLabel, toDateKey } from "@/utils/months";
import type { Period } from "@/store/useStore";

/** Mark one client's month as paid or pending, showing what that month adds up to. */
export default function PaymentForm() {
  const { clients, period, rollup, getPayment, setPayment, monthSessions } = useStoreContext();
  const [client, setClient] = useState("");
  const [target, setTarget] = useState<Period>(period);
  const [total, setTotal] = useState(0);
  const [paid, setPaid] = useState(false);
  const [paidOn, setPaidOn] = useState(() => toDateKey(new Date()));
  const [notice, setNotice] = useState<NoticeState | null>(null);

  useEffect(() => {
    setTarget(period);
  }, [period]);

  useEffect(() => {
    if (!client || !clients.includes(client)) setClient(clients[0] ?? "");
  }, [clients, client]);

  useEffect(() => {
    if (!client) return;
    let cancelled = false;
    void (async () => {
      try {
        const [sessions, status] = await Promise.all([monthSessions(target.year, target.month), getPayment(client, target.year, target.month)]);
        if (cancelled) return;
        setTotal(clientMonthTotal(sessions, client));
        setPaid(status.paid);
        setPaidOn(status.paidOn ?? toDateKey(new Date()));
      } catch (err) {
        if (!cancelled) setNotice({ tone: "error", text: describeError(err) });
      }
    })();
    return () => {
      cancelled = true;
    };
    // rollup changes after every write
  }, [client, target, rollup, monthSessions, getPayment]);

  const handleSave = async () => {
    try {
      await setPayment(client, target.year, target.month, paid, paid ? paidOn : null);
      setNotice({
        tone: "success",
        text: `Estado del mes para ${client} (${monthLabel(target.year, target.month)}) actualizado a: ${paymentLabel(paid)}.`,
      });
    } catch (err) {
      setNotice({ tone: "error", text: describeError(err) });
    }
  };

  return (
    <section className="card">
      <h2>Actualizar estado de pago mensual</h2>
      <Notice notice={notice} />
      {clients.length === 0 ? (
        <div className="notice notice--info">Aún no hay clientes registrados.</div>
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
          <MonthFilter value={target} onChange={setTarget} yearLabel="Año del pago" monthLabel="Mes del pago" />
          <p>
            <strong>
              Total de {client} en {monthLabel(target.year, target.month)}: {formatMoney(total)}
            </strong>
          </p>
          <label style={{ display: "flex", gap: 8, alignItems: "center", marginBottom: 12 }}>
            <input type="checkbox" checked={paid} onChange={(e) => setPaid(e.target.checked)} />
            Marcar este mes como pagado
          </label>
          <label className="field">
            Fecha de pago (exacta)
            <input type="date" value={paidOn} disabled={!paid} onChange={(e) => setPaidOn(e.target.value)} />
          </label>
          <Button variant="primary" onClick={() => void handleSave()}>
            Guardar estado de pago mensual
          </Button>
        </>
      )}
    </section>
  );
}
