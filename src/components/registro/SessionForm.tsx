import { useState, type FormEvent } from "react";
import { useStoreContext } from "@/context/StoreContext";
import { Button } from "@/components/ui/Button";
import Notice, { type NoticeState } from "@/components/Notice";
import { describeError } from "@/lib/errors";
import { formatMoney } from "@/utils/money";
import { toDateKey } from "@/utils/months";

const NEW_CLIENT = "(Escribir nombre nuevo)";
const DEFAULT_AMOUNT = 30000;

function nowTime(): string {
  const d = new Date();
  return `${String(d.getHours()).padStart(2, "0")}:${String(d.getMinutes()).padStart(2, "0")}`;
}

export default function SessionForm() {
  const { clients, addSession } = useStoreContext();
  const [selected, setSelected] = useState(NEW_CLIENT);
  const [newName, setNewName] = useState("");
  const [amount, setAmount] = useState(String(DEFAULT_AMOUNT));
  const [time, setTime] = useState(nowTime);
  const [date, setDate] = useState(() => toDateKey(new Date()));
  const [saving, setSaving] = useState(false);
  const [notice, setNotice] = useState<NoticeState | null>(null);

  const clientInput = selected === NEW_CLIENT ? newName : selected;

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    setSaving(true);
    try {
      const created = await addSession(clientInput, date, time, amount.trim() === "" ? Number.NaN : Number(amount));
      setNotice({
        tone: "success",
        text: `Clase guardada para ${created.client} el ${date} a las ${time} por ${formatMoney(created.amount)}.`,
      });
      setNewName("");
      setAmount(String(DEFAULT_AMOUNT));
    } catch (err) {
      setNotice({ tone: "error", text: describeError(err) });
    } finally {
      setSaving(false);
    }
  };

  return (
    <section className="card">
      <h2>Registrar una clase</h2>
      <Notice notice={notice} />
      <form onSubmit={(e) => void handleSubmit(e)}>
        <label className="field">
          Cliente
          <select value={selected} onChange={(e) => setSelected(e.target.value)}>
            {[NEW_CLIENT, ...clients].map((c) => (
              <option key={c} value={c}>
                {c}
              </option>
            ))}
          </select>
        </label>
        {selected === NEW_CLIENT && (
          <label className="field">
            Nombre del cliente*
            <input value={newName} placeholder="Ej: Juano Monroy" onChange={(e) => setNewName(e.target.value)} />
          </label>
        )}
        <div style={{ display: "flex", gap: 12 }}>
          <label className="field" style={{ flex: 1 }}>
            Valor de la clase*
            <input type="number" min={0} step={1000} value={amount} onChange={(e) => setAmount(e.target.value)} />
          </label>
          <label className="field" style={{ flex: 1 }}>
            Hora*
            <input type="time" value={time} onChange={(e) => setTime(e.target.value)} />
          </label>
        </div>
        <label className="field">
          Fecha*
          <input type="date" value={date} onChange={(e) => setDate(e.target.value)} />
        </label>
        <Button type="submit" variant="primary" loading={saving}>
          Guardar clase
        </Button>
      </form>
    </section>
  );
}
