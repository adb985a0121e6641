import { useCallback, useEffect, useMemo, useState } from "react";
import { useStoreContext } from "@/context/StoreContext";
import DataTable from "@/components/DataTable";
import Notice, { type NoticeState } from "@/components/Notice";
import { Button } from "@/components/ui/Button";
import { addAllowedEmail, listAllowedEmails, removeAllowedEmail } from "@/lib/auth/allowList";
import { describeError } from "@/lib/errors";
import { createSupabaseClient } from "@/lib/supabase";
import type { AllowedEmail } from "@/types";

const ALLOW_COLUMNS = ["email", "created_at", "created_by"] as const;

/** Allow-list editor; only rendered for the per-login backend. */
export default function AdminAccessPanel() {
  const { config, session, adminAccess } = useStoreContext();
  const isAdmin = adminAccess.kind === "admin";
  const client = useMemo(() => (session ? createSupabaseClient(config, session) : null), [config, session]);
  const [list, setList] = useState<AllowedEmail[]>([]);
  const [toAdd, setToAdd] = useState("");
  const [toRemove, setToRemove] = useState("");
  const [notice, setNotice] = useState<NoticeState | null>(null);

  const refresh = useCallback(async () => {
    if (!client || !isAdmin) return;
    try {
      setList(await listAllowedEmails(client));
    } catch (err) {
      setNotice({ tone: "error", text: `No se pudo cargar la lista: ${describeError(err)}` });
    }
  }, [client, isAdmin]);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  const handleAdd = async () => {
    if (!client) return;
    try {
      await addAllowedEmail(client, toAdd, session?.email ?? null);
      setToAdd("");
      setNotice({ tone: "success", text: "Correo agregado a la lista blanca." });
      await refresh();
    } catch (err) {
      setNotice({ tone: "error", text: `No se pudo agregar: ${describeError(err)}` });
    }
  };

  const handleRemove = async () => {
    if (!client) return;
    try {
      await removeAllowedEmail(client, toRemove);
      setToRemove("");
      setNotice({ tone: "success", text: "Correo eliminado de la lista." });
      await refresh();
    } catch (err) {
      setNotice({ tone: "error", text: `No se pudo eliminar: ${describeError(err)}` });
    }
  };

  return (
    <details className="card">
      <summary>Gestión de accesos (solo admin)</summary>
      {adminAccess.kind === "error" ? (
        <Notice notice={{ tone: "error", text: `No se pudo verificar el acceso de administrador: ${adminAccess.message}` }} />
      ) : !isAdmin ? (
        <p style={{ color: "var(--text-muted)" }}>Debes ser administrador para ver/editar esta sección.</p>
      ) : (
        <div style={{ marginTop: 12 }}>
          <div className="notice notice--info">Solo los correos de esta lista podrán iniciar sesión en la app.</div>
          <Notice notice={notice} />
          <div style={{ display: "flex", gap: 12, alignItems: "flex-end" }}>
            <label className="field" style={{ flex: 2 }}>
              Agregar correo a la lista
              <input type="email" placeholder="correo@ejemplo.com" value={toAdd} onChange={(e) => setToAdd(e.target.value)} />
            </label>
            <Button onClick={() => void handleAdd()} style={{ marginBottom: 12 }}>
              Agregar
            </Button>
          </div>
          {list.length === 0 ? (
            <p style={{ color: "var(--text-muted)" }}>No hay correos permitidos aún.</p>
          ) : (
            <>
              <DataTable
                columns={ALLOW_COLUMNS}
                rows={list.map((r) => ({ email: r.email, created_at: r.createdAt ?? "", created_by: r.createdBy ?? "" }))}
                rowKey={(r) => r.email}
              />
              <div style={{ display: "flex", gap: 12, alignItems: "flex-end", marginTop: 12 }}>
                <label className="field" style={{ flex: 2 }}>
                  Correo a borrar
                  <input type="email" placeholder="correo@ejemplo.com" value={toRemove} onChange={(e) => setToRemove(e.target.value)} />
                </label>
                <Button variant="danger" onClick={() => void handleRemove()} style={{ marginBottom: 12 }}>
                  Borrar
                </Button>
              </div>
            </>
          )}
        </div>
      )}
    </details>
  );
}
