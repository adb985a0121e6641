import { useMemo, useState, type FormEvent } from "react";
import { useNavigate } from "react-router-dom";
import { useStoreContext } from "@/context/StoreContext";
import { Button } from "@/components/ui/Button";
import Notice, { type NoticeState } from "@/components/Notice";
import { requestLoginCode, verifyLoginCode } from "@/lib/auth/otpAuth";
import { describeError } from "@/lib/errors";
import { createSupabaseClient } from "@/lib/supabase";

/** Email one-time code login: allow-list check, code sent, code verified. */
export default function Login() {
  const { config, login } = useStoreContext();
  const navigate = useNavigate();
  const client = useMemo(() => createSupabaseClient(config), [config]);
  const [email, setEmail] = useState("");
  const [pendingEmail, setPendingEmail] = useState<string | null>(null);
  const [code, setCode] = useState("");
  const [busy, setBusy] = useState(false);
  const [notice, setNotice] = useState<NoticeState | null>(null);

  const handleSend = async (e: FormEvent) => {
    e.preventDefault();
    setBusy(true);
    try {
      const { allowed } = await requestLoginCode(client, email);
      if (!allowed) {
        setNotice({ tone: "error", text: "Este correo no está autorizado. Pídele acceso al administrador." });
        return;
      }
      setPendingEmail(email.trim());
      setNotice({ tone: "success", text: "Te enviamos un código. Revisa tu correo (principal/SPAM)." });
    } catch (err) {
      setNotice({ tone: "error", text: `No se pudo enviar el código: ${describeError(err)}` });
    } finally {
      setBusy(false);
    }
  };

  const handleVerify = async (e: FormEvent) => {
    e.preventDefault();
    if (!pendingEmail) return;
    setBusy(true);
    try {
      login(await verifyLoginCode(client, pendingEmail, code));
      navigate("/", { replace: true });
    } catch (err) {
      setNotice({ tone: "error", text: describeError(err) });
    } finally {
      setBusy(false);
    }
  };

  return (
    <div style={{ minHeight: "100dvh", display: "flex", flexDirection: "column", justifyContent: "center", padding: 24 }}>
      <div style={{ maxWidth: 400, width: "100%", margin: "0 auto" }}>
        <h1 style={{ fontSize: 28, fontWeight: 700, marginBottom: 24 }}>Inicia sesión</h1>
        <Notice notice={notice} />
        <form onSubmit={(e) => void handleSend(e)}>
          <label className="field">
            Correo
            <input type="email" placeholder="tu-correo@ejemplo.com" value={email} onChange={(e) => setEmail(e.target.value)} />
          </label>
          <Button type="submit" variant="primary" fullWidth loading={busy && !pendingEmail}>
            Enviar código al correo
          </Button>
        </form>
        {pendingEmail && (
          <form onSubmit={(e) => void handleVerify(e)} style={{ marginTop: 24 }}>
            <label className="field">
              Código recibido (6 dígitos)
              <input inputMode="numeric" maxLength={10} value={code} onChange={(e) => setCode(e.target.value)} />
            </label>
            <Button type="submit" variant="primary" fullWidth loading={busy}>
              Verificar código
            </Button>
          </form>
        )}
      </div>
    </div>
  );
}
