import { Outlet, useLocation } from "react-router-dom";
import { useStoreContext } from "@/context/StoreContext";
import MonthFilter from "@/components/MonthFilter";
import Notice from "@/components/Notice";
import { Button, LinkButton } from "@/components/ui/Button";

const tabs = [
  { to: "/", label: "📋 Registro & Resumen" },
  { to: "/calendario", label: "📆 Calendario" },
];

export function isTabActive(to: string, pathname: string): boolean {
  return to === "/" ? pathname === "/" : pathname === to || pathname.startsWith(`${to}/`);
}

export function SectionTabs() {
  const { pathname } = useLocation();
  return (
    <nav style={{ display: "flex", gap: 8, marginBottom: 16 }} aria-label="Secciones">
      {tabs.map(({ to, label }) => (
        <LinkButton key={to} to={to} variant="tab" active={isTabActive(to, pathname)}>
          {label}
        </LinkButton>
      ))}
    </nav>
  );
}

const BACKEND_CAPTION = {
  "supabase-auth": "Persistencia en Supabase.",
  supabase: "Persistencia en Supabase.",
  local: "Persistencia local en este navegador.",
} as const;

export default function Layout() {
  const { config, session, period, setPeriod, loadError, logout } = useStoreContext();

  return (
    <div className="app-layout" style={{ maxWidth: 1100, margin: "0 auto", padding: "20px 16px 40px" }}>
      <header style={{ marginBottom: 16 }}>
        <h1 style={{ margin: "0 0 4px" }}>💪 Registro de Entrenos para Cobro</h1>
        <p style={{ margin: 0, color: "var(--text-muted)" }}>
          Registra clases y lleva el pago por <strong>mes</strong> y por <strong>persona</strong>. {BACKEND_CAPTION[config.backend]}
        </p>
      </header>

      {config.requiresLogin && session && (
        <div className="card" style={{ display: "flex", justifyContent: "space-between", alignItems: "center" }}>
          <span>Sesión: {session.email}</span>
          <Button size="sm" onClick={() => void logout()}>
            Cerrar sesión
          </Button>
        </div>
      )}

      <div className="card">
        <MonthFilter value={period} onChange={setPeriod} />
      </div>

      <SectionTabs />

      <Notice notice={loadError ? { tone: "error", text: loadError } : null} />
      <main className="app-shell">
        <Outlet />
      </main>
    </div>
  );
}
