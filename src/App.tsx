import { Routes, Route, Navigate } from "react-router-dom";
import { useStoreContext } from "./context/StoreContext";
import Layout from "./components/Layout";
import Login from "./pages/Login";
import Registro from "./pages/Registro";
import Calendar from "./pages/Calendar";

function AuthGate() {
  const { signedIn, loaded } = useStoreContext();
  if (!signedIn) return <Navigate to="/login" replace />;
  if (!loaded) return <div className="loading-screen">Cargando…</div>;
  return <Layout />;
}

export default function App() {
  const { config, signedIn } = useStoreContext();
  return (
    <Routes>
      <Route
        path="/login"
        element={config.requiresLogin && !signedIn ? <Login /> : <Navigate to="/" replace />}
      />
      <Route path="/" element={<AuthGate />}>
        <Route index element={<Registro />} />
        <Route path="calendario" element={<Calendar />} />
      </Route>
      <Route path="*" element={<Navigate to="/" replace />} />
    </Routes>
  );
}
