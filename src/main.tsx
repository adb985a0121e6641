import React from "react";
import ReactDOM from "react-dom/client";
import { BrowserRouter } from "react-router-dom";
import { StoreProvider } from "./context/StoreContext";
import { readConfig, type AppConfig } from "./lib/config";
import { describeError } from "./lib/errors";
import App from "./App";
import "./index.css";

const root = document.getElementById("root");
if (!root) throw new Error("Missing #root element");

let config: AppConfig | null = null;
let configError: string | null = null;
try {
  config = readConfig(import.meta.env);
} catch (e) {
  console.error("[Entrenos] Invalid configuration:", e);
  configError = describeError(e);
}

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    {config ? (
      <StoreProvider config={config}>
        <BrowserRouter>
          <App />
        </BrowserRouter>
      </StoreProvider>
    ) : (
      <div className="loading-screen">Configuración inválida: {configError}</div>
    )}
  </React.StrictMode>
);
