import { useStoreContext } from "@/context/StoreContext";
import SessionForm from "@/components/registro/SessionForm";
import MonthSessions from "@/components/registro/MonthSessions";
import MonthSummary from "@/components/registro/MonthSummary";
import PaymentForm from "@/components/registro/PaymentForm";
import ClientHistory from "@/components/registro/ClientHistory";
import AdminAccessPanel from "@/components/registro/AdminAccessPanel";

export default function Registro() {
  const { config } = useStoreContext();
  return (
    <>
      {config.requiresLogin && <AdminAccessPanel />}
      <SessionForm />
      <MonthSessions />
      <MonthSummary />
      <PaymentForm />
      <ClientHistory />
    </>
  );
}
