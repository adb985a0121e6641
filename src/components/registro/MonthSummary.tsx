import { useStoreContext } from "@/context/StoreContext";
import DataTable from "@/components/DataTable";
import { ROLLUP_COLUMNS, toRollupTable } from "@/lib/aggregation/tables";
import { formatMoney } from "@/utils/money";

export default function MonthSummary() {
  const { rollup } = useStoreContext();

  return (
    <section className="card">
      <h2>Resumen por persona (mes seleccionado)</h2>
      {!rollup || rollup.rows.length === 0 ? (
        <div className="notice notice--info">No hay datos para resumir en este mes.</div>
      ) : (
        <>
          <p>
            <strong>Total de clases del mes:</strong> {rollup.totalClasses} | <strong>Total a cobrar:</strong>{" "}
            {formatMoney(rollup.totalAmount)}
          </p>
          <DataTable columns={ROLLUP_COLUMNS} rows={toRollupTable(rollup.rows)} rowKey={(r) => r.Cliente} />
        </>
      )}
    </section>
  );
}
