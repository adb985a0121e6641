export interface DataTableProps<Row, Col extends keyof Row> {
  columns: readonly Col[];
  rows: Row[];
  rowKey: (row: Row, index: number) => string | number;
}

/** Plain table over typed rows; columns are the row keys shown as headers. */
export default function DataTable<Row, Col extends keyof Row & string>({ columns, rows, rowKey }: DataTableProps<Row, Col>) {
  return (
    <div style={{ overflowX: "auto" }}>
      <table className="data-table">
        <thead>
          <tr>
            {columns.map((c) => (
              <th key={c}>{c}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, i) => (
            <tr key={rowKey(row, i)}>
              {columns.map((c) => (
                <td key={c}>{String(row[c])}</td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
