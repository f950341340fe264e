import type { Scalar, TablePreview, TableSetPreview } from '../types/wizard';
import { columnLabel, type TableKind } from '../utils/columnLabels';
import DataTable, { type Column } from './DataTable';

type Row = Record<string, Scalar>;

const toColumns = (table: TablePreview, kind: TableKind): Column<Row>[] =>
  table.columns.map((column) => ({
    header: columnLabel(column, kind),
    accessor: (row: Row) => {
      const value = row[column];
      return value === null || value === undefined ? '—' : String(value);
    },
  }));

const caption = (table: TablePreview) =>
  table.rows.length < table.totalRows ? `Showing ${table.rows.length} of ${table.totalRows} rows` : undefined;

interface TablePartProps {
  title: string;
  kind: TableKind;
  table: TablePreview | null;
  emptyMessage: string;
}

const TablePart = ({ title, kind, table, emptyMessage }: TablePartProps) => (
  <article>
    <DataTable
      title={title}
      columns={table ? toColumns(table, kind) : []}
      rows={table?.rows ?? []}
      caption={table ? caption(table) : undefined}
      emptyMessage={emptyMessage}
    />
  </article>
);

interface TableSetPanelProps {
  heading: string;
  tables: TableSetPreview;
}

const TableSetPanel = ({ heading, tables }: TableSetPanelProps) => (
  <section className="table-set">
    <h3>{heading}</h3>
    <div className="grid three-column">
      <TablePart title="Input" kind="features" table={tables.features} emptyMessage="No rows matched the filter." />
      <TablePart title="Output" kind="targets" table={tables.targets} emptyMessage="Outputs are unknown for fixtures." />
      <TablePart title="Odds" kind="odds" table={tables.odds} emptyMessage="Extracted without odds." />
    </div>
  </section>
);

export default TableSetPanel;
