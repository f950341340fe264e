import type { ReactNode } from 'react';

export interface Column<T> {
  header: string;
  accessor: keyof T | ((row: T) => ReactNode);
  width?: string;
}

interface DataTableProps<T> {
  columns: Column<T>[];
  rows: T[];
  emptyMessage?: string;
  title?: string;
  caption?: string;
  rowKey?: (row: T, index: number) => string | number;
  isSelected?: (row: T) => boolean;
  onToggleRow?: (row: T) => void;
  selectionDisabled?: boolean;
}

const renderValue = (value: unknown): ReactNode => {
  if (value === null || value === undefined) {
    return '—';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  return JSON.stringify(value);
};

const getValue = <T,>(row: T, accessor: Column<T>['accessor']): ReactNode => {
  if (typeof accessor === 'function') {
    return accessor(row);
  }

  return renderValue(row[accessor]);
};

function DataTable<T>({
  columns,
  rows,
  emptyMessage = 'No data yet.',
  title,
  caption,
  rowKey,
  isSelected,
  onToggleRow,
  selectionDisabled,
}: DataTableProps<T>) {
  const selectable = Boolean(isSelected && onToggleRow);

  return (
    <div className="table-wrapper">
      {title && <h4 className="table-title">{title}</h4>}
      {rows.length === 0 ? (
        <p className="table-empty">{emptyMessage}</p>
      ) : (
        <table>
          {caption && <caption>{caption}</caption>}
          <thead>
            <tr>
              {selectable && <th style={{ width: '2.5rem' }} />}
              {columns.map((column) => (
                <th key={column.header} style={{ width: column.width }}>
                  {column.header}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rows.map((row, index) => (
              <tr key={rowKey ? rowKey(row, index) : index} className={isSelected?.(row) ? 'selected' : undefined}>
                {selectable && (
                  <td>
                    <input
                      type="checkbox"
                      checked={isSelected?.(row) ?? false}
                      disabled={selectionDisabled}
                      onChange={() => onToggleRow?.(row)}
                    />
                  </td>
                )}
                {columns.map((column) => (
                  <td key={column.header}>{getValue(row, column.accessor)}</td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
}

export default DataTable;
