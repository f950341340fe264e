import { useMemo, useState } from 'react';
import type { FilterColumn, FilterRow } from '../types/wizard';
import { searchFilterRows } from '../utils/paramSearch';
import DataTable, { type Column } from './DataTable';

interface FilterTableProps {
  rows: FilterRow[];
  columns: FilterColumn[];
  selectedIds: number[];
  disabled: boolean;
  onChange(selectedIds: number[]): void;
}

const FilterTable = ({ rows, columns, selectedIds, disabled, onChange }: FilterTableProps) => {
  const [query, setQuery] = useState('');
  const visibleRows = useMemo(() => searchFilterRows(rows, columns, query), [rows, columns, query]);
  const selected = useMemo(() => new Set(selectedIds), [selectedIds]);

  const tableColumns: Column<FilterRow>[] = columns
    .filter((column) => !column.hidden)
    .map((column) => ({ header: column.label, accessor: column.field }));

  const toggle = (row: FilterRow) => {
    onChange(selected.has(row.id) ? selectedIds.filter((id) => id !== row.id) : [...selectedIds, row.id]);
  };

  return (
    <div className="filter-table">
      <div className="filter-toolbar">
        <input
          type="search"
          className="pill-input"
          placeholder="Search leagues, divisions, years"
          value={query}
          onChange={(event) => setQuery(event.target.value)}
        />
        <span className="subtle">{selectedIds.length} selected</span>
        <button
          type="button"
          disabled={disabled || visibleRows.length === 0}
          onClick={() => onChange([...new Set([...selectedIds, ...visibleRows.map((row) => row.id)])])}
        >
          Select shown
        </button>
        <button type="button" disabled={disabled || selectedIds.length === 0} onClick={() => onChange([])}>
          Clear
        </button>
      </div>
      <DataTable
        columns={tableColumns}
        rows={visibleRows}
        rowKey={(row) => row.id}
        isSelected={(row) => selected.has(row.id)}
        onToggleRow={toggle}
        selectionDisabled={disabled}
        emptyMessage="No parameters match the search."
      />
    </div>
  );
};

export default FilterTable;
