import Fuse from 'fuse.js';
import type { FilterColumn, FilterRow } from '../types/wizard';

interface SearchableRow {
  row: FilterRow;
  text: string;
}

const describeRow = (row: FilterRow, columns: FilterColumn[]): string =>
  columns
    .filter((column) => !column.hidden)
    .map((column) => row[column.field])
    .filter((value) => value !== null && value !== undefined)
    .map(String)
    .join(' ');

/**
 * Narrows the filter table to rows loosely matching `query`. An empty query
 * keeps every row in its original order.
 */
export const searchFilterRows = (rows: FilterRow[], columns: FilterColumn[], query: string): FilterRow[] => {
  const trimmed = query.trim();
  if (!trimmed) {
    return rows;
  }

  const fuse = new Fuse<SearchableRow>(
    rows.map((row) => ({ row, text: describeRow(row, columns) })),
    {
      keys: ['text'],
      threshold: 0.3,
      ignoreLocation: true,
    },
  );

  const matchedIds = new Set(fuse.search(trimmed).map((result) => result.item.row.id));
  return rows.filter((row) => matchedIds.has(row.id));
};
