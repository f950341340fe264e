import type { FilterColumn, FilterRow, OddsTypeOption, ParamGrid, ParamRecord } from '../../domain/contracts';

export const ID_FIELD = 'id';

export const NO_ODDS_LABEL = 'No Odds';

/** Upper-cases the first letter of every run of letters, lower-cases the rest. */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_, prefix: string, letter: string) => `${prefix}${letter.toUpperCase()}`);
}

export function assignRowIds(params: ParamRecord[]): FilterRow[] {
  return params.map((param, index) => ({ ...param, [ID_FIELD]: index + 1 }));
}

export function deriveFilterColumns(params: ParamRecord[]): FilterColumn[] {
  const names: string[] = [];
  for (const param of params) {
    for (const name of Object.keys(param)) {
      if (name !== ID_FIELD && !names.includes(name)) {
        names.push(name);
      }
    }
  }

  return [
    { name: ID_FIELD, label: 'ID', field: ID_FIELD, required: true, sortable: false, hidden: true },
    ...names.map((name) => ({
      name,
      label: titleCase(name),
      field: name,
      required: false,
      sortable: true,
      hidden: false,
    })),
  ];
}

export function buildParamGrid(rows: FilterRow[]): ParamGrid {
  return rows.map((row) => {
    const entry: ParamGrid[number] = {};
    for (const [name, value] of Object.entries(row)) {
      if (name !== ID_FIELD) {
        entry[name] = [value];
      }
    }
    return entry;
  });
}

export function oddsTypeLabel(oddsType: string): string {
  return oddsType
    .split('_')
    .map((token) => titleCase(token))
    .join(' ');
}

export function buildOddsTypeOptions(oddsTypes: string[]): OddsTypeOption[] {
  return [
    ...oddsTypes.map((oddsType) => ({ value: oddsType, label: oddsTypeLabel(oddsType) })),
    { value: null, label: NO_ODDS_LABEL },
  ];
}
