/** Upper-cases the first letter of every run of letters: `home_win` → `Home_Win`. */
export const titleCase = (value: string): string =>
  value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());

export type TableKind = 'features' | 'targets' | 'odds';

/**
 * Display label for a data column. Feature columns title-case every token
 * (`home_team__rating` → `Home Team Rating`); target and odds columns drop
 * their leading tokens and put the rest in parentheses
 * (`odds__market_average__home_win__full_time_goals` → `Home Win (Full Time Goals)`).
 */
export const columnLabel = (column: string, kind: TableKind): string => {
  if (kind === 'features') {
    return column
      .split(/__?/)
      .filter((token) => token.length > 0)
      .map(titleCase)
      .join(' ');
  }

  const skip = kind === 'targets' ? 1 : 2;
  const tokens = column.split('__').slice(skip).map(titleCase);
  if (tokens.length === 0) {
    return titleCase(column).split('_').join(' ');
  }
  return `${tokens.join(' (')})`.split('_').join(' ');
};
