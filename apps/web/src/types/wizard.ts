export const STAGES = ['SportSelect', 'FilterSelect', 'ExtractionConfig', 'DataMaterialize', 'Export'] as const;

export type Stage = (typeof STAGES)[number];

export const SPORT_OPTIONS = ['Soccer', 'NBA', 'NFL', 'NHL'] as const;

export type Scalar = string | number | boolean | null;

export type FilterRow = Record<string, Scalar> & { id: number };

export interface FilterColumn {
  name: string;
  label: string;
  field: string;
  required: boolean;
  sortable: boolean;
  hidden: boolean;
}

export interface TablePreview {
  columns: string[];
  rows: Array<Record<string, Scalar>>;
  totalRows: number;
}

export interface TableSetPreview {
  features: TablePreview;
  targets: TablePreview | null;
  odds: TablePreview | null;
}

export interface ControlState {
  visible: boolean;
  enabled: boolean;
}

export type ControlId = 'sport' | 'filter' | 'extraction' | 'advance' | 'export' | 'cancel';

export interface OddsTypeOption {
  value: string | null;
  label: string;
}

export interface WizardState {
  selectedSport?: string;
  availableParams?: FilterRow[];
  filterColumns?: FilterColumn[];
  selectedParamRows?: FilterRow[];
  availableOddsTypes?: string[];
  oddsType?: string | null;
  dropNaThreshold?: number;
  trainTables?: TableSetPreview;
  fixtureTables?: TableSetPreview;
}

export interface WizardSessionView {
  sessionId: string;
  cursor: Stage;
  exported: number;
  pendingStage: Stage | null;
  state: WizardState;
  controls: Record<ControlId, ControlState>;
  oddsTypeOptions: OddsTypeOption[];
}

export interface WizardNotice {
  code: string;
  message: string;
}
