export const STAGES = ['SportSelect', 'FilterSelect', 'ExtractionConfig', 'DataMaterialize', 'Export'] as const;

export type Stage = (typeof STAGES)[number];

export const SPORTS = ['Soccer', 'NBA', 'NFL', 'NHL'] as const;

export type Sport = (typeof SPORTS)[number];

export const SUPPORTED_SPORTS: readonly Sport[] = ['Soccer'];

export type Scalar = string | number | boolean | null;

export type ParamRecord = Record<string, Scalar>;

export type FilterRow = ParamRecord & { id: number };

export interface FilterColumn {
  name: string;
  label: string;
  field: string;
  required: boolean;
  sortable: boolean;
  hidden: boolean;
}

export type ParamGrid = Array<Record<string, Scalar[]>>;

export interface LoaderHandle {
  sport: Sport;
  paramGrid: ParamGrid;
}

export interface DataTable {
  columns: string[];
  rows: Record<string, Scalar>[];
}

export interface TableSet {
  features: DataTable;
  targets: DataTable | null;
  odds: DataTable | null;
}

export interface LoaderArchive {
  fileName: string;
  contentType: string;
  data: Uint8Array;
}

export interface OddsTypeOption {
  value: string | null;
  label: string;
}

export interface PipelineState {
  selectedSport?: Sport;
  availableParams?: FilterRow[];
  filterColumns?: FilterColumn[];
  selectedParamRows?: FilterRow[];
  loader?: LoaderHandle;
  availableOddsTypes?: string[];
  oddsType?: string | null;
  dropNaThreshold?: number;
  trainTables?: TableSet;
  fixtureTables?: TableSet;
}

export type PipelineField = keyof PipelineState;

/**
 * The data-loading collaborator. Every call may be slow; the wizard only ever
 * reaches it through the fetch coordinator.
 */
export interface DataLoaderService {
  getAllParams(sport: Sport): Promise<ParamRecord[]>;
  getOddsTypes(loader: LoaderHandle): Promise<string[]>;
  extractTrainData(loader: LoaderHandle, oddsType: string | null, dropNaThreshold: number): Promise<TableSet>;
  extractFixturesData(loader: LoaderHandle): Promise<TableSet>;
  serializeLoader(loader: LoaderHandle): Promise<LoaderArchive>;
}

export type ControlId = 'sport' | 'filter' | 'extraction' | 'advance' | 'export' | 'cancel';

export interface ControlState {
  visible: boolean;
  enabled: boolean;
}

export type ControlStates = Record<ControlId, ControlState>;

export interface WizardSnapshot {
  cursor: Stage;
  exported: number;
  pendingStage: Stage | null;
  state: PipelineState;
  controls: ControlStates;
  oddsTypeOptions: OddsTypeOption[];
}

export interface WizardNotice {
  code: string;
  message: string;
}

export type FieldEvents = { [K in PipelineField as `field:${K}`]: PipelineState[K] | undefined };

export type ControlEvents = { [K in ControlId as `control:${K}`]: ControlState };

export type WizardEvents = FieldEvents &
  ControlEvents & {
    'stage:invalidated': Stage;
    'fetch:pending': Stage;
    'fetch:settled': Stage;
    cursor: Stage;
    notice: WizardNotice;
  };

export type WizardTopic = keyof WizardEvents;

export interface WizardEvent<K extends WizardTopic = WizardTopic> {
  topic: K;
  payload: WizardEvents[K];
}

export interface WizardSettings {
  loaderServiceUrl: string | null;
  defaultDropNaThreshold: number;
  maxPreviewRows: number;
}
