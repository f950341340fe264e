import { STAGES } from '../../domain/contracts';
import type { PipelineField, PipelineState, Stage } from '../../domain/contracts';

export interface StageDefinition {
  stage: Stage;
  label: string;
  /** Fields cleared when this stage is invalidated. */
  owns: readonly PipelineField[];
  /** Holds when the cursor may rest on this stage. */
  canEnter(state: PipelineState): boolean;
}

const definitions: Record<Stage, StageDefinition> = {
  SportSelect: {
    stage: 'SportSelect',
    label: 'Sport',
    owns: ['availableParams', 'filterColumns'],
    canEnter: () => true,
  },
  FilterSelect: {
    stage: 'FilterSelect',
    label: 'Filter',
    owns: ['selectedParamRows', 'loader', 'availableOddsTypes'],
    canEnter: (state) =>
      state.selectedSport !== undefined &&
      state.availableParams !== undefined &&
      state.filterColumns !== undefined,
  },
  ExtractionConfig: {
    stage: 'ExtractionConfig',
    label: 'Extraction',
    owns: ['oddsType', 'dropNaThreshold'],
    canEnter: (state) =>
      state.loader !== undefined &&
      (state.selectedParamRows?.length ?? 0) > 0 &&
      state.availableOddsTypes !== undefined,
  },
  DataMaterialize: {
    stage: 'DataMaterialize',
    label: 'Data',
    owns: ['trainTables', 'fixtureTables'],
    canEnter: (state) =>
      state.oddsType !== undefined &&
      state.dropNaThreshold !== undefined &&
      state.trainTables !== undefined &&
      state.fixtureTables !== undefined,
  },
  Export: {
    stage: 'Export',
    label: 'Export',
    owns: [],
    canEnter: (state) =>
      state.loader !== undefined && state.trainTables !== undefined && state.fixtureTables !== undefined,
  },
};

export function getStageDefinition(stage: Stage): StageDefinition {
  return definitions[stage];
}

export function stageIndex(stage: Stage): number {
  return STAGES.indexOf(stage);
}

export function nextStage(stage: Stage): Stage | null {
  return STAGES[stageIndex(stage) + 1] ?? null;
}

/** The stage itself followed by every later stage, in ascending order. */
export function stagesFrom(stage: Stage): Stage[] {
  return STAGES.slice(stageIndex(stage));
}

export function isBefore(stage: Stage, other: Stage): boolean {
  return stageIndex(stage) < stageIndex(other);
}

export function fieldsOwnedFrom(stage: Stage): PipelineField[] {
  return stagesFrom(stage).flatMap((entry) => [...definitions[entry].owns]);
}

export const stageDefinitions: readonly StageDefinition[] = STAGES.map((stage) => definitions[stage]);
