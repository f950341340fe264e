import { STAGES, type Stage } from '../types/wizard';

export type StepStatus = 'complete' | 'running' | 'current' | 'pending';

export interface StepView {
  key: Stage;
  label: string;
  status: StepStatus;
}

export const STAGE_LABELS: Record<Stage, string> = {
  SportSelect: 'Sport',
  FilterSelect: 'Filter',
  ExtractionConfig: 'Extraction',
  DataMaterialize: 'Data',
  Export: 'Export',
};

/** Stages before the cursor are complete; the cursor shows as running while its fetch is pending. */
export const buildSteps = (cursor: Stage, pendingStage: Stage | null): StepView[] => {
  const cursorIndex = STAGES.indexOf(cursor);
  return STAGES.map((stage, index) => {
    let status: StepStatus = 'pending';
    if (index < cursorIndex) {
      status = 'complete';
    } else if (index === cursorIndex) {
      status = pendingStage === stage ? 'running' : 'current';
    }
    return { key: stage, label: STAGE_LABELS[stage], status };
  });
};
