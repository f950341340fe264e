import type { Stage } from '../types/wizard';
import type { StepView } from '../utils/stepper';

const statusClass = (status: StepView['status']) => {
  switch (status) {
    case 'complete':
      return 'step-pill complete';
    case 'running':
      return 'step-pill running';
    case 'current':
      return 'step-pill current';
    default:
      return 'step-pill';
  }
};

interface WizardStepperProps {
  steps: StepView[];
  onRewind?: (stage: Stage) => void;
}

const WizardStepper = ({ steps, onRewind }: WizardStepperProps) => {
  return (
    <ol className="wizard-stepper">
      {steps.map((step, index) => (
        <li key={step.key}>
          <button
            type="button"
            className={statusClass(step.status)}
            disabled={step.status !== 'complete' || !onRewind}
            onClick={() => onRewind?.(step.key)}
          >
            <span className="step-index">{index + 1}</span>
            <span>{step.label}</span>
          </button>
        </li>
      ))}
    </ol>
  );
};

export default WizardStepper;
