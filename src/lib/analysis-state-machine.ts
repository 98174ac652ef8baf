/**
 * Analysis State Machine
 *
 * Lifecycle of one asset-class analysis pass.
 *
 * Phases:
 *   NotRun → DataLoaded → IndicatorsComputed → SignalsGenerated → Selected → [Success|NoSignals]
 *   DataLoaded → NoSignals when no history is usable
 *   any non-terminal phase → Error
 *
 * Transitions are explicit and validated.
 */

// ============================================
// TYPES
// ============================================

export enum AnalysisPhase {
  NOT_RUN = 'NotRun',
  DATA_LOADED = 'DataLoaded',
  INDICATORS_COMPUTED = 'IndicatorsComputed',
  SIGNALS_GENERATED = 'SignalsGenerated',
  SELECTED = 'Selected',
  SUCCESS = 'Success',           // terminal
  NO_SIGNALS = 'NoSignals',      // terminal
  ERROR = 'Error',               // terminal
}

export type AnalysisStatus = 'NotRun' | 'Success' | 'NoSignals' | 'Error';

export interface PhaseTransition {
  from: AnalysisPhase;
  to: AnalysisPhase;
  timestamp: Date;
  details?: string;
}

export class InvalidTransitionError extends Error {
  readonly from: AnalysisPhase;
  readonly to: AnalysisPhase;

  constructor(from: AnalysisPhase, to: AnalysisPhase) {
    super(`Invalid analysis transition: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

// ============================================
// STATE MACHINE
// ============================================

const VALID_TRANSITIONS: Record<AnalysisPhase, AnalysisPhase[]> = {
  [AnalysisPhase.NOT_RUN]: [AnalysisPhase.DATA_LOADED, AnalysisPhase.ERROR],
  [AnalysisPhase.DATA_LOADED]: [AnalysisPhase.INDICATORS_COMPUTED, AnalysisPhase.NO_SIGNALS, AnalysisPhase.ERROR],
  [AnalysisPhase.INDICATORS_COMPUTED]: [AnalysisPhase.SIGNALS_GENERATED, AnalysisPhase.ERROR],
  [AnalysisPhase.SIGNALS_GENERATED]: [AnalysisPhase.SELECTED, AnalysisPhase.ERROR],
  [AnalysisPhase.SELECTED]: [AnalysisPhase.SUCCESS, AnalysisPhase.NO_SIGNALS, AnalysisPhase.ERROR],
  [AnalysisPhase.SUCCESS]: [],
  [AnalysisPhase.NO_SIGNALS]: [],
  [AnalysisPhase.ERROR]: [],
};

export const TERMINAL_PHASES: AnalysisPhase[] = [
  AnalysisPhase.SUCCESS,
  AnalysisPhase.NO_SIGNALS,
  AnalysisPhase.ERROR,
];

export function isValidTransition(from: AnalysisPhase, to: AnalysisPhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalPhase(phase: AnalysisPhase): boolean {
  return TERMINAL_PHASES.includes(phase);
}

/**
 * Externally visible status. Intermediate phases report NotRun until the
 * pass finishes.
 */
export function statusOf(phase: AnalysisPhase): AnalysisStatus {
  switch (phase) {
    case AnalysisPhase.SUCCESS:
      return 'Success';
    case AnalysisPhase.NO_SIGNALS:
      return 'NoSignals';
    case AnalysisPhase.ERROR:
      return 'Error';
    default:
      return 'NotRun';
  }
}

export type PhaseChangeCallback = (transition: PhaseTransition) => void;

export class AnalysisStateMachine {
  private phase: AnalysisPhase = AnalysisPhase.NOT_RUN;
  private transitions: PhaseTransition[] = [];

  constructor(
    private readonly onPhaseChange?: PhaseChangeCallback,
    private readonly now: () => Date = () => new Date()
  ) {}

  getPhase(): AnalysisPhase {
    return this.phase;
  }

  getStatus(): AnalysisStatus {
    return statusOf(this.phase);
  }

  getTransitions(): readonly PhaseTransition[] {
    return this.transitions;
  }

  /**
   * Move to `to`, throwing InvalidTransitionError if the move is not allowed
   */
  transition(to: AnalysisPhase, details?: string): PhaseTransition {
    if (!isValidTransition(this.phase, to)) {
      throw new InvalidTransitionError(this.phase, to);
    }

    const transition: PhaseTransition = {
      from: this.phase,
      to,
      timestamp: this.now(),
      details,
    };

    this.phase = to;
    this.transitions.push(transition);
    this.onPhaseChange?.(transition);
    return transition;
  }

  /**
   * Start a new pass. History from the previous pass is discarded.
   */
  reset(): void {
    this.phase = AnalysisPhase.NOT_RUN;
    this.transitions = [];
  }
}
