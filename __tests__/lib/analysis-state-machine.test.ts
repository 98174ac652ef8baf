/**
 * Analysis State Machine Tests
 */

import {
  AnalysisPhase,
  AnalysisStateMachine,
  InvalidTransitionError,
  isTerminalPhase,
  isValidTransition,
  statusOf,
  type PhaseTransition,
} from '@/lib/analysis-state-machine';

describe('Analysis State Machine', () => {
  describe('Phase Helpers', () => {
    describe('isValidTransition', () => {
      it('should allow NotRun → DataLoaded', () => {
        expect(isValidTransition(AnalysisPhase.NOT_RUN, AnalysisPhase.DATA_LOADED)).toBe(true);
      });

      it('should allow DataLoaded → NoSignals (nothing usable)', () => {
        expect(isValidTransition(AnalysisPhase.DATA_LOADED, AnalysisPhase.NO_SIGNALS)).toBe(true);
      });

      it('should allow Selected → Success', () => {
        expect(isValidTransition(AnalysisPhase.SELECTED, AnalysisPhase.SUCCESS)).toBe(true);
      });

      it('should allow Error from every non-terminal phase', () => {
        for (const phase of [
          AnalysisPhase.NOT_RUN,
          AnalysisPhase.DATA_LOADED,
          AnalysisPhase.INDICATORS_COMPUTED,
          AnalysisPhase.SIGNALS_GENERATED,
          AnalysisPhase.SELECTED,
        ]) {
          expect(isValidTransition(phase, AnalysisPhase.ERROR)).toBe(true);
        }
      });

      it('should reject NotRun → Selected (skip phases)', () => {
        expect(isValidTransition(AnalysisPhase.NOT_RUN, AnalysisPhase.SELECTED)).toBe(false);
      });

      it('should reject Success → Error (terminal phase)', () => {
        expect(isValidTransition(AnalysisPhase.SUCCESS, AnalysisPhase.ERROR)).toBe(false);
      });
    });

    describe('isTerminalPhase', () => {
      it('should return true for the three outcomes', () => {
        expect(isTerminalPhase(AnalysisPhase.SUCCESS)).toBe(true);
        expect(isTerminalPhase(AnalysisPhase.NO_SIGNALS)).toBe(true);
        expect(isTerminalPhase(AnalysisPhase.ERROR)).toBe(true);
      });

      it('should return false for an intermediate phase', () => {
        expect(isTerminalPhase(AnalysisPhase.SIGNALS_GENERATED)).toBe(false);
      });
    });

    describe('statusOf', () => {
      it('should report intermediate phases as NotRun', () => {
        expect(statusOf(AnalysisPhase.INDICATORS_COMPUTED)).toBe('NotRun');
      });

      it('should map terminal phases to their status', () => {
        expect(statusOf(AnalysisPhase.SUCCESS)).toBe('Success');
        expect(statusOf(AnalysisPhase.NO_SIGNALS)).toBe('NoSignals');
        expect(statusOf(AnalysisPhase.ERROR)).toBe('Error');
      });
    });
  });

  describe('AnalysisStateMachine', () => {
    const fixed = new Date('2024-03-01T21:00:00.000Z');
    let machine: AnalysisStateMachine;
    let seen: PhaseTransition[];

    beforeEach(() => {
      seen = [];
      machine = new AnalysisStateMachine(t => seen.push(t), () => fixed);
    });

    it('should start in NotRun', () => {
      expect(machine.getPhase()).toBe(AnalysisPhase.NOT_RUN);
      expect(machine.getStatus()).toBe('NotRun');
      expect(machine.getTransitions()).toEqual([]);
    });

    it('should record the full happy path', () => {
      machine.transition(AnalysisPhase.DATA_LOADED, '12 instruments');
      machine.transition(AnalysisPhase.INDICATORS_COMPUTED);
      machine.transition(AnalysisPhase.SIGNALS_GENERATED);
      machine.transition(AnalysisPhase.SELECTED);
      machine.transition(AnalysisPhase.SUCCESS);

      expect(machine.getStatus()).toBe('Success');
      expect(machine.getTransitions().map(t => t.to)).toEqual([
        AnalysisPhase.DATA_LOADED,
        AnalysisPhase.INDICATORS_COMPUTED,
        AnalysisPhase.SIGNALS_GENERATED,
        AnalysisPhase.SELECTED,
        AnalysisPhase.SUCCESS,
      ]);
      expect(machine.getTransitions()[0]).toEqual({
        from: AnalysisPhase.NOT_RUN,
        to: AnalysisPhase.DATA_LOADED,
        timestamp: fixed,
        details: '12 instruments',
      });
    });

    it('should notify the callback on each transition', () => {
      machine.transition(AnalysisPhase.DATA_LOADED);
      machine.transition(AnalysisPhase.NO_SIGNALS);

      expect(seen.map(t => `${t.from}→${t.to}`)).toEqual([
        'NotRun→DataLoaded',
        'DataLoaded→NoSignals',
      ]);
    });

    it('should throw InvalidTransitionError and keep the phase', () => {
      expect(() => machine.transition(AnalysisPhase.SUCCESS)).toThrow(InvalidTransitionError);
      expect(() => machine.transition(AnalysisPhase.SUCCESS)).toThrow(
        'Invalid analysis transition: NotRun → Success'
      );
      expect(machine.getPhase()).toBe(AnalysisPhase.NOT_RUN);
      expect(seen).toEqual([]);
    });

    it('should not leave a terminal phase', () => {
      machine.transition(AnalysisPhase.ERROR);
      expect(() => machine.transition(AnalysisPhase.DATA_LOADED)).toThrow(InvalidTransitionError);
    });

    it('should discard history on reset', () => {
      machine.transition(AnalysisPhase.DATA_LOADED);
      machine.transition(AnalysisPhase.ERROR);
      machine.reset();

      expect(machine.getPhase()).toBe(AnalysisPhase.NOT_RUN);
      expect(machine.getTransitions()).toEqual([]);
      expect(() => machine.transition(AnalysisPhase.DATA_LOADED)).not.toThrow();
    });
  });
});
