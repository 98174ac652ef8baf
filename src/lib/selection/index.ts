export {
  fuseCandidates,
  fuseAll,
  compareCandidates,
  compareText,
  strategyPriority,
  FAMILY_PRIORITY,
  type FusionPriorityTable,
} from './fusion';
export {
  selectSignals,
  rankSignals,
  forcedEntryConfidence,
  type InstrumentReference,
  type SelectionInput,
  type SelectionResult,
} from './selection-policy';
