/**
 * Technical Signal Engine
 */

export * from './lib/indicators';
export * from './lib/strategies';
export * from './lib/selection';
export * from './lib/asset-classes';

export {
  AnalysisPhase,
  AnalysisStateMachine,
  InvalidTransitionError,
  isTerminalPhase,
  isValidTransition,
  statusOf,
  type AnalysisStatus,
  type PhaseTransition,
} from './lib/analysis-state-machine';
export {
  AssetClassOrchestrator,
  type AssetClassRunResult,
  type OrchestratorDependencies,
  type SkippedInstrument,
  type SkipReason,
} from './lib/asset-class-orchestrator';
export {
  PortfolioTechnicalManager,
  createPortfolioTechnicalManager,
  runBounded,
  type ComprehensiveReport,
  type ManagerDependencies,
  type ManagerOverrides,
  type RunOptions,
  type TradingSummary,
} from './lib/portfolio-technical-manager';

export {
  ConfigValidationError,
  defaultAnalysisConfig,
  loadAnalysisConfig,
  parseAnalysisConfig,
  type AnalysisConfig,
  type AssetClassSettings,
} from './lib/analysis-config';
export {
  AlpacaPriceSource,
  DataSourceUnavailableError,
  StaticPriceSource,
  type BarsClient,
  type PriceSource,
} from './lib/price-source';
export { CircuitBreaker, CircuitOpenError } from './lib/circuit-breaker';
export { TokenBucketRateLimiter, unlimitedRateLimiter, type RateLimiter } from './lib/rate-limiter';
export { withRetry, isTransientError } from './lib/retry';
export { FileReportSink, nullReportSink, type ReportSink } from './lib/report-writer';
export { FileUniverseSource, StaticUniverseSource, parseUniverse, type UniverseSource } from './lib/universe-loader';
export { formatSignalsCsv, toSignalRow, type SignalTableRow } from './lib/formatters';
export { createLogger, type Logger } from './lib/logger';
