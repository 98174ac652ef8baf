/**
 * Asset-Class Orchestrator
 *
 * Runs one analysis pass for one asset class: load the universe, fetch
 * history, compute indicators, run the strategy module, select, and hand the
 * result to the report sink. Failures end in the Error phase and are never
 * thrown to the caller.
 */

import { randomUUID } from 'node:crypto';
import { AnalysisPhase, AnalysisStateMachine, type AnalysisStatus, type PhaseTransition } from './analysis-state-machine';
import type { AssetClassStrategyModule } from './asset-classes/asset-class-module';
import { CircuitOpenError } from './circuit-breaker';
import { computeIndicatorSet, sanitizeBars, snapshotIndicators } from './indicators/indicator-set';
import type { IndicatorSet, PriceBar } from './indicators/types';
import { createLogger, serializeError, type Logger } from './logger';
import { DataSourceUnavailableError, type PriceSource } from './price-source';
import { unlimitedRateLimiter, type RateLimiter } from './rate-limiter';
import { nullReportSink, type ReportSink } from './report-writer';
import { selectSignals, type InstrumentReference, type SelectionResult } from './selection/selection-policy';
import type { AssetClass, Signal, WatchSignal } from './strategies/types';
import type { UniverseSource } from './universe-loader';

export type SkipReason = 'fetch_failed' | 'insufficient_history';

export interface SkippedInstrument {
  instrument: string;
  reason: SkipReason;
  detail: string;
}

export interface AssetClassRunResult {
  runId: string;
  assetClass: AssetClass;
  status: AnalysisStatus;
  phase: AnalysisPhase;
  signals: Signal[];
  /** WATCH survivors outside the trade list */
  watchlist: WatchSignal[];
  selection: SelectionResult | null;
  universe: string[];
  skipped: SkippedInstrument[];
  reportPath: string | null;
  error?: string;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export interface OrchestratorDependencies {
  module: AssetClassStrategyModule;
  priceSource: PriceSource;
  universeSource: UniverseSource;
  rateLimiter?: RateLimiter;
  reportSink?: ReportSink;
  now?: () => Date;
}

interface LoadedHistories {
  histories: Map<string, PriceBar[]>;
  skipped: SkippedInstrument[];
}

export class AssetClassOrchestrator {
  readonly assetClass: AssetClass;
  private readonly module: AssetClassStrategyModule;
  private readonly priceSource: PriceSource;
  private readonly universeSource: UniverseSource;
  private readonly rateLimiter: RateLimiter;
  private readonly reportSink: ReportSink;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly machine: AnalysisStateMachine;
  private lastResult: AssetClassRunResult | null = null;

  constructor(deps: OrchestratorDependencies) {
    this.module = deps.module;
    this.assetClass = deps.module.assetClass;
    this.priceSource = deps.priceSource;
    this.universeSource = deps.universeSource;
    this.rateLimiter = deps.rateLimiter ?? unlimitedRateLimiter;
    this.reportSink = deps.reportSink ?? nullReportSink;
    this.now = deps.now ?? (() => new Date());
    this.log = createLogger('orchestrator', { assetClass: this.assetClass });
    this.machine = new AnalysisStateMachine(
      transition => this.log.debug('Phase change', { from: transition.from, to: transition.to, details: transition.details }),
      this.now
    );
  }

  getStatus(): AnalysisStatus {
    return this.machine.getStatus();
  }

  getPhase(): AnalysisPhase {
    return this.machine.getPhase();
  }

  getTransitions(): readonly PhaseTransition[] {
    return this.machine.getTransitions();
  }

  getLastResult(): AssetClassRunResult | null {
    return this.lastResult;
  }

  /**
   * Selected signals from the last finished pass (empty before the first)
   */
  getSelection(): Signal[] {
    return this.lastResult?.signals ?? [];
  }

  async run(): Promise<AssetClassRunResult> {
    const runId = randomUUID();
    const log = this.log.child('run', { runId });
    const startedAt = this.now();
    const { profile } = this.module;

    this.machine.reset();
    let universe: string[] = [];
    let skipped: SkippedInstrument[] = [];
    let selection: SelectionResult | null = null;
    let reportPath: string | null = null;
    let errorMessage: string | undefined;

    try {
      universe = await this.universeSource.load(this.assetClass, profile.defaultUniverse);
      log.info('Starting analysis', { universeSize: universe.length, lookbackBars: profile.lookbackBars });

      const loaded = await this.loadHistories(universe, log);
      skipped = loaded.skipped;
      this.machine.transition(
        AnalysisPhase.DATA_LOADED,
        `${loaded.histories.size}/${universe.length} instruments usable`
      );

      if (loaded.histories.size === 0) {
        this.machine.transition(AnalysisPhase.NO_SIGNALS, 'No usable price history');
      } else {
        const indicators = new Map<string, IndicatorSet>();
        const references = new Map<string, InstrumentReference>();
        for (const [instrument, bars] of loaded.histories) {
          const set = computeIndicatorSet(instrument, bars);
          indicators.set(instrument, set);
          const snapshot = snapshotIndicators(set);
          if (snapshot) {
            references.set(instrument, {
              instrument,
              price: snapshot.price,
              atr: snapshot.atr,
              asOf: snapshot.asOf,
            });
          }
        }
        this.machine.transition(AnalysisPhase.INDICATORS_COMPUTED);

        const candidates = this.module.generateCandidates(indicators);
        this.machine.transition(AnalysisPhase.SIGNALS_GENERATED);

        selection = selectSignals({
          assetClass: this.assetClass,
          candidates,
          references,
          minPositions: profile.minPositions,
          maxPositions: profile.maxPositions,
          fusionPriority: profile.fusionPriority,
        });
        this.machine.transition(
          AnalysisPhase.SELECTED,
          `${selection.signals.length} selected (${selection.forcedCount} forced), ${selection.watchlist.length} watched`
        );

        reportPath = await this.writeReport([...selection.signals, ...selection.watchlist], startedAt, log);

        this.machine.transition(
          selection.signals.length > 0 ? AnalysisPhase.SUCCESS : AnalysisPhase.NO_SIGNALS
        );
      }
    } catch (error) {
      errorMessage = error instanceof Error ? error.message : String(error);
      log.error('Analysis failed', serializeError(error));
      this.machine.transition(AnalysisPhase.ERROR, errorMessage);
    }

    const finishedAt = this.now();
    const result: AssetClassRunResult = {
      runId,
      assetClass: this.assetClass,
      status: this.machine.getStatus(),
      phase: this.machine.getPhase(),
      signals: selection?.signals ?? [],
      watchlist: selection?.watchlist ?? [],
      selection,
      universe,
      skipped,
      reportPath,
      error: errorMessage,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };

    log.info('Analysis finished', {
      status: result.status,
      signals: result.signals.length,
      watched: result.watchlist.length,
      skipped: skipped.length,
      durationMs: result.durationMs,
    });
    this.lastResult = result;
    return result;
  }

  /**
   * Fetch every instrument in sequence. Per-instrument failures are skipped;
   * an open circuit or a universe where every fetch failed aborts the pass.
   */
  private async loadHistories(universe: string[], log: Logger): Promise<LoadedHistories> {
    const { lookbackBars, minHistoryBars } = this.module.profile;
    const histories = new Map<string, PriceBar[]>();
    const skipped: SkippedInstrument[] = [];
    let failures = 0;
    let lastError: unknown;

    for (const instrument of universe) {
      await this.rateLimiter.acquire();

      let bars: PriceBar[];
      try {
        bars = sanitizeBars(await this.priceSource.fetchDailyBars(instrument, lookbackBars));
      } catch (error) {
        if (error instanceof CircuitOpenError) throw error;
        failures++;
        lastError = error;
        log.warn('Price history unavailable, skipping instrument', { instrument, ...serializeError(error) });
        skipped.push({
          instrument,
          reason: 'fetch_failed',
          detail: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (bars.length < minHistoryBars) {
        log.debug('Insufficient history, excluding instrument', { instrument, bars: bars.length, minHistoryBars });
        skipped.push({
          instrument,
          reason: 'insufficient_history',
          detail: `${bars.length} of ${minHistoryBars} bars`,
        });
        continue;
      }

      histories.set(instrument, bars);
    }

    if (universe.length > 0 && failures === universe.length) {
      throw new DataSourceUnavailableError(this.priceSource.name, failures, lastError);
    }

    return { histories, skipped };
  }

  private async writeReport(signals: Signal[], generatedAt: Date, log: Logger): Promise<string | null> {
    try {
      return await this.reportSink.writeAssetClassReport(this.assetClass, signals, generatedAt);
    } catch (error) {
      log.error('Failed to write signal report', serializeError(error));
      return null;
    }
  }
}
