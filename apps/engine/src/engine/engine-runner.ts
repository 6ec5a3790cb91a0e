/**
 * Engine Runner
 *
 * Schedules refresh cycles every refresh_interval_seconds, numbers them and supersedes
 * the previous cycle when a new one starts. Holds the latest best-price view the Gate
 * checks price movement against, and the position ledger every cycle reserves through.
 */

import type { OddsSourceAdapter } from '../../adapters/OddsSourceAdapter';
import type { TeamNameResolver } from '../../adapters/TeamResolver';
import type { EngineConfig } from '../config/engine-config';
import type { ExecutionClient } from '../execution/execution-client';
import type { HistoryStore } from '../persistence/history-store';
import type { RatingsProvider, TeamContextProvider } from '../ratings/rating-store';
import { SourceAggregator } from '../aggregation/source-aggregator';
import { ScorelineModel } from '../model/scoreline-model';
import { MarketEvaluator } from '../markets/market-evaluator';
import { ConfidenceScorer } from '../scoring/confidence-scorer';
import { StakeSizer } from '../staking/stake-sizer';
import { SafetyGate } from '../gate/safety-gate';
import { PositionLedger } from '../gate/position-ledger';
import { MatchEvaluator } from './match-evaluator';
import { PriceBook } from './price-book';
import { runRefreshCycle, type CycleDependencies, type CycleReport } from './refresh-cycle';

export interface EngineCollaborators {
  adapters: OddsSourceAdapter[];
  resolver: TeamNameResolver;
  ratings: RatingsProvider & TeamContextProvider;
  history: HistoryStore;
  execution: ExecutionClient;
  clock?: () => Date;
}

export class EngineRunner {
  readonly priceBook = new PriceBook();
  private deps: CycleDependencies;
  private clock: () => Date;
  private intervalMs: number;
  private cycleCounter = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(config: EngineConfig, collaborators: EngineCollaborators) {
    this.clock = collaborators.clock ?? (() => new Date());
    this.intervalMs = config.refresh_interval_seconds * 1000;

    const markets = new MarketEvaluator(config.evaluation);
    this.deps = {
      config,
      adapters: collaborators.adapters,
      aggregator: new SourceAggregator(config.aggregation, collaborators.resolver),
      evaluator: new MatchEvaluator({
        model: new ScorelineModel(config.model, collaborators.ratings),
        markets,
        scorer: new ConfidenceScorer(config.confidence, collaborators.ratings),
        sizer: new StakeSizer(config.staking),
      }),
      gate: new SafetyGate(config.gate, this.priceBook, this.clock),
      history: collaborators.history,
      execution: collaborators.execution,
      priceBook: this.priceBook,
      ledger: new PositionLedger(),
    };
  }

  /**
   * Run one cycle. Starting it supersedes any cycle still in flight.
   */
  runOnce(): Promise<CycleReport> {
    const cycleId = ++this.cycleCounter;
    return runRefreshCycle(this.deps, {
      cycleId,
      clock: this.clock,
      isCurrent: () => this.cycleCounter === cycleId,
    });
  }

  start(onReport?: (report: CycleReport) => void): void {
    if (this.timer) return;

    const tick = () => {
      this.runOnce()
        .then(report => onReport?.(report))
        .catch(error => console.error('[ENGINE] Refresh cycle failed:', error));
    };

    console.log(`[ENGINE] Starting refresh loop every ${this.intervalMs / 1000}s`);
    this.timer = setInterval(tick, this.intervalMs);
    tick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    console.log('[ENGINE] Refresh loop stopped');
  }
}
