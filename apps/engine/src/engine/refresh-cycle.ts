/**
 * Refresh Cycle
 *
 * One atomic pass: every source runs concurrently and either reports or is marked
 * absent, the aggregator builds the cycle's views, matches are evaluated in parallel,
 * and each stake-bearing candidate goes through the Safety Gate. Results that have not
 * reached the Gate when the cycle is superseded or times out are discarded.
 */

import type { OddsSourceAdapter } from '../../adapters/OddsSourceAdapter';
import type { EngineConfig } from '../config/engine-config';
import type { ExcludedMatch, SourceAggregator } from '../aggregation/source-aggregator';
import type { ExecutionClient, SubmitResult } from '../execution/execution-client';
import type { SafetyGate } from '../gate/safety-gate';
import type { HistoryStore } from '../persistence/history-store';
import type {
  CanonicalMatchView,
  DecisionReasonCode,
  ExecutionIntent,
  GateDecision,
  RawOddsQuote,
  RecommendationRecord,
} from '../types';
import { BankrollContext } from '../gate/bankroll-context';
import type { PositionLedger } from '../gate/position-ledger';
import { withDeadline } from '../../lib/deadline';
import type { EvaluatedCandidate, EvaluatedMatch, MatchEvaluator } from './match-evaluator';
import type { PriceBook } from './price-book';

export type SourceStatus = 'ok' | 'failed' | 'timeout';

export interface SourceReport {
  sourceId: string;
  status: SourceStatus;
  quoteCount: number;
  durationMs: number;
  error?: string;
}

export interface CycleReport {
  cycleId: number;
  startedAt: Date;
  finishedAt: Date;
  sources: SourceReport[];
  excluded: ExcludedMatch[];
  staleDropped: number;
  matchesEvaluated: number;
  records: RecommendationRecord[];
  counts: Partial<Record<'APPROVED' | DecisionReasonCode, number>>;
}

export interface CycleDependencies {
  config: EngineConfig;
  adapters: OddsSourceAdapter[];
  aggregator: SourceAggregator;
  evaluator: MatchEvaluator;
  gate: SafetyGate;
  history: HistoryStore;
  execution: ExecutionClient;
  priceBook: PriceBook;
  /** Engine-lifetime approvals; shared by overlapping cycles */
  ledger: PositionLedger;
}

export interface CycleOptions {
  cycleId: number;
  clock?: () => Date;
  /** False once a newer cycle has started */
  isCurrent?: () => boolean;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error &&
    (error.name === 'DeadlineExceededError' || error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Fetch one source, bounded by the timeout. Never throws: failures become the report.
 */
export async function fetchSource(
  adapter: OddsSourceAdapter,
  timeoutMs: number
): Promise<{ report: SourceReport; quotes: RawOddsQuote[] }> {
  const sourceId = adapter.getName();
  const started = Date.now();

  try {
    const quotes = await withDeadline(adapter.fetchQuotes(AbortSignal.timeout(timeoutMs)), timeoutMs, sourceId);
    return {
      report: { sourceId, status: 'ok', quoteCount: quotes.length, durationMs: Date.now() - started },
      quotes,
    };
  } catch (error) {
    const status: SourceStatus = isTimeout(error) ? 'timeout' : 'failed';
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[SOURCE:${sourceId}] ${status}: ${message}`);
    return {
      report: { sourceId, status, quoteCount: 0, durationMs: Date.now() - started, error: message },
      quotes: [],
    };
  }
}

export async function collectQuotes(
  adapters: OddsSourceAdapter[],
  timeoutMs: number
): Promise<{ reports: SourceReport[]; quotes: RawOddsQuote[] }> {
  const results = await Promise.all(adapters.map(adapter => fetchSource(adapter, timeoutMs)));
  return {
    reports: results.map(r => r.report),
    quotes: results.flatMap(r => r.quotes),
  };
}

export async function runRefreshCycle(deps: CycleDependencies, options: CycleOptions): Promise<CycleReport> {
  const clock = options.clock ?? (() => new Date());
  const isCurrent = options.isCurrent ?? (() => true);
  const startedAt = clock();
  const deadline = startedAt.getTime() + deps.config.cycle_timeout_ms;
  const isActive = () => isCurrent() && clock().getTime() <= deadline;
  const remainingMs = () => Math.max(0, deadline - clock().getTime());
  const tag = `[CYCLE] #${options.cycleId}`;

  const { reports, quotes } = await collectQuotes(deps.adapters, deps.config.source_timeout_ms);
  const aggregation = deps.aggregator.aggregate(quotes, clock());

  if (isCurrent()) {
    deps.priceBook.update(aggregation.views);
  }

  const context = await withDeadline(
    BankrollContext.open(deps.history, deps.config.gate.daily_loss_limit, clock(), deps.ledger),
    remainingMs(),
    'history store'
  );

  const records: RecommendationRecord[] = [];
  let matchesEvaluated = 0;

  await Promise.all(aggregation.views.map(async view => {
    let evaluated: EvaluatedMatch | null;
    try {
      evaluated = deps.evaluator.evaluate(view, clock());
    } catch (error) {
      console.error(`${tag} Evaluation failed for ${view.match.matchId}:`, error);
      return;
    }
    if (!evaluated) return;
    matchesEvaluated++;

    for (const candidate of evaluated.candidates) {
      const decision = await decide(deps, context, view, candidate, { isActive, remainingMs, clock });
      records.push({
        match: evaluated.summary,
        marketType: candidate.probability.marketType,
        selection: candidate.probability.selection,
        price: candidate.price.price,
        sourceId: candidate.price.sourceId,
        modelProbability: candidate.probability.modelProbability,
        fairImpliedProbability: candidate.probability.fairImpliedProbability,
        edge: candidate.probability.edge,
        confidence: candidate.confidence,
        stake: candidate.stake,
        decision,
      });
    }
  }));

  records.sort((a, b) =>
    a.match.matchId.localeCompare(b.match.matchId) ||
    a.marketType.localeCompare(b.marketType) ||
    a.selection.localeCompare(b.selection)
  );

  const counts: CycleReport['counts'] = {};
  for (const record of records) {
    const key = record.decision.outcome === 'Approved' ? 'APPROVED' : record.decision.reasonCode;
    counts[key] = (counts[key] ?? 0) + 1;
  }

  const report: CycleReport = {
    cycleId: options.cycleId,
    startedAt,
    finishedAt: clock(),
    sources: reports,
    excluded: aggregation.excluded,
    staleDropped: aggregation.staleDropped,
    matchesEvaluated,
    records,
    counts,
  };

  logCycleSummary(tag, report);
  return report;
}

interface CycleTiming {
  isActive: () => boolean;
  remainingMs: () => number;
  clock: () => Date;
}

async function decide(
  deps: CycleDependencies,
  context: BankrollContext,
  view: CanonicalMatchView,
  candidate: EvaluatedCandidate,
  timing: CycleTiming
): Promise<GateDecision> {
  const { isActive, remainingMs, clock } = timing;
  if (!isActive()) {
    return { outcome: 'Rejected', reasonCode: 'SUPERSEDED', timestamp: clock() };
  }
  if (!candidate.stake) {
    return { outcome: 'Rejected', reasonCode: 'NO_STAKE', timestamp: clock() };
  }

  const intent: ExecutionIntent = {
    matchId: view.match.matchId,
    marketType: candidate.probability.marketType,
    selection: candidate.probability.selection,
    price: candidate.price.price,
    sourceId: candidate.price.sourceId,
    stake: candidate.stake,
    confidence: candidate.confidence,
    createdAt: clock(),
  };

  const { decision, reservation } = await deps.gate.evaluate(
    { intent, snapshotObservedAt: candidate.price.observedAt },
    context
  );
  if (decision.outcome !== 'Approved' || !reservation) {
    return decision;
  }

  const label = `${intent.matchId} ${intent.marketType}/${intent.selection}`;
  let result: SubmitResult;
  try {
    result = await withDeadline(deps.execution.submitIntent(intent), remainingMs(), 'execution');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    if (isTimeout(error)) {
      // The intent may still execute: the position stays reserved.
      console.error(`[EXECUTION] Intent for ${label} unconfirmed: ${reason}`);
      return { ...decision, executionNote: `execution unconfirmed: ${reason}` };
    }
    result = { status: 'rejected', reason };
  }

  if (result.status === 'rejected') {
    console.error(`[EXECUTION] Intent for ${label} not executed: ${result.reason}`);
    await context.release(reservation);
    return { ...decision, executionNote: `execution rejected: ${result.reason}` };
  }

  const { reference } = result;
  try {
    await withDeadline(deps.history.recordBet({
      betId: reference,
      matchId: intent.matchId,
      marketType: intent.marketType,
      selection: intent.selection,
      stake: intent.stake.amount,
      price: intent.price,
      placedAt: clock(),
      status: 'open',
      pnl: null,
      settledAt: null,
    }), remainingMs(), 'history store');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[EXECUTION] ${reference} for ${label} accepted but not recorded: ${message}`);
    return { ...decision, executionNote: `accepted as ${reference}; history write failed: ${message}` };
  }

  await context.confirm(reservation);
  return decision;
}

function logCycleSummary(tag: string, report: CycleReport): void {
  const ok = report.sources.filter(s => s.status === 'ok').length;
  const failed = report.sources.length - ok;
  const counts = Object.entries(report.counts)
    .map(([key, value]) => `${key}=${value}`)
    .join(' ') || 'none';

  console.log(
    `${tag} sources ok=${ok} failed=${failed} | matches evaluated=${report.matchesEvaluated} ` +
    `excluded=${report.excluded.length} stale_quotes=${report.staleDropped} | decisions: ${counts}`
  );
}
