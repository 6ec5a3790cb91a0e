export * from './src/types';
export * from './src/markets/market-keys';
export * from './src/config/engine-config';
export * from './src/model/poisson';
export * from './src/model/scoreline-distribution';
export * from './src/model/live-adjustment';
export * from './src/model/scoreline-model';
export * from './src/markets/market-evaluator';
export * from './src/scoring/confidence-scorer';
export * from './src/staking/stake-sizer';
export * from './src/gate/position-ledger';
export * from './src/gate/bankroll-context';
export * from './src/gate/safety-gate';
export * from './src/aggregation/match-identity';
export * from './src/aggregation/source-aggregator';
export * from './src/ratings/rating-store';
export * from './src/persistence/history-store';
export * from './src/execution/execution-client';
export * from './src/engine/price-book';
export * from './src/engine/match-evaluator';
export * from './src/engine/refresh-cycle';
export * from './src/engine/engine-runner';
export * from './adapters/OddsSourceAdapter';
export * from './adapters/AdapterFactory';
export * from './adapters/FileReplayAdapter';
export * from './adapters/HttpFeedAdapter';
export * from './adapters/TeamResolver';
