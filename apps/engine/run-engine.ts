/**
 * Engine CLI
 *
 * Usage:
 *   npx tsx apps/engine/run-engine.ts --once
 *   npx tsx apps/engine/run-engine.ts --profile conservative
 *
 * Approved intents always go to the dry-run execution client.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { Command } from 'commander';
import { AdapterFactory } from './adapters/AdapterFactory';
import { TeamResolver } from './adapters/TeamResolver';
import { EngineConfigError, loadEngineConfig } from './src/config/engine-config';
import { RatingStore } from './src/ratings/rating-store';
import { InMemoryHistoryStore } from './src/persistence/history-store';
import { DryRunExecutionClient } from './src/execution/execution-client';
import { EngineRunner } from './src/engine/engine-runner';
import type { CycleReport } from './src/engine/refresh-cycle';

dotenv.config();

interface CliOptions {
  config?: string;
  sources: string;
  ratings: string;
  profile?: string;
  once?: boolean;
}

function printReport(report: CycleReport): void {
  for (const record of report.records) {
    const outcome = record.decision.outcome === 'Approved'
      ? `APPROVED${record.decision.executionNote ? ` (${record.decision.executionNote})` : ''}`
      : `REJECTED ${record.decision.reasonCode}`;
    console.log(
      `   ${record.match.matchId} ${record.marketType}/${record.selection} @ ${record.price} ` +
      `edge=${(record.edge * 100).toFixed(2)}% confidence=${record.confidence.toFixed(1)} ` +
      `stake=${record.stake ? `${record.stake.amount} ${record.stake.currency}` : '-'} -> ${outcome}`
    );
  }
}

async function main() {
  const program = new Command();

  program
    .name('run-engine')
    .description('Run the in-play prediction and decision engine')
    .option('--config <path>', 'Engine configuration file (ENGINE_CONFIG_PATH takes precedence)')
    .option('--sources <path>', 'Odds sources file', path.join(__dirname, 'config/sources.yml'))
    .option('--ratings <path>', 'Team ratings file', path.join(__dirname, 'data/ratings.yml'))
    .option('--profile <name>', 'Strategy profile to apply (e.g. conservative, aggressive)')
    .option('--once', 'Run a single refresh cycle and exit')
    .action(async (options: CliOptions) => {
      let runner: EngineRunner;
      try {
        const config = loadEngineConfig({ configPath: options.config, profile: options.profile });
        runner = new EngineRunner(config, {
          adapters: await new AdapterFactory(options.sources).createAvailableAdapters(),
          resolver: new TeamResolver(),
          ratings: RatingStore.fromFile(options.ratings, config.model.rating_max_age_hours),
          history: new InMemoryHistoryStore(),
          execution: new DryRunExecutionClient(),
        });
      } catch (error) {
        if (error instanceof EngineConfigError) {
          console.error(`[CONFIG] ${error.message}`);
        } else {
          console.error('[ENGINE] Failed to start:', error);
        }
        process.exit(1);
      }

      if (options.once) {
        printReport(await runner.runOnce());
        return;
      }

      runner.start(printReport);
      const shutdown = () => {
        runner.stop();
        process.exit(0);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });

  await program.parseAsync(process.argv);
}

main().catch(error => {
  console.error('[ENGINE] Fatal error:', error);
  process.exit(1);
});
