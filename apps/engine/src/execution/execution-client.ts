/**
 * Execution collaborator contract. Placing bets is the collaborator's concern; the
 * engine submits approved intents once and does not retry a rejection in the same cycle.
 */

import type { ExecutionIntent } from '../types';

export type SubmitResult =
  | { status: 'accepted'; reference: string }
  | { status: 'rejected'; reason: string };

export interface ExecutionClient {
  submitIntent(intent: ExecutionIntent): Promise<SubmitResult>;
}

/**
 * Logs and accepts every intent without placing anything
 */
export class DryRunExecutionClient implements ExecutionClient {
  private submitted: ExecutionIntent[] = [];

  async submitIntent(intent: ExecutionIntent): Promise<SubmitResult> {
    this.submitted.push(intent);
    const reference = `dry-run-${this.submitted.length}`;
    console.log(
      `[EXECUTION] DRY RUN ${reference}: ${intent.matchId} ${intent.marketType}/${intent.selection} ` +
      `${intent.stake.amount} ${intent.stake.currency} @ ${intent.price} (${intent.sourceId}, confidence ${intent.confidence.toFixed(1)})`
    );
    return { status: 'accepted', reference };
  }

  getSubmitted(): ExecutionIntent[] {
    return [...this.submitted];
  }
}
