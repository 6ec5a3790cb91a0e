/**
 * Cross-source fixture identity.
 *
 * Two source fixtures describe the same real-world match iff their normalized team ids
 * are equal and their kickoffs fall within the tolerance window of a cluster's anchor.
 * Resolution is reported as a tagged outcome; nothing here guesses.
 */

import { utcDateKey } from '../../lib/time';

export interface NormalizedFixture {
  sourceId: string;
  sourceEventId: string;
  homeTeamId: string;
  awayTeamId: string;
  competition: string;
  kickoffTime: Date;
}

export interface FixtureCluster {
  homeTeamId: string;
  awayTeamId: string;
  competition: string;
  anchorKickoff: Date;
  members: NormalizedFixture[];
  ambiguous: boolean;
  ambiguityDetail: string | null;
}

export type IdentityOutcome =
  | { kind: 'Matched'; cluster: FixtureCluster }
  | { kind: 'Ambiguous'; candidates: FixtureCluster[] }
  | { kind: 'NoMatch' };

export function fixtureKey(sourceId: string, sourceEventId: string): string {
  return `${sourceId}#${sourceEventId}`;
}

export function canonicalMatchId(homeTeamId: string, awayTeamId: string, kickoff: Date): string {
  return `${homeTeamId}_vs_${awayTeamId}@${utcDateKey(kickoff)}`;
}

/**
 * Deterministic processing order: source, team ids, kickoff. Each source's own listings
 * seed clusters before later sources are matched against them.
 */
export function compareFixtures(a: NormalizedFixture, b: NormalizedFixture): number {
  return (
    a.sourceId.localeCompare(b.sourceId) ||
    a.homeTeamId.localeCompare(b.homeTeamId) ||
    a.awayTeamId.localeCompare(b.awayTeamId) ||
    a.kickoffTime.getTime() - b.kickoffTime.getTime() ||
    a.sourceEventId.localeCompare(b.sourceEventId)
  );
}

export function resolveIdentity(
  fixture: NormalizedFixture,
  clusters: FixtureCluster[],
  toleranceMs: number
): IdentityOutcome {
  const candidates = clusters.filter(cluster =>
    cluster.homeTeamId === fixture.homeTeamId &&
    cluster.awayTeamId === fixture.awayTeamId &&
    Math.abs(cluster.anchorKickoff.getTime() - fixture.kickoffTime.getTime()) <= toleranceMs
  );

  if (candidates.length === 0) return { kind: 'NoMatch' };
  if (candidates.length > 1) return { kind: 'Ambiguous', candidates };
  return { kind: 'Matched', cluster: candidates[0] };
}

/**
 * Group fixtures into clusters. A fixture matching several clusters marks all of them
 * ambiguous; a source listing two events for one cluster does the same.
 */
export function clusterFixtures(fixtures: NormalizedFixture[], toleranceMs: number): FixtureCluster[] {
  const clusters: FixtureCluster[] = [];

  for (const fixture of [...fixtures].sort(compareFixtures)) {
    const outcome = resolveIdentity(fixture, clusters, toleranceMs);

    switch (outcome.kind) {
      case 'NoMatch':
        clusters.push({
          homeTeamId: fixture.homeTeamId,
          awayTeamId: fixture.awayTeamId,
          competition: fixture.competition,
          anchorKickoff: fixture.kickoffTime,
          members: [fixture],
          ambiguous: false,
          ambiguityDetail: null,
        });
        break;

      case 'Matched': {
        const { cluster } = outcome;
        const sameSource = cluster.members.find(member => member.sourceId === fixture.sourceId);
        if (sameSource && sameSource.sourceEventId !== fixture.sourceEventId) {
          cluster.ambiguous = true;
          cluster.ambiguityDetail =
            `${fixture.sourceId} lists both ${sameSource.sourceEventId} and ${fixture.sourceEventId}`;
        }
        cluster.members.push(fixture);
        break;
      }

      case 'Ambiguous':
        for (const candidate of outcome.candidates) {
          candidate.ambiguous = true;
          candidate.ambiguityDetail =
            `${fixtureKey(fixture.sourceId, fixture.sourceEventId)} matches ${outcome.candidates.length} fixtures`;
        }
        break;
    }
  }

  return clusters;
}
