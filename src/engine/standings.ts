import { DataIntegrityError } from '../core/errors';
import { Ballot, RoundRecord, Standing, Team } from '../core/types';
import { createRng, seededShuffle } from './rng';

export interface StandingsOptions {
  /** When set, equal teams are ordered by a seeded permutation instead of by id. */
  tieBreakSeed?: number | null;
}

interface TeamTotals {
  points: number;
  speakerScore: number;
  roundsDebated: number;
}

/**
 * Rank every team on the roster from the results of completed rounds.
 *
 * Order: team points (desc), cumulative speaker score (desc), tie-break key
 * (asc). The tie-break key is unique per team, so the result is a total
 * order and ranks run 1..n without gaps or ties.
 */
export function computeStandings(
  roster: readonly Team[],
  rounds: readonly RoundRecord[],
  options: StandingsOptions = {},
): Standing[] {
  assertUniqueRoster(roster);
  const totals = new Map<number, TeamTotals>();
  for (const team of roster) {
    totals.set(team.id, { points: 0, speakerScore: 0, roundsDebated: 0 });
  }

  for (const record of rounds) {
    if (record.round.status !== 'completed') continue;

    const pairings = new Map(record.pairings.map(p => [p.id, p]));

    for (const ballot of selectAuthoritativeBallots(record.ballots)) {
      const pairing = pairings.get(ballot.pairingId);
      if (!pairing) {
        throw new DataIntegrityError(
          `Ballot ${ballot.id} references pairing ${ballot.pairingId}, which is not in round ${record.round.id}`,
        );
      }

      for (const result of ballot.teamResults) {
        const teamTotals = totals.get(result.teamId);
        if (!teamTotals) {
          throw new DataIntegrityError(
            `Ballot ${ballot.id} references team ${result.teamId}, which is not on the roster`,
          );
        }
        if (!pairing.teamIds.includes(result.teamId)) {
          throw new DataIntegrityError(
            `Ballot ${ballot.id} scores team ${result.teamId}, which did not debate in pairing ${pairing.id}`,
          );
        }
        teamTotals.points += result.points;
        teamTotals.speakerScore += result.speakerScore;
        teamTotals.roundsDebated++;
      }
    }
  }

  const tieBreakKeys = computeTieBreakKeys(roster, options.tieBreakSeed ?? null);

  const unranked = roster.map(team => {
    const teamTotals = totals.get(team.id) ?? { points: 0, speakerScore: 0, roundsDebated: 0 };
    return {
      teamId: team.id,
      institutionId: team.institutionId,
      points: teamTotals.points,
      speakerScore: teamTotals.speakerScore,
      roundsDebated: teamTotals.roundsDebated,
      tieBreakKey: tieBreakKeys.get(team.id) ?? team.id,
    };
  });

  unranked.sort((a, b) =>
    b.points - a.points ||
    b.speakerScore - a.speakerScore ||
    a.tieBreakKey - b.tieBreakKey ||
    a.teamId - b.teamId,
  );

  return unranked.map((entry, index) => ({ ...entry, rank: index + 1 }));
}

/**
 * One ballot per pairing: the highest version wins, then the most recently
 * created (highest id).
 */
export function selectAuthoritativeBallots(ballots: readonly Ballot[]): Ballot[] {
  const byPairing = new Map<number, Ballot>();
  for (const ballot of ballots) {
    const current = byPairing.get(ballot.pairingId);
    if (
      !current ||
      ballot.version > current.version ||
      (ballot.version === current.version && ballot.id > current.id)
    ) {
      byPairing.set(ballot.pairingId, ballot);
    }
  }
  return [...byPairing.values()].sort((a, b) => a.pairingId - b.pairingId);
}

function assertUniqueRoster(roster: readonly Team[]): void {
  const seen = new Set<number>();
  for (const team of roster) {
    if (seen.has(team.id)) {
      throw new DataIntegrityError(`Team ${team.id} appears twice on the roster`);
    }
    seen.add(team.id);
  }
}

function computeTieBreakKeys(roster: readonly Team[], seed: number | null): Map<number, number> {
  const ids = roster.map(t => t.id).sort((a, b) => a - b);
  if (seed === null) {
    return new Map(ids.map(id => [id, id]));
  }
  const permuted = seededShuffle(ids, createRng(seed));
  return new Map(permuted.map((id, index) => [id, index]));
}
