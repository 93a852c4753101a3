import { DataIntegrityError } from '../core/errors';
import {
  AdjudicatorConflict,
  ConflictSets,
  History,
  RoundRecord,
  Team,
  pairKey,
  relationKey,
} from '../core/types';

/**
 * Derive the avoidance relations from every completed round.
 *
 * Rounds that are pending, drawn or in progress are skipped: their outcomes
 * are unknown and must not constrain the next draw. A bye is not a meeting.
 */
export function computeHistory(roster: readonly Team[], rounds: readonly RoundRecord[]): History {
  const institutionOf = new Map<number, number | null>();
  for (const team of roster) {
    institutionOf.set(team.id, team.institutionId);
  }

  const metPairs = new Set<string>();
  const metInstitutions = new Set<string>();
  const judgedTeams = new Set<string>();
  const judgedInstitutions = new Set<string>();
  const byeTeams = new Set<number>();

  const completed = rounds
    .filter(r => r.round.status === 'completed')
    .sort((a, b) => a.round.sequence - b.round.sequence);

  for (const record of completed) {
    assertSingleParticipation(record);

    for (const pairing of record.pairings) {
      for (const teamId of pairing.teamIds) {
        if (!institutionOf.has(teamId)) {
          throw new DataIntegrityError(
            `Pairing ${pairing.id} in round ${record.round.id} lists team ${teamId}, which is not on the roster`,
          );
        }
      }

      if (pairing.bye) {
        for (const teamId of pairing.teamIds) byeTeams.add(teamId);
        continue;
      }

      for (let i = 0; i < pairing.teamIds.length; i++) {
        for (let j = i + 1; j < pairing.teamIds.length; j++) {
          const a = pairing.teamIds[i];
          const b = pairing.teamIds[j];
          metPairs.add(pairKey(a, b));

          const institutionA = institutionOf.get(a) ?? null;
          const institutionB = institutionOf.get(b) ?? null;
          if (institutionB !== null) metInstitutions.add(relationKey(a, institutionB));
          if (institutionA !== null) metInstitutions.add(relationKey(b, institutionA));
        }
      }

      for (const seat of pairing.panel) {
        for (const teamId of pairing.teamIds) {
          judgedTeams.add(relationKey(seat.adjudicatorId, teamId));
          const institutionId = institutionOf.get(teamId) ?? null;
          if (institutionId !== null) {
            judgedInstitutions.add(relationKey(seat.adjudicatorId, institutionId));
          }
        }
      }
    }
  }

  return { metPairs, metInstitutions, judgedTeams, judgedInstitutions, byeTeams };
}

/**
 * Merge prior judging with declared conflicts into the sets the allocator
 * excludes by.
 */
export function buildConflicts(
  history: History,
  declared: readonly AdjudicatorConflict[] = [],
): ConflictSets {
  const teams = new Set(history.judgedTeams);
  const institutions = new Set<string>();

  for (const conflict of declared) {
    if (conflict.target.kind === 'team') {
      teams.add(relationKey(conflict.adjudicatorId, conflict.target.teamId));
    } else {
      institutions.add(relationKey(conflict.adjudicatorId, conflict.target.institutionId));
    }
  }

  return { teams, institutions };
}

function assertSingleParticipation(record: RoundRecord): void {
  const seenTeams = new Set<number>();
  const seenAdjudicators = new Set<number>();

  for (const pairing of record.pairings) {
    for (const teamId of pairing.teamIds) {
      if (seenTeams.has(teamId)) {
        throw new DataIntegrityError(`Team ${teamId} appears in more than one pairing of round ${record.round.id}`);
      }
      seenTeams.add(teamId);
    }
    for (const seat of pairing.panel) {
      if (seenAdjudicators.has(seat.adjudicatorId)) {
        throw new DataIntegrityError(
          `Adjudicator ${seat.adjudicatorId} sits on more than one panel in round ${record.round.id}`,
        );
      }
      seenAdjudicators.add(seat.adjudicatorId);
    }
  }
}
