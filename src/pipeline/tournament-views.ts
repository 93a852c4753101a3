import { Standing } from '../core/types';
import { computeHistory } from '../engine/history';
import { computeStandings } from '../engine/standings';
import { Db } from '../storage/database';
import { loadTournamentSnapshot } from '../storage/snapshot';

export interface HistoryView {
  roundsCounted: number;
  metPairs: [number, number][];
  metInstitutions: { teamId: number; institutionId: number }[];
  judgedTeams: { adjudicatorId: number; teamId: number }[];
  judgedInstitutions: { adjudicatorId: number; institutionId: number }[];
  byeTeams: number[];
}

/** Standings from every completed round of the tournament. */
export function tournamentStandings(db: Db, tournamentId: number): Standing[] {
  const snapshot = loadTournamentSnapshot(db, tournamentId);
  return computeStandings(snapshot.roster, snapshot.rounds, {
    tieBreakSeed: snapshot.tournament.settings.tieBreakSeed,
  });
}

/**
 * The relations derived from completed rounds, flattened into sorted arrays
 * for JSON. `metPairs` and `judgedTeams` constrain the next draw; the
 * institution relations are reported for review only.
 */
export function tournamentHistory(db: Db, tournamentId: number): HistoryView {
  const snapshot = loadTournamentSnapshot(db, tournamentId);
  const history = computeHistory(snapshot.roster, snapshot.rounds);

  const metPairs = [...history.metPairs]
    .map(key => splitKey(key, ':'))
    .sort((a, b) => a[0] - b[0] || a[1] - b[1]);

  const metInstitutions = sortedRelations(history.metInstitutions)
    .map(([teamId, institutionId]) => ({ teamId, institutionId }));
  const judgedTeams = sortedRelations(history.judgedTeams)
    .map(([adjudicatorId, teamId]) => ({ adjudicatorId, teamId }));
  const judgedInstitutions = sortedRelations(history.judgedInstitutions)
    .map(([adjudicatorId, institutionId]) => ({ adjudicatorId, institutionId }));

  return {
    roundsCounted: snapshot.rounds.filter(r => r.round.status === 'completed').length,
    metPairs,
    metInstitutions,
    judgedTeams,
    judgedInstitutions,
    byeTeams: [...history.byeTeams].sort((a, b) => a - b),
  };
}

function sortedRelations(keys: ReadonlySet<string>): [number, number][] {
  return [...keys]
    .map(key => splitKey(key, '>'))
    .sort((a, b) => a[0] - b[0] || a[1] - b[1]);
}

function splitKey(key: string, separator: string): [number, number] {
  const [first, second] = key.split(separator);
  return [Number(first), Number(second)];
}
