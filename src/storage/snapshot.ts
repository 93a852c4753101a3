import { Adjudicator, AdjudicatorConflict, RoundRecord, Team, Tournament } from '../core/types';
import { listTournamentAdjudicators, listTournamentConflicts } from './adjudicators';
import { listRoundBallots } from './ballots';
import { Db } from './database';
import { listPairings } from './pairings';
import { listTournamentRounds } from './rounds';
import { listTournamentTeams } from './teams';
import { requireTournament } from './tournaments';

export interface TournamentSnapshot {
  tournament: Tournament;
  roster: Team[];
  adjudicators: Adjudicator[];
  conflicts: AdjudicatorConflict[];
  rounds: RoundRecord[];
}

/**
 * Materialise everything the draw engine reads about one tournament.
 * Read inside a single transaction so the parts agree with each other.
 */
export function loadTournamentSnapshot(db: Db, tournamentId: number): TournamentSnapshot {
  const read = db.transaction((id: number): TournamentSnapshot => {
    const tournament = requireTournament(db, id);
    const rounds = listTournamentRounds(db, id).map(round => ({
      round,
      pairings: listPairings(db, round.id),
      ballots: listRoundBallots(db, round.id),
    }));

    return {
      tournament,
      roster: listTournamentTeams(db, id),
      adjudicators: listTournamentAdjudicators(db, id),
      conflicts: listTournamentConflicts(db, id),
      rounds,
    };
  });

  return read(tournamentId);
}
