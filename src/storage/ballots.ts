import { NotFoundError, ValidationError } from '../core/errors';
import { Ballot, BallotSpeakerScore, BallotTeamResult } from '../core/types';
import { Db, FIRST_PAGE, Page } from './database';
import { requirePairing } from './pairings';

interface BallotRow {
  id: number;
  pairing_id: number;
  adjudicator_id: number | null;
  version: number;
}

interface TeamResultRow {
  ballot_id: number;
  team_id: number;
  points: number;
  speaker_score: number;
}

interface SpeakerScoreRow {
  ballot_id: number;
  speaker_id: number;
  position: number;
  score: number;
}

export interface NewBallot {
  pairingId: number;
  adjudicatorId: number | null;
  teamResults: BallotTeamResult[];
  speakerScores: BallotSpeakerScore[];
}

export interface BallotFilter {
  pairingId: number | null;
  adjudicatorId: number | null;
}

function assemble(db: Db, rows: BallotRow[]): Ballot[] {
  if (rows.length === 0) return [];

  const ballots = new Map<number, Ballot>();
  for (const row of rows) {
    ballots.set(row.id, {
      id: row.id,
      pairingId: row.pairing_id,
      adjudicatorId: row.adjudicator_id,
      version: row.version,
      teamResults: [],
      speakerScores: [],
    });
  }

  const ids = [...ballots.keys()];
  const placeholders = ids.map(() => '?').join(', ');

  const results = db.prepare<number[], TeamResultRow>(
    `SELECT * FROM ballot_team_results WHERE ballot_id IN (${placeholders}) ORDER BY ballot_id, rowid`
  ).all(...ids);
  for (const row of results) {
    ballots.get(row.ballot_id)?.teamResults.push({
      teamId: row.team_id,
      points: row.points,
      speakerScore: row.speaker_score,
    });
  }

  const scores = db.prepare<number[], SpeakerScoreRow>(
    `SELECT * FROM ballot_speaker_scores WHERE ballot_id IN (${placeholders}) ORDER BY ballot_id, position`
  ).all(...ids);
  for (const row of scores) {
    ballots.get(row.ballot_id)?.speakerScores.push({
      speakerId: row.speaker_id,
      position: row.position,
      score: row.score,
    });
  }

  return [...ballots.values()];
}

/**
 * Check a ballot against the pairing it scores: every team in the room gets
 * exactly one result, the submitting adjudicator sat on the panel, and every
 * scored speaker debated in the room.
 */
function validateBallot(db: Db, input: NewBallot): void {
  const pairing = requirePairing(db, input.pairingId);
  if (pairing.bye) {
    throw new ValidationError(`Pairing ${pairing.id} is a bye and takes no ballots`);
  }

  const scored = input.teamResults.map(r => r.teamId);
  const expected = new Set(pairing.teamIds);
  if (new Set(scored).size !== scored.length || scored.length !== expected.size || !scored.every(id => expected.has(id))) {
    throw new ValidationError(
      `Ballot must score each of teams ${pairing.teamIds.join(', ')} exactly once`,
    );
  }

  if (input.adjudicatorId !== null && !pairing.panel.some(s => s.adjudicatorId === input.adjudicatorId)) {
    throw new ValidationError(`Adjudicator ${input.adjudicatorId} is not on the panel of pairing ${pairing.id}`);
  }

  if (input.speakerScores.length === 0) return;

  const placeholders = pairing.teamIds.map(() => '?').join(', ');
  const eligible = new Set(
    db.prepare<number[], { id: number }>(`SELECT id FROM speakers WHERE team_id IN (${placeholders})`)
      .all(...pairing.teamIds)
      .map(row => row.id),
  );
  for (const score of input.speakerScores) {
    if (!eligible.has(score.speakerId)) {
      throw new ValidationError(`Speaker ${score.speakerId} is not on a team in pairing ${pairing.id}`);
    }
  }
}

/**
 * Store a ballot as the next version for its pairing. The highest version is
 * the one that counts.
 */
export function createBallot(db: Db, input: NewBallot): Ballot {
  validateBallot(db, input);

  const insert = db.transaction((ballot: NewBallot): number => {
    const latest = db.prepare<[number], { version: number | null }>(
      'SELECT MAX(version) AS version FROM ballots WHERE pairing_id = ?'
    ).get(ballot.pairingId);

    const result = db.prepare(
      'INSERT INTO ballots (pairing_id, adjudicator_id, version, submitted_at) VALUES (?, ?, ?, ?)'
    ).run(ballot.pairingId, ballot.adjudicatorId, (latest?.version ?? 0) + 1, Date.now());
    const ballotId = Number(result.lastInsertRowid);

    const insertResult = db.prepare(
      'INSERT INTO ballot_team_results (ballot_id, team_id, points, speaker_score) VALUES (?, ?, ?, ?)'
    );
    for (const r of ballot.teamResults) insertResult.run(ballotId, r.teamId, r.points, r.speakerScore);

    const insertScore = db.prepare(
      'INSERT INTO ballot_speaker_scores (ballot_id, speaker_id, position, score) VALUES (?, ?, ?, ?)'
    );
    for (const s of ballot.speakerScores) insertScore.run(ballotId, s.speakerId, s.position, s.score);

    return ballotId;
  });

  return requireBallot(db, insert(input));
}

export function requireBallot(db: Db, id: number): Ballot {
  const row = db.prepare<[number], BallotRow>('SELECT * FROM ballots WHERE id = ?').get(id);
  if (!row) throw new NotFoundError('Ballot', id);
  return assemble(db, [row])[0];
}

export function listBallots(db: Db, filter: BallotFilter, page: Page = FIRST_PAGE): Ballot[] {
  const rows = db.prepare<[number | null, number | null, number | null, number | null, number, number], BallotRow>(`
    SELECT * FROM ballots
    WHERE (? IS NULL OR pairing_id = ?) AND (? IS NULL OR adjudicator_id = ?)
    ORDER BY id LIMIT ? OFFSET ?
  `).all(filter.pairingId, filter.pairingId, filter.adjudicatorId, filter.adjudicatorId, page.limit, page.offset);
  return assemble(db, rows);
}

/** Every version of every ballot in a round. */
export function listRoundBallots(db: Db, roundId: number): Ballot[] {
  const rows = db.prepare<[number], BallotRow>(`
    SELECT b.* FROM ballots b
    JOIN pairings p ON p.id = b.pairing_id
    WHERE p.round_id = ?
    ORDER BY b.id
  `).all(roundId);
  return assemble(db, rows);
}
