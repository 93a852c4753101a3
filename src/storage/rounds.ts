import { ROUND_STATUSES } from '../core/constants';
import { DataIntegrityError, NotFoundError, RoundStateError, ValidationError } from '../core/errors';
import { Motion, Round, RoundStatus } from '../core/types';
import { Db, FIRST_PAGE, Page } from './database';
import { requireTournament } from './tournaments';

interface RoundRow {
  id: number;
  tournament_id: number;
  sequence: number;
  name: string;
  abbreviation: string | null;
  status: string;
}

interface MotionRow {
  id: number;
  round_id: number;
  text: string;
  infoslide: string | null;
}

export interface NewRound {
  tournamentId: number;
  sequence: number | null;
  name: string;
  abbreviation: string | null;
}

export interface RoundPatch {
  name?: string;
  abbreviation?: string | null;
}

export interface RoundFilter {
  tournamentId: number | null;
  status: RoundStatus | null;
}

export interface NewMotion {
  roundId: number;
  text: string;
  infoslide: string | null;
}

export interface MotionPatch {
  text?: string;
  infoslide?: string | null;
}

function parseStatus(value: string): RoundStatus {
  const status = ROUND_STATUSES.find(s => s === value);
  if (!status) throw new DataIntegrityError(`Stored round status "${value}" is not recognised`);
  return status;
}

function toRound(row: RoundRow): Round {
  return {
    id: row.id,
    tournamentId: row.tournament_id,
    sequence: row.sequence,
    name: row.name,
    abbreviation: row.abbreviation,
    status: parseStatus(row.status),
  };
}

function toMotion(row: MotionRow): Motion {
  return { id: row.id, roundId: row.round_id, text: row.text, infoslide: row.infoslide };
}

// === Rounds ===

function nextSequence(db: Db, tournamentId: number): number {
  const row = db.prepare<[number], { last: number | null }>(
    'SELECT MAX(sequence) AS last FROM rounds WHERE tournament_id = ?'
  ).get(tournamentId);
  return (row?.last ?? 0) + 1;
}

/**
 * Rounds are appended: the sequence defaults to the next free number, and
 * an explicit one must equal it so the sequence never has gaps.
 */
export function createRound(db: Db, input: NewRound): Round {
  requireTournament(db, input.tournamentId);
  const sequence = nextSequence(db, input.tournamentId);
  if (input.sequence !== null && input.sequence !== sequence) {
    throw new ValidationError(`The next round of tournament ${input.tournamentId} must have sequence ${sequence}`);
  }

  const result = db.prepare(
    "INSERT INTO rounds (tournament_id, sequence, name, abbreviation, status) VALUES (?, ?, ?, ?, 'pending')"
  ).run(input.tournamentId, sequence, input.name, input.abbreviation);
  return requireRound(db, Number(result.lastInsertRowid));
}

export function getRound(db: Db, id: number): Round | null {
  const row = db.prepare<[number], RoundRow>('SELECT * FROM rounds WHERE id = ?').get(id);
  return row ? toRound(row) : null;
}

export function requireRound(db: Db, id: number): Round {
  const round = getRound(db, id);
  if (!round) throw new NotFoundError('Round', id);
  return round;
}

export function listRounds(db: Db, filter: RoundFilter, page: Page = FIRST_PAGE): Round[] {
  return db.prepare<[number | null, number | null, string | null, string | null, number, number], RoundRow>(`
    SELECT * FROM rounds
    WHERE (? IS NULL OR tournament_id = ?) AND (? IS NULL OR status = ?)
    ORDER BY tournament_id, sequence LIMIT ? OFFSET ?
  `).all(filter.tournamentId, filter.tournamentId, filter.status, filter.status, page.limit, page.offset)
    .map(toRound);
}

export function listTournamentRounds(db: Db, tournamentId: number): Round[] {
  return db.prepare<[number], RoundRow>('SELECT * FROM rounds WHERE tournament_id = ? ORDER BY sequence')
    .all(tournamentId)
    .map(toRound);
}

export function updateRound(db: Db, id: number, patch: RoundPatch): Round {
  const current = requireRound(db, id);
  db.prepare('UPDATE rounds SET name = ?, abbreviation = ? WHERE id = ?').run(
    patch.name ?? current.name,
    patch.abbreviation !== undefined ? patch.abbreviation : current.abbreviation,
    id,
  );
  return requireRound(db, id);
}

/** Raw status write; transition rules live in the round drawer. */
export function writeRoundStatus(db: Db, id: number, status: RoundStatus): void {
  const result = db.prepare('UPDATE rounds SET status = ? WHERE id = ?').run(status, id);
  if (result.changes === 0) throw new NotFoundError('Round', id);
}

/**
 * Only the last round of a tournament can be deleted, and only before it is
 * drawn.
 */
export function deleteRound(db: Db, id: number): void {
  const round = requireRound(db, id);
  if (round.status !== 'pending') {
    throw new RoundStateError(`Round ${id} is ${round.status}; only pending rounds can be deleted`);
  }
  if (round.sequence !== nextSequence(db, round.tournamentId) - 1) {
    throw new RoundStateError(`Round ${id} is not the last round of tournament ${round.tournamentId}`);
  }
  db.prepare('DELETE FROM rounds WHERE id = ?').run(id);
}

// === Motions ===

export function createMotion(db: Db, input: NewMotion): Motion {
  requireRound(db, input.roundId);
  const result = db.prepare('INSERT INTO motions (round_id, text, infoslide) VALUES (?, ?, ?)')
    .run(input.roundId, input.text, input.infoslide);
  return requireMotion(db, Number(result.lastInsertRowid));
}

export function requireMotion(db: Db, id: number): Motion {
  const row = db.prepare<[number], MotionRow>('SELECT * FROM motions WHERE id = ?').get(id);
  if (!row) throw new NotFoundError('Motion', id);
  return toMotion(row);
}

export function listMotions(db: Db, roundId: number | null, page: Page = FIRST_PAGE): Motion[] {
  return db.prepare<[number | null, number | null, number, number], MotionRow>(`
    SELECT * FROM motions
    WHERE (? IS NULL OR round_id = ?)
    ORDER BY id LIMIT ? OFFSET ?
  `).all(roundId, roundId, page.limit, page.offset).map(toMotion);
}

export function updateMotion(db: Db, id: number, patch: MotionPatch): Motion {
  const current = requireMotion(db, id);
  db.prepare('UPDATE motions SET text = ?, infoslide = ? WHERE id = ?').run(
    patch.text ?? current.text,
    patch.infoslide !== undefined ? patch.infoslide : current.infoslide,
    id,
  );
  return requireMotion(db, id);
}

export function deleteMotion(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM motions WHERE id = ?').run(id);
  if (result.changes === 0) throw new NotFoundError('Motion', id);
}
