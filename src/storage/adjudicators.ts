import { DataIntegrityError, NotFoundError, ValidationError } from '../core/errors';
import { Adjudicator, AdjudicatorConflict, ConflictTarget } from '../core/types';
import { Db, FIRST_PAGE, Page, fromFlag, toFlag } from './database';
import { requireInstitution } from './institutions';
import { requireTeam } from './teams';
import { requireTournament } from './tournaments';

interface AdjudicatorRow {
  id: number;
  tournament_id: number;
  institution_id: number | null;
  name: string;
  experience: number;
  independent: number;
  active: number;
}

interface ConflictRow {
  id: number;
  adjudicator_id: number;
  team_id: number | null;
  institution_id: number | null;
}

export interface NewAdjudicator {
  tournamentId: number;
  name: string;
  institutionId: number | null;
  experience: number;
  independent: boolean;
  active: boolean;
}

export type AdjudicatorPatch = Partial<Omit<NewAdjudicator, 'tournamentId'>>;

function toAdjudicator(row: AdjudicatorRow): Adjudicator {
  return {
    id: row.id,
    tournamentId: row.tournament_id,
    name: row.name,
    institutionId: row.institution_id,
    experience: row.experience,
    independent: fromFlag(row.independent),
    active: fromFlag(row.active),
  };
}

function toConflict(row: ConflictRow): AdjudicatorConflict {
  let target: ConflictTarget;
  if (row.team_id !== null) {
    target = { kind: 'team', teamId: row.team_id };
  } else if (row.institution_id !== null) {
    target = { kind: 'institution', institutionId: row.institution_id };
  } else {
    throw new DataIntegrityError(`Conflict ${row.id} names neither a team nor an institution`);
  }
  return { id: row.id, adjudicatorId: row.adjudicator_id, target };
}

function assertInstitutionInTournament(db: Db, institutionId: number | null, tournamentId: number): void {
  if (institutionId === null) return;
  if (requireInstitution(db, institutionId).tournamentId !== tournamentId) {
    throw new ValidationError(`Institution ${institutionId} belongs to another tournament`);
  }
}

// === Adjudicators ===

export function createAdjudicator(db: Db, input: NewAdjudicator): Adjudicator {
  requireTournament(db, input.tournamentId);
  assertInstitutionInTournament(db, input.institutionId, input.tournamentId);

  const result = db.prepare(`
    INSERT INTO adjudicators (tournament_id, institution_id, name, experience, independent, active)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(
    input.tournamentId,
    input.institutionId,
    input.name,
    input.experience,
    toFlag(input.independent),
    toFlag(input.active),
  );
  return requireAdjudicator(db, Number(result.lastInsertRowid));
}

export function getAdjudicator(db: Db, id: number): Adjudicator | null {
  const row = db.prepare<[number], AdjudicatorRow>('SELECT * FROM adjudicators WHERE id = ?').get(id);
  return row ? toAdjudicator(row) : null;
}

export function requireAdjudicator(db: Db, id: number): Adjudicator {
  const adjudicator = getAdjudicator(db, id);
  if (!adjudicator) throw new NotFoundError('Adjudicator', id);
  return adjudicator;
}

export function listAdjudicators(db: Db, tournamentId: number | null, page: Page = FIRST_PAGE): Adjudicator[] {
  return db.prepare<[number | null, number | null, number, number], AdjudicatorRow>(`
    SELECT * FROM adjudicators
    WHERE (? IS NULL OR tournament_id = ?)
    ORDER BY id LIMIT ? OFFSET ?
  `).all(tournamentId, tournamentId, page.limit, page.offset).map(toAdjudicator);
}

/** Every adjudicator of a tournament, active or not, unpaginated. */
export function listTournamentAdjudicators(db: Db, tournamentId: number): Adjudicator[] {
  return db.prepare<[number], AdjudicatorRow>('SELECT * FROM adjudicators WHERE tournament_id = ? ORDER BY id')
    .all(tournamentId)
    .map(toAdjudicator);
}

export function updateAdjudicator(db: Db, id: number, patch: AdjudicatorPatch): Adjudicator {
  const current = requireAdjudicator(db, id);
  const institutionId = patch.institutionId !== undefined ? patch.institutionId : current.institutionId;
  assertInstitutionInTournament(db, institutionId, current.tournamentId);

  db.prepare(`
    UPDATE adjudicators SET name = ?, institution_id = ?, experience = ?, independent = ?, active = ?
    WHERE id = ?
  `).run(
    patch.name ?? current.name,
    institutionId,
    patch.experience ?? current.experience,
    toFlag(patch.independent ?? current.independent),
    toFlag(patch.active ?? current.active),
    id,
  );
  return requireAdjudicator(db, id);
}

export function deleteAdjudicator(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM adjudicators WHERE id = ?').run(id);
  if (result.changes === 0) throw new NotFoundError('Adjudicator', id);
}

// === Declared conflicts ===

export function createConflict(db: Db, adjudicatorId: number, target: ConflictTarget): AdjudicatorConflict {
  const adjudicator = requireAdjudicator(db, adjudicatorId);

  const targetTournament = target.kind === 'team'
    ? requireTeam(db, target.teamId).tournamentId
    : requireInstitution(db, target.institutionId).tournamentId;
  if (targetTournament !== adjudicator.tournamentId) {
    throw new ValidationError(`Conflict target belongs to another tournament than adjudicator ${adjudicatorId}`);
  }

  const result = db.prepare(
    'INSERT INTO adjudicator_conflicts (adjudicator_id, team_id, institution_id) VALUES (?, ?, ?)'
  ).run(
    adjudicatorId,
    target.kind === 'team' ? target.teamId : null,
    target.kind === 'institution' ? target.institutionId : null,
  );
  return requireConflict(db, Number(result.lastInsertRowid));
}

export function requireConflict(db: Db, id: number): AdjudicatorConflict {
  const row = db.prepare<[number], ConflictRow>('SELECT * FROM adjudicator_conflicts WHERE id = ?').get(id);
  if (!row) throw new NotFoundError('Conflict', id);
  return toConflict(row);
}

export function listConflicts(db: Db, adjudicatorId: number): AdjudicatorConflict[] {
  return db.prepare<[number], ConflictRow>('SELECT * FROM adjudicator_conflicts WHERE adjudicator_id = ? ORDER BY id')
    .all(adjudicatorId)
    .map(toConflict);
}

export function listTournamentConflicts(db: Db, tournamentId: number): AdjudicatorConflict[] {
  return db.prepare<[number], ConflictRow>(`
    SELECT c.* FROM adjudicator_conflicts c
    JOIN adjudicators a ON a.id = c.adjudicator_id
    WHERE a.tournament_id = ?
    ORDER BY c.id
  `).all(tournamentId).map(toConflict);
}

export function deleteConflict(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM adjudicator_conflicts WHERE id = ?').run(id);
  if (result.changes === 0) throw new NotFoundError('Conflict', id);
}
