import { NotFoundError, ValidationError } from '../core/errors';
import { Speaker, Team } from '../core/types';
import { Db, FIRST_PAGE, Page } from './database';
import { requireInstitution } from './institutions';
import { requireTournament } from './tournaments';

interface TeamRow {
  id: number;
  tournament_id: number;
  institution_id: number | null;
  name: string;
  abbreviation: string | null;
}

interface SpeakerRow {
  id: number;
  team_id: number;
  name: string;
}

export interface NewTeam {
  tournamentId: number;
  name: string;
  abbreviation: string | null;
  institutionId: number | null;
  speakers: string[];
}

export interface TeamPatch {
  name?: string;
  abbreviation?: string | null;
  institutionId?: number | null;
}

export interface TeamFilter {
  tournamentId: number | null;
  name: string | null;
}

function toSpeaker(row: SpeakerRow): Speaker {
  return { id: row.id, teamId: row.team_id, name: row.name };
}

function speakerIdsOf(db: Db, teamId: number): number[] {
  return db.prepare<[number], { id: number }>('SELECT id FROM speakers WHERE team_id = ? ORDER BY id')
    .all(teamId)
    .map(row => row.id);
}

function toTeam(db: Db, row: TeamRow): Team {
  return {
    id: row.id,
    tournamentId: row.tournament_id,
    name: row.name,
    abbreviation: row.abbreviation,
    institutionId: row.institution_id,
    speakerIds: speakerIdsOf(db, row.id),
  };
}

function assertInstitutionInTournament(db: Db, institutionId: number | null, tournamentId: number): void {
  if (institutionId === null) return;
  const institution = requireInstitution(db, institutionId);
  if (institution.tournamentId !== tournamentId) {
    throw new ValidationError(`Institution ${institutionId} belongs to another tournament`);
  }
}

// === Teams ===

export function createTeam(db: Db, input: NewTeam): Team {
  requireTournament(db, input.tournamentId);
  assertInstitutionInTournament(db, input.institutionId, input.tournamentId);

  const insert = db.transaction((team: NewTeam): number => {
    const result = db.prepare(
      'INSERT INTO teams (tournament_id, institution_id, name, abbreviation) VALUES (?, ?, ?, ?)'
    ).run(team.tournamentId, team.institutionId, team.name, team.abbreviation);
    const teamId = Number(result.lastInsertRowid);
    const addSpeaker = db.prepare('INSERT INTO speakers (team_id, name) VALUES (?, ?)');
    for (const name of team.speakers) addSpeaker.run(teamId, name);
    return teamId;
  });

  return requireTeam(db, insert(input));
}

export function getTeam(db: Db, id: number): Team | null {
  const row = db.prepare<[number], TeamRow>('SELECT * FROM teams WHERE id = ?').get(id);
  return row ? toTeam(db, row) : null;
}

export function requireTeam(db: Db, id: number): Team {
  const team = getTeam(db, id);
  if (!team) throw new NotFoundError('Team', id);
  return team;
}

export function listTeams(db: Db, filter: TeamFilter, page: Page = FIRST_PAGE): Team[] {
  return db.prepare<[number | null, number | null, string | null, string | null, number, number], TeamRow>(`
    SELECT * FROM teams
    WHERE (? IS NULL OR tournament_id = ?) AND (? IS NULL OR name = ?)
    ORDER BY id LIMIT ? OFFSET ?
  `).all(filter.tournamentId, filter.tournamentId, filter.name, filter.name, page.limit, page.offset)
    .map(row => toTeam(db, row));
}

/** Every team of a tournament, unpaginated, for draw snapshots. */
export function listTournamentTeams(db: Db, tournamentId: number): Team[] {
  return db.prepare<[number], TeamRow>('SELECT * FROM teams WHERE tournament_id = ? ORDER BY id')
    .all(tournamentId)
    .map(row => toTeam(db, row));
}

export function updateTeam(db: Db, id: number, patch: TeamPatch): Team {
  const current = requireTeam(db, id);
  const institutionId = patch.institutionId !== undefined ? patch.institutionId : current.institutionId;
  assertInstitutionInTournament(db, institutionId, current.tournamentId);

  db.prepare('UPDATE teams SET name = ?, abbreviation = ?, institution_id = ? WHERE id = ?').run(
    patch.name ?? current.name,
    patch.abbreviation !== undefined ? patch.abbreviation : current.abbreviation,
    institutionId,
    id,
  );
  return requireTeam(db, id);
}

export function deleteTeam(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM teams WHERE id = ?').run(id);
  if (result.changes === 0) throw new NotFoundError('Team', id);
}

// === Speakers ===

export function createSpeaker(db: Db, teamId: number, name: string): Speaker {
  requireTeam(db, teamId);
  const result = db.prepare('INSERT INTO speakers (team_id, name) VALUES (?, ?)').run(teamId, name);
  return requireSpeaker(db, Number(result.lastInsertRowid));
}

export function getSpeaker(db: Db, id: number): Speaker | null {
  const row = db.prepare<[number], SpeakerRow>('SELECT * FROM speakers WHERE id = ?').get(id);
  return row ? toSpeaker(row) : null;
}

export function requireSpeaker(db: Db, id: number): Speaker {
  const speaker = getSpeaker(db, id);
  if (!speaker) throw new NotFoundError('Speaker', id);
  return speaker;
}

export function listSpeakers(db: Db, teamId: number | null, page: Page = FIRST_PAGE): Speaker[] {
  return db.prepare<[number | null, number | null, number, number], SpeakerRow>(`
    SELECT * FROM speakers
    WHERE (? IS NULL OR team_id = ?)
    ORDER BY id LIMIT ? OFFSET ?
  `).all(teamId, teamId, page.limit, page.offset).map(toSpeaker);
}

export function deleteSpeaker(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM speakers WHERE id = ?').run(id);
  if (result.changes === 0) throw new NotFoundError('Speaker', id);
}
