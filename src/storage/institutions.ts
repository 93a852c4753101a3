import { NotFoundError } from '../core/errors';
import { Institution } from '../core/types';
import { Db, FIRST_PAGE, Page } from './database';
import { requireTournament } from './tournaments';

interface InstitutionRow {
  id: number;
  tournament_id: number;
  name: string;
  abbreviation: string | null;
}

export interface NewInstitution {
  tournamentId: number;
  name: string;
  abbreviation: string | null;
}

function toInstitution(row: InstitutionRow): Institution {
  return {
    id: row.id,
    tournamentId: row.tournament_id,
    name: row.name,
    abbreviation: row.abbreviation,
  };
}

export function createInstitution(db: Db, input: NewInstitution): Institution {
  requireTournament(db, input.tournamentId);
  const result = db.prepare(
    'INSERT INTO institutions (tournament_id, name, abbreviation) VALUES (?, ?, ?)'
  ).run(input.tournamentId, input.name, input.abbreviation);
  return requireInstitution(db, Number(result.lastInsertRowid));
}

export function getInstitution(db: Db, id: number): Institution | null {
  const row = db.prepare<[number], InstitutionRow>('SELECT * FROM institutions WHERE id = ?').get(id);
  return row ? toInstitution(row) : null;
}

export function requireInstitution(db: Db, id: number): Institution {
  const institution = getInstitution(db, id);
  if (!institution) throw new NotFoundError('Institution', id);
  return institution;
}

export function listInstitutions(db: Db, tournamentId: number | null, page: Page = FIRST_PAGE): Institution[] {
  return db.prepare<[number | null, number | null, number, number], InstitutionRow>(`
    SELECT * FROM institutions
    WHERE (? IS NULL OR tournament_id = ?)
    ORDER BY id LIMIT ? OFFSET ?
  `).all(tournamentId, tournamentId, page.limit, page.offset).map(toInstitution);
}

/**
 * Fails with a foreign-key violation while a team or adjudicator still
 * belongs to the institution.
 */
export function deleteInstitution(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM institutions WHERE id = ?').run(id);
  if (result.changes === 0) throw new NotFoundError('Institution', id);
}
