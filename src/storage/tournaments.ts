import { BYE_POLICIES, PAIRING_METHODS } from '../core/constants';
import { DataIntegrityError, NotFoundError } from '../core/errors';
import { ByePolicy, DrawConfig, PairingMethod, Tournament } from '../core/types';
import { validateDrawConfig } from '../engine/draw-config';
import { Db, FIRST_PAGE, Page, fromFlag, toFlag } from './database';

interface TournamentRow {
  id: number;
  name: string;
  abbreviation: string | null;
  sides_per_room: number;
  panel_size: number;
  avoid_institution_clash: number;
  bye_policy: string;
  pairing_method: string;
  tie_break_seed: number | null;
  max_swap_distance: number;
}

export interface NewTournament {
  name: string;
  abbreviation: string | null;
  settings: DrawConfig;
}

export interface TournamentPatch {
  name?: string;
  abbreviation?: string | null;
  settings?: Partial<DrawConfig>;
}

function parseByePolicy(value: string): ByePolicy {
  const policy = BYE_POLICIES.find(p => p === value);
  if (!policy) throw new DataIntegrityError(`Stored bye policy "${value}" is not recognised`);
  return policy;
}

function parsePairingMethod(value: string): PairingMethod {
  const method = PAIRING_METHODS.find(m => m === value);
  if (!method) throw new DataIntegrityError(`Stored pairing method "${value}" is not recognised`);
  return method;
}

function toTournament(row: TournamentRow): Tournament {
  return {
    id: row.id,
    name: row.name,
    abbreviation: row.abbreviation,
    settings: {
      sidesPerRoom: row.sides_per_room,
      panelSize: row.panel_size,
      avoidInstitutionClash: fromFlag(row.avoid_institution_clash),
      byePolicy: parseByePolicy(row.bye_policy),
      pairingMethod: parsePairingMethod(row.pairing_method),
      tieBreakSeed: row.tie_break_seed,
      maxSwapDistance: row.max_swap_distance,
    },
  };
}

function settingsParams(settings: DrawConfig) {
  return {
    sides_per_room: settings.sidesPerRoom,
    panel_size: settings.panelSize,
    avoid_institution_clash: toFlag(settings.avoidInstitutionClash),
    bye_policy: settings.byePolicy,
    pairing_method: settings.pairingMethod,
    tie_break_seed: settings.tieBreakSeed,
    max_swap_distance: settings.maxSwapDistance,
  };
}

export function createTournament(db: Db, input: NewTournament): Tournament {
  validateDrawConfig(input.settings);
  const result = db.prepare(`
    INSERT INTO tournaments (name, abbreviation, sides_per_room, panel_size, avoid_institution_clash, bye_policy, pairing_method, tie_break_seed, max_swap_distance)
    VALUES (@name, @abbreviation, @sides_per_room, @panel_size, @avoid_institution_clash, @bye_policy, @pairing_method, @tie_break_seed, @max_swap_distance)
  `).run({ name: input.name, abbreviation: input.abbreviation, ...settingsParams(input.settings) });
  return requireTournament(db, Number(result.lastInsertRowid));
}

export function getTournament(db: Db, id: number): Tournament | null {
  const row = db.prepare<[number], TournamentRow>('SELECT * FROM tournaments WHERE id = ?').get(id);
  return row ? toTournament(row) : null;
}

export function requireTournament(db: Db, id: number): Tournament {
  const tournament = getTournament(db, id);
  if (!tournament) throw new NotFoundError('Tournament', id);
  return tournament;
}

export function listTournaments(db: Db, page: Page = FIRST_PAGE): Tournament[] {
  return db.prepare<[number, number], TournamentRow>(
    'SELECT * FROM tournaments ORDER BY id LIMIT ? OFFSET ?'
  ).all(page.limit, page.offset).map(toTournament);
}

export function updateTournament(db: Db, id: number, patch: TournamentPatch): Tournament {
  const current = requireTournament(db, id);
  const next = {
    name: patch.name ?? current.name,
    abbreviation: patch.abbreviation !== undefined ? patch.abbreviation : current.abbreviation,
    settings: { ...current.settings, ...patch.settings },
  };
  validateDrawConfig(next.settings);
  db.prepare(`
    UPDATE tournaments SET
      name = @name, abbreviation = @abbreviation,
      sides_per_room = @sides_per_room, panel_size = @panel_size,
      avoid_institution_clash = @avoid_institution_clash, bye_policy = @bye_policy,
      pairing_method = @pairing_method, tie_break_seed = @tie_break_seed,
      max_swap_distance = @max_swap_distance
    WHERE id = @id
  `).run({ id, name: next.name, abbreviation: next.abbreviation, ...settingsParams(next.settings) });
  return requireTournament(db, id);
}

export function deleteTournament(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM tournaments WHERE id = ?').run(id);
  if (result.changes === 0) throw new NotFoundError('Tournament', id);
}
