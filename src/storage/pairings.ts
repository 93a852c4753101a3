import { NotFoundError } from '../core/errors';
import { AllocatedRoom, Pairing, PanelRole } from '../core/types';
import { Db, fromFlag, toFlag } from './database';

interface PairingRow {
  id: number;
  round_id: number;
  room_rank: number;
  bye: number;
}

interface PairingTeamRow {
  pairing_id: number;
  team_id: number;
}

interface PanelSeatRow {
  pairing_id: number;
  adjudicator_id: number;
  role: PanelRole;
}

function assemble(db: Db, rows: PairingRow[]): Pairing[] {
  if (rows.length === 0) return [];

  const pairings = new Map<number, Pairing>();
  for (const row of rows) {
    pairings.set(row.id, {
      id: row.id,
      roundId: row.round_id,
      roomRank: row.room_rank,
      teamIds: [],
      bye: fromFlag(row.bye),
      panel: [],
    });
  }

  const ids = [...pairings.keys()];
  const placeholders = ids.map(() => '?').join(', ');

  const teams = db.prepare<number[], PairingTeamRow>(
    `SELECT pairing_id, team_id FROM pairing_teams WHERE pairing_id IN (${placeholders}) ORDER BY pairing_id, side`
  ).all(...ids);
  for (const row of teams) pairings.get(row.pairing_id)?.teamIds.push(row.team_id);

  const seats = db.prepare<number[], PanelSeatRow>(
    `SELECT pairing_id, adjudicator_id, role FROM panel_seats WHERE pairing_id IN (${placeholders}) ORDER BY pairing_id, seat`
  ).all(...ids);
  for (const row of seats) {
    pairings.get(row.pairing_id)?.panel.push({ adjudicatorId: row.adjudicator_id, role: row.role });
  }

  return [...pairings.values()];
}

/**
 * Write every room of a draw. Callers wrap this in the same transaction as
 * the round's status change.
 */
export function insertDraw(db: Db, roundId: number, rooms: readonly AllocatedRoom[]): Pairing[] {
  const insertPairing = db.prepare('INSERT INTO pairings (round_id, room_rank, bye) VALUES (?, ?, ?)');
  const insertTeam = db.prepare('INSERT INTO pairing_teams (pairing_id, team_id, side) VALUES (?, ?, ?)');
  const insertSeat = db.prepare('INSERT INTO panel_seats (pairing_id, adjudicator_id, role, seat) VALUES (?, ?, ?, ?)');

  for (const room of rooms) {
    const pairingId = Number(insertPairing.run(roundId, room.roomRank, toFlag(room.bye)).lastInsertRowid);
    room.teamIds.forEach((teamId, side) => insertTeam.run(pairingId, teamId, side));
    room.panel.forEach((seat, index) => insertSeat.run(pairingId, seat.adjudicatorId, seat.role, index));
  }

  return listPairings(db, roundId);
}

export function listPairings(db: Db, roundId: number): Pairing[] {
  const rows = db.prepare<[number], PairingRow>('SELECT * FROM pairings WHERE round_id = ? ORDER BY room_rank')
    .all(roundId);
  return assemble(db, rows);
}

export function requirePairing(db: Db, id: number): Pairing {
  const row = db.prepare<[number], PairingRow>('SELECT * FROM pairings WHERE id = ?').get(id);
  if (!row) throw new NotFoundError('Pairing', id);
  return assemble(db, [row])[0];
}

export function deletePairings(db: Db, roundId: number): number {
  return db.prepare('DELETE FROM pairings WHERE round_id = ?').run(roundId).changes;
}
