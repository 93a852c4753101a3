import { DataIntegrityError, InfeasibleError } from '../core/errors';
import {
  Adjudicator,
  AllocatedRoom,
  ConflictSets,
  DrawConfig,
  DrawRoom,
  PanelSeat,
  Team,
  relationKey,
} from '../core/types';
import { validateDrawConfig } from './draw-config';
import { IS_DRAW_DEBUG_ENABLED, drawLogger } from './draw-logger';

/**
 * Seat a panel in every non-bye room.
 *
 * Rooms are filled in room-rank order, each taking the most experienced
 * adjudicators still free who have no conflict with any team in the room.
 * The most experienced member chairs. A room that cannot be filled to
 * `panelSize` fails the whole allocation.
 */
export function allocatePanels(
  draw: readonly DrawRoom[],
  pool: readonly Adjudicator[],
  conflicts: ConflictSets,
  roster: readonly Team[],
  config: DrawConfig,
): AllocatedRoom[] {
  validateDrawConfig(config);

  const institutionOf = new Map<number, number | null>();
  for (const team of roster) institutionOf.set(team.id, team.institutionId);

  const seen = new Set<number>();
  for (const adjudicator of pool) {
    if (seen.has(adjudicator.id)) {
      throw new DataIntegrityError(`Adjudicator ${adjudicator.id} appears twice in the pool`);
    }
    seen.add(adjudicator.id);
  }

  const bySeniority = [...pool].sort((a, b) => b.experience - a.experience || a.id - b.id);
  const assigned = new Set<number>();
  const panels = new Map<number, PanelSeat[]>();

  const byImportance = [...draw].sort((a, b) => a.roomRank - b.roomRank);
  for (const room of byImportance) {
    if (room.bye) continue;

    for (const teamId of room.teamIds) {
      if (!institutionOf.has(teamId)) {
        throw new DataIntegrityError(`Room ${room.roomRank} lists team ${teamId}, which is not on the roster`);
      }
    }

    const panel: Adjudicator[] = [];
    for (const adjudicator of bySeniority) {
      if (panel.length === config.panelSize) break;
      if (assigned.has(adjudicator.id)) continue;
      if (isConflicted(adjudicator, room.teamIds, conflicts, institutionOf)) continue;
      panel.push(adjudicator);
    }

    if (panel.length < config.panelSize) {
      throw new InfeasibleError(
        `Room ${room.roomRank}: only ${panel.length} of ${config.panelSize} adjudicators are free of conflicts`,
        {
          stage: 'allocation',
          constraint: 'panel-size',
          roomRank: room.roomRank,
          teamIds: [...room.teamIds],
        },
      );
    }

    for (const adjudicator of panel) assigned.add(adjudicator.id);
    panels.set(room.roomRank, panel.map((adjudicator, index): PanelSeat => ({
      adjudicatorId: adjudicator.id,
      role: index === 0 ? 'chair' : 'panellist',
    })));

    if (IS_DRAW_DEBUG_ENABLED) {
      drawLogger.withMetadata({
        room: room.roomRank,
        panel: panel.map(a => ({ id: a.id, experience: a.experience })),
      }).debug('Panel seated');
    }
  }

  drawLogger.withMetadata({
    rooms: panels.size,
    seated: assigned.size,
    unused: pool.length - assigned.size,
  }).info('Panels allocated');

  return draw.map(room => ({ ...room, teamIds: [...room.teamIds], panel: panels.get(room.roomRank) ?? [] }));
}

/**
 * Whether seating the adjudicator in a room with these teams breaks a
 * conflict: prior judging or a declared conflict with a team, a declared
 * conflict with a team's institution, or (for non-independent adjudicators)
 * a shared institution.
 */
export function isConflicted(
  adjudicator: Adjudicator,
  teamIds: readonly number[],
  conflicts: ConflictSets,
  institutionOf: ReadonlyMap<number, number | null>,
): boolean {
  for (const teamId of teamIds) {
    if (conflicts.teams.has(relationKey(adjudicator.id, teamId))) return true;

    const institutionId = institutionOf.get(teamId) ?? null;
    if (institutionId === null) continue;
    if (conflicts.institutions.has(relationKey(adjudicator.id, institutionId))) return true;
    if (!adjudicator.independent && adjudicator.institutionId === institutionId) return true;
  }
  return false;
}
