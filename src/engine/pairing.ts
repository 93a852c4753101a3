import { BYE_BRACKET } from '../core/constants';
import { DataIntegrityError, InfeasibleConstraint, InfeasibleError } from '../core/errors';
import { DrawConfig, DrawRoom, History, Standing, pairKey } from '../core/types';
import { validateDrawConfig } from './draw-config';
import { IS_DRAW_DEBUG_ENABLED, drawLogger } from './draw-logger';
import { createRng, seededShuffle } from './rng';

interface WorkingRoom {
  bracket: number;
  teams: Standing[];
}

interface Violation {
  constraint: Exclude<InfeasibleConstraint, 'uneven-field' | 'panel-size'>;
  first: Standing;
  second: Standing;
}

interface SwapOption {
  mover: Standing;
  candidate: Standing;
  roomIndex: number;
  distance: number;
}

/**
 * Power-pair the next round.
 *
 * Teams are walked in rank order and grouped into brackets of equal points
 * (topped up with pull-ups from the next group), rooms are seeded inside each
 * bracket per `pairingMethod`, and every room is then checked top to bottom
 * against the hard constraints. A violating room gets at most one swap with a
 * team from the same or an adjacent bracket, closest rank first; if none
 * works the draw fails with {@link InfeasibleError} rather than emitting an
 * illegal room.
 */
export function generateDraw(
  standings: readonly Standing[],
  history: History,
  config: DrawConfig,
): DrawRoom[] {
  validateDrawConfig(config);
  const ordered = orderStandings(standings);

  const { byes, remaining } = assignByes(ordered, history, config);
  const brackets = formBrackets(remaining, config.sidesPerRoom);

  const rng = config.tieBreakSeed !== null ? createRng(config.tieBreakSeed) : null;
  const rooms: WorkingRoom[] = [];
  brackets.forEach((bracket, index) => {
    for (const teams of seedBracket(bracket, config, rng)) {
      rooms.push({ bracket: index, teams });
    }
  });

  if (IS_DRAW_DEBUG_ENABLED) {
    drawLogger.withMetadata({
      brackets: brackets.map(b => ({ points: b[0].points, ranks: b.map(s => s.rank) })),
      byes: byes.map(s => s.teamId),
    }).debug('Brackets formed');
  }

  const swaps = resolveConstraints(rooms, history, config);

  const draw: DrawRoom[] = rooms.map((room, index) => ({
    roomRank: index + 1,
    bracket: room.bracket,
    teamIds: room.teams.map(s => s.teamId),
    bye: false,
  }));

  for (const bye of byes) {
    draw.push({
      roomRank: draw.length + 1,
      bracket: BYE_BRACKET,
      teamIds: [bye.teamId],
      bye: true,
    });
  }

  drawLogger.withMetadata({
    teams: ordered.length,
    rooms: rooms.length,
    byes: byes.length,
    swaps,
  }).info('Draw generated');

  return draw;
}

/**
 * Every pair of teams in the room that breaks a hard constraint.
 */
export function findViolations(
  teams: readonly Standing[],
  history: History,
  avoidInstitutionClash: boolean,
): Violation[] {
  const violations: Violation[] = [];
  for (let i = 0; i < teams.length; i++) {
    for (let j = i + 1; j < teams.length; j++) {
      const first = teams[i];
      const second = teams[j];
      if (history.metPairs.has(pairKey(first.teamId, second.teamId))) {
        violations.push({ constraint: 'repeat-pairing', first, second });
      }
      if (
        avoidInstitutionClash &&
        first.institutionId !== null &&
        first.institutionId === second.institutionId
      ) {
        violations.push({ constraint: 'institution-clash', first, second });
      }
    }
  }
  return violations;
}

function orderStandings(standings: readonly Standing[]): Standing[] {
  const ordered = [...standings].sort((a, b) => a.rank - b.rank);
  const seen = new Set<number>();
  ordered.forEach((standing, index) => {
    if (seen.has(standing.teamId)) {
      throw new DataIntegrityError(`Team ${standing.teamId} appears twice in the standings`);
    }
    seen.add(standing.teamId);
    if (standing.rank !== index + 1) {
      throw new DataIntegrityError(
        `Standings must rank teams 1..${ordered.length} without gaps; found rank ${standing.rank} at position ${index + 1}`,
      );
    }
  });
  return ordered;
}

function assignByes(
  ordered: Standing[],
  history: History,
  config: DrawConfig,
): { byes: Standing[]; remaining: Standing[] } {
  const remainder = ordered.length % config.sidesPerRoom;
  if (remainder === 0) {
    return { byes: [], remaining: ordered };
  }

  if (config.byePolicy === 'no-bye') {
    throw new InfeasibleError(
      `${ordered.length} teams cannot be split into rooms of ${config.sidesPerRoom} and the bye policy allows no byes`,
      {
        stage: 'draw',
        constraint: 'uneven-field',
        roomRank: Math.ceil(ordered.length / config.sidesPerRoom),
        teamIds: ordered.slice(ordered.length - remainder).map(s => s.teamId),
      },
    );
  }

  // Lowest-ranked teams first, preferring those who have not had a bye yet.
  const chosen = new Set<number>();
  for (let i = ordered.length - 1; i >= 0 && chosen.size < remainder; i--) {
    if (!history.byeTeams.has(ordered[i].teamId)) chosen.add(ordered[i].teamId);
  }
  for (let i = ordered.length - 1; i >= 0 && chosen.size < remainder; i--) {
    chosen.add(ordered[i].teamId);
  }

  return {
    byes: ordered.filter(s => chosen.has(s.teamId)),
    remaining: ordered.filter(s => !chosen.has(s.teamId)),
  };
}

/**
 * Split rank-ordered teams into brackets of equal points. A bracket whose
 * size is not a multiple of the room size pulls up the top teams of the
 * groups below it.
 */
export function formBrackets(teams: readonly Standing[], sidesPerRoom: number): Standing[][] {
  const brackets: Standing[][] = [];
  let start = 0;

  while (start < teams.length) {
    const points = teams[start].points;
    let end = start;
    while (end < teams.length && teams[end].points === points) end++;

    const remainder = (end - start) % sidesPerRoom;
    if (remainder !== 0) {
      end = Math.min(teams.length, end + sidesPerRoom - remainder);
    }

    brackets.push(teams.slice(start, end));
    start = end;
  }

  return brackets;
}

/**
 * Split one bracket into rooms. `adjacent` takes consecutive ranks,
 * `folded` snakes top against bottom, `random` shuffles with the seeded
 * generator and then takes consecutive positions.
 */
export function seedBracket(
  bracket: readonly Standing[],
  config: DrawConfig,
  rng: (() => number) | null,
): Standing[][] {
  const sides = config.sidesPerRoom;
  const roomCount = bracket.length / sides;
  const rooms: Standing[][] = [];

  if (config.pairingMethod === 'folded') {
    for (let room = 0; room < roomCount; room++) {
      const teams: Standing[] = [];
      for (let side = 0; side < sides; side++) {
        const index = side % 2 === 0
          ? side * roomCount + room
          : (side + 1) * roomCount - 1 - room;
        teams.push(bracket[index]);
      }
      rooms.push(teams);
    }
    return rooms;
  }

  const lineup = config.pairingMethod === 'random' && rng
    ? seededShuffle(bracket, rng)
    : [...bracket];

  for (let room = 0; room < roomCount; room++) {
    rooms.push(lineup.slice(room * sides, room * sides + sides));
  }
  return rooms;
}

function resolveConstraints(rooms: WorkingRoom[], history: History, config: DrawConfig): number {
  let swaps = 0;

  for (let i = 0; i < rooms.length; i++) {
    const violations = findViolations(rooms[i].teams, history, config.avoidInstitutionClash);
    if (violations.length === 0) continue;

    const swap = findSwap(rooms, i, violations, history, config);
    if (!swap) {
      const { constraint, first, second } = violations[0];
      throw new InfeasibleError(
        `Room ${i + 1}: no swap within ${config.maxSwapDistance} ranks resolves the ${constraint} ` +
        `between teams ${first.teamId} and ${second.teamId}`,
        {
          stage: 'draw',
          constraint,
          roomRank: i + 1,
          teamIds: rooms[i].teams.map(s => s.teamId),
        },
      );
    }

    rooms[i].teams = rooms[i].teams.map(s => (s === swap.mover ? swap.candidate : s));
    const other = rooms[swap.roomIndex];
    other.teams = other.teams.map(s => (s === swap.candidate ? swap.mover : s));
    swaps++;

    if (IS_DRAW_DEBUG_ENABLED) {
      drawLogger.withMetadata({
        room: i + 1,
        otherRoom: swap.roomIndex + 1,
        moved: swap.mover.teamId,
        replacedBy: swap.candidate.teamId,
        distance: swap.distance,
        resolved: violations.map(v => v.constraint),
      }).debug('Swapped teams to resolve constraint');
    }
  }

  return swaps;
}

function findSwap(
  rooms: WorkingRoom[],
  roomIndex: number,
  violations: Violation[],
  history: History,
  config: DrawConfig,
): SwapOption | null {
  const room = rooms[roomIndex];
  const movers = new Map<number, Standing>();
  for (const v of violations) {
    movers.set(v.first.teamId, v.first);
    movers.set(v.second.teamId, v.second);
  }

  const options: SwapOption[] = [];
  for (const mover of movers.values()) {
    rooms.forEach((other, otherIndex) => {
      if (otherIndex === roomIndex) return;
      if (Math.abs(other.bracket - room.bracket) > 1) return;
      for (const candidate of other.teams) {
        const distance = Math.abs(candidate.rank - mover.rank);
        if (distance > config.maxSwapDistance) continue;
        options.push({ mover, candidate, roomIndex: otherIndex, distance });
      }
    });
  }

  options.sort((a, b) =>
    a.distance - b.distance ||
    b.mover.rank - a.mover.rank ||
    a.candidate.rank - b.candidate.rank,
  );

  for (const option of options) {
    const swapped = room.teams.map(s => (s === option.mover ? option.candidate : s));
    if (findViolations(swapped, history, config.avoidInstitutionClash).length > 0) continue;

    // Rooms above have already been settled and must stay legal.
    if (option.roomIndex < roomIndex) {
      const otherSwapped = rooms[option.roomIndex].teams.map(s => (s === option.candidate ? option.mover : s));
      if (findViolations(otherSwapped, history, config.avoidInstitutionClash).length > 0) continue;
    }

    return option;
  }

  return null;
}
