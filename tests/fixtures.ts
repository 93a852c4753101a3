import {
  Adjudicator,
  Ballot,
  DrawConfig,
  History,
  Pairing,
  PanelSeat,
  RoundRecord,
  RoundStatus,
  Standing,
  Team,
} from '../src/core/types';

export function makeConfig(overrides: Partial<DrawConfig> = {}): DrawConfig {
  return {
    sidesPerRoom: 2,
    panelSize: 1,
    avoidInstitutionClash: true,
    byePolicy: 'lowest-rank-bye',
    pairingMethod: 'adjacent',
    tieBreakSeed: null,
    maxSwapDistance: 8,
    ...overrides,
  };
}

/** Teams 1..count; `institutions[i]` is team i+1's institution. */
export function makeTeams(count: number, institutions: (number | null)[] = []): Team[] {
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    tournamentId: 1,
    name: `Team ${i + 1}`,
    abbreviation: null,
    institutionId: institutions[i] ?? null,
    speakerIds: [],
  }));
}

/** Standings in the given order, ranked 1..n. */
export function makeStandings(
  teamIds: number[],
  options: { points?: number[]; institutions?: (number | null)[] } = {},
): Standing[] {
  return teamIds.map((teamId, index) => ({
    teamId,
    institutionId: options.institutions?.[index] ?? null,
    rank: index + 1,
    points: options.points?.[index] ?? 0,
    speakerScore: 0,
    tieBreakKey: teamId,
    roundsDebated: 0,
  }));
}

export function makeHistory(overrides: Partial<History> = {}): History {
  return {
    metPairs: new Set<string>(),
    metInstitutions: new Set<string>(),
    judgedTeams: new Set<string>(),
    judgedInstitutions: new Set<string>(),
    byeTeams: new Set<number>(),
    ...overrides,
  };
}

export function makeAdjudicator(id: number, overrides: Partial<Adjudicator> = {}): Adjudicator {
  return {
    id,
    tournamentId: 1,
    name: `Adjudicator ${id}`,
    institutionId: null,
    experience: 0,
    independent: false,
    active: true,
    ...overrides,
  };
}

export interface RoomSpec {
  teamIds: number[];
  panel?: number[];
  bye?: boolean;
  /** Per team: [points, speakerScore], in `teamIds` order. */
  results?: [number, number][];
}

/**
 * A round with one pairing per room (pairing ids start at `firstPairingId`)
 * and one version-1 ballot for every room that has results.
 */
export function makeRound(
  id: number,
  sequence: number,
  rooms: RoomSpec[],
  status: RoundStatus = 'completed',
  firstPairingId = id * 100,
): RoundRecord {
  const pairings: Pairing[] = rooms.map((room, index): Pairing => ({
    id: firstPairingId + index,
    roundId: id,
    roomRank: index + 1,
    teamIds: room.teamIds,
    bye: room.bye ?? false,
    panel: (room.panel ?? []).map((adjudicatorId, seat): PanelSeat => ({
      adjudicatorId,
      role: seat === 0 ? 'chair' : 'panellist',
    })),
  }));

  const ballots: Ballot[] = [];
  rooms.forEach((room, index) => {
    if (!room.results) return;
    const results = room.results;
    ballots.push({
      id: firstPairingId + index,
      pairingId: firstPairingId + index,
      adjudicatorId: room.panel?.[0] ?? null,
      version: 1,
      teamResults: room.teamIds.map((teamId, side) => ({
        teamId,
        points: results[side][0],
        speakerScore: results[side][1],
      })),
      speakerScores: [],
    });
  });

  return {
    round: { id, tournamentId: 1, sequence, name: `Round ${sequence}`, abbreviation: null, status },
    pairings,
    ballots,
  };
}
