// === REGISTRATION ===

export interface Tournament {
  id: number;
  name: string;
  abbreviation: string | null;
  settings: DrawConfig;
}

export interface Institution {
  id: number;
  tournamentId: number;
  name: string;
  abbreviation: string | null;
}

export interface Team {
  id: number;
  tournamentId: number;
  name: string;
  abbreviation: string | null;
  institutionId: number | null;   // null for independent (composite) teams
  speakerIds: number[];           // member order
}

export interface Speaker {
  id: number;
  teamId: number;
  name: string;
}

export interface Adjudicator {
  id: number;
  tournamentId: number;
  name: string;
  institutionId: number | null;
  experience: number;             // ordinal, higher = more senior
  independent: boolean;           // exempt from institution conflicts
  active: boolean;                // inactive adjudicators stay out of the pool
}

export type ConflictTarget =
  | { kind: 'team'; teamId: number }
  | { kind: 'institution'; institutionId: number };

export interface AdjudicatorConflict {
  id: number;
  adjudicatorId: number;
  target: ConflictTarget;
}

/** A tournament-scoped label for speakers and adjudicators (e.g. novice, ESL). */
export interface Tag {
  id: number;
  tournamentId: number;
  name: string;
}

// === ROUNDS ===

export type RoundStatus = 'pending' | 'drawn' | 'in-progress' | 'completed';

export interface Round {
  id: number;
  tournamentId: number;
  sequence: number;               // 1-based, no gaps
  name: string;
  abbreviation: string | null;
  status: RoundStatus;
}

export interface Motion {
  id: number;
  roundId: number;
  text: string;
  infoslide: string | null;
}

export type PanelRole = 'chair' | 'panellist';

export interface PanelSeat {
  adjudicatorId: number;
  role: PanelRole;
}

export interface Pairing {
  id: number;
  roundId: number;
  roomRank: number;               // 1 = most important room
  teamIds: number[];              // side order
  bye: boolean;
  panel: PanelSeat[];
}

export interface BallotTeamResult {
  teamId: number;
  points: number;                 // team points; 1 for a win in a two-team room
  speakerScore: number;
}

export interface BallotSpeakerScore {
  speakerId: number;
  position: number;
  score: number;
}

export interface Ballot {
  id: number;
  pairingId: number;
  adjudicatorId: number | null;
  version: number;
  teamResults: BallotTeamResult[];
  speakerScores: BallotSpeakerScore[];
}

/**
 * Everything the engine needs to know about one round: the round itself,
 * its rooms, and every ballot submitted against them.
 */
export interface RoundRecord {
  round: Round;
  pairings: Pairing[];
  ballots: Ballot[];
}

// === DRAW CONFIGURATION ===

export type ByePolicy = 'lowest-rank-bye' | 'no-bye';

export type PairingMethod = 'adjacent' | 'folded' | 'random';

export interface DrawConfig {
  sidesPerRoom: number;
  panelSize: number;
  avoidInstitutionClash: boolean;
  byePolicy: ByePolicy;
  pairingMethod: PairingMethod;
  tieBreakSeed: number | null;
  maxSwapDistance: number;
}

// === DERIVED SNAPSHOTS ===

export interface Standing {
  teamId: number;
  institutionId: number | null;
  rank: number;                   // 1..n, unique
  points: number;
  speakerScore: number;
  tieBreakKey: number;
  roundsDebated: number;
}

export interface History {
  /** Unordered team pairs, keyed by {@link pairKey}. */
  metPairs: ReadonlySet<string>;
  /** (team, institution of a past opponent), keyed by {@link relationKey}. */
  metInstitutions: ReadonlySet<string>;
  /** (adjudicator, team), keyed by {@link relationKey}. */
  judgedTeams: ReadonlySet<string>;
  /** (adjudicator, institution), keyed by {@link relationKey}. */
  judgedInstitutions: ReadonlySet<string>;
  byeTeams: ReadonlySet<number>;
}

export interface ConflictSets {
  /** (adjudicator, team) pairs the allocator must never seat together. */
  teams: ReadonlySet<string>;
  /** (adjudicator, institution) pairs declared as conflicts. */
  institutions: ReadonlySet<string>;
}

// === DRAW OUTPUT ===

export interface DrawRoom {
  roomRank: number;
  bracket: number;                // 0 = top bracket, -1 for byes
  teamIds: number[];
  bye: boolean;
}

export interface AllocatedRoom extends DrawRoom {
  panel: PanelSeat[];
}

export interface RoundDraw {
  roundId: number;
  standings: Standing[];
  rooms: AllocatedRoom[];
}

// === KEYS ===

export function pairKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

export function relationKey(owner: number, other: number): string {
  return `${owner}>${other}`;
}
