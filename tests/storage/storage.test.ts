import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { ConfigurationError, NotFoundError, RoundStateError, ValidationError } from '../../src/core/errors';
import { constraintViolationMessage } from '../../src/server/constraint-messages';
import {
  createConflict,
  listConflicts,
  listTournamentConflicts,
  updateAdjudicator,
} from '../../src/storage/adjudicators';
import { createBallot, listBallots } from '../../src/storage/ballots';
import { Db } from '../../src/storage/database';
import { createInstitution, deleteInstitution } from '../../src/storage/institutions';
import { insertDraw, listPairings } from '../../src/storage/pairings';
import { createRound, deleteRound, listRounds, writeRoundStatus } from '../../src/storage/rounds';
import { loadTournamentSnapshot } from '../../src/storage/snapshot';
import {
  addAdjudicatorsToTag,
  addSpeakersToTag,
  createTag,
  deleteTag,
  listTagAdjudicators,
  listTagSpeakers,
  listTags,
  removeAdjudicatorFromTag,
  updateTag,
} from '../../src/storage/tags';
import { createTeam, deleteSpeaker, getTeam, listSpeakers, listTeams, updateTeam } from '../../src/storage/teams';
import {
  createTournament,
  deleteTournament,
  getTournament,
  listTournaments,
  updateTournament,
} from '../../src/storage/tournaments';
import { openTestDatabase, seedTournament } from '../db-fixtures';
import { makeConfig } from '../fixtures';

function sqliteErrorOf(run: () => unknown): InstanceType<typeof Database.SqliteError> {
  try {
    run();
  } catch (error) {
    if (error instanceof Database.SqliteError) return error;
    throw error;
  }
  throw new Error('expected a SqliteError');
}

describe('storage', () => {
  let db: Db;

  beforeEach(() => {
    db = openTestDatabase();
  });

  afterEach(() => {
    db.close();
  });

  describe('tournaments', () => {
    it('stores and reads back draw settings', () => {
      const settings = makeConfig({ sidesPerRoom: 4, pairingMethod: 'folded', tieBreakSeed: 11 });
      const created = createTournament(db, { name: 'Spring Open', abbreviation: null, settings });

      expect(getTournament(db, created.id)).toEqual({
        id: created.id,
        name: 'Spring Open',
        abbreviation: null,
        settings,
      });
      expect(listTournaments(db).map(t => t.name)).toEqual(['Spring Open']);
    });

    it('merges a partial settings patch', () => {
      const { tournament } = seedTournament(db, 0, []);
      const updated = updateTournament(db, tournament.id, { settings: { panelSize: 3 } });

      expect(updated.settings).toEqual(makeConfig({ panelSize: 3 }));
      expect(updated.name).toBe('Test Open');
    });

    it('refuses settings the engine cannot run with', () => {
      const { tournament } = seedTournament(db, 0, []);
      expect(() => updateTournament(db, tournament.id, { settings: { pairingMethod: 'random' } }))
        .toThrow(ConfigurationError);
    });

    it('cascades a delete to everything the tournament owns', () => {
      const { tournament, teams } = seedTournament(db, 2, [1]);
      deleteTournament(db, tournament.id);

      expect(getTournament(db, tournament.id)).toBeNull();
      expect(getTeam(db, teams[0].id)).toBeNull();
      expect(() => deleteTournament(db, tournament.id)).toThrow(NotFoundError);
    });
  });

  describe('teams and speakers', () => {
    it('keeps speakers in registration order', () => {
      const { teams } = seedTournament(db, 1, []);
      const speakers = listSpeakers(db, teams[0].id);

      expect(speakers.map(s => s.name)).toEqual(['Speaker 1A', 'Speaker 1B']);
      expect(teams[0].speakerIds).toEqual(speakers.map(s => s.id));
    });

    it('rejects a duplicate team name with a readable message', () => {
      const { tournament } = seedTournament(db, 1, []);
      const error = sqliteErrorOf(() => createTeam(db, {
        tournamentId: tournament.id,
        name: 'Team 1',
        abbreviation: null,
        institutionId: null,
        speakers: [],
      }));

      expect(error.code).toBe('SQLITE_CONSTRAINT_UNIQUE');
      expect(constraintViolationMessage(error.message)).toBe('A team with this name already exists in this tournament');
    });

    it('filters by name', () => {
      const { tournament } = seedTournament(db, 3, []);
      const found = listTeams(db, { tournamentId: tournament.id, name: 'Team 2' });
      expect(found.map(t => t.name)).toEqual(['Team 2']);
    });

    it('rejects an institution from another tournament', () => {
      const { teams } = seedTournament(db, 1, []);
      const other = seedTournament(db, 0, []);
      const institution = createInstitution(db, { tournamentId: other.tournament.id, name: 'Elsewhere', abbreviation: null });

      expect(() => updateTeam(db, teams[0].id, { institutionId: institution.id })).toThrow(ValidationError);
    });

    it('refuses to delete an institution that still has teams', () => {
      const { tournament, teams } = seedTournament(db, 1, []);
      const institution = createInstitution(db, { tournamentId: tournament.id, name: 'North', abbreviation: 'N' });
      updateTeam(db, teams[0].id, { institutionId: institution.id });

      const error = sqliteErrorOf(() => deleteInstitution(db, institution.id));
      expect(constraintViolationMessage(error.message)).toBe('Referenced resource does not exist or is still in use');
    });
  });

  describe('adjudicators and conflicts', () => {
    it('stores declared conflicts of both kinds', () => {
      const { tournament, teams, adjudicators } = seedTournament(db, 1, [3]);
      const institution = createInstitution(db, { tournamentId: tournament.id, name: 'North', abbreviation: null });

      createConflict(db, adjudicators[0].id, { kind: 'team', teamId: teams[0].id });
      createConflict(db, adjudicators[0].id, { kind: 'institution', institutionId: institution.id });

      expect(listConflicts(db, adjudicators[0].id).map(c => c.target)).toEqual([
        { kind: 'team', teamId: teams[0].id },
        { kind: 'institution', institutionId: institution.id },
      ]);
      expect(listTournamentConflicts(db, tournament.id)).toHaveLength(2);
    });

    it('rejects the same conflict twice', () => {
      const { teams, adjudicators } = seedTournament(db, 1, [3]);
      createConflict(db, adjudicators[0].id, { kind: 'team', teamId: teams[0].id });

      const error = sqliteErrorOf(() => createConflict(db, adjudicators[0].id, { kind: 'team', teamId: teams[0].id }));
      expect(constraintViolationMessage(error.message)).toBe('This conflict is already declared');
    });

    it('patches only the given fields', () => {
      const { adjudicators } = seedTournament(db, 0, [3]);
      const updated = updateAdjudicator(db, adjudicators[0].id, { active: false });

      expect(updated).toEqual({ ...adjudicators[0], active: false });
    });
  });

  describe('rounds', () => {
    it('appends rounds in sequence', () => {
      const { tournament } = seedTournament(db, 0, []);
      createRound(db, { tournamentId: tournament.id, sequence: null, name: 'Round 1', abbreviation: 'R1' });
      const second = createRound(db, { tournamentId: tournament.id, sequence: 2, name: 'Round 2', abbreviation: 'R2' });

      expect(second.sequence).toBe(2);
      expect(second.status).toBe('pending');
      expect(() => createRound(db, { tournamentId: tournament.id, sequence: 5, name: 'Round 5', abbreviation: null }))
        .toThrow('The next round of tournament 1 must have sequence 3');
    });

    it('filters by status', () => {
      const { tournament } = seedTournament(db, 0, []);
      const first = createRound(db, { tournamentId: tournament.id, sequence: null, name: 'Round 1', abbreviation: null });
      createRound(db, { tournamentId: tournament.id, sequence: null, name: 'Round 2', abbreviation: null });
      writeRoundStatus(db, first.id, 'completed');

      const pending = listRounds(db, { tournamentId: tournament.id, status: 'pending' });
      expect(pending.map(r => r.name)).toEqual(['Round 2']);
    });

    it('deletes only the last pending round', () => {
      const { tournament } = seedTournament(db, 0, []);
      const first = createRound(db, { tournamentId: tournament.id, sequence: null, name: 'Round 1', abbreviation: null });
      const second = createRound(db, { tournamentId: tournament.id, sequence: null, name: 'Round 2', abbreviation: null });

      expect(() => deleteRound(db, first.id)).toThrow(RoundStateError);
      deleteRound(db, second.id);
      expect(listRounds(db, { tournamentId: tournament.id, status: null })).toHaveLength(1);
    });
  });

  describe('pairings and ballots', () => {
    function drawnRound() {
      const seeded = seedTournament(db, 3, [5]);
      const [t1, t2, t3] = seeded.teams;
      const round = createRound(db, { tournamentId: seeded.tournament.id, sequence: null, name: 'Round 1', abbreviation: null });
      const pairings = insertDraw(db, round.id, [
        { roomRank: 1, bracket: 0, teamIds: [t1.id, t2.id], bye: false, panel: [{ adjudicatorId: seeded.adjudicators[0].id, role: 'chair' }] },
        { roomRank: 2, bracket: -1, teamIds: [t3.id], bye: true, panel: [] },
      ]);
      return { ...seeded, round, pairings };
    }

    it('reads back rooms with side order and panel', () => {
      const { round, pairings, teams, adjudicators } = drawnRound();

      expect(listPairings(db, round.id)).toEqual(pairings);
      expect(pairings[0]).toEqual({
        id: pairings[0].id,
        roundId: round.id,
        roomRank: 1,
        teamIds: [teams[0].id, teams[1].id],
        bye: false,
        panel: [{ adjudicatorId: adjudicators[0].id, role: 'chair' }],
      });
      expect(pairings[1].bye).toBe(true);
    });

    it('numbers resubmitted ballots as new versions', () => {
      const { pairings, teams, adjudicators } = drawnRound();
      const input = {
        pairingId: pairings[0].id,
        adjudicatorId: adjudicators[0].id,
        teamResults: [
          { teamId: teams[0].id, points: 1, speakerScore: 151 },
          { teamId: teams[1].id, points: 0, speakerScore: 149 },
        ],
        speakerScores: [{ speakerId: teams[0].speakerIds[0], position: 1, score: 76 }],
      };

      const first = createBallot(db, input);
      const second = createBallot(db, input);

      expect([first.version, second.version]).toEqual([1, 2]);
      expect(second.teamResults).toEqual(input.teamResults);
      expect(second.speakerScores).toEqual(input.speakerScores);
      expect(listBallots(db, { pairingId: pairings[0].id, adjudicatorId: null })).toHaveLength(2);
    });

    it('rejects a ballot that does not score exactly the room', () => {
      const { pairings, teams } = drawnRound();
      expect(() => createBallot(db, {
        pairingId: pairings[0].id,
        adjudicatorId: null,
        teamResults: [
          { teamId: teams[0].id, points: 1, speakerScore: 150 },
          { teamId: teams[2].id, points: 0, speakerScore: 150 },
        ],
        speakerScores: [],
      })).toThrow(ValidationError);
    });

    it('rejects a ballot for a bye', () => {
      const { pairings, teams } = drawnRound();
      expect(() => createBallot(db, {
        pairingId: pairings[1].id,
        adjudicatorId: null,
        teamResults: [{ teamId: teams[2].id, points: 1, speakerScore: 150 }],
        speakerScores: [],
      })).toThrow(`Pairing ${pairings[1].id} is a bye and takes no ballots`);
    });

    it('rejects a ballot from an adjudicator off the panel', () => {
      const { pairings, teams, tournament } = drawnRound();
      const outsider = seedTournament(db, 0, [1]).adjudicators[0];
      expect(tournament.id).not.toBe(outsider.tournamentId);

      expect(() => createBallot(db, {
        pairingId: pairings[0].id,
        adjudicatorId: outsider.id,
        teamResults: [
          { teamId: teams[0].id, points: 1, speakerScore: 150 },
          { teamId: teams[1].id, points: 0, speakerScore: 150 },
        ],
        speakerScores: [],
      })).toThrow(ValidationError);
    });
  });

  describe('loadTournamentSnapshot', () => {
    it('gathers roster, pool and every round with its pairings', () => {
      const { tournament, teams, adjudicators } = seedTournament(db, 2, [4, 2]);
      const round = createRound(db, { tournamentId: tournament.id, sequence: null, name: 'Round 1', abbreviation: null });
      insertDraw(db, round.id, [
        { roomRank: 1, bracket: 0, teamIds: [teams[0].id, teams[1].id], bye: false, panel: [{ adjudicatorId: adjudicators[0].id, role: 'chair' }] },
      ]);

      const snapshot = loadTournamentSnapshot(db, tournament.id);
      expect(snapshot.roster).toEqual(teams);
      expect(snapshot.adjudicators).toEqual(adjudicators);
      expect(snapshot.rounds).toHaveLength(1);
      expect(snapshot.rounds[0].pairings[0].teamIds).toEqual([teams[0].id, teams[1].id]);
      expect(snapshot.rounds[0].ballots).toEqual([]);
    });
  });

  describe('tags', () => {
    it('filters by tournament and by a case-insensitive name fragment', () => {
      const { tournament } = seedTournament(db, 0, []);
      const other = seedTournament(db, 0, []);
      createTag(db, { tournamentId: tournament.id, name: 'Novice' });
      createTag(db, { tournamentId: tournament.id, name: 'ESL' });
      createTag(db, { tournamentId: other.tournament.id, name: 'Novice break' });

      const filter = { tournamentId: null, name: 'novice', speakerId: null, adjudicatorId: null };
      expect(listTags(db, filter).map(t => t.name)).toEqual(['Novice', 'Novice break']);
      expect(listTags(db, { ...filter, tournamentId: tournament.id }).map(t => t.name)).toEqual(['Novice']);
    });

    it('renames and deletes', () => {
      const { tournament } = seedTournament(db, 0, []);
      const tag = createTag(db, { tournamentId: tournament.id, name: 'Novice' });

      expect(updateTag(db, tag.id, { name: 'Novices' })).toEqual({ ...tag, name: 'Novices' });
      deleteTag(db, tag.id);
      expect(() => deleteTag(db, tag.id)).toThrow(`Tag ${tag.id} not found`);
    });

    it('tags speakers and finds tags by speaker', () => {
      const { tournament, teams } = seedTournament(db, 2, []);
      const [first, second] = [teams[0].speakerIds[0], teams[1].speakerIds[1]];
      const tag = createTag(db, { tournamentId: tournament.id, name: 'ESL' });

      const members = addSpeakersToTag(db, tag.id, [second, first]);

      expect(members.map(s => s.id)).toEqual([first, second]);
      expect(listTags(db, { tournamentId: null, name: null, speakerId: second, adjudicatorId: null }))
        .toEqual([tag]);
    });

    it('rejects tagging a speaker twice', () => {
      const { tournament, teams } = seedTournament(db, 1, []);
      const speakerId = teams[0].speakerIds[0];
      const tag = createTag(db, { tournamentId: tournament.id, name: 'ESL' });
      addSpeakersToTag(db, tag.id, [speakerId]);

      const error = sqliteErrorOf(() => addSpeakersToTag(db, tag.id, [speakerId]));
      expect(constraintViolationMessage(error.message)).toBe('This speaker already has this tag');
    });

    it('adds no speaker when one of the batch is from another tournament', () => {
      const { tournament, teams } = seedTournament(db, 1, []);
      const outsider = seedTournament(db, 1, []).teams[0].speakerIds[0];
      const tag = createTag(db, { tournamentId: tournament.id, name: 'ESL' });

      expect(() => addSpeakersToTag(db, tag.id, [teams[0].speakerIds[0], outsider])).toThrow(ValidationError);
      expect(listTagSpeakers(db, tag.id)).toEqual([]);
    });

    it('drops the membership when the speaker is deleted', () => {
      const { tournament, teams } = seedTournament(db, 1, []);
      const speakerId = teams[0].speakerIds[0];
      const tag = createTag(db, { tournamentId: tournament.id, name: 'ESL' });
      addSpeakersToTag(db, tag.id, [speakerId]);

      deleteSpeaker(db, speakerId);
      expect(listTagSpeakers(db, tag.id)).toEqual([]);
    });

    it('tags and untags adjudicators', () => {
      const { tournament, adjudicators } = seedTournament(db, 0, [4, 2]);
      const [a1, a2] = adjudicators;
      const tag = createTag(db, { tournamentId: tournament.id, name: 'Trainee' });

      expect(addAdjudicatorsToTag(db, tag.id, [a1.id, a2.id])).toEqual([a1, a2]);
      removeAdjudicatorFromTag(db, tag.id, a1.id);
      expect(listTagAdjudicators(db, tag.id)).toEqual([a2]);
      expect(() => removeAdjudicatorFromTag(db, tag.id, a1.id))
        .toThrow(`Adjudicator ${a1.id} on tag ${tag.id} not found`);
    });
  });
});
