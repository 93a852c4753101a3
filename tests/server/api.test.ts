import { describe, it, expect, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import {
  ConfigurationError,
  DataIntegrityError,
  InfeasibleError,
  NotFoundError,
  RoundStateError,
  ValidationError,
} from '../../src/core/errors';
import { toErrorResponse } from '../../src/server/api';
import { constraintViolationMessage } from '../../src/server/constraint-messages';
import { ballotCreateSchema, conflictCreateSchema, pageQuerySchema, tournamentCreateSchema } from '../../src/server/schemas';
import { Db } from '../../src/storage/database';
import { createTeam } from '../../src/storage/teams';
import { openTestDatabase, seedTournament } from '../db-fixtures';

describe('toErrorResponse', () => {
  let db: Db | null = null;

  afterEach(() => {
    db?.close();
    db = null;
  });

  it.each([
    [new ValidationError('bad team'), 400, { error: 'bad team' }],
    [new ConfigurationError('panelSize must be a positive integer'), 400, { error: 'panelSize must be a positive integer' }],
    [new NotFoundError('Round', 9), 404, { error: 'Round 9 not found' }],
    [new RoundStateError('Round 1 is drawn'), 409, { error: 'Round 1 is drawn' }],
    [new DataIntegrityError('Team 3 appears twice on the roster'), 500, { error: 'Team 3 appears twice on the roster' }],
    [new SyntaxError('Unexpected token'), 400, { error: 'Malformed JSON body' }],
    [new Error('boom'), 500, { error: 'Internal server error' }],
  ])('maps %s', (error, status, body) => {
    expect(toErrorResponse(error)).toEqual({ status, body });
  });

  it('reports where a draw became infeasible', () => {
    const error = new InfeasibleError('Room 2: only 0 of 1 adjudicators are free of conflicts', {
      stage: 'allocation',
      constraint: 'panel-size',
      roomRank: 2,
      teamIds: [4, 2],
    });

    expect(toErrorResponse(error)).toEqual({
      status: 422,
      body: {
        error: 'Room 2: only 0 of 1 adjudicators are free of conflicts',
        stage: 'allocation',
        constraint: 'panel-size',
        roomRank: 2,
        teamIds: [4, 2],
      },
    });
  });

  it('maps a rejected request body to 400 with the issues', () => {
    const parsed = tournamentCreateSchema.safeParse({ name: '' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const response = toErrorResponse(parsed.error);
    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid request');
    expect(response.body.issues).toEqual(parsed.error.issues);
  });

  it('maps a unique constraint failure to 409', () => {
    db = openTestDatabase();
    const { tournament } = seedTournament(db, 1, []);
    const input = { tournamentId: tournament.id, name: 'Team 1', abbreviation: null, institutionId: null, speakers: [] };

    let caught: unknown = null;
    try {
      createTeam(db, input);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(Database.SqliteError);
    expect(toErrorResponse(caught)).toEqual({
      status: 409,
      body: { error: 'A team with this name already exists in this tournament' },
    });
  });
});

describe('constraintViolationMessage', () => {
  it.each([
    ['UNIQUE constraint failed: rounds.tournament_id, rounds.sequence', 'A round with this sequence already exists in this tournament'],
    ['UNIQUE constraint failed: institutions.tournament_id, institutions.name', 'An institution with this name already exists in this tournament'],
    ['FOREIGN KEY constraint failed', 'Referenced resource does not exist or is still in use'],
    ['CHECK constraint failed: version >= 1', 'Database constraint violated'],
  ])('translates %s', (message, expected) => {
    expect(constraintViolationMessage(message)).toBe(expected);
  });
});

describe('request schemas', () => {
  it('fills tournament defaults and trims names', () => {
    expect(tournamentCreateSchema.parse({ name: '  Spring Open ' })).toEqual({
      name: 'Spring Open',
      abbreviation: null,
      settings: {},
    });
  });

  it('coerces paging query strings and caps the limit', () => {
    expect(pageQuerySchema.parse({ offset: '20', limit: '50' })).toEqual({ offset: 20, limit: 50 });
    expect(pageQuerySchema.parse({})).toEqual({ offset: 0, limit: 100 });
    expect(pageQuerySchema.safeParse({ limit: '5000' }).success).toBe(false);
  });

  it('accepts either conflict kind and nothing else', () => {
    expect(conflictCreateSchema.parse({ kind: 'team', teamId: 3 })).toEqual({ kind: 'team', teamId: 3 });
    expect(conflictCreateSchema.parse({ kind: 'institution', institutionId: 4 }))
      .toEqual({ kind: 'institution', institutionId: 4 });
    expect(conflictCreateSchema.safeParse({ kind: 'speaker', speakerId: 1 }).success).toBe(false);
  });

  it('requires at least one team result on a ballot', () => {
    expect(ballotCreateSchema.safeParse({ pairingId: 1, teamResults: [] }).success).toBe(false);
    expect(ballotCreateSchema.parse({
      pairingId: 1,
      teamResults: [{ teamId: 2, points: 1, speakerScore: 150 }],
    })).toEqual({
      pairingId: 1,
      adjudicatorId: null,
      teamResults: [{ teamId: 2, points: 1, speakerScore: 150 }],
      speakerScores: [],
    });
  });
});
