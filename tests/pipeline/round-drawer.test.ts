import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InfeasibleError, RoundStateError } from '../../src/core/errors';
import { Pairing, Round, Team } from '../../src/core/types';
import { TournamentEventMap, TournamentEventName, TypedEventBus } from '../../src/events/event-bus';
import { RoundDrawer } from '../../src/pipeline/round-drawer';
import { tournamentHistory, tournamentStandings } from '../../src/pipeline/tournament-views';
import { createAdjudicator } from '../../src/storage/adjudicators';
import { Db } from '../../src/storage/database';
import { listPairings } from '../../src/storage/pairings';
import { createRound, requireRound } from '../../src/storage/rounds';
import { SeededTournament, openTestDatabase, seedTournament } from '../db-fixtures';

type RecordedEvent = { [K in TournamentEventName]: { type: K; payload: TournamentEventMap[K] } }[TournamentEventName];

function roomsOf(pairings: Pairing[]): number[][] {
  return pairings.map(p => p.teamIds);
}

function panelsOf(pairings: Pairing[]): number[][] {
  return pairings.map(p => p.panel.map(s => s.adjudicatorId));
}

describe('RoundDrawer', () => {
  let db: Db;
  let bus: TypedEventBus;
  let drawer: RoundDrawer;
  let events: RecordedEvent[];
  let seeded: SeededTournament;
  let teams: Team[];
  let first: Round;

  beforeEach(() => {
    db = openTestDatabase();
    bus = new TypedEventBus();
    events = [];
    bus.on('round-drawn', payload => events.push({ type: 'round-drawn', payload }));
    bus.on('draw-discarded', payload => events.push({ type: 'draw-discarded', payload }));
    bus.on('round-status-changed', payload => events.push({ type: 'round-status-changed', payload }));
    bus.on('ballot-submitted', payload => events.push({ type: 'ballot-submitted', payload }));
    drawer = new RoundDrawer({ db, bus });

    seeded = seedTournament(db, 4, [5, 3, 1]);
    teams = seeded.teams;
    first = createRound(db, { tournamentId: seeded.tournament.id, sequence: null, name: 'Round 1', abbreviation: 'R1' });
  });

  afterEach(() => {
    bus.removeAllListeners();
    db.close();
  });

  async function playFirstRound(): Promise<Pairing[]> {
    const pairings = await drawer.drawRound(first.id);
    await drawer.setStatus(first.id, 'in-progress');

    const [t1, t2, t3, t4] = teams;
    await drawer.submitBallot({
      pairingId: pairings[0].id,
      adjudicatorId: null,
      teamResults: [
        { teamId: t1.id, points: 1, speakerScore: 75 },
        { teamId: t2.id, points: 0, speakerScore: 70 },
      ],
      speakerScores: [],
    });
    await drawer.submitBallot({
      pairingId: pairings[1].id,
      adjudicatorId: null,
      teamResults: [
        { teamId: t3.id, points: 1, speakerScore: 74 },
        { teamId: t4.id, points: 0, speakerScore: 72 },
      ],
      speakerScores: [],
    });
    await drawer.setStatus(first.id, 'completed');
    return pairings;
  }

  it('draws the first round in registration order and seats the senior adjudicators', async () => {
    const pairings = await drawer.drawRound(first.id);
    const [a1, a2] = seeded.adjudicators;

    expect(roomsOf(pairings)).toEqual([[1, 2], [3, 4]]);
    expect(panelsOf(pairings)).toEqual([[a1.id], [a2.id]]);
    expect(requireRound(db, first.id).status).toBe('drawn');
    expect(events.map(e => e.type)).toEqual(['round-drawn', 'round-status-changed']);
  });

  it('refuses to draw a round twice', async () => {
    await drawer.drawRound(first.id);
    await expect(drawer.drawRound(first.id)).rejects.toThrow(RoundStateError);
  });

  it('serialises concurrent draws of the same round', async () => {
    const results = await Promise.allSettled([drawer.drawRound(first.id), drawer.drawRound(first.id)]);

    expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
    expect(listPairings(db, first.id)).toHaveLength(2);
  });

  it('refuses to draw a round before the previous one is completed', async () => {
    await drawer.drawRound(first.id);
    const second = createRound(db, { tournamentId: seeded.tournament.id, sequence: null, name: 'Round 2', abbreviation: null });

    await expect(drawer.drawRound(second.id))
      .rejects.toThrow(`Round ${second.id} cannot be drawn: round 1 (Round 1) is drawn`);
  });

  it('accepts ballots only while the round is in progress', async () => {
    const pairings = await drawer.drawRound(first.id);
    const ballot = {
      pairingId: pairings[0].id,
      adjudicatorId: null,
      teamResults: [
        { teamId: teams[0].id, points: 1, speakerScore: 75 },
        { teamId: teams[1].id, points: 0, speakerScore: 70 },
      ],
      speakerScores: [],
    };

    await expect(drawer.submitBallot(ballot)).rejects.toThrow(RoundStateError);

    await drawer.setStatus(first.id, 'in-progress');
    const stored = await drawer.submitBallot(ballot);
    expect(stored.version).toBe(1);
    expect(events.at(-1)).toEqual({
      type: 'ballot-submitted',
      payload: {
        tournamentId: seeded.tournament.id,
        roundId: first.id,
        pairingId: pairings[0].id,
        ballotId: stored.id,
        version: 1,
      },
    });
  });

  it('refuses to complete a round with unballoted rooms', async () => {
    await drawer.drawRound(first.id);
    await drawer.setStatus(first.id, 'in-progress');

    await expect(drawer.setStatus(first.id, 'completed'))
      .rejects.toThrow(`Round ${first.id} cannot be completed: no ballot for room(s) 1, 2`);
  });

  it('refuses a transition the lifecycle does not allow', async () => {
    await expect(drawer.setStatus(first.id, 'completed'))
      .rejects.toThrow(`Round ${first.id} cannot move from pending to completed; draw or discard the round instead`);
  });

  it('ranks teams from the completed round', async () => {
    await playFirstRound();

    expect(tournamentStandings(db, seeded.tournament.id).map(s => s.teamId)).toEqual([1, 3, 4, 2]);
    expect(tournamentHistory(db, seeded.tournament.id).metPairs).toEqual([[1, 2], [3, 4]]);
  });

  it('leaves the round pending when no conflict-free panel exists', async () => {
    await playFirstRound();
    const second = createRound(db, { tournamentId: seeded.tournament.id, sequence: null, name: 'Round 2', abbreviation: null });

    const failure = drawer.drawRound(second.id);
    await expect(failure).rejects.toThrow(InfeasibleError);
    await expect(failure).rejects.toThrow('Room 2: only 0 of 1 adjudicators are free of conflicts');

    expect(requireRound(db, second.id).status).toBe('pending');
    expect(listPairings(db, second.id)).toEqual([]);
  });

  it('power-pairs the second round once the pool is large enough', async () => {
    await playFirstRound();
    const second = createRound(db, { tournamentId: seeded.tournament.id, sequence: null, name: 'Round 2', abbreviation: null });
    const extra = createAdjudicator(db, {
      tournamentId: seeded.tournament.id,
      name: 'Adjudicator 4',
      institutionId: null,
      experience: 2,
      independent: false,
      active: true,
    });

    const pairings = await drawer.drawRound(second.id);

    expect(roomsOf(pairings)).toEqual([[1, 3], [4, 2]]);
    expect(panelsOf(pairings)).toEqual([[extra.id], [seeded.adjudicators[2].id]]);
  });

  it('discards a draw that has no ballots', async () => {
    await drawer.drawRound(first.id);
    events.length = 0;

    const round = await drawer.discardDraw(first.id);

    expect(round.status).toBe('pending');
    expect(listPairings(db, first.id)).toEqual([]);
    expect(events).toEqual([
      {
        type: 'draw-discarded',
        payload: { tournamentId: seeded.tournament.id, roundId: first.id, removedPairings: 2 },
      },
      {
        type: 'round-status-changed',
        payload: { tournamentId: seeded.tournament.id, roundId: first.id, previous: 'drawn', current: 'pending' },
      },
    ]);
  });

  it('refuses to reopen a round once the next one is drawn', async () => {
    await playFirstRound();
    const second = createRound(db, { tournamentId: seeded.tournament.id, sequence: null, name: 'Round 2', abbreviation: null });
    createAdjudicator(db, {
      tournamentId: seeded.tournament.id,
      name: 'Adjudicator 4',
      institutionId: null,
      experience: 2,
      independent: false,
      active: true,
    });
    await drawer.drawRound(second.id);

    await expect(drawer.setStatus(first.id, 'in-progress'))
      .rejects.toThrow(`Round ${first.id} cannot be reopened: round ${second.id} is already drawn`);
  });
});
