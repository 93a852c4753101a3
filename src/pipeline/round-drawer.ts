import { ROUND_TRANSITIONS } from '../core/constants';
import { RoundStateError } from '../core/errors';
import { Ballot, Pairing, Round, RoundStatus } from '../core/types';
import { DrawTask, computeRoundDrawAsync } from '../engine/drawer';
import { TypedEventBus, eventBus } from '../events/event-bus';
import { NewBallot, createBallot, listRoundBallots } from '../storage/ballots';
import { Db } from '../storage/database';
import { deletePairings, insertDraw, listPairings, requirePairing } from '../storage/pairings';
import { listTournamentRounds, requireRound, writeRoundStatus } from '../storage/rounds';
import { TournamentSnapshot, loadTournamentSnapshot } from '../storage/snapshot';
import { tabLogger } from './tab-logger';

export interface RoundDrawerOptions {
  db: Db;
  bus?: TypedEventBus;
}

/**
 * Owns every round lifecycle transition.
 *
 * Draw attempts on one round are serialised; the round's status is re-read
 * inside the lock and the pairings, panels and `drawn` status are written in
 * one transaction, so a draw is either fully committed or not at all.
 */
export class RoundDrawer {
  private db: Db;
  private bus: TypedEventBus;
  private locks = new Map<number, Promise<void>>();

  constructor(options: RoundDrawerOptions) {
    this.db = options.db;
    this.bus = options.bus ?? eventBus;
  }

  /**
   * Generate and commit the draw for a pending round whose predecessors are
   * all completed.
   */
  async drawRound(roundId: number): Promise<Pairing[]> {
    return this.withRoundLock(roundId, async () => {
      const round = requireRound(this.db, roundId);
      const snapshot = loadTournamentSnapshot(this.db, round.tournamentId);
      assertDrawable(round, snapshot);

      const start = Date.now();
      const draw = await computeRoundDrawAsync(buildDrawTask(round, snapshot));

      const commit = this.db.transaction((): Pairing[] => {
        const current = requireRound(this.db, roundId);
        if (current.status !== 'pending') {
          throw new RoundStateError(`Round ${roundId} is ${current.status}; it was drawn while this draw was computed`);
        }
        const pairings = insertDraw(this.db, roundId, draw.rooms);
        writeRoundStatus(this.db, roundId, 'drawn');
        return pairings;
      });
      const pairings = commit();

      tabLogger.withMetadata({
        tournamentId: round.tournamentId,
        roundId,
        rooms: pairings.length,
        elapsedMs: Date.now() - start,
      }).info('Round drawn');

      this.bus.emit('round-drawn', { tournamentId: round.tournamentId, roundId, pairings });
      this.bus.emit('round-status-changed', {
        tournamentId: round.tournamentId,
        roundId,
        previous: 'pending',
        current: 'drawn',
      });
      return pairings;
    });
  }

  /**
   * Throw away a committed draw and return the round to `pending`. Refused
   * once any ballot has been entered against it.
   */
  async discardDraw(roundId: number): Promise<Round> {
    return this.withRoundLock(roundId, async () => {
      const round = requireRound(this.db, roundId);
      if (round.status !== 'drawn') {
        throw new RoundStateError(`Round ${roundId} is ${round.status}; only a drawn round can have its draw discarded`);
      }

      const ballots = listRoundBallots(this.db, roundId);
      if (ballots.length > 0) {
        throw new RoundStateError(`Round ${roundId} already has ${ballots.length} ballot(s); its draw cannot be discarded`);
      }

      const discard = this.db.transaction((): number => {
        const removed = deletePairings(this.db, roundId);
        writeRoundStatus(this.db, roundId, 'pending');
        return removed;
      });
      const removedPairings = discard();

      tabLogger.withMetadata({ tournamentId: round.tournamentId, roundId, removedPairings }).info('Draw discarded');

      this.bus.emit('draw-discarded', { tournamentId: round.tournamentId, roundId, removedPairings });
      this.bus.emit('round-status-changed', {
        tournamentId: round.tournamentId,
        roundId,
        previous: 'drawn',
        current: 'pending',
      });
      return requireRound(this.db, roundId);
    });
  }

  /**
   * Move a round along its lifecycle. Completing requires a ballot for every
   * non-bye room; reopening a completed round is refused once a later round
   * has been drawn.
   */
  async setStatus(roundId: number, target: RoundStatus): Promise<Round> {
    return this.withRoundLock(roundId, async () => {
      const round = requireRound(this.db, roundId);

      if (!ROUND_TRANSITIONS[round.status].includes(target)) {
        throw new RoundStateError(
          `Round ${roundId} cannot move from ${round.status} to ${target}` +
          (target === 'pending' || round.status === 'pending' ? '; draw or discard the round instead' : ''),
        );
      }

      if (target === 'completed') {
        this.assertFullyBalloted(roundId);
      }

      if (round.status === 'completed') {
        const later = listTournamentRounds(this.db, round.tournamentId)
          .find(r => r.sequence > round.sequence && r.status !== 'pending');
        if (later) {
          throw new RoundStateError(`Round ${roundId} cannot be reopened: round ${later.id} is already ${later.status}`);
        }
      }

      writeRoundStatus(this.db, roundId, target);

      tabLogger.withMetadata({
        tournamentId: round.tournamentId,
        roundId,
        previous: round.status,
        current: target,
      }).info('Round status changed');

      this.bus.emit('round-status-changed', {
        tournamentId: round.tournamentId,
        roundId,
        previous: round.status,
        current: target,
      });
      return requireRound(this.db, roundId);
    });
  }

  /**
   * Record a ballot for a room of an in-progress round. A resubmission for
   * the same room becomes the next version and supersedes the last.
   */
  async submitBallot(input: NewBallot): Promise<Ballot> {
    const pairing = requirePairing(this.db, input.pairingId);

    return this.withRoundLock(pairing.roundId, async () => {
      const round = requireRound(this.db, pairing.roundId);
      if (round.status !== 'in-progress') {
        throw new RoundStateError(`Round ${round.id} is ${round.status}; ballots are only accepted while it is in progress`);
      }

      const ballot = createBallot(this.db, input);

      tabLogger.withMetadata({
        roundId: round.id,
        pairingId: ballot.pairingId,
        ballotId: ballot.id,
        version: ballot.version,
      }).info('Ballot submitted');

      this.bus.emit('ballot-submitted', {
        tournamentId: round.tournamentId,
        roundId: round.id,
        pairingId: ballot.pairingId,
        ballotId: ballot.id,
        version: ballot.version,
      });
      return ballot;
    });
  }

  private assertFullyBalloted(roundId: number): void {
    const balloted = new Set(listRoundBallots(this.db, roundId).map(b => b.pairingId));
    const missing = listPairings(this.db, roundId).filter(p => !p.bye && !balloted.has(p.id));
    if (missing.length > 0) {
      throw new RoundStateError(
        `Round ${roundId} cannot be completed: no ballot for room(s) ${missing.map(p => p.roomRank).join(', ')}`,
      );
    }
  }

  private async withRoundLock<T>(roundId: number, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(roundId) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(() => undefined, () => undefined);
    this.locks.set(roundId, settled);

    try {
      return await run;
    } finally {
      if (this.locks.get(roundId) === settled) {
        this.locks.delete(roundId);
      }
    }
  }
}

/**
 * The engine's input for one round: the active adjudicators and every
 * earlier round of the tournament.
 */
export function buildDrawTask(round: Round, snapshot: TournamentSnapshot): DrawTask {
  return {
    roundId: round.id,
    roster: snapshot.roster,
    adjudicators: snapshot.adjudicators.filter(a => a.active),
    conflicts: snapshot.conflicts,
    rounds: snapshot.rounds.filter(r => r.round.sequence < round.sequence),
    config: snapshot.tournament.settings,
  };
}

/**
 * A round can be drawn when it is pending, the tournament's sequence has no
 * gaps up to it, and every earlier round is completed.
 */
export function assertDrawable(round: Round, snapshot: TournamentSnapshot): void {
  if (round.status !== 'pending') {
    throw new RoundStateError(`Round ${round.id} is ${round.status}; only a pending round can be drawn`);
  }

  const earlier = snapshot.rounds
    .map(r => r.round)
    .filter(r => r.sequence < round.sequence)
    .sort((a, b) => a.sequence - b.sequence);

  earlier.forEach((r, index) => {
    if (r.sequence !== index + 1) {
      throw new RoundStateError(
        `Round sequence of tournament ${round.tournamentId} has a gap before round ${r.sequence}`,
      );
    }
    if (r.status !== 'completed') {
      throw new RoundStateError(
        `Round ${round.id} cannot be drawn: round ${r.sequence} (${r.name}) is ${r.status}`,
      );
    }
  });

  if (earlier.length !== round.sequence - 1) {
    throw new RoundStateError(
      `Round sequence of tournament ${round.tournamentId} has a gap before round ${round.sequence}`,
    );
  }
}
