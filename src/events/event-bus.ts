import { EventEmitter } from 'events';
import { Pairing, RoundStatus } from '../core/types';

// === Typed Event Payloads ===

export interface RoundDrawnPayload {
  tournamentId: number;
  roundId: number;
  pairings: Pairing[];
}

export interface DrawDiscardedPayload {
  tournamentId: number;
  roundId: number;
  removedPairings: number;
}

export interface RoundStatusChangedPayload {
  tournamentId: number;
  roundId: number;
  previous: RoundStatus;
  current: RoundStatus;
}

export interface BallotSubmittedPayload {
  tournamentId: number;
  roundId: number;
  pairingId: number;
  ballotId: number;
  version: number;
}

// === Event Map ===

export interface TournamentEventMap {
  'round-drawn': RoundDrawnPayload;
  'draw-discarded': DrawDiscardedPayload;
  'round-status-changed': RoundStatusChangedPayload;
  'ballot-submitted': BallotSubmittedPayload;
}

export type TournamentEventName = keyof TournamentEventMap;

export const TOURNAMENT_EVENTS: TournamentEventName[] = [
  'round-drawn',
  'draw-discarded',
  'round-status-changed',
  'ballot-submitted',
];

// === Typed Event Bus ===

export class TypedEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends TournamentEventName>(
    event: K,
    listener: (payload: TournamentEventMap[K]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  off<K extends TournamentEventName>(
    event: K,
    listener: (payload: TournamentEventMap[K]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  emit<K extends TournamentEventName>(
    event: K,
    payload: TournamentEventMap[K],
  ): void {
    this.emitter.emit(event, payload);
  }

  listenerCount(event: TournamentEventName): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

// Singleton export
export const eventBus = new TypedEventBus();
