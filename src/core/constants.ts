import { ByePolicy, PairingMethod, RoundStatus } from './types';

export const ROUND_STATUSES: RoundStatus[] = ['pending', 'drawn', 'in-progress', 'completed'];

export const BYE_POLICIES: ByePolicy[] = ['lowest-rank-bye', 'no-bye'];

export const PAIRING_METHODS: PairingMethod[] = ['adjacent', 'folded', 'random'];

// Status changes a caller may request directly. pending <-> drawn only
// happens by committing or discarding a draw.
export const ROUND_TRANSITIONS: Record<RoundStatus, RoundStatus[]> = {
  'pending': [],
  'drawn': ['in-progress'],
  'in-progress': ['drawn', 'completed'],
  'completed': ['in-progress'],
};

export const BYE_BRACKET = -1;

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;
