import path from 'path';
import Piscina from 'piscina';
import { CONFIG } from '../config';
import { SerializedFailure, deserializeFailure, serializeFailure } from '../core/errors';
import {
  Adjudicator,
  AdjudicatorConflict,
  DrawConfig,
  RoundDraw,
  RoundRecord,
  Team,
} from '../core/types';
import { allocatePanels } from './allocation';
import { validateDrawConfig } from './draw-config';
import { buildConflicts, computeHistory } from './history';
import { generateDraw } from './pairing';
import { computeStandings } from './standings';

/**
 * A self-contained snapshot of everything one round's draw depends on.
 * Plain data only, so it can be handed to a worker thread as-is.
 */
export interface DrawTask {
  roundId: number;
  roster: Team[];
  adjudicators: Adjudicator[];
  conflicts: AdjudicatorConflict[];
  rounds: RoundRecord[];
  config: DrawConfig;
}

export type DrawTaskResult =
  | { ok: true; draw: RoundDraw }
  | { ok: false; failure: SerializedFailure };

let pool: Piscina | null = null;

function getPool(): Piscina {
  if (pool) return pool;
  pool = new Piscina({
    filename: path.resolve(__dirname, 'draw-worker.js'),
    maxThreads: CONFIG.DRAW_WORKER_THREADS,
    idleTimeout: 30000,
  });
  return pool;
}

/**
 * Destroy the worker pool. Call on shutdown.
 */
export async function destroyPool(): Promise<void> {
  if (pool) {
    await pool.destroy();
    pool = null;
  }
}

/**
 * Standings, history, pairing and allocation for one round, on the
 * calling thread.
 */
export function computeRoundDraw(task: DrawTask): RoundDraw {
  validateDrawConfig(task.config);

  const standings = computeStandings(task.roster, task.rounds, { tieBreakSeed: task.config.tieBreakSeed });
  const history = computeHistory(task.roster, task.rounds);
  const conflicts = buildConflicts(history, task.conflicts);

  const draw = generateDraw(standings, history, task.config);
  const rooms = allocatePanels(draw, task.adjudicators, conflicts, task.roster, task.config);

  return { roundId: task.roundId, standings, rooms };
}

/**
 * Same as {@link computeRoundDraw}, with the typed failures folded into the
 * result so they survive structured cloning.
 */
export function runDrawTask(task: DrawTask): DrawTaskResult {
  try {
    return { ok: true, draw: computeRoundDraw(task) };
  } catch (error) {
    const failure = serializeFailure(error);
    if (!failure) throw error;
    return { ok: false, failure };
  }
}

/**
 * Compute a round's draw on the worker pool when one is configured,
 * otherwise in-thread. Typed failures are rethrown as their own classes.
 */
export async function computeRoundDrawAsync(task: DrawTask): Promise<RoundDraw> {
  if (CONFIG.DRAW_WORKER_THREADS <= 0) {
    return computeRoundDraw(task);
  }

  const result: DrawTaskResult = await getPool().run(task);
  if (!result.ok) {
    throw deserializeFailure(result.failure);
  }
  return result.draw;
}
