import path from 'path';
import { config as dotenvConfig } from 'dotenv';
import type { ByePolicy, PairingMethod } from './core/types';

dotenvConfig({ path: path.resolve(process.cwd(), '.env') });

const ROOT_DIR = path.resolve(__dirname, '..');

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value === 'true' || value === '1';
}

function parseByePolicy(value: string | undefined): ByePolicy {
  return value === 'no-bye' ? 'no-bye' : 'lowest-rank-bye';
}

function parsePairingMethod(value: string | undefined): PairingMethod {
  if (value === 'folded' || value === 'random') return value;
  return 'adjacent';
}

function parseOptionalInt(value: string | undefined): number | null {
  if (value === undefined || value === '') return null;
  const parsed = parseInt(value);
  return Number.isNaN(parsed) ? null : parsed;
}

export const CONFIG = {
  // Server
  PORT: parseInt(process.env.PORT || '3000'),

  // Paths
  ROOT_DIR,
  OUTPUT_DIR: path.resolve(ROOT_DIR, process.env.TABBIT_OUTPUT_DIR || 'output'),
  SCHEMA_PATH: path.resolve(ROOT_DIR, 'sql', 'schema.sql'),
  DB_PATH: path.resolve(ROOT_DIR, process.env.TABBIT_DATABASE_PATH || path.join('data', 'tabbit.db')),

  // Draw computation (0 = compute on the calling thread)
  DRAW_WORKER_THREADS: parseInt(process.env.TABBIT_DRAW_WORKER_THREADS || '0'),

  LOG_LEVEL: process.env.TABBIT_LOG_LEVEL || 'info',

  // Draw defaults for newly created tournaments
  DEFAULT_SIDES_PER_ROOM: parseInt(process.env.TABBIT_DEFAULT_SIDES_PER_ROOM || '2'),
  DEFAULT_PANEL_SIZE: parseInt(process.env.TABBIT_DEFAULT_PANEL_SIZE || '1'),
  DEFAULT_AVOID_INSTITUTION_CLASH: parseBoolean(process.env.TABBIT_DEFAULT_AVOID_INSTITUTION_CLASH, true),
  DEFAULT_BYE_POLICY: parseByePolicy(process.env.TABBIT_DEFAULT_BYE_POLICY),
  DEFAULT_PAIRING_METHOD: parsePairingMethod(process.env.TABBIT_DEFAULT_PAIRING_METHOD),
  DEFAULT_TIE_BREAK_SEED: parseOptionalInt(process.env.TABBIT_DEFAULT_TIE_BREAK_SEED),
  DEFAULT_MAX_SWAP_DISTANCE: parseInt(process.env.TABBIT_DEFAULT_MAX_SWAP_DISTANCE || '8'),
};
