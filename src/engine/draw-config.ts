import { CONFIG } from '../config';
import { BYE_POLICIES, PAIRING_METHODS } from '../core/constants';
import { ConfigurationError } from '../core/errors';
import { DrawConfig } from '../core/types';

export function defaultDrawConfig(): DrawConfig {
  return {
    sidesPerRoom: CONFIG.DEFAULT_SIDES_PER_ROOM,
    panelSize: CONFIG.DEFAULT_PANEL_SIZE,
    avoidInstitutionClash: CONFIG.DEFAULT_AVOID_INSTITUTION_CLASH,
    byePolicy: CONFIG.DEFAULT_BYE_POLICY,
    pairingMethod: CONFIG.DEFAULT_PAIRING_METHOD,
    tieBreakSeed: CONFIG.DEFAULT_TIE_BREAK_SEED,
    maxSwapDistance: CONFIG.DEFAULT_MAX_SWAP_DISTANCE,
  };
}

/**
 * Reject a configuration the engine cannot run with. Called before any
 * standings or draw work begins.
 */
export function validateDrawConfig(config: DrawConfig): void {
  if (!Number.isInteger(config.sidesPerRoom) || config.sidesPerRoom <= 0) {
    throw new ConfigurationError(`sidesPerRoom must be a positive integer, got ${config.sidesPerRoom}`);
  }
  if (!Number.isInteger(config.panelSize) || config.panelSize <= 0) {
    throw new ConfigurationError(`panelSize must be a positive integer, got ${config.panelSize}`);
  }
  if (!Number.isInteger(config.maxSwapDistance) || config.maxSwapDistance <= 0) {
    throw new ConfigurationError(`maxSwapDistance must be a positive integer, got ${config.maxSwapDistance}`);
  }
  if (!BYE_POLICIES.includes(config.byePolicy)) {
    throw new ConfigurationError(`Unknown bye policy: "${config.byePolicy}"`);
  }
  if (!PAIRING_METHODS.includes(config.pairingMethod)) {
    throw new ConfigurationError(`Unknown pairing method: "${config.pairingMethod}"`);
  }
  if (config.tieBreakSeed !== null && !Number.isInteger(config.tieBreakSeed)) {
    throw new ConfigurationError(`tieBreakSeed must be an integer, got ${config.tieBreakSeed}`);
  }
  if (config.pairingMethod === 'random' && config.tieBreakSeed === null) {
    throw new ConfigurationError('The random pairing method needs an explicit tieBreakSeed');
  }
}
