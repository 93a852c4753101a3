/**
 * Logger for draw generation and adjudicator allocation.
 *
 * Debug records are only built when enabled:
 *   DEBUG=draw npm test
 *   TABBIT_LOG_LEVEL=debug npm start
 *
 * TABBIT_LOG_LEVEL=silent turns it off entirely.
 */

import { ConsoleTransport, LogLayer } from 'loglayer';
import { CONFIG } from '../config';

const DEBUG_KEYWORD = 'draw';

function isDebugEnabled(): boolean {
  return Boolean(process.env.DEBUG?.includes(DEBUG_KEYWORD)) || CONFIG.LOG_LEVEL === 'debug';
}

export const drawLogger = new LogLayer({
  transport: new ConsoleTransport({ logger: console }),
  prefix: '[DRAW]',
  enabled: CONFIG.LOG_LEVEL !== 'silent',
});

/**
 * Guard for debug-only payloads, so bracket and swap summaries are not
 * assembled when nobody reads them.
 */
export const IS_DRAW_DEBUG_ENABLED = isDebugEnabled();
