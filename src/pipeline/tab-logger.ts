import { ConsoleTransport, LogLayer } from 'loglayer';
import { CONFIG } from '../config';

/** Round lifecycle and ballot intake. */
export const tabLogger = new LogLayer({
  transport: new ConsoleTransport({ logger: console }),
  prefix: '[TAB]',
  enabled: CONFIG.LOG_LEVEL !== 'silent',
});
