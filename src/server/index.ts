import { CONFIG } from '../config';
import { destroyPool } from '../engine/drawer';
import { closeDatabase, getDatabase } from '../storage/database';
import { startServer } from './api';

/**
 * Serve the API until SIGINT, then close the server, the worker pool and
 * the database.
 */
export function serve(port: number = CONFIG.PORT): void {
  const running = startServer(port, getDatabase());

  async function shutdown(): Promise<void> {
    await running.close();
    await destroyPool();
    closeDatabase();
  }

  process.once('SIGINT', () => {
    shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      },
    );
  });
}

if (require.main === module) {
  serve();
}
