import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import http from 'http';
import Database from 'better-sqlite3';
import { WebSocketServer, WebSocket } from 'ws';
import { ZodError } from 'zod';
import {
  ConfigurationError,
  DataIntegrityError,
  InfeasibleError,
  NotFoundError,
  RoundStateError,
  ValidationError,
} from '../core/errors';
import { TOURNAMENT_EVENTS, TournamentEventMap, TypedEventBus, eventBus } from '../events/event-bus';
import { RoundDrawer } from '../pipeline/round-drawer';
import { tabLogger } from '../pipeline/tab-logger';
import { Db } from '../storage/database';
import { constraintViolationMessage } from './constraint-messages';
import { createBallotsRouter } from './routes/ballots';
import { createParticipantsRouter } from './routes/participants';
import { createRoundsRouter } from './routes/rounds';
import { createTagsRouter } from './routes/tags';
import { createTournamentsRouter } from './routes/tournaments';

// WebSocket clients
const wsClients = new Set<WebSocket>();

/**
 * Build the Express app over an open database. The app holds no other
 * state, so tests can create one per in-memory database.
 */
export function createApp(db: Db, bus: TypedEventBus = eventBus): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(logMutations);

  const drawer = new RoundDrawer({ db, bus });

  const api = express.Router();
  api.get('/ping', (_req, res) => {
    res.json('ready');
  });
  api.use('/tournaments', createTournamentsRouter(db));
  api.use('/ballots', createBallotsRouter(db, drawer));
  api.use('/tags', createTagsRouter(db));
  api.use(createParticipantsRouter(db));
  api.use(createRoundsRouter(db, drawer));

  app.use('/api/v1', api);

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(handleError);

  return app;
}

function logMutations(req: Request, res: Response, next: NextFunction): void {
  if (req.method !== 'GET' && req.method !== 'OPTIONS') {
    const start = Date.now();
    res.on('finish', () => {
      tabLogger.withMetadata({
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        elapsedMs: Date.now() - start,
      }).info('Request handled');
    });
  }
  next();
}

export interface ErrorResponse {
  status: number;
  body: Record<string, unknown>;
}

/**
 * Map every error kind to its status code and JSON body. Anything
 * unrecognised is a 500 without details.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ZodError) {
    return { status: 400, body: { error: 'Invalid request', issues: err.issues } };
  }
  if (err instanceof ValidationError || err instanceof ConfigurationError) {
    return { status: 400, body: { error: err.message } };
  }
  if (err instanceof NotFoundError) {
    return { status: 404, body: { error: err.message } };
  }
  if (err instanceof RoundStateError) {
    return { status: 409, body: { error: err.message } };
  }
  if (err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT')) {
    return { status: 409, body: { error: constraintViolationMessage(err.message) } };
  }
  if (err instanceof InfeasibleError) {
    return { status: 422, body: { error: err.message, ...err.detail } };
  }
  if (err instanceof DataIntegrityError) {
    return { status: 500, body: { error: err.message } };
  }
  if (err instanceof SyntaxError) {
    // Malformed JSON body from express.json()
    return { status: 400, body: { error: 'Malformed JSON body' } };
  }
  return { status: 500, body: { error: 'Internal server error' } };
}

function handleError(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const { status, body } = toErrorResponse(err);
  if (status === 500) {
    console.error('Request failed:', err);
  }
  res.status(status).json(body);
}

export interface RunningServer {
  server: http.Server;
  close(): Promise<void>;
}

/**
 * Serve the API and push tournament events to WebSocket clients as
 * `{ type, payload }` messages.
 */
export function startServer(port: number, db: Db, bus: TypedEventBus = eventBus): RunningServer {
  const app = createApp(db, bus);
  const server = http.createServer(app);

  // WebSocket server
  const wss = new WebSocketServer({ server });
  wss.on('connection', (ws) => {
    wsClients.add(ws);
    ws.on('close', () => wsClients.delete(ws));
  });

  const unsubscribes = TOURNAMENT_EVENTS.map(event => {
    const forward = (payload: TournamentEventMap[typeof event]) => broadcastUpdate({ type: event, payload });
    bus.on(event, forward);
    return () => bus.off(event, forward);
  });

  server.listen(port, () => {
    console.log(`\n  Tabbit`);
    console.log(`  API:        http://localhost:${port}/api/v1`);
    console.log(`  WebSocket:  ws://localhost:${port}`);
    console.log(`  Press Ctrl+C to stop.\n`);
  });

  return {
    server,
    close: () => new Promise<void>((resolve, reject) => {
      for (const unsubscribe of unsubscribes) unsubscribe();
      for (const ws of wsClients) ws.terminate();
      wsClients.clear();
      wss.close();
      server.close(err => (err ? reject(err) : resolve()));
    }),
  };
}

export function broadcastUpdate(data: unknown): void {
  const msg = JSON.stringify(data);
  for (const ws of wsClients) {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(msg);
    }
  }
}
