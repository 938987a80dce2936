import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type BetterSqlite3 from 'better-sqlite3';
import type { Config } from '../config.js';
import { createBackupRouter } from './routes/backup.js';
import { PanelError, SelectionError } from '../utils/errors.js';
import { debug, error, errorMessage } from '../utils/logger.js';

export interface AppContext {
  db: BetterSqlite3.Database;
  config: Config;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp({ db, config }: AppContext): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false, limit: '1mb' }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    debug(`${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.use('/backup', createBackupRouter(db, config));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Endpoint not found' });
  });

  // Express recognises error handlers by their four parameters
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).type('text/plain').send('Malformed request body');
      return;
    }
    if (err instanceof SelectionError) {
      res.status(err.status).type('text/plain').send(err.message);
      return;
    }
    if (err instanceof PanelError) {
      res.status(err.status).json({ error: err.message });
      return;
    }
    error(`Unhandled error: ${errorMessage(err)}`);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
