import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { DatabaseProbePort } from '@biostream/domain';
import type { AppConfig } from '../config/env.js';

const MAX_COLLECTIONS = 10;
const MAX_ERROR_CHARS = 50;

export interface DatabaseDiagnostic {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

export interface StatusRouterDeps {
  config: Pick<AppConfig, 'databaseUrl' | 'databaseName'>;
  databaseProbe: DatabaseProbePort;
  activeSessions?: () => number;
}

function clip(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.slice(0, MAX_ERROR_CHARS);
}

/** Reports on the optional database without ever failing the request. */
export async function diagnoseDatabase(deps: StatusRouterDeps): Promise<DatabaseDiagnostic> {
  const { config, databaseProbe } = deps;
  const report: DatabaseDiagnostic = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: null,
    database_name: null,
    connection_status: 'Not Connected',
    collections: [],
  };

  if (!databaseProbe.isConfigured()) {
    report.database = '❌ Database not configured (set DATABASE_URL)';
  } else {
    try {
      await databaseProbe.connect();
      report.database = '✅ Available';
      report.connection_status = 'Connected';

      try {
        report.collections = await databaseProbe.listCollections(MAX_COLLECTIONS);
        report.database = '✅ Connected & Working';
      } catch (err) {
        report.database = `⚠️  Connected but Error: ${clip(err)}`;
      }
    } catch (err) {
      report.database = `❌ Error: ${clip(err)}`;
    }
  }

  report.database_url = config.databaseUrl ? '✅ Set' : '❌ Not Set';
  report.database_name = config.databaseName ? '✅ Set' : '❌ Not Set';
  return report;
}

export function createStatusRouter(deps: StatusRouterDeps): Router {
  const router = Router();

  /** GET / */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Hello from the Biostream backend!' });
  });

  /** GET /api/hello */
  router.get('/api/hello', (_req: Request, res: Response) => {
    res.json({ message: 'Hello from the backend API!' });
  });

  /** GET /healthz */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      activeSessions: deps.activeSessions?.() ?? 0,
    });
  });

  /** GET /test — database diagnostic */
  router.get('/test', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      return res.json(await diagnoseDatabase(deps));
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
