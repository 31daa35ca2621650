import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer as createHttpServer } from 'http';
import type { Server } from 'http';
import type { DatabaseProbePort } from '@biostream/domain';
import { closePool, PgDatabaseProbe } from '@biostream/adapters';

import type { AppConfig } from './config/env.js';
import { createStatusRouter } from './controllers/status.controller.js';
import { errorHandler, notFound } from './middleware/error-handler.js';
import { WsGateway } from './ws/ws-gateway.js';
import type { WsGatewayOptions } from './ws/ws-gateway.js';

export interface AppDeps {
  config: AppConfig;
  databaseProbe?: DatabaseProbePort;
  activeSessions?: () => number;
}

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const { config } = deps;
  const databaseProbe = deps.databaseProbe ?? new PgDatabaseProbe(config.databaseUrl);
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigins === '*' ? true : [...config.corsOrigins],
      credentials: true,
    }),
  );
  if (config.nodeEnv !== 'test') app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use(
    createStatusRouter({
      config,
      databaseProbe,
      activeSessions: deps.activeSessions,
    }),
  );

  // ─── Error handling (must be last) ──────────────────────────────────────────
  app.use(notFound);
  app.use(errorHandler);

  return app;
}

export interface ServerDeps extends Omit<AppDeps, 'activeSessions'> {
  gateway?: WsGatewayOptions;
}

export interface BiostreamServer {
  app: ReturnType<typeof express>;
  httpServer: Server;
  wsGateway: WsGateway;
  /** Binds the configured host/port; resolves with the bound port. */
  listen(): Promise<number>;
  /** Stops telemetry sessions, the HTTP server and the database pool. */
  close(): Promise<void>;
}

/** Composes the HTTP app and the telemetry WebSocket gateway on one server. */
export function createServer(deps: ServerDeps): BiostreamServer {
  const { config } = deps;
  const app = buildApp({ ...deps, activeSessions: () => wsGateway.activeSessions });
  const httpServer = createHttpServer(app);
  const wsGateway = new WsGateway(httpServer, deps.gateway);

  return {
    app,
    httpServer,
    wsGateway,

    listen: () =>
      new Promise<number>((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(config.port, config.host, () => {
          httpServer.off('error', reject);
          const address = httpServer.address();
          const port = address !== null && typeof address === 'object' ? address.port : config.port;
          console.log(`[server] listening on http://${config.host}:${port}`);
          resolve(port);
        });
      }),

    close: async () => {
      await wsGateway.close();
      if (httpServer.listening) {
        await new Promise<void>((resolve, reject) => {
          httpServer.close((err) => (err ? reject(err) : resolve()));
        });
      }
      await closePool();
    },
  };
}
