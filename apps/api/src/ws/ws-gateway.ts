import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { MonotonicClockPort, RandomSourcePort, SessionResult } from '@biostream/domain';
import { mathRandom, performanceClock } from '@biostream/adapters';
import { TelemetrySession } from '../services/telemetry/telemetry-session.js';
import type { Sleep } from '../services/telemetry/delay.js';
import { WsConnection } from './ws-connection.js';

export const TELEMETRY_WS_PATH = '/ws/telemetry';

/** WebSocket close code for "endpoint going away". */
const CLOSE_CODE_GOING_AWAY = 1001;

export interface WsGatewayOptions {
  path?: string;
  clock?: MonotonicClockPort;
  /** Called once per connection so sessions never share a random source. */
  randomSource?: () => RandomSourcePort;
  intervalMs?: number;
  sleep?: Sleep;
}

/**
 * Accepts upgraded connections on the telemetry path and runs one
 * independent {@link TelemetrySession} per socket. Client messages are
 * ignored; streaming starts as soon as the socket opens.
 */
export class WsGateway {
  private readonly wss: WebSocketServer;
  private readonly sessions = new Map<TelemetrySession, Promise<SessionResult>>();
  private readonly clock: MonotonicClockPort;
  private readonly randomSource: () => RandomSourcePort;
  private readonly intervalMs: number | undefined;
  private readonly sleep: Sleep | undefined;
  private nextSessionId = 1;
  private closing: Promise<void> | null = null;

  constructor(server: Server, options: WsGatewayOptions = {}) {
    const path = options.path ?? TELEMETRY_WS_PATH;
    this.clock = options.clock ?? performanceClock;
    this.randomSource = options.randomSource ?? (() => mathRandom);
    this.intervalMs = options.intervalMs;
    this.sleep = options.sleep;

    this.wss = new WebSocketServer({ server, path });
    this.wss.on('connection', (ws, req) => this.accept(ws, req.socket.remoteAddress));
    this.wss.on('error', (err) => {
      console.error('[ws-gateway] server error', err);
    });

    console.log(`[ws-gateway] listening on ${path}`);
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  /** Stops every session, closes their sockets and the WebSocket server. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    for (const session of this.sessions.keys()) session.stop();
    await Promise.all(this.sessions.values());

    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
    console.log('[ws-gateway] closed');
  }

  private accept(ws: WebSocket, remoteAddress: string | undefined): void {
    const label = `#${this.nextSessionId++}`;
    ws.on('error', (err) => {
      console.warn(`[ws-gateway] socket ${label} error: ${err.message}`);
    });

    // Shutdown already collected the sessions it waits on; late sockets are turned away.
    if (this.closing) {
      ws.close(CLOSE_CODE_GOING_AWAY, 'Server shutting down');
      return;
    }

    const session = new TelemetrySession(new WsConnection(ws), {
      clock: this.clock,
      random: this.randomSource(),
      intervalMs: this.intervalMs,
      sleep: this.sleep,
      label,
    });
    console.log(`[ws-gateway] session ${label} opened from ${remoteAddress ?? 'unknown'}`);

    const done = session.serve().then((result) => {
      this.sessions.delete(session);
      if (result.reason === 'stopped' && ws.readyState === WebSocket.OPEN) {
        ws.close(CLOSE_CODE_GOING_AWAY, 'Server shutting down');
      }
      console.log(
        `[ws-gateway] session ${label} ended: ${result.reason} after ${result.samplesSent} samples`,
      );
      return result;
    });
    this.sessions.set(session, done);
  }
}
