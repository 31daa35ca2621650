// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/telemetry-sample.js';
export * from './entities/telemetry-session.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/duplex-connection.port.js';
export * from './ports/outbound/random-source.port.js';
export * from './ports/outbound/monotonic-clock.port.js';
export * from './ports/outbound/database-probe.port.js';
