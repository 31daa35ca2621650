// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool } from './postgres/pool.js';
export type { DbPool } from './postgres/pool.js';
export { PgDatabaseProbe } from './postgres/database-probe.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { performanceClock, ManualClock } from './clock/monotonic-clock.js';
export { SeededRng, mathRandom, constantRandom } from './random/random-source.js';
