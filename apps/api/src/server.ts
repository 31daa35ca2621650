import 'dotenv/config';
import { loadConfig } from './config/env.js';
import { createServer } from './app.js';

async function main() {
  const config = loadConfig();
  const server = createServer({ config });
  await server.listen();

  const shutdown = async () => {
    console.log('[server] shutting down...');
    await server.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
