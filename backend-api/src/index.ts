import 'dotenv/config';

import { createApp } from './app.js';
import { pool } from './database/db.js';
import { logError, logInfo } from './utils/logger.js';

const port = Number(process.env.PORT ?? 3001);
// Listen on localhost by default and expose through the reverse proxy.
// HOST=0.0.0.0 is for local debugging only.
const host = process.env.HOST ?? '127.0.0.1';

async function bootstrap() {
  // Fail fast when the database is unreachable instead of on the first sync.
  await pool.query('select 1');

  const app = createApp();
  const server = app.listen(port, host, () => {
    logInfo(`[backend-api] listening on ${host}:${port}`, undefined, { critical: true });
  });

  const shutdown = () => {
    server.close(() => {
      pool.end().catch((e) => logError('[backend-api] pool shutdown failed', { message: String(e) }));
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

bootstrap().catch((e) => {
  logError('[backend-api] bootstrap failed', { message: String(e) });
  process.exit(1);
});
