import express from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import type { PollerStatus } from './core/relay/InboxPoller.js';

const logger = createLogger({ component: 'server' });

export function createHealthApp(getStatus: () => PollerStatus): express.Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString(), poller: getStatus() });
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startHealthServer(
  getStatus: () => PollerStatus,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  const app = createHealthApp(getStatus);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'Health server started');
      resolve(server);
    });
    server.on('error', reject);
  });
}
