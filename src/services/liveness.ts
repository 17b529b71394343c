import { createServer, type Server } from 'http';
import { logger } from '../utils/logger.js';

export const LIVENESS_BODY = 'Bot is running!';

/**
 * Answers every request with 200 so hosts that expect an open port
 * (Render web services, for one) keep the process alive. It shares the event
 * loop with the bot but never waits on it.
 */
export function startLivenessServer(port: number): Server {
  const server = createServer((_req, res) => {
    res.writeHead(200, { 'Content-Type': 'text/plain' });
    res.end(LIVENESS_BODY);
  });

  server.on('error', (error) => {
    logger.error('Liveness server error', error);
  });

  server.listen(port, '0.0.0.0', () => {
    logger.info(`Liveness endpoint listening on port ${port}`);
  });

  return server;
}

export function stopLivenessServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
