/**
 * Drumwatch Server Entry Point
 */

import { ENV, validateConfig } from './config/env.js';
import { logger } from './utils/logger.js';
import { wsServer } from './websocket/server.js';
import { orchestrator } from './orchestrator/index.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
  console.log(`
  ╔══════════════════════════════════════╗
  ║    Drumwatch - Woodpecker Deterrent  ║
  ║            Server v0.1.0             ║
  ╚══════════════════════════════════════╝
  `);

  // Validate configuration
  const configProblems = validateConfig();

  // Load catalog and classifier; a failure or a configuration problem leaves
  // the engine not ready but the status endpoint keeps serving
  const ready = await orchestrator.initialize(configProblems);
  if (!ready && configProblems.length > 0) {
    logger.error('Server', `Configuration rejected (${configProblems.length} problem(s)); fix .env and restart`);
  }

  const app = createApp(orchestrator);

  // Start HTTP server (for both REST API and WebSocket)
  const httpServer = app.listen(ENV.SERVER_PORT, () => {
    logger.info('Server', `HTTP server running on http://localhost:${ENV.SERVER_PORT}`);
  });

  // Start WebSocket server (attached to HTTP server on same port)
  wsServer.start(httpServer);

  logger.info('Server', `Drumwatch listening on port ${ENV.SERVER_PORT} (ws path ${ENV.WS_PATH})`);

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info('Server', 'Shutting down...');
    await wsServer.stop();
    await orchestrator.shutdown();
    httpServer.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((err) => {
      logger.error('Server', 'Shutdown failed', err);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
