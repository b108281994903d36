import {
  createModelClient,
  loadAgentConfig,
  logger,
} from '@toolloop/shared';
import { Agent } from './agent.js';
import { createApi } from './api.js';

const log = logger.child({ module: 'main' });

async function main() {
  const startTime = Date.now();
  log.info('agent service starting');

  const config = await loadAgentConfig();
  const model = createModelClient(config.model);

  const shutdownController = new AbortController();
  const app = createApi({
    startTime,
    shutdownSignal: shutdownController.signal,
    createAgent: () => Agent.create({ config, model }),
  });

  const port = parseInt(process.env.PORT ?? '3000', 10);
  const server = app.listen(port, () => {
    log.info({ port, servers: config.servers.map((s) => s.id) }, 'agent API listening');
  });

  // Graceful shutdown: cancel running agents, then wait for their streams to
  // finish cleanup before exiting
  const shutdown = () => {
    if (shutdownController.signal.aborted) return;
    log.info('shutting down');
    shutdownController.abort();
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'agent service failed to start');
  process.exit(1);
});
