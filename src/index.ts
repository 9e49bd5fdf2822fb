import { buildServer } from './api/server.js';
import { loadConfig } from './config/index.js';
import { getLogger } from './utils/logging.js';

async function main() {
  const cfg = loadConfig();
  const server = await buildServer();
  await server.listen({ port: cfg.server.port, host: cfg.server.host });
  getLogger().info(
    { port: cfg.server.port, maxTokens: cfg.registry.maxTokens },
    'Server started',
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
