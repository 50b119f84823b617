import { createModelClient } from './ai/router.js';
import { ConversationManager } from './agent/conversation-manager.js';
import { buildApp } from './app.js';
import { loadConfig, loadEnvFile, loadMcpServers } from './config/index.js';
import { ConfigurationError } from './lib/errors.js';
import { createLogger, logger as bootLogger } from './lib/logger.js';
import { DEFAULT_RETRY_CONFIG } from './lib/retry.js';
import { McpManager, ToolRegistry } from './mcp/index.js';
import { createConversationStore } from './storage/index.js';

async function main(): Promise<void> {
  // .env files are in the server directory (one level up from src/)
  loadEnvFile();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const store = await createConversationStore(config.storage);
  logger.info({ type: config.storage.type, root: config.storage.root }, 'Conversation store ready');

  const registry = new ToolRegistry({ policy: config.mcp.toolNamePolicy, logger });
  const mcp = new McpManager({
    registry,
    logger,
    clientOptions: {
      timeoutMs: config.mcp.toolTimeoutMs,
      retry: {
        ...DEFAULT_RETRY_CONFIG,
        maxAttempts: config.mcp.connectRetries,
        initialDelayMs: config.mcp.retryDelayMs,
      },
    },
  });
  await mcp.initialize(await loadMcpServers(config.mcp.serversFile));

  const model = createModelClient(config.llm, logger);
  logger.info({ provider: model.provider }, 'Model client initialized');

  const conversations = new ConversationManager({
    model,
    tools: registry,
    store,
    logger,
    maxIterations: config.agent.maxIterations,
  });

  const app = await buildApp({ conversations, tools: registry, mcp }, { logger });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    try {
      await app.close();
      await mcp.disconnectAll();
      await store.close();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: config.port, host: config.host });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    bootLogger.fatal({ issues: error.issues }, 'Invalid configuration');
  } else {
    bootLogger.fatal({ err: error }, 'Failed to start server');
  }
  process.exit(1);
});
