/**
 * Support assistant backend entry point.
 *
 * Loads configuration, builds the knowledge base and tool registry, prepares
 * the knowledge base (loading or seeding it) and serves the HTTP API.
 */

import 'dotenv/config';
import { loadConfig } from './config/loader';
import { createAppContext } from './app';
import { WebChannel } from './channels/web';
import { errorMessage } from './errors';
import logger from './utils/logger';

const log = logger.child({ module: 'System' });

async function main() {
  const config = await loadConfig();
  log.info(`Starting ${config.app_name} (${config.environment})`);

  const ctx = createAppContext(config);
  log.info(`Registered tools: ${ctx.tools.toolNames.join(', ')}`);

  // A failed load is retried by the first request that needs the knowledge base
  try {
    await ctx.knowledgeBase.initialize();
    const stats = await ctx.knowledgeBase.getStats();
    log.info(`Knowledge base ready: ${stats.total_documents} documents (dimension ${stats.dimension})`);
  } catch (err) {
    log.error(`Knowledge base initialization failed: ${errorMessage(err)}`);
  }

  if (!ctx.sessions.configured) {
    log.warn('OPENAI_AGENT_ID is not set; chat session endpoints will return errors.');
  }

  const web = new WebChannel(ctx);
  await web.start();

  const shutdown = async (signal: string) => {
    log.info(`Received ${signal}. Shutting down...`);
    try {
      await web.stop();
      log.info('Shutdown complete.');
      process.exit(0);
    } catch (err) {
      log.error(`Error during shutdown: ${errorMessage(err)}`);
      process.exit(1);
    }
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
  log.fatal(`Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});
