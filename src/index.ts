/**
 * Main entry point for the claim gate service
 */
import { main } from './service';
import { logger } from './utils/logger';
import Config from './config';

// Log the startup
logger.info({
  name: Config.service.name,
  version: Config.service.version,
  environment: process.env.NODE_ENV || 'development',
  neo4j: Config.neo4j.uri,
  llm: { baseUrl: Config.llm.baseUrl, model: Config.llm.model },
  gapScan: Config.scheduler.enabled,
}, 'Starting claim gate service');

main(Config).catch((error) => {
  logger.fatal({ error }, 'Fatal error in claim gate service');
  process.exit(1);
});
