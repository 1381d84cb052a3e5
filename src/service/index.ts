/**
 * Composition root
 *
 * Builds the stores and components from configuration, starts the HTTP
 * server and the optional gap scanner, and tears everything down again on
 * SIGTERM/SIGINT.
 */
import { Server } from 'http';
import { AppConfig } from '../config';
import { Neo4jGraphStore } from '../graph-store';
import { PgEvidenceStore } from '../evidence-store';
import { ClaimLedger } from '../ledger/claim-ledger';
import { ConflictDetector } from '../policy/conflict';
import { PolicyGate } from '../policy/gate';
import { OpenAIChatModel } from '../llm/openai-chat-model';
import { AgentLoop } from '../agent/agent-loop';
import { CypherGuard } from '../agent/cypher-guard';
import { ToolDispatcher } from '../agent/tool-dispatcher';
import { buildSystemPrompt } from '../agent/prompt';
import { defaultRouters } from '../agent/routers';
import { GapScanner } from '../scheduler/gap-scanner';
import { Services, createApp, startServer, stopServer } from '../http/server';
import { logger } from '../utils/logger';

export function createServices(config: AppConfig): Services {
  const graph = new Neo4jGraphStore(config.neo4j);
  const evidence = new PgEvidenceStore(config.postgres);
  const ledger = new ClaimLedger(graph, evidence);
  const gate = new PolicyGate(config.policy, ledger, new ConflictDetector(graph));
  const model = new OpenAIChatModel(config.llm);

  const tools = new ToolDispatcher(ledger, gate, new CypherGuard(config.policy.allowedReadRelations));
  const agent = new AgentLoop(model, tools, {
    systemPrompt: buildSystemPrompt(config.policy.allowedReadRelations),
    maxSteps: config.agent.maxSteps,
    neighborsLimit: config.agent.neighborsLimit,
    routers: defaultRouters(config.agent.neighborsLimit),
  });

  return { graph, evidence, ledger, gate, agent, model };
}

/**
 * Start the service; resolves once it is listening
 */
export async function main(config: AppConfig): Promise<void> {
  const services = createServices(config);

  await services.graph.init();
  await services.evidence.init();

  const server = await startServer(createApp(services, { apiKey: config.auth.apiKey }), config.http.port, config.http.host);

  const scanner = config.scheduler.enabled
    ? new GapScanner(services.ledger, services.gate, config.scheduler)
    : null;
  scanner?.start();

  if (!config.auth.apiKey) {
    logger.warn('GATEWAY_API_KEY is not set; all routes are open');
  }

  setupGracefulShutdown(services, server, scanner);
}

function setupGracefulShutdown(services: Services, server: Server, scanner: GapScanner | null): void {
  let stopping = false;

  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Received shutdown signal');

    try {
      scanner?.stop();
      await stopServer(server);
      await services.graph.close();
      await services.evidence.close();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  // Listen for termination signals
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    void shutdown('unhandledRejection');
  });
}
