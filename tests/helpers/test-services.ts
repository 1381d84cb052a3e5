import { AgentLoop } from '../../src/agent/agent-loop';
import { CypherGuard } from '../../src/agent/cypher-guard';
import { defaultRouters } from '../../src/agent/routers';
import { ToolDispatcher } from '../../src/agent/tool-dispatcher';
import { Services } from '../../src/http/server';
import { ClaimLedger } from '../../src/ledger/claim-ledger';
import { ConflictDetector } from '../../src/policy/conflict';
import { PolicyGate } from '../../src/policy/gate';
import { FakeEvidenceStore, InMemoryGraphStore } from './in-memory-stores';
import { ScriptedModel } from './scripted-model';
import { TEST_POLICY } from './fixtures';

export interface TestServices extends Services {
  graph: InMemoryGraphStore;
  evidence: FakeEvidenceStore;
  model: ScriptedModel;
}

/**
 * The production wiring over in-memory stores and a scripted model
 */
export function createTestServices(replies: string[] = []): TestServices {
  const graph = new InMemoryGraphStore();
  const evidence = new FakeEvidenceStore();
  const ledger = new ClaimLedger(graph, evidence);
  const gate = new PolicyGate(TEST_POLICY, ledger, new ConflictDetector(graph));
  const model = new ScriptedModel(replies);

  const tools = new ToolDispatcher(ledger, gate, new CypherGuard(TEST_POLICY.allowedReadRelations));
  const agent = new AgentLoop(model, tools, {
    systemPrompt: 'test system prompt',
    maxSteps: 4,
    neighborsLimit: 50,
    routers: defaultRouters(50),
  });

  return { graph, evidence, ledger, gate, agent, model };
}
