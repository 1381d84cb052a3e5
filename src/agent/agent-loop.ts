/**
 * Agent Loop - bounded tool-dispatch conversation with a language model
 *
 * Each step sends the whole history to the model, parses one JSON action from
 * the reply and either finishes or dispatches a tool and feeds its result
 * back. Fast-path routers may answer before the model is ever called.
 */
import { ChatMessage, LanguageModel } from '../llm/types';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { ActionDefaults, extractJson, finalAnswer, parseAction, parseReply } from './actions';
import { IntentRouter } from './routers';
import { ToolDispatcher, ToolResult } from './tool-dispatcher';

export const STOPPED_ANSWER = '(stopped: max_steps)';

export type TraceEntry = { assistant: string } | { tool_result: ToolResult };

export interface AgentResult {
  answer: string;
  trace: TraceEntry[];
  /** Raw tool output when a routed question ends without a model answer */
  data?: ToolResult;
}

export interface AgentLoopOptions extends ActionDefaults {
  systemPrompt: string;
  maxSteps: number;
  routers: IntentRouter[];
}

// Anything below one, or not a number at all, still gets a single step
function stepBudget(maxSteps: number): number {
  return Number.isFinite(maxSteps) ? Math.max(1, Math.floor(maxSteps)) : 1;
}

export class AgentLoop {
  constructor(
    private readonly model: LanguageModel,
    private readonly tools: ToolDispatcher,
    private readonly options: AgentLoopOptions,
  ) {}

  async run(question: string, maxSteps: number = this.options.maxSteps): Promise<AgentResult> {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.options.systemPrompt },
      { role: 'user', content: question },
    ];

    try {
      for (const router of this.options.routers) {
        const call = router.match(question);
        if (!call) continue;

        logger.info({ router: router.name, tool: call.tool }, 'Question routed without model');
        const routedText = JSON.stringify(call);
        const result = await this.tools.dispatch(parseAction(call, this.options));
        const trace: TraceEntry[] = [{ assistant: routedText }, { tool_result: result }];

        if (router.followUp === 'return') {
          metrics.agentRuns.inc({ outcome: 'routed' });
          return { answer: '', trace, data: result };
        }

        messages.push({ role: 'assistant', content: routedText }, { role: 'tool', content: JSON.stringify(result) });
        const reply = await this.model.generate(messages);
        trace.push({ assistant: reply });

        const answer = finalAnswer(extractJson(reply));
        metrics.agentRuns.inc({ outcome: 'routed' });
        return answer === null ? { answer: '', trace, data: result } : { answer, trace };
      }

      return await this.loop(messages, stepBudget(maxSteps));
    } catch (error) {
      metrics.agentRuns.inc({ outcome: 'error' });
      throw error;
    }
  }

  private async loop(messages: ChatMessage[], steps: number): Promise<AgentResult> {
    const trace: TraceEntry[] = [];

    for (let step = 0; step < steps; step++) {
      const reply = await this.model.generate(messages);
      trace.push({ assistant: reply });

      const action = parseReply(extractJson(reply), this.options);
      if (action.kind === 'final') {
        metrics.agentRuns.inc({ outcome: 'final' });
        logger.debug({ steps: step + 1 }, 'Agent finished');
        return { answer: action.answer, trace };
      }

      const result = await this.tools.dispatch(action);
      trace.push({ tool_result: result });
      messages.push({ role: 'assistant', content: reply }, { role: 'tool', content: JSON.stringify(result) });
    }

    metrics.agentRuns.inc({ outcome: 'max_steps' });
    logger.warn({ steps }, 'Agent stopped at step limit');
    return { answer: STOPPED_ANSWER, trace };
  }
}
