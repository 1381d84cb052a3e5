import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { UpstreamUnavailableError, errorMessage } from '../utils/errors';
import { ChatMessage, LanguageModel } from './types';

export interface OpenAIChatOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export const TOOL_RESULT_OPEN = '[TOOL_RESULT]';
export const TOOL_RESULT_CLOSE = '[END_TOOL_RESULT]';

/**
 * Local OpenAI-compatible servers often only accept system/user/assistant
 * roles, so tool turns go out as user turns wrapped in markers the output
 * parser knows to strip.
 */
function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'user', content: `${TOOL_RESULT_OPEN}\n${message.content}\n${TOOL_RESULT_CLOSE}` };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * Chat model on any OpenAI-compatible endpoint (LM Studio, vLLM, OpenAI).
 * Single non-streaming completion per call, no retries.
 */
export class OpenAIChatModel implements LanguageModel {
  private readonly oai: OpenAI;

  constructor(private readonly options: OpenAIChatOptions) {
    this.oai = new OpenAI({
      // The SDK refuses an empty key even for servers that ignore it
      apiKey: options.apiKey || 'unused',
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(messages: ChatMessage[]): Promise<string> {
    const endTimer = metrics.modelCallTime.startTimer();
    try {
      const completion = await this.oai.chat.completions.create({
        model: this.options.model,
        messages: messages.map(toMessageParam),
        temperature: this.options.temperature,
        stream: false,
      });
      return completion.choices[0]?.message?.content ?? '';
    } catch (error) {
      const reason =
        error instanceof APIConnectionTimeoutError
          ? 'request timed out'
          : error instanceof APIError && error.status !== undefined
            ? `HTTP ${error.status}: ${error.message}`
            : errorMessage(error);
      logger.error({ error, model: this.options.model }, 'Language model call failed');
      throw new UpstreamUnavailableError('llm', reason, error);
    } finally {
      endTimer();
    }
  }
}
