import { ChatMessage, LanguageModel } from '../../src/llm/types';

/**
 * Language model that plays back canned replies and records every prompt
 */
export class ScriptedModel implements LanguageModel {
  readonly calls: ChatMessage[][] = [];
  private readonly replies: string[];

  constructor(replies: string[] = []) {
    this.replies = [...replies];
  }

  async generate(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages.map((m) => ({ ...m })));
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('ScriptedModel ran out of replies');
    }
    return reply;
  }
}
