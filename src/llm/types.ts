export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Opaque text-generation capability used by the agent loop
 */
export interface LanguageModel {
  generate(messages: ChatMessage[]): Promise<string>;
}
