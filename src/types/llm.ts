/**
 * Text generation contract consumed by the planner and LLM-backed tools
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export interface GenerationOptions {
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly stop?: readonly string[];
}

export interface TextGenerator {
  complete(prompt: string, options?: GenerationOptions): Promise<string>;
  chat(messages: readonly ChatMessage[], options?: GenerationOptions): Promise<string>;
}

export type LlmProvider = 'ollama' | 'openai';

/**
 * A text generator that can also report on its backing server
 */
export interface LanguageModel extends TextGenerator {
  isConnected(): Promise<boolean>;
  listModels(): Promise<string[]>;
}
