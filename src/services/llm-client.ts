/**
 * LLM Client - text generation against Ollama or OpenAI-compatible servers
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ChatMessage, GenerationOptions, LanguageModel, LlmProvider } from '../types/llm.js';

export interface LlmClientSettings {
  readonly provider: LlmProvider;
  readonly baseUrl: string;
  readonly model: string;
  readonly timeoutSeconds: number;
  readonly maxRetries: number;
  readonly apiKey?: string | undefined;
}

type Endpoint = 'generate' | 'chat' | 'models';

const API_PATHS: Record<LlmProvider, Record<Endpoint, string>> = {
  ollama: {
    generate: '/api/generate',
    chat: '/api/chat',
    models: '/api/tags',
  },
  openai: {
    generate: '/v1/completions',
    chat: '/v1/chat/completions',
    models: '/v1/models',
  },
};

const DEFAULT_MAX_TOKENS = 1000;
const DEFAULT_TEMPERATURE = 0.7;

const OllamaGenerateResponseSchema = z.object({
  response: z.string().default(''),
});

const OllamaChatResponseSchema = z.object({
  message: z.object({ content: z.string().default('') }).default({}),
});

const OpenAiCompletionResponseSchema = z.object({
  choices: z.array(z.object({ text: z.string().default('') })).default([]),
});

const OpenAiChatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().default('') }).default({}) }))
    .default([]),
});

const OllamaModelsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const OpenAiModelsResponseSchema = z.object({
  data: z.array(z.object({ id: z.string() })).default([]),
});

export class LlmClient implements LanguageModel {
  private readonly logger: Logger;
  private readonly http: AxiosInstance;

  constructor(
    private readonly settings: LlmClientSettings,
    http?: AxiosInstance
  ) {
    this.logger = createChildLogger({ service: 'LlmClient', provider: settings.provider });
    this.http = http ?? LlmClient.createHttpClient(settings);
  }

  static createHttpClient(settings: LlmClientSettings): AxiosInstance {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (settings.apiKey !== undefined && settings.apiKey !== '') {
      headers['Authorization'] = `Bearer ${settings.apiKey}`;
    }
    return axios.create({
      baseURL: settings.baseUrl,
      timeout: settings.timeoutSeconds * 1000,
      headers,
    });
  }

  async complete(prompt: string, options: GenerationOptions = {}): Promise<string> {
    const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    const temperature = options.temperature ?? DEFAULT_TEMPERATURE;

    return this.withRetries('Completion', async () => {
      if (this.settings.provider === 'ollama') {
        const data = await this.post('generate', {
          model: this.settings.model,
          prompt,
          stream: false,
          options: { num_predict: maxTokens, temperature },
        });
        return OllamaGenerateResponseSchema.parse(data).response;
      }

      const data = await this.post('generate', {
        model: this.settings.model,
        prompt,
        max_tokens: maxTokens,
        temperature,
        stop: options.stop ?? null,
      });
      return OpenAiCompletionResponseSchema.parse(data).choices[0]?.text ?? '';
    });
  }

  async chat(messages: readonly ChatMessage[], options: GenerationOptions = {}): Promise<string> {
    const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    const temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    const payloadMessages = messages.map((m) => ({ role: m.role, content: m.content }));

    return this.withRetries('Chat', async () => {
      if (this.settings.provider === 'ollama') {
        const data = await this.post('chat', {
          model: this.settings.model,
          messages: payloadMessages,
          stream: false,
          options: { num_predict: maxTokens, temperature },
        });
        return OllamaChatResponseSchema.parse(data).message.content;
      }

      const data = await this.post('chat', {
        model: this.settings.model,
        messages: payloadMessages,
        max_tokens: maxTokens,
        temperature,
      });
      return OpenAiChatResponseSchema.parse(data).choices[0]?.message.content ?? '';
    });
  }

  /**
   * Whether the server answers its model listing endpoint
   */
  async isConnected(): Promise<boolean> {
    try {
      const response = await this.http.get(API_PATHS[this.settings.provider].models);
      return response.status === 200;
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'LLM connection check failed');
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const response = await this.http.get<unknown>(API_PATHS[this.settings.provider].models);
      if (this.settings.provider === 'ollama') {
        return OllamaModelsResponseSchema.parse(response.data).models.map((m) => m.name);
      }
      return OpenAiModelsResponseSchema.parse(response.data).data.map((m) => m.id);
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Failed to list models');
      return [];
    }
  }

  private async post(endpoint: Endpoint, body: Record<string, unknown>): Promise<unknown> {
    const response = await this.http.post<unknown>(API_PATHS[this.settings.provider][endpoint], body);
    return response.data;
  }

  private async withRetries(label: string, attempt: () => Promise<string>): Promise<string> {
    const attempts = Math.max(1, this.settings.maxRetries);
    let lastError: unknown;

    for (let i = 1; i <= attempts; i++) {
      try {
        return await attempt();
      } catch (error) {
        lastError = error;
        this.logger.warn({ attempt: i, error: errorMessage(error) }, `${label} attempt failed`);
      }
    }

    throw lastError;
  }
}
