/**
 * LLM client tests
 */

import type { AxiosInstance } from 'axios';
import { LlmClient, type LlmClientSettings } from '../../services/llm-client.js';

const OLLAMA: LlmClientSettings = {
  provider: 'ollama',
  baseUrl: 'http://localhost:11434',
  model: 'test-model',
  timeoutSeconds: 5,
  maxRetries: 3,
};

const OPENAI: LlmClientSettings = { ...OLLAMA, provider: 'openai', apiKey: 'test-secret' };

describe('LlmClient', () => {
  let http: jest.Mocked<AxiosInstance>;

  beforeEach(() => {
    http = { get: jest.fn(), post: jest.fn() } as unknown as jest.Mocked<AxiosInstance>;
  });

  describe('createHttpClient', () => {
    it('should add a bearer token only when an API key is set', () => {
      const withKey = LlmClient.createHttpClient(OPENAI);
      const withoutKey = LlmClient.createHttpClient(OLLAMA);

      expect(withKey.defaults.baseURL).toBe('http://localhost:11434');
      expect(withKey.defaults.timeout).toBe(5000);
      expect(withKey.defaults.headers['Authorization']).toBe('Bearer test-secret');
      expect(withoutKey.defaults.headers['Authorization']).toBeUndefined();
    });
  });

  describe('ollama', () => {
    it('should call the generate endpoint', async () => {
      http.post.mockResolvedValue({ data: { response: 'hello', model: 'test-model' } });
      const client = new LlmClient(OLLAMA, http);

      await expect(client.complete('Say hello', { maxTokens: 20, temperature: 0.1 })).resolves.toBe('hello');
      expect(http.post).toHaveBeenCalledWith('/api/generate', {
        model: 'test-model',
        prompt: 'Say hello',
        stream: false,
        options: { num_predict: 20, temperature: 0.1 },
      });
    });

    it('should call the chat endpoint with default settings', async () => {
      http.post.mockResolvedValue({ data: { message: { role: 'assistant', content: 'hi there' } } });
      const client = new LlmClient(OLLAMA, http);

      await expect(client.chat([{ role: 'user', content: 'hi' }])).resolves.toBe('hi there');
      expect(http.post).toHaveBeenCalledWith('/api/chat', {
        model: 'test-model',
        messages: [{ role: 'user', content: 'hi' }],
        stream: false,
        options: { num_predict: 1000, temperature: 0.7 },
      });
    });

    it('should list model names', async () => {
      http.get.mockResolvedValue({ status: 200, data: { models: [{ name: 'a' }, { name: 'b' }] } });
      const client = new LlmClient(OLLAMA, http);

      await expect(client.listModels()).resolves.toEqual(['a', 'b']);
      expect(http.get).toHaveBeenCalledWith('/api/tags');
    });
  });

  describe('openai-compatible', () => {
    it('should call the completions endpoint with stop sequences', async () => {
      http.post.mockResolvedValue({ data: { choices: [{ text: 'done' }], usage: { total_tokens: 9 } } });
      const client = new LlmClient(OPENAI, http);

      await expect(client.complete('Go', { stop: ['\n'] })).resolves.toBe('done');
      expect(http.post).toHaveBeenCalledWith('/v1/completions', {
        model: 'test-model',
        prompt: 'Go',
        max_tokens: 1000,
        temperature: 0.7,
        stop: ['\n'],
      });
    });

    it('should call the chat completions endpoint', async () => {
      http.post.mockResolvedValue({ data: { choices: [{ message: { role: 'assistant', content: 'ok' } }] } });
      const client = new LlmClient(OPENAI, http);

      await expect(client.chat([{ role: 'system', content: 's' }])).resolves.toBe('ok');
      expect(http.post.mock.calls[0]?.[0]).toBe('/v1/chat/completions');
    });

    it('should return an empty string when there are no choices', async () => {
      http.post.mockResolvedValue({ data: { choices: [] } });
      const client = new LlmClient(OPENAI, http);

      await expect(client.complete('Go')).resolves.toBe('');
    });

    it('should list model ids', async () => {
      http.get.mockResolvedValue({ status: 200, data: { data: [{ id: 'm1' }] } });
      const client = new LlmClient(OPENAI, http);

      await expect(client.listModels()).resolves.toEqual(['m1']);
      expect(http.get).toHaveBeenCalledWith('/v1/models');
    });
  });

  describe('retries', () => {
    it('should retry until an attempt succeeds', async () => {
      http.post
        .mockRejectedValueOnce(new Error('first'))
        .mockRejectedValueOnce(new Error('second'))
        .mockResolvedValueOnce({ data: { response: 'third time' } });
      const client = new LlmClient(OLLAMA, http);

      await expect(client.complete('x')).resolves.toBe('third time');
      expect(http.post).toHaveBeenCalledTimes(3);
    });

    it('should rethrow the last error after maxRetries attempts', async () => {
      http.post
        .mockRejectedValueOnce(new Error('first'))
        .mockRejectedValueOnce(new Error('second'))
        .mockRejectedValueOnce(new Error('last'));
      const client = new LlmClient(OLLAMA, http);

      await expect(client.complete('x')).rejects.toThrow('last');
      expect(http.post).toHaveBeenCalledTimes(3);
    });
  });

  describe('health', () => {
    it('should report connectivity from the models endpoint', async () => {
      http.get.mockResolvedValueOnce({ status: 200, data: {} }).mockRejectedValueOnce(new Error('ECONNREFUSED'));
      const client = new LlmClient(OLLAMA, http);

      await expect(client.isConnected()).resolves.toBe(true);
      await expect(client.isConnected()).resolves.toBe(false);
    });

    it('should return no models when listing fails', async () => {
      http.get.mockRejectedValue(new Error('down'));
      const client = new LlmClient(OLLAMA, http);

      await expect(client.listModels()).resolves.toEqual([]);
    });
  });
});
