/**
 * llm_generate tool tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { LlmGenerateTool } from '../../tools/llm-generate.tool.js';
import type { TextGenerator } from '../../types/llm.js';

describe('LlmGenerateTool', () => {
  let llm: jest.Mocked<TextGenerator>;
  let tool: LlmGenerateTool;

  beforeEach(() => {
    llm = {
      complete: jest.fn().mockResolvedValue('completed text'),
      chat: jest.fn().mockResolvedValue('chat text'),
    };
    tool = new LlmGenerateTool(llm);
  });

  it('should complete a direct prompt with default settings', async () => {
    const result = await tool.execute({ prompt: 'Write a tagline' });

    expect(llm.complete).toHaveBeenCalledWith('Write a tagline', { maxTokens: 1000, temperature: 0.7 });
    expect(result).toEqual({ success: true, outputs: { generated: 'completed text' } });
  });

  it('should substitute context in both placeholder spellings', async () => {
    await tool.execute({
      prompt: 'A: {{ context }} / B: {{context}}',
      context: 'flat',
      max_tokens: 50,
      temperature: 0.2,
    });

    expect(llm.complete).toHaveBeenCalledWith('A: flat / B: flat', { maxTokens: 50, temperature: 0.2 });
  });

  it('should switch to chat when a system prompt is given', async () => {
    const result = await tool.execute({ prompt: 'Summarize', system_prompt: 'Be brief' });

    expect(llm.chat).toHaveBeenCalledWith(
      [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Summarize' },
      ],
      { maxTokens: 1000, temperature: 0.7 }
    );
    expect(llm.complete).not.toHaveBeenCalled();
    expect(result.outputs).toEqual({ generated: 'chat text' });
  });

  describe('prompt templates', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'llm-generate-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read the template file', async () => {
      const templatePath = path.join(dir, 'ad.txt');
      await writeFile(templatePath, 'Write an ad for: {{ context }}', 'utf-8');

      await tool.execute({ prompt_template: templatePath, context: 'two rooms' });

      expect(llm.complete).toHaveBeenCalledWith('Write an ad for: two rooms', { maxTokens: 1000, temperature: 0.7 });
    });

    it('should use the template text itself when no such file exists', async () => {
      await tool.execute({ prompt_template: path.join(dir, 'missing.txt') });

      expect(llm.complete).toHaveBeenCalledWith(path.join(dir, 'missing.txt'), {
        maxTokens: 1000,
        temperature: 0.7,
      });
    });
  });

  it('should fail without a prompt', async () => {
    await expect(tool.execute({ context: 'orphan' })).resolves.toEqual({
      success: false,
      outputs: {},
      error: "No prompt provided (need 'prompt' or 'prompt_template')",
    });
    expect(llm.complete).not.toHaveBeenCalled();
  });

  it('should report generation errors as a failed result', async () => {
    llm.complete.mockRejectedValue(new Error('connection refused'));

    await expect(tool.execute({ prompt: 'hi' })).resolves.toEqual({
      success: false,
      outputs: {},
      error: 'connection refused',
    });
  });
});
