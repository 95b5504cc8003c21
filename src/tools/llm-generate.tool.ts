/**
 * llm_generate - text generation through the shared LLM client
 */

import { readFile } from 'node:fs/promises';
import { BaseTool } from './base.tool.js';
import { errorMessage } from '../utils/errors.js';
import type { ContextMap } from '../types/context.js';
import type { TextGenerator } from '../types/llm.js';
import type { ToolResult, ToolSchema } from '../types/tools.js';

const DEFAULT_MAX_TOKENS = 1000;
const DEFAULT_TEMPERATURE = 0.7;

function optionalString(inputs: ContextMap, key: string): string | undefined {
  const value = inputs[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

async function loadTemplate(templatePath: string): Promise<string> {
  try {
    return await readFile(templatePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      // Not a file on disk; treat as inline template text
      return templatePath;
    }
    throw error;
  }
}

export class LlmGenerateTool extends BaseTool {
  readonly name = 'llm_generate';
  readonly description = 'Generate text using the LLM with an optional prompt template';

  readonly inputSchema: ToolSchema = {
    type: 'object',
    properties: {
      prompt: { type: 'string', description: 'Direct prompt text (alternative to template)' },
      prompt_template: { type: 'string', description: 'Path to prompt template file' },
      context: { type: 'string', description: 'Context to inject into the prompt' },
      system_prompt: { type: 'string', description: 'Optional system prompt' },
      max_tokens: { type: 'integer', description: 'Maximum tokens to generate', default: DEFAULT_MAX_TOKENS },
      temperature: { type: 'number', description: 'Sampling temperature (0-1)', default: DEFAULT_TEMPERATURE },
    },
  };

  readonly outputSchema: ToolSchema = {
    type: 'object',
    properties: {
      generated: { type: 'string', description: 'Generated text' },
    },
  };

  constructor(private readonly llm: TextGenerator) {
    super();
  }

  async execute(inputs: ContextMap): Promise<ToolResult> {
    try {
      const prompt = await this.buildPrompt(inputs);
      if (prompt === undefined) {
        return this.failure("No prompt provided (need 'prompt' or 'prompt_template')");
      }

      const maxTokensInput = inputs['max_tokens'];
      const temperatureInput = inputs['temperature'];
      const options = {
        maxTokens: typeof maxTokensInput === 'number' ? maxTokensInput : DEFAULT_MAX_TOKENS,
        temperature: typeof temperatureInput === 'number' ? temperatureInput : DEFAULT_TEMPERATURE,
      };

      const systemPrompt = optionalString(inputs, 'system_prompt');
      const generated =
        systemPrompt !== undefined
          ? await this.llm.chat(
              [
                { role: 'system', content: systemPrompt },
                { role: 'user', content: prompt },
              ],
              options
            )
          : await this.llm.complete(prompt, options);

      return this.success({ generated });
    } catch (error) {
      return this.failure(errorMessage(error));
    }
  }

  private async buildPrompt(inputs: ContextMap): Promise<string | undefined> {
    const templatePath = optionalString(inputs, 'prompt_template');
    const prompt = templatePath !== undefined ? await loadTemplate(templatePath) : optionalString(inputs, 'prompt');
    if (prompt === undefined || prompt === '') {
      return undefined;
    }

    const context = optionalString(inputs, 'context');
    if (context === undefined) {
      return prompt;
    }
    return prompt.split('{{ context }}').join(context).split('{{context}}').join(context);
  }
}
