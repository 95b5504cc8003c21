/**
 * image_generate - placeholder until an image backend is wired in
 */

import { BaseTool } from './base.tool.js';
import type { ContextMap } from '../types/context.js';
import type { ToolResult, ToolSchema } from '../types/tools.js';

export class ImageGenerateTool extends BaseTool {
  readonly name = 'image_generate';
  readonly description = 'Generate an image from a text prompt (placeholder)';

  readonly inputSchema: ToolSchema = {
    type: 'object',
    required: ['prompt'],
    properties: {
      prompt: { type: 'string', description: 'Image generation prompt' },
      negative_prompt: { type: 'string', description: 'Negative prompt (what to avoid)' },
      size: { type: 'string', description: "Image size (e.g., '1024x1024')", default: '1024x1024' },
      style: {
        type: 'string',
        description: 'Image style',
        enum: ['realistic', 'artistic', 'cartoon', 'abstract'],
        default: 'realistic',
      },
    },
  };

  readonly outputSchema: ToolSchema = {
    type: 'object',
    properties: {
      image_path: { type: 'string', description: 'Path to generated image' },
      prompt_used: { type: 'string', description: 'Final prompt used for generation' },
    },
  };

  execute(inputs: ContextMap): Promise<ToolResult> {
    const prompt = inputs['prompt'] ?? '';
    return Promise.resolve(
      this.success(
        { image_path: '[PLACEHOLDER] No image generated', prompt_used: prompt },
        { status: 'placeholder', message: 'Image generation is not configured' }
      )
    );
  }
}
