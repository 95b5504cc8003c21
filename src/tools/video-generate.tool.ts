/**
 * video_generate - placeholder until a video backend is wired in
 */

import { BaseTool } from './base.tool.js';
import type { ContextMap } from '../types/context.js';
import type { ToolResult, ToolSchema } from '../types/tools.js';

export class VideoGenerateTool extends BaseTool {
  readonly name = 'video_generate';
  readonly description = 'Generate a video from a prompt or image (placeholder)';

  readonly inputSchema: ToolSchema = {
    type: 'object',
    required: ['prompt'],
    properties: {
      prompt: { type: 'string', description: 'Video generation prompt' },
      source_image: { type: 'string', description: 'Optional source image path' },
      duration: { type: 'integer', description: 'Video duration in seconds', default: 5 },
      fps: { type: 'integer', description: 'Frames per second', default: 24 },
    },
  };

  readonly outputSchema: ToolSchema = {
    type: 'object',
    properties: {
      video_path: { type: 'string', description: 'Path to generated video' },
      duration: { type: 'integer', description: 'Actual video duration' },
    },
  };

  execute(inputs: ContextMap): Promise<ToolResult> {
    const duration = inputs['duration'] ?? 5;
    return Promise.resolve(
      this.success(
        { video_path: '[PLACEHOLDER] No video generated', duration },
        { status: 'placeholder', message: 'Video generation is not configured' }
      )
    );
  }
}
