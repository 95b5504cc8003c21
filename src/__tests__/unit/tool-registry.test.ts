/**
 * Tool registry and placeholder tool tests
 */

import { ToolRegistry, createToolRegistry } from '../../services/tool-registry.js';
import { ImageGenerateTool } from '../../tools/image-generate.tool.js';
import { VideoGenerateTool } from '../../tools/video-generate.tool.js';
import type { TextGenerator } from '../../types/llm.js';

const textGenerator: TextGenerator = {
  complete: () => Promise.resolve(''),
  chat: () => Promise.resolve(''),
};

describe('ToolRegistry', () => {
  it('should start empty', () => {
    const registry = new ToolRegistry();

    expect(registry.listTools()).toEqual([]);
    expect(registry.getTool('scrape_url')).toBeUndefined();
    expect(registry.has('scrape_url')).toBe(false);
  });

  it('should register the built-in tools', () => {
    const registry = createToolRegistry({ textGenerator, scrapeTimeoutSeconds: 5 });

    expect(registry.listTools()).toEqual(['scrape_url', 'llm_generate', 'image_generate', 'video_generate']);
    expect(registry.describeAll().map((d) => d.name)).toEqual(registry.listTools());
    expect(registry.getTool('llm_generate')?.description).toBe(
      'Generate text using the LLM with an optional prompt template'
    );
  });

  it('should let a later registration replace an earlier one', () => {
    const registry = new ToolRegistry([new ImageGenerateTool()]);
    const replacement = new ImageGenerateTool();
    registry.register(replacement);

    expect(registry.listTools()).toEqual(['image_generate']);
    expect(registry.getTool('image_generate')).toBe(replacement);
  });
});

describe('placeholder tools', () => {
  it('should echo the image prompt', async () => {
    const result = await new ImageGenerateTool().execute({ prompt: 'a red door' });

    expect(result.success).toBe(true);
    expect(result.outputs).toEqual({ image_path: '[PLACEHOLDER] No image generated', prompt_used: 'a red door' });
    expect(result.metadata?.['status']).toBe('placeholder');
  });

  it('should validate the image style', () => {
    expect(new ImageGenerateTool().validateInputs({ prompt: 'x', style: 'noir' })).toEqual({
      valid: false,
      error: 'Invalid value for style: expected one of realistic, artistic, cartoon, abstract',
    });
  });

  it('should default the video duration', async () => {
    const result = await new VideoGenerateTool().execute({ prompt: 'waves' });

    expect(result.outputs).toEqual({ video_path: '[PLACEHOLDER] No video generated', duration: 5 });
    expect(result.metadata?.['status']).toBe('placeholder');
  });
});
