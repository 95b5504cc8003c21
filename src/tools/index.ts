/**
 * Built-in tool exports
 */

export { BaseTool, buildInputValidator } from './base.tool.js';
export { ScrapeUrlTool, extractContent, SCRAPE_USER_AGENT } from './scrape-url.tool.js';
export type { ScrapeUrlToolOptions } from './scrape-url.tool.js';
export { LlmGenerateTool } from './llm-generate.tool.js';
export { ImageGenerateTool } from './image-generate.tool.js';
export { VideoGenerateTool } from './video-generate.tool.js';
