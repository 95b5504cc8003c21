/**
 * Tool Registry - name → tool lookup for the planner
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger.js';
import {
  ImageGenerateTool,
  LlmGenerateTool,
  ScrapeUrlTool,
  VideoGenerateTool,
} from '../tools/index.js';
import type { TextGenerator } from '../types/llm.js';
import type { ToolContract, ToolDescription } from '../types/tools.js';

export interface BuiltinToolDeps {
  readonly textGenerator: TextGenerator;
  readonly scrapeTimeoutSeconds?: number;
  readonly http?: AxiosInstance;
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolContract>();
  private readonly logger: Logger;

  constructor(tools: readonly ToolContract[] = []) {
    this.logger = createChildLogger({ service: 'ToolRegistry' });
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Add a tool. A later registration under the same name replaces the earlier one.
   */
  register(tool: ToolContract): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn({ tool: tool.name }, 'Replacing registered tool');
    }
    this.tools.set(tool.name, tool);
  }

  getTool(name: string): ToolContract | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listTools(): string[] {
    return [...this.tools.keys()];
  }

  describeAll(): ToolDescription[] {
    return [...this.tools.values()].map((tool) => tool.describe());
  }
}

/**
 * Registry holding every built-in tool, sharing the given dependencies
 */
export function createToolRegistry(deps: BuiltinToolDeps): ToolRegistry {
  const scrapeOptions = {
    ...(deps.scrapeTimeoutSeconds !== undefined && { timeoutSeconds: deps.scrapeTimeoutSeconds }),
    ...(deps.http !== undefined && { http: deps.http }),
  };

  return new ToolRegistry([
    new ScrapeUrlTool(scrapeOptions),
    new LlmGenerateTool(deps.textGenerator),
    new ImageGenerateTool(),
    new VideoGenerateTool(),
  ]);
}
