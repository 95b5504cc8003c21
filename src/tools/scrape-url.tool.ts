/**
 * scrape_url - fetch a page and extract its readable text
 */

import axios, { type AxiosInstance } from 'axios';
import { HTMLElement, TextNode, parse, type Node } from 'node-html-parser';
import type { Logger } from 'pino';
import { BaseTool } from './base.tool.js';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ContextMap } from '../types/context.js';
import type { ToolResult, ToolSchema } from '../types/tools.js';

export const SCRAPE_USER_AGENT = 'Mozilla/5.0 (compatible; PlanRunner/1.0)';

const STRIPPED_ELEMENTS = 'script, style, nav, footer, header';
const MAX_REDIRECTS = 5;

export interface ScrapeUrlToolOptions {
  readonly timeoutSeconds?: number;
  readonly http?: AxiosInstance;
}

/**
 * Stripped, non-empty text fragments under a node, in document order
 */
function textFragments(node: Node, out: string[] = []): string[] {
  if (node instanceof TextNode) {
    const text = node.text.trim();
    if (text !== '') {
      out.push(text);
    }
    return out;
  }
  for (const child of node.childNodes) {
    textFragments(child, out);
  }
  return out;
}

function finalUrlOf(request: unknown, fallback: string): string {
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const res = request.res;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return fallback;
}

export function extractContent(html: string, selector?: string): { content: string; title: string } {
  const root = parse(html);
  const title = root.querySelector('title')?.text.trim() ?? '';

  if (selector !== undefined && selector !== '') {
    const content = root
      .querySelectorAll(selector)
      .map((el: HTMLElement) => textFragments(el).join(''))
      .filter((text) => text !== '')
      .join('\n\n');
    return { content, title };
  }

  for (const el of root.querySelectorAll(STRIPPED_ELEMENTS)) {
    el.remove();
  }
  return { content: textFragments(root).join('\n'), title };
}

export class ScrapeUrlTool extends BaseTool {
  readonly name = 'scrape_url';
  readonly description = 'Scrape content from a web URL with optional CSS selector';

  readonly inputSchema: ToolSchema = {
    type: 'object',
    required: ['url'],
    properties: {
      url: { type: 'string', description: 'URL to scrape' },
      selector: { type: 'string', description: 'CSS selector to extract specific content' },
      timeout: { type: 'integer', description: 'Request timeout in seconds', default: 30 },
    },
  };

  readonly outputSchema: ToolSchema = {
    type: 'object',
    properties: {
      content: { type: 'string', description: 'Extracted text content' },
      title: { type: 'string', description: 'Page title' },
      url: { type: 'string', description: 'Final URL after redirects' },
    },
  };

  private readonly http: AxiosInstance;
  private readonly timeoutSeconds: number;
  private readonly logger: Logger;

  constructor(options: ScrapeUrlToolOptions = {}) {
    super();
    this.http = options.http ?? axios.create();
    this.timeoutSeconds = options.timeoutSeconds ?? 30;
    this.logger = createChildLogger({ tool: 'scrape_url' });
  }

  async execute(inputs: ContextMap): Promise<ToolResult> {
    const url = inputs['url'];
    if (typeof url !== 'string' || url === '') {
      return this.failure('Missing required field: url');
    }
    const selector = typeof inputs['selector'] === 'string' ? inputs['selector'] : undefined;
    const timeout = typeof inputs['timeout'] === 'number' ? inputs['timeout'] : this.timeoutSeconds;

    try {
      const response = await this.http.get<unknown>(url, {
        timeout: timeout * 1000,
        maxRedirects: MAX_REDIRECTS,
        responseType: 'text',
        headers: { 'User-Agent': SCRAPE_USER_AGENT },
      });
      const html = typeof response.data === 'string' ? response.data : '';
      const { content, title } = extractContent(html, selector);

      this.logger.debug({ url, length: content.length }, 'Page scraped');
      return this.success({ content, title, url: finalUrlOf(response.request, url) });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const detail = error.response !== undefined ? `status ${error.response.status}` : error.message;
        return this.failure(`HTTP error: ${detail}`);
      }
      this.logger.error({ url, error: errorMessage(error) }, 'Scrape failed');
      return this.failure(errorMessage(error));
    }
  }
}
