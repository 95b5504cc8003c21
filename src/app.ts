/**
 * Application wiring
 *
 * Every collaborator is built here and handed down explicitly; nothing below
 * this module reaches for a global.
 */

import express, { type Express } from 'express';
import type { AxiosInstance } from 'axios';
import type { Config } from './utils/index.js';
import { JobStore } from './repositories/index.js';
import {
  ArtifactStore,
  JobRunner,
  LlmClient,
  Planner,
  createToolRegistry,
  type ToolRegistry,
} from './services/index.js';
import { createApiRouter } from './api/index.js';
import type { LanguageModel } from './types/index.js';

export interface AppContext {
  readonly config: Config;
  readonly llm: LanguageModel;
  readonly toolRegistry: ToolRegistry;
  readonly planner: Planner;
  readonly jobStore: JobStore;
  readonly jobRunner: JobRunner;
  readonly artifactStore: ArtifactStore;
  readonly startedAt: number;
}

export interface AppContextOverrides {
  readonly llm?: LanguageModel;
  /** HTTP client used by the scrape tool */
  readonly http?: AxiosInstance;
}

export function createAppContext(config: Config, overrides: AppContextOverrides = {}): AppContext {
  const llm =
    overrides.llm ??
    new LlmClient({
      provider: config.llm.provider,
      baseUrl: config.llm.baseUrl,
      model: config.llm.model,
      timeoutSeconds: config.llm.timeoutSeconds,
      maxRetries: config.llm.maxRetries,
      apiKey: config.llm.apiKey,
    });

  const toolRegistry = createToolRegistry({
    textGenerator: llm,
    scrapeTimeoutSeconds: config.tools.scrapeTimeoutSeconds,
    ...(overrides.http !== undefined && { http: overrides.http }),
  });

  const planner = new Planner(llm, toolRegistry, {
    maxTokens: config.planner.maxTokens,
    temperature: config.planner.temperature,
    defaultMaxSteps: config.planner.maxSteps,
  });

  const jobStore = new JobStore();
  const jobRunner = new JobRunner(jobStore, { maxConcurrent: config.jobs.maxConcurrent });

  return {
    config,
    llm,
    toolRegistry,
    planner,
    jobStore,
    jobRunner,
    artifactStore: new ArtifactStore(config.output.basePath),
    startedAt: Date.now(),
  };
}

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use('/', createApiRouter(ctx));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
      },
      meta: {
        requestId: req.requestId ?? 'unknown',
        timestamp: new Date().toISOString(),
      },
    });
  });

  return app;
}
