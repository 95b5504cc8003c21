/**
 * Configuration loader for the planrunner service
 * Reads configuration from environment variables with validation
 */

import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

const ConfigSchema = z.object({
  // Server
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().default('0.0.0.0'),

  // Text generation backend
  llm: z.object({
    provider: z.enum(['ollama', 'openai']).default('ollama'),
    baseUrl: z.string().url().default('http://localhost:11434'),
    model: z.string().min(1).default('llama3.2'),
    timeoutSeconds: z.coerce.number().int().min(1).max(3600).default(120),
    maxRetries: z.coerce.number().int().min(1).max(10).default(3),
    apiKey: z.string().optional(),
  }),

  // Job execution
  jobs: z.object({
    maxConcurrent: z.coerce.number().int().min(1).max(64).default(4),
    retentionHours: z.coerce.number().min(1).max(24 * 365).default(24),
    cleanupIntervalMinutes: z.coerce.number().int().min(1).max(1440).default(60),
  }),

  // Plan generation
  planner: z.object({
    maxSteps: z.coerce.number().int().min(1).max(50).default(10),
    maxTokens: z.coerce.number().int().min(256).max(32000).default(2000),
    temperature: z.coerce.number().min(0).max(2).default(0.1),
  }),

  // Tools
  tools: z.object({
    scrapeTimeoutSeconds: z.coerce.number().int().min(1).max(300).default(30),
  }),

  // Artifacts
  output: z.object({
    basePath: z.string().default('./outputs'),
  }),

  // Logging
  log: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    pretty: z
      .enum(['true', 'false', '1', '0'])
      .default('false')
      .transform((value) => value === 'true' || value === '1'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function loadConfig(): Config {
  const env = process.env;

  const rawConfig = {
    nodeEnv: emptyToUndefined(env['NODE_ENV']),
    port: emptyToUndefined(env['PORT']),
    host: emptyToUndefined(env['HOST']),
    llm: {
      provider: emptyToUndefined(env['LLM_PROVIDER']),
      baseUrl: emptyToUndefined(env['LLM_BASE_URL']),
      model: emptyToUndefined(env['LLM_MODEL']),
      timeoutSeconds: emptyToUndefined(env['LLM_TIMEOUT_SECONDS']),
      maxRetries: emptyToUndefined(env['LLM_MAX_RETRIES']),
      apiKey: emptyToUndefined(env['LLM_API_KEY']),
    },
    jobs: {
      maxConcurrent: emptyToUndefined(env['JOBS_MAX_CONCURRENT']),
      retentionHours: emptyToUndefined(env['JOBS_RETENTION_HOURS']),
      cleanupIntervalMinutes: emptyToUndefined(env['JOBS_CLEANUP_INTERVAL_MINUTES']),
    },
    planner: {
      maxSteps: emptyToUndefined(env['PLANNER_MAX_STEPS']),
      maxTokens: emptyToUndefined(env['PLANNER_MAX_TOKENS']),
      temperature: emptyToUndefined(env['PLANNER_TEMPERATURE']),
    },
    tools: {
      scrapeTimeoutSeconds: emptyToUndefined(env['SCRAPE_TIMEOUT_SECONDS']),
    },
    output: {
      basePath: emptyToUndefined(env['OUTPUT_BASE_PATH']),
    },
    log: {
      level: emptyToUndefined(env['LOG_LEVEL']),
      pretty: emptyToUndefined(env['LOG_PRETTY']),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (configInstance === null) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allows resetting config
export function resetConfig(): void {
  configInstance = null;
}

export default getConfig;
