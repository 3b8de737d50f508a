/**
 * Unified Application Configuration
 *
 * Single source of truth for all configuration with Zod validation.
 * Consolidates environment variables, constants, and defaults.
 */

import { z } from 'zod';
import { readFileSync } from 'fs';
import { join, resolve } from 'path';

export const CONSTANTS = {
  SERVICE: {
    NAME: 'ai_career_companion',
    CLOUD_PROVIDER: 'gcp',
  },
  TIMEOUTS: {
    MLFLOW: 10000, // 10s
    GEMINI: 60000, // 60s
  },
  DEFAULTS: {
    HOST: '0.0.0.0',
    PORT: 8080,
    MLFLOW_TRACKING_URI: 'http://localhost:5000',
    MLFLOW_EXPERIMENT_ID: '0',
    PROMPT_ALIAS: 'production',
    PROMPT_CACHE_TTL: 300, // seconds
    GEMINI_MODEL: 'gemini-1.5-flash',
  },
  SECRETS: {
    GEMINI_API_KEY: 'gemini-api-key',
    MLFLOW_TRACKING_URI: 'mlflow-tracking-uri',
  },
} as const;

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('development');
const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const AppConfigSchema = z.object({
  server: z.object({
    nodeEnv: NodeEnvSchema,
    appEnv: z.string().min(1).default('development'),
    logLevel: LogLevelSchema,
    port: z.coerce.number().int().min(1).max(65535).default(CONSTANTS.DEFAULTS.PORT),
    host: z.string().min(1).default(CONSTANTS.DEFAULTS.HOST),
    version: z.string(),
  }),
  prompts: z.object({
    dir: z.string().min(1),
    alias: z.string().min(1).default(CONSTANTS.DEFAULTS.PROMPT_ALIAS),
    autoPromote: z.boolean().default(true),
    cacheTtlSeconds: z.coerce.number().int().min(0).default(CONSTANTS.DEFAULTS.PROMPT_CACHE_TTL),
  }),
  registry: z.object({
    backend: z.enum(['mlflow', 'memory']).default('mlflow'),
    trackingUri: z.string().url().default(CONSTANTS.DEFAULTS.MLFLOW_TRACKING_URI),
    experimentId: z.string().min(1).default(CONSTANTS.DEFAULTS.MLFLOW_EXPERIMENT_ID),
    timeoutMs: z.coerce.number().int().positive().default(CONSTANTS.TIMEOUTS.MLFLOW),
  }),
  model: z.object({
    name: z.string().min(1).default(CONSTANTS.DEFAULTS.GEMINI_MODEL),
    timeoutMs: z.coerce.number().int().positive().default(CONSTANTS.TIMEOUTS.GEMINI),
    temperature: z.number().min(0).max(2).default(0.7),
    topP: z.number().min(0).max(1).default(0.95),
    topK: z.number().int().positive().default(40),
    maxOutputTokens: z.number().int().positive().default(1024),
  }),
  secrets: z.object({
    backend: z.enum(['env', 'gcp']).default('env'),
    projectId: z.string().min(1).optional(),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Get package version from package.json (two levels up from src/config and dist/config)
 */
export function getPackageVersion(): string {
  try {
    const packageJsonPath = join(__dirname, '..', '..', 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Empty strings count as unset
 */
function getEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Create configuration with environment variable overrides and validation
 */
export function createAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    server: {
      nodeEnv: getEnvValue(env, 'NODE_ENV'),
      appEnv: getEnvValue(env, 'APP_ENV'),
      logLevel: getEnvValue(env, 'LOG_LEVEL'),
      port: getEnvValue(env, 'PORT'),
      host: getEnvValue(env, 'HOST'),
      version: getPackageVersion(),
    },
    prompts: {
      dir: resolve(getEnvValue(env, 'PROMPTS_DIR') ?? join(process.cwd(), 'prompts')),
      alias: getEnvValue(env, 'PROMPT_ALIAS'),
      autoPromote: parseBoolean(getEnvValue(env, 'PROMPT_AUTO_PROMOTE')),
      cacheTtlSeconds: getEnvValue(env, 'PROMPT_CACHE_TTL_SECONDS'),
    },
    registry: {
      backend: getEnvValue(env, 'REGISTRY_BACKEND'),
      trackingUri: getEnvValue(env, 'MLFLOW_TRACKING_URI'),
      experimentId: getEnvValue(env, 'MLFLOW_EXPERIMENT_ID'),
      timeoutMs: getEnvValue(env, 'MLFLOW_TIMEOUT_MS'),
    },
    model: {
      name: getEnvValue(env, 'GEMINI_MODEL'),
      timeoutMs: getEnvValue(env, 'GEMINI_TIMEOUT_MS'),
    },
    secrets: {
      backend: getEnvValue(env, 'SECRET_BACKEND'),
      projectId: getEnvValue(env, 'GOOGLE_CLOUD_PROJECT'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Configuration validation failed:\n${issues.join('\n')}`);
  }

  return result.data;
}
