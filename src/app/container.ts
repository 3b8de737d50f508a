/**
 * Dependency Injection Container
 *
 * Builds every service from configuration, with per-dependency overrides
 * for tests.
 */

import type { Logger } from 'pino';
import { createLogger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { CONSTANTS, createAppConfig, type AppConfig } from '../config/app-config';
import { createSecretProvider, type SecretProvider } from '../infrastructure/secrets';
import { createMlflowClient, type MlflowClient } from '../infrastructure/mlflow/client';
import { MlflowTemplateStore } from '../infrastructure/mlflow/prompt-registry';
import { MlflowTrackingBackend, type TrackingBackend } from '../infrastructure/mlflow/tracking';
import { GeminiClient, type ModelClient } from '../infrastructure/ai/gemini-client';
import { PrometheusTelemetry } from '../infrastructure/telemetry';
import {
  CachedTemplateStore,
  InMemoryTemplateStore,
  type TemplateStore,
} from '../prompts/template-store';
import { PromptResolver } from '../prompts/resolver';
import { loadCatalog, type PromptCatalog } from '../prompts/catalog';
import { InteractionRecorder } from '../tracking/interaction-recorder';
import { InMemoryTrackingBackend } from '../tracking/memory-tracking';
import { CareerService } from '../services/career-service';

/**
 * All application dependencies with their types
 */
export interface Deps {
  config: AppConfig;
  logger: Logger;

  // Infrastructure
  secrets: SecretProvider;
  store: TemplateStore;
  tracking: TrackingBackend;
  model: ModelClient;
  telemetry: PrometheusTelemetry;

  // Prompts
  catalog: PromptCatalog;
  resolver: PromptResolver;

  // Services
  recorder: InteractionRecorder;
  careerService: CareerService;
}

/**
 * Container environment presets
 */
export type ContainerEnvironment = 'default' | 'test';

export interface ContainerConfigOverrides {
  config?: AppConfig;
  environment?: ContainerEnvironment;
}

/**
 * Partial dependency overrides for testing
 */
export type DepsOverrides = Partial<Deps>;

/**
 * Tracking server URL: the secret when one is stored, else configuration.
 * Looked up once per container.
 */
function trackingUriLookup(
  secrets: SecretProvider,
  config: AppConfig,
  logger: Logger,
): () => Promise<string> {
  let uri: Promise<string> | undefined;
  return () => {
    uri ??= secrets.getSecret(CONSTANTS.SECRETS.MLFLOW_TRACKING_URI).catch((error: unknown) => {
      logger.debug({ error: errorMessage(error) }, 'Using configured tracking URI');
      return config.registry.trackingUri;
    });
    return uri;
  };
}

/**
 * Create application container with all dependencies
 */
export async function createContainer(
  configOverrides: ContainerConfigOverrides = {},
  depsOverrides: DepsOverrides = {},
): Promise<Deps> {
  const baseConfig = configOverrides.config ?? createAppConfig();

  // The test preset applies to a copy; the caller's config is left as given
  const appConfig: AppConfig =
    configOverrides.environment === 'test'
      ? {
          ...baseConfig,
          server: { ...baseConfig.server, logLevel: 'silent' },
          registry: { ...baseConfig.registry, backend: 'memory' },
          prompts: { ...baseConfig.prompts, cacheTtlSeconds: 0 },
        }
      : baseConfig;

  // Create logger first as other services depend on it
  const logger = depsOverrides.logger ?? createLogger({ level: appConfig.server.logLevel });

  const secrets =
    depsOverrides.secrets ??
    createSecretProvider(appConfig.secrets.backend, logger, { projectId: appConfig.secrets.projectId });

  let mlflow: MlflowClient | undefined;
  const getMlflow = (): MlflowClient => {
    mlflow ??= createMlflowClient(
      {
        baseUrl: trackingUriLookup(secrets, appConfig, logger),
        timeoutMs: appConfig.registry.timeoutMs,
      },
      logger,
    );
    return mlflow;
  };

  const useMlflow = appConfig.registry.backend === 'mlflow';

  const store =
    depsOverrides.store ??
    new CachedTemplateStore(
      useMlflow ? new MlflowTemplateStore(getMlflow(), logger) : new InMemoryTemplateStore(),
      logger,
      { ttlSeconds: appConfig.prompts.cacheTtlSeconds },
    );

  const tracking =
    depsOverrides.tracking ??
    (useMlflow
      ? new MlflowTrackingBackend(getMlflow(), appConfig.registry.experimentId, logger)
      : new InMemoryTrackingBackend());

  const model = depsOverrides.model ?? new GeminiClient(appConfig.model, secrets, logger);

  const telemetry =
    depsOverrides.telemetry ??
    new PrometheusTelemetry(logger, { defaultMetrics: configOverrides.environment !== 'test' });

  const catalog = depsOverrides.catalog ?? (await loadCatalog(appConfig.prompts.dir));

  const resolver =
    depsOverrides.resolver ??
    new PromptResolver(store, logger, {
      promptsDir: appConfig.prompts.dir,
      modelTag: appConfig.model.name,
      autoPromote: appConfig.prompts.autoPromote,
    });

  const recorder =
    depsOverrides.recorder ??
    new InteractionRecorder(tracking, logger, { environment: appConfig.server.appEnv });

  const careerService =
    depsOverrides.careerService ??
    new CareerService({
      resolver,
      store,
      catalog,
      model,
      recorder,
      tracking,
      telemetry,
      logger,
      alias: appConfig.prompts.alias,
    });

  logger.info(
    {
      config: {
        nodeEnv: appConfig.server.nodeEnv,
        appEnv: appConfig.server.appEnv,
        port: appConfig.server.port,
        registryBackend: appConfig.registry.backend,
        secretBackend: appConfig.secrets.backend,
        promptAlias: appConfig.prompts.alias,
        model: appConfig.model.name,
      },
      prompts: catalog.names(),
    },
    'Dependency container created',
  );

  return {
    config: appConfig,
    logger,
    secrets,
    store,
    tracking,
    model,
    telemetry,
    catalog,
    resolver,
    recorder,
    careerService,
  };
}

/**
 * Container with in-memory backends and silent logging
 */
export async function createTestContainer(overrides: DepsOverrides = {}): Promise<Deps> {
  return createContainer({ environment: 'test' }, overrides);
}
