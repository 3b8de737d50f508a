/**
 * Main export file for embedding the career companion service
 */

export { createContainer, createTestContainer, type Deps, type DepsOverrides } from './app/container';
export { createApp, startServer, stopServer } from './server/app';
export { createAppConfig, CONSTANTS, type AppConfig } from './config/app-config';
export { createLogger, createTimer } from './lib/logger';
export * from './lib/errors';
export * from './types/core';

// Prompts
export {
  renderTemplate,
  listPlaceholders,
  type PromptTemplate,
  type RenderableTemplate,
  type TemplateFields,
} from './prompts/template';
export {
  CachedTemplateStore,
  InMemoryTemplateStore,
  DEFAULT_ALIAS,
  type PromptSummary,
  type TemplateStore,
} from './prompts/template-store';
export { PromptResolver, type PromptResolverOptions } from './prompts/resolver';
export { readPromptFile } from './prompts/file-loader';
export { loadCatalog, parseCatalog, PromptCatalog, type CatalogEntry } from './prompts/catalog';

// Infrastructure
export { MlflowTemplateStore } from './infrastructure/mlflow/prompt-registry';
export { MlflowTrackingBackend, type TrackingBackend } from './infrastructure/mlflow/tracking';
export { createMlflowClient, type MlflowClient } from './infrastructure/mlflow/client';
export { GeminiClient, type ModelClient } from './infrastructure/ai/gemini-client';
export { createSecretProvider, type SecretProvider } from './infrastructure/secrets';
export { PrometheusTelemetry, type TelemetrySink } from './infrastructure/telemetry';

// Tracking and services
export { InteractionRecorder, type Interaction } from './tracking/interaction-recorder';
export { InMemoryTrackingBackend } from './tracking/memory-tracking';
export { CareerService } from './services/career-service';
