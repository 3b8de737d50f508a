/**
 * Response shapes of the MLflow REST API endpoints the service calls
 */

import { z } from 'zod';

const TagSchema = z.object({
  key: z.string(),
  value: z.string().default(''),
});

export type MlflowTag = z.infer<typeof TagSchema>;

export const ModelVersionSchema = z.object({
  name: z.string(),
  version: z.coerce.number().int().positive(),
  description: z.string().optional(),
  tags: z.array(TagSchema).default([]),
  aliases: z.array(z.string()).default([]),
});

export type MlflowModelVersion = z.infer<typeof ModelVersionSchema>;

export const ModelVersionResponseSchema = z.object({
  model_version: ModelVersionSchema,
});

export const RegisteredModelSchema = z.object({
  name: z.string(),
  tags: z.array(TagSchema).default([]),
  aliases: z
    .array(z.object({ alias: z.string(), version: z.coerce.number().int().positive() }))
    .default([]),
  latest_versions: z.array(ModelVersionSchema).default([]),
});

export const SearchRegisteredModelsResponseSchema = z.object({
  registered_models: z.array(RegisteredModelSchema).default([]),
  next_page_token: z.string().optional(),
});

export const EmptyResponseSchema = z.object({}).passthrough();

export const RunInfoSchema = z.object({
  run_id: z.string(),
  status: z.string().optional(),
  start_time: z.coerce.number().optional(),
  artifact_uri: z.string().optional(),
});

export const CreateRunResponseSchema = z.object({
  run: z.object({ info: RunInfoSchema }),
});

const MetricSchema = z.object({
  key: z.string(),
  value: z.number(),
});

export const RunSchema = z.object({
  info: RunInfoSchema,
  data: z
    .object({
      metrics: z.array(MetricSchema).default([]),
      tags: z.array(TagSchema).default([]),
    })
    .default({}),
});

export type MlflowRun = z.infer<typeof RunSchema>;

export const SearchRunsResponseSchema = z.object({
  runs: z.array(RunSchema).default([]),
  next_page_token: z.string().optional(),
});

export const ErrorResponseSchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional(),
});

export function tagsToRecord(tags: MlflowTag[]): Record<string, string> {
  return Object.fromEntries(tags.map((tag) => [tag.key, tag.value]));
}

export function recordToTags(record: Record<string, string>): MlflowTag[] {
  return Object.entries(record).map(([key, value]) => ({ key, value }));
}
