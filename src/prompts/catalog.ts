/**
 * Prompt catalog loader
 */

import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { resolvePromptPath } from './file-loader';

export const CATALOG_FILE = 'catalog.yaml';

export const OperationSchema = z.enum([
  'analyze_skills',
  'generate_plan',
  'performance_review',
  'mentor_simulation',
]);

export type Operation = z.infer<typeof OperationSchema>;

const CatalogEntrySchema = z.object({
  operation: OperationSchema,
  name: z.string().min(1),
  file: z.string().min(1),
  endpoint: z.string().startsWith('/'),
  responseKey: z.string().min(1),
  metric: z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

const CatalogSchema = z
  .object({ prompts: z.array(CatalogEntrySchema).min(1) })
  .superRefine((catalog, ctx) => {
    for (const operation of OperationSchema.options) {
      const count = catalog.prompts.filter((entry) => entry.operation === operation).length;
      if (count !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['prompts'],
          message: `expected exactly one entry for '${operation}', found ${count}`,
        });
      }
    }
  });

export class PromptCatalog {
  private readonly byOperation: Map<Operation, CatalogEntry>;

  constructor(readonly entries: readonly CatalogEntry[]) {
    this.byOperation = new Map(entries.map((entry) => [entry.operation, entry]));
  }

  get(operation: Operation): CatalogEntry {
    const entry = this.byOperation.get(operation);
    if (!entry) {
      throw new Error(`No catalog entry for operation '${operation}'`);
    }
    return entry;
  }

  names(): string[] {
    return this.entries.map((entry) => entry.name);
  }
}

/**
 * Parse catalog YAML. Throws with every validation issue listed.
 */
export function parseCatalog(content: string, source = CATALOG_FILE): PromptCatalog {
  const parsed = CatalogSchema.safeParse(yaml.load(content));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid prompt catalog ${source}:\n${issues.join('\n')}`);
  }
  return new PromptCatalog(parsed.data.prompts);
}

export async function loadCatalog(promptsDir: string): Promise<PromptCatalog> {
  const path = resolvePromptPath(CATALOG_FILE, promptsDir);
  return parseCatalog(await readFile(path, 'utf-8'), path);
}
