/**
 * Request schemas for the career endpoints and prompt administration
 */

import { z } from 'zod';
import { CONSTANTS } from '../config/app-config';
import { ValidationError } from '../lib/errors';

const text = z.string().trim().min(1, 'must not be empty');
const textOrNumber = z.union([text, z.number().nonnegative()]).transform(String);

export const SkillGapRequestSchema = z.object({
  current_skills: text,
  target_role: text,
});

export const CareerPlanRequestSchema = z.object({
  current_role: text,
  target_role: text,
  years_experience: textOrNumber,
  timeline: text,
});

export const ReviewRequestSchema = z.object({
  employee_name: text,
  role: text,
  review_period: text,
  achievements: text,
  areas_for_improvement: text,
});

export const MentorRequestSchema = z.object({
  career_stage: text,
  question: text,
});

export type SkillGapRequest = z.infer<typeof SkillGapRequestSchema>;
export type CareerPlanRequest = z.infer<typeof CareerPlanRequestSchema>;
export type ReviewRequest = z.infer<typeof ReviewRequestSchema>;
export type MentorRequest = z.infer<typeof MentorRequestSchema>;

export const RegisterPromptSchema = z.object({
  prompt_name: z.string().trim().regex(/^[\w.-]+$/, 'may only contain letters, digits, _ . -'),
  prompt_content: text,
  model: text.default(CONSTANTS.DEFAULTS.GEMINI_MODEL),
});

export const PromoteAliasSchema = z.object({
  version: z.coerce.number().int().positive(),
  alias: text.default(CONSTANTS.DEFAULTS.PROMPT_ALIAS),
});

export const EndpointMetricsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
});

/**
 * Validate input against a schema, throwing ValidationError listing every issue
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new ValidationError('Request validation failed', issues);
  }
  return result.data;
}
