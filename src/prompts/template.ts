/**
 * Prompt templates and placeholder rendering
 */

import { MissingFieldError } from '../lib/errors';

/**
 * A registered, versioned prompt as stored in the registry
 */
export interface PromptTemplate {
  name: string;
  version: number;
  /** Alias the template was resolved through, when loaded by alias */
  alias?: string;
  body: string;
  tags: Record<string, string>;
}

export type TemplateFields = Readonly<Record<string, string>>;

export type TemplateSource = 'registry' | 'file';

/**
 * Template handed to callers for one request
 */
export interface RenderableTemplate {
  readonly name: string;
  readonly source: TemplateSource;
  readonly version: number | undefined;
  readonly body: string;
  render(fields: TemplateFields): string;
}

// `{{` and `}}` are literal braces, `{name}` is a placeholder
const TOKEN_PATTERN = /\{\{|\}\}|\{(\w+)\}/g;

/**
 * Substitute `{field}` placeholders in order of appearance.
 * Throws MissingFieldError for the first placeholder without a value;
 * fields the body never references are ignored.
 */
export function renderTemplate(body: string, fields: TemplateFields, templateName?: string): string {
  return body.replace(TOKEN_PATTERN, (token: string, field: string | undefined) => {
    if (field === undefined) {
      return token === '{{' ? '{' : '}';
    }
    if (!Object.prototype.hasOwnProperty.call(fields, field)) {
      throw new MissingFieldError(field, templateName);
    }
    return fields[field];
  });
}

/**
 * Placeholder names referenced by a template body, first occurrence first
 */
export function listPlaceholders(body: string): string[] {
  const seen = new Set<string>();
  for (const match of body.matchAll(TOKEN_PATTERN)) {
    const field = match[1];
    if (field !== undefined) {
      seen.add(field);
    }
  }
  return [...seen];
}

class ResolvedTemplate implements RenderableTemplate {
  constructor(
    readonly name: string,
    readonly source: TemplateSource,
    readonly version: number | undefined,
    readonly body: string,
  ) {}

  render(fields: TemplateFields): string {
    return renderTemplate(this.body, fields, this.name);
  }
}

export function fromRegistry(template: PromptTemplate): RenderableTemplate {
  return new ResolvedTemplate(template.name, 'registry', template.version, template.body);
}

export function fromFileContent(name: string, content: string): RenderableTemplate {
  return new ResolvedTemplate(name, 'file', undefined, content);
}
