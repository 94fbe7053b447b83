/**
 * Prompt Registry
 * In-memory template lookup and strict {{variable}} rendering
 */

import { ConfigError, ValidationError } from "@foresight/core";
import type { IPromptRegistry, PromptRole, PromptTemplate, PromptVariables } from "./types.js";

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Placeholder names in order of first appearance
 */
export function placeholdersOf(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Substitute every placeholder. A placeholder without a value throws
 * instead of leaking "{{name}}" into a prompt.
 */
export function renderTemplate(template: PromptTemplate, variables: PromptVariables): string {
  const missing = placeholdersOf(template.template).filter((name) => !(name in variables));
  if (missing.length > 0) {
    throw new ValidationError(`Prompt ${template.id} is missing variables: ${missing.join(", ")}`, {
      field: missing[0],
      context: { promptId: template.id, missing },
    });
  }

  return template.template.replace(PLACEHOLDER, (_match, name: string) => String(variables[name]));
}

export class PromptRegistry implements IPromptRegistry {
  private readonly prompts: Map<string, PromptTemplate> = new Map();

  constructor(templates: readonly PromptTemplate[] = []) {
    for (const template of templates) {
      this.register(template);
    }
  }

  get(id: string): PromptTemplate | undefined {
    return this.prompts.get(id);
  }

  require(id: string): PromptTemplate {
    const template = this.prompts.get(id);
    if (!template) {
      throw new ConfigError(`Prompt not found: ${id}`, { id });
    }
    return template;
  }

  register(template: PromptTemplate): void {
    this.prompts.set(template.id, template);
  }

  list(role?: PromptRole): PromptTemplate[] {
    const all = Array.from(this.prompts.values());
    return role ? all.filter((p) => p.role === role) : all;
  }

  render(id: string, variables: PromptVariables): string {
    return renderTemplate(this.require(id), variables);
  }
}

/**
 * Helper to define a template with a default version
 */
export function definePrompt(
  config: Omit<PromptTemplate, "version"> & { version?: string }
): PromptTemplate {
  return Object.freeze({ ...config, version: config.version ?? "1" });
}
