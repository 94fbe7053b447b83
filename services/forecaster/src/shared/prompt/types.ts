/**
 * Prompt Types
 * Templates are plain data handed to the pipeline through its config
 */

import { z } from "zod";

export const PROMPT_ROLES = [
  "search-query",
  "relevance",
  "summarization",
  "base-reasoning",
  "meta-reasoning",
  "alignment",
  "category",
  "ill-defined",
] as const;

export type PromptRole = (typeof PROMPT_ROLES)[number];

export const PromptTemplateSchema = z.object({
  /** Unique identifier (e.g. "reasoning-scratchpad") */
  id: z.string().min(1),

  /** Pipeline step this template serves */
  role: z.enum(PROMPT_ROLES),

  version: z.string().default("1"),

  description: z.string().optional(),

  systemPrompt: z.string().optional(),

  /** Body with {{variable}} placeholders */
  template: z.string().min(1),
});

export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;

/**
 * Template schema that also checks the template serves `role`
 */
export function templateSchemaFor(role: PromptRole) {
  return PromptTemplateSchema.refine((template) => template.role === role, {
    message: `Template role must be ${role}`,
  });
}

export type PromptVariables = Record<string, string | number>;

/**
 * Prompt registry interface
 */
export interface IPromptRegistry {
  get(id: string): PromptTemplate | undefined;

  /**
   * Like get, but a missing id is a configuration error
   */
  require(id: string): PromptTemplate;

  register(template: PromptTemplate): void;

  list(role?: PromptRole): PromptTemplate[];

  render(id: string, variables: PromptVariables): string;
}
