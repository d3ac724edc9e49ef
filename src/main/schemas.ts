/**
 * Zod schemas for everything read from outside the process.
 *
 * The settings file and saved chats live on disk and may have been edited by
 * hand; command-line values come straight from the user. Validating them here
 * keeps malformed data from reaching the registry or the session loop.
 */

import { z } from 'zod';
import { PROVIDER_NAMES } from '../shared/types';
import { ConfigError } from './services/ai/errors';

// ── Providers ──────────────────────────────────────────────────────────────

export const ProviderNameSchema = z.enum(PROVIDER_NAMES);

const ModelIdSchema = z.string().trim().min(1).max(200);

export const ProviderModelsSchema = z.object({
  anthropic: ModelIdSchema,
  google: ModelIdSchema,
  mistral: ModelIdSchema,
  openai: ModelIdSchema,
});

export const BaseUrlsSchema = z.object({
  anthropic: z.string().url().optional(),
  google: z.string().url().optional(),
  mistral: z.string().url().optional(),
  openai: z.string().url().optional(),
});

// ── Settings ───────────────────────────────────────────────────────────────

export const AppSettingsSchema = z.object({
  defaultProvider: ProviderNameSchema,
  models: ProviderModelsSchema,
  baseUrls: BaseUrlsSchema,
  timeoutMs: z.number().int().min(1000).max(600_000),
  maxTokens: z.number().int().min(1).max(200_000),
  temperature: z.number().min(0).max(2).nullable(),
  stream: z.boolean(),
  plain: z.boolean(),
});

/** What may actually be on disk: any subset, merged over the defaults */
export const StoredSettingsSchema = AppSettingsSchema.partial().extend({
  models: ProviderModelsSchema.partial().optional(),
});

export const ApiKeySchema = z.string().trim().min(8).max(512);

// ── Saved chats ────────────────────────────────────────────────────────────

export const SessionNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(100)
  .regex(/^[\w.-]+$/, 'use letters, digits, dots, dashes or underscores')
  .refine((name) => name !== '__proto__', 'this name is reserved');

export const TurnSchema = z.object({
  id: z.string().min(1),
  role: z.enum(['user', 'assistant', 'system']),
  text: z.string(),
  timestamp: z.string().datetime(),
});

export const SavedChatSchema = z.object({
  name: SessionNameSchema,
  provider: ProviderNameSchema,
  model: ModelIdSchema,
  turns: z.array(TurnSchema),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

// ── CLI ────────────────────────────────────────────────────────────────────

export const ChatOptionsSchema = z.object({
  provider: z.string().trim().min(1).max(50).optional(),
  model: ModelIdSchema.optional(),
});

// ── Validation helper ──────────────────────────────────────────────────────

/**
 * Parse and validate `input` against `schema`.
 * Throws a ConfigError listing every issue on failure.
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what = 'input'): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || what}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${what}: ${issues}`);
  }
  return result.data;
}
