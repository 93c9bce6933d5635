/**
 * Configuration constants
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { formatIssues } from './schemas.js';

// Load environment variables before reading them
config();

const int = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const pct = (fallback: number) => z.coerce.number().min(0).max(100).default(fallback);

export const DEFAULT_SYSTEM_DIRECTIVE = `You are a helpful and friendly assistant.

Earlier parts of this conversation may be shown out of order: the most recent
exchanges come first, followed by older exchanges that look relevant to the
latest question. Use them when they help, and say so when you lack context.`;

const EnvSchema = z.object({
  DATA_DIR: z.string().min(1).default('./data/conversations'),
  MODEL: z.string().min(1).default('gpt-4o-mini'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  MAX_TOKENS: z.coerce.number().int().positive().optional(),
  SYSTEM_DIRECTIVE: z.string().min(1).default(DEFAULT_SYSTEM_DIRECTIVE),

  // Context selection
  RECENCY_WINDOW: int(4),
  RESPONSE_RESERVE_PCT: pct(25),
  BUDGET_SAFETY_MARGIN_PCT: pct(5),
  MESSAGE_TOKEN_OVERHEAD: int(4),

  // API retries (exponential backoff)
  MAX_RETRIES: int(3),
  RETRY_BASE_DELAY_MS: int(1000),
  RETRY_MAX_DELAY_MS: int(10000),

  // Title is generated once this many exchanges have happened
  TITLE_AFTER_EXCHANGES: int(2),

  DEBUG: z.string().optional().transform(value => value === 'true'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional()
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export const CONFIG = loadConfig(process.env);
