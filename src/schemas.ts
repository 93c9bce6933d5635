/**
 * Runtime validation for model parameters and persisted session records
 */

import { z } from 'zod';

export const ModelParametersSchema = z
  .object({
    model: z.string().min(1, 'Model name must not be empty'),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive().optional(),
    systemDirective: z.string().min(1, 'System directive must not be empty'),
    contextWindow: z.number().int().positive().optional(),
    recencyWindow: z.number().int().nonnegative()
  })
  .strict();

export const ModelParametersPatchSchema = ModelParametersSchema.partial().strict();

export const MessageSchema = z.object({
  id: z.string().min(1),
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
  timestamp: z.number().finite(),
  tokenCount: z.number().int().nonnegative()
});

const ModelUsageSchema = z.object({
  promptTokens: z.number().int().nonnegative(),
  completionTokens: z.number().int().nonnegative()
});

export const SESSION_RECORD_VERSION = 1;

export const SessionRecordSchema = z.object({
  version: z.literal(SESSION_RECORD_VERSION),
  id: z.string().min(1),
  title: z.string(),
  titleSource: z.enum(['placeholder', 'generated', 'user']),
  createdAt: z.number().finite(),
  updatedAt: z.number().finite(),
  parameters: ModelParametersSchema,
  messages: z.array(MessageSchema),
  tokenUsage: z.record(ModelUsageSchema),
  embeddings: z.object({
    dimension: z.number().int().positive().nullable(),
    vectors: z.record(z.array(z.number().finite()))
  })
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

export const SessionSummarySchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  createdAt: z.number().finite(),
  updatedAt: z.number().finite(),
  messageCount: z.number().int().nonnegative()
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
