import { z } from 'zod';

export const userIntentSchema = z.enum(['unsubscribe_if_possible', 'block_only', 'delete_only', 'skip']);

// Scan API validation schemas
export const scanRequestSchema = z.object({
  pageSize: z.coerce.number().int().min(1).max(500).optional(),
  maxMessages: z.coerce.number().int().min(1).max(10000).optional(),
  concurrency: z.coerce.number().int().min(1).max(50).optional(),
  query: z.string().min(1).optional(),
  includeIneligible: z.boolean().default(false),
});

export const scanParamsSchema = z.object({
  scanId: z.string().uuid(),
});

export const selectionRequestSchema = z.object({
  selections: z.array(z.object({
    senderAddress: z.string().min(1).transform(value => value.toLowerCase()),
    intent: userIntentSchema,
  })).min(1),
});

export type SelectionRequest = z.infer<typeof selectionRequestSchema>;
