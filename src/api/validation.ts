/**
 * API Validation Schemas
 * Zod schemas for request validation
 */
import { z } from 'zod';

// Query of the update webhook; at least one address is required
export const webhookQuerySchema = z
  .object({
    ipv4: z.string().min(1).optional(),
    ipv6: z.string().min(1).optional(),
    ttl: z.coerce.number().int().min(1).optional(),
  })
  .refine((q) => q.ipv4 !== undefined || q.ipv6 !== undefined, {
    message: 'Provide an ipv4 or ipv6 or both.',
  });

export type WebhookQuery = z.infer<typeof webhookQuerySchema>;
