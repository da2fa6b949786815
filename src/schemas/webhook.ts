import { z } from 'zod';

export const WebhookSchema = z
  .object({
    id: z.string(),
    url: z.string(),
    events: z.array(z.string()).default([]),
    active: z.boolean().optional(),
    created_at: z.string().optional(),
  })
  .passthrough();
export type Webhook = z.infer<typeof WebhookSchema>;

export const WebhookListSchema = z.array(WebhookSchema);
