import { z } from 'zod';
import { MetadataSchema } from './common.js';

export const MessageSchema = z
  .object({
    role: z.string(),
    content: z.string(),
  })
  .passthrough();
export type Message = z.infer<typeof MessageSchema>;

export const SUMMARY_TYPES = ['brief', 'detailed', 'topics', 'action_items'] as const;
export type SummaryType = (typeof SUMMARY_TYPES)[number];

export const ConversationSchema = z
  .object({
    id: z.string(),
    user_id: z.string().optional(),
    conversation: z.array(MessageSchema).optional(),
    platform: z.string().optional(),
    metadata: MetadataSchema.optional(),
    created_at: z.string().optional(),
  })
  .passthrough();
export type Conversation = z.infer<typeof ConversationSchema>;

export const ConversationListSchema = z.array(ConversationSchema);
