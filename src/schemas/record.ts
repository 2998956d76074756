import { z } from 'zod';

// Unknown fields are carried through untouched; only what the exporters read is checked
export const ConversationRecordSchema = z.object({
  // JSON numbers past 2^53 lose digits on parse, so large ids must arrive as strings
  id: z.union([
    z.string().min(1),
    z.number().refine(Number.isSafeInteger, {
      message: 'numeric ids must be integers up to 2^53 - 1; quote larger ids as strings',
    }),
  ]),
  text: z.object({
    Title: z.string(),
    Conversation: z.string(),
  }).passthrough(),
}).passthrough();

export type ConversationRecord = z.infer<typeof ConversationRecordSchema>;

export function parseConversationRecord(data: unknown): ConversationRecord {
  return ConversationRecordSchema.parse(data);
}
