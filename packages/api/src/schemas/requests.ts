import { z } from '@hono/zod-openapi';

export const ChatPartSchema = z.object({
  text: z.string(),
});

export const ChatMessageSchema = z
  .object({
    role: z.string().openapi({ example: 'model' }),
    parts: z.array(ChatPartSchema),
  })
  .openapi('ChatMessage');

export const ChatRequestSchema = z
  .object({
    message: z.string().openapi({ example: 'The Eiffel Tower was moved to Rome in 2020.' }),
    chatHistory: z.array(ChatMessageSchema).optional(),
  })
  .openapi('ChatRequest');

export type ChatRequest = z.infer<typeof ChatRequestSchema>;
