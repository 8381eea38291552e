import { z } from 'zod';
import { isProvince, type Province } from '@/types/core';

const conversationMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

const provinceSchema = z
  .string()
  .transform((v) => v.trim().toUpperCase())
  .refine((v): v is Province => isProvince(v), { message: 'province must be one of MB, ON, SK, AB, BC' });

export const agentQuerySchema = z.object({
  query: z.string().trim().min(1, 'Query is required and cannot be empty').max(4000),
  province: provinceSchema.optional(),
  session_id: z.string().trim().min(1, 'session_id is required'),
  user_id: z.string().optional(),
  conversation_history: z.array(conversationMessageSchema).optional(),
});

export type AgentQueryBody = z.infer<typeof agentQuerySchema>;

export function validateAgentQuery(data: unknown):
  | { success: true; data: AgentQueryBody }
  | { success: false; error: Array<{ path: string; message: string }> } {
  const result = agentQuerySchema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return { success: true, data: result.data };
}
