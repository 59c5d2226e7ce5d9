import { z } from 'zod';

export const SESSION_FILE_VERSION = 3;
export const MAX_TITLE_LENGTH = 50;
export const MAX_FIRST_MESSAGE_LENGTH = 100;

export const ResumeTokenSchema = z.object({
  engine: z.string().min(1),
  value: z.string().min(1)
});

export const SessionSchema = z.object({
  id: z.string().min(1),
  engine: z.string().min(1),
  resumeToken: ResumeTokenSchema,
  title: z.string().optional(),
  firstMessage: z.string().optional(),
  createdAt: z.number(),
  updatedAt: z.number()
});

export const ChatStateSchema = z.object({
  chatId: z.string(),
  historyByEngine: z.record(z.string(), z.array(SessionSchema)),
  activeSessionIdByEngine: z.record(z.string(), z.string())
});

export const SessionFileV3Schema = z.object({
  version: z.literal(3),
  chat: ChatStateSchema
});

/** v2: sessions keyed by resume id, timestamps in epoch seconds. */
export const SessionFileV2Schema = z.object({
  version: z.literal(2),
  history: z.record(
    z.string(),
    z.object({
      resume: z.string(),
      engine: z.string(),
      title: z.string().nullish(),
      first_message: z.string().nullish(),
      created_at: z.number().default(0),
      updated_at: z.number().default(0)
    })
  ),
  active: z.record(z.string(), z.string()).default({})
});

/** v1: one resume token per engine, no history. */
export const SessionFileV1Schema = z.object({
  version: z.literal(1).optional(),
  sessions: z.record(z.string(), z.object({ resume: z.string().nullish() }))
});

export type Session = z.infer<typeof SessionSchema>;
export type ChatState = z.infer<typeof ChatStateSchema>;
export type SessionFileV3 = z.infer<typeof SessionFileV3Schema>;
export type SessionFileV2 = z.infer<typeof SessionFileV2Schema>;
export type SessionFileV1 = z.infer<typeof SessionFileV1Schema>;

export function emptyChatState(chatId: string): ChatState {
  return { chatId, historyByEngine: {}, activeSessionIdByEngine: {} };
}
