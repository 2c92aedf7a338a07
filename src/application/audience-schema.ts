import { z } from 'zod';

/**
 * Identifiers that end up inside a category (`A-<likert>`, `A-<qid>`) are
 * restricted so the derived category always frames as one clean line.
 */
const identifier = z.string().regex(/^[A-Za-z0-9_.:-]{1,64}$/, {
  message: 'Must be 1-64 characters of letters, digits, _ . : -',
});

export const nicknameSchema = z.object({
  user: z.string().min(1).max(64),
  uuid: z.string().regex(/^[0-9a-fA-F-]+$/, { message: 'Must be a UUID-like string' }),
});

/** Likert values arrive as strings "0" (fully agree) to "4" (fully disagree). */
export const likertSchema = z.object({
  likert: identifier,
  user: z.string().min(1).max(64),
  value: z.enum(['0', '1', '2', '3', '4']),
});

export const answerSchema = z.object({
  answer: z.string().max(2000),
  qid: identifier,
  user: z.string().min(1).max(64),
});

export type NicknameInput = z.infer<typeof nicknameSchema>;
export type LikertInput = z.infer<typeof likertSchema>;
export type LikertValue = LikertInput['value'];
export type AnswerInput = z.infer<typeof answerSchema>;
