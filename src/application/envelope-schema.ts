import { z } from 'zod';
import { createEnvelope, EnvelopeValidationError } from '../domain/index.js';
import type { Envelope } from '../domain/index.js';

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const LINE_BREAK = /[\r\n]/;

/**
 * Zod schema for an envelope arriving from a publisher.
 *
 * - `category` becomes an `event:` line, so it must be a single printable line.
 * - `payload` becomes exactly one `data:` line; callers serialize or escape
 *   multi-line content (JSON.stringify does) before publishing.
 */
export const envelopeSchema = z
  .object({
    payload: z.string().refine((v) => !LINE_BREAK.test(v), {
      message: 'payload must not contain line breaks',
    }),
    category: z
      .string()
      .min(1)
      .max(128)
      .refine((v) => !CONTROL_CHARS.test(v), {
        message: 'category must not contain control characters',
      })
      .optional(),
  })
  .strict();

export type EnvelopeInput = z.infer<typeof envelopeSchema>;

/**
 * Validates an unknown value and returns a frozen envelope.
 * Throws EnvelopeValidationError listing every issue.
 */
export function parseEnvelope(input: unknown): Envelope {
  const parsed = envelopeSchema.safeParse(input);

  if (!parsed.success) {
    throw new EnvelopeValidationError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }

  return createEnvelope(parsed.data.payload, parsed.data.category);
}
