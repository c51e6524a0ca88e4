import { z } from 'zod';

/**
 * Validation for startSession input. Surrounding whitespace is removed
 * from the identifiers; the topic keeps the caller's spelling.
 */
export const startSessionInputSchema = z.object({
  topic: z.string().refine((value) => value.trim().length > 0, 'topic must not be empty'),
  studentId: z.string().trim().min(1, 'studentId must not be empty'),
  sessionId: z.string().trim().min(1, 'sessionId must not be empty'),
});

export type StartSessionInputParsed = z.infer<typeof startSessionInputSchema>;
