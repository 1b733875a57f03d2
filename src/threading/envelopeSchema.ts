/**
 * Envelope intake
 * Validates records handed over by mailbox backends before they are threaded.
 */

import { z } from 'zod';
import { ValidationError, ValidationIssue } from '../errors';
import { Envelope } from './types';

export const envelopeSchema = z.object({
  message_id: z.string(),
  references: z.array(z.string()).default([]),
  in_reply_to: z.string().default(''),
  date: z.number().int(),
  subject: z.string().default(''),
  thread: z.number().int().nonnegative().nullable().default(null),
});

export const envelopeCollectionSchema = z.array(envelopeSchema);

export type EnvelopeRecord = z.input<typeof envelopeSchema>;

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

export function parseEnvelope(record: unknown): Envelope {
  const result = envelopeSchema.safeParse(record);
  if (!result.success) {
    throw ValidationError.multipleIssues(toIssues(result.error));
  }
  return result.data;
}

/**
 * Validate a whole collection; issue fields are prefixed with the record's
 * position, e.g. `3.date`.
 */
export function parseEnvelopes(records: unknown): Envelope[] {
  const result = envelopeCollectionSchema.safeParse(records);
  if (!result.success) {
    throw ValidationError.multipleIssues(toIssues(result.error));
  }
  return result.data;
}
