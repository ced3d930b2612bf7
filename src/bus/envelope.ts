import { z } from 'zod';
import { MESSAGE_TYPES } from './channels.js';

export const EnvelopeSchema = z.object({
  type: z.enum(MESSAGE_TYPES),
  version: z.string().optional(),
  count: z.number().int().nonnegative().optional(),
  data: z.unknown().optional(),
  status: z.string().optional(),
  details: z.record(z.unknown()).optional(),
  timestamp: z.string().datetime(),
  source: z.string().min(1),
});

export type Envelope = z.infer<typeof EnvelopeSchema>;

/** What publishers hand to the bus; the bus stamps timestamp and source. */
export type EnvelopeInput = Omit<Envelope, 'timestamp' | 'source'>;

/**
 * Decode a wire payload. Returns null for invalid JSON or a payload that is
 * not an envelope.
 */
export function decodeEnvelope(raw: string): Envelope | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = EnvelopeSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
