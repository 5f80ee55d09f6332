import { z } from 'zod';

/**
 * Request envelope as it appears in a text frame.
 * `requestPayload` still holds the JSON text of the relayed body.
 */
export const RequestEnvelopeWireSchema = z.object({
  version: z.string(),
  type: z.literal('SkillRequestMessage'),
  requestId: z.string().min(1),
  requestPayload: z.string(),
});
