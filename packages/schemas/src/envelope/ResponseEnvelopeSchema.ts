import { z } from 'zod';

export const SuccessResponseEnvelopeSchema = z.object({
  version: z.string(),
  type: z.literal('SkillResponseSuccessMessage'),
  originalRequestId: z.string(),
  responsePayload: z.string(),
});

export const FailureResponseEnvelopeSchema = z.object({
  version: z.string(),
  type: z.literal('SkillResponseFailureMessage'),
  originalRequestId: z.string(),
  errorCode: z.string(),
  errorMessage: z.string(),
});

export const ResponseEnvelopeSchema = z.discriminatedUnion('type', [
  SuccessResponseEnvelopeSchema,
  FailureResponseEnvelopeSchema,
]);
