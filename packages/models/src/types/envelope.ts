/**
 * Envelope types exchanged with the debugging relay.
 *
 * Each text frame carries exactly one envelope. The relay wraps the original
 * HTTPS request body in `requestPayload`; the client answers with either a
 * success or a failure envelope that references it by `originalRequestId`.
 */

/**
 * Message type discriminators used on the wire.
 */
export const EnvelopeTypes = {
  REQUEST: 'SkillRequestMessage',
  SUCCESS_RESPONSE: 'SkillResponseSuccessMessage',
  FAILURE_RESPONSE: 'SkillResponseFailureMessage',
} as const;

export type EnvelopeType = (typeof EnvelopeTypes)[keyof typeof EnvelopeTypes];

/**
 * Structured form of an inbound request.
 * `requestPayload` is the parsed JSON body, not its text.
 */
export interface RequestEnvelope {
  version: string;
  type: typeof EnvelopeTypes.REQUEST;
  requestId: string;
  requestPayload: unknown;
}

export interface SuccessResponseEnvelope {
  version: string;
  type: typeof EnvelopeTypes.SUCCESS_RESPONSE;
  originalRequestId: string;
  /** JSON text of the invocation target's result */
  responsePayload: string;
}

export interface FailureResponseEnvelope {
  version: string;
  type: typeof EnvelopeTypes.FAILURE_RESPONSE;
  originalRequestId: string;
  errorCode: string;
  errorMessage: string;
}

export type ResponseEnvelope = SuccessResponseEnvelope | FailureResponseEnvelope;
