/**
 * Envelope Codec
 *
 * Converts WebSocket frames into structured request envelopes and structured
 * responses back into text frames. Binary frames are read as UTF-8 text.
 * @public
 */

import type WebSocket from 'ws';
import type { z } from 'zod';
import {
  EnvelopeTypes,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '@local-relay/models';
import { RequestEnvelopeWireSchema } from '@local-relay/schemas';
import { SessionError, toError } from '../errors/index.js';

/**
 * Anything a frame can arrive as: text, a buffer, an ArrayBuffer, or fragments.
 */
export type RawPayload = string | WebSocket.RawData;

/**
 * @public
 */
export interface EnvelopeCodec {
  /** @throws {SessionError} MALFORMED_PAYLOAD */
  decode(raw: RawPayload): RequestEnvelope;
  encode(response: ResponseEnvelope): string;
}

/**
 * Reads the complete payload as UTF-8, whatever its container.
 */
export function payloadToText(raw: RawPayload): string {
  if (typeof raw === 'string') {
    return raw;
  }
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString('utf8');
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString('utf8');
  }
  return raw.toString('utf8');
}

/**
 * Decodes one frame into a request envelope, parsing the inner payload.
 * @throws {SessionError} MALFORMED_PAYLOAD when any layer fails to parse
 */
export function decodeRequest(raw: RawPayload): RequestEnvelope {
  const text = payloadToText(raw);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw SessionError.malformedPayload('frame is not valid JSON', toError(error));
  }

  const wire = RequestEnvelopeWireSchema.safeParse(json);
  if (!wire.success) {
    throw SessionError.malformedPayload(describeIssues(wire.error), wire.error);
  }

  let requestPayload: unknown;
  try {
    requestPayload = JSON.parse(wire.data.requestPayload);
  } catch (error) {
    throw SessionError.malformedPayload('requestPayload is not valid JSON', toError(error));
  }

  return {
    version: wire.data.version,
    type: EnvelopeTypes.REQUEST,
    requestId: wire.data.requestId,
    requestPayload,
  };
}

export function encodeResponse(response: ResponseEnvelope): string {
  return JSON.stringify(response);
}

/**
 * Inverse of {@link decodeRequest}. Relays and tests build frames with it.
 */
export function encodeRequest(request: RequestEnvelope): string {
  return JSON.stringify({
    version: request.version,
    type: request.type,
    requestId: request.requestId,
    requestPayload: JSON.stringify(request.requestPayload),
  });
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Default JSON codec used by debug sessions.
 * @public
 */
export const jsonEnvelopeCodec: EnvelopeCodec = {
  decode: decodeRequest,
  encode: encodeResponse,
};
