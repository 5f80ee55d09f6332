export {
  decodeRequest,
  encodeRequest,
  encodeResponse,
  payloadToText,
  jsonEnvelopeCodec,
  type EnvelopeCodec,
  type RawPayload,
} from './envelope-codec.js';
