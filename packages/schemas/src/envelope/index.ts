export { RequestEnvelopeWireSchema } from './RequestEnvelopeSchema.js';
export {
  ResponseEnvelopeSchema,
  SuccessResponseEnvelopeSchema,
  FailureResponseEnvelopeSchema,
} from './ResponseEnvelopeSchema.js';
