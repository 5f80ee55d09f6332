import {
  EnvelopeTypes,
  type InvocationFailurePolicy,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '@local-relay/models';
import { SessionError, toError } from '../errors/index.js';
import { componentLogger, type Logger } from '../logging/index.js';
import type { InvocationTargetResolver } from './invocation-target.js';

/** Error code sent back to the relay when the invocation target fails */
export const INVOCATION_FAILURE_ERROR_CODE = '500';

export interface InvocationDispatcherOptions {
  resolver: InvocationTargetResolver;
  /** Default: `respond` */
  policy?: InvocationFailurePolicy;
  logger?: Logger;
}

/**
 * Hands decoded requests to the local invocation target and turns the outcome
 * into a response envelope. Performs no I/O of its own.
 * @public
 */
export class InvocationDispatcher {
  public readonly policy: InvocationFailurePolicy;
  private readonly resolver: InvocationTargetResolver;
  private readonly logger: Logger;

  public constructor(options: InvocationDispatcherOptions) {
    this.resolver = options.resolver;
    this.policy = options.policy ?? 'respond';
    this.logger = componentLogger('dispatcher', options.logger);
  }

  /**
   * Resolves the target, invokes it and builds the response.
   * @throws {SessionError} INVOCATION_FAILED (fatal) when the target fails under the `fatal` policy
   */
  public async invoke(request: RequestEnvelope, targetId: string): Promise<ResponseEnvelope> {
    const { requestId, version } = request;
    this.logger.debug({ requestId, targetId, payload: request.requestPayload }, 'invoking target');

    let responsePayload: string;
    try {
      const target = await this.resolver.resolve(targetId);
      const result: unknown = await target.call(request.requestPayload, { requestId, version });
      responsePayload = serializeResult(result);
    } catch (error) {
      const cause = toError(error);
      this.logger.warn({ err: cause, requestId, targetId }, 'invocation target failed');

      if (this.policy === 'fatal') {
        throw SessionError.invocationFailure(cause.message, true, cause);
      }
      return {
        version,
        type: EnvelopeTypes.FAILURE_RESPONSE,
        originalRequestId: requestId,
        errorCode: INVOCATION_FAILURE_ERROR_CODE,
        errorMessage: cause.message,
      };
    }

    this.logger.debug({ requestId, payload: responsePayload }, 'invocation succeeded');
    return {
      version,
      type: EnvelopeTypes.SUCCESS_RESPONSE,
      originalRequestId: requestId,
      responsePayload,
    };
  }
}

function serializeResult(result: unknown): string {
  // JSON.stringify yields undefined for functions and symbols
  const text: string | undefined = JSON.stringify(result ?? null);
  if (text === undefined) {
    throw new TypeError(`Invocation result of type ${typeof result} cannot be serialized`);
  }
  return text;
}
