import { describe, it, expect, vi } from 'vitest';
import { EnvelopeTypes, type RequestEnvelope } from '@local-relay/models';
import { SessionError, SessionErrorCode } from '../errors/index.js';
import { InvocationDispatcher } from './invocation-dispatcher.js';
import { StaticTargetResolver, type InvocationTargetResolver } from './invocation-target.js';

const request: RequestEnvelope = {
  version: '1.0',
  type: EnvelopeTypes.REQUEST,
  requestId: 'req-7',
  requestPayload: { name: 'world' },
};

describe('InvocationDispatcher', () => {
  it('should answer with the serialised result of the target', async () => {
    const resolver = new StaticTargetResolver({
      greet: (payload, context) => ({ payload, requestId: context.requestId }),
    });
    const dispatcher = new InvocationDispatcher({ resolver });

    await expect(dispatcher.invoke(request, 'greet')).resolves.toEqual({
      version: '1.0',
      type: 'SkillResponseSuccessMessage',
      originalRequestId: 'req-7',
      responsePayload: '{"payload":{"name":"world"},"requestId":"req-7"}',
    });
  });

  it('should await asynchronous targets', async () => {
    const resolver = new StaticTargetResolver({
      greet: async () => 'hello',
    });
    const dispatcher = new InvocationDispatcher({ resolver });

    const response = await dispatcher.invoke(request, 'greet');

    expect(response).toMatchObject({ responsePayload: '"hello"' });
  });

  it('should serialise an undefined result as null', async () => {
    const dispatcher = new InvocationDispatcher({
      resolver: new StaticTargetResolver({ noop: () => undefined }),
    });

    const response = await dispatcher.invoke(request, 'noop');

    expect(response).toMatchObject({ responsePayload: 'null' });
  });

  it('should support callback-style handlers and call/invoke objects', async () => {
    const resolver = new StaticTargetResolver()
      .register('callback', (_payload, _context, callback) => {
        callback(undefined, { via: 'callback' });
      })
      .register('object', { call: () => ({ via: 'call' }) });
    const dispatcher = new InvocationDispatcher({ resolver });

    await expect(dispatcher.invoke(request, 'callback')).resolves.toMatchObject({
      responsePayload: '{"via":"callback"}',
    });
    await expect(dispatcher.invoke(request, 'object')).resolves.toMatchObject({
      responsePayload: '{"via":"call"}',
    });
  });

  it('should resolve the target again for every request', async () => {
    const call = vi.fn().mockReturnValueOnce('first').mockReturnValueOnce('second');
    const resolver: InvocationTargetResolver = { resolve: vi.fn(() => ({ call })) };
    const dispatcher = new InvocationDispatcher({ resolver });

    await dispatcher.invoke(request, 'target');
    const second = await dispatcher.invoke(request, 'target');

    expect(resolver.resolve).toHaveBeenCalledTimes(2);
    expect(second).toMatchObject({ responsePayload: '"second"' });
    expect(call).toHaveBeenCalledWith({ name: 'world' }, { requestId: 'req-7', version: '1.0' });
  });

  describe("with the 'respond' policy", () => {
    it('should turn a thrown error into a failure envelope', async () => {
      const dispatcher = new InvocationDispatcher({
        resolver: new StaticTargetResolver({
          broken: () => {
            throw new Error('boom');
          },
        }),
      });

      await expect(dispatcher.invoke(request, 'broken')).resolves.toEqual({
        version: '1.0',
        type: 'SkillResponseFailureMessage',
        originalRequestId: 'req-7',
        errorCode: '500',
        errorMessage: 'boom',
      });
    });

    it('should report unknown targets in a failure envelope', async () => {
      const dispatcher = new InvocationDispatcher({ resolver: new StaticTargetResolver() });

      await expect(dispatcher.invoke(request, 'missing')).resolves.toMatchObject({
        type: 'SkillResponseFailureMessage',
        errorMessage: "Unknown invocation target 'missing'",
      });
    });

    it('should report results that cannot be serialised', async () => {
      const dispatcher = new InvocationDispatcher({
        resolver: new StaticTargetResolver({ fn: () => () => 1 }),
      });

      await expect(dispatcher.invoke(request, 'fn')).resolves.toMatchObject({
        errorMessage: 'Invocation result of type function cannot be serialized',
      });
    });
  });

  describe("with the 'fatal' policy", () => {
    it('should throw a fatal invocation failure', async () => {
      const dispatcher = new InvocationDispatcher({
        policy: 'fatal',
        resolver: new StaticTargetResolver({
          broken: () => Promise.reject(new Error('boom')),
        }),
      });

      const error = await dispatcher.invoke(request, 'broken').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SessionError);
      expect(error).toMatchObject({
        code: SessionErrorCode.INVOCATION_FAILED,
        isFatal: true,
        message: 'Invocation failed: boom',
      });
    });
  });
});
