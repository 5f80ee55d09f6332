/**
 * Invocation target capability.
 *
 * The dispatcher never holds a live handle to application code: it asks a
 * resolver for an {@link Invokable} by id on every request.
 */

export interface InvocationContext {
  requestId: string;
  version: string;
}

/**
 * Local application logic producing a response payload for a request payload.
 * May return a value or a promise; throwing or rejecting is an application failure.
 * @public
 */
export interface Invokable {
  call(payload: unknown, context: InvocationContext): unknown;
}

/**
 * @public
 */
export interface InvocationTargetResolver {
  resolve(targetId: string): Invokable | Promise<Invokable>;
}

export type InvocationCallback = (error?: unknown, result?: unknown) => void;

/**
 * Function target. Handlers declaring a third parameter are callback-style,
 * `(event, context, callback)`, as exported by function-as-a-service entry
 * points, and settle through the callback.
 */
export type InvocationHandler = (
  payload: unknown,
  context: InvocationContext,
  callback: InvocationCallback,
) => unknown;

/**
 * Adapts an exported value to an {@link Invokable}.
 *
 * Accepts a function, or an object exposing `call` or `invoke`. Functions
 * declaring three parameters are treated as callback-style handlers.
 * @param value - Exported value
 * @param label - Target id used in error messages
 * @throws {TypeError} When the value is not callable
 * @public
 */
export function toInvokable(value: unknown, label: string): Invokable {
  if (typeof value === 'function') {
    const fn = value;
    if (fn.length >= 3) {
      return { call: (payload, context) => callWithCallback(fn, payload, context) };
    }
    return { call: (payload, context): unknown => Reflect.apply(fn, undefined, [payload, context]) };
  }

  if (typeof value === 'object' && value !== null) {
    for (const method of ['call', 'invoke'] as const) {
      const member: unknown = Reflect.get(value, method);
      if (typeof member === 'function') {
        return {
          call: (payload, context): unknown => Reflect.apply(member, value, [payload, context]),
        };
      }
    }
  }

  throw new TypeError(`Invocation target '${label}' is not callable`);
}

function callWithCallback(
  fn: Function,
  payload: unknown,
  context: InvocationContext,
): Promise<unknown> {
  return new Promise<unknown>((resolve, reject) => {
    let settled = false;
    const callback: InvocationCallback = (error, result) => {
      if (settled) return;
      settled = true;
      if (error !== undefined && error !== null) {
        reject(error);
      } else {
        resolve(result);
      }
    };

    try {
      const returned: unknown = Reflect.apply(fn, undefined, [payload, context, callback]);
      if (returned instanceof Promise) {
        returned.then(
          (result: unknown) => callback(undefined, result),
          (error: unknown) => callback(error ?? new Error('Invocation target rejected')),
        );
      }
    } catch (error) {
      callback(error ?? new Error('Invocation target threw'));
    }
  });
}

/**
 * Resolves ids against an in-process registry.
 * @public
 */
export class StaticTargetResolver implements InvocationTargetResolver {
  private readonly targets = new Map<string, Invokable>();

  public constructor(targets: Record<string, Invokable | InvocationHandler> = {}) {
    for (const [id, target] of Object.entries(targets)) {
      this.register(id, target);
    }
  }

  public register(id: string, target: Invokable | InvocationHandler): this {
    this.targets.set(id, toInvokable(target, id));
    return this;
  }

  public resolve(targetId: string): Invokable {
    const target = this.targets.get(targetId);
    if (!target) {
      throw new Error(`Unknown invocation target '${targetId}'`);
    }
    return target;
  }
}
