export {
  toInvokable,
  StaticTargetResolver,
  type Invokable,
  type InvocationContext,
  type InvocationHandler,
  type InvocationCallback,
  type InvocationTargetResolver,
} from './invocation-target.js';
export {
  ModuleTargetResolver,
  parseModuleTargetId,
  type ModuleImporter,
  type ModuleTargetId,
  type ModuleTargetResolverOptions,
} from './module-target-resolver.js';
export {
  InvocationDispatcher,
  INVOCATION_FAILURE_ERROR_CODE,
  type InvocationDispatcherOptions,
} from './invocation-dispatcher.js';
