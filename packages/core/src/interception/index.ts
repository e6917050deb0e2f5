export type {
  GenerationRequest,
  GenerationOutcome,
  GenerationFn,
  ProceedFn,
  GenerationInterceptor,
  InterceptorRegistration,
  InterceptorHost,
  StructuredModelClient,
  LifecycleResult,
} from './types.js';
export { InterceptionPolicy, type PolicyDecision, type PolicySkipReason } from './policy.js';
export { InterceptorRegistry, type InterceptorRegistryDeps } from './registry.js';
export {
  StructuredTurnInterceptor,
  STRUCTURED_TURN_INTERCEPTOR_ID,
  type StructuredTurnInterceptorDeps,
} from './structured-turn-interceptor.js';
export {
  StructuredHistoryExtension,
  type StructuredHistoryExtensionDeps,
} from './extension.js';
