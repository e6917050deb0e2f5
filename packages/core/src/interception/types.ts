/**
 * Interception Types
 *
 * The host routes every reply generation through an InterceptorRegistry;
 * interceptors may answer the request themselves or hand it on.
 */

import type { ChatContext, StructuredTurn } from '../structuring/types.js';

export interface GenerationRequest {
  context: ChatContext;
  prompt: string;
}

export interface GenerationOutcome {
  content: string;
  reasoning?: string;
  model?: string;
}

/** Runs the rest of the chain, ending in the host's own generation call. */
export type ProceedFn = () => Promise<GenerationOutcome>;

export type GenerationFn = (request: GenerationRequest) => Promise<GenerationOutcome>;

export interface GenerationInterceptor {
  readonly id: string;
  intercept(request: GenerationRequest, proceed: ProceedFn): Promise<GenerationOutcome>;
}

export interface InterceptorRegistration {
  id: string;
  interceptor: GenerationInterceptor;
  /** Lower runs first */
  priority: number;
}

/** Where the extension plugs in; InterceptorRegistry is the stock implementation. */
export interface InterceptorHost {
  register(interceptor: GenerationInterceptor, opts?: { priority?: number }): string;
  unregister(id: string): boolean;
}

export interface StructuredModelClient {
  generate(turns: readonly StructuredTurn[]): Promise<GenerationOutcome>;
}

export interface LifecycleResult {
  ok: boolean;
  message: string;
}
