/**
 * InterceptorRegistry: the host-side chain that generation calls pass
 * through. Interceptors run in ascending priority; equal priorities keep
 * registration order. The last `proceed()` calls the host's own generator.
 */

import type { SecureLogger } from '../logging/logger.js';
import type {
  GenerationFn,
  GenerationInterceptor,
  GenerationOutcome,
  GenerationRequest,
  InterceptorHost,
  InterceptorRegistration,
} from './types.js';

export interface InterceptorRegistryDeps {
  logger: SecureLogger;
}

const DEFAULT_PRIORITY = 100;

export class InterceptorRegistry implements InterceptorHost {
  private readonly deps: InterceptorRegistryDeps;
  private readonly registrations = new Map<string, InterceptorRegistration>();
  private sequence = 0;

  constructor(deps: InterceptorRegistryDeps) {
    this.deps = deps;
  }

  register(interceptor: GenerationInterceptor, opts?: { priority?: number }): string {
    this.sequence++;
    const id = `${interceptor.id}:${this.sequence}`;
    const registration: InterceptorRegistration = {
      id,
      interceptor,
      priority: opts?.priority ?? DEFAULT_PRIORITY,
    };
    this.registrations.set(id, registration);

    this.deps.logger.debug('Interceptor registered', {
      registrationId: id,
      interceptorId: interceptor.id,
      priority: registration.priority,
    });
    return id;
  }

  unregister(id: string): boolean {
    const removed = this.registrations.delete(id);
    if (removed) {
      this.deps.logger.debug('Interceptor unregistered', { registrationId: id });
    }
    return removed;
  }

  /** Active registrations in the order they run. */
  getRegistered(): InterceptorRegistration[] {
    // Map keeps insertion order and sort is stable, so ties stay in registration order
    return [...this.registrations.values()].sort((a, b) => a.priority - b.priority);
  }

  async generate(request: GenerationRequest, original: GenerationFn): Promise<GenerationOutcome> {
    const chain = this.getRegistered();

    const run = (index: number): Promise<GenerationOutcome> => {
      const registration = chain[index];
      if (!registration) {
        return original(request);
      }
      return registration.interceptor.intercept(request, () => run(index + 1));
    };

    return run(0);
  }
}
