/**
 * StructuredHistoryExtension: start/stop lifecycle for the structured
 * turn interceptor. The host calls `start(registry)` once it is ready and
 * `stop()` when shutting down.
 */

import type { StructuringConfig } from '@turnweaver/shared';
import type { SecureLogger } from '../logging/logger.js';
import { createDiagnosticLog, type DiagnosticLog } from '../logging/verbose.js';
import { toErrorMessage } from '../utils/errors.js';
import type { GenerationInterceptor, InterceptorHost, LifecycleResult } from './types.js';

export interface StructuredHistoryExtensionDeps {
  interceptor: GenerationInterceptor;
  logger: SecureLogger;
  priority?: number;
}

interface ActiveRegistration {
  host: InterceptorHost;
  id: string;
}

export class StructuredHistoryExtension {
  private readonly config: StructuringConfig;
  private readonly deps: StructuredHistoryExtensionDeps;
  private readonly diagnostic: DiagnosticLog;
  private active: ActiveRegistration | null = null;

  constructor(config: StructuringConfig, deps: StructuredHistoryExtensionDeps) {
    this.config = config;
    this.deps = deps;
    this.diagnostic = createDiagnosticLog(deps.logger, config.verbose);
  }

  get isActive(): boolean {
    return this.active !== null;
  }

  start(host: InterceptorHost): LifecycleResult {
    if (!this.config.enabled) {
      this.diagnostic('Structured history disabled, interceptor not registered');
      return { ok: true, message: 'Structured history is disabled; nothing registered' };
    }

    if (this.active) {
      return { ok: true, message: 'Interceptor already registered; skipping' };
    }

    try {
      const id = host.register(this.deps.interceptor, { priority: this.deps.priority });
      this.active = { host, id };
    } catch (err) {
      const message = `Failed to register interceptor: ${toErrorMessage(err)}`;
      this.deps.logger.error(message);
      return { ok: false, message };
    }

    const message = 'Interceptor registered';
    this.deps.logger.info(message, { registrationId: this.active.id });
    return { ok: true, message };
  }

  stop(): LifecycleResult {
    if (!this.active) {
      return { ok: true, message: 'Interceptor not registered; nothing to remove' };
    }

    const { host, id } = this.active;
    try {
      host.unregister(id);
    } catch (err) {
      const message = `Failed to unregister interceptor: ${toErrorMessage(err)}`;
      this.deps.logger.error(message);
      return { ok: false, message };
    }

    this.active = null;
    const message = 'Interceptor unregistered';
    this.deps.logger.info(message, { registrationId: id });
    return { ok: true, message };
  }
}
