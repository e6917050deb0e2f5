/**
 * StructuredTurnInterceptor: answers a generation call with structured
 * turns when the policy allows and the assembler succeeds, otherwise hands
 * the flat prompt back to the host.
 */

import type { SecureLogger } from '../logging/logger.js';
import type { StructuredMessageAssembler } from '../structuring/assembler.js';
import {
  StructuringError,
  StructuringFailedError,
  UnexpectedStructuringError,
} from '../structuring/errors.js';
import { createDiagnosticLog, type DiagnosticLog } from '../logging/verbose.js';
import { toErrorMessage } from '../utils/errors.js';
import type { InterceptionPolicy } from './policy.js';
import type {
  GenerationInterceptor,
  GenerationOutcome,
  GenerationRequest,
  ProceedFn,
  StructuredModelClient,
} from './types.js';

export const STRUCTURED_TURN_INTERCEPTOR_ID = 'structured-turns';

export interface StructuredTurnInterceptorDeps {
  policy: InterceptionPolicy;
  assembler: Pick<StructuredMessageAssembler, 'assemble'>;
  modelClient: StructuredModelClient;
  logger: SecureLogger;
  verbose?: boolean;
}

export class StructuredTurnInterceptor implements GenerationInterceptor {
  readonly id = STRUCTURED_TURN_INTERCEPTOR_ID;
  private readonly deps: StructuredTurnInterceptorDeps;
  private readonly diagnostic: DiagnosticLog;

  constructor(deps: StructuredTurnInterceptorDeps) {
    this.deps = deps;
    this.diagnostic = createDiagnosticLog(deps.logger, deps.verbose ?? false);
  }

  async intercept(request: GenerationRequest, proceed: ProceedFn): Promise<GenerationOutcome> {
    const decision = this.deps.policy.evaluate(request);
    if (!decision.apply) {
      this.diagnostic('Structured request skipped by policy', {
        reason: decision.reason,
        conversationId: request.context.conversationId,
      });
      return proceed();
    }

    try {
      const result = await this.deps.assembler.assemble(request.context, request.prompt);
      if (!result.ok) {
        throw new StructuringFailedError(result.reason);
      }

      const turns = result.turns
        .map((turn) => ({ role: turn.role, text: turn.text.trim() }))
        .filter((turn) => turn.text.length > 0);

      const outcome = await this.deps.modelClient.generate(turns);

      this.diagnostic('Structured request succeeded', {
        conversationId: request.context.conversationId,
        model: outcome.model,
        turnCount: turns.length,
      });
      return { ...outcome, content: outcome.content.trim() };
    } catch (err) {
      this.deps.logger.warn('Structured request failed', {
        conversationId: request.context.conversationId,
        error: toErrorMessage(err),
      });

      if (this.deps.policy.fallbackOnFailure) {
        return proceed();
      }
      if (err instanceof StructuringError) {
        throw err;
      }
      throw new UnexpectedStructuringError(toErrorMessage(err), err);
    }
  }
}
