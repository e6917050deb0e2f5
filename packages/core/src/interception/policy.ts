/**
 * InterceptionPolicy: decides whether a generation call is rebuilt as
 * structured turns or left to the host.
 */

import type { StructuringConfig } from '@turnweaver/shared';
import { DEFAULT_PROMPT_MARKERS, type PromptMarkers } from '../structuring/markers.js';
import type { GenerationRequest } from './types.js';

export type PolicySkipReason = 'disabled' | 'group-disabled' | 'private-disabled' | 'rewrite-disabled';

export type PolicyDecision = { apply: true } | { apply: false; reason: PolicySkipReason };

export class InterceptionPolicy {
  private readonly config: StructuringConfig;
  private readonly markers: PromptMarkers;

  constructor(config: StructuringConfig, markers: PromptMarkers = DEFAULT_PROMPT_MARKERS) {
    this.config = config;
    this.markers = markers;
  }

  get fallbackOnFailure(): boolean {
    return this.config.fallbackToOriginal;
  }

  isRewritePrompt(prompt: string): boolean {
    return this.markers.rewriteMarkers.some((marker) => prompt.includes(marker));
  }

  evaluate(request: GenerationRequest): PolicyDecision {
    if (!this.config.enabled) {
      return { apply: false, reason: 'disabled' };
    }
    if (request.context.isGroup && !this.config.applyGroup) {
      return { apply: false, reason: 'group-disabled' };
    }
    if (!request.context.isGroup && !this.config.applyPrivate) {
      return { apply: false, reason: 'private-disabled' };
    }
    if (!this.config.applyRewrite && this.isRewritePrompt(request.prompt)) {
      return { apply: false, reason: 'rewrite-disabled' };
    }
    return { apply: true };
  }
}
