/**
 * StructuredMessageAssembler: turns a flattened prompt back into
 * `[system prefix, history turns..., system suffix]`.
 *
 * The prompt supplies the system segments; the history itself is rebuilt
 * from the message store so each message keeps its speaker and role.
 */

import type { SecureLogger } from '../logging/logger.js';
import { createDiagnosticLog, type DiagnosticLog } from '../logging/verbose.js';
import { splitPrompt } from './boundary-splitter.js';
import { FAILURE_DESCRIPTIONS, type StructuringFailureReason } from './errors.js';
import { buildHistoryBlocks } from './history-block-builder.js';
import { DEFAULT_PROMPT_MARKERS, type PromptMarkers } from './markers.js';
import { inferTimeMode } from './timestamp-classifier.js';
import type {
  AssemblerSettings,
  ChatContext,
  HistoryRenderDeps,
  MergedHistoryBlock,
  MessageStore,
  PromptSplitResult,
  StructuredTurn,
} from './types.js';

export interface StructuredMessageAssemblerDeps {
  messageStore: MessageStore;
  render: HistoryRenderDeps;
  logger: SecureLogger;
  markers?: PromptMarkers;
  splitter?: (prompt: string, markers: PromptMarkers) => PromptSplitResult | null;
  /** Unix seconds */
  clock?: () => number;
}

export type AssemblyResult =
  | { ok: true; turns: StructuredTurn[] }
  | { ok: false; reason: StructuringFailureReason };

export function blocksToTurns(blocks: readonly MergedHistoryBlock[], splitAssistantSpeaker: boolean): StructuredTurn[] {
  const turns: StructuredTurn[] = [];
  for (const block of blocks) {
    if (splitAssistantSpeaker && block.role === 'assistant') {
      // Speaker/time headers stay on the user side; the assistant turn carries only what was said
      turns.push({ role: 'user', text: block.entries.map((e) => e.header).join('\n') });
      turns.push({ role: 'assistant', text: block.entries.map((e) => e.content).join('\n') });
    } else {
      turns.push({ role: block.role, text: block.lines.join('\n') });
    }
  }
  return turns;
}

export class StructuredMessageAssembler {
  private readonly settings: AssemblerSettings;
  private readonly deps: StructuredMessageAssemblerDeps;
  private readonly markers: PromptMarkers;
  private readonly splitter: (prompt: string, markers: PromptMarkers) => PromptSplitResult | null;
  private readonly clock: () => number;
  private readonly diagnostic: DiagnosticLog;

  constructor(settings: AssemblerSettings, deps: StructuredMessageAssemblerDeps) {
    this.settings = settings;
    this.deps = deps;
    this.markers = deps.markers ?? DEFAULT_PROMPT_MARKERS;
    this.splitter = deps.splitter ?? splitPrompt;
    this.clock = deps.clock ?? (() => Date.now() / 1000);
    this.diagnostic = createDiagnosticLog(deps.logger, settings.structuring.verbose);
  }

  /** History window: a positive override wins over the host's own size. */
  resolveHistoryLimit(): number {
    const override = this.settings.structuring.maxContextSizeOverride;
    return override > 0 ? override : this.settings.host.maxContextSize;
  }

  /**
   * Build the structured turn sequence. Soft failures come back as a reason;
   * a failing message store query rejects.
   */
  async assemble(context: ChatContext, prompt: string): Promise<AssemblyResult> {
    const split = this.splitter(prompt, this.markers);
    if (!split) {
      return this.fail('NO_BOUNDARY_FOUND', context);
    }

    const conversationId = context.conversationId ?? '';
    if (!conversationId) {
      return this.fail('MISSING_CONVERSATION_ID', context);
    }

    const now = this.clock();
    const history = await this.deps.messageStore.queryHistory({
      conversationId,
      before: now,
      limit: this.resolveHistoryLimit(),
      visibilityLevel: this.settings.structuring.visibilityLevel,
    });
    if (history.length === 0) {
      return this.fail('EMPTY_HISTORY', context);
    }

    const timeMode = inferTimeMode(prompt);
    const blocks = buildHistoryBlocks(
      history,
      { timeMode, mergeConsecutive: this.settings.structuring.mergeConsecutive, now },
      this.deps.render,
      this.deps.logger
    );
    if (blocks.length === 0) {
      return this.fail('EMPTY_BLOCKS', context);
    }

    const turns: StructuredTurn[] = [];
    if (split.systemPrefix) {
      turns.push({ role: 'system', text: split.systemPrefix });
    }
    turns.push(...blocksToTurns(blocks, this.settings.structuring.splitAssistantSpeaker));
    if (split.systemSuffix) {
      turns.push({ role: 'system', text: split.systemSuffix });
    }

    if (turns.length < 2) {
      return this.fail('TOO_FEW_TURNS', context);
    }

    this.diagnostic('Structured turns assembled', {
      conversationId,
      timeMode,
      historyCount: history.length,
      blockCount: blocks.length,
      turnCount: turns.length,
    });
    return { ok: true, turns };
  }

  async tryBuildStructuredTurns(context: ChatContext, prompt: string): Promise<StructuredTurn[] | null> {
    const result = await this.assemble(context, prompt);
    return result.ok ? result.turns : null;
  }

  private fail(reason: StructuringFailureReason, context: ChatContext): AssemblyResult {
    this.diagnostic(`Structuring skipped: ${FAILURE_DESCRIPTIONS[reason]}`, {
      reason,
      conversationId: context.conversationId,
    });
    return { ok: false, reason };
  }
}
