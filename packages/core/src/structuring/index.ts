/**
 * Structured History Module: recovers prompt boundaries and rebuilds the
 * chat history as role-tagged turns.
 */

export type {
  TurnRole,
  TimeMode,
  PromptSplitResult,
  HistoryMessage,
  HistoryLine,
  MergedHistoryBlock,
  StructuredTurn,
  ChatContext,
  HistoryQuery,
  MessageStore,
  IdentityResolver,
  BotIdentityCheck,
  ReferenceNormalizer,
  TimeRenderer,
  HistoryRenderDeps,
  HistoryBuildOptions,
  AssemblerSettings,
} from './types.js';

export { DEFAULT_PROMPT_MARKERS, type PromptMarkers } from './markers.js';
export { isTimestampedLine, isHistoryLikeLine, inferTimeMode } from './timestamp-classifier.js';
export {
  splitPrompt,
  splitLines,
  findSuffixStart,
  splitByTimeAnchor,
  splitByHeaderAnchor,
  splitByTimeline,
  SPLIT_STRATEGIES,
  type SplitStrategy,
} from './boundary-splitter.js';
export {
  buildHistoryBlocks,
  normalizeMessageContent,
  resolveSpeakerName,
  IMAGE_PLACEHOLDER,
  UNKNOWN_SPEAKER,
} from './history-block-builder.js';
export {
  StructuredMessageAssembler,
  blocksToTurns,
  type StructuredMessageAssemblerDeps,
  type AssemblyResult,
} from './assembler.js';
export {
  StructuringError,
  StructuringFailedError,
  UnexpectedStructuringError,
  FAILURE_DESCRIPTIONS,
  type StructuringFailureReason,
} from './errors.js';
export {
  createTimeRenderer,
  formatClockTime,
  formatMonthDayTime,
  formatRelativeTime,
  type TimeLocale,
  type TimeRendererOptions,
} from './time-format.js';
export { createReferenceNormalizer, type ReferenceNormalizerOptions } from './reference-normalizer.js';
