/**
 * Structured History Types
 *
 * Types for recovering prompt boundaries and re-rendering chat history as
 * role-tagged turns, plus the collaborator contracts the chat host fulfils.
 */

import type { HostConfig, StructuringConfig } from '@turnweaver/shared';

export type TurnRole = 'system' | 'user' | 'assistant';

export type TimeMode = 'relative' | 'absolute_no_year';

export interface PromptSplitResult {
  systemPrefix: string;
  systemSuffix: string;
}

/** A stored chat message as the host's message store hands it out. */
export interface HistoryMessage {
  platform: string;
  userId: string;
  userNickname?: string;
  userCardname?: string;
  displayMessage?: string;
  processedPlainText?: string;
  /** Unix seconds */
  time?: number;
}

export interface HistoryLine {
  /** `<time>, <speaker>:` */
  header: string;
  content: string;
  /** `<time>, <speaker>: <content>` */
  text: string;
}

export interface MergedHistoryBlock {
  role: Exclude<TurnRole, 'system'>;
  speakerKey: string;
  lines: string[];
  entries: HistoryLine[];
}

export interface StructuredTurn {
  role: TurnRole;
  text: string;
}

export interface ChatContext {
  conversationId?: string;
  isGroup: boolean;
}

// ── Host collaborators ────────────────────────────────────────

export interface HistoryQuery {
  conversationId: string;
  /** Unix seconds; only messages strictly before this are returned */
  before: number;
  limit: number;
  visibilityLevel: number;
}

export interface MessageStore {
  /** Messages in ascending time order. */
  queryHistory(query: HistoryQuery): Promise<HistoryMessage[]>;
}

export interface IdentityResolver {
  resolveDisplayName(platform: string, userId: string): string | null | undefined;
}

export type BotIdentityCheck = (platform: string, userId: string) => boolean;

export type ReferenceNormalizer = (text: string, platform: string, replaceBotName: boolean) => string;

export type TimeRenderer = (timestamp: number, mode: TimeMode) => string;

export interface HistoryRenderDeps {
  isBotIdentity: BotIdentityCheck;
  identity?: IdentityResolver;
  normalizeReferences: ReferenceNormalizer;
  renderTime: TimeRenderer;
  botNickname: string;
}

export interface HistoryBuildOptions {
  timeMode: TimeMode;
  mergeConsecutive: boolean;
  /** Unix seconds substituted for missing or non-positive message times */
  now: number;
}

export interface AssemblerSettings {
  structuring: StructuringConfig;
  host: Pick<HostConfig, 'maxContextSize' | 'botNickname'>;
}
