/**
 * History Block Builder
 *
 * Renders each stored message as `<time>, <speaker>: <content>` and groups
 * consecutive messages from the same speaker and role into one block.
 */

import type { SecureLogger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import type {
  HistoryBuildOptions,
  HistoryLine,
  HistoryMessage,
  HistoryRenderDeps,
  MergedHistoryBlock,
} from './types.js';

const PICTURE_ID_TOKEN = /\[picid:[^\]]+\]/g;

export const IMAGE_PLACEHOLDER = '[image]';
export const UNKNOWN_SPEAKER = 'someone';

/**
 * Message text with mention tokens resolved and raw picture ids collapsed.
 * Returns '' for a message with nothing to show.
 */
export function normalizeMessageContent(message: HistoryMessage, deps: HistoryRenderDeps): string {
  const raw = message.displayMessage || message.processedPlainText || '';
  if (!raw.trim()) {
    return '';
  }

  const content = deps.normalizeReferences(raw, message.platform, true);
  return content.replace(PICTURE_ID_TOKEN, IMAGE_PLACEHOLDER).trim();
}

export function resolveSpeakerName(
  message: HistoryMessage,
  deps: HistoryRenderDeps,
  logger: SecureLogger = createNoopLogger()
): string {
  const { platform, userId } = message;

  if (deps.isBotIdentity(platform, userId)) {
    return `${deps.botNickname}(you)`;
  }

  if (deps.identity && platform && userId) {
    try {
      const personName = deps.identity.resolveDisplayName(platform, userId);
      if (personName) {
        return personName;
      }
    } catch (err) {
      logger.debug('Display name lookup failed, using profile names', {
        platform,
        userId,
        error: toErrorMessage(err),
      });
    }
  }

  return message.userNickname || message.userCardname || userId || UNKNOWN_SPEAKER;
}

function resolveTimestamp(message: HistoryMessage, now: number): number {
  const { time } = message;
  if (typeof time !== 'number' || !Number.isFinite(time) || time <= 0) {
    return now;
  }
  return time;
}

export function buildHistoryBlocks(
  messages: readonly HistoryMessage[],
  options: HistoryBuildOptions,
  deps: HistoryRenderDeps,
  logger: SecureLogger = createNoopLogger()
): MergedHistoryBlock[] {
  const blocks: MergedHistoryBlock[] = [];

  for (const message of messages) {
    const role = deps.isBotIdentity(message.platform, message.userId) ? 'assistant' : 'user';

    const content = normalizeMessageContent(message, deps);
    if (!content) {
      continue;
    }

    const readableTime = deps.renderTime(resolveTimestamp(message, options.now), options.timeMode);
    const speaker = resolveSpeakerName(message, deps, logger);
    const header = `${readableTime}, ${speaker}:`;
    const entry: HistoryLine = { header, content, text: `${header} ${content}` };
    const speakerKey = `${message.platform}:${message.userId}:${role}`;

    const last = blocks[blocks.length - 1];
    if (options.mergeConsecutive && last && last.speakerKey === speakerKey) {
      last.lines.push(entry.text);
      last.entries.push(entry);
    } else {
      blocks.push({ role, speakerKey, lines: [entry.text], entries: [entry] });
    }
  }

  return blocks;
}
