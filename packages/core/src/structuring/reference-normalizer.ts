/**
 * Rewrites `<nickname:userId>` mention and reply tokens to plain display
 * names. The bot's own tokens become `<bot nickname>(you)` when asked to.
 */

import type { BotIdentityCheck, ReferenceNormalizer } from './types.js';

const REFERENCE_TOKEN = /<([^:<>\n]+):([^:<>\n]+)>/g;

export interface ReferenceNormalizerOptions {
  isBotIdentity: BotIdentityCheck;
  botNickname: string;
}

export function createReferenceNormalizer(options: ReferenceNormalizerOptions): ReferenceNormalizer {
  return (text, platform, replaceBotName) =>
    text.replace(REFERENCE_TOKEN, (_token, name: string, userId: string) => {
      if (replaceBotName && options.isBotIdentity(platform, userId.trim())) {
        return `${options.botNickname}(you)`;
      }
      return name.trim();
    });
}
