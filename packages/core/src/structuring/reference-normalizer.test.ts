import { describe, it, expect } from 'vitest';
import { createReferenceNormalizer } from './reference-normalizer.js';

const normalize = createReferenceNormalizer({
  isBotIdentity: (platform, userId) => platform === 'qq' && userId === '10000',
  botNickname: 'Mai',
});

describe('createReferenceNormalizer', () => {
  it('replaces mention tokens with the display name', () => {
    expect(normalize('hi <Ming:123>, ask <Hong:456>', 'qq', true)).toBe('hi Ming, ask Hong');
  });

  it('marks the bot as you when asked to', () => {
    expect(normalize('reply to <Maimai:10000>', 'qq', true)).toBe('reply to Mai(you)');
  });

  it('keeps the stored name for the bot otherwise', () => {
    expect(normalize('reply to <Maimai:10000>', 'qq', false)).toBe('reply to Maimai');
  });

  it('only treats the bot id as the bot on its own platform', () => {
    expect(normalize('<Someone:10000>', 'discord', true)).toBe('Someone');
  });

  it('leaves text without tokens alone', () => {
    expect(normalize('a < b > c', 'qq', true)).toBe('a < b > c');
  });
});
