/**
 * History Block Builder Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  buildHistoryBlocks,
  normalizeMessageContent,
  resolveSpeakerName,
} from './history-block-builder.js';
import type { HistoryMessage, HistoryRenderDeps, HistoryBuildOptions } from './types.js';

function makeMessage(userId: string, nickname: string, content: string, time?: number): HistoryMessage {
  return {
    platform: 'qq',
    userId,
    userNickname: nickname,
    userCardname: '',
    displayMessage: content,
    processedPlainText: content,
    time,
  };
}

function makeDeps(overrides: Partial<HistoryRenderDeps> = {}): HistoryRenderDeps {
  return {
    isBotIdentity: (_platform, userId) => userId === 'bot-id',
    normalizeReferences: (text) => text,
    renderTime: (timestamp) => `T${Math.trunc(timestamp)}`,
    botNickname: 'Mai',
    ...overrides,
  };
}

const OPTIONS: HistoryBuildOptions = { timeMode: 'relative', mergeConsecutive: true, now: 500 };

describe('buildHistoryBlocks', () => {
  it('collapses consecutive bot messages into one assistant block', () => {
    const messages = [
      makeMessage('bot-id', 'Mai', 'first', 1),
      makeMessage('bot-id', 'Mai', 'second', 2),
      makeMessage('bot-id', 'Mai', 'third', 3),
      makeMessage('u1', 'Ming', 'ok', 4),
    ];

    const blocks = buildHistoryBlocks(messages, OPTIONS, makeDeps());

    expect(blocks).toHaveLength(2);
    expect(blocks[0]?.role).toBe('assistant');
    expect(blocks[0]?.speakerKey).toBe('qq:bot-id:assistant');
    expect(blocks[0]?.lines).toEqual([
      'T1, Mai(you): first',
      'T2, Mai(you): second',
      'T3, Mai(you): third',
    ]);
    expect(blocks[1]).toEqual({
      role: 'user',
      speakerKey: 'qq:u1:user',
      lines: ['T4, Ming: ok'],
      entries: [{ header: 'T4, Ming:', content: 'ok', text: 'T4, Ming: ok' }],
    });
  });

  it('gives every message its own block when merging is off', () => {
    const messages = [
      makeMessage('bot-id', 'Mai', 'first', 1),
      makeMessage('bot-id', 'Mai', 'second', 2),
      makeMessage('u1', 'Ming', 'a', 3),
      makeMessage('u1', 'Ming', 'b', 4),
    ];

    const blocks = buildHistoryBlocks(messages, { ...OPTIONS, mergeConsecutive: false }, makeDeps());

    expect(blocks.map((b) => b.lines)).toEqual([
      ['T1, Mai(you): first'],
      ['T2, Mai(you): second'],
      ['T3, Ming: a'],
      ['T4, Ming: b'],
    ]);
  });

  it('yields equal blocks when run twice on the same input', () => {
    const messages = [makeMessage('u1', 'Ming', 'a', 1), makeMessage('u1', 'Ming', 'b', 2)];
    const deps = makeDeps();
    expect(buildHistoryBlocks(messages, OPTIONS, deps)).toEqual(buildHistoryBlocks(messages, OPTIONS, deps));
  });

  it('skips a message whose content is blank', () => {
    const blank: HistoryMessage = { ...makeMessage('u2', 'Hong', '   ', 2), processedPlainText: '' };
    const blocks = buildHistoryBlocks([blank], OPTIONS, makeDeps());
    expect(blocks).toEqual([]);
  });

  it('does not let a skipped message break a merge run', () => {
    const messages = [
      makeMessage('u1', 'Ming', 'a', 1),
      { ...makeMessage('u2', 'Hong', '', 2), processedPlainText: '' },
      makeMessage('u1', 'Ming', 'b', 3),
    ];

    const blocks = buildHistoryBlocks(messages, OPTIONS, makeDeps());

    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.lines).toEqual(['T1, Ming: a', 'T3, Ming: b']);
  });

  it('keeps the same user on two platforms apart', () => {
    const messages = [
      makeMessage('u1', 'Ming', 'a', 1),
      { ...makeMessage('u1', 'Ming', 'b', 2), platform: 'discord' },
    ];
    expect(buildHistoryBlocks(messages, OPTIONS, makeDeps())).toHaveLength(2);
  });

  it('substitutes the current time for a missing or non-positive timestamp', () => {
    const messages = [makeMessage('u1', 'Ming', 'a'), makeMessage('u2', 'Hong', 'b', 0)];
    const blocks = buildHistoryBlocks(messages, OPTIONS, makeDeps());
    expect(blocks.map((b) => b.lines[0])).toEqual(['T500, Ming: a', 'T500, Hong: b']);
  });

  it('passes the inferred time mode to the renderer', () => {
    const renderTime = vi.fn().mockReturnValue('14:05:00');
    const blocks = buildHistoryBlocks(
      [makeMessage('u1', 'Ming', 'a', 100)],
      { ...OPTIONS, timeMode: 'absolute_no_year' },
      makeDeps({ renderTime })
    );
    expect(renderTime).toHaveBeenCalledWith(100, 'absolute_no_year');
    expect(blocks[0]?.lines).toEqual(['14:05:00, Ming: a']);
  });
});

describe('normalizeMessageContent', () => {
  it('prefers the display rendering over the plain text', () => {
    const message = { ...makeMessage('u1', 'Ming', 'display', 1), processedPlainText: 'plain' };
    expect(normalizeMessageContent(message, makeDeps())).toBe('display');
  });

  it('falls back to the plain text when the display rendering is empty', () => {
    const message = { ...makeMessage('u1', 'Ming', '', 1), processedPlainText: 'plain' };
    expect(normalizeMessageContent(message, makeDeps())).toBe('plain');
  });

  it('collapses raw picture ids into an image placeholder', () => {
    const message = makeMessage('u1', 'Ming', 'look [picid:abc123] nice', 1);
    expect(normalizeMessageContent(message, makeDeps())).toBe('look [image] nice');
  });

  it('rewrites references through the normalizer with bot-name replacement on', () => {
    const normalizeReferences = vi.fn().mockReturnValue('  @Hong hi  ');
    const message = makeMessage('u1', 'Ming', '@<Hong:u2> hi', 1);

    expect(normalizeMessageContent(message, makeDeps({ normalizeReferences }))).toBe('@Hong hi');
    expect(normalizeReferences).toHaveBeenCalledWith('@<Hong:u2> hi', 'qq', true);
  });
});

describe('resolveSpeakerName', () => {
  it('names the bot with the "(you)" suffix', () => {
    expect(resolveSpeakerName(makeMessage('bot-id', 'ignored', 'x'), makeDeps())).toBe('Mai(you)');
  });

  it('prefers the persisted display name', () => {
    const identity = { resolveDisplayName: vi.fn().mockReturnValue('Resolved') };
    expect(resolveSpeakerName(makeMessage('u1', 'Ming', 'x'), makeDeps({ identity }))).toBe('Resolved');
    expect(identity.resolveDisplayName).toHaveBeenCalledWith('qq', 'u1');
  });

  it('falls back to the nickname when the lookup throws', () => {
    const identity = {
      resolveDisplayName: vi.fn(() => {
        throw new Error('person table unavailable');
      }),
    };
    const logger = {
      info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(),
      child: vi.fn().mockReturnThis(), level: 'info' as const,
    };

    expect(resolveSpeakerName(makeMessage('u1', 'Ming', 'x'), makeDeps({ identity }), logger)).toBe('Ming');
    expect(logger.debug).toHaveBeenCalledWith('Display name lookup failed, using profile names', {
      platform: 'qq',
      userId: 'u1',
      error: 'person table unavailable',
    });
  });

  it('walks nickname, card name, user id, then "someone"', () => {
    const deps = makeDeps({ identity: { resolveDisplayName: () => null } });
    const base = makeMessage('u1', '', 'x');

    expect(resolveSpeakerName({ ...base, userCardname: 'Card' }, deps)).toBe('Card');
    expect(resolveSpeakerName(base, deps)).toBe('u1');
    expect(resolveSpeakerName({ ...base, userId: '' }, deps)).toBe('someone');
  });
});
