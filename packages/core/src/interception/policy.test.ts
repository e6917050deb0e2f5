import { describe, it, expect } from 'vitest';
import { StructuringConfigSchema, type StructuringConfig } from '@turnweaver/shared';
import { InterceptionPolicy } from './policy.js';

const makePolicy = (overrides: Partial<StructuringConfig> = {}) =>
  new InterceptionPolicy(StructuringConfigSchema.parse(overrides));

const group = (prompt = 'current time: X') => ({ context: { conversationId: 'c', isGroup: true }, prompt });
const direct = (prompt = 'current time: X') => ({ context: { conversationId: 'c', isGroup: false }, prompt });

describe('InterceptionPolicy', () => {
  it('applies everywhere with default settings', () => {
    const policy = makePolicy();
    expect(policy.evaluate(group())).toEqual({ apply: true });
    expect(policy.evaluate(direct())).toEqual({ apply: true });
    expect(policy.evaluate(group('now please rewrite this'))).toEqual({ apply: true });
  });

  it('skips everything when disabled', () => {
    const policy = makePolicy({ enabled: false, applyGroup: false });
    expect(policy.evaluate(group())).toEqual({ apply: false, reason: 'disabled' });
  });

  it('honours the group and private switches separately', () => {
    const noGroup = makePolicy({ applyGroup: false });
    expect(noGroup.evaluate(group())).toEqual({ apply: false, reason: 'group-disabled' });
    expect(noGroup.evaluate(direct())).toEqual({ apply: true });

    const noPrivate = makePolicy({ applyPrivate: false });
    expect(noPrivate.evaluate(direct())).toEqual({ apply: false, reason: 'private-disabled' });
    expect(noPrivate.evaluate(group())).toEqual({ apply: true });
  });

  it('skips rewrite prompts only when rewrites are off', () => {
    const policy = makePolicy({ applyRewrite: false });
    expect(policy.evaluate(group('... 改写后的回复 ...'))).toEqual({ apply: false, reason: 'rewrite-disabled' });
    expect(policy.evaluate(group('current time: X\nnow answer'))).toEqual({ apply: true });
  });

  it('recognises rewrite markers anywhere in the prompt', () => {
    const policy = makePolicy();
    expect(policy.isRewritePrompt('intro\nyou now want to add to what you just said\n')).toBe(true);
    expect(policy.isRewritePrompt('现在请你对这句内容进行改写')).toBe(true);
    expect(policy.isRewritePrompt('now answer')).toBe(false);
  });

  it('mirrors fallbackToOriginal', () => {
    expect(makePolicy().fallbackOnFailure).toBe(true);
    expect(makePolicy({ fallbackToOriginal: false }).fallbackOnFailure).toBe(false);
  });
});
