import { describe, it, expect } from 'vitest';
import {
  createTimeRenderer,
  formatClockTime,
  formatMonthDayTime,
  formatRelativeTime,
} from './time-format.js';

// 2023-11-14T22:13:20Z
const TS = 1700000000;

describe('formatClockTime', () => {
  it('renders HH:MM:SS in the given timezone', () => {
    expect(formatClockTime(TS, 'UTC')).toBe('22:13:20');
    expect(formatClockTime(TS, 'Asia/Shanghai')).toBe('06:13:20');
  });

  it('renders midnight as 00', () => {
    expect(formatClockTime(0, 'UTC')).toBe('00:00:00');
  });
});

describe('formatMonthDayTime', () => {
  it('renders MM-DD HH:MM', () => {
    expect(formatMonthDayTime(TS, 'UTC')).toBe('11-14 22:13');
    expect(formatMonthDayTime(TS, 'Asia/Shanghai')).toBe('11-15 06:13');
  });
});

describe('formatRelativeTime', () => {
  it.each([
    [5, 'just now'],
    [30, '30 seconds ago'],
    [60, '1 minute ago'],
    [150, '2 minutes ago'],
    [3600, '1 hour ago'],
    [7200, '2 hours ago'],
    [86400, '1 day ago'],
  ])('renders %i seconds back as %s', (diff, expected) => {
    expect(formatRelativeTime(TS - diff, TS, 'en', 'UTC')).toBe(expected);
  });

  it('falls back to the calendar form from two days back', () => {
    expect(formatRelativeTime(TS, TS + 86400 * 3, 'en', 'UTC')).toBe('11-14 22:13');
  });

  it('speaks Chinese', () => {
    expect(formatRelativeTime(TS - 5, TS, 'zh', 'UTC')).toBe('刚刚');
    expect(formatRelativeTime(TS - 300, TS, 'zh', 'UTC')).toBe('5分钟前');
    expect(formatRelativeTime(TS - 7200, TS, 'zh', 'UTC')).toBe('2小时前');
  });
});

describe('createTimeRenderer', () => {
  const render = createTimeRenderer({ locale: 'en', timezone: 'UTC', now: () => TS + 600 });

  it('uses the injected clock for relative times', () => {
    expect(render(TS, 'relative')).toBe('10 minutes ago');
  });

  it('uses the clock form for absolute_no_year', () => {
    expect(render(TS, 'absolute_no_year')).toBe('22:13:20');
  });
});
