/**
 * Human-readable message times, matching what the host's prompt builder
 * writes in front of each history line.
 */

import type { TimeMode, TimeRenderer } from './types.js';

export type TimeLocale = 'en' | 'zh';

export interface TimeRendererOptions {
  locale: TimeLocale;
  timezone: string;
  /** Unix seconds */
  now?: () => number;
}

const RELATIVE_UNITS = {
  en: {
    justNow: 'just now',
    seconds: (n: number) => `${n} ${n === 1 ? 'second' : 'seconds'} ago`,
    minutes: (n: number) => `${n} ${n === 1 ? 'minute' : 'minutes'} ago`,
    hours: (n: number) => `${n} ${n === 1 ? 'hour' : 'hours'} ago`,
    days: (n: number) => `${n} ${n === 1 ? 'day' : 'days'} ago`,
  },
  zh: {
    justNow: '刚刚',
    seconds: (n: number) => `${n}秒前`,
    minutes: (n: number) => `${n}分钟前`,
    hours: (n: number) => `${n}小时前`,
    days: (n: number) => `${n}天前`,
  },
} as const;

function dateParts(timestamp: number, timezone: string): Record<'month' | 'day' | 'hour' | 'minute' | 'second', string> {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  const parts = formatter.formatToParts(new Date(timestamp * 1000));
  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '00';
  return {
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
    second: get('second'),
  };
}

/** `HH:MM:SS` in the configured timezone. */
export function formatClockTime(timestamp: number, timezone: string): string {
  const p = dateParts(timestamp, timezone);
  return `${p.hour}:${p.minute}:${p.second}`;
}

/** `MM-DD HH:MM` in the configured timezone. */
export function formatMonthDayTime(timestamp: number, timezone: string): string {
  const p = dateParts(timestamp, timezone);
  return `${p.month}-${p.day} ${p.hour}:${p.minute}`;
}

export function formatRelativeTime(timestamp: number, now: number, locale: TimeLocale, timezone: string): string {
  const units = RELATIVE_UNITS[locale];
  const diff = now - timestamp;

  if (diff < 20) return units.justNow;
  if (diff < 60) return units.seconds(Math.floor(diff));
  if (diff < 3600) return units.minutes(Math.floor(diff / 60));
  if (diff < 86400) return units.hours(Math.floor(diff / 3600));
  if (diff < 86400 * 2) return units.days(Math.floor(diff / 86400));
  return formatMonthDayTime(timestamp, timezone);
}

export function createTimeRenderer(options: TimeRendererOptions): TimeRenderer {
  const now = options.now ?? (() => Date.now() / 1000);
  return (timestamp: number, mode: TimeMode): string => {
    if (mode === 'absolute_no_year') {
      return formatClockTime(timestamp, options.timezone);
    }
    return formatRelativeTime(timestamp, now(), options.locale, options.timezone);
  };
}
