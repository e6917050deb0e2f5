/**
 * Timestamp Classifier
 *
 * Recognises chat-history lines of the form `<time>, <speaker>: <content>`
 * and infers which time rendering a flattened prompt used.
 */

import { DEFAULT_PROMPT_MARKERS, type PromptMarkers } from './markers.js';
import type { TimeMode } from './types.js';

const TIMESTAMPED_LINE =
  /^\s*(\[[^\]]+\])?(just now|刚刚|\d+ (?:seconds?|minutes?|hours?|days?) ago|\d+(?:秒前|分钟前|小时前|天前)|\d{1,2}:\d{2}(?::\d{2})?|\d{1,2}-\d{1,2}\s+\d{1,2}:\d{2}(?::\d{2})?),\s+.+$/;

const RELATIVE_TIME_MARKER = /(?:(?:seconds?|minutes?|hours?|days?) ago|秒前|分钟前|小时前|天前),\s/;

const CLOCK_TIME_MARKER = /\d{1,2}:\d{2}(?::\d{2})?,\s/;

export function isTimestampedLine(line: string): boolean {
  return TIMESTAMPED_LINE.test(line);
}

/**
 * A line belongs to a history run when it is timestamped or one of the
 * structural lines the host interleaves with messages. Blank lines only
 * continue a run that is already open.
 */
export function isHistoryLikeLine(
  line: string,
  hasOpenBlock: boolean,
  markers: PromptMarkers = DEFAULT_PROMPT_MARKERS
): boolean {
  const text = line.trim();
  if (!text) {
    return hasOpenBlock;
  }
  if (isTimestampedLine(text)) {
    return true;
  }
  if (markers.imageInfoHeaders.includes(text)) {
    return true;
  }
  if (markers.imageContentLines.some((m) => text.startsWith(m.prefix) && text.includes(m.contains))) {
    return true;
  }
  return markers.historyStartPrefixes.some((prefix) => text.startsWith(prefix));
}

export function inferTimeMode(prompt: string): TimeMode {
  if (RELATIVE_TIME_MARKER.test(prompt)) {
    return 'relative';
  }
  if (CLOCK_TIME_MARKER.test(prompt)) {
    return 'absolute_no_year';
  }
  return 'relative';
}
