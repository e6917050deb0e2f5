/**
 * Prompt Boundary Splitter
 *
 * Recovers the system prefix and system suffix around the chat history of a
 * flattened prompt. Three strategies are tried in order, first hit wins:
 * 1. the "current time" anchor line
 * 2. a chat-history header line
 * 3. the longest run of history-like lines
 */

import { DEFAULT_PROMPT_MARKERS, type PromptMarkers } from './markers.js';
import { isHistoryLikeLine, isTimestampedLine } from './timestamp-classifier.js';
import type { PromptSplitResult } from './types.js';

export type SplitStrategy = (lines: string[], markers: PromptMarkers) => PromptSplitResult | null;

/**
 * Split text into lines the way the prompt builder joined them: any line
 * terminator separates, and a single trailing terminator adds no empty line.
 */
export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** First index at or after `start` whose trimmed line opens the suffix, or null. */
export function findSuffixStart(
  lines: string[],
  start: number,
  markers: PromptMarkers = DEFAULT_PROMPT_MARKERS
): number | null {
  for (let i = start; i < lines.length; i++) {
    const text = (lines[i] ?? '').trim();
    if (markers.suffixPrefixes.some((prefix) => text.startsWith(prefix))) {
      return i;
    }
  }
  return null;
}

function sliceResult(lines: string[], historyStart: number, historyEnd: number): PromptSplitResult | null {
  const systemPrefix = lines.slice(0, historyStart).join('\n').trim();
  const systemSuffix = lines.slice(historyEnd).join('\n').trim();
  if (!systemPrefix && !systemSuffix) {
    return null;
  }
  return { systemPrefix, systemSuffix };
}

function splitFrom(lines: string[], historyStart: number, markers: PromptMarkers): PromptSplitResult | null {
  const historyEnd = findSuffixStart(lines, historyStart, markers) ?? lines.length;
  return sliceResult(lines, historyStart, historyEnd);
}

export const splitByTimeAnchor: SplitStrategy = (lines, markers) => {
  const anchor = lines.findIndex((line) => {
    const text = line.trim();
    return markers.timeAnchors.some((marker) => text.startsWith(marker));
  });
  if (anchor < 0) return null;
  return splitFrom(lines, anchor + 1, markers);
};

export const splitByHeaderAnchor: SplitStrategy = (lines, markers) => {
  const header = lines.findIndex((line) => markers.historyHeaders.some((key) => line.includes(key)));
  if (header < 0) return null;

  let historyStart = header + 1;
  while (historyStart < lines.length && !(lines[historyStart] ?? '').trim()) {
    historyStart++;
  }
  return splitFrom(lines, historyStart, markers);
};

/**
 * Scan for the longest run of history-like lines that holds at least one
 * timestamped line. Equal-length runs keep the earliest.
 */
export const splitByTimeline: SplitStrategy = (lines, markers) => {
  let bestStart: number | null = null;
  let bestEnd: number | null = null;
  let bestLength = -1;
  let openStart: number | null = null;
  let timestampCount = 0;

  // One virtual line past the end closes a run that reaches end of input
  for (let i = 0; i <= lines.length; i++) {
    const isEnd = i === lines.length;
    const text = isEnd ? '' : (lines[i] ?? '').trim();

    if (!isEnd && isHistoryLikeLine(text, openStart !== null, markers)) {
      if (openStart === null) {
        openStart = i;
        timestampCount = 0;
      }
      if (isTimestampedLine(text)) {
        timestampCount++;
      }
      continue;
    }

    if (openStart !== null) {
      const length = i - openStart;
      if (timestampCount >= 1 && length > bestLength) {
        bestStart = openStart;
        bestEnd = i;
        bestLength = length;
      }
      openStart = null;
      timestampCount = 0;
    }
  }

  if (bestStart === null || bestEnd === null) {
    return null;
  }
  return sliceResult(lines, bestStart, bestEnd);
};

export const SPLIT_STRATEGIES: readonly SplitStrategy[] = [
  splitByTimeAnchor,
  splitByHeaderAnchor,
  splitByTimeline,
];

export function splitPrompt(
  prompt: string,
  markers: PromptMarkers = DEFAULT_PROMPT_MARKERS
): PromptSplitResult | null {
  const lines = splitLines(prompt);
  if (lines.length === 0) {
    return null;
  }

  for (const strategy of SPLIT_STRATEGIES) {
    const result = strategy(lines, markers);
    if (result) {
      return result;
    }
  }
  return null;
}
