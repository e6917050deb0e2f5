/**
 * Prompt Marker Vocabulary
 *
 * Every literal the boundary splitter and the interception policy look for in
 * a flattened prompt. The host renders its prompts either in English or in
 * Chinese, so each list carries both spellings.
 */

export interface PromptMarkers {
  /** A line whose trimmed text starts with one of these opens the history right after it. */
  timeAnchors: string[];
  /** A line containing one of these introduces the history on the next non-blank line. */
  historyHeaders: string[];
  /** Ordered prefixes of the first line after the history (trimmed `startsWith`). */
  suffixPrefixes: string[];
  /** Substrings that mark a prompt as a rewrite of an earlier reply. */
  rewriteMarkers: string[];
  imageInfoHeaders: string[];
  /** `[prefix ... contains]` pairs recognising per-image description lines. */
  imageContentLines: { prefix: string; contains: string }[];
  historyStartPrefixes: string[];
}

export const DEFAULT_PROMPT_MARKERS: PromptMarkers = {
  timeAnchors: ['current time:', '当前时间：'],
  historyHeaders: [
    "here is what's being discussed in the group",
    'here is what you discussed earlier',
    '下面是群里正在聊的内容',
    '这是你们之前聊的内容',
  ],
  suffixPrefixes: [
    'now',
    'you now want to add',
    'you are currently',
    'now please rewrite this',
    'please, based on the chat',
    'rewritten reply',
    'your name is',
    '现在',
    '你现在想补充说明',
    '你正在',
    '现在请你对这句内容进行改写',
    '请你根据聊天内容',
    '改写后的回复',
    '你的名字是',
  ],
  rewriteMarkers: [
    'now please rewrite this',
    'rewritten reply',
    'you now want to add to what you just said',
    '现在请你对这句内容进行改写',
    '改写后的回复',
    '你现在想补充说明你刚刚自己的发言内容',
  ],
  imageInfoHeaders: ['image info:', '图片信息：'],
  imageContentLines: [
    { prefix: '[image', contains: ' content:' },
    { prefix: '[图片', contains: '的内容：' },
  ],
  historyStartPrefixes: ['chat history starts at:', '以下聊天开始时间：'],
};
