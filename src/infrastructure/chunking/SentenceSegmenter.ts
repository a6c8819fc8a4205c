/** 不以空白分隔詞彙的語言：句界不可靠，改用固定長度字元窗 */
const NO_WHITESPACE_LANGUAGES = new Set(['zh', 'ja', 'th', 'lo', 'km', 'my']);

const PARAGRAPH_BREAK_RE = /\n\s*\n/;

/** 句末標點（含結尾引號、括號）之後的空白即為句界 */
const SENTENCE_BREAK_RE = /(?<=[.!?。！？]["'”’)\]]*)\s+/;

export function hasReliableSentenceBoundaries(language: string): boolean {
  return !NO_WHITESPACE_LANGUAGES.has(language);
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(PARAGRAPH_BREAK_RE)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function splitSentences(paragraph: string): string[] {
  return paragraph
    .split(SENTENCE_BREAK_RE)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * 調整切點，不把 surrogate pair（emoji、CJK 擴充區字元）切成兩半：
 * 切點落在 low surrogate 上時往前退一格，但不退到 floor 以下
 */
export function safeBoundary(text: string, index: number, floor: number = 0): number {
  if (index <= floor + 1 || index >= text.length) return index;
  const code = text.charCodeAt(index);
  const prev = text.charCodeAt(index - 1);
  const splitsPair = code >= 0xdc00 && code <= 0xdfff && prev >= 0xd800 && prev <= 0xdbff;
  return splitsPair ? index - 1 : index;
}

/** 固定長度切窗，最後一段可能較短 */
export function fixedWindows(text: string, size: number): string[] {
  const windows: string[] = [];
  for (let start = 0; start < text.length; ) {
    const end = safeBoundary(text, Math.min(start + size, text.length), start);
    windows.push(text.slice(start, end));
    start = end;
  }
  return windows;
}
