import type { ChildChunk, PageRange, PageSpan, ParentChunk } from '../../domain/entities/Chunk.js';
import { CHARS_PER_TOKEN } from '../../domain/entities/Chunk.js';
import type { IngestedDocument } from '../../domain/entities/Document.js';
import { isUsablePage } from '../../domain/entities/Document.js';
import type { ChunkingConfig } from '../../config/types.js';
import { ConfigValidationError } from '../../domain/errors/DomainErrors.js';
import {
  fixedWindows,
  hasReliableSentenceBoundaries,
  safeBoundary,
  splitParagraphs,
  splitSentences,
} from './SentenceSegmenter.js';

export interface ChunkingResult {
  parents: ParentChunk[];
  children: ChildChunk[];
  /** 被略過的缺頁頁碼 */
  gaps: number[];
}

/** 組 parent 的最小單位：一個句子（或整段） */
interface Unit {
  text: string;
  page: number;
  /** 段落或頁面的第一個單位，前面以空行分隔 */
  breakBefore: boolean;
}

interface ParentBuffer {
  text: string;
  spans: PageSpan[];
}

/**
 * 兩層 chunking：parent（寬 context）與 child（細粒度檢索單位）
 *
 * - 各頁先切段落，再依語言切句；句界不可靠的語言以整段為單位
 * - 單位貪婪累積成 parent，超過 parentSize 前 flush；單一過長單位切固定窗
 * - 每個 parent 再切成重疊的 child 窗，stride = childSize - childOverlap
 * - 切點不落在 surrogate pair 中間
 *
 * 尺寸單位為估算 token（× CHARS_PER_TOKEN 換成字元）。
 * 相同文件 + 相同設定必得相同的 id、數量與文字範圍。
 */
export class HierarchicalChunker {
  private readonly parentChars: number;
  private readonly childChars: number;
  private readonly strideChars: number;

  constructor(config: ChunkingConfig) {
    const { parentSize, childSize, childOverlap } = config;
    const valid = Number.isInteger(parentSize) && Number.isInteger(childSize) && Number.isInteger(childOverlap)
      && childSize > 0 && childOverlap >= 0 && childOverlap < childSize && childSize <= parentSize;
    if (!valid) {
      throw new ConfigValidationError(
        `Invalid chunk sizes: parent=${parentSize} child=${childSize} overlap=${childOverlap}`,
      );
    }
    this.parentChars = config.parentSize * CHARS_PER_TOKEN;
    this.childChars = config.childSize * CHARS_PER_TOKEN;
    this.strideChars = (config.childSize - config.childOverlap) * CHARS_PER_TOKEN;
  }

  chunk(doc: IngestedDocument): ChunkingResult {
    const docKey = doc.documentId.slice(0, 12);
    const language = doc.language.code;
    const ocrPages = new Set<number>();
    const gaps: number[] = [];
    const units: Unit[] = [];
    const sentenceMode = hasReliableSentenceBoundaries(language);

    for (const page of doc.pages) {
      if (!isUsablePage(page)) {
        gaps.push(page.pageNumber);
        continue;
      }
      if (page.kind === 'recognized') ocrPages.add(page.pageNumber);

      for (const paragraph of splitParagraphs(page.text)) {
        const pieces = sentenceMode ? splitSentences(paragraph) : [paragraph];
        pieces.forEach((text, i) => {
          units.push({ text, page: page.pageNumber, breakBefore: i === 0 });
        });
      }
    }

    const parents: ParentChunk[] = [];
    const children: ChildChunk[] = [];

    for (const buffer of this.assembleParents(units)) {
      const index = parents.length;
      const parentId = `${docKey}-p${String(index + 1).padStart(4, '0')}`;
      const parentChildren = this.splitChildren(parentId, buffer, language, ocrPages);
      const pages = buffer.spans.map((s) => s.page);

      parents.push({
        kind: 'parent',
        id: parentId,
        index,
        text: buffer.text,
        pageRange: { start: Math.min(...pages), end: Math.max(...pages) },
        pageSpans: buffer.spans,
        language,
        ocrProcessed: pages.some((p) => ocrPages.has(p)),
        childIds: parentChildren.map((c) => c.id),
      });
      children.push(...parentChildren);
    }

    return { parents, children, gaps };
  }

  /** 貪婪累積單位成 parent 窗 */
  private assembleParents(units: Unit[]): ParentBuffer[] {
    const result: ParentBuffer[] = [];
    let buffer: ParentBuffer = { text: '', spans: [] };

    const flush = (): void => {
      if (buffer.text.length > 0) result.push(buffer);
      buffer = { text: '', spans: [] };
    };

    const append = (text: string, page: number, breakBefore: boolean): void => {
      const separator = buffer.text.length === 0 ? '' : breakBefore ? '\n\n' : ' ';
      const start = buffer.text.length + separator.length;
      buffer.text += separator + text;
      const end = buffer.text.length;

      const last = buffer.spans[buffer.spans.length - 1];
      if (last && last.page === page) {
        last.end = end;
      } else {
        buffer.spans.push({ page, start, end });
      }
    };

    for (const unit of units) {
      const separatorLength = unit.breakBefore ? 2 : 1;
      if (buffer.text.length > 0 && buffer.text.length + separatorLength + unit.text.length > this.parentChars) {
        flush();
      }

      if (unit.text.length <= this.parentChars) {
        append(unit.text, unit.page, unit.breakBefore);
        continue;
      }

      // 單一單位超過 parent 尺寸：切固定窗，最後一窗留在 buffer 繼續累積
      const windows = fixedWindows(unit.text, this.parentChars);
      windows.forEach((window, i) => {
        append(window, unit.page, unit.breakBefore);
        if (i < windows.length - 1) flush();
      });
    }

    flush();
    return result;
  }

  /** 將 parent 切成重疊 child 窗；文字一律取自 parent 本身 */
  private splitChildren(
    parentId: string,
    parent: ParentBuffer,
    language: string,
    ocrPages: Set<number>,
  ): ChildChunk[] {
    const children: ChildChunk[] = [];
    const length = parent.text.length;

    for (let start = 0; ; start = safeBoundary(parent.text, start + this.strideChars)) {
      const end = safeBoundary(parent.text, Math.min(start + this.childChars, length), start);
      const pageRange = pageRangeOf(parent.spans, start, end);
      const index = children.length;

      children.push({
        kind: 'child',
        id: `${parentId}-c${String(index + 1).padStart(3, '0')}`,
        parentId,
        index,
        start,
        end,
        text: parent.text.slice(start, end),
        page: pageRange.start,
        pageRange,
        language,
        ocrProcessed: touchesPages(parent.spans, start, end, ocrPages),
      });

      if (end >= length) break;
    }

    return children;
  }
}

function overlapping(spans: PageSpan[], start: number, end: number): PageSpan[] {
  return spans.filter((s) => s.start < end && s.end > start);
}

/** 窗口 [start, end) 涵蓋的頁碼範圍；只落在分隔字元上時取前一個 span */
function pageRangeOf(spans: PageSpan[], start: number, end: number): PageRange {
  const hit = overlapping(spans, start, end);
  if (hit.length === 0) {
    const before = spans.filter((s) => s.end <= start);
    const page = (before[before.length - 1] ?? spans[0]).page;
    return { start: page, end: page };
  }
  return { start: hit[0].page, end: hit[hit.length - 1].page };
}

function touchesPages(spans: PageSpan[], start: number, end: number, pages: Set<number>): boolean {
  return overlapping(spans, start, end).some((s) => pages.has(s.page));
}
