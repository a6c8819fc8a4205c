import fs from 'node:fs/promises';
import path from 'node:path';
import matter from 'gray-matter';
import type { DocumentSourcePort, OpenedDocument } from '../../domain/ports/DocumentSourcePort.js';

const TEXT_EXTENSIONS = new Set(['.txt', '.text']);
const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);

/** 分頁字元（form feed），與 pdftotext 等工具的輸出一致 */
export const PAGE_BREAK = '\f';

class OpenedText implements OpenedDocument {
  constructor(
    readonly sourceName: string,
    private readonly pages: string[],
  ) {}

  get pageCount(): number {
    return this.pages.length;
  }

  async extractText(pageNumber: number): Promise<string> {
    const text = this.pages[pageNumber - 1];
    if (text === undefined) {
      throw new Error(`Page ${pageNumber} is out of range`);
    }
    return text;
  }

  async renderImage(pageNumber: number): Promise<Uint8Array> {
    throw new Error(`Page ${pageNumber} of a text document has no image`);
  }

  async close(): Promise<void> {}
}

/**
 * 純文字 / Markdown 文件
 *
 * 以 form feed 分頁；Markdown 的 frontmatter 由 gray-matter 去除。
 * 含 NUL 字元的內容視為二進位檔（非文字）而拒絕。
 */
export class TextDocumentSource implements DocumentSourcePort {
  supports(filePath: string): boolean {
    const ext = path.extname(filePath).toLowerCase();
    return TEXT_EXTENSIONS.has(ext) || MARKDOWN_EXTENSIONS.has(ext);
  }

  async open(filePath: string): Promise<OpenedDocument> {
    const raw = await fs.readFile(filePath, 'utf-8');
    if (raw.includes('\u0000')) {
      throw new Error(`${path.basename(filePath)} is not a text file`);
    }

    const isMarkdown = MARKDOWN_EXTENSIONS.has(path.extname(filePath).toLowerCase());
    const body = isMarkdown ? matter(raw).content : raw;

    return new OpenedText(path.basename(filePath), splitPages(body.replace(/\r\n/g, '\n')));
  }
}

/** 以 form feed 分頁；結尾的 form feed 只是結束最後一頁，不另開新頁 */
export function splitPages(text: string): string[] {
  const pages = text.split(PAGE_BREAK);
  if (pages.length > 1 && pages[pages.length - 1].trim() === '') pages.pop();
  return pages;
}
