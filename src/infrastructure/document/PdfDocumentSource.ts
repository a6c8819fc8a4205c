import fs from 'node:fs/promises';
import path from 'node:path';
import { PDFParse } from 'pdf-parse';
import type { DocumentSourcePort, OpenedDocument } from '../../domain/ports/DocumentSourcePort.js';

interface PdfPageText {
  num: number;
  text: string;
}

/**
 * pdf-parse 開啟的 PDF
 *
 * 文字層於 open 時一次取出；頁面影像按需渲染（只有需要 OCR 的頁面）。
 */
class OpenedPdf implements OpenedDocument {
  private readonly texts: Map<number, string>;

  constructor(
    readonly sourceName: string,
    readonly pageCount: number,
    pages: PdfPageText[],
    private readonly parser: PDFParse,
    private readonly renderScale: number,
  ) {
    this.texts = new Map(pages.map((p) => [p.num, p.text]));
  }

  async extractText(pageNumber: number): Promise<string> {
    const text = this.texts.get(pageNumber);
    if (text === undefined) {
      throw new Error(`Page ${pageNumber} has no text layer`);
    }
    return text;
  }

  async renderImage(pageNumber: number): Promise<Uint8Array> {
    const result = await this.parser.getScreenshot({
      partial: [pageNumber],
      scale: this.renderScale,
      imageBuffer: true,
      imageDataUrl: false,
    });
    const [shot] = result.pages;
    if (!shot || shot.data.length === 0) {
      throw new Error(`Page ${pageNumber} could not be rendered`);
    }
    return shot.data;
  }

  async close(): Promise<void> {
    await this.parser.destroy();
  }
}

export class PdfDocumentSource implements DocumentSourcePort {
  constructor(private readonly renderScale: number = 2) {}

  supports(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === '.pdf';
  }

  async open(filePath: string): Promise<OpenedDocument> {
    const data = new Uint8Array(await fs.readFile(filePath));
    const parser = new PDFParse({ data });

    try {
      const result = await parser.getText();
      return new OpenedPdf(path.basename(filePath), result.total, result.pages, parser, this.renderScale);
    } catch (err) {
      await parser.destroy();
      throw err;
    }
  }
}
