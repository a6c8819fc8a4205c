import path from 'node:path';
import type { DocumentSourcePort, OpenedDocument } from '../domain/ports/DocumentSourcePort.js';
import type { OcrPort } from '../domain/ports/OcrPort.js';
import type { LanguageDetectorPort } from '../domain/ports/LanguageDetectorPort.js';
import type { DetectedLanguage, IngestedDocument, PageExtraction } from '../domain/entities/Document.js';
import { UNKNOWN_LANGUAGE, isUsablePage } from '../domain/entities/Document.js';
import {
  EmptyDocumentError,
  IngestionFailedError,
  PageExtractionFailedError,
} from '../domain/errors/DomainErrors.js';
import { ContentHash } from '../domain/value-objects/ContentHash.js';
import type { IngestionConfig } from '../config/types.js';
import type { Result } from '../shared/Result.js';
import { fail, ok } from '../shared/Result.js';
import { Logger, errorMessage } from '../shared/Logger.js';

/** 非空白字元數 */
export function textDensity(text: string): number {
  return text.replace(/\s+/g, '').length;
}

/**
 * 文件抽取：逐頁取原生文字層，密度不足時改走 OCR，最後偵測主要語言
 *
 * 單頁失敗只會成為缺頁（gap），整份文件無法開啟或沒有任何可用文字才算失敗。
 */
export class ExtractionPipeline {
  private readonly logger = new Logger('ExtractionPipeline');

  constructor(
    private readonly source: DocumentSourcePort,
    private readonly ocr: OcrPort,
    private readonly detector: LanguageDetectorPort,
    private readonly config: Pick<IngestionConfig, 'ocrMinCharsPerPage' | 'languageMinConfidence'>,
  ) {}

  async extract(
    filePath: string,
  ): Promise<Result<IngestedDocument, IngestionFailedError | EmptyDocumentError>> {
    const fileName = path.basename(filePath);
    if (!this.source.supports(filePath)) {
      return fail(new IngestionFailedError(`Unsupported document type: ${fileName}`));
    }

    let doc: OpenedDocument;
    try {
      doc = await this.source.open(filePath);
    } catch (err) {
      return fail(new IngestionFailedError(`Cannot open "${fileName}": ${errorMessage(err)}`, undefined, { cause: err }));
    }

    const pages: PageExtraction[] = [];
    try {
      for (let pageNumber = 1; pageNumber <= doc.pageCount; pageNumber++) {
        pages.push(await this.extractPage(doc, pageNumber));
      }
    } finally {
      await doc.close();
    }

    const usable = pages.filter(isUsablePage);
    if (usable.length === 0) {
      return fail(new EmptyDocumentError(doc.sourceName, doc.pageCount));
    }

    const documentId = ContentHash.fromParts(
      pages.map((p) => (isUsablePage(p) ? p.text : '')),
    ).value;
    const language = this.detectLanguage(usable.map((p) => p.text).join('\n\n'));

    this.logger.info('Document extracted', {
      source: doc.sourceName,
      pages: pages.length,
      recognized: pages.filter((p) => p.kind === 'recognized').length,
      gaps: pages.length - usable.length,
      language: language.code,
    });

    return ok({ documentId, sourceName: doc.sourceName, pages, language });
  }

  private async extractPage(doc: OpenedDocument, pageNumber: number): Promise<PageExtraction> {
    let nativeText = '';
    try {
      nativeText = await doc.extractText(pageNumber);
    } catch (err) {
      this.logger.debug('Native text layer unreadable', { pageNumber, error: errorMessage(err) });
    }

    const density = textDensity(nativeText);
    if (density >= this.config.ocrMinCharsPerPage) {
      if (density > 0) return { kind: 'native', pageNumber, density, text: nativeText };
      return {
        kind: 'gap', pageNumber, density,
        error: new PageExtractionFailedError(pageNumber, 'page has no text'),
      };
    }

    let reason: string;
    let cause: unknown;
    try {
      const image = await doc.renderImage(pageNumber);
      const recognized = (await this.ocr.recognize(image, pageNumber)).trim();
      if (recognized.length > 0) {
        return { kind: 'recognized', pageNumber, density, text: recognized };
      }
      reason = 'no text recognized';
    } catch (err) {
      reason = errorMessage(err);
      cause = err;
    }

    // OCR 失敗但文字層仍有少量內容：保留原生文字
    if (density > 0) {
      return { kind: 'native', pageNumber, density, text: nativeText };
    }

    this.logger.warn('Page skipped', { pageNumber, reason });
    return {
      kind: 'gap', pageNumber, density,
      error: new PageExtractionFailedError(pageNumber, reason, cause === undefined ? undefined : { cause }),
    };
  }

  private detectLanguage(text: string): DetectedLanguage {
    const detected = this.detector.detect(text);
    if (detected.confidence < this.config.languageMinConfidence) {
      return { code: UNKNOWN_LANGUAGE, confidence: detected.confidence };
    }
    return detected;
  }
}
