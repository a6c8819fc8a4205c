import path from 'node:path';
import type { DocumentSourcePort, OpenedDocument } from '../../domain/ports/DocumentSourcePort.js';

/**
 * 依副檔名分派到第一個支援的來源
 */
export class FileDocumentSource implements DocumentSourcePort {
  constructor(private readonly sources: readonly DocumentSourcePort[]) {}

  supports(filePath: string): boolean {
    return this.sources.some((s) => s.supports(filePath));
  }

  async open(filePath: string): Promise<OpenedDocument> {
    const source = this.sources.find((s) => s.supports(filePath));
    if (!source) {
      throw new Error(`Unsupported document type: ${path.extname(filePath) || '(none)'}`);
    }
    return source.open(filePath);
  }
}
