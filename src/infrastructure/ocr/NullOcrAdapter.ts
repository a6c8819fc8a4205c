import type { OcrPort } from '../../domain/ports/OcrPort.js';

/**
 * 空 OCR 實作
 *
 * 設計意圖：ocr.provider 為 'none' 時使用。一律回傳空字串，
 * 影像頁因此被記錄為缺頁，其餘頁面照常處理。
 */
export class NullOcrAdapter implements OcrPort {
  readonly providerId = 'none';

  async recognize(_image: Uint8Array, _pageNumber: number): Promise<string> {
    return '';
  }
}
