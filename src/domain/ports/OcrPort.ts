/**
 * 光學辨識協作者：頁面影像（PNG bytes）→ 文字
 * 頁面沒有文字時回傳空字串
 */
export interface OcrPort {
  readonly providerId: string;
  recognize(image: Uint8Array, pageNumber: number): Promise<string>;
}
