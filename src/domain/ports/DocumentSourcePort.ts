/**
 * 已開啟的文件：逐頁提供原生文字與頁面影像
 */
export interface OpenedDocument {
  readonly sourceName: string;
  readonly pageCount: number;
  /** pageNumber 為 1-based；文字層無法讀取時丟出錯誤 */
  extractText(pageNumber: number): Promise<string>;
  /** 頁面影像（PNG）；不支援影像的來源丟出錯誤 */
  renderImage(pageNumber: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface DocumentSourcePort {
  supports(filePath: string): boolean;
  /** 檔案損毀或無法讀取時丟出錯誤 */
  open(filePath: string): Promise<OpenedDocument>;
}
