export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 pagewise domain 錯誤的基底類別 */
export abstract class PageWiseError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable ---

/** 向量儲存（或其 embedding 依賴）無法使用；呼叫端可自行退避重試 */
export class IndexUnavailableError extends PageWiseError {
  readonly classification = 'retryable' as const;
  readonly code = 'INDEX_UNAVAILABLE';

  constructor(
    message: string,
    public readonly collectionName: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class EmbeddingRateLimitError extends PageWiseError {
  readonly classification = 'retryable' as const;
  readonly code = 'EMBEDDING_RATE_LIMIT';
}

// --- Degradable ---

export class EmbeddingUnavailableError extends PageWiseError {
  readonly classification = 'degradable' as const;
  readonly code = 'EMBEDDING_UNAVAILABLE';
}

/** 單頁抽取失敗（原生文字層與 OCR 皆無結果），記錄為缺頁後繼續處理 */
export class PageExtractionFailedError extends PageWiseError {
  readonly classification = 'degradable' as const;
  readonly code = 'PAGE_EXTRACTION_FAILED';

  constructor(
    public readonly pageNumber: number,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Page ${pageNumber} could not be extracted: ${reason}`, options);
  }
}

export class AnswerGenerationTimeoutError extends PageWiseError {
  readonly classification = 'degradable' as const;
  readonly code = 'ANSWER_TIMEOUT';

  constructor(
    public readonly timeoutMs: number,
    options?: ErrorOptions,
  ) {
    super(`Answer generation exceeded ${timeoutMs}ms`, options);
  }
}

export class AnswerGenerationFailedError extends PageWiseError {
  readonly classification = 'degradable' as const;
  readonly code = 'ANSWER_FAILED';
}

// --- Manual ---

/**
 * 整份文件無法處理（檔案損毀、格式不支援）
 * pageNumber 只在單頁錯誤升級為整份失敗時才會帶上
 */
export class IngestionFailedError extends PageWiseError {
  readonly classification = 'manual' as const;
  readonly code = 'INGESTION_FAILED';

  constructor(
    message: string,
    public readonly pageNumber?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class EmptyDocumentError extends PageWiseError {
  readonly classification = 'manual' as const;
  readonly code = 'EMPTY_DOCUMENT';

  constructor(
    public readonly sourceName: string,
    public readonly pageCount: number,
    options?: ErrorOptions,
  ) {
    super(`No usable text in "${sourceName}" (${pageCount} pages)`, options);
  }
}

export class CollectionNotFoundError extends PageWiseError {
  readonly classification = 'manual' as const;
  readonly code = 'COLLECTION_NOT_FOUND';

  constructor(
    public readonly collectionName: string,
    options?: ErrorOptions,
  ) {
    super(`Collection "${collectionName}" does not exist. Run: pagewise ingest <file> --collection ${collectionName}`, options);
  }
}

export class OrphanChildError extends PageWiseError {
  readonly classification = 'manual' as const;
  readonly code = 'ORPHAN_CHILD';

  constructor(
    public readonly childId: string,
    public readonly parentId: string,
    options?: ErrorOptions,
  ) {
    super(`Child chunk "${childId}" references missing parent "${parentId}"`, options);
  }
}

export class ConfigValidationError extends PageWiseError {
  readonly classification = 'manual' as const;
  readonly code = 'CONFIG_INVALID';
}
