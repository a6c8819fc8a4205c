import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AskUseCase, DEGRADED_ANSWER } from '../../../src/application/AskUseCase.js';
import { RetrievalExpander } from '../../../src/application/RetrievalExpander.js';
import { VectorIndex } from '../../../src/application/VectorIndex.js';
import { EmbeddingBatcher } from '../../../src/infrastructure/embedding/EmbeddingBatcher.js';
import type {
  AnswerGeneratorPort,
  AnswerRequest,
  GeneratedAnswer,
} from '../../../src/domain/ports/AnswerGeneratorPort.js';
import {
  AnswerGenerationFailedError,
  CollectionNotFoundError,
  IndexUnavailableError,
} from '../../../src/domain/errors/DomainErrors.js';
import type { SessionContext } from '../../../src/domain/entities/SessionContext.js';
import { createBagOfWordsEmbedding } from '../../helpers/fakes.js';
import { InMemoryCollectionStore, makeParent, scored } from '../../helpers/InMemoryCollectionStore.js';

/** 可替換行為的答案生成器，記錄收到的請求 */
class ScriptedGenerator implements AnswerGeneratorPort {
  readonly providerId = 'scripted';
  readonly requests: AnswerRequest[] = [];

  constructor(
    private behaviour: (request: AnswerRequest, signal: AbortSignal) => Promise<GeneratedAnswer>,
  ) {}

  generate(request: AnswerRequest, signal: AbortSignal): Promise<GeneratedAnswer> {
    this.requests.push(request);
    return this.behaviour(request, signal);
  }
}

/** 直到 signal abort 才 reject，模擬卡住的 LLM 呼叫 */
function hangUntilAborted(_request: AnswerRequest, signal: AbortSignal): Promise<GeneratedAnswer> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('Request was aborted.')));
  });
}

const session: SessionContext = {
  collectionName: 'docs',
  documentId: 'abcdef012345',
  sourceName: 'manual.pdf',
  language: 'de',
  languageConfidence: 0.97,
  parentCount: 2,
  childCount: 3,
  ocrPages: [],
  gapPages: [],
  embeddingModel: 'mock-bow',
  ingestedAt: 0,
};

/**
 * Feature: 問答與降級
 *
 * 作為呼叫端，我希望答案生成失敗或逾時時仍能拿到檢索到的段落與引用，
 * 並在索引暫時不可用時自動重試。
 */
describe('AskUseCase', () => {
  let store: InMemoryCollectionStore;
  let index: VectorIndex;

  function createUseCase(generator: AnswerGeneratorPort, overrides: { indexRetries?: number; answerTimeoutMs?: number } = {}) {
    const expander = new RetrievalExpander(index, { minScore: 0.3 });
    return new AskUseCase(expander, index, generator, {
      retrieval: {
        topK: 8,
        contextBudget: 3000,
        indexRetries: overrides.indexRetries ?? 3,
        retryBaseDelayMs: 1,
      },
      answerTimeoutMs: overrides.answerTimeoutMs ?? 1000,
    });
  }

  beforeEach(() => {
    store = new InMemoryCollectionStore();
    store.createCollection('docs', 8);
    store.putParents('docs', [
      makeParent('doc-p0001', 0, 'The pump must be primed before use.', [1, 1]),
      makeParent('doc-p0002', 1, 'Replace the filter every six months.', [2, 2]),
    ]);
    store.scriptedResults = [
      scored('doc-p0001-c001', 'doc-p0001', 0.9, 1),
      scored('doc-p0002-c001', 'doc-p0002', 0.6, 2),
    ];

    const embedding = createBagOfWordsEmbedding(8);
    index = new VectorIndex(store, embedding, new EmbeddingBatcher(embedding));
  });

  /**
   * Scenario: 正常作答
   * Given 模型只引用 [2]
   * Then 回傳 answered，引用只包含第 2 段
   */
  it('should answer and keep only the referenced citations', async () => {
    const generator = new ScriptedGenerator(async () => ({ answer: 'Every six months.', referencedIndexes: [2] }));
    const useCase = createUseCase(generator);

    const result = await useCase.ask({ question: 'How often is the filter replaced?', collectionName: 'docs' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.status).toBe('answered');
    expect(result.value.answer).toBe('Every six months.');
    expect(result.value.citations.map((c) => c.parentId)).toEqual(['doc-p0002']);

    const request = generator.requests[0];
    expect(request.query).toBe('How often is the filter replaced?');
    expect(request.contexts.map((c) => c.index)).toEqual([1, 2]);
    expect(request.contexts[0].text).toBe('The pump must be primed before use.');
  });

  it('should cite every context when the model references none', async () => {
    const generator = new ScriptedGenerator(async () => ({ answer: 'Prime it first.', referencedIndexes: [] }));

    const result = await createUseCase(generator).ask({ question: 'pump', collectionName: 'docs' });

    expect(result.ok && result.value.citations.map((c) => c.parentId)).toEqual(['doc-p0001', 'doc-p0002']);
  });

  it('should pass the language recorded at ingestion to the generator', async () => {
    store.saveSession('docs', session);
    const generator = new ScriptedGenerator(async () => ({ answer: 'Ja.', referencedIndexes: [1] }));

    await createUseCase(generator).ask({ question: 'pump', collectionName: 'docs' });

    expect(generator.requests[0].language).toBe('de');
  });

  it('should fall back to unknown language without a session', async () => {
    const generator = new ScriptedGenerator(async () => ({ answer: 'Yes.', referencedIndexes: [1] }));

    await createUseCase(generator).ask({ question: 'pump', collectionName: 'docs' });

    expect(generator.requests[0].language).toBe('unknown');
  });

  /**
   * Scenario: 答案生成逾時
   * Given 生成器在期限內沒有回應
   * Then 降級回傳 DEGRADED_ANSWER 與全部引用，錯誤代碼為 ANSWER_TIMEOUT
   */
  it('should degrade when answer generation exceeds the deadline', async () => {
    const generator = new ScriptedGenerator(hangUntilAborted);

    const result = await createUseCase(generator, { answerTimeoutMs: 20 })
      .ask({ question: 'pump', collectionName: 'docs' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.status).toBe('degraded');
    expect(result.value.answer).toBe(DEGRADED_ANSWER);
    expect(result.value.citations.map((c) => c.parentId)).toEqual(['doc-p0001', 'doc-p0002']);
    expect(result.value.degradation).toEqual({
      code: 'ANSWER_TIMEOUT',
      message: 'Answer generation exceeded 20ms',
    });
    expect(result.value.retrieval.contexts).toHaveLength(2);
  });

  it('should degrade when answer generation fails', async () => {
    const generator = new ScriptedGenerator(async () => {
      throw new Error('502 Bad Gateway');
    });

    const result = await createUseCase(generator).ask({ question: 'pump', collectionName: 'docs' });

    expect(result.ok && result.value.degradation).toEqual({
      code: 'ANSWER_FAILED',
      message: 'Answer generation failed: 502 Bad Gateway',
    });
  });

  it('should keep the message of an answer generation error as is', async () => {
    const generator = new ScriptedGenerator(async () => {
      throw new AnswerGenerationFailedError('Answer generation is disabled');
    });

    const result = await createUseCase(generator).ask({ question: 'pump', collectionName: 'docs' });

    expect(result.ok && result.value.degradation?.message).toBe('Answer generation is disabled');
  });

  it('should not call the generator when nothing relevant is found', async () => {
    store.scriptedResults = [scored('doc-p0001-c001', 'doc-p0001', 0.1, 1)];
    const behaviour = vi.fn(async () => ({ answer: 'unused', referencedIndexes: [] }));
    const generator = new ScriptedGenerator(behaviour);

    const result = await createUseCase(generator).ask({ question: 'volcano', collectionName: 'docs' });

    expect(result.ok && result.value).toMatchObject({
      status: 'no_relevant_content',
      answer: null,
      citations: [],
    });
    expect(behaviour).not.toHaveBeenCalled();
  });

  it('should honour per-request topK and context budget', async () => {
    const generator = new ScriptedGenerator(async () => ({ answer: 'x', referencedIndexes: [] }));

    const result = await createUseCase(generator).retrieve({
      question: 'pump',
      collectionName: 'docs',
      topK: 1,
      contextBudget: 500,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.matches).toHaveLength(1);
    expect(result.value.contextBudget).toBe(500);
  });

  /**
   * Scenario: 索引暫時鎖住
   * Given 第一次查詢失敗
   * Then 重試後成功
   */
  it('should retry a temporarily unavailable index', async () => {
    store.failNextSearches = 1;
    const generator = new ScriptedGenerator(async () => ({ answer: 'ok', referencedIndexes: [] }));

    const result = await createUseCase(generator).ask({ question: 'pump', collectionName: 'docs' });

    expect(result.ok && result.value.status).toBe('answered');
    expect(store.searchCalls).toBe(2);
  });

  it('should fail with INDEX_UNAVAILABLE after the retries run out', async () => {
    store.failNextSearches = 10;
    const generator = new ScriptedGenerator(async () => ({ answer: 'ok', referencedIndexes: [] }));

    const result = await createUseCase(generator, { indexRetries: 2 })
      .ask({ question: 'pump', collectionName: 'docs' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(IndexUnavailableError);
    expect(result.error.message).toBe('Index "docs" unavailable: database is locked');
    expect(store.searchCalls).toBe(3);
    expect(generator.requests).toHaveLength(0);
  });

  it('should fail without retrying for an unknown collection', async () => {
    const generator = new ScriptedGenerator(async () => ({ answer: 'ok', referencedIndexes: [] }));

    const result = await createUseCase(generator).ask({ question: 'pump', collectionName: 'other' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CollectionNotFoundError);
    expect(store.searchCalls).toBe(0);
  });
});
