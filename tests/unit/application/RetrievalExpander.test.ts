import { describe, it, expect, beforeEach } from 'vitest';
import { RetrievalExpander } from '../../../src/application/RetrievalExpander.js';
import { VectorIndex } from '../../../src/application/VectorIndex.js';
import { EmbeddingBatcher } from '../../../src/infrastructure/embedding/EmbeddingBatcher.js';
import {
  CollectionNotFoundError,
  OrphanChildError,
} from '../../../src/domain/errors/DomainErrors.js';
import { createBagOfWordsEmbedding } from '../../helpers/fakes.js';
import { InMemoryCollectionStore, makeParent, scored } from '../../helpers/InMemoryCollectionStore.js';

/**
 * Feature: 子塊檢索 → 父塊擴展
 *
 * 作為答案生成前的檢索步驟，我需要把命中的 child 換回完整的 parent，
 * 去除重複並控制在 context budget 內。
 */
describe('RetrievalExpander', () => {
  let store: InMemoryCollectionStore;
  let expander: RetrievalExpander;

  // 估算 token = ceil(字元數 / 4)
  const p1 = makeParent('doc-p0001', 0, 'a'.repeat(400), [1, 1]); // 100 tokens
  const p2 = makeParent('doc-p0002', 1, 'b'.repeat(200), [2, 3]); // 50 tokens
  const p3 = makeParent('doc-p0003', 2, 'c'.repeat(800), [4, 4]); // 200 tokens

  beforeEach(() => {
    store = new InMemoryCollectionStore();
    store.createCollection('docs', 8);
    store.putParents('docs', [p1, p2, p3]);

    const embedding = createBagOfWordsEmbedding(8);
    const index = new VectorIndex(store, embedding, new EmbeddingBatcher(embedding));
    expander = new RetrievalExpander(index, { minScore: 0.3 });
  });

  it('should deduplicate children by parent and keep the best score', async () => {
    store.scriptedResults = [
      scored('doc-p0002-c001', 'doc-p0002', 0.9, 2),
      scored('doc-p0002-c002', 'doc-p0002', 0.8, 3),
      scored('doc-p0001-c001', 'doc-p0001', 0.7, 1),
    ];

    const result = await expander.expand('query', 8, 3000, 'docs');

    expect(result.status).toBe('ok');
    expect(result.matches).toHaveLength(3);
    expect(result.contexts.map((c) => c.parentId)).toEqual(['doc-p0002', 'doc-p0001']);
    expect(result.contexts[0].text).toBe(p2.text);
    expect(result.contexts[0].citation).toEqual({
      parentId: 'doc-p0002',
      pageRange: { start: 2, end: 3 },
      matchedPages: [2, 3],
      ocrProcessed: false,
      score: 0.9,
      childIds: ['doc-p0002-c001', 'doc-p0002-c002'],
    });
    expect(result.usedTokens).toBe(150);
  });

  /**
   * Scenario: 超出 budget 的 parent 整段排除
   * Given budget 120 tokens，排序後為 P2(50)、P1(100)、P3(200)
   * Then 只放入 P2，P1 與其後的 parent 全部排除
   */
  it('should stop at the first parent that would exceed the budget', async () => {
    store.scriptedResults = [
      scored('doc-p0002-c001', 'doc-p0002', 0.9, 2),
      scored('doc-p0001-c001', 'doc-p0001', 0.8, 1),
      scored('doc-p0003-c001', 'doc-p0003', 0.7, 4),
    ];

    const result = await expander.expand('query', 8, 120, 'docs');

    expect(result.status).toBe('ok');
    expect(result.contexts.map((c) => c.parentId)).toEqual(['doc-p0002']);
    expect(result.excludedParentIds).toEqual(['doc-p0001', 'doc-p0003']);
    expect(result.usedTokens).toBe(50);
    expect(result.usedTokens).toBeLessThanOrEqual(result.contextBudget);
  });

  it('should include a parent that fills the budget exactly', async () => {
    store.scriptedResults = [
      scored('doc-p0002-c001', 'doc-p0002', 0.9, 2),
      scored('doc-p0001-c001', 'doc-p0001', 0.8, 1),
    ];

    const result = await expander.expand('query', 8, 150, 'docs');

    expect(result.contexts.map((c) => c.parentId)).toEqual(['doc-p0002', 'doc-p0001']);
    expect(result.usedTokens).toBe(150);
  });

  it('should report context_budget_exceeded when the best parent alone does not fit', async () => {
    store.scriptedResults = [scored('doc-p0003-c001', 'doc-p0003', 0.9, 4)];

    const result = await expander.expand('query', 8, 100, 'docs');

    expect(result.status).toBe('context_budget_exceeded');
    expect(result.contexts).toEqual([]);
    expect(result.excludedParentIds).toEqual(['doc-p0003']);
    expect(result.usedTokens).toBe(0);
  });

  /**
   * Scenario: 沒有相近的內容
   * Given 所有命中都低於 minScore
   * Then 回傳空 context 與 no_relevant_content
   */
  it('should report no_relevant_content when every match is below the minimum score', async () => {
    store.scriptedResults = [
      scored('doc-p0001-c001', 'doc-p0001', 0.29, 1),
      scored('doc-p0002-c001', 'doc-p0002', 0.05, 2),
    ];

    const result = await expander.expand('query', 8, 3000, 'docs');

    expect(result.status).toBe('no_relevant_content');
    expect(result.matches).toEqual([]);
    expect(result.contexts).toEqual([]);
  });

  it('should break score ties by parent order', async () => {
    store.scriptedResults = [
      scored('doc-p0003-c001', 'doc-p0003', 0.8, 4),
      scored('doc-p0001-c001', 'doc-p0001', 0.8, 1),
    ];

    const result = await expander.expand('query', 8, 3000, 'docs');

    expect(result.contexts.map((c) => c.parentId)).toEqual(['doc-p0001', 'doc-p0003']);
  });

  it('should cite every page a child crosses', async () => {
    store.scriptedResults = [scored('doc-p0002-c001', 'doc-p0002', 0.9, [2, 3])];

    const result = await expander.expand('query', 8, 3000, 'docs');

    expect(result.matches[0].pageRange).toEqual({ start: 2, end: 3 });
    expect(result.contexts[0].citation.matchedPages).toEqual([2, 3]);
  });

  it('should flag a citation as OCR when any contributing child came from OCR', async () => {
    store.scriptedResults = [
      scored('doc-p0002-c001', 'doc-p0002', 0.9, 2, false),
      scored('doc-p0002-c002', 'doc-p0002', 0.6, 3, true),
    ];

    const result = await expander.expand('query', 8, 3000, 'docs');

    expect(result.contexts[0].citation.ocrProcessed).toBe(true);
  });

  it('should only ask the index for k children', async () => {
    store.scriptedResults = [
      scored('doc-p0002-c001', 'doc-p0002', 0.9, 2),
      scored('doc-p0001-c001', 'doc-p0001', 0.8, 1),
    ];

    const result = await expander.expand('query', 1, 3000, 'docs');

    expect(result.matches.map((m) => m.childId)).toEqual(['doc-p0002-c001']);
  });

  it('should reject a match whose parent is missing', async () => {
    store.scriptedResults = [scored('doc-p0009-c001', 'doc-p0009', 0.9)];

    await expect(expander.expand('query', 8, 3000, 'docs')).rejects.toBeInstanceOf(OrphanChildError);
  });

  it('should reject an unknown collection', async () => {
    await expect(expander.expand('query', 8, 3000, 'nope')).rejects.toBeInstanceOf(CollectionNotFoundError);
  });
});
