import type { PageRange, ParentChunk } from '../domain/entities/Chunk.js';
import { estimateTokens } from '../domain/entities/Chunk.js';
import type {
  ChildMatch,
  Citation,
  ContextPiece,
  RetrievalResult,
} from '../domain/entities/RetrievalResult.js';
import { OrphanChildError } from '../domain/errors/DomainErrors.js';
import type { VectorIndex } from './VectorIndex.js';
import { Logger } from '../shared/Logger.js';

export interface RetrievalExpanderOptions {
  /** cosine similarity 低於此值的命中直接捨棄 */
  minScore: number;
}

interface ParentHit {
  parent: ParentChunk;
  bestScore: number;
  childIds: string[];
  pages: Set<number>;
  ocrProcessed: boolean;
}

/**
 * 子塊檢索 → 父塊擴展
 *
 * 以 child 做細粒度比對，再換回所屬 parent 的完整文字作為 context：
 * 1. top-k child（minScore 以下捨棄）
 * 2. 依 parent 去重，保留最佳分數與貢獻的 child
 * 3. 依最佳分數排序，整段放入 parent 直到下一段會超出 contextBudget
 *
 * parent 永不截斷；放不下的 parent（及其後所有）整段排除。
 */
export class RetrievalExpander {
  private readonly logger = new Logger('RetrievalExpander');

  constructor(
    private readonly index: VectorIndex,
    private readonly options: RetrievalExpanderOptions,
  ) {}

  async expand(
    query: string,
    k: number,
    contextBudget: number,
    collectionName: string,
  ): Promise<RetrievalResult> {
    const vector = await this.index.embedQuery(query, collectionName);

    return this.index.snapshot(collectionName, (view): RetrievalResult => {
      const matches: ChildMatch[] = view.search(vector, k)
        .filter((r) => r.score >= this.options.minScore)
        .sort((a, b) => b.score - a.score)
        .map((r) => ({
          childId: r.id,
          parentId: r.payload.parent_id,
          pageRange: { start: r.payload.page, end: r.payload.page_end },
          score: r.score,
          ocrProcessed: r.payload.ocr_processed,
        }));

      const base: Omit<RetrievalResult, 'status'> = {
        query,
        collectionName,
        matches,
        contexts: [],
        excludedParentIds: [],
        usedTokens: 0,
        contextBudget,
      };

      if (matches.length === 0) {
        this.logger.debug('No relevant content', { collectionName, k });
        return { ...base, status: 'no_relevant_content' };
      }

      const parentIds = [...new Set(matches.map((m) => m.parentId))];
      const parents = view.parents(parentIds);

      const hits = new Map<string, ParentHit>();
      for (const match of matches) {
        const parent = parents.get(match.parentId);
        if (!parent) throw new OrphanChildError(match.childId, match.parentId);

        const hit = hits.get(parent.id);
        if (hit) {
          hit.bestScore = Math.max(hit.bestScore, match.score);
          hit.childIds.push(match.childId);
          addPages(hit.pages, match.pageRange);
          hit.ocrProcessed ||= match.ocrProcessed;
        } else {
          hits.set(parent.id, {
            parent,
            bestScore: match.score,
            childIds: [match.childId],
            pages: addPages(new Set<number>(), match.pageRange),
            ocrProcessed: match.ocrProcessed,
          });
        }
      }

      const ranked = [...hits.values()].sort(
        (a, b) => b.bestScore - a.bestScore || a.parent.index - b.parent.index,
      );

      const contexts: ContextPiece[] = [];
      const excludedParentIds: string[] = [];
      let usedTokens = 0;

      for (const hit of ranked) {
        const tokens = estimateTokens(hit.parent.text);
        if (excludedParentIds.length > 0 || usedTokens + tokens > contextBudget) {
          excludedParentIds.push(hit.parent.id);
          continue;
        }
        usedTokens += tokens;
        contexts.push({
          parentId: hit.parent.id,
          text: hit.parent.text,
          tokens,
          citation: toCitation(hit),
        });
      }

      this.logger.debug('Expanded matches', {
        collectionName,
        matches: matches.length,
        parents: ranked.length,
        included: contexts.length,
        usedTokens,
      });

      return {
        ...base,
        status: contexts.length === 0 ? 'context_budget_exceeded' : 'ok',
        contexts,
        excludedParentIds,
        usedTokens,
      };
    });
  }
}

function toCitation(hit: ParentHit): Citation {
  return {
    parentId: hit.parent.id,
    pageRange: hit.parent.pageRange,
    matchedPages: [...hit.pages].sort((a, b) => a - b),
    ocrProcessed: hit.ocrProcessed,
    score: hit.bestScore,
    childIds: hit.childIds,
  };
}

function addPages(pages: Set<number>, range: PageRange): Set<number> {
  for (let page = range.start; page <= range.end; page++) pages.add(page);
  return pages;
}
