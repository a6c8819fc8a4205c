import type { Citation, RetrievalResult } from '../../domain/entities/RetrievalResult.js';
import type { AskOutcome } from '../../application/dto/AskOutcome.js';

export type OutputFormat = 'json' | 'text';
export type DetailLevel = 'brief' | 'normal' | 'full';

const SNIPPET_CHARS = 200;

/** "Page 3" 或 "Pages 3, 5" */
export function formatPages(pages: number[]): string {
  if (pages.length === 0) return 'Page ?';
  if (pages.length === 1) return `Page ${pages[0]}`;
  return `Pages ${pages.join(', ')}`;
}

/** 引用標頭：Child Chunk (Parent ID: x) - Page n */
export function formatCitation(citation: Citation): string {
  const ocr = citation.ocrProcessed ? ' [OCR]' : '';
  return `Child Chunk (Parent ID: ${citation.parentId}) - ${formatPages(citation.matchedPages)}${ocr}`;
}

/**
 * 漸進式揭露格式化器：根據 level 控制輸出細節
 *
 * - brief：答案 + 引用標頭
 * - normal：再加上每段 context 的開頭片段與分數（預設）
 * - full：含完整 parent 文字
 */
export class ProgressiveDisclosureFormatter {
  formatAnswer(outcome: AskOutcome, format: OutputFormat, level: DetailLevel = 'normal'): string {
    if (format === 'json') {
      return JSON.stringify(this.shapeOutcome(outcome, level), null, 2);
    }

    const lines: string[] = [];
    switch (outcome.status) {
      case 'no_relevant_content':
        return 'No relevant content found in the document.';
      case 'context_budget_exceeded':
        return 'Relevant passages were found but none fit within the context budget.';
      case 'degraded':
        lines.push(`Warning: ${outcome.degradation?.message ?? 'answer generation unavailable'}`);
        break;
      case 'answered':
        break;
    }

    if (outcome.answer) lines.push(outcome.answer);
    if (outcome.citations.length > 0) {
      lines.push('', 'Sources:');
      for (const citation of outcome.citations) {
        lines.push(`  - ${formatCitation(citation)}`);
      }
    }

    if (level !== 'brief') {
      lines.push('', this.textContexts(outcome.retrieval, level));
    }
    return lines.join('\n');
  }

  formatRetrieval(result: RetrievalResult, format: OutputFormat, level: DetailLevel = 'normal'): string {
    if (format === 'json') {
      return JSON.stringify(this.shapeRetrieval(result, level), null, 2);
    }
    if (result.status === 'no_relevant_content') return 'No relevant content found in the document.';
    return this.textContexts(result, level);
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  private shapeOutcome(outcome: AskOutcome, level: DetailLevel): unknown {
    return {
      status: outcome.status,
      answer: outcome.answer,
      citations: outcome.citations,
      ...(outcome.degradation ? { degradation: outcome.degradation } : {}),
      ...(level === 'brief' ? {} : { retrieval: this.shapeRetrieval(outcome.retrieval, level) }),
    };
  }

  /** 根據 level 篩選欄位 */
  private shapeRetrieval(result: RetrievalResult, level: DetailLevel): unknown {
    if (level === 'full') return result;
    return {
      status: result.status,
      usedTokens: result.usedTokens,
      contextBudget: result.contextBudget,
      excludedParentIds: result.excludedParentIds,
      contexts: result.contexts.map((c) => ({
        parentId: c.parentId,
        tokens: c.tokens,
        citation: c.citation,
        ...(level === 'normal' ? { snippet: c.text.slice(0, SNIPPET_CHARS) } : {}),
      })),
    };
  }

  /** 人類可讀的 context 列表 */
  private textContexts(result: RetrievalResult, level: DetailLevel): string {
    if (result.contexts.length === 0) {
      return `No context fits the budget of ${result.contextBudget} tokens.`;
    }

    const blocks = result.contexts.map((c, i) => {
      const { start, end } = c.citation.pageRange;
      const range = start === end ? `p.${start}` : `pp.${start}-${end}`;
      const header = `[${i + 1}] ${formatCitation(c.citation)} (${range}, score: ${c.citation.score.toFixed(4)}, ${c.tokens} tokens)`;
      if (level === 'brief') return header;

      const body = level === 'full' ? c.text : c.text.slice(0, SNIPPET_CHARS).replace(/\s+/g, ' ');
      return `${header}\n${body.split('\n').map((l) => `    ${l}`).join('\n')}`;
    });

    const footer = `Context: ${result.usedTokens}/${result.contextBudget} tokens`
      + (result.excludedParentIds.length > 0 ? `, ${result.excludedParentIds.length} parent(s) excluded` : '');
    return [...blocks, footer].join('\n\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
