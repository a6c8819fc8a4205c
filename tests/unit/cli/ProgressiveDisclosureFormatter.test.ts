import { describe, it, expect } from 'vitest';
import {
  ProgressiveDisclosureFormatter,
  formatCitation,
  formatPages,
} from '../../../src/cli/formatters/ProgressiveDisclosureFormatter.js';
import type { Citation, RetrievalResult } from '../../../src/domain/entities/RetrievalResult.js';
import type { AskOutcome } from '../../../src/application/dto/AskOutcome.js';

const citation: Citation = {
  parentId: 'abcdef012345-p0002',
  pageRange: { start: 2, end: 3 },
  matchedPages: [3],
  ocrProcessed: true,
  score: 0.81234,
  childIds: ['abcdef012345-p0002-c004'],
};

const retrieval: RetrievalResult = {
  query: 'stairwell colour',
  collectionName: 'docs',
  status: 'ok',
  matches: [],
  contexts: [{ parentId: citation.parentId, text: 'The stairwell was painted\ncobalt blue.', tokens: 10, citation }],
  excludedParentIds: ['abcdef012345-p0005'],
  usedTokens: 10,
  contextBudget: 3000,
};

const answered: AskOutcome = {
  status: 'answered',
  answer: 'Cobalt blue.',
  citations: [citation],
  retrieval,
};

describe('formatPages / formatCitation', () => {
  it('should label one or several pages', () => {
    expect(formatPages([4])).toBe('Page 4');
    expect(formatPages([4, 6])).toBe('Pages 4, 6');
    expect(formatPages([])).toBe('Page ?');
  });

  it('should name the parent and mark OCR pages', () => {
    expect(formatCitation(citation)).toBe('Child Chunk (Parent ID: abcdef012345-p0002) - Page 3 [OCR]');
    expect(formatCitation({ ...citation, ocrProcessed: false })).toBe(
      'Child Chunk (Parent ID: abcdef012345-p0002) - Page 3',
    );
  });
});

describe('ProgressiveDisclosureFormatter', () => {
  const formatter = new ProgressiveDisclosureFormatter();

  it('should print only the answer and sources at brief level', () => {
    expect(formatter.formatAnswer(answered, 'text', 'brief')).toBe(
      'Cobalt blue.\n\nSources:\n  - Child Chunk (Parent ID: abcdef012345-p0002) - Page 3 [OCR]',
    );
  });

  it('should add context snippets at normal level', () => {
    const text = formatter.formatAnswer(answered, 'text', 'normal');

    expect(text).toContain(
      '[1] Child Chunk (Parent ID: abcdef012345-p0002) - Page 3 [OCR] (pp.2-3, score: 0.8123, 10 tokens)\n'
      + '    The stairwell was painted cobalt blue.',
    );
    expect(text.endsWith('Context: 10/3000 tokens, 1 parent(s) excluded')).toBe(true);
  });

  it('should keep the full parent text at full level', () => {
    const text = formatter.formatRetrieval(retrieval, 'text', 'full');

    expect(text).toContain('    The stairwell was painted\n    cobalt blue.');
  });

  it('should warn before a degraded answer', () => {
    const degraded: AskOutcome = {
      ...answered,
      status: 'degraded',
      answer: 'An answer could not be generated.',
      degradation: { code: 'ANSWER_TIMEOUT', message: 'Answer generation exceeded 30000ms' },
    };

    const text = formatter.formatAnswer(degraded, 'text', 'brief');

    expect(text.split('\n')[0]).toBe('Warning: Answer generation exceeded 30000ms');
  });

  it('should explain empty outcomes', () => {
    const empty: AskOutcome = {
      status: 'no_relevant_content',
      answer: null,
      citations: [],
      retrieval: { ...retrieval, status: 'no_relevant_content', contexts: [] },
    };

    expect(formatter.formatAnswer(empty, 'text')).toBe('No relevant content found in the document.');
  });

  it('should drop the retrieval details from brief JSON', () => {
    const json: unknown = JSON.parse(formatter.formatAnswer(answered, 'json', 'brief'));

    expect(json).toEqual({ status: 'answered', answer: 'Cobalt blue.', citations: [citation] });
  });

  it('should include snippets in normal JSON retrieval output', () => {
    const json: unknown = JSON.parse(formatter.formatRetrieval(retrieval, 'json', 'normal'));

    expect(json).toEqual({
      status: 'ok',
      usedTokens: 10,
      contextBudget: 3000,
      excludedParentIds: ['abcdef012345-p0005'],
      contexts: [{
        parentId: 'abcdef012345-p0002',
        tokens: 10,
        citation,
        snippet: 'The stairwell was painted\ncobalt blue.',
      }],
    });
  });

  it('should flatten objects to indented text', () => {
    expect(formatter.formatObject({ name: 'docs', counts: { parents: 2 } }, 'text')).toBe(
      'name: docs\ncounts:\n  parents: 2',
    );
  });
});
