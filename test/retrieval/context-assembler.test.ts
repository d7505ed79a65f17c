/**
 * Tests for prompt context assembly.
 */

import { describe, it, expect } from 'vitest';
import { assembleContext, formatPassageHeader } from '../../src/retrieval/context-assembler.js';
import type { MergedCandidate } from '../../src/retrieval/types.js';
import type { ConversationTurn } from '../../src/memory/conversation-memory.js';
import type { DocumentMetadata } from '../../src/storage/types.js';
import { approximateTokens } from '../../src/utils/token-counter.js';

function merged(
  kbId: string,
  id: string,
  content: string,
  normalizedScore: number,
  metadata: DocumentMetadata = {},
): MergedCandidate {
  return {
    document: { id, kbId, content, metadata },
    score: normalizedScore,
    origin: 'reranked',
    sources: ['vector'],
    kbId,
    normalizedScore,
    localScore: normalizedScore,
    localRank: 1,
  };
}

const history: ConversationTurn[] = [
  { role: 'user', text: 'What is the notice period?', timestamp: 1 },
  { role: 'assistant', text: 'Thirty days.', timestamp: 2 },
];

describe('context-assembler', () => {
  describe('formatPassageHeader', () => {
    it('names the knowledge base, source and relevance', () => {
      const candidate = merged('legal', 'd1', 'x', 0.456, { sourceName: 'Employment Act' });
      expect(formatPassageHeader(candidate)).toBe('[KB: legal | Source: Employment Act | Relevance: 46%]');
    });

    it('falls back to the document id without a source name', () => {
      expect(formatPassageHeader(merged('hr', 'h1', 'x', 1))).toBe('[KB: hr | Source: h1 | Relevance: 100%]');
    });
  });

  describe('assembleContext', () => {
    it('renders passages best first, separated', () => {
      const result = assembleContext(
        {
          candidates: [
            merged('legal', 'd1', 'Notice period is 30 days.', 1, { sourceName: 'Employment Act' }),
            merged('hr', 'h1', 'content of h1', 0.5),
          ],
        },
        [],
        { maxTokens: 1000 },
      );

      expect(result.text).toBe(
        '[KB: legal | Source: Employment Act | Relevance: 100%]\nNotice period is 30 days.' +
          '\n\n---\n\n' +
          '[KB: hr | Source: h1 | Relevance: 50%]\ncontent of h1',
      );
      expect(result.tokenCount).toBe(approximateTokens(result.text));
      expect(result.passages).toEqual([
        { kbId: 'legal', id: 'd1', relevance: 100, preview: 'Notice period is 30 days.', truncated: false },
        { kbId: 'hr', id: 'h1', relevance: 50, preview: 'content of h1', truncated: false },
      ]);
      expect(result.historyTurns).toBe(0);
      expect(result.totalConsidered).toBe(2);
    });

    it('puts conversation history first', () => {
      const result = assembleContext({ candidates: [merged('legal', 'd1', 'short', 1)] }, history, {
        maxTokens: 1000,
      });

      expect(result.text).toBe(
        'Conversation so far:\nUser: What is the notice period?\nAssistant: Thirty days.' +
          '\n\n---\n\n' +
          '[KB: legal | Source: d1 | Relevance: 100%]\nshort',
      );
      expect(result.historyTurns).toBe(2);
    });

    it('keeps only the most recent turns that fit the history share', () => {
      const result = assembleContext({ candidates: [merged('legal', 'd1', 'short', 1)] }, history, {
        maxTokens: 80,
      });

      expect(result.historyTurns).toBe(1);
      expect(result.text.startsWith('Conversation so far:\nAssistant: Thirty days.\n\n---\n\n')).toBe(true);
    });

    it('truncates a passage that does not fit when enough budget remains', () => {
      const result = assembleContext(
        { candidates: [merged('legal', 'd1', 'a'.repeat(2000), 1), merged('legal', 'd2', 'next', 0.5)] },
        [],
        { maxTokens: 200 },
      );

      expect(result.passages).toHaveLength(1);
      expect(result.passages[0].truncated).toBe(true);
      expect(result.passages[0].preview).toBe('a'.repeat(100) + '...');
      expect(result.text.endsWith('\n...[truncated]')).toBe(true);
      expect(result.tokenCount).toBeLessThanOrEqual(200);
      expect(result.totalConsidered).toBe(2);
    });

    it('never cuts a passage inside a surrogate pair', () => {
      const content = 'a' + '\u{1F600}'.repeat(1000);

      const result = assembleContext({ candidates: [merged('legal', 'd1', content, 1)] }, [], { maxTokens: 200 });

      expect(result.passages[0].truncated).toBe(true);
      expect(result.passages[0].preview).toBe('a' + '\u{1F600}'.repeat(49) + '...');
      expect(result.text).not.toMatch(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/);
      expect(result.tokenCount).toBeLessThanOrEqual(200);
    });

    it('drops a passage that does not fit when little budget remains', () => {
      const result = assembleContext(
        { candidates: [merged('legal', 'd1', 'x'.repeat(300), 1), merged('legal', 'd2', 'y'.repeat(2000), 0.5)] },
        [],
        { maxTokens: 150 },
      );

      expect(result.passages.map((p) => [p.id, p.truncated])).toEqual([['d1', false]]);
      expect(result.text).not.toContain('y');
    });

    it('returns empty text for no passages and no history', () => {
      expect(assembleContext({ candidates: [] }, [], { maxTokens: 100 })).toEqual({
        text: '',
        tokenCount: 0,
        passages: [],
        historyTurns: 0,
        totalConsidered: 0,
      });
    });
  });
});
