/**
 * Tests for the search CLI command handler.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/retrieval/create-orchestrator.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/retrieval/create-orchestrator.js')>();
  return { ...actual, createOrchestrator: vi.fn() };
});

import { searchCommand } from '../../../src/cli/commands/search.js';
import { createOrchestrator } from '../../../src/retrieval/create-orchestrator.js';
import { RetrievalOrchestrator } from '../../../src/retrieval/orchestrator.js';
import type { MergedAnswerContext } from '../../../src/retrieval/types.js';
import { FakeDocumentLookup, FakeEmbeddingClient, FakeKeywordIndex, FakeVectorIndex } from '../../retrieval/fakes.js';

const mockCreateOrchestrator = vi.mocked(createOrchestrator);

describe('searchCommand', () => {
  beforeEach(() => {
    mockCreateOrchestrator.mockImplementation(
      (config) =>
        new RetrievalOrchestrator({
          config,
          embedder: new FakeEmbeddingClient(),
          vectorIndex: new FakeVectorIndex({
            legal: [
              { id: 'd1', score: 0.9 },
              { id: 'd2', score: 0.1 },
            ],
          }),
          keywordIndex: new FakeKeywordIndex(),
          documents: new FakeDocumentLookup(),
        }),
    );
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requires a query and --kb', async () => {
    await expect(searchCommand.handler(['notice'])).rejects.toThrow('exit 2');

    expect(console.error).toHaveBeenCalledWith('Error: Query and --kb are required');
    expect(mockCreateOrchestrator).not.toHaveBeenCalled();
  });

  it('rejects a malformed --top-k', async () => {
    await expect(searchCommand.handler(['notice', '--kb', 'legal', '--top-k', '0'])).rejects.toThrow('exit 2');

    expect(console.error).toHaveBeenCalledWith('Error: --top-k must be a positive integer, got "0"');
  });

  it('prints the assembled context', async () => {
    await searchCommand.handler(['notice', 'period', '--kb', 'legal']);

    expect(console.log).toHaveBeenCalledWith(
      '[KB: legal | Source: d1 | Relevance: 100%]\ncontent of d1' +
        '\n\n---\n\n' +
        '[KB: legal | Source: d2 | Relevance: 0%]\ncontent of d2',
    );
  });

  it('prints the merged context as JSON', async () => {
    await searchCommand.handler(['notice', '--kb', 'legal', '--top-k', '1', '--json']);

    const printed = vi.mocked(console.log).mock.calls[0][0];
    const context: MergedAnswerContext = JSON.parse(String(printed));
    expect(context.query).toBe('notice');
    expect(context.topK).toBe(1);
    expect(context.candidates.map((c) => c.document.id)).toEqual(['d1']);
  });

  it('reports no results and exits with an error', async () => {
    await expect(searchCommand.handler(['notice', '--kb', 'finance'])).rejects.toThrow('exit 1');

    expect(String(vi.mocked(console.error).mock.calls[0][0])).toMatch(/^No results: /);
  });
});
