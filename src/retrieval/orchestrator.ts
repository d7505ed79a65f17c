/**
 * Retrieval orchestrator: one question in, one context bundle out.
 *
 * Pipeline per question:
 *   read history → embed once → [vector ‖ keyword] per KB → fuse per KB
 *   → rerank per KB → merge across KBs → append user turn
 *
 * Each fan-out ends at a `Promise.allSettled` barrier, so a slow or failing KB
 * never hides the others and the final order never depends on which call
 * finished first. Every external call runs under the failure policy and is
 * bounded by the request's end-to-end deadline.
 */

import type {
  DocumentLookup,
  EmbeddingClient,
  KbOutcome,
  KbSummary,
  KeywordIndex,
  MergedAnswerContext,
  RerankerClient,
  RetrievalResult,
  VectorIndex,
} from './types.js';
import { VectorRetriever } from './vector-retriever.js';
import { KeywordRetriever } from './keyword-retriever.js';
import { fuseScores, validateFusionWeight } from './score-fusion.js';
import { rerankResult } from './reranking.js';
import { mergeKnowledgeBases, type MergeResult } from './kb-merger.js';
import { callWithPolicy } from './failure-policy.js';
import { PipelineEvents, type EventRecorder } from './pipeline-events.js';
import { ConversationMemory, type ConversationTurn } from '../memory/conversation-memory.js';
import { DEFAULT_CONFIG, type RetrievalConfig } from '../config/retrieval-config.js';
import { Deadline, abortReason } from '../utils/async-utils.js';
import { NoResultsError, ValidationError, errorCode, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('orchestrator');

export interface OrchestratorDependencies {
  embedder: EmbeddingClient;
  vectorIndex: VectorIndex;
  keywordIndex: KeywordIndex;
  documents: DocumentLookup;
  /** Absent: reranking is skipped */
  reranker?: RerankerClient;
  memory?: ConversationMemory;
  events?: PipelineEvents;
  config?: RetrievalConfig;
}

export interface AnswerContextRequest {
  query: string;
  kbIds: readonly string[];
  sessionId: string;
  /** Defaults to the configured top-K */
  topK?: number;
  signal?: AbortSignal;
}

export interface AnswerContextResponse {
  context: MergedAnswerContext;
  /** Conversation before this question */
  history: ConversationTurn[];
}

type KbFusion =
  | { status: 'fused'; result: RetrievalResult; partial: boolean }
  | { status: 'failed'; error: unknown };

export class RetrievalOrchestrator {
  readonly config: RetrievalConfig;
  readonly memory: ConversationMemory;
  readonly events: PipelineEvents;
  private readonly vectorRetriever: VectorRetriever;
  private readonly keywordRetriever: KeywordRetriever;
  private readonly reranker?: RerankerClient;

  constructor(deps: OrchestratorDependencies) {
    this.config = deps.config ?? DEFAULT_CONFIG;
    validateFusionWeight(this.config.fusionWeight);
    this.memory = deps.memory ?? new ConversationMemory(this.config.memory);
    this.events = deps.events ?? new PipelineEvents();
    this.vectorRetriever = new VectorRetriever(deps.embedder, deps.vectorIndex, deps.documents);
    this.keywordRetriever = new KeywordRetriever(deps.keywordIndex, deps.documents);
    this.reranker = this.config.rerank.enabled ? deps.reranker : undefined;
  }

  /**
   * Retrieve, fuse, rerank and merge context for one question, and record the
   * question in the session's history.
   *
   * @throws ValidationError for an empty query, empty KB selection or top-K < 1
   * @throws NoResultsError when no KB contributes a candidate (the user turn
   *   is still recorded)
   * @throws CancelledError when the caller aborts (history is left untouched)
   */
  async answerContext(request: AnswerContextRequest): Promise<AnswerContextResponse> {
    const { query, sessionId, signal } = request;
    const topK = request.topK ?? this.config.topK;
    const kbIds = validateRequest(query, request.kbIds, topK);
    if (signal?.aborted) throw abortReason(signal);

    const start = Date.now();
    const deadline = new Deadline(this.config.timeouts.deadlineMs, signal);
    const requestEvents = this.events.forRequest();

    try {
      const history = await this.memory.read(sessionId);
      this.throwIfCancelled(deadline);

      const fused = await this.retrieveAndFuse(query, kbIds, deadline, requestEvents);

      const outcomes: KbOutcome[] = [];
      const fallbacks = new Set<string>();
      const reranked = await Promise.all(
        kbIds.map(async (kbId) => {
          const kb = fused.get(kbId);
          if (kb?.status !== 'fused') return undefined;
          const outcome = await rerankResult(query, kb.result, {
            topN: this.config.rerank.topN,
            client: this.reranker,
            timeoutMs: this.config.timeouts.rerankMs,
            deadline,
            events: requestEvents,
          });
          if (outcome.fallback) fallbacks.add(kbId);
          return outcome.result;
        }),
      );
      this.throwIfCancelled(deadline);

      kbIds.forEach((kbId, i) => {
        const result = reranked[i];
        const kb = fused.get(kbId);
        if (result) {
          outcomes.push({ status: 'ok', result });
        } else if (kb?.status === 'failed') {
          outcomes.push({ status: 'failed', kbId, error: kb.error });
        }
      });

      let merged: MergeResult;
      try {
        merged = mergeKnowledgeBases(outcomes, { topK });
      } catch (error) {
        if (error instanceof NoResultsError) {
          requestEvents.record({
            kind: 'no-results',
            reason: error.omissions.length > 0 ? 'ALL_KBS_FAILED' : 'NO_MATCHES',
            message: `No results for query across ${kbIds.length} knowledge base(s)`,
          });
          await this.memory.append(sessionId, { role: 'user', text: query });
        }
        throw error;
      }

      const knowledgeBases: KbSummary[] = merged.knowledgeBases.map((summary) => {
        const kb = fused.get(summary.kbId);
        return {
          ...summary,
          rerankFallback: fallbacks.has(summary.kbId),
          partial: kb?.status === 'fused' && kb.partial,
        };
      });

      await this.memory.append(sessionId, { role: 'user', text: query });

      const context: MergedAnswerContext = {
        query,
        candidates: merged.candidates,
        topK,
        omissions: merged.omissions,
        degradations: requestEvents.events.filter((e) => e.severity !== 'info'),
        knowledgeBases,
        durationMs: Date.now() - start,
      };
      log.debug('Answer context ready', {
        sessionId,
        kbs: kbIds.length,
        candidates: context.candidates.length,
        omissions: context.omissions.length,
        durationMs: context.durationMs,
      });
      return { context, history };
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Record the generated answer as the session's assistant turn.
   */
  async recordAnswer(sessionId: string, text: string): Promise<ConversationTurn> {
    return this.memory.append(sessionId, { role: 'assistant', text });
  }

  /**
   * Forget a session's history. Idempotent; unknown ids are a no-op.
   */
  async clearSession(sessionId: string): Promise<void> {
    if (!sessionId.trim()) return;
    await this.memory.clear(sessionId);
  }

  async getHistory(sessionId: string): Promise<ConversationTurn[]> {
    return this.memory.read(sessionId);
  }

  /**
   * Fan out first-pass retrieval and fuse per KB. Returns, per KB, either the
   * fused result or the error that took out both retrievers.
   */
  private async retrieveAndFuse(
    query: string,
    kbIds: readonly string[],
    deadline: Deadline,
    events: EventRecorder,
  ): Promise<Map<string, KbFusion>> {
    const { timeouts, failurePolicy: policy } = this.config;

    const embedding = callWithPolicy(
      'embed query',
      (signal) => this.vectorRetriever.embedQuery(query, signal),
      { policy, deadline, timeoutMs: timeouts.embeddingMs, events },
    );

    const settled = await Promise.all(
      kbIds.map((kbId) =>
        Promise.allSettled([
          embedding.then((vector) =>
            callWithPolicy(
              `vector search ${kbId}`,
              (signal) =>
                this.vectorRetriever.retrieve({
                  kbId,
                  query,
                  embedding: vector,
                  limit: this.config.vectorSearchLimit,
                  signal,
                }),
              { policy, deadline, timeoutMs: timeouts.vectorSearchMs, events, kbId },
            ),
          ),
          callWithPolicy(
            `keyword search ${kbId}`,
            (signal) =>
              this.keywordRetriever.retrieve({
                kbId,
                query,
                limit: this.config.keywordSearchLimit,
                signal,
              }),
            { policy, deadline, timeoutMs: timeouts.keywordSearchMs, events, kbId },
          ),
        ]),
      ),
    );

    // A cancelled request reports nothing about the KBs it abandoned
    this.throwIfCancelled(deadline);

    const fused = new Map<string, KbFusion>();
    kbIds.forEach((kbId, i) => {
      const [vector, keyword] = settled[i];

      if (vector.status === 'rejected' && keyword.status === 'rejected') {
        events.record({
          kind: 'kb-omitted',
          reason: errorCode(vector.reason),
          kbId,
          message: `Knowledge base "${kbId}" omitted: ${errorMessage(vector.reason)}`,
        });
        fused.set(kbId, { status: 'failed', error: vector.reason });
        return;
      }

      const failed = vector.status === 'rejected' ? vector : keyword.status === 'rejected' ? keyword : undefined;
      if (failed) {
        events.record({
          kind: 'retrieval-partial',
          reason: errorCode(failed.reason),
          kbId,
          message: `${failed === vector ? 'Vector' : 'Keyword'} retrieval failed for "${kbId}": ${errorMessage(failed.reason)}`,
        });
      }

      const vectorResult = vector.status === 'fulfilled' ? vector.value : undefined;
      const keywordResult = keyword.status === 'fulfilled' ? keyword.value : undefined;
      const candidates = fuseScores(vectorResult?.candidates ?? [], keywordResult?.candidates ?? [], {
        weight: this.config.fusionWeight,
        limit: this.config.fusionLimit,
      });

      fused.set(kbId, {
        status: 'fused',
        result: {
          kbId,
          origin: 'fused',
          candidates,
          durationMs: Math.max(vectorResult?.durationMs ?? 0, keywordResult?.durationMs ?? 0),
        },
        partial: failed !== undefined,
      });
    });

    return fused;
  }

  private throwIfCancelled(deadline: Deadline): void {
    if (deadline.cancelledByCaller) throw abortReason(deadline.signal);
  }
}

/**
 * Check a request and return its KB ids with duplicates removed, in order.
 */
function validateRequest(query: string, kbIds: readonly string[], topK: number): string[] {
  if (typeof query !== 'string' || !query.trim()) {
    throw new ValidationError('Query must not be empty', 'INVALID_QUERY');
  }
  const unique = [...new Set(kbIds.map((id) => id.trim()))];
  if (unique.length === 0 || unique.some((id) => id === '')) {
    throw new ValidationError('Select at least one knowledge base', 'INVALID_KB_SELECTION');
  }
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError(`topK must be a positive integer, got ${topK}`, 'INVALID_TOP_K');
  }
  return unique;
}
