/**
 * Retrieval pipeline exports.
 */

// Types
export type {
  Candidate,
  DocumentLookup,
  KbOutcome,
  KbStatus,
  KbSummary,
  KeywordIndex,
  MergedAnswerContext,
  MergedCandidate,
  RetrievalResult,
  RetrieverKind,
  ScoreOrigin,
  VectorIndex,
} from './types.js';

// First-pass retrievers
export { VectorRetriever } from './vector-retriever.js';
export type { VectorRetrieveRequest } from './vector-retriever.js';
export { KeywordRetriever } from './keyword-retriever.js';
export type { KeywordRetrieveRequest } from './keyword-retriever.js';

// Fusion, reranking, merge
export { fuseScores, minMaxNormalize } from './score-fusion.js';
export type { FusionOptions } from './score-fusion.js';
export { rerankResult, validateRerankScores } from './reranking.js';
export type { RerankIntegrationOptions, RerankOutcome } from './reranking.js';
export { mergeKnowledgeBases } from './kb-merger.js';
export type { MergeOptions, MergeResult } from './kb-merger.js';

// Failure policy and events
export { callWithPolicy, isCriticalError, shouldRetry } from './failure-policy.js';
export { PipelineEvents, RequestEventLog } from './pipeline-events.js';
export type { PipelineEvent, PipelineEventKind, EventSeverity, EventRecorder } from './pipeline-events.js';

// Orchestrator
export { RetrievalOrchestrator } from './orchestrator.js';
export type { AnswerContextRequest, AnswerContextResponse, OrchestratorDependencies } from './orchestrator.js';
export { createOrchestrator, createEmbedderFromConfig, createRerankerFromConfig } from './create-orchestrator.js';
export type { CreateOrchestratorOptions } from './create-orchestrator.js';

// Prompt context
export { assembleContext, formatPassageHeader } from './context-assembler.js';
export type { AssembleOptions, AssembledContext, AssembledPassage } from './context-assembler.js';
