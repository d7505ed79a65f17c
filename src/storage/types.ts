/**
 * Types for the knowledge-base store.
 *
 * A knowledge base (KB) is an independently indexed corpus ("legal",
 * "business", "customer"). Documents are unique by id within their KB and
 * immutable once indexed; re-adding an id replaces the document.
 *
 * @module storage/types
 */

/**
 * Descriptive metadata carried with a document.
 */
export interface DocumentMetadata {
  /** Kind of source, e.g. 'faq', 'regulation', 'contract_template' */
  sourceType?: string;
  /** Human-readable source name */
  sourceName?: string;
  /** ISO timestamp of when the source was created */
  createdAt?: string;
  /** Any further string-valued fields from the import */
  [key: string]: string | undefined;
}

/**
 * An indexed document.
 */
export interface KbDocument {
  /** Identifier, unique within its knowledge base */
  id: string;
  /** Owning knowledge base */
  kbId: string;
  /** Text content */
  content: string;
  metadata: DocumentMetadata;
  /** Dense embedding, when one was indexed and requested */
  embedding?: number[];
}

/**
 * A document to be indexed.
 */
export interface NewDocument {
  id: string;
  content: string;
  metadata?: DocumentMetadata;
  embedding?: number[];
}

/**
 * A registered knowledge base.
 */
export interface KnowledgeBaseInfo {
  id: string;
  name: string;
  description: string | null;
  /** Dimensions of stored embeddings, null until the first vector */
  embeddingDims: number | null;
  /** Incremented on every write; lets caches detect changes */
  revision: number;
  createdAt: string;
}

/**
 * Raw (document id, score) pair returned by an index. Higher is better.
 */
export interface IndexHit {
  id: string;
  score: number;
}

/**
 * Per-KB health, as reported by `checkKnowledgeBases`.
 */
export interface KnowledgeBaseHealth {
  kbId: string;
  exists: boolean;
  documentCount: number;
  vectorCount: number;
}
