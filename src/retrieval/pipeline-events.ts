/**
 * Side channel for degraded-mode and failure events in the retrieval pipeline.
 *
 * Stages never swallow a failure silently: each fallback, partial retrieval,
 * omitted KB, retry or empty answer is recorded here. `PipelineEvents` keeps
 * process-wide counts keyed by kind and reason plus a bounded list of recent
 * events; `forRequest()` gives one request its own log of what happened to it,
 * which ends up in `MergedAnswerContext.degradations`.
 */

import { createLogger } from '../utils/logger.js';

const log = createLogger('pipeline-events');

export type PipelineEventKind = 'rerank-fallback' | 'retrieval-partial' | 'kb-omitted' | 'retry' | 'no-results';

/**
 * `degraded`: the answer is still served, built from less.
 * `omission`: a KB contributed nothing.
 * `error`: the request fails.
 */
export type EventSeverity = 'info' | 'degraded' | 'omission' | 'error';

const SEVERITY: Record<PipelineEventKind, EventSeverity> = {
  'rerank-fallback': 'degraded',
  'retrieval-partial': 'degraded',
  'kb-omitted': 'omission',
  retry: 'info',
  'no-results': 'error',
};

export interface PipelineEventInput {
  kind: PipelineEventKind;
  /** Error code or short machine-readable cause */
  reason: string;
  kbId?: string;
  message: string;
}

export interface PipelineEvent extends PipelineEventInput {
  severity: EventSeverity;
  timestamp: number;
}

/** Anything stages can record events into. */
export interface EventRecorder {
  record(input: PipelineEventInput): PipelineEvent;
}

export interface PipelineEventsOptions {
  /** Recent events kept in memory. Default: 100 */
  maxRecent?: number;
  now?: () => number;
}

export function severityOf(kind: PipelineEventKind): EventSeverity {
  return SEVERITY[kind];
}

export class PipelineEvents implements EventRecorder {
  private readonly counters = new Map<string, number>();
  private readonly recentEvents: PipelineEvent[] = [];
  private readonly maxRecent: number;
  private readonly now: () => number;

  constructor(options: PipelineEventsOptions = {}) {
    this.maxRecent = options.maxRecent ?? 100;
    this.now = options.now ?? Date.now;
  }

  record(input: PipelineEventInput): PipelineEvent {
    const event: PipelineEvent = Object.freeze({
      ...input,
      severity: severityOf(input.kind),
      timestamp: this.now(),
    });

    const key = `${event.kind}:${event.reason}`;
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);

    this.recentEvents.push(event);
    if (this.recentEvents.length > this.maxRecent) {
      this.recentEvents.shift();
    }

    const data = { kind: event.kind, reason: event.reason, kbId: event.kbId, severity: event.severity };
    if (event.severity === 'info') {
      log.info(event.message, data);
    } else {
      log.warn(event.message, data);
    }
    return event;
  }

  /**
   * Events recorded so far for a kind, optionally narrowed to one reason.
   */
  count(kind: PipelineEventKind, reason?: string): number {
    if (reason !== undefined) {
      return this.counters.get(`${kind}:${reason}`) ?? 0;
    }
    let total = 0;
    for (const [key, value] of this.counters) {
      if (key.startsWith(`${kind}:`)) total += value;
    }
    return total;
  }

  /** Counter snapshot keyed by `kind:reason`. */
  counts(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }

  /** Most recent events, oldest first. */
  recent(): PipelineEvent[] {
    return [...this.recentEvents];
  }

  reset(): void {
    this.counters.clear();
    this.recentEvents.length = 0;
  }

  /**
   * A recorder for one request: events go to this instance and are also
   * kept in the returned log's `events`.
   */
  forRequest(): RequestEventLog {
    return new RequestEventLog(this);
  }
}

export class RequestEventLog implements EventRecorder {
  readonly events: PipelineEvent[] = [];

  constructor(private readonly parent: EventRecorder) {}

  record(input: PipelineEventInput): PipelineEvent {
    const event = this.parent.record(input);
    this.events.push(event);
    return event;
  }
}
