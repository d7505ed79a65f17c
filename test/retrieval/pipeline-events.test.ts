/**
 * Tests for degraded-mode event recording.
 */

import { describe, it, expect } from 'vitest';
import { PipelineEvents, severityOf } from '../../src/retrieval/pipeline-events.js';

describe('pipeline-events', () => {
  it('maps each kind to a severity', () => {
    expect(severityOf('rerank-fallback')).toBe('degraded');
    expect(severityOf('retrieval-partial')).toBe('degraded');
    expect(severityOf('kb-omitted')).toBe('omission');
    expect(severityOf('retry')).toBe('info');
    expect(severityOf('no-results')).toBe('error');
  });

  it('stamps recorded events with severity and time', () => {
    const events = new PipelineEvents({ now: () => 1234 });

    const event = events.record({ kind: 'kb-omitted', reason: 'INDEX_NOT_FOUND', kbId: 'legal', message: 'gone' });

    expect(event).toEqual({
      kind: 'kb-omitted',
      reason: 'INDEX_NOT_FOUND',
      kbId: 'legal',
      message: 'gone',
      severity: 'omission',
      timestamp: 1234,
    });
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('counts by kind and by reason', () => {
    const events = new PipelineEvents();
    events.record({ kind: 'rerank-fallback', reason: 'TIMEOUT', message: 'slow' });
    events.record({ kind: 'rerank-fallback', reason: 'TIMEOUT', message: 'slow' });
    events.record({ kind: 'rerank-fallback', reason: 'AUTH_FAILED', message: 'denied' });

    expect(events.count('rerank-fallback')).toBe(3);
    expect(events.count('rerank-fallback', 'TIMEOUT')).toBe(2);
    expect(events.count('kb-omitted')).toBe(0);
    expect(events.counts()).toEqual({ 'rerank-fallback:TIMEOUT': 2, 'rerank-fallback:AUTH_FAILED': 1 });
  });

  it('keeps a bounded list of recent events', () => {
    const events = new PipelineEvents({ maxRecent: 2 });
    events.record({ kind: 'retry', reason: 'r1', message: 'one' });
    events.record({ kind: 'retry', reason: 'r2', message: 'two' });
    events.record({ kind: 'retry', reason: 'r3', message: 'three' });

    expect(events.recent().map((e) => e.reason)).toEqual(['r2', 'r3']);
    expect(events.count('retry')).toBe(3);
  });

  it('resets counters and recent events', () => {
    const events = new PipelineEvents();
    events.record({ kind: 'retry', reason: 'TIMEOUT', message: 'again' });

    events.reset();

    expect(events.counts()).toEqual({});
    expect(events.recent()).toEqual([]);
  });

  it('keeps a per-request log alongside the shared counters', () => {
    const events = new PipelineEvents();
    const first = events.forRequest();
    const second = events.forRequest();

    first.record({ kind: 'retrieval-partial', reason: 'TIMEOUT', kbId: 'a', message: 'keyword timed out' });
    second.record({ kind: 'kb-omitted', reason: 'UNKNOWN', kbId: 'b', message: 'failed' });

    expect(first.events.map((e) => e.kind)).toEqual(['retrieval-partial']);
    expect(second.events.map((e) => e.kind)).toEqual(['kb-omitted']);
    expect(events.recent()).toHaveLength(2);
  });
});
