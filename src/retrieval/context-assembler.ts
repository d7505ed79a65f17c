/**
 * Prompt context assembly for answer generation.
 *
 * Renders recent conversation and the merged passages, best first, as one
 * text block within an approximate token budget. The last passage that does
 * not fit is truncated if enough budget remains, otherwise dropped.
 */

import type { MergedAnswerContext, MergedCandidate } from './types.js';
import type { ConversationTurn } from '../memory/conversation-memory.js';
import { approximateTokens } from '../utils/token-counter.js';

const SEPARATOR = '\n\n---\n\n';
const TRUNCATION_MARKER = '\n...[truncated]';

export interface AssembleOptions {
  /** Token budget for the whole text */
  maxTokens: number;
  /** Share of the budget history may use. Default: 0.25 */
  historyShare?: number;
  /** Smallest remaining budget worth a truncated passage. Default: 100 */
  minPartialTokens?: number;
}

export interface AssembledPassage {
  kbId: string;
  id: string;
  /** Normalized score as a whole percentage */
  relevance: number;
  preview: string;
  truncated: boolean;
}

export interface AssembledContext {
  text: string;
  tokenCount: number;
  passages: AssembledPassage[];
  /** Turns of history included */
  historyTurns: number;
  /** Passages available before the budget was applied */
  totalConsidered: number;
}

/**
 * Header line for a passage.
 */
export function formatPassageHeader(candidate: MergedCandidate): string {
  const source = candidate.document.metadata.sourceName ?? candidate.document.id;
  const relevance = Math.round(candidate.normalizedScore * 100);
  return `[KB: ${candidate.kbId} | Source: ${source} | Relevance: ${relevance}%]`;
}

function formatTurn(turn: ConversationTurn): string {
  return `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.text}`;
}

/**
 * Most recent turns that fit the history budget, in chronological order.
 */
function assembleHistory(history: readonly ConversationTurn[], budget: number): { text: string; turns: number } {
  const lines: string[] = [];
  for (let i = history.length - 1; i >= 0; i--) {
    const next = ['Conversation so far:', formatTurn(history[i]), ...lines].join('\n');
    if (approximateTokens(next) > budget) break;
    lines.unshift(formatTurn(history[i]));
  }
  if (lines.length === 0) return { text: '', turns: 0 };
  return { text: ['Conversation so far:', ...lines].join('\n'), turns: lines.length };
}

/**
 * First `end` UTF-16 units of `text`, one shorter when `end` would split a
 * surrogate pair.
 */
function cutAt(text: string, end: number): string {
  const code = text.charCodeAt(end - 1);
  const splitsPair = end > 0 && end < text.length && code >= 0xd800 && code <= 0xdbff;
  return text.slice(0, splitsPair ? end - 1 : end);
}

function preview(content: string): string {
  return cutAt(content, 100) + (content.length > 100 ? '...' : '');
}

/**
 * Longest prefix of `content` such that the text still fits `maxTokens`.
 */
function fitPrefix(content: string, render: (body: string) => string, maxTokens: number): string | null {
  let lo = 0;
  let hi = content.length;
  let best: string | null = null;
  while (lo <= hi) {
    const mid = Math.floor((lo + hi) / 2);
    const body = cutAt(content, mid) + TRUNCATION_MARKER;
    if (approximateTokens(render(body)) <= maxTokens) {
      best = body;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return best;
}

/**
 * Render history and passages within the token budget.
 */
export function assembleContext(
  context: Pick<MergedAnswerContext, 'candidates'>,
  history: readonly ConversationTurn[],
  options: AssembleOptions,
): AssembledContext {
  const { maxTokens, historyShare = 0.25, minPartialTokens = 100 } = options;

  const parts: string[] = [];
  const passages: AssembledPassage[] = [];

  const historySection = assembleHistory(history, Math.floor(maxTokens * historyShare));
  if (historySection.text) parts.push(historySection.text);

  for (const candidate of context.candidates) {
    const header = formatPassageHeader(candidate);
    const content = candidate.document.content;
    const render = (body: string): string => [...parts, `${header}\n${body}`].join(SEPARATOR);

    if (approximateTokens(render(content)) <= maxTokens) {
      parts.push(`${header}\n${content}`);
      passages.push({
        kbId: candidate.kbId,
        id: candidate.document.id,
        relevance: Math.round(candidate.normalizedScore * 100),
        preview: preview(content),
        truncated: false,
      });
      continue;
    }

    const remaining = maxTokens - approximateTokens(parts.join(SEPARATOR));
    if (remaining > minPartialTokens) {
      const body = fitPrefix(content, render, maxTokens);
      if (body !== null) {
        parts.push(`${header}\n${body}`);
        passages.push({
          kbId: candidate.kbId,
          id: candidate.document.id,
          relevance: Math.round(candidate.normalizedScore * 100),
          preview: preview(body),
          truncated: true,
        });
      }
    }
    break;
  }

  const text = parts.join(SEPARATOR);
  return {
    text,
    tokenCount: approximateTokens(text),
    passages,
    historyTurns: historySection.turns,
    totalConsidered: context.candidates.length,
  };
}
