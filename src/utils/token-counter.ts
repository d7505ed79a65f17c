/**
 * Approximate token counting for prompt budgets.
 *
 * Latin text averages ~3.5 characters per token; CJK ideographs are close to
 * one token each. Biased slightly high so assembled prompts stay under budget.
 */

import { countCjk } from './text-utils.js';

const CHARS_PER_TOKEN = 3.5;

/**
 * Approximate token count for a string.
 */
export function approximateTokens(text: string): number {
  if (!text) return 0;
  const cjk = countCjk(text);
  return cjk + Math.ceil((text.length - cjk) / CHARS_PER_TOKEN);
}
