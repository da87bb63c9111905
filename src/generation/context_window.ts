/**
 * @fileoverview Context window assembly
 *
 * Passages enter in rank order and are numbered 1..n for citation. When the
 * estimated size exceeds the budget, whole passages are dropped from the
 * lowest-ranked end. The top-ranked passage is always kept whole, even when
 * it alone is over budget.
 */

import type { ContextPassage, RerankedCandidate } from '../types.js';
import { estimateTokenCount } from '../utils/text.js';

export interface ContextWindowOptions {
  generatorPassages: number;
  minRelevanceScore: number;
  maxContextTokens: number;
}

export interface ContextWindow {
  passages: ContextPassage[];
  estimatedTokens: number;
  /** Passages dropped for the token budget */
  droppedForBudget: number;
  /** Candidates below minRelevanceScore */
  belowThreshold: number;
}

export function formatPassage(passage: ContextPassage): string {
  const { chunk } = passage.candidate;
  return `[${passage.citationIndex}] ${chunk.filename} (page ${chunk.pageNumber})\n${chunk.text}`;
}

export function buildContextWindow(
  candidates: readonly RerankedCandidate[],
  options: ContextWindowOptions
): ContextWindow {
  const ranked = [...candidates].sort((a, b) => a.rank - b.rank);
  const eligible = ranked.filter((candidate) => candidate.relevanceScore >= options.minRelevanceScore);
  const selected = eligible.slice(0, options.generatorPassages);

  const passages: ContextPassage[] = [];
  let estimatedTokens = 0;
  for (const [index, candidate] of selected.entries()) {
    const passage: ContextPassage = { citationIndex: index + 1, candidate };
    const cost = estimateTokenCount(formatPassage(passage));
    if (passages.length > 0 && estimatedTokens + cost > options.maxContextTokens) {
      break;
    }
    passages.push(passage);
    estimatedTokens += cost;
  }

  return {
    passages,
    estimatedTokens,
    droppedForBudget: selected.length - passages.length,
    belowThreshold: ranked.length - eligible.length,
  };
}
