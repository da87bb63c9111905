/**
 * @fileoverview Follow-up contextualization
 *
 * Short follow-ups such as "tell me more about it" retrieve nothing useful on
 * their own. When a question is short and leans on the conversation
 * (pronouns, "what about", "elaborate"), the language model rewrites it as a
 * standalone search query. The rewrite only feeds retrieval; generation still
 * answers the user's own words.
 */

import type { ConversationTurn } from '../types.js';
import type { LanguageModel } from '../providers/types.js';
import { isCancellation } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { normalizeText } from '../utils/text.js';

export const VAGUE_INDICATORS: readonly string[] = [
  'it',
  'this',
  'that',
  'these',
  'those',
  'them',
  'the first',
  'the second',
  'the last',
  'the previous',
  'more',
  'details',
  'elaborate',
  'explain',
  'tell me more',
  'what about',
  'how about',
  'and',
  'also',
];

export type RewriteReason = 'no_history' | 'detailed' | 'not_vague' | 'rewritten' | 'fallback';

export interface RewriteResult {
  query: string;
  rewritten: boolean;
  reason: RewriteReason;
}

export interface FollowUpRewriterOptions {
  /** Questions longer than this are taken as standalone */
  maxFollowUpWords?: number;
  /** Turns of history shown to the model */
  contextTurns?: number;
}

const SYSTEM_PROMPT = 'You rewrite follow-up questions into standalone search queries for a legal document database.';

function countWords(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

export function isVagueFollowUp(question: string): boolean {
  const padded = ` ${normalizeText(question)} `;
  return VAGUE_INDICATORS.some((indicator) => padded.includes(` ${indicator} `));
}

function stripQuotes(text: string): string {
  return text.trim().replace(/^["'“‘]+|["'”’]+$/g, '').trim();
}

export class FollowUpRewriter {
  private readonly maxFollowUpWords: number;
  private readonly contextTurns: number;

  constructor(
    private readonly model: LanguageModel,
    options: FollowUpRewriterOptions = {}
  ) {
    this.maxFollowUpWords = options.maxFollowUpWords ?? 8;
    this.contextTurns = options.contextTurns ?? 2;
  }

  /** Previous user question joined with the current one. */
  fallback(question: string, turns: readonly ConversationTurn[]): RewriteResult {
    const previous = turns.length > 0 ? turns[turns.length - 1].query : undefined;
    if (!previous) {
      return { query: question, rewritten: false, reason: 'no_history' };
    }
    return { query: `${previous} ${question}`, rewritten: true, reason: 'fallback' };
  }

  async rewrite(
    question: string,
    turns: readonly ConversationTurn[],
    signal?: AbortSignal
  ): Promise<RewriteResult> {
    if (turns.length === 0) {
      return { query: question, rewritten: false, reason: 'no_history' };
    }
    if (countWords(question) > this.maxFollowUpWords) {
      return { query: question, rewritten: false, reason: 'detailed' };
    }
    if (!isVagueFollowUp(question)) {
      return { query: question, rewritten: false, reason: 'not_vague' };
    }

    const recent = turns.slice(-this.contextTurns);
    const transcript = recent
      .map((turn) => `USER: ${turn.query}\nASSISTANT: ${turn.answer}`)
      .join('\n');
    const prompt = [
      'Given this conversation:',
      '',
      transcript,
      '',
      `The user's latest question is: "${question}"`,
      '',
      'Rewrite it as one clear, self-contained question naming the specific topic from the conversation.',
      'Reply with the rewritten question only.',
    ].join('\n');

    try {
      const response = await this.model.complete({
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }],
        maxTokens: 150,
        temperature: 0.3,
        signal,
      });
      const rewritten = stripQuotes(response.text);
      if (!rewritten) {
        return this.fallback(question, turns);
      }
      logDebug('Follow-up rewritten', { from: question, to: rewritten });
      return { query: rewritten, rewritten: true, reason: 'rewritten' };
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) throw error;
      logWarning('Follow-up rewrite failed; combining with previous question', { error: getErrorMessage(error) });
      return this.fallback(question, turns);
    }
  }
}
