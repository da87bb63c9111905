/**
 * @fileoverview Prompt construction for grounded answers
 */

import type { ChatMessage } from '../providers/types.js';
import type { ContextPassage, ConversationTurn } from '../types.js';
import { formatPassage } from './context_window.js';

export const INSUFFICIENT_INFORMATION_ANSWER =
  'I cannot answer this question because the available documents do not contain enough information about it.';

export const SUPPRESSED_ANSWER =
  'I could not produce an answer that is fully supported by the available documents. ' +
  'Please rephrase the question or consult the source documents directly.';

export const GENERATION_SYSTEM_PROMPT = `You are a legal document assistant.

Your responsibilities:
1. Answer ONLY from the numbered sources provided with the question.
2. After every sentence that states a fact, cite its source as [n], or [n, m] for several sources.
3. Never cite a source number that was not provided.
4. If the sources do not answer the question, reply: "I cannot answer this question as it is not covered in the available documents."
5. Do not add knowledge, assumptions or hedged generalizations from outside the sources.
6. Use earlier turns of the conversation only to understand what the question refers to.

Be precise and keep a professional tone.`;

/**
 * Prior turns as alternating user/assistant messages, oldest first.
 */
export function buildHistoryMessages(turns: readonly ConversationTurn[], historyTurns: number): ChatMessage[] {
  if (historyTurns <= 0) return [];
  return turns.slice(-historyTurns).flatMap((turn): ChatMessage[] => [
    { role: 'user', content: turn.query },
    { role: 'assistant', content: turn.answer },
  ]);
}

export function buildFeedbackSection(flaggedSpans: readonly string[]): string {
  if (flaggedSpans.length === 0) return '';
  const items = flaggedSpans.map((span) => `- ${span}`).join('\n');
  return [
    'A previous draft made these statements without support in the sources:',
    items,
    'Either support each of them with a citation to a source that states it, or leave it out.',
  ].join('\n');
}

export function buildAnswerPrompt(
  question: string,
  passages: readonly ContextPassage[],
  flaggedSpans: readonly string[] = []
): string {
  const sources = passages.map(formatPassage).join('\n\n');
  const sections = [
    `Sources:\n\n${sources}`,
    `Question: ${question}`,
  ];
  const feedback = buildFeedbackSection(flaggedSpans);
  if (feedback) sections.push(feedback);
  sections.push('Answer using only the sources above, with a citation after each factual sentence.');
  return sections.join('\n\n');
}
