/**
 * @fileoverview Grounded answer generation
 *
 * Builds the context window from reranked passages, asks the language model
 * for an answer with `[n]` citation markers and checks the markers against
 * the passages actually supplied. An empty window never reaches the model.
 */

import { GenerationFailure, isCancellation } from '../core/errors.js';
import type { LanguageModel } from '../providers/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { ConversationTurn, DraftAnswer, RerankedCandidate } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { isDecline, resolveCitations } from './citations.js';
import { buildContextWindow, type ContextWindow, type ContextWindowOptions } from './context_window.js';
import {
  GENERATION_SYSTEM_PROMPT,
  INSUFFICIENT_INFORMATION_ANSWER,
  buildAnswerPrompt,
  buildHistoryMessages,
} from './prompts.js';

export interface GeneratorOptions extends ContextWindowOptions {
  historyTurns: number;
  maxAnswerTokens: number;
  temperature: number;
}

export interface GenerationRequest {
  query: string;
  history: readonly ConversationTurn[];
  candidates: readonly RerankedCandidate[];
  /** Spans flagged by the validator on the previous draft */
  feedback?: readonly string[];
  /** 1-based number of this generator call within the answer */
  attempt: number;
  signal?: AbortSignal;
}

export class Generator {
  constructor(
    private readonly model: LanguageModel,
    private readonly options: GeneratorOptions
  ) {}

  buildWindow(candidates: readonly RerankedCandidate[]): ContextWindow {
    return buildContextWindow(candidates, this.options);
  }

  /**
   * @throws GenerationFailure when the model call fails
   */
  async generate(request: GenerationRequest): Promise<DraftAnswer> {
    const window = this.buildWindow(request.candidates);
    if (window.passages.length === 0) {
      return {
        text: INSUFFICIENT_INFORMATION_ANSWER,
        passages: [],
        citations: [],
        invalidCitations: [],
        attempt: request.attempt,
        declined: true,
      };
    }
    if (window.droppedForBudget > 0) {
      logDebug('Context window trimmed', {
        kept: window.passages.length,
        dropped: window.droppedForBudget,
        estimatedTokens: window.estimatedTokens,
      });
    }

    const messages = [
      ...buildHistoryMessages(request.history, this.options.historyTurns),
      { role: 'user' as const, content: buildAnswerPrompt(request.query, window.passages, request.feedback) },
    ];

    let text: string;
    try {
      const response = await this.model.complete({
        system: GENERATION_SYSTEM_PROMPT,
        messages,
        maxTokens: this.options.maxAnswerTokens,
        temperature: this.options.temperature,
        signal: request.signal,
      });
      if (response.stopReason === 'max_tokens') {
        logWarning('Answer truncated at the token limit', { attempt: request.attempt, model: response.model });
      }
      text = response.text;
    } catch (error) {
      if (isCancellation(error)) throw error;
      throw new GenerationFailure(request.attempt, getErrorMessage(error), toError(error));
    }

    const resolved = resolveCitations(text, window.passages);
    if (resolved.invalidCitations.length > 0) {
      logWarning('Answer cited passages that were not supplied', {
        attempt: request.attempt,
        invalid: resolved.invalidCitations,
      });
    }

    return {
      text: resolved.text,
      passages: window.passages,
      citations: resolved.citations,
      invalidCitations: resolved.invalidCitations,
      attempt: request.attempt,
      declined: isDecline(resolved.text, resolved.citations.length),
    };
  }
}
