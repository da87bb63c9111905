import { describe, it, expect } from 'vitest';
import { ProviderError } from '../../core/errors.js';
import { ScriptedLanguageModel } from '../../__tests__/helpers/fakes.js';
import { smallGraph } from '../../knowledge/__tests__/fixtures.js';
import { LexiconEntityExtractor } from '../lexicon_entity_extractor.js';
import { LlmCrossEncoder, formatScoringRequest } from '../llm_cross_encoder.js';
import { LlmEntityExtractor } from '../llm_entity_extractor.js';
import { toProviderError } from '../provider_errors.js';

describe('LexiconEntityExtractor', () => {
  it('finds concepts and aliases in order of appearance', async () => {
    const extractor = new LexiconEntityExtractor(smallGraph());
    await expect(extractor.extract('Does the Constitution guarantee due process of law?')).resolves.toEqual([
      { text: 'Constitution', type: 'statute' },
      { text: 'Due Process', type: 'concept' },
    ]);
  });

  it('matches whole phrases only', async () => {
    const extractor = new LexiconEntityExtractor(smallGraph());
    await expect(extractor.extract('constitutionality of fair hearings')).resolves.toEqual([]);
  });
});

describe('LlmEntityExtractor', () => {
  it('parses, dedupes and coerces unknown types to other', async () => {
    const model = new ScriptedLanguageModel([
      '```json\n{"entities": [{"text": "Article 21", "type": "article"}, {"text": "article 21", "type": "article"}, {"text": "Maneka Gandhi", "type": "litigant"}]}\n```',
    ]);
    const extractor = new LlmEntityExtractor(model);
    await expect(extractor.extract('What did Maneka Gandhi decide about Article 21?')).resolves.toEqual([
      { text: 'Article 21', type: 'article' },
      { text: 'Maneka Gandhi', type: 'other' },
    ]);
    expect(extractor.name).toBe('llm:fake-llm');
    expect(model.requests[0]?.temperature).toBe(0);
  });

  it('caps the number of entities', async () => {
    const model = new ScriptedLanguageModel([
      '{"entities": [{"text": "a", "type": "concept"}, {"text": "b", "type": "concept"}, {"text": "c", "type": "concept"}]}',
    ]);
    await expect(new LlmEntityExtractor(model, 2).extract('a b c')).resolves.toHaveLength(2);
  });

  it('reports an unparseable reply as an invalid response', async () => {
    const model = new ScriptedLanguageModel(['I found no entities.']);
    const failure = await new LlmEntityExtractor(model).extract('anything').catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(ProviderError);
    if (failure instanceof ProviderError) {
      expect(failure.reason).toBe('invalid_response');
    }
  });
});

describe('LlmCrossEncoder', () => {
  it('numbers passages and clips long ones', () => {
    const long = 'x'.repeat(1600);
    const request = formatScoringRequest('What is bail?', ['Bail is release.', long]);
    expect(request.startsWith('Question: What is bail?\n\nPassage 1:\nBail is release.\n\nPassage 2:\n')).toBe(true);
    expect(request.endsWith(`${'x'.repeat(1500)}...`)).toBe(true);
  });

  it('returns one probability per passage', async () => {
    const model = new ScriptedLanguageModel(['{"scores": [0.9, 0.2]}']);
    const encoder = new LlmCrossEncoder(model);
    await expect(encoder.score('What is bail?', ['Bail is release.', 'Unrelated.'])).resolves.toEqual([0.9, 0.2]);
    expect(encoder.scoreScale).toBe('probability');
    expect(model.requests[0]?.maxTokens).toBe(36);
  });

  it('does not call the model for no passages', async () => {
    const model = new ScriptedLanguageModel(['{"scores": []}']);
    await expect(new LlmCrossEncoder(model).score('q', [])).resolves.toEqual([]);
    expect(model.calls).toBe(0);
  });

  it('rejects a reply without scores', async () => {
    const model = new ScriptedLanguageModel(['{"ranking": [1, 2]}']);
    await expect(new LlmCrossEncoder(model).score('q', ['a', 'b'])).rejects.toBeInstanceOf(ProviderError);
  });
});

describe('toProviderError', () => {
  it('classifies SDK failures by HTTP status', () => {
    const auth = toProviderError('anthropic', Object.assign(new Error('bad key'), { status: 401 }));
    expect([auth.reason, auth.retryable]).toEqual(['auth_failed', false]);

    const limited = toProviderError('openai', Object.assign(new Error('slow down'), { status: 429 }));
    expect([limited.reason, limited.retryable]).toEqual(['unavailable', true]);

    const rejected = toProviderError('openai', Object.assign(new Error('bad request'), { status: 400 }));
    expect([rejected.reason, rejected.retryable]).toEqual(['unavailable', false]);

    const network = toProviderError('openai', new Error('socket hang up'));
    expect(network.retryable).toBe(true);
    expect(network.message).toBe('Provider openai unavailable: socket hang up');
  });

  it('passes ProviderError through unchanged', () => {
    const original = new ProviderError('anthropic', 'invalid_response', true, 'empty');
    expect(toProviderError('anthropic', original)).toBe(original);
  });
});
