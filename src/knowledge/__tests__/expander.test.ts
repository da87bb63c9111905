import { describe, it, expect, vi } from 'vitest';
import { KnowledgeExpander, unexpandedQuery } from '../expander.js';
import { LegalKnowledgeGraph } from '../knowledge_graph.js';
import { smallGraph } from './fixtures.js';

const DUE_PROCESS = { text: 'due process', type: 'concept' as const };

describe('KnowledgeExpander', () => {
  it('adds related concepts weighted by inverse distance', () => {
    const expanded = new KnowledgeExpander(smallGraph()).expand('What does due process require?', [DUE_PROCESS]);
    expect(expanded.originalQuery).toBe('What does due process require?');
    expect(expanded.expansionTerms).toEqual([
      { term: 'Fair Hearing', weight: 1, distance: 1, relation: 'defines', sourceEntity: 'due process' },
      { term: 'Natural Justice', weight: 1, distance: 1, relation: 'related-to', sourceEntity: 'due process' },
      { term: 'Audi Alteram Partem', weight: 0.5, distance: 2, relation: 'related-to', sourceEntity: 'due process' },
    ]);
    expect(expanded.provenance).toEqual({
      'due process': ['Fair Hearing', 'Natural Justice', 'Audi Alteram Partem'],
    });
  });

  it('respects the depth and term limits', () => {
    const shallow = new KnowledgeExpander(smallGraph(), { maxDepth: 1 }).expand('due process', [DUE_PROCESS]);
    expect(shallow.expansionTerms.map((term) => term.term)).toEqual(['Fair Hearing', 'Natural Justice']);

    const capped = new KnowledgeExpander(smallGraph(), { maxExpansionTerms: 1 }).expand('due process', [DUE_PROCESS]);
    expect(capped.expansionTerms.map((term) => term.term)).toEqual(['Fair Hearing']);
    expect(capped.provenance).toEqual({ 'due process': ['Fair Hearing'] });
  });

  it('skips concepts the query already mentions', () => {
    const expanded = new KnowledgeExpander(smallGraph()).expand('Is a fair hearing part of due process?', [DUE_PROCESS]);
    expect(expanded.expansionTerms.map((term) => term.term)).toEqual(['Natural Justice', 'Audi Alteram Partem']);
  });

  it('keeps the maximum weight across entities and never an entity itself', () => {
    const expanded = new KnowledgeExpander(smallGraph()).expand('due process and audi alteram partem', [
      DUE_PROCESS,
      { text: 'audi alteram partem', type: 'concept' },
    ]);
    expect(expanded.expansionTerms).toEqual([
      { term: 'Fair Hearing', weight: 1, distance: 1, relation: 'defines', sourceEntity: 'due process' },
      { term: 'Natural Justice', weight: 1, distance: 1, relation: 'related-to', sourceEntity: 'due process' },
    ]);
  });

  it('records provenance for entities named like object members', () => {
    const graph = LegalKnowledgeGraph.fromJSON({
      version: 1,
      concepts: [{ name: 'constructor' }, { name: 'Building Contract' }],
      relations: [{ from: 'constructor', to: 'Building Contract', relation: 'related-to' }],
    });
    const expanded = new KnowledgeExpander(graph).expand('duties of a constructor', [
      { text: 'constructor', type: 'concept' },
    ]);
    expect(expanded.expansionTerms.map((term) => term.term)).toEqual(['Building Contract']);
    expect(expanded.provenance).toEqual({ constructor: ['Building Contract'] });
  });

  it('returns the unexpanded query without entities', () => {
    expect(new KnowledgeExpander(smallGraph()).expand('What is estoppel?', [])).toEqual(unexpandedQuery('What is estoppel?'));
  });

  it('adds nothing for entities the graph does not know', () => {
    const expanded = new KnowledgeExpander(smallGraph()).expand('What is estoppel?', [{ text: 'estoppel', type: 'concept' }]);
    expect(expanded.expansionTerms).toEqual([]);
    expect(expanded.entities).toEqual([{ text: 'estoppel', type: 'concept' }]);
  });

  it('degrades to the unexpanded query when traversal fails', () => {
    const graph = smallGraph();
    vi.spyOn(graph, 'traverse').mockImplementation(() => {
      throw new Error('corrupt graph');
    });
    const expanded = new KnowledgeExpander(graph).expand('due process', [DUE_PROCESS]);
    expect(expanded).toEqual(unexpandedQuery('due process', [DUE_PROCESS]));
  });
});
