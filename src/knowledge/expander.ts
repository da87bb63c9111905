/**
 * @fileoverview Knowledge-graph query expansion
 *
 * Turns a query plus extracted entities into an ExpandedQuery: related
 * concepts within `maxDepth` hops of each entity, weighted 1/distance.
 * Expansion never blocks the pipeline; any failure yields the unexpanded
 * query.
 */

import type { ExpandedQuery, ExpansionTerm, ExtractedEntity } from '../types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { normalizeText } from '../utils/text.js';
import type { LegalKnowledgeGraph } from './knowledge_graph.js';

export interface KnowledgeExpanderOptions {
  maxDepth?: number;
  maxExpansionTerms?: number;
}

export function unexpandedQuery(query: string, entities: ExtractedEntity[] = []): ExpandedQuery {
  return { originalQuery: query, entities: [...entities], expansionTerms: [], provenance: {} };
}

function containsPhrase(haystack: string, phrase: string): boolean {
  return ` ${haystack} `.includes(` ${phrase} `);
}

export class KnowledgeExpander {
  private readonly maxDepth: number;
  private readonly maxExpansionTerms: number;

  constructor(
    private readonly graph: LegalKnowledgeGraph,
    options: KnowledgeExpanderOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? 2;
    this.maxExpansionTerms = options.maxExpansionTerms ?? 12;
  }

  expand(query: string, entities: ExtractedEntity[]): ExpandedQuery {
    if (entities.length === 0) {
      return unexpandedQuery(query);
    }
    try {
      return this.expandWithGraph(query, entities);
    } catch (error) {
      logWarning('Knowledge expansion failed; using unexpanded query', { error: getErrorMessage(error) });
      return unexpandedQuery(query, entities);
    }
  }

  private expandWithGraph(query: string, entities: ExtractedEntity[]): ExpandedQuery {
    const normalizedQuery = normalizeText(query);
    const excluded = new Set<string>();
    for (const entity of entities) {
      const key = normalizeText(entity.text);
      if (key) excluded.add(key);
      const resolved = this.graph.resolve(entity.text);
      if (resolved) excluded.add(resolved);
    }

    const best = new Map<string, ExpansionTerm>();
    for (const entity of entities) {
      for (const reached of this.graph.traverse(entity.text, this.maxDepth)) {
        const termKey = normalizeText(reached.name);
        if (!termKey || excluded.has(termKey) || containsPhrase(normalizedQuery, termKey)) continue;
        const weight = 1 / reached.distance;
        const current = best.get(termKey);
        // Maximum across paths, never the sum; ties keep the earlier entity.
        if (current && current.weight >= weight) continue;
        best.set(termKey, {
          term: reached.name,
          weight,
          distance: reached.distance,
          relation: reached.relation,
          sourceEntity: entity.text,
        });
      }
    }

    const expansionTerms = Array.from(best.values())
      .sort((a, b) => b.weight - a.weight || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
      .slice(0, this.maxExpansionTerms);

    const provenance = new Map<string, string[]>();
    for (const term of expansionTerms) {
      const terms = provenance.get(term.sourceEntity) ?? [];
      terms.push(term.term);
      provenance.set(term.sourceEntity, terms);
    }

    logDebug('Query expanded', { entities: entities.length, terms: expansionTerms.length });
    return { originalQuery: query, entities: [...entities], expansionTerms, provenance: Object.fromEntries(provenance) };
  }
}
