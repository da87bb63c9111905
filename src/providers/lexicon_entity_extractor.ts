import type { ExtractedEntity } from '../types.js';
import type { LegalKnowledgeGraph } from '../knowledge/knowledge_graph.js';
import { normalizeText } from '../utils/text.js';
import type { EntityExtractor } from './types.js';

/**
 * Dictionary match of graph concepts and their aliases against the query.
 * Entities are returned in order of first appearance; a concept matched by
 * several surface forms is reported once.
 */
export class LexiconEntityExtractor implements EntityExtractor {
  readonly name = 'lexicon';

  constructor(private readonly graph: LegalKnowledgeGraph) {}

  async extract(text: string): Promise<ExtractedEntity[]> {
    const padded = ` ${normalizeText(text)} `;
    const matches: Array<{ position: number; length: number; entity: ExtractedEntity; key: string }> = [];

    for (const concept of this.graph.concepts()) {
      let position = -1;
      for (const form of [concept.key, ...concept.aliases.map(normalizeText)]) {
        if (!form) continue;
        const found = padded.indexOf(` ${form} `);
        if (found >= 0 && (position < 0 || found < position)) position = found;
      }
      if (position >= 0) {
        matches.push({
          position,
          length: concept.key.length,
          key: concept.key,
          entity: { text: concept.name, type: concept.type },
        });
      }
    }

    matches.sort((a, b) => a.position - b.position || b.length - a.length || (a.key < b.key ? -1 : 1));
    return matches.map((match) => match.entity);
  }
}
