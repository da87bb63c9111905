import { LegalKnowledgeGraph, type KnowledgeGraphFile } from '../knowledge_graph.js';

export const SMALL_GRAPH: KnowledgeGraphFile = {
  version: 1,
  concepts: [
    { name: 'Due Process', aliases: ['due process of law'] },
    { name: 'Fair Hearing' },
    { name: 'Natural Justice' },
    { name: 'Audi Alteram Partem' },
    { name: 'Constitution', type: 'statute' },
  ],
  relations: [
    { from: 'Due Process', to: 'Fair Hearing', relation: 'defines' },
    { from: 'Due Process', to: 'Natural Justice', relation: 'related-to' },
    { from: 'Natural Justice', to: 'Audi Alteram Partem', relation: 'narrower-than' },
    { from: 'Fair Hearing', to: 'Audi Alteram Partem', relation: 'related-to' },
  ],
};

export function smallGraph(): LegalKnowledgeGraph {
  return LegalKnowledgeGraph.fromJSON(SMALL_GRAPH);
}
