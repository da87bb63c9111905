/**
 * @fileoverview Legal concept graph
 *
 * Concepts are linked by labelled relations (`defines`, `is-part-of`,
 * `is-amended-by`, ...). The graph is loaded from JSON, validated with zod,
 * and queried by normalized concept key so lookups ignore case and
 * punctuation. `synonym-of` and `related-to` are symmetric and get a reverse
 * edge at load time; the other relations are followed in their stated
 * direction only.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { ENTITY_TYPES, type EntityType, type RelationLabel } from '../types.js';
import { normalizeText } from '../utils/text.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

const RELATION_LABELS = [
  'defines',
  'is-part-of',
  'is-amended-by',
  'related-to',
  'synonym-of',
  'broader-than',
  'narrower-than',
] as const satisfies readonly RelationLabel[];

const SYMMETRIC_RELATIONS: ReadonlySet<RelationLabel> = new Set<RelationLabel>(['related-to', 'synonym-of']);

export const KnowledgeGraphFileSchema = z.object({
  version: z.literal(1),
  concepts: z.array(
    z.object({
      name: z.string().min(1),
      type: z.enum(ENTITY_TYPES).default('concept'),
      aliases: z.array(z.string().min(1)).default([]),
    }),
  ),
  relations: z.array(
    z.object({
      from: z.string().min(1),
      to: z.string().min(1),
      relation: z.enum(RELATION_LABELS),
    }),
  ),
});

export type KnowledgeGraphFile = z.input<typeof KnowledgeGraphFileSchema>;

export const DEFAULT_KNOWLEDGE_GRAPH_URL = new URL('../../data/legal_knowledge_graph.json', import.meta.url);

// ============================================================================
// TYPES
// ============================================================================

export interface ConceptNode {
  /** Normalized lookup key */
  key: string;
  /** Display form as written in the graph file */
  name: string;
  type: EntityType;
  aliases: string[];
}

export interface ConceptEdge {
  target: string;
  relation: RelationLabel;
}

export interface ReachedConcept {
  key: string;
  name: string;
  distance: number;
  /** Label of the edge that first reached this concept */
  relation: RelationLabel;
}

// ============================================================================
// GRAPH
// ============================================================================

export class LegalKnowledgeGraph {
  private readonly nodes = new Map<string, ConceptNode>();
  private readonly aliasIndex = new Map<string, string>();
  private readonly edges = new Map<string, ConceptEdge[]>();

  private constructor() {}

  static fromJSON(raw: unknown): LegalKnowledgeGraph {
    const parsed = KnowledgeGraphFileSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError('knowledgeGraph', `Invalid knowledge graph: ${details}`);
    }

    const graph = new LegalKnowledgeGraph();
    for (const concept of parsed.data.concepts) {
      graph.addConcept(concept.name, concept.type, concept.aliases);
    }
    for (const relation of parsed.data.relations) {
      graph.addRelation(relation.from, relation.to, relation.relation);
    }
    return graph;
  }

  /**
   * Load and validate a graph file. Defaults to the bundled legal graph.
   *
   * @throws ConfigurationError when the file is missing or malformed
   */
  static load(path: string | URL = DEFAULT_KNOWLEDGE_GRAPH_URL): LegalKnowledgeGraph {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
      throw new ConfigurationError('knowledgeGraphPath', `Cannot read ${String(path)}: ${getErrorMessage(error)}`);
    }
    return LegalKnowledgeGraph.fromJSON(raw);
  }

  get size(): number {
    return this.nodes.size;
  }

  concepts(): ConceptNode[] {
    return Array.from(this.nodes.values());
  }

  /** Canonical key for a concept name or alias, if the graph knows it. */
  resolve(name: string): string | undefined {
    const key = normalizeText(name);
    if (this.nodes.has(key)) return key;
    return this.aliasIndex.get(key);
  }

  getConcept(name: string): ConceptNode | undefined {
    const key = this.resolve(name);
    return key === undefined ? undefined : this.nodes.get(key);
  }

  neighbors(name: string): ConceptEdge[] {
    const key = this.resolve(name);
    if (key === undefined) return [];
    return (this.edges.get(key) ?? []).map((edge) => ({ ...edge }));
  }

  /**
   * Breadth-first walk from `start` up to `maxDepth` hops. Each concept is
   * reported once, at its shortest distance; among equally short paths the
   * first edge in file order wins. The start concept is not reported.
   */
  traverse(start: string, maxDepth: number): ReachedConcept[] {
    const origin = this.resolve(start);
    if (origin === undefined || maxDepth < 1) return [];

    const visited = new Set<string>([origin]);
    const reached: ReachedConcept[] = [];
    const queue: Array<{ key: string; depth: number }> = [{ key: origin, depth: 0 }];

    for (let head = 0; head < queue.length; head++) {
      const { key, depth } = queue[head];
      if (depth >= maxDepth) continue;
      for (const edge of this.edges.get(key) ?? []) {
        if (visited.has(edge.target)) continue;
        visited.add(edge.target);
        const node = this.nodes.get(edge.target);
        reached.push({
          key: edge.target,
          name: node?.name ?? edge.target,
          distance: depth + 1,
          relation: edge.relation,
        });
        queue.push({ key: edge.target, depth: depth + 1 });
      }
    }
    return reached;
  }

  private addConcept(name: string, type: EntityType, aliases: string[]): void {
    const key = normalizeText(name);
    if (!key) return;
    const existing = this.nodes.get(key);
    if (existing) {
      existing.aliases.push(...aliases);
    } else {
      this.nodes.set(key, { key, name, type, aliases: [...aliases] });
    }
    for (const alias of aliases) {
      const aliasKey = normalizeText(alias);
      if (aliasKey && aliasKey !== key && !this.aliasIndex.has(aliasKey)) {
        this.aliasIndex.set(aliasKey, key);
      }
    }
  }

  private ensureConcept(name: string): string {
    const key = this.resolve(name) ?? normalizeText(name);
    if (!this.nodes.has(key)) {
      this.addConcept(name, 'concept', []);
    }
    return key;
  }

  private addRelation(from: string, to: string, relation: RelationLabel): void {
    const source = this.ensureConcept(from);
    const target = this.ensureConcept(to);
    if (!source || !target || source === target) return;
    this.pushEdge(source, { target, relation });
    if (SYMMETRIC_RELATIONS.has(relation)) {
      this.pushEdge(target, { target: source, relation });
    }
  }

  private pushEdge(source: string, edge: ConceptEdge): void {
    const list = this.edges.get(source) ?? [];
    if (list.some((existing) => existing.target === edge.target)) return;
    list.push(edge);
    this.edges.set(source, list);
  }
}

let defaultGraph: LegalKnowledgeGraph | null = null;

/** Bundled graph, loaded once per process. */
export function getDefaultKnowledgeGraph(): LegalKnowledgeGraph {
  if (!defaultGraph) {
    defaultGraph = LegalKnowledgeGraph.load();
  }
  return defaultGraph;
}
