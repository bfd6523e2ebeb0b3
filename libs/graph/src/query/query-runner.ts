import {
  CORRELATIVE_RELATIONS,
  type GraphEdge,
  type GraphNode,
  type GraphView,
} from '../graph.types';
import { citationKey, inferCentralDogma, mergeViews } from '../graph.utils';

export const SEEDING_TYPES = ['induction', 'neighbors', 'citation'] as const;
export type SeedingType = (typeof SEEDING_TYPES)[number];

export const PIPELINE_FUNCTIONS = [
  'removeAssociations',
  'removeIsolatedNodes',
  'inferCentralDogma',
  'expandNeighbors',
] as const;
export type PipelineFunction = (typeof PIPELINE_FUNCTIONS)[number];

export interface SeedingEntry {
  type: SeedingType;
  /** Node keys or names for node seeds; citation references for `citation` */
  data: string[];
}

export interface PipelineEntry {
  function: PipelineFunction;
}

/**
 * Replays a stored query against its assembled universe: the union of the
 * seeds (or the whole universe when there are none), then each pipeline
 * step in order.
 */
export function runQuery(
  universe: GraphView,
  seeding: readonly SeedingEntry[],
  pipeline: readonly PipelineEntry[],
): GraphView {
  let result =
    seeding.length === 0
      ? universe
      : mergeViews(seeding.map((entry) => applySeeding(universe, entry)));

  for (const step of pipeline) {
    result = applyPipelineStep(result, universe, step);
  }

  return result;
}

export function applySeeding(universe: GraphView, entry: SeedingEntry): GraphView {
  switch (entry.type) {
    case 'induction': {
      const keys = matchNodeKeys(universe.nodes, entry.data);
      const edges = universe.edges.filter(
        (edge) => keys.has(edge.source) && keys.has(edge.target),
      );
      return subgraph(universe, keys, edges);
    }
    case 'neighbors': {
      const keys = matchNodeKeys(universe.nodes, entry.data);
      return expandFrom(universe, keys);
    }
    case 'citation': {
      const references = new Set(entry.data);
      const edges = universe.edges.filter(
        (edge) =>
          edge.citation !== null &&
          (references.has(edge.citation.reference) ||
            references.has(citationKey(edge.citation))),
      );
      return subgraph(universe, endpointKeys(edges), edges);
    }
  }
}

export function applyPipelineStep(
  current: GraphView,
  universe: GraphView,
  step: PipelineEntry,
): GraphView {
  switch (step.function) {
    case 'removeAssociations':
      return {
        nodes: current.nodes,
        edges: current.edges.filter(
          (edge) => !CORRELATIVE_RELATIONS.has(edge.relation),
        ),
      };
    case 'removeIsolatedNodes': {
      const connected = endpointKeys(current.edges);
      return {
        nodes: current.nodes.filter((node) => connected.has(node.key)),
        edges: current.edges,
      };
    }
    case 'inferCentralDogma':
      return inferCentralDogma(current);
    case 'expandNeighbors': {
      const keys = new Set(current.nodes.map((node) => node.key));
      return mergeViews([current, expandFrom(universe, keys)]);
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────

/** Matches on exact key or case-insensitive name */
function matchNodeKeys(nodes: readonly GraphNode[], terms: readonly string[]): Set<string> {
  const exact = new Set(terms);
  const lowered = new Set(terms.map((term) => term.toLowerCase()));

  return new Set(
    nodes
      .filter((node) => exact.has(node.key) || lowered.has(node.name.toLowerCase()))
      .map((node) => node.key),
  );
}

function expandFrom(universe: GraphView, keys: ReadonlySet<string>): GraphView {
  const edges = universe.edges.filter(
    (edge) => keys.has(edge.source) || keys.has(edge.target),
  );
  const nodeKeys = endpointKeys(edges);
  for (const key of keys) nodeKeys.add(key);
  return subgraph(universe, nodeKeys, edges);
}

function endpointKeys(edges: readonly GraphEdge[]): Set<string> {
  const keys = new Set<string>();
  for (const edge of edges) {
    keys.add(edge.source);
    keys.add(edge.target);
  }
  return keys;
}

function subgraph(
  universe: GraphView,
  keys: ReadonlySet<string>,
  edges: GraphEdge[],
): GraphView {
  return {
    nodes: universe.nodes.filter((node) => keys.has(node.key)),
    edges,
  };
}
