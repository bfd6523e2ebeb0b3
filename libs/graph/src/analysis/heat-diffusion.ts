import type { GraphView } from '../graph.types';

export interface HeatDiffusionOptions {
  /** Number of synchronous update rounds */
  steps: number;
  /** Share of a node's heat replaced by its neighbours' mean each round, in [0, 1] */
  alpha: number;
}

export const DEFAULT_HEAT_DIFFUSION_OPTIONS: Readonly<HeatDiffusionOptions> = {
  steps: 10,
  alpha: 0.5,
};

export interface HeatScore {
  node: string;
  name: string;
  /** Heat seeded from the dataset, 0 when the node had no measurement */
  initial: number;
  score: number;
}

/**
 * Spreads measured values over the graph, treating edges as undirected.
 *
 * Each round: `h'(v) = (1 - alpha) * h(v) + alpha * mean(h(u) for u ~ v)`.
 * Nodes without neighbours keep their heat. Values are matched to nodes by
 * case-insensitive name. Results are ordered by |score| descending, then key.
 */
export function diffuseHeat(
  graph: GraphView,
  values: Readonly<Record<string, number>>,
  options: HeatDiffusionOptions = DEFAULT_HEAT_DIFFUSION_OPTIONS,
): HeatScore[] {
  const measured = new Map<string, number>();
  for (const [gene, value] of Object.entries(values)) {
    measured.set(gene.toLowerCase(), value);
  }

  const neighbours = new Map<string, string[]>();
  for (const node of graph.nodes) {
    neighbours.set(node.key, []);
  }
  for (const edge of graph.edges) {
    if (edge.source === edge.target) continue;
    neighbours.get(edge.source)?.push(edge.target);
    neighbours.get(edge.target)?.push(edge.source);
  }

  const initial = new Map<string, number>();
  for (const node of graph.nodes) {
    initial.set(node.key, measured.get(node.name.toLowerCase()) ?? 0);
  }

  let heat = new Map(initial);
  for (let step = 0; step < options.steps; step++) {
    const next = new Map<string, number>();
    for (const [key, current] of heat) {
      const adjacent = neighbours.get(key) ?? [];
      if (adjacent.length === 0) {
        next.set(key, current);
        continue;
      }
      const total = adjacent.reduce((sum, other) => sum + (heat.get(other) ?? 0), 0);
      const mean = total / adjacent.length;
      next.set(key, (1 - options.alpha) * current + options.alpha * mean);
    }
    heat = next;
  }

  return graph.nodes
    .map((node) => ({
      node: node.key,
      name: node.name,
      initial: initial.get(node.key) ?? 0,
      score: heat.get(node.key) ?? 0,
    }))
    .sort(
      (a, b) =>
        Math.abs(b.score) - Math.abs(a.score) || a.node.localeCompare(b.node),
    );
}
