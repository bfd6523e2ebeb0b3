import { createHash } from 'crypto';
import {
  NODE_FUNCTIONS,
  RELATIONS,
  type CitationRef,
  type GraphEdge,
  type GraphNode,
  type GraphView,
  type NodeFunction,
  type Relation,
} from './graph.types';

const BARE_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNodeFunction(value: unknown): value is NodeFunction {
  return (
    typeof value === 'string' &&
    Object.prototype.hasOwnProperty.call(NODE_FUNCTIONS, value)
  );
}

export function isRelation(value: unknown): value is Relation {
  return (
    typeof value === 'string' &&
    RELATIONS.some((relation) => relation === value)
  );
}

/** Returns the trimmed string, or null for anything blank or non-string */
export function nonEmptyString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Canonical label for a node: `p(HGNC:AKT1)`, `bp("cell death")`.
 * Names outside the bare-name alphabet are quoted.
 */
export function nodeLabel(
  fn: NodeFunction,
  namespace: string | null,
  name: string,
): string {
  const quotedName = BARE_NAME_PATTERN.test(name)
    ? name
    : `"${name.replace(/"/g, '\\"')}"`;
  const qualified = namespace ? `${namespace}:${quotedName}` : quotedName;
  return `${NODE_FUNCTIONS[fn]}(${qualified})`;
}

export function makeNode(
  fn: NodeFunction,
  namespace: string | null,
  name: string,
): GraphNode {
  return { key: nodeLabel(fn, namespace, name), function: fn, namespace, name };
}

export function citationKey(citation: CitationRef): string {
  return `${citation.db}:${citation.reference}`;
}

export function edgeHash(
  source: string,
  relation: Relation,
  target: string,
  citation: CitationRef | null,
  evidence: string | null,
): string {
  const canonical = JSON.stringify([
    source,
    relation,
    target,
    citation ? citationKey(citation) : null,
    evidence,
  ]);
  return createHash('md5').update(canonical).digest('hex');
}

export function makeEdge(
  source: string,
  relation: Relation,
  target: string,
  citation: CitationRef | null = null,
  evidence: string | null = null,
  annotations: Record<string, string> = {},
): GraphEdge {
  return {
    source,
    target,
    relation,
    citation,
    evidence,
    annotations,
    hash: edgeHash(source, relation, target, citation, evidence),
  };
}

/** Union of several views; nodes dedupe by key and edges by hash, first wins */
export function mergeViews(views: readonly GraphView[]): GraphView {
  const nodes = new Map<string, GraphNode>();
  const edges = new Map<string, GraphEdge>();

  for (const view of views) {
    for (const node of view.nodes) {
      if (!nodes.has(node.key)) nodes.set(node.key, node);
    }
    for (const edge of view.edges) {
      if (!edges.has(edge.hash)) edges.set(edge.hash, edge);
    }
  }

  return { nodes: [...nodes.values()], edges: [...edges.values()] };
}

/**
 * Adds `g(X) transcribedTo r(X)` and `r(X) translatedTo p(X)` for every
 * protein that has a namespace.
 */
export function inferCentralDogma(view: GraphView): GraphView {
  const inferred: GraphView = { nodes: [], edges: [] };

  for (const node of view.nodes) {
    if (node.function !== 'Protein' || node.namespace === null) continue;

    const rna = makeNode('Rna', node.namespace, node.name);
    const gene = makeNode('Gene', node.namespace, node.name);

    inferred.nodes.push(rna, gene);
    inferred.edges.push(
      makeEdge(gene.key, 'transcribedTo', rna.key),
      makeEdge(rna.key, 'translatedTo', node.key),
    );
  }

  return mergeViews([view, inferred]);
}
