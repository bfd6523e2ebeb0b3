/**
 * Shared graph shapes produced by the compiler and consumed by the
 * exporters, the query runner and the analyses.
 *
 * A node is identified by its canonical label (e.g. `p(HGNC:AKT1)`), so
 * graphs compiled from different documents can be merged without an id
 * mapping step.
 */

// ── Vocabulary ──────────────────────────────────────────────

/** Node functions understood by the compiler, with their label prefix */
export const NODE_FUNCTIONS = {
  Protein: 'p',
  Rna: 'r',
  Gene: 'g',
  MicroRna: 'm',
  Abundance: 'a',
  Complex: 'complex',
  BiologicalProcess: 'bp',
  Pathology: 'path',
} as const;

export type NodeFunction = keyof typeof NODE_FUNCTIONS;

export const RELATIONS = [
  'increases',
  'directlyIncreases',
  'decreases',
  'directlyDecreases',
  'regulates',
  'causesNoChange',
  'rateLimitingStepOf',
  'association',
  'positiveCorrelation',
  'negativeCorrelation',
  'biomarkerFor',
  'prognosticBiomarkerFor',
  'hasComponent',
  'hasMember',
  'hasVariant',
  'isA',
  'partOf',
  'transcribedTo',
  'translatedTo',
] as const;

export type Relation = (typeof RELATIONS)[number];

/** Relations that carry no causal direction */
export const CORRELATIVE_RELATIONS: ReadonlySet<Relation> = new Set<Relation>([
  'association',
  'positiveCorrelation',
  'negativeCorrelation',
]);

// ── Compiled graph ──────────────────────────────────────────

export interface GraphMetadata {
  name: string;
  version: string;
  description: string | null;
  authors: string | null;
  contact: string | null;
  license: string | null;
}

export interface CitationRef {
  db: string;
  reference: string;
  title: string | null;
}

export interface GraphNode {
  /** Canonical label, unique within a graph */
  key: string;
  function: NodeFunction;
  namespace: string | null;
  name: string;
}

export interface GraphEdge {
  source: string;
  target: string;
  relation: Relation;
  citation: CitationRef | null;
  evidence: string | null;
  annotations: Record<string, string>;
  /** md5 over the edge's canonical form, unique within a graph */
  hash: string;
}

/** Nodes and edges without document metadata: query results, assemblies */
export interface GraphView {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface CompiledGraph extends GraphView {
  metadata: GraphMetadata;
  warnings: string[];
}
