/**
 * @biocurate/graph
 *
 * Graph compilation, export, query replay and analysis. Pure functions and
 * one injectable compiler; no I/O.
 */

// ── Model ───────────────────────────────────────────────────
export {
  NODE_FUNCTIONS,
  RELATIONS,
  CORRELATIVE_RELATIONS,
} from './graph.types';
export type {
  NodeFunction,
  Relation,
  GraphMetadata,
  CitationRef,
  GraphNode,
  GraphEdge,
  GraphView,
  CompiledGraph,
} from './graph.types';
export {
  isRecord,
  nodeLabel,
  citationKey,
  makeNode,
  makeEdge,
  mergeViews,
  inferCentralDogma,
} from './graph.utils';

// ── Compiler ────────────────────────────────────────────────
export { CompilationError } from './compiler/compilation.error';
export { NodeLinkCompiler } from './compiler/node-link.compiler';
export {
  GRAPH_COMPILER,
  DEFAULT_COMPILE_OPTIONS,
} from './compiler/graph-compiler.interface';
export type {
  CompileOptions,
  GraphCompiler,
} from './compiler/graph-compiler.interface';

// ── Export ──────────────────────────────────────────────────
export {
  EXPORT_FORMATS,
  exportGraph,
  isExportFormat,
  toNodeLink,
} from './export/graph-exporter';
export type {
  ExportFormat,
  ExportResult,
  ExportableGraph,
} from './export/graph-exporter';

// ── Queries ─────────────────────────────────────────────────
export {
  SEEDING_TYPES,
  PIPELINE_FUNCTIONS,
  runQuery,
  applySeeding,
  applyPipelineStep,
} from './query/query-runner';
export type {
  SeedingType,
  SeedingEntry,
  PipelineFunction,
  PipelineEntry,
} from './query/query-runner';

// ── Analysis ────────────────────────────────────────────────
export {
  diffuseHeat,
  DEFAULT_HEAT_DIFFUSION_OPTIONS,
} from './analysis/heat-diffusion';
export type {
  HeatDiffusionOptions,
  HeatScore,
} from './analysis/heat-diffusion';
