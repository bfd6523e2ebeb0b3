import type { CompiledGraph } from '../graph.types';

/** Per-upload switches stored on the report and honoured by the compiler */
export interface CompileOptions {
  /** Every link must carry its own citation; otherwise the last one is reused */
  citationClearing: boolean;

  /** Add the gene and RNA each namespaced protein originates from */
  inferOrigin: boolean;

  /** Reject nodes whose namespace is missing or malformed */
  identifierValidation: boolean;
}

export const DEFAULT_COMPILE_OPTIONS: Readonly<CompileOptions> = {
  citationClearing: true,
  inferOrigin: true,
  identifierValidation: true,
};

/**
 * Port for turning a stored document into a compiled graph.
 *
 * Implementations throw CompilationError for documents that cannot be
 * compiled at all and report skipped items through `warnings`.
 */
export interface GraphCompiler {
  compile(source: string, options: CompileOptions): CompiledGraph;
}

/** Injection token for the active GraphCompiler implementation */
export const GRAPH_COMPILER = 'GRAPH_COMPILER';
