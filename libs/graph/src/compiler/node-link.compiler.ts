import { Injectable } from '@nestjs/common';
import type {
  CitationRef,
  CompiledGraph,
  GraphEdge,
  GraphMetadata,
  GraphNode,
} from '../graph.types';
import {
  inferCentralDogma,
  isNodeFunction,
  isRecord,
  isRelation,
  makeEdge,
  makeNode,
  nonEmptyString,
} from '../graph.utils';
import { CompilationError } from './compilation.error';
import { STORAGE_LIMITS, containsNul, exceedsLimit } from './storage-limits';
import type { CompileOptions, GraphCompiler } from './graph-compiler.interface';

const NAMESPACE_PATTERN = /^[A-Za-z][A-Za-z0-9_.-]*$/;

interface NodeLinkDocument {
  graph: Record<string, unknown>;
  nodes: unknown[];
  links: unknown[];
}

/**
 * Compiles node-link JSON documents:
 *
 * ```json
 * {
 *   "graph": { "name": "Tau signalling", "version": "1.0.0" },
 *   "nodes": [{ "id": "a", "function": "Protein", "namespace": "HGNC", "name": "MAPT" }],
 *   "links": [{ "source": "a", "target": "b", "relation": "increases",
 *               "citation": { "db": "PubMed", "reference": "123" }, "evidence": "..." }]
 * }
 * ```
 *
 * Fatal problems throw CompilationError. Problems confined to one node or
 * link skip that item and are recorded in `warnings`, the way a line-based
 * parser skips a bad statement and keeps going.
 */
@Injectable()
export class NodeLinkCompiler implements GraphCompiler {
  compile(source: string, options: CompileOptions): CompiledGraph {
    const document = this.parseDocument(source);
    const metadata = this.readMetadata(document.graph);
    const warnings: string[] = [];

    const nodesById = this.readNodes(document.nodes, options, warnings);
    const edges = this.readLinks(document.links, nodesById, options, warnings);

    const nodes = new Map<string, GraphNode>();
    for (const node of nodesById.values()) {
      nodes.set(node.key, node);
    }

    const view = { nodes: [...nodes.values()], edges };
    const compiled = options.inferOrigin ? inferCentralDogma(view) : view;

    return { metadata, ...compiled, warnings };
  }

  // ── Document structure ───────────────────────────────────

  private parseDocument(source: string): NodeLinkDocument {
    let parsed: unknown;
    try {
      parsed = JSON.parse(source);
    } catch {
      throw new CompilationError('the document is not valid JSON');
    }

    if (!isRecord(parsed)) {
      throw new CompilationError('the document must be a JSON object');
    }
    if (containsNul(parsed)) {
      throw new CompilationError('the document contains a NUL character');
    }

    const { graph, nodes, links } = parsed;

    if (!isRecord(graph)) {
      throw new CompilationError('the document name was missing');
    }
    if (!Array.isArray(nodes)) {
      throw new CompilationError('the document has no "nodes" list');
    }
    if (!Array.isArray(links)) {
      throw new CompilationError('the document has no "links" list');
    }

    return { graph, nodes, links };
  }

  private readMetadata(graph: Record<string, unknown>): GraphMetadata {
    const name = nonEmptyString(graph['name']);
    if (!name) {
      throw new CompilationError('the document name was missing');
    }

    if (exceedsLimit(name, STORAGE_LIMITS.networkName)) {
      throw new CompilationError(
        `the document name is longer than ${STORAGE_LIMITS.networkName} characters`,
      );
    }

    const version = nonEmptyString(graph['version']);
    if (!version) {
      throw new CompilationError('the document version was missing');
    }
    if (exceedsLimit(version, STORAGE_LIMITS.networkVersion)) {
      throw new CompilationError(
        `the document version is longer than ${STORAGE_LIMITS.networkVersion} characters`,
      );
    }

    const contact = nonEmptyString(graph['contact']);
    if (contact && exceedsLimit(contact, STORAGE_LIMITS.networkContact)) {
      throw new CompilationError(
        `the document contact is longer than ${STORAGE_LIMITS.networkContact} characters`,
      );
    }

    return {
      name,
      version,
      description: nonEmptyString(graph['description']),
      authors: nonEmptyString(graph['authors']),
      contact,
      license: nonEmptyString(graph['license']),
    };
  }

  // ── Nodes ────────────────────────────────────────────────

  private readNodes(
    rawNodes: unknown[],
    options: CompileOptions,
    warnings: string[],
  ): Map<string, GraphNode> {
    const seenIds = new Set<string>();
    const nodesById = new Map<string, GraphNode>();

    rawNodes.forEach((raw, index) => {
      if (!isRecord(raw)) {
        warnings.push(`nodes[${index}] is not an object`);
        return;
      }

      const id = nonEmptyString(raw['id']);
      if (!id) {
        warnings.push(`nodes[${index}] has no id`);
        return;
      }

      if (seenIds.has(id)) {
        throw new CompilationError(
          `node "${id}" is defined more than once (nodes[${index}])`,
        );
      }
      seenIds.add(id);

      const fn = raw['function'];
      if (!isNodeFunction(fn)) {
        warnings.push(`node "${id}" has unknown function "${String(fn)}"`);
        return;
      }

      const name = nonEmptyString(raw['name']);
      if (!name) {
        warnings.push(`node "${id}" has no name`);
        return;
      }

      const namespace = nonEmptyString(raw['namespace']);
      if (options.identifierValidation) {
        if (!namespace) {
          warnings.push(`node "${id}" has no namespace`);
          return;
        }
        if (!NAMESPACE_PATTERN.test(namespace)) {
          warnings.push(`node "${id}" has an invalid namespace "${namespace}"`);
          return;
        }
      }

      const node = makeNode(fn, namespace, name);
      if (exceedsLimit(node.key, STORAGE_LIMITS.nodeLabel)) {
        warnings.push(
          `node "${id}" has a label longer than ${STORAGE_LIMITS.nodeLabel} characters`,
        );
        return;
      }

      nodesById.set(id, node);
    });

    return nodesById;
  }

  // ── Links ────────────────────────────────────────────────

  private readLinks(
    rawLinks: unknown[],
    nodesById: Map<string, GraphNode>,
    options: CompileOptions,
    warnings: string[],
  ): GraphEdge[] {
    const edges = new Map<string, GraphEdge>();
    let currentCitation: CitationRef | null = null;

    rawLinks.forEach((raw, index) => {
      if (!isRecord(raw)) {
        warnings.push(`links[${index}] is not an object`);
        return;
      }

      const source = this.resolveEndpoint(raw['source'], nodesById);
      const target = this.resolveEndpoint(raw['target'], nodesById);
      if (!source || !target) {
        const missing = source ? raw['target'] : raw['source'];
        warnings.push(
          `links[${index}] references unknown node "${String(missing)}"`,
        );
        return;
      }

      const relation = raw['relation'];
      if (!isRelation(relation)) {
        warnings.push(
          `links[${index}] has unknown relation "${String(relation)}"`,
        );
        return;
      }

      const ownCitation = this.readCitation(raw['citation']);
      if (ownCitation && !this.citationFits(ownCitation)) {
        warnings.push(`links[${index}] has a citation too long to store`);
        return;
      }
      if (ownCitation) {
        currentCitation = ownCitation;
      } else if (options.citationClearing || !currentCitation) {
        warnings.push(`links[${index}] has no citation`);
        return;
      }

      const edge = makeEdge(
        source.key,
        relation,
        target.key,
        ownCitation ?? currentCitation,
        nonEmptyString(raw['evidence']),
        this.readAnnotations(raw['annotations']),
      );

      if (!edges.has(edge.hash)) {
        edges.set(edge.hash, edge);
      }
    });

    return [...edges.values()];
  }

  private resolveEndpoint(
    value: unknown,
    nodesById: Map<string, GraphNode>,
  ): GraphNode | undefined {
    return typeof value === 'string' ? nodesById.get(value) : undefined;
  }

  private readCitation(value: unknown): CitationRef | null {
    if (!isRecord(value)) return null;

    const db = nonEmptyString(value['db']);
    const reference = nonEmptyString(value['reference']);
    if (!db || !reference) return null;

    return { db, reference, title: nonEmptyString(value['title']) };
  }

  private citationFits(citation: CitationRef): boolean {
    return (
      !exceedsLimit(citation.db, STORAGE_LIMITS.citationDb) &&
      !exceedsLimit(citation.reference, STORAGE_LIMITS.citationReference)
    );
  }

  private readAnnotations(value: unknown): Record<string, string> {
    const annotations: Record<string, string> = {};
    if (!isRecord(value)) return annotations;

    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === 'string') {
        annotations[key] = entry;
      }
    }
    return annotations;
  }
}
