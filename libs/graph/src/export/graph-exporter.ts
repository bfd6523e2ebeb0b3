import type { GraphEdge, GraphMetadata, GraphView } from '../graph.types';
import { citationKey } from '../graph.utils';

export const EXPORT_FORMATS = [
  'nodelink',
  'sif',
  'tsv',
  'graphml',
  'citations',
] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportResult {
  content: string;
  contentType: string;
  extension: string;
}

/** Metadata is optional: query results have none of their own */
export interface ExportableGraph extends GraphView {
  metadata?: GraphMetadata;
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Serializes a graph. Output is deterministic for a given graph: nodes and
 * edges are written in their stored order, citations sorted.
 */
export function exportGraph(
  graph: ExportableGraph,
  format: ExportFormat,
): ExportResult {
  switch (format) {
    case 'nodelink':
      return {
        content: JSON.stringify(toNodeLink(graph), null, 2),
        contentType: 'application/json',
        extension: 'json',
      };
    case 'sif':
      return {
        content: toSif(graph),
        contentType: 'text/plain',
        extension: 'sif',
      };
    case 'tsv':
      return {
        content: toTsv(graph),
        contentType: 'text/tab-separated-values',
        extension: 'tsv',
      };
    case 'graphml':
      return {
        content: toGraphMl(graph),
        contentType: 'application/xml',
        extension: 'graphml',
      };
    case 'citations':
      return {
        content: toCitationList(graph),
        contentType: 'text/plain',
        extension: 'txt',
      };
  }
}

/**
 * Node-link form that the compiler accepts back, with node keys as ids.
 */
export function toNodeLink(graph: ExportableGraph): Record<string, unknown> {
  return {
    graph: graph.metadata ?? {},
    nodes: graph.nodes.map((node) => ({
      id: node.key,
      function: node.function,
      namespace: node.namespace,
      name: node.name,
    })),
    links: graph.edges.map((edge) => ({
      source: edge.source,
      target: edge.target,
      relation: edge.relation,
      citation: edge.citation,
      evidence: edge.evidence,
      annotations: edge.annotations,
    })),
  };
}

function toSif(graph: GraphView): string {
  return joinLines(
    graph.edges.map((edge) => `${edge.source}\t${edge.relation}\t${edge.target}`),
  );
}

function toTsv(graph: GraphView): string {
  const header = 'source\trelation\ttarget\tcitation\tevidence';
  const rows = graph.edges.map((edge) =>
    [
      edge.source,
      edge.relation,
      edge.target,
      edge.citation ? citationKey(edge.citation) : '',
      sanitizeCell(edge.evidence ?? ''),
    ].join('\t'),
  );
  return joinLines([header, ...rows]);
}

function toCitationList(graph: GraphView): string {
  const keys = new Set<string>();
  for (const edge of graph.edges) {
    if (edge.citation) keys.add(citationKey(edge.citation));
  }
  return joinLines([...keys].sort());
}

function toGraphMl(graph: ExportableGraph): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<graphml xmlns="http://graphml.graphdrawing.org/xmlns">',
    '  <key id="function" for="node" attr.name="function" attr.type="string"/>',
    '  <key id="relation" for="edge" attr.name="relation" attr.type="string"/>',
    '  <key id="citation" for="edge" attr.name="citation" attr.type="string"/>',
    `  <graph id="${escapeXml(graph.metadata?.name ?? 'graph')}" edgedefault="directed">`,
  ];

  for (const node of graph.nodes) {
    lines.push(
      `    <node id="${escapeXml(node.key)}"><data key="function">${node.function}</data></node>`,
    );
  }

  graph.edges.forEach((edge: GraphEdge, index) => {
    const citation = edge.citation
      ? `<data key="citation">${escapeXml(citationKey(edge.citation))}</data>`
      : '';
    lines.push(
      `    <edge id="e${index}" source="${escapeXml(edge.source)}" target="${escapeXml(edge.target)}">` +
        `<data key="relation">${edge.relation}</data>${citation}</edge>`,
    );
  });

  lines.push('  </graph>', '</graphml>');
  return joinLines(lines);
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function sanitizeCell(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}

function joinLines(lines: string[]): string {
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
