import type { Citation, Edge, Network } from '@biocurate/database';
import type { CitationViewDto, EdgeViewDto, NetworkViewDto } from './dto';

export function toNetworkView(network: Network): NetworkViewDto {
  return {
    id: network.id,
    name: network.name,
    version: network.version,
    description: network.description,
    authors: network.authors,
    contact: network.contact,
    license: network.license,
    public: network.public,
    numberNodes: network.numberNodes,
    numberEdges: network.numberEdges,
    ownerId: network.ownerId,
    reportId: network.reportId,
    createdAt: network.createdAt.toISOString(),
  };
}

export function toCitationView(citation: Citation): CitationViewDto {
  return {
    id: citation.id,
    db: citation.db,
    reference: citation.reference,
    title: citation.title,
  };
}

/** `edge.citation` must be loaded when the edge has one */
export function toEdgeView(edge: Edge): EdgeViewDto {
  return {
    id: edge.id,
    networkId: edge.networkId,
    source: edge.sourceLabel,
    target: edge.targetLabel,
    relation: edge.relation,
    evidence: edge.evidence,
    annotations: edge.annotations,
    citation: edge.citation ? toCitationView(edge.citation) : null,
  };
}
