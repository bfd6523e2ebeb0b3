import type { GraphView } from '../graph.types';
import { makeEdge, makeNode } from '../graph.utils';
import { runQuery } from './query-runner';

describe('runQuery', () => {
  const app = makeNode('Protein', 'HGNC', 'APP');
  const bace1 = makeNode('Protein', 'HGNC', 'BACE1');
  const psen1 = makeNode('Protein', 'HGNC', 'PSEN1');
  const plaque = makeNode('Pathology', 'MESH', 'Plaque');
  const orphan = makeNode('Abundance', 'CHEBI', 'zinc');

  const universe: GraphView = {
    nodes: [app, bace1, psen1, plaque, orphan],
    edges: [
      makeEdge(bace1.key, 'increases', app.key, { db: 'PubMed', reference: '1', title: null }),
      makeEdge(psen1.key, 'increases', app.key, { db: 'PubMed', reference: '2', title: null }),
      makeEdge(app.key, 'association', plaque.key, { db: 'PubMed', reference: '3', title: null }),
    ],
  };

  const keysOf = (view: GraphView) => view.nodes.map((node) => node.key);

  it('should return the whole universe without seeding', () => {
    expect(runQuery(universe, [], [])).toBe(universe);
  });

  it('should induce the subgraph over the named nodes', () => {
    const result = runQuery(universe, [{ type: 'induction', data: ['app', 'BACE1'] }], []);

    expect(keysOf(result)).toEqual(['p(HGNC:APP)', 'p(HGNC:BACE1)']);
    expect(result.edges).toHaveLength(1);
    expect(result.edges[0].source).toBe('p(HGNC:BACE1)');
  });

  it('should pull in first neighbours', () => {
    const result = runQuery(universe, [{ type: 'neighbors', data: ['path(MESH:Plaque)'] }], []);

    expect(keysOf(result)).toEqual(['p(HGNC:APP)', 'path(MESH:Plaque)']);
    expect(result.edges.map((edge) => edge.relation)).toEqual(['association']);
  });

  it('should seed by citation reference', () => {
    const result = runQuery(universe, [{ type: 'citation', data: ['PubMed:2'] }], []);

    expect(keysOf(result)).toEqual(['p(HGNC:APP)', 'p(HGNC:PSEN1)']);
  });

  it('should union several seeds', () => {
    const result = runQuery(
      universe,
      [
        { type: 'citation', data: ['1'] },
        { type: 'citation', data: ['2'] },
      ],
      [],
    );

    expect(result.edges).toHaveLength(2);
    expect(result.nodes).toHaveLength(3);
  });

  it('should apply pipeline steps in order', () => {
    const result = runQuery(
      universe,
      [],
      [{ function: 'removeAssociations' }, { function: 'removeIsolatedNodes' }],
    );

    expect(keysOf(result)).toEqual(['p(HGNC:APP)', 'p(HGNC:BACE1)', 'p(HGNC:PSEN1)']);
    expect(result.edges).toHaveLength(2);
  });

  it('should expand a seed back into the universe', () => {
    const result = runQuery(
      universe,
      [{ type: 'induction', data: ['PSEN1'] }],
      [{ function: 'expandNeighbors' }],
    );

    expect(keysOf(result)).toEqual(['p(HGNC:PSEN1)', 'p(HGNC:APP)']);
    expect(result.edges).toHaveLength(1);
  });

  it('should infer gene and RNA origins in the pipeline', () => {
    const result = runQuery(
      universe,
      [{ type: 'induction', data: ['APP'] }],
      [{ function: 'inferCentralDogma' }],
    );

    expect(keysOf(result)).toEqual(['p(HGNC:APP)', 'r(HGNC:APP)', 'g(HGNC:APP)']);
    expect(result.edges.map((edge) => edge.relation)).toEqual([
      'transcribedTo',
      'translatedTo',
    ]);
  });
});
