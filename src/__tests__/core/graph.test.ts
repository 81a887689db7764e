/**
 * Unit tests for the knowledge graph store
 *
 * Tests construction from seeds, name lookup, relationship facts,
 * sealing and statistics.
 */

import { KnowledgeGraph, buildGraph, toRelationAttributes } from '../../core/graph.js';
import { loadSeedFile } from '../../storage/seed.js';
import { GraphConstructionError } from '../../utils/error-handler.js';
import { TestHelpers } from '../setup.js';

describe('KnowledgeGraph', () => {
  describe('buildGraph', () => {
    test('should build and seal a graph from seeds', () => {
      const graph = buildGraph(TestHelpers.createSmallSeeds());

      expect(graph.isSealed()).toBe(true);
      expect(graph.getNode('a')).toEqual({
        id: 'a',
        name: 'Alice Smith',
        kind: 'person',
        role: 'Engineer',
        extra: {}
      });
      expect(graph.getNode('org')?.kind).toBe('organization');
      expect(graph.getAllEdges()).toHaveLength(4);
    });

    test('should reject relationships with dangling endpoints', () => {
      const seeds = TestHelpers.createSmallSeeds();
      seeds.relationships.push({ source: 'a', target: 'zz', relation: 'knows', attributes: {} });

      expect(() => buildGraph(seeds)).toThrow(GraphConstructionError);

      try {
        buildGraph(seeds);
      } catch (error) {
        expect(error).toBeInstanceOf(GraphConstructionError);
        if (error instanceof GraphConstructionError) {
          expect(error.details).toEqual(['relationships[4] (a --[knows]--> zz) references unknown node zz']);
        }
      }
    });

    test('should reject duplicate node ids', () => {
      const seeds = TestHelpers.createSmallSeeds();
      seeds.organizations.push({ id: 'a', name: 'Another' });

      expect(() => buildGraph(seeds)).toThrow('Duplicate node id a');
    });

    test('should keep parallel edges between the same pair', () => {
      const graph = buildGraph(loadSeedFile());

      const relations = graph.getOutgoingEdges('c4')
        .filter(edge => edge.target === 'c3')
        .map(edge => edge.relation);

      expect(relations).toEqual(['invested_in', 'partners_with']);
    });

    test('should refuse writes once sealed', () => {
      const graph = buildGraph(TestHelpers.createSmallSeeds());

      expect(() => graph.addNode({ id: 'x', name: 'X', kind: 'organization', extra: {} }))
        .toThrow('Knowledge graph is sealed and cannot be modified');
    });

    test('should not let returned nodes change the stored graph', () => {
      const graph = buildGraph(loadSeedFile());
      const node = graph.getNode('p1');
      const [match] = graph.findNodesByName('musk');

      expect(node && Reflect.set(node, 'name', 'Someone Else')).toBe(false);
      expect(node && Reflect.set(node.extra, 'nickname', 'x')).toBe(false);
      expect(match && Reflect.set(match.node, 'name', 'Someone Else')).toBe(false);
      expect(graph.getNode('p1')?.name).toBe('Elon Musk');
      expect(graph.getNode('p1')?.extra).toEqual({});
    });

    test('should not let fact or edge attributes change the stored graph', () => {
      const graph = buildGraph(loadSeedFile());
      const [fact] = graph.relationshipsOf('p1');
      const [edge] = graph.getOutgoingEdges('p1');

      expect(fact && Reflect.set(fact.attributes, 'year', 1999)).toBe(false);
      expect(fact && Reflect.set(fact.attributes.extra, 'note', 'x')).toBe(false);
      expect(edge && Reflect.set(edge, 'target', 'c3')).toBe(false);
      expect(graph.relationshipsOf('p1')[0]?.attributes).toEqual({ year: 2003, extra: {} });
      expect(graph.successors('p1')[0]).toBe('c1');
    });

    test('should copy node input rather than keep the caller object', () => {
      const graph = new KnowledgeGraph();
      const input = { id: 'n', name: 'Loop Corp', kind: 'organization' as const, extra: {} };
      graph.addNode(input);

      input.name = 'Renamed';

      expect(graph.getNode('n')?.name).toBe('Loop Corp');
    });
  });

  describe('toRelationAttributes', () => {
    test('should split known attributes from extras', () => {
      expect(toRelationAttributes({ year: 2003, amount: '$1B', type: 'strategic', note: 'test' })).toEqual({
        year: 2003,
        amount: '$1B',
        type: 'strategic',
        extra: { note: 'test' }
      });
    });

    test('should move mistyped known attributes to extras', () => {
      expect(toRelationAttributes({ amount: 5, year: true })).toEqual({
        extra: { amount: 5, year: true }
      });
    });
  });

  describe('findNodesByName', () => {
    let graph: KnowledgeGraph;

    beforeEach(() => {
      graph = buildGraph(loadSeedFile());
    });

    test('should match a query contained in a node name', () => {
      expect(graph.findNodesByName('musk').map(match => match.id)).toEqual(['p1']);
    });

    test('should match a node name contained in a longer query', () => {
      expect(graph.findNodesByName('Elon Musk Jr').map(match => match.id)).toEqual(['p1']);
    });

    test('should be case-insensitive', () => {
      expect(graph.findNodesByName('OPENAI').map(match => match.id)).toEqual(['c3']);
    });

    test('should apply the substring rule literally to short queries', () => {
      expect(graph.findNodesByName('x').map(match => match.id)).toEqual(['c2']);
      expect(graph.findNodesByName('')).toHaveLength(13);
    });

    test('should return an empty list when nothing matches', () => {
      expect(graph.findNodesByName('Anthropic Labs')).toEqual([]);
    });
  });

  describe('relationshipsOf', () => {
    let graph: KnowledgeGraph;

    beforeEach(() => {
      graph = buildGraph(loadSeedFile());
    });

    test('should return outgoing edges before incoming edges', () => {
      const facts = graph.relationshipsOf('c4');

      expect(facts.map(f => [f.direction, f.source, f.relation, f.target])).toEqual([
        ['outgoing', 'c4', 'invested_in', 'c3'],
        ['outgoing', 'c4', 'partners_with', 'c3'],
        ['incoming', 'p3', 'leads', 'c4'],
        ['incoming', 'c5', 'partners_with', 'c4']
      ]);
    });

    test('should resolve names on both ends', () => {
      const [fact] = graph.relationshipsOf('c4');

      expect(fact?.sourceName).toBe('Microsoft');
      expect(fact?.targetName).toBe('OpenAI');
      expect(fact?.attributes).toEqual({ amount: '$13B', year: 2023, extra: {} });
    });

    test('should produce one fact per touching edge', () => {
      for (const node of graph.getAllNodes()) {
        const expected = graph.getOutgoingEdges(node.id).length + graph.getIncomingEdges(node.id).length;
        expect(graph.relationshipsOf(node.id)).toHaveLength(expected);
      }
    });

    test('should tag a self-loop once in each direction', () => {
      const graph = new KnowledgeGraph();
      graph.addNode({ id: 'n', name: 'Loop Corp', kind: 'organization', extra: {} });
      graph.addEdge({ source: 'n', target: 'n', relation: 'acquired', attributes: { extra: {} } });

      expect(graph.relationshipsOf('n').map(f => f.direction)).toEqual(['outgoing', 'incoming']);
    });

    test('should return an empty list for unknown nodes', () => {
      expect(graph.relationshipsOf('missing')).toEqual([]);
    });
  });

  describe('neighbors and stats', () => {
    test('should list successors and predecessors per edge', () => {
      const graph = buildGraph(loadSeedFile());

      expect(graph.successors('p1')).toEqual(['c1', 'c2', 'c8', 'c1', 'c2']);
      expect(graph.predecessors('c6')).toEqual(['p5', 'p5', 'c7']);
    });

    test('should count nodes by kind', () => {
      const graph = buildGraph(loadSeedFile());

      expect(graph.getStats()).toEqual({
        totalNodes: 13,
        totalEdges: 17,
        people: 5,
        organizations: 8
      });
    });
  });
});
