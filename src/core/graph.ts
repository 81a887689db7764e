/**
 * Core in-memory knowledge graph using adjacency lists
 *
 * Keeps a forward and a reverse adjacency list per node so both successor
 * and predecessor queries are a single map lookup. The graph is multi-
 * relational: parallel edges between the same ordered pair are kept as
 * separate entries.
 *
 * A graph is built once from seed data and then sealed. Stored nodes, edges
 * and their attribute maps are frozen copies, and sealing blocks further
 * writes, so one instance can be shared by concurrent pipeline runs.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AttributeValue,
  Fact,
  GraphEdge,
  GraphNode,
  GraphSeeds,
  GraphStats,
  RelationAttributes,
  RelationLabel
} from './types.js';
import { GraphConstructionError } from '../utils/error-handler.js';

/**
 * Read-only view of the graph used by traversal, retrieval and the API
 */
export interface GraphLike {
  getNode(nodeId: string): GraphNode | undefined;
  getOutgoingEdges(nodeId: string): GraphEdge[];
  getIncomingEdges(nodeId: string): GraphEdge[];
  successors(nodeId: string): string[];
  predecessors(nodeId: string): string[];
  relationshipsOf(nodeId: string): Fact[];
  findNodesByName(query: string): Array<{ id: string; node: GraphNode }>;
}

export class KnowledgeGraph implements GraphLike {
  private nodes: Map<string, GraphNode> = new Map();
  private adjacencyList: Map<string, GraphEdge[]> = new Map();
  private reverseAdjacencyList: Map<string, GraphEdge[]> = new Map();
  private edgeCount = 0;
  private sealed = false;

  /**
   * Add a node to the graph
   */
  addNode(node: GraphNode): string {
    this.assertWritable();

    if (this.nodes.has(node.id)) {
      throw new GraphConstructionError(`Duplicate node id ${node.id}`);
    }

    this.nodes.set(node.id, Object.freeze({ ...node, extra: Object.freeze({ ...node.extra }) }));
    this.adjacencyList.set(node.id, []);
    this.reverseAdjacencyList.set(node.id, []);

    return node.id;
  }

  /**
   * Add an edge between two existing nodes
   *
   * Both endpoints must already exist; a dangling endpoint means the seed
   * data is broken and the graph cannot be built.
   */
  addEdge(edge: Omit<GraphEdge, 'id'> & { id?: string }): string {
    this.assertWritable();

    if (!this.nodes.has(edge.source)) {
      throw new GraphConstructionError(`Source node ${edge.source} does not exist`);
    }
    if (!this.nodes.has(edge.target)) {
      throw new GraphConstructionError(`Target node ${edge.target} does not exist`);
    }

    const fullEdge: GraphEdge = Object.freeze({
      id: edge.id ?? uuidv4(),
      source: edge.source,
      target: edge.target,
      relation: edge.relation,
      attributes: Object.freeze({ ...edge.attributes, extra: Object.freeze({ ...edge.attributes.extra }) })
    });

    this.adjacencyList.get(edge.source)?.push(fullEdge);
    this.reverseAdjacencyList.get(edge.target)?.push(fullEdge);
    this.edgeCount++;

    return fullEdge.id;
  }

  /**
   * Stop accepting writes. Called once construction is complete.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  getNode(nodeId: string): GraphNode | undefined {
    return this.nodes.get(nodeId);
  }

  hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  getOutgoingEdges(nodeId: string): GraphEdge[] {
    return [...(this.adjacencyList.get(nodeId) ?? [])];
  }

  getIncomingEdges(nodeId: string): GraphEdge[] {
    return [...(this.reverseAdjacencyList.get(nodeId) ?? [])];
  }

  /**
   * Target ids of outgoing edges, one entry per edge
   */
  successors(nodeId: string): string[] {
    return (this.adjacencyList.get(nodeId) ?? []).map(edge => edge.target);
  }

  /**
   * Source ids of incoming edges, one entry per edge
   */
  predecessors(nodeId: string): string[] {
    return (this.reverseAdjacencyList.get(nodeId) ?? []).map(edge => edge.source);
  }

  /**
   * Find nodes by name using a case-insensitive mutual substring rule
   *
   * A node matches when the query is contained in its name or its name is
   * contained in the query, so "musk" finds "Elon Musk" and so does
   * "Elon Musk Jr". Results follow node insertion order.
   */
  findNodesByName(query: string): Array<{ id: string; node: GraphNode }> {
    const needle = query.toLowerCase();
    const matches: Array<{ id: string; node: GraphNode }> = [];

    for (const [id, node] of this.nodes) {
      const haystack = node.name.toLowerCase();
      if (haystack.includes(needle) || needle.includes(haystack)) {
        matches.push({ id, node });
      }
    }

    return matches;
  }

  /**
   * All relationships touching a node as facts
   *
   * Outgoing edges come first, then incoming ones. Every edge yields
   * exactly one fact; deduplication happens during traversal.
   */
  relationshipsOf(nodeId: string): Fact[] {
    const node = this.nodes.get(nodeId);
    if (!node) {
      return [];
    }

    const facts: Fact[] = [];

    for (const edge of this.adjacencyList.get(nodeId) ?? []) {
      facts.push(this.toFact(edge, 'outgoing', node.name, this.nameOf(edge.target)));
    }

    for (const edge of this.reverseAdjacencyList.get(nodeId) ?? []) {
      facts.push(this.toFact(edge, 'incoming', this.nameOf(edge.source), node.name));
    }

    return facts;
  }

  getAllNodes(): GraphNode[] {
    return Array.from(this.nodes.values());
  }

  /**
   * Get all edges in the graph
   * Flattens the adjacency list structure
   */
  getAllEdges(): GraphEdge[] {
    const allEdges: GraphEdge[] = [];
    for (const edges of this.adjacencyList.values()) {
      allEdges.push(...edges);
    }
    return allEdges;
  }

  getStats(): GraphStats {
    let people = 0;
    let organizations = 0;
    for (const node of this.nodes.values()) {
      if (node.kind === 'person') {
        people++;
      } else {
        organizations++;
      }
    }

    return {
      totalNodes: this.nodes.size,
      totalEdges: this.edgeCount,
      people,
      organizations
    };
  }

  private toFact(
    edge: GraphEdge,
    direction: Fact['direction'],
    sourceName: string,
    targetName: string
  ): Fact {
    return {
      direction,
      edgeId: edge.id,
      source: edge.source,
      sourceName,
      target: edge.target,
      targetName,
      relation: edge.relation,
      attributes: edge.attributes
    };
  }

  private nameOf(nodeId: string): string {
    return this.nodes.get(nodeId)?.name ?? nodeId;
  }

  private assertWritable(): void {
    if (this.sealed) {
      throw new Error('Knowledge graph is sealed and cannot be modified');
    }
  }
}

/**
 * Split a raw attribute map into the fixed relationship schema plus extras
 */
export function toRelationAttributes(raw: Record<string, AttributeValue>): RelationAttributes {
  const attributes: RelationAttributes = { extra: {} };

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'year' && typeof value !== 'boolean') {
      attributes.year = value;
    } else if (key === 'amount' && typeof value === 'string') {
      attributes.amount = value;
    } else if (key === 'role' && typeof value === 'string') {
      attributes.role = value;
    } else if (key === 'product' && typeof value === 'string') {
      attributes.product = value;
    } else if (key === 'type' && typeof value === 'string') {
      attributes.type = value;
    } else {
      attributes.extra[key] = value;
    }
  }

  return attributes;
}

/**
 * Build and seal a graph from seed collections
 *
 * @throws GraphConstructionError on duplicate node ids or dangling endpoints
 */
export function buildGraph(seeds: GraphSeeds): KnowledgeGraph {
  const graph = new KnowledgeGraph();

  for (const person of seeds.people) {
    graph.addNode({
      id: person.id,
      name: person.name,
      kind: 'person',
      role: person.role,
      extra: person.extra ?? {}
    });
  }

  for (const organization of seeds.organizations) {
    graph.addNode({
      id: organization.id,
      name: organization.name,
      kind: 'organization',
      industry: organization.industry,
      extra: organization.extra ?? {}
    });
  }

  const dangling: string[] = [];
  seeds.relationships.forEach((relationship, index) => {
    for (const endpoint of [relationship.source, relationship.target]) {
      if (!graph.hasNode(endpoint)) {
        dangling.push(`relationships[${index}] (${describeRelationship(relationship.source, relationship.relation, relationship.target)}) references unknown node ${endpoint}`);
      }
    }
  });

  if (dangling.length > 0) {
    throw new GraphConstructionError(
      `Seed data references ${dangling.length} nonexistent node id(s)`,
      dangling
    );
  }

  for (const relationship of seeds.relationships) {
    graph.addEdge({
      source: relationship.source,
      target: relationship.target,
      relation: relationship.relation,
      attributes: toRelationAttributes(relationship.attributes)
    });
  }

  return graph.seal();
}

function describeRelationship(source: string, relation: RelationLabel, target: string): string {
  return `${source} --[${relation}]--> ${target}`;
}
