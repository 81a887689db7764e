/**
 * Bounded breadth-first traversal for fact collection
 *
 * Walks outward from a start node in both edge directions, collecting every
 * relationship of each visited node as a fact. The visited set keeps cyclic,
 * multi-relational graphs from looping.
 *
 * Time Complexity: O(V + E) within the depth bound
 */

import type { Fact } from './types.js';
import type { GraphLike } from './graph.js';

/**
 * Result of a traversal from one start node
 */
export interface TraversalResult {
  startNodeId: string;
  /** Visited node ids in visit order */
  visitedNodeIds: string[];
  /** Deduplicated facts in first-seen order */
  facts: Fact[];
}

export const DEFAULT_TRAVERSAL_DEPTH = 1;

/**
 * Key identifying a fact regardless of which end it was discovered from
 */
export function factKey(fact: Pick<Fact, 'source' | 'target' | 'relation'>): string {
  return `${fact.source}\u0000${fact.target}\u0000${fact.relation}`;
}

/**
 * Drop facts whose (source, target, relation) key was already seen
 */
export function dedupeFacts(facts: readonly Fact[]): Fact[] {
  const seen = new Set<string>();
  const unique: Fact[] = [];

  for (const fact of facts) {
    const key = factKey(fact);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(fact);
    }
  }

  return unique;
}

export class GraphTraversal {
  private graph: GraphLike;

  constructor(graph: GraphLike) {
    this.graph = graph;
  }

  /**
   * Breadth-first traversal from a start node
   *
   * A node popped at depth d contributes all of its relationships before the
   * depth limit is consulted; its neighbors are queued at d + 1 only while
   * d < maxDepth. Depth 0 therefore yields just the start node's own facts.
   */
  traverse(startNodeId: string, maxDepth: number = DEFAULT_TRAVERSAL_DEPTH): TraversalResult {
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new RangeError(`Traversal depth must be a non-negative integer, got ${maxDepth}`);
    }

    if (!this.graph.getNode(startNodeId)) {
      throw new Error(`Start node ${startNodeId} does not exist`);
    }

    const visited = new Set<string>();
    const queue: Array<{ nodeId: string; depth: number }> = [{ nodeId: startNodeId, depth: 0 }];
    const facts: Fact[] = [];

    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      const { nodeId, depth } = next;

      if (visited.has(nodeId)) {
        continue;
      }
      visited.add(nodeId);

      facts.push(...this.graph.relationshipsOf(nodeId));

      if (depth < maxDepth) {
        const neighbors = [...this.graph.successors(nodeId), ...this.graph.predecessors(nodeId)];
        for (const neighborId of neighbors) {
          if (!visited.has(neighborId)) {
            queue.push({ nodeId: neighborId, depth: depth + 1 });
          }
        }
      }
    }

    return {
      startNodeId,
      visitedNodeIds: Array.from(visited),
      facts: dedupeFacts(facts)
    };
  }
}
