/**
 * Request and response types for the HTTP API
 */

import type { EntityMention, Fact, GraphNode, GraphStats, KnownRelation } from '../core/types.js';
import type { TraceEntry } from '../agent/stages.js';

export interface AskRequest {
  question: string;
}

export interface AskResponse {
  question: string;
  answer: string;
  context: string;
  entities: EntityMention[];
  relationshipIntents: KnownRelation[];
  matchedNodeIds: string[];
  facts: Fact[];
  trace: TraceEntry[];
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  service: string;
  generationAvailable: boolean;
  traversalDepth: number;
  /** Handled error counts keyed by `category:message` */
  errorStats: Record<string, number>;
}

export type StatsResponse = GraphStats;

export interface SearchResponse {
  query: string;
  results: Array<{ id: string; node: GraphNode }>;
  total: number;
}

export interface NodeDetailResponse {
  node: GraphNode;
  connections: number;
  relationships: Fact[];
}

export interface SubgraphResponse {
  startNode: string;
  depth: number;
  visitedNodes: GraphNode[];
  facts: Fact[];
}

export interface ErrorResponse {
  error: string;
  details?: string[];
}
