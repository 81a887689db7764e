/**
 * Hono HTTP API for the question answering pipeline
 *
 * Exposes question answering plus read-only views of the knowledge graph.
 * The app is built by a factory so tests can drive it in process with
 * `app.request()`.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import type { KnowledgeGraph } from '../core/graph.js';
import { GraphTraversal } from '../core/traversal.js';
import type { GraphNode } from '../core/types.js';
import type { GraphRagPipeline } from '../agent/pipeline.js';
import { ErrorHandler } from '../utils/error-handler.js';
import type {
  AskRequest,
  AskResponse,
  ErrorResponse,
  HealthResponse,
  NodeDetailResponse,
  SearchResponse,
  StatsResponse,
  SubgraphResponse
} from './types.js';

export interface ApiDependencies {
  graph: KnowledgeGraph;
  pipeline: GraphRagPipeline;
  /** Origins allowed by CORS */
  allowedOrigins?: string[];
}

export const MAX_QUESTION_LENGTH = 2000;

const askRequestSchema = z.object({
  question: z
    .string({ required_error: 'Question is required', invalid_type_error: 'Question must be a string' })
    .max(MAX_QUESTION_LENGTH, { message: `Question must be at most ${MAX_QUESTION_LENGTH} characters` })
}, { invalid_type_error: 'Request body must be a JSON object' }) satisfies z.ZodType<AskRequest>;

const depthSchema = z.coerce.number().int().min(0).max(5);

export function createApi(deps: ApiDependencies): Hono {
  const { graph, pipeline } = deps;
  const traversal = new GraphTraversal(graph);
  const app = new Hono();

  app.use('/*', cors({
    origin: deps.allowedOrigins ?? ['http://localhost:5173', 'http://localhost:3000', 'http://127.0.0.1:5173'],
    allowHeaders: ['Content-Type', 'Authorization'],
    allowMethods: ['GET', 'POST', 'OPTIONS']
  }));

  /**
   * GET /api/health
   */
  app.get('/api/health', (c) => {
    const body: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'graph-rag-server',
      generationAvailable: pipeline.generationAvailable,
      traversalDepth: pipeline.traversalDepth,
      errorStats: ErrorHandler.getErrorStats()
    };
    return c.json(body);
  });

  /**
   * GET /api/stats
   */
  app.get('/api/stats', (c) => {
    const body: StatsResponse = graph.getStats();
    return c.json(body);
  });

  /**
   * POST /api/ask
   * Run the full pipeline for one question
   */
  app.post('/api/ask', async (c) => {
    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch {
      const body: ErrorResponse = { error: 'Request body must be valid JSON' };
      return c.json(body, 400);
    }

    const parsed = askRequestSchema.safeParse(payload);
    if (!parsed.success) {
      const body: ErrorResponse = {
        error: parsed.error.issues[0]?.message ?? 'Invalid request body',
        details: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      };
      return c.json(body, 400);
    }

    try {
      const state = await pipeline.run(parsed.data.question);
      const body: AskResponse = {
        question: state.question,
        answer: state.answer,
        context: state.context,
        entities: state.detectedEntities,
        relationshipIntents: state.relationshipIntents,
        matchedNodeIds: state.matchedNodes.map(match => match.nodeId),
        facts: state.facts,
        trace: state.trace
      };
      return c.json(body);
    } catch (error) {
      console.error('Error answering question:', error);
      const body: ErrorResponse = { error: 'Failed to answer question' };
      return c.json(body, 500);
    }
  });

  /**
   * GET /api/search?q=
   * Name lookup with the mutual substring rule
   */
  app.get('/api/search', (c) => {
    const query = c.req.query('q') ?? '';
    if (!query.trim()) {
      const body: ErrorResponse = { error: 'Search query is required' };
      return c.json(body, 400);
    }

    const results = graph.findNodesByName(query);
    const body: SearchResponse = { query, results, total: results.length };
    return c.json(body);
  });

  /**
   * GET /api/nodes/:nodeId
   */
  app.get('/api/nodes/:nodeId', (c) => {
    const nodeId = c.req.param('nodeId');
    const node = graph.getNode(nodeId);

    if (!node) {
      const body: ErrorResponse = { error: 'Node not found' };
      return c.json(body, 404);
    }

    const relationships = graph.relationshipsOf(nodeId);
    const body: NodeDetailResponse = {
      node,
      connections: relationships.length,
      relationships
    };
    return c.json(body);
  });

  /**
   * GET /api/graph/subgraph/:nodeId?depth=
   * Facts reachable from a node within the given depth
   */
  app.get('/api/graph/subgraph/:nodeId', (c) => {
    const nodeId = c.req.param('nodeId');
    if (!graph.getNode(nodeId)) {
      const body: ErrorResponse = { error: 'Node not found' };
      return c.json(body, 404);
    }

    const depth = depthSchema.safeParse(c.req.query('depth') ?? String(pipeline.traversalDepth));
    if (!depth.success) {
      const body: ErrorResponse = { error: 'Depth must be an integer between 0 and 5' };
      return c.json(body, 400);
    }

    const result = traversal.traverse(nodeId, depth.data);
    const visitedNodes = result.visitedNodeIds
      .map(id => graph.getNode(id))
      .filter((node): node is GraphNode => node !== undefined);

    const body: SubgraphResponse = {
      startNode: nodeId,
      depth: depth.data,
      visitedNodes,
      facts: result.facts
    };
    return c.json(body);
  });

  return app;
}
