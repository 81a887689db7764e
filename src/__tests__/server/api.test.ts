/**
 * HTTP API tests, driven in process through Hono's request helper
 */

import type { Hono } from 'hono';
import { bootstrap } from '../../agent/bootstrap.js';
import { NO_INFORMATION_ANSWER } from '../../agent/stages.js';
import { loadConfig } from '../../config/index.js';
import { MAX_QUESTION_LENGTH, createApi } from '../../server/api.js';
import type {
  AskResponse,
  ErrorResponse,
  HealthResponse,
  NodeDetailResponse,
  SearchResponse,
  StatsResponse,
  SubgraphResponse
} from '../../server/types.js';
import { FakeGenerator } from '../setup.js';

function postJson(app: Hono, path: string, body: string): Response | Promise<Response> {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body
  });
}

describe('bootstrap', () => {
  test('should wire the bundled seeds into a pipeline', () => {
    const { graph, recognizer, pipeline } = bootstrap(loadConfig({ GRAPHRAG_TRAVERSAL_DEPTH: '2' }), { generator: null });

    expect(graph.isSealed()).toBe(true);
    expect(graph.getStats().totalNodes).toBe(13);
    expect(recognizer.detect('Who leads NVIDIA?').map(e => e.name)).toEqual(['NVIDIA']);
    expect(pipeline.traversalDepth).toBe(2);
    expect(pipeline.generationAvailable).toBe(false);
  });

  test('should disable generation when no key is configured', () => {
    const { pipeline } = bootstrap(loadConfig({}));

    expect(pipeline.generationAvailable).toBe(false);
    expect(console.warn).toHaveBeenCalledWith('⚠️ GROQ_API_KEY not set. LLM features disabled.');
  });

  test('should fail fast on a missing seed file', () => {
    expect(() => bootstrap(loadConfig({ GRAPHRAG_SEED_PATH: 'data/does-not-exist.json' })))
      .toThrow('Seed file not found');
  });
});

describe('createApi', () => {
  let app: Hono;
  let generator: FakeGenerator;

  beforeEach(() => {
    generator = new FakeGenerator({ answer: 'Microsoft invested $13B in OpenAI.' });
    const { graph, pipeline } = bootstrap(loadConfig({}), { generator });
    app = createApi({ graph, pipeline });
  });

  describe('GET /api/health', () => {
    test('should report service status', async () => {
      const res = await app.request('/api/health');
      const body: HealthResponse = await res.json();

      expect(res.status).toBe(200);
      expect(body.status).toBe('healthy');
      expect(body.service).toBe('graph-rag-server');
      expect(body.generationAvailable).toBe(true);
      expect(body.traversalDepth).toBe(1);
      expect(body.errorStats).toEqual({});
    });

    test('should count generation failures', async () => {
      const { graph, pipeline } = bootstrap(loadConfig({}), {
        generator: new FakeGenerator({ error: new Error('connection refused') })
      });
      const failing = createApi({ graph, pipeline });

      await postJson(failing, '/api/ask', JSON.stringify({ question: 'Who leads NVIDIA?' }));
      await postJson(failing, '/api/ask', JSON.stringify({ question: 'Who leads OpenAI?' }));
      const res = await failing.request('/api/health');
      const body: HealthResponse = await res.json();

      expect(body.errorStats).toEqual({ 'generation:Failed to generate answer': 2 });
    });
  });

  describe('GET /api/stats', () => {
    test('should count nodes and edges', async () => {
      const res = await app.request('/api/stats');
      const body: StatsResponse = await res.json();

      expect(body).toEqual({ totalNodes: 13, totalEdges: 17, people: 5, organizations: 8 });
    });
  });

  describe('POST /api/ask', () => {
    test('should answer a grounded question', async () => {
      const res = await postJson(app, '/api/ask', JSON.stringify({
        question: 'What is the relationship between Microsoft and OpenAI?'
      }));
      const body: AskResponse = await res.json();

      expect(res.status).toBe(200);
      expect(body.answer).toBe('Microsoft invested $13B in OpenAI.');
      expect(body.matchedNodeIds).toEqual(['c4', 'c3']);
      expect(body.facts).toHaveLength(9);
      expect(body.context.startsWith('Information about: Microsoft, OpenAI\n')).toBe(true);
      expect(body.trace[0]).toEqual({ stage: 'detect', message: '🔍 STEP 1: Entity Detection' });
      expect(generator.prompts).toHaveLength(1);
    });

    test('should answer ungrounded questions with the fixed message', async () => {
      const res = await postJson(app, '/api/ask', JSON.stringify({ question: 'hello' }));
      const body: AskResponse = await res.json();

      expect(res.status).toBe(200);
      expect(body.answer).toBe(NO_INFORMATION_ANSWER);
      expect(body.entities).toEqual([]);
      expect(generator.prompts).toEqual([]);
    });

    test('should reject a missing question', async () => {
      const res = await postJson(app, '/api/ask', JSON.stringify({}));
      const body: ErrorResponse = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe('Question is required');
      expect(body.details).toEqual(['question: Question is required']);
    });

    test('should reject a non-string question', async () => {
      const res = await postJson(app, '/api/ask', JSON.stringify({ question: 42 }));
      const body: ErrorResponse = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe('Question must be a string');
    });

    test('should reject an overlong question with its own message', async () => {
      const res = await postJson(app, '/api/ask', JSON.stringify({ question: 'a'.repeat(MAX_QUESTION_LENGTH + 1) }));
      const body: ErrorResponse = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe('Question must be at most 2000 characters');
      expect(generator.prompts).toEqual([]);
    });

    test('should reject a body that is not an object', async () => {
      const res = await postJson(app, '/api/ask', JSON.stringify(['Who leads NVIDIA?']));
      const body: ErrorResponse = await res.json();

      expect(res.status).toBe(400);
      expect(body.details).toEqual(['(root): Request body must be a JSON object']);
    });

    test('should reject malformed JSON', async () => {
      const res = await postJson(app, '/api/ask', '{ "question": ');
      const body: ErrorResponse = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe('Request body must be valid JSON');
    });
  });

  describe('GET /api/search', () => {
    test('should find nodes by partial name', async () => {
      const res = await app.request('/api/search?q=musk');
      const body: SearchResponse = await res.json();

      expect(body.total).toBe(1);
      expect(body.results[0]?.id).toBe('p1');
      expect(body.results[0]?.node.name).toBe('Elon Musk');
    });

    test('should require a query', async () => {
      const res = await app.request('/api/search?q=');

      expect(res.status).toBe(400);
    });
  });

  describe('GET /api/nodes/:nodeId', () => {
    test('should return a node with its relationships', async () => {
      const res = await app.request('/api/nodes/p1');
      const body: NodeDetailResponse = await res.json();

      expect(res.status).toBe(200);
      expect(body.node.name).toBe('Elon Musk');
      expect(body.connections).toBe(5);
      expect(body.relationships.map(f => f.relation)).toEqual(['founded', 'founded', 'founded', 'leads', 'leads']);
    });

    test('should return 404 for an unknown node', async () => {
      const res = await app.request('/api/nodes/zz');
      const body: ErrorResponse = await res.json();

      expect(res.status).toBe(404);
      expect(body.error).toBe('Node not found');
    });
  });

  describe('GET /api/graph/subgraph/:nodeId', () => {
    test('should stay on the start node at depth 0', async () => {
      const res = await app.request('/api/graph/subgraph/p1?depth=0');
      const body: SubgraphResponse = await res.json();

      expect(res.status).toBe(200);
      expect(body.depth).toBe(0);
      expect(body.visitedNodes.map(node => node.id)).toEqual(['p1']);
      expect(body.facts).toHaveLength(5);
    });

    test('should use the pipeline depth by default', async () => {
      const res = await app.request('/api/graph/subgraph/c4');
      const body: SubgraphResponse = await res.json();

      expect(body.depth).toBe(1);
      expect(body.visitedNodes.map(node => node.id)).toEqual(['c4', 'c3', 'p3', 'c5']);
    });

    test.each(['abc', '9', '-1'])('should reject depth %s', async (depth) => {
      const res = await app.request(`/api/graph/subgraph/p1?depth=${depth}`);

      expect(res.status).toBe(400);
    });

    test('should return 404 for an unknown node', async () => {
      const res = await app.request('/api/graph/subgraph/zz?depth=1');

      expect(res.status).toBe(404);
    });
  });
});
