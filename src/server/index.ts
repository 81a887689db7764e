/**
 * Main server entry point
 *
 * Loads configuration, builds the knowledge graph once and serves the
 * pipeline over HTTP. A graph that cannot be built aborts startup.
 */

import { serve } from '@hono/node-server';
import { loadConfig } from '../config/index.js';
import { bootstrap } from '../agent/bootstrap.js';
import { createApi } from './api.js';
import {
  ErrorCategory,
  ErrorHandler,
  ErrorSeverity,
  GraphConstructionError,
  toError
} from '../utils/error-handler.js';

function main(): void {
  const config = loadConfig();

  console.log(`🧠 Starting Graph RAG Server...`);
  console.log(`🌱 Building knowledge graph from ${config.seedPath}`);

  const { graph, pipeline } = bootstrap(config);
  const stats = graph.getStats();
  console.log(`📊 Knowledge graph ready: ${stats.totalNodes} nodes (${stats.people} people, ${stats.organizations} organizations), ${stats.totalEdges} edges`);
  console.log(`🤖 Answer generation ${pipeline.generationAvailable ? `enabled (${config.model})` : 'disabled'}`);

  const app = createApi({ graph, pipeline });

  console.log(`🔗 API endpoints:`);
  console.log(`   GET  /api/health - Health check`);
  console.log(`   GET  /api/stats - Graph statistics`);
  console.log(`   POST /api/ask - Answer a question`);
  console.log(`   GET  /api/search - Find nodes by name`);
  console.log(`   GET  /api/nodes/:nodeId - Node details`);
  console.log(`   GET  /api/graph/subgraph/:nodeId - Facts around a node`);

  serve({
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host
  }, (info) => {
    console.log(`✅ Graph RAG Server is running on http://${info.address}:${info.port}`);
  });
}

try {
  main();
} catch (error) {
  const err = toError(error);
  ErrorHandler.handle(
    err instanceof GraphConstructionError ? ErrorCategory.CONSTRUCTION : ErrorCategory.CONFIGURATION,
    ErrorSeverity.CRITICAL,
    'Failed to start Graph RAG Server',
    err,
    err instanceof GraphConstructionError ? { details: err.details } : undefined
  );
  process.exit(1);
}

process.on('SIGINT', () => {
  console.log('\n🛑 Shutting down Graph RAG Server...');
  process.exit(0);
});

process.on('SIGTERM', () => {
  console.log('\n🛑 Shutting down Graph RAG Server...');
  process.exit(0);
});
