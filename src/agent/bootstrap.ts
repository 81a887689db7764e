/**
 * Process-level wiring: seed files → graph, catalog → recognizer,
 * configuration → generator, all handed to one pipeline.
 */

import { buildGraph, type KnowledgeGraph } from '../core/graph.js';
import { EntityRecognizer } from '../extraction/entity-recognizer.js';
import { loadEntityCatalog, loadSeedFile } from '../storage/seed.js';
import type { GraphRagConfig } from '../config/index.js';
import { createAnswerGenerator, type AnswerGenerator } from './generator.js';
import { GraphRagPipeline } from './pipeline.js';

export interface BootstrapResult {
  graph: KnowledgeGraph;
  recognizer: EntityRecognizer;
  pipeline: GraphRagPipeline;
}

/**
 * Build everything a process needs to answer questions
 *
 * Graph construction errors propagate: they are fatal at startup.
 * Pass `generator` to override the configured one (null disables it).
 */
export function bootstrap(
  config: GraphRagConfig,
  overrides: { generator?: AnswerGenerator | null } = {}
): BootstrapResult {
  const graph = buildGraph(loadSeedFile(config.seedPath));
  const recognizer = new EntityRecognizer(loadEntityCatalog(config.catalogPath));

  const generator = overrides.generator !== undefined
    ? overrides.generator
    : createAnswerGenerator(config).generator;

  const pipeline = new GraphRagPipeline({
    graph,
    recognizer,
    generator,
    traversalDepth: config.traversalDepth,
    generationTimeoutMs: config.generationTimeoutMs
  });

  return { graph, recognizer, pipeline };
}
