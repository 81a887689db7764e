/**
 * Stage functions of the question answering pipeline
 *
 * Each stage reads the current state and returns a partial update with its
 * own trace lines. Stages never mutate the state they are given; the
 * pipeline merges updates in order.
 */

import type { EntityMention, Fact, GraphNode, KnownRelation } from '../core/types.js';
import type { GraphLike } from '../core/graph.js';
import { GraphTraversal, dedupeFacts, type TraversalResult } from '../core/traversal.js';
import type { EntityRecognizer } from '../extraction/entity-recognizer.js';
import { analyzeQuestion } from '../extraction/intent.js';
import { NO_GROUNDING_CONTEXT, buildContext } from '../context/context-builder.js';
import { buildPrompt, generateWithTimeout, type AnswerGenerator } from './generator.js';
import { ErrorCategory, ErrorHandler } from '../utils/error-handler.js';

export enum PipelineStage {
  DETECT = 'detect',
  RETRIEVE = 'retrieve',
  TRAVERSE = 'traverse',
  BUILD_CONTEXT = 'build_context',
  GENERATE = 'generate',
  DONE = 'done'
}

export type ActiveStage = Exclude<PipelineStage, PipelineStage.DONE>;

export interface TraceEntry {
  stage: ActiveStage;
  message: string;
}

export interface MatchedNode {
  nodeId: string;
  node: GraphNode;
  /** Name of the mention that produced this match */
  matchedEntity: string;
}

/**
 * State threaded through one pipeline run
 */
export interface PipelineState {
  stage: PipelineStage;
  question: string;
  detectedEntities: EntityMention[];
  relationshipIntents: KnownRelation[];
  matchedNodes: MatchedNode[];
  traversalResults: TraversalResult[];
  facts: Fact[];
  context: string;
  answer: string;
  trace: TraceEntry[];
}

/**
 * What a stage may change. Trace lines are appended, never replaced.
 */
export type StageUpdate = Partial<Omit<PipelineState, 'stage' | 'question' | 'trace'>> & {
  trace: string[];
};

export interface StageDependencies {
  graph: GraphLike;
  recognizer: EntityRecognizer;
  traversal: GraphTraversal;
  generator: AnswerGenerator | null;
  traversalDepth: number;
  generationTimeoutMs: number;
}

export const NO_INFORMATION_ANSWER =
  "I couldn't find any relevant information in the knowledge graph to answer your question.";

const MAX_TRACED_FACTS = 5;
const MAX_CONTEXT_PREVIEW_LINES = 8;

export function detectEntities(state: PipelineState, deps: StageDependencies): StageUpdate {
  const analysis = analyzeQuestion(state.question, deps.recognizer);
  const entities = analysis.detectedEntities;

  const trace = [
    '🔍 STEP 1: Entity Detection',
    `   Question: ${state.question}`,
    `   Detected ${entities.length} entities:`
  ];
  for (const entity of entities) {
    trace.push(`   - ${entity.name} (${entity.kind})`);
  }
  if (entities.length === 0) {
    trace.push('   ⚠️  No entities detected');
  }
  if (analysis.relationshipIntents.length > 0) {
    trace.push(`   Relationship intents: ${analysis.relationshipIntents.join(', ')}`);
  }

  return {
    detectedEntities: entities,
    relationshipIntents: analysis.relationshipIntents,
    trace
  };
}

export function retrieveNodes(state: PipelineState, deps: StageDependencies): StageUpdate {
  const matchedNodes: MatchedNode[] = [];
  const trace = ['📊 STEP 2: Node Retrieval'];

  for (const entity of state.detectedEntities) {
    for (const { id, node } of deps.graph.findNodesByName(entity.name)) {
      matchedNodes.push({ nodeId: id, node, matchedEntity: entity.name });
      trace.push(`   Found: ${node.name} (ID: ${id})`);
    }
  }

  if (matchedNodes.length === 0) {
    trace.push('   ⚠️  No matching nodes found in graph');
  } else {
    trace.push(`   Total nodes matched: ${matchedNodes.length}`);
  }

  return { matchedNodes, trace };
}

export function traverseRelationships(state: PipelineState, deps: StageDependencies): StageUpdate {
  const traversalResults: TraversalResult[] = [];
  const trace = [`🔗 STEP 3: Graph Traversal (depth ${deps.traversalDepth})`];

  for (const matched of state.matchedNodes) {
    const result = deps.traversal.traverse(matched.nodeId, deps.traversalDepth);
    traversalResults.push(result);

    trace.push(`   Traversing from: ${matched.node.name}`);
    trace.push(`   - Visited ${result.visitedNodeIds.length} nodes`);
    trace.push(`   - Found ${result.facts.length} relationships`);
    for (const fact of result.facts.slice(0, MAX_TRACED_FACTS)) {
      trace.push(`     → ${fact.sourceName} --[${fact.relation}]--> ${fact.targetName}`);
    }
  }

  return { traversalResults, trace };
}

export function buildContextStage(state: PipelineState): StageUpdate {
  // Two start nodes can rediscover the same edge
  const facts = dedupeFacts(state.traversalResults.flatMap(result => result.facts));
  const context = buildContext(facts, state.detectedEntities);

  const trace = [
    '📝 STEP 4: Context Building',
    `   Unique facts collected: ${facts.length}`,
    '   Context preview:'
  ];
  for (const line of context.split('\n').slice(0, MAX_CONTEXT_PREVIEW_LINES)) {
    trace.push(`   | ${line}`);
  }

  return { facts, context, trace };
}

export async function generateAnswer(state: PipelineState, deps: StageDependencies): Promise<StageUpdate> {
  const { context, question } = state;
  const trace = ['🤖 STEP 5: Answer Generation'];

  if (context === NO_GROUNDING_CONTEXT) {
    trace.push('   No context available, skipping LLM');
    return { answer: NO_INFORMATION_ANSWER, trace };
  }

  if (!deps.generator) {
    trace.push('   ⚠️  LLM not available (missing API key or package)');
    return {
      answer: `[LLM not available - showing raw context]\n\n${context}\n\nSet GROQ_API_KEY environment variable to enable LLM responses.`,
      trace
    };
  }

  const generator = deps.generator;
  const result = await ErrorHandler.wrapOperation(
    () => generateWithTimeout(generator, buildPrompt(context, question), deps.generationTimeoutMs),
    ErrorCategory.GENERATION,
    'generate answer',
    { generator: generator.name, timeoutMs: deps.generationTimeoutMs },
    'Showing raw context instead'
  );

  if (result.success) {
    trace.push(`   ✅ LLM response generated successfully (${generator.name})`);
    return { answer: result.data, trace };
  }

  const reason = result.error.originalError?.message ?? result.error.message;
  trace.push(`   ❌ LLM error: ${reason}`);
  return {
    answer: `Error generating response: ${reason}\n\nRaw context:\n${context}`,
    trace
  };
}
