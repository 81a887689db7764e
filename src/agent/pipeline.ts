/**
 * Question answering pipeline
 *
 * A closed, linear state machine:
 *
 *   detect → retrieve → traverse → build_context → generate → done
 *
 * Every run starts from a fresh state. The sealed graph is the only object
 * shared between runs, so concurrent questions need no locking. The one
 * content-based branch lives inside the generate stage: a context equal to
 * the no-grounding sentinel short-circuits to a fixed answer.
 */

import type { GraphLike } from '../core/graph.js';
import { DEFAULT_TRAVERSAL_DEPTH, GraphTraversal } from '../core/traversal.js';
import type { EntityRecognizer } from '../extraction/entity-recognizer.js';
import { DEFAULT_GENERATION_TIMEOUT_MS } from '../config/index.js';
import type { AnswerGenerator } from './generator.js';
import {
  PipelineStage,
  buildContextStage,
  detectEntities,
  generateAnswer,
  retrieveNodes,
  traverseRelationships,
  type ActiveStage,
  type PipelineState,
  type StageDependencies,
  type StageUpdate
} from './stages.js';

export interface PipelineOptions {
  graph: GraphLike;
  recognizer: EntityRecognizer;
  /** Generator for the final stage; null disables live generation */
  generator?: AnswerGenerator | null;
  traversalDepth?: number;
  generationTimeoutMs?: number;
}

type StageHandler = (state: PipelineState, deps: StageDependencies) => StageUpdate | Promise<StageUpdate>;

const STAGE_HANDLERS: Record<ActiveStage, StageHandler> = {
  [PipelineStage.DETECT]: detectEntities,
  [PipelineStage.RETRIEVE]: retrieveNodes,
  [PipelineStage.TRAVERSE]: traverseRelationships,
  [PipelineStage.BUILD_CONTEXT]: buildContextStage,
  [PipelineStage.GENERATE]: generateAnswer
};

const NEXT_STAGE: Record<ActiveStage, PipelineStage> = {
  [PipelineStage.DETECT]: PipelineStage.RETRIEVE,
  [PipelineStage.RETRIEVE]: PipelineStage.TRAVERSE,
  [PipelineStage.TRAVERSE]: PipelineStage.BUILD_CONTEXT,
  [PipelineStage.BUILD_CONTEXT]: PipelineStage.GENERATE,
  [PipelineStage.GENERATE]: PipelineStage.DONE
};

export function createInitialState(question: string): PipelineState {
  return {
    stage: PipelineStage.DETECT,
    question,
    detectedEntities: [],
    relationshipIntents: [],
    matchedNodes: [],
    traversalResults: [],
    facts: [],
    context: '',
    answer: '',
    trace: []
  };
}

/**
 * Apply a stage's update and advance to the next stage
 */
export function mergeState(state: PipelineState, stage: ActiveStage, update: StageUpdate): PipelineState {
  const { trace, ...changes } = update;
  return {
    ...state,
    ...changes,
    stage: NEXT_STAGE[stage],
    trace: [...state.trace, ...trace.map(message => ({ stage, message }))]
  };
}

/**
 * Render the trace for display, blank line between stages
 */
export function formatTrace(state: PipelineState): string {
  const lines: string[] = [];
  let previous: ActiveStage | undefined;
  for (const entry of state.trace) {
    if (previous !== undefined && entry.stage !== previous) {
      lines.push('');
    }
    lines.push(entry.message);
    previous = entry.stage;
  }
  return lines.join('\n');
}

export class GraphRagPipeline {
  readonly generationAvailable: boolean;
  private deps: StageDependencies;

  constructor(options: PipelineOptions) {
    const generator = options.generator ?? null;
    this.generationAvailable = generator !== null;
    this.deps = {
      graph: options.graph,
      recognizer: options.recognizer,
      traversal: new GraphTraversal(options.graph),
      generator,
      traversalDepth: options.traversalDepth ?? DEFAULT_TRAVERSAL_DEPTH,
      generationTimeoutMs: options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS
    };

    if (!Number.isInteger(this.deps.traversalDepth) || this.deps.traversalDepth < 0) {
      throw new RangeError(`Traversal depth must be a non-negative integer, got ${this.deps.traversalDepth}`);
    }
  }

  get traversalDepth(): number {
    return this.deps.traversalDepth;
  }

  /**
   * Answer one question. Recoverable conditions never throw; the returned
   * state always carries an answer.
   */
  async run(question: string): Promise<PipelineState> {
    let state = createInitialState(question);
    let stage = state.stage;

    while (stage !== PipelineStage.DONE) {
      const update = await STAGE_HANDLERS[stage](state, this.deps);
      state = mergeState(state, stage, update);
      stage = state.stage;
    }

    return state;
  }
}
