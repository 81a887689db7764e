/**
 * Core exports for the graph-grounded question answering system
 */

// Core graph components
export { KnowledgeGraph, buildGraph, toRelationAttributes, type GraphLike } from './core/graph.js';
export {
  GraphTraversal,
  dedupeFacts,
  factKey,
  DEFAULT_TRAVERSAL_DEPTH,
  type TraversalResult
} from './core/traversal.js';

// Entity recognition and question analysis
export {
  EntityRecognizer,
  type EntityCatalog,
  type CatalogEntry
} from './extraction/entity-recognizer.js';
export {
  analyzeQuestion,
  extractRelationshipIntents,
  type QuestionAnalysis
} from './extraction/intent.js';

// Context rendering
export {
  NO_GROUNDING_CONTEXT,
  buildContext,
  formatFact,
  formatTraversalSummary
} from './context/context-builder.js';

// Pipeline and answer generation
export {
  GraphRagPipeline,
  createInitialState,
  mergeState,
  formatTrace,
  type PipelineOptions
} from './agent/pipeline.js';
export {
  PipelineStage,
  NO_INFORMATION_ANSWER,
  type PipelineState,
  type TraceEntry,
  type MatchedNode
} from './agent/stages.js';
export {
  GroqAnswerGenerator,
  createAnswerGenerator,
  buildPrompt,
  generateWithTimeout,
  type AnswerGenerator,
  type GenerateOptions,
  type GeneratorSetup
} from './agent/generator.js';
export { bootstrap, type BootstrapResult } from './agent/bootstrap.js';

// Seed data and configuration
export {
  loadSeedFile,
  loadEntityCatalog,
  parseSeedData,
  parseEntityCatalog
} from './storage/seed.js';
export { loadConfig, type GraphRagConfig } from './config/index.js';

// HTTP API
export { createApi, type ApiDependencies } from './server/api.js';

// Errors
export {
  ErrorHandler,
  ErrorCategory,
  ErrorSeverity,
  GraphConstructionError,
  GenerationTimeoutError,
  ConfigurationError,
  type ErrorInfo,
  type OperationResult
} from './utils/error-handler.js';

// Type definitions
export type {
  AttributeValue,
  NodeKind,
  PersonNode,
  OrganizationNode,
  GraphNode,
  GraphEdge,
  KnownRelation,
  RelationLabel,
  RelationAttributes,
  Fact,
  FactDirection,
  EntityMention,
  GraphSeeds,
  PersonSeed,
  OrganizationSeed,
  RelationshipSeed,
  GraphStats
} from './core/types.js';
export { KNOWN_RELATIONS, isKnownRelation } from './core/types.js';
