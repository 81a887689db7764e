/**
 * Graph RAG question answering
 *
 * Answers questions about people and organizations using only facts found
 * in a small knowledge graph:
 * - Closed-vocabulary entity recognition with alias resolution
 * - Mutual substring node lookup
 * - Bounded BFS over a multi-relational directed graph
 * - Fact deduplication and sentence rendering
 * - A five-stage pipeline with an injectable answer generator
 */

export * from "./src/index.js";
