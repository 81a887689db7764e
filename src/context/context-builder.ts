/**
 * Renders graph facts into a grounding context for answer generation
 */

import type { EntityMention, Fact, KnownRelation } from '../core/types.js';
import { isKnownRelation } from '../core/types.js';
import type { TraversalResult } from '../core/traversal.js';

/**
 * Context returned when there is nothing to ground an answer on.
 * The pipeline compares against this exact string.
 */
export const NO_GROUNDING_CONTEXT = 'No relevant information found in the knowledge graph.';

const RELATION_TEMPLATES: Record<KnownRelation, (source: string, target: string) => string> = {
  founded: (source, target) => `${source} founded ${target}`,
  co_founded: (source, target) => `${source} co-founded ${target}`,
  leads: (source, target) => `${source} leads ${target}`,
  works_at: (source, target) => `${source} works at ${target}`,
  invested_in: (source, target) => `${source} invested in ${target}`,
  acquired: (source, target) => `${source} acquired ${target}`,
  partners_with: (source, target) => `${source} partners with ${target}`,
  supplies: (source, target) => `${source} supplies to ${target}`
};

/**
 * Convert a single fact into a sentence
 *
 * Unknown relations render as "<source> <relation> <target>". Attribute
 * fragments follow in a fixed order: year, amount, role (leads only), product.
 */
export function formatFact(fact: Fact): string {
  const { sourceName, targetName, relation, attributes } = fact;

  const sentence = isKnownRelation(relation)
    ? RELATION_TEMPLATES[relation](sourceName, targetName)
    : `${sourceName} ${relation} ${targetName}`;

  const parts: string[] = [];
  if (attributes.year !== undefined) {
    parts.push(`in ${attributes.year}`);
  }
  if (attributes.amount !== undefined) {
    parts.push(`(${attributes.amount})`);
  }
  if (attributes.role !== undefined && relation === 'leads') {
    parts.push(`as ${attributes.role}`);
  }
  if (attributes.product !== undefined) {
    parts.push(`(${attributes.product})`);
  }

  return parts.length > 0 ? `${sentence} ${parts.join(' ')}` : sentence;
}

/**
 * Build the grounding context from facts, in the order given
 */
export function buildContext(facts: readonly Fact[], entities: readonly EntityMention[]): string {
  if (facts.length === 0) {
    return NO_GROUNDING_CONTEXT;
  }

  const lines: string[] = [];

  if (entities.length > 0) {
    lines.push(`Information about: ${entities.map(e => e.name).join(', ')}`);
    lines.push('');
  }

  lines.push('Known facts:');
  for (const fact of facts) {
    lines.push(`- ${formatFact(fact)}`);
  }

  return lines.join('\n');
}

export function formatTraversalSummary(result: TraversalResult): string {
  return [
    `Started from: ${result.startNodeId}`,
    `Visited nodes: ${result.visitedNodeIds.join(', ')}`,
    `Facts discovered: ${result.facts.length}`
  ].join('\n');
}
