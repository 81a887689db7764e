/**
 * Core type definitions for the graph-grounded question answering system
 *
 * Nodes and relationship attributes are fixed-schema records with an
 * `extra` side mapping, so unknown seed attributes survive without turning
 * the whole record into an untyped dictionary.
 */

/** Scalar value allowed in attribute maps */
export type AttributeValue = string | number | boolean;

/** Node kinds known to the graph */
export type NodeKind = 'person' | 'organization';

interface BaseNode {
  /** Unique identifier for the node */
  id: string;
  /** Display name used for lookup and rendering */
  name: string;
  /** Attributes outside the kind's fixed schema */
  extra: Record<string, AttributeValue>;
}

export interface PersonNode extends BaseNode {
  kind: 'person';
  role?: string;
}

export interface OrganizationNode extends BaseNode {
  kind: 'organization';
  industry?: string;
}

/**
 * Represents a node in the knowledge graph
 */
export type GraphNode = PersonNode | OrganizationNode;

/**
 * Relation labels with a rendering template.
 * Any other label is still accepted and rendered verbatim.
 */
export const KNOWN_RELATIONS = [
  'founded',
  'co_founded',
  'leads',
  'works_at',
  'invested_in',
  'acquired',
  'partners_with',
  'supplies'
] as const;

export type KnownRelation = typeof KNOWN_RELATIONS[number];

/** Open relation label: a known relation or any other string */
export type RelationLabel = KnownRelation | (string & {});

export function isKnownRelation(label: string): label is KnownRelation {
  return (KNOWN_RELATIONS as readonly string[]).includes(label);
}

/**
 * Attributes carried by a relationship
 */
export interface RelationAttributes {
  year?: number | string;
  amount?: string;
  /** Role held, meaningful for `leads` */
  role?: string;
  product?: string;
  /** Partnership or relationship flavour, e.g. 'strategic' */
  type?: string;
  extra: Record<string, AttributeValue>;
}

/**
 * Represents a directed, labeled edge between two nodes.
 * Several edges may connect the same ordered pair.
 */
export interface GraphEdge {
  /** Unique identifier for the edge */
  id: string;
  /** Source node identifier */
  source: string;
  /** Target node identifier */
  target: string;
  relation: RelationLabel;
  attributes: RelationAttributes;
}

/** Which end of the edge the visited node sits on */
export type FactDirection = 'outgoing' | 'incoming';

/**
 * Display-ready statement derived from one edge
 */
export interface Fact {
  direction: FactDirection;
  edgeId: string;
  source: string;
  sourceName: string;
  target: string;
  targetName: string;
  relation: RelationLabel;
  attributes: RelationAttributes;
}

/**
 * Recognized reference to a known entity in question text
 */
export interface EntityMention {
  /** Canonical display name */
  name: string;
  kind: NodeKind;
  /** Lowercased surface form that matched */
  matchedText: string;
}

/**
 * Seed records for graph construction
 */
export interface PersonSeed {
  id: string;
  name: string;
  role?: string;
  extra?: Record<string, AttributeValue>;
}

export interface OrganizationSeed {
  id: string;
  name: string;
  industry?: string;
  extra?: Record<string, AttributeValue>;
}

export interface RelationshipSeed {
  source: string;
  target: string;
  relation: RelationLabel;
  attributes: Record<string, AttributeValue>;
}

export interface GraphSeeds {
  people: PersonSeed[];
  organizations: OrganizationSeed[];
  relationships: RelationshipSeed[];
}

/**
 * Basic graph statistics
 */
export interface GraphStats {
  totalNodes: number;
  totalEdges: number;
  people: number;
  organizations: number;
}
