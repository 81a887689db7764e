/**
 * Relationship intent detection
 *
 * Keyword stems hint at which relation a question asks about. The result
 * is diagnostic: it is traced alongside detected entities but never used to
 * filter retrieved facts.
 */

import type { EntityMention, KnownRelation } from '../core/types.js';
import type { EntityRecognizer } from './entity-recognizer.js';

const RELATIONSHIP_KEYWORDS: ReadonlyArray<[KnownRelation, readonly string[]]> = [
  ['founded', ['found', 'start', 'creat', 'establish']],
  ['leads', ['lead', 'run', 'ceo', 'head', 'manage']],
  ['works_at', ['work', 'employ']],
  ['invested_in', ['invest', 'fund', 'money']],
  ['acquired', ['acquir', 'bought', 'purchase']],
  ['partners_with', ['partner', 'collaborat', 'work with']],
  ['supplies', ['supply', 'provide', 'sell']]
];

export interface QuestionAnalysis {
  originalQuestion: string;
  detectedEntities: EntityMention[];
  relationshipIntents: KnownRelation[];
}

export function extractRelationshipIntents(question: string): KnownRelation[] {
  const lowered = question.toLowerCase();
  return RELATIONSHIP_KEYWORDS
    .filter(([, keywords]) => keywords.some(keyword => lowered.includes(keyword)))
    .map(([relation]) => relation);
}

export function analyzeQuestion(question: string, recognizer: EntityRecognizer): QuestionAnalysis {
  return {
    originalQuestion: question,
    detectedEntities: recognizer.detect(question),
    relationshipIntents: extractRelationshipIntents(question)
  };
}
