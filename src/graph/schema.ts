// file: src/graph/schema.ts
import { SchemaViolationError } from '../errors';

export const NODE_LABELS = ['Level', 'Topic', 'Subtopic'] as const;

export const RELATIONSHIP_TYPES = [
  'PREREQUISITE_FOR',
  'USED_IN',
  'CONTAINS',
  'HAS_SUBTOPIC',
  'USED_WITH',
  'FREQUENTLY_TESTED_IN',
  'EASIER_THAN',
] as const;

export const PROPERTY_KEYS = [
  'description',
  'difficulty',
  'estimated_weeks',
  'id',
  'name',
  'order',
  'complexity',
  'estimated_hours',
  'level',
  'practical_applications',
  'type',
  'key_concepts',
  'parent_topic',
  'space_complexity',
  'time_complexity',
  'strength',
  'difficulty_gap',
  'data',
  'nodes',
  'relationships',
  'style',
  'visualisation',
  'weight',
] as const;

export type NodeLabel = (typeof NODE_LABELS)[number];
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];
export type PropertyKey = (typeof PROPERTY_KEYS)[number];

export function isNodeLabel(token: string): token is NodeLabel {
  return NODE_LABELS.some(l => l === token);
}

export function isRelationshipType(token: string): token is RelationshipType {
  return RELATIONSHIP_TYPES.some(t => t === token);
}

export function isPropertyKey(token: string): token is PropertyKey {
  return PROPERTY_KEYS.some(k => k === token);
}

/*
 * Jedyna ścieżka, którą token trafia dosłownie do wzorca zapytania.
 * Wartości tekstowe (nazwy, trudność) zawsze idą jako parametry.
 */
export function assertNodeLabel(token: string): NodeLabel {
  if (!isNodeLabel(token)) throw new SchemaViolationError('label', token);
  return token;
}

export function assertRelationshipType(token: string): RelationshipType {
  if (!isRelationshipType(token)) throw new SchemaViolationError('relationship', token);
  return token;
}

export function assertPropertyKey(token: string): PropertyKey {
  if (!isPropertyKey(token)) throw new SchemaViolationError('property', token);
  return token;
}
