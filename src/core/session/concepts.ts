/**
 * Concept labels recorded as chunks are covered.
 */

import type { RevisionSession } from '../models';

const CONCEPT_WORDS = 3;
const SHORT_CONCEPT_MAX_LENGTH = 50;

/**
 * Derives a concept label from chunk text: the first three words, or the
 * first 50 characters when the text has fewer than three words.
 *
 * @example
 * ```typescript
 * extractConceptName('Proteins are built from amino acids'); // 'Proteins are built'
 * extractConceptName('Osmosis'); // 'Osmosis'
 * ```
 */
export function extractConceptName(text: string): string {
  const words = text.trim().split(/\s+/).filter((word) => word.length > 0);
  if (words.length >= CONCEPT_WORDS) {
    return words.slice(0, CONCEPT_WORDS).join(' ');
  }
  return text.trim().slice(0, SHORT_CONCEPT_MAX_LENGTH);
}

/**
 * Records a concept unless it is already listed or empty.
 *
 * @returns true when the concept was added
 */
export function addConcept(session: RevisionSession, concept: string): boolean {
  if (concept.length === 0 || session.conceptsCovered.includes(concept)) {
    return false;
  }
  session.conceptsCovered.push(concept);
  return true;
}
