import { describe, it, expect } from 'vitest';
import { addConcept, extractConceptName } from './concepts';
import { createRevisionSession } from '../models';

describe('extractConceptName', () => {
  it('takes the first three words', () => {
    expect(extractConceptName('  Proteins are built from amino acids')).toBe('Proteins are built');
  });

  it('keeps short texts up to fifty characters', () => {
    expect(extractConceptName('Osmosis')).toBe('Osmosis');
    expect(extractConceptName(`${'a'.repeat(40)} ${'b'.repeat(20)}`)).toBe(
      `${'a'.repeat(40)} ${'b'.repeat(9)}`
    );
  });
});

describe('addConcept', () => {
  it('records a concept only once', () => {
    const session = createRevisionSession({ id: 's', topic: 'nutrition', studentId: 'u' });

    expect(addConcept(session, 'Fats store energy')).toBe(true);
    expect(addConcept(session, 'Fats store energy')).toBe(false);

    expect(session.conceptsCovered).toEqual(['Fats store energy']);
  });

  it('ignores empty labels', () => {
    const session = createRevisionSession({ id: 's', topic: 'nutrition', studentId: 'u' });

    expect(addConcept(session, '')).toBe(false);
    expect(session.conceptsCovered).toEqual([]);
  });
});
