/**
 * Stage Classifier
 *
 * Picks the stage of a turn by walking an ordered rule list; the first rule
 * whose predicate holds wins. Numeric rules overlap on purpose (turn 15
 * matches both the quiz and the question rule), so list order is the
 * tie-break.
 */

import type { RecapMode, Stage } from '../models';

/**
 * What a rule can look at.
 */
export interface ClassificationInput {
  /** Conversation count after this turn's increment */
  conversationCount: number;
  /** Raw student utterance, or null when none was sent */
  utterance: string | null;
}

export interface StageRule {
  stage: Stage;
  matches: (input: ClassificationInput) => boolean;
}

/** Lowercase fragments that mark an utterance as a question */
export const QUESTION_INDICATORS = [
  '?',
  'what',
  'how',
  'why',
  'when',
  'where',
  'who',
  'which',
  'explain',
  'can you',
  'could you',
  'tell me',
  'help',
] as const;

/** Lowercase fragments that end a session on request */
export const END_SESSION_PHRASES = [
  'end session',
  'finish',
  'complete',
  'done',
  'exit',
  'summary',
] as const;

/** Lowercase fragments that select the quick recap pace at kickoff */
export const QUICK_RECAP_KEYWORDS = ['quick', 'recap', 'summary', 'brief', 'short'] as const;

function containsAny(text: string | null, fragments: readonly string[]): boolean {
  if (!text) return false;
  const lowered = text.toLowerCase();
  return fragments.some((fragment) => lowered.includes(fragment));
}

export function isQuestion(utterance: string | null): boolean {
  return containsAny(utterance, QUESTION_INDICATORS);
}

export function isEndSessionRequest(utterance: string | null): boolean {
  return containsAny(utterance, END_SESSION_PHRASES);
}

export function detectRecapMode(utterance: string | null): RecapMode {
  return containsAny(utterance, QUICK_RECAP_KEYWORDS) ? 'quick_recap' : 'deep_dive';
}

export const STAGE_RULES: readonly StageRule[] = [
  { stage: 'kickoff_response', matches: ({ conversationCount }) => conversationCount === 1 },
  { stage: 'user_question', matches: ({ utterance }) => isQuestion(utterance) },
  {
    stage: 'mini_quiz',
    matches: ({ conversationCount: n }) => n > 5 && n % 5 === 0,
  },
  {
    stage: 'engaging_question',
    matches: ({ conversationCount: n }) => n > 2 && n % 3 === 0,
  },
  {
    stage: 'progress_check',
    matches: ({ conversationCount: n }) => n > 8 && n % 8 === 0,
  },
  { stage: 'progressive_recap', matches: () => true },
];

/**
 * Returns the stage of the first matching rule, or 'general' when none
 * matches.
 */
export function classifyStage(
  input: ClassificationInput,
  rules: readonly StageRule[] = STAGE_RULES
): Stage {
  const rule = rules.find((candidate) => candidate.matches(input));
  return rule ? rule.stage : 'general';
}

/**
 * Classifies a turn and applies the quiz override: while a quiz is open, a
 * turn classified as a new quiz is routed to quiz feedback instead.
 */
export function resolveStage(
  input: ClassificationInput & { quizInProgress: boolean },
  rules: readonly StageRule[] = STAGE_RULES
): Stage {
  const stage = classifyStage(input, rules);
  if (stage === 'mini_quiz' && input.quizInProgress) {
    return 'quiz_feedback';
  }
  return stage;
}
