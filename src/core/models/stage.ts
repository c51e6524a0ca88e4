/**
 * Pedagogical Stages
 *
 * A stage is the mode that governs how one turn's response is produced.
 * It is derived per turn by the stage classifier and is never stored on the
 * session itself; the turn log records the label each turn resolved to.
 */

/**
 * All stages a turn can be dispatched to.
 *
 * - 'kickoff_response': first turn; reads the student's recap preference
 * - 'progressive_recap': explains the next content chunk
 * - 'engaging_question': asks one question about the latest concept
 * - 'mini_quiz': asks a short quiz over recent concepts
 * - 'quiz_feedback': responds to the answers for an open quiz
 * - 'user_question': answers a question the student asked
 * - 'progress_check': reports progress or completes the session
 * - 'general': fallback, behaves like progressive recap
 */
export const STAGES = [
  'kickoff_response',
  'progressive_recap',
  'engaging_question',
  'mini_quiz',
  'quiz_feedback',
  'user_question',
  'progress_check',
  'general',
] as const;

export type Stage = (typeof STAGES)[number];

/**
 * Label carried by a completion response. It is a response label only;
 * the classifier never produces it.
 */
export type CompletionStage = 'session_complete';

/**
 * Every label a response or turn record can carry.
 */
export type StageLabel = Stage | CompletionStage;
