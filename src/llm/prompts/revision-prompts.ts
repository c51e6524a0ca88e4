/**
 * Revision Prompt Builders
 *
 * Pure string builders for every stage of a revision session. Each builder
 * returns the user-role prompt body; REVISION_SYSTEM_PROMPT is sent as the
 * system instruction alongside it.
 *
 * Study material is wrapped in <study_material> tags. Content coming from
 * the corpus or the student passes through escapePromptContent first so it
 * cannot close those tags early.
 */

import type { RecapMode, SessionStats } from '../../core/models';

/**
 * System instruction shared by every revision prompt.
 */
export const REVISION_SYSTEM_PROMPT = `You are a friendly, patient revision tutor for school students.
You help a student revise one topic at a time using the study material you are given.
Keep explanations short and concrete, use everyday examples, and end most replies with a question that keeps the student thinking.
Never invent facts that contradict the study material.`;

/**
 * Escapes content that could break out of the prompt's delimiters.
 */
export function escapePromptContent(content: string): string {
  if (!content) {
    return '';
  }

  return content
    .replace(/<\/?study_material>/gi, (tag) => tag.replace('<', '&lt;').replace('>', '&gt;'))
    .replace(/```/g, '` ` `');
}

function studyMaterial(text: string): string {
  return `<study_material>\n${escapePromptContent(text)}\n</study_material>`;
}

/**
 * Opening message of a session, built from the first few chunks.
 */
export function buildKickoffPrompt(topic: string, topicContent: string): string {
  const material = topicContent.trim()
    ? studyMaterial(topicContent)
    : 'No study material is available for this topic, so rely on standard school-level knowledge.';

  return `We are starting a revision session on "${topic}".

${material}

Write a warm welcome that:
1. Names the topic and why it matters
2. Gives a one-paragraph overview of what the session will cover
3. Asks whether the student wants a quick recap or a deep dive, step by step`;
}

/**
 * Explanation of one chunk during progressive recap.
 *
 * @param chunkNumber - 1-based position of the chunk
 */
export function buildRecapPrompt(params: {
  topic: string;
  chunkText: string;
  chunkNumber: number;
  totalChunks: number;
  mode: RecapMode | null;
}): string {
  const { topic, chunkText, chunkNumber, totalChunks, mode } = params;

  const pace =
    mode === 'quick_recap'
      ? 'The student asked for a quick recap: explain this in three or four sentences.'
      : 'The student asked for a deep dive: break this down step by step with an example.';

  return `Revision of "${topic}", section ${chunkNumber} of ${totalChunks}.

${studyMaterial(chunkText)}

${pace}
Finish with one short check-for-understanding question.`;
}

/**
 * A single question about a covered concept.
 */
export function buildEngagingQuestionPrompt(
  topic: string,
  concept: string,
  difficulty: 'easy' | 'medium' | 'hard'
): string {
  return `The student is revising "${topic}" and has just covered: ${escapePromptContent(concept)}

Ask exactly one ${difficulty} question about this concept.
- easy: recall of a fact or definition
- medium: explaining how or why something happens
- hard: applying the idea to a new situation

Do not give the answer. Encourage the student to reply in their own words.`;
}

/**
 * A short quiz over recently covered concepts.
 */
export function buildMiniQuizPrompt(
  topic: string,
  concepts: string[],
  questionCount: number
): string {
  const list = concepts.map((concept) => `- ${escapePromptContent(concept)}`).join('\n');

  return `Time for a mini quiz on "${topic}".

Concepts to cover:
${list}

Write ${questionCount} numbered question${questionCount === 1 ? '' : 's'}, mixing multiple choice and short answer.
Do not include the answers. Ask the student to answer all of them in one reply.`;
}

/**
 * Feedback on the student's quiz answers. There is no answer key: the
 * model judges the answers itself.
 */
export function buildQuizFeedbackPrompt(
  topic: string,
  answer: string,
  concepts: string[]
): string {
  return `The student answered a mini quiz on "${topic}" covering: ${concepts
    .map(escapePromptContent)
    .join(', ')}.

Their answers:
"""
${escapePromptContent(answer)}
"""

Give encouraging feedback: point out what they got right, gently correct anything wrong with a short explanation, and suggest what to revisit.`;
}

/**
 * Progress narrative shown while the session continues.
 */
export function buildProgressPrompt(params: {
  topic: string;
  conceptsCompleted: number;
  totalConcepts: number;
  percentage: number;
}): string {
  const { topic, conceptsCompleted, totalConcepts, percentage } = params;

  return `Give the student a short progress update for their revision of "${topic}".

- Sections covered: ${conceptsCompleted} of ${totalConcepts}
- Progress: ${percentage.toFixed(0)}%

Celebrate what they have done so far, name what is left, and motivate them to keep going.`;
}

/**
 * Closing message of a completed session.
 */
export function buildConclusionPrompt(
  topic: string,
  concepts: string[],
  stats: SessionStats
): string {
  const covered =
    concepts.length > 0
      ? concepts.map((concept) => `- ${escapePromptContent(concept)}`).join('\n')
      : '- (no individual concepts recorded)';

  return `The student has finished a revision session on "${topic}".

Session statistics:
- Interactions: ${stats.total_interactions}
- Concepts covered: ${stats.concepts_covered}
- Duration: ${stats.session_duration_minutes} minutes
- Completion: ${stats.completion_rate}%

Concepts covered:
${covered}

Write a conclusion that congratulates the student, summarises the key ideas above, and suggests one or two ways to keep practising.`;
}

/**
 * Answer to a question the student asked, grounded in search results.
 */
export function buildQuestionPrompt(topic: string, question: string, context: string): string {
  const material = context.trim()
    ? studyMaterial(context)
    : 'No matching study material was found; answer from standard school-level knowledge and say so briefly.';

  return `While revising "${topic}", the student asked:
"""
${escapePromptContent(question)}
"""

${material}

Answer the question clearly using the study material, then invite the student to continue the revision.`;
}
