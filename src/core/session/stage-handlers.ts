/**
 * Stage Handlers
 *
 * One handler per stage. Each handler reads what it needs from the session
 * and the content façade, asks the text generator for the reply, and only
 * then updates the session. A generator failure therefore propagates with
 * the session untouched; the engine turns it into a generic reply.
 *
 * Dispatch is an exhaustive switch over the Stage union, so adding a stage
 * without a handler is a compile error.
 */

import type { RevisionSession, SessionStats, Stage } from '../models';
import type { ContentService } from '../content';
import type { TopicConfig } from '../topics';
import type { TextGenerator } from '../../llm/types';
import {
  REVISION_SYSTEM_PROMPT,
  buildConclusionPrompt,
  buildEngagingQuestionPrompt,
  buildKickoffPrompt,
  buildMiniQuizPrompt,
  buildProgressPrompt,
  buildQuestionPrompt,
  buildQuizFeedbackPrompt,
  buildRecapPrompt,
} from '../../llm/prompts';
import { addConcept, extractConceptName } from './concepts';
import { detectRecapMode } from './stage-classifier';
import type { StageOutcome } from './types';

/** Chunks fetched for a kickoff without recap material, and per question */
const CONTEXT_CHUNK_LIMIT = 3;

/** Number of recent concepts a mini quiz draws from */
const QUIZ_CONCEPT_WINDOW = 3;

/** Coverage percentage at which a progress check completes the session */
const COMPLETION_PERCENTAGE = 90;

const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

/**
 * Difficulty of an engaging question: easy for turns 0-5, medium for
 * 6-11, hard from 12 on.
 */
export function selectDifficulty(conversationCount: number): Difficulty {
  return DIFFICULTIES[Math.min(Math.floor(conversationCount / 6), 2)];
}

/**
 * Coverage of the session as a percentage. Uses covered concepts against
 * the chunk count when chunks exist, otherwise turns against the
 * completion threshold.
 */
export function progressPercentage(session: RevisionSession, completionThreshold: number): number {
  const totalChunks = session.conceptChunks.length;
  if (totalChunks > 0) {
    return (session.conceptsCovered.length / totalChunks) * 100;
  }
  if (completionThreshold <= 0) {
    return 100;
  }
  return (session.conversationCount / completionThreshold) * 100;
}

export interface StageHandlerOptions {
  content: ContentService;
  generator: TextGenerator;
  temperature: number;
  maxTokens: number;
}

export class StageHandlers {
  private readonly content: ContentService;
  private readonly generator: TextGenerator;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: StageHandlerOptions) {
    this.content = options.content;
    this.generator = options.generator;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
  }

  /**
   * Runs the handler for `stage`.
   *
   * @param limits - The session's effective limits
   * @throws Whatever the text generator throws
   */
  async handle(
    stage: Stage,
    session: RevisionSession,
    utterance: string | null,
    limits: TopicConfig
  ): Promise<StageOutcome> {
    switch (stage) {
      case 'kickoff_response':
        return this.kickoff(session, utterance);
      case 'progressive_recap':
        return this.progressiveRecap(session, limits, 'progressive_recap');
      case 'general':
        return this.progressiveRecap(session, limits, 'general');
      case 'engaging_question':
        return this.engagingQuestion(session);
      case 'mini_quiz':
        return this.miniQuiz(session, utterance);
      case 'quiz_feedback':
        return this.quizFeedback(session, utterance);
      case 'user_question':
        return this.userQuestion(session, utterance);
      case 'progress_check':
        return this.progressCheck(session, limits);
      default: {
        const unhandled: never = stage;
        throw new Error(`No handler for stage: ${String(unhandled)}`);
      }
    }
  }

  /**
   * Generates the opening message of a new session from its first chunks.
   */
  async opening(topic: string, initialChunks: { text: string }[]): Promise<string> {
    const topicContent = initialChunks.map((chunk) => chunk.text).join('\n');
    return this.generate(buildKickoffPrompt(topic, topicContent));
  }

  /**
   * Generates the closing narrative of a completed session.
   */
  async conclusion(session: RevisionSession, stats: SessionStats): Promise<string> {
    return this.generate(buildConclusionPrompt(session.topic, session.conceptsCovered, stats));
  }

  private async kickoff(session: RevisionSession, utterance: string | null): Promise<StageOutcome> {
    const mode = detectRecapMode(utterance);
    const first = session.conceptChunks.at(0);

    if (!first) {
      const initial = await this.content.getChunks(session.topic, CONTEXT_CHUNK_LIMIT);
      const response = await this.opening(session.topic, initial);

      session.recapMode = mode;
      session.currentChunkIndex = 0;
      return {
        kind: 'reply',
        stage: 'kickoff_response',
        response,
        sources: initial.map((chunk) => chunk.chunkId),
      };
    }

    const response = await this.generate(
      buildRecapPrompt({
        topic: session.topic,
        chunkText: first.text,
        chunkNumber: 1,
        totalChunks: session.conceptChunks.length,
        mode,
      })
    );

    session.recapMode = mode;
    session.currentChunkIndex = 0;
    addConcept(session, extractConceptName(first.text));

    return { kind: 'reply', stage: 'kickoff_response', response, sources: [first.chunkId] };
  }

  private async progressiveRecap(
    session: RevisionSession,
    limits: TopicConfig,
    stage: 'progressive_recap' | 'general'
  ): Promise<StageOutcome> {
    const chunks = session.conceptChunks;
    // Nothing covered yet (the kickoff recap failed): the cursor chunk is still undelivered
    const nextIndex =
      session.conceptsCovered.length === 0 ? session.currentChunkIndex : session.currentChunkIndex + 1;
    const next = chunks.at(nextIndex);

    if (chunks.length === 0 || !next) {
      // Exhausted: the cursor stays on the last chunk
      session.currentChunkIndex = Math.max(chunks.length - 1, 0);
      return this.progressCheck(session, limits);
    }

    const response = await this.generate(
      buildRecapPrompt({
        topic: session.topic,
        chunkText: next.text,
        chunkNumber: nextIndex + 1,
        totalChunks: chunks.length,
        mode: session.recapMode,
      })
    );

    session.currentChunkIndex = nextIndex;
    addConcept(session, extractConceptName(next.text));

    return { kind: 'reply', stage, response, sources: [next.chunkId] };
  }

  private async engagingQuestion(session: RevisionSession): Promise<StageOutcome> {
    const concept = session.conceptsCovered.at(-1) ?? session.topic;
    const difficulty = selectDifficulty(session.conversationCount);

    const response = await this.generate(
      buildEngagingQuestionPrompt(session.topic, concept, difficulty)
    );

    session.awaitingAnswer = true;
    session.awaitingAnswerConcept = concept;

    return { kind: 'reply', stage: 'engaging_question', response, sources: [] };
  }

  private async miniQuiz(session: RevisionSession, utterance: string | null): Promise<StageOutcome> {
    if (session.quizInProgress) {
      return this.quizFeedback(session, utterance);
    }

    const recent = session.conceptsCovered.slice(-QUIZ_CONCEPT_WINDOW);
    const concepts = recent.length > 0 ? recent : [session.topic];
    const questionCount = Math.min(QUIZ_CONCEPT_WINDOW, concepts.length);

    const response = await this.generate(
      buildMiniQuizPrompt(session.topic, concepts, questionCount)
    );

    session.quizInProgress = true;
    session.quizConcepts = [...concepts];

    return { kind: 'reply', stage: 'mini_quiz', response, sources: [] };
  }

  /**
   * Feedback on quiz answers. Correctness is left entirely to the
   * generator; there is no answer key.
   */
  private async quizFeedback(
    session: RevisionSession,
    utterance: string | null
  ): Promise<StageOutcome> {
    const concepts = session.quizConcepts.length > 0 ? session.quizConcepts : [session.topic];

    const response = await this.generate(
      buildQuizFeedbackPrompt(session.topic, utterance ?? '', concepts)
    );

    session.quizInProgress = false;
    session.quizConcepts = [];

    return { kind: 'reply', stage: 'quiz_feedback', response, sources: [] };
  }

  private async userQuestion(
    session: RevisionSession,
    utterance: string | null
  ): Promise<StageOutcome> {
    const question = utterance ?? '';
    const results = await this.content.search(session.topic, question, CONTEXT_CHUNK_LIMIT);
    const context = results.map((chunk) => chunk.text).join('\n');

    const response = await this.generate(buildQuestionPrompt(session.topic, question, context));

    return {
      kind: 'reply',
      stage: 'user_question',
      response,
      sources: results.map((chunk) => chunk.chunkId),
    };
  }

  private async progressCheck(session: RevisionSession, limits: TopicConfig): Promise<StageOutcome> {
    const totalChunks = session.conceptChunks.length;
    const covered = session.conceptsCovered.length;
    const percentage = progressPercentage(session, limits.completionThreshold);

    if (
      percentage >= COMPLETION_PERCENTAGE ||
      (totalChunks > 0 && covered >= totalChunks) ||
      session.conversationCount >= limits.completionThreshold
    ) {
      return { kind: 'complete' };
    }

    const response = await this.generate(
      buildProgressPrompt({
        topic: session.topic,
        conceptsCompleted: totalChunks > 0 ? covered : session.conversationCount,
        totalConcepts: totalChunks > 0 ? totalChunks : limits.completionThreshold,
        percentage,
      })
    );

    return { kind: 'reply', stage: 'progress_check', response, sources: [] };
  }

  private async generate(prompt: string): Promise<string> {
    const { text } = await this.generator.complete([{ role: 'user', content: prompt }], {
      system: REVISION_SYSTEM_PROMPT,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });
    return text;
  }
}
