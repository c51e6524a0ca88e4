/**
 * Revision Engine - Session Lifecycle Manager
 *
 * The RevisionEngine drives a revision session from start to completion:
 *
 * 1. **Start**: resolves the topic limits, builds a fresh session, loads
 *    the topic's chunks, generates the opening message and persists the
 *    snapshot together with turn 0.
 *
 * 2. **Continue**: counts the turn, checks for a manual end request and
 *    the turn cap, classifies the stage, runs its handler, then persists
 *    the turn and the updated snapshot.
 *
 * 3. **Complete**: marks the session complete (once), computes statistics
 *    and generates the conclusion.
 *
 * Session Flow:
 * ```
 * startSession() -> [continueSession() loop] -> completion
 *                          |
 *                          v
 *      end phrase? -> cap reached? -> classify -> handler -> persist
 * ```
 *
 * Turns of one session are serialized through a SessionTurnQueue; turns of
 * different sessions run independently. Collaborator faults never escape a
 * turn: content faults come back as empty content, generator faults as a
 * generic reply, and failed writes are logged by the store.
 *
 * @example
 * ```typescript
 * const engine = new RevisionEngine(dependencies);
 *
 * const opening = await engine.startSession({
 *   topic: 'photosynthesis',
 *   studentId: 'student_42',
 *   sessionId: 'sess_001',
 * });
 * console.log('Tutor:', opening.response);
 *
 * const reply = await engine.continueSession('sess_001', 'quick recap please');
 * if (reply.is_session_complete) {
 *   console.log(reply.session_summary);
 * }
 * ```
 */

import {
  createRevisionSession,
  type RevisionSession,
  type SessionStats,
  type StageLabel,
  type TopicSummary,
  type TurnRecord,
} from '../models';
import { resolveTopicConfig, defaultTopicConfig, type TopicConfig } from '../topics';
import { config } from '../../config';
import { RevisionError } from './errors';
import { startSessionInputSchema } from './schemas';
import { isEndSessionRequest, resolveStage } from './stage-classifier';
import { StageHandlers } from './stage-handlers';
import { SessionTurnQueue } from './turn-queue';
import type { SessionStore } from './session-store';
import type { ContentService } from '../content';
import type {
  RevisionEngineConfig,
  RevisionEngineDependencies,
  RevisionResponse,
  StageOutcome,
  StartSessionInput,
} from './types';

/** Reply used when a handler fails; the turn still counts */
export const GENERIC_CONTINUATION_MESSAGE =
  "I encountered an issue, but let's continue with your revision! Let's pick up where we left off.";

export const SESSION_NOT_FOUND_MESSAGE = 'Session not found. Please start a new revision session.';

export const NEXT_SUGGESTED_ACTION =
  'Feel free to start a new session anytime to explore more topics or dive deeper into this one!';

/** Chunks used to build the opening message */
const OPENING_CHUNK_LIMIT = 3;

/**
 * Default engine configuration, read from the application config.
 */
export function defaultRevisionEngineConfig(): RevisionEngineConfig {
  return {
    defaultTopicConfig: defaultTopicConfig(),
    temperature: config.anthropic.temperature,
    maxTokens: config.anthropic.maxTokens,
  };
}

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Summary used when the conclusion cannot be generated.
 */
export function fallbackSummary(session: RevisionSession): string {
  return `Congratulations on completing your revision of ${session.topic}! You worked through ${session.conversationCount} interactions. Keep revisiting these ideas to make them stick.`;
}

interface TurnReply {
  response: string;
  stage: StageLabel;
  sources: string[];
}

/**
 * RevisionEngine orchestrates revision sessions.
 */
export class RevisionEngine {
  private readonly store: SessionStore;
  private readonly content: ContentService;
  private readonly handlers: StageHandlers;
  private readonly queue = new SessionTurnQueue();
  private readonly config: RevisionEngineConfig;
  private readonly now: () => Date;

  constructor(deps: RevisionEngineDependencies, engineConfig: Partial<RevisionEngineConfig> = {}) {
    this.config = { ...defaultRevisionEngineConfig(), ...engineConfig };
    this.store = deps.store;
    this.content = deps.content;
    this.now = deps.now ?? (() => new Date());
    this.handlers = new StageHandlers({
      content: deps.content,
      generator: deps.generator,
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    });
  }

  /**
   * Opens a new session and returns its opening message.
   *
   * An existing session with the same id is replaced. A generator failure
   * yields the generic message; the session is still created.
   *
   * @throws {RevisionError} INVALID_INPUT when a field is empty
   */
  async startSession(input: StartSessionInput): Promise<RevisionResponse> {
    const parsed = startSessionInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new RevisionError(
        parsed.error.issues.map((issue) => issue.message).join('; '),
        'INVALID_INPUT'
      );
    }
    const { topic, studentId, sessionId } = parsed.data;

    return this.queue.run(sessionId, async () => {
      this.store.sweepCache();

      const limits = resolveTopicConfig(topic, this.config.defaultTopicConfig);
      const session = createRevisionSession({
        id: sessionId,
        topic,
        studentId,
        maxConversations: limits.maxConversations,
        completionThreshold: limits.completionThreshold,
        startedAt: this.now(),
      });

      const initial = await this.content.getChunks(topic, OPENING_CHUNK_LIMIT);
      session.conceptChunks = await this.content.getAllChunks(topic);

      let reply: TurnReply;
      try {
        reply = {
          response: await this.handlers.opening(topic, initial),
          stage: 'kickoff_response',
          sources: initial.map((chunk) => chunk.chunkId),
        };
      } catch (error) {
        console.error(`[RevisionEngine] Opening message failed for session ${sessionId}:`, error);
        reply = { response: GENERIC_CONTINUATION_MESSAGE, stage: 'general', sources: [] };
      }

      await this.store.put(session);
      await this.store.appendTurn({
        sessionId,
        turn: 0,
        userMessage: null,
        assistantMessage: reply.response,
        stage: reply.stage,
        timestamp: this.now(),
      });

      console.log(
        `[RevisionEngine] Started session ${sessionId} on "${topic}" with ${session.conceptChunks.length} chunks`
      );

      return this.formatResponse(session, reply);
    });
  }

  /**
   * Processes one student turn. Never throws: an unknown session yields
   * the not-found response and every collaborator fault is absorbed.
   */
  async continueSession(sessionId: string, utterance?: string | null): Promise<RevisionResponse> {
    return this.queue.run(sessionId, () => this.processTurn(sessionId, utterance ?? null));
  }

  /**
   * Completes a session on request without counting a turn. Calling it
   * again regenerates the summary; the completion flag is set only once.
   *
   * @throws {RevisionError} SESSION_NOT_FOUND when the session is unknown
   */
  async completeSession(sessionId: string): Promise<RevisionResponse> {
    return this.queue.run(sessionId, async () => {
      const session = await this.store.get(sessionId);
      if (!session) {
        throw new RevisionError(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
      }
      return this.complete(session);
    });
  }

  /**
   * Returns a copy of the session record, or null when it is unknown.
   */
  async getSession(sessionId: string): Promise<RevisionSession | null> {
    const session = await this.store.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  /**
   * Returns the session's turn log, oldest first.
   *
   * @throws {RevisionError} SESSION_NOT_FOUND when the session is unknown
   */
  async getTranscript(sessionId: string): Promise<TurnRecord[]> {
    const session = await this.store.get(sessionId);
    if (!session) {
      throw new RevisionError(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
    }
    return this.store.getTurns(sessionId);
  }

  /**
   * Lists the topics available for revision.
   */
  async listTopics(): Promise<TopicSummary[]> {
    return this.content.listTopics();
  }

  private async processTurn(sessionId: string, utterance: string | null): Promise<RevisionResponse> {
    const session = await this.store.get(sessionId);
    if (!session) {
      return this.notFoundResponse(sessionId);
    }

    session.conversationCount += 1;
    session.lastInteraction = this.now();

    const limits = this.limitsFor(session);

    if (session.isComplete || isEndSessionRequest(utterance)) {
      return this.complete(session, utterance);
    }

    if (limits.maxConversations > 0 && session.conversationCount >= limits.maxConversations) {
      console.log(
        `[RevisionEngine] Session ${sessionId} reached its turn cap of ${limits.maxConversations}`
      );
      return this.complete(session, utterance);
    }

    const stage = resolveStage({
      conversationCount: session.conversationCount,
      utterance,
      quizInProgress: session.quizInProgress,
    });

    let outcome: StageOutcome;
    try {
      outcome = await this.handlers.handle(stage, session, utterance, limits);
    } catch (error) {
      console.error(
        `[RevisionEngine] Stage ${stage} failed on turn ${session.conversationCount} of session ${sessionId}:`,
        error
      );
      return this.persistTurn(session, utterance, {
        response: GENERIC_CONTINUATION_MESSAGE,
        stage: 'general',
        sources: [],
      });
    }

    if (outcome.kind === 'complete') {
      return this.complete(session, utterance);
    }

    // Any reply other than a new question settles the pending one
    if (outcome.stage !== 'engaging_question') {
      session.awaitingAnswer = false;
      session.awaitingAnswerConcept = null;
    }

    return this.persistTurn(session, utterance, outcome);
  }

  private async persistTurn(
    session: RevisionSession,
    utterance: string | null,
    reply: TurnReply
  ): Promise<RevisionResponse> {
    await this.store.appendTurn({
      sessionId: session.id,
      turn: session.conversationCount,
      userMessage: utterance,
      assistantMessage: reply.response,
      stage: reply.stage,
      timestamp: session.lastInteraction,
    });
    await this.store.put(session);

    return this.formatResponse(session, reply);
  }

  /**
   * Marks the session complete and produces the terminal response.
   *
   * @param utterance - The triggering turn's utterance, when completion
   *   happens inside a turn; undefined for a direct completeSession call
   */
  private async complete(
    session: RevisionSession,
    utterance?: string | null
  ): Promise<RevisionResponse> {
    if (!session.isComplete) {
      session.isComplete = true;
      console.log(
        `[RevisionEngine] Session ${session.id} completed after ${session.conversationCount} turns`
      );
    }

    const stats = this.computeStats(session);

    let summary: string;
    try {
      summary = await this.handlers.conclusion(session, stats);
    } catch (error) {
      console.error(`[RevisionEngine] Conclusion failed for session ${session.id}:`, error);
      summary = fallbackSummary(session);
    }

    if (utterance !== undefined) {
      await this.store.appendTurn({
        sessionId: session.id,
        turn: session.conversationCount,
        userMessage: utterance,
        assistantMessage: summary,
        stage: 'session_complete',
        timestamp: this.now(),
      });
    }
    await this.store.put(session);

    return {
      ...this.formatResponse(session, {
        response: summary,
        stage: 'session_complete',
        sources: [],
      }),
      session_summary: summary,
      next_suggested_action: NEXT_SUGGESTED_ACTION,
      session_stats: stats,
    };
  }

  private computeStats(session: RevisionSession): SessionStats {
    const { completionThreshold } = this.limitsFor(session);
    const elapsedMs = this.now().getTime() - session.startedAt.getTime();
    const rate =
      completionThreshold > 0 ? (session.conversationCount / completionThreshold) * 100 : 100;

    return {
      total_interactions: session.conversationCount,
      concepts_covered: session.conceptsCovered.length,
      concepts_list: [...session.conceptsCovered],
      session_duration_minutes: roundToTenth(Math.max(elapsedMs, 0) / 60_000),
      completion_rate: Math.min(100, roundToTenth(rate)),
    };
  }

  /**
   * Effective limits: the session's overrides, falling back to the topic
   * configuration.
   */
  private limitsFor(session: RevisionSession): TopicConfig {
    const resolved = resolveTopicConfig(session.topic, this.config.defaultTopicConfig);
    return {
      maxConversations: session.maxConversations ?? resolved.maxConversations,
      completionThreshold: session.completionThreshold ?? resolved.completionThreshold,
    };
  }

  private formatResponse(session: RevisionSession, reply: TurnReply): RevisionResponse {
    const limits = this.limitsFor(session);

    return {
      response: reply.response,
      topic: session.topic,
      session_id: session.id,
      conversation_count: session.conversationCount,
      is_session_complete: session.isComplete,
      session_summary: null,
      sources: reply.sources,
      current_stage: reply.stage,
      max_conversations: limits.maxConversations,
      completion_threshold: limits.completionThreshold,
      timestamp: this.now().toISOString(),
    };
  }

  private notFoundResponse(sessionId: string): RevisionResponse {
    return {
      response: SESSION_NOT_FOUND_MESSAGE,
      topic: '',
      session_id: sessionId,
      conversation_count: 0,
      is_session_complete: false,
      session_summary: null,
      sources: [],
      current_stage: 'general',
      max_conversations: this.config.defaultTopicConfig.maxConversations,
      completion_threshold: this.config.defaultTopicConfig.completionThreshold,
      timestamp: this.now().toISOString(),
    };
  }
}
