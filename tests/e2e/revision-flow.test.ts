/**
 * Revision Flow End-to-End Tests
 *
 * Drives the RevisionEngine over an in-memory database seeded with a
 * six-chunk topic and a scripted text generator, from session start to
 * completion.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  GENERIC_CONTINUATION_MESSAGE,
  NEXT_SUGGESTED_ACTION,
  RevisionEngine,
  RevisionError,
  SESSION_NOT_FOUND_MESSAGE,
  SessionCache,
  SessionStore,
} from '../../src/core/session';
import type { NewTurnRecord, RevisionSession, TurnRecord } from '../../src/core/models';
import type { AppendOnlyRepository, SnapshotRepository } from '../../src/storage/repositories';
import { MOCK_REPLIES, MockTextGenerator, createClock, seedTopic } from '../helpers';
import { cleanupTestDatabase, createTestContext, createTestEngine, type TestContext } from '../setup';

const TOPIC = 'nutrition';
const START = { topic: TOPIC, studentId: 'student_1', sessionId: 'sess_1' };

describe('Revision flow', () => {
  let context: TestContext;
  let generator: MockTextGenerator;
  let clock: ReturnType<typeof createClock>;
  let engine: RevisionEngine;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    context = createTestContext();
    await seedTopic(context.repos.contentRepo, TOPIC, 6);
    generator = new MockTextGenerator();
    clock = createClock();
    engine = createTestEngine(context, generator, { now: clock.now });
  });

  afterEach(() => {
    cleanupTestDatabase(context);
    vi.restoreAllMocks();
  });

  describe('startSession', () => {
    it('opens with the first chunks and logs turn zero', async () => {
      const response = await engine.startSession(START);

      expect(response).toEqual({
        response: MOCK_REPLIES.opening,
        topic: TOPIC,
        session_id: 'sess_1',
        conversation_count: 0,
        is_session_complete: false,
        session_summary: null,
        sources: ['nutrition_001', 'nutrition_002', 'nutrition_003'],
        current_stage: 'kickoff_response',
        max_conversations: 25,
        completion_threshold: 15,
        timestamp: '2024-03-01T09:00:00.000Z',
      });

      const transcript = await engine.getTranscript('sess_1');
      expect(transcript.map((t) => [t.turn, t.userMessage, t.stage])).toEqual([
        [0, null, 'kickoff_response'],
      ]);

      const session = await engine.getSession('sess_1');
      expect(session?.conceptChunks).toHaveLength(6);
      expect(session?.conversationCount).toBe(0);
    });

    it('uses the topic table for known topics', async () => {
      const response = await engine.startSession({ ...START, topic: 'Photosynthesis' });

      expect(response.max_conversations).toBe(30);
      expect(response.completion_threshold).toBe(20);
      expect(response.sources).toEqual([]);
    });

    it('rejects blank fields', async () => {
      const attempt = engine.startSession({ ...START, topic: '   ' });

      await expect(attempt).rejects.toBeInstanceOf(RevisionError);
      await expect(attempt).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    });

    it('still creates the session when the opening cannot be generated', async () => {
      generator.failWith(new Error('generator down'));

      const response = await engine.startSession(START);

      expect(response.response).toBe(GENERIC_CONTINUATION_MESSAGE);
      expect(response.current_stage).toBe('general');
      expect(await engine.getSession('sess_1')).not.toBeNull();
    });
  });

  describe('continueSession', () => {
    beforeEach(async () => {
      await engine.startSession(START);
    });

    it('walks the topic through every stage to completion', async () => {
      const stages: string[] = [];
      const sources: string[][] = [];
      const utterances = ['quick recap please', ...Array<string>(10).fill('ok')];

      let last = await engine.continueSession('sess_1', utterances[0]);
      stages.push(last.current_stage);
      sources.push(last.sources);
      for (const utterance of utterances.slice(1)) {
        clock.advance(60_000);
        last = await engine.continueSession('sess_1', utterance);
        stages.push(last.current_stage);
        sources.push(last.sources);
      }

      expect(stages).toEqual([
        'kickoff_response',
        'progressive_recap',
        'engaging_question',
        'progressive_recap',
        'progressive_recap',
        'engaging_question',
        'progressive_recap',
        'progressive_recap',
        'engaging_question',
        'mini_quiz',
        'session_complete',
      ]);
      expect(sources.filter((ids) => ids.length > 0)).toEqual([
        ['nutrition_001'],
        ['nutrition_002'],
        ['nutrition_003'],
        ['nutrition_004'],
        ['nutrition_005'],
        ['nutrition_006'],
      ]);

      expect(last.is_session_complete).toBe(true);
      expect(last.conversation_count).toBe(11);
      expect(last.session_summary).toBe(MOCK_REPLIES.conclusion);
      expect(last.next_suggested_action).toBe(NEXT_SUGGESTED_ACTION);
      expect(last.session_stats).toEqual({
        total_interactions: 11,
        concepts_covered: 6,
        concepts_list: [
          'Concept 1 of',
          'Concept 2 of',
          'Concept 3 of',
          'Concept 4 of',
          'Concept 5 of',
          'Concept 6 of',
        ],
        session_duration_minutes: 10,
        completion_rate: 73.3,
      });

      const session = await engine.getSession('sess_1');
      expect(session?.currentChunkIndex).toBe(5);
      expect(session?.recapMode).toBe('quick_recap');

      const transcript = await engine.getTranscript('sess_1');
      expect(transcript.map((t) => t.turn)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
      expect(transcript.at(-1)?.stage).toBe('session_complete');
    });

    it('clears a pending question on the next reply', async () => {
      await engine.continueSession('sess_1', 'ok');
      await engine.continueSession('sess_1', 'ok');
      await engine.continueSession('sess_1', 'ok');
      expect((await engine.getSession('sess_1'))?.awaitingAnswer).toBe(true);

      await engine.continueSession('sess_1', 'ok');

      const session = await engine.getSession('sess_1');
      expect(session?.awaitingAnswer).toBe(false);
      expect(session?.awaitingAnswerConcept).toBeNull();
    });

    it('answers questions from matching chunks', async () => {
      await engine.continueSession('sess_1', 'ok');

      const response = await engine.continueSession('sess_1', 'what does this concept mean?');

      expect(response.current_stage).toBe('user_question');
      expect(response.response).toBe(MOCK_REPLIES.answer);
      expect(response.sources).toHaveLength(3);
    });

    it('returns the not-found response for an unknown session', async () => {
      const response = await engine.continueSession('missing', 'hello');

      expect(response).toMatchObject({
        response: SESSION_NOT_FOUND_MESSAGE,
        session_id: 'missing',
        conversation_count: 0,
        is_session_complete: false,
        current_stage: 'general',
        sources: [],
      });
    });

    it('counts the turn and replies generically when generation fails', async () => {
      generator.failWith(new Error('generator down'));

      const response = await engine.continueSession('sess_1', 'ok');

      expect(response.response).toBe(GENERIC_CONTINUATION_MESSAGE);
      expect(response.current_stage).toBe('general');
      expect(response.conversation_count).toBe(1);
      expect((await engine.getSession('sess_1'))?.conceptsCovered).toEqual([]);
      expect((await engine.getTranscript('sess_1')).at(-1)?.stage).toBe('general');
    });

    it('picks up at the first chunk after a failed kickoff', async () => {
      generator.failWith(new Error('generator down'));
      await engine.continueSession('sess_1', 'ok');
      generator.recover();

      const response = await engine.continueSession('sess_1', 'ok');

      expect(response.current_stage).toBe('progressive_recap');
      expect(response.sources).toEqual(['nutrition_001']);
      expect((await engine.getSession('sess_1'))?.conceptsCovered).toEqual(['Concept 1 of']);
    });

    it('ends the session when the student asks to', async () => {
      await engine.continueSession('sess_1', 'ok');

      const response = await engine.continueSession('sess_1', "I'm done for today");

      expect(response.is_session_complete).toBe(true);
      expect(response.current_stage).toBe('session_complete');
      expect(response.conversation_count).toBe(2);
      expect(response.session_stats).toEqual({
        total_interactions: 2,
        concepts_covered: 1,
        concepts_list: ['Concept 1 of'],
        session_duration_minutes: 0,
        completion_rate: 13.3,
      });
    });

    it('keeps counting turns after completion', async () => {
      await engine.continueSession('sess_1', 'done');

      const response = await engine.continueSession('sess_1', 'ok');

      expect(response.is_session_complete).toBe(true);
      expect(response.conversation_count).toBe(2);
      expect(response.session_summary).toBe(MOCK_REPLIES.conclusion);
    });

    it('uses the fallback summary when the conclusion fails', async () => {
      generator.failWith(new Error('generator down'), 'has finished a revision session');

      const response = await engine.continueSession('sess_1', 'end session');

      expect(response.session_summary).toBe(
        'Congratulations on completing your revision of nutrition! You worked through 1 interactions. Keep revisiting these ideas to make them stick.'
      );
    });

    it('serializes concurrent turns of one session', async () => {
      const responses = await Promise.all([
        engine.continueSession('sess_1', 'ok'),
        engine.continueSession('sess_1', 'ok'),
        engine.continueSession('sess_1', 'ok'),
      ]);

      expect(responses.map((r) => r.conversation_count)).toEqual([1, 2, 3]);
      expect(responses.map((r) => r.current_stage)).toEqual([
        'kickoff_response',
        'progressive_recap',
        'engaging_question',
      ]);
    });

    it('resumes from the snapshot with a fresh cache', async () => {
      await engine.continueSession('sess_1', 'ok');

      const cache = new SessionCache({ ttlMs: 60_000, maxEntries: 10 });
      const store = new SessionStore({
        sessionRepo: context.repos.sessionRepo,
        turnRepo: context.repos.turnRepo,
        cache,
      });
      const restarted = createTestEngine({ ...context, cache, store }, generator, { now: clock.now });

      const response = await restarted.continueSession('sess_1', 'ok');

      expect(response.conversation_count).toBe(2);
      expect(response.sources).toEqual(['nutrition_002']);
    });
  });

  describe('durable write failures', () => {
    const failingSessions: SnapshotRepository<RevisionSession> = {
      findById: async () => null,
      upsert: async () => {
        throw new Error('disk full');
      },
    };
    const failingTurns: AppendOnlyRepository<TurnRecord, NewTurnRecord> = {
      append: async () => {
        throw new Error('disk full');
      },
      findByParentId: async () => [],
    };

    it('keeps answering and counting turns from the cache', async () => {
      const cache = new SessionCache({ ttlMs: 60_000, maxEntries: 10 });
      const store = new SessionStore({ sessionRepo: failingSessions, turnRepo: failingTurns, cache });
      engine = createTestEngine({ ...context, cache, store }, generator, { now: clock.now });

      const opening = await engine.startSession(START);
      const first = await engine.continueSession('sess_1', 'ok');
      const second = await engine.continueSession('sess_1', 'ok');

      expect(opening.response).toBe(MOCK_REPLIES.opening);
      expect(first).toMatchObject({
        response: MOCK_REPLIES.recap,
        current_stage: 'kickoff_response',
        conversation_count: 1,
        sources: ['nutrition_001'],
      });
      expect(second).toMatchObject({
        current_stage: 'progressive_recap',
        conversation_count: 2,
        sources: ['nutrition_002'],
      });
      expect(console.error).toHaveBeenCalledWith(
        '[SessionStore] Failed to persist session sess_1:',
        expect.any(Error)
      );
      expect(console.error).toHaveBeenCalledWith(
        '[SessionStore] Failed to log turn 2 of session sess_1:',
        expect.any(Error)
      );
    });
  });

  describe('turn cap', () => {
    it('completes when the cap is reached', async () => {
      engine = createTestEngine(context, generator, {
        now: clock.now,
        config: { defaultTopicConfig: { maxConversations: 3, completionThreshold: 15 } },
      });
      await engine.startSession(START);

      await engine.continueSession('sess_1', 'ok');
      await engine.continueSession('sess_1', 'ok');
      const response = await engine.continueSession('sess_1', 'ok');

      expect(response.is_session_complete).toBe(true);
      expect(response.conversation_count).toBe(3);
      expect(response.max_conversations).toBe(3);
    });

    it('never caps a session whose limit is zero', async () => {
      engine = createTestEngine(context, generator, {
        now: clock.now,
        config: { defaultTopicConfig: { maxConversations: 0, completionThreshold: 15 } },
      });
      await engine.startSession(START);

      await engine.continueSession('sess_1', 'ok');
      const response = await engine.continueSession('sess_1', 'ok');

      expect(response.is_session_complete).toBe(false);
      expect(response.conversation_count).toBe(2);
      expect(response.max_conversations).toBe(0);
    });
  });

  describe('completeSession', () => {
    it('completes without counting a turn and can be repeated', async () => {
      await engine.startSession(START);

      const first = await engine.completeSession('sess_1');
      const second = await engine.completeSession('sess_1');

      expect(first.is_session_complete).toBe(true);
      expect(first.conversation_count).toBe(0);
      expect(first.session_stats?.completion_rate).toBe(0);
      expect(second.is_session_complete).toBe(true);
      expect(second.session_summary).toBe(MOCK_REPLIES.conclusion);
      expect(await engine.getTranscript('sess_1')).toHaveLength(1);
    });

    it('rejects an unknown session', async () => {
      await expect(engine.completeSession('missing')).rejects.toMatchObject({
        code: 'SESSION_NOT_FOUND',
      });
    });
  });

  it('lists seeded topics', async () => {
    expect(await engine.listTopics()).toEqual([
      { topic: TOPIC, chunkCount: 6, description: 'Study material with 6 content sections' },
    ]);
  });
});
