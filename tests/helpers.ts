/**
 * Test Helpers Module
 *
 * Scripted text generator, chunk fixtures and a controllable clock shared
 * by the integration tests.
 */

import type { ContentChunkRepository } from '../src/storage/repositories';
import type { ContentChunk } from '../src/core/models';
import type { CompletionOptions, LLMMessage, LLMResponse, TextGenerator } from '../src/llm/types';

// ============================================================================
// Mock Text Generator
// ============================================================================

/**
 * Canned replies, keyed by the prompt they answer.
 */
export const MOCK_REPLIES = {
  opening: 'Welcome to your revision session!',
  recap: 'Here is the next section explained.',
  question: 'Here is a question for you.',
  quiz: 'Mini quiz time!',
  quizFeedback: 'Nice work on the quiz.',
  progress: 'You are making steady progress.',
  conclusion: 'Well done, the session is complete.',
  answer: 'Here is the answer to your question.',
  fallback: 'Let us keep going.',
} as const;

const REPLY_MARKERS: ReadonlyArray<readonly [string, string]> = [
  ['We are starting a revision session', MOCK_REPLIES.opening],
  ['Revision of "', MOCK_REPLIES.recap],
  ['Ask exactly one', MOCK_REPLIES.question],
  ['Time for a mini quiz', MOCK_REPLIES.quiz],
  ['answered a mini quiz', MOCK_REPLIES.quizFeedback],
  ['short progress update', MOCK_REPLIES.progress],
  ['has finished a revision session', MOCK_REPLIES.conclusion],
  ['the student asked:', MOCK_REPLIES.answer],
];

export interface RecordedCall {
  prompt: string;
  options: CompletionOptions | undefined;
}

/**
 * TextGenerator that answers from MOCK_REPLIES and records every prompt.
 * Calls can be made to fail, either all of them or those whose prompt
 * contains a marker.
 */
export class MockTextGenerator implements TextGenerator {
  readonly calls: RecordedCall[] = [];
  private failure: { error: Error; marker: string | null } | null = null;

  async complete(
    messages: string | LLMMessage[],
    options?: CompletionOptions
  ): Promise<LLMResponse> {
    const prompt = typeof messages === 'string' ? messages : messages.map((m) => m.content).join('\n');
    this.calls.push({ prompt, options });

    if (this.failure && (this.failure.marker === null || prompt.includes(this.failure.marker))) {
      throw this.failure.error;
    }

    const match = REPLY_MARKERS.find(([marker]) => prompt.includes(marker));
    return {
      text: match ? match[1] : MOCK_REPLIES.fallback,
      usage: { inputTokens: 10, outputTokens: 5 },
      stopReason: 'end_turn',
    };
  }

  /** Makes every later call fail, or only those whose prompt contains `marker` */
  failWith(error: Error, marker: string | null = null): void {
    this.failure = { error, marker };
  }

  recover(): void {
    this.failure = null;
  }

  get lastPrompt(): string | undefined {
    return this.calls.at(-1)?.prompt;
  }
}

// ============================================================================
// Content Fixtures
// ============================================================================

/**
 * Builds `count` chunks whose concept names (first three words) differ.
 */
export function makeChunks(topic: string, count: number): ContentChunk[] {
  return Array.from({ length: count }, (_, i) => ({
    chunkId: `${topic}_${String(i + 1).padStart(3, '0')}`,
    topic,
    text: `Concept ${i + 1} of ${topic} describes one idea in a short sentence.`,
  }));
}

/**
 * Inserts fixture chunks for a topic and returns them.
 */
export async function seedTopic(
  repo: ContentChunkRepository,
  topic: string,
  count: number
): Promise<ContentChunk[]> {
  const chunks = makeChunks(topic, count);
  await repo.createMany(chunks);
  return chunks;
}

// ============================================================================
// Clock
// ============================================================================

/**
 * A clock that only moves when told to.
 */
export function createClock(start = new Date('2024-03-01T09:00:00.000Z')) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}
