/**
 * In-process GenerativeProvider stand-in
 *
 * Replies from a queue of canned texts or errors; once the queue is empty
 * it answers with a valid payload.
 */

import type {
  GenerationRequest,
  GenerationResult,
  GenerativeProvider,
} from '../../src/analysis/index.js';
import type { TokenUsage } from '../../src/config/costs.js';
import { createValidPayload } from './fixtures.js';

export class FakeGenerativeProvider implements GenerativeProvider {
  readonly modelId = 'gemini-test';
  readonly requests: GenerationRequest[] = [];
  usage: TokenUsage = { inputTokens: 1000, outputTokens: 200, cachedInputTokens: 0 };
  /** Resolves before every reply when set, to hold generations in flight */
  gate: Promise<void> | null = null;
  private readonly queue: Array<string | Error> = [];

  respondWith(...replies: Array<string | Error>): this {
    this.queue.push(...replies);
    return this;
  }

  get calls(): number {
    return this.requests.length;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    if (this.gate) {
      await this.gate;
    }
    const reply = this.queue.shift() ?? JSON.stringify(createValidPayload());
    if (reply instanceof Error) {
      throw reply;
    }
    return { text: reply, modelId: this.modelId, usage: { ...this.usage } };
  }
}
