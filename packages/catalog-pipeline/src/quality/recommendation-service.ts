/**
 * Recommendation text for quality reports
 *
 * Talks to an Ollama-compatible chat endpoint. Failures propagate to the
 * caller; QualityScorer replaces them with RECOMMENDATIONS_UNAVAILABLE.
 */

import { z } from 'zod';
import type { RecommendationService } from '../core/types.js';
import { HTTPClient } from '../core/http-client.js';

export const RECOMMENDATIONS_UNAVAILABLE =
  'Recommendations unavailable: the text generation service could not be reached.';

const SYSTEM_PROMPT =
  'You are a data quality expert. Give three short, concrete recommendations.';

export interface OllamaRecommendationConfig {
  /** Default: http://localhost:11434 */
  readonly baseUrl?: string;
  /** Default: llama3.2 */
  readonly model?: string;
  readonly timeoutMs?: number;
  readonly client?: HTTPClient;
}

const ChatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

export class OllamaRecommendationService implements RecommendationService {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly client: HTTPClient;

  constructor(config: OllamaRecommendationConfig = {}) {
    this.baseUrl = (config.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
    this.model = config.model ?? 'llama3.2';
    this.timeoutMs = config.timeoutMs ?? 60_000;
    // Local model: a retry rarely helps and each attempt is slow
    this.client = config.client ?? new HTTPClient({ maxRetries: 0, timeoutMs: this.timeoutMs });
  }

  async generate(summary: string): Promise<string> {
    const data = await this.client.postJSON(
      `${this.baseUrl}/api/chat`,
      {
        model: this.model,
        stream: false,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: `${summary}\n\nWhat are your priority recommendations?` },
        ],
      },
      { timeoutMs: this.timeoutMs }
    );

    const parsed = ChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(
        `Unexpected chat response: ${parsed.error.errors.map((e) => e.message).join(', ')}`
      );
    }

    const content = parsed.data.message.content.trim();
    if (content.length === 0) {
      throw new Error('Chat response was empty');
    }
    return content;
  }
}
