/**
 * Herald — Weekly Summarizer
 *
 * Best-effort prose for the weekly digest via the Anthropic Messages API.
 * Callers fall back to the deterministic digest when this throws.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { Activity, ReportingWindow } from '../types';
import { buildSummaryPrompt, buildSummarySystemPrompt, type DigestOptions } from './digest';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'Summarizer' });

export interface Summarizer {
  summarize(activities: Activity[], window: ReportingWindow): Promise<string>;
}

export interface AnthropicSummarizerConfig extends DigestOptions {
  apiKey: string;
  model: string;
  maxTokens?: number;
  temperature?: number;
}

export class AnthropicSummarizer implements Summarizer {
  private client: Anthropic | null = null;

  constructor(private readonly config: AnthropicSummarizerConfig) {}

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.config.apiKey });
    }
    return this.client;
  }

  async summarize(activities: Activity[], window: ReportingWindow): Promise<string> {
    const response = await this.getClient().messages.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens ?? 2000,
      temperature: this.config.temperature ?? 0.7,
      system: buildSummarySystemPrompt(this.config.projectName),
      messages: [{ role: 'user', content: buildSummaryPrompt(activities, window, this.config) }],
    });

    const textContent = response.content.find((c) => c.type === 'text');
    if (!textContent || textContent.type !== 'text' || textContent.text.trim() === '') {
      throw new Error('No text content in response');
    }

    log.info('Weekly summary generated', {
      activities: activities.length,
      characters: textContent.text.length,
      tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
    });

    return textContent.text.trim();
  }
}
