import * as core from '@actions/core';

import type { ClientCache } from '../lib/client-cache.js';
import { ConfigurationError, errorMessage } from '../lib/errors.js';
import type { BackendKind } from '../lib/llm.js';
import { REVIEWER_SYSTEM_PROMPT } from '../lib/role-prompts.js';
import { CATEGORY_TABLE, type CategoryDef } from './categories.js';
import type { ReviewCategory, ReviewerResult } from './types.js';

export type ReviewerOptions = {
  cache: ClientCache;
  backend: BackendKind;
  temperature: number;
  maxTokens?: number;
};

// Reviewers never sample below this, whatever the configured temperature.
export const MIN_REVIEWER_TEMPERATURE = 0.2;
export const DEFAULT_REVIEWER_MAX_TOKENS = 2000;

export class SpecializedReviewer {
  readonly def: CategoryDef;

  constructor(
    readonly category: ReviewCategory,
    private readonly opts: ReviewerOptions
  ) {
    this.def = CATEGORY_TABLE[category];
  }

  get name(): string {
    return this.def.reviewerName;
  }

  /**
   * Resolves to null when the backend call fails or comes back empty.
   * ConfigurationError is rethrown: missing credentials are not a soft failure.
   */
  async review(payload: string, diffOnly = false): Promise<ReviewerResult | null> {
    const { cache, backend, temperature } = this.opts;
    const userPrompt = this.def.buildPrompt(payload, diffOnly);

    let reply: string;
    try {
      const client = await cache.acquire(`${this.category}_agent`, backend, temperature);
      reply = await client.complete({
        systemPrompt: REVIEWER_SYSTEM_PROMPT(this.def.title.toLowerCase()),
        userPrompt,
        temperature: Math.max(MIN_REVIEWER_TEMPERATURE, temperature),
        maxTokens: this.opts.maxTokens ?? DEFAULT_REVIEWER_MAX_TOKENS,
      });
    } catch (e) {
      if (e instanceof ConfigurationError) throw e;
      core.error(`Error in ${this.name}: ${errorMessage(e)}`);
      return null;
    }

    if (!reply.trim()) {
      core.error(`${this.name} returned empty response`);
      return null;
    }

    core.debug(`${this.name} completed successfully`);
    const parsed = this.def.parse(reply);

    return Object.freeze({
      reviewerName: this.name,
      category: this.category,
      score: parsed.score,
      summary: parsed.summary,
      rawText: reply,
      findings: Object.freeze(parsed.findings),
      recommendations: Object.freeze(parsed.recommendations),
    });
  }
}
