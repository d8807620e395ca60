import * as core from '@actions/core';

import type { ClientCache } from '../lib/client-cache.js';
import { ConfigurationError, errorMessage } from '../lib/errors.js';
import type { BackendKind } from '../lib/llm.js';
import { buildDiffContextPayload } from '../lib/role-prompts.js';
import { ConsolidationEngine } from './consolidation.js';
import { runPool, type TaskOutcome } from './pool.js';
import { SpecializedReviewer } from './reviewer.js';
import {
  isReviewCategory,
  REVIEW_CATEGORIES,
  type ConsolidatedResult,
  type CycleState,
  type ReviewCategory,
  type ReviewComment,
  type ReviewerResult,
} from './types.js';

export const DEFAULT_REVIEWER_TIMEOUT_MS = 360_000;
export const DEFAULT_PRIMARY_PATH = 'code_snippet';

export type OrchestratorOptions = {
  cache: ClientCache;
  backend: BackendKind;
  temperature: number;
  enabled?: readonly string[];
  timeoutMs?: number;
  maxRetries?: number;
  maxTokens?: number;
};

export type RunOptions = {
  diffOnly?: boolean;
  parallel?: boolean;
};

export type CycleOptions = RunOptions & {
  primaryFilePath?: string;
  knownFilePaths?: readonly string[];
};

export type CycleTransition = {
  from: CycleState;
  to: CycleState;
  reason?: string;
};

export type CycleReport = {
  state: CycleState;
  transitions: CycleTransition[];
  consolidated: ConsolidatedResult | null;
  comments: ReviewComment[];
  failedCategories: ReviewCategory[];
};

export type OrchestratorStatistics = {
  total: number;
  enabled: ReviewCategory[];
  available: ReviewCategory[];
  disabled: ReviewCategory[];
};

type Collected = {
  results: ReviewerResult[];
  failed: ReviewCategory[];
};

const NEXT_STATES: Readonly<Record<CycleState, readonly CycleState[]>> = {
  idle: ['dispatching', 'degraded'],
  dispatching: ['collecting', 'degraded'],
  collecting: ['consolidating', 'degraded'],
  consolidating: ['rendering'],
  rendering: ['done', 'degraded'],
  degraded: [],
  done: [],
};

class CycleTracker {
  state: CycleState = 'idle';
  readonly transitions: CycleTransition[] = [];

  move(to: CycleState, reason?: string): void {
    if (!NEXT_STATES[this.state].includes(to)) {
      throw new Error(`Invalid review cycle transition: ${this.state} -> ${to}`);
    }
    this.transitions.push({ from: this.state, to, ...(reason ? { reason } : {}) });
    core.debug(`Review cycle: ${this.state} -> ${to}${reason ? ` (${reason})` : ''}`);
    this.state = to;
  }
}

export function resolveCategories(names: readonly string[] | undefined): ReviewCategory[] {
  if (!names) return [...REVIEW_CATEGORIES];
  const out: ReviewCategory[] = [];
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    if (!isReviewCategory(name)) {
      core.warning(`Unknown review category ignored: ${raw}`);
      continue;
    }
    if (!out.includes(name)) out.push(name);
  }
  return out;
}

export class Orchestrator {
  readonly reviewers: ReadonlyMap<ReviewCategory, SpecializedReviewer>;
  readonly engine: ConsolidationEngine;
  readonly timeoutMs: number;
  private enabled: ReviewCategory[];

  constructor(opts: OrchestratorOptions) {
    const { cache, backend, temperature } = opts;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_REVIEWER_TIMEOUT_MS;

    this.reviewers = new Map<ReviewCategory, SpecializedReviewer>(
      REVIEW_CATEGORIES.map((c) => [c, new SpecializedReviewer(c, { cache, backend, temperature, maxTokens: opts.maxTokens })])
    );

    this.engine = new ConsolidationEngine({
      cache,
      backend,
      temperature: Math.min(1, temperature * 2),
      maxRetries: opts.maxRetries,
    });

    this.enabled = resolveCategories(opts.enabled);
  }

  available(): ReviewCategory[] {
    return [...REVIEW_CATEGORIES];
  }

  enabledCategories(): ReviewCategory[] {
    return [...this.enabled];
  }

  setEnabled(names: readonly string[]): void {
    this.enabled = resolveCategories(names);
    core.info(`Enabled reviewers: ${this.enabled.join(', ') || '(none)'}`);
  }

  statistics(): OrchestratorStatistics {
    const available = this.available();
    return {
      total: available.length,
      enabled: this.enabledCategories(),
      available,
      disabled: available.filter((c) => !this.enabled.includes(c)),
    };
  }

  async run(payload: string, opts: RunOptions = {}): Promise<ReviewerResult[]> {
    return (await this.collect(payload, opts)).results;
  }

  private async collect(payload: string, { diffOnly = false, parallel = true }: RunOptions): Promise<Collected> {
    const categories = this.enabledCategories();
    if (!categories.length) {
      core.warning('No reviewers enabled');
      return { results: [], failed: [] };
    }

    core.info(`Running ${categories.length} reviewers ${parallel ? 'in parallel' : 'sequentially'}`);

    const tasks = categories.map((category) => ({
      key: category,
      run: () => this.reviewerFor(category).review(payload, diffOnly),
    }));

    const results: ReviewerResult[] = [];
    const failed: ReviewCategory[] = [];
    const configErrors: ConfigurationError[] = [];

    const onSettled = (outcome: TaskOutcome<ReviewCategory, ReviewerResult | null>) => {
      const name = this.reviewerFor(outcome.key).name;
      if (outcome.status === 'fulfilled' && outcome.value) {
        core.info(`${name} completed`);
        results.push(outcome.value);
        return;
      }

      failed.push(outcome.key);
      if (outcome.status === 'timeout') {
        core.error(`${name} timed out after ${outcome.timeoutMs}ms`);
      } else if (outcome.status === 'rejected') {
        if (outcome.reason instanceof ConfigurationError) configErrors.push(outcome.reason);
        core.error(`${name} failed: ${errorMessage(outcome.reason)}`);
      } else {
        core.warning(`${name} produced no result`);
      }
    };

    await runPool(tasks, {
      concurrency: parallel ? tasks.length : 1,
      timeoutMs: this.timeoutMs,
      onSettled,
    });

    if (configErrors.length) throw configErrors[0];

    core.info(`Collected ${results.length}/${categories.length} reviewer results`);
    return { results, failed };
  }

  private reviewerFor(category: ReviewCategory): SpecializedReviewer {
    const reviewer = this.reviewers.get(category);
    if (!reviewer) throw new Error(`No reviewer registered for ${category}`);
    return reviewer;
  }

  async reviewDiffWithContext(diff: string, fileContent: string, opts: Omit<RunOptions, 'diffOnly'> = {}): Promise<ReviewerResult[]> {
    return this.run(buildDiffContextPayload(diff, fileContent), { ...opts, diffOnly: true });
  }

  /**
   * One full review: dispatch, collect, consolidate, render comments.
   * Ends in `done`, or in `degraded` when any reviewer failed, nothing could
   * be reviewed, or comment generation fell back to an empty list.
   */
  async reviewCycle(payload: string, opts: CycleOptions = {}): Promise<CycleReport> {
    const cycle = new CycleTracker();
    const report = (consolidated: ConsolidatedResult | null, comments: ReviewComment[], failed: ReviewCategory[]): CycleReport => ({
      state: cycle.state,
      transitions: cycle.transitions,
      consolidated,
      comments,
      failedCategories: failed,
    });

    if (!payload.trim()) {
      cycle.move('degraded', 'empty payload');
      return report(null, [], []);
    }

    cycle.move('dispatching');
    if (!this.enabled.length) {
      cycle.move('degraded', 'no reviewers enabled');
      return report(null, [], []);
    }

    cycle.move('collecting');
    const { results, failed } = await this.collect(payload, opts);
    if (!results.length) {
      cycle.move('degraded', 'no review possible');
      return report(null, [], failed);
    }

    cycle.move('consolidating');
    const consolidated = await this.engine.consolidate(results, payload);

    cycle.move('rendering');
    const generated = await this.engine.renderComments(
      consolidated,
      opts.primaryFilePath ?? DEFAULT_PRIMARY_PATH,
      opts.knownFilePaths ?? []
    );

    if (generated.status !== 'ok') {
      cycle.move('degraded', `comment generation: ${generated.status}`);
    } else if (failed.length) {
      cycle.move('degraded', `reviewers failed: ${failed.join(', ')}`);
    } else {
      cycle.move('done');
    }

    return report(consolidated, generated.comments, failed);
  }
}
