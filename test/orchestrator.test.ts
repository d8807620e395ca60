import { describe, expect, it, vi } from 'vitest';

import { CATEGORY_TABLE } from '../src/review/categories.js';
import { Orchestrator, resolveCategories } from '../src/review/orchestrator.js';
import { REVIEW_CATEGORIES, type ReviewCategory } from '../src/review/types.js';
import { ClientCache } from '../src/lib/client-cache.js';
import { BackendError, ConfigurationError } from '../src/lib/errors.js';
import type { CompletionRequest } from '../src/lib/llm.js';
import { fakeCache, isCommentsCall, isNarrativeCall, type Responder } from './helpers.js';

vi.mock('@actions/core');

const COMMENTS = '[{"file_path":"src/a.js","line_number":3,"review_comment":"Use a parameterized query"}]';

function categoryOf(req: CompletionRequest): ReviewCategory | undefined {
  return REVIEW_CATEGORIES.find((c) =>
    req.systemPrompt.startsWith(`You are a ${CATEGORY_TABLE[c].title.toLowerCase()} expert`)
  );
}

// Reviewers answer per category; consolidation calls get fixed replies.
function responder(overrides: Partial<Record<ReviewCategory, Responder>> = {}, comments = COMMENTS): Responder {
  return (req) => {
    if (isNarrativeCall(req)) return 'Consolidated narrative.';
    if (isCommentsCall(req)) return comments;
    const category = categoryOf(req);
    const override = category ? overrides[category] : undefined;
    if (override) return override(req);
    return `Line 3: Issue: ${category} concern. Fix: address it`;
  };
}

function build(respond: Responder, enabled?: string[], timeoutMs = 1000) {
  const { cache, backends } = fakeCache(respond);
  const orchestrator = new Orchestrator({ cache, backend: 'local', temperature: 0.1, enabled, timeoutMs });
  return { orchestrator, cache, backends };
}

describe('category selection', () => {
  it('drops unknown names and duplicates', () => {
    expect(resolveCategories(['security', 'bogus', 'SECURITY', ' style '])).toEqual(['security', 'style']);
  });

  it('enables everything by default and reports statistics', () => {
    const { orchestrator } = build(responder());
    orchestrator.setEnabled(['security', 'performance']);

    expect(orchestrator.statistics()).toEqual({
      total: 6,
      enabled: ['security', 'performance'],
      available: ['security', 'performance', 'style', 'architecture', 'readability', 'testability'],
      disabled: ['style', 'architecture', 'readability', 'testability'],
    });
  });
});

describe('Orchestrator.run', () => {
  it('collects one result per enabled reviewer', async () => {
    const { orchestrator } = build(responder(), ['security', 'performance', 'style']);
    const results = await orchestrator.run('const a = 1;');

    expect(results.map((r) => r.category).sort()).toEqual(['performance', 'security', 'style']);
  });

  it('excludes failed and empty reviewers', async () => {
    const { orchestrator } = build(
      responder({
        security: () => {
          throw new BackendError('offline');
        },
        style: () => '',
      }),
      ['security', 'performance', 'style']
    );

    const results = await orchestrator.run('code');
    expect(results.map((r) => r.category)).toEqual(['performance']);
  });

  it('excludes a reviewer that exceeds its timeout', async () => {
    const { orchestrator } = build(
      responder({ performance: () => new Promise<string>(() => undefined) }),
      ['security', 'performance'],
      50
    );

    const results = await orchestrator.run('code');
    expect(results.map((r) => r.category)).toEqual(['security']);
  });

  it('runs sequentially in submission order', async () => {
    const slow: Responder = () => new Promise((resolve) => setTimeout(() => resolve('Issue: slow one'), 30));
    const { orchestrator } = build(responder({ security: slow }), ['security', 'performance']);

    const results = await orchestrator.run('code', { parallel: false });
    expect(results.map((r) => r.category)).toEqual(['security', 'performance']);
  });

  it('propagates configuration errors', async () => {
    const cache = new ClientCache(async () => {
      throw new ConfigurationError('Missing Azure credentials: clientId', ['clientId']);
    });
    const orchestrator = new Orchestrator({ cache, backend: 'hosted', temperature: 0.1, enabled: ['security'] });

    await expect(orchestrator.run('code')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('wraps a diff with its file context in diff-only mode', async () => {
    const { orchestrator, backends } = build(responder(), ['readability']);
    await orchestrator.reviewDiffWithContext('+const b = 2;', 'const a = 1;\nconst b = 2;');

    const prompt = backends[0].calls[0].userPrompt;
    expect(prompt).toContain('CRITICAL RESTRICTION');
    expect(prompt).toContain('DIFF TO REVIEW:\n+const b = 2;\n\nFULL FILE CONTEXT:\nconst a = 1;\nconst b = 2;');
  });
});

describe('Orchestrator.reviewCycle', () => {
  it('walks every state on a clean run', async () => {
    const { orchestrator, cache } = build(responder(), ['security', 'style']);
    const report = await orchestrator.reviewCycle('code', { knownFilePaths: ['src/a.js', 'src/b.js'] });

    expect(report.state).toBe('done');
    expect(report.transitions.map((t) => t.to)).toEqual(['dispatching', 'collecting', 'consolidating', 'rendering', 'done']);
    expect(report.failedCategories).toEqual([]);
    expect(report.consolidated?.detailedAnalysis).toBe('Consolidated narrative.');
    expect(report.comments).toEqual([
      { file_path: 'src/a.js', line_number: 3, review_comment: 'Use a parameterized query' },
    ]);
    expect(cache.info().keys).toContain('consolidation_agent_local_0.2');
  });

  it('degrades when a reviewer fails but still consolidates', async () => {
    const { orchestrator } = build(
      responder({
        security: () => {
          throw new BackendError('offline');
        },
      }),
      ['security', 'style']
    );

    const report = await orchestrator.reviewCycle('code');

    expect(report.state).toBe('degraded');
    expect(report.failedCategories).toEqual(['security']);
    expect(report.consolidated?.reviewerResults.map((r) => r.category)).toEqual(['style']);
    expect(report.transitions.at(-1)).toEqual({ from: 'rendering', to: 'degraded', reason: 'reviewers failed: security' });
  });

  it('still consolidates when a reviewer times out inside the cycle', async () => {
    const { orchestrator } = build(
      responder({ performance: () => new Promise<string>(() => undefined) }),
      ['security', 'performance'],
      50
    );

    const report = await orchestrator.reviewCycle('code');

    expect(report.state).toBe('degraded');
    expect(report.failedCategories).toEqual(['performance']);
    expect(report.consolidated?.reviewerResults.map((r) => r.category)).toEqual(['security']);
    expect(Object.keys(report.consolidated?.findingsByCategory ?? {})).toEqual(['security']);
    expect(report.transitions.at(-1)).toEqual({ from: 'rendering', to: 'degraded', reason: 'reviewers failed: performance' });
  });

  it('degrades when comment generation cannot be parsed', async () => {
    const { orchestrator } = build(responder({}, 'I found nothing worth a list.'), ['security']);
    const report = await orchestrator.reviewCycle('code');

    expect(report.state).toBe('degraded');
    expect(report.comments).toEqual([]);
    expect(report.transitions.at(-1)?.reason).toBe('comment generation: malformed-output');
  });

  it('reports no review possible when every reviewer fails', async () => {
    const { orchestrator } = build(() => '', ['security', 'style']);
    const report = await orchestrator.reviewCycle('code');

    expect(report.state).toBe('degraded');
    expect(report.consolidated).toBeNull();
    expect(report.failedCategories.sort()).toEqual(['security', 'style']);
    expect(report.transitions.at(-1)).toEqual({ from: 'collecting', to: 'degraded', reason: 'no review possible' });
  });

  it('stops early with nothing enabled', async () => {
    const { orchestrator, backends } = build(responder(), []);
    const report = await orchestrator.reviewCycle('code');

    expect(report.transitions).toEqual([
      { from: 'idle', to: 'dispatching' },
      { from: 'dispatching', to: 'degraded', reason: 'no reviewers enabled' },
    ]);
    expect(backends).toHaveLength(0);
  });

  it('treats a blank payload as degenerate input', async () => {
    const { orchestrator } = build(responder());
    const report = await orchestrator.reviewCycle('   \n');

    expect(report).toEqual({
      state: 'degraded',
      transitions: [{ from: 'idle', to: 'degraded', reason: 'empty payload' }],
      consolidated: null,
      comments: [],
      failedCategories: [],
    });
  });
});
