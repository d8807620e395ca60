import * as core from '@actions/core';

import type { ClientCache } from '../lib/client-cache.js';
import { ConfigurationError, errorMessage, MalformedOutputError } from '../lib/errors.js';
import type { BackendClient, BackendKind } from '../lib/llm.js';
import { CATEGORY_TABLE } from './categories.js';
import { requireJsonArray } from './json.js';
import { findingKey, normalizeTitle } from './parsing.js';
import type {
  ConsolidatedResult,
  Finding,
  ReviewCategory,
  ReviewComment,
  ReviewerResult,
  SeverityDistribution,
} from './types.js';

export const DEFAULT_SCORE = 5;
export const ANALYSIS_UNAVAILABLE = 'Unable to generate detailed analysis due to AI service unavailability.';
export const MAX_PRIORITY_RECOMMENDATIONS = 10;
export const PAYLOAD_EXCERPT_CHARS = 1000;
export const ANALYSIS_FINDINGS_LIMIT = 10;

export const PRIORITY_KEYWORDS = [
  'security',
  'vulnerability',
  'critical',
  'fix immediately',
  'performance',
  'bottleneck',
  'memory leak',
  'sql injection',
  'xss',
  'authentication',
  'authorization',
] as const;

const CONSOLIDATOR_SYSTEM =
  'You are a senior technical lead specializing in consolidating multiple code review reports. ' +
  'Provide comprehensive analysis and actionable recommendations.';

const REVIEW_GOAL = `**Goal:**
Review each hunk of diff and reviewer feedback
    - If there is any feedback for that hunk: Provide crisp feedback with line numbers and suggest the change to be made.
    - If there is no feedback for that hunk: Ignore and move on the next hunk.
    - Do not provide a highly verbose review, so that it is not overwhelming for the user to read.`;

const OUTPUT_FORMAT = `CRITICAL: Your response must be ONLY a valid JSON array. Do not include any other text, explanations, or markdown formatting.

Output format (return ONLY this JSON, nothing else):
[
    {
        "file_path": "filename.js",
        "line_number": 10,
        "review_comment": "Specific issue description and suggested fix"
    }
]

If no issues found, return: []`;

const CONSOLIDATION_RULES = `CRITICAL CONSOLIDATION INSTRUCTIONS:
1. ANALYZE ALL REVIEWER FEEDBACK thoroughly - do not miss any issue mentioned by any reviewer
2. DEDUPLICATE similar findings: if several reviewers mention the same issue on the same or a nearby line, merge them into ONE review comment
3. COMBINE related issues into one comprehensive comment
4. Extract specific line numbers where mentioned and write crisp, actionable comments
5. BE COMPREHENSIVE: every distinct issue found by any reviewer must appear in the output

QUALITY REQUIREMENTS:
- NEVER skip or drop a distinct issue
- NEVER use placeholder text or truncate a comment
- Each review_comment must be complete and include a specific fix suggestion`;

export type ConsolidationOptions = {
  cache: ClientCache;
  backend: BackendKind;
  temperature: number;
  maxRetries?: number;
};

export type CommentGenerationStatus = 'ok' | 'backend-unavailable' | 'malformed-output';

export type CommentGeneration = {
  comments: ReviewComment[];
  status: CommentGenerationStatus;
  strategy?: string;
};

// Ties go to the even neighbour: 6.5 -> 6, 7.5 -> 8.
export function roundHalfEven(x: number): number {
  const r = Math.round(x);
  return Math.abs(x % 1) === 0.5 && r % 2 !== 0 ? r - 1 : r;
}

export function overallScore(results: readonly ReviewerResult[]): number {
  if (!results.length) return DEFAULT_SCORE;
  const mean = results.reduce((sum, r) => sum + r.score, 0) / results.length;
  return Math.min(10, Math.max(1, roundHalfEven(mean)));
}

export function qualityBand(score: number): string {
  if (score >= 8) return 'excellent';
  if (score >= 6) return 'good';
  if (score >= 4) return 'acceptable';
  return 'needs improvement';
}

export function executiveSummary(results: readonly ReviewerResult[], score: number, criticalCount: number): string {
  const n = results.length;
  const titles = results.map((r) => CATEGORY_TABLE[r.category].title).join(', ');
  const parts = [
    n ? `Code review completed by ${n} specialized reviewer${n === 1 ? '' : 's'}: ${titles}.` : 'Code review completed without any successful reviewers.',
    `Overall code quality is ${qualityBand(score)} with a score of ${score}/10.`,
  ];
  if (criticalCount > 0) {
    parts.push(`However, ${criticalCount} critical issue${criticalCount === 1 ? ' requires' : 's require'} immediate attention.`);
  }
  return parts.join(' ');
}

export function priorityRecommendations(recommendations: readonly string[], critical: readonly Finding[]): string[] {
  const out: string[] = [];
  const add = (s: string) => {
    if (!out.includes(s)) out.push(s);
  };

  for (const f of critical) {
    if (f.suggestion) add(`CRITICAL: ${f.suggestion}`);
  }
  for (const rec of recommendations) {
    const lower = rec.toLowerCase();
    if (PRIORITY_KEYWORDS.some((k) => lower.includes(k))) add(rec);
  }

  return out.slice(0, MAX_PRIORITY_RECOMMENDATIONS);
}

export function buildAnalysisPrompt(results: readonly ReviewerResult[], findings: readonly Finding[], payload: string): string {
  const excerpt = payload.length > PAYLOAD_EXCERPT_CHARS ? `${payload.slice(0, PAYLOAD_EXCERPT_CHARS)}...` : payload;
  const reviewerLines = results.map(
    (r) => `- ${r.reviewerName}: Score ${r.score}/10, ${r.findings.length ? `${r.findings.length} findings` : 'no major issues'}`
  );
  const findingLines = findings
    .slice(0, ANALYSIS_FINDINGS_LIMIT)
    .map((f) => `- [${f.severity.toUpperCase()}] ${f.title}`);

  return [
    'You are a senior technical lead consolidating multiple specialized code review reports.',
    '',
    'Original Code:',
    '```',
    excerpt,
    '```',
    '',
    'Reviewer Summary:',
    ...reviewerLines,
    '',
    'Key Findings:',
    ...findingLines,
    '',
    'Provide a consolidated analysis that covers:',
    '1. **Cross-Reviewer Correlation**: connections between the findings of different reviewers',
    '2. **Priority Assessment**: issues ranked by business impact and technical risk',
    '3. **Root Cause Analysis**: underlying causes that contribute to several issues',
    '4. **Implementation Roadmap**: the order in which to address the issues',
    '5. **Trade-off Analysis**: conflicts between recommendations',
    '6. **Quality Gates**: what must be fixed before the code can be deployed',
    '',
    'Be specific and actionable.',
  ].join('\n');
}

export function buildCommentsPrompt(result: ConsolidatedResult, primaryFilePath: string, knownFilePaths: readonly string[]): string {
  const reviews = result.reviewerResults.map((r) =>
    [
      `**${CATEGORY_TABLE[r.category].title} Reviewer:**`,
      r.rawText,
      '',
      '**Recommendations:**',
      ...r.recommendations.map((rec) => `- ${rec}`),
    ].join('\n')
  );

  const fileContext = knownFilePaths.length
    ? `Files in this diff: ${knownFilePaths.join(', ')}`
    : `File being reviewed: ${primaryFilePath}`;

  return [
    REVIEW_GOAL,
    '',
    OUTPUT_FORMAT,
    '',
    'Reviews to Consolidate:',
    ...reviews,
    '',
    fileContext,
    '',
    CONSOLIDATION_RULES,
    '',
    'Consolidate these reviews into the JSON format above, with NO DUPLICATE issues for the same line but ALL DISTINCT ISSUES included.',
  ].join('\n');
}

function toLineNumber(x: unknown): number | null {
  const n = typeof x === 'string' && x.trim() !== '' ? Number(x) : x;
  if (typeof n !== 'number' || !Number.isFinite(n) || n <= 0) return null;
  return Math.floor(n);
}

export type RawComment = { index: number; claimedPath: string; comment: ReviewComment };

// Keeps object items only; `index` is the position in the reply array.
export function normalizeCommentItems(items: readonly unknown[]): RawComment[] {
  const out: RawComment[] = [];
  items.forEach((item, index) => {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) return;
    const rec: Record<string, unknown> = { ...item };
    const text = rec.review_comment;
    out.push({
      index,
      claimedPath: typeof rec.file_path === 'string' ? rec.file_path.trim() : '',
      comment: {
        file_path: '',
        line_number: toLineNumber(rec.line_number),
        review_comment: typeof text === 'string' ? text : text === undefined || text === null ? '' : JSON.stringify(text),
      },
    });
  });
  return out;
}

// The known path equal to the claimed one, or the longest one the claim ends with at a `/`.
export function matchKnownPath(claimed: string, known: readonly string[]): string | undefined {
  if (!claimed || claimed === 'unknown') return undefined;
  return known
    .filter((k) => claimed === k || claimed.endsWith(`/${k}`))
    .sort((a, b) => b.length - a.length)[0];
}

/**
 * Every emitted path comes from the caller: a matching known path, the known
 * path at `index % known.length`, or the primary path when nothing is known.
 */
export function assignFilePaths(items: readonly RawComment[], primaryFilePath: string, knownFilePaths: readonly string[]): ReviewComment[] {
  return items.map(({ index, claimedPath, comment }) => {
    if (!knownFilePaths.length) return { ...comment, file_path: primaryFilePath };
    const file_path = matchKnownPath(claimedPath, knownFilePaths) ?? knownFilePaths[index % knownFilePaths.length];
    return { ...comment, file_path };
  });
}

export function dedupeComments(comments: readonly ReviewComment[]): ReviewComment[] {
  const seen = new Set<string>();
  return comments.filter((c) => {
    const k = `${c.file_path}::${c.line_number ?? ''}::${normalizeTitle(c.review_comment)}`;
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}

export class ConsolidationEngine {
  readonly maxRetries: number;

  constructor(private readonly opts: ConsolidationOptions) {
    this.maxRetries = Math.max(1, opts.maxRetries ?? 3);
  }

  private client(): Promise<BackendClient> {
    return this.opts.cache.acquire('consolidation_agent', this.opts.backend, this.opts.temperature);
  }

  async consolidate(results: readonly ReviewerResult[], originalPayload: string): Promise<ConsolidatedResult> {
    const findings: Finding[] = [];
    const recommendations: string[] = [];
    const seen = new Set<string>();

    for (const r of results) {
      recommendations.push(...r.recommendations);
      for (const f of r.findings) {
        const key = findingKey(f);
        if (seen.has(key)) continue;
        seen.add(key);
        findings.push(f);
      }
    }

    const criticalIssues = findings.filter((f) => f.severity === 'critical');
    const findingsByCategory: Partial<Record<ReviewCategory, Finding[]>> = {};
    const severityDistribution: SeverityDistribution = {};

    for (const f of findings) {
      (findingsByCategory[f.category] ??= []).push(f);
      severityDistribution[f.severity] = (severityDistribution[f.severity] ?? 0) + 1;
    }

    const score = overallScore(results);
    const detailedAnalysis = await this.detailedAnalysis(results, findings, originalPayload);

    return Object.freeze({
      overallScore: score,
      summary: executiveSummary(results, score, criticalIssues.length),
      reviewerResults: Object.freeze([...results]),
      criticalIssues: Object.freeze(criticalIssues),
      priorityRecommendations: Object.freeze(priorityRecommendations(recommendations, criticalIssues)),
      findingsByCategory: Object.freeze(findingsByCategory),
      severityDistribution: Object.freeze(severityDistribution),
      detailedAnalysis,
    });
  }

  private async detailedAnalysis(results: readonly ReviewerResult[], findings: readonly Finding[], payload: string): Promise<string> {
    try {
      const client = await this.client();
      const text = await client.complete({
        systemPrompt: CONSOLIDATOR_SYSTEM,
        userPrompt: buildAnalysisPrompt(results, findings, payload),
        temperature: this.opts.temperature,
        maxTokens: 3000,
      });
      return text.trim() || ANALYSIS_UNAVAILABLE;
    } catch (e) {
      if (e instanceof ConfigurationError) throw e;
      core.error(`Error in consolidation analysis: ${errorMessage(e)}`);
      return ANALYSIS_UNAVAILABLE;
    }
  }

  async renderComments(
    result: ConsolidatedResult,
    primaryFilePath: string,
    knownFilePaths: readonly string[] = []
  ): Promise<CommentGeneration> {
    const userPrompt = buildCommentsPrompt(result, primaryFilePath, knownFilePaths);
    const systemPrompt = `You are a senior technical lead consolidating code review reports. ${REVIEW_GOAL}\n\n${OUTPUT_FORMAT}`;

    let reply = '';
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const client = await this.client();
        reply = await client.complete({ systemPrompt, userPrompt, temperature: 0.2, maxTokens: 4000 });
        if (reply.trim()) break;
        core.warning(`Attempt ${attempt}/${this.maxRetries} returned an empty reply`);
      } catch (e) {
        if (e instanceof ConfigurationError) throw e;
        core.warning(`Attempt ${attempt}/${this.maxRetries} failed: ${errorMessage(e)}`);
      }
    }

    if (!reply.trim()) {
      core.error(`All ${this.maxRetries} comment generation attempts failed`);
      return { comments: [], status: 'backend-unavailable' };
    }

    try {
      const { value, strategy } = requireJsonArray(reply);
      core.debug(`Parsed ${value.length} review comments (${strategy})`);
      const assigned = assignFilePaths(normalizeCommentItems(value), primaryFilePath, knownFilePaths);
      return { comments: dedupeComments(assigned), status: 'ok', strategy };
    } catch (e) {
      if (!(e instanceof MalformedOutputError)) throw e;
      core.warning(`Could not parse review comments: ${e.message}`);
      return { comments: [], status: 'malformed-output' };
    }
  }

  async generateReviewComments(
    result: ConsolidatedResult,
    primaryFilePath: string,
    knownFilePaths: readonly string[] = []
  ): Promise<ReviewComment[]> {
    return (await this.renderComments(result, primaryFilePath, knownFilePaths)).comments;
  }
}
