import type { Finding, ReviewCategory, Severity } from './types.js';

// First matching row wins; substring match on the lower-cased line.
export const SEVERITY_KEYWORDS: ReadonlyArray<readonly [Severity, readonly string[]]> = [
  ['critical', ['critical', 'severe', 'vulnerability']],
  ['high', ['high', 'important', 'major']],
  ['medium', ['medium', 'moderate']],
  ['low', ['low', 'minor']],
];

export const FINDING_MARKERS = ['issue:', 'problem:', 'vulnerability:', 'warning:'] as const;
export const RECOMMENDATION_MARKERS = ['recommend:', 'suggest:', 'should:', 'fix:'] as const;

export const SCORE_PENALTY: Readonly<Record<Severity, number>> = {
  critical: 3,
  high: 2,
  medium: 1,
  low: 0,
  info: 0,
};

const SUMMARY_MAX_CHARS = 200;

export type ParsedReply = {
  findings: Finding[];
  recommendations: string[];
  score: number;
  summary: string;
};

export function classifySeverity(line: string): Severity {
  const lower = line.toLowerCase();
  for (const [severity, words] of SEVERITY_KEYWORDS) {
    if (words.some((w) => lower.includes(w))) return severity;
  }
  return 'info';
}

export function extractLineNumber(text: string): number | undefined {
  const m = text.match(/\bline\s*(\d+)/i);
  if (!m) return undefined;
  const n = Number(m[1]);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

function extractCodeSnippet(text: string): string | undefined {
  const m = text.match(/`([^`]+)`/);
  return m?.[1]?.trim() || undefined;
}

// Text after the first recommendation marker, if the line carries one.
function extractSuggestion(line: string): string | undefined {
  const lower = line.toLowerCase();
  for (const marker of RECOMMENDATION_MARKERS) {
    const at = lower.indexOf(marker);
    if (at !== -1) return line.slice(at + marker.length).trim() || undefined;
  }
  return undefined;
}

export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function findingKey(f: Pick<Finding, 'category' | 'lineNumber' | 'title'>): string {
  return `${f.category}:${f.lineNumber ?? ''}:${normalizeTitle(f.title)}`;
}

export function scoreFindings(findings: readonly Pick<Finding, 'severity'>[]): number {
  const raw = findings.reduce((score, f) => score - SCORE_PENALTY[f.severity], 10);
  return Math.max(1, raw);
}

export function summarizeReply(reply: string): string {
  return reply.length > SUMMARY_MAX_CHARS ? `${reply.slice(0, SUMMARY_MAX_CHARS)}...` : reply;
}

/**
 * Keyword heuristic over a free-form reviewer reply. Each non-blank line is
 * classified on its own; marker lines become findings or recommendations.
 * Repeated lines are kept and each one counts against the score; duplicates
 * are merged later, during consolidation.
 */
export function parseReviewerReply(reply: string, category: ReviewCategory): ParsedReply {
  const findings: Finding[] = [];
  const recommendations: string[] = [];

  for (const rawLine of reply.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const lower = line.toLowerCase();

    if (FINDING_MARKERS.some((m) => lower.includes(m))) {
      const lineNumber = extractLineNumber(line);
      const codeSnippet = extractCodeSnippet(line);
      const suggestion = extractSuggestion(line);
      const finding: Finding = Object.freeze({
        category,
        severity: classifySeverity(line),
        title: line,
        description: line,
        ...(lineNumber !== undefined ? { lineNumber } : {}),
        ...(codeSnippet ? { codeSnippet } : {}),
        ...(suggestion ? { suggestion } : {}),
      });
      findings.push(finding);
    }

    if (RECOMMENDATION_MARKERS.some((m) => lower.includes(m))) {
      recommendations.push(line);
    }
  }

  return {
    findings,
    recommendations,
    score: scoreFindings(findings),
    summary: summarizeReply(reply),
  };
}
