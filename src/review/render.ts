import { errorMessage, MalformedOutputError } from '../lib/errors.js';
import type { ConsolidatedResult, ReviewComment } from './types.js';

export const NO_ISSUES_MESSAGE = '✅ **No issues found!** The code looks good and follows best practices.';

function byLine(a: ReviewComment, b: ReviewComment): number {
  if (a.line_number === null) return b.line_number === null ? 0 : 1;
  if (b.line_number === null) return -1;
  return a.line_number - b.line_number;
}

export function groupCommentsByFile(comments: readonly ReviewComment[]): Map<string, ReviewComment[]> {
  const groups = new Map<string, ReviewComment[]>();
  for (const c of comments) {
    const list = groups.get(c.file_path) ?? [];
    list.push(c);
    groups.set(c.file_path, list);
  }
  return groups;
}

export function formatCommentsForPr(comments: readonly ReviewComment[]): string {
  if (!comments.length) return NO_ISSUES_MESSAGE;

  const groups = groupCommentsByFile(comments);
  const files = [...groups.keys()].sort();

  let out = '## 🔍 **Code Review Results**\n\n';
  for (const file of files) {
    const issues = [...(groups.get(file) ?? [])].sort(byLine);
    out += `### 📁 **File: ${file}** (${issues.length} ${issues.length === 1 ? 'issue' : 'issues'})\n\n`;
    for (const c of issues) {
      const label = c.line_number === null ? '**General:**' : `**Line ${c.line_number}:**`;
      out += `${label} ${c.review_comment}\n\n`;
    }
    out += '---\n\n';
  }

  out += `**📊 Summary:** Found ${comments.length} issue(s) across ${files.length} file(s).\n\n`;
  out += 'Please review the feedback above and address any critical issues before merging.';
  return out;
}

export function serializeComments(comments: readonly ReviewComment[]): string {
  return JSON.stringify(comments, null, 2);
}

function toComment(item: unknown, index: number): ReviewComment {
  if (typeof item !== 'object' || item === null || Array.isArray(item)) {
    throw new MalformedOutputError(`Comment ${index} is not an object`);
  }
  const rec: Record<string, unknown> = { ...item };
  const { file_path, line_number, review_comment } = rec;
  if (typeof file_path !== 'string' || typeof review_comment !== 'string') {
    throw new MalformedOutputError(`Comment ${index} is missing file_path or review_comment`);
  }
  const line =
    line_number === null
      ? null
      : typeof line_number === 'number' && Number.isInteger(line_number) && line_number > 0
        ? line_number
        : undefined;
  if (line === undefined) throw new MalformedOutputError(`Comment ${index} has an invalid line_number`);
  return { file_path, line_number: line, review_comment };
}

// Inverse of serializeComments; key order is fixed so re-serializing is byte-identical.
export function parseComments(text: string): ReviewComment[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new MalformedOutputError('Comment list is not valid JSON', { cause: errorMessage(e) });
  }
  if (!Array.isArray(parsed)) throw new MalformedOutputError('Comment list is not a JSON array');
  return parsed.map(toComment);
}

export function renderConsolidatedJson(result: ConsolidatedResult, comments?: readonly ReviewComment[]): string {
  return JSON.stringify(
    {
      overall_score: result.overallScore,
      summary: result.summary,
      severity_distribution: result.severityDistribution,
      critical_issues: result.criticalIssues,
      priority_recommendations: result.priorityRecommendations,
      findings_by_category: result.findingsByCategory,
      reviewers: result.reviewerResults.map((r) => ({
        name: r.reviewerName,
        category: r.category,
        score: r.score,
        summary: r.summary,
        findings: r.findings,
        recommendations: r.recommendations,
      })),
      detailed_analysis: result.detailedAnalysis,
      ...(comments ? { review_comments: comments } : {}),
    },
    null,
    2
  );
}
