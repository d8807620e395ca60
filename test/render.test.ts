import { describe, expect, it } from 'vitest';

import {
  formatCommentsForPr,
  NO_ISSUES_MESSAGE,
  parseComments,
  renderConsolidatedJson,
  serializeComments,
} from '../src/review/render.js';
import type { ConsolidatedResult, ReviewComment } from '../src/review/types.js';
import { MalformedOutputError } from '../src/lib/errors.js';

const comments: ReviewComment[] = [
  { file_path: 'b.js', line_number: 5, review_comment: 'B5' },
  { file_path: 'a.js', line_number: null, review_comment: 'General note' },
  { file_path: 'a.js', line_number: 2, review_comment: 'A2' },
];

describe('formatCommentsForPr', () => {
  it('renders the no-issues message for an empty list', () => {
    expect(formatCommentsForPr([])).toBe(NO_ISSUES_MESSAGE);
    expect(NO_ISSUES_MESSAGE).toBe('✅ **No issues found!** The code looks good and follows best practices.');
  });

  it('groups by sorted file and orders lines with unnumbered last', () => {
    expect(formatCommentsForPr(comments)).toBe(
      '## 🔍 **Code Review Results**\n\n' +
        '### 📁 **File: a.js** (2 issues)\n\n' +
        '**Line 2:** A2\n\n' +
        '**General:** General note\n\n' +
        '---\n\n' +
        '### 📁 **File: b.js** (1 issue)\n\n' +
        '**Line 5:** B5\n\n' +
        '---\n\n' +
        '**📊 Summary:** Found 3 issue(s) across 2 file(s).\n\n' +
        'Please review the feedback above and address any critical issues before merging.'
    );
  });
});

describe('comment serialization', () => {
  it('emits indented JSON', () => {
    expect(serializeComments([{ file_path: 'a.js', line_number: 1, review_comment: 'x' }])).toBe(
      '[\n  {\n    "file_path": "a.js",\n    "line_number": 1,\n    "review_comment": "x"\n  }\n]'
    );
    expect(serializeComments([])).toBe('[]');
  });

  it('re-serializes parsed output byte for byte', () => {
    const text = serializeComments(comments);
    expect(serializeComments(parseComments(text))).toBe(text);
  });

  it('rejects items that are not comments', () => {
    expect(() => parseComments('{"file_path":"a.js"}')).toThrow(MalformedOutputError);
    expect(() => parseComments('[{"file_path":"a.js","line_number":0,"review_comment":"x"}]')).toThrow(
      'Comment 0 has an invalid line_number'
    );
    expect(() => parseComments('[{"line_number":1,"review_comment":"x"}]')).toThrow(MalformedOutputError);
    expect(() => parseComments('not json')).toThrow('Comment list is not valid JSON');
  });
});

describe('renderConsolidatedJson', () => {
  it('writes the report with the rendered comments', () => {
    const result: ConsolidatedResult = {
      overallScore: 6,
      summary: 'summary',
      reviewerResults: [
        {
          reviewerName: 'SecurityReviewer',
          category: 'security',
          score: 6,
          summary: 's',
          rawText: 'raw',
          findings: [],
          recommendations: ['Fix: x'],
        },
      ],
      criticalIssues: [],
      priorityRecommendations: [],
      findingsByCategory: {},
      severityDistribution: { medium: 2 },
      detailedAnalysis: 'analysis',
    };

    const parsed: unknown = JSON.parse(renderConsolidatedJson(result, comments.slice(0, 1)));
    expect(parsed).toEqual({
      overall_score: 6,
      summary: 'summary',
      severity_distribution: { medium: 2 },
      critical_issues: [],
      priority_recommendations: [],
      findings_by_category: {},
      reviewers: [
        {
          name: 'SecurityReviewer',
          category: 'security',
          score: 6,
          summary: 's',
          findings: [],
          recommendations: ['Fix: x'],
        },
      ],
      detailed_analysis: 'analysis',
      review_comments: [{ file_path: 'b.js', line_number: 5, review_comment: 'B5' }],
    });
  });
});
