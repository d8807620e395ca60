export const SEVERITIES = ['critical', 'high', 'medium', 'low', 'info'] as const;

// Ordered by decreasing urgency.
export type Severity = (typeof SEVERITIES)[number];

export const REVIEW_CATEGORIES = [
  'security',
  'performance',
  'style',
  'architecture',
  'readability',
  'testability',
] as const;

export type ReviewCategory = (typeof REVIEW_CATEGORIES)[number];

export function isReviewCategory(x: string): x is ReviewCategory {
  return REVIEW_CATEGORIES.some((c) => c === x);
}

export type Finding = Readonly<{
  category: ReviewCategory;
  severity: Severity;
  title: string;
  description: string;
  lineNumber?: number;
  codeSnippet?: string;
  suggestion?: string;
}>;

export type ReviewerResult = Readonly<{
  reviewerName: string;
  category: ReviewCategory;
  score: number; // 1..10
  summary: string;
  rawText: string;
  findings: readonly Finding[];
  recommendations: readonly string[];
}>;

export type SeverityDistribution = Partial<Record<Severity, number>>;

export type ConsolidatedResult = Readonly<{
  overallScore: number; // 1..10
  summary: string;
  reviewerResults: readonly ReviewerResult[];
  criticalIssues: readonly Finding[];
  priorityRecommendations: readonly string[];
  findingsByCategory: Readonly<Partial<Record<ReviewCategory, readonly Finding[]>>>;
  severityDistribution: Readonly<SeverityDistribution>;
  detailedAnalysis: string;
}>;

// Wire shape consumed by the PR layer; snake_case on purpose.
export type ReviewComment = {
  file_path: string;
  line_number: number | null;
  review_comment: string;
};

export type CycleState =
  | 'idle'
  | 'dispatching'
  | 'collecting'
  | 'consolidating'
  | 'rendering'
  | 'degraded'
  | 'done';
