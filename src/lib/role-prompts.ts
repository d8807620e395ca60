export type RoleBrief = {
  expert: string; // "a cybersecurity expert"
  subject: string; // "security issue"
  focus: string[];
  diffFocus: string;
  asks: string[];
  example: string;
  closing: string;
};

// Prefixes every line with its 1-based number so the model can cite it.
export function numberLines(code: string): string {
  return code
    .split('\n')
    .map((line, i) => `${String(i + 1).padStart(3, ' ')}: ${line}`)
    .join('\n');
}

export function buildDiffOnlyPrompt(brief: RoleBrief, payload: string): string {
  return [
    `You are ${brief.expert} reviewing code changes.`,
    '',
    "CRITICAL RESTRICTION: You are reviewing a DIFF with context. You MUST ONLY comment on the lines that are being ADDED or CHANGED in the diff (lines starting with '+' or modified lines). DO NOT comment on context lines or unchanged code.",
    '',
    'The content below contains:',
    '1. DIFF TO REVIEW: The actual changes you should analyze',
    '2. FULL FILE CONTEXT: Additional context to understand the changes (DO NOT REVIEW THESE LINES)',
    '',
    payload,
    '',
    'INSTRUCTIONS:',
    '- ONLY review the lines that are being added/changed in the DIFF section',
    '- Use the FULL FILE CONTEXT only to understand the broader context',
    `- For each ${brief.subject} found in the DIFF changes, provide:`,
    '  * Exact line number from the diff',
    ...brief.asks.map((a) => `  * ${a}`),
    '  * Start with "Line X:" format',
    '',
    `Focus on these aspects in the CHANGED LINES ONLY: ${brief.diffFocus}`,
    '',
    `Example: "${brief.example}"`,
    '',
    `${brief.closing} IGNORE unchanged context lines.`,
  ].join('\n');
}

export function buildFullReviewPrompt(brief: RoleBrief, payload: string): string {
  return [
    `You are ${brief.expert} conducting a thorough code review.`,
    '',
    'Analyze this code and provide specific, actionable feedback with EXACT LINE NUMBERS:',
    '',
    '```',
    numberLines(payload),
    '```',
    '',
    `CRITICAL: For each ${brief.subject} found, you MUST:`,
    '- Start with "Line X:" where X is the specific line number',
    ...brief.asks.map((a) => `- ${a}`),
    '',
    'Focus on these aspects:',
    ...brief.focus.map((f, i) => `${i + 1}. ${f}`),
    '',
    `Example format: "${brief.example}"`,
    '',
    `${brief.closing} Use specific line references.`,
  ].join('\n');
}

export const REVIEWER_SYSTEM_PROMPT = (expertise: string) =>
  `You are a ${expertise} expert conducting a thorough code review. ` +
  'CRITICAL REQUIREMENTS: 1) ALWAYS scan the ENTIRE code thoroughly for ALL potential issues, ' +
  '2) NEVER miss obvious problems, 3) ALWAYS provide specific line numbers for each issue you identify, ' +
  "4) Format your response to clearly indicate the line number for each finding (e.g., 'Line 15: Issue: description'), " +
  '5) Prefix issues with "Issue:" and fixes with "Fix:", 6) Be comprehensive and consistent in your analysis.';

export function buildDiffContextPayload(diff: string, fileContent: string): string {
  return [
    'DIFF TO REVIEW:',
    diff,
    '',
    'FULL FILE CONTEXT:',
    fileContent,
    '',
    'INSTRUCTIONS: Only review the changes shown in the DIFF section above. Use the full file context to understand the surrounding code, but do not comment on unchanged lines.',
  ].join('\n');
}
