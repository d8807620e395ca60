import type { ReviewComment } from './types.js';

export type InlineComment = {
  path: string;
  line: number;
  body: string;
};

// GitHub needs an exact file + line for review comments; anything without a
// line, or on a file outside the diff, stays in the summary comment only.
export function commentsToInlineComments(
  comments: readonly ReviewComment[],
  diffPaths: readonly string[]
): InlineComment[] {
  const out: InlineComment[] = [];

  for (const c of comments) {
    if (c.line_number === null) continue;
    if (!diffPaths.includes(c.file_path)) continue;
    out.push({ path: c.file_path, line: c.line_number, body: c.review_comment });
  }

  // De-dupe by path+line
  const seen = new Set<string>();
  return out.filter((c) => {
    const k = `${c.path}::${c.line}`;
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}
