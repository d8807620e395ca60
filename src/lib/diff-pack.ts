export type DiffFileBlock = {
  path: string;
  patch: string;
};

export type PackDiffOptions = {
  maxFiles?: number;
  maxTotalChars?: number;
};

export type PackedDiff = {
  text: string;
  selectedFiles: string[];
  truncated: boolean;
};

const GIT_HEADER = /^diff --git a\/(\S+) b\/(\S+)/;

export function shouldReviewPath(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  if (lower.endsWith('.lock')) return false;
  if (lower.endsWith('package-lock.json')) return false;
  if (lower.endsWith('pnpm-lock.yaml')) return false;
  if (lower.includes('/dist/') || lower.startsWith('dist/')) return false;
  if (lower.includes('/vendor/') || lower.startsWith('vendor/')) return false;
  if (lower.endsWith('.min.js') || lower.endsWith('.min.css')) return false;
  return true;
}

/**
 * New-side paths named by `diff --git a/… b/…` headers, in order of first
 * appearance. Diffs without git headers fall back to `+++ b/…` lines.
 */
export function extractDiffFilePaths(diff: string): string[] {
  const lines = diff.split(/\r?\n/);
  const paths: string[] = [];
  const add = (p: string | undefined) => {
    if (p && !paths.includes(p)) paths.push(p);
  };

  for (const line of lines) add(line.match(GIT_HEADER)?.[2]);
  if (paths.length) return paths;

  for (const line of lines) add(line.match(/^\+\+\+ b\/(\S+)/)?.[1]);
  return paths;
}

export function splitUnifiedDiffByFile(diff: string): DiffFileBlock[] {
  const out: DiffFileBlock[] = [];
  let curPath: string | null = null;
  let cur: string[] = [];

  const flush = () => {
    if (curPath) out.push({ path: curPath, patch: cur.join('\n').trimEnd() });
  };

  for (const line of diff.split(/\r?\n/)) {
    if (line.startsWith('diff --git ')) {
      flush();
      cur = [line];
      curPath = line.match(GIT_HEADER)?.[2] ?? null;
      continue;
    }
    if (curPath) cur.push(line);
  }

  flush();
  return out;
}

// Keeps whole file blocks in order until the character budget runs out.
export function packUnifiedDiff(diff: string, opts: PackDiffOptions = {}): PackedDiff {
  const { maxFiles = 25, maxTotalChars = 120_000 } = opts;

  const blocks = splitUnifiedDiffByFile(diff).filter((b) => shouldReviewPath(b.path));
  const parts: string[] = [];
  const selectedFiles: string[] = [];
  let total = 0;
  let truncated = blocks.length > maxFiles;

  for (const b of blocks.slice(0, maxFiles)) {
    if (total + b.patch.length + 1 > maxTotalChars) {
      truncated = true;
      break;
    }
    parts.push(b.patch);
    selectedFiles.push(b.path);
    total += b.patch.length + 1;
  }

  return { text: parts.join('\n'), selectedFiles, truncated };
}
