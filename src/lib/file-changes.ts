import { splitUnifiedDiffByFile } from './diff-pack.js';
import { isRecord } from './http.js';

export const FILE_CHANGE_STATUSES = ['added', 'modified', 'deleted', 'renamed'] as const;
export type FileChangeStatus = (typeof FILE_CHANGE_STATUSES)[number];

export type FileChange = {
  filename: string;
  status: FileChangeStatus;
  additions: number;
  deletions: number;
  oldFilename?: string;
  diffContent: string;
  language?: string;
};

const LANGUAGES: Readonly<Record<string, string>> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.hpp': 'cpp',
  '.cs': 'csharp',
  '.php': 'php',
  '.rb': 'ruby',
  '.go': 'go',
  '.rs': 'rust',
  '.swift': 'swift',
  '.kt': 'kotlin',
  '.scala': 'scala',
  '.sql': 'sql',
  '.html': 'html',
  '.css': 'css',
  '.scss': 'scss',
  '.less': 'less',
  '.json': 'json',
  '.xml': 'xml',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.md': 'markdown',
  '.sh': 'bash',
  '.dockerfile': 'dockerfile',
};

const HEADER = /^diff --git a\/(.*?) b\/(.*)$/;

// By extension; dotfiles such as `.env` have none.
export function detectLanguage(filename: string): string | undefined {
  const base = filename.toLowerCase().split('/').pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0) return undefined;
  return LANGUAGES[base.slice(dot)];
}

function parseFileBlock(patch: string): FileChange | null {
  const lines = patch.split('\n');
  const header = lines[0]?.match(HEADER);
  if (!header) return null;

  const oldPath = header[1] ?? '';
  const newPath = header[2] ?? '';
  let status: FileChangeStatus = 'modified';
  let filename = newPath;
  let oldFilename: string | undefined;

  for (const line of lines.slice(1, 10)) {
    if (line.startsWith('new file mode')) status = 'added';
    else if (line.startsWith('deleted file mode')) {
      status = 'deleted';
      filename = oldPath;
    } else if (line.startsWith('rename from')) {
      status = 'renamed';
      oldFilename = oldPath;
    }
  }

  let additions = 0;
  let deletions = 0;
  const hunkStart = lines.findIndex((l) => l.startsWith('@@'));
  const hunks = hunkStart === -1 ? [] : lines.slice(hunkStart);

  for (const line of hunks) {
    if (line.startsWith('+') && !line.startsWith('+++')) additions++;
    else if (line.startsWith('-') && !line.startsWith('---')) deletions++;
  }

  const language = detectLanguage(filename);
  return {
    filename,
    status,
    additions,
    deletions,
    ...(oldFilename ? { oldFilename } : {}),
    diffContent: hunks.join('\n'),
    ...(language ? { language } : {}),
  };
}

/** One entry per `diff --git` block, with status, line counts and hunk text. */
export function parseDiffFileChanges(diff: string): FileChange[] {
  return splitUnifiedDiffByFile(diff)
    .map((b) => parseFileBlock(b.patch))
    .filter((c): c is FileChange => c !== null);
}

function toStatus(x: unknown): FileChangeStatus {
  if (x === 'removed') return 'deleted';
  return FILE_CHANGE_STATUSES.find((s) => s === x) ?? 'modified';
}

function toCount(x: unknown): number {
  const n = typeof x === 'string' ? Number(x) : x;
  return typeof n === 'number' && Number.isFinite(n) ? Math.max(0, Math.trunc(n)) : 0;
}

function firstString(rec: Record<string, unknown>, ...keys: string[]): string {
  for (const k of keys) {
    const v = rec[k];
    if (typeof v === 'string' && v) return v;
  }
  return '';
}

/**
 * Accepts a change list such as GitHub's "list pull request files" reply.
 * Items without a file name are skipped.
 */
export function fileChangesFromJson(data: unknown): FileChange[] {
  if (!Array.isArray(data)) throw new Error('Change list must be a JSON array of file changes');

  const out: FileChange[] = [];
  for (const item of data) {
    if (!isRecord(item)) continue;
    const filename = firstString(item, 'filename', 'file');
    if (!filename) continue;

    const oldFilename = firstString(item, 'old_filename', 'previous_filename');
    const language = detectLanguage(filename);
    out.push({
      filename,
      status: toStatus(item.status),
      additions: toCount(item.additions ?? item.added),
      deletions: toCount(item.deletions ?? item.deleted),
      ...(oldFilename ? { oldFilename } : {}),
      diffContent: firstString(item, 'diff', 'patch'),
      ...(language ? { language } : {}),
    });
  }
  return out;
}
